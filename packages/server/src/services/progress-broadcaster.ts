import type { FastifyBaseLogger } from "fastify";
import type {
  ConnectionEvent,
  JobSummary,
  ProgressFrame,
  PushFrame,
} from "@neurodeck/shared";
import { errorMessage } from "../errors.js";

/** One outbound connection. `send` may throw or reject when the peer is gone. */
export interface PushChannel {
  readonly id: string;
  send(frame: PushFrame): void | Promise<void>;
}

export interface BroadcasterConfig {
  deliveryTimeoutMs: number;
  heartbeatIntervalMs: number;
}

const DEFAULT_CONFIG: BroadcasterConfig = {
  deliveryTimeoutMs: 5000,
  heartbeatIntervalMs: 15_000,
};

function withTimeout(work: Promise<void>, ms: number): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`delivery timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Fans progress frames out to per-job subscribers and connection events to
 * every open connection. Each channel has its own ordered send queue, so a
 * slow peer delays only itself; callers may hand frames off without waiting.
 * A channel whose delivery fails is dropped and its queued frames are
 * discarded; publish itself never fails.
 */
export class ProgressBroadcaster {
  private subscribers = new Map<string, Set<PushChannel>>();
  private connections = new Set<PushChannel>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private config: BroadcasterConfig;
  /** Tail of each channel's send queue; resolves false once the channel failed. */
  private queues = new WeakMap<PushChannel, Promise<boolean>>();

  constructor(
    private log: FastifyBaseLogger,
    config?: Partial<BroadcasterConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.heartbeat().catch((err: unknown) => {
        this.log.warn({ err: errorMessage(err) }, "Heartbeat failed");
      });
    }, this.config.heartbeatIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Drop every channel and stop the heartbeat. */
  close(): void {
    this.stop();
    this.subscribers.clear();
    this.connections.clear();
  }

  subscribe(jobId: string, channel: PushChannel): void {
    let set = this.subscribers.get(jobId);
    if (!set) {
      set = new Set();
      this.subscribers.set(jobId, set);
    }
    set.add(channel);
    this.start();
    this.log.debug({ jobId, channelId: channel.id }, "Subscribed to job progress");
  }

  unsubscribe(jobId: string, channel: PushChannel): void {
    const set = this.subscribers.get(jobId);
    if (!set) return;
    set.delete(channel);
    if (set.size === 0) this.subscribers.delete(jobId);
    this.stopIfIdle();
  }

  addConnection(channel: PushChannel): void {
    this.connections.add(channel);
    this.start();
  }

  removeConnection(channel: PushChannel): void {
    this.connections.delete(channel);
    this.stopIfIdle();
  }

  subscriberCount(jobId: string): number {
    return this.subscribers.get(jobId)?.size ?? 0;
  }

  connectionCount(): number {
    return this.connections.size;
  }

  subscribedJobCount(): number {
    return this.subscribers.size;
  }

  /**
   * Push a job snapshot to everyone subscribed to that job. Frames are queued
   * synchronously; the promise settles once every current subscriber took the
   * frame or was dropped.
   */
  async publish(jobId: string, data: JobSummary): Promise<void> {
    const set = this.subscribers.get(jobId);
    if (!set || set.size === 0) return;
    const frame: ProgressFrame = { type: "training_progress", jobId, data };
    await this.deliver([...set], frame, (channel) => this.unsubscribe(jobId, channel));
  }

  /** Push an event to every open connection. */
  async broadcast(event: ConnectionEvent): Promise<void> {
    if (this.connections.size === 0) return;
    await this.deliver([...this.connections], event, (channel) =>
      this.removeConnection(channel),
    );
  }

  /**
   * Queue a frame behind the channel's earlier sends. Resolves false when this
   * send, or an earlier one on the same channel, failed.
   */
  sendTo(channel: PushChannel, frame: PushFrame): Promise<boolean> {
    const previous = this.queues.get(channel) ?? Promise.resolve(true);
    const next = previous.then((healthy) => (healthy ? this.attempt(channel, frame) : false));
    this.queues.set(channel, next);
    return next;
  }

  private async attempt(channel: PushChannel, frame: PushFrame): Promise<boolean> {
    try {
      await withTimeout(
        Promise.resolve().then(() => channel.send(frame)),
        this.config.deliveryTimeoutMs,
      );
      return true;
    } catch (err) {
      this.log.debug(
        { channelId: channel.id, type: frame.type, err: errorMessage(err) },
        "Push delivery failed",
      );
      return false;
    }
  }

  private async deliver(
    channels: PushChannel[],
    frame: PushFrame,
    drop: (channel: PushChannel) => void,
  ): Promise<void> {
    await Promise.all(
      channels.map(async (channel) => {
        if (!(await this.sendTo(channel, frame))) drop(channel);
      }),
    );
  }

  private async heartbeat(): Promise<void> {
    const frame: ConnectionEvent = { type: "heartbeat", data: { timestamp: Date.now() } };
    await this.broadcast(frame);
    for (const [jobId, set] of this.subscribers) {
      await this.deliver([...set], frame, (channel) => this.unsubscribe(jobId, channel));
    }
  }

  private stopIfIdle(): void {
    if (this.subscribers.size === 0 && this.connections.size === 0) {
      this.stop();
    }
  }
}
