import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";
import type { JobSummary, PushFrame } from "@neurodeck/shared";
import { ProgressBroadcaster, type PushChannel } from "../progress-broadcaster.js";
import { socketChannel, type SocketLike } from "../socket-channel.js";
import { silentLog } from "./fakes.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function summary(jobId: string): JobSummary {
  return {
    jobId,
    unitId: "unit-1",
    status: "running",
    currentEpoch: 1,
    totalEpochs: 10,
    metrics: { loss: 0.5, accuracy: 50, val_loss: 0, val_accuracy: 0 },
    createdAt: 1,
    updatedAt: 2,
    estimatedTimeRemaining: 9,
  };
}

function live(id: string): PushChannel & { frames: PushFrame[] } {
  const frames: PushFrame[] = [];
  return { id, frames, send: (frame) => void frames.push(frame) };
}

function dead(id: string): PushChannel {
  return {
    id,
    send() {
      throw new Error("connection reset");
    },
  };
}

// ---------------------------------------------------------------------------
// publish
// ---------------------------------------------------------------------------

describe("ProgressBroadcaster.publish", () => {
  it("delivers to live subscribers and drops the dead one", async () => {
    const broadcaster = new ProgressBroadcaster(silentLog);
    const good = live("good");
    broadcaster.subscribe("job-1", good);
    broadcaster.subscribe("job-1", dead("bad"));

    await broadcaster.publish("job-1", summary("job-1"));

    assert.equal(good.frames.length, 1);
    assert.deepEqual(good.frames[0], {
      type: "training_progress",
      jobId: "job-1",
      data: summary("job-1"),
    });
    assert.equal(broadcaster.subscriberCount("job-1"), 1);
    broadcaster.close();
  });

  it("only reaches subscribers of the published job", async () => {
    const broadcaster = new ProgressBroadcaster(silentLog);
    const one = live("one");
    const two = live("two");
    broadcaster.subscribe("job-1", one);
    broadcaster.subscribe("job-2", two);

    await broadcaster.publish("job-2", summary("job-2"));

    assert.equal(one.frames.length, 0);
    assert.equal(two.frames.length, 1);
    broadcaster.close();
  });

  it("is a no-op with no subscribers", async () => {
    const broadcaster = new ProgressBroadcaster(silentLog);
    await broadcaster.publish("nobody", summary("nobody"));
    assert.equal(broadcaster.subscribedJobCount(), 0);
  });

  it("drops a channel whose delivery times out", async () => {
    const broadcaster = new ProgressBroadcaster(silentLog, { deliveryTimeoutMs: 20 });
    const stalled: PushChannel = { id: "stalled", send: () => new Promise<void>(() => {}) };
    broadcaster.subscribe("job-1", stalled);

    await broadcaster.publish("job-1", summary("job-1"));

    assert.equal(broadcaster.subscriberCount("job-1"), 0);
    assert.equal(broadcaster.subscribedJobCount(), 0);
    broadcaster.close();
  });
});

describe("ProgressBroadcaster per-channel queues", () => {
  it("keeps a fast subscriber current while a slow one is still sending", async () => {
    const broadcaster = new ProgressBroadcaster(silentLog, { deliveryTimeoutMs: 30 });
    const fast = live("fast");
    let slowCalls = 0;
    const slow: PushChannel = {
      id: "slow",
      send: () => {
        slowCalls += 1;
        return new Promise<void>(() => {});
      },
    };
    broadcaster.subscribe("job-1", slow);
    broadcaster.subscribe("job-1", fast);

    const first = broadcaster.publish("job-1", { ...summary("job-1"), currentEpoch: 1 });
    const second = broadcaster.publish("job-1", { ...summary("job-1"), currentEpoch: 2 });
    await sleep(5);

    assert.deepEqual(
      fast.frames.map((f) => (f.type === "training_progress" ? f.data.currentEpoch : -1)),
      [1, 2],
    );
    assert.equal(broadcaster.subscriberCount("job-1"), 2);

    await Promise.all([first, second]);
    // The queued second frame is discarded once the first one timed out
    assert.equal(slowCalls, 1);
    assert.equal(broadcaster.subscriberCount("job-1"), 1);
    broadcaster.close();
  });

  it("delivers frames to one channel in publish order", async () => {
    const broadcaster = new ProgressBroadcaster(silentLog);
    const seen: number[] = [];
    const laggy: PushChannel = {
      id: "laggy",
      send: async (frame) => {
        const epoch = frame.type === "training_progress" ? frame.data.currentEpoch : -1;
        await sleep(epoch === 1 ? 15 : 0);
        seen.push(epoch);
      },
    };
    broadcaster.subscribe("job-1", laggy);

    await Promise.all([
      broadcaster.publish("job-1", { ...summary("job-1"), currentEpoch: 1 }),
      broadcaster.publish("job-1", { ...summary("job-1"), currentEpoch: 2 }),
      broadcaster.publish("job-1", { ...summary("job-1"), currentEpoch: 3 }),
    ]);

    assert.deepEqual(seen, [1, 2, 3]);
    broadcaster.close();
  });
});

// ---------------------------------------------------------------------------
// broadcast / connections
// ---------------------------------------------------------------------------

describe("ProgressBroadcaster.broadcast", () => {
  it("sends events to every connection and removes failing ones", async () => {
    const broadcaster = new ProgressBroadcaster(silentLog);
    const a = live("a");
    broadcaster.addConnection(a);
    broadcaster.addConnection(dead("b"));

    await broadcaster.broadcast({ type: "heartbeat", data: { timestamp: 42 } });

    assert.deepEqual(a.frames, [{ type: "heartbeat", data: { timestamp: 42 } }]);
    assert.equal(broadcaster.connectionCount(), 1);
    broadcaster.close();
  });

  it("sendTo reports failure without throwing", async () => {
    const broadcaster = new ProgressBroadcaster(silentLog);
    const ok = await broadcaster.sendTo(dead("x"), { type: "pong", data: { timestamp: 1 } });
    assert.equal(ok, false);
  });

  it("close forgets every channel", () => {
    const broadcaster = new ProgressBroadcaster(silentLog);
    broadcaster.addConnection(live("a"));
    broadcaster.subscribe("job-1", live("b"));
    broadcaster.close();
    assert.equal(broadcaster.connectionCount(), 0);
    assert.equal(broadcaster.subscribedJobCount(), 0);
  });
});

// ---------------------------------------------------------------------------
// socketChannel
// ---------------------------------------------------------------------------

describe("socketChannel", () => {
  it("serializes frames onto an open socket", async () => {
    const sent: string[] = [];
    const socket: SocketLike = {
      readyState: 1,
      send(data, cb) {
        sent.push(data);
        cb?.();
      },
    };

    await socketChannel(socket, "s1").send({ type: "pong", data: { timestamp: 7 } });
    assert.deepEqual(sent, ['{"type":"pong","data":{"timestamp":7}}']);
  });

  it("rejects when the socket is closed", async () => {
    const socket: SocketLike = { readyState: 3, send: () => {} };
    await assert.rejects(
      Promise.resolve(socketChannel(socket, "s2").send({ type: "pong", data: { timestamp: 7 } })),
      /socket s2 is not open/,
    );
  });

  it("rejects when the send callback reports an error", async () => {
    const socket: SocketLike = {
      readyState: 1,
      send: (_data, cb) => cb?.(new Error("write EPIPE")),
    };
    await assert.rejects(
      Promise.resolve(socketChannel(socket, "s3").send({ type: "pong", data: { timestamp: 7 } })),
      /write EPIPE/,
    );
  });
});
