import { nanoid } from "nanoid";
import type { FastifyInstance } from "fastify";
import type { ConnectionEvent } from "@neurodeck/shared";
import { socketChannel } from "../services/socket-channel.js";

/** Reply to a client frame on any push socket: `ping` gets a pong, the rest is echoed. */
export function replyTo(text: string): ConnectionEvent {
  const trimmed = text.trim();
  if (trimmed === "ping" || isPingObject(trimmed)) {
    return { type: "pong", data: { timestamp: Date.now() } };
  }
  return { type: "echo", data: { message: text } };
}

function isPingObject(text: string): boolean {
  if (!text.startsWith("{")) return false;
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === "object" && parsed !== null && Reflect.get(parsed, "type") === "ping";
  } catch {
    return false;
  }
}

export default async function wsRoutes(fastify: FastifyInstance) {
  const { broadcaster, jobs } = fastify;

  /** GET /ws — generic connection: lifecycle broadcasts plus ping/echo. */
  fastify.get("/ws", { websocket: true }, (socket, request) => {
    const channel = socketChannel(socket, nanoid(10));
    broadcaster.addConnection(channel);
    request.log.debug({ channelId: channel.id }, "WebSocket connected");

    socket.on("message", (data) => {
      void broadcaster.sendTo(channel, replyTo(data.toString()));
    });
    socket.on("close", () => {
      broadcaster.removeConnection(channel);
      request.log.debug({ channelId: channel.id }, "WebSocket closed");
    });

    void broadcaster.sendTo(channel, {
      type: "connected",
      data: { connectionId: channel.id, timestamp: Date.now() },
    });
  });

  /** GET /ws/training/:jobId — progress frames for one job, snapshot first. */
  fastify.get<{ Params: { jobId: string } }>(
    "/ws/training/:jobId",
    { websocket: true },
    (socket, request) => {
      const { jobId } = request.params;
      const channel = socketChannel(socket, nanoid(10));

      socket.on("message", (data) => {
        void broadcaster.sendTo(channel, replyTo(data.toString()));
      });
      socket.on("close", () => broadcaster.unsubscribe(jobId, channel));

      broadcaster.subscribe(jobId, channel);
      const snapshot = jobs.snapshot(jobId);
      if (snapshot) {
        void broadcaster.sendTo(channel, { type: "training_progress", jobId, data: snapshot });
      }
    },
  );
}
