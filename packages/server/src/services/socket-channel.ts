import type { PushFrame } from "@neurodeck/shared";
import type { PushChannel } from "./progress-broadcaster.js";

const OPEN = 1;

/** The slice of a `ws` WebSocket a push channel needs. */
export interface SocketLike {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
}

/** Wrap a WebSocket as a push channel that resolves once the frame is flushed. */
export function socketChannel(socket: SocketLike, id: string): PushChannel {
  return {
    id,
    send(frame: PushFrame): Promise<void> {
      return new Promise((resolve, reject) => {
        if (socket.readyState !== OPEN) {
          reject(new Error(`socket ${id} is not open`));
          return;
        }
        socket.send(JSON.stringify(frame), (err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
