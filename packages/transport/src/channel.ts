import { createConnection, type Socket } from "node:net";
import type { ConnectionAddress } from "./config.js";
import { TransportError } from "./errors.js";
import { logger as rootLogger, type Logger } from "./logger.js";

export type ChannelRead =
  | { kind: "data"; bytes: Buffer }
  | { kind: "closed" }
  | { kind: "timeout" };

/**
 * Pull-style duplex byte channel. `read` behaves like a blocking recv with a
 * timeout: it hands out buffered bytes first, then waits for more.
 */
export interface Channel {
  read(maxBytes: number, timeoutMs: number): Promise<ChannelRead>;
  write(bytes: Buffer, timeoutMs: number): Promise<void>;
  close(): void;
  readonly closed: boolean;
}

export type ChannelFactory = (address: ConnectionAddress, connectTimeoutMs: number) => Promise<Channel>;

export function describeAddress(address: ConnectionAddress): string {
  return `${address.host}:${address.port}`;
}

export class SocketChannel implements Channel {
  private readonly pending: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private destroyed = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly socket: Socket,
    private readonly log: Logger = rootLogger.child({ module: "channel" }),
  ) {
    socket.on("data", (chunk: Buffer) => {
      this.pending.push(chunk);
      this.notify();
    });
    socket.on("end", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("close", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("error", (error: Error) => {
      this.failure = error;
      this.notify();
    });
  }

  get closed(): boolean {
    return this.destroyed || this.ended || this.failure !== null;
  }

  async read(maxBytes: number, timeoutMs: number): Promise<ChannelRead> {
    if (!Number.isInteger(maxBytes) || maxBytes <= 0) {
      throw new RangeError(`maxBytes must be a positive integer, got ${maxBytes}.`);
    }
    const deadline = Date.now() + Math.max(0, timeoutMs);
    for (;;) {
      if (this.pending.length > 0) {
        return { kind: "data", bytes: this.take(maxBytes) };
      }
      if (this.failure) {
        throw new TransportError("CONNECTION_FAILURE", `Connection to Blender lost: ${this.failure.message}`, {
          cause: this.failure,
        });
      }
      if (this.ended || this.destroyed) {
        return { kind: "closed" };
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return { kind: "timeout" };
      }
      await this.waitForActivity(remaining);
    }
  }

  write(bytes: Buffer, timeoutMs: number): Promise<void> {
    if (this.failure) {
      return Promise.reject(
        new TransportError("CONNECTION_FAILURE", `Connection to Blender lost: ${this.failure.message}`, {
          cause: this.failure,
        }),
      );
    }
    if (this.destroyed || this.ended || !this.socket.writable) {
      return Promise.reject(new TransportError("CONNECTION_FAILURE", "Connection to Blender is closed."));
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        reject(new TransportError("CONNECTION_FAILURE", `Timed out after ${timeoutMs} ms sending command to Blender.`));
      }, timeoutMs);

      this.socket.write(bytes, (error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(
            new TransportError("CONNECTION_FAILURE", `Connection to Blender lost: ${error.message}`, { cause: error }),
          );
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    try {
      this.socket.destroy();
    } catch (error) {
      this.log.warn({ err: error }, "error while closing Blender socket");
    }
    this.notify();
  }

  private take(maxBytes: number): Buffer {
    const parts: Buffer[] = [];
    let size = 0;
    while (this.pending.length > 0 && size < maxBytes) {
      const head = this.pending[0];
      if (!head) break;
      const room = maxBytes - size;
      if (head.length <= room) {
        parts.push(head);
        size += head.length;
        this.pending.shift();
      } else {
        parts.push(head.subarray(0, room));
        this.pending[0] = head.subarray(room);
        size += room;
      }
    }
    return parts.length === 1 && parts[0] ? parts[0] : Buffer.concat(parts, size);
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private waitForActivity(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, timeoutMs);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}

export const openSocketChannel: ChannelFactory = (address, connectTimeoutMs) => {
  const target = describeAddress(address);
  return new Promise<Channel>((resolve, reject) => {
    const socket = createConnection({ host: address.host, port: address.port });
    let settled = false;

    const fail = (message: string, cause?: unknown) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      reject(new TransportError("CONNECTION_FAILURE", message, { cause }));
    };

    const timer = setTimeout(() => {
      fail(`Timed out after ${connectTimeoutMs} ms connecting to Blender at ${target}.`);
    }, connectTimeoutMs);

    socket.once("error", (error: Error) => {
      fail(
        `Could not connect to Blender at ${target} (${error.message}). Make sure the Blender add-on is running.`,
        error,
      );
    });

    socket.once("connect", () => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.setNoDelay(true);
      resolve(new SocketChannel(socket));
    });
  });
};
