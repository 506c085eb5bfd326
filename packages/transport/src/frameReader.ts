import type { Channel } from "./channel.js";
import { jsonCodec, type DocumentCodec } from "./codec.js";
import { DEFAULT_CONNECTION_CONFIG } from "./config.js";
import { TransportError } from "./errors.js";
import { logger as rootLogger, type Logger } from "./logger.js";

/**
 * Produces exactly one complete document from a channel. The dispatcher only
 * depends on this interface, so a length-prefixed protocol can replace the
 * speculative reader without touching dispatch.
 */
export interface FrameReader {
  readFrame(channel: Channel, timeoutMs: number): Promise<unknown>;
}

export interface SpeculativeFrameReaderOptions {
  codec?: DocumentCodec;
  chunkSize?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * The add-on writes bare JSON with no length prefix, so the only proof that a
 * response is complete is that the bytes received so far decode as one
 * document. Bytes are read in chunks and a decode is attempted whenever the
 * codec's scanner says the buffer could be complete.
 */
export function createSpeculativeFrameReader(options: SpeculativeFrameReaderOptions = {}): FrameReader {
  const codec = options.codec ?? jsonCodec;
  const chunkSize = options.chunkSize ?? DEFAULT_CONNECTION_CONFIG.chunkSize;
  const log = options.logger ?? rootLogger.child({ module: "frame-reader" });
  const now = options.now ?? Date.now;

  return {
    async readFrame(channel, timeoutMs) {
      const chunks: Buffer[] = [];
      let received = 0;
      const scanner = codec.createScanner();
      const deadline = now() + timeoutMs;
      let reason: "closed" | "timeout" = "timeout";

      for (;;) {
        const remaining = deadline - now();
        if (remaining <= 0) break;

        const read = await channel.read(chunkSize, remaining);
        if (read.kind === "timeout") break;
        if (read.kind === "closed") {
          if (received === 0) {
            throw new TransportError("CONNECTION_CLOSED", "Blender closed the connection before sending a response.");
          }
          reason = "closed";
          break;
        }

        chunks.push(read.bytes);
        received += read.bytes.length;
        if (!scanner.feed(read.bytes)) continue;

        const attempt = codec.tryDecode(Buffer.concat(chunks, received));
        if (attempt.complete) {
          log.debug({ bytes: received }, "received complete response");
          return attempt.value;
        }
      }

      if (reason === "timeout") {
        log.warn({ bytes: received, timeoutMs }, "timed out waiting for a complete response");
      }
      // A response that finished arriving exactly at the deadline is still valid.
      if (received > 0) {
        const attempt = codec.tryDecode(Buffer.concat(chunks, received));
        if (attempt.complete) {
          log.info({ bytes: received, reason }, "using response assembled before the receive ended");
          return attempt.value;
        }
      }

      if (reason === "closed") {
        throw new TransportError(
          "INCOMPLETE_MESSAGE",
          `Blender closed the connection after sending an incomplete response (${received} bytes).`,
        );
      }
      throw new TransportError(
        "INCOMPLETE_MESSAGE",
        received === 0
          ? `Timed out after ${timeoutMs} ms waiting for Blender to respond. The command may still be running; check the scene before retrying, or try simplifying the request.`
          : `Timed out after ${timeoutMs} ms with an incomplete response from Blender (${received} bytes). The command may still be running; check the scene before retrying.`,
      );
    },
  };
}
