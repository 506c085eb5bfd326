import { describeAddress, openSocketChannel, type Channel, type ChannelFactory } from "./channel.js";
import { DEFAULT_CONNECTION_CONFIG, type ConnectionAddress } from "./config.js";
import { asTransportError } from "./errors.js";
import { logger as rootLogger, type Logger } from "./logger.js";

export type HealthCheck = (channel: Channel) => Promise<void>;

export interface ConnectionManagerOptions {
  address?: ConnectionAddress;
  connectTimeoutMs?: number;
  openChannel?: ChannelFactory;
  logger?: Logger;
}

/**
 * Owns the one cached connection to Blender. Blender runs as a single local
 * instance, so there is never more than one channel per manager.
 *
 * Not safe for concurrent use on its own: the dispatcher calls `acquire` and
 * `release` only while holding its dispatch lock.
 */
export class ConnectionManager {
  readonly address: ConnectionAddress;
  private readonly connectTimeoutMs: number;
  private readonly openChannel: ChannelFactory;
  private readonly log: Logger;
  private channel: Channel | null = null;

  constructor(options: ConnectionManagerOptions = {}) {
    this.address = options.address ?? {
      host: DEFAULT_CONNECTION_CONFIG.host,
      port: DEFAULT_CONNECTION_CONFIG.port,
    };
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECTION_CONFIG.connectTimeoutMs;
    this.openChannel = options.openChannel ?? openSocketChannel;
    this.log = options.logger ?? rootLogger.child({ module: "connection" });
  }

  get connected(): boolean {
    return this.channel !== null;
  }

  async acquire(healthCheck?: HealthCheck): Promise<Channel> {
    const cached = this.channel;
    if (cached) {
      if (cached.closed) {
        this.log.warn({ address: describeAddress(this.address) }, "cached Blender connection was closed by the peer");
        this.release();
      } else if (!healthCheck) {
        return cached;
      } else {
        try {
          await healthCheck(cached);
          return cached;
        } catch (error) {
          this.log.warn({ err: error }, "existing Blender connection is no longer valid, reconnecting");
          this.release();
        }
      }
    }

    try {
      const channel = await this.openChannel(this.address, this.connectTimeoutMs);
      this.channel = channel;
      this.log.info({ address: describeAddress(this.address) }, "connected to Blender");
      return channel;
    } catch (error) {
      const failure = asTransportError(
        error,
        "CONNECTION_FAILURE",
        `Could not connect to Blender at ${describeAddress(this.address)}`,
      );
      this.log.error({ err: failure }, "failed to connect to Blender");
      throw failure;
    }
  }

  release(): void {
    const channel = this.channel;
    if (!channel) return;
    this.channel = null;
    try {
      channel.close();
    } catch (error) {
      this.log.warn({ err: error }, "error disconnecting from Blender");
    }
    this.log.info({ address: describeAddress(this.address) }, "disconnected from Blender");
  }
}
