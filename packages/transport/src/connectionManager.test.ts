import { describe, expect, it } from "vitest";
import type { ChannelFactory } from "./channel.js";
import type { ConnectionAddress } from "./config.js";
import { ConnectionManager } from "./connectionManager.js";
import { TransportError } from "./errors.js";
import { ScriptedChannel } from "./__tests__/scriptedChannel.js";

function trackingFactory() {
  const opened: ScriptedChannel[] = [];
  const calls: Array<{ address: ConnectionAddress; connectTimeoutMs: number }> = [];
  const factory: ChannelFactory = async (address, connectTimeoutMs) => {
    calls.push({ address, connectTimeoutMs });
    const channel = new ScriptedChannel([]);
    opened.push(channel);
    return channel;
  };
  return { factory, opened, calls };
}

describe("connection manager", () => {
  it("opens lazily against the configured address", async () => {
    const { factory, calls } = trackingFactory();
    const manager = new ConnectionManager({
      address: { host: "blender.local", port: 9999 },
      connectTimeoutMs: 1_234,
      openChannel: factory,
    });

    expect(manager.connected).toBe(false);
    expect(calls).toHaveLength(0);

    await manager.acquire();
    expect(manager.connected).toBe(true);
    expect(calls).toEqual([{ address: { host: "blender.local", port: 9999 }, connectTimeoutMs: 1_234 }]);
  });

  it("defaults to localhost:9876", () => {
    const manager = new ConnectionManager();
    expect(manager.address).toEqual({ host: "localhost", port: 9876 });
  });

  it("reuses a cached channel that passes the health check", async () => {
    const { factory, opened } = trackingFactory();
    const manager = new ConnectionManager({ openChannel: factory });
    let probes = 0;

    const first = await manager.acquire(async () => {
      probes += 1;
    });
    const second = await manager.acquire(async () => {
      probes += 1;
    });

    expect(second).toBe(first);
    expect(opened).toHaveLength(1);
    // The first acquire had nothing cached to probe.
    expect(probes).toBe(1);
  });

  it("tears down and reopens when the health check fails", async () => {
    const { factory, opened } = trackingFactory();
    const manager = new ConnectionManager({ openChannel: factory });

    const first = await manager.acquire();
    const second = await manager.acquire(async () => {
      throw new TransportError("INCOMPLETE_MESSAGE", "Timed out waiting for Blender to respond.");
    });

    expect(second).not.toBe(first);
    expect(opened).toHaveLength(2);
    expect(opened[0]?.closeCalls).toBe(1);
    expect(opened[1]?.closeCalls).toBe(0);
  });

  it("skips the probe and reconnects when the cached channel is already closed", async () => {
    const { factory, opened } = trackingFactory();
    const manager = new ConnectionManager({ openChannel: factory });
    let probes = 0;

    const first = await manager.acquire();
    first.close();
    await manager.acquire(async () => {
      probes += 1;
    });

    expect(probes).toBe(0);
    expect(opened).toHaveLength(2);
  });

  it("wraps open failures as CONNECTION_FAILURE and stays disconnected", async () => {
    const manager = new ConnectionManager({
      address: { host: "127.0.0.1", port: 1 },
      openChannel: async () => {
        throw new Error("connect ECONNREFUSED 127.0.0.1:1");
      },
    });

    await expect(manager.acquire()).rejects.toMatchObject({
      code: "CONNECTION_FAILURE",
      message: "Could not connect to Blender at 127.0.0.1:1: connect ECONNREFUSED 127.0.0.1:1",
    });
    expect(manager.connected).toBe(false);
  });

  it("release closes once, swallows close errors and is idempotent", async () => {
    const channel = new ScriptedChannel([]);
    channel.close = () => {
      channel.closeCalls += 1;
      throw new Error("EBADF");
    };
    const manager = new ConnectionManager({ openChannel: async () => channel });

    await manager.acquire();
    expect(() => manager.release()).not.toThrow();
    manager.release();

    expect(channel.closeCalls).toBe(1);
    expect(manager.connected).toBe(false);
  });
});
