import { describe, expect, it } from "vitest";
import { TransportError } from "./errors.js";
import { createSpeculativeFrameReader } from "./frameReader.js";
import { ScriptedChannel, byteByByte, createFakeClock } from "./__tests__/scriptedChannel.js";

const SCENE_RESPONSE = JSON.stringify({
  status: "success",
  result: { name: "Scene", object_count: 2, objects: [{ name: "Cube" }, { name: "Näkymä {kamera}" }] },
});

function readerWithClock(chunkSize = 8192) {
  const clock = createFakeClock(1_000);
  const reader = createSpeculativeFrameReader({ chunkSize, now: clock.now });
  return { clock, reader };
}

async function expectTransportError(promise: Promise<unknown>, code: TransportError["code"]): Promise<TransportError> {
  try {
    await promise;
  } catch (error) {
    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).code).toBe(code);
    return error as TransportError;
  }
  throw new Error(`expected ${code}`);
}

describe("speculative frame reader", () => {
  it("returns a response delivered in a single chunk", async () => {
    const { clock, reader } = readerWithClock();
    const channel = new ScriptedChannel([SCENE_RESPONSE], clock);

    await expect(reader.readFrame(channel, 180_000)).resolves.toEqual(JSON.parse(SCENE_RESPONSE));
  });

  it("reassembles a response delivered one byte at a time", async () => {
    const { clock, reader } = readerWithClock();
    const steps = byteByByte(SCENE_RESPONSE);
    const channel = new ScriptedChannel([...steps, "<timeout>"], clock);

    await expect(reader.readFrame(channel, 180_000)).resolves.toEqual(JSON.parse(SCENE_RESPONSE));
    // Stops at the exact byte that completes the document.
    expect(channel.readSizes).toHaveLength(steps.length);
  });

  it("reads in chunks of the configured size", async () => {
    const { clock, reader } = readerWithClock(16);
    const channel = new ScriptedChannel([SCENE_RESPONSE], clock);

    await reader.readFrame(channel, 180_000);
    expect(new Set(channel.readSizes)).toEqual(new Set([16]));
    expect(channel.readSizes).toHaveLength(Math.ceil(Buffer.byteLength(SCENE_RESPONSE) / 16));
  });

  it("raises CONNECTION_CLOSED when the peer closes before sending anything", async () => {
    const { clock, reader } = readerWithClock();
    const channel = new ScriptedChannel(["<closed>"], clock);

    await expectTransportError(reader.readFrame(channel, 180_000), "CONNECTION_CLOSED");
  });

  it("raises INCOMPLETE_MESSAGE when the peer closes mid-document", async () => {
    const { clock, reader } = readerWithClock();
    const channel = new ScriptedChannel(['{"status":"success","res', "<closed>"], clock);

    const error = await expectTransportError(reader.readFrame(channel, 180_000), "INCOMPLETE_MESSAGE");
    expect(error.message).toBe("Blender closed the connection after sending an incomplete response (24 bytes).");
  });

  it("accepts the first prefix that decodes on its own", async () => {
    const { clock, reader } = readerWithClock();
    // Top-level scalars are ambiguous without a length prefix; responses are
    // always objects, which cannot parse until their closing brace arrives.
    const channel = new ScriptedChannel(["4", "2", "<closed>"], clock);

    await expect(reader.readFrame(channel, 180_000)).resolves.toBe(4);
  });

  it("raises INCOMPLETE_MESSAGE at the deadline when nothing arrives", async () => {
    const { clock, reader } = readerWithClock();
    const channel = new ScriptedChannel(["<timeout>"], clock);

    const error = await expectTransportError(reader.readFrame(channel, 5_000), "INCOMPLETE_MESSAGE");
    expect(error.message).toContain("Timed out after 5000 ms waiting for Blender to respond.");
    expect(clock.now()).toBe(6_000);
  });

  it("raises INCOMPLETE_MESSAGE at the deadline with a partial document", async () => {
    const { clock, reader } = readerWithClock();
    const channel = new ScriptedChannel(['{"status":"succ', "<timeout>"], clock);

    const error = await expectTransportError(reader.readFrame(channel, 5_000), "INCOMPLETE_MESSAGE");
    expect(error.message).toContain("incomplete response from Blender (15 bytes)");
  });

  it("does not cut a document at braces inside strings", async () => {
    const { clock, reader } = readerWithClock();
    // Balanced braces inside a string value would fool a naive brace counter.
    const channel = new ScriptedChannel(['{"message":"}', '{"', ',"status":"error"}'], clock);

    await expect(reader.readFrame(channel, 180_000)).resolves.toEqual({ message: "}{", status: "error" });
  });

  it("propagates connection failures raised by the channel", async () => {
    const { clock, reader } = readerWithClock();
    const failure = new TransportError("CONNECTION_FAILURE", "Connection to Blender lost: read ECONNRESET");
    const channel = new ScriptedChannel(['{"status"', failure], clock);

    await expect(reader.readFrame(channel, 180_000)).rejects.toBe(failure);
  });
});
