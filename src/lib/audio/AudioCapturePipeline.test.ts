import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  AudioCapturePipeline,
  type AudioSource,
  type CaptureClock,
  type CaptureStatus,
} from "./AudioCapturePipeline";
import { AudioMailbox } from "./AudioMailbox";

function ramp(start: number, length: number): Int16Array {
  return Int16Array.from({ length }, (_, i) => start + i);
}

class ScriptedSource implements AudioSource {
  starts = 0;
  stops = 0;
  onRead: () => void = () => {};

  constructor(
    private readonly chunks: Array<Int16Array | Error>,
    private readonly failStart = false,
    private readonly endless = false,
  ) {}

  async start(): Promise<void> {
    if (this.failStart) throw new Error("microphone busy");
    this.starts++;
  }

  async read(): Promise<Int16Array | null> {
    this.onRead();
    if (this.endless) return new Int16Array(64);
    const next = this.chunks.shift();
    if (next instanceof Error) throw next;
    return next ?? null;
  }

  async stop(): Promise<void> {
    this.stops++;
  }
}

describe("AudioCapturePipeline", () => {
  let mailbox: AudioMailbox;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    mailbox = AudioMailbox.create(2048);
  });

  it("should publish only complete blocks", async () => {
    const source = new ScriptedSource([ramp(0, 1000), ramp(1000, 1000), ramp(2000, 1000)]);
    const pipeline = new AudioCapturePipeline(source, mailbox);

    await pipeline.start();
    await pipeline.finished();

    expect(pipeline.blocksPublished).toBe(1);
    expect(Array.from(mailbox.take() ?? [])).toEqual(Array.from(ramp(0, 2048)));
    expect(mailbox.take()).toBeNull();
    expect(pipeline.status).toBe("stopped");
    expect(source.stops).toBe(1);
  });

  it("should report unavailable when the source cannot start", async () => {
    const source = new ScriptedSource([], true);
    const pipeline = new AudioCapturePipeline(source, mailbox);
    const statuses: CaptureStatus[] = [];
    pipeline.onStatus((s) => statuses.push(s));

    await expect(pipeline.start()).resolves.toBeUndefined();
    expect(pipeline.status).toBe("unavailable");
    expect(statuses).toEqual(["unavailable"]);
    expect(console.warn).toHaveBeenCalled();
  });

  it("should contain read failures inside the loop", async () => {
    const source = new ScriptedSource([ramp(0, 100), new Error("device unplugged")]);
    const pipeline = new AudioCapturePipeline(source, mailbox);

    await pipeline.start();
    await pipeline.finished();

    expect(pipeline.status).toBe("unavailable");
    expect(source.stops).toBe(1);
    expect(console.error).toHaveBeenCalled();
  });

  it("should cycle record and idle windows in burst mode", async () => {
    let t = 0;
    const sleeps: number[] = [];
    const clock: CaptureClock = {
      now: () => t,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    };
    const source = new ScriptedSource([
      ramp(0, 1024),
      ramp(0, 1024),
      ramp(0, 1024),
      ramp(0, 1024),
    ]);
    source.onRead = () => {
      t += 1000;
    };

    const pipeline = new AudioCapturePipeline(
      source,
      mailbox,
      { blockSize: 1024, burst: { recordMs: 2000, idleMs: 55_000 } },
      clock,
    );
    await pipeline.start();
    await pipeline.finished();

    expect(pipeline.blocksPublished).toBe(4);
    expect(sleeps).toEqual([55_000, 55_000]);
    expect(source.starts).toBe(3);
    expect(source.stops).toBe(3);
  });

  it("should wind down on stop", async () => {
    const source = new ScriptedSource([], false, true);
    const pipeline = new AudioCapturePipeline(source, mailbox);

    await pipeline.start();
    expect(pipeline.status).toBe("running");

    await pipeline.stop();
    expect(pipeline.status).toBe("stopped");
    expect(source.stops).toBe(1);
  });

  it("should reject a block size beyond the mailbox", () => {
    expect(
      () => new AudioCapturePipeline(new ScriptedSource([]), AudioMailbox.create(16), { blockSize: 32 }),
    ).toThrow("blockSize");
  });
});
