/**
 * AudioCapturePipeline - background PCM capture into the audio mailbox.
 *
 * Reads chunks from an AudioSource, accumulates them into a fixed-size
 * block and publishes each complete block. Partial blocks are never
 * published. The loop is independent of frame processing: source failures
 * are logged and surface as status "unavailable", never as a thrown error
 * on the frame path.
 *
 * With a burst configured, capture runs for `recordMs`, then the source is
 * stopped for `idleMs`, and the cycle repeats. A partial block left at the
 * end of a recording window is discarded.
 */

import type { AudioMailbox } from "./AudioMailbox";
import type { CaptureBurst } from "../constants/ScanModes";
import { audioLog } from "../logger";

// ============================================================================
// TYPES
// ============================================================================

/** Microphone (or any PCM producer) */
export interface AudioSource {
  start(): Promise<void>;
  /**
   * Next chunk of mono int16 PCM; null when the source has ended.
   * Must settle within one chunk period so stop() is not held up.
   */
  read(): Promise<Int16Array | null>;
  stop(): Promise<void>;
}

export type CaptureStatus = "idle" | "running" | "unavailable" | "stopped";

export interface CaptureConfig {
  /** Samples per published block */
  blockSize: number;
  burst: CaptureBurst | null;
}

export interface CaptureClock {
  /** Milliseconds, monotonic */
  now(): number;
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

const DEFAULT_CONFIG: CaptureConfig = {
  blockSize: 2048,
  burst: null,
};

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export const SYSTEM_CLOCK: CaptureClock = {
  now: () => performance.now(),
  sleep: abortableSleep,
};

// ============================================================================
// PIPELINE
// ============================================================================

export class AudioCapturePipeline {
  private readonly source: AudioSource;
  private readonly mailbox: AudioMailbox;
  private readonly config: CaptureConfig;
  private readonly clock: CaptureClock;

  private readonly block: Int16Array;
  private filled = 0;
  private _status: CaptureStatus = "idle";
  private _blocksPublished = 0;
  private _onStatus: ((status: CaptureStatus) => void) | null = null;

  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    source: AudioSource,
    mailbox: AudioMailbox,
    config: Partial<CaptureConfig> = {},
    clock: CaptureClock = SYSTEM_CLOCK,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.blockSize > mailbox.capacity) {
      throw new Error(
        `blockSize ${this.config.blockSize} exceeds mailbox capacity ${mailbox.capacity}`,
      );
    }
    this.source = source;
    this.mailbox = mailbox;
    this.clock = clock;
    this.block = new Int16Array(this.config.blockSize);
  }

  get status(): CaptureStatus {
    return this._status;
  }

  get blocksPublished(): number {
    return this._blocksPublished;
  }

  onStatus(callback: (status: CaptureStatus) => void): void {
    this._onStatus = callback;
  }

  /**
   * Start the source and launch the capture loop. Resolves once capture is
   * running, or with status "unavailable" if the source could not start.
   */
  async start(): Promise<void> {
    if (this._status === "running") return;
    await this.stop();

    const abort = new AbortController();
    this.abort = abort;

    try {
      await this.source.start();
    } catch (error) {
      audioLog.warn("Audio source failed to start", error);
      this.abort = null;
      this.setStatus("unavailable");
      return;
    }

    this.setStatus("running");
    this.loop = this.run(abort.signal);
  }

  /** Stop capture and wait for the loop to wind down */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.abort?.abort();
    await loop;
    this.loop = null;
    this.abort = null;
  }

  /** Resolves when the capture loop has ended on its own or after stop() */
  finished(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async run(signal: AbortSignal): Promise<void> {
    const burst = this.config.burst;
    let windowStart = this.clock.now();
    let sourceRunning = true;

    try {
      while (!signal.aborted) {
        const chunk = await this.source.read();
        if (chunk === null) {
          audioLog.info("Audio source ended");
          break;
        }
        if (signal.aborted) break;
        this.accept(chunk);

        if (burst && this.clock.now() - windowStart >= burst.recordMs) {
          this.filled = 0;
          await this.source.stop();
          sourceRunning = false;
          await this.clock.sleep(burst.idleMs, signal);
          if (signal.aborted) break;
          await this.source.start();
          sourceRunning = true;
          windowStart = this.clock.now();
        }
      }
      this.setStatus("stopped");
    } catch (error) {
      audioLog.error("Audio capture failed", error);
      this.setStatus("unavailable");
    } finally {
      this.filled = 0;
      if (sourceRunning) await this.stopSource();
    }
  }

  /** Copy a chunk into the pending block, publishing each time it fills */
  private accept(chunk: Int16Array): void {
    let offset = 0;
    while (offset < chunk.length) {
      const take = Math.min(this.block.length - this.filled, chunk.length - offset);
      this.block.set(chunk.subarray(offset, offset + take), this.filled);
      this.filled += take;
      offset += take;

      if (this.filled === this.block.length) {
        this.mailbox.publish(this.block);
        this._blocksPublished++;
        this.filled = 0;
      }
    }
  }

  private async stopSource(): Promise<void> {
    try {
      await this.source.stop();
    } catch (error) {
      audioLog.warn("Audio source failed to stop", error);
    }
  }

  private setStatus(status: CaptureStatus): void {
    if (this._status === status) return;
    this._status = status;
    this._onStatus?.(status);
  }
}
