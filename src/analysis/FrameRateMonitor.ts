/**
 * FrameRateMonitor - measured sensor frame rate.
 *
 * Instantaneous rate = 1e9 / Δt between consecutive frame timestamps,
 * averaged over a short ring. Non-positive Δt (duplicate or reordered
 * timestamps) is ignored.
 */

import { RingBuffer } from "../lib/buffers/RingBuffer";
import type { RateConfig } from "../engine/config";

const NS_PER_SECOND = 1e9;

export class FrameRateMonitor {
  private readonly rates: RingBuffer;
  private lastTimestampNs: number | null = null;

  constructor(config: RateConfig) {
    this.rates = new RingBuffer(config.historySize);
  }

  /** Record a frame and return the mean rate in Hz (0 until two frames) */
  tick(timestampNs: number): number {
    if (this.lastTimestampNs !== null) {
      const dt = timestampNs - this.lastTimestampNs;
      if (dt > 0) this.rates.push(NS_PER_SECOND / dt);
    }
    if (this.lastTimestampNs === null || timestampNs > this.lastTimestampNs) {
      this.lastTimestampNs = timestampNs;
    }
    return this.realHz;
  }

  get realHz(): number {
    return this.rates.mean();
  }

  get isMeasured(): boolean {
    return this.rates.length > 0;
  }
}
