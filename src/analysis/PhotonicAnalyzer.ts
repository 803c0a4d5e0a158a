/**
 * Photonic Analyzer
 *
 * Ambient-light flicker statistics and a coarse light-source guess.
 *
 * Classification, first match wins:
 *   mean < darkLux               → Dark
 *   flicker < naturalFlickerMax  → Natural
 *   dominant freq in mains band  → Grid
 *   otherwise                    → Artificial
 * Before any lux reading the source is Unknown.
 */

import { RingBuffer } from "../lib/buffers/RingBuffer";
import { isMainsFrequency } from "../lib/signal/frequencyLabels";
import type { PhotonicConfig } from "../engine/config";
import type { LightSource } from "../engine/types";

export interface PhotonicSample {
  /** Most recent lux reading, null if none yet */
  lux: number | null;
  meanLux: number;
  /** stddev / mean; 0 when the mean is 0 */
  flickerIndex: number;
  lightSource: LightSource;
}

export class PhotonicAnalyzer {
  private readonly config: PhotonicConfig;
  private readonly history: RingBuffer;

  constructor(config: PhotonicConfig) {
    this.config = config;
    this.history = new RingBuffer(config.historySize);
  }

  /**
   * @param lux - this frame's reading, if the light sensor reported one
   * @param dominantFreq - dominant spectral frequency, Hz (0 when unknown)
   */
  update(lux: number | undefined, dominantFreq: number): PhotonicSample {
    if (lux !== undefined && Number.isFinite(lux)) {
      this.history.push(lux);
    }

    const latest = this.history.latest();
    if (latest === undefined) {
      return { lux: null, meanLux: 0, flickerIndex: 0, lightSource: "Unknown" };
    }

    const meanLux = this.history.mean();
    const flickerIndex = meanLux === 0 ? 0 : Math.sqrt(this.history.variance()) / meanLux;

    return {
      lux: latest,
      meanLux,
      flickerIndex,
      lightSource: this.classify(meanLux, flickerIndex, dominantFreq),
    };
  }

  private classify(meanLux: number, flickerIndex: number, dominantFreq: number): LightSource {
    if (meanLux < this.config.darkLux) return "Dark";
    if (flickerIndex < this.config.naturalFlickerMax) return "Natural";
    if (isMainsFrequency(dominantFreq)) return "Grid";
    return "Artificial";
  }
}
