/**
 * Acoustic Level Meter
 *
 * Perceptual sound level (dBA) from raw 16-bit PCM blocks.
 *
 * A-weighting is approximated by a two-stage cascade run sample by sample:
 * a first-order high-pass that rolls off the low end, followed by a fixed
 * shaping gain for the presence region. Cutoff and gain are tuned per target
 * sample rate through AcousticConfig.
 *
 * Level:
 *   dBA = 20·log10(weightedRMS + ε) + splOffset + coupling·ln(1 + shimmer)
 *
 * The shimmer term adds structure-borne roughness to the acoustic reading.
 */

import { RingBuffer } from "../lib/buffers/RingBuffer";
import type { AcousticConfig } from "../engine/config";

// ============================================
// Types
// ============================================

export interface AcousticReading {
  dbA: number;
  /** Bessel-corrected std dev of recent readings, dB */
  uncertainty: number;
  weightedRms: number;
}

// ============================================
// A-weighting Cascade
// ============================================

export class AWeightingCascade {
  private readonly alpha: number;
  private readonly gain: number;

  constructor(sampleRate: number, cutoffHz: number, gainDb: number) {
    const dt = 1 / sampleRate;
    const rc = 1 / (2 * Math.PI * cutoffHz);
    this.alpha = rc / (rc + dt);
    this.gain = Math.pow(10, gainDb / 20);
  }

  /**
   * Filter one block. Each block starts from rest with the previous input
   * primed to its first sample, so a DC offset produces no onset step.
   */
  process(pcm: ArrayLike<number>): Float64Array {
    const out = new Float64Array(pcm.length);
    if (pcm.length === 0) return out;

    let prevIn = pcm[0];
    let prevHp = 0;
    for (let i = 0; i < pcm.length; i++) {
      const x = pcm[i];
      const hp = this.alpha * (prevHp + x - prevIn);
      prevIn = x;
      prevHp = hp;
      out[i] = hp * this.gain;
    }
    return out;
  }
}

export function rms(values: ArrayLike<number>): number {
  if (values.length === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < values.length; i++) sumSquares += values[i] * values[i];
  return Math.sqrt(sumSquares / values.length);
}

// ============================================
// Acoustic Level Meter Class
// ============================================

export class AcousticLevelMeter {
  private readonly config: AcousticConfig;
  private readonly cascade: AWeightingCascade;
  private readonly history: RingBuffer;
  private lastDbA = 0;

  constructor(config: AcousticConfig, sampleRate: number) {
    this.config = config;
    this.cascade = new AWeightingCascade(sampleRate, config.highPassCutoffHz, config.shapingGainDb);
    this.history = new RingBuffer(config.historySize);
  }

  /** Most recent reading; 0 before any block has been measured */
  get currentDbA(): number {
    return this.lastDbA;
  }

  get uncertainty(): number {
    return this.history.sampleStdDev();
  }

  measure(pcm: ArrayLike<number>, splOffset: number, shimmer: number): AcousticReading {
    const weightedRms = rms(this.cascade.process(pcm));
    const dbA =
      weightedRms === 0
        ? 0
        : 20 * Math.log10(weightedRms + this.config.epsilon) +
          splOffset +
          this.correctionTerm(shimmer);

    this.lastDbA = dbA;
    this.history.push(dbA);

    return { dbA, uncertainty: this.history.sampleStdDev(), weightedRms };
  }

  /**
   * SPL offset that maps the current reading onto `targetDb`:
   *   newOffset = target − (currentDb − previousOffset)
   * Before any block has been measured the current reading is 0.
   */
  referenceOffset(targetDb: number, previousOffset: number): number {
    return targetDb - (this.lastDbA - previousOffset);
  }

  private correctionTerm(shimmer: number): number {
    return this.config.shimmerCouplingDb * Math.log1p(Math.max(0, shimmer));
  }
}
