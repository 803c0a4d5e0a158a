/**
 * Vibration Analyzer
 *
 * Turns the fuser's linear and calibrated acceleration into vibration
 * severity metrics:
 * - Vibration magnitude ‖linearAccel‖ and its decaying peak hold
 * - ISO-10816-style velocity proxy with zone A–D (proxy thresholds, not a
 *   certified measurement)
 * - Shimmer: squared deviation of ‖calAccel‖ from its recent mean
 * - Short- and long-term gradients of ‖calAccel‖ for trend forecasting
 *
 * Also keeps the vibration-magnitude window consumed by the mechanical FFT.
 */

import type * as THREE from "three";
import { RingBuffer } from "../lib/buffers/RingBuffer";
import type { VibrationConfig, ZoneThresholds } from "../engine/config";
import type { IsoZone, Severity } from "../engine/types";

// ============================================
// Types
// ============================================

export interface ZoneClassification {
  zone: IsoZone;
  severity: Severity;
}

export interface VibrationSample {
  /** ‖linearAccel‖, m/s² */
  vibrationMag: number;
  /** ‖calAccel‖, m/s² */
  rawMag: number;
  /** Decaying running max of vibrationMag */
  peak: number;
  /** mm/s proxy */
  velocityRms: number;
  zone: IsoZone;
  severity: Severity;
  shimmer: number;
  shortTermGradient: number;
  longTermGradient: number;
}

// ============================================
// Zone Classification
// ============================================

/**
 * Zone from velocity RMS, evaluated high-to-low. A value exactly on a
 * threshold belongs to the higher zone.
 */
export function classifyZone(velocityRms: number, thresholds: ZoneThresholds): ZoneClassification {
  if (velocityRms >= thresholds.d) return { zone: "D", severity: 3 };
  if (velocityRms >= thresholds.c) return { zone: "C", severity: 2 };
  if (velocityRms >= thresholds.b) return { zone: "B", severity: 1 };
  return { zone: "A", severity: 0 };
}

// ============================================
// Vibration Analyzer Class
// ============================================

export class VibrationAnalyzer {
  private readonly config: VibrationConfig;
  private readonly rawHistory: RingBuffer;
  private readonly magnitudeHistory: RingBuffer;
  private peak = 0;
  private longTermGradient = 0;

  constructor(config: VibrationConfig) {
    this.config = config;
    this.rawHistory = new RingBuffer(config.shimmerWindowSize);
    this.magnitudeHistory = new RingBuffer(config.spectrumWindowSize);
  }

  update(linearAccel: THREE.Vector3, calAccel: THREE.Vector3): VibrationSample {
    const vibrationMag = linearAccel.length();
    const rawMag = calAccel.length();

    // Shimmer is measured against the history before this sample joins it
    const shimmer =
      this.rawHistory.length === 0 ? 0 : (rawMag - this.rawHistory.mean()) ** 2;
    this.rawHistory.push(rawMag);

    const shortTermGradient = this.shortTermGradient();
    const decay = this.config.gradientDecay;
    this.longTermGradient = decay * this.longTermGradient + (1 - decay) * shortTermGradient;

    if (vibrationMag > this.peak) {
      this.peak = vibrationMag;
    } else {
      this.peak *= this.config.peakDecay;
    }

    this.magnitudeHistory.push(vibrationMag);

    const velocityRms = vibrationMag * this.config.velocityProxyFactor;
    const { zone, severity } = classifyZone(velocityRms, this.config.zoneThresholds);

    return {
      vibrationMag,
      rawMag,
      peak: this.peak,
      velocityRms,
      zone,
      severity,
      shimmer,
      shortTermGradient,
      longTermGradient: this.longTermGradient,
    };
  }

  /**
   * Vibration magnitudes, oldest first, once the spectrum window is full;
   * null before then.
   */
  spectrumWindow(): Float64Array | null {
    return this.magnitudeHistory.isFull ? this.magnitudeHistory.toArray() : null;
  }

  /** (newest half − oldest half) / half size */
  private shortTermGradient(): number {
    const n = this.rawHistory.length;
    const half = Math.floor(n / 2);
    if (half === 0) return 0;
    const oldest = this.rawHistory.sumRange(0, half);
    const newest = this.rawHistory.sumRange(n - half, half);
    return (newest - oldest) / half;
  }
}
