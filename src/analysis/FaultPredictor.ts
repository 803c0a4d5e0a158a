/**
 * Fault Predictor
 *
 * Heuristic time-to-failure (TTF) estimates behind one pluggable interface.
 * Every model reads the same per-frame inputs and returns a FaultPrediction;
 * a model that cannot forecast says so with kind "no-forecast" and a null TTF
 * rather than a placeholder number.
 *
 * Models:
 * - ThresholdDecayModel (default): amplitude/frequency rules with an
 *   exponential decay of a base lifetime, T = T_base · e^(−k · excess)
 * - GradientTrendModel: extrapolates the long-term shimmer trend,
 *   T = ln(1 / shimmer) / (longTermGradient · scale)
 */

import type { FaultPrediction } from "../engine/types";

// ============================================
// Types
// ============================================

export interface FaultInputs {
  /** Vibration amplitude, m/s² */
  amplitude: number;
  /** Dominant spectral frequency, Hz (0 when no spectrum) */
  dominantFreq: number;
  shimmer: number;
  longTermGradient: number;
}

export interface TtfModel {
  readonly name: string;
  predict(inputs: FaultInputs): FaultPrediction;
}

const HOURS_PER_DAY = 24;

export const NO_FORECAST: FaultPrediction = Object.freeze({
  kind: "no-forecast",
  text: "No forecast",
  confidence: 0,
  ttfHours: null,
});

// ============================================
// Threshold-Decay Model
// ============================================

export interface ThresholdDecayConfig {
  /** Amplitude above which a fault is critical (m/s²) */
  highAmplitude: number;
  /** Amplitude above which mounts are suspect (m/s²) */
  warningAmplitude: number;
  /** Critical faults above this frequency are bearing/gear wear (Hz) */
  bearingCutoffHz: number;
  warningBandHz: { min: number; max: number };
}

export const DEFAULT_THRESHOLD_DECAY_CONFIG: ThresholdDecayConfig = {
  highAmplitude: 4.0,
  warningAmplitude: 1.5,
  bearingCutoffHz: 20,
  warningBandHz: { min: 10, max: 60 },
};

export class ThresholdDecayModel implements TtfModel {
  readonly name = "threshold-decay";
  private readonly config: ThresholdDecayConfig;

  constructor(config: Partial<ThresholdDecayConfig> = {}) {
    this.config = { ...DEFAULT_THRESHOLD_DECAY_CONFIG, ...config };
  }

  predict({ amplitude, dominantFreq }: FaultInputs): FaultPrediction {
    const { highAmplitude, warningAmplitude, bearingCutoffHz, warningBandHz } = this.config;

    if (amplitude > highAmplitude) {
      const excess = amplitude - highAmplitude;
      if (dominantFreq > bearingCutoffHz) {
        const ttfHours = 24 * Math.exp(-0.5 * excess);
        return {
          kind: "bearing-wear",
          text: `CRITICAL: Bearing Wear (Est. Fail ${ttfHours.toFixed(1)} h)`,
          confidence: 0.9 + Math.min(0.09, excess * 0.05),
          ttfHours,
        };
      }
      const ttfDays = 7 * Math.exp(-0.3 * excess);
      return {
        kind: "imbalance",
        text: `CRITICAL: Imbalance (Est. Fail ${ttfDays.toFixed(1)} d)`,
        confidence: 0.85 + Math.min(0.14, excess * 0.05),
        ttfHours: ttfDays * HOURS_PER_DAY,
      };
    }

    if (
      amplitude > warningAmplitude &&
      dominantFreq >= warningBandHz.min &&
      dominantFreq <= warningBandHz.max
    ) {
      const excess = amplitude - warningAmplitude;
      const ttfDays = 30 * Math.exp(-0.1 * excess);
      return {
        kind: "mount-warning",
        text: `Warning: Check Mounts (Risk ${ttfDays.toFixed(1)} d)`,
        confidence: 0.6 + Math.min(0.19, excess * 0.1),
        ttfHours: ttfDays * HOURS_PER_DAY,
      };
    }

    return { kind: "healthy", text: "Healthy", confidence: 0.05, ttfHours: null };
  }
}

// ============================================
// Gradient-Trend Model
// ============================================

export interface GradientTrendConfig {
  shimmerEpsilon: number;
  gradientEpsilon: number;
  /** Converts gradient units per frame into per-hour units */
  scale: number;
  /** Reported confidence when a forecast is made */
  confidence: number;
}

export const DEFAULT_GRADIENT_TREND_CONFIG: GradientTrendConfig = {
  shimmerEpsilon: 1e-6,
  gradientEpsilon: 1e-6,
  scale: 1,
  confidence: 0.5,
};

export class GradientTrendModel implements TtfModel {
  readonly name = "gradient-trend";
  private readonly config: GradientTrendConfig;

  constructor(config: Partial<GradientTrendConfig> = {}) {
    this.config = { ...DEFAULT_GRADIENT_TREND_CONFIG, ...config };
  }

  predict({ shimmer, longTermGradient }: FaultInputs): FaultPrediction {
    const { shimmerEpsilon, gradientEpsilon, scale, confidence } = this.config;
    if (shimmer <= shimmerEpsilon || longTermGradient <= gradientEpsilon) {
      return NO_FORECAST;
    }

    const ttfHours = Math.max(0, Math.log(1 / shimmer) / (longTermGradient * scale));
    return {
      kind: "trend",
      text: `Trend: Est. Fail ${ttfHours.toFixed(1)} h`,
      confidence,
      ttfHours,
    };
  }
}
