/**
 * Engine boundary types: what goes into a frame, what comes out, and the
 * calibration values the engine exchanges with its persistence collaborator.
 */

import type { FrequencyBand } from "../lib/signal/frequencyLabels";

// ============================================================================
// INPUT
// ============================================================================

export type Vec3Tuple = [number, number, number];

/** Display rotation in degrees, as reported by the host */
export type DisplayRotation = 0 | 90 | 180 | 270;

export interface SensorFrame {
  /** Accelerometer, m/s² */
  accel: Vec3Tuple;
  /** Gyroscope, rad/s */
  gyro?: Vec3Tuple;
  /** Mono PCM block; at least the audio FFT length for spectral analysis */
  pcm?: Int16Array;
  /** Ambient light, lux */
  lux?: number;
  rotation: DisplayRotation;
  /** Monotonic timestamp, nanoseconds */
  timestampNs: number;
}

// ============================================================================
// CALIBRATION
// ============================================================================

export interface TiltZero {
  /** degrees */
  pitch: number;
  /** degrees */
  roll: number;
}

/**
 * Calibration offsets. Replaced as a whole, never patched field by field,
 * so a frame always sees one consistent profile.
 */
export interface CalibrationProfile {
  readonly accelZero: Readonly<Vec3Tuple>;
  readonly gyroZero: Readonly<Vec3Tuple>;
  /** dB added to the raw weighted level */
  readonly splOffset: number;
  readonly tiltZero: Readonly<TiltZero>;
}

// ============================================================================
// OUTPUT
// ============================================================================

export type IsoZone = "A" | "B" | "C" | "D";
export type Severity = 0 | 1 | 2 | 3;

/** Ordered by escalating severity */
export type EngineStateTag = "Baseline" | "Descriptor" | "TonalDominance" | "Critical";

export type LightSource = "Unknown" | "Dark" | "Natural" | "Grid" | "Artificial";

export type SpectrumSource = "audio" | "vibration" | "none";

export type FaultKind =
  | "healthy"
  | "bearing-wear"
  | "imbalance"
  | "mount-warning"
  | "trend"
  | "no-forecast";

export interface FaultPrediction {
  kind: FaultKind;
  text: string;
  /** 0..1 */
  confidence: number;
  /** Estimated hours to failure; null when the model gives no forecast */
  ttfHours: number | null;
}

/** Recoverable situations reported alongside a valid frame */
export type EngineCondition =
  | "audio-unavailable"
  | "audio-stale"
  | "audio-short-buffer"
  | "warm-sensor";

export interface DiagnosticResult {
  timestampNs: number;
  realHz: number;

  tiltDegrees: number;
  tiltConfidence: number;
  pitchDegrees: number;
  rollDegrees: number;
  /** Offset-corrected gyro magnitude, deg/s */
  rotationRate: number;

  /** Linear acceleration magnitude, m/s² */
  vibrationRms: number;
  vibrationPeak: number;
  /** mm/s proxy */
  velocityRms: number;
  isoZone: IsoZone;
  severity: Severity;
  shimmer: number;
  shortTermGradient: number;
  longTermGradient: number;

  dbA: number;
  dbUncertainty: number;

  lux: number | null;
  flickerIndex: number;
  lightSource: LightSource;

  dominantFreq: number;
  freqLabel: string;
  freqBand: FrequencyBand;
  spectrumSource: SpectrumSource;
  spectralEntropy: number;

  fault: FaultPrediction;
  state: EngineStateTag;
  conditions: readonly EngineCondition[];
}
