/**
 * Engine configuration
 *
 * The two engine generations this pipeline unifies disagreed on most tuning
 * constants, so every one of them is a named, overridable field. Overrides
 * are merged per section over the defaults and validated once, when an
 * engine context is created.
 */

import { STANDARD_GRAVITY } from "../lib/math/conventions";
import { isPowerOfTwo } from "../lib/signal/SignalProcessor";

// ============================================================================
// TYPES
// ============================================================================

export interface OrientationConfig {
  /** Gravity smoothing coefficient α, 0 < α < 1 */
  gravityAlpha: number;
  /** Standard gravity used when building an accel zero from rest (m/s²) */
  standardGravity: number;
  tiltHistorySize: number;
}

export interface ZoneThresholds {
  /** mm/s at which zone B starts */
  b: number;
  c: number;
  d: number;
}

export interface VibrationConfig {
  /** mm/s of velocity proxy per m/s² of vibration magnitude */
  velocityProxyFactor: number;
  zoneThresholds: ZoneThresholds;
  /** Raw-magnitude ring used for shimmer and gradients */
  shimmerWindowSize: number;
  /** Vibration-magnitude ring feeding the mechanical FFT; power of two */
  spectrumWindowSize: number;
  peakDecay: number;
  /** Weight kept by the long-term gradient EMA each frame */
  gradientDecay: number;
  /** Accel sample rate assumed until frame timing has been measured (Hz) */
  nominalSampleRate: number;
}

export interface SpectralConfig {
  audioFftSize: number;
  audioSampleRate: number;
  /** Minimum frame time between two runs of the same spectral path (ms) */
  dutyIntervalMs: number;
}

export interface AcousticConfig {
  highPassCutoffHz: number;
  shapingGainDb: number;
  epsilon: number;
  /** dB per ln-unit of (1 + shimmer) */
  shimmerCouplingDb: number;
  historySize: number;
}

export interface PhotonicConfig {
  historySize: number;
  darkLux: number;
  naturalFlickerMax: number;
}

export interface ClassifierConfig {
  criticalShimmer: number;
  tonalEntropy: number;
}

export interface RateConfig {
  historySize: number;
}

export interface EngineConfig {
  orientation: OrientationConfig;
  vibration: VibrationConfig;
  spectral: SpectralConfig;
  acoustic: AcousticConfig;
  photonic: PhotonicConfig;
  classifier: ClassifierConfig;
  rate: RateConfig;
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  orientation: {
    gravityAlpha: 0.8,
    standardGravity: STANDARD_GRAVITY,
    tiltHistorySize: 50,
  },
  vibration: {
    velocityProxyFactor: 2.0,
    zoneThresholds: { b: 1.8, c: 4.5, d: 11.0 },
    shimmerWindowSize: 128,
    spectrumWindowSize: 512,
    peakDecay: 0.99,
    gradientDecay: 0.999,
    nominalSampleRate: 50,
  },
  spectral: {
    audioFftSize: 2048,
    audioSampleRate: 16000,
    dutyIntervalMs: 200,
  },
  acoustic: {
    highPassCutoffHz: 500,
    shapingGainDb: 2,
    epsilon: 1e-9,
    shimmerCouplingDb: 0.5,
    historySize: 40,
  },
  photonic: {
    historySize: 50,
    darkLux: 5,
    naturalFlickerMax: 0.01,
  },
  classifier: {
    criticalShimmer: 4.0,
    tonalEntropy: 0.35,
  },
  rate: {
    historySize: 20,
  },
};

// ============================================================================
// RESOLUTION
// ============================================================================

function requireOpenUnit(name: string, value: number): void {
  if (!(value > 0 && value < 1)) {
    throw new Error(`${name} must lie strictly between 0 and 1, got ${value}`);
  }
}

function requirePositive(name: string, value: number): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new Error(`${name} must be a positive number, got ${value}`);
  }
}

function requireCapacity(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
}

export function validateEngineConfig(config: EngineConfig): void {
  const { orientation, vibration, spectral, acoustic, photonic, rate } = config;

  requireOpenUnit("orientation.gravityAlpha", orientation.gravityAlpha);
  requireCapacity("orientation.tiltHistorySize", orientation.tiltHistorySize);

  requirePositive("vibration.velocityProxyFactor", vibration.velocityProxyFactor);
  const { b, c, d } = vibration.zoneThresholds;
  if (!(d > c && c > b && b > 0)) {
    throw new Error(
      `vibration.zoneThresholds must satisfy d > c > b > 0, got d=${d} c=${c} b=${b}`,
    );
  }
  requireCapacity("vibration.shimmerWindowSize", vibration.shimmerWindowSize);
  if (!isPowerOfTwo(vibration.spectrumWindowSize)) {
    throw new Error(
      `vibration.spectrumWindowSize must be a power of two, got ${vibration.spectrumWindowSize}`,
    );
  }
  requireOpenUnit("vibration.peakDecay", vibration.peakDecay);
  requireOpenUnit("vibration.gradientDecay", vibration.gradientDecay);
  requirePositive("vibration.nominalSampleRate", vibration.nominalSampleRate);

  if (!isPowerOfTwo(spectral.audioFftSize)) {
    throw new Error(`spectral.audioFftSize must be a power of two, got ${spectral.audioFftSize}`);
  }
  requirePositive("spectral.audioSampleRate", spectral.audioSampleRate);
  if (spectral.dutyIntervalMs < 0) {
    throw new Error(`spectral.dutyIntervalMs must not be negative, got ${spectral.dutyIntervalMs}`);
  }

  requirePositive("acoustic.highPassCutoffHz", acoustic.highPassCutoffHz);
  requirePositive("acoustic.epsilon", acoustic.epsilon);
  requireCapacity("acoustic.historySize", acoustic.historySize);

  requireCapacity("photonic.historySize", photonic.historySize);
  requireCapacity("rate.historySize", rate.historySize);
}

export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const config: EngineConfig = {
    orientation: { ...DEFAULT_ENGINE_CONFIG.orientation, ...overrides.orientation },
    vibration: { ...DEFAULT_ENGINE_CONFIG.vibration, ...overrides.vibration },
    spectral: { ...DEFAULT_ENGINE_CONFIG.spectral, ...overrides.spectral },
    acoustic: { ...DEFAULT_ENGINE_CONFIG.acoustic, ...overrides.acoustic },
    photonic: { ...DEFAULT_ENGINE_CONFIG.photonic, ...overrides.photonic },
    classifier: { ...DEFAULT_ENGINE_CONFIG.classifier, ...overrides.classifier },
    rate: { ...DEFAULT_ENGINE_CONFIG.rate, ...overrides.rate },
  };
  validateEngineConfig(config);
  return config;
}
