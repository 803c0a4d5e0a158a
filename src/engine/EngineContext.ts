/**
 * Engine context and the per-frame pipeline.
 *
 * All mutable engine state lives in one EngineContext, owned by a single
 * caller and passed into processFrame. There are no module-level instances,
 * so any number of engines can run side by side.
 *
 * Per frame:
 *   1. Read the calibration profile once
 *   2. Frame rate → orientation → vibration
 *   3. Mechanical spectrum (duty-cycled, window full, caller allows it)
 *   4. Audio level and audio spectrum (duty-cycled) when PCM is present
 *   5. Photonic → fault model (mechanical spectrum) → state classifier
 */

import { AcousticLevelMeter } from "../analysis/AcousticLevelMeter";
import { classifyEngineState } from "../analysis/EngineStateClassifier";
import { ThresholdDecayModel, type TtfModel } from "../analysis/FaultPredictor";
import { FrameRateMonitor } from "../analysis/FrameRateMonitor";
import { PhotonicAnalyzer } from "../analysis/PhotonicAnalyzer";
import { VibrationAnalyzer } from "../analysis/VibrationAnalyzer";
import { OrientationFuser } from "../lib/fusion/OrientationFuser";
import { engineLog } from "../lib/logger";
import { SpectralAnalyzer, type SpectralSnapshot } from "../lib/signal/SignalProcessor";
import { UNLABELED } from "../lib/signal/frequencyLabels";
import { createCalibrationStore, type CalibrationStore } from "../store/calibrationStore";
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from "./config";
import type {
  CalibrationProfile,
  DiagnosticResult,
  EngineCondition,
  SensorFrame,
  SpectrumSource,
} from "./types";

const NS_PER_MS = 1e6;

// ============================================================================
// CONTEXT
// ============================================================================

interface SpectralPath {
  readonly analyzer: SpectralAnalyzer;
  snapshot: SpectralSnapshot | null;
  lastRunNs: number | null;
}

export interface EngineContext {
  readonly config: EngineConfig;
  readonly calibration: CalibrationStore;
  readonly ttfModel: TtfModel;

  readonly rate: FrameRateMonitor;
  readonly fuser: OrientationFuser;
  readonly vibration: VibrationAnalyzer;
  readonly acoustic: AcousticLevelMeter;
  readonly photonic: PhotonicAnalyzer;

  readonly mechanicalPath: SpectralPath;
  readonly audioPath: SpectralPath;

  /** PCM blocks received since creation */
  audioBlocks: number;
  frames: number;
}

export interface EngineContextOptions {
  ttfModel?: TtfModel;
  calibration?: CalibrationProfile;
}

export interface ProcessFrameOptions {
  /** Allow the mechanical spectrum this frame (false while not Active) */
  mechanicalSpectrum?: boolean;
}

/** Build a context; throws on invalid configuration */
export function createEngineContext(
  overrides: EngineConfigOverrides = {},
  options: EngineContextOptions = {},
): EngineContext {
  const config = resolveEngineConfig(overrides);

  return {
    config,
    calibration: createCalibrationStore(options.calibration),
    ttfModel: options.ttfModel ?? new ThresholdDecayModel(),

    rate: new FrameRateMonitor(config.rate),
    fuser: new OrientationFuser(config.orientation),
    vibration: new VibrationAnalyzer(config.vibration),
    acoustic: new AcousticLevelMeter(config.acoustic, config.spectral.audioSampleRate),
    photonic: new PhotonicAnalyzer(config.photonic),

    mechanicalPath: {
      analyzer: new SpectralAnalyzer(config.vibration.spectrumWindowSize),
      snapshot: null,
      lastRunNs: null,
    },
    audioPath: {
      analyzer: new SpectralAnalyzer(config.spectral.audioFftSize),
      snapshot: null,
      lastRunNs: null,
    },

    audioBlocks: 0,
    frames: 0,
  };
}

// ============================================================================
// FRAME PIPELINE
// ============================================================================

function isDue(path: SpectralPath, timestampNs: number, intervalMs: number): boolean {
  return path.lastRunNs === null || timestampNs - path.lastRunNs >= intervalMs * NS_PER_MS;
}

function runSpectralPath(
  path: SpectralPath,
  samples: ArrayLike<number>,
  sampleRate: number,
  timestampNs: number,
): void {
  const snapshot = path.analyzer.analyze(samples, sampleRate);
  path.lastRunNs = timestampNs;
  if (snapshot) path.snapshot = snapshot;
}

function assertFrame(frame: SensorFrame): void {
  if (!frame.accel.every(Number.isFinite)) {
    throw new Error(`SensorFrame.accel must be finite, got [${frame.accel.join(", ")}]`);
  }
  if (!Number.isFinite(frame.timestampNs)) {
    throw new Error(`SensorFrame.timestampNs must be finite, got ${frame.timestampNs}`);
  }
}

/**
 * The reported spectrum prefers audio whenever one exists; the mechanical
 * spectrum stands in otherwise. Fault prediction reads only the mechanical one.
 */
function dominantSpectrum(ctx: EngineContext): {
  snapshot: SpectralSnapshot | null;
  source: SpectrumSource;
} {
  if (ctx.audioPath.snapshot) return { snapshot: ctx.audioPath.snapshot, source: "audio" };
  if (ctx.mechanicalPath.snapshot) {
    return { snapshot: ctx.mechanicalPath.snapshot, source: "vibration" };
  }
  return { snapshot: null, source: "none" };
}

export function processFrame(
  ctx: EngineContext,
  frame: SensorFrame,
  options: ProcessFrameOptions = {},
): DiagnosticResult {
  assertFrame(frame);
  const { config } = ctx;
  const calibration = ctx.calibration.getState().profile;
  const conditions: EngineCondition[] = [];
  ctx.frames++;

  const realHz = ctx.rate.tick(frame.timestampNs);

  // Orientation and vibration
  const orientation = ctx.fuser.update(frame.accel, frame.gyro, frame.rotation, calibration);
  const vibration = ctx.vibration.update(orientation.linearAccel, orientation.calAccel);

  // Mechanical spectrum
  const window = ctx.vibration.spectrumWindow();
  if (
    options.mechanicalSpectrum !== false &&
    window !== null &&
    isDue(ctx.mechanicalPath, frame.timestampNs, config.spectral.dutyIntervalMs)
  ) {
    const sampleRate = ctx.rate.isMeasured ? realHz : config.vibration.nominalSampleRate;
    runSpectralPath(ctx.mechanicalPath, window, sampleRate, frame.timestampNs);
  }

  // Audio
  const pcm = frame.pcm;
  if (pcm) {
    ctx.audioBlocks++;
    ctx.acoustic.measure(pcm, calibration.splOffset, vibration.shimmer);

    if (pcm.length < config.spectral.audioFftSize) {
      conditions.push("audio-short-buffer");
      engineLog.debug(
        `PCM block of ${pcm.length} samples is shorter than the ${config.spectral.audioFftSize}-point FFT`,
      );
    } else if (isDue(ctx.audioPath, frame.timestampNs, config.spectral.dutyIntervalMs)) {
      runSpectralPath(ctx.audioPath, pcm, config.spectral.audioSampleRate, frame.timestampNs);
    }
  } else {
    conditions.push(ctx.audioBlocks === 0 ? "audio-unavailable" : "audio-stale");
  }

  const { snapshot, source } = dominantSpectrum(ctx);
  const dominantFreq = snapshot?.dominantFreq ?? 0;
  const label = snapshot?.label ?? UNLABELED;

  const light = ctx.photonic.update(frame.lux, dominantFreq);

  const fault = ctx.ttfModel.predict({
    amplitude: vibration.peak,
    dominantFreq: ctx.mechanicalPath.snapshot?.dominantFreq ?? 0,
    shimmer: vibration.shimmer,
    longTermGradient: vibration.longTermGradient,
  });

  const state = classifyEngineState(
    {
      severity: vibration.severity,
      shimmer: vibration.shimmer,
      spectralEntropy: snapshot && snapshot.totalEnergy > 0 ? snapshot.entropy : null,
    },
    config.classifier,
  );

  return Object.freeze({
    timestampNs: frame.timestampNs,
    realHz,

    tiltDegrees: orientation.tilt,
    tiltConfidence: orientation.tiltConfidence,
    pitchDegrees: orientation.pitch,
    rollDegrees: orientation.roll,
    rotationRate: orientation.rotationRate,

    vibrationRms: vibration.vibrationMag,
    vibrationPeak: vibration.peak,
    velocityRms: vibration.velocityRms,
    isoZone: vibration.zone,
    severity: vibration.severity,
    shimmer: vibration.shimmer,
    shortTermGradient: vibration.shortTermGradient,
    longTermGradient: vibration.longTermGradient,

    dbA: ctx.acoustic.currentDbA,
    dbUncertainty: ctx.acoustic.uncertainty,

    lux: light.lux,
    flickerIndex: light.flickerIndex,
    lightSource: light.lightSource,

    dominantFreq,
    freqLabel: label.text,
    freqBand: label.band,
    spectrumSource: source,
    spectralEntropy: snapshot?.entropy ?? 0,

    fault: Object.freeze({ ...fault }),
    state,
    conditions: Object.freeze(conditions),
  });
}
