/**
 * MeasurementSession - a scan mode wired to an engine, an eco controller
 * and the audio mailbox.
 *
 * Per frame:
 *   - drop the sensors the scan mode does not use
 *   - take at most one PCM block from the mailbox
 *   - run the engine, with the mechanical spectrum only while Active
 *   - feed the vibration magnitude to the eco controller
 *   - flag "warm-sensor" after a long uninterrupted Active stretch
 *
 * Accel-zero capture averages the next N display-remapped accel samples
 * and installs the resulting offset.
 */

import type { TtfModel } from "../analysis/FaultPredictor";
import { DiagnosticEngine } from "../engine/DiagnosticEngine";
import type { EngineConfigOverrides } from "../engine/config";
import type { DiagnosticResult, SensorFrame, Vec3Tuple } from "../engine/types";
import { AudioMailbox } from "../lib/audio/AudioMailbox";
import { DEFAULT_SCAN_MODE, getScanMode, type ScanMode, type ScanModeId } from "../lib/constants/ScanModes";
import { remapForDisplay } from "../lib/math/conventions";
import { EcoController, type EcoConfig } from "../lib/power/EcoController";
import { sessionLog } from "../lib/logger";

// ============================================================================
// TYPES
// ============================================================================

export interface SessionOptions {
  mode: ScanModeId;
  engine: EngineConfigOverrides;
  eco: Partial<EcoConfig>;
  ttfModel?: TtfModel;
  /** Continuous Active time before the warm-sensor condition, ms */
  warmSensorMs: number;
  /** Samples averaged by captureAccelZero() when no count is given */
  accelZeroSamples: number;
}

const DEFAULT_OPTIONS: SessionOptions = {
  mode: DEFAULT_SCAN_MODE,
  engine: {},
  eco: {},
  warmSensorMs: 20 * 60 * 1000,
  accelZeroSamples: 50,
};

interface AccelZeroCapture {
  remaining: number;
  count: number;
  sum: Vec3Tuple;
  resolve: (offset: Vec3Tuple) => void;
  reject: (error: Error) => void;
  promise: Promise<Vec3Tuple>;
}

const NS_PER_MS = 1e6;

// ============================================================================
// SESSION
// ============================================================================

export class MeasurementSession {
  readonly engine: DiagnosticEngine;
  readonly eco: EcoController;
  readonly mailbox: AudioMailbox;

  private readonly options: SessionOptions;
  private mode: Readonly<ScanMode>;
  private activeSinceNs: number | null = null;
  private warmReported = false;
  private capture: AccelZeroCapture | null = null;

  constructor(options: Partial<SessionOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.mode = getScanMode(this.options.mode);
    this.engine = new DiagnosticEngine(this.options.engine, { ttfModel: this.options.ttfModel });
    this.eco = new EcoController(this.mode, this.options.eco);
    this.mailbox = AudioMailbox.create(this.engine.config.spectral.audioFftSize);
  }

  get scanMode(): Readonly<ScanMode> {
    return this.mode;
  }

  get sampleRateHz(): number {
    return this.eco.sampleRateHz;
  }

  start(nowNs: number): void {
    this.eco.engage(nowNs);
    this.activeSinceNs = nowNs;
    this.warmReported = false;
    sessionLog.info(`Session started in ${this.mode.label}`);
  }

  stop(): void {
    if (this.capture) {
      this.capture.reject(new Error("Session stopped before accel-zero capture finished"));
      this.capture = null;
    }
    this.activeSinceNs = null;
    sessionLog.info("Session stopped");
  }

  setMode(id: ScanModeId): void {
    this.mode = getScanMode(id);
    this.eco.setMode(this.mode);
    sessionLog.info(`Scan mode → ${this.mode.label}`);
  }

  processFrame(frame: SensorFrame): DiagnosticResult {
    const pcm = this.mode.useMicrophone
      ? (frame.pcm ?? this.mailbox.take() ?? undefined)
      : undefined;

    const input: SensorFrame = {
      accel: frame.accel,
      gyro: this.mode.useGyro ? frame.gyro : undefined,
      pcm,
      lux: this.mode.useLight ? frame.lux : undefined,
      rotation: frame.rotation,
      timestampNs: frame.timestampNs,
    };

    const result = this.engine.processFrame(input, { mechanicalSpectrum: this.eco.isActive });
    this.eco.update(result.vibrationRms, frame.timestampNs);
    this.feedAccelZero(frame);

    if (!this.isWarm(frame.timestampNs)) return result;

    return Object.freeze({
      ...result,
      conditions: Object.freeze([...result.conditions, "warm-sensor" as const]),
    });
  }

  /**
   * Average the next `samples` accel readings and install the resulting
   * accel zero. Resolves with the offset.
   */
  captureAccelZero(samples: number = this.options.accelZeroSamples): Promise<Vec3Tuple> {
    if (!Number.isInteger(samples) || samples <= 0) {
      return Promise.reject(new Error(`samples must be a positive integer, got ${samples}`));
    }
    if (this.capture) return this.capture.promise;

    let resolve: (offset: Vec3Tuple) => void = () => {};
    let reject: (error: Error) => void = () => {};
    const promise = new Promise<Vec3Tuple>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.capture = { remaining: samples, count: samples, sum: [0, 0, 0], resolve, reject, promise };
    return promise;
  }

  private feedAccelZero(frame: SensorFrame): void {
    const capture = this.capture;
    if (!capture) return;

    const v = remapForDisplay(frame.accel, frame.rotation);
    capture.sum[0] += v.x;
    capture.sum[1] += v.y;
    capture.sum[2] += v.z;
    capture.remaining--;
    if (capture.remaining > 0) return;

    this.capture = null;
    const mean: Vec3Tuple = [
      capture.sum[0] / capture.count,
      capture.sum[1] / capture.count,
      capture.sum[2] / capture.count,
    ];
    capture.resolve(this.engine.calibrateAccelFromRest(mean));
  }

  private isWarm(timestampNs: number): boolean {
    if (!this.eco.isActive) {
      this.activeSinceNs = null;
      this.warmReported = false;
      return false;
    }
    if (this.activeSinceNs === null) this.activeSinceNs = timestampNs;

    const warm = timestampNs - this.activeSinceNs >= this.options.warmSensorMs * NS_PER_MS;
    if (warm && !this.warmReported) {
      this.warmReported = true;
      sessionLog.warn("Sensors active without a rest; readings may drift with temperature");
    }
    return warm;
  }
}
