/**
 * DiagnosticEngine - one engine instance around an EngineContext.
 *
 * Frame processing and calibration actions arrive on different paths.
 * Calibration actions build a new immutable profile and install it in one
 * store write; the next frame picks it up whole.
 */

import { accelOffsetFromRest } from "../lib/fusion/OrientationFuser";
import { calibLog } from "../lib/logger";
import type { CalibrationState } from "../store/calibrationStore";
import type { EngineConfig, EngineConfigOverrides } from "./config";
import {
  createEngineContext,
  processFrame,
  type EngineContext,
  type EngineContextOptions,
  type ProcessFrameOptions,
} from "./EngineContext";
import type { CalibrationProfile, DiagnosticResult, SensorFrame, Vec3Tuple } from "./types";

export class DiagnosticEngine {
  private readonly ctx: EngineContext;

  constructor(overrides: EngineConfigOverrides = {}, options: EngineContextOptions = {}) {
    this.ctx = createEngineContext(overrides, options);
  }

  get config(): EngineConfig {
    return this.ctx.config;
  }

  processFrame(frame: SensorFrame, options?: ProcessFrameOptions): DiagnosticResult {
    return processFrame(this.ctx, frame, options);
  }

  // ==========================================================================
  // CALIBRATION
  // ==========================================================================

  getCalibration(): CalibrationProfile {
    return this.ctx.calibration.getState().profile;
  }

  /** Install a profile, e.g. one restored from persistence */
  loadCalibration(profile: CalibrationProfile): void {
    this.ctx.calibration.getState().replace(profile);
  }

  setCalibration(
    accelZero: Readonly<Vec3Tuple>,
    gyroZero: Readonly<Vec3Tuple>,
    splOffset: number,
  ): void {
    this.ctx.calibration.getState().update({ accelZero, gyroZero, splOffset });
    calibLog.info("Calibration offsets updated", { accelZero, gyroZero, splOffset });
  }

  /** Accel zero from a resting average; standard gravity stays on z */
  calibrateAccelFromRest(restMean: Readonly<Vec3Tuple>): Vec3Tuple {
    const accelZero = accelOffsetFromRest(restMean, this.ctx.config.orientation.standardGravity);
    this.ctx.calibration.getState().update({ accelZero });
    calibLog.info("Accel zero captured", accelZero);
    return accelZero;
  }

  /** Make the current orientation read as level */
  zeroTilt(): void {
    const tiltZero = this.ctx.fuser.currentRawTilt();
    this.ctx.calibration.getState().update({ tiltZero });
    calibLog.info("Tilt zeroed", tiltZero);
  }

  clearTiltZero(): void {
    this.ctx.calibration.getState().update({ tiltZero: { pitch: 0, roll: 0 } });
    calibLog.info("Tilt zero cleared");
  }

  /** Shift the SPL offset so the current reading becomes `targetDb` */
  setReferenceLevel(targetDb: number): void {
    if (!Number.isFinite(targetDb)) {
      throw new Error(`targetDb must be finite, got ${targetDb}`);
    }
    const previous = this.getCalibration().splOffset;
    const splOffset = this.ctx.acoustic.referenceOffset(targetDb, previous);
    this.ctx.calibration.getState().update({ splOffset });
    calibLog.info(`SPL reference set to ${targetDb} dB (offset ${splOffset.toFixed(2)})`);
  }

  resetCalibration(): void {
    this.ctx.calibration.getState().reset();
  }

  /** Notified with every new profile */
  subscribeCalibration(listener: (profile: CalibrationProfile) => void): () => void {
    return this.ctx.calibration.subscribe((state: CalibrationState, previous: CalibrationState) => {
      if (state.profile !== previous.profile) listener(state.profile);
    });
  }
}
