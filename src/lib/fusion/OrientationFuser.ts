/**
 * Orientation Fuser
 *
 * Gravity estimation from a calibrated accelerometer, and tilt, pitch and
 * roll derived from that estimate.
 *
 * Pipeline per sample:
 *   1. Remap axes for the current display rotation
 *   2. Subtract the accel zero offset (calibration precedes smoothing)
 *   3. gravity = α·gravity + (1 − α)·calAccel (the first sample seeds it)
 *   4. linearAccel = calAccel − gravity
 *   5. pitch/roll from gravity, minus the stored tilt zero
 */

import * as THREE from "three";
import { RingBuffer } from "../buffers/RingBuffer";
import { remapForDisplay } from "../math/conventions";
import type { OrientationConfig } from "../../engine/config";
import type {
  CalibrationProfile,
  DisplayRotation,
  TiltZero,
  Vec3Tuple,
} from "../../engine/types";

const RAD2DEG = 180 / Math.PI;
const DEG2RAD = Math.PI / 180;

export interface OrientationSample {
  calAccel: THREE.Vector3;
  linearAccel: THREE.Vector3;
  /** Degrees, tilt zero applied */
  pitch: number;
  roll: number;
  /** Combined inclination from level, degrees */
  tilt: number;
  /** Sample standard deviation of recent tilt, degrees */
  tiltConfidence: number;
  /** Offset-corrected gyro magnitude, deg/s (0 without gyro) */
  rotationRate: number;
}

/**
 * Accel zero offset from a resting average: the vertical axis keeps
 * standard gravity so the calibrated reading still carries it.
 */
export function accelOffsetFromRest(
  restMean: Readonly<Vec3Tuple>,
  standardGravity: number,
): Vec3Tuple {
  return [restMean[0], restMean[1], restMean[2] - standardGravity];
}

export class OrientationFuser {
  private readonly alpha: number;
  private readonly gravity = new THREE.Vector3();
  private seeded = false;
  private readonly tiltHistory: RingBuffer;
  private rawPitch = 0;
  private rawRoll = 0;

  constructor(config: OrientationConfig) {
    this.alpha = config.gravityAlpha;
    this.tiltHistory = new RingBuffer(config.tiltHistorySize);
  }

  update(
    accel: Readonly<Vec3Tuple>,
    gyro: Readonly<Vec3Tuple> | undefined,
    rotation: DisplayRotation,
    calibration: CalibrationProfile,
  ): OrientationSample {
    const [ox, oy, oz] = calibration.accelZero;
    const calAccel = remapForDisplay(accel, rotation).sub(new THREE.Vector3(ox, oy, oz));

    if (this.seeded) {
      this.gravity.multiplyScalar(this.alpha).addScaledVector(calAccel, 1 - this.alpha);
    } else {
      this.gravity.copy(calAccel);
      this.seeded = true;
    }
    const linearAccel = calAccel.clone().sub(this.gravity);

    const g = this.gravity;
    this.rawPitch = Math.atan2(g.y, g.z) * RAD2DEG;
    this.rawRoll = Math.atan2(-g.x, Math.sqrt(g.y * g.y + g.z * g.z)) * RAD2DEG;

    const pitch = this.rawPitch - calibration.tiltZero.pitch;
    const roll = this.rawRoll - calibration.tiltZero.roll;
    const cosTilt = Math.cos(pitch * DEG2RAD) * Math.cos(roll * DEG2RAD);
    const tilt = Math.acos(Math.min(1, Math.max(-1, cosTilt))) * RAD2DEG;

    this.tiltHistory.push(tilt);

    let rotationRate = 0;
    if (gyro) {
      const [gx, gy, gz] = calibration.gyroZero;
      rotationRate =
        remapForDisplay(gyro, rotation).sub(new THREE.Vector3(gx, gy, gz)).length() * RAD2DEG;
    }

    return {
      calAccel,
      linearAccel,
      pitch,
      roll,
      tilt,
      tiltConfidence: this.tiltHistory.sampleStdDev(),
      rotationRate,
    };
  }

  /** Uncorrected pitch/roll of the current gravity estimate, for tilt zeroing */
  currentRawTilt(): TiltZero {
    return { pitch: this.rawPitch, roll: this.rawRoll };
  }

  getGravity(): THREE.Vector3 {
    return this.gravity.clone();
  }
}
