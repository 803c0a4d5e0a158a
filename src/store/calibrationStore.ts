/**
 * Calibration Store - per-engine calibration profile
 * ==================================================
 *
 * Holds the offsets an engine applies to every frame. Calibration actions
 * arrive from a control path separate from frame processing, so the profile
 * is an immutable value swapped in a single store write; frame processing
 * reads it once per frame and never observes a partial update.
 *
 * One store per engine instance. Persisting the profile is left to the
 * caller (subscribe and write the plain numbers wherever they live).
 *
 * @module calibrationStore
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { CalibrationProfile, TiltZero, Vec3Tuple } from "../engine/types";

function freezeVec(v: Readonly<Vec3Tuple>): Readonly<Vec3Tuple> {
  const copy: Vec3Tuple = [v[0], v[1], v[2]];
  return Object.freeze(copy);
}

function freezeTilt(t: Readonly<TiltZero>): Readonly<TiltZero> {
  return Object.freeze({ pitch: t.pitch, roll: t.roll });
}

export function freezeProfile(profile: CalibrationProfile): CalibrationProfile {
  return Object.freeze({
    accelZero: freezeVec(profile.accelZero),
    gyroZero: freezeVec(profile.gyroZero),
    splOffset: profile.splOffset,
    tiltZero: freezeTilt(profile.tiltZero),
  });
}

export const NEUTRAL_CALIBRATION: CalibrationProfile = freezeProfile({
  accelZero: [0, 0, 0],
  gyroZero: [0, 0, 0],
  splOffset: 0,
  tiltZero: { pitch: 0, roll: 0 },
});

export interface CalibrationState {
  profile: CalibrationProfile;
  /** Incremented on every change */
  revision: number;

  // Actions
  replace: (profile: CalibrationProfile) => void;
  /** Read-modify-write of selected fields as one store update */
  update: (patch: Partial<CalibrationProfile>) => void;
  reset: () => void;
}

export type CalibrationStore = StoreApi<CalibrationState>;

export function createCalibrationStore(
  initial: CalibrationProfile = NEUTRAL_CALIBRATION,
): CalibrationStore {
  return createStore<CalibrationState>()((set) => ({
    profile: freezeProfile(initial),
    revision: 0,

    replace: (profile) => {
      set((state) => ({
        profile: freezeProfile(profile),
        revision: state.revision + 1,
      }));
    },

    update: (patch) => {
      set((state) => ({
        profile: freezeProfile({ ...state.profile, ...patch }),
        revision: state.revision + 1,
      }));
    },

    reset: () => {
      set((state) => ({
        profile: NEUTRAL_CALIBRATION,
        revision: state.revision + 1,
      }));
    },
  }));
}
