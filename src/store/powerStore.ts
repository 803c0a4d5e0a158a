/**
 * Power Store - sampling-power state shared by the eco controller and the
 * thermal guard.
 *
 * Subscribers receive (state, previous) pairs, so edge detection is a
 * comparison of the two; writes that change nothing are skipped by the
 * actions below and never notify.
 */

import { createStore, type StoreApi } from "zustand/vanilla";

export type EcoState = "Active" | "Eco" | "UltraEco";

export interface PowerState {
  ecoState: EcoState;
  /** Timestamp of the last above-threshold motion, ns; null before engage */
  lastMotionNs: number | null;
  /** Timestamp of the last eco-state change, ns */
  lastTransitionNs: number | null;
  ultraEcoOverride: boolean;
  throttled: boolean;
  temperatureC: number | null;

  // Actions
  transition: (to: EcoState, atNs: number) => void;
  markMotion: (atNs: number) => void;
  setUltraEcoOverride: (enabled: boolean) => void;
  setThermal: (temperatureC: number, throttled: boolean) => void;
  reset: () => void;
}

export type PowerStore = StoreApi<PowerState>;

type PowerData = Pick<
  PowerState,
  "ecoState" | "lastMotionNs" | "lastTransitionNs" | "ultraEcoOverride" | "throttled" | "temperatureC"
>;

const INITIAL: PowerData = {
  ecoState: "Active",
  lastMotionNs: null,
  lastTransitionNs: null,
  ultraEcoOverride: false,
  throttled: false,
  temperatureC: null,
};

export function createPowerStore(): PowerStore {
  return createStore<PowerState>()((set, get) => ({
    ...INITIAL,

    transition: (to, atNs) => {
      if (get().ecoState === to) return;
      set({ ecoState: to, lastTransitionNs: atNs });
    },

    markMotion: (atNs) => {
      set({ lastMotionNs: atNs });
    },

    setUltraEcoOverride: (enabled) => {
      if (get().ultraEcoOverride === enabled) return;
      set({ ultraEcoOverride: enabled });
    },

    setThermal: (temperatureC, throttled) => {
      set({ temperatureC, throttled });
    },

    reset: () => {
      set({ ...INITIAL });
    },
  }));
}
