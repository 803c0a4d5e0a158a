/**
 * EcoController - motion-driven sampling-power state machine
 *
 * States:
 *   Active    full rate of the scan mode
 *   Eco       reduced rate after a quiet period
 *   UltraEco  minimum rate, held by an explicit override
 *
 * Transitions:
 *   vibrationMag > wakeThreshold            → Active (resets last-motion)
 *   Active and quiet for > ecoTimeoutMs     → Eco
 *   override on                             → UltraEco (automatic moves suspended)
 *   override off                            → Active with a fresh last-motion
 *
 * A thermal guard sits alongside: temperature above throttleOnC forces the
 * minimum rate until it drops below throttleOffC.
 *
 * Listeners fire on edges only.
 */

import { createPowerStore, type EcoState, type PowerStore } from "../../store/powerStore";
import { MIN_SAMPLE_RATE_HZ, type ScanMode } from "../constants/ScanModes";
import { powerLog } from "../logger";

// ============================================================================
// TYPES
// ============================================================================

export interface EcoConfig {
  /** Vibration magnitude counted as motion, m/s² */
  wakeThreshold: number;
  /** Quiet time before dropping to Eco, ms */
  ecoTimeoutMs: number;
  /** Temperature that engages the throttle, °C */
  throttleOnC: number;
  /** Temperature that releases it, °C */
  throttleOffC: number;
}

export interface EcoTransition {
  from: EcoState;
  to: EcoState;
  timestampNs: number;
}

export interface ThermalChange {
  throttled: boolean;
  temperatureC: number;
}

// ============================================================================
// DEFAULT CONFIG
// ============================================================================

export const DEFAULT_ECO_CONFIG: EcoConfig = {
  wakeThreshold: 0.12,
  ecoTimeoutMs: 8_000,
  throttleOnC: 45,
  throttleOffC: 40,
};

const NS_PER_MS = 1e6;

// ============================================================================
// ECO CONTROLLER
// ============================================================================

export class EcoController {
  private readonly config: EcoConfig;
  private readonly store: PowerStore;
  private mode: Readonly<ScanMode>;

  constructor(mode: Readonly<ScanMode>, config: Partial<EcoConfig> = {}, store?: PowerStore) {
    this.config = { ...DEFAULT_ECO_CONFIG, ...config };
    if (!(this.config.throttleOffC < this.config.throttleOnC)) {
      throw new Error(
        `throttleOffC must be below throttleOnC, got ${this.config.throttleOffC} >= ${this.config.throttleOnC}`,
      );
    }
    this.mode = mode;
    this.store = store ?? createPowerStore();
  }

  get state(): EcoState {
    return this.store.getState().ecoState;
  }

  get isThrottled(): boolean {
    return this.store.getState().throttled;
  }

  get isActive(): boolean {
    return this.state === "Active";
  }

  /** Sampling rate the host should request right now */
  get sampleRateHz(): number {
    const { ecoState, throttled } = this.store.getState();
    if (throttled || ecoState === "UltraEco") return MIN_SAMPLE_RATE_HZ;
    return ecoState === "Eco" ? this.mode.ecoRateHz : this.mode.activeRateHz;
  }

  getStore(): PowerStore {
    return this.store;
  }

  setMode(mode: Readonly<ScanMode>): void {
    this.mode = mode;
  }

  /** Start in Active with `nowNs` as the last motion */
  engage(nowNs: number): void {
    const { markMotion, transition, ultraEcoOverride } = this.store.getState();
    markMotion(nowNs);
    if (!ultraEcoOverride) transition("Active", nowNs);
  }

  /** Feed one vibration magnitude; returns the resulting state */
  update(vibrationMag: number, timestampNs: number): EcoState {
    const { ultraEcoOverride, lastMotionNs, ecoState, markMotion, transition } =
      this.store.getState();

    if (ultraEcoOverride) return ecoState;

    if (lastMotionNs === null) {
      markMotion(timestampNs);
      return ecoState;
    }

    if (vibrationMag > this.config.wakeThreshold) {
      markMotion(timestampNs);
      transition("Active", timestampNs);
    } else if (
      ecoState === "Active" &&
      timestampNs - lastMotionNs > this.config.ecoTimeoutMs * NS_PER_MS
    ) {
      transition("Eco", timestampNs);
    }

    return this.state;
  }

  setUltraEco(enabled: boolean, nowNs: number): void {
    const { setUltraEcoOverride, markMotion, transition } = this.store.getState();
    setUltraEcoOverride(enabled);
    if (enabled) {
      transition("UltraEco", nowNs);
    } else {
      markMotion(nowNs);
      transition("Active", nowNs);
    }
  }

  /** Thermal guard with hysteresis between throttleOffC and throttleOnC */
  reportTemperature(celsius: number): void {
    const { throttled, setThermal } = this.store.getState();
    let next = throttled;
    if (!throttled && celsius > this.config.throttleOnC) next = true;
    else if (throttled && celsius < this.config.throttleOffC) next = false;

    if (next !== throttled) {
      powerLog.warn(next ? `Thermal throttle engaged at ${celsius} °C` : `Thermal throttle released at ${celsius} °C`);
    }
    setThermal(celsius, next);
  }

  onTransition(listener: (transition: EcoTransition) => void): () => void {
    return this.store.subscribe((state, previous) => {
      if (state.ecoState === previous.ecoState) return;
      powerLog.debug(`${previous.ecoState} → ${state.ecoState}`);
      listener({
        from: previous.ecoState,
        to: state.ecoState,
        timestampNs: state.lastTransitionNs ?? 0,
      });
    });
  }

  onThermalChange(listener: (change: ThermalChange) => void): () => void {
    return this.store.subscribe((state, previous) => {
      if (state.throttled === previous.throttled || state.temperatureC === null) return;
      listener({ throttled: state.throttled, temperatureC: state.temperatureC });
    });
  }
}
