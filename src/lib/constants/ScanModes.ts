/**
 * Scan Mode Presets
 *
 * Each mode picks the accelerometer rates for the Active and Eco power
 * states and which optional sensors it listens to. Rates follow the usual
 * handset sensor-delay tiers:
 *
 *   NORMAL ≈ 5 Hz    : BatterySaver, LightMeter
 *   UI     ≈ 16 Hz   : LevelStability, NoiseScanner
 *   GAME   = 50 Hz   : VibrationMonitor
 *
 * Ultra-eco and the thermal throttle both drop to MIN_SAMPLE_RATE_HZ.
 */

export type ScanModeId =
    | "BatterySaver"
    | "LevelStability"
    | "VibrationMonitor"
    | "NoiseScanner"
    | "LightMeter";

export interface CaptureBurst {
    /** Recording window, ms */
    recordMs: number;
    /** Idle gap after each window, ms */
    idleMs: number;
}

export interface ScanMode {
    id: ScanModeId;
    label: string;
    activeRateHz: number;
    ecoRateHz: number;
    useGyro: boolean;
    useLight: boolean;
    useMicrophone: boolean;
    /** Periodic capture instead of continuous; null for continuous */
    burst: CaptureBurst | null;
}

export const MIN_SAMPLE_RATE_HZ = 1;

export const SCAN_MODES: Readonly<Record<ScanModeId, Readonly<ScanMode>>> = {
    BatterySaver: {
        id: "BatterySaver",
        label: "Battery Saver",
        activeRateHz: 5,
        ecoRateHz: MIN_SAMPLE_RATE_HZ,
        useGyro: false,
        useLight: false,
        useMicrophone: false,
        burst: null,
    },
    LevelStability: {
        id: "LevelStability",
        label: "Level & Stability",
        activeRateHz: 16,
        ecoRateHz: 5,
        useGyro: false,
        useLight: true,
        useMicrophone: false,
        burst: null,
    },
    VibrationMonitor: {
        id: "VibrationMonitor",
        label: "Vibration Monitor",
        activeRateHz: 50,
        ecoRateHz: 5,
        useGyro: true,
        useLight: false,
        useMicrophone: true,
        burst: null,
    },
    NoiseScanner: {
        id: "NoiseScanner",
        label: "Noise Scanner",
        activeRateHz: 16,
        ecoRateHz: 5,
        useGyro: false,
        useLight: false,
        useMicrophone: true,
        burst: { recordMs: 5_000, idleMs: 55_000 },
    },
    LightMeter: {
        id: "LightMeter",
        label: "Light Meter",
        activeRateHz: 5,
        ecoRateHz: MIN_SAMPLE_RATE_HZ,
        useGyro: false,
        useLight: true,
        useMicrophone: false,
        burst: null,
    },
} as const;

export const DEFAULT_SCAN_MODE: ScanModeId = "LevelStability";

export function getScanMode(id: ScanModeId): Readonly<ScanMode> {
    return SCAN_MODES[id];
}
