/**
 * Frequency labeling for dominant spectral peaks.
 *
 * Bands are evaluated top-down and the first match wins, so mains hum takes
 * precedence over the motor band it overlaps.
 */

export type FrequencyBand = "mains" | "motor" | "low-frequency" | "unlabeled";

export type FrequencyLabel =
  | { band: "mains"; mainsHz: 50 | 60; text: string }
  | { band: "motor"; rpm: number; text: string }
  | { band: "low-frequency"; text: string }
  | { band: "unlabeled"; text: string };

interface HzRange {
  min: number;
  max: number;
}

export const MAINS_50HZ_BAND: HzRange = { min: 49, max: 51 };
export const MAINS_60HZ_BAND: HzRange = { min: 59, max: 61 };
export const MOTOR_BAND: HzRange = { min: 13, max: 60 };
/** Suspension / human motion sits below this */
export const LOW_FREQUENCY_CEILING_HZ = 5;

export const UNLABELED: FrequencyLabel = { band: "unlabeled", text: "Unlabeled" };

function inRange(hz: number, range: HzRange): boolean {
  return hz >= range.min && hz <= range.max;
}

export function isMainsFrequency(hz: number): boolean {
  return inRange(hz, MAINS_50HZ_BAND) || inRange(hz, MAINS_60HZ_BAND);
}

export function labelFrequency(hz: number): FrequencyLabel {
  if (inRange(hz, MAINS_50HZ_BAND)) {
    return { band: "mains", mainsHz: 50, text: "Mains Hum (50 Hz)" };
  }
  if (inRange(hz, MAINS_60HZ_BAND)) {
    return { band: "mains", mainsHz: 60, text: "Mains Hum (60 Hz)" };
  }
  if (inRange(hz, MOTOR_BAND)) {
    const rpm = Math.trunc(hz * 60);
    return { band: "motor", rpm, text: `Motor/Fan (${rpm} RPM)` };
  }
  if (hz < LOW_FREQUENCY_CEILING_HZ) {
    return { band: "low-frequency", text: "Suspension / Human" };
  }
  return UNLABELED;
}
