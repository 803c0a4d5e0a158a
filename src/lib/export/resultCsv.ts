import type { CalibrationProfile, DiagnosticResult } from "../../engine/types";
import type { ScanMode } from "../constants/ScanModes";

export const DEFAULT_EXPORT_CHUNK_SIZE = 2000;

export const RESULT_CSV_COLUMNS = [
  "time_s",
  "hz",
  "shimmer",
  "vel_mm_s",
  "iso_zone",
  "spl_dba",
  "lux",
  "freq_hz",
  "label",
  "severity",
  "tilt_deg",
  "state",
] as const;

interface CsvChunkProgress {
  processed: number;
  total: number;
}

interface SerializeResultsCsvInput {
  results: readonly DiagnosticResult[];
  mode?: Readonly<ScanMode>;
  calibration?: CalibrationProfile;
  /** Wall-clock start of the session, ms since epoch */
  startedAt?: number;
  chunkSize?: number;
  onProgress?: (progress: CsvChunkProgress) => void;
}

/** Quote a field only when it carries a separator, quote or newline */
export function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatResultLine(result: DiagnosticResult, firstTimestampNs: number): string {
  return [
    ((result.timestampNs - firstTimestampNs) / 1e9).toFixed(3),
    result.realHz.toFixed(1),
    result.shimmer.toFixed(4),
    result.velocityRms.toFixed(2),
    result.isoZone,
    result.dbA.toFixed(1),
    result.lux === null ? "" : result.lux.toFixed(0),
    result.dominantFreq.toFixed(2),
    csvField(result.freqLabel),
    String(result.severity),
    result.tiltDegrees.toFixed(2),
    result.state,
  ].join(",");
}

export function serializeResultsCsv({
  results,
  mode,
  calibration,
  startedAt,
  chunkSize = DEFAULT_EXPORT_CHUNK_SIZE,
  onProgress,
}: SerializeResultsCsvInput): string | null {
  if (results.length === 0) {
    return null;
  }

  const first = results[0].timestampNs;
  const durationSec = (results[results.length - 1].timestampNs - first) / 1e9;

  const lines: string[] = [];
  lines.push("# Fieldscope Measurement Export");
  if (mode) lines.push(`# Mode: ${mode.label}`);
  if (startedAt !== undefined) lines.push(`# Date: ${new Date(startedAt).toISOString()}`);
  lines.push(`# Duration: ${durationSec.toFixed(2)}s`);
  lines.push(`# Frames: ${results.length}`);

  if (calibration) {
    lines.push("# Calibration:");
    lines.push(`#   accel_zero=${calibration.accelZero.map((v) => v.toFixed(6)).join(",")}`);
    lines.push(`#   gyro_zero=${calibration.gyroZero.map((v) => v.toFixed(6)).join(",")}`);
    lines.push(`#   spl_offset=${calibration.splOffset.toFixed(2)}`);
    lines.push(
      `#   tilt_zero=${calibration.tiltZero.pitch.toFixed(3)},${calibration.tiltZero.roll.toFixed(3)}`,
    );
  }
  lines.push("#");
  lines.push(RESULT_CSV_COLUMNS.join(","));

  const total = results.length;
  for (let index = 0; index < total; index += chunkSize) {
    const end = Math.min(index + chunkSize, total);
    for (let i = index; i < end; i += 1) {
      lines.push(formatResultLine(results[i], first));
    }
    onProgress?.({ processed: end, total });
  }

  return lines.join("\n");
}
