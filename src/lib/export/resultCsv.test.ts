import { describe, expect, it, vi } from "vitest";
import type { DiagnosticResult } from "../../engine/types";
import { NEUTRAL_CALIBRATION } from "../../store/calibrationStore";
import { SCAN_MODES } from "../constants/ScanModes";
import { csvField, formatResultLine, serializeResultsCsv } from "./resultCsv";

function makeResult(overrides: Partial<DiagnosticResult> = {}): DiagnosticResult {
  return {
    timestampNs: 0,
    realHz: 50,
    tiltDegrees: 1.5,
    tiltConfidence: 0.1,
    pitchDegrees: 1.5,
    rollDegrees: 0,
    rotationRate: 0,
    vibrationRms: 1,
    vibrationPeak: 1,
    velocityRms: 2,
    isoZone: "B",
    severity: 1,
    shimmer: 0.25,
    shortTermGradient: 0,
    longTermGradient: 0,
    dbA: 62.34,
    dbUncertainty: 0.5,
    lux: 480.4,
    flickerIndex: 0,
    lightSource: "Natural",
    dominantFreq: 30,
    freqLabel: "Motor/Fan (1800 RPM)",
    freqBand: "motor",
    spectrumSource: "vibration",
    spectralEntropy: 0.5,
    fault: { kind: "healthy", text: "Healthy", confidence: 0.05, ttfHours: null },
    state: "Descriptor",
    conditions: [],
    ...overrides,
  };
}

describe("formatResultLine", () => {
  it("should format one row relative to the first timestamp", () => {
    const line = formatResultLine(makeResult({ timestampNs: 1_520_000_000 }), 20_000_000);
    expect(line).toBe("1.500,50.0,0.2500,2.00,B,62.3,480,30.00,Motor/Fan (1800 RPM),1,1.50,Descriptor");
  });

  it("should leave lux empty when no reading exists", () => {
    const line = formatResultLine(makeResult({ lux: null }), 0);
    expect(line.split(",")[6]).toBe("");
  });
});

describe("csvField", () => {
  it("should quote fields with separators or quotes", () => {
    expect(csvField("plain")).toBe("plain");
    expect(csvField("a,b")).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
  });
});

describe("serializeResultsCsv", () => {
  it("should return null for an empty export", () => {
    expect(serializeResultsCsv({ results: [] })).toBeNull();
  });

  it("should write a header block, the column row and one line per result", () => {
    const csv = serializeResultsCsv({
      results: [makeResult(), makeResult({ timestampNs: 2_000_000_000 })],
      mode: SCAN_MODES.VibrationMonitor,
      calibration: NEUTRAL_CALIBRATION,
    });
    const lines = (csv ?? "").split("\n");

    expect(lines.slice(0, 4)).toEqual([
      "# Fieldscope Measurement Export",
      "# Mode: Vibration Monitor",
      "# Duration: 2.00s",
      "# Frames: 2",
    ]);
    expect(lines[4]).toBe("# Calibration:");
    expect(lines[7]).toBe("#   spl_offset=0.00");
    expect(lines[9]).toBe("#");
    expect(lines[10]).toBe(
      "time_s,hz,shimmer,vel_mm_s,iso_zone,spl_dba,lux,freq_hz,label,severity,tilt_deg,state",
    );
    expect(lines).toHaveLength(13);
    expect(lines[12].startsWith("2.000,")).toBe(true);
  });

  it("should report progress per chunk", () => {
    const onProgress = vi.fn();
    serializeResultsCsv({
      results: [makeResult(), makeResult(), makeResult()],
      chunkSize: 2,
      onProgress,
    });

    expect(onProgress).toHaveBeenNthCalledWith(1, { processed: 2, total: 3 });
    expect(onProgress).toHaveBeenNthCalledWith(2, { processed: 3, total: 3 });
  });
});
