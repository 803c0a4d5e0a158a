import { describe, it, expect, beforeEach } from "vitest";
import { PhotonicAnalyzer } from "./PhotonicAnalyzer";
import { DEFAULT_ENGINE_CONFIG } from "../engine/config";

describe("PhotonicAnalyzer", () => {
  let analyzer: PhotonicAnalyzer;

  beforeEach(() => {
    analyzer = new PhotonicAnalyzer(DEFAULT_ENGINE_CONFIG.photonic);
  });

  it("should report Unknown before any lux reading", () => {
    expect(analyzer.update(undefined, 50)).toEqual({
      lux: null,
      meanLux: 0,
      flickerIndex: 0,
      lightSource: "Unknown",
    });
  });

  it("should classify steady daylight as Natural", () => {
    let sample = analyzer.update(500, 0);
    for (let i = 0; i < 10; i++) sample = analyzer.update(500, 0);

    expect(sample.lux).toBe(500);
    expect(sample.flickerIndex).toBe(0);
    expect(sample.lightSource).toBe("Natural");
  });

  it("should classify a dim room as Dark regardless of flicker", () => {
    analyzer.update(1, 50);
    const sample = analyzer.update(3, 50);
    expect(sample.lightSource).toBe("Dark");
  });

  it("should skip flicker when the mean is zero", () => {
    const sample = analyzer.update(0, 0);
    expect(sample.flickerIndex).toBe(0);
    expect(sample.lightSource).toBe("Dark");
  });

  it("should compute flicker as stddev over mean", () => {
    analyzer.update(90, 0);
    const sample = analyzer.update(110, 0);
    // mean 100, population stddev 10
    expect(sample.flickerIndex).toBeCloseTo(0.1, 12);
  });

  it("should call flickering light Grid when the spectrum peaks at mains", () => {
    analyzer.update(90, 50);
    expect(analyzer.update(110, 50).lightSource).toBe("Grid");
  });

  it("should call flickering light Artificial away from mains", () => {
    analyzer.update(90, 120);
    expect(analyzer.update(110, 120).lightSource).toBe("Artificial");
  });

  it("should keep the last reading on frames without lux", () => {
    analyzer.update(500, 0);
    const sample = analyzer.update(undefined, 0);
    expect(sample.lux).toBe(500);
    expect(sample.lightSource).toBe("Natural");
  });
});
