import { describe, it, expect } from "vitest";
import {
  GradientTrendModel,
  NO_FORECAST,
  ThresholdDecayModel,
  type FaultInputs,
} from "./FaultPredictor";
import { classifyEngineState } from "./EngineStateClassifier";
import { DEFAULT_ENGINE_CONFIG } from "../engine/config";

function inputs(overrides: Partial<FaultInputs>): FaultInputs {
  return { amplitude: 0, dominantFreq: 0, shimmer: 0, longTermGradient: 0, ...overrides };
}

describe("ThresholdDecayModel", () => {
  const model = new ThresholdDecayModel();

  it("should flag high-frequency excess as bearing wear", () => {
    const prediction = model.predict(inputs({ amplitude: 6, dominantFreq: 30 }));

    expect(prediction.kind).toBe("bearing-wear");
    expect(prediction.ttfHours).toBeCloseTo(24 * Math.exp(-1), 12);
    expect(prediction.text).toBe("CRITICAL: Bearing Wear (Est. Fail 8.8 h)");
    expect(prediction.confidence).toBeCloseTo(0.99, 12);
  });

  it("should flag low-frequency excess as imbalance", () => {
    const prediction = model.predict(inputs({ amplitude: 5, dominantFreq: 10 }));

    expect(prediction.kind).toBe("imbalance");
    expect(prediction.ttfHours).toBeCloseTo(7 * 24 * Math.exp(-0.3), 9);
    expect(prediction.text).toBe("CRITICAL: Imbalance (Est. Fail 5.2 d)");
    expect(prediction.confidence).toBeCloseTo(0.9, 12);
  });

  it("should warn about mounts between the two amplitudes", () => {
    const prediction = model.predict(inputs({ amplitude: 4, dominantFreq: 30 }));

    expect(prediction.kind).toBe("mount-warning");
    expect(prediction.ttfHours).toBeCloseTo(30 * 24 * Math.exp(-0.25), 9);
    expect(prediction.text).toBe("Warning: Check Mounts (Risk 23.4 d)");
    expect(prediction.confidence).toBeCloseTo(0.79, 12);
  });

  it("should include the warning band edges", () => {
    expect(model.predict(inputs({ amplitude: 2, dominantFreq: 10 })).kind).toBe("mount-warning");
    expect(model.predict(inputs({ amplitude: 2, dominantFreq: 60 })).kind).toBe("mount-warning");
  });

  it("should report healthy with no TTF otherwise", () => {
    expect(model.predict(inputs({ amplitude: 2, dominantFreq: 5 }))).toEqual({
      kind: "healthy",
      text: "Healthy",
      confidence: 0.05,
      ttfHours: null,
    });
  });
});

describe("GradientTrendModel", () => {
  const model = new GradientTrendModel();

  it("should extrapolate the shimmer trend", () => {
    const prediction = model.predict(inputs({ shimmer: 0.5, longTermGradient: 0.01 }));

    expect(prediction.kind).toBe("trend");
    expect(prediction.ttfHours).toBeCloseTo(Math.LN2 / 0.01, 9);
  });

  it("should clamp a negative extrapolation at zero", () => {
    const prediction = model.predict(inputs({ shimmer: 2, longTermGradient: 0.01 }));
    expect(prediction.ttfHours).toBe(0);
  });

  it("should give no forecast below the epsilons", () => {
    expect(model.predict(inputs({ shimmer: 0, longTermGradient: 0.01 }))).toBe(NO_FORECAST);
    expect(model.predict(inputs({ shimmer: 0.5, longTermGradient: 0 }))).toBe(NO_FORECAST);
    expect(NO_FORECAST.ttfHours).toBeNull();
  });
});

describe("classifyEngineState", () => {
  const config = DEFAULT_ENGINE_CONFIG.classifier;

  it("should put severity 3 or high shimmer first", () => {
    expect(classifyEngineState({ severity: 3, shimmer: 0, spectralEntropy: 0.1 }, config)).toBe(
      "Critical",
    );
    expect(classifyEngineState({ severity: 0, shimmer: 4.01, spectralEntropy: null }, config)).toBe(
      "Critical",
    );
  });

  it("should detect tonal dominance only with a spectrum", () => {
    expect(classifyEngineState({ severity: 1, shimmer: 0, spectralEntropy: 0.2 }, config)).toBe(
      "TonalDominance",
    );
    expect(classifyEngineState({ severity: 0, shimmer: 0, spectralEntropy: null }, config)).toBe(
      "Baseline",
    );
  });

  it("should fall back to descriptor and baseline by severity", () => {
    expect(classifyEngineState({ severity: 2, shimmer: 4, spectralEntropy: 0.9 }, config)).toBe(
      "Descriptor",
    );
    expect(classifyEngineState({ severity: 0, shimmer: 0, spectralEntropy: 0.9 }, config)).toBe(
      "Baseline",
    );
  });
});
