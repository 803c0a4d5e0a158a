import { describe, it, expect } from "vitest";
import {
  SpectralTransform,
  SpectralAnalyzer,
  spectralEntropy,
  hannWindow,
  isPowerOfTwo,
} from "./SignalProcessor";
import { labelFrequency, isMainsFrequency } from "./frequencyLabels";

// ============================================================================
// TEST UTILITIES
// ============================================================================

function sinusoid(n: number, cyclesPerFrame: number, amplitude = 1): Float64Array {
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    out[i] = amplitude * Math.sin((2 * Math.PI * cyclesPerFrame * i) / n);
  }
  return out;
}

describe("SpectralTransform", () => {
  it("should reject sizes that are not powers of two", () => {
    expect(isPowerOfTwo(512)).toBe(true);
    expect(isPowerOfTwo(500)).toBe(false);
    expect(() => new SpectralTransform(500)).toThrow(/power of two/);
  });

  it("should put a cosine's energy at its bin with magnitude N/2", () => {
    const n = 64;
    const re = new Float64Array(n);
    const im = new Float64Array(n);
    for (let i = 0; i < n; i++) re[i] = Math.cos((2 * Math.PI * 5 * i) / n);

    new SpectralTransform(n).forward(re, im);

    expect(Math.hypot(re[5], im[5])).toBeCloseTo(32, 9);
    expect(Math.hypot(re[6], im[6])).toBeCloseTo(0, 9);
  });

  it("should reconstruct the signal after forward then inverse", () => {
    const n = 256;
    const original = new Float64Array(n);
    for (let i = 0; i < n; i++) {
      original[i] = Math.sin(0.3 * i) + 0.5 * Math.cos(1.7 * i) + 0.1;
    }
    const re = Float64Array.from(original);
    const im = new Float64Array(n);
    const fft = new SpectralTransform(n);

    fft.forward(re, im);
    fft.inverse(re, im);

    for (let i = 0; i < n; i++) {
      expect(re[i]).toBeCloseTo(original[i], 9);
      expect(im[i]).toBeCloseTo(0, 9);
    }
  });

  it("should refuse arrays of the wrong length", () => {
    const fft = new SpectralTransform(8);
    expect(() => fft.forward(new Float64Array(4), new Float64Array(8))).toThrow(
      /expects 8/,
    );
  });
});

describe("hannWindow", () => {
  it("should be zero at both ends and one in the middle", () => {
    const w = hannWindow(5);
    expect(w[0]).toBeCloseTo(0, 12);
    expect(w[2]).toBeCloseTo(1, 12);
    expect(w[4]).toBeCloseTo(0, 12);
  });
});

describe("spectralEntropy", () => {
  const n = 512;

  it("should be zero for a single-bin impulse", () => {
    const mags = new Float64Array(n / 2);
    mags[10] = 3;
    expect(spectralEntropy(mags, n)).toBe(0);
  });

  it("should approach one for a uniform spectrum", () => {
    const mags = new Float64Array(n / 2).fill(1);
    // ln(255) / ln(256)
    expect(spectralEntropy(mags, n)).toBeCloseTo(1, 2);
    expect(spectralEntropy(mags, n)).toBeLessThanOrEqual(1);
  });

  it("should be zero when total energy is zero", () => {
    expect(spectralEntropy(new Float64Array(n / 2), n)).toBe(0);
  });

  it("should stay within [0, 1] for mixed spectra", () => {
    const mags = new Float64Array(n / 2);
    for (let i = 0; i < mags.length; i++) mags[i] = (i * 37) % 11;
    const h = spectralEntropy(mags, n);
    expect(h).toBeGreaterThanOrEqual(0);
    expect(h).toBeLessThanOrEqual(1);
  });
});

describe("SpectralAnalyzer", () => {
  it("should detect an injected sinusoid within one bin", () => {
    const n = 512;
    const sampleRate = 50;
    const analyzer = new SpectralAnalyzer(n);

    const snapshot = analyzer.analyze(sinusoid(n, 40, 2), sampleRate);

    expect(snapshot).not.toBeNull();
    const expected = (40 * sampleRate) / n; // 3.90625 Hz
    expect(Math.abs((snapshot?.dominantFreq ?? 0) - expected)).toBeLessThanOrEqual(
      sampleRate / n,
    );
    expect(snapshot?.dominantBin).toBe(40);
    expect(snapshot?.label.band).toBe("low-frequency");
  });

  it("should report a tonal spectrum with low entropy", () => {
    const analyzer = new SpectralAnalyzer(1024);
    const snapshot = analyzer.analyze(sinusoid(1024, 200), 1024);
    expect(snapshot?.entropy).toBeLessThan(0.35);
  });

  it("should label a 50 Hz tone as mains hum", () => {
    const analyzer = new SpectralAnalyzer(1024);
    const snapshot = analyzer.analyze(sinusoid(1024, 50, 1000), 1024);

    expect(snapshot?.dominantFreq).toBe(50);
    expect(snapshot?.label).toEqual({
      band: "mains",
      mainsHz: 50,
      text: "Mains Hum (50 Hz)",
    });
  });

  it("should analyze only the newest fftSize samples", () => {
    const analyzer = new SpectralAnalyzer(1024);
    const samples = new Float64Array(1024 + 300);
    samples.set(sinusoid(1024, 30), 300);

    const snapshot = analyzer.analyze(samples, 1024);
    expect(snapshot?.dominantFreq).toBe(30);
    expect(snapshot?.label.text).toBe("Motor/Fan (1800 RPM)");
  });

  it("should skip buffers shorter than the transform", () => {
    const analyzer = new SpectralAnalyzer(512);
    expect(analyzer.analyze(new Float64Array(100), 50)).toBeNull();
  });

  it("should leave a silent buffer unlabeled with zero entropy", () => {
    const analyzer = new SpectralAnalyzer(256);
    const snapshot = analyzer.analyze(new Float64Array(256).fill(8), 50);

    expect(snapshot?.totalEnergy).toBe(0);
    expect(snapshot?.entropy).toBe(0);
    expect(snapshot?.dominantFreq).toBe(0);
    expect(snapshot?.label.band).toBe("unlabeled");
  });
});

describe("labelFrequency", () => {
  it("should evaluate bands top-down", () => {
    expect(labelFrequency(60).band).toBe("mains");
    expect(labelFrequency(55).band).toBe("motor");
    expect(labelFrequency(2).text).toBe("Suspension / Human");
    expect(labelFrequency(8).band).toBe("unlabeled");
    expect(labelFrequency(120).band).toBe("unlabeled");
  });

  it("should recognise both mains bands", () => {
    expect(isMainsFrequency(49.5)).toBe(true);
    expect(isMainsFrequency(60.9)).toBe(true);
    expect(isMainsFrequency(55)).toBe(false);
  });
});
