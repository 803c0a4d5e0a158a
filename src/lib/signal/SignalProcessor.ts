/**
 * Signal Processor
 *
 * Spectral stage shared by the vibration and audio paths: a fixed-size FFT
 * over real/imaginary arrays, Hann windowing, bin magnitudes, dominant
 * frequency and normalized spectral entropy.
 */

import FFT from "fft.js";
import { labelFrequency, UNLABELED, type FrequencyLabel } from "./frequencyLabels";

// ============================================
// Types
// ============================================

export interface SpectralSnapshot {
  /** Transform length (power of two) */
  fftSize: number;
  /** Sample rate the bins were scaled with (Hz) */
  sampleRate: number;
  /** Arg-max bin over 1..N/2-1 (0 when the spectrum is silent) */
  dominantBin: number;
  /** dominantBin * sampleRate / N */
  dominantFreq: number;
  dominantMagnitude: number;
  /** Sum of bin magnitudes over 1..N/2-1 */
  totalEnergy: number;
  /** Normalized Shannon entropy, 0..1 */
  entropy: number;
  label: FrequencyLabel;
}

// ============================================
// FFT
// ============================================

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 1 && (n & (n - 1)) === 0;
}

/**
 * Fixed-size complex FFT over split real/imaginary arrays.
 *
 * Callers see an in-place transform: `re`/`im` hold the spectrum after
 * `forward()` and the time series again after `inverse()`. fft.js works on
 * interleaved arrays, so both directions pack and unpack through two
 * scratch buffers allocated once per instance.
 */
export class SpectralTransform {
  readonly size: number;
  private readonly fft: FFT;
  private readonly input: number[];
  private readonly output: number[];

  constructor(size: number) {
    if (!isPowerOfTwo(size)) {
      throw new Error(`FFT size must be a power of two, got ${size}`);
    }
    this.size = size;
    this.fft = new FFT(size);
    this.input = this.fft.createComplexArray();
    this.output = this.fft.createComplexArray();
  }

  forward(re: Float64Array, im: Float64Array): void {
    this.run(re, im, false);
  }

  /** Inverse transform, scaled by 1/N */
  inverse(re: Float64Array, im: Float64Array): void {
    this.run(re, im, true);
  }

  private run(re: Float64Array, im: Float64Array, inverse: boolean): void {
    if (re.length !== this.size || im.length !== this.size) {
      throw new Error(
        `FFT expects ${this.size} real and imaginary samples, got ${re.length}/${im.length}`,
      );
    }

    for (let i = 0; i < this.size; i++) {
      this.input[2 * i] = re[i];
      this.input[2 * i + 1] = im[i];
    }

    if (inverse) {
      this.fft.inverseTransform(this.output, this.input);
    } else {
      this.fft.transform(this.output, this.input);
    }

    for (let i = 0; i < this.size; i++) {
      re[i] = this.output[2 * i];
      im[i] = this.output[2 * i + 1];
    }
  }
}

// ============================================
// Spectral Measures
// ============================================

/**
 * Symmetric Hann window: 0.5 * (1 - cos(2πi / (n - 1)))
 */
export function hannWindow(n: number): Float64Array {
  const w = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    w[i] = 0.5 * (1 - Math.cos((2 * Math.PI * i) / (n - 1)));
  }
  return w;
}

/**
 * Magnitude of bins 0..N/2-1. Index 0 (DC) is filled but callers skip it.
 */
export function binMagnitudes(re: Float64Array, im: Float64Array): Float64Array {
  const half = re.length / 2;
  const mags = new Float64Array(half);
  for (let i = 0; i < half; i++) {
    mags[i] = Math.sqrt(re[i] * re[i] + im[i] * im[i]);
  }
  return mags;
}

/**
 * Shannon entropy of the magnitude distribution over bins 1..N/2-1,
 * divided by ln(N/2). Zero total energy yields 0.
 */
export function spectralEntropy(magnitudes: ArrayLike<number>, fftSize: number): number {
  const half = fftSize / 2;
  let total = 0;
  for (let i = 1; i < half; i++) total += magnitudes[i];
  if (total <= 0) return 0;

  let h = 0;
  for (let i = 1; i < half; i++) {
    const p = magnitudes[i] / total;
    if (p > 0) h -= p * Math.log(p);
  }
  return h / Math.log(half);
}

// ============================================
// Spectral Analyzer
// ============================================

/**
 * Windowed FFT with precomputed coefficients. One instance per path; the
 * vibration and audio paths use different sizes.
 */
export class SpectralAnalyzer {
  readonly fftSize: number;
  private readonly transform: SpectralTransform;
  private readonly window: Float64Array;
  private readonly re: Float64Array;
  private readonly im: Float64Array;

  constructor(fftSize: number) {
    this.transform = new SpectralTransform(fftSize);
    this.fftSize = fftSize;
    this.window = hannWindow(fftSize);
    this.re = new Float64Array(fftSize);
    this.im = new Float64Array(fftSize);
  }

  /**
   * Analyze the newest `fftSize` samples. Returns null when fewer are
   * available; the caller keeps its previous snapshot in that case.
   */
  analyze(samples: ArrayLike<number>, sampleRate: number): SpectralSnapshot | null {
    const n = this.fftSize;
    if (samples.length < n) return null;

    const offset = samples.length - n;
    let mean = 0;
    for (let i = 0; i < n; i++) mean += samples[offset + i];
    mean /= n;

    for (let i = 0; i < n; i++) {
      this.re[i] = (samples[offset + i] - mean) * this.window[i];
      this.im[i] = 0;
    }
    this.transform.forward(this.re, this.im);

    const mags = binMagnitudes(this.re, this.im);
    let dominantBin = 0;
    let dominantMagnitude = 0;
    let totalEnergy = 0;
    for (let i = 1; i < n / 2; i++) {
      totalEnergy += mags[i];
      if (mags[i] > dominantMagnitude) {
        dominantMagnitude = mags[i];
        dominantBin = i;
      }
    }

    const dominantFreq = (dominantBin * sampleRate) / n;
    return {
      fftSize: n,
      sampleRate,
      dominantBin,
      dominantFreq,
      dominantMagnitude,
      totalEnergy,
      entropy: spectralEntropy(mags, n),
      label: totalEnergy > 0 ? labelFrequency(dominantFreq) : UNLABELED,
    };
  }
}
