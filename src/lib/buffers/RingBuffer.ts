/**
 * RingBuffer - Pre-allocated circular buffer of numeric samples.
 *
 * Every history the engine keeps (tilt, dBA, lux, frame rate, raw and
 * vibration magnitude) is one of these. Writes overwrite the oldest entry
 * once the ring is full; statistics are derived on demand and never cached.
 */

export class RingBuffer {
  private readonly buf: Float64Array;
  private readonly capacity: number;
  private head = 0; // next write position
  private _size = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buf = new Float64Array(capacity);
  }

  get length(): number {
    return this._size;
  }

  get size(): number {
    return this.capacity;
  }

  get isFull(): boolean {
    return this._size === this.capacity;
  }

  /** Append one sample, discarding the oldest when full */
  push(value: number): void {
    this.buf[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    if (this._size < this.capacity) this._size++;
  }

  /** Sample at `index` counted from the oldest retained entry */
  at(index: number): number {
    if (index < 0 || index >= this._size) {
      throw new RangeError(`RingBuffer index ${index} out of range 0..${this._size - 1}`);
    }
    const tail = (this.head - this._size + this.capacity) % this.capacity;
    return this.buf[(tail + index) % this.capacity];
  }

  /** Most recent sample, or undefined when empty */
  latest(): number | undefined {
    if (this._size === 0) return undefined;
    return this.buf[(this.head - 1 + this.capacity) % this.capacity];
  }

  /** Sum of `count` entries starting `start` entries after the oldest */
  sumRange(start: number, count: number): number {
    let sum = 0;
    for (let i = 0; i < count; i++) sum += this.at(start + i);
    return sum;
  }

  sum(): number {
    return this.sumRange(0, this._size);
  }

  mean(): number {
    return this._size === 0 ? 0 : this.sum() / this._size;
  }

  /** Population variance (n divisor) */
  variance(): number {
    if (this._size === 0) return 0;
    return this.sumSquaredDeviations() / this._size;
  }

  /** Bessel-corrected standard deviation (n−1 divisor); 0 below two samples */
  sampleStdDev(): number {
    if (this._size < 2) return 0;
    return Math.sqrt(this.sumSquaredDeviations() / (this._size - 1));
  }

  /** Copy out in chronological order (oldest first) */
  toArray(): Float64Array {
    const out = new Float64Array(this._size);
    for (let i = 0; i < this._size; i++) out[i] = this.at(i);
    return out;
  }

  private sumSquaredDeviations(): number {
    const avg = this.mean();
    let acc = 0;
    for (let i = 0; i < this._size; i++) {
      const d = this.at(i) - avg;
      acc += d * d;
    }
    return acc;
  }
}
