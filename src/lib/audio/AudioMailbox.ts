/**
 * AudioMailbox - single-slot PCM handoff between the capture loop and the
 * frame path.
 *
 * One slot, most-recent-wins: publishing over an untaken block replaces it
 * and counts an overwrite. There is no queue; a consumer that misses a block
 * simply gets the next one.
 *
 * Both buffers are SharedArrayBuffers so a producer on a worker thread can
 * attach with `AudioMailbox.fromShared(mailbox.shared)`. The slot is guarded
 * by a compare-and-swap spin lock; the critical section is a copy in or a
 * copy out and nothing else.
 *
 * Control word layout (Int32):
 *   [0] lock       0 = free, 1 = held
 *   [1] length     samples in the slot
 *   [2] full       1 while an untaken block is present
 *   [3] sequence   incremented on every publish
 *   [4] overwrites blocks replaced before being taken
 */

const LOCK = 0;
const LENGTH = 1;
const FULL = 2;
const SEQUENCE = 3;
const OVERWRITES = 4;
const CONTROL_WORDS = 5;

export interface SharedAudioSlot {
  control: SharedArrayBuffer;
  data: SharedArrayBuffer;
}

export class AudioMailbox {
  private readonly control: Int32Array;
  private readonly data: Int16Array;
  readonly shared: SharedAudioSlot;

  private constructor(shared: SharedAudioSlot) {
    this.shared = shared;
    this.control = new Int32Array(shared.control);
    this.data = new Int16Array(shared.data);
  }

  static create(capacity: number): AudioMailbox {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`AudioMailbox capacity must be a positive integer, got ${capacity}`);
    }
    return new AudioMailbox({
      control: new SharedArrayBuffer(CONTROL_WORDS * Int32Array.BYTES_PER_ELEMENT),
      data: new SharedArrayBuffer(capacity * Int16Array.BYTES_PER_ELEMENT),
    });
  }

  /** Attach to a slot created elsewhere (e.g. passed to a worker thread) */
  static fromShared(shared: SharedAudioSlot): AudioMailbox {
    if (shared.control.byteLength !== CONTROL_WORDS * Int32Array.BYTES_PER_ELEMENT) {
      throw new Error(`AudioMailbox control buffer has ${shared.control.byteLength} bytes`);
    }
    return new AudioMailbox(shared);
  }

  get capacity(): number {
    return this.data.length;
  }

  get sequence(): number {
    return Atomics.load(this.control, SEQUENCE);
  }

  get overwrites(): number {
    return Atomics.load(this.control, OVERWRITES);
  }

  get hasBlock(): boolean {
    return Atomics.load(this.control, FULL) === 1;
  }

  /** Copy a complete block into the slot, replacing any untaken one */
  publish(block: Int16Array): void {
    if (block.length > this.data.length) {
      throw new RangeError(
        `Block of ${block.length} samples exceeds mailbox capacity ${this.data.length}`,
      );
    }
    this.lock();
    try {
      this.data.set(block);
      if (this.control[FULL] === 1) this.control[OVERWRITES]++;
      this.control[LENGTH] = block.length;
      this.control[FULL] = 1;
      this.control[SEQUENCE]++;
    } finally {
      this.unlock();
    }
  }

  /** Copy out and clear the pending block; null when the slot is empty */
  take(): Int16Array | null {
    this.lock();
    try {
      if (this.control[FULL] !== 1) return null;
      const block = this.data.slice(0, this.control[LENGTH]);
      this.control[FULL] = 0;
      return block;
    } finally {
      this.unlock();
    }
  }

  private lock(): void {
    while (Atomics.compareExchange(this.control, LOCK, 0, 1) !== 0) {
      // Held only for a copy; wait briefly for the release notify
      Atomics.wait(this.control, LOCK, 1, 1);
    }
  }

  private unlock(): void {
    Atomics.store(this.control, LOCK, 0);
    Atomics.notify(this.control, LOCK, 1);
  }
}
