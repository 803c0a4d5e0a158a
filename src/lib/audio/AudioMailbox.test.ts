import { describe, it, expect } from "vitest";
import { AudioMailbox } from "./AudioMailbox";

describe("AudioMailbox", () => {
  it("should hand over a published block once", () => {
    const mailbox = AudioMailbox.create(4);
    mailbox.publish(Int16Array.from([1, 2, 3, 4]));

    expect(mailbox.hasBlock).toBe(true);
    expect(Array.from(mailbox.take() ?? [])).toEqual([1, 2, 3, 4]);
    expect(mailbox.take()).toBeNull();
    expect(mailbox.hasBlock).toBe(false);
  });

  it("should return null before anything is published", () => {
    expect(AudioMailbox.create(8).take()).toBeNull();
  });

  it("should keep only the most recent block", () => {
    const mailbox = AudioMailbox.create(2);
    mailbox.publish(Int16Array.from([1, 1]));
    mailbox.publish(Int16Array.from([2, 2]));

    expect(Array.from(mailbox.take() ?? [])).toEqual([2, 2]);
    expect(mailbox.overwrites).toBe(1);
    expect(mailbox.sequence).toBe(2);
  });

  it("should copy out so later publishes do not alter a taken block", () => {
    const mailbox = AudioMailbox.create(2);
    mailbox.publish(Int16Array.from([5, 6]));
    const taken = mailbox.take();
    mailbox.publish(Int16Array.from([7, 8]));

    expect(Array.from(taken ?? [])).toEqual([5, 6]);
  });

  it("should carry the block length for short publishes", () => {
    const mailbox = AudioMailbox.create(8);
    mailbox.publish(Int16Array.from([9, 10, 11]));
    expect(mailbox.take()?.length).toBe(3);
  });

  it("should share the slot with a second view of the same memory", () => {
    const consumer = AudioMailbox.create(3);
    const producer = AudioMailbox.fromShared(consumer.shared);

    producer.publish(Int16Array.from([-1, 0, 1]));
    expect(Array.from(consumer.take() ?? [])).toEqual([-1, 0, 1]);
  });

  it("should reject blocks larger than the slot", () => {
    const mailbox = AudioMailbox.create(2);
    expect(() => mailbox.publish(new Int16Array(3))).toThrow(RangeError);
  });

  it("should reject a non-positive capacity", () => {
    expect(() => AudioMailbox.create(0)).toThrow("capacity");
  });
});
