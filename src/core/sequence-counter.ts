/** Largest bound whose values all fit a signed 32-bit sequence field. */
export const MAX_SEQUENCE_BOUND = 0x80000000;

/**
 * Issues sequence numbers 0, 1, …, bound − 1, then wraps to 0.
 * Values are unique only within one window of `bound` consecutive calls.
 */
export class SequenceCounter {
  private value = 0;

  constructor(readonly bound: number) {
    if (!Number.isInteger(bound) || bound < 1 || bound > MAX_SEQUENCE_BOUND) {
      throw new RangeError(`SequenceCounter bound must be an integer in [1, ${MAX_SEQUENCE_BOUND}]`);
    }
  }

  next(): number {
    const issued = this.value;
    this.value = (this.value + 1) % this.bound;
    return issued;
  }

  /** The value the next call to `next()` will return. */
  peek(): number {
    return this.value;
  }
}
