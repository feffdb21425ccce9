/**
 * Source of correlation IDs stamped on every outbound envelope. IDs let log
 * lines and traces be joined across components; replies are not matched by
 * them because every call owns its stream.
 */
export interface CorrelationIdGenerator {
  next(): bigint;
}

const U64_MAX = (1n << 64n) - 1n;

/**
 * Process-wide counter. Increments happen synchronously on the event loop,
 * so concurrent calls can never observe the same value. Starts at 1, skips
 * 0 and wraps after 2^64 - 1.
 */
export class CounterIdGenerator implements CorrelationIdGenerator {
  private last: bigint;

  constructor(start: bigint = 1n) {
    if (start < 1n || start > U64_MAX) {
      throw new RangeError(`Correlation ID start out of range: ${start}`);
    }
    this.last = start - 1n;
  }

  next(): bigint {
    this.last = this.last === U64_MAX ? 1n : this.last + 1n;
    return this.last;
  }
}

export const defaultIdGenerator: CorrelationIdGenerator = new CounterIdGenerator();
