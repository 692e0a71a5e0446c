const ISO_PATTERN =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;

/**
 * A UTC instant with microsecond resolution.
 *
 * `Date` stops at milliseconds, so the instant is kept as whole microseconds
 * since the Unix epoch. Current dates fit well inside `Number.MAX_SAFE_INTEGER`.
 */
export class Instant {
  private constructor(readonly epochMicros: number) {
    Object.freeze(this);
  }

  /**
   * Wall-clock milliseconds from `Date.now()`, refined with the microsecond
   * digits of the high-resolution timer. Never leaves the current millisecond.
   */
  static now(): Instant {
    const subMillis = Number((process.hrtime.bigint() / 1_000n) % 1_000n);
    return new Instant(Date.now() * 1000 + subMillis);
  }

  static fromEpochMicros(epochMicros: number): Instant {
    if (!Number.isSafeInteger(epochMicros)) {
      throw new RangeError(`Epoch microseconds must be a safe integer, got ${epochMicros}`);
    }
    return new Instant(epochMicros);
  }

  static fromDate(date: Date): Instant {
    const ms = date.getTime();
    if (Number.isNaN(ms)) {
      throw new RangeError("Cannot build an instant from an invalid Date");
    }
    return new Instant(ms * 1000);
  }

  static from(value: Instant | Date): Instant {
    return value instanceof Instant ? value : Instant.fromDate(value);
  }

  /**
   * Parses an ISO-8601 timestamp with an explicit offset. Digits past the
   * sixth fractional place are dropped.
   */
  static parse(text: string): Instant | null {
    const match = ISO_PATTERN.exec(text);
    if (!match) {
      return null;
    }

    const [, wholeSeconds, fraction = "", offset] = match;
    const ms = Date.parse(`${wholeSeconds}${offset}`);
    if (Number.isNaN(ms)) {
      return null;
    }

    const micros = Number(fraction.padEnd(6, "0").slice(0, 6));
    return new Instant(ms * 1000 + micros);
  }

  toDate(): Date {
    return new Date(Math.floor(this.epochMicros / 1000));
  }

  toISOString(): string {
    const ms = Math.floor(this.epochMicros / 1000);
    const subMillis = this.epochMicros - ms * 1000;
    const base = new Date(ms).toISOString();
    return `${base.slice(0, -1)}${String(subMillis).padStart(3, "0")}Z`;
  }

  compare(other: Instant): number {
    return this.epochMicros - other.epochMicros;
  }

  equals(other: Instant): boolean {
    return this.epochMicros === other.epochMicros;
  }

  toString(): string {
    return this.toISOString();
  }
}
