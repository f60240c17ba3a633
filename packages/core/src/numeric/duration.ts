/**
 * A signed span of time in milliseconds. Fractional milliseconds are kept.
 */
export class Duration {
  readonly milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new RangeError(`Duration must be finite, got ${milliseconds}`);
    }
    this.milliseconds = milliseconds === 0 ? 0 : milliseconds;
  }

  static readonly zero = new Duration(0);

  static ofMilliseconds(ms: number): Duration {
    return new Duration(ms);
  }

  static ofSeconds(seconds: number): Duration {
    return new Duration(seconds * 1000);
  }

  static ofMinutes(minutes: number): Duration {
    return new Duration(minutes * 60_000);
  }

  /** Time from `start` to `end`; negative when `end` comes first. */
  static between(start: Date, end: Date): Duration {
    return new Duration(end.getTime() - start.getTime());
  }

  get isZero(): boolean {
    return this.milliseconds === 0;
  }

  get isNegative(): boolean {
    return this.milliseconds < 0;
  }

  abs(): Duration {
    return this.milliseconds < 0 ? new Duration(-this.milliseconds) : this;
  }

  minus(other: Duration): Duration {
    return new Duration(this.milliseconds - other.milliseconds);
  }

  equals(other: Duration): boolean {
    return this.milliseconds === other.milliseconds;
  }

  toString(): string {
    return `${this.milliseconds}ms`;
  }
}
