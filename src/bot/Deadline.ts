/**
 * Deadline - cooperative cancellation for searches
 *
 * An absolute point in time plus the clock that measures it. Searches poll
 * `expired()`; nothing is interrupted from outside.
 */

/** Milliseconds since some fixed origin */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export class Deadline {
  private constructor(
    readonly at: number,
    private readonly clock: Clock,
  ) {}

  /** Expires `ms` milliseconds from now */
  static after(ms: number, clock: Clock = systemClock): Deadline {
    return new Deadline(clock() + ms, clock);
  }

  static at(time: number, clock: Clock = systemClock): Deadline {
    return new Deadline(time, clock);
  }

  static never(clock: Clock = systemClock): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY, clock);
  }

  /** Current time on this deadline's clock */
  now(): number {
    return this.clock();
  }

  expired(): boolean {
    return this.clock() >= this.at;
  }

  remainingMs(): number {
    return Math.max(0, this.at - this.clock());
  }

  /**
   * Whichever of the two expires first
   */
  earliest(other?: Deadline): Deadline {
    if (!other) return this;
    return other.at < this.at ? other : this;
  }
}
