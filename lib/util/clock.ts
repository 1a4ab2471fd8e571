/**
 * Source of the current time
 */
export interface Clock {
  now(): Date;
}

export const SYSTEM_CLOCK: Clock = {
  now: () => new Date(),
};

/**
 * The instant invariant builds pretend it is
 */
export const INVARIANT_INSTANT = new Date('2038-01-01T00:00:00Z');

/**
 * Handle to a clock that has been pinned to one instant
 */
export interface FrozenTime {
  stop(): void;
}

/**
 * The capability to pin a clock to one instant
 */
export interface ClockFreezer {
  freeze(instant: Date): FrozenTime;
}

/**
 * The clock that a build reads its time from
 *
 * Follows the underlying source until frozen. Nothing outside the build
 * observes the frozen time.
 */
export class BuildClock implements Clock, ClockFreezer {
  private frozenAt?: Date;

  constructor(private readonly source: Clock = SYSTEM_CLOCK) {
  }

  public get frozen() {
    return this.frozenAt !== undefined;
  }

  public now(): Date {
    return this.frozenAt !== undefined ? new Date(this.frozenAt.getTime()) : this.source.now();
  }

  public freeze(instant: Date): FrozenTime {
    this.frozenAt = new Date(instant.getTime());
    return {
      stop: () => { this.frozenAt = undefined; },
    };
  }
}
