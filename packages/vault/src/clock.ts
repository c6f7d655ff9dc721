import type { UnixSeconds } from "@keepsake/types";

/**
 * Source of the current time, in unix seconds.
 */
export interface Clock {
  now(): UnixSeconds;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: UnixSeconds;

  constructor(start: UnixSeconds) {
    this._now = start;
  }

  now(): UnixSeconds {
    return this._now;
  }

  set(time: UnixSeconds): void {
    this._now = time;
  }

  advance(seconds: number): UnixSeconds {
    this._now += seconds;
    return this._now;
  }
}
