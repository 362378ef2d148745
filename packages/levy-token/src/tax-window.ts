// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * The fixed interval after creation during which the levy is evaluated.
 *
 * The window is open while `now <= end`: a transfer at exactly `end` is
 * still levied, one second later it is not.
 */
export class TaxWindow {
  readonly start: number;
  readonly duration: number;
  readonly end: number;

  constructor(start: number, duration: number) {
    if (!Number.isInteger(start) || !Number.isInteger(duration) || duration <= 0) {
      throw new RangeError('start must be an integer and duration a positive integer.');
    }
    this.start = start;
    this.duration = duration;
    this.end = start + duration;
  }

  isOpen(now: number): boolean {
    return now <= this.end;
  }

  /** Seconds left until the window closes, never negative. */
  remaining(now: number): number {
    return Math.max(0, this.end - now);
  }
}
