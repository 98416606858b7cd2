import { ClockOverflowError } from "./errors.js";

/**
 * Lamport logical clock. `tick` stamps local events (snapshots, sends) while
 * `receive` applies the merge rule and must run before any other effect of a
 * timestamped message.
 */
export class LamportClock {
  private counter = 0;

  get value(): number {
    return this.counter;
  }

  tick(): number {
    this.counter = LamportClock.advance(this.counter);
    return this.counter;
  }

  receive(other: number): number {
    this.counter = LamportClock.advance(Math.max(this.counter, other));
    return this.counter;
  }

  toString(): string {
    return `LC(${this.counter})`;
  }

  private static advance(from: number): number {
    if (from >= Number.MAX_SAFE_INTEGER) {
      throw new ClockOverflowError();
    }
    return from + 1;
  }
}
