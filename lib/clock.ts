import type { Clock } from "./types";

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/// Clock the host sets explicitly; never moves backwards
export class HostClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    if (!Number.isFinite(timestamp) || timestamp < 0) {
      throw new Error(`Invalid timestamp: ${timestamp}`);
    }
    if (timestamp < this.current) {
      throw new Error(
        `Clock cannot move backwards (${timestamp} < ${this.current})`
      );
    }
    this.current = Math.floor(timestamp);
  }

  advance(seconds: number): void {
    this.set(this.current + seconds);
  }
}
