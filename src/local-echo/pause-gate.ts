/** Returns milliseconds from a monotonic source. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

/**
 * Suppresses local echo until a deadline. Expiry is checked lazily on each
 * call rather than by a timer: the first check at or past the deadline unsets
 * it.
 */
export class PauseGate {
  private deadline: number | undefined;

  constructor(private readonly now: Clock = monotonicClock) {}

  /** An infinite duration pauses until `resume()`. */
  pause(durationMillis: number): void {
    const duration = durationMillis > 0 ? durationMillis : 0;
    this.deadline = this.now() + duration;
  }

  isPaused(): boolean {
    if (this.deadline === undefined) {
      return false;
    }
    if (this.now() < this.deadline) {
      return true;
    }
    this.deadline = undefined;
    return false;
  }

  resume(): void {
    this.deadline = undefined;
  }

  remainingMillis(): number {
    if (!this.isPaused() || this.deadline === undefined) {
      return 0;
    }
    return this.deadline - this.now();
  }
}
