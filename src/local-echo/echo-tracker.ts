/**
 * Characters written to the screen by local echo that the remote has not yet
 * confirmed, oldest first.
 */
export class EchoTracker {
  private readonly queue: Array<string> = [];

  recordEcho(ch: string): void {
    this.queue.push(ch);
  }

  /** Removes and returns the oldest character, or `undefined` when empty. */
  consumeFront(): string | undefined {
    return this.queue.shift();
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  clear(): void {
    this.queue.length = 0;
  }

  get size(): number {
    return this.queue.length;
  }

  snapshot(): Array<string> {
    return [...this.queue];
  }
}
