import { log } from "../utils/logger/log.js";

/**
 * Append-only log of local-echo mismatches, kept for an operator to inspect
 * after the fact. Survives session clears; only `resetLog()` empties it.
 */
export class TerminalDiagnostics {
  private entries: Array<string> = [];

  log(message: string): void {
    this.entries.push(message);
    log(`[local-echo] ${message}`);
  }

  getLog(): string {
    return this.entries.join("\n");
  }

  resetLog(): void {
    this.entries = [];
  }

  get entryCount(): number {
    return this.entries.length;
  }
}
