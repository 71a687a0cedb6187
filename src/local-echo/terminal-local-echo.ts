import type { ControlSequenceClassifier } from "../utils/ansi-code.js";
import type { Clock } from "./pause-gate.js";

import { BACKSPACE, defaultClassifier, prettyPrint } from "../utils/ansi-code.js";
import { EchoTracker } from "./echo-tracker.js";
import { PauseGate, monotonicClock } from "./pause-gate.js";
import { TerminalDiagnostics } from "./terminal-diagnostics.js";

export type TerminalWriter = (text: string) => void;

export type TerminalLocalEchoOptions = {
  classifier?: ControlSequenceClassifier;
  clock?: Clock;
  diagnostics?: TerminalDiagnostics;
};

/**
 * Shows typed characters immediately and reconciles them against the remote
 * echo when it arrives, so nothing is displayed twice.
 *
 * `echo()` and `write()` share the echo queue without locking and must be
 * called from a single dispatch context (the event loop), never interleaved.
 */
export class TerminalLocalEcho {
  private readonly tracker = new EchoTracker();
  private readonly gate: PauseGate;
  private readonly classifier: ControlSequenceClassifier;
  private readonly diagnostics: TerminalDiagnostics;

  constructor(
    private readonly writer: TerminalWriter,
    options: TerminalLocalEchoOptions = {},
  ) {
    this.gate = new PauseGate(options.clock ?? monotonicClock);
    this.classifier = options.classifier ?? defaultClassifier;
    this.diagnostics = options.diagnostics ?? new TerminalDiagnostics();
  }

  echo(input: string): void {
    if (this.paused()) {
      return;
    }

    // Longer input is a control sequence or pasted text; only single
    // keystrokes are echoed and tracked.
    if (input.length !== 1) {
      return;
    }

    const ch = input.charCodeAt(0);
    if ((ch >= 32 /* space */ && ch <= 126 /* tilde */) || ch === 8 /* backspace */) {
      this.tracker.recordEcho(input);
      this.writer(input);
    }
  }

  isEmpty(): boolean {
    return this.tracker.isEmpty();
  }

  /** Characters still waiting for the remote echo, oldest first. */
  pending(): Array<string> {
    return this.tracker.snapshot();
  }

  write(output: string): void {
    // Shells answer rapid typing and backspacing with ^H, ESC[K or BEL mixed
    // into the already echoed text. Control spans are excluded from matching,
    // otherwise deleted characters get orphaned in the queue and can no longer
    // be backspaced over.
    let chunkStart = 0;
    let match = this.classifier.nextMatch(output, 0);
    while (match !== null) {
      const chunkEnd = match.index;

      const outputToMatch = output.substring(chunkStart, chunkEnd);
      if (outputToMatch.length > 0) {
        const matchLen = this.outputNonEchoed(outputToMatch);
        if (matchLen === 0) {
          // Nothing matched; give up on this chunk and show the rest as-is.
          this.writer(output.substring(chunkEnd));
          return;
        }
      }

      const matchedValue = match.value;
      if (matchedValue === BACKSPACE && !this.tracker.isEmpty()) {
        // A backspace typed locally is already in the queue and on screen. One
        // that is not was generated by the server; either way drop one entry
        // so matching stays aligned.
        const popped = this.tracker.consumeFront();
        if (popped !== BACKSPACE) {
          // The screen holds text the server does not know about, so its
          // backspace has to start one column further right.
          this.writer(matchedValue);
        }
      }

      this.writer(matchedValue);

      chunkStart = chunkEnd + match.length;
      match = this.classifier.nextMatch(output, chunkStart);
    }

    this.outputNonEchoed(output.substring(chunkStart));
  }

  /**
   * Skips text that was already echoed and writes whatever follows it. Only
   * exact matches from the start of `outputToMatch` count.
   *
   * @returns length of the matched prefix; 0 when nothing matched
   */
  private outputNonEchoed(outputToMatch: string): number {
    let lastOutput = "";
    while (!this.tracker.isEmpty() && lastOutput.length < outputToMatch.length) {
      lastOutput += this.tracker.consumeFront() ?? "";
    }

    if (lastOutput === outputToMatch) {
      return outputToMatch.length;
    }

    if (outputToMatch.startsWith(lastOutput)) {
      this.writer(outputToMatch.substring(lastOutput.length));
      return lastOutput.length;
    }

    this.diagnostics.log(
      `Received: '${prettyPrint(outputToMatch)}' Had: '${prettyPrint(lastOutput)}'`,
    );
    this.tracker.clear();
    this.writer(outputToMatch);
    return 0;
  }

  clear(): void {
    this.tracker.clear();
  }

  pause(pauseMillis: number): void {
    this.gate.pause(pauseMillis);
    this.clear();
  }

  resume(): void {
    this.gate.resume();
  }

  paused(): boolean {
    return this.gate.isPaused();
  }

  getDiagnostics(): string {
    return this.diagnostics.getLog();
  }

  resetDiagnostics(): void {
    this.diagnostics.resetLog();
  }
}
