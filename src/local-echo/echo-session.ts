import type { ControlSequenceClassifier } from "../utils/ansi-code.js";
import type { EchoConfig } from "../utils/config.js";
import type { Clock } from "./pause-gate.js";
import type { TerminalWriter } from "./terminal-local-echo.js";

import { prettyPrint } from "../utils/ansi-code.js";
import { isLoggingEnabled, log } from "../utils/logger/log.js";
import { TerminalLocalEcho } from "./terminal-local-echo.js";

/** Bidirectional channel to the remote process. */
export interface EchoTransport {
  send(input: string): void;
  /** Subscribes to remote output; the returned function unsubscribes. */
  onOutput(listener: (chunk: string) => void): () => void;
}

export type EchoSessionOptions = {
  transport: EchoTransport;
  writer: TerminalWriter;
  config: EchoConfig;
  clock?: Clock;
  classifier?: ControlSequenceClassifier;
};

/**
 * Connects keystrokes, remote output and the screen through a
 * `TerminalLocalEcho`.
 */
export class EchoSession {
  readonly localEcho: TerminalLocalEcho;

  private readonly transport: EchoTransport;
  private readonly writer: TerminalWriter;
  private readonly pauseMillis: number;
  private readonly pauseOn: ReadonlySet<string>;
  private localEchoEnabled: boolean;
  private unsubscribe: (() => void) | null;

  private constructor(options: EchoSessionOptions) {
    this.transport = options.transport;
    this.writer = options.writer;
    this.pauseMillis = options.config.pauseMillis;
    this.pauseOn = new Set(options.config.pauseOn);
    this.localEchoEnabled = options.config.localEcho;
    this.localEcho = new TerminalLocalEcho(options.writer, {
      clock: options.clock,
      classifier: options.classifier,
    });
    this.unsubscribe = this.transport.onOutput((chunk) =>
      this.receiveOutput(chunk),
    );
  }

  static create(options: EchoSessionOptions): EchoSession {
    return new EchoSession(options);
  }

  get disposed(): boolean {
    return this.unsubscribe === null;
  }

  get diagnostics(): string {
    return this.localEcho.getDiagnostics();
  }

  get localEchoActive(): boolean {
    return this.localEchoEnabled;
  }

  sendInput(input: string): void {
    if (this.disposed) {
      if (isLoggingEnabled()) {
        log(`[echo-session] dropping input after dispose: '${prettyPrint(input)}'`);
      }
      return;
    }

    if (this.localEchoEnabled) {
      if (this.pauseOn.has(input)) {
        // Pausing clears the queue; with echo still unconfirmed that would
        // show the pending characters a second time when they arrive.
        if (this.localEcho.isEmpty()) {
          this.localEcho.pause(this.pauseMillis);
        }
      } else {
        this.localEcho.echo(input);
      }
    }

    this.transport.send(input);
  }

  setLocalEcho(enabled: boolean): void {
    if (!enabled) {
      this.localEcho.clear();
    }
    this.localEchoEnabled = enabled;
  }

  clear(): void {
    this.localEcho.clear();
  }

  dispose(): void {
    if (this.unsubscribe === null) {
      return;
    }
    this.unsubscribe();
    this.unsubscribe = null;
  }

  private receiveOutput(chunk: string): void {
    if (!this.localEchoEnabled || this.localEcho.isEmpty()) {
      this.writer(chunk);
    } else {
      this.localEcho.write(chunk);
    }
  }
}
