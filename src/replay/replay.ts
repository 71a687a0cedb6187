import type { EchoConfig } from "../utils/config.js";
import type { SessionStep } from "./session-script.js";

import { EchoSession } from "../local-echo/echo-session.js";
import { log } from "../utils/logger/log.js";
import { renderScreen } from "./screen.js";
import { ScriptTransport } from "./script-transport.js";

export type ReplayResult = {
  /** Every fragment handed to the display, in order. */
  writes: Array<string>;
  /** The final screen contents. */
  display: string;
  diagnostics: string;
  /** Locally echoed characters never confirmed by the remote. */
  pending: Array<string>;
  /** Everything forwarded to the remote. */
  sent: Array<string>;
};

/** A clock that only moves when told to. */
export function createManualClock(start = 0): {
  now: () => number;
  advance: (millis: number) => void;
} {
  let current = start;
  return {
    now: () => current,
    advance: (millis: number) => {
      current += millis;
    },
  };
}

export function replaySession(
  steps: ReadonlyArray<SessionStep>,
  config: EchoConfig,
): ReplayResult {
  const writes: Array<string> = [];
  const clock = createManualClock();
  const transport = new ScriptTransport();
  const session = EchoSession.create({
    transport,
    writer: (text) => writes.push(text),
    config,
    clock: clock.now,
  });

  try {
    for (const step of steps) {
      switch (step.kind) {
        case "type":
          for (const ch of step.data) {
            session.sendInput(ch);
          }
          break;
        case "input":
          session.sendInput(step.data);
          break;
        case "output":
          transport.emit(step.data);
          break;
        case "wait":
          clock.advance(step.millis);
          break;
        case "pause":
          session.localEcho.pause(step.millis);
          break;
        case "clear":
          session.clear();
          break;
      }
    }
  } finally {
    session.dispose();
  }

  const pending = session.localEcho.pending();
  log(
    `[replay] ${steps.length} steps, ${writes.length} writes, ${pending.length} pending`,
  );

  return {
    writes,
    display: renderScreen(writes.join("")),
    diagnostics: session.diagnostics,
    pending,
    sent: [...transport.sent],
  };
}
