export type {
  ControlMatch,
  ControlSequenceClassifier,
} from "./utils/ansi-code.js";
export {
  ANSI_CTRL_PATTERN,
  controlSpans,
  createPatternClassifier,
  defaultClassifier,
  prettyPrint,
} from "./utils/ansi-code.js";
export type { EchoConfig } from "./utils/config.js";
export { defaultConfig, loadConfig, saveConfig } from "./utils/config.js";
export type { EchoSessionOptions, EchoTransport } from "./local-echo/echo-session.js";
export { EchoSession } from "./local-echo/echo-session.js";
export { EchoTracker } from "./local-echo/echo-tracker.js";
export type { Clock } from "./local-echo/pause-gate.js";
export { PauseGate, monotonicClock } from "./local-echo/pause-gate.js";
export { TerminalDiagnostics } from "./local-echo/terminal-diagnostics.js";
export type {
  TerminalLocalEchoOptions,
  TerminalWriter,
} from "./local-echo/terminal-local-echo.js";
export { TerminalLocalEcho } from "./local-echo/terminal-local-echo.js";
export type { ReplayResult } from "./replay/replay.js";
export { createManualClock, replaySession } from "./replay/replay.js";
export type { SessionStep } from "./replay/session-script.js";
export {
  parseSessionScript,
  parseSessionSteps,
  SessionScriptError,
} from "./replay/session-script.js";
export { renderScreen } from "./replay/screen.js";
