import { extname } from "path";
import { load as loadYaml } from "js-yaml";

/**
 * One step of a recorded terminal session.
 *
 * - `type`: keystrokes sent one character at a time, as a user types them
 * - `input`: a single burst, as a paste or a synthesized key sequence
 * - `output`: a chunk of remote output
 * - `wait`: advance the replay clock
 * - `pause`: pause local echo for the given milliseconds
 * - `clear`: clear the session
 */
export type SessionStep =
  | { kind: "type"; data: string }
  | { kind: "input"; data: string }
  | { kind: "output"; data: string }
  | { kind: "wait"; millis: number }
  | { kind: "pause"; millis: number }
  | { kind: "clear" };

export class SessionScriptError extends Error {
  constructor(
    message: string,
    readonly stepIndex?: number,
  ) {
    super(stepIndex === undefined ? message : `step ${stepIndex}: ${message}`);
    this.name = "SessionScriptError";
  }
}

const TEXT_KEYS = ["type", "input", "output"] as const;
const MILLIS_KEYS = ["wait", "pause"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parseStep(raw: unknown, index: number): SessionStep {
  if (!isRecord(raw)) {
    throw new SessionScriptError("expected an object", index);
  }
  const keys = Object.keys(raw);
  const [key] = keys;
  if (keys.length !== 1 || key === undefined) {
    throw new SessionScriptError(
      `expected exactly one of ${[...TEXT_KEYS, ...MILLIS_KEYS, "clear"].join(", ")}`,
      index,
    );
  }
  const value = raw[key];

  for (const kind of TEXT_KEYS) {
    if (key === kind) {
      if (typeof value !== "string") {
        throw new SessionScriptError(`'${kind}' must be a string`, index);
      }
      return { kind, data: value };
    }
  }

  for (const kind of MILLIS_KEYS) {
    if (key === kind) {
      if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
        throw new SessionScriptError(
          `'${kind}' must be a non-negative number of milliseconds`,
          index,
        );
      }
      return { kind, millis: value };
    }
  }

  if (key === "clear") {
    if (value !== true) {
      throw new SessionScriptError("'clear' must be true", index);
    }
    return { kind: "clear" };
  }

  throw new SessionScriptError(`unknown step '${key}'`, index);
}

/**
 * Validates an already parsed script: either a list of steps or an object
 * with a `steps` list.
 */
export function parseSessionSteps(document: unknown): Array<SessionStep> {
  const list = isRecord(document) ? document["steps"] : document;
  if (!Array.isArray(list)) {
    throw new SessionScriptError("a session script must be a list of steps");
  }
  return list.map((raw: unknown, index) => parseStep(raw, index));
}

export function parseSessionScript(
  source: string,
  format: "json" | "yaml",
): Array<SessionStep> {
  let document: unknown;
  try {
    document = format === "json" ? JSON.parse(source) : loadYaml(source);
  } catch (err) {
    throw new SessionScriptError(
      `could not parse ${format.toUpperCase()}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseSessionSteps(document);
}

export function scriptFormatForPath(path: string): "json" | "yaml" {
  return extname(path).toLowerCase() === ".json" ? "json" : "yaml";
}
