import ansiRegex from "ansi-regex";

/** One control span located inside a chunk of terminal output. */
export type ControlMatch = {
  /** Offset of the first character of the span within the searched text. */
  index: number;
  /** The matched control text, exactly as it appeared. */
  value: string;
  length: number;
};

/**
 * Locates control sequences in terminal output. Implementations only need to
 * report the leftmost match starting at or after `fromIndex`; callers never
 * rely on anything else about the underlying grammar.
 */
export interface ControlSequenceClassifier {
  nextMatch(text: string, fromIndex: number): ControlMatch | null;
}

export const BACKSPACE = "\b";
export const BELL = "\x07";
export const ESCAPE = "\x1b";
export const DELETE = "\x7f";

/** Single-byte controls the shell sprinkles around echoed keystrokes. */
const CONTROL_CHARS = "[\\b\\n\\r\\x7f\\x07]";

/**
 * Matches ANSI escape sequences (CSI, OSC and friends, as recognised by
 * `ansi-regex`) or one of BS, LF, CR, DEL and BEL.
 */
export const ANSI_CTRL_PATTERN = new RegExp(
  `(?:${ansiRegex().source})|(?:${CONTROL_CHARS})`,
  "g",
);

export function createPatternClassifier(
  pattern: RegExp,
): ControlSequenceClassifier {
  // Our own global copy: `lastIndex` is mutated on every search and a sticky
  // flag would turn "next match" into "match here".
  const flags = pattern.flags.replace(/[gy]/g, "") + "g";
  const regex = new RegExp(pattern.source, flags);

  return {
    nextMatch(text: string, fromIndex: number): ControlMatch | null {
      let start = Math.max(0, fromIndex);
      while (start <= text.length) {
        regex.lastIndex = start;
        const found = regex.exec(text);
        if (found === null) {
          return null;
        }
        const value = found[0];
        if (value.length > 0) {
          return { index: found.index, value, length: value.length };
        }
        // Skip empty matches so callers always make progress.
        start = found.index + 1;
      }
      return null;
    },
  };
}

export const defaultClassifier: ControlSequenceClassifier =
  createPatternClassifier(ANSI_CTRL_PATTERN);

/** Iterates every control span in `text`, left to right. */
export function* controlSpans(
  text: string,
  classifier: ControlSequenceClassifier = defaultClassifier,
): Generator<ControlMatch> {
  let cursor = 0;
  let match = classifier.nextMatch(text, cursor);
  while (match !== null) {
    yield match;
    cursor = match.index + match.length;
    match = classifier.nextMatch(text, cursor);
  }
}

const NAMED_ESCAPES: Record<string, string> = {
  [ESCAPE]: "\\33",
  [BACKSPACE]: "\\b",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  [BELL]: "\\7",
  [DELETE]: "\\177",
};

/**
 * Renders control characters as readable escapes so a diagnostic line shows
 * exactly what was received, e.g. `"\x1b[K"` becomes `\33[K`.
 */
export function prettyPrint(text: string): string {
  let out = "";
  for (const ch of text) {
    const named: string | undefined = NAMED_ESCAPES[ch];
    if (named !== undefined) {
      out += named;
      continue;
    }
    const code = ch.charCodeAt(0);
    if (code < 0x20 || (code >= 0x80 && code < 0xa0)) {
      out += `\\${code.toString(8)}`;
    } else {
      out += ch;
    }
  }
  return out;
}
