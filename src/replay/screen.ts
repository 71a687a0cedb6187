import type { ControlSequenceClassifier } from "../utils/ansi-code.js";

import { BACKSPACE, defaultClassifier } from "../utils/ansi-code.js";

const ERASE_TO_END_OF_LINE = /^\x1b\[0?K$/;

/**
 * Plays terminal text onto a minimal line grid, to show what a user would
 * have seen. Understands printable text, BS, CR, LF (as a new line) and
 * ESC[K; every other control span is dropped.
 */
export function renderScreen(
  text: string,
  classifier: ControlSequenceClassifier = defaultClassifier,
): string {
  const lines: Array<Array<string>> = [];
  let line: Array<string> = [];
  lines.push(line);
  let col = 0;

  const put = (literal: string) => {
    for (const ch of literal) {
      while (line.length < col) {
        line.push(" ");
      }
      line[col] = ch;
      col += 1;
    }
  };

  let cursor = 0;
  let match = classifier.nextMatch(text, cursor);
  while (match !== null) {
    put(text.substring(cursor, match.index));

    const value = match.value;
    if (value === BACKSPACE) {
      col = Math.max(0, col - 1);
    } else if (value === "\r") {
      col = 0;
    } else if (value === "\n") {
      line = [];
      lines.push(line);
      col = 0;
    } else if (ERASE_TO_END_OF_LINE.test(value)) {
      line.length = Math.min(line.length, col);
    }

    cursor = match.index + match.length;
    match = classifier.nextMatch(text, cursor);
  }
  put(text.substring(cursor));

  return lines.map((l) => l.join("")).join("\n");
}
