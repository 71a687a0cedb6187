import type { Clock } from "../src/local-echo/pause-gate.js";

import { TerminalLocalEcho } from "../src/local-echo/terminal-local-echo.js";
import { createPatternClassifier } from "../src/utils/ansi-code.js";
import { createManualClock } from "../src/replay/replay.js";
import { describe, it, expect } from "vitest";

function setup(clock?: Clock) {
  const writes: Array<string> = [];
  const echo = new TerminalLocalEcho((text) => writes.push(text), { clock });
  const type = (keys: string) => {
    for (const ch of keys) {
      echo.echo(ch);
    }
  };
  return { echo, writes, type };
}

describe("TerminalLocalEcho – keystroke admission", () => {
  it("echoes printable ASCII and backspace immediately", () => {
    const { echo, writes, type } = setup();
    type(" a~\b");
    expect(writes).toEqual([" ", "a", "~", "\b"]);
    expect(echo.pending()).toEqual([" ", "a", "~", "\b"]);
  });

  it("ignores other control characters and non-ASCII input", () => {
    const { echo, writes, type } = setup();
    type("\t\x7f\x1b\ré");
    expect(writes).toEqual([]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("never echoes input that is not exactly one character", () => {
    const { echo, writes } = setup();
    echo.echo("abc");
    echo.echo("");
    echo.echo("\x1b[A");
    expect(writes).toEqual([]);
    expect(echo.isEmpty()).toBe(true);
  });
});

describe("TerminalLocalEcho – reconciling remote output", () => {
  it("writes nothing more when the remote echoes exactly what was typed", () => {
    const { echo, writes, type } = setup();
    type("ls");
    echo.write("ls");
    expect(writes).toEqual(["l", "s"]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("writes only the part of the output beyond what was echoed", () => {
    const { echo, writes, type } = setup();
    type("ab");
    echo.write("abc");
    expect(writes).toEqual(["a", "b", "c"]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("confirms echoed text split over several chunks", () => {
    const { echo, writes, type } = setup();
    type("abc");
    echo.write("a");
    expect(echo.pending()).toEqual(["b", "c"]);
    echo.write("bc");
    expect(writes).toEqual(["a", "b", "c"]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("recovers from unrelated output by clearing the queue and logging once", () => {
    const { echo, writes, type } = setup();
    type("x");
    echo.write("y");
    expect(writes).toEqual(["x", "y"]);
    expect(echo.isEmpty()).toBe(true);
    expect(echo.getDiagnostics()).toBe("Received: 'y' Had: 'x'");
  });

  it("escapes control characters in diagnostics", () => {
    const { echo, type } = setup();
    type("x\b");
    echo.write("yz");
    expect(echo.getDiagnostics()).toBe("Received: 'yz' Had: 'x\\b'");
  });

  it("writes the rest of the chunk verbatim when a span before a control fails to match", () => {
    const { echo, writes, type } = setup();
    type("x");
    echo.write("y\x1b[Kz");
    expect(writes).toEqual(["x", "y", "\x1b[Kz"]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("writes output in two pieces when nothing was echoed", () => {
    const { echo, writes } = setup();
    echo.write("hello\r\n");
    expect(writes).toEqual(["hello", "\r\n"]);
    expect(echo.getDiagnostics()).toBe("");
  });

  it("matches echoed text around a bell", () => {
    const { echo, writes, type } = setup();
    type("ab");
    echo.write("a\x07b");
    expect(writes).toEqual(["a", "b", "\x07"]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("passes control-only chunks through without touching the queue", () => {
    const { echo, writes, type } = setup();
    type("a");
    echo.write("\x1b[31m");
    echo.write("\r\n");
    expect(writes).toEqual(["a", "\x1b[31m", "\r", "\n"]);
    expect(echo.pending()).toEqual(["a"]);
  });

  it("writes an extra backspace when a server backspace pops an echoed character", () => {
    const { echo, writes, type } = setup();
    type("a");
    echo.write("\b");
    expect(writes).toEqual(["a", "\b", "\b"]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("forwards a single backspace when the queue is empty", () => {
    const { echo, writes } = setup();
    echo.write("\b");
    expect(writes).toEqual(["\b"]);
  });

  it("consumes a typed backspace without doubling it", () => {
    const { echo, writes, type } = setup();
    type("a\b");
    echo.write("a");
    echo.write("\b\x1b[K");
    expect(writes).toEqual(["a", "\b", "\b", "\x1b[K"]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("accepts a custom classifier", () => {
    const writes: Array<string> = [];
    const echo = new TerminalLocalEcho((text) => writes.push(text), {
      classifier: createPatternClassifier(/\x1b\[[0-9;]*m/),
    });
    echo.echo("a");
    echo.write("\x1b[1ma\x1b[0m");
    expect(writes).toEqual(["a", "\x1b[1m", "\x1b[0m"]);
    expect(echo.isEmpty()).toBe(true);
  });

  it("shows output again after clear()", () => {
    const { echo, writes, type } = setup();
    type("a");
    echo.clear();
    expect(echo.isEmpty()).toBe(true);
    echo.write("a");
    expect(writes).toEqual(["a", "a"]);
  });
});

describe("TerminalLocalEcho – pausing", () => {
  it("clears the queue and suppresses echo until the pause elapses", () => {
    const clock = createManualClock();
    const { echo, writes, type } = setup(clock.now);
    type("ab");
    echo.pause(100);
    expect(echo.isEmpty()).toBe(true);

    type("c");
    expect(writes).toEqual(["a", "b"]);
    expect(echo.isEmpty()).toBe(true);

    clock.advance(99);
    expect(echo.paused()).toBe(true);
    clock.advance(1);
    expect(echo.paused()).toBe(false);

    type("d");
    expect(writes).toEqual(["a", "b", "d"]);
    expect(echo.pending()).toEqual(["d"]);
  });

  it("resume() ends a pause early", () => {
    const clock = createManualClock();
    const { echo, writes } = setup(clock.now);
    echo.pause(1000);
    echo.resume();
    echo.echo("x");
    expect(writes).toEqual(["x"]);
  });
});

describe("TerminalLocalEcho – diagnostics", () => {
  it("keeps entries across clears until reset", () => {
    const { echo, type } = setup();
    type("a");
    echo.write("b");
    type("c");
    echo.write("d");
    echo.clear();
    expect(echo.getDiagnostics()).toBe(
      "Received: 'b' Had: 'a'\nReceived: 'd' Had: 'c'",
    );
    echo.resetDiagnostics();
    expect(echo.getDiagnostics()).toBe("");
  });
});
