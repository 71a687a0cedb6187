#!/usr/bin/env node
import "dotenv/config";

import type { ReplayResult } from "./replay/replay.js";

import { replaySession } from "./replay/replay.js";
import {
  parseSessionScript,
  scriptFormatForPath,
  SessionScriptError,
} from "./replay/session-script.js";
import { prettyPrint } from "./utils/ansi-code.js";
import { loadConfig } from "./utils/config.js";
import { initLogger, log } from "./utils/logger/log.js";
import chalk from "chalk";
import { readFileSync } from "fs";
import meow from "meow";

// Must run with DEBUG=1 for anything to be written.
initLogger();

const cli = meow(
  `
  Usage
    $ termecho replay <script>

  Replays a recorded session (YAML or JSON) through local echo and prints
  what the screen would have shown.

  Options
    -h, --help              Show usage and exit
    --version               Print version and exit
    -c, --config <path>     Config file to use (default: ~/.termecho/config.json)
    --no-local-echo         Replay with local echo turned off
    --pause-ms <n>          Override how long a pause trigger suspends echo
    --json                  Print the full replay result as JSON
    --raw                   Print every display write with control characters escaped

  Examples
    $ termecho replay session.yaml
    $ termecho replay --raw --pause-ms 0 session.json
`,
  {
    importMeta: import.meta,
    autoHelp: true,
    booleanDefault: undefined,
    flags: {
      help: { type: "boolean", shortFlag: "h" },
      version: { type: "boolean" },
      config: { type: "string", shortFlag: "c" },
      localEcho: { type: "boolean" },
      pauseMs: { type: "number" },
      json: { type: "boolean" },
      raw: { type: "boolean" },
    },
  },
);

function printResult(result: ReplayResult): void {
  if (cli.flags.json) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (cli.flags.raw) {
    for (const write of result.writes) {
      // eslint-disable-next-line no-console
      console.log(chalk.gray("» ") + prettyPrint(write));
    }
  } else {
    // eslint-disable-next-line no-console
    console.log(result.display);
  }

  if (result.diagnostics !== "") {
    // eslint-disable-next-line no-console
    console.log(chalk.yellow("\nLocal echo mismatches:"));
    for (const line of result.diagnostics.split("\n")) {
      // eslint-disable-next-line no-console
      console.log(chalk.yellow(`  ${line}`));
    }
  }

  if (result.pending.length > 0) {
    // eslint-disable-next-line no-console
    console.log(
      chalk.dim(
        `\n${result.pending.length} echoed character(s) never confirmed: '${prettyPrint(result.pending.join(""))}'`,
      ),
    );
  }
}

function main(): number {
  const [command, scriptPath] = cli.input;
  if (command !== "replay" || scriptPath === undefined) {
    return cli.showHelp(1);
  }

  const config = loadConfig(cli.flags.config);
  if (cli.flags.localEcho !== undefined) {
    config.localEcho = cli.flags.localEcho;
  }
  if (cli.flags.pauseMs !== undefined) {
    config.pauseMillis = cli.flags.pauseMs;
  }
  log(`[cli] replaying ${scriptPath} with ${JSON.stringify(config)}`);

  const steps = parseSessionScript(
    readFileSync(scriptPath, "utf-8"),
    scriptFormatForPath(scriptPath),
  );
  printResult(replaySession(steps, config));
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  if (err instanceof SessionScriptError) {
    // eslint-disable-next-line no-console
    console.error(chalk.red(`Invalid session script: ${err.message}`));
  } else {
    // eslint-disable-next-line no-console
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  }
  process.exitCode = 1;
}
