import { log } from "./logger/log.js";
import { config as loadDotenv } from "dotenv";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { load as loadYaml, dump as dumpYaml } from "js-yaml";
import { homedir } from "os";
import { dirname, join, extname } from "path";

// ---------------------------------------------------------------------------
// User-wide environment config (~/.termecho.env)
// ---------------------------------------------------------------------------

// Loaded after process.env and any project-local .env (see cli.ts); dotenv
// never overrides a variable that is already set, so explicit environment
// variables win, then the project .env, then this file.
const USER_WIDE_CONFIG_PATH = join(homedir(), ".termecho.env");

const isVitest =
  typeof (globalThis as { vitest?: unknown }).vitest !== "undefined";

if (!isVitest) {
  loadDotenv({ path: USER_WIDE_CONFIG_PATH });
}

export const DEFAULT_LOCAL_ECHO = true;
export const DEFAULT_PAUSE_MS = 500;
/** No keystroke pauses local echo unless configured, e.g. `["\t"]`. */
export const DEFAULT_PAUSE_ON: ReadonlyArray<string> = [];

export const CONFIG_DIR = join(homedir(), ".termecho");
export const CONFIG_JSON_FILEPATH = join(CONFIG_DIR, "config.json");
export const CONFIG_YAML_FILEPATH = join(CONFIG_DIR, "config.yaml");
export const CONFIG_YML_FILEPATH = join(CONFIG_DIR, "config.yml");
export const CONFIG_FILEPATH = CONFIG_JSON_FILEPATH;

/** Shape of the config file on disk; every field is optional and untrusted. */
export type StoredConfig = {
  localEcho?: unknown;
  pauseMillis?: unknown;
  pauseOn?: unknown;
};

export type EchoConfig = {
  localEcho: boolean;
  /** How long local echo stays off after a pause trigger is typed. */
  pauseMillis: number;
  /** Keystrokes that pause local echo instead of being echoed. */
  pauseOn: Array<string>;
};

export function defaultConfig(): EchoConfig {
  return {
    localEcho: DEFAULT_LOCAL_ECHO,
    pauseMillis: DEFAULT_PAUSE_MS,
    pauseOn: [...DEFAULT_PAUSE_ON],
  };
}

function parseBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }
  return undefined;
}

function parseMillis(value: unknown): number | undefined {
  const n =
    typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof n === "number" && Number.isFinite(n) && n >= 0) {
    return n;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readStoredConfig(path: string): StoredConfig {
  const raw = readFileSync(path, "utf-8");
  const ext = extname(path).toLowerCase();
  try {
    const parsed: unknown =
      ext === ".yaml" || ext === ".yml" ? loadYaml(raw) : JSON.parse(raw);
    if (isRecord(parsed)) {
      return {
        localEcho: parsed["localEcho"],
        pauseMillis: parsed["pauseMillis"],
        pauseOn: parsed["pauseOn"],
      };
    }
    log(`[termecho] Warning: ${path} does not contain an object. Ignoring it.`);
  } catch (err) {
    log(`[termecho] Warning: failed to parse ${path}: ${String(err)}`);
  }
  return {};
}

/**
 * Resolves the config at `configPath`. A missing or broken file yields the
 * defaults; individual invalid values are dropped with a log line. When the
 * default JSON path does not exist the YAML variants are tried.
 */
export const loadConfig = (
  configPath: string = CONFIG_FILEPATH,
  env: NodeJS.ProcessEnv = process.env,
): EchoConfig => {
  let actualConfigPath = configPath;
  if (!existsSync(actualConfigPath) && configPath === CONFIG_FILEPATH) {
    if (existsSync(CONFIG_YAML_FILEPATH)) {
      actualConfigPath = CONFIG_YAML_FILEPATH;
    } else if (existsSync(CONFIG_YML_FILEPATH)) {
      actualConfigPath = CONFIG_YML_FILEPATH;
    }
  }

  const stored: StoredConfig = existsSync(actualConfigPath)
    ? readStoredConfig(actualConfigPath)
    : {};

  const config = defaultConfig();

  if (stored.localEcho !== undefined) {
    const localEcho = parseBoolean(stored.localEcho);
    if (localEcho === undefined) {
      log(
        `[termecho] Warning: 'localEcho' in config is not a boolean (got '${String(stored.localEcho)}'). Ignoring this value.`,
      );
    } else {
      config.localEcho = localEcho;
    }
  }

  if (stored.pauseMillis !== undefined) {
    const pauseMillis = parseMillis(stored.pauseMillis);
    if (pauseMillis === undefined) {
      log(
        `[termecho] Warning: 'pauseMillis' in config is not a non-negative number (got '${String(stored.pauseMillis)}'). Ignoring this value.`,
      );
    } else {
      config.pauseMillis = pauseMillis;
    }
  }

  if (stored.pauseOn !== undefined) {
    if (
      Array.isArray(stored.pauseOn) &&
      stored.pauseOn.every((key): key is string => typeof key === "string")
    ) {
      config.pauseOn = stored.pauseOn;
    } else {
      log(
        `[termecho] Warning: 'pauseOn' in config is not a list of strings. Ignoring this value.`,
      );
    }
  }

  const envLocalEcho = env["TERMECHO_LOCAL_ECHO"];
  if (envLocalEcho !== undefined && envLocalEcho !== "") {
    const localEcho = parseBoolean(envLocalEcho);
    if (localEcho !== undefined) {
      config.localEcho = localEcho;
    }
  }

  const envPause = env["TERMECHO_PAUSE_MS"];
  if (envPause !== undefined && envPause !== "") {
    const pauseMillis = parseMillis(envPause);
    if (pauseMillis !== undefined) {
      config.pauseMillis = pauseMillis;
    }
  }

  return config;
};

export const saveConfig = (
  config: EchoConfig,
  configPath: string = CONFIG_FILEPATH,
): void => {
  const dir = dirname(configPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const ext = extname(configPath).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") {
    writeFileSync(configPath, dumpYaml(config), "utf-8");
  } else {
    writeFileSync(configPath, JSON.stringify(config, null, 2), "utf-8");
  }
};
