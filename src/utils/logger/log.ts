import * as fsSync from "fs";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

export interface Logger {
  /** Checking this can be used to avoid constructing a large log message. */
  isLoggingEnabled(): boolean;

  log(message: string): void;
}

class AsyncLogger implements Logger {
  private queue: Array<string> = [];
  private isWriting: boolean = false;

  constructor(private readonly filePath: string) {}

  isLoggingEnabled(): boolean {
    return true;
  }

  log(message: string): void {
    const entry = `[${now()}] ${message}\n`;
    this.queue.push(entry);
    void this.maybeWrite();
  }

  private async maybeWrite(): Promise<void> {
    if (this.isWriting || this.queue.length === 0) {
      return;
    }

    this.isWriting = true;
    const messages = this.queue.join("");
    this.queue = [];

    try {
      await fs.appendFile(this.filePath, messages);
    } catch (err: unknown) {
      // The log file is the only place to report this, so fall back to stderr.
      // eslint-disable-next-line no-console
      console.error(`[termecho] failed to write log: ${String(err)}`);
    } finally {
      this.isWriting = false;
    }

    await this.maybeWrite();
  }
}

class EmptyLogger implements Logger {
  isLoggingEnabled(): boolean {
    return false;
  }

  log(_message: string): void {
    // No-op
  }
}

function now() {
  const date = new Date();
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");
  return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}`;
}

let logger: Logger | undefined;

/**
 * Creates a .log file for this process, and symlinks termecho-latest.log to
 * it so you can reliably run:
 *
 * - Mac/Windows: `tail -F "$TMPDIR/termecho/termecho-latest.log"`
 * - Linux: `tail -F ~/.local/termecho/termecho-latest.log`
 */
export function initLogger(): Logger {
  if (logger) {
    return logger;
  } else if (!process.env["DEBUG"]) {
    logger = new EmptyLogger();
    return logger;
  }

  const isMac = process.platform === "darwin";
  const isWin = process.platform === "win32";

  // os.tmpdir() is per-user on Mac and Windows only; on Linux keep logs under
  // the home directory so they are not world-readable.
  const logDir =
    isMac || isWin
      ? path.join(os.tmpdir(), "termecho")
      : path.join(os.homedir(), ".local", "termecho");
  fsSync.mkdirSync(logDir, { recursive: true });
  const logFile = path.join(logDir, `termecho-${now()}.log`);
  // Write the empty string so the file exists and can be tail'd.
  fsSync.writeFileSync(logFile, "");

  if (!isWin) {
    const latestLink = path.join(logDir, "termecho-latest.log");
    try {
      fsSync.symlinkSync(logFile, latestLink, "file");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        fsSync.unlinkSync(latestLink);
        fsSync.symlinkSync(logFile, latestLink, "file");
      } else {
        throw err;
      }
    }
  }

  logger = new AsyncLogger(logFile);
  return logger;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function log(message: string): void {
  (logger ?? initLogger()).log(message);
}

/**
 * USE SPARINGLY! Only guard a call to log() with this when the message is
 * expensive to build.
 *
 * `log()` is already a no-op if DEBUG is not set.
 */
export function isLoggingEnabled(): boolean {
  return (logger ?? initLogger()).isLoggingEnabled();
}
