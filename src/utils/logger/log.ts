import { getLogDir, isDebugEnabled, LOG_FILE_PREFIX } from "../config";
import * as fsSync from "fs";
import * as fs from "fs/promises";
import * as path from "path";

export interface Logger {
  /** Checking this can be used to avoid constructing a large log message. */
  isLoggingEnabled(): boolean;

  log(message: string): void;
}

class AsyncLogger implements Logger {
  private queue: Array<string> = [];
  private isWriting: boolean = false;
  private failed: boolean = false;

  constructor(private readonly filePath: string) {}

  isLoggingEnabled(): boolean {
    return !this.failed;
  }

  log(message: string): void {
    if (this.failed) {
      return;
    }
    const entry = `[${now()}] ${message}\n`;
    this.queue.push(entry);
    this.maybeWrite().catch(() => this.disable());
  }

  // The editor owns stdout/stderr, so there is nowhere to report a broken
  // log file. Stop logging instead.
  private disable(): void {
    this.failed = true;
    this.queue = [];
    this.isWriting = false;
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

export function now(date: Date = new Date()): string {
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
 * Creates a .log file for this session, but also symlinks rawpad-latest.log
 * to the current log file so you can reliably run:
 *
 * - Mac/Windows: `tail -F "$TMPDIR/rawpad/rawpad-latest.log"`
 * - Linux: `tail -F ~/.local/rawpad/rawpad-latest.log`
 */
export function initLogger(): Logger {
  if (logger) {
    return logger;
  } else if (!isDebugEnabled()) {
    logger = new EmptyLogger();
    return logger;
  }

  try {
    logger = new AsyncLogger(createLogFile());
  } catch {
    // Unwritable log directory: run without a log.
    logger = new EmptyLogger();
  }
  return logger;
}

function createLogFile(): string {
  const isWin = process.platform === "win32";

  const logDir = getLogDir();
  fsSync.mkdirSync(logDir, { recursive: true });
  const logFile = path.join(logDir, `${LOG_FILE_PREFIX}-${now()}.log`);
  // Write the empty string so the file exists and can be tail'd.
  fsSync.writeFileSync(logFile, "");

  // Symlink to rawpad-latest.log on UNIX because Windows is funny about
  // symlinks.
  if (!isWin) {
    const latestLink = path.join(logDir, `${LOG_FILE_PREFIX}-latest.log`);
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

  return logFile;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function log(message: string): void {
  (logger ?? initLogger()).log(message);
}

/**
 * USE SPARINGLY! This function should only be used to guard a call to log() if
 * the log message is large and you want to avoid constructing it if logging is
 * disabled.
 *
 * `log()` is already a no-op if DEBUG is not set, so an extra
 * `isLoggingEnabled()` check is unnecessary.
 */
export function isLoggingEnabled(): boolean {
  return (logger ?? initLogger()).isLoggingEnabled();
}
