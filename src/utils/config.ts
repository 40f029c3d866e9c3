import { config as loadDotenv } from "dotenv";
import { homedir, tmpdir } from "os";
import { join } from "path";

// ---------------------------------------------------------------------------
// User‑wide environment config (~/.rawpad.env)
// ---------------------------------------------------------------------------

// Loaded *after* process.env and any project‑local .env file (handled via
// "dotenv/config" in cli.ts).  dotenv never overrides variables that are
// already set, so the precedence order is:
//   1. Explicit environment variables
//   2. Project‑local .env
//   3. User‑wide ~/.rawpad.env
export const USER_WIDE_CONFIG_PATH = join(homedir(), ".rawpad.env");

// Skipped under Vitest so a developer's own file cannot leak into tests.
const isVitest = Boolean(process.env["VITEST"]);

if (!isVitest) {
  loadDotenv({ path: USER_WIDE_CONFIG_PATH });
}

export const LOG_FILE_PREFIX = "rawpad";

/** Logging is opt‑in; nothing is written unless DEBUG is set. */
export function isDebugEnabled(): boolean {
  return Boolean(process.env["DEBUG"]);
}

/**
 * Directory that receives the per‑session log files.
 *
 * On Mac and Windows `os.tmpdir()` is already a user‑specific folder, so we
 * prefer it there. On Linux we use ~/.local/rawpad so logs are not
 * world‑readable. `RAWPAD_LOG_DIR` overrides both.
 */
export function getLogDir(): string {
  const override = process.env["RAWPAD_LOG_DIR"];
  if (override) {
    return override;
  }

  const isMac = process.platform === "darwin";
  const isWin = process.platform === "win32";
  return isMac || isWin
    ? join(tmpdir(), "rawpad")
    : join(homedir(), ".local", "rawpad");
}
