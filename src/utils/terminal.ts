import { log } from "./logger/log";

/**
 * The slice of a TTY read stream needed to toggle raw mode. `process.stdin`
 * satisfies it; tests hand in a fake.
 */
export interface RawModeDevice {
  readonly isTTY?: boolean;
  /** A destroyed TTY stream has closed its handle; setRawMode then no-ops. */
  readonly destroyed?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume?(): unknown;
}

export class TerminalModeError extends Error {
  override name = "TerminalModeError";
}

export class TerminalModeController {
  private raw = false;

  constructor(private readonly device: RawModeDevice) {}

  isRaw(): boolean {
    return this.raw;
  }

  /**
   * Disable canonical line processing and local echo so every byte is
   * delivered as soon as it is available.
   */
  enterRawMode(): void {
    if (!this.device.isTTY || typeof this.device.setRawMode !== "function") {
      throw new TerminalModeError("input is not a terminal");
    }

    try {
      this.device.setRawMode(true);
    } catch (err: unknown) {
      throw new TerminalModeError("failed to enable raw mode", { cause: err });
    }
    this.raw = true;
    this.device.resume?.();
    log("terminal: raw mode on");
  }

  /**
   * Re-enable canonical processing and echo. Only the first call after
   * `enterRawMode()` touches the device.
   */
  restoreMode(): void {
    if (!this.raw) {
      return;
    }
    this.raw = false;

    if (this.device.destroyed) {
      throw new TerminalModeError(
        "terminal closed before its mode could be restored",
      );
    }
    try {
      this.device.setRawMode?.(false);
    } catch (err: unknown) {
      throw new TerminalModeError("failed to restore terminal mode", {
        cause: err,
      });
    }
    log("terminal: raw mode off");
  }
}

let activeTerminal: TerminalModeController | null = null;

// Track whether the clean‑up routine has already executed so repeat calls are
// silently ignored. This can happen when different exit paths (e.g. a signal
// handler and the process "exit" event) both attempt to tidy up.
let didRunOnExit = false;

export function setActiveTerminal(terminal: TerminalModeController): void {
  activeTerminal = terminal;
  didRunOnExit = false;
}

export function onExit(): void {
  if (didRunOnExit) {
    return;
  }

  didRunOnExit = true;

  // Leaving the terminal in raw mode after the process has exited looks like
  // a "frozen" shell: no input is echoed and Ctrl‑C/Z no longer work.
  if (activeTerminal) {
    try {
      activeTerminal.restoreMode();
    } catch (err: unknown) {
      log(`terminal: restore on exit failed: ${String(err)}`);
    }
  }
}
