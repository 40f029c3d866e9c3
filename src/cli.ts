#!/usr/bin/env node
import "dotenv/config";

import { runEditor } from "./editor";
import { StreamSurface } from "./renderer";
import { initLogger, log } from "./utils/logger/log";
import {
  onExit,
  setActiveTerminal,
  TerminalModeController,
} from "./utils/terminal";
import { CLI_VERSION } from "./version";
import chalk from "chalk";
import meow from "meow";

// Call this early so `tail -F ~/.local/rawpad/rawpad-latest.log` works
// immediately. This must be run with DEBUG=1 for logging to work.
initLogger();

const cli = meow(
  `
  Usage
    $ rawpad

  Keys
    Arrow keys        Move the cursor (up/down land on column 1)
    Enter             Split the line at the cursor
    Backspace         Delete the byte before the cursor, or join lines
    Ctrl-D, Ctrl-C    Quit

  Options
    --version         Print version and exit
    -h, --help        Show usage and exit

  Environment
    DEBUG=1           Write a session log
    RAWPAD_LOG_DIR    Directory for session logs
`,
  {
    importMeta: import.meta,
    autoHelp: true,
    flags: {
      help: { type: "boolean", shortFlag: "h" },
      version: { type: "boolean" },
    },
  },
);

// For --help, show help and exit.
if (cli.flags.help) {
  cli.showHelp();
}

log(`rawpad ${CLI_VERSION} starting`);

const terminal = new TerminalModeController(process.stdin);
setActiveTerminal(terminal);

const exit = () => {
  onExit();
  process.exit(0);
};

process.on("SIGTERM", exit);
process.on("SIGQUIT", exit);
process.on("SIGHUP", exit);

// Ensure terminal clean-up always runs, even when other code calls
// `process.exit()` directly.
process.once("exit", onExit);

try {
  await runEditor({
    input: process.stdin,
    output: new StreamSurface(process.stdout),
    terminal,
  });
} catch (err: unknown) {
  onExit();
  const message = err instanceof Error ? err.message : String(err);
  log(`fatal: ${message}`);
  // eslint-disable-next-line no-console
  console.error(chalk.red(`rawpad: ${message}`));
  process.exit(1);
}

process.exit(0);
