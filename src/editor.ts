import type { RenderSurface } from "./renderer";
import type { TerminalModeController } from "./utils/terminal";

import { InputDecoder } from "./input-decoder";
import { Renderer } from "./renderer";
import TextBuffer from "./text-buffer";
import { log } from "./utils/logger/log";

export class InputReadError extends Error {
  override name = "InputReadError";
}

/**
 * One editing session: the buffer, the decoder feeding it and the renderer
 * painting it. Nothing here touches the terminal mode.
 */
export class EditorSession {
  readonly buffer = new TextBuffer();
  readonly decoder = new InputDecoder();
  readonly renderer: Renderer;
  /** Set when the session ended because reading the input failed. */
  readError: InputReadError | null = null;

  constructor(surface: RenderSurface) {
    this.renderer = new Renderer(surface);
  }

  /**
   * Feed one input byte. Returns false once the session should end; in that
   * case nothing is rendered. Otherwise the screen is repainted exactly once,
   * whether or not the byte completed an event.
   */
  processByte(byte: number): boolean {
    const event = this.decoder.feed(byte);
    if (event) {
      if (event.type === "terminate") {
        log("editor: end of session");
        return false;
      }
      this.buffer.handleEvent(event);
    }
    this.renderer.render(this.buffer);
    return true;
  }
}

export interface RunEditorOptions {
  input: NodeJS.ReadableStream;
  output: RenderSurface;
  terminal: TerminalModeController;
}

function toBytes(chunk: Buffer | string): Uint8Array {
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, "utf8");
}

/**
 * Feed bytes to the session in arrival order. Resolves on end of session or
 * end of input; a failing read resolves with the error instead of throwing.
 *
 * The input is detached and paused, never destroyed: when it is the TTY
 * itself, its handle must stay open until the terminal mode is restored.
 */
function readLoop(
  session: EditorSession,
  input: NodeJS.ReadableStream,
): Promise<InputReadError | null> {
  return new Promise((resolve, reject) => {
    const detach = () => {
      input.removeListener("data", onData);
      input.removeListener("end", onEnd);
      input.removeListener("close", onEnd);
      input.removeListener("error", onError);
      input.pause();
    };

    const onData = (chunk: Buffer | string) => {
      try {
        for (const byte of toBytes(chunk)) {
          if (!session.processByte(byte)) {
            detach();
            resolve(null);
            return;
          }
        }
      } catch (err: unknown) {
        detach();
        reject(err);
      }
    };

    const onEnd = () => {
      detach();
      log("editor: input closed");
      resolve(null);
    };

    const onError = (err: Error) => {
      detach();
      resolve(new InputReadError("failed to read input", { cause: err }));
    };

    input.on("data", onData);
    input.on("end", onEnd);
    input.on("close", onEnd);
    input.on("error", onError);
    input.resume();
  });
}

/**
 * Run the interactive loop until end of session, end of input or a read
 * error. Raw mode brackets the loop and is restored on every exit path.
 */
export async function runEditor({
  input,
  output,
  terminal,
}: RunEditorOptions): Promise<EditorSession> {
  const session = new EditorSession(output);

  session.renderer.clearView();
  terminal.enterRawMode();

  let failure: unknown = undefined;
  try {
    session.renderer.clearView();
    session.readError = await readLoop(session, input);
  } catch (err: unknown) {
    failure = err;
  }
  if (session.readError) {
    // A broken input stream ends the session the same way Ctrl‑D does.
    const { message, cause } = session.readError;
    log(`editor: ${message}: ${String(cause)}`);
  }

  const shutdownSteps: Array<[string, () => void]> = [
    ["jump to top", () => session.renderer.jumpToTop(session.buffer)],
    ["restore terminal mode", () => terminal.restoreMode()],
    ["clear screen", () => session.renderer.clearView()],
  ];
  for (const [label, step] of shutdownSteps) {
    try {
      step();
    } catch (err: unknown) {
      log(`editor: shutdown step "${label}" failed: ${String(err)}`);
      if (failure === undefined) {
        failure = err;
      }
    }
  }

  if (failure !== undefined) {
    throw failure;
  }
  return session;
}
