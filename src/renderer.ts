import type TextBuffer from "./text-buffer";

const ESC = "\x1b";
const CLEAR_SCREEN = `${ESC}[2J`;
const CURSOR_HOME = `${ESC}[H`;

/** 1-based row/column addressing, as the terminal expects it. */
function moveTo(row: number, col: number): string {
  return `${ESC}[${row};${col}H`;
}

export class OutputWriteError extends Error {
  override name = "OutputWriteError";
}

/**
 * Something the renderer can paint on. Every `write` is delivered right away;
 * there is no separate flush step.
 */
export interface RenderSurface {
  write(chunk: Uint8Array | string): void;
}

/**
 * Render surface backed by a Node writable stream (normally stdout).
 *
 * Stream errors are reported asynchronously, so one seen on the stream is
 * remembered and raised from the next write.
 */
export class StreamSurface implements RenderSurface {
  private failure: Error | null = null;

  constructor(private readonly stream: NodeJS.WritableStream) {
    stream.on("error", (err: Error) => {
      if (!this.failure) {
        this.failure = err;
      }
    });
  }

  write(chunk: Uint8Array | string): void {
    if (this.failure) {
      throw new OutputWriteError("output stream failed", {
        cause: this.failure,
      });
    }
    try {
      this.stream.write(chunk);
    } catch (err: unknown) {
      throw new OutputWriteError("write to output failed", { cause: err });
    }
  }
}

export class Renderer {
  constructor(private readonly surface: RenderSurface) {}

  private write(chunk: Uint8Array | string): void {
    try {
      this.surface.write(chunk);
    } catch (err: unknown) {
      if (err instanceof OutputWriteError) {
        throw err;
      }
      throw new OutputWriteError("write to output failed", { cause: err });
    }
  }

  clearView(): void {
    this.write(CLEAR_SCREEN + CURSOR_HOME);
  }

  /** Full repaint: clear, every line at its row, then the cursor. */
  render(buffer: TextBuffer): void {
    this.clearView();
    const lineCount = buffer.getLineCount();
    for (let row = 0; row < lineCount; row++) {
      this.write(moveTo(row + 1, 1));
      this.write(buffer.getLineBytes(row));
    }
    const [cursorRow, cursorCol] = buffer.getCursor();
    this.write(moveTo(cursorRow + 1, cursorCol + 1));
  }

  /** Park the cursor at the origin and repaint. Used once during shutdown. */
  jumpToTop(buffer: TextBuffer): void {
    buffer.moveToStartOfDocument();
    this.render(buffer);
  }
}
