import type { InputEvent } from "./input-decoder";

import { isLoggingEnabled, log } from "./utils/logger/log";

export type Direction = "left" | "right" | "up" | "down";

/** Every input event except `terminate`, which belongs to the event loop. */
export type EditEvent = Exclude<InputEvent, { type: "terminate" }>;

/* -------------------------------------------------------------------------
 *  Debug helper – verbose tracing goes to the session log when DEBUG is set.
 *  Never to stdout: the editor owns the screen.
 * ---------------------------------------------------------------------- */

function dbg(label: string, data: Record<string, unknown>): void {
  if (isLoggingEnabled()) {
    log(`[TextBuffer] ${label} ${JSON.stringify(data)}`);
  }
}

/* ────────────────────────────────────────────────────────────────────────── */

/**
 * In-memory document: a non-empty list of byte lines plus a cursor. Bytes are
 * opaque, one byte is one column.
 */
export default class TextBuffer {
  private lines: Array<Array<number>> = [[]];
  private cursorRow = 0;
  private cursorCol = 0;

  /* =======================================================================
   *  Geometry helpers
   * ===================================================================== */
  private line(r: number): Array<number> {
    const line = this.lines[r];
    if (line === undefined) {
      // Unreachable while the cursor invariant holds.
      throw new RangeError(`row ${r} out of range`);
    }
    return line;
  }
  private lineLen(r: number): number {
    return this.line(r).length;
  }

  /* =======================================================================
   *  Public read‑only accessors
   * ===================================================================== */
  getCursor(): [number, number] {
    return [this.cursorRow, this.cursorCol];
  }
  getLineCount(): number {
    return this.lines.length;
  }
  getLineBytes(row: number): Uint8Array {
    return Uint8Array.from(this.line(row));
  }
  /** Lines decoded byte-for-byte (latin1), convenient for inspection. */
  getLines(): Array<string> {
    return this.lines.map((l) => Buffer.from(l).toString("latin1"));
  }

  /* =======================================================================
   *  Editing operations
   * ===================================================================== */
  insertByte(byte: number): void {
    dbg("insertByte", { byte, beforeCursor: this.getCursor() });

    const line = this.line(this.cursorRow);
    if (this.cursorCol === line.length) {
      line.push(byte);
    } else {
      line.splice(this.cursorCol, 0, byte);
    }
    this.cursorCol += 1;
  }

  /**
   * Split the current line at the caret. The text right of the caret (possibly
   * nothing) becomes a new line directly below and the caret moves to its
   * start.
   */
  insertLineBreak(): void {
    dbg("insertLineBreak", { beforeCursor: this.getCursor() });

    const line = this.line(this.cursorRow);
    const after =
      this.cursorCol === line.length ? [] : line.splice(this.cursorCol);

    this.lines.splice(this.cursorRow + 1, 0, after);

    this.cursorRow += 1;
    this.cursorCol = 0;
  }

  backspace(): void {
    dbg("backspace", { beforeCursor: this.getCursor() });
    if (this.cursorCol === 0 && this.cursorRow === 0) {
      return;
    } // nothing to delete

    if (this.cursorCol > 0) {
      this.line(this.cursorRow).splice(this.cursorCol - 1, 1);
      this.cursorCol--;
    } else {
      // merge with previous
      const prev = this.line(this.cursorRow - 1);
      const cur = this.line(this.cursorRow);
      const newCol = prev.length;
      this.lines[this.cursorRow - 1] = prev.concat(cur);
      this.lines.splice(this.cursorRow, 1);
      this.cursorRow--;
      this.cursorCol = newCol;
    }

    dbg("backspace:after", { cursor: this.getCursor() });
  }

  /**
   * Vertical moves always land on column 0; there is no remembered "preferred"
   * column.
   */
  move(dir: Direction): void {
    const before = this.getCursor();
    switch (dir) {
      case "left":
        if (this.cursorCol > 0) {
          this.cursorCol--;
        }
        break;
      case "right":
        if (this.cursorCol < this.lineLen(this.cursorRow)) {
          this.cursorCol++;
        }
        break;
      case "up":
        if (this.cursorRow > 0) {
          this.cursorRow--;
          this.cursorCol = 0;
        }
        break;
      case "down":
        if (this.cursorRow < this.lines.length - 1) {
          this.cursorRow++;
          this.cursorCol = 0;
        }
        break;
    }

    dbg("move", { dir, before, after: this.getCursor() });
  }

  /** Move caret to *absolute* beginning of the buffer (row-0, col-0). */
  moveToStartOfDocument(): void {
    this.cursorRow = 0;
    this.cursorCol = 0;
  }

  /* =======================================================================
   *  High level "handleEvent" – receives what the decoder emits
   * ===================================================================== */
  handleEvent(event: EditEvent): void {
    switch (event.type) {
      case "printable":
        this.insertByte(event.byte);
        break;
      case "enter":
        this.insertLineBreak();
        break;
      case "backspace":
        this.backspace();
        break;
      case "arrowUp":
        this.move("up");
        break;
      case "arrowDown":
        this.move("down");
        break;
      case "arrowLeft":
        this.move("left");
        break;
      case "arrowRight":
        this.move("right");
        break;
    }
  }
}
