/**
 * Byte values the decoder recognises. Arrow keys arrive as the three byte
 * sequence ESC [ A..D.
 */
export const Key = {
  CTRL_C: 0x03,
  CTRL_D: 0x04,
  ENTER: 0x0a, // LF
  RETURN: 0x0d, // CR, what raw mode delivers for the Enter key
  ESCAPE: 0x1b,
  BACKSPACE: 0x7f, // DEL
  ARROW_UP: "[A",
  ARROW_DOWN: "[B",
  ARROW_RIGHT: "[C",
  ARROW_LEFT: "[D",
} as const;

export type InputEvent =
  | { type: "printable"; byte: number }
  | { type: "enter" }
  | { type: "backspace" }
  | { type: "terminate" }
  | { type: "arrowUp" }
  | { type: "arrowDown" }
  | { type: "arrowLeft" }
  | { type: "arrowRight" };

export type DecoderState = "idle" | "escapePending";

type ArrowEvent = Extract<
  InputEvent,
  { type: "arrowUp" | "arrowDown" | "arrowLeft" | "arrowRight" }
>;

const ARROWS: Record<string, ArrowEvent> = {
  [Key.ARROW_UP]: { type: "arrowUp" },
  [Key.ARROW_DOWN]: { type: "arrowDown" },
  [Key.ARROW_RIGHT]: { type: "arrowRight" },
  [Key.ARROW_LEFT]: { type: "arrowLeft" },
};

// Escape sequences are matched at exactly this many bytes (ESC + 2). Longer
// sequences such as ESC [ 1 ; 5 A are not understood.
const ESCAPE_SEQUENCE_LENGTH = 3;

function classify(byte: number): InputEvent {
  switch (byte) {
    case Key.CTRL_D:
    case Key.CTRL_C:
      return { type: "terminate" };
    case Key.ENTER:
    case Key.RETURN:
      return { type: "enter" };
    case Key.BACKSPACE:
      return { type: "backspace" };
    default:
      return { type: "printable", byte };
  }
}

/**
 * Turns a raw byte stream into logical input events, one byte at a time.
 * Never throws: unknown escape sequences are dropped.
 */
export class InputDecoder {
  private pending: Array<number> = [];

  get state(): DecoderState {
    return this.pending.length === 0 ? "idle" : "escapePending";
  }

  pendingBytes(): Array<number> {
    return this.pending.slice();
  }

  /** Returns the completed event, or null while a sequence is incomplete. */
  feed(byte: number): InputEvent | null {
    if (this.pending.length === 0) {
      if (byte === Key.ESCAPE) {
        this.pending.push(byte);
        return null;
      }
      return classify(byte);
    }

    this.pending.push(byte);
    if (this.pending.length < ESCAPE_SEQUENCE_LENGTH) {
      return null;
    }

    const [, second = 0, third = 0] = this.pending;
    const suffix = String.fromCharCode(second, third);
    this.pending = [];
    return ARROWS[suffix] ?? null;
  }

  decode(chunk: Uint8Array): Array<InputEvent> {
    const events: Array<InputEvent> = [];
    for (const byte of chunk) {
      const event = this.feed(byte);
      if (event) {
        events.push(event);
      }
    }
    return events;
  }
}
