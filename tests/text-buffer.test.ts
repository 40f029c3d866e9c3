import TextBuffer from "../src/text-buffer";
import { bytes } from "./render-test-helpers";
import { describe, it, expect } from "vitest";

function typeText(buf: TextBuffer, text: string): void {
  for (const b of bytes(text)) {
    buf.insertByte(b);
  }
}

describe("TextBuffer – editing", () => {
  /* ------------------------------------------------------------------ */
  /*  insertByte                                                         */
  /* ------------------------------------------------------------------ */
  it("starts as a single empty line with the cursor at the origin", () => {
    const buf = new TextBuffer();
    expect(buf.getLines()).toEqual([""]);
    expect(buf.getCursor()).toEqual([0, 0]);
    expect(buf.getLineCount()).toBe(1);
  });

  it("appends bytes in order when the cursor is at end of line", () => {
    const buf = new TextBuffer();
    typeText(buf, "hello, world");
    expect(buf.getLines()).toEqual(["hello, world"]);
    expect(buf.getCursor()).toEqual([0, 12]);
  });

  it("inserts at the cursor column in the middle of a line", () => {
    // (col, byte, expectedLine)
    const cases: Array<[number, string, string]> = [
      [0, "x", "xab"],
      [1, "x", "axb"],
      [2, "x", "abx"],
    ];

    for (const [col, ch, want] of cases) {
      const buf = new TextBuffer();
      typeText(buf, "ab");
      while (buf.getCursor()[1] > col) {
        buf.move("left");
      }
      typeText(buf, ch);
      expect(buf.getLines()).toEqual([want]);
      expect(buf.getCursor()).toEqual([0, col + 1]);
    }
  });

  it("keeps bytes opaque, including non-ASCII values", () => {
    const buf = new TextBuffer();
    buf.insertByte(0xc3);
    buf.insertByte(0xa9);
    expect(buf.getLineBytes(0)).toEqual(Uint8Array.from([0xc3, 0xa9]));
    expect(buf.getCursor()).toEqual([0, 2]);
  });

  /* ------------------------------------------------------------------ */
  /*  insertLineBreak                                                    */
  /* ------------------------------------------------------------------ */
  it("splits the line at the cursor", () => {
    const buf = new TextBuffer();
    typeText(buf, "hello");
    buf.move("left");
    buf.move("left");
    buf.move("left");
    buf.insertLineBreak();
    expect(buf.getLines()).toEqual(["he", "llo"]);
    expect(buf.getCursor()).toEqual([1, 0]);
  });

  it("adds an empty line below when the cursor is at end of line", () => {
    const buf = new TextBuffer();
    typeText(buf, "ab");
    buf.insertLineBreak();
    expect(buf.getLines()).toEqual(["ab", ""]);
    expect(buf.getCursor()).toEqual([1, 0]);
  });

  it("inserts the new line directly after the current row", () => {
    const buf = new TextBuffer();
    typeText(buf, "one");
    buf.insertLineBreak();
    typeText(buf, "three");
    buf.move("up");
    buf.move("right");
    buf.move("right");
    buf.move("right");
    buf.insertLineBreak();
    typeText(buf, "two");
    expect(buf.getLines()).toEqual(["one", "two", "three"]);
    expect(buf.getCursor()).toEqual([1, 3]);
  });

  /* ------------------------------------------------------------------ */
  /*  backspace                                                          */
  /* ------------------------------------------------------------------ */
  it("deletes the byte before the cursor", () => {
    const buf = new TextBuffer();
    typeText(buf, "abc");
    buf.move("left");
    buf.backspace();
    expect(buf.getLines()).toEqual(["ac"]);
    expect(buf.getCursor()).toEqual([0, 1]);
  });

  it("joins with the previous line at column 0", () => {
    const buf = new TextBuffer();
    typeText(buf, "ab");
    buf.insertLineBreak();
    typeText(buf, "cd");
    buf.move("left");
    buf.move("left");
    buf.backspace();
    expect(buf.getLines()).toEqual(["abcd"]);
    expect(buf.getCursor()).toEqual([0, 2]);
  });

  it("is a no-op at the very start of the buffer", () => {
    const buf = new TextBuffer();
    buf.backspace();
    expect(buf.getLines()).toEqual([""]);
    expect(buf.getCursor()).toEqual([0, 0]);
    expect(buf.getLineCount()).toBe(1);
  });

  it("undoes a line break in the middle of a line", () => {
    const buf = new TextBuffer();
    typeText(buf, "hello");
    buf.move("left");
    buf.move("left");
    buf.insertLineBreak();
    buf.backspace();
    expect(buf.getLines()).toEqual(["hello"]);
    expect(buf.getCursor()).toEqual([0, 3]);
  });

  it("undoes a line break at column 0 of a non-empty line", () => {
    const buf = new TextBuffer();
    typeText(buf, "ab");
    buf.move("left");
    buf.move("left");
    buf.insertLineBreak();
    expect(buf.getLines()).toEqual(["", "ab"]);
    buf.backspace();
    expect(buf.getLines()).toEqual(["ab"]);
    expect(buf.getLineBytes(0)).toEqual(Uint8Array.from([0x61, 0x62]));
    expect(buf.getCursor()).toEqual([0, 0]);
  });
});

describe("TextBuffer – cursor movement", () => {
  function threeLines(): TextBuffer {
    const buf = new TextBuffer();
    typeText(buf, "first");
    buf.insertLineBreak();
    typeText(buf, "second");
    buf.insertLineBreak();
    typeText(buf, "third");
    return buf;
  }

  it("resets the column to 0 on vertical moves", () => {
    const buf = threeLines();
    expect(buf.getCursor()).toEqual([2, 5]);
    buf.move("up");
    expect(buf.getCursor()).toEqual([1, 0]);
    buf.move("right");
    buf.move("down");
    expect(buf.getCursor()).toEqual([2, 0]);
  });

  it("stays put at the buffer and line boundaries", () => {
    const buf = threeLines();
    buf.move("down");
    expect(buf.getCursor()).toEqual([2, 5]);
    buf.move("right");
    expect(buf.getCursor()).toEqual([2, 5]);

    buf.move("up");
    buf.move("up");
    buf.move("up");
    expect(buf.getCursor()).toEqual([0, 0]);
    buf.move("left");
    expect(buf.getCursor()).toEqual([0, 0]);
  });

  it("treats right then left as identity at interior columns", () => {
    const buf = new TextBuffer();
    typeText(buf, "abcd");
    for (let c = 1; c < 4; c++) {
      buf.moveToStartOfDocument();
      for (let i = 0; i < c; i++) {
        buf.move("right");
      }
      buf.move("right");
      buf.move("left");
      expect(buf.getCursor()).toEqual([0, c]);
    }
  });

  it("moveToStartOfDocument parks the cursor at the origin", () => {
    const buf = threeLines();
    buf.moveToStartOfDocument();
    expect(buf.getCursor()).toEqual([0, 0]);
    expect(buf.getLines()).toEqual(["first", "second", "third"]);
  });
});

describe("TextBuffer – handleEvent", () => {
  it("dispatches decoder events to the matching operation", () => {
    const buf = new TextBuffer();
    buf.handleEvent({ type: "printable", byte: 0x78 });
    buf.handleEvent({ type: "enter" });
    expect(buf.getLines()).toEqual(["x", ""]);
    expect(buf.getCursor()).toEqual([1, 0]);

    buf.handleEvent({ type: "arrowUp" });
    expect(buf.getCursor()).toEqual([0, 0]);
    buf.handleEvent({ type: "arrowRight" });
    expect(buf.getCursor()).toEqual([0, 1]);
    buf.handleEvent({ type: "arrowDown" });
    expect(buf.getCursor()).toEqual([1, 0]);

    buf.handleEvent({ type: "backspace" });
    expect(buf.getLines()).toEqual(["x"]);
    expect(buf.getCursor()).toEqual([0, 1]);
    buf.handleEvent({ type: "arrowLeft" });
    expect(buf.getCursor()).toEqual([0, 0]);
  });

  it("leaves an empty buffer untouched at its boundaries", () => {
    const buf = new TextBuffer();
    buf.handleEvent({ type: "backspace" });
    buf.handleEvent({ type: "arrowLeft" });
    buf.handleEvent({ type: "arrowDown" });
    buf.handleEvent({ type: "arrowUp" });
    buf.handleEvent({ type: "arrowRight" });
    expect(buf.getLines()).toEqual([""]);
    expect(buf.getCursor()).toEqual([0, 0]);
  });
});

describe("TextBuffer – invariants under random edits", () => {
  // Small deterministic PRNG so failures reproduce.
  function mulberry32(seed: number): () => number {
    let a = seed;
    return () => {
      a = (a + 0x6d2b79f5) | 0;
      let t = Math.imul(a ^ (a >>> 15), 1 | a);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
  }

  const ops: Array<(buf: TextBuffer, rnd: () => number) => void> = [
    (buf, rnd) => buf.insertByte(0x20 + Math.floor(rnd() * 95)),
    (buf) => buf.insertLineBreak(),
    (buf) => buf.backspace(),
    (buf) => buf.move("up"),
    (buf) => buf.move("down"),
    (buf) => buf.move("left"),
    (buf) => buf.move("right"),
  ];

  for (const seed of [1, 7, 42, 1234, 99999]) {
    it(`keeps the cursor in range (seed ${seed})`, () => {
      const rnd = mulberry32(seed);
      const buf = new TextBuffer();
      for (let step = 0; step < 2000; step++) {
        const op = ops[Math.floor(rnd() * ops.length)];
        op?.(buf, rnd);

        const [row, col] = buf.getCursor();
        const lineCount = buf.getLineCount();
        expect(lineCount).toBeGreaterThanOrEqual(1);
        expect(row).toBeGreaterThanOrEqual(0);
        expect(row).toBeLessThan(lineCount);
        expect(col).toBeGreaterThanOrEqual(0);
        expect(col).toBeLessThanOrEqual(buf.getLineBytes(row).length);
      }
    });
  }
});
