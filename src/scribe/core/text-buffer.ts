import { Text } from "@codemirror/state";
import { deletedEnd, type TextEdit } from "./change";
import {
  EditorError,
  done,
  fail,
  ok,
  type Offset,
  type Position,
  type Result,
} from "./types";
import { scalarLength, surrogatePairStarts } from "../shared/segmenter";

function toDoc(text: string): Text {
  return Text.of(text.split("\n"));
}

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/** Number of leading entries of the ascending `values` below `bound`. */
function countBelow(values: number[], bound: number): number {
  let low = 0;
  let high = values.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (values[mid] < bound) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/** Query surface handed to code outside the engine. */
export type ReadonlyTextBuffer = Pick<
  TextBuffer,
  | "length"
  | "text"
  | "lineCount"
  | "lineLength"
  | "lineText"
  | "lineStartOffset"
  | "slice"
  | "positionToOffset"
  | "offsetToPosition"
  | "clampPosition"
>;

/**
 * Mutable text content. Lines live in a `@codemirror/state` rope indexed by
 * UTF-16 code units, which also answers line lookups. The buffer exposes
 * scalar offsets; the code unit positions of surrogate pairs are the only
 * extra index it keeps, so a document without astral characters converts
 * offsets with no correction at all.
 */
export class TextBuffer {
  private doc: Text;
  private scalarCount: number;
  // Code unit index of every surrogate pair in the document, ascending.
  private pairStarts: number[];

  constructor(text = "") {
    this.doc = toDoc(text);
    this.scalarCount = scalarLength(text);
    this.pairStarts = surrogatePairStarts(text);
  }

  get length(): number {
    return this.scalarCount;
  }

  text(): string {
    return this.doc.toString();
  }

  lineCount(): number {
    return this.doc.lines;
  }

  lineText(line: number): string {
    this.assertLine(line);
    return this.doc.line(line + 1).text;
  }

  lineStartOffset(line: number): Offset {
    this.assertLine(line);
    return this.lineStart(line);
  }

  lineLength(line: number): number {
    this.assertLine(line);
    const { from, to } = this.doc.line(line + 1);
    return this.toScalar(to) - this.toScalar(from);
  }

  insert(at: Offset, text: string): Result {
    if (!isIndex(at) || at > this.scalarCount) {
      return fail("OutOfBounds", `Offset ${at} is outside [0, ${this.length}]`);
    }
    this.replaceRange(at, at, text);
    return done;
  }

  delete(start: Offset, end: Offset): Result<string> {
    const invalid = this.checkRange(start, end);
    if (invalid) {
      return { ok: false, error: invalid };
    }
    const removed = this.sliceUnchecked(start, end);
    this.replaceRange(start, end, "");
    return ok(removed);
  }

  slice(start: Offset, end: Offset): Result<string> {
    const invalid = this.checkRange(start, end);
    if (invalid) {
      return { ok: false, error: invalid };
    }
    return ok(this.sliceUnchecked(start, end));
  }

  /**
   * Applies an edit only if `edit.deleted` matches the current content at
   * `edit.offset`. Nothing is mutated on failure.
   */
  applyEdit(edit: TextEdit): Result {
    if (!isIndex(edit.offset) || edit.offset > this.scalarCount) {
      return fail(
        "OutOfBounds",
        `Offset ${edit.offset} is outside [0, ${this.length}]`,
      );
    }
    const end = deletedEnd(edit);
    if (end > this.scalarCount) {
      return fail(
        "InvalidRange",
        `Range [${edit.offset}, ${end}) exceeds length ${this.length}`,
      );
    }
    if (this.sliceUnchecked(edit.offset, end) !== edit.deleted) {
      return fail(
        "InvalidRange",
        `Content at [${edit.offset}, ${end}) does not match the edit`,
      );
    }
    this.replaceRange(edit.offset, end, edit.inserted);
    return done;
  }

  positionToOffset(position: Position): Result<Offset> {
    const { line, column } = position;
    if (!isIndex(line) || line >= this.doc.lines) {
      return fail(
        "OutOfBounds",
        `Line ${line} is outside [0, ${this.doc.lines - 1}]`,
      );
    }
    const length = this.lineLength(line);
    if (!isIndex(column) || column > length) {
      return fail(
        "OutOfBounds",
        `Column ${column} is outside [0, ${length}] on line ${line}`,
      );
    }
    return ok(this.lineStart(line) + column);
  }

  offsetToPosition(offset: Offset): Position {
    const target = Math.max(0, Math.min(Math.trunc(offset), this.scalarCount));
    const line = this.doc.lineAt(this.toCodeUnit(target));
    return { line: line.number - 1, column: target - this.toScalar(line.from) };
  }

  clampPosition(position: Position): Position {
    const line = Math.max(
      0,
      Math.min(Math.trunc(position.line), this.doc.lines - 1),
    );
    const column = Math.max(
      0,
      Math.min(Math.trunc(position.column), this.lineLength(line)),
    );
    return { line, column };
  }

  private lineStart(line: number): Offset {
    return this.toScalar(this.doc.line(line + 1).from);
  }

  private toScalar(codeUnit: number): Offset {
    return codeUnit - countBelow(this.pairStarts, codeUnit);
  }

  private toCodeUnit(offset: Offset): number {
    // The pair at pairStarts[i] sits at scalar offset pairStarts[i] - i, and
    // those scalar offsets ascend, so the pairs before `offset` form a prefix.
    let low = 0;
    let high = this.pairStarts.length;
    while (low < high) {
      const mid = (low + high) >> 1;
      if (this.pairStarts[mid] - mid < offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return offset + low;
  }

  private sliceUnchecked(start: Offset, end: Offset): string {
    if (start === end) {
      return "";
    }
    return this.doc.sliceString(this.toCodeUnit(start), this.toCodeUnit(end));
  }

  private replaceRange(start: Offset, end: Offset, text: string) {
    if (start === end && text === "") {
      return;
    }
    const from = this.toCodeUnit(start);
    const to = start === end ? from : this.toCodeUnit(end);
    this.doc = this.doc.replace(from, to, toDoc(text));
    this.scalarCount += scalarLength(text) - (end - start);

    const shift = text.length - (to - from);
    const kept = countBelow(this.pairStarts, from);
    const following = this.pairStarts.slice(countBelow(this.pairStarts, to));
    this.pairStarts = this.pairStarts.slice(0, kept).concat(
      surrogatePairStarts(text).map((index) => index + from),
      following.map((index) => index + shift),
    );
  }

  private checkRange(start: Offset, end: Offset): EditorError | null {
    if (!isIndex(start) || !Number.isInteger(end) || start > end) {
      return new EditorError(
        "InvalidRange",
        `Range [${start}, ${end}) is malformed`,
      );
    }
    if (end > this.scalarCount) {
      return new EditorError(
        "InvalidRange",
        `Range [${start}, ${end}) exceeds length ${this.length}`,
      );
    }
    return null;
  }

  private assertLine(line: number) {
    if (!isIndex(line) || line >= this.doc.lines) {
      throw new EditorError(
        "OutOfBounds",
        `Line ${line} is outside [0, ${this.doc.lines - 1}]`,
      );
    }
  }
}
