import { mapOffset, type TextEdit } from "./change";
import type { CursorMovement } from "./commands";
import type { TextBuffer } from "./text-buffer";
import {
  done,
  positionsEqual,
  type Cursor,
  type Offset,
  type Position,
  type Range,
  type Result,
  type Selection,
} from "./types";
import { scalars } from "../shared/segmenter";
import {
  firstNonWhitespace,
  getWordBoundaries,
  runEnd,
  runStart,
  skipWhitespaceBackward,
  skipWhitespaceForward,
} from "../shared/word-break";

export const DEFAULT_PAGE_SIZE = 20;

/** Cursor ends expressed as buffer offsets, captured before an edit. */
export type CursorOffsets = {
  head: Offset;
  anchor: Offset;
};

type MoveTarget = {
  position: Position;
  stickyColumn: number;
};

/**
 * Cursor and selection over a TextBuffer. The anchor is always stored; the
 * selection is considered empty while it equals the head.
 */
export class CursorSelection {
  private buffer: TextBuffer;
  private pageSize: number;
  private head: Position = { line: 0, column: 0 };
  private anchor: Position = { line: 0, column: 0 };
  private sticky = 0;
  private selecting = false;

  constructor(buffer: TextBuffer, pageSize = DEFAULT_PAGE_SIZE) {
    this.buffer = buffer;
    this.pageSize = pageSize;
  }

  get position(): Position {
    return { ...this.head };
  }

  get selection(): Selection | null {
    if (positionsEqual(this.anchor, this.head)) {
      return null;
    }
    return { anchor: { ...this.anchor }, head: { ...this.head } };
  }

  get stickyColumn(): number {
    return this.sticky;
  }

  /** True between `startSelection()` and `endSelection()`. */
  get isSelecting(): boolean {
    return this.selecting;
  }

  snapshot(): Cursor {
    return {
      position: this.position,
      selection: this.selection,
      stickyColumn: this.sticky,
    };
  }

  restore(cursor: Cursor) {
    this.head = this.buffer.clampPosition(cursor.position);
    this.anchor = cursor.selection
      ? this.buffer.clampPosition(cursor.selection.anchor)
      : { ...this.head };
    this.sticky = cursor.stickyColumn;
    this.selecting = false;
  }

  reset() {
    this.restore({
      position: { line: 0, column: 0 },
      selection: null,
      stickyColumn: 0,
    });
  }

  move(movement: CursorMovement, extend = false) {
    const target = this.resolveMove(movement);
    this.place(target.position, extend, target.stickyColumn);
  }

  /** Offset `movement` would place the head at, without moving it. */
  peekOffset(movement: CursorMovement): Offset {
    return this.offsetOf(this.resolveMove(movement).position);
  }

  moveTo(position: Position, extend = false): Result {
    const offset = this.buffer.positionToOffset(position);
    if (!offset.ok) {
      return offset;
    }
    this.place(
      { line: position.line, column: position.column },
      extend,
      position.column,
    );
    return done;
  }

  startSelection() {
    this.anchor = { ...this.head };
    this.selecting = true;
  }

  endSelection() {
    this.selecting = false;
  }

  clearSelection() {
    this.anchor = { ...this.head };
    this.selecting = false;
  }

  selectAll() {
    const lastLine = this.buffer.lineCount() - 1;
    this.anchor = { line: 0, column: 0 };
    this.head = { line: lastLine, column: this.buffer.lineLength(lastLine) };
    this.sticky = this.head.column;
  }

  /** Selects the line under the cursor including its trailing newline. */
  selectLine() {
    const { line } = this.head;
    this.anchor = { line, column: 0 };
    this.head =
      line + 1 < this.buffer.lineCount()
        ? { line: line + 1, column: 0 }
        : { line, column: this.buffer.lineLength(line) };
    this.sticky = this.head.column;
  }

  selectWord() {
    const { line, column } = this.head;
    const chars = scalars(this.buffer.lineText(line));
    const bounds = getWordBoundaries(chars, column);
    this.anchor = { line, column: bounds.start };
    this.head = { line, column: bounds.end };
    this.sticky = bounds.end;
  }

  /** Selects `[start, end)` with the head at `end`. */
  selectRange(range: Range) {
    this.anchor = this.buffer.offsetToPosition(range.start);
    this.head = this.buffer.offsetToPosition(range.end);
    this.sticky = this.head.column;
    this.selecting = false;
  }

  /** Ordered offsets of a non-empty selection. */
  selectionRange(): Range | null {
    if (positionsEqual(this.anchor, this.head)) {
      return null;
    }
    const { head, anchor } = this.toOffsets();
    return { start: Math.min(head, anchor), end: Math.max(head, anchor) };
  }

  toOffsets(): CursorOffsets {
    return {
      head: this.offsetOf(this.head),
      anchor: this.offsetOf(this.anchor),
    };
  }

  /** Re-derives both ends from their pre-edit offsets. */
  remap(edit: TextEdit, before: CursorOffsets) {
    this.head = this.buffer.offsetToPosition(mapOffset(before.head, edit));
    this.anchor = this.buffer.offsetToPosition(mapOffset(before.anchor, edit));
    this.sticky = this.head.column;
    this.selecting = false;
  }

  private place(position: Position, extend: boolean, stickyColumn: number) {
    if (!extend && !this.selecting) {
      this.anchor = { ...position };
    }
    this.head = position;
    this.sticky = stickyColumn;
  }

  private offsetOf(position: Position): Offset {
    const offset = this.buffer.positionToOffset(position);
    if (!offset.ok) {
      throw offset.error;
    }
    return offset.value;
  }

  private resolveMove(movement: CursorMovement): MoveTarget {
    const { line, column } = this.head;
    const lastLine = this.buffer.lineCount() - 1;

    switch (movement) {
      case "left":
        if (column > 0) {
          return this.horizontal({ line, column: column - 1 });
        }
        if (line > 0) {
          return this.horizontal({
            line: line - 1,
            column: this.buffer.lineLength(line - 1),
          });
        }
        return this.horizontal(this.head);
      case "right":
        if (column < this.buffer.lineLength(line)) {
          return this.horizontal({ line, column: column + 1 });
        }
        if (line < lastLine) {
          return this.horizontal({ line: line + 1, column: 0 });
        }
        return this.horizontal(this.head);
      case "up":
        return this.vertical(line - 1);
      case "down":
        return this.vertical(line + 1);
      case "page-up":
        return this.vertical(Math.max(0, line - this.pageSize));
      case "page-down":
        return this.vertical(Math.min(lastLine, line + this.pageSize));
      case "word-left":
        return this.horizontal(this.wordLeft());
      case "word-right":
        return this.horizontal(this.wordRight());
      case "line-start": {
        const first = firstNonWhitespace(scalars(this.buffer.lineText(line)));
        return this.horizontal({
          line,
          column: column === 0 && first !== 0 ? first : 0,
        });
      }
      case "line-end":
        return this.horizontal({ line, column: this.buffer.lineLength(line) });
      case "document-start":
        return this.horizontal({ line: 0, column: 0 });
      case "document-end":
        return this.horizontal({
          line: lastLine,
          column: this.buffer.lineLength(lastLine),
        });
    }
  }

  private horizontal(position: Position): MoveTarget {
    return { position: { ...position }, stickyColumn: position.column };
  }

  // Vertical moves keep the sticky column even when the target line clamps it.
  private vertical(targetLine: number): MoveTarget {
    if (targetLine < 0 || targetLine >= this.buffer.lineCount()) {
      return { position: { ...this.head }, stickyColumn: this.sticky };
    }
    return {
      position: {
        line: targetLine,
        column: Math.min(this.sticky, this.buffer.lineLength(targetLine)),
      },
      stickyColumn: this.sticky,
    };
  }

  private wordRight(): Position {
    const lastLine = this.buffer.lineCount() - 1;
    let { line, column } = this.head;
    let chars = scalars(this.buffer.lineText(line));

    for (;;) {
      column = skipWhitespaceForward(chars, column);
      if (column < chars.length || line === lastLine) {
        break;
      }
      line += 1;
      column = 0;
      chars = scalars(this.buffer.lineText(line));
    }

    return { line, column: runEnd(chars, column) };
  }

  private wordLeft(): Position {
    let { line, column } = this.head;
    let chars = scalars(this.buffer.lineText(line));

    for (;;) {
      column = skipWhitespaceBackward(chars, column);
      if (column > 0 || line === 0) {
        break;
      }
      line -= 1;
      chars = scalars(this.buffer.lineText(line));
      column = chars.length;
    }

    return { line, column: runStart(chars, column) };
  }
}
