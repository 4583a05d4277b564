import {
  deletedEnd,
  insertedEnd,
  invertEdit,
  type TextEdit,
} from "./change";
import type { CursorSelection } from "./cursor";
import type { TextBuffer } from "./text-buffer";
import { ok, type Cursor, type Result } from "./types";
import { isSingleScalar } from "../shared/segmenter";

export const MAX_UNDO_STACK_SIZE = 100;

/**
 * What produced an entry. Only `insert`, `delete-backward` and
 * `delete-forward` entries holding single characters ever coalesce.
 */
export type EditKind =
  | "insert"
  | "delete-backward"
  | "delete-forward"
  | "delete-word"
  | "delete-line"
  | "delete-selection"
  | "replace"
  | "cut"
  | "paste";

export type HistoryEntry = {
  id: number;
  kind: EditKind;
  forward: TextEdit;
  inverse: TextEdit;
  cursorBefore: Cursor;
  cursorAfter: Cursor;
};

export type HistoryOptions = {
  maxDepth?: number;
  /** Edits further apart than this never coalesce. 0 disables the limit. */
  coalesceIntervalMs?: number;
  now?: () => number;
};

function startsSession(kind: EditKind, edit: TextEdit): boolean {
  switch (kind) {
    case "insert":
      return edit.deleted === "" && isSingleScalar(edit.inserted);
    case "delete-backward":
    case "delete-forward":
      return edit.inserted === "" && isSingleScalar(edit.deleted);
    default:
      return false;
  }
}

/** The merged forward edit, or null when `edit` does not continue `top`. */
function mergeEdits(
  top: HistoryEntry,
  kind: EditKind,
  edit: TextEdit,
): TextEdit | null {
  if (top.kind !== kind || !startsSession(kind, edit)) {
    return null;
  }
  const previous = top.forward;
  switch (kind) {
    case "insert":
      if (edit.offset !== insertedEnd(previous)) {
        return null;
      }
      return {
        offset: previous.offset,
        deleted: "",
        inserted: previous.inserted + edit.inserted,
      };
    case "delete-backward":
      if (deletedEnd(edit) !== previous.offset) {
        return null;
      }
      return {
        offset: edit.offset,
        deleted: edit.deleted + previous.deleted,
        inserted: "",
      };
    case "delete-forward":
      if (edit.offset !== previous.offset) {
        return null;
      }
      return {
        offset: previous.offset,
        deleted: previous.deleted + edit.deleted,
        inserted: "",
      };
    default:
      return null;
  }
}

export class HistoryEngine {
  private buffer: TextBuffer;
  private cursor: CursorSelection;
  private maxDepth: number;
  private coalesceIntervalMs: number;
  private now: () => number;
  private undoStack: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];
  private sessionOpen = false;
  private lastEditAt = 0;
  private nextId = 1;
  private savedId = 0;

  constructor(
    buffer: TextBuffer,
    cursor: CursorSelection,
    options: HistoryOptions = {},
  ) {
    this.buffer = buffer;
    this.cursor = cursor;
    this.maxDepth = Math.max(1, options.maxDepth ?? MAX_UNDO_STACK_SIZE);
    this.coalesceIntervalMs = options.coalesceIntervalMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  get undoEntries(): readonly HistoryEntry[] {
    return this.undoStack;
  }

  get redoEntries(): readonly HistoryEntry[] {
    return this.redoStack;
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get isModified(): boolean {
    return this.topId() !== this.savedId;
  }

  markSaved() {
    this.savedId = this.topId();
  }

  /** Ends the coalescing session so the next edit opens a new entry. */
  breakCoalescing() {
    this.sessionOpen = false;
  }

  clear() {
    this.undoStack = [];
    this.redoStack = [];
    this.sessionOpen = false;
    this.savedId = 0;
  }

  /** Records an edit that has already been applied to the buffer. */
  record(
    kind: EditKind,
    edit: TextEdit,
    cursorBefore: Cursor,
    cursorAfter: Cursor,
  ): HistoryEntry {
    const now = this.now();
    const top = this.undoStack[this.undoStack.length - 1];
    const withinInterval =
      this.coalesceIntervalMs <= 0 ||
      now - this.lastEditAt < this.coalesceIntervalMs;
    const merged =
      this.sessionOpen && top && withinInterval
        ? mergeEdits(top, kind, edit)
        : null;

    let entry: HistoryEntry;
    if (top && merged) {
      entry = {
        ...top,
        id: this.nextId++,
        forward: merged,
        inverse: invertEdit(merged),
        cursorAfter,
      };
      this.undoStack[this.undoStack.length - 1] = entry;
    } else {
      entry = {
        id: this.nextId++,
        kind,
        forward: edit,
        inverse: invertEdit(edit),
        cursorBefore,
        cursorAfter,
      };
      this.undoStack.push(entry);
      if (this.undoStack.length > this.maxDepth) {
        this.undoStack.shift();
      }
    }

    this.redoStack = [];
    this.sessionOpen = startsSession(kind, edit);
    this.lastEditAt = now;
    return entry;
  }

  /** Reverts the latest entry. Resolves to null when there is nothing to undo. */
  undo(): Result<HistoryEntry | null> {
    this.sessionOpen = false;
    const entry = this.undoStack[this.undoStack.length - 1];
    if (!entry) {
      return ok(null);
    }
    const applied = this.buffer.applyEdit(entry.inverse);
    if (!applied.ok) {
      return applied;
    }
    this.undoStack.pop();
    this.cursor.restore(entry.cursorBefore);
    this.redoStack.push(entry);
    return ok(entry);
  }

  /** Re-applies the latest undone entry. Resolves to null when there is none. */
  redo(): Result<HistoryEntry | null> {
    this.sessionOpen = false;
    const entry = this.redoStack[this.redoStack.length - 1];
    if (!entry) {
      return ok(null);
    }
    const applied = this.buffer.applyEdit(entry.forward);
    if (!applied.ok) {
      return applied;
    }
    this.redoStack.pop();
    this.cursor.restore(entry.cursorAfter);
    this.undoStack.push(entry);
    return ok(entry);
  }

  private topId(): number {
    return this.undoStack[this.undoStack.length - 1]?.id ?? 0;
  }
}
