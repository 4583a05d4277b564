/** Character index into the buffer, counted in Unicode scalar values. */
export type Offset = number;

export type Position = {
  line: number;
  column: number;
};

export type Selection = {
  /** Fixed end of the selection. */
  anchor: Position;
  /** End that moves when the selection is extended. */
  head: Position;
};

export type Cursor = {
  position: Position;
  selection: Selection | null;
  stickyColumn: number;
};

export type Range = {
  start: Offset;
  end: Offset;
};

export type EditorErrorKind =
  | "OutOfBounds"
  | "InvalidRange"
  | "NoSelection"
  | "Unhandled"
  | "Reentrant";

export class EditorError extends Error {
  readonly kind: EditorErrorKind;

  constructor(kind: EditorErrorKind, message: string) {
    super(message);
    this.name = "EditorError";
    this.kind = kind;
  }
}

export type Result<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: EditorError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export const done: Result<void> = { ok: true, value: undefined };

export function fail<T = never>(
  kind: EditorErrorKind,
  message: string,
): Result<T> {
  return { ok: false, error: new EditorError(kind, message) };
}

export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return a.column - b.column;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

export function selectionsEqual(
  a: Selection | null,
  b: Selection | null,
): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return positionsEqual(a.anchor, b.anchor) && positionsEqual(a.head, b.head);
}

/** Orders a selection's ends regardless of its direction. */
export function selectionBounds(selection: Selection): {
  start: Position;
  end: Position;
} {
  if (comparePositions(selection.anchor, selection.head) <= 0) {
    return { start: selection.anchor, end: selection.head };
  }
  return { start: selection.head, end: selection.anchor };
}
