import type { Offset } from "./types";
import { scalarLength } from "../shared/segmenter";

/**
 * Replaces the scalars `[offset, offset + len(deleted))` with `inserted`.
 * A pure insertion has an empty `deleted`, a pure deletion an empty
 * `inserted`.
 */
export type TextEdit = {
  offset: Offset;
  deleted: string;
  inserted: string;
};

export function insertion(offset: Offset, text: string): TextEdit {
  return { offset, deleted: "", inserted: text };
}

export function deletion(offset: Offset, text: string): TextEdit {
  return { offset, deleted: text, inserted: "" };
}

export function invertEdit(edit: TextEdit): TextEdit {
  return { offset: edit.offset, deleted: edit.inserted, inserted: edit.deleted };
}

export function isEmptyEdit(edit: TextEdit): boolean {
  return edit.deleted === edit.inserted;
}

export function deletedEnd(edit: TextEdit): Offset {
  return edit.offset + scalarLength(edit.deleted);
}

export function insertedEnd(edit: TextEdit): Offset {
  return edit.offset + scalarLength(edit.inserted);
}

/**
 * Maps a pre-edit offset to its post-edit value. Offsets inside the deleted
 * range collapse onto the edit point, and offsets at or after the edit point
 * move past the inserted text.
 */
export function mapOffset(offset: Offset, edit: TextEdit): Offset {
  if (offset < edit.offset) {
    return offset;
  }
  const removedEnd = deletedEnd(edit);
  if (offset <= removedEnd) {
    return insertedEnd(edit);
  }
  return offset - (removedEnd - edit.offset) + scalarLength(edit.inserted);
}
