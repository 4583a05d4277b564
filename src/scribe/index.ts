export { ScribeEngine, defaultEngineOptions } from "./engine/scribe-engine";
export type {
  CommandOutcome,
  EngineOptions,
  KeyOutcome,
} from "./engine/scribe-engine";
export { ListenerRegistry } from "./engine/events";
export type { EditorEvent, EditorListener } from "./engine/events";
export { MemoryClipboard } from "./engine/clipboard";
export type { ClipboardProvider } from "./engine/clipboard";
export { findAll, nextMatch, previousMatch } from "./engine/search";
export type { SearchState } from "./engine/search";

export { TextBuffer } from "./core/text-buffer";
export type { ReadonlyTextBuffer } from "./core/text-buffer";
export { CursorSelection, DEFAULT_PAGE_SIZE } from "./core/cursor";
export { HistoryEngine, MAX_UNDO_STACK_SIZE } from "./core/history";
export type { EditKind, HistoryEntry, HistoryOptions } from "./core/history";
export {
  deletion,
  insertion,
  invertEdit,
  mapOffset,
} from "./core/change";
export type { TextEdit } from "./core/change";
export {
  CursorMovementSchema,
  EditorCommandSchema,
  isNavigation,
  isTextMutation,
} from "./core/commands";
export type {
  CursorMovement,
  EditorCommand,
  EditorCommandType,
} from "./core/commands";
export { EditorError, comparePositions } from "./core/types";
export type {
  Cursor,
  EditorErrorKind,
  Offset,
  Position,
  Range,
  Result,
  Selection,
} from "./core/types";

export {
  KeymapSchema,
  ShortcutResolver,
  defaultKeymap,
  validateKeymap,
} from "./shortcuts/shortcut-resolver";
export type {
  Keymap,
  ResolvedKey,
  ShortcutBinding,
  ShortcutResolverOptions,
} from "./shortcuts/shortcut-resolver";
export { KeymapError, formatChord, parseChord } from "./shortcuts/keys";
export type { Chord, KeyEvent, KeyEventSource } from "./shortcuts/keys";
export { detectPlatform } from "./shared/platform";
export type { Platform } from "./shared/platform";
