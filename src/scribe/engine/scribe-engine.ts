import type { TextEdit } from "../core/change";
import type { EditorCommand } from "../core/commands";
import { CursorSelection, DEFAULT_PAGE_SIZE } from "../core/cursor";
import {
  HistoryEngine,
  MAX_UNDO_STACK_SIZE,
  type EditKind,
} from "../core/history";
import { TextBuffer, type ReadonlyTextBuffer } from "../core/text-buffer";
import {
  done,
  fail,
  ok,
  positionsEqual,
  selectionBounds,
  selectionsEqual,
  type Cursor,
  type EditorError,
  type Range,
  type Result,
  type Selection,
} from "../core/types";
import { normalizeLineEndings, scalarLength } from "../shared/segmenter";
import type { Platform } from "../shared/platform";
import type { KeyEvent, KeyEventSource } from "../shortcuts/keys";
import { ShortcutResolver } from "../shortcuts/shortcut-resolver";
import { MemoryClipboard, type ClipboardProvider } from "./clipboard";
import {
  ListenerRegistry,
  type EditorEvent,
  type EditorListener,
} from "./events";
import { findAll, nextMatch, previousMatch, type SearchState } from "./search";

export type EngineOptions = {
  value?: string;
  maxHistoryDepth?: number;
  /** Typing further apart than this starts a new undo entry. 0 disables. */
  coalesceIntervalMs?: number;
  now?: () => number;
  pageSize?: number;
  platform?: Platform;
  /** Keymap data merged over the default bindings. */
  keymap?: unknown;
  clipboard?: ClipboardProvider;
  debug?: boolean;
};

export const defaultEngineOptions = {
  value: "",
  maxHistoryDepth: MAX_UNDO_STACK_SIZE,
  coalesceIntervalMs: 0,
  pageSize: DEFAULT_PAGE_SIZE,
  debug: false,
};

export type CommandOutcome = {
  /** False when the command was valid but had nothing to act on. */
  applied: boolean;
  /** Events delivered to listeners for this command, in order. */
  events: EditorEvent[];
  /** Match selected by find, find-next, find-previous and replace. */
  match?: Range | null;
  replacements?: number;
};

export type KeyOutcome =
  | { handled: true; command: EditorCommand; outcome: CommandOutcome }
  | { handled: false; chord: string };

type Step = Result<Omit<CommandOutcome, "events">>;

const changed: Step = ok({ applied: true });
const unchanged: Step = ok({ applied: false });

/**
 * Owns the buffer, cursor and history of one document and applies editor
 * commands to them. Every command either commits fully or fails without
 * mutating anything. Listeners run synchronously after the commit, and a
 * command issued from a listener is rejected with `Reentrant`.
 */
export class ScribeEngine {
  readonly shortcuts: ShortcutResolver;
  private textBuffer: TextBuffer;
  private cursor: CursorSelection;
  private history: HistoryEngine;
  private clipboard: ClipboardProvider;
  private listeners = new ListenerRegistry();
  private debug: boolean;
  private searchQuery: string | null = null;
  private dispatching = false;
  private pendingEdits: TextEdit[] = [];

  constructor(options: EngineOptions = {}) {
    const resolved = { ...defaultEngineOptions, ...options };
    this.debug = resolved.debug;
    this.textBuffer = new TextBuffer(normalizeLineEndings(resolved.value));
    this.cursor = new CursorSelection(this.textBuffer, resolved.pageSize);
    this.history = new HistoryEngine(this.textBuffer, this.cursor, {
      maxDepth: resolved.maxHistoryDepth,
      coalesceIntervalMs: resolved.coalesceIntervalMs,
      now: resolved.now,
    });
    this.clipboard = resolved.clipboard ?? new MemoryClipboard();
    this.shortcuts = new ShortcutResolver({ platform: resolved.platform });
    if (resolved.keymap !== undefined) {
      this.shortcuts.loadKeymap(resolved.keymap);
    }
  }

  get buffer(): ReadonlyTextBuffer {
    return this.textBuffer;
  }

  subscribe(listener: EditorListener): () => void {
    return this.listeners.subscribe(listener);
  }

  dispatch(command: EditorCommand): Result<CommandOutcome> {
    return this.transaction(command.type, () => this.execute(command));
  }

  handleKeyEvent(event: KeyEvent): Result<KeyOutcome> {
    const resolved = this.shortcuts.resolve(event);
    if (resolved.type === "unhandled") {
      this.log("unhandled key", resolved.chord);
      return ok({ handled: false, chord: resolved.chord });
    }
    const command: EditorCommand =
      resolved.type === "command"
        ? resolved.command
        : { type: "insert-char", char: resolved.text };
    const outcome = this.dispatch(command);
    if (!outcome.ok) {
      return outcome;
    }
    return ok({ handled: true, command, outcome: outcome.value });
  }

  /**
   * Feeds a host key source into the engine. Returns the detach handle.
   * Commands that fail, such as cut with nothing selected, are passed to
   * `onError`; without one they are only logged in debug mode.
   */
  attachKeySource(
    source: KeyEventSource,
    onError?: (error: EditorError, event: KeyEvent) => void,
  ): () => void {
    return source.onKey((event) => {
      const result = this.handleKeyEvent(event);
      if (!result.ok) {
        this.log(`key "${event.key}" rejected:`, result.error.message);
        onError?.(result.error, event);
      }
    });
  }

  getValue(): string {
    return this.textBuffer.text();
  }

  /** Replaces the whole content, clearing history, search and selection. */
  setValue(value: string): Result<CommandOutcome> {
    return this.transaction("set-value", () => {
      const current = this.textBuffer.text();
      const next = normalizeLineEndings(value);
      if (current !== next) {
        const edit: TextEdit = { offset: 0, deleted: current, inserted: next };
        const applied = this.textBuffer.applyEdit(edit);
        if (!applied.ok) {
          return applied;
        }
        this.pendingEdits.push(edit);
      }
      this.cursor.reset();
      this.history.clear();
      this.searchQuery = null;
      return current !== next ? changed : unchanged;
    });
  }

  getCursor(): Cursor {
    return this.cursor.snapshot();
  }

  getSelection(): Selection | null {
    return this.cursor.selection;
  }

  getSelectedText(): string | null {
    const range = this.cursor.selectionRange();
    if (!range) {
      return null;
    }
    const text = this.textBuffer.slice(range.start, range.end);
    return text.ok ? text.value : null;
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  isModified(): boolean {
    return this.history.isModified;
  }

  markSaved() {
    this.history.markSaved();
  }

  getSearchState(): SearchState {
    const matches = this.matches();
    const selected = this.cursor.selectionRange();
    const activeIndex = selected
      ? matches.findIndex(
          (match) =>
            match.start === selected.start && match.end === selected.end,
        )
      : -1;
    return { query: this.searchQuery, matches, activeIndex };
  }

  private transaction(label: string, body: () => Step): Result<CommandOutcome> {
    if (this.dispatching) {
      return fail(
        "Reentrant",
        `Cannot run "${label}" while another command is being applied`,
      );
    }
    this.dispatching = true;
    try {
      this.log("dispatch", label);
      const before = this.cursor.snapshot();
      this.pendingEdits = [];
      const step = body();
      if (!step.ok) {
        this.log(`${label} failed:`, step.error.message);
        return step;
      }
      const events = this.collectEvents(before);
      this.listeners.emit(events);
      return ok({ ...step.value, events });
    } finally {
      this.dispatching = false;
    }
  }

  private collectEvents(before: Cursor): EditorEvent[] {
    const events: EditorEvent[] = [];
    if (this.pendingEdits.length > 0) {
      events.push({ type: "text-changed", edits: this.pendingEdits });
    }
    const after = this.cursor.snapshot();
    if (!positionsEqual(before.position, after.position)) {
      events.push({ type: "cursor-moved", position: after.position });
    }
    if (!selectionsEqual(before.selection, after.selection)) {
      events.push({ type: "selection-changed", selection: after.selection });
    }
    return events;
  }

  private execute(command: EditorCommand): Step {
    switch (command.type) {
      case "insert-char":
        return this.insertText(command.char);
      case "insert-text":
        return this.insertText(command.text);
      case "delete-backward":
        return this.deleteOr("delete-backward", () => {
          const head = this.head();
          return { start: Math.max(0, head - 1), end: head };
        });
      case "delete-forward":
        return this.deleteOr("delete-forward", () => {
          const head = this.head();
          const end = Math.min(this.textBuffer.length, head + 1);
          return { start: head, end };
        });
      case "delete-word-backward":
        return this.deleteOr("delete-word", () => ({
          start: this.cursor.peekOffset("word-left"),
          end: this.head(),
        }));
      case "delete-word-forward":
        return this.deleteOr("delete-word", () => ({
          start: this.head(),
          end: this.cursor.peekOffset("word-right"),
        }));
      case "delete-to-line-start":
        return this.deleteOr("delete-line", () => {
          const { line } = this.cursor.position;
          return {
            start: this.textBuffer.lineStartOffset(line),
            end: this.head(),
          };
        });
      case "delete-to-line-end":
        return this.deleteOr("delete-line", () => this.toLineEnd());
      case "delete-line":
        return this.deleteLines();
      case "delete-selection": {
        const selected = this.cursor.selectionRange();
        if (!selected) {
          return fail("NoSelection", "Nothing is selected");
        }
        return this.replaceRange("delete-selection", selected, "");
      }

      case "move-cursor":
        this.cursor.move(command.movement, command.extend ?? false);
        return this.navigated();
      case "move-cursor-to": {
        const target = this.textBuffer.clampPosition(command.position);
        const moved = this.cursor.moveTo(target, command.extend ?? false);
        if (!moved.ok) {
          return moved;
        }
        return this.navigated();
      }
      case "start-selection":
        this.cursor.startSelection();
        return this.navigated();
      case "end-selection":
        this.cursor.endSelection();
        return this.navigated();
      case "select-all":
        this.cursor.selectAll();
        return this.navigated();
      case "select-line":
        this.cursor.selectLine();
        return this.navigated();
      case "select-word":
        this.cursor.selectWord();
        return this.navigated();
      case "clear-selection":
        this.cursor.clearSelection();
        return this.navigated();

      case "undo": {
        const entry = this.history.undo();
        if (!entry.ok) {
          return entry;
        }
        if (!entry.value) {
          return unchanged;
        }
        this.pendingEdits.push(entry.value.inverse);
        return changed;
      }
      case "redo": {
        const entry = this.history.redo();
        if (!entry.ok) {
          return entry;
        }
        if (!entry.value) {
          return unchanged;
        }
        this.pendingEdits.push(entry.value.forward);
        return changed;
      }
      case "history-boundary":
        this.history.breakCoalescing();
        return changed;

      case "copy":
      case "cut": {
        const selected = this.cursor.selectionRange();
        if (!selected) {
          return fail("NoSelection", `Nothing is selected to ${command.type}`);
        }
        const text = this.textBuffer.slice(selected.start, selected.end);
        if (!text.ok) {
          return text;
        }
        this.clipboard.setText(text.value);
        return command.type === "cut"
          ? this.replaceRange("cut", selected, "")
          : changed;
      }
      case "paste": {
        const text = command.text ?? this.clipboard.getText();
        if (text === null || text === "") {
          return unchanged;
        }
        const normalized = normalizeLineEndings(text);
        const selected = this.cursor.selectionRange();
        const head = this.head();
        return this.replaceRange(
          "paste",
          selected ?? { start: head, end: head },
          normalized,
        );
      }

      case "find": {
        if (command.query === "") {
          return fail("InvalidRange", "Search query is empty");
        }
        this.searchQuery = command.query;
        const from = this.cursor.selectionRange()?.start ?? this.head();
        return this.selectMatch(nextMatch(this.matches(), from));
      }
      case "find-next": {
        if (this.searchQuery === null) {
          return fail("InvalidRange", "There is no active search");
        }
        const from = this.cursor.selectionRange()?.end ?? this.head();
        return this.selectMatch(nextMatch(this.matches(), from));
      }
      case "find-previous": {
        if (this.searchQuery === null) {
          return fail("InvalidRange", "There is no active search");
        }
        const from = this.cursor.selectionRange()?.start ?? this.head();
        return this.selectMatch(previousMatch(this.matches(), from));
      }
      case "replace":
        return this.replaceNext(command.query, command.replacement);
      case "replace-all":
        return this.replaceAll(command.query, command.replacement);

      default: {
        const unknown: never = command;
        return fail("Unhandled", `Unknown command ${JSON.stringify(unknown)}`);
      }
    }
  }

  private head() {
    return this.cursor.toOffsets().head;
  }

  private navigated(): Step {
    this.history.breakCoalescing();
    return changed;
  }

  private insertText(text: string): Step {
    const normalized = normalizeLineEndings(text);
    const selected = this.cursor.selectionRange();
    if (selected) {
      return this.replaceRange("replace", selected, normalized);
    }
    if (normalized === "") {
      return unchanged;
    }
    const head = this.head();
    return this.replaceRange("insert", { start: head, end: head }, normalized);
  }

  /** Deletes the selection if there is one, otherwise `target()`. */
  private deleteOr(kind: EditKind, target: () => Range): Step {
    const selected = this.cursor.selectionRange();
    if (selected) {
      return this.replaceRange("delete-selection", selected, "");
    }
    const range = target();
    if (range.start >= range.end) {
      return unchanged;
    }
    return this.replaceRange(kind, range, "");
  }

  // At the end of a line the line break itself is removed.
  private toLineEnd(): Range {
    const { line, column } = this.cursor.position;
    const head = this.head();
    const length = this.textBuffer.lineLength(line);
    if (column < length) {
      return { start: head, end: head + length - column };
    }
    return { start: head, end: Math.min(this.textBuffer.length, head + 1) };
  }

  /** Removes every line the cursor or selection touches. */
  private deleteLines(): Step {
    let first = this.cursor.position.line;
    let last = first;
    const selection = this.cursor.selection;
    if (selection) {
      const { start, end } = selectionBounds(selection);
      first = start.line;
      last = end.column === 0 && end.line > start.line ? end.line - 1 : end.line;
    }

    const buffer = this.textBuffer;
    let range: Range;
    if (last + 1 < buffer.lineCount()) {
      range = {
        start: buffer.lineStartOffset(first),
        end: buffer.lineStartOffset(last + 1),
      };
    } else if (first > 0) {
      range = { start: buffer.lineStartOffset(first) - 1, end: buffer.length };
    } else {
      range = { start: 0, end: buffer.length };
    }

    if (range.start >= range.end) {
      return unchanged;
    }
    return this.replaceRange("delete-line", range, "");
  }

  private replaceRange(kind: EditKind, range: Range, text: string): Step {
    const deleted = this.textBuffer.slice(range.start, range.end);
    if (!deleted.ok) {
      return deleted;
    }
    const committed = this.commit(kind, {
      offset: range.start,
      deleted: deleted.value,
      inserted: text,
    });
    if (!committed.ok) {
      return committed;
    }
    return changed;
  }

  private commit(kind: EditKind, edit: TextEdit): Result {
    const cursorBefore = this.cursor.snapshot();
    const offsets = this.cursor.toOffsets();
    const applied = this.textBuffer.applyEdit(edit);
    if (!applied.ok) {
      return applied;
    }
    this.cursor.remap(edit, offsets);
    this.history.record(kind, edit, cursorBefore, this.cursor.snapshot());
    this.pendingEdits.push(edit);
    return done;
  }

  private matches(): Range[] {
    if (this.searchQuery === null) {
      return [];
    }
    return findAll(this.textBuffer.text(), this.searchQuery);
  }

  private selectMatch(match: Range | null): Step {
    if (!match) {
      return ok({ applied: false, match: null });
    }
    this.cursor.selectRange(match);
    this.history.breakCoalescing();
    return ok({ applied: true, match });
  }

  /**
   * Replaces the selection when it is a match for `query`, then selects the
   * following match.
   */
  private replaceNext(query: string, replacement: string): Step {
    if (query === "") {
      return fail("InvalidRange", "Search query is empty");
    }
    this.searchQuery = query;
    let replacements = 0;
    const selected = this.cursor.selectionRange();
    if (selected && this.getSelectedText() === query) {
      const replaced = this.replaceRange(
        "replace",
        selected,
        normalizeLineEndings(replacement),
      );
      if (!replaced.ok) {
        return replaced;
      }
      replacements = 1;
    }

    const match = nextMatch(this.matches(), this.head());
    if (match) {
      this.cursor.selectRange(match);
    }
    this.history.breakCoalescing();
    return ok({
      applied: replacements > 0 || match !== null,
      match,
      replacements,
    });
  }

  /**
   * Replaces every non-overlapping match, left to right, as found in the text
   * before the first replacement. One history entry per replaced match.
   */
  private replaceAll(query: string, replacement: string): Step {
    if (query === "") {
      return fail("InvalidRange", "Search query is empty");
    }
    this.searchQuery = query;
    const text = normalizeLineEndings(replacement);
    const shift = scalarLength(text) - scalarLength(query);
    const matches = findAll(this.textBuffer.text(), query);
    for (const [index, match] of matches.entries()) {
      const moved = index * shift;
      const replaced = this.replaceRange(
        "replace",
        { start: match.start + moved, end: match.end + moved },
        text,
      );
      if (!replaced.ok) {
        return replaced;
      }
    }
    this.history.breakCoalescing();
    return ok({ applied: matches.length > 0, replacements: matches.length });
  }

  private log(...args: unknown[]) {
    if (this.debug) {
      console.log("[scribe]", ...args);
    }
  }
}
