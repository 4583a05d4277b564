import { afterEach, describe, expect, it, vi } from "vitest";
import { ScribeEngine, type CommandOutcome } from "./scribe-engine";
import type { EditorEvent } from "./events";
import type { Result } from "../core/types";
import type { KeyEvent } from "../shortcuts/keys";
import { createTestHarness } from "../test/harness";

function errorKind(result: Result<unknown>) {
  return result.ok ? null : result.error.kind;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ScribeEngine editing", () => {
  it("inserts, then undoes and redoes with the cursor restored", () => {
    const h = createTestHarness();
    h.run({ type: "insert-text", text: "Hello, World!" });
    h.moveTo(0, 5);
    h.run({ type: "insert-char", char: "," });
    expect(h.value()).toBe("Hello,, World!");
    expect(h.cursor()).toEqual([0, 6]);

    h.run({ type: "undo" });
    expect(h.value()).toBe("Hello, World!");
    expect(h.cursor()).toEqual([0, 5]);

    h.run({ type: "redo" });
    expect(h.value()).toBe("Hello,, World!");
    expect(h.cursor()).toEqual([0, 6]);
  });

  it("deletes a selected line and restores it on undo", () => {
    const source = 'fn main() {\n    println!("Hi");\n}';
    const h = createTestHarness({ value: source });
    h.moveTo(1, 2);
    h.run({ type: "select-line" });
    expect(h.engine.getSelection()).toEqual({
      anchor: { line: 1, column: 0 },
      head: { line: 2, column: 0 },
    });

    h.run({ type: "delete-selection" });
    expect(h.value()).toBe("fn main() {\n}");
    expect(h.cursor()).toEqual([1, 0]);

    h.run({ type: "undo" });
    expect(h.value()).toBe(source);
    expect(h.engine.getSelection()).toEqual({
      anchor: { line: 1, column: 0 },
      head: { line: 2, column: 0 },
    });
  });

  it("repeats undo and redo of a multi-line delete without drift", () => {
    const source = "one\ntwo\nthree";
    const h = createTestHarness({ value: source });
    h.moveTo(0, 1);
    h.moveTo(2, 2, true);
    h.run({ type: "delete-selection" });
    expect(h.value()).toBe("oree");

    for (let cycle = 0; cycle < 3; cycle += 1) {
      h.run({ type: "undo" });
      expect(h.value()).toBe(source);
      expect(h.cursor()).toEqual([2, 2]);
      expect(h.engine.getSelection()).toEqual({
        anchor: { line: 0, column: 1 },
        head: { line: 2, column: 2 },
      });

      h.run({ type: "redo" });
      expect(h.value()).toBe("oree");
      expect(h.cursor()).toEqual([0, 1]);
      expect(h.engine.getSelection()).toBeNull();
    }
  });

  it("walks back separate edits to the original cursor and selection", () => {
    const h = createTestHarness({ value: "one two" });
    h.moveTo(0, 3);
    h.run({ type: "insert-char", char: "!" });
    h.moveTo(0, 8);
    h.run({ type: "insert-text", text: " three" });
    h.moveTo(0, 0);
    h.moveTo(0, 4, true);
    h.run({ type: "delete-selection" });
    expect(h.value()).toBe(" two three");

    h.run({ type: "undo" });
    expect(h.value()).toBe("one! two three");
    expect(h.engine.getSelection()).toEqual({
      anchor: { line: 0, column: 0 },
      head: { line: 0, column: 4 },
    });

    h.run({ type: "undo" });
    expect(h.value()).toBe("one! two");
    expect(h.cursor()).toEqual([0, 8]);
    expect(h.engine.getSelection()).toBeNull();

    h.run({ type: "undo" });
    expect(h.value()).toBe("one two");
    expect(h.cursor()).toEqual([0, 3]);
    expect(h.engine.getSelection()).toBeNull();
    expect(h.engine.canUndo()).toBe(false);
  });

  it("stops recording events once the harness is destroyed", () => {
    const h = createTestHarness();
    h.typeText("a");
    expect(h.events).toHaveLength(2);
    h.destroy();
    h.typeText("b");
    expect(h.value()).toBe("ab");
    expect(h.events).toHaveLength(2);
  });

  it("undoes a run of typing in one step", () => {
    const h = createTestHarness();
    h.typeText("abc");
    h.run({ type: "undo" });
    expect(h.value()).toBe("");
    expect(h.engine.canUndo()).toBe(false);
  });

  it("groups consecutive backspaces", () => {
    const h = createTestHarness();
    h.typeText("abc");
    h.run({ type: "delete-backward" });
    h.run({ type: "delete-backward" });
    expect(h.value()).toBe("a");
    h.run({ type: "undo" });
    expect(h.value()).toBe("abc");
    expect(h.cursor()).toEqual([0, 3]);
    h.run({ type: "undo" });
    expect(h.value()).toBe("");
  });

  it("splits typing at a history boundary", () => {
    const h = createTestHarness();
    h.typeText("ab");
    h.run({ type: "history-boundary" });
    h.typeText("cd");
    h.run({ type: "undo" });
    expect(h.value()).toBe("ab");
  });

  it("splits typing when the cursor moves", () => {
    const h = createTestHarness();
    h.typeText("ab");
    h.run({ type: "move-cursor", movement: "left" });
    h.run({ type: "move-cursor", movement: "right" });
    h.typeText("c");
    h.run({ type: "undo" });
    expect(h.value()).toBe("ab");
  });

  it("clears redo after a new edit", () => {
    const h = createTestHarness();
    h.typeText("a");
    h.run({ type: "undo" });
    expect(h.engine.canRedo()).toBe(true);
    h.typeText("b");
    expect(h.engine.canRedo()).toBe(false);
  });

  it("reports undo on an empty history as not applied", () => {
    const h = createTestHarness();
    expect(h.run({ type: "undo" })).toEqual({ applied: false, events: [] });
  });

  it("replaces the selection when typing", () => {
    const h = createTestHarness({ value: "hello world" });
    h.run({ type: "select-word" });
    h.typeText("J");
    expect(h.value()).toBe("J world");
    h.typeText("o");
    h.run({ type: "undo" });
    expect(h.value()).toBe("J world");
    h.run({ type: "undo" });
    expect(h.value()).toBe("hello world");
  });

  it("normalizes inserted line endings", () => {
    const h = createTestHarness();
    h.run({ type: "insert-text", text: "a\r\nb\rc" });
    expect(h.value()).toBe("a\nb\nc");
    expect(h.cursor()).toEqual([2, 1]);
  });

  it("deletes the selection on backspace", () => {
    const h = createTestHarness({ value: "abcdef" });
    h.moveTo(0, 1);
    h.moveTo(0, 4, true);
    h.run({ type: "delete-backward" });
    expect(h.value()).toBe("aef");
    expect(h.cursor()).toEqual([0, 1]);
  });

  it("requires a selection for delete-selection", () => {
    const h = createTestHarness({ value: "abc" });
    const result = h.engine.dispatch({ type: "delete-selection" });
    expect(errorKind(result)).toBe("NoSelection");
    expect(h.value()).toBe("abc");
  });

  it("deletes words in both directions", () => {
    const h = createTestHarness({ value: "foo bar" });
    h.run({ type: "move-cursor", movement: "document-end" });
    h.run({ type: "delete-word-backward" });
    expect(h.value()).toBe("foo ");
    h.moveTo(0, 0);
    h.run({ type: "delete-word-forward" });
    expect(h.value()).toBe(" ");
  });

  it("deletes to the line start and end", () => {
    const h = createTestHarness({ value: "ab\ncd" });
    h.moveTo(0, 2);
    h.run({ type: "delete-to-line-end" });
    expect(h.value()).toBe("abcd");
    h.moveTo(0, 3);
    h.run({ type: "delete-to-line-start" });
    expect(h.value()).toBe("d");
    expect(h.cursor()).toEqual([0, 0]);
  });

  it("deletes whole lines", () => {
    const h = createTestHarness({ value: "one\ntwo\nthree" });
    h.moveTo(1, 1);
    h.run({ type: "delete-line" });
    expect(h.value()).toBe("one\nthree");
    expect(h.cursor()).toEqual([1, 0]);

    h.run({ type: "delete-line" });
    expect(h.value()).toBe("one");
    expect(h.cursor()).toEqual([0, 3]);

    h.run({ type: "delete-line" });
    expect(h.value()).toBe("");
    expect(h.run({ type: "delete-line" }).applied).toBe(false);
  });

  it("clamps explicit cursor moves", () => {
    const h = createTestHarness({ value: "ab\ncd" });
    h.moveTo(5, 99);
    expect(h.cursor()).toEqual([1, 2]);
  });

  it("resets everything on setValue", () => {
    const h = createTestHarness();
    h.typeText("abc");
    const result = h.engine.setValue("x\r\ny");
    expect(result.ok && result.value.applied).toBe(true);
    expect(h.value()).toBe("x\ny");
    expect(h.cursor()).toEqual([0, 0]);
    expect(h.engine.canUndo()).toBe(false);
    expect(h.engine.isModified()).toBe(false);
  });

  it("tracks the saved state", () => {
    const h = createTestHarness();
    h.typeText("a");
    expect(h.engine.isModified()).toBe(true);
    h.engine.markSaved();
    expect(h.engine.isModified()).toBe(false);
    h.run({ type: "undo" });
    expect(h.engine.isModified()).toBe(true);
  });

  it("evicts history past the configured depth", () => {
    const h = createTestHarness({ maxHistoryDepth: 2 });
    h.run({ type: "insert-text", text: "one " });
    h.run({ type: "insert-text", text: "two " });
    h.run({ type: "insert-text", text: "three" });
    h.run({ type: "undo" });
    h.run({ type: "undo" });
    expect(h.value()).toBe("one ");
    expect(h.engine.canUndo()).toBe(false);
  });
});

describe("ScribeEngine events", () => {
  it("emits text-changed before cursor-moved", () => {
    const h = createTestHarness();
    h.typeText("x");
    expect(h.events).toEqual([
      {
        type: "text-changed",
        edits: [{ offset: 0, deleted: "", inserted: "x" }],
      },
      { type: "cursor-moved", position: { line: 0, column: 1 } },
    ]);
  });

  it("emits selection changes for navigation without text changes", () => {
    const h = createTestHarness({ value: "ab" });
    h.run({ type: "move-cursor", movement: "right", extend: true });
    expect(h.events).toEqual([
      { type: "cursor-moved", position: { line: 0, column: 1 } },
      {
        type: "selection-changed",
        selection: {
          anchor: { line: 0, column: 0 },
          head: { line: 0, column: 1 },
        },
      },
    ]);
    h.clearEvents();
    h.run({ type: "clear-selection" });
    expect(h.events).toEqual([{ type: "selection-changed", selection: null }]);
  });

  it("returns the delivered events with the outcome", () => {
    const h = createTestHarness();
    const outcome = h.run({ type: "insert-char", char: "q" });
    expect(outcome.applied).toBe(true);
    expect(outcome.events).toEqual(h.events);
  });

  it("stops notifying after unsubscribe", () => {
    const engine = new ScribeEngine({ platform: "linux" });
    const seen: EditorEvent[] = [];
    const unsubscribe = engine.subscribe((event) => seen.push(event));
    engine.dispatch({ type: "insert-char", char: "a" });
    unsubscribe();
    engine.dispatch({ type: "insert-char", char: "b" });
    expect(seen).toHaveLength(2);
  });

  it("rejects commands issued from a listener", () => {
    const engine = new ScribeEngine({ platform: "linux" });
    const nested: Result<CommandOutcome>[] = [];
    engine.subscribe((event) => {
      if (event.type === "text-changed") {
        nested.push(engine.dispatch({ type: "insert-char", char: "!" }));
      }
    });
    engine.dispatch({ type: "insert-char", char: "a" });
    expect(nested).toHaveLength(1);
    expect(errorKind(nested[0])).toBe("Reentrant");
    expect(engine.getValue()).toBe("a");

    const afterwards = engine.dispatch({ type: "insert-char", char: "b" });
    expect(afterwards.ok).toBe(true);
  });

  it("keeps notifying listeners after one throws", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const engine = new ScribeEngine({ platform: "linux" });
    const seen: string[] = [];
    engine.subscribe(() => {
      throw new Error("listener broke");
    });
    engine.subscribe((event) => seen.push(event.type));
    engine.dispatch({ type: "insert-char", char: "a" });
    expect(seen).toEqual(["text-changed", "cursor-moved"]);
    expect(error).toHaveBeenCalledTimes(2);
  });

  it("logs commands when debug is enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const engine = new ScribeEngine({ platform: "linux", debug: true });
    engine.dispatch({ type: "select-all" });
    expect(log).toHaveBeenCalledWith("[scribe]", "dispatch", "select-all");
  });
});

describe("ScribeEngine clipboard", () => {
  it("copies the selection and pastes at the cursor", () => {
    const h = createTestHarness({ value: "hello world" });
    h.run({ type: "select-word" });
    h.run({ type: "copy" });
    expect(h.clipboard.getText()).toBe("hello");
    h.run({ type: "move-cursor", movement: "document-end" });
    h.run({ type: "paste" });
    expect(h.value()).toBe("hello worldhello");
    expect(h.cursor()).toEqual([0, 16]);
  });

  it("cuts the selection as one undoable edit", () => {
    const h = createTestHarness({ value: "hello world" });
    h.run({ type: "move-cursor", movement: "word-right", extend: true });
    h.run({ type: "cut" });
    expect(h.value()).toBe(" world");
    expect(h.clipboard.getText()).toBe("hello");
    h.run({ type: "undo" });
    expect(h.value()).toBe("hello world");
    expect(h.engine.getSelectedText()).toBe("hello");
  });

  it("pastes explicit text over the selection", () => {
    const h = createTestHarness({ value: "abc" });
    h.run({ type: "select-all" });
    h.run({ type: "paste", text: "x\r\ny" });
    expect(h.value()).toBe("x\ny");
  });

  it("requires a selection to copy or cut", () => {
    const h = createTestHarness({ value: "abc" });
    expect(errorKind(h.engine.dispatch({ type: "copy" }))).toBe("NoSelection");
    expect(errorKind(h.engine.dispatch({ type: "cut" }))).toBe("NoSelection");
  });

  it("does nothing when the clipboard is empty", () => {
    const h = createTestHarness({ value: "abc" });
    expect(h.run({ type: "paste" }).applied).toBe(false);
    expect(h.value()).toBe("abc");
  });
});

describe("ScribeEngine search", () => {
  it("finds a match and wraps around on find-next", () => {
    const h = createTestHarness({ value: "Hello, World!" });
    const found = h.run({ type: "find", query: "World" });
    expect(found.match).toEqual({ start: 7, end: 12 });
    expect(h.engine.getSelection()).toEqual({
      anchor: { line: 0, column: 7 },
      head: { line: 0, column: 12 },
    });

    const next = h.run({ type: "find-next" });
    expect(next.match).toEqual({ start: 7, end: 12 });
    expect(h.engine.getSearchState()).toEqual({
      query: "World",
      matches: [{ start: 7, end: 12 }],
      activeIndex: 0,
    });
  });

  it("moves between matches in both directions", () => {
    const h = createTestHarness({ value: "ab ab ab" });
    h.run({ type: "find", query: "ab" });
    expect(h.run({ type: "find-next" }).match).toEqual({ start: 3, end: 5 });
    expect(h.run({ type: "find-next" }).match).toEqual({ start: 6, end: 8 });
    expect(h.run({ type: "find-next" }).match).toEqual({ start: 0, end: 2 });
    expect(h.run({ type: "find-previous" }).match).toEqual({
      start: 6,
      end: 8,
    });
  });

  it("reports a missing match without moving", () => {
    const h = createTestHarness({ value: "abc" });
    const outcome = h.run({ type: "find", query: "zzz" });
    expect(outcome.applied).toBe(false);
    expect(outcome.match).toBeNull();
    expect(h.engine.getSelection()).toBeNull();
  });

  it("rejects empty queries", () => {
    const h = createTestHarness({ value: "abc" });
    expect(errorKind(h.engine.dispatch({ type: "find", query: "" }))).toBe(
      "InvalidRange",
    );
    expect(
      errorKind(
        h.engine.dispatch({ type: "replace-all", query: "", replacement: "x" }),
      ),
    ).toBe("InvalidRange");
    expect(errorKind(h.engine.dispatch({ type: "find-next" }))).toBe(
      "InvalidRange",
    );
  });

  it("replaces the selected match and selects the next one", () => {
    const h = createTestHarness({ value: "cat cat cat" });
    const first = h.run({ type: "replace", query: "cat", replacement: "dog" });
    expect(first.replacements).toBe(0);
    expect(first.match).toEqual({ start: 0, end: 3 });

    const second = h.run({ type: "replace", query: "cat", replacement: "dog" });
    expect(second.replacements).toBe(1);
    expect(h.value()).toBe("dog cat cat");
    expect(second.match).toEqual({ start: 4, end: 7 });
  });

  it("replaces all matches with one history entry each", () => {
    const h = createTestHarness({ value: "a.b.c" });
    const outcome = h.run({
      type: "replace-all",
      query: ".",
      replacement: "..",
    });
    expect(outcome.replacements).toBe(2);
    expect(h.value()).toBe("a..b..c");
    expect(h.events[0]).toEqual({
      type: "text-changed",
      edits: [
        { offset: 1, deleted: ".", inserted: ".." },
        { offset: 4, deleted: ".", inserted: ".." },
      ],
    });

    h.run({ type: "undo" });
    expect(h.value()).toBe("a..b.c");
    h.run({ type: "undo" });
    expect(h.value()).toBe("a.b.c");
  });

  it("replaces overlapping candidates left to right as first found", () => {
    const h = createTestHarness({ value: "aaaa" });
    const outcome = h.run({ type: "replace-all", query: "aa", replacement: "a" });
    expect(outcome.replacements).toBe(2);
    expect(h.value()).toBe("aa");
  });

  it("does not revisit text it inserted", () => {
    const h = createTestHarness({ value: "a-a" });
    const outcome = h.run({
      type: "replace-all",
      query: "a",
      replacement: "aa",
    });
    expect(outcome.replacements).toBe(2);
    expect(h.value()).toBe("aa-aa");
  });
});

describe("ScribeEngine keys", () => {
  it("undoes with Ctrl+Z on linux", () => {
    const h = createTestHarness();
    h.pressKey("a");
    h.pressKey("b", { shift: false });
    expect(h.value()).toBe("ab");
    const outcome = h.pressKey("z", { ctrl: true });
    expect(outcome.handled && outcome.command).toEqual({ type: "undo" });
    expect(h.value()).toBe("");
  });

  it("undoes with Cmd+Z on mac", () => {
    const h = createTestHarness({ platform: "mac" });
    h.pressKey("a");
    h.pressKey("z", { meta: true });
    expect(h.value()).toBe("");
  });

  it("inserts line breaks and typed characters", () => {
    const h = createTestHarness();
    h.pressKey("H", { shift: true });
    h.pressKey("Enter");
    h.pressKey(" ");
    expect(h.value()).toBe("H\n ");
  });

  it("reports unbound keys as unhandled", () => {
    const h = createTestHarness();
    expect(h.pressKey("F9")).toEqual({ handled: false, chord: "f9" });
  });

  it("applies keymap options over the defaults", () => {
    const h = createTestHarness({
      keymap: {
        bindings: [
          {
            chord: "alt+d",
            command: { type: "delete-line" },
            description: "Delete line",
          },
        ],
      },
    });
    h.run({ type: "insert-text", text: "one\ntwo" });
    h.pressKey("d", { alt: true });
    expect(h.value()).toBe("one");
  });

  it("reads keys from an attached source until detached", () => {
    const engine = new ScribeEngine({ platform: "linux" });
    let listener: ((event: KeyEvent) => void) | null = null;
    const detach = engine.attachKeySource({
      onKey(next) {
        listener = next;
        return () => {
          listener = null;
        };
      },
    });
    const send = (event: KeyEvent) => listener?.(event);
    send({ key: "o" });
    send({ key: "k" });
    detach();
    send({ key: "!" });
    expect(engine.getValue()).toBe("ok");
  });

  it("passes failed key commands to the error callback", () => {
    const engine = new ScribeEngine({ platform: "linux", value: "abc" });
    let listener: ((event: KeyEvent) => void) | null = null;
    const failures: [string, string][] = [];
    engine.attachKeySource(
      {
        onKey(next) {
          listener = next;
          return () => {
            listener = null;
          };
        },
      },
      (error, event) => {
        failures.push([error.kind, event.key]);
      },
    );
    const send = (event: KeyEvent) => listener?.(event);
    send({ key: "x", ctrl: true });
    expect(failures).toEqual([["NoSelection", "x"]]);
    expect(engine.getValue()).toBe("abc");
  });
});
