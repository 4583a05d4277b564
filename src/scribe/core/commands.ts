import { Type, type Static } from "@sinclair/typebox";

// Commands are plain data so keymaps can name them in JSON. The schemas below
// validate external keymaps, and the static types are derived from them.

export const CursorMovementSchema = Type.Union([
  Type.Literal("left"),
  Type.Literal("right"),
  Type.Literal("up"),
  Type.Literal("down"),
  Type.Literal("word-left"),
  Type.Literal("word-right"),
  Type.Literal("line-start"),
  Type.Literal("line-end"),
  Type.Literal("document-start"),
  Type.Literal("document-end"),
  Type.Literal("page-up"),
  Type.Literal("page-down"),
]);

export type CursorMovement = Static<typeof CursorMovementSchema>;

const PositionSchema = Type.Object({
  line: Type.Integer({ minimum: 0 }),
  column: Type.Integer({ minimum: 0 }),
});

function command<T extends string>(type: T) {
  return Type.Object({ type: Type.Literal(type) });
}

export const EditorCommandSchema = Type.Union([
  // Text mutation
  Type.Object({
    type: Type.Literal("insert-char"),
    char: Type.String({ minLength: 1 }),
  }),
  Type.Object({ type: Type.Literal("insert-text"), text: Type.String() }),
  command("delete-forward"),
  command("delete-backward"),
  command("delete-word-forward"),
  command("delete-word-backward"),
  command("delete-to-line-start"),
  command("delete-to-line-end"),
  command("delete-line"),
  command("delete-selection"),

  // Navigation
  Type.Object({
    type: Type.Literal("move-cursor"),
    movement: CursorMovementSchema,
    extend: Type.Optional(Type.Boolean()),
  }),
  Type.Object({
    type: Type.Literal("move-cursor-to"),
    position: PositionSchema,
    extend: Type.Optional(Type.Boolean()),
  }),

  // Selection
  command("start-selection"),
  command("end-selection"),
  command("select-all"),
  command("select-line"),
  command("select-word"),
  command("clear-selection"),

  // History
  command("undo"),
  command("redo"),
  command("history-boundary"),

  // Clipboard
  command("cut"),
  command("copy"),
  Type.Object({
    type: Type.Literal("paste"),
    text: Type.Optional(Type.String()),
  }),

  // Search
  Type.Object({ type: Type.Literal("find"), query: Type.String() }),
  command("find-next"),
  command("find-previous"),
  Type.Object({
    type: Type.Literal("replace"),
    query: Type.String(),
    replacement: Type.String(),
  }),
  Type.Object({
    type: Type.Literal("replace-all"),
    query: Type.String(),
    replacement: Type.String(),
  }),
]);

export type EditorCommand = Static<typeof EditorCommandSchema>;

export type EditorCommandType = EditorCommand["type"];

const textMutationTypes = [
  "insert-char",
  "insert-text",
  "delete-forward",
  "delete-backward",
  "delete-word-forward",
  "delete-word-backward",
  "delete-to-line-start",
  "delete-to-line-end",
  "delete-line",
  "delete-selection",
  "cut",
  "paste",
  "replace",
  "replace-all",
] as const;

const navigationTypes = [
  "move-cursor",
  "move-cursor-to",
  "start-selection",
  "end-selection",
  "select-all",
  "select-line",
  "select-word",
  "clear-selection",
] as const;

const textMutationSet: ReadonlySet<string> = new Set(textMutationTypes);
const navigationSet: ReadonlySet<string> = new Set(navigationTypes);

export type TextMutationCommand = Extract<
  EditorCommand,
  { type: (typeof textMutationTypes)[number] }
>;

export type NavigationCommand = Extract<
  EditorCommand,
  { type: (typeof navigationTypes)[number] }
>;

/** Type guard for commands that can change the buffer */
export function isTextMutation(
  command: EditorCommand,
): command is TextMutationCommand {
  return textMutationSet.has(command.type);
}

/** Type guard for commands that only move the cursor or selection */
export function isNavigation(
  command: EditorCommand,
): command is NavigationCommand {
  return navigationSet.has(command.type);
}
