import type { Platform } from "../shared/platform";
import { isSingleScalar } from "../shared/segmenter";

/** Raw key event as delivered by the host, shaped like a DOM KeyboardEvent. */
export type KeyEvent = {
  key: string;
  ctrl?: boolean;
  alt?: boolean;
  shift?: boolean;
  meta?: boolean;
};

export type PhysicalModifier = "ctrl" | "alt" | "shift" | "meta";

/** `primary` stands for the platform's command modifier. */
export type Modifier = "primary" | PhysicalModifier;

export type PrimaryModifierTable = Record<Platform, "ctrl" | "meta">;

export type Chord = {
  key: string;
  modifiers: ReadonlySet<Modifier>;
};

export class KeymapError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.join("\n")}` : message);
    this.name = "KeymapError";
    this.issues = issues;
  }
}

const MODIFIER_ORDER: readonly Modifier[] = [
  "primary",
  "ctrl",
  "alt",
  "shift",
  "meta",
];

const MODIFIER_ALIASES: Record<string, Modifier> = {
  primary: "primary",
  mod: "primary",
  ctrl: "ctrl",
  control: "ctrl",
  alt: "alt",
  option: "alt",
  opt: "alt",
  shift: "shift",
  meta: "meta",
  cmd: "meta",
  command: "meta",
  super: "meta",
  win: "meta",
};

const KEY_ALIASES: Record<string, string> = {
  arrowleft: "left",
  arrowright: "right",
  arrowup: "up",
  arrowdown: "down",
  spacebar: "space",
  esc: "escape",
  return: "enter",
  del: "delete",
  pgup: "pageup",
  pgdn: "pagedown",
};

const KEY_LABELS: Record<string, string> = {
  left: "Left",
  right: "Right",
  up: "Up",
  down: "Down",
  space: "Space",
  escape: "Esc",
  enter: "Enter",
  tab: "Tab",
  backspace: "Backspace",
  delete: "Delete",
  home: "Home",
  end: "End",
  pageup: "PageUp",
  pagedown: "PageDown",
  insert: "Insert",
};

export function normalizeKey(key: string): string {
  if (key === " ") {
    return "space";
  }
  const lower = key.toLowerCase();
  if (isSingleScalar(key)) {
    return lower;
  }
  return KEY_ALIASES[lower] ?? lower;
}

/**
 * Parses chord strings such as `"primary+shift+z"` or `"alt+left"`. A
 * trailing `"++"` names the plus key itself.
 */
export function parseChord(text: string): Chord {
  const trimmed = text.trim();
  let key: string;
  let names: string[];
  if (trimmed === "+") {
    key = "+";
    names = [];
  } else if (trimmed.endsWith("++")) {
    key = "+";
    names = trimmed.slice(0, -2).split("+");
  } else {
    const parts = trimmed.split("+");
    key = parts[parts.length - 1] ?? "";
    names = parts.slice(0, -1);
  }

  if (key === "") {
    throw new KeymapError(`Chord "${text}" has no key`);
  }

  const modifiers = new Set<Modifier>();
  for (const name of names) {
    const modifier = MODIFIER_ALIASES[name.trim().toLowerCase()];
    if (!modifier) {
      throw new KeymapError(`Chord "${text}" has unknown modifier "${name}"`);
    }
    modifiers.add(modifier);
  }

  return { key: normalizeKey(key.trim()), modifiers };
}

export function chordFromEvent(event: KeyEvent): Chord {
  const modifiers = new Set<Modifier>();
  if (event.ctrl) modifiers.add("ctrl");
  if (event.alt) modifiers.add("alt");
  if (event.shift) modifiers.add("shift");
  if (event.meta) modifiers.add("meta");
  return { key: normalizeKey(event.key), modifiers };
}

/** Folds the platform's primary physical modifier into `primary`. */
export function normalizeChord(
  chord: Chord,
  primary: PhysicalModifier,
): Chord {
  const modifiers = new Set<Modifier>();
  for (const modifier of chord.modifiers) {
    modifiers.add(modifier === primary ? "primary" : modifier);
  }
  return { key: chord.key, modifiers };
}

/** Canonical string used as the binding table key. */
export function chordId(chord: Chord): string {
  return [
    ...MODIFIER_ORDER.filter((modifier) => chord.modifiers.has(modifier)),
    chord.key,
  ].join("+");
}

/** Display form of a chord, e.g. `Cmd+Shift+Z` on mac. */
export function formatChord(chord: Chord, platform: Platform): string {
  const mac = platform === "mac";
  const labels: Record<Modifier, string> = {
    primary: mac ? "Cmd" : "Ctrl",
    ctrl: "Ctrl",
    alt: mac ? "Option" : "Alt",
    shift: "Shift",
    meta: mac ? "Cmd" : "Super",
  };
  const names = MODIFIER_ORDER.filter((modifier) =>
    chord.modifiers.has(modifier),
  ).map((modifier) => labels[modifier]);
  const key =
    KEY_LABELS[chord.key] ??
    (/^f\d{1,2}$/.test(chord.key) ? chord.key.toUpperCase() : chord.key);
  return [...names, key.length === 1 ? key.toUpperCase() : key].join("+");
}

/**
 * Text typed by the event when it is not a shortcut: a single printable
 * scalar with no modifier other than shift.
 */
export function printableText(event: KeyEvent): string | null {
  if (event.ctrl || event.alt || event.meta) {
    return null;
  }
  if (!isSingleScalar(event.key)) {
    return null;
  }
  const code = event.key.codePointAt(0) ?? 0;
  if (code < 0x20 || code === 0x7f) {
    return null;
  }
  return event.key;
}

/** Host-side producer of key events, e.g. a terminal or DOM adapter. */
export type KeyEventSource = {
  onKey(listener: (event: KeyEvent) => void): () => void;
};
