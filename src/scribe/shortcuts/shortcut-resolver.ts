import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import defaultKeymapData from "./default-keymap.json";
import {
  KeymapError,
  chordFromEvent,
  chordId,
  formatChord as formatChordLabel,
  normalizeChord,
  parseChord,
  printableText,
  type Chord,
  type KeyEvent,
  type PrimaryModifierTable,
} from "./keys";
import { EditorCommandSchema, type EditorCommand } from "../core/commands";
import { detectPlatform, platforms, type Platform } from "../shared/platform";

const PlatformSchema = Type.Union([
  Type.Literal("mac"),
  Type.Literal("windows"),
  Type.Literal("linux"),
]);

const PrimaryModifierSchema = Type.Union([
  Type.Literal("ctrl"),
  Type.Literal("meta"),
]);

const KeymapBindingSchema = Type.Object({
  chord: Type.String({ minLength: 1 }),
  command: EditorCommandSchema,
  description: Type.String(),
});

export const KeymapSchema = Type.Object({
  primaryModifier: Type.Optional(
    Type.Record(PlatformSchema, PrimaryModifierSchema),
  ),
  bindings: Type.Array(KeymapBindingSchema),
  overrides: Type.Optional(
    Type.Partial(Type.Record(PlatformSchema, Type.Array(KeymapBindingSchema))),
  ),
});

export type Keymap = Static<typeof KeymapSchema>;

export type ShortcutBinding = {
  chord: string;
  command: EditorCommand;
  description: string;
  /** Present on overrides that only apply to one platform. */
  platform?: Platform;
};

export type ResolvedKey =
  | { type: "command"; command: EditorCommand; binding: ShortcutBinding }
  | { type: "character"; text: string }
  | { type: "unhandled"; chord: string };

export type ShortcutResolverOptions = {
  platform?: Platform;
  /** Replaces the default keymap. Validated like `loadKeymap` input. */
  keymap?: unknown;
};

const FALLBACK_PRIMARY: PrimaryModifierTable = {
  mac: "meta",
  windows: "ctrl",
  linux: "ctrl",
};

export function validateKeymap(config: unknown): Keymap {
  if (Value.Check(KeymapSchema, config)) {
    return config;
  }
  const issues = [...Value.Errors(KeymapSchema, config)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
  throw new KeymapError("Invalid keymap", issues);
}

export const defaultKeymap: Keymap = validateKeymap(defaultKeymapData);

/**
 * Maps key events to editor commands. Bindings are keyed by normalized chord
 * id, so `meta+z` on mac and `ctrl+z` elsewhere both land on `primary+z`.
 */
export class ShortcutResolver {
  readonly platform: Platform;
  private primary: PrimaryModifierTable = { ...FALLBACK_PRIMARY };
  private portable = new Map<string, ShortcutBinding>();
  private overrides = new Map<Platform, Map<string, ShortcutBinding>>();

  constructor(options: ShortcutResolverOptions = {}) {
    this.platform = options.platform ?? detectPlatform();
    this.loadKeymap(options.keymap ?? defaultKeymap);
  }

  /**
   * Validates external keymap data and merges it over the current table.
   * Throws `KeymapError` without touching the table when the data is invalid.
   */
  loadKeymap(config: unknown) {
    const keymap = validateKeymap(config);
    const primary = { ...this.primary, ...keymap.primaryModifier };

    // Parse everything first so a bad chord leaves the table untouched.
    const portable = keymap.bindings.map((binding) => ({
      id: this.idFor(binding.chord, primary[this.platform]),
      binding: { ...binding },
    }));
    const overrides = platforms.flatMap((platform) =>
      (keymap.overrides?.[platform] ?? []).map((binding) => ({
        platform,
        id: this.idFor(binding.chord, primary[platform]),
        binding: { ...binding, platform },
      })),
    );

    // Ids depend on the primary modifier, so existing bindings are re-keyed
    // from their chord strings before the new ones are added.
    this.portable = this.rekey(this.portable, primary[this.platform]);
    for (const platform of platforms) {
      const table = this.overrides.get(platform);
      if (table) {
        this.overrides.set(platform, this.rekey(table, primary[platform]));
      }
    }
    this.primary = primary;
    for (const { id, binding } of portable) {
      this.portable.set(id, binding);
    }
    for (const { platform, id, binding } of overrides) {
      this.tableFor(platform).set(id, binding);
    }
  }

  /** Adds or replaces a binding. Returns the binding it replaced. */
  addBinding(binding: ShortcutBinding): ShortcutBinding | null {
    if (!Value.Check(EditorCommandSchema, binding.command)) {
      throw new KeymapError(`Invalid command bound to "${binding.chord}"`);
    }
    const table = binding.platform
      ? this.tableFor(binding.platform)
      : this.portable;
    const id = this.idFor(
      binding.chord,
      this.primary[binding.platform ?? this.platform],
    );
    const previous = table.get(id) ?? null;
    table.set(id, { ...binding });
    return previous;
  }

  removeBinding(chord: string, platform?: Platform): boolean {
    const table = platform ? this.tableFor(platform) : this.portable;
    return table.delete(
      this.idFor(chord, this.primary[platform ?? this.platform]),
    );
  }

  /** Bindings in effect on the active platform. */
  getBindings(): ShortcutBinding[] {
    const active = this.tableFor(this.platform);
    const effective = [...this.portable].map(
      ([id, binding]) => active.get(id) ?? binding,
    );
    for (const [id, binding] of active) {
      if (!this.portable.has(id)) {
        effective.push(binding);
      }
    }
    return effective;
  }

  lookup(chord: string): ShortcutBinding | null {
    return this.find(this.idFor(chord, this.primary[this.platform]));
  }

  resolve(event: KeyEvent): ResolvedKey {
    const chord = this.normalize(chordFromEvent(event));
    const id = chordId(chord);
    const binding = this.find(id);
    if (binding) {
      return { type: "command", command: binding.command, binding };
    }
    const text = printableText(event);
    if (text !== null) {
      return { type: "character", text };
    }
    return { type: "unhandled", chord: id };
  }

  formatChord(chord: string): string {
    const parsed = this.parse(chord, this.primary[this.platform]);
    return formatChordLabel(parsed, this.platform);
  }

  private find(id: string): ShortcutBinding | null {
    const override = this.tableFor(this.platform).get(id);
    return override ?? this.portable.get(id) ?? null;
  }

  private normalize(chord: Chord): Chord {
    return normalizeChord(chord, this.primary[this.platform]);
  }

  private parse(chord: string, primary: "ctrl" | "meta"): Chord {
    return normalizeChord(parseChord(chord), primary);
  }

  private idFor(chord: string, primary: "ctrl" | "meta"): string {
    return chordId(this.parse(chord, primary));
  }

  private rekey(
    table: Map<string, ShortcutBinding>,
    primary: "ctrl" | "meta",
  ): Map<string, ShortcutBinding> {
    return new Map(
      [...table.values()].map((binding): [string, ShortcutBinding] => [
        this.idFor(binding.chord, primary),
        binding,
      ]),
    );
  }

    private tableFor(platform: Platform): Map<string, ShortcutBinding> {
    let table = this.overrides.get(platform);
    if (!table) {
      table = new Map();
      this.overrides.set(platform, table);
    }
    return table;
  }
}
