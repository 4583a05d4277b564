/** Host clipboard. `getText` returns null when there is nothing to paste. */
export type ClipboardProvider = {
  getText(): string | null;
  setText(text: string): void;
};

/** Clipboard for hosts without system clipboard access, and for tests. */
export class MemoryClipboard implements ClipboardProvider {
  private content: string | null = null;

  getText(): string | null {
    return this.content;
  }

  setText(text: string) {
    this.content = text;
  }
}
