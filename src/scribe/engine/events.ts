import type { TextEdit } from "../core/change";
import type { Position, Selection } from "../core/types";

export type EditorEvent =
  | { type: "text-changed"; edits: TextEdit[] }
  | { type: "cursor-moved"; position: Position }
  | { type: "selection-changed"; selection: Selection | null };

export type EditorListener = (event: EditorEvent) => void;

function removeFromArray<T>(arr: T[], value: T) {
  const index = arr.indexOf(value);
  if (index === -1) {
    return;
  }
  arr.splice(index, 1);
}

/** Ordered listener list. Listeners run in the order they subscribed. */
export class ListenerRegistry {
  private listeners: EditorListener[] = [];

  get size(): number {
    return this.listeners.length;
  }

  subscribe(listener: EditorListener): () => void {
    this.listeners.push(listener);
    return () => removeFromArray(this.listeners, listener);
  }

  emit(events: readonly EditorEvent[]) {
    if (events.length === 0) {
      return;
    }
    // A listener may unsubscribe while we iterate.
    const listeners = [...this.listeners];
    for (const event of events) {
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          console.error(`[scribe] ${event.type} listener failed`, error);
        }
      }
    }
  }
}
