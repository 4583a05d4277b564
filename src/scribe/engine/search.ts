import type { Offset, Range } from "../core/types";
import { scalarLength } from "../shared/segmenter";

export type SearchState = {
  query: string | null;
  matches: Range[];
  /** Index of the match that is currently selected, or -1. */
  activeIndex: number;
};

/** Non-overlapping exact matches of `query`, in scalar offsets. */
export function findAll(text: string, query: string): Range[] {
  if (query === "") {
    return [];
  }
  const queryLength = scalarLength(query);
  const matches: Range[] = [];
  let scanned = 0;
  let scannedScalars = 0;
  let index = text.indexOf(query);
  while (index !== -1) {
    scannedScalars += scalarLength(text.slice(scanned, index));
    scanned = index;
    matches.push({ start: scannedScalars, end: scannedScalars + queryLength });
    index = text.indexOf(query, index + query.length);
  }
  return matches;
}

/** First match starting at or after `from`, wrapping to the first match. */
export function nextMatch(matches: Range[], from: Offset): Range | null {
  return matches.find((match) => match.start >= from) ?? matches[0] ?? null;
}

/** Last match starting before `from`, wrapping to the last match. */
export function previousMatch(matches: Range[], from: Offset): Range | null {
  for (let i = matches.length - 1; i >= 0; i -= 1) {
    if (matches[i].start < from) {
      return matches[i];
    }
  }
  return matches[matches.length - 1] ?? null;
}
