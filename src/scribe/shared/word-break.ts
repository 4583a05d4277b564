export type CharClass = "word" | "punctuation" | "whitespace";

const WHITESPACE = /^\s$/u;
const WORD = /^[\p{L}\p{M}\p{N}_]$/u;

export function charClass(char: string): CharClass {
  if (WHITESPACE.test(char)) {
    return "whitespace";
  }
  if (WORD.test(char)) {
    return "word";
  }
  return "punctuation";
}

/** End of the class run that starts at `column`. */
export function runEnd(chars: string[], column: number): number {
  if (column >= chars.length) {
    return chars.length;
  }
  const kind = charClass(chars[column]);
  let end = column + 1;
  while (end < chars.length && charClass(chars[end]) === kind) {
    end += 1;
  }
  return end;
}

/** Start of the class run that ends at `column`. */
export function runStart(chars: string[], column: number): number {
  if (column <= 0) {
    return 0;
  }
  const kind = charClass(chars[column - 1]);
  let start = column - 1;
  while (start > 0 && charClass(chars[start - 1]) === kind) {
    start -= 1;
  }
  return start;
}

export function skipWhitespaceForward(chars: string[], column: number): number {
  let next = column;
  while (next < chars.length && charClass(chars[next]) === "whitespace") {
    next += 1;
  }
  return next;
}

export function skipWhitespaceBackward(
  chars: string[],
  column: number,
): number {
  let previous = column;
  while (previous > 0 && charClass(chars[previous - 1]) === "whitespace") {
    previous -= 1;
  }
  return previous;
}

/**
 * Bounds of the class run under `column`. A cursor sitting on whitespace just
 * after a non-whitespace run picks that run instead.
 */
export function getWordBoundaries(
  chars: string[],
  column: number,
): { start: number; end: number } {
  if (chars.length === 0) {
    return { start: 0, end: 0 };
  }

  let anchor = Math.max(0, Math.min(column, chars.length));
  const under = anchor < chars.length ? charClass(chars[anchor]) : null;
  if (
    anchor > 0 &&
    (under === null || under === "whitespace") &&
    charClass(chars[anchor - 1]) !== "whitespace"
  ) {
    anchor -= 1;
  }
  if (anchor >= chars.length) {
    anchor = chars.length - 1;
  }

  return {
    start: runStart(chars, anchor + 1),
    end: runEnd(chars, anchor),
  };
}

export function firstNonWhitespace(chars: string[]): number {
  const column = skipWhitespaceForward(chars, 0);
  return column === chars.length ? 0 : column;
}
