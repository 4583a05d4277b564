// Positions inside the engine count Unicode scalar values, while JavaScript
// strings index UTF-16 code units. These helpers convert between the two.

function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) > 0x7f) {
      return false;
    }
  }
  return true;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Width in code units of the scalar starting at `index`. */
function scalarWidthAt(text: string, index: number): number {
  const code = text.charCodeAt(index);
  if (
    isHighSurrogate(code) &&
    index + 1 < text.length &&
    isLowSurrogate(text.charCodeAt(index + 1))
  ) {
    return 2;
  }
  return 1;
}

export function scalarLength(text: string): number {
  if (isAsciiText(text)) {
    return text.length;
  }

  let count = 0;
  for (let i = 0; i < text.length; i += scalarWidthAt(text, i)) {
    count += 1;
  }
  return count;
}

/** Code unit indexes at which a surrogate pair starts, ascending. */
export function surrogatePairStarts(text: string): number[] {
  const starts: number[] = [];
  if (isAsciiText(text)) {
    return starts;
  }
  for (let i = 0; i < text.length; i += 1) {
    if (scalarWidthAt(text, i) === 2) {
      starts.push(i);
      i += 1;
    }
  }
  return starts;
}

export function scalars(text: string): string[] {
  return Array.from(text);
}

export function isSingleScalar(text: string): boolean {
  return text.length > 0 && scalarWidthAt(text, 0) === text.length;
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}
