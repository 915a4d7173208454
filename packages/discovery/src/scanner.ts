/**
 * Delimiter-balance scanning over registration source.
 *
 * Nothing here understands the grammar. Comments and the contents of string
 * literals are blanked out (`maskSource`) so later stages can search for
 * brackets, commas, and keywords with plain string operations while every
 * offset still points into the original text.
 */

export interface StringToken {
  /** Offset of the prefix, or of the opening quote when unprefixed */
  readonly start: number;
  readonly quoteStart: number;
  /** Exclusive */
  readonly end: number;
  /** Lower-cased prefix letters (`r`, `b`, `f`, `rb`, ...) */
  readonly prefix: string;
  readonly delimiter: string;
  readonly terminated: boolean;
}

export interface LogicalLine {
  /** Masked statement text, continuations joined and whitespace collapsed */
  readonly text: string;
  readonly start: number;
  readonly end: number;
  /** 1-based line of the first physical line */
  readonly line: number;
  /** Leading whitespace width of the first physical line */
  readonly indent: number;
}

export interface Segment {
  readonly start: number;
  readonly end: number;
}

const OPENERS: ReadonlyMap<string, string> = new Map([
  ["(", ")"],
  ["[", "]"],
  ["{", "}"],
]);
const CLOSERS = new Set([")", "]", "}"]);
const STRING_PREFIXES = new Set(["r", "u", "b", "f", "br", "rb", "fr", "rf"]);

export function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z0-9_]$/.test(ch);
}

/**
 * Offset where the prefix of the string whose quote sits at `quoteIndex`
 * begins (equal to `quoteIndex` when there is none).
 */
export function stringPrefixStart(source: string, quoteIndex: number): number {
  let k = quoteIndex;
  while (k > 0 && quoteIndex - k < 2 && /^[rRbBuUfF]$/.test(source.charAt(k - 1))) {
    k--;
  }
  if (k === quoteIndex) return k;
  const prefix = source.slice(k, quoteIndex).toLowerCase();
  if (!STRING_PREFIXES.has(prefix) || isIdentifierChar(source[k - 1])) return quoteIndex;
  return k;
}

/** Read the string literal whose opening quote is at `quoteIndex`. */
export function readStringToken(source: string, quoteIndex: number): StringToken {
  const start = stringPrefixStart(source, quoteIndex);
  const quote = source.charAt(quoteIndex);
  const triple = source.startsWith(quote.repeat(3), quoteIndex);
  const delimiter = triple ? quote.repeat(3) : quote;
  const prefix = source.slice(start, quoteIndex).toLowerCase();

  let i = quoteIndex + delimiter.length;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (source.startsWith(delimiter, i)) {
      return { start, quoteStart: quoteIndex, end: i + delimiter.length, prefix, delimiter, terminated: true };
    }
    if (!triple && ch === "\n") break;
    i++;
  }
  return {
    start,
    quoteStart: quoteIndex,
    end: Math.min(i, source.length),
    prefix,
    delimiter,
    terminated: false,
  };
}

function blank(text: string): string {
  return text.replace(/[^\n]/g, " ");
}

/**
 * Replace comments and string contents with spaces. Quote characters,
 * newlines, and the overall length are preserved.
 */
export function maskSource(source: string): string {
  const out: string[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (ch === "#") {
      const newline = source.indexOf("\n", i);
      const end = newline === -1 ? source.length : newline;
      out.push(" ".repeat(end - i));
      i = end;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const token = readStringToken(source, i);
      const open = token.delimiter.length;
      const close = token.terminated ? token.delimiter.length : 0;
      out.push(token.delimiter);
      out.push(blank(source.slice(i + open, token.end - close)));
      if (token.terminated) out.push(token.delimiter);
      i = token.end;
      continue;
    }
    out.push(ch);
    i++;
  }
  return out.join("");
}

/**
 * Index of the bracket closing the one at `openIndex` in masked text,
 * or -1 when the brackets do not balance.
 */
export function findClosing(masked: string, openIndex: number): number {
  const stack: string[] = [];
  for (let i = openIndex; i < masked.length; i++) {
    const ch = masked.charAt(i);
    const closer = OPENERS.get(ch);
    if (closer !== undefined) {
      stack.push(closer);
      continue;
    }
    if (CLOSERS.has(ch)) {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i;
    }
  }
  return -1;
}

/** Split `[start, end)` of masked text on `separator` at bracket depth zero. */
export function splitTopLevel(
  masked: string,
  start: number,
  end: number,
  separator = ",",
): Segment[] {
  const segments: Segment[] = [];
  let depth = 0;
  let segmentStart = start;
  for (let i = start; i < end; i++) {
    const ch = masked.charAt(i);
    if (OPENERS.has(ch)) depth++;
    else if (CLOSERS.has(ch)) depth--;
    else if (ch === separator && depth === 0) {
      segments.push({ start: segmentStart, end: i });
      segmentStart = i + 1;
    }
  }
  segments.push({ start: segmentStart, end });
  return segments;
}

/** 1-based line and column of `offset`. */
export function lineColumn(source: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

/**
 * Group masked text into logical lines: physical lines joined while a
 * bracket is open or the line ends in a backslash. Blank lines are dropped.
 */
export function logicalLines(masked: string): LogicalLine[] {
  const lines: LogicalLine[] = [];
  let depth = 0;
  let start = 0;
  let startLine = 1;
  let currentLine = 1;

  const emit = (end: number): void => {
    const raw = masked.slice(start, end);
    const text = raw
      .replace(/\\\r?\n/g, " ")
      .replace(/\s+/g, " ")
      .trim();
    if (text !== "") {
      const indent = /^[ \t]*/.exec(raw)?.[0].length ?? 0;
      lines.push({ text, start, end, line: startLine, indent });
    }
  };

  for (let i = 0; i < masked.length; i++) {
    const ch = masked.charAt(i);
    if (OPENERS.has(ch)) depth++;
    else if (CLOSERS.has(ch)) depth = Math.max(0, depth - 1);
    else if (ch === "\n") {
      currentLine++;
      const continued = masked.charAt(i - 1) === "\\" || masked.slice(i - 2, i) === "\\\r";
      if (depth > 0 || continued) continue;
      emit(i);
      start = i + 1;
      startLine = currentLine;
    }
  }
  emit(masked.length);
  return lines;
}
