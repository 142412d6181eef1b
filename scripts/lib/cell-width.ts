import { eastAsianWidth } from "get-east-asian-width";
import { EncodingError } from "./errors.js";

const ZERO_WIDTH = /^[\p{Mn}\p{Me}\p{Cf}]$/u;

export function isSurrogate(codePoint: number): boolean {
  return codePoint >= 0xd800 && codePoint <= 0xdfff;
}

/**
 * Terminal cell width of a code point: 2 for East Asian wide/fullwidth,
 * 0 for combining and format characters, -1 for control characters
 * (which occupy no cell).
 */
export function cellWidth(codePoint: number): number {
  if (isSurrogate(codePoint) || codePoint > 0x10ffff || codePoint < 0) {
    throw new EncodingError(`Unable to convert U+${codePoint.toString(16).toUpperCase()} to a character cell`, {
      codePoint,
    });
  }
  if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) return -1;
  if (ZERO_WIDTH.test(String.fromCodePoint(codePoint))) return 0;
  return eastAsianWidth(codePoint);
}

export interface CellFit {
  /** Cells used by the whole text */
  cells: number;
  /** UTF-16 length of the longest prefix that stays within the budget */
  length: number;
}

/**
 * Measure `text` in character cells and find how much of it fits in `budget`.
 * The prefix always holds at least one code point so callers make progress.
 * With `skipInvalid`, lone surrogates count as zero cells instead of failing.
 */
export function fitToCells(text: string, budget: number, skipInvalid = false): CellFit {
  let cells = 0;
  let length = -1;
  let i = 0;
  while (i < text.length) {
    const cp = text.codePointAt(i) ?? 0;
    const w = skipInvalid && isSurrogate(cp) ? 0 : cellWidth(cp);
    if (w >= 0) cells += w;
    const next = i + (cp > 0xffff ? 2 : 1);
    if (cells > budget && length < 0) {
      length = i > 0 ? i : next;
    }
    i = next;
  }
  return { cells, length: length < 0 ? text.length : length };
}
