import type { Fragment, RowGroup } from './types.js';
import { roundHalfEven } from './stats.js';

// Guard value for a degenerate char height reaching this module.
const FALLBACK_CHAR_HEIGHT = 32.0;

// Two spaces of monospaced output cover one body character.
const SPACES_PER_CHAR = 2;

function usableCharHeight(charHeight: number): number {
  return charHeight > 0 ? charHeight : FALLBACK_CHAR_HEIGHT;
}

export function pixelsToSpaces(px: number, charHeight: number): number {
  return Math.max(0, roundHalfEven((Math.max(0, px) / usableCharHeight(charHeight)) * SPACES_PER_CHAR));
}

/** Left text margin: the smallest x over every fragment of the document. */
export function documentLeftEdge(fragments: readonly Fragment[]): number {
  if (fragments.length === 0) return 0;
  return Math.min(...fragments.map((f) => f.x));
}

export function computeRowIndentSpaces(row: RowGroup, baseLeft: number, charHeight: number): number {
  if (row.length === 0) return 0;
  const leftX = Math.min(...row.map((f) => f.x));
  return pixelsToSpaces(leftX - baseLeft, charHeight);
}

/** Joins a left-to-right row, turning each horizontal gap into spaces. */
export function joinFragmentsWithSpacing(row: RowGroup, charHeight: number): string {
  const parts: string[] = [];
  let prev: Fragment | null = null;

  for (const frag of row) {
    if (prev) {
      const spaces = pixelsToSpaces(frag.x - prev.right, charHeight);
      if (spaces > 0) parts.push(' '.repeat(spaces));
    }
    parts.push(frag.text);
    prev = frag;
  }

  return parts.join('');
}

/**
 * Blank lines to place between two rows: the distance from the previous
 * row's lowest bottom edge to the next row's top, in whole line spacings.
 */
export function computeBlankLinesBetween(prevRow: RowGroup, currRow: RowGroup, lineSpacing: number): number {
  if (prevRow.length === 0 || currRow.length === 0 || lineSpacing <= 0) return 0;
  const prevBottom = Math.max(...prevRow.map((f) => f.bottom));
  const currTop = Math.min(...currRow.map((f) => f.y));
  const gapPx = Math.max(0, currTop - prevBottom);
  return Math.max(0, Math.floor(gapPx / lineSpacing));
}
