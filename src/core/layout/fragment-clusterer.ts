import type { OCRRegion } from '../../types/ocr.js';
import { TextDirection } from '../../types/ocr.js';
import { Fragment } from './types.js';
import type { RowGroup } from './types.js';

export const DEFAULT_SAME_LINE_RATIO = 0.4;

export function computeLineSpacing(charHeight: number, lineHeightMultiplier: number): number {
  return Math.max(1.0, charHeight * lineHeightMultiplier);
}

/**
 * One fragment per non-empty line of every horizontal region, positioned by
 * the line's own bounding box.
 */
export function collectHorizontalFragments(regions: OCRRegion[]): Fragment[] {
  const fragments: Fragment[] = [];
  for (const region of regions) {
    if (region.dir !== TextDirection.Horizontal) continue;
    for (const line of region.lines) {
      if (!line.text) continue;
      const box = line.boundingBox;
      fragments.push(new Fragment(line.text.trim(), box.x, box.y, box.width, box.height));
    }
  }
  return fragments;
}

function byX(a: Fragment, b: Fragment): number {
  return a.x - b.x;
}

/**
 * Groups fragments into visual rows in a single forward pass over the
 * fragments sorted by vertical midpoint. A fragment joins the open row when
 * it lies within `max(1, ratio * lineSpacing)` of the row's running mean
 * midpoint; otherwise the row is closed and a new one opened.
 *
 * Relies on Array.prototype.sort being stable (guaranteed since ES2019):
 * fragments with equal midpoints keep their input order, and so do fragments
 * sharing an x inside a row.
 */
export function groupFragmentsByLine(
  fragments: readonly Fragment[],
  lineSpacing: number,
  ratio: number = DEFAULT_SAME_LINE_RATIO
): RowGroup[] {
  if (fragments.length === 0) return [];

  const ordered = [...fragments].sort((a, b) => a.yMid - b.yMid);
  const threshold = Math.max(1.0, ratio * lineSpacing);

  const groups: RowGroup[] = [];
  let current: Fragment[] = [];
  let currentMid = 0;

  for (const item of ordered) {
    if (current.length > 0 && Math.abs(item.yMid - currentMid) <= threshold) {
      current = [...current, item];
      currentMid = (currentMid * (current.length - 1) + item.yMid) / current.length;
      continue;
    }
    if (current.length > 0) groups.push([...current].sort(byX));
    current = [item];
    currentMid = item.yMid;
  }

  if (current.length > 0) groups.push([...current].sort(byX));
  return groups;
}
