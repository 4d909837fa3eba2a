import type { OCRRegion } from '../types/ocr.js';
import { TextDirection } from '../types/ocr.js';
import type { RowGroup } from './layout/types.js';
import {
  collectHorizontalFragments,
  computeLineSpacing,
  DEFAULT_SAME_LINE_RATIO,
  groupFragmentsByLine
} from './layout/fragment-clusterer.js';
import {
  computeBlankLinesBetween,
  computeRowIndentSpaces,
  documentLeftEdge,
  joinFragmentsWithSpacing
} from './layout/spacing.js';

export type AssemblerOptions = {
  sameLineThresholdRatio?: number;
};

/**
 * Turns parsed regions into plain text lines that keep the page layout:
 * indentation and gaps become spaces, vertical gaps become blank lines.
 * Vertical-direction regions follow all horizontal text, unformatted.
 */
export class TextLineAssembler {
  private readonly ratio: number;

  constructor(options: AssemblerOptions = {}) {
    this.ratio = options.sameLineThresholdRatio ?? DEFAULT_SAME_LINE_RATIO;
  }

  assemble(regions: OCRRegion[], charHeight: number, lineHeightMultiplier: number): string[] {
    return [
      ...this.assembleHorizontal(regions, charHeight, lineHeightMultiplier),
      ...this.assembleVertical(regions)
    ];
  }

  private assembleHorizontal(regions: OCRRegion[], charHeight: number, lineHeightMultiplier: number): string[] {
    const fragments = collectHorizontalFragments(regions);
    if (fragments.length === 0) return [];

    const lineSpacing = computeLineSpacing(charHeight, lineHeightMultiplier);
    const rows = groupFragmentsByLine(fragments, lineSpacing, this.ratio);
    const baseLeft = documentLeftEdge(fragments);

    const out: string[] = [];
    let prevRow: RowGroup | null = null;

    for (const row of rows) {
      if (prevRow) {
        const blanks = computeBlankLinesBetween(prevRow, row, lineSpacing);
        for (let i = 0; i < blanks; i++) out.push('');
      }

      const text = joinFragmentsWithSpacing(row, charHeight).trim();
      // Skipped rows do not count as the previous row for gap measurement.
      if (!text) continue;

      out.push(' '.repeat(computeRowIndentSpaces(row, baseLeft, charHeight)) + text);
      prevRow = row;
    }

    return out;
  }

  private assembleVertical(regions: OCRRegion[]): string[] {
    const out: string[] = [];
    const vertical = regions
      .filter((r) => r.dir === TextDirection.Vertical)
      .sort((a, b) => a.boundingBox.x - b.boundingBox.x);

    for (const region of vertical) {
      const lines = [...region.lines].sort((a, b) => a.boundingBox.x - b.boundingBox.x);
      for (const line of lines) {
        const text = line.text.trim();
        if (text) out.push(text);
      }
    }

    return out;
  }
}
