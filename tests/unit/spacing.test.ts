import { describe, it, expect } from 'vitest';
import {
  computeBlankLinesBetween,
  computeRowIndentSpaces,
  documentLeftEdge,
  joinFragmentsWithSpacing,
  pixelsToSpaces
} from '../../src/core/layout/spacing.js';
import { Fragment } from '../../src/core/layout/types.js';

describe('joinFragmentsWithSpacing', () => {
  it('inserts four spaces for a gap of twice the char height', () => {
    const row = [new Fragment('ab', 0, 0, 50, 20), new Fragment('cd', 90, 0, 50, 20)];
    expect(joinFragmentsWithSpacing(row, 20)).toBe('ab    cd');
  });

  it('concatenates overlapping fragments without a separator', () => {
    const row = [new Fragment('ab', 0, 0, 50, 20), new Fragment('cd', 40, 0, 50, 20)];
    expect(joinFragmentsWithSpacing(row, 20)).toBe('abcd');
  });

  it('substitutes 32px for a non-positive char height', () => {
    const row = [new Fragment('a', 0, 0, 10, 20), new Fragment('b', 42, 0, 10, 20)];
    expect(joinFragmentsWithSpacing(row, 0)).toBe('a  b');
  });

  it('sends an exact half-space gap to the even count', () => {
    // 8px at 32px -> 0.5 -> 0 spaces; 24px -> 1.5 -> 2 spaces
    const tight = [new Fragment('ab', 0, 0, 10, 20), new Fragment('cd', 18, 0, 10, 20)];
    const wide = [new Fragment('ab', 0, 0, 10, 20), new Fragment('cd', 34, 0, 10, 20)];
    expect(joinFragmentsWithSpacing(tight, 32)).toBe('abcd');
    expect(joinFragmentsWithSpacing(wide, 32)).toBe('ab  cd');
  });

  it('returns an empty string for an empty row', () => {
    expect(joinFragmentsWithSpacing([], 20)).toBe('');
  });
});

describe('computeRowIndentSpaces', () => {
  it('measures from the document left edge', () => {
    const row = [new Fragment('x', 160, 0, 10, 10), new Fragment('y', 130, 0, 10, 10)];
    expect(computeRowIndentSpaces(row, 100, 30)).toBe(2);
  });

  it('never goes negative', () => {
    expect(computeRowIndentSpaces([new Fragment('x', 50, 0, 10, 10)], 100, 30)).toBe(0);
  });

  it('finds the document left edge', () => {
    expect(documentLeftEdge([new Fragment('a', 40, 0, 1, 1), new Fragment('b', 12, 9, 1, 1)])).toBe(12);
    expect(documentLeftEdge([])).toBe(0);
  });

  it('rounds to the nearest space count', () => {
    expect(pixelsToSpaces(14, 40)).toBe(1);
    expect(pixelsToSpaces(9, 40)).toBe(0);
  });

  it('rounds an indent of exactly half a space count to even', () => {
    // 40px at 32px -> 2.5 -> 2; 56px -> 3.5 -> 4
    expect(computeRowIndentSpaces([new Fragment('x', 40, 0, 10, 10)], 0, 32)).toBe(2);
    expect(computeRowIndentSpaces([new Fragment('x', 56, 0, 10, 10)], 0, 32)).toBe(4);
  });
});

describe('computeBlankLinesBetween', () => {
  const prev = [new Fragment('a', 0, 0, 10, 20), new Fragment('b', 20, 5, 10, 10)];

  it('gives one blank line for a gap of exactly one line spacing', () => {
    expect(computeBlankLinesBetween(prev, [new Fragment('c', 0, 95, 10, 20)], 75)).toBe(1);
  });

  it('gives none for a gap just under the line spacing', () => {
    expect(computeBlankLinesBetween(prev, [new Fragment('c', 0, 94, 10, 20)], 75)).toBe(0);
  });

  it('floors multiple line spacings', () => {
    expect(computeBlankLinesBetween(prev, [new Fragment('c', 0, 200, 10, 20)], 75)).toBe(2);
  });

  it('returns zero for a non-positive line spacing', () => {
    expect(computeBlankLinesBetween(prev, [new Fragment('c', 0, 200, 10, 20)], 0)).toBe(0);
  });
});
