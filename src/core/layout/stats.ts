export function median(arr: readonly number[]): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Median that tolerates junk samples: falls back to the first value when the
 * median is not a finite number (e.g. a NaN slipped into the set).
 */
export function robustMedian(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = median(values);
  return Number.isFinite(m) ? m : values[0];
}

/** Rounds to the nearest integer, sending exact halves to the even neighbour (2.5 -> 2, 3.5 -> 4). */
export function roundHalfEven(v: number): number {
  const r = Math.round(v);
  return Math.abs(v % 1) === 0.5 && r % 2 !== 0 ? r - 1 : r;
}

export function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

// CJK Unified Ideographs, Extension A, and Extensions B through E.
const CJK_IDEOGRAPH_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x4e00, 0x9fff],
  [0x3400, 0x4dbf],
  [0x20000, 0x2a6df],
  [0x2a700, 0x2b73f],
  [0x2b740, 0x2b81f],
  [0x2b820, 0x2ceaf]
];

export function isCjkIdeograph(cp: number): boolean {
  return CJK_IDEOGRAPH_RANGES.some(([lo, hi]) => cp >= lo && cp <= hi);
}

export function containsCjk(text: string): boolean {
  for (const ch of text) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined && isCjkIdeograph(cp)) return true;
  }
  return false;
}
