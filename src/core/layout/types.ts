export type SampleCounts = {
  char: number;
  line: number;
};

export type LayoutConstants = {
  charHeight: number;
  lineHeightMultiplier: number;
  /** Raw samples taken from the current document, before any blending. */
  sampleCounts: SampleCounts;
};

/** On-disk shape of the calibration file; keys stay snake_case for compatibility. */
export type CalibrationState = {
  char_height: number;
  line_height_multiplier: number;
  sample_counts: SampleCounts;
  updated_at: number;
};

export type RowGroup = readonly Fragment[];

/**
 * One horizontal OCR line reduced to text plus geometry. Immutable; the
 * vertical midpoint is derived on access.
 */
export class Fragment {
  constructor(
    readonly text: string,
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number
  ) {}

  get yMid(): number {
    return this.y + this.height / 2;
  }

  get right(): number {
    return this.x + this.width;
  }

  get bottom(): number {
    return this.y + this.height;
  }
}
