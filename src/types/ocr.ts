// Raw shapes as returned by the OCR service. Every field is optional;
// parsing fills in defaults.

export interface RawOCRDocument {
  Result?: RawOCRResult;
  [key: string]: unknown;
}

export interface RawOCRResult {
  regions?: RawOCRRegion[];
  [key: string]: unknown;
}

export interface RawOCRRegion {
  lang?: string;
  dir?: string;
  boundingBox?: string;
  lines?: RawOCRLine[];
}

export interface RawOCRLine {
  text?: string;
  boundingBox?: string;
  text_height?: number | string;
  style?: string;
  words?: RawOCRWord[];
}

export interface RawOCRWord {
  word?: string;
  boundingBox?: string;
}

export enum TextDirection {
  Horizontal = 'h',
  Vertical = 'v'
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type BoundingBoxParseResult =
  | { status: 'parsed'; box: BoundingBox; source: string }
  | { status: 'defaulted'; box: BoundingBox; source: string };

export interface OCRWord {
  word: string;
  boundingBox: BoundingBox;
}

export interface OCRLine {
  text: string;
  words: OCRWord[];
  boundingBox: BoundingBox;
  textHeight: number;
  style: string;
}

export interface OCRRegion {
  lang: string;
  /** 'h' or 'v' for well-formed input; anything else is carried through and ignored by layout. */
  dir: string;
  lines: OCRLine[];
  boundingBox: BoundingBox;
}
