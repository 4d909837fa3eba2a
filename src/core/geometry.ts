import type {
  BoundingBox,
  BoundingBoxParseResult,
  OCRLine,
  OCRRegion,
  OCRWord
} from '../types/ocr.js';
import { TextDirection } from '../types/ocr.js';
import { DocumentStructureError } from './errors.js';
import { isRecord } from '../utils/guards.js';

export const ZERO_BOX: Readonly<BoundingBox> = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });

const INTEGER_TOKEN = /^[+-]?\d+$/;

export type DegradedBoxHandler = (result: BoundingBoxParseResult) => void;

/**
 * Parses "x,y,w,h" or the quad form "x1,y1,x2,y2,x3,y3,x4,y4". A quad is
 * reduced to its axis-aligned bounding rectangle; rotation is discarded.
 * Never throws: anything malformed comes back tagged `defaulted` with a zero box.
 */
export function parseBoundingBox(source: unknown): BoundingBoxParseResult {
  const raw = typeof source === 'string' ? source : '';
  const defaulted: BoundingBoxParseResult = { status: 'defaulted', box: { ...ZERO_BOX }, source: raw };
  if (typeof source !== 'string') return defaulted;

  const parts = raw
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  if (!parts.every((p) => INTEGER_TOKEN.test(p))) return defaulted;
  const values = parts.map((p) => Number.parseInt(p, 10));

  if (values.length === 4) {
    const [x, y, width, height] = values;
    if (width < 0 || height < 0) return defaulted;
    return { status: 'parsed', box: { x, y, width, height }, source: raw };
  }

  if (values.length === 8) {
    const xs = [values[0], values[2], values[4], values[6]];
    const ys = [values[1], values[3], values[5], values[7]];
    const minX = Math.min(...xs);
    const minY = Math.min(...ys);
    return {
      status: 'parsed',
      box: { x: minX, y: minY, width: Math.max(...xs) - minX, height: Math.max(...ys) - minY },
      source: raw
    };
  }

  return defaulted;
}

/** Convenience form of {@link parseBoundingBox} that drops the tag. */
export function boundingBoxFromString(source: unknown): BoundingBox {
  return parseBoundingBox(source).box;
}

function asRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new DocumentStructureError(`${what} must be an object`);
  }
  return value;
}

function asArray(value: unknown, what: string): unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new DocumentStructureError(`${what} must be an array`);
  }
  return value;
}

function asString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function readBox(value: unknown, onDegraded?: DegradedBoxHandler): BoundingBox {
  const result = parseBoundingBox(value === undefined ? '0,0,0,0' : value);
  if (result.status === 'defaulted') onDegraded?.(result);
  return result.box;
}

// A missing key means horizontal; a present non-string value matches neither direction.
function readDirection(value: unknown): string {
  if (value === undefined) return TextDirection.Horizontal;
  return typeof value === 'string' ? value : '';
}

function readTextHeight(value: unknown): number {
  if (value === undefined || value === null || value === '' || value === 0) return 0;
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : 0;
  if (typeof value === 'string' && INTEGER_TOKEN.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  throw new DocumentStructureError(`invalid text_height: ${String(value)}`);
}

export function parseWord(data: unknown, onDegraded?: DegradedBoxHandler): OCRWord {
  const record = asRecord(data, 'word');
  return {
    word: asString(record.word, ''),
    boundingBox: readBox(record.boundingBox, onDegraded)
  };
}

export function parseLine(data: unknown, onDegraded?: DegradedBoxHandler): OCRLine {
  const record = asRecord(data, 'line');
  const style = record.style;
  return {
    text: asString(record.text, ''),
    words: asArray(record.words, 'line.words').map((w) => parseWord(w, onDegraded)),
    boundingBox: readBox(record.boundingBox, onDegraded),
    textHeight: readTextHeight(record.text_height),
    style: style === undefined || style === null ? '' : String(style)
  };
}

export function parseRegion(data: unknown, onDegraded?: DegradedBoxHandler): OCRRegion {
  const record = asRecord(data, 'region');
  return {
    lang: asString(record.lang, ''),
    dir: readDirection(record.dir),
    lines: asArray(record.lines, 'region.lines').map((l) => parseLine(l, onDegraded)),
    boundingBox: readBox(record.boundingBox, onDegraded)
  };
}

/**
 * Extracts the region list from a full OCR response. The top-level `Result`
 * key is mandatory; everything below it degrades to defaults.
 */
export function parseDocument(document: unknown, onDegraded?: DegradedBoxHandler): OCRRegion[] {
  const root = asRecord(document, 'document');
  if (!('Result' in root)) {
    throw new DocumentStructureError("missing 'Result' field in OCR JSON");
  }
  const result = asRecord(root.Result, 'Result');
  return asArray(result.regions, 'Result.regions').map((r) => parseRegion(r, onDegraded));
}
