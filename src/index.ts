import type { OCRLayoutConfig, OCRLayoutConfigInput } from './types/config.js';
import { resolveLayoutConfig } from './types/config.js';
import type { BoundingBoxParseResult, OCRRegion } from './types/ocr.js';
import type { CalibrationState, LayoutConstants } from './core/layout/types.js';
import type { CalibrationStore } from './core/layout/calibration-store.js';
import { FileCalibrationStore } from './core/layout/calibration-store.js';
import { LayoutConstantEstimator } from './core/layout/constants-estimator.js';
import { TextLineAssembler } from './core/text-line-assembler.js';
import { parseDocument } from './core/geometry.js';
import { createDebugLogger } from './utils/debug.js';

export type ConversionResult =
  | {
      ok: true;
      text: string;
      lines: string[];
      constants: LayoutConstants;
      /** Bounding boxes that were malformed and replaced by a zero rectangle. */
      degradedBoxes: number;
    }
  | { ok: false; error: string };

export const CONVERSION_FAILED_PREFIX = 'conversion failed: ';

export class OCRLayoutConverter {
  private config: OCRLayoutConfig;
  private store: CalibrationStore;
  private estimator: LayoutConstantEstimator;
  private assembler: TextLineAssembler;
  private readonly debug: (...args: unknown[]) => void;

  constructor(config: OCRLayoutConfigInput = {}) {
    this.config = resolveLayoutConfig(config);
    this.store = this.config.calibrationStore ?? new FileCalibrationStore(this.config.constantsFile);
    this.estimator = new LayoutConstantEstimator(this.store, this.config);
    this.assembler = new TextLineAssembler({ sameLineThresholdRatio: this.config.sameLineThresholdRatio });
    this.debug = createDebugLogger('ocr-layout', this.config.debug);
  }

  estimateLayoutConstants(regions: OCRRegion[]): LayoutConstants {
    return this.estimator.estimate(regions);
  }

  convertRegionsToTextLines(regions: OCRRegion[], charHeight: number, lineHeightMultiplier: number): string[] {
    return this.assembler.assemble(regions, charHeight, lineHeightMultiplier);
  }

  /**
   * Full conversion with diagnostics. Structure problems in the document are
   * reported through `{ ok: false }`; this method does not throw.
   */
  convert(document: unknown): ConversionResult {
    const degraded: BoundingBoxParseResult[] = [];
    try {
      const regions = parseDocument(document, (r) => degraded.push(r));
      if (degraded.length > 0) {
        this.debug(`${degraded.length} malformed bounding box(es) defaulted to 0,0,0,0`, degraded.map((d) => d.source));
      }

      const constants = this.estimateLayoutConstants(regions);
      this.debug('layout constants', constants);

      const lines = this.convertRegionsToTextLines(regions, constants.charHeight, constants.lineHeightMultiplier);
      return { ok: true, text: lines.join('\n'), lines, constants, degradedBoxes: degraded.length };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  /** Layout-preserving plain text, or a "conversion failed: ..." diagnostic. */
  convertJsonToText(document: unknown): string {
    const result = this.convert(document);
    return result.ok ? result.text : `${CONVERSION_FAILED_PREFIX}${result.error}`;
  }

  getCalibration(): CalibrationState | null {
    return this.store.load();
  }

  resetCalibration(): void {
    this.store.clear();
  }
}

export type { OCRLayoutConfig, OCRLayoutConfigInput, LayoutDefaults } from './types/config.js';
export { DEFAULT_LAYOUT_CONFIG, loadConfigFromEnv, resolveLayoutConfig } from './types/config.js';
export type {
  BoundingBox,
  BoundingBoxParseResult,
  OCRLine,
  OCRRegion,
  OCRWord,
  RawOCRDocument
} from './types/ocr.js';
export { TextDirection } from './types/ocr.js';
export type { CalibrationState, LayoutConstants, RowGroup, SampleCounts } from './core/layout/types.js';
export { Fragment } from './core/layout/types.js';
export type { CalibrationStore } from './core/layout/calibration-store.js';
export { FileCalibrationStore, MemoryCalibrationStore } from './core/layout/calibration-store.js';
export { LayoutConstantEstimator } from './core/layout/constants-estimator.js';
export { collectHorizontalFragments, computeLineSpacing, groupFragmentsByLine } from './core/layout/fragment-clusterer.js';
export {
  computeBlankLinesBetween,
  computeRowIndentSpaces,
  joinFragmentsWithSpacing
} from './core/layout/spacing.js';
export { TextLineAssembler } from './core/text-line-assembler.js';
export { parseBoundingBox, parseDocument, parseRegion } from './core/geometry.js';
export { DocumentStructureError } from './core/errors.js';
export default OCRLayoutConverter;
