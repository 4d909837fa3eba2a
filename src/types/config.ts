import type { CalibrationStore } from '../core/layout/calibration-store.js';

export interface LayoutDefaults {
  charHeight: number;
  lineHeightMultiplier: number;
}

export interface OCRLayoutConfig {
  // Calibration persistence
  constantsFile: string;
  calibrationStore?: CalibrationStore;

  // Row clustering: share of the line spacing within which fragments count as one row
  sameLineThresholdRatio: number;

  // Estimation tuning
  defaults: LayoutDefaults;
  multiplierRange: [number, number];
  sparseThresholds: { char: number; line: number };
  maxBlendWeight: number;
  maxSampleCount: number;

  debug?: boolean;
}

export type OCRLayoutConfigInput = Partial<Omit<OCRLayoutConfig, 'defaults' | 'sparseThresholds'>> & {
  defaults?: Partial<LayoutDefaults>;
  sparseThresholds?: Partial<OCRLayoutConfig['sparseThresholds']>;
};

export const DEFAULT_LAYOUT_CONFIG: OCRLayoutConfig = {
  constantsFile: 'ocr_layout_constants.json',
  sameLineThresholdRatio: 0.4,
  defaults: {
    charHeight: 32.0,
    lineHeightMultiplier: 1.5
  },
  multiplierRange: [1.2, 2.0],
  sparseThresholds: { char: 5, line: 3 },
  maxBlendWeight: 0.7,
  maxSampleCount: 1000,
  debug: false
};

export function resolveLayoutConfig(input: OCRLayoutConfigInput = {}): OCRLayoutConfig {
  return {
    ...DEFAULT_LAYOUT_CONFIG,
    ...input,
    defaults: { ...DEFAULT_LAYOUT_CONFIG.defaults, ...input.defaults },
    sparseThresholds: { ...DEFAULT_LAYOUT_CONFIG.sparseThresholds, ...input.sparseThresholds }
  };
}

/**
 * Reads overrides from environment variables:
 * OCR_LAYOUT_CONSTANTS_FILE, OCR_LAYOUT_SAME_LINE_RATIO and OCR_LAYOUT_DEBUG.
 * Unset or unparsable values are left out so the defaults apply.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined>): OCRLayoutConfigInput {
  const out: OCRLayoutConfigInput = {};

  const file = env.OCR_LAYOUT_CONSTANTS_FILE?.trim();
  if (file) out.constantsFile = file;

  const ratio = Number.parseFloat(env.OCR_LAYOUT_SAME_LINE_RATIO ?? '');
  if (Number.isFinite(ratio) && ratio > 0) out.sameLineThresholdRatio = ratio;

  if (env.OCR_LAYOUT_DEBUG === '1' || env.OCR_LAYOUT_DEBUG === 'true') out.debug = true;

  return out;
}
