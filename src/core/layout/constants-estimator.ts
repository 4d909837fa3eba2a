import type { OCRRegion } from '../../types/ocr.js';
import type { OCRLayoutConfig } from '../../types/config.js';
import { DEFAULT_LAYOUT_CONFIG } from '../../types/config.js';
import type { CalibrationStore } from './calibration-store.js';
import type { CalibrationState, LayoutConstants, SampleCounts } from './types.js';
import { clamp, containsCjk, robustMedian, roundHalfEven } from './stats.js';
import { createDebugLogger } from '../../utils/debug.js';

export type EstimatorOptions = Pick<
  OCRLayoutConfig,
  'defaults' | 'multiplierRange' | 'sparseThresholds' | 'maxBlendWeight' | 'maxSampleCount' | 'debug'
>;

type LayoutSamples = {
  charHeights: number[];
  lineHeights: number[];
};

function roundTo(value: number, digits: number): number {
  const f = Math.pow(10, digits);
  return roundHalfEven(value * f) / f;
}

/**
 * Estimates the body-text character height and line-height multiplier of a
 * page, then folds the result into the calibration history held by `store`.
 *
 * Char height comes only from words containing CJK ideographs, whose boxes
 * are close to square and therefore a reliable size reference.
 */
export class LayoutConstantEstimator {
  private readonly options: EstimatorOptions;
  private readonly debug: (...args: unknown[]) => void;

  constructor(
    private readonly store: CalibrationStore,
    options: Partial<EstimatorOptions> = {}
  ) {
    this.options = { ...DEFAULT_LAYOUT_CONFIG, ...options };
    this.debug = createDebugLogger('estimator', this.options.debug);
  }

  collectSamples(regions: OCRRegion[]): LayoutSamples {
    const charHeights: number[] = [];
    const lineHeights: number[] = [];

    for (const region of regions) {
      for (const line of region.lines) {
        if (line.boundingBox.height > 0) {
          lineHeights.push(line.boundingBox.height);
        } else if (line.textHeight > 0) {
          lineHeights.push(line.textHeight);
        }

        for (const w of line.words) {
          if (!w.word) continue;
          if (containsCjk(w.word) && w.boundingBox.height > 0) {
            charHeights.push(w.boundingBox.height);
          }
        }
      }
    }

    return { charHeights, lineHeights };
  }

  estimate(regions: OCRRegion[]): LayoutConstants {
    const { defaults, multiplierRange, sparseThresholds, maxBlendWeight, maxSampleCount } = this.options;
    const { charHeights, lineHeights } = this.collectSamples(regions);
    const charN = charHeights.length;
    const lineN = lineHeights.length;

    const sparseChar = charN < sparseThresholds.char;
    const sparseLine = lineN < sparseThresholds.line;

    const currentCharHeight = sparseChar ? 0 : robustMedian(charHeights);
    const currentLineHeight = sparseLine ? 0 : robustMedian(lineHeights);

    // Median of per-sample ratios rather than a ratio of medians.
    let currentMultiplier = 0;
    if (currentCharHeight > 0 && currentLineHeight > 0) {
      currentMultiplier = robustMedian(
        lineHeights.filter((lh) => lh > 0).map((lh) => lh / currentCharHeight)
      );
    }

    const prev = this.store.load();
    const prevCharHeight = prev?.char_height ?? 0;
    const prevMultiplier = prev?.line_height_multiplier ?? 0;
    const prevCharN = prev?.sample_counts.char ?? 0;
    const prevLineN = prev?.sample_counts.line ?? 0;

    let finalCharHeight = currentCharHeight;
    let finalMultiplier = currentMultiplier;

    if (prevCharHeight > 0) {
      if (sparseChar || currentCharHeight <= 0) {
        finalCharHeight = prevCharHeight;
      } else {
        const w = Math.min(maxBlendWeight, charN / (charN + prevCharN + 1e-6));
        finalCharHeight = w * currentCharHeight + (1 - w) * prevCharHeight;
      }
    }

    if (prevMultiplier > 0) {
      if (sparseLine || currentMultiplier <= 0) {
        finalMultiplier = prevMultiplier;
      } else {
        const w = Math.min(maxBlendWeight, lineN / (lineN + prevLineN + 1e-6));
        finalMultiplier = w * currentMultiplier + (1 - w) * prevMultiplier;
      }
    }

    if (finalCharHeight <= 0) finalCharHeight = defaults.charHeight;
    if (finalMultiplier <= 0) finalMultiplier = defaults.lineHeightMultiplier;
    finalMultiplier = clamp(finalMultiplier, multiplierRange[0], multiplierRange[1]);

    const sampleCounts: SampleCounts = { char: charN, line: lineN };
    this.debug('samples', sampleCounts, 'current', { currentCharHeight, currentMultiplier }, 'previous', {
      prevCharHeight,
      prevMultiplier
    });

    this.persist({
      char_height: roundTo(finalCharHeight, 2),
      line_height_multiplier: roundTo(finalMultiplier, 3),
      sample_counts: {
        char: Math.min(maxSampleCount, prevCharN + charN),
        line: Math.min(maxSampleCount, prevLineN + lineN)
      },
      updated_at: Math.floor(Date.now() / 1000)
    });

    return {
      charHeight: finalCharHeight,
      lineHeightMultiplier: finalMultiplier,
      sampleCounts
    };
  }

  private persist(state: CalibrationState): void {
    try {
      this.store.save(state);
    } catch (error) {
      // The estimate is still usable; only cross-run memory is lost.
      console.warn('[estimator] Failed to persist layout constants:', error);
    }
  }
}
