import { existsSync, readFileSync, rmSync, writeFileSync } from 'fs';
import type { CalibrationState, SampleCounts } from './types.js';
import { isRecord } from '../../utils/guards.js';

/**
 * Persistence seam for calibration constants. `load` never throws: a missing
 * or unreadable store is reported as `null` (no history). `save` may throw;
 * callers decide whether a failed write matters.
 *
 * There is no locking. Two processes sharing one store race on `save` and the
 * last write wins.
 */
export interface CalibrationStore {
  load(): CalibrationState | null;
  save(state: CalibrationState): void;
  clear(): void;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string') {
    const n = Number.parseFloat(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

function toCount(value: unknown): number {
  return Math.max(0, Math.trunc(toNumber(value)));
}

/** Coerces whatever was read from disk into a well-typed state. */
export function normalizeCalibrationState(raw: unknown): CalibrationState | null {
  if (!isRecord(raw)) return null;
  const counts = raw.sample_counts;
  const sampleCounts: SampleCounts = { char: 0, line: 0 };
  if (isRecord(counts)) {
    sampleCounts.char = toCount(counts.char);
    sampleCounts.line = toCount(counts.line);
  }
  return {
    char_height: toNumber(raw.char_height),
    line_height_multiplier: toNumber(raw.line_height_multiplier),
    sample_counts: sampleCounts,
    updated_at: toCount(raw.updated_at)
  };
}

export class FileCalibrationStore implements CalibrationStore {
  constructor(readonly filePath: string) {}

  load(): CalibrationState | null {
    if (!existsSync(this.filePath)) return null;
    try {
      return normalizeCalibrationState(JSON.parse(readFileSync(this.filePath, 'utf-8')));
    } catch (error) {
      console.warn(`[calibration] Ignoring unreadable constants file ${this.filePath}:`, error);
      return null;
    }
  }

  save(state: CalibrationState): void {
    writeFileSync(this.filePath, JSON.stringify(state, null, 2), 'utf-8');
  }

  clear(): void {
    rmSync(this.filePath, { force: true });
  }
}

export class MemoryCalibrationStore implements CalibrationStore {
  private state: CalibrationState | null;

  constructor(initial: CalibrationState | null = null) {
    this.state = initial ? structuredClone(initial) : null;
  }

  load(): CalibrationState | null {
    return this.state ? structuredClone(this.state) : null;
  }

  save(state: CalibrationState): void {
    this.state = structuredClone(state);
  }

  clear(): void {
    this.state = null;
  }
}
