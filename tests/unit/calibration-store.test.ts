import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  FileCalibrationStore,
  MemoryCalibrationStore,
  normalizeCalibrationState
} from '../../src/core/layout/calibration-store.js';
import { LayoutConstantEstimator } from '../../src/core/layout/constants-estimator.js';
import type { CalibrationState } from '../../src/core/layout/types.js';
import { sampleRegion } from '../test-utils.js';

const state: CalibrationState = {
  char_height: 36.5,
  line_height_multiplier: 1.625,
  sample_counts: { char: 12, line: 7 },
  updated_at: 1700000000
};

describe('FileCalibrationStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ocr-layout-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('reports no history when the file is missing', () => {
    expect(new FileCalibrationStore(join(dir, 'constants.json')).load()).toBeNull();
  });

  it('writes pretty-printed JSON and reads it back', () => {
    const file = join(dir, 'constants.json');
    const store = new FileCalibrationStore(file);
    store.save(state);
    expect(readFileSync(file, 'utf-8')).toBe(JSON.stringify(state, null, 2));
    expect(store.load()).toEqual(state);
  });

  it('treats invalid JSON as a cold start', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const file = join(dir, 'constants.json');
    writeFileSync(file, '{ not json', 'utf-8');
    expect(new FileCalibrationStore(file).load()).toBeNull();
  });

  it('treats a non-object payload as a cold start', () => {
    const file = join(dir, 'constants.json');
    writeFileSync(file, '[1, 2, 3]', 'utf-8');
    expect(new FileCalibrationStore(file).load()).toBeNull();
  });

  it('clears the file', () => {
    const file = join(dir, 'constants.json');
    const store = new FileCalibrationStore(file);
    store.save(state);
    store.clear();
    expect(existsSync(file)).toBe(false);
    expect(() => store.clear()).not.toThrow();
  });

  it('lets the estimator carry on when the file cannot be written', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = new FileCalibrationStore(join(dir, 'missing-dir', 'constants.json'));
    const estimator = new LayoutConstantEstimator(store);
    const result = estimator.estimate([sampleRegion({ lines: 3, lineHeight: 60, cjkWords: 5, charHeight: 40 })]);
    expect(result.charHeight).toBe(40);
    expect(result.lineHeightMultiplier).toBe(1.5);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('normalizeCalibrationState', () => {
  it('coerces loosely typed values', () => {
    expect(
      normalizeCalibrationState({ char_height: '30.5', line_height_multiplier: null, sample_counts: { char: 4.7 } })
    ).toEqual({
      char_height: 30.5,
      line_height_multiplier: 0,
      sample_counts: { char: 4, line: 0 },
      updated_at: 0
    });
  });
});

describe('MemoryCalibrationStore', () => {
  it('hands out copies so callers cannot mutate stored state', () => {
    const store = new MemoryCalibrationStore(state);
    const loaded = store.load();
    expect(loaded).toEqual(state);
    if (loaded) loaded.sample_counts.char = 999;
    expect(store.load()?.sample_counts.char).toBe(12);
  });
});
