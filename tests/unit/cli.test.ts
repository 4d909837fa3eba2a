import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { defaultOutputPath, parseArgs, run } from '../../src/cli.js';

describe('cli', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ocr-layout-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('parses flags and the input path', () => {
    expect(parseArgs(['page.json', '--out', 'page.txt', '--constants', 'c.json', '--debug'])).toEqual({
      input: 'page.json',
      out: 'page.txt',
      constantsFile: 'c.json',
      debug: true,
      help: false
    });
  });

  it('derives the output path from the input name', () => {
    expect(defaultOutputPath('scan_ocr.json')).toBe('scan_ocr.txt');
    expect(defaultOutputPath('SCAN.JSON')).toBe('SCAN.txt');
    expect(defaultOutputPath('scan.json')).toBe('scan.txt');
    expect(defaultOutputPath('scan')).toBe('scan.txt');
  });

  it('writes the reconstructed text next to the input', () => {
    const input = join(dir, 'page_ocr.json');
    writeFileSync(
      input,
      JSON.stringify({
        Result: {
          regions: [
            {
              dir: 'h',
              lines: [
                { text: 'Title', boundingBox: '0,0,200,20' },
                { text: 'Body', boundingBox: '0,100,200,20' }
              ]
            }
          ]
        }
      }),
      'utf-8'
    );

    const code = run([input, '--constants', join(dir, 'constants.json')], {});
    expect(code).toBe(0);
    // No samples: 32px char height * 1.5 = 48px spacing; gap 80 -> 1 blank line
    expect(readFileSync(join(dir, 'page_ocr.txt'), 'utf-8')).toBe('Title\n\nBody');
  });

  it('fails with a diagnostic for a document without Result', () => {
    const input = join(dir, 'bad.json');
    writeFileSync(input, JSON.stringify({ regions: [] }), 'utf-8');
    const code = run([input, '--constants', join(dir, 'constants.json')], {});
    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith("conversion failed: missing 'Result' field in OCR JSON");
  });

  it('prints usage without an input', () => {
    expect(run([], {})).toBe(1);
    expect(run(['--help'], {})).toBe(0);
  });
});
