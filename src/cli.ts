#!/usr/bin/env node
/**
 * Converts an OCR JSON response into layout-preserving plain text.
 *
 *   ocr-layout-text <input.json> [--out <file>] [--constants <file>] [--debug]
 *
 * Environment (a .env file is honoured): OCR_LAYOUT_CONSTANTS_FILE,
 * OCR_LAYOUT_SAME_LINE_RATIO, OCR_LAYOUT_DEBUG.
 */

import 'dotenv/config';
import { readFileSync, realpathSync, writeFileSync } from 'fs';
import { pathToFileURL } from 'url';
import { CONVERSION_FAILED_PREFIX, OCRLayoutConverter } from './index.js';
import { loadConfigFromEnv } from './types/config.js';
import type { OCRLayoutConfigInput } from './types/config.js';

export type CliArgs = {
  input?: string;
  out?: string;
  constantsFile?: string;
  debug: boolean;
  help: boolean;
};

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { debug: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--out' || a === '-o') out.out = argv[++i];
    else if (a === '--constants') out.constantsFile = argv[++i];
    else if (a === '--debug') out.debug = true;
    else if (a === '--help' || a === '-h') out.help = true;
    else if (!a.startsWith('-') && out.input === undefined) out.input = a;
  }

  return out;
}

/** Swaps a `.json` extension for `.txt` (`page_ocr.json` -> `page_ocr.txt`); anything else gets `.txt` appended. */
export function defaultOutputPath(input: string): string {
  if (/\.json$/i.test(input)) return input.replace(/\.json$/i, '.txt');
  return `${input}.txt`;
}

const USAGE = 'Usage: ocr-layout-text <input.json> [--out <file>] [--constants <file>] [--debug]';

export function run(argv: string[], env: Record<string, string | undefined>): number {
  const args = parseArgs(argv);
  if (args.help || !args.input) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }

  const config: OCRLayoutConfigInput = { ...loadConfigFromEnv(env) };
  if (args.constantsFile) config.constantsFile = args.constantsFile;
  if (args.debug) config.debug = true;

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(args.input, 'utf-8'));
  } catch (error) {
    console.error(`Failed to read OCR JSON from ${args.input}:`, error);
    return 1;
  }

  const converter = new OCRLayoutConverter(config);
  const result = converter.convert(document);
  if (!result.ok) {
    console.error(`${CONVERSION_FAILED_PREFIX}${result.error}`);
    return 1;
  }

  const outputPath = args.out ?? defaultOutputPath(args.input);
  writeFileSync(outputPath, result.text, 'utf-8');

  console.log(`✓ Text written to ${outputPath}`);
  console.log(
    `  char height ${result.constants.charHeight.toFixed(2)}px, line multiplier ${result.constants.lineHeightMultiplier.toFixed(3)}, ` +
      `samples ${result.constants.sampleCounts.char} char / ${result.constants.sampleCounts.line} line`
  );
  console.log('');
  console.log(result.text);
  return 0;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  process.exitCode = run(process.argv.slice(2), process.env);
}
