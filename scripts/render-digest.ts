#!/usr/bin/env tsx
/**
 * Render a digest markdown file to HTML, plain text, or parsed blocks
 *
 * Usage:
 *   npx tsx scripts/render-digest.ts digest.md [--format html|text|json] [--out file]
 */

import dotenv from 'dotenv';
import { readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { loadThemeFromEnv } from '../src/config/theme';
import { logger } from '../src/lib/logger';
import { parse, render } from '../src/lib/render';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Theme overrides come from DIGEST_* variables
dotenv.config({ path: join(__dirname, '..', '.env.local') });

export type OutputFormat = 'html' | 'text' | 'json';

export interface CliOptions {
  input: string;
  format: OutputFormat;
  out?: string;
}

const FORMATS: OutputFormat[] = ['html', 'text', 'json'];

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

/**
 * Parse command-line arguments (without the node/script prefix)
 * @throws Error on a missing input file or an unknown flag
 */
export function parseCliArgs(args: string[]): CliOptions {
  let input: string | undefined;
  let format: OutputFormat = 'html';
  let out: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--format' || arg === '-f') {
      const value = args[++i];
      if (value === undefined || !isOutputFormat(value)) {
        throw new Error(`--format must be one of: ${FORMATS.join(', ')}`);
      }
      format = value;
    } else if (arg === '--out' || arg === '-o') {
      out = args[++i];
      if (!out) {
        throw new Error('--out requires a file path');
      }
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (input === undefined) {
      input = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (!input) {
    throw new Error('Usage: render-digest <file.md> [--format html|text|json] [--out file]');
  }

  return { input, format, out };
}

/**
 * Render markdown in the requested output format
 */
export function renderDigest(markdown: string, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(parse(markdown), null, 2);
  }

  const output = render(markdown, loadThemeFromEnv());
  return format === 'html' ? output.html : output.text;
}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  const markdown = await readFile(options.input, 'utf-8');
  const output = renderDigest(markdown, options.format);

  if (options.out) {
    await writeFile(options.out, output, 'utf-8');
    logger.info('Wrote rendered digest', { input: options.input, out: options.out, format: options.format });
  } else {
    process.stdout.write(`${output}\n`);
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      logger.error('render-digest failed', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
