/**
 * tilediff CLI - compare command
 */

import {
  createGrid,
  decodePng,
  diff,
  encodePng,
  loadDiffOptions,
  mergeDiffOptions,
  parseColor,
  type DiffOptions,
  type DiffSummary,
  type MarkerColor,
  type NrgbaGrid,
} from '@tilediff/core';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ZodError } from 'zod';
import { getLoggerSafe } from './logger';
import { errln, outln } from './print';

export interface ParsedArgs {
  positionals: string[];
  flags: Record<string, string | boolean>;
}

export interface CompareConfig {
  image1: string;
  image2: string;
  output?: string;
  json: boolean;
  options: Readonly<DiffOptions>;
}

/**
 * Bad invocation: wrong arity, unknown flag or malformed flag value.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const BOOLEAN_FLAGS = new Set(['includeAa', 'diffMask', 'json']);

const VALUE_FLAGS = new Set([
  'threshold',
  'alpha',
  'aaColor',
  'diffColor',
  'diffColorAlt',
  'tileSize',
  'concurrency',
  'logLevel',
  'logFormat',
  'logFile',
]);

const toCamel = (s: string): string =>
  s.replace(/-([a-z])/g, (_: string, c: string) => c.toUpperCase());

const toKebab = (s: string): string => s.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);

/**
 * Split argv into positionals and flags.
 * Accepts `--flag value`, `--flag=value`, bare boolean flags and `--no-flag`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const out: ParsedArgs = { positionals: [], flags: {} };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;

    // --no-flag
    const nof = a.match(/^--no-([a-z][\w-]*)$/i);
    if (nof && nof[1]) {
      out.flags[toCamel(nof[1])] = false;
      continue;
    }

    // --long=value
    const leq = a.match(/^--([a-z][\w-]*)=(.*)$/i);
    if (leq && leq[1] !== undefined && leq[2] !== undefined) {
      out.flags[toCamel(leq[1])] = leq[2];
      continue;
    }

    // --long [value?]
    if (a.startsWith('--')) {
      const key = toCamel(a.slice(2));
      const next = argv[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        out.flags[key] = next;
        i++;
      } else {
        out.flags[key] = true;
      }
      continue;
    }

    out.positionals.push(a);
  }

  return out;
}

function stringFlag(flags: ParsedArgs['flags'], key: string): string | undefined {
  const value = flags[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new UsageError(`--${toKebab(key)} requires a value`);
  }
  return value;
}

function numberFlag(flags: ParsedArgs['flags'], key: string): number | undefined {
  const value = stringFlag(flags, key);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new UsageError(`Invalid --${toKebab(key)} value: ${value}`);
  }
  return parsed;
}

function booleanFlag(flags: ParsedArgs['flags'], key: string): boolean | undefined {
  const value = flags[key];
  if (value === undefined || typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new UsageError(`Invalid --${toKebab(key)} value: ${value}`);
}

function colorFlag(flags: ParsedArgs['flags'], key: string): MarkerColor | undefined {
  const value = stringFlag(flags, key);
  return value === undefined ? undefined : parseColor(value);
}

/**
 * Build the compare configuration: environment over defaults, flags over environment.
 *
 * @throws UsageError for bad arity, unknown flags or malformed values
 * @throws ZodError for out-of-range option values
 */
export function buildCompareConfig(
  args: ParsedArgs,
  env: Record<string, string | undefined> = process.env
): CompareConfig {
  for (const key of Object.keys(args.flags)) {
    if (!BOOLEAN_FLAGS.has(key) && !VALUE_FLAGS.has(key)) {
      throw new UsageError(`Unknown option: --${toKebab(key)}`);
    }
  }

  const [image1, image2, output, ...rest] = args.positionals;
  if (image1 === undefined || image2 === undefined || rest.length > 0) {
    throw new UsageError('Expected <image1.png> <image2.png> [diff.png]');
  }

  const { flags } = args;
  const tileSize = numberFlag(flags, 'tileSize');
  const diffColorAlt = colorFlag(flags, 'diffColorAlt');

  const options = mergeDiffOptions({
    ...loadDiffOptions(env),
    threshold: numberFlag(flags, 'threshold'),
    includeAA: booleanFlag(flags, 'includeAa'),
    alpha: numberFlag(flags, 'alpha'),
    diffMask: booleanFlag(flags, 'diffMask'),
    aaColor: colorFlag(flags, 'aaColor'),
    diffColor: colorFlag(flags, 'diffColor'),
    diffColorAlt,
    tileWidth: tileSize,
    tileHeight: tileSize,
    concurrency: numberFlag(flags, 'concurrency'),
  });

  return {
    image1,
    image2,
    output,
    json: booleanFlag(flags, 'json') ?? false,
    options,
  };
}

function printUsage(): void {
  errln('Usage: tilediff compare <image1.png> <image2.png> [diff.png] [options]');
  errln('');
  errln('Options:');
  errln('  --threshold <0-1>        Matching threshold (default 0.1)');
  errln('  --include-aa             Count anti-aliased pixels as differences');
  errln('  --alpha <0-1>            Opacity of the unchanged background (default 0.1)');
  errln('  --diff-mask              Draw only differing pixels on a transparent background');
  errln('  --aa-color <r,g,b[,a]>   Color of anti-aliased pixels (default 255,255,0)');
  errln('  --diff-color <r,g,b[,a]> Color of differing pixels (default 255,0,0)');
  errln('  --diff-color-alt <...>   Reserved; accepted but not painted');
  errln('  --tile-size <n>          Tile width and height in pixels (default 256)');
  errln('  --concurrency <n>        Tile tasks queued at once (default 4)');
  errln('  --json                   Print the summary as JSON');
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

async function readImage(path: string): Promise<NrgbaGrid> {
  try {
    return decodePng(await readFile(path));
  } catch (e) {
    throw new Error(`Failed to read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function formatSummary(summary: DiffSummary): string {
  return `different pixels: ${summary.diffCount} (${(summary.diffRatio * 100).toFixed(2)}%)`;
}

/**
 * Run the compare command.
 *
 * @returns Exit code: 0 no differences, 1 differences found, 2 usage or input error
 */
export async function runCompare(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  const logger = getLoggerSafe();

  let config: CompareConfig;
  try {
    config = buildCompareConfig(parseArgs(argv), env);
  } catch (e) {
    if (e instanceof ZodError) {
      errln(`Invalid option: ${formatZodError(e)}`);
      return 2;
    }
    errln(e instanceof Error ? e.message : String(e));
    errln('');
    printUsage();
    return 2;
  }

  let img1: NrgbaGrid;
  let img2: NrgbaGrid;
  try {
    [img1, img2] = await Promise.all([readImage(config.image1), readImage(config.image2)]);
  } catch (e) {
    errln(e instanceof Error ? e.message : String(e));
    return 2;
  }
  logger.debug(
    { image1: config.image1, image2: config.image2, width: img1.width, height: img1.height },
    'images decoded'
  );

  const output = createGrid(img1.width, img1.height);
  const result = await diff(img1, img2, output, config.options, { logger });
  if (!result.success) {
    errln(result.error.message);
    return 2;
  }
  const summary = result.value;

  if (config.output) {
    const outputPath = resolve(process.cwd(), config.output);
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, encodePng(output));
    logger.info({ path: outputPath }, 'diff image written');
  }

  if (config.json) {
    outln(JSON.stringify(summary));
  } else {
    outln(formatSummary(summary));
    if (summary.antialiasedCount > 0) {
      outln(`anti-aliased pixels: ${summary.antialiasedCount}`);
    }
  }

  return summary.diffCount > 0 ? 1 : 0;
}
