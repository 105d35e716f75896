/**
 * tilediff CLI entry point
 */

import { createRequire } from 'node:module';
import { z } from 'zod';
import { runCompare } from './compare';
import { initLogger } from './logger';
import { errln, outln } from './print';

const PackageJsonSchema = z.object({ version: z.string() });

const requireJson = createRequire(import.meta.url);
const pkg = PackageJsonSchema.parse(requireJson('../../package.json'));

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

process.on('uncaughtException', (error: Error) => {
  process.stderr.write(`Fatal error (uncaught exception): ${describeError(error)}\n`);
  process.exit(2);
});

process.on('unhandledRejection', (reason: unknown) => {
  process.stderr.write(`Fatal error (unhandled promise rejection): ${describeError(reason)}\n`);
  process.exit(2);
});

const command = process.argv[2];
const args = process.argv.slice(3);

/**
 * Print help message to stdout (bypassing logger for CLI output)
 */
function printHelp(): void {
  outln('tilediff - perceptual pixel diff for PNG images');
  outln('');
  outln('Usage: tilediff <command> [options]');
  outln('');
  outln('Commands:');
  outln('  compare <image1.png> <image2.png> [diff.png]   Compare two images');
  outln('  help                                           Show this help message');
  outln('  version                                        Show version number');
  outln('');
  outln('Global Options:');
  outln('  --log-level <level>     Set log level (silent|debug|info|warn|error)');
  outln('  --log-format <format>   Set log format (json|pretty|silent)');
  outln('  --log-file <path>       Write logs to file');
  outln('');
  outln('Run "tilediff compare" without args to see command-specific options');
}

async function main(): Promise<number> {
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  if (command === 'version' || command === '--version' || command === '-v') {
    outln(`tilediff: ${pkg.version}`);
    return 0;
  }

  initLogger(args);

  if (command === 'compare') {
    return runCompare(args);
  }

  errln(`Unknown command: ${command}`);
  errln('Run "tilediff help" to see available commands');
  return 2;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    errln('Fatal error:', describeError(error));
    process.exitCode = 2;
  }
);
