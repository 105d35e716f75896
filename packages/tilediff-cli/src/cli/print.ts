/**
 * Human-readable CLI output.
 * Kept apart from the pino logger: these lines are the command's result, not diagnostics.
 */

export const outln = (...parts: unknown[]): void => {
  process.stdout.write(parts.map(String).join(' ') + '\n');
};

export const errln = (...parts: unknown[]): void => {
  process.stderr.write(parts.map(String).join(' ') + '\n');
};
