/**
 * Diagnostics for cellmark, written to stderr.
 *
 * Debug lines trace markup that fell back to plain text and unknown tag
 * styles; the CLI turns them on with --debug or `debug` in the config file.
 * Warnings report config values that were ignored. Errors are the CLI's
 * usage and strict-markup failures.
 */

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

function timestamp(): string {
  return new Date().toISOString();
}

export function debug(message: string): void {
  if (debugEnabled) {
    process.stderr.write(`[cellmark ${timestamp()}] ${message}\n`);
  }
}

export function warn(message: string): void {
  process.stderr.write(`[cellmark warn] ${message}\n`);
}

function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err) return String(err);
  return '';
}

export function error(message: string, err?: unknown): void {
  const detail = err ? `: ${formatError(err)}` : '';
  process.stderr.write(`[cellmark error] ${message}${detail}\n`);
}
