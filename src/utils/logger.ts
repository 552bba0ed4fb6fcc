/**
 * Debug logging for verbose mode.
 * Lines go to stderr so they never mix with the wrapped binary's stdout.
 */

export const LOG_PREFIX = '[rulekit]';

/** Log helper */
export function debugLog(message: string, verbose: boolean): void {
  if (verbose) console.error(`${LOG_PREFIX} ${message}`);
}
