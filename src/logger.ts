/** Prefix for every report line the tool prints. */
export const LOG_PREFIX = '[lazy-ignore]';

/**
 * Writes verbose messages directly to stderr, bypassing console.error spies.
 * @param message - The verbose message to log.
 */
export function verboseLog(message: string): void {
  process.stderr.write(`${LOG_PREFIX} ${message}\n`);
}

/**
 * Message text of a thrown value.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
