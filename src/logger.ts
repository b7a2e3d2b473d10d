// file: src/logger.ts
import { formatErrorChain } from './ErrorContext';

/**
 * Writes progress messages directly to stderr, bypassing console.error spies.
 * Only called when --verbose is set.
 */
export function verboseLog(message: string): void {
  process.stderr.write(message + '\n');
}

/**
 * Reports a fatal failure with its chain of causes.
 * In verbose mode the outermost stack trace follows the chain.
 */
export function logFatal(err: unknown, verbose: boolean = false): void {
  console.error(`Error: ${formatErrorChain(err)}`);
  if (verbose && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
}
