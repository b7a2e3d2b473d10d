// file: src/ErrorContext.ts

/**
 * Awaits an operation and, if it fails, rethrows with `message` as context and
 * the original failure as the cause.
 */
export async function withContext<T>(operation: Promise<T>, message: string): Promise<T> {
  try {
    return await operation;
  } catch (err: unknown) {
    throw new Error(message, { cause: err });
  }
}

/**
 * Synchronous counterpart of {@link withContext}.
 */
export function withContextSync<T>(operation: () => T, message: string): T {
  try {
    return operation();
  } catch (err: unknown) {
    throw new Error(message, { cause: err });
  }
}

/**
 * Formats an error and its chain of causes on one line, outermost first:
 * `failed to process entries: failed to process file a.rs: unknown property 'x'`.
 */
export function formatErrorChain(err: unknown): string {
  const messages: string[] = [];
  let current: unknown = err;
  while (current !== undefined) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      current = undefined;
    }
  }
  return messages.join(': ');
}

/**
 * Tells whether a failure is a Node system error with the given code (e.g. ENOENT).
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
