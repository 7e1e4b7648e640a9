/**
 * Outcome of a best-effort operation. Failures are returned, not thrown,
 * so each caller has to decide what to do with them.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: unknown };

const success = <T>(value: T): Result<T> => ({ ok: true, value });

const failure = <T = never>(error: unknown): Result<T> => ({
  ok: false,
  error,
});

/**
 * Run `work` and capture either its value or whatever it threw/rejected with.
 * Never rejects.
 */
export async function attempt<T>(work: () => Promise<T>): Promise<Result<T>> {
  try {
    return success(await work());
  } catch (error) {
    return failure(error);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
