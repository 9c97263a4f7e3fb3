export type Result<T> = { ok: true; value: T } | { ok: false; error: Error };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Runs one content-store call and tags the outcome instead of throwing, so the
 * caller decides the recovery policy for that call site.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    return { ok: false, error: toError(err) };
  }
}
