/**
 * Runs `fn`, routing any thrown error or rejection to `report` and returning
 * `fallback` instead. Used wherever a failure must stay inside one unit of work:
 * the fetch call, a single dispatch, a backoff call, a whole cycle.
 */
export async function isolate<T>(
  fn: () => T | Promise<T>,
  fallback: T,
  report: (err: unknown) => void
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    report(err);
    return fallback;
  }
}

export function isolateSync<T>(fn: () => T, fallback: T, report: (err: unknown) => void): T {
  try {
    return fn();
  } catch (err) {
    report(err);
    return fallback;
  }
}
