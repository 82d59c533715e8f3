import { performance } from 'perf_hooks';

export interface TimedResult<T> {
  result: T;
  durationMs: number;
  /** `durationMs` in seconds */
  seconds: number;
}

/**
 * Await `operation` and report how long it took. Errors propagate unchanged.
 */
export async function timed<T>(operation: () => Promise<T>): Promise<TimedResult<T>> {
  const start = performance.now();
  const result = await operation();
  const durationMs = performance.now() - start;

  return { result, durationMs, seconds: durationMs / 1000 };
}
