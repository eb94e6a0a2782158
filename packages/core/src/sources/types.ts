/**
 * Outcome of one collection. `ok: false` means the underlying probe failed
 * and `value` holds the documented default for that metric.
 */
export interface CollectResult<T> {
  value: T;
  ok: boolean;
  error?: string;
}

export interface MetricSource<T = number> {
  readonly name: string;
  /** Never rejects; failures are reported through `ok`. */
  collect(): Promise<CollectResult<T>>;
}

export function collected<T>(value: T): CollectResult<T> {
  return { value, ok: true };
}

export function fallback<T>(value: T, error: unknown): CollectResult<T> {
  return { value, ok: false, error: describeError(error) };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
