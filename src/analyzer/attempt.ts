export interface AttemptOptions<T> {
  maxAttempts: number;
  /** Returns the reasons a value is not acceptable; empty means accept. */
  check: (value: T) => string[];
}

export interface AttemptOutcome<T> {
  value: T;
  attempts: number;
  accepted: boolean;
  problems: string[];
}

/**
 * Runs `fn` until `check` passes or `maxAttempts` is used up. Each retry gets
 * the problems found in the previous value. The last value is returned either
 * way; errors thrown by `fn` are not retried.
 */
export async function attempt<T>(
  fn: (previous: { value: T; problems: string[] } | null) => Promise<T>,
  options: AttemptOptions<T>,
): Promise<AttemptOutcome<T>> {
  if (options.maxAttempts < 1) throw new RangeError('maxAttempts must be at least 1');

  let previous: { value: T; problems: string[] } | null = null;
  for (let n = 1; ; n++) {
    const value = await fn(previous);
    const problems = options.check(value);
    if (problems.length === 0) return { value, attempts: n, accepted: true, problems };
    if (n >= options.maxAttempts) return { value, attempts: n, accepted: false, problems };
    previous = { value, problems };
  }
}
