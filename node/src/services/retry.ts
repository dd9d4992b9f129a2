// node/src/services/retry.ts — bounded attempts returned as a typed result
import { errorMessage } from './errors';

export type Result<T, E> = { ok: true; value: T; attempts: number } | { ok: false; error: E };

export class AttemptsExhausted extends Error {
  constructor(
    public readonly attempts: number,
    public readonly failures: Error[],
  ) {
    const last = failures[failures.length - 1];
    super(`Gave up after ${attempts} attempt(s): ${last ? last.message : 'no attempt ran'}`);
    this.name = 'AttemptsExhausted';
  }

  get lastError(): Error | undefined {
    return this.failures[this.failures.length - 1];
  }
}

interface AttemptOptions {
  /** Called after each failed attempt (1-based attempt number). */
  onFailure?: (error: Error, attempt: number) => void;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(errorMessage(err));
}

/**
 * Run `fn` up to `maxAttempts` times with no delay between attempts.
 * Resolves with the first successful value, or with every failure once attempts run out.
 */
export async function attempt<T>(
  fn: (attemptNumber: number) => Promise<T>,
  maxAttempts: number,
  options: AttemptOptions = {},
): Promise<Result<T, AttemptsExhausted>> {
  const failures: Error[] = [];
  const limit = Math.max(1, Math.floor(maxAttempts));

  for (let attemptNumber = 1; attemptNumber <= limit; attemptNumber++) {
    try {
      const value = await fn(attemptNumber);
      return { ok: true, value, attempts: attemptNumber };
    } catch (err) {
      const error = toError(err);
      failures.push(error);
      options.onFailure?.(error, attemptNumber);
    }
  }

  return { ok: false, error: new AttemptsExhausted(limit, failures) };
}
