import { Logger } from './logger.js';
import { TransientIOError } from '../types/errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  isRetryable(err: unknown): boolean;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED']);

function field(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null || !(key in err)) return undefined;
  return Reflect.get(err, key);
}

export function statusOf(err: unknown): number | null {
  const status = field(err, 'statusCode') ?? field(err, 'status');
  return typeof status === 'number' ? status : null;
}

// Seconds from a Retry-After header, 0 when absent
export function retryAfterSeconds(err: unknown): number {
  const headers = field(err, 'headers');
  const value = Number(field(headers, 'retry-after'));
  return Number.isFinite(value) && value > 0 ? value : 0;
}

// Treat common transient network errors as retryable, in addition to 429/5xx
export function isTransientError(err: unknown): boolean {
  const status = statusOf(err);
  if (status === 429 || (status !== null && status >= 500 && status < 600)) return true;
  const code = String(field(err, 'code') ?? '');
  const message = err instanceof Error ? err.message : '';
  const looksLikeTimeout = code === 'ETIMEDOUT' || /timeout|timed out|ETIMEDOUT/i.test(message);
  return TRANSIENT_CODES.has(code) || looksLikeTimeout;
}

export function defaultRetryPolicy(overrides: Partial<Pick<RetryPolicy, 'maxAttempts' | 'baseDelayMs'>> = {}): RetryPolicy {
  return {
    maxAttempts: overrides.maxAttempts ?? 3,
    baseDelayMs: overrides.baseDelayMs ?? 500,
    isRetryable: isTransientError,
  };
}

/**
 * Runs `fn` under the policy. Retryable failures back off exponentially
 * (or by Retry-After) and, once attempts run out, surface as TransientIOError.
 * Anything else is rethrown as-is.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy, label: string, wait: Sleep = sleep): Promise<T> {
  const attempts = Math.max(1, policy.maxAttempts);
  for (let i = 0; i < attempts; i++) {
    try {
      return await fn();
    } catch (err) {
      if (!policy.isRetryable(err)) throw err;
      if (i === attempts - 1) throw new TransientIOError(label, attempts, err);
      const retryAfter = retryAfterSeconds(err);
      const backoffMs = retryAfter > 0 ? retryAfter * 1000 : policy.baseDelayMs * Math.pow(2, i);
      Logger.warn(`${label} failed (status ${statusOf(err) ?? 'n/a'}). Retrying in ${backoffMs}ms...`);
      await wait(backoffMs);
    }
  }
  // Unreachable: the loop either returns or throws
  throw new TransientIOError(label, attempts, null);
}
