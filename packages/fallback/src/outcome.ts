/**
 * @llm-relay/fallback - Invocation outcomes
 *
 * A provider never throws past its own boundary: every call resolves to an
 * InvokeResult, and thrown errors are turned into a FailureClass here.
 */

import type { FailureClass } from '@llm-relay/core';
import { errorMessage } from '@llm-relay/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface InvokeSuccess<T> {
  ok: true;
  value: T;
}

export interface InvokeFailure {
  ok: false;
  failure: FailureClass;
  message: string;
  cause?: unknown;
}

export type InvokeResult<T> = InvokeSuccess<T> | InvokeFailure;

export function succeeded<T>(value: T): InvokeSuccess<T> {
  return { ok: true, value };
}

export function failed(failure: FailureClass, message: string, cause?: unknown): InvokeFailure {
  return cause === undefined ? { ok: false, failure, message } : { ok: false, failure, message, cause };
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

const RATE_LIMIT_STATUS = 429;
const RATE_LIMIT_MARKERS = ['rate_limit', 'rate limit', 'ratelimit', '429'];

/** Status code carried by an SDK error (`status`) or an HTTP client error (`statusCode`). */
export function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return undefined;
}

/**
 * True when the vendor signalled throttling: HTTP 429, or a rate-limit
 * marker in the error text.
 */
export function isRateLimitError(err: unknown): boolean {
  if (statusOf(err) === RATE_LIMIT_STATUS) return true;
  const text = errorMessage(err).toLowerCase();
  return RATE_LIMIT_MARKERS.some((marker) => text.includes(marker));
}

/**
 * Classify a thrown error. Unavailability is decided at registry build time,
 * never from a thrown error, so only `rate_limited` and `other` come out of here.
 */
export function classifyFailure(err: unknown): InvokeFailure {
  const failure: FailureClass = isRateLimitError(err) ? 'rate_limited' : 'other';
  return failed(failure, errorMessage(err), err);
}
