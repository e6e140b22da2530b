/**
 * @llm-relay/fallback - FallbackChain
 *
 * Generic fallback chain that tries providers strictly in the order given,
 * one at a time, with per-attempt deadlines, caller cancellation and
 * detailed attempt tracking.
 */

import pino from 'pino';
import { nanoid } from 'nanoid';
import type { FailureClass } from '@llm-relay/core';
import { classifyFailure, failed, type InvokeResult } from './outcome.js';
import { LoggerSink, type EventSink } from './events.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A provider that can be placed into a FallbackChain. */
export interface FallbackProvider<I, O> {
  /** Identifier reported in results, attempts and errors. */
  name: string;
  /** Decided once, when the provider was registered. Unavailable providers are never executed. */
  available: boolean;
  /** Why the provider is unavailable. */
  reason?: string;
  /** Must resolve, never reject; the chain still guards against a rejection. */
  execute: (input: I, signal: AbortSignal) => Promise<InvokeResult<O>>;
}

/** Record of a single attempt within a chain execution. */
export interface FallbackAttempt {
  provider: string;
  /** 1-based attempt number on this provider; 0 when it was skipped. */
  attempt: number;
  success: boolean;
  failure?: FailureClass;
  error?: string;
  durationMs: number;
}

/** Successful chain execution result. */
export interface FallbackResult<O> {
  result: O;
  provider: string;
  attempts: FallbackAttempt[];
  callId: string;
}

/** Options accepted by FallbackChain constructor. */
export interface FallbackChainOptions<I, O> {
  /** Providers in attempt order. */
  providers: FallbackProvider<I, O>[];
  /** Per-attempt timeout in milliseconds (default 60 000, 0 disables it). */
  timeoutMs?: number;
  /** Extra attempts on the same provider before moving on (default 0). */
  retries?: number;
  /** A value failing this check counts as an `empty` failure. */
  isUsable?: (value: O) => boolean;
  /** Called whenever we fall back from one provider to the next. */
  onFallback?: (from: string, to: string, error: string) => void;
  /** Custom pino logger instance, used by the default sink. */
  logger?: pino.Logger;
  /** Receives every dispatch event. Defaults to a LoggerSink. */
  sink?: EventSink;
}

/** Per-execution overrides. */
export interface ExecuteOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  callId?: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Thrown when every provider in the chain was skipped or failed. */
export class AllProvidersFailedError extends Error {
  /** Every provider in attempt order, whether it was invoked or not. */
  public readonly providers: string[];
  public readonly attempts: FallbackAttempt[];
  /** Final failure class per provider. */
  public readonly failures: Record<string, FailureClass>;
  public readonly callId: string;

  constructor(providers: string[], attempts: FallbackAttempt[], callId: string) {
    const failures = summarize(attempts);
    super(describeFailures(providers, failures));
    this.name = 'AllProvidersFailedError';
    this.providers = providers;
    this.attempts = attempts;
    this.failures = failures;
    this.callId = callId;
  }
}

/** Thrown when the caller's signal aborts a dispatch. */
export class DispatchAbortedError extends Error {
  public readonly attempts: FallbackAttempt[];
  public readonly callId: string;

  constructor(callId: string, attempts: FallbackAttempt[], reason?: unknown) {
    super('Dispatch aborted by caller', reason === undefined ? undefined : { cause: reason });
    this.name = 'DispatchAbortedError';
    this.callId = callId;
    this.attempts = attempts;
  }
}

function summarize(attempts: FallbackAttempt[]): Record<string, FailureClass> {
  const failures: Record<string, FailureClass> = {};
  for (const attempt of attempts) {
    if (attempt.failure) failures[attempt.provider] = attempt.failure;
  }
  return failures;
}

function describeFailures(providers: string[], failures: Record<string, FailureClass>): string {
  if (providers.length === 0) {
    return 'All providers failed: no providers configured';
  }
  const parts = providers.map((name) => `${name} (${failures[name] ?? 'other'})`);
  return `All ${providers.length} providers failed: ${parts.join(', ')}`;
}

// ---------------------------------------------------------------------------
// FallbackChain
// ---------------------------------------------------------------------------

/**
 * Executes providers in order until one returns a usable value.
 *
 * ```ts
 * const chain = new FallbackChain({
 *   providers: [anthropic, openai],
 *   timeoutMs: 15_000,
 *   onFallback: (from, to, err) => console.warn(`${from} -> ${to}: ${err}`),
 * });
 * const { result, provider, attempts } = await chain.execute(input);
 * ```
 */
export class FallbackChain<I, O> {
  private readonly providers: FallbackProvider<I, O>[];
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly isUsable: (value: O) => boolean;
  private readonly onFallback?: (from: string, to: string, error: string) => void;
  private readonly sink: EventSink;

  constructor(options: FallbackChainOptions<I, O>) {
    this.providers = [...options.providers];
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.retries = Math.max(0, Math.floor(options.retries ?? 0));
    this.isUsable = options.isUsable ?? (() => true);
    this.onFallback = options.onFallback;
    this.sink =
      options.sink ?? new LoggerSink(options.logger ?? pino({ name: '@llm-relay/fallback' }));
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Execute the chain against `input`. Unavailable providers are recorded
   * and skipped; every failure (rate limit, empty value, error, timeout)
   * moves on to the next provider.
   */
  async execute(input: I, options: ExecuteOptions = {}): Promise<FallbackResult<O>> {
    const callId = options.callId ?? nanoid();
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const names = this.getProviderNames();
    const attempts: FallbackAttempt[] = [];

    this.sink.emit({ type: 'dispatch_started', callId, order: names });

    for (const [index, provider] of this.providers.entries()) {
      const next: FallbackProvider<I, O> | undefined = this.providers[index + 1];

      // --- availability ------------------------------------------------------
      if (!provider.available) {
        const reason = provider.reason ?? 'Provider unavailable';
        attempts.push({
          provider: provider.name,
          attempt: 0,
          success: false,
          failure: 'unavailable',
          error: reason,
          durationMs: 0,
        });
        this.sink.emit({ type: 'provider_skipped', callId, provider: provider.name, reason });
        this.fallBack(callId, provider.name, next, reason);
        continue;
      }

      // --- execution ---------------------------------------------------------
      let lastError = 'unknown';
      for (let attempt = 1; attempt <= this.retries + 1; attempt++) {
        if (options.signal?.aborted) {
          this.sink.emit({ type: 'dispatch_aborted', callId, provider: provider.name });
          throw new DispatchAbortedError(callId, attempts, options.signal.reason);
        }

        this.sink.emit({ type: 'attempt_started', callId, provider: provider.name, attempt });
        const start = performance.now();

        let outcome: InvokeResult<O>;
        try {
          outcome = await this.runAttempt(provider, input, timeoutMs, callId, attempts, options.signal);
        } catch (err: unknown) {
          if (err instanceof DispatchAbortedError) {
            this.sink.emit({ type: 'dispatch_aborted', callId, provider: provider.name });
          }
          throw err;
        }
        const durationMs = Math.round(performance.now() - start);

        if (outcome.ok && this.isUsable(outcome.value)) {
          attempts.push({ provider: provider.name, attempt, success: true, durationMs });
          this.sink.emit({
            type: 'attempt_succeeded',
            callId,
            provider: provider.name,
            attempt,
            durationMs,
          });
          return { result: outcome.value, provider: provider.name, attempts, callId };
        }

        const failure = outcome.ok ? failed('empty', 'Provider returned an empty response') : outcome;
        attempts.push({
          provider: provider.name,
          attempt,
          success: false,
          failure: failure.failure,
          error: failure.message,
          durationMs,
        });
        this.sink.emit({
          type: 'attempt_failed',
          callId,
          provider: provider.name,
          attempt,
          failure: failure.failure,
          error: failure.message,
          durationMs,
        });
        lastError = failure.message;
      }

      this.fallBack(callId, provider.name, next, lastError);
    }

    // All providers exhausted
    this.sink.emit({ type: 'dispatch_failed', callId, providers: names });
    throw new AllProvidersFailedError(names, attempts, callId);
  }

  /**
   * Return the provider names in attempt order.
   */
  getProviderNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  /**
   * Release the sink.
   */
  async close(): Promise<void> {
    await this.sink.close?.();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private fallBack(
    callId: string,
    from: string,
    next: FallbackProvider<I, O> | undefined,
    reason: string,
  ): void {
    if (!next) return;
    this.sink.emit({ type: 'fallback', callId, from, to: next.name, reason });
    this.onFallback?.(from, next.name, reason);
  }

  /**
   * Run one invocation under the deadline and the caller's signal. A
   * provider that ignores its signal still cannot hold the chain past the
   * deadline: the race settles and the late result is dropped.
   */
  private async runAttempt(
    provider: FallbackProvider<I, O>,
    input: I,
    timeoutMs: number,
    callId: string,
    attempts: FallbackAttempt[],
    outer?: AbortSignal,
  ): Promise<InvokeResult<O>> {
    const controller = new AbortController();
    const cleanups: Array<() => void> = [];
    const guards: Array<Promise<InvokeResult<O>>> = [];

    if (timeoutMs > 0) {
      guards.push(
        new Promise<InvokeResult<O>>((resolve) => {
          const timer = setTimeout(() => {
            const message = `Provider "${provider.name}" timed out after ${timeoutMs}ms`;
            controller.abort(new Error(message));
            resolve(failed('other', message));
          }, timeoutMs);
          cleanups.push(() => clearTimeout(timer));
        }),
      );
    }

    if (outer) {
      guards.push(
        new Promise<InvokeResult<O>>((_resolve, reject) => {
          const onAbort = (): void => {
            controller.abort(outer.reason);
            reject(new DispatchAbortedError(callId, attempts, outer.reason));
          };
          outer.addEventListener('abort', onAbort, { once: true });
          cleanups.push(() => outer.removeEventListener('abort', onAbort));
        }),
      );
    }

    let invocation: Promise<InvokeResult<O>>;
    try {
      invocation = provider
        .execute(input, controller.signal)
        .catch((err: unknown) => classifyFailure(err));
    } catch (err: unknown) {
      invocation = Promise.resolve(classifyFailure(err));
    }

    try {
      return await Promise.race([invocation, ...guards]);
    } finally {
      for (const cleanup of cleanups) cleanup();
    }
  }
}
