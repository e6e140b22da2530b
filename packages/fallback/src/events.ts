/**
 * @llm-relay/fallback - Dispatch events
 *
 * Every state transition of a dispatch is reported to an EventSink. Sinks
 * are injected into the chain, so tests and hosts decide where events go.
 */

import pino from 'pino';
import type { FailureClass } from '@llm-relay/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DispatchEvent =
  | { type: 'dispatch_started'; callId: string; order: string[] }
  | { type: 'provider_skipped'; callId: string; provider: string; reason: string }
  | { type: 'attempt_started'; callId: string; provider: string; attempt: number }
  | {
      type: 'attempt_succeeded';
      callId: string;
      provider: string;
      attempt: number;
      durationMs: number;
    }
  | {
      type: 'attempt_failed';
      callId: string;
      provider: string;
      attempt: number;
      failure: FailureClass;
      error: string;
      durationMs: number;
    }
  | { type: 'fallback'; callId: string; from: string; to: string; reason: string }
  | { type: 'dispatch_failed'; callId: string; providers: string[] }
  | { type: 'dispatch_aborted'; callId: string; provider?: string };

export type DispatchEventType = DispatchEvent['type'];

export interface EventSink {
  emit(event: DispatchEvent): void;
  /** Flush and release whatever the sink holds. */
  close?(): Promise<void>;
}

// ---------------------------------------------------------------------------
// LoggerSink
// ---------------------------------------------------------------------------

/**
 * Writes events to pino. Rate limits are warnings and other failures are
 * errors, so operators can tell throttling from breakage.
 */
export class LoggerSink implements EventSink {
  private readonly log: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.log = logger ?? pino({ name: '@llm-relay/dispatch' });
  }

  emit(event: DispatchEvent): void {
    switch (event.type) {
      case 'dispatch_started':
        this.log.debug({ callId: event.callId, order: event.order }, 'Dispatch started');
        break;
      case 'provider_skipped':
        this.log.info(
          { callId: event.callId, provider: event.provider, reason: event.reason },
          'Provider unavailable, skipping',
        );
        break;
      case 'attempt_started':
        this.log.info(
          { callId: event.callId, provider: event.provider, attempt: event.attempt },
          'Trying provider',
        );
        break;
      case 'attempt_succeeded':
        this.log.info(
          { callId: event.callId, provider: event.provider, durationMs: event.durationMs },
          'Provider succeeded',
        );
        break;
      case 'attempt_failed': {
        const fields = {
          callId: event.callId,
          provider: event.provider,
          attempt: event.attempt,
          failure: event.failure,
          durationMs: event.durationMs,
          error: event.error,
        };
        if (event.failure === 'rate_limited') {
          this.log.warn(fields, 'Provider rate limited');
        } else {
          this.log.error(fields, 'Provider failed');
        }
        break;
      }
      case 'fallback':
        this.log.info(
          { callId: event.callId, from: event.from, to: event.to, reason: event.reason },
          'Falling back',
        );
        break;
      case 'dispatch_failed':
        this.log.error({ callId: event.callId, providers: event.providers }, 'All providers failed');
        break;
      case 'dispatch_aborted':
        this.log.warn({ callId: event.callId, provider: event.provider }, 'Dispatch aborted');
        break;
    }
  }

  async close(): Promise<void> {
    this.log.flush();
  }
}

// ---------------------------------------------------------------------------
// MemorySink
// ---------------------------------------------------------------------------

/** Keeps events in memory, in emission order. */
export class MemorySink implements EventSink {
  private readonly buffer: DispatchEvent[] = [];
  private closed = false;

  emit(event: DispatchEvent): void {
    if (this.closed) return;
    this.buffer.push(event);
  }

  get events(): readonly DispatchEvent[] {
    return this.buffer;
  }

  ofType<K extends DispatchEventType>(type: K): Array<Extract<DispatchEvent, { type: K }>> {
    return this.buffer.filter(
      (event): event is Extract<DispatchEvent, { type: K }> => event.type === type,
    );
  }

  clear(): void {
    this.buffer.length = 0;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ---------------------------------------------------------------------------
// FanoutSink
// ---------------------------------------------------------------------------

/** Forwards every event to several sinks. */
export class FanoutSink implements EventSink {
  constructor(private readonly sinks: EventSink[]) {}

  emit(event: DispatchEvent): void {
    for (const sink of this.sinks) {
      sink.emit(event);
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.close?.()));
  }
}
