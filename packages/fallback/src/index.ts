/**
 * @llm-relay/fallback - Sequential provider failover
 *
 * Provides provider-agnostic failover with:
 *   - Ordered, one-at-a-time execution with per-attempt deadlines
 *   - Failure classification (unavailable, rate limited, empty, other)
 *   - An immutable registry that decides availability once, at build time
 *   - A read-only status reporter over that registry
 *   - Injectable event sinks for observability
 *
 * @packageDocumentation
 */

// Chain - core execution engine
export {
  FallbackChain,
  AllProvidersFailedError,
  DispatchAbortedError,
  type FallbackProvider,
  type FallbackAttempt,
  type FallbackResult,
  type FallbackChainOptions,
  type ExecuteOptions,
} from './chain.js';

// Outcomes - never-throw result values and error classification
export {
  classifyFailure,
  isRateLimitError,
  statusOf,
  succeeded,
  failed,
  type InvokeResult,
  type InvokeSuccess,
  type InvokeFailure,
} from './outcome.js';

// Registry - provider id -> handle, fixed at build time
export {
  ProviderRegistry,
  UNAVAILABLE_REASONS,
  type ProviderSpec,
  type ProviderHandle,
  type RegistryOptions,
} from './registry.js';

// Status - read-only availability report
export {
  StatusReporter,
  type ProviderStatus,
  type StatusReport,
  type OverallStatus,
} from './status.js';

// Events - observability sinks
export {
  LoggerSink,
  MemorySink,
  FanoutSink,
  type DispatchEvent,
  type DispatchEventType,
  type EventSink,
} from './events.js';
