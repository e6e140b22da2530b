/**
 * @llm-relay/fallback - ProviderRegistry
 *
 * Builds the set of provider handles once, from credentials and factories,
 * and fixes the attempt order: primary first, then the declared order.
 * A missing credential or a failing factory makes a provider unavailable;
 * it never aborts the build.
 */

import pino from 'pino';
import { errorMessage } from '@llm-relay/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Everything the registry needs to know about one provider. */
export interface ProviderSpec<C> {
  id: string;
  /** Defaults to true. */
  enabled?: boolean;
  credential?: string;
  /** Builds the underlying client. May throw. */
  create?: (credential: string) => C;
}

/** The registry's record of one configured provider. */
export interface ProviderHandle<C> {
  readonly id: string;
  readonly available: boolean;
  readonly capability?: C;
  /** Why the provider is unavailable. */
  readonly reason?: string;
}

export interface RegistryOptions<C> {
  primary: string;
  /** Providers in declared fallback order. The primary is moved to the front. */
  providers: ProviderSpec<C>[];
  logger?: pino.Logger;
}

export const UNAVAILABLE_REASONS = {
  disabled: 'disabled',
  missingCredential: 'credential not set',
  noIntegration: 'no integration registered',
} as const;

// ---------------------------------------------------------------------------
// ProviderRegistry
// ---------------------------------------------------------------------------

/**
 * Immutable map of provider id to handle.
 *
 * ```ts
 * const registry = ProviderRegistry.build({
 *   primary: 'anthropic',
 *   providers: [
 *     { id: 'anthropic', credential: key, create: (k) => new AnthropicProvider({ apiKey: k }) },
 *     { id: 'openai', credential: undefined, create: (k) => new OpenAIProvider({ apiKey: k }) },
 *   ],
 * });
 * registry.attemptOrder().map((h) => h.id); // ['anthropic', 'openai']
 * ```
 */
export class ProviderRegistry<C> {
  readonly primary: string;
  private readonly handles: ReadonlyMap<string, ProviderHandle<C>>;
  private readonly order: readonly ProviderHandle<C>[];

  private constructor(primary: string, ordered: ProviderHandle<C>[]) {
    this.primary = primary;
    this.order = Object.freeze([...ordered]);
    this.handles = new Map(ordered.map((handle) => [handle.id, handle]));
  }

  /**
   * Build the registry. Throws only when the primary is not among the
   * providers, which is a configuration error rather than unavailability.
   */
  static build<C>(options: RegistryOptions<C>): ProviderRegistry<C> {
    const log = options.logger ?? pino({ name: '@llm-relay/registry' });

    const specs = dedupe(options.providers);
    const primarySpec = specs.find((spec) => spec.id === options.primary);
    if (!primarySpec) {
      throw new Error(
        `Primary provider "${options.primary}" is not configured. Known: ${specs.map((s) => s.id).join(', ') || 'none'}`,
      );
    }

    const ordered = [primarySpec, ...specs.filter((spec) => spec !== primarySpec)].map((spec) =>
      Object.freeze(initialize(spec, log)),
    );

    log.info(
      {
        primary: options.primary,
        order: ordered.map((h) => h.id),
        available: ordered.filter((h) => h.available).map((h) => h.id),
      },
      'Provider registry built',
    );

    return new ProviderRegistry(options.primary, ordered);
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  /** Primary first, then the remaining providers in declared order. */
  attemptOrder(): readonly ProviderHandle<C>[] {
    return this.order;
  }

  get(id: string): ProviderHandle<C> | undefined {
    return this.handles.get(id);
  }

  /** Provider ids in attempt order. */
  ids(): string[] {
    return this.order.map((handle) => handle.id);
  }
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function dedupe<C>(specs: ProviderSpec<C>[]): ProviderSpec<C>[] {
  const seen = new Set<string>();
  return specs.filter((spec) => {
    if (seen.has(spec.id)) return false;
    seen.add(spec.id);
    return true;
  });
}

function initialize<C>(spec: ProviderSpec<C>, log: pino.Logger): ProviderHandle<C> {
  if (spec.enabled === false) {
    log.info({ provider: spec.id }, 'Provider disabled');
    return { id: spec.id, available: false, reason: UNAVAILABLE_REASONS.disabled };
  }

  if (!spec.credential) {
    log.warn({ provider: spec.id }, 'Provider credential not set');
    return { id: spec.id, available: false, reason: UNAVAILABLE_REASONS.missingCredential };
  }

  if (!spec.create) {
    log.warn({ provider: spec.id }, 'No integration registered for provider');
    return { id: spec.id, available: false, reason: UNAVAILABLE_REASONS.noIntegration };
  }

  try {
    const capability = spec.create(spec.credential);
    log.info({ provider: spec.id }, 'Provider client initialized');
    return { id: spec.id, available: true, capability };
  } catch (err: unknown) {
    const message = errorMessage(err);
    log.error({ provider: spec.id, error: message }, 'Failed to initialize provider client');
    return { id: spec.id, available: false, reason: message };
  }
}
