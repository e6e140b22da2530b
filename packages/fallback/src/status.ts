/**
 * @llm-relay/fallback - StatusReporter
 *
 * Read-only view of which providers are usable and which one is primary.
 * Reflects registry state only: it never probes a vendor and never changes
 * with call outcomes.
 */

import type { ProviderRegistry } from './registry.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Overall status level. */
export type OverallStatus = 'healthy' | 'degraded' | 'down';

export interface ProviderStatus {
  available: boolean;
  reason?: string;
}

export interface StatusReport {
  primaryProvider: string;
  /** Keyed by provider id, in attempt order. */
  providers: Record<string, ProviderStatus>;
  /**
   * healthy: the primary is available. degraded: only fallbacks are.
   * down: nothing is.
   */
  overallStatus: OverallStatus;
}

// ---------------------------------------------------------------------------
// StatusReporter
// ---------------------------------------------------------------------------

export class StatusReporter<C = unknown> {
  constructor(private readonly registry: ProviderRegistry<C>) {}

  getStatus(): StatusReport {
    const providers: Record<string, ProviderStatus> = {};
    for (const handle of this.registry.attemptOrder()) {
      providers[handle.id] = handle.reason === undefined
        ? { available: handle.available }
        : { available: handle.available, reason: handle.reason };
    }

    return {
      primaryProvider: this.registry.primary,
      providers,
      overallStatus: this.overallStatus(),
    };
  }

  isAvailable(id: string): boolean {
    return this.registry.get(id)?.available ?? false;
  }

  /** Ids of available providers, in attempt order. */
  availableProviders(): string[] {
    return this.registry
      .attemptOrder()
      .filter((handle) => handle.available)
      .map((handle) => handle.id);
  }

  private overallStatus(): OverallStatus {
    if (this.isAvailable(this.registry.primary)) return 'healthy';
    return this.availableProviders().length > 0 ? 'degraded' : 'down';
  }
}
