/**
 * Provider Registry
 *
 * Process-wide health, weight, quota and rate-limit state for search
 * providers. Owned by one object (inject a fresh one per test) and mutated
 * only through its methods. State is not persisted and resets on restart.
 */

import { RateLimiterMemory, RateLimiterQueue } from 'rate-limiter-flexible';
import type { ProviderConfig } from '@/config';
import { createLogger } from '@/utils/logger';

const log = createLogger('provider-registry');

export interface ProviderState {
  name: string;
  weight: number;
  quota: number | null;
  healthy: boolean;
  minCallIntervalMs: number;
  lastCallAt: number;
}

export interface ProviderRegistryOptions {
  fallbackProvider: string;
  weightStepUp?: number;
  weightStepDown?: number;
  now?: () => number;
}

export const MIN_WEIGHT = 0.1;
export const MAX_WEIGHT = 1.0;

/**
 * One token per minCallIntervalMs. The queue hands tokens out in FIFO order,
 * so concurrent callers for the same provider are served one interval apart.
 */
function createCallGate(config: ProviderConfig): RateLimiterQueue | null {
  if (config.minCallIntervalMs <= 0) return null;
  const limiter = new RateLimiterMemory({
    keyPrefix: `provider:${config.name}`,
    points: 1,
    duration: config.minCallIntervalMs / 1000,
  });
  return new RateLimiterQueue(limiter);
}

function clampWeight(weight: number): number {
  // Round away float drift from repeated 0.05 steps.
  const rounded = Math.round(weight * 1000) / 1000;
  return Math.min(MAX_WEIGHT, Math.max(MIN_WEIGHT, rounded));
}

export class ProviderRegistry {
  readonly fallbackProvider: string;
  private readonly providers = new Map<string, ProviderState>();
  private readonly callGates = new Map<string, RateLimiterQueue>();
  private readonly stepUp: number;
  private readonly stepDown: number;
  private readonly now: () => number;

  constructor(
    private readonly configs: readonly ProviderConfig[],
    options: ProviderRegistryOptions,
  ) {
    this.fallbackProvider = options.fallbackProvider;
    this.stepUp = options.weightStepUp ?? 0.05;
    this.stepDown = options.weightStepDown ?? 0.1;
    this.now = options.now ?? Date.now;
    this.reset();
  }

  reset(): void {
    this.providers.clear();
    this.callGates.clear();
    for (const config of this.configs) {
      const gate = createCallGate(config);
      if (gate) this.callGates.set(config.name, gate);
      this.providers.set(config.name, {
        name: config.name,
        weight: clampWeight(config.weight),
        quota: config.quota,
        healthy: config.quota === null || config.quota > 0,
        minCallIntervalMs: config.minCallIntervalMs,
        lastCallAt: 0,
      });
    }
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  get(name: string): Readonly<ProviderState> | undefined {
    const state = this.providers.get(name);
    return state ? { ...state } : undefined;
  }

  snapshot(): ProviderState[] {
    return [...this.providers.values()].map((state) => ({ ...state }));
  }

  /**
   * Healthy provider with remaining quota and the highest weight; ties go to
   * declaration order. Falls back to the designated fallback name when no
   * candidate is left.
   */
  pickProvider(exclude: ReadonlySet<string> = new Set()): string {
    let best: ProviderState | null = null;
    for (const state of this.providers.values()) {
      if (exclude.has(state.name)) continue;
      const quotaOk = state.quota === null || state.quota > 0;
      if (!state.healthy || !quotaOk) continue;
      if (!best || state.weight > best.weight) best = state;
    }
    return best ? best.name : this.fallbackProvider;
  }

  /**
   * Wait until minCallIntervalMs has passed since the provider's last call,
   * then stamp the call. Callers for the same provider queue behind each other.
   */
  async applyRateLimit(name: string): Promise<void> {
    const state = this.providers.get(name);
    if (!state) return;

    const gate = this.callGates.get(name);
    if (gate) {
      await gate.removeTokens(1, name);
    }
    state.lastCallAt = this.now();
  }

  markSuccess(name: string): void {
    const state = this.providers.get(name);
    if (!state) return;

    state.weight = clampWeight(state.weight + this.stepUp);
    state.healthy = true;

    if (state.quota !== null) {
      state.quota -= 1;
      if (state.quota <= 0) {
        state.quota = 0;
        state.healthy = false;
        log.warn('Provider exhausted its quota; marking unhealthy', { provider: name });
      }
    }
  }

  markFailure(name: string): void {
    const state = this.providers.get(name);
    if (!state) return;

    state.weight = clampWeight(state.weight - this.stepDown);
    state.healthy = false;
    log.warn('Provider marked unhealthy', { provider: name, weight: state.weight });
  }
}
