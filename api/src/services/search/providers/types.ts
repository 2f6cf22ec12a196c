import type { RawSearchHit } from '@/types/research';

export interface SearchProviderAdapter {
  name: string;
  search(topic: string, limit: number): Promise<RawSearchHit[]>;
}

export interface ProviderHttpOptions {
  timeoutMs: number;
  fetchFn?: typeof globalThis.fetch;
}
