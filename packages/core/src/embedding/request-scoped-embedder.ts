import type { Result } from 'neverthrow';
import type { EmbedError, Embedder } from '../types/provider.js';

type PendingEmbedding = Promise<Result<number[][], EmbedError>>;

/**
 * Shares embeddings between the searches of one request. Every partition
 * queries with the same variant text under the same deadline signal, so
 * results are keyed by signal and text and the variant is embedded once.
 * Calls without a signal pass straight through.
 */
export class RequestScopedEmbedder implements Embedder {
  private readonly inner: Embedder;
  private readonly bySignal = new WeakMap<AbortSignal, Map<string, PendingEmbedding>>();

  constructor(inner: Embedder) {
    this.inner = inner;
  }

  get dimensions(): number {
    return this.inner.dimensions;
  }

  embed(texts: string[], signal?: AbortSignal): PendingEmbedding {
    if (!signal) return this.inner.embed(texts, signal);

    let cache = this.bySignal.get(signal);
    if (!cache) {
      cache = new Map();
      this.bySignal.set(signal, cache);
    }

    const key = texts.join('\u0000');
    const cached = cache.get(key);
    if (cached) return cached;

    const pending = this.inner.embed(texts, signal);
    cache.set(key, pending);
    return pending;
  }
}
