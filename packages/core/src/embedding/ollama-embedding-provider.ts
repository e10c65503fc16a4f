import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { EmbedError, type Embedder } from '../types/provider.js';

export interface OllamaEmbeddingConfig {
  baseUrl: string;
  model: string;
  dimensions: number;
  timeout: number;
}

const DEFAULT_CONFIG: OllamaEmbeddingConfig = {
  baseUrl: 'http://localhost:11434',
  model: 'nomic-embed-text',
  dimensions: 768,
  timeout: 30_000,
};

const BATCH_SIZE = 50;

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

interface CombinedSignal {
  signal: AbortSignal;
  /** Detach from the caller's signal once the request has settled. */
  release: () => void;
}

function noop(): void {}

/** Abort when either the caller's signal or the request timeout fires. */
function combineSignals(timeoutMs: number, signal?: AbortSignal): CombinedSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!signal) return { signal: timeout, release: noop };

  const controller = new AbortController();
  if (signal.aborted) {
    controller.abort(signal.reason);
    return { signal: controller.signal, release: noop };
  }

  const onCallerAbort = (): void => controller.abort(signal.reason);
  const onTimeout = (): void => controller.abort(timeout.reason);
  signal.addEventListener('abort', onCallerAbort, { once: true });
  timeout.addEventListener('abort', onTimeout, { once: true });

  return {
    signal: controller.signal,
    release: () => {
      signal.removeEventListener('abort', onCallerAbort);
      timeout.removeEventListener('abort', onTimeout);
    },
  };
}

export class OllamaEmbeddingProvider implements Embedder {
  private readonly config: OllamaEmbeddingConfig;

  constructor(config?: Partial<OllamaEmbeddingConfig>) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    merged.baseUrl = merged.baseUrl.replace(/\/+$/, '');
    this.config = merged;
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Result<number[][], EmbedError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    const allEmbeddings: number[][] = [];
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const result = await this.embedBatch(texts.slice(i, i + BATCH_SIZE), signal);
      if (result.isErr()) {
        return err(result.error);
      }
      allEmbeddings.push(...result.value);
    }
    return ok(allEmbeddings);
  }

  private async embedBatch(
    texts: string[],
    signal?: AbortSignal,
  ): Promise<Result<number[][], EmbedError>> {
    const combined = combineSignals(this.config.timeout, signal);
    try {
      const response = await globalThis.fetch(`${this.config.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          input: texts,
        }),
        signal: combined.signal,
      });

      if (!response.ok) {
        return err(
          new EmbedError(`Ollama embed API returned status ${response.status}: ${response.statusText}`),
        );
      }

      const parsed = embedResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return err(new EmbedError('Invalid response: embeddings is not an array of vectors'));
      }
      if (parsed.data.embeddings.length !== texts.length) {
        return err(
          new EmbedError(
            `Invalid response: expected ${texts.length} embeddings, got ${parsed.data.embeddings.length}`,
          ),
        );
      }
      return ok(parsed.data.embeddings);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return err(new EmbedError(`Ollama embed request failed: ${message}`));
    } finally {
      combined.release();
    }
  }
}
