import { ok, type Result } from 'neverthrow';
import type { DocumentType, SourceMetadata } from '../../types/document.js';
import type { IndexError, VectorIndex, VectorMatch } from '../../types/provider.js';

export type QueryHandler = (
  text: string,
  topK: number,
  signal?: AbortSignal,
) => Promise<Result<VectorMatch[], IndexError>>;

export interface StubIndex extends VectorIndex {
  readonly calls: Array<{ text: string; topK: number }>;
}

/** VectorIndex backed by a handler; records every call. */
export function stubIndex(handler: QueryHandler): StubIndex {
  const calls: Array<{ text: string; topK: number }> = [];
  return {
    calls,
    query(text, topK, signal) {
      calls.push({ text, topK });
      return handler(text, topK, signal);
    },
  };
}

/** Index that answers every query with the same matches. */
export function fixedIndex(matches: VectorMatch[]): StubIndex {
  return stubIndex(async () => ok(matches));
}

export function vectorMatch(
  documentId: string,
  score: number,
  documentType: DocumentType,
  metadata: Partial<SourceMetadata> = {},
): VectorMatch {
  return {
    documentId,
    chunkId: `${documentId}#0`,
    score,
    metadata: { documentType, ...metadata },
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
