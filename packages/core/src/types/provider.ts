import type { Result } from 'neverthrow';
import type { AuthorityRecord, SourceMetadata } from './document.js';

export class EmbedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbedError';
  }
}

export type IndexErrorKind = 'unavailable' | 'embedding_failed' | 'query_failed' | 'aborted';

export class IndexError extends Error {
  readonly kind: IndexErrorKind;

  constructor(kind: IndexErrorKind, message: string) {
    super(message);
    this.name = 'IndexError';
    this.kind = kind;
  }
}

export interface Embedder {
  embed(texts: string[], signal?: AbortSignal): Promise<Result<number[][], EmbedError>>;
  readonly dimensions: number;
}

export interface VectorMatch {
  documentId: string;
  chunkId: string;
  score: number;
  metadata: SourceMetadata;
}

/** One instance per document-type partition. */
export interface VectorIndex {
  query(
    text: string,
    topK: number,
    signal?: AbortSignal,
  ): Promise<Result<VectorMatch[], IndexError>>;
}

export interface AuthorityStore {
  lookup(authorId: string): AuthorityRecord | undefined;
  size(): number;
}
