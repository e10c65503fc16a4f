import { ok, err, type Result } from 'neverthrow';
import { QdrantClient } from '@qdrant/js-client-rest';
import { DOCUMENT_TYPES, type DocumentType, type SourceMetadata } from '../types/document.js';
import { IndexError, type Embedder, type VectorIndex, type VectorMatch } from '../types/provider.js';
import {
  isRecord,
  optionalDate,
  optionalString,
  safeBoolean,
  safeNumber,
  safeStringUnion,
} from '../utils/safe-cast.js';

export interface QdrantIndexConfig {
  url: string;
  collectionName: string;
  apiKey?: string;
}

/** Payload fields written at ingestion time. */
export const PAYLOAD_FIELDS = {
  documentId: 'document_id',
  chunkId: 'chunk_id',
  authorId: 'author_id',
  affiliation: 'affiliation',
  publishedAt: 'published_at',
  documentType: 'document_type',
  title: 'title',
  superseded: 'superseded',
} as const;

interface ScoredPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

function clampScore(score: number): number {
  return Math.min(1, Math.max(0, safeNumber(score, 0)));
}

/** 4xx from Qdrant means the request itself was rejected. */
function isClientRejection(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Read-only view of one partition's Qdrant collection. Embeds the variant
 * text, searches, and maps point payloads into source metadata.
 */
export class QdrantVectorIndex implements VectorIndex {
  readonly partition: DocumentType;
  private readonly embedder: Embedder;
  private readonly config: QdrantIndexConfig;
  private client: QdrantClient | null = null;

  constructor(partition: DocumentType, embedder: Embedder, config: QdrantIndexConfig) {
    this.partition = partition;
    this.embedder = embedder;
    this.config = config;
  }

  async query(text: string, topK: number, signal?: AbortSignal): Promise<Result<VectorMatch[], IndexError>> {
    if (signal?.aborted) {
      return err(new IndexError('aborted', `Search on ${this.config.collectionName} aborted before start`));
    }

    const embedded = await this.embedder.embed([text], signal);
    if (embedded.isErr()) {
      if (signal?.aborted) {
        return err(new IndexError('aborted', `Search on ${this.config.collectionName} aborted during embedding`));
      }
      return err(new IndexError('embedding_failed', embedded.error.message));
    }

    const vector = embedded.value[0];
    if (!vector || vector.length === 0) {
      return err(new IndexError('embedding_failed', 'Embedder returned no vector'));
    }
    if (vector.length !== this.embedder.dimensions) {
      return err(
        new IndexError(
          'query_failed',
          `Vector has ${vector.length} dimensions, collection expects ${this.embedder.dimensions}`,
        ),
      );
    }

    let points: ScoredPoint[];
    try {
      points = await this.getClient().search(this.config.collectionName, {
        vector,
        limit: topK,
        with_payload: true,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      const kind = isClientRejection(error) ? 'query_failed' : 'unavailable';
      return err(new IndexError(kind, `Qdrant search on ${this.config.collectionName} failed: ${message}`));
    }

    if (signal?.aborted) {
      return err(new IndexError('aborted', `Search on ${this.config.collectionName} aborted`));
    }

    return ok(points.map((point) => this.toMatch(point)));
  }

  private getClient(): QdrantClient {
    if (!this.client) {
      this.client = new QdrantClient({
        url: this.config.url,
        apiKey: this.config.apiKey,
        checkCompatibility: false,
      });
    }
    return this.client;
  }

  private toMatch(point: ScoredPoint): VectorMatch {
    const payload = isRecord(point.payload) ? point.payload : {};
    const pointId = String(point.id);
    const documentId = optionalString(payload[PAYLOAD_FIELDS.documentId]) ?? pointId;

    const metadata: SourceMetadata = {
      documentType: safeStringUnion(payload[PAYLOAD_FIELDS.documentType], DOCUMENT_TYPES, this.partition),
      authorId: optionalString(payload[PAYLOAD_FIELDS.authorId]),
      affiliation: optionalString(payload[PAYLOAD_FIELDS.affiliation]),
      publishedAt: optionalDate(payload[PAYLOAD_FIELDS.publishedAt]),
      title: optionalString(payload[PAYLOAD_FIELDS.title]),
      superseded: safeBoolean(payload[PAYLOAD_FIELDS.superseded]),
    };

    return {
      documentId,
      chunkId: optionalString(payload[PAYLOAD_FIELDS.chunkId]) ?? pointId,
      score: clampScore(point.score),
      metadata,
    };
  }
}
