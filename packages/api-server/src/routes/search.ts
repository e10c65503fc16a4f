import { Router } from 'express';
import { z } from 'zod';
import {
  DeadlineExceededError,
  MAX_DEADLINE_MS,
  isDocumentType,
  isIntent,
  type AuthorityRagRuntime,
  type DocumentType,
  type Intent,
  type RankedResult,
  type RetrievalResponse,
} from '@authority-rag/core';

const MAX_QUERY_LENGTH = 2000;

export const searchRequestSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'query must not be empty')
    .max(MAX_QUERY_LENGTH, `query must be at most ${MAX_QUERY_LENGTH} characters`),
  document_type: z
    .custom<DocumentType>((value) => typeof value === 'string' && isDocumentType(value), {
      message: 'document_type must be one of academic, standards, blogs, audits, transcripts',
    })
    .optional(),
  intent: z
    .custom<Intent>((value) => typeof value === 'string' && isIntent(value), {
      message: 'intent must be one of research, standards, implementation, testing, news, unknown',
    })
    .optional(),
  deadline_ms: z.number().int().positive().max(MAX_DEADLINE_MS).optional(),
});

export type SearchRequest = z.infer<typeof searchRequestSchema>;

export interface SearchResponseItem {
  document_id: string;
  chunk_id: string;
  partition: DocumentType;
  title: string | null;
  score: number;
  similarity: number;
  authority_level: number;
  authority_origin: string;
  author_id: string | null;
  recency: number;
  published_at: string | null;
  provenances: readonly string[];
  variants: readonly string[];
}

function formatResult(result: RankedResult): SearchResponseItem {
  return {
    document_id: result.documentId,
    chunk_id: result.chunkId,
    partition: result.partition,
    title: result.source.title ?? null,
    score: result.score,
    similarity: result.similarity,
    authority_level: result.authority.level,
    authority_origin: result.authority.origin,
    author_id: result.authority.authorId || null,
    recency: result.recency,
    published_at: result.source.publishedAt?.toISOString() ?? null,
    provenances: result.provenances,
    variants: result.variants,
  };
}

export function formatSearchResponse(response: RetrievalResponse): Record<string, unknown> {
  return {
    query: response.query,
    intent: response.intent,
    intent_source: response.intentSource,
    degraded: response.degraded,
    snapshot_version: response.snapshotVersion,
    variants: response.variants.map((v) => ({ text: v.text, provenance: v.provenance })),
    routes: response.routes,
    results: response.results.map(formatResult),
    total: response.results.length,
    failures: response.failures,
    stats: response.stats,
  };
}

export interface SearchRouteDeps {
  readonly runtime: AuthorityRagRuntime | null;
}

export function createSearchRouter(deps: SearchRouteDeps): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    const parsed = searchRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: 'Validation Error',
        details: parsed.error.issues,
      });
      return;
    }

    const runtime = deps.runtime;
    if (!runtime) {
      res.status(503).json({
        error: 'Service Unavailable',
        message: 'Retrieval runtime not initialized. Check the server configuration.',
      });
      return;
    }

    try {
      const { query, document_type, intent, deadline_ms } = parsed.data;
      const result = await runtime.pipeline.run({
        query,
        documentType: document_type,
        intent,
        deadlineMs: deadline_ms,
      });

      if (result.isErr()) {
        const status = result.error instanceof DeadlineExceededError ? 504 : 503;
        res.status(status).json({
          error: result.error.name,
          code: result.error.code,
          reason: result.error.reason,
          message: result.error.message,
        });
        return;
      }

      res.json(formatSearchResponse(result.value));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      res.status(500).json({
        error: 'Internal Server Error',
        message,
      });
    }
  });

  return router;
}
