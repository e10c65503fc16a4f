import { Router } from 'express';
import { DOCUMENT_TYPES, type AuthorityRagRuntime } from '@authority-rag/core';

export interface StatusResponse {
  health: 'ok' | 'not_initialized';
  snapshot_version: number | null;
  loaded_at: string | null;
  ontology_version: string | null;
  concepts: number;
  authors: number;
  embedding_model: string | null;
  collections: Record<string, string>;
}

export interface StatusRouteDeps {
  readonly runtime: AuthorityRagRuntime | null;
}

export function createStatusRouter(deps: StatusRouteDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const runtime = deps.runtime;
    if (!runtime) {
      const status: StatusResponse = {
        health: 'not_initialized',
        snapshot_version: null,
        loaded_at: null,
        ontology_version: null,
        concepts: 0,
        authors: 0,
        embedding_model: null,
        collections: {},
      };
      res.json(status);
      return;
    }

    const snapshot = runtime.snapshots.current();
    const collections: Record<string, string> = {};
    for (const partition of DOCUMENT_TYPES) {
      collections[partition] = runtime.config.vectorIndex.collections[partition];
    }

    const status: StatusResponse = {
      health: 'ok',
      snapshot_version: snapshot.version,
      loaded_at: snapshot.loadedAt.toISOString(),
      ontology_version: snapshot.ontology.version,
      concepts: snapshot.ontology.size,
      authors: snapshot.authorities.size(),
      embedding_model: runtime.config.embedding.model,
      collections,
    };
    res.json(status);
  });

  return router;
}
