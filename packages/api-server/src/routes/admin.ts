import { Router } from 'express';
import type { AuthorityRagRuntime } from '@authority-rag/core';
import { requireAdmin } from '../middleware/auth.js';

export interface AdminRouteDeps {
  readonly runtime: AuthorityRagRuntime | null;
}

export function createAdminRouter(deps: AdminRouteDeps): Router {
  const router = Router();

  router.post('/reload', requireAdmin, async (_req, res) => {
    const runtime = deps.runtime;
    if (!runtime) {
      res.status(503).json({
        error: 'Service Unavailable',
        message: 'Retrieval runtime not initialized. Check the server configuration.',
      });
      return;
    }

    const result = await runtime.reload();
    if (result.isErr()) {
      res.status(500).json({
        error: 'Reload Failed',
        message: result.error.message,
        snapshot_version: runtime.snapshots.current().version,
      });
      return;
    }

    res.json({
      snapshot_version: result.value.version,
      loaded_at: result.value.loadedAt.toISOString(),
      concepts: result.value.ontology.size,
      authors: result.value.authorities.size(),
    });
  });

  return router;
}
