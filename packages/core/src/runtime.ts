import { ok, err, type Result } from 'neverthrow';
import { isAbsolute, relative, resolve } from 'node:path';
import { loadConfig } from './config/config-parser.js';
import { OllamaEmbeddingProvider } from './embedding/ollama-embedding-provider.js';
import { QdrantVectorIndex } from './embedding/qdrant-vector-index.js';
import { RequestScopedEmbedder } from './embedding/request-scoped-embedder.js';
import { loadOntologyFile } from './ontology/schema-loader.js';
import { loadAuthorityFile } from './authority/authority-store.js';
import { SnapshotRegistry, type KnowledgeSnapshot } from './snapshot/snapshot-registry.js';
import { RetrievalPipeline } from './retrieval/pipeline.js';
import type { PartitionIndexes } from './retrieval/search-fanout.js';
import type { Clock } from './retrieval/deadline.js';
import { createConsoleLogger, type Logger } from './logging/logger.js';
import { DOCUMENT_TYPES } from './types/document.js';
import type { AuthorityStore } from './types/provider.js';
import type { AuthorityRagConfig } from './types/config.js';
import { ConfigurationError } from './types/errors.js';
import type { OntologyGraph } from './ontology/ontology-graph.js';

/** Everything needed at query time, loaded and wired. */
export interface AuthorityRagRuntime {
  readonly rootDir: string;
  readonly config: AuthorityRagConfig;
  readonly snapshots: SnapshotRegistry;
  readonly pipeline: RetrievalPipeline;
  readonly logger: Logger;
  /**
   * Re-read ontology and authority files and swap them in. On failure the
   * previous snapshot stays in place.
   */
  reload(): Promise<Result<KnowledgeSnapshot, ConfigurationError>>;
}

export interface RuntimeOptions {
  /** Project root directory (must contain .authrag.yaml). */
  rootDir: string;
  logger?: Logger;
  /** Per-partition indexes; Qdrant collections from config when omitted. */
  indexes?: PartitionIndexes;
  clock?: Clock;
}

interface KnowledgeFiles {
  ontology: OntologyGraph;
  authorities: AuthorityStore;
}

function resolveInsideRoot(rootDir: string, path: string, label: string): Result<string, ConfigurationError> {
  const root = resolve(rootDir);
  const resolved = resolve(root, path);
  const rel = relative(root, resolved);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    return err(new ConfigurationError(`${label} path escapes project root: ${path}`));
  }
  return ok(resolved);
}

async function loadKnowledge(
  rootDir: string,
  config: AuthorityRagConfig,
): Promise<Result<KnowledgeFiles, ConfigurationError>> {
  const ontologyPath = resolveInsideRoot(rootDir, config.ontology.path, 'Ontology');
  if (ontologyPath.isErr()) return err(ontologyPath.error);
  const authorityPath = resolveInsideRoot(rootDir, config.authority.path, 'Authority');
  if (authorityPath.isErr()) return err(authorityPath.error);

  const ontology = await loadOntologyFile(ontologyPath.value);
  if (ontology.isErr()) return err(ontology.error);

  const authorities = await loadAuthorityFile(authorityPath.value);
  if (authorities.isErr()) return err(authorities.error);

  return ok({ ontology: ontology.value, authorities: authorities.value });
}

function createQdrantIndexes(config: AuthorityRagConfig): PartitionIndexes {
  const embedder = new RequestScopedEmbedder(
    new OllamaEmbeddingProvider({
      baseUrl: config.embedding.baseUrl,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
    }),
  );

  const indexes: PartitionIndexes = {};
  for (const partition of DOCUMENT_TYPES) {
    indexes[partition] = new QdrantVectorIndex(partition, embedder, {
      url: config.vectorIndex.url,
      apiKey: config.vectorIndex.apiKey,
      collectionName: config.vectorIndex.collections[partition],
    });
  }
  return indexes;
}

/**
 * Load config, ontology and authority store, then wire the snapshot
 * registry, partition indexes and retrieval pipeline together.
 */
export async function createRuntime(
  options: RuntimeOptions,
): Promise<Result<AuthorityRagRuntime, ConfigurationError>> {
  const { rootDir } = options;

  const configResult = await loadConfig(rootDir);
  if (configResult.isErr()) {
    return err(configResult.error);
  }
  const config = configResult.value;
  const logger = options.logger ?? createConsoleLogger({ level: config.logging.level });

  const knowledge = await loadKnowledge(rootDir, config);
  if (knowledge.isErr()) {
    return err(knowledge.error);
  }

  const snapshots = new SnapshotRegistry(knowledge.value.ontology, knowledge.value.authorities);
  const pipeline = new RetrievalPipeline({
    snapshots,
    indexes: options.indexes ?? createQdrantIndexes(config),
    expansion: config.expansion,
    search: config.search,
    fusion: config.fusion,
    routing: config.routing,
    logger,
    clock: options.clock,
  });

  logger.info('knowledge snapshot loaded', {
    version: snapshots.current().version,
    concepts: knowledge.value.ontology.size,
    authors: knowledge.value.authorities.size(),
  });

  let pendingReload: Promise<Result<KnowledgeSnapshot, ConfigurationError>> | null = null;

  const reloadOnce = async (): Promise<Result<KnowledgeSnapshot, ConfigurationError>> => {
    const next = await loadKnowledge(rootDir, config);
    if (next.isErr()) {
      logger.error('snapshot reload failed; keeping current snapshot', {
        version: snapshots.current().version,
        error: next.error.message,
      });
      return err(next.error);
    }
    const snapshot = snapshots.replace(next.value.ontology, next.value.authorities);
    logger.info('knowledge snapshot reloaded', {
      version: snapshot.version,
      concepts: next.value.ontology.size,
      authors: next.value.authorities.size(),
    });
    return ok(snapshot);
  };

  return ok({
    rootDir,
    config,
    snapshots,
    pipeline,
    logger,
    reload(): Promise<Result<KnowledgeSnapshot, ConfigurationError>> {
      // Concurrent reload calls share one disk read and one swap
      if (!pendingReload) {
        pendingReload = reloadOnce().finally(() => {
          pendingReload = null;
        });
      }
      return pendingReload;
    },
  });
}
