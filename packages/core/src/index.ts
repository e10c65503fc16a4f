export type {
  DocumentType,
  Provenance,
  SourceMetadata,
  DocumentHit,
  AuthorityLevel,
  AuthorityRecord,
  AuthorityOrigin,
  ResolvedAuthority,
  RankedResult,
  Intent,
  Query,
  QueryVariant,
  ExpandedQuery,
  PartitionRoute,
  RetrievalRequest,
  RetrievalResponse,
  SearchFailure,
  SearchFailureKind,
  FanoutStats,
  AuthorityRagConfig,
  OntologyConfig,
  AuthorityConfig,
  EmbeddingConfig,
  VectorIndexConfig,
  ExpansionConfig,
  SearchConfig,
  FusionConfig,
  FusionWeights,
  RoutingTable,
  LogLevel,
  LoggingConfig,
  Embedder,
  VectorIndex,
  VectorMatch,
  AuthorityStore,
  IndexErrorKind,
  PipelineErrorCode,
  RetrievalUnavailableReason,
  DeadlineExceededReason,
} from './types/index.js';

export {
  DOCUMENT_TYPES,
  PROVENANCE_PRIORITY,
  INTENTS,
  hitKey,
  isDocumentType,
  isIntent,
  EmbedError,
  IndexError,
  ConfigurationError,
  PipelineError,
  RetrievalUnavailableError,
  DeadlineExceededError,
} from './types/index.js';

export {
  loadConfig,
  parseConfig,
  interpolateEnvVars,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config/config-parser.js';

export type { Logger, LogContext, ConsoleLoggerOptions } from './logging/logger.js';
export { createConsoleLogger, silentLogger, formatContext } from './logging/logger.js';

export type {
  Concept,
  ConceptRelation,
  DomainScore,
  ExpandOptions,
  ExpandedTerm,
  ExpansionKind,
  OntologyEdge,
  OntologyStats,
  RelationKind,
  OntologyDocument,
} from './ontology/index.js';
export {
  OntologyGraph,
  RELATION_KINDS,
  buildOntologyGraph,
  findHierarchyCycle,
  loadOntologyFile,
  normalizeTerm,
} from './ontology/index.js';

export type { AuthorityDocument, AuthorityEntry } from './authority/index.js';
export {
  InMemoryAuthorityStore,
  buildAuthorityStore,
  cleanAuthorName,
  loadAuthorityFile,
} from './authority/index.js';

export type { KnowledgeSnapshot } from './snapshot/snapshot-registry.js';
export { SnapshotRegistry } from './snapshot/snapshot-registry.js';

export type {
  IntentRule,
  IntentClassification,
  Clock,
  FanoutResult,
  PartitionIndexes,
  SearchFanoutOptions,
  FusionRankerOptions,
  RetrievalPipelineOptions,
  RetrievalPlan,
} from './retrieval/index.js';
export {
  IntentClassifier,
  INTENT_RULES,
  QueryExpander,
  CollectionRouter,
  DEFAULT_ROUTING_TABLE,
  Deadline,
  MAX_DEADLINE_MS,
  SearchFanout,
  AuthorityResolver,
  FusionRanker,
  RetrievalPipeline,
} from './retrieval/index.js';

export type { OllamaEmbeddingConfig, QdrantIndexConfig } from './embedding/index.js';
export { OllamaEmbeddingProvider, QdrantVectorIndex, RequestScopedEmbedder } from './embedding/index.js';

export type { AuthorityRagRuntime, RuntimeOptions } from './runtime.js';
export { createRuntime } from './runtime.js';

export { BUNDLED_ONTOLOGY_PATH, BUNDLED_AUTHORITIES_PATH } from './data-paths.js';

export { safeString, safeNumber, safeStringUnion, isRecord } from './utils/safe-cast.js';
