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
} from './document.js';
export { DOCUMENT_TYPES, PROVENANCE_PRIORITY, hitKey, isDocumentType } from './document.js';
export type {
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
} from './query.js';
export { INTENTS, isIntent } from './query.js';
export type {
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
} from './config.js';
export type {
  Embedder,
  VectorIndex,
  VectorMatch,
  AuthorityStore,
  IndexErrorKind,
} from './provider.js';
export { EmbedError, IndexError } from './provider.js';
export type {
  PipelineErrorCode,
  RetrievalUnavailableReason,
  DeadlineExceededReason,
} from './errors.js';
export {
  ConfigurationError,
  PipelineError,
  RetrievalUnavailableError,
  DeadlineExceededError,
} from './errors.js';
