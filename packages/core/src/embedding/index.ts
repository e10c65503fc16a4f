export type { OllamaEmbeddingConfig } from './ollama-embedding-provider.js';
export { OllamaEmbeddingProvider } from './ollama-embedding-provider.js';

export type { QdrantIndexConfig } from './qdrant-vector-index.js';
export { QdrantVectorIndex, PAYLOAD_FIELDS } from './qdrant-vector-index.js';

export { RequestScopedEmbedder } from './request-scoped-embedder.js';
