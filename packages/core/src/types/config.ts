import type { DocumentType } from './document.js';
import type { Intent } from './query.js';

export interface OntologyConfig {
  path: string;
}

export interface AuthorityConfig {
  path: string;
}

export interface EmbeddingConfig {
  provider: 'ollama';
  model: string;
  dimensions: number;
  baseUrl: string;
}

export interface VectorIndexConfig {
  provider: 'qdrant';
  url: string;
  apiKey?: string;
  collections: Record<DocumentType, string>;
}

export interface ExpansionConfig {
  maxDepth: number;
  maxTerms: number;
  maxVariants: number;
}

export interface SearchConfig {
  topK: number;
  concurrency: number;
  deadlineMs: number;
}

export interface FusionWeights {
  similarity: number;
  authority: number;
  recency: number;
  partition: number;
}

export interface FusionConfig {
  weights: FusionWeights;
  recencyHorizonYears: number;
  maxResults: number;
  /** Share of maxResults a single partition may supply, in (0, 1]. */
  partitionCap: number;
}

export type RoutingTable = Record<Intent, Partial<Record<DocumentType, number>>>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
}

export interface AuthorityRagConfig {
  version: string;
  ontology: OntologyConfig;
  authority: AuthorityConfig;
  embedding: EmbeddingConfig;
  vectorIndex: VectorIndexConfig;
  expansion: ExpansionConfig;
  search: SearchConfig;
  fusion: FusionConfig;
  routing?: Partial<RoutingTable>;
  logging: LoggingConfig;
}
