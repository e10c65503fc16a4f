import type { DocumentType, Provenance, RankedResult } from './document.js';

export type Intent =
  | 'research'
  | 'standards'
  | 'implementation'
  | 'testing'
  | 'news'
  | 'unknown';

export const INTENTS: readonly Intent[] = [
  'research',
  'standards',
  'implementation',
  'testing',
  'news',
  'unknown',
] as const;

export interface Query {
  readonly text: string;
  readonly documentType?: DocumentType;
}

export interface QueryVariant {
  readonly text: string;
  readonly provenance: Provenance;
  /** Query term the expansion replaced; absent for the original query. */
  readonly sourceTerm?: string;
  /** Expansion term substituted in; absent for the original query. */
  readonly expansionTerm?: string;
}

export interface ExpandedQuery {
  readonly query: Query;
  readonly intent: Intent;
  /** Candidate terms extracted from the query text, in query order. */
  readonly candidateTerms: readonly string[];
  /** Merged ontology expansion terms, deduplicated. */
  readonly expansionTerms: readonly string[];
  readonly variants: readonly QueryVariant[];
}

export interface PartitionRoute {
  readonly partition: DocumentType;
  readonly weight: number;
}

export interface RetrievalRequest {
  readonly query: string;
  readonly documentType?: DocumentType;
  /** Skips classification when set. */
  readonly intent?: Intent;
  /** Request budget in milliseconds, measured from ingress. */
  readonly deadlineMs?: number;
}

export type SearchFailureKind =
  | 'unavailable'
  | 'embedding_failed'
  | 'query_failed'
  | 'aborted'
  | 'timeout'
  | 'missing_index'
  | 'exception';

export interface SearchFailure {
  readonly variant: string;
  readonly partition: DocumentType;
  readonly kind: SearchFailureKind;
  readonly message: string;
}

export interface FanoutStats {
  readonly dispatched: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly timedOut: number;
}

export interface RetrievalResponse {
  readonly query: string;
  readonly intent: Intent;
  readonly intentSource: 'override' | 'classifier';
  readonly variants: readonly QueryVariant[];
  readonly routes: readonly PartitionRoute[];
  readonly results: readonly RankedResult[];
  readonly degraded: boolean;
  readonly failures: readonly SearchFailure[];
  readonly stats: FanoutStats;
  readonly snapshotVersion: number;
}

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}
