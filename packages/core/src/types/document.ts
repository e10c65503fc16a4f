export type DocumentType =
  | 'academic'
  | 'standards'
  | 'blogs'
  | 'audits'
  | 'transcripts';

/** Canonical partition order, used wherever a stable ordering is needed. */
export const DOCUMENT_TYPES: readonly DocumentType[] = [
  'academic',
  'standards',
  'blogs',
  'audits',
  'transcripts',
] as const;

export type Provenance = 'original' | 'synonym' | 'hyponym' | 'related';

/** Lower value = stronger provenance. */
export const PROVENANCE_PRIORITY: Readonly<Record<Provenance, number>> = {
  original: 0,
  synonym: 1,
  hyponym: 2,
  related: 3,
};

/**
 * Source metadata attached to an indexed chunk. Owned by the index; the
 * pipeline only reads it.
 */
export interface SourceMetadata {
  readonly documentType: DocumentType;
  readonly authorId?: string;
  readonly affiliation?: string;
  readonly publishedAt?: Date;
  readonly title?: string;
  /** Standards only: a superseded standard loses its recency exemption. */
  readonly superseded?: boolean;
}

export interface DocumentHit {
  readonly documentId: string;
  readonly chunkId: string;
  /** Raw similarity in [0, 1]. */
  readonly similarity: number;
  readonly partition: DocumentType;
  readonly variant: string;
  readonly provenance: Provenance;
  /** Position of the hit within its own (variant, partition) search. */
  readonly rank: number;
  readonly source: Readonly<SourceMetadata>;
}

export type AuthorityLevel = 1 | 2 | 3 | 4 | 5;

export interface AuthorityRecord {
  readonly authorId: string;
  readonly level: AuthorityLevel;
  readonly expertise: readonly string[];
}

export type AuthorityOrigin = 'author' | 'affiliation' | 'document_type_default';

export interface ResolvedAuthority extends AuthorityRecord {
  readonly origin: AuthorityOrigin;
}

export interface RankedResult {
  readonly documentId: string;
  readonly chunkId: string;
  readonly partition: DocumentType;
  readonly score: number;
  readonly similarity: number;
  readonly authority: ResolvedAuthority;
  readonly recency: number;
  readonly partitionWeight: number;
  readonly provenances: readonly Provenance[];
  readonly variants: readonly string[];
  readonly source: Readonly<SourceMetadata>;
}

/** Key identifying one chunk across variants and partitions. */
export function hitKey(hit: { documentId: string; chunkId: string }): string {
  return `${hit.documentId}::${hit.chunkId}`;
}

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}
