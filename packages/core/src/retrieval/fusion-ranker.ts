import {
  hitKey,
  PROVENANCE_PRIORITY,
  type DocumentHit,
  type DocumentType,
  type Provenance,
  type RankedResult,
  type ResolvedAuthority,
  type SourceMetadata,
} from '../types/document.js';
import type { FusionConfig, FusionWeights } from '../types/config.js';
import type { PartitionRoute } from '../types/query.js';
import type { Clock } from './deadline.js';
import { DOCUMENT_TYPE_AUTHORITY } from './authority-resolver.js';

export const DEFAULT_FUSION_WEIGHTS: FusionWeights = {
  similarity: 0.5,
  authority: 0.25,
  recency: 0.15,
  partition: 0.1,
};

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
  weights: DEFAULT_FUSION_WEIGHTS,
  recencyHorizonYears: 5,
  maxResults: 10,
  partitionCap: 0.6,
};

const SCORE_EPSILON = 1e-9;
const MS_PER_YEAR = 365.25 * 24 * 60 * 60 * 1000;
const MAX_AUTHORITY_LEVEL = 5;

export interface FusionRankerOptions extends Partial<FusionConfig> {
  clock?: Clock;
}

interface MergedHit {
  documentId: string;
  chunkId: string;
  partition: DocumentType;
  similarity: number;
  partitionWeight: number;
  provenances: Set<Provenance>;
  variants: string[];
  source: Readonly<SourceMetadata>;
}

/**
 * Linear decay from 1 (published now or later) to 0 at the horizon.
 * Standards that are still in force never decay; undated sources score 0.
 */
export function recencyFactor(source: SourceMetadata, now: number, horizonYears: number): number {
  if (source.documentType === 'standards' && source.superseded !== true) return 1;
  if (!source.publishedAt) return 0;

  const published = source.publishedAt.getTime();
  if (Number.isNaN(published)) return 0;

  const ageYears = (now - published) / MS_PER_YEAR;
  if (ageYears <= 0) return 1;
  if (horizonYears <= 0) return 0;
  return Math.min(1, Math.max(0, 1 - ageYears / horizonYears));
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Score desc (ties within 1e-9), similarity desc, authority desc, ids asc. */
export function compareRanked(a: RankedResult, b: RankedResult): number {
  if (Math.abs(a.score - b.score) > SCORE_EPSILON) return b.score - a.score;
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  if (a.authority.level !== b.authority.level) return b.authority.level - a.authority.level;
  return compareText(a.documentId, b.documentId) || compareText(a.chunkId, b.chunkId);
}

/**
 * Merges fan-out hits into a deduplicated, scored and diversified list.
 * Output order depends only on the hits' values, never on their arrival order.
 */
export class FusionRanker {
  private readonly config: FusionConfig;
  private readonly clock: Clock;

  constructor(options: FusionRankerOptions = {}) {
    const { clock, ...config } = options;
    this.config = { ...DEFAULT_FUSION_CONFIG, ...config };
    this.clock = clock ?? Date.now;
  }

  rank(
    hits: readonly DocumentHit[],
    authorities: ReadonlyMap<string, ResolvedAuthority>,
    routes: readonly PartitionRoute[],
  ): RankedResult[] {
    const routeWeights = new Map<DocumentType, number>(routes.map((r) => [r.partition, r.weight]));
    const merged = this.deduplicate(hits, routeWeights);
    const now = this.clock();

    const scored = merged.map((hit) => this.score(hit, authorities, now)).sort(compareRanked);
    return this.diversify(scored);
  }

  private deduplicate(
    hits: readonly DocumentHit[],
    routeWeights: ReadonlyMap<DocumentType, number>,
  ): MergedHit[] {
    const byKey = new Map<string, MergedHit>();

    for (const hit of hits) {
      const key = hitKey(hit);
      const weight = routeWeights.get(hit.partition) ?? 0;
      const existing = byKey.get(key);

      if (!existing) {
        byKey.set(key, {
          documentId: hit.documentId,
          chunkId: hit.chunkId,
          partition: hit.partition,
          similarity: hit.similarity,
          partitionWeight: weight,
          provenances: new Set([hit.provenance]),
          variants: [hit.variant],
          source: hit.source,
        });
        continue;
      }

      existing.similarity = Math.max(existing.similarity, hit.similarity);
      existing.partitionWeight = Math.max(existing.partitionWeight, weight);
      existing.provenances.add(hit.provenance);
      if (!existing.variants.includes(hit.variant)) existing.variants.push(hit.variant);
    }

    return [...byKey.values()];
  }

  private score(
    hit: MergedHit,
    authorities: ReadonlyMap<string, ResolvedAuthority>,
    now: number,
  ): RankedResult {
    const { weights, recencyHorizonYears } = this.config;
    const authority: ResolvedAuthority = authorities.get(hitKey(hit)) ?? {
      authorId: hit.source.authorId ?? '',
      level: DOCUMENT_TYPE_AUTHORITY[hit.source.documentType],
      expertise: [],
      origin: 'document_type_default',
    };
    const similarity = Math.min(1, Math.max(0, hit.similarity));
    const recency = recencyFactor(hit.source, now, recencyHorizonYears);

    const score =
      weights.similarity * similarity +
      weights.authority * (authority.level / MAX_AUTHORITY_LEVEL) +
      weights.recency * recency +
      weights.partition * hit.partitionWeight;

    return {
      documentId: hit.documentId,
      chunkId: hit.chunkId,
      partition: hit.partition,
      score,
      similarity,
      authority,
      recency,
      partitionWeight: hit.partitionWeight,
      provenances: [...hit.provenances].sort((a, b) => PROVENANCE_PRIORITY[a] - PROVENANCE_PRIORITY[b]),
      variants: [...hit.variants].sort(compareText),
      source: hit.source,
    };
  }

  /**
   * Walk the sorted list under a per-partition quota. If that leaves the
   * page short, refill from the skipped items in score order.
   */
  private diversify(sorted: readonly RankedResult[]): RankedResult[] {
    const maxResults = Math.max(1, Math.floor(this.config.maxResults));
    const cap = Math.max(1, Math.floor(this.config.partitionCap * maxResults + SCORE_EPSILON));

    const selected: RankedResult[] = [];
    const skipped: RankedResult[] = [];
    const counts = new Map<DocumentType, number>();

    for (const result of sorted) {
      if (selected.length >= maxResults) break;
      const count = counts.get(result.partition) ?? 0;
      if (count >= cap) {
        skipped.push(result);
        continue;
      }
      counts.set(result.partition, count + 1);
      selected.push(result);
    }

    for (const result of skipped) {
      if (selected.length >= maxResults) break;
      selected.push(result);
    }

    return selected.sort(compareRanked);
  }
}
