import { DOCUMENT_TYPES, type DocumentType } from '../types/document.js';
import type { RoutingTable } from '../types/config.js';
import type { ExpandedQuery, Intent, PartitionRoute } from '../types/query.js';

const UNKNOWN_WEIGHT = 0.5;

export const DEFAULT_ROUTING_TABLE: Readonly<RoutingTable> = {
  research: { academic: 1.0, standards: 0.4, blogs: 0.3 },
  standards: { standards: 1.0, blogs: 0.5, academic: 0.3 },
  implementation: { blogs: 1.0, audits: 0.8, standards: 0.3 },
  testing: { transcripts: 1.0, audits: 0.8, blogs: 0.2 },
  news: { blogs: 1.0, academic: 0.4, standards: 0.2 },
  unknown: {
    academic: UNKNOWN_WEIGHT,
    standards: UNKNOWN_WEIGHT,
    blogs: UNKNOWN_WEIGHT,
    audits: UNKNOWN_WEIGHT,
    transcripts: UNKNOWN_WEIGHT,
  },
};

/**
 * Replace whole intent rows of the default table. A row given in
 * `overrides` wins completely; it is not merged partition by partition.
 */
export function mergeRoutingTable(overrides: Partial<RoutingTable> | undefined): RoutingTable {
  return { ...DEFAULT_ROUTING_TABLE, ...overrides };
}

/**
 * Maps an intent to weighted document-type partitions. Routes come back
 * ordered by weight, then by canonical partition order.
 */
export class CollectionRouter {
  private readonly table: RoutingTable;

  constructor(overrides?: Partial<RoutingTable>) {
    this.table = mergeRoutingTable(overrides);
  }

  route(intent: Intent, expanded?: Pick<ExpandedQuery, 'query'>): PartitionRoute[] {
    const filter = expanded?.query.documentType;
    if (filter) {
      return [{ partition: filter, weight: 1.0 }];
    }

    const row = this.table[intent];
    const routes: PartitionRoute[] = [];
    for (const partition of DOCUMENT_TYPES) {
      const weight = row[partition];
      if (weight !== undefined && weight > 0) {
        routes.push({ partition, weight });
      }
    }

    return routes.sort(
      (a, b) => b.weight - a.weight || partitionOrder(a.partition) - partitionOrder(b.partition),
    );
  }
}

function partitionOrder(partition: DocumentType): number {
  return DOCUMENT_TYPES.indexOf(partition);
}
