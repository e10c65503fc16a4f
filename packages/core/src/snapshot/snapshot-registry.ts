import type { OntologyGraph } from '../ontology/ontology-graph.js';
import type { AuthorityStore } from '../types/provider.js';

export interface KnowledgeSnapshot {
  readonly version: number;
  readonly ontology: OntologyGraph;
  readonly authorities: AuthorityStore;
  readonly loadedAt: Date;
}

/**
 * Holds the current ontology and authority store behind a single reference.
 * A request captures `current()` once; `replace()` swaps in a new snapshot
 * without touching the one in-flight requests hold.
 */
export class SnapshotRegistry {
  private snapshot: KnowledgeSnapshot;
  private readonly now: () => Date;

  constructor(ontology: OntologyGraph, authorities: AuthorityStore, now: () => Date = () => new Date()) {
    this.now = now;
    this.snapshot = Object.freeze({ version: 1, ontology, authorities, loadedAt: now() });
  }

  current(): KnowledgeSnapshot {
    return this.snapshot;
  }

  replace(ontology: OntologyGraph, authorities: AuthorityStore): KnowledgeSnapshot {
    const next = Object.freeze({
      version: this.snapshot.version + 1,
      ontology,
      authorities,
      loadedAt: this.now(),
    });
    this.snapshot = next;
    return next;
  }
}
