import type { Provenance } from '../types/document.js';

export const RELATION_KINDS = [
  'synonym',
  'hyponym',
  'implements',
  'requires',
  'addresses',
  'tested_by',
] as const;

export type RelationKind = (typeof RELATION_KINDS)[number];

/** Edge families the traversal can be restricted to. */
export type ExpansionKind = 'synonym' | 'hyponym' | 'related';

export interface ConceptRelation {
  readonly kind: RelationKind;
  readonly target: string;
}

export interface Concept {
  readonly id: string;
  readonly label: string;
  readonly definition: string;
  readonly parents: readonly string[];
  readonly children: readonly string[];
  readonly synonyms: readonly string[];
  readonly relations: readonly ConceptRelation[];
  readonly domains: readonly string[];
}

export interface OntologyEdge {
  readonly source: string;
  readonly target: string;
  readonly kind: RelationKind;
}

export interface ExpandedTerm {
  readonly term: string;
  readonly provenance: Provenance;
  /** Hops from the matched concept; 0 for the term itself and its own synonyms. */
  readonly depth: number;
  readonly conceptId?: string;
}

export interface ExpandOptions {
  maxDepth?: number;
  maxResults?: number;
}

export interface OntologyStats {
  concepts: number;
  roots: number;
  hierarchyEdges: number;
  synonyms: number;
  relations: Record<RelationKind, number>;
  domains: Record<string, number>;
}

export interface DomainScore {
  domain: string;
  score: number;
}

export const DEFAULT_MAX_DEPTH = 2;
export const DEFAULT_MAX_RESULTS = 25;
const MIN_SUBSTRING_LENGTH = 3;

const KIND_PRIORITY: Readonly<Record<ExpansionKind, number>> = {
  synonym: 0,
  hyponym: 1,
  related: 2,
};

export function expansionKindOf(kind: RelationKind): ExpansionKind {
  if (kind === 'synonym' || kind === 'hyponym') return kind;
  return 'related';
}

export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase().replace(/\s+/g, ' ');
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortedTerms(terms: readonly string[]): string[] {
  return [...terms].sort((a, b) => compareText(normalizeTerm(a), normalizeTerm(b)));
}

/**
 * Immutable concept graph: one node table plus typed, directed edge lists.
 *
 * Construct through `buildOntologyGraph`, which validates references and
 * parent/child acyclicity first; the constructor trusts its input.
 */
export class OntologyGraph {
  readonly version: string;
  private readonly nodes = new Map<string, Concept>();
  private readonly outgoing = new Map<string, OntologyEdge[]>();
  private readonly termIndex = new Map<string, Set<string>>();
  private readonly haystacks = new Map<string, string>();
  private readonly phrases: readonly string[];

  constructor(concepts: readonly Concept[], version = '1') {
    this.version = version;

    for (const concept of concepts) {
      this.nodes.set(concept.id, concept);
    }

    for (const concept of concepts) {
      const edges: OntologyEdge[] = [];
      for (const child of concept.children) {
        edges.push({ source: concept.id, target: child, kind: 'hyponym' });
      }
      for (const relation of concept.relations) {
        edges.push({ source: concept.id, target: relation.target, kind: relation.kind });
      }
      edges.sort((a, b) => this.compareEdges(a, b));
      this.outgoing.set(concept.id, edges);

      this.indexTerm(concept.id, concept.id);
      this.indexTerm(concept.label, concept.id);
      for (const synonym of concept.synonyms) {
        this.indexTerm(synonym, concept.id);
      }

      this.haystacks.set(
        concept.id,
        [concept.label, ...concept.synonyms, concept.definition].join('\n').toLowerCase(),
      );
    }

    const multiWord = new Set<string>();
    for (const concept of concepts) {
      for (const term of [concept.label, ...concept.synonyms]) {
        const normalized = normalizeTerm(term);
        if (normalized.includes(' ')) multiWord.add(normalized);
      }
    }
    this.phrases = [...multiWord].sort((a, b) => b.length - a.length || compareText(a, b));
  }

  get size(): number {
    return this.nodes.size;
  }

  getConcept(id: string): Concept | undefined {
    return this.nodes.get(id);
  }

  getAllConcepts(): Concept[] {
    return [...this.nodes.values()];
  }

  /** Outgoing edges in traversal order: kind priority, then target label. */
  getEdges(conceptId: string): readonly OntologyEdge[] {
    return this.outgoing.get(conceptId) ?? [];
  }

  /**
   * Concepts matching a term: exact (case-insensitive) id, label or synonym
   * first; otherwise labels and synonyms containing the term.
   */
  findConcepts(term: string): Concept[] {
    const key = normalizeTerm(term);
    if (key.length === 0) return [];

    const exact = this.termIndex.get(key);
    if (exact && exact.size > 0) {
      return this.sortConcepts([...exact]);
    }

    if (key.length < MIN_SUBSTRING_LENGTH) return [];

    const partial: string[] = [];
    for (const concept of this.nodes.values()) {
      const names = [concept.label, ...concept.synonyms];
      if (names.some((name) => normalizeTerm(name).includes(key))) {
        partial.push(concept.id);
      }
    }
    return this.sortConcepts(partial);
  }

  /** Related-term set for `term`, the term itself first. */
  expand(
    term: string,
    kinds: ReadonlySet<ExpansionKind>,
    maxDepth = DEFAULT_MAX_DEPTH,
    maxResults = DEFAULT_MAX_RESULTS,
  ): string[] {
    return this.expandDetailed(term, kinds, { maxDepth, maxResults }).map((t) => t.term);
  }

  /**
   * Breadth-first expansion from the concepts matching `term`, following
   * only edges whose family is in `kinds`. An unknown term yields just itself.
   */
  expandDetailed(
    term: string,
    kinds: ReadonlySet<ExpansionKind>,
    options: ExpandOptions = {},
  ): ExpandedTerm[] {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const maxResults = Math.max(1, options.maxResults ?? DEFAULT_MAX_RESULTS);
    const results: ExpandedTerm[] = [];
    const seen = new Set<string>();

    const add = (value: string, provenance: Provenance, depth: number, conceptId?: string): void => {
      if (results.length >= maxResults) return;
      const key = normalizeTerm(value);
      if (key.length === 0 || seen.has(key)) return;
      seen.add(key);
      results.push({ term: value, provenance, depth, conceptId });
    };

    add(term, 'original', 0);

    const matches = this.findConcepts(term);
    const visited = new Set<string>(matches.map((c) => c.id));
    const queue: Array<{ concept: Concept; depth: number }> = [];

    for (const concept of matches) {
      if (kinds.has('synonym')) {
        add(concept.label, 'synonym', 0, concept.id);
        for (const synonym of sortedTerms(concept.synonyms)) {
          add(synonym, 'synonym', 0, concept.id);
        }
      }
      queue.push({ concept, depth: 0 });
    }

    for (let head = 0; head < queue.length && results.length < maxResults; head++) {
      const current = queue[head];
      if (!current || current.depth >= maxDepth) continue;

      for (const edge of this.getEdges(current.concept.id)) {
        const family = expansionKindOf(edge.kind);
        if (!kinds.has(family) || visited.has(edge.target)) continue;

        const target = this.nodes.get(edge.target);
        if (!target) continue;
        visited.add(target.id);

        const depth = current.depth + 1;
        add(target.label, family, depth, target.id);
        if (kinds.has('synonym')) {
          for (const synonym of sortedTerms(target.synonyms)) {
            add(synonym, family, depth, target.id);
          }
        }
        queue.push({ concept: target, depth });
      }
    }

    return results;
  }

  /** Number of concepts mentioning the term. Lower means more specific. */
  termFrequency(term: string): number {
    const key = normalizeTerm(term);
    if (key.length === 0) return 0;
    let count = 0;
    for (const haystack of this.haystacks.values()) {
      if (haystack.includes(key)) count++;
    }
    return count;
  }

  /** Multi-word labels and synonyms, longest first. */
  multiWordTerms(): readonly string[] {
    return this.phrases;
  }

  /**
   * Rank domains by the share of their concepts' labels and synonyms that
   * appear in the text. Domains without a match are omitted.
   */
  classifyDomains(text: string): DomainScore[] {
    const haystack = normalizeTerm(text);
    const domainTerms = new Map<string, Set<string>>();
    for (const concept of this.nodes.values()) {
      for (const domain of concept.domains) {
        const terms = domainTerms.get(domain) ?? new Set<string>();
        terms.add(normalizeTerm(concept.label));
        for (const synonym of concept.synonyms) terms.add(normalizeTerm(synonym));
        domainTerms.set(domain, terms);
      }
    }

    const scores: DomainScore[] = [];
    for (const [domain, terms] of domainTerms) {
      let matched = 0;
      for (const term of terms) {
        if (haystack.includes(term)) matched++;
      }
      if (matched > 0) {
        scores.push({ domain, score: matched / terms.size });
      }
    }
    return scores.sort((a, b) => b.score - a.score || compareText(a.domain, b.domain));
  }

  stats(): OntologyStats {
    const relations: Record<RelationKind, number> = {
      synonym: 0,
      hyponym: 0,
      implements: 0,
      requires: 0,
      addresses: 0,
      tested_by: 0,
    };
    const domains: Record<string, number> = {};
    let hierarchyEdges = 0;
    let synonyms = 0;
    let roots = 0;

    for (const concept of this.nodes.values()) {
      hierarchyEdges += concept.children.length;
      synonyms += concept.synonyms.length;
      if (concept.parents.length === 0) roots++;
      for (const relation of concept.relations) {
        relations[relation.kind]++;
      }
      for (const domain of concept.domains) {
        domains[domain] = (domains[domain] ?? 0) + 1;
      }
    }

    return { concepts: this.nodes.size, roots, hierarchyEdges, synonyms, relations, domains };
  }

  private indexTerm(term: string, conceptId: string): void {
    const key = normalizeTerm(term);
    if (key.length === 0) return;
    const ids = this.termIndex.get(key);
    if (ids) {
      ids.add(conceptId);
    } else {
      this.termIndex.set(key, new Set([conceptId]));
    }
  }

  private sortConcepts(ids: string[]): Concept[] {
    const concepts: Concept[] = [];
    for (const id of ids) {
      const concept = this.nodes.get(id);
      if (concept) concepts.push(concept);
    }
    return concepts.sort(
      (a, b) => compareText(normalizeTerm(a.label), normalizeTerm(b.label)) || compareText(a.id, b.id),
    );
  }

  private compareEdges(a: OntologyEdge, b: OntologyEdge): number {
    const byKind = KIND_PRIORITY[expansionKindOf(a.kind)] - KIND_PRIORITY[expansionKindOf(b.kind)];
    if (byKind !== 0) return byKind;
    const labelA = normalizeTerm(this.nodes.get(a.target)?.label ?? a.target);
    const labelB = normalizeTerm(this.nodes.get(b.target)?.label ?? b.target);
    return compareText(labelA, labelB) || compareText(a.target, b.target);
  }
}
