import {
  normalizeTerm,
  type ExpansionKind,
  type ExpandedTerm,
  type OntologyGraph,
} from '../ontology/ontology-graph.js';
import { PROVENANCE_PRIORITY, type Provenance } from '../types/document.js';
import type { ExpandedQuery, Intent, Query, QueryVariant } from '../types/query.js';
import type { ExpansionConfig } from '../types/config.js';

export const DEFAULT_EXPANSION_CONFIG: ExpansionConfig = {
  maxDepth: 2,
  maxTerms: 25,
  maxVariants: 5,
};

/** Known compound terms kept together during tokenization. */
export const COMPOUND_TERMS: readonly string[] = [
  'color contrast',
  'contrast ratio',
  'screen reader',
  'keyboard navigation',
  'focus indicator',
  'focus order',
  'alt text',
  'live region',
  'skip link',
  'form label',
  'accessible name',
  'heading structure',
  'reduced motion',
  'touch target',
  'error message',
];

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'to', 'of', 'and', 'or', 'in', 'on', 'for', 'with',
  'by', 'at', 'as', 'is', 'are', 'was', 'be', 'it', 'its', 'this', 'that',
  'how', 'do', 'does', 'can', 'should', 'what', 'why', 'when', 'where',
  'which', 'who', 'my', 'me', 'we', 'you', 'your', 'our', 'about', 'from',
  'into', 'i', 'there', 'any', 'some',
]);

/** Edge families followed per intent. */
export const EXPANSION_KINDS_BY_INTENT: Readonly<Record<Intent, ReadonlySet<ExpansionKind>>> = {
  research: new Set<ExpansionKind>(['related', 'synonym']),
  standards: new Set<ExpansionKind>(['related', 'synonym']),
  implementation: new Set<ExpansionKind>(['hyponym', 'synonym']),
  testing: new Set<ExpansionKind>(['hyponym', 'synonym']),
  news: new Set<ExpansionKind>(['synonym']),
  unknown: new Set<ExpansionKind>(['synonym', 'hyponym', 'related']),
};

interface Expansion {
  sourceTerm: string;
  term: string;
  provenance: Provenance;
}

interface RankedVariant extends QueryVariant {
  frequency: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive, word-bounded, whitespace-tolerant pattern for a phrase. */
function phrasePattern(phrase: string): RegExp {
  const words = normalizeTerm(phrase).split(' ').map(escapeRegExp);
  return new RegExp(`(?<![a-z0-9])${words.join('\\s+')}(?![a-z0-9])`, 'i');
}

/**
 * Split a query into candidate terms: compound phrases first (longest
 * match wins), then single words without stop words. Terms keep the order
 * in which they appear in the query.
 */
export function extractCandidateTerms(text: string, phrases: readonly string[]): string[] {
  let working = normalizeTerm(text);
  const found: Array<{ term: string; index: number }> = [];

  const ordered = [...new Set(phrases.map(normalizeTerm))].sort(
    (a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0),
  );

  for (const phrase of ordered) {
    if (phrase.length === 0) continue;
    const pattern = new RegExp(phrasePattern(phrase).source, 'gi');
    for (const match of working.matchAll(pattern)) {
      found.push({ term: phrase, index: match.index ?? 0 });
    }
    working = working.replace(pattern, (matched) => ' '.repeat(matched.length));
  }

  for (const match of working.matchAll(/[a-z0-9]+(?:['-][a-z0-9]+)*/g)) {
    const word = match[0];
    if (word.length < 2 || STOP_WORDS.has(word)) continue;
    found.push({ term: word, index: match.index ?? 0 });
  }

  found.sort((a, b) => a.index - b.index);

  const terms: string[] = [];
  for (const { term } of found) {
    if (!terms.includes(term)) terms.push(term);
  }
  return terms;
}

/** Replace the first occurrence of `source` in `text` with `replacement`. */
export function substituteTerm(text: string, source: string, replacement: string): string | null {
  const match = phrasePattern(source).exec(text);
  if (!match) return null;
  return text.slice(0, match.index) + replacement + text.slice(match.index + match[0].length);
}

/**
 * Turns a query into a bounded set of search variants using the ontology.
 * The original query is always the first variant.
 */
export class QueryExpander {
  private readonly ontology: OntologyGraph;
  private readonly config: ExpansionConfig;

  constructor(ontology: OntologyGraph, config?: Partial<ExpansionConfig>) {
    this.ontology = ontology;
    this.config = { ...DEFAULT_EXPANSION_CONFIG, ...config };
  }

  expand(query: Query, intent: Intent): ExpandedQuery {
    const text = query.text.trim();
    const phrases = [...COMPOUND_TERMS, ...this.ontology.multiWordTerms()];
    const candidateTerms = extractCandidateTerms(text, phrases);
    const expansions = this.collectExpansions(candidateTerms, EXPANSION_KINDS_BY_INTENT[intent]);

    return {
      query,
      intent,
      candidateTerms,
      expansionTerms: expansions.map((e) => e.term),
      variants: this.buildVariants(text, candidateTerms, expansions),
    };
  }

  private collectExpansions(
    candidateTerms: readonly string[],
    kinds: ReadonlySet<ExpansionKind>,
  ): Expansion[] {
    const seen = new Set(candidateTerms.map(normalizeTerm));
    const expansions: Expansion[] = [];

    for (const sourceTerm of candidateTerms) {
      const expanded: ExpandedTerm[] = this.ontology.expandDetailed(sourceTerm, kinds, {
        maxDepth: this.config.maxDepth,
        maxResults: this.config.maxTerms,
      });
      for (const entry of expanded) {
        if (entry.provenance === 'original') continue;
        const key = normalizeTerm(entry.term);
        if (seen.has(key)) continue;
        seen.add(key);
        expansions.push({ sourceTerm, term: entry.term, provenance: entry.provenance });
      }
    }

    return expansions;
  }

  private buildVariants(
    text: string,
    candidateTerms: readonly string[],
    expansions: readonly Expansion[],
  ): QueryVariant[] {
    const maxVariants = Math.max(1, this.config.maxVariants);
    const variants: QueryVariant[] = [{ text, provenance: 'original' }];
    const seen = new Set([normalizeTerm(text)]);

    const substitutions: RankedVariant[] = [];
    for (const expansion of expansions) {
      const substituted = substituteTerm(text, expansion.sourceTerm, expansion.term);
      if (substituted === null) continue;
      substitutions.push({
        text: substituted,
        provenance: expansion.provenance,
        sourceTerm: expansion.sourceTerm,
        expansionTerm: expansion.term,
        frequency: this.ontology.termFrequency(expansion.term),
      });
    }

    substitutions.sort(
      (a, b) =>
        PROVENANCE_PRIORITY[a.provenance] - PROVENANCE_PRIORITY[b.provenance] ||
        a.frequency - b.frequency ||
        (a.text < b.text ? -1 : a.text > b.text ? 1 : 0),
    );

    const push = (variant: QueryVariant): void => {
      if (variants.length >= maxVariants) return;
      const key = normalizeTerm(variant.text);
      if (key.length === 0 || seen.has(key)) return;
      seen.add(key);
      variants.push(variant);
    };

    for (const { text: variantText, provenance, sourceTerm, expansionTerm } of substitutions) {
      push({ text: variantText, provenance, sourceTerm, expansionTerm });
    }

    const strongest = expansions.reduce<Provenance | null>(
      (best, e) =>
        best === null || PROVENANCE_PRIORITY[e.provenance] < PROVENANCE_PRIORITY[best] ? e.provenance : best,
      null,
    );
    if (strongest !== null) {
      push({
        text: [...candidateTerms, ...expansions.map((e) => e.term)].join(' '),
        provenance: strongest,
      });
    }

    return variants;
  }
}
