import {
  hitKey,
  type AuthorityLevel,
  type DocumentHit,
  type DocumentType,
  type ResolvedAuthority,
} from '../types/document.js';
import type { AuthorityStore } from '../types/provider.js';

export const DOCUMENT_TYPE_AUTHORITY: Readonly<Record<DocumentType, AuthorityLevel>> = {
  standards: 5,
  academic: 3,
  transcripts: 2,
  audits: 2,
  blogs: 1,
};

interface AffiliationRule {
  pattern: RegExp;
  level: AuthorityLevel;
}

/** First match wins. */
const AFFILIATION_RULES: readonly AffiliationRule[] = [
  { pattern: /\b(w3c|world wide web consortium|iso)\b/i, level: 5 },
  { pattern: /\b(google|microsoft|apple|mozilla|adobe|meta|facebook)\b/i, level: 2 },
  { pattern: /\b(university|college|institute|research)\b/i, level: 3 },
  { pattern: /\b(accessibility|usability|inclusive|deque|tpg|paciello)\b/i, level: 2 },
];

export function inferAffiliationLevel(affiliation: string | undefined): AuthorityLevel | undefined {
  if (!affiliation) return undefined;
  return AFFILIATION_RULES.find((rule) => rule.pattern.test(affiliation))?.level;
}

/**
 * Attaches an authority level to each hit. Never mutates the store and
 * never fails: unknown authors fall back to the document-type default.
 */
export class AuthorityResolver {
  private readonly store: AuthorityStore;

  constructor(store: AuthorityStore) {
    this.store = store;
  }

  resolve(hit: Pick<DocumentHit, 'source'>): ResolvedAuthority {
    const { authorId, affiliation, documentType } = hit.source;

    if (authorId) {
      const record = this.store.lookup(authorId);
      if (record) return { ...record, origin: 'author' };
    }

    const inferred = inferAffiliationLevel(affiliation);
    if (inferred !== undefined) {
      return { authorId: authorId ?? '', level: inferred, expertise: [], origin: 'affiliation' };
    }

    return {
      authorId: authorId ?? '',
      level: DOCUMENT_TYPE_AUTHORITY[documentType],
      expertise: [],
      origin: 'document_type_default',
    };
  }

  resolveAll(hits: readonly DocumentHit[]): Map<string, ResolvedAuthority> {
    const resolved = new Map<string, ResolvedAuthority>();
    for (const hit of hits) {
      const key = hitKey(hit);
      if (!resolved.has(key)) resolved.set(key, this.resolve(hit));
    }
    return resolved;
  }
}
