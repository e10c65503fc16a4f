import type { Intent } from '../types/query.js';

export interface IntentRule {
  readonly id: string;
  readonly intent: Intent;
  readonly patterns: readonly RegExp[];
}

export interface IntentClassification {
  intent: Intent;
  /** Id of the rule that matched; null when the query fell through to unknown. */
  ruleId: string | null;
}

const MAX_QUERY_LENGTH = 2000;

/**
 * Ordered rule table. Evaluated top to bottom against the lowercased query;
 * the first rule with a matching pattern decides the intent, so order
 * resolves queries that carry markers for several intents.
 *
 * | # | rule                  | intent         |
 * |---|-----------------------|----------------|
 * | 1 | research-evidence     | research       |
 * | 2 | standards-reference   | standards      |
 * | 3 | testing-activity      | testing        |
 * | 4 | implementation-howto  | implementation |
 * | 5 | news-recency          | news           |
 */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    id: 'research-evidence',
    intent: 'research',
    patterns: [
      /\bresearch\s+(shows?|suggests?|finds?|found|says)\b/,
      /\bstud(y|ies)\b/,
      /\bevidence\b/,
      /\bpeer[-\s]reviewed\b/,
      /\bpapers?\b/,
      /\bliterature\b/,
      /\bexperiments?\b/,
    ],
  },
  {
    id: 'standards-reference',
    intent: 'standards',
    patterns: [
      /\baccording\s+to\b/,
      /\bwcag\b/,
      /\bsuccess\s+criteri(on|a)\b/,
      /\bconformance\b/,
      /\bsection\s+508\b/,
      /\ben\s+301\s+549\b/,
      /\bnormative\b/,
      /\bcomplian(ce|t)\b/,
    ],
  },
  {
    id: 'testing-activity',
    intent: 'testing',
    patterns: [
      /\btesters?\s+(found|reported|noticed|flagged)\b/,
      /\bhow\s+(do\s+i|to|should\s+i|can\s+i)\s+(test|verify|audit)\b/,
      /\btesting\b/,
      /\btest\s+with\b/,
      /\busability\s+tests?\b/,
      /\bscreen\s+reader\s+tests?\b/,
    ],
  },
  {
    id: 'implementation-howto',
    intent: 'implementation',
    patterns: [
      /\bhow\s+(do\s+i|to|can\s+i|should\s+i)\b/,
      /\bimplement(ing|ation)?\b/,
      /\bfix(ing)?\b/,
      /\bbuild(ing)?\b/,
      /\bcode\s+examples?\b/,
      /\bwhy\s+(is|does|isn't|doesn't)\b.*\b(not\s+working|broken|fail(s|ing)?)\b/,
    ],
  },
  {
    id: 'news-recency',
    intent: 'news',
    patterns: [
      /\blatest\b/,
      /\bwhat'?s\s+new\b/,
      /\brecent(ly)?\b/,
      /\bannounce(d|ment|ments)?\b/,
      /\bnews\b/,
      /\bupcoming\b/,
    ],
  },
];

/**
 * Deterministic, rule-driven intent detection. Never fails: a query that
 * matches no rule is `unknown`, which selects the broadest strategy
 * downstream.
 */
export class IntentClassifier {
  private readonly rules: readonly IntentRule[];

  constructor(rules: readonly IntentRule[] = INTENT_RULES) {
    this.rules = rules;
  }

  classify(text: string): Intent {
    return this.classifyDetailed(text).intent;
  }

  classifyDetailed(text: string): IntentClassification {
    const lowered = text.trim().toLowerCase();
    if (lowered.length === 0 || lowered.length > MAX_QUERY_LENGTH) {
      return { intent: 'unknown', ruleId: null };
    }

    for (const rule of this.rules) {
      if (rule.patterns.some((pattern) => pattern.test(lowered))) {
        return { intent: rule.intent, ruleId: rule.id };
      }
    }
    return { intent: 'unknown', ruleId: null };
  }
}
