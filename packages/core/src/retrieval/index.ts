export type { IntentRule, IntentClassification } from './intent-classifier.js';
export { IntentClassifier, INTENT_RULES } from './intent-classifier.js';

export {
  QueryExpander,
  COMPOUND_TERMS,
  DEFAULT_EXPANSION_CONFIG,
  EXPANSION_KINDS_BY_INTENT,
  extractCandidateTerms,
  substituteTerm,
} from './query-expander.js';

export { CollectionRouter, DEFAULT_ROUTING_TABLE, mergeRoutingTable } from './collection-router.js';

export type { Clock, RaceOutcome } from './deadline.js';
export { Deadline, DeadlineAbortError, MAX_DEADLINE_MS, raceAbort } from './deadline.js';

export type { FanoutResult, PartitionIndexes, SearchFanoutOptions } from './search-fanout.js';
export { SearchFanout, DEFAULT_CONCURRENCY, DEFAULT_TOP_K } from './search-fanout.js';

export { AuthorityResolver, DOCUMENT_TYPE_AUTHORITY, inferAffiliationLevel } from './authority-resolver.js';

export type { FusionRankerOptions } from './fusion-ranker.js';
export {
  FusionRanker,
  DEFAULT_FUSION_CONFIG,
  DEFAULT_FUSION_WEIGHTS,
  compareRanked,
  recencyFactor,
} from './fusion-ranker.js';

export type { RetrievalPipelineOptions, RetrievalPlan } from './pipeline.js';
export { RetrievalPipeline, DEFAULT_DEADLINE_MS } from './pipeline.js';
