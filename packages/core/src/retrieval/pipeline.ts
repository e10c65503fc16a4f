import { ok, err, type Result } from 'neverthrow';
import type { ExpansionConfig, RoutingTable, SearchConfig } from '../types/config.js';
import type {
  Intent,
  PartitionRoute,
  QueryVariant,
  RetrievalRequest,
  RetrievalResponse,
} from '../types/query.js';
import { DeadlineExceededError, type PipelineError } from '../types/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { KnowledgeSnapshot, SnapshotRegistry } from '../snapshot/snapshot-registry.js';
import { IntentClassifier } from './intent-classifier.js';
import { QueryExpander } from './query-expander.js';
import { CollectionRouter } from './collection-router.js';
import { SearchFanout, type PartitionIndexes } from './search-fanout.js';
import { AuthorityResolver } from './authority-resolver.js';
import { FusionRanker, type FusionRankerOptions } from './fusion-ranker.js';
import { Deadline, type Clock } from './deadline.js';

export const DEFAULT_DEADLINE_MS = 5000;

export interface RetrievalPipelineOptions {
  snapshots: SnapshotRegistry;
  indexes: PartitionIndexes;
  classifier?: IntentClassifier;
  expansion?: Partial<ExpansionConfig>;
  search?: Partial<SearchConfig>;
  fusion?: FusionRankerOptions;
  routing?: Partial<RoutingTable>;
  logger?: Logger;
  /** Clock for request deadlines. */
  clock?: Clock;
}

/** Output of the synchronous stages: what the fan-out would run. */
export interface RetrievalPlan {
  query: string;
  intent: Intent;
  intentSource: 'override' | 'classifier';
  /** Classifier rule that decided the intent; null for overrides and unknown. */
  ruleId: string | null;
  candidateTerms: readonly string[];
  expansionTerms: readonly string[];
  variants: readonly QueryVariant[];
  routes: readonly PartitionRoute[];
  snapshotVersion: number;
}

/**
 * Sequences classification, expansion, routing, fan-out, authority
 * resolution and fusion for one request against one captured snapshot.
 */
export class RetrievalPipeline {
  private readonly snapshots: SnapshotRegistry;
  private readonly classifier: IntentClassifier;
  private readonly router: CollectionRouter;
  private readonly fanout: SearchFanout;
  private readonly ranker: FusionRanker;
  private readonly expansion: Partial<ExpansionConfig>;
  private readonly deadlineMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: RetrievalPipelineOptions) {
    this.snapshots = options.snapshots;
    this.classifier = options.classifier ?? new IntentClassifier();
    this.router = new CollectionRouter(options.routing);
    this.logger = options.logger ?? silentLogger;
    this.fanout = new SearchFanout(options.indexes, {
      topK: options.search?.topK,
      concurrency: options.search?.concurrency,
      logger: this.logger,
    });
    this.ranker = new FusionRanker(options.fusion);
    this.expansion = options.expansion ?? {};
    this.deadlineMs = options.search?.deadlineMs ?? DEFAULT_DEADLINE_MS;
    this.clock = options.clock ?? Date.now;
  }

  explain(request: RetrievalRequest): RetrievalPlan {
    return this.plan(request, this.snapshots.current());
  }

  async run(request: RetrievalRequest): Promise<Result<RetrievalResponse, PipelineError>> {
    const snapshot = this.snapshots.current();
    const deadline = new Deadline(request.deadlineMs ?? this.deadlineMs, this.clock);

    try {
      if (deadline.expired()) {
        return err(
          new DeadlineExceededError(
            'deadline_exceeded_before_classification',
            `Deadline of ${deadline.budgetMs}ms passed before classification`,
          ),
        );
      }

      const plan = this.plan(request, snapshot);

      if (deadline.expired()) {
        return err(
          new DeadlineExceededError(
            'deadline_exceeded_before_search',
            `Deadline of ${deadline.budgetMs}ms passed before search fan-out`,
          ),
        );
      }

      const fanout = await this.fanout.search(plan, plan.routes, deadline);
      if (fanout.isErr()) {
        this.logger.error('retrieval unavailable', {
          reason: fanout.error.reason,
          error: fanout.error.message,
        });
        return err(fanout.error);
      }

      const { hits, failures, degraded, stats } = fanout.value;
      const authorities = new AuthorityResolver(snapshot.authorities).resolveAll(hits);
      const results = this.ranker.rank(hits, authorities, plan.routes);

      this.logger.info('retrieval complete', {
        intent: plan.intent,
        variants: plan.variants.length,
        partitions: plan.routes.length,
        hits: hits.length,
        results: results.length,
        degraded,
        snapshot: snapshot.version,
      });

      return ok({
        query: plan.query,
        intent: plan.intent,
        intentSource: plan.intentSource,
        variants: plan.variants,
        routes: plan.routes,
        results,
        degraded,
        failures,
        stats,
        snapshotVersion: snapshot.version,
      });
    } finally {
      deadline.dispose();
    }
  }

  private plan(request: RetrievalRequest, snapshot: KnowledgeSnapshot): RetrievalPlan {
    const text = request.query.trim();
    const classification = request.intent
      ? { intent: request.intent, ruleId: null }
      : this.classifier.classifyDetailed(text);

    const expander = new QueryExpander(snapshot.ontology, this.expansion);
    const expanded = expander.expand({ text, documentType: request.documentType }, classification.intent);
    const routes = this.router.route(classification.intent, expanded);

    return {
      query: text,
      intent: classification.intent,
      intentSource: request.intent ? 'override' : 'classifier',
      ruleId: classification.ruleId,
      candidateTerms: expanded.candidateTerms,
      expansionTerms: expanded.expansionTerms,
      variants: expanded.variants,
      routes,
      snapshotVersion: snapshot.version,
    };
  }
}
