import pLimit from 'p-limit';
import { ok, err, type Result } from 'neverthrow';
import type { DocumentHit, DocumentType } from '../types/document.js';
import type { VectorIndex, VectorMatch } from '../types/provider.js';
import type {
  ExpandedQuery,
  FanoutStats,
  PartitionRoute,
  QueryVariant,
  SearchFailure,
  SearchFailureKind,
} from '../types/query.js';
import { RetrievalUnavailableError } from '../types/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { raceAbort, type Deadline } from './deadline.js';

export const DEFAULT_TOP_K = 10;
export const DEFAULT_CONCURRENCY = 8;

export type PartitionIndexes = Partial<Record<DocumentType, VectorIndex>>;

export interface SearchFanoutOptions {
  topK?: number;
  concurrency?: number;
  logger?: Logger;
}

export interface FanoutResult {
  /** Dispatch order: variant order, then route order, then rank. */
  hits: DocumentHit[];
  failures: SearchFailure[];
  degraded: boolean;
  stats: FanoutStats;
}

interface SearchTask {
  variant: QueryVariant;
  route: PartitionRoute;
}

type TaskOutcome =
  | { status: 'ok'; matches: VectorMatch[] }
  | { status: 'failed'; kind: SearchFailureKind; message: string; dispatched: boolean };

/**
 * Runs every (variant, partition) search through a bounded pool that
 * shares one request deadline. Individual failures are absorbed; the stage
 * only fails when nothing succeeded.
 */
export class SearchFanout {
  private readonly indexes: PartitionIndexes;
  private readonly topK: number;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(indexes: PartitionIndexes, options: SearchFanoutOptions = {}) {
    this.indexes = indexes;
    this.topK = Math.max(1, options.topK ?? DEFAULT_TOP_K);
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.logger = options.logger ?? silentLogger;
  }

  async search(
    expanded: Pick<ExpandedQuery, 'variants'>,
    routes: readonly PartitionRoute[],
    deadline: Deadline,
  ): Promise<Result<FanoutResult, RetrievalUnavailableError>> {
    const tasks: SearchTask[] = [];
    for (const variant of expanded.variants) {
      for (const route of routes) {
        tasks.push({ variant, route });
      }
    }

    if (tasks.length === 0) {
      return err(
        new RetrievalUnavailableError('no_searches_dispatched', 'No (variant, partition) searches to run'),
      );
    }

    const limit = pLimit(this.concurrency);
    const outcomes = await Promise.all(tasks.map((task) => limit(() => this.runTask(task, deadline))));

    const hits: DocumentHit[] = [];
    const failures: SearchFailure[] = [];
    let dispatched = 0;
    let succeeded = 0;
    let timedOut = 0;

    tasks.forEach((task, index) => {
      const outcome = outcomes[index];
      if (!outcome) return;

      if (outcome.status === 'ok') {
        dispatched++;
        succeeded++;
        outcome.matches.forEach((match, rank) => {
          hits.push({
            documentId: match.documentId,
            chunkId: match.chunkId,
            similarity: match.score,
            partition: task.route.partition,
            variant: task.variant.text,
            provenance: task.variant.provenance,
            rank,
            source: match.metadata,
          });
        });
        return;
      }

      if (outcome.dispatched) dispatched++;
      if (outcome.kind === 'timeout') timedOut++;
      const failure: SearchFailure = {
        variant: task.variant.text,
        partition: task.route.partition,
        kind: outcome.kind,
        message: outcome.message,
      };
      failures.push(failure);
      this.logger.warn('search failed', {
        variant: failure.variant,
        partition: failure.partition,
        kind: failure.kind,
        error: failure.message,
      });
    });

    const stats: FanoutStats = { dispatched, succeeded, failed: failures.length, timedOut };

    if (succeeded === 0) {
      const reason = timedOut === failures.length ? 'all_searches_timed_out' : 'all_searches_failed';
      return err(
        new RetrievalUnavailableError(
          reason,
          `All ${tasks.length} searches failed (${timedOut} timed out)`,
        ),
      );
    }

    return ok({ hits, failures, degraded: failures.length > 0, stats });
  }

  private async runTask(task: SearchTask, deadline: Deadline): Promise<TaskOutcome> {
    if (deadline.expired()) {
      return { status: 'failed', kind: 'timeout', message: 'Deadline passed before dispatch', dispatched: false };
    }

    const index = this.indexes[task.route.partition];
    if (!index) {
      return {
        status: 'failed',
        kind: 'missing_index',
        message: `No index configured for partition ${task.route.partition}`,
        dispatched: false,
      };
    }

    try {
      const outcome = await raceAbort(
        index.query(task.variant.text, this.topK, deadline.signal),
        deadline.signal,
      );
      if (!outcome.settled) {
        return { status: 'failed', kind: 'timeout', message: 'Search abandoned at deadline', dispatched: true };
      }

      const result = outcome.value;
      if (result.isErr()) {
        const kind: SearchFailureKind =
          result.error.kind === 'aborted' && deadline.expired() ? 'timeout' : result.error.kind;
        return { status: 'failed', kind, message: result.error.message, dispatched: true };
      }
      return { status: 'ok', matches: result.value.slice(0, this.topK) };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'failed', kind: 'exception', message, dispatched: true };
    }
  }
}
