import { describe, it, expect, vi } from 'vitest';
import { ok, err } from 'neverthrow';
import { RetrievalPipeline } from './pipeline.js';
import { SnapshotRegistry } from '../snapshot/snapshot-registry.js';
import { InMemoryAuthorityStore } from '../authority/authority-store.js';
import { OntologyGraph } from '../ontology/ontology-graph.js';
import { IndexError } from '../types/provider.js';
import type { Logger } from '../logging/logger.js';
import { contrastGraph } from '../integration/fixtures/contrast-ontology.js';
import { delay, fixedIndex, stubIndex, vectorMatch } from '../integration/fixtures/stub-index.js';
import type { PartitionIndexes } from './search-fanout.js';

function registry(): SnapshotRegistry {
  return new SnapshotRegistry(
    contrastGraph(),
    new InMemoryAuthorityStore([{ id: 'jonah-feld', name: 'Jonah Feld', level: 3, expertise: [] }]),
  );
}

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function allPartitions(): PartitionIndexes {
  return {
    academic: fixedIndex([vectorMatch('paper', 0.7, 'academic')]),
    standards: fixedIndex([vectorMatch('wcag', 0.7, 'standards')]),
    blogs: fixedIndex([vectorMatch('post', 0.8, 'blogs', { authorId: 'jonah-feld' })]),
    audits: fixedIndex([vectorMatch('ticket', 0.6, 'audits')]),
    transcripts: fixedIndex([vectorMatch('session', 0.6, 'transcripts')]),
  };
}

describe('RetrievalPipeline', () => {
  describe('explain', () => {
    it('should report the classification, variants and routes without searching', () => {
      const indexes = allPartitions();
      const pipeline = new RetrievalPipeline({ snapshots: registry(), indexes });

      const plan = pipeline.explain({ query: '  how to fix color contrast issues ' });

      expect(plan.query).toBe('how to fix color contrast issues');
      expect(plan.intent).toBe('implementation');
      expect(plan.intentSource).toBe('classifier');
      expect(plan.ruleId).toBe('implementation-howto');
      expect(plan.candidateTerms).toEqual(['fix', 'color contrast', 'issues']);
      expect(plan.variants).toHaveLength(5);
      expect(plan.routes.map((r) => r.partition)).toEqual(['blogs', 'audits', 'standards']);
      expect(plan.snapshotVersion).toBe(1);
    });

    it('should skip classification for an intent override', () => {
      const pipeline = new RetrievalPipeline({ snapshots: registry(), indexes: {} });

      const plan = pipeline.explain({ query: 'how to fix color contrast issues', intent: 'news' });

      expect(plan.intent).toBe('news');
      expect(plan.intentSource).toBe('override');
      expect(plan.ruleId).toBeNull();
      expect(plan.routes.map((r) => r.partition)).toEqual(['blogs', 'academic', 'standards']);
    });

    it('should restrict routing to a requested document type', () => {
      const pipeline = new RetrievalPipeline({ snapshots: registry(), indexes: {} });

      const plan = pipeline.explain({ query: 'color contrast', documentType: 'transcripts' });

      expect(plan.routes).toEqual([{ partition: 'transcripts', weight: 1 }]);
    });

    it('should honor expansion limits', () => {
      const pipeline = new RetrievalPipeline({
        snapshots: registry(),
        indexes: {},
        expansion: { maxVariants: 2 },
      });

      expect(pipeline.explain({ query: 'how to fix color contrast issues' }).variants).toHaveLength(2);
    });
  });

  describe('run', () => {
    it('should search every routed partition and rank the results', async () => {
      const indexes = allPartitions();
      const logger = recordingLogger();
      const pipeline = new RetrievalPipeline({ snapshots: registry(), indexes, logger });

      const result = await pipeline.run({ query: 'how to fix color contrast issues' });

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        const response = result.value;
        expect(response.intent).toBe('implementation');
        expect(response.degraded).toBe(false);
        expect(response.stats).toEqual({ dispatched: 15, succeeded: 15, failed: 0, timedOut: 0 });
        expect(response.results.map((r) => r.partition).sort()).toEqual(['audits', 'blogs', 'standards']);
        const post = response.results.find((r) => r.documentId === 'post');
        expect(post?.authority.origin).toBe('author');
        expect(post?.variants).toHaveLength(5);
        expect(response.snapshotVersion).toBe(1);
      }
      expect(indexes.academic).toMatchObject({ calls: [] });
      expect(logger.info).toHaveBeenCalledWith(
        'retrieval complete',
        expect.objectContaining({ intent: 'implementation', variants: 5, partitions: 3, hits: 15, results: 3 }),
      );
    });

    it('should return a degraded response when some partitions fail', async () => {
      const pipeline = new RetrievalPipeline({
        snapshots: registry(),
        indexes: {
          ...allPartitions(),
          audits: stubIndex(async () => err(new IndexError('unavailable', 'audits offline'))),
        },
        expansion: { maxVariants: 1 },
      });

      const result = await pipeline.run({ query: 'how to fix color contrast issues' });

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.degraded).toBe(true);
        expect(result.value.failures).toEqual([
          {
            variant: 'how to fix color contrast issues',
            partition: 'audits',
            kind: 'unavailable',
            message: 'audits offline',
          },
        ]);
        expect(result.value.results.map((r) => r.documentId)).not.toContain('ticket');
      }
    });

    it('should fail with retrieval_unavailable when every search fails', async () => {
      const failing = stubIndex(async () => err(new IndexError('unavailable', 'offline')));
      const logger = recordingLogger();
      const pipeline = new RetrievalPipeline({
        snapshots: registry(),
        indexes: { blogs: failing, audits: failing, standards: failing },
        expansion: { maxVariants: 1 },
        logger,
      });

      const result = await pipeline.run({ query: 'how to fix color contrast issues' });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('retrieval_unavailable');
        expect(result.error.reason).toBe('all_searches_failed');
      }
      expect(logger.error).toHaveBeenCalledWith('retrieval unavailable', {
        reason: 'all_searches_failed',
        error: 'All 3 searches failed (0 timed out)',
      });
    });

    it('should fail before classification when the budget is already spent', async () => {
      const indexes = allPartitions();
      const pipeline = new RetrievalPipeline({ snapshots: registry(), indexes });

      const result = await pipeline.run({ query: 'how to fix color contrast issues', deadlineMs: 0 });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('deadline_exceeded');
        expect(result.error.reason).toBe('deadline_exceeded_before_classification');
      }
      expect(indexes.blogs).toMatchObject({ calls: [] });
    });

    it('should fail before search when planning used up the budget', async () => {
      let now = 0;
      const clock = (): number => {
        const value = now;
        now += 60;
        return value;
      };
      const indexes = allPartitions();
      const pipeline = new RetrievalPipeline({ snapshots: registry(), indexes, clock });

      const result = await pipeline.run({ query: 'how to fix color contrast issues', deadlineMs: 100 });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.reason).toBe('deadline_exceeded_before_search');
        expect(result.error.message).toBe('Deadline of 100ms passed before search fan-out');
      }
      expect(indexes.blogs).toMatchObject({ calls: [] });
    });

    it('should wait for slow searches under a budget beyond the timer range', async () => {
      const blogs = stubIndex(async () => {
        await delay(30);
        return ok([vectorMatch('post', 0.8, 'blogs')]);
      });
      const pipeline = new RetrievalPipeline({ snapshots: registry(), indexes: { blogs } });

      const result = await pipeline.run({
        query: 'how to fix color contrast issues',
        documentType: 'blogs',
        deadlineMs: 3_000_000_000,
      });

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.stats.timedOut).toBe(0);
        expect(result.value.results.map((r) => r.documentId)).toEqual(['post']);
      }
    });

    it('should use the snapshot current at request start', async () => {
      const snapshots = registry();
      const pipeline = new RetrievalPipeline({ snapshots, indexes: allPartitions() });

      snapshots.replace(new OntologyGraph([]), new InMemoryAuthorityStore([]));
      const result = await pipeline.run({ query: 'how to fix color contrast issues' });

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.snapshotVersion).toBe(2);
        expect(result.value.variants).toEqual([
          { text: 'how to fix color contrast issues', provenance: 'original' },
        ]);
        const post = result.value.results.find((r) => r.documentId === 'post');
        expect(post?.authority.origin).toBe('document_type_default');
      }
    });
  });
});
