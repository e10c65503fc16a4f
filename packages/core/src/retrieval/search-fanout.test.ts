import { describe, it, expect, vi, afterEach } from 'vitest';
import { ok, err } from 'neverthrow';
import { SearchFanout } from './search-fanout.js';
import { Deadline } from './deadline.js';
import { IndexError } from '../types/provider.js';
import type { QueryVariant } from '../types/query.js';
import type { Logger } from '../logging/logger.js';
import { delay, fixedIndex, stubIndex, vectorMatch } from '../integration/fixtures/stub-index.js';

const VARIANTS: QueryVariant[] = [
  { text: 'focus order', provenance: 'original' },
  { text: 'tab order', provenance: 'synonym', sourceTerm: 'focus order', expansionTerm: 'tab order' },
];

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe('SearchFanout', () => {
  const deadlines: Deadline[] = [];
  const newDeadline = (ms: number): Deadline => {
    const deadline = new Deadline(ms);
    deadlines.push(deadline);
    return deadline;
  };

  afterEach(() => {
    for (const deadline of deadlines.splice(0)) deadline.dispose();
  });

  it('should collect hits in dispatch order regardless of completion order', async () => {
    const fanout = new SearchFanout({
      blogs: stubIndex(async (text) => {
        await delay(text === 'focus order' ? 30 : 5);
        return ok([vectorMatch(`blog-${text}`, 0.9, 'blogs')]);
      }),
      audits: stubIndex(async (text) => ok([vectorMatch(`audit-${text}`, 0.5, 'audits')])),
    });

    const result = await fanout.search(
      { variants: VARIANTS },
      [
        { partition: 'blogs', weight: 1 },
        { partition: 'audits', weight: 0.8 },
      ],
      newDeadline(1_000),
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.hits.map((h) => [h.documentId, h.variant, h.provenance])).toEqual([
        ['blog-focus order', 'focus order', 'original'],
        ['audit-focus order', 'focus order', 'original'],
        ['blog-tab order', 'tab order', 'synonym'],
        ['audit-tab order', 'tab order', 'synonym'],
      ]);
      expect(result.value.degraded).toBe(false);
      expect(result.value.stats).toEqual({ dispatched: 4, succeeded: 4, failed: 0, timedOut: 0 });
    }
  });

  it('should pass topK to the index and trim longer answers', async () => {
    const index = fixedIndex([
      vectorMatch('a', 0.9, 'blogs'),
      vectorMatch('b', 0.8, 'blogs'),
      vectorMatch('c', 0.7, 'blogs'),
    ]);
    const fanout = new SearchFanout({ blogs: index }, { topK: 2 });

    const result = await fanout.search(
      { variants: VARIANTS.slice(0, 1) },
      [{ partition: 'blogs', weight: 1 }],
      newDeadline(1_000),
    );

    expect(index.calls).toEqual([{ text: 'focus order', topK: 2 }]);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.hits.map((h) => [h.documentId, h.rank, h.partition])).toEqual([
        ['a', 0, 'blogs'],
        ['b', 1, 'blogs'],
      ]);
    }
  });

  it('should absorb a failing partition and mark the response degraded', async () => {
    const logger = recordingLogger();
    const fanout = new SearchFanout(
      {
        blogs: fixedIndex([vectorMatch('a', 0.9, 'blogs')]),
        audits: stubIndex(async () => err(new IndexError('unavailable', 'connection refused'))),
      },
      { logger },
    );

    const result = await fanout.search(
      { variants: VARIANTS.slice(0, 1) },
      [
        { partition: 'blogs', weight: 1 },
        { partition: 'audits', weight: 0.8 },
      ],
      newDeadline(1_000),
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.degraded).toBe(true);
      expect(result.value.failures).toEqual([
        { variant: 'focus order', partition: 'audits', kind: 'unavailable', message: 'connection refused' },
      ]);
      expect(result.value.stats).toEqual({ dispatched: 2, succeeded: 1, failed: 1, timedOut: 0 });
    }
    expect(logger.warn).toHaveBeenCalledWith('search failed', {
      variant: 'focus order',
      partition: 'audits',
      kind: 'unavailable',
      error: 'connection refused',
    });
  });

  it('should report missing indexes without dispatching them', async () => {
    const fanout = new SearchFanout({ blogs: fixedIndex([vectorMatch('a', 0.9, 'blogs')]) });

    const result = await fanout.search(
      { variants: VARIANTS.slice(0, 1) },
      [
        { partition: 'blogs', weight: 1 },
        { partition: 'transcripts', weight: 0.5 },
      ],
      newDeadline(1_000),
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.failures).toEqual([
        {
          variant: 'focus order',
          partition: 'transcripts',
          kind: 'missing_index',
          message: 'No index configured for partition transcripts',
        },
      ]);
      expect(result.value.stats).toEqual({ dispatched: 1, succeeded: 1, failed: 1, timedOut: 0 });
    }
  });

  it('should turn thrown errors into exception failures', async () => {
    const fanout = new SearchFanout({
      blogs: fixedIndex([vectorMatch('a', 0.9, 'blogs')]),
      audits: stubIndex(() => Promise.reject(new Error('socket hang up'))),
    });

    const result = await fanout.search(
      { variants: VARIANTS.slice(0, 1) },
      [
        { partition: 'blogs', weight: 1 },
        { partition: 'audits', weight: 0.8 },
      ],
      newDeadline(1_000),
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.failures[0]?.kind).toBe('exception');
      expect(result.value.failures[0]?.message).toBe('socket hang up');
    }
  });

  it('should fail with all_searches_failed when nothing succeeds', async () => {
    const fanout = new SearchFanout({
      blogs: stubIndex(async () => err(new IndexError('query_failed', 'bad request'))),
    });

    const result = await fanout.search(
      { variants: VARIANTS },
      [{ partition: 'blogs', weight: 1 }],
      newDeadline(1_000),
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe('retrieval_unavailable');
      expect(result.error.reason).toBe('all_searches_failed');
      expect(result.error.message).toBe('All 2 searches failed (0 timed out)');
    }
  });

  it('should abandon in-flight searches and skip queued ones at the deadline', async () => {
    const index = stubIndex(() => new Promise<never>(() => undefined));
    const fanout = new SearchFanout({ blogs: index }, { concurrency: 1 });

    const result = await fanout.search(
      { variants: VARIANTS },
      [{ partition: 'blogs', weight: 1 }],
      newDeadline(20),
    );

    expect(index.calls).toHaveLength(1);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.reason).toBe('all_searches_timed_out');
      expect(result.error.message).toBe('All 2 searches failed (2 timed out)');
    }
  });

  it('should keep results that arrived before the deadline', async () => {
    const fanout = new SearchFanout({
      blogs: fixedIndex([vectorMatch('fast', 0.9, 'blogs')]),
      audits: stubIndex(() => new Promise<never>(() => undefined)),
    });

    const result = await fanout.search(
      { variants: VARIANTS.slice(0, 1) },
      [
        { partition: 'blogs', weight: 1 },
        { partition: 'audits', weight: 0.8 },
      ],
      newDeadline(20),
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.hits.map((h) => h.documentId)).toEqual(['fast']);
      expect(result.value.failures).toEqual([
        { variant: 'focus order', partition: 'audits', kind: 'timeout', message: 'Search abandoned at deadline' },
      ]);
      expect(result.value.stats).toEqual({ dispatched: 2, succeeded: 1, failed: 1, timedOut: 1 });
    }
  });

  it('should never run more searches at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const index = stubIndex(async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return ok([]);
    });
    const fanout = new SearchFanout({ blogs: index, audits: index, standards: index }, { concurrency: 2 });

    const result = await fanout.search(
      { variants: VARIANTS },
      [
        { partition: 'blogs', weight: 1 },
        { partition: 'audits', weight: 0.8 },
        { partition: 'standards', weight: 0.3 },
      ],
      newDeadline(1_000),
    );

    expect(result.isOk()).toBe(true);
    expect(index.calls).toHaveLength(6);
    expect(peak).toBe(2);
  });

  it('should refuse an empty plan', async () => {
    const fanout = new SearchFanout({});

    const result = await fanout.search({ variants: VARIANTS }, [], newDeadline(1_000));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.reason).toBe('no_searches_dispatched');
    }
  });
});
