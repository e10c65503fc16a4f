import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ok, err } from 'neverthrow';
import { EmbedError, type Embedder } from '../types/provider.js';

// Mock the Qdrant client before importing the index
const mockSearch = vi.fn();
const mockConstructor = vi.fn();

vi.mock('@qdrant/js-client-rest', () => ({
  QdrantClient: vi.fn().mockImplementation((options: unknown) => {
    mockConstructor(options);
    return { search: mockSearch };
  }),
}));

import { QdrantVectorIndex } from './qdrant-vector-index.js';

function stubEmbedder(dimensions = 3): Embedder & { embed: ReturnType<typeof vi.fn> } {
  return {
    dimensions,
    embed: vi.fn().mockResolvedValue(ok([[0.1, 0.2, 0.3]])),
  };
}

const config = { url: 'http://qdrant.test:6333', collectionName: 'standards', apiKey: 'test-secret' };

describe('QdrantVectorIndex', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockSearch.mockResolvedValue([]);
  });

  it('should embed the text and search the collection', async () => {
    const embedder = stubEmbedder();
    const index = new QdrantVectorIndex('standards', embedder, config);

    const result = await index.query('contrast ratio', 7);

    expect(result.isOk()).toBe(true);
    expect(embedder.embed).toHaveBeenCalledWith(['contrast ratio'], undefined);
    expect(mockSearch).toHaveBeenCalledWith('standards', {
      vector: [0.1, 0.2, 0.3],
      limit: 7,
      with_payload: true,
    });
    expect(mockConstructor).toHaveBeenCalledWith({
      url: 'http://qdrant.test:6333',
      apiKey: 'test-secret',
      checkCompatibility: false,
    });
  });

  it('should map payload fields into source metadata', async () => {
    mockSearch.mockResolvedValue([
      {
        id: 11,
        version: 1,
        score: 0.82,
        payload: {
          document_id: 'sc-1-4-3',
          chunk_id: 'sc-1-4-3#2',
          author_id: 'w3c-wg',
          affiliation: 'W3C',
          published_at: '2023-10-05T00:00:00.000Z',
          document_type: 'standards',
          title: 'Contrast (Minimum)',
          superseded: false,
        },
      },
    ]);

    const result = await new QdrantVectorIndex('standards', stubEmbedder(), config).query('q', 5);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual([
        {
          documentId: 'sc-1-4-3',
          chunkId: 'sc-1-4-3#2',
          score: 0.82,
          metadata: {
            documentType: 'standards',
            authorId: 'w3c-wg',
            affiliation: 'W3C',
            publishedAt: new Date('2023-10-05T00:00:00.000Z'),
            title: 'Contrast (Minimum)',
            superseded: false,
          },
        },
      ]);
    }
  });

  it('should fall back to the point id and partition when payload fields are missing', async () => {
    mockSearch.mockResolvedValue([{ id: 42, version: 1, score: 1.7, payload: null }]);

    const result = await new QdrantVectorIndex('audits', stubEmbedder(), config).query('q', 5);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const [match] = result.value;
      expect(match?.documentId).toBe('42');
      expect(match?.chunkId).toBe('42');
      expect(match?.score).toBe(1);
      expect(match?.metadata.documentType).toBe('audits');
      expect(match?.metadata.publishedAt).toBeUndefined();
    }
  });

  it('should report embedding failures as embedding_failed', async () => {
    const embedder = stubEmbedder();
    embedder.embed.mockResolvedValue(err(new EmbedError('model not loaded')));

    const result = await new QdrantVectorIndex('blogs', embedder, config).query('q', 5);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('embedding_failed');
      expect(result.error.message).toBe('model not loaded');
    }
    expect(mockSearch).not.toHaveBeenCalled();
  });

  it('should report a dimension mismatch as query_failed', async () => {
    const result = await new QdrantVectorIndex('blogs', stubEmbedder(768), config).query('q', 5);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('query_failed');
    }
  });

  it('should report connection errors as unavailable', async () => {
    mockSearch.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const result = await new QdrantVectorIndex('blogs', stubEmbedder(), config).query('q', 5);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('unavailable');
      expect(result.error.message).toBe('Qdrant search on standards failed: connect ECONNREFUSED');
    }
  });

  it('should report rejected requests as query_failed', async () => {
    mockSearch.mockRejectedValue(Object.assign(new Error('Not found: collection'), { status: 404 }));

    const result = await new QdrantVectorIndex('blogs', stubEmbedder(), config).query('q', 5);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('query_failed');
    }
  });

  it('should return aborted without embedding when the signal already fired', async () => {
    const embedder = stubEmbedder();
    const controller = new AbortController();
    controller.abort();

    const result = await new QdrantVectorIndex('blogs', embedder, config).query('q', 5, controller.signal);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('aborted');
    }
    expect(embedder.embed).not.toHaveBeenCalled();
  });
});
