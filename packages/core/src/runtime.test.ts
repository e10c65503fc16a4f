import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createRuntime } from './runtime.js';
import { ConfigurationError } from './types/errors.js';
import type { Logger } from './logging/logger.js';
import { CONTRAST_ONTOLOGY } from './integration/fixtures/contrast-ontology.js';
import { fixedIndex, vectorMatch } from './integration/fixtures/stub-index.js';

const CONFIG = `
version: "1"
ontology:
  path: data/ontology.json
authority:
  path: data/authorities.json
logging:
  level: silent
`;

const ONE_AUTHOR = { authors: [{ id: 'jonah-feld', name: 'Jonah Feld', level: 3 }] };
const TWO_AUTHORS = {
  authors: [
    { id: 'jonah-feld', name: 'Jonah Feld', level: 3 },
    { id: 'lena-castellano', name: 'Lena Castellano', level: 2 },
  ],
};

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe('createRuntime', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'authrag-runtime-'));
    await mkdir(join(tempDir, 'data'), { recursive: true });
    await writeFile(join(tempDir, '.authrag.yaml'), CONFIG);
    await writeFile(join(tempDir, 'data', 'ontology.json'), JSON.stringify(CONTRAST_ONTOLOGY));
    await writeFile(join(tempDir, 'data', 'authorities.json'), JSON.stringify(ONE_AUTHOR));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should fail when the config file is missing', async () => {
    await rm(join(tempDir, '.authrag.yaml'));

    const result = await createRuntime({ rootDir: tempDir, logger: recordingLogger() });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error.message).toContain('Config file not found');
    }
  });

  it('should refuse knowledge files outside the project root', async () => {
    await writeFile(join(tempDir, '.authrag.yaml'), CONFIG.replace('data/ontology.json', '../ontology.json'));

    const result = await createRuntime({ rootDir: tempDir, logger: recordingLogger() });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Ontology path escapes project root: ../ontology.json');
    }
  });

  it('should fail when the ontology file is missing', async () => {
    await rm(join(tempDir, 'data', 'ontology.json'));

    const result = await createRuntime({ rootDir: tempDir, logger: recordingLogger() });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(`Ontology file not found: ${join(tempDir, 'data', 'ontology.json')}`);
    }
  });

  it('should load the knowledge snapshot and wire the pipeline', async () => {
    const logger = recordingLogger();
    const result = await createRuntime({
      rootDir: tempDir,
      logger,
      indexes: { blogs: fixedIndex([vectorMatch('post', 0.8, 'blogs', { authorId: 'jonah-feld' })]) },
    });

    expect(result.isOk()).toBe(true);
    if (!result.isOk()) return;
    const runtime = result.value;

    expect(runtime.snapshots.current().version).toBe(1);
    expect(runtime.snapshots.current().ontology.size).toBe(10);
    expect(logger.info).toHaveBeenCalledWith('knowledge snapshot loaded', {
      version: 1,
      concepts: 10,
      authors: 1,
    });

    const response = await runtime.pipeline.run({ query: 'color contrast', documentType: 'blogs' });
    expect(response.isOk()).toBe(true);
    if (response.isOk()) {
      expect(response.value.results.map((r) => [r.documentId, r.authority.level])).toEqual([['post', 3]]);
    }
  });

  it('should swap in a new snapshot on reload', async () => {
    const logger = recordingLogger();
    const result = await createRuntime({ rootDir: tempDir, logger, indexes: {} });
    expect(result.isOk()).toBe(true);
    if (!result.isOk()) return;

    await writeFile(join(tempDir, 'data', 'authorities.json'), JSON.stringify(TWO_AUTHORS));
    const reloaded = await result.value.reload();

    expect(reloaded.isOk()).toBe(true);
    expect(result.value.snapshots.current().version).toBe(2);
    expect(result.value.snapshots.current().authorities.size()).toBe(2);
    expect(logger.info).toHaveBeenCalledWith('knowledge snapshot reloaded', {
      version: 2,
      concepts: 10,
      authors: 2,
    });
  });

  it('should keep the current snapshot when a reload fails', async () => {
    const logger = recordingLogger();
    const result = await createRuntime({ rootDir: tempDir, logger, indexes: {} });
    expect(result.isOk()).toBe(true);
    if (!result.isOk()) return;

    await writeFile(join(tempDir, 'data', 'ontology.json'), '{ "concepts": ');
    const reloaded = await result.value.reload();

    expect(reloaded.isErr()).toBe(true);
    expect(result.value.snapshots.current().version).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      'snapshot reload failed; keeping current snapshot',
      expect.objectContaining({ version: 1 }),
    );
  });

  it('should share one reload between concurrent callers', async () => {
    const result = await createRuntime({ rootDir: tempDir, logger: recordingLogger(), indexes: {} });
    expect(result.isOk()).toBe(true);
    if (!result.isOk()) return;

    const [first, second] = await Promise.all([result.value.reload(), result.value.reload()]);

    expect(first.isOk() && second.isOk()).toBe(true);
    expect(result.value.snapshots.current().version).toBe(2);
  });
});
