import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { buildOntologyGraph, findHierarchyCycle, loadOntologyFile } from './schema-loader.js';
import { ConfigurationError } from '../types/errors.js';
import { CONTRAST_ONTOLOGY } from '../integration/fixtures/contrast-ontology.js';
import { BUNDLED_ONTOLOGY_PATH } from '../data-paths.js';

describe('buildOntologyGraph', () => {
  it('should build a graph from a valid document', () => {
    const result = buildOntologyGraph(CONTRAST_ONTOLOGY);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.size).toBe(10);
    }
  });

  it('should union parents and children into one hierarchy', () => {
    const result = buildOntologyGraph({
      concepts: {
        root: { label: 'root' },
        leaf: { label: 'leaf', parents: ['root'] },
      },
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.getConcept('root')?.children).toEqual(['leaf']);
      expect(result.value.getConcept('leaf')?.parents).toEqual(['root']);
      expect(result.value.version).toBe('1');
    }
  });

  it('should reject schema violations', () => {
    const result = buildOntologyGraph({
      concepts: { a: { label: '', relations: [{ kind: 'likes', target: 'b' }] } },
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error.message).toContain('Ontology validation failed');
      expect(result.error.message).toContain('concepts.a.label: Concept label must not be empty');
      expect(result.error.message).toContain('concepts.a.relations.0.kind');
    }
  });

  it('should reject dangling references', () => {
    const result = buildOntologyGraph({
      concepts: {
        a: { label: 'a', children: ['ghost'], relations: [{ kind: 'requires', target: 'phantom' }] },
      },
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        'Ontology has broken references: Concept a references unknown child: ghost; ' +
          'Concept a references unknown requires target: phantom',
      );
    }
  });

  it('should reject a parent/child cycle', () => {
    const result = buildOntologyGraph({
      concepts: {
        a: { label: 'a', children: ['b'] },
        b: { label: 'b', children: ['c'] },
        c: { label: 'c', parents: ['b'], children: ['a'] },
      },
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Ontology parent/child hierarchy has a cycle: a -> b -> c -> a');
    }
  });

  it('should allow cycles through related edges', () => {
    const result = buildOntologyGraph({
      concepts: {
        a: { label: 'a', relations: [{ kind: 'requires', target: 'b' }] },
        b: { label: 'b', relations: [{ kind: 'requires', target: 'a' }] },
      },
    });

    expect(result.isOk()).toBe(true);
  });
});

describe('findHierarchyCycle', () => {
  it('should return null for a DAG with shared children', () => {
    const childrenOf = new Map([
      ['a', new Set(['b', 'c'])],
      ['b', new Set(['d'])],
      ['c', new Set(['d'])],
      ['d', new Set<string>()],
    ]);

    expect(findHierarchyCycle(childrenOf)).toBeNull();
  });

  it('should detect a self loop', () => {
    expect(findHierarchyCycle(new Map([['x', new Set(['x'])]]))).toEqual(['x', 'x']);
  });
});

describe('loadOntologyFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'authrag-ontology-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load a JSON file from disk', async () => {
    const path = join(tempDir, 'ontology.json');
    writeFileSync(path, JSON.stringify(CONTRAST_ONTOLOGY));

    const result = await loadOntologyFile(path);

    expect(result.isOk()).toBe(true);
  });

  it('should report a missing file', async () => {
    const path = join(tempDir, 'missing.json');
    const result = await loadOntologyFile(path);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(`Ontology file not found: ${path}`);
    }
  });

  it('should report invalid JSON', async () => {
    const path = join(tempDir, 'ontology.json');
    writeFileSync(path, '{ "concepts": ');

    const result = await loadOntologyFile(path);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toContain('Invalid JSON in ontology file');
    }
  });

  it('should load the bundled sample ontology', async () => {
    const result = await loadOntologyFile(BUNDLED_ONTOLOGY_PATH);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.size).toBe(36);
      expect(result.value.findConcepts('contrast ratio').map((c) => c.id)).toEqual(['color-contrast']);
    }
  });
});
