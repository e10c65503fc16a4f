import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';
import { OntologyGraph, RELATION_KINDS, type Concept } from './ontology-graph.js';

const relationSchema = z.object({
  kind: z.enum(RELATION_KINDS),
  target: z.string().min(1, 'Relation target must not be empty'),
});

const conceptSchema = z.object({
  label: z.string().min(1, 'Concept label must not be empty'),
  definition: z.string().default(''),
  parents: z.array(z.string().min(1)).default([]),
  children: z.array(z.string().min(1)).default([]),
  synonyms: z.array(z.string().min(1)).default([]),
  relations: z.array(relationSchema).default([]),
  domains: z.array(z.string().min(1)).default([]),
});

export const ontologyDocumentSchema = z.object({
  version: z.string().min(1).default('1'),
  concepts: z.record(z.string().min(1), conceptSchema),
});

export type OntologyDocument = z.input<typeof ontologyDocumentSchema>;
type ParsedConcept = z.infer<typeof conceptSchema>;

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function findDanglingReferences(concepts: Record<string, ParsedConcept>): string[] {
  const issues: string[] = [];
  for (const [id, concept] of Object.entries(concepts)) {
    for (const parent of concept.parents) {
      if (!(parent in concepts)) issues.push(`Concept ${id} references unknown parent: ${parent}`);
    }
    for (const child of concept.children) {
      if (!(child in concepts)) issues.push(`Concept ${id} references unknown child: ${child}`);
    }
    for (const relation of concept.relations) {
      if (!(relation.target in concepts)) {
        issues.push(`Concept ${id} references unknown ${relation.kind} target: ${relation.target}`);
      }
    }
  }
  return issues;
}

/** Union of `children` and inverted `parents` into one parent → child map. */
function buildHierarchy(concepts: Record<string, ParsedConcept>): Map<string, Set<string>> {
  const childrenOf = new Map<string, Set<string>>();
  for (const id of Object.keys(concepts)) {
    childrenOf.set(id, new Set());
  }
  for (const [id, concept] of Object.entries(concepts)) {
    for (const child of concept.children) {
      childrenOf.get(id)?.add(child);
    }
    for (const parent of concept.parents) {
      childrenOf.get(parent)?.add(id);
    }
  }
  return childrenOf;
}

/**
 * Depth-first search with a visiting set. Returns the first cycle found as
 * a path (`a -> b -> a`), or null for a DAG.
 */
export function findHierarchyCycle(childrenOf: ReadonlyMap<string, ReadonlySet<string>>): string[] | null {
  const visiting = new Set<string>();
  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    if (done.has(id)) return null;
    if (visiting.has(id)) {
      return [...stack.slice(stack.indexOf(id)), id];
    }
    visiting.add(id);
    stack.push(id);
    for (const child of [...(childrenOf.get(id) ?? [])].sort()) {
      const cycle = visit(child);
      if (cycle) return cycle;
    }
    stack.pop();
    visiting.delete(id);
    done.add(id);
    return null;
  };

  for (const id of [...childrenOf.keys()].sort()) {
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Validate an ontology document and build the graph. Fails on schema
 * errors, dangling references and parent/child cycles.
 */
export function buildOntologyGraph(document: unknown): Result<OntologyGraph, ConfigurationError> {
  const parsed = ontologyDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return err(new ConfigurationError(`Ontology validation failed: ${formatZodErrors(parsed.error)}`));
  }

  const { version, concepts } = parsed.data;

  const dangling = findDanglingReferences(concepts);
  if (dangling.length > 0) {
    return err(new ConfigurationError(`Ontology has broken references: ${dangling.join('; ')}`));
  }

  const childrenOf = buildHierarchy(concepts);
  const cycle = findHierarchyCycle(childrenOf);
  if (cycle) {
    return err(new ConfigurationError(`Ontology parent/child hierarchy has a cycle: ${cycle.join(' -> ')}`));
  }

  const parentsOf = new Map<string, string[]>();
  for (const [parent, children] of childrenOf) {
    for (const child of children) {
      const parents = parentsOf.get(child) ?? [];
      parents.push(parent);
      parentsOf.set(child, parents);
    }
  }

  const nodes: Concept[] = Object.entries(concepts).map(([id, concept]) => ({
    id,
    label: concept.label,
    definition: concept.definition,
    parents: parentsOf.get(id) ?? [],
    children: [...(childrenOf.get(id) ?? [])],
    synonyms: concept.synonyms,
    relations: concept.relations,
    domains: concept.domains,
  }));

  return ok(new OntologyGraph(nodes, version));
}

export async function loadOntologyFile(path: string): Promise<Result<OntologyGraph, ConfigurationError>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return err(new ConfigurationError(`Ontology file not found: ${path}`));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigurationError(`Invalid JSON in ontology file: ${message}`));
  }

  return buildOntologyGraph(parsed);
}
