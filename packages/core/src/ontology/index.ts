export type {
  Concept,
  ConceptRelation,
  DomainScore,
  ExpandOptions,
  ExpandedTerm,
  ExpansionKind,
  OntologyEdge,
  OntologyStats,
  RelationKind,
} from './ontology-graph.js';
export {
  OntologyGraph,
  RELATION_KINDS,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_RESULTS,
  expansionKindOf,
  normalizeTerm,
} from './ontology-graph.js';

export type { OntologyDocument } from './schema-loader.js';
export { buildOntologyGraph, findHierarchyCycle, loadOntologyFile, ontologyDocumentSchema } from './schema-loader.js';
