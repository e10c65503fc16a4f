import { buildOntologyGraph, type OntologyDocument } from '../../ontology/schema-loader.js';
import type { OntologyGraph } from '../../ontology/ontology-graph.js';

/** Small accessibility ontology shared by the retrieval tests. */
export const CONTRAST_ONTOLOGY: OntologyDocument = {
  version: 'test-1',
  concepts: {
    accessibility: {
      label: 'accessibility',
      definition: 'Degree to which content can be used by people with disabilities.',
      synonyms: ['a11y'],
      children: ['visual-accessibility', 'keyboard-access'],
      domains: ['general'],
    },
    'visual-accessibility': {
      label: 'visual accessibility',
      definition: 'Support for users with impaired sight.',
      children: ['color-contrast', 'text-alternatives'],
      domains: ['visual'],
    },
    'color-contrast': {
      label: 'color contrast',
      definition: 'Luminance difference between foreground and background colors.',
      synonyms: ['color accessibility', 'contrast ratio'],
      children: ['non-text-contrast', 'text-contrast'],
      relations: [
        { kind: 'addresses', target: 'low-vision' },
        { kind: 'tested_by', target: 'contrast-checker' },
      ],
      domains: ['visual', 'css'],
    },
    'text-contrast': {
      label: 'text contrast',
      definition: 'Luminance ratio between text and its background.',
      synonyms: ['minimum contrast'],
      domains: ['visual'],
    },
    'non-text-contrast': {
      label: 'non-text contrast',
      definition: 'Contrast of interface components and graphics.',
      synonyms: ['ui component contrast'],
      domains: ['visual'],
    },
    'low-vision': {
      label: 'low vision',
      definition: 'Reduced visual acuity.',
      domains: ['visual'],
    },
    'contrast-checker': {
      label: 'contrast checker',
      definition: 'Tool that measures luminance ratios.',
      domains: ['testing'],
    },
    'text-alternatives': {
      label: 'text alternatives',
      definition: 'Textual equivalents for images.',
      synonyms: ['alt text'],
      domains: ['visual'],
    },
    'keyboard-access': {
      label: 'keyboard access',
      definition: 'Operating every control without a mouse.',
      synonyms: ['keyboard navigation'],
      children: ['focus-indicator'],
      domains: ['motor'],
    },
    'focus-indicator': {
      label: 'focus indicator',
      definition: 'Visible marker on the focused element.',
      relations: [{ kind: 'requires', target: 'color-contrast' }],
      domains: ['motor'],
    },
  },
};

export function contrastGraph(): OntologyGraph {
  const result = buildOntologyGraph(CONTRAST_ONTOLOGY);
  if (result.isErr()) throw result.error;
  return result.value;
}
