import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import type { AuthorityRagConfig } from '../types/config.js';
import { ConfigurationError } from '../types/errors.js';
import { MAX_DEADLINE_MS } from '../retrieval/deadline.js';

export const CONFIG_FILE_NAME = '.authrag.yaml';

// --- Zod Schemas ---

const ontologyConfigSchema = z.object({
  path: z.string().min(1, 'Ontology path must not be empty'),
});

const authorityConfigSchema = z.object({
  path: z.string().min(1, 'Authority path must not be empty'),
});

const embeddingConfigSchema = z.object({
  provider: z.literal('ollama'),
  model: z.string().min(1, 'Embedding model must not be empty'),
  dimensions: z.number().int('Dimensions must be an integer').positive('Dimensions must be positive'),
  baseUrl: z.string().url('Embedding baseUrl must be a URL'),
});

const collectionName = z.string().min(1, 'Collection name must not be empty');

const vectorIndexConfigSchema = z.object({
  provider: z.literal('qdrant'),
  url: z.string().url('Vector index url must be a URL'),
  apiKey: z.string().min(1).optional(),
  collections: z.object({
    academic: collectionName,
    standards: collectionName,
    blogs: collectionName,
    audits: collectionName,
    transcripts: collectionName,
  }),
});

const expansionConfigSchema = z.object({
  maxDepth: z.number().int('maxDepth must be an integer').min(0, 'maxDepth must not be negative'),
  maxTerms: z.number().int('maxTerms must be an integer').positive('maxTerms must be positive'),
  maxVariants: z.number().int('maxVariants must be an integer').positive('maxVariants must be positive'),
});

const searchConfigSchema = z.object({
  topK: z.number().int('topK must be an integer').positive('topK must be positive'),
  concurrency: z.number().int('concurrency must be an integer').positive('concurrency must be positive'),
  deadlineMs: z
    .number()
    .int('deadlineMs must be an integer')
    .positive('deadlineMs must be positive')
    .max(MAX_DEADLINE_MS, `deadlineMs must be at most ${MAX_DEADLINE_MS}`),
});

const unitWeight = z.number().min(0, 'Weights must be between 0 and 1').max(1, 'Weights must be between 0 and 1');

const fusionConfigSchema = z.object({
  weights: z
    .object({
      similarity: unitWeight,
      authority: unitWeight,
      recency: unitWeight,
      partition: unitWeight,
    })
    .refine((w) => Math.abs(w.similarity + w.authority + w.recency + w.partition - 1) <= 1e-6, {
      message: 'Fusion weights must sum to 1.0',
    }),
  recencyHorizonYears: z.number().positive('recencyHorizonYears must be positive'),
  maxResults: z.number().int('maxResults must be an integer').positive('maxResults must be positive'),
  partitionCap: z
    .number()
    .gt(0, 'partitionCap must be greater than 0')
    .max(1, 'partitionCap must be at most 1'),
});

const routingRowSchema = z
  .object({
    academic: unitWeight.optional(),
    standards: unitWeight.optional(),
    blogs: unitWeight.optional(),
    audits: unitWeight.optional(),
    transcripts: unitWeight.optional(),
  })
  .strict();

const routingConfigSchema = z
  .object({
    research: routingRowSchema.optional(),
    standards: routingRowSchema.optional(),
    implementation: routingRowSchema.optional(),
    testing: routingRowSchema.optional(),
    news: routingRowSchema.optional(),
    unknown: routingRowSchema.optional(),
  })
  .strict();

const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

const authorityRagConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  ontology: ontologyConfigSchema,
  authority: authorityConfigSchema,
  embedding: embeddingConfigSchema,
  vectorIndex: vectorIndexConfigSchema,
  expansion: expansionConfigSchema,
  search: searchConfigSchema,
  fusion: fusionConfigSchema,
  routing: routingConfigSchema.optional(),
  logging: loggingConfigSchema,
});

// --- Defaults ---

export const DEFAULT_CONFIG: AuthorityRagConfig = {
  version: '1',
  ontology: {
    path: 'data/ontology.json',
  },
  authority: {
    path: 'data/authorities.json',
  },
  embedding: {
    provider: 'ollama',
    model: 'nomic-embed-text',
    dimensions: 768,
    baseUrl: 'http://localhost:11434',
  },
  vectorIndex: {
    provider: 'qdrant',
    url: 'http://localhost:6333',
    collections: {
      academic: 'academic_papers',
      standards: 'standards',
      blogs: 'expert_blogs',
      audits: 'audit_tickets',
      transcripts: 'testing_transcripts',
    },
  },
  expansion: {
    maxDepth: 2,
    maxTerms: 25,
    maxVariants: 5,
  },
  search: {
    topK: 10,
    concurrency: 8,
    deadlineMs: 5000,
  },
  fusion: {
    weights: {
      similarity: 0.5,
      authority: 0.25,
      recency: 0.15,
      partition: 0.1,
    },
    recencyHorizonYears: 5,
    maxResults: 10,
    partitionCap: 0.6,
  },
  logging: {
    level: 'info',
  },
};

// --- Environment variable interpolation ---

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;
const ESCAPED_ENV_VAR_PATTERN = /\\\$\{([^}]+)\}/g;

function interpolateEnvVarsInString(value: string): string | ConfigurationError {
  // Park escaped \${...} behind a placeholder so the lookup below skips it
  const placeholder = '\x00ENV_ESCAPED\x00';
  const withPlaceholders = value.replace(ESCAPED_ENV_VAR_PATTERN, `${placeholder}$1${placeholder}`);

  const missing: string[] = [];
  const resolved = withPlaceholders.replace(ENV_VAR_PATTERN, (match, varName: string) => {
    const envValue = process.env[varName];
    if (envValue === undefined) {
      missing.push(varName);
      return match;
    }
    return envValue;
  });

  if (missing.length > 0) {
    return new ConfigurationError(
      `Missing environment variable(s): ${missing.join(', ')}. Set them before starting authrag.`,
    );
  }

  return resolved.replace(
    new RegExp(`${placeholder.replace(/\x00/g, '\\x00')}(.+?)${placeholder.replace(/\x00/g, '\\x00')}`, 'g'),
    (_match, varName: string) => `\${${varName}}`,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function interpolateEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVarsInString(obj);
  }
  if (Array.isArray(obj)) {
    const result: unknown[] = [];
    for (const item of obj) {
      const interpolated = interpolateEnvVars(item);
      if (interpolated instanceof ConfigurationError) return interpolated;
      result.push(interpolated);
    }
    return result;
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const interpolated = interpolateEnvVars(value);
      if (interpolated instanceof ConfigurationError) return interpolated;
      result[key] = interpolated;
    }
    return result;
  }
  return obj;
}

// --- Helpers ---

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function section(partial: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = partial[key];
  return isRecord(value) ? value : {};
}

export function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  const vectorIndex = section(partial, 'vectorIndex');
  const fusion = section(partial, 'fusion');

  return {
    version: partial['version'] ?? DEFAULT_CONFIG.version,
    ontology: { ...DEFAULT_CONFIG.ontology, ...section(partial, 'ontology') },
    authority: { ...DEFAULT_CONFIG.authority, ...section(partial, 'authority') },
    embedding: { ...DEFAULT_CONFIG.embedding, ...section(partial, 'embedding') },
    vectorIndex: {
      ...DEFAULT_CONFIG.vectorIndex,
      ...vectorIndex,
      collections: {
        ...DEFAULT_CONFIG.vectorIndex.collections,
        ...section(vectorIndex, 'collections'),
      },
    },
    expansion: { ...DEFAULT_CONFIG.expansion, ...section(partial, 'expansion') },
    search: { ...DEFAULT_CONFIG.search, ...section(partial, 'search') },
    fusion: {
      ...DEFAULT_CONFIG.fusion,
      ...fusion,
      weights: { ...DEFAULT_CONFIG.fusion.weights, ...section(fusion, 'weights') },
    },
    ...(partial['routing'] !== undefined ? { routing: partial['routing'] } : {}),
    logging: { ...DEFAULT_CONFIG.logging, ...section(partial, 'logging') },
  };
}

/** Validate an already-parsed config object (defaults merged first). */
export function parseConfig(raw: unknown): Result<AuthorityRagConfig, ConfigurationError> {
  if (!isRecord(raw)) {
    return err(new ConfigurationError('Config file is empty or not a valid YAML object'));
  }

  const interpolated = interpolateEnvVars(raw);
  if (interpolated instanceof ConfigurationError) {
    return err(interpolated);
  }
  if (!isRecord(interpolated)) {
    return err(new ConfigurationError('Config file is empty or not a valid YAML object'));
  }

  const validationResult = authorityRagConfigSchema.safeParse(applyDefaults(interpolated));
  if (!validationResult.success) {
    return err(new ConfigurationError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

// --- Main ---

export async function loadConfig(rootDir: string): Promise<Result<AuthorityRagConfig, ConfigurationError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch {
    return err(new ConfigurationError(`Config file not found: ${configPath}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigurationError(`Invalid YAML in config file: ${message}`));
  }

  return parseConfig(parsed);
}
