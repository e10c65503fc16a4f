import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';
import type { AuthorityLevel, AuthorityRecord } from '../types/document.js';
import type { AuthorityStore } from '../types/provider.js';

const levelSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]);

const authorSchema = z.object({
  id: z.string().min(1, 'Author id must not be empty'),
  name: z.string().min(1, 'Author name must not be empty'),
  level: levelSchema,
  expertise: z.array(z.string().min(1)).default([]),
});

export const authorityDocumentSchema = z.object({
  version: z.string().min(1).default('1'),
  authors: z.array(authorSchema).default([]),
});

export type AuthorityDocument = z.input<typeof authorityDocumentSchema>;

export interface AuthorityEntry {
  id: string;
  name: string;
  level: AuthorityLevel;
  expertise: readonly string[];
}

const TITLE_PATTERN = /\b(dr|prof|professor|mr|ms|mrs)\b\.?\s*/gi;
const SUFFIX_PATTERN = /[\s,]*\b(jr|sr|phd|ph\.d|md|m\.d)\b\.?\s*$/i;

/** Strip honorifics and degree suffixes, collapse whitespace and case-fold. */
export function cleanAuthorName(name: string): string {
  return name
    .replace(TITLE_PATTERN, '')
    .replace(SUFFIX_PATTERN, '')
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase();
}

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Read-only author → authority table. Lookups try the exact id, then the
 * cleaned display name, then a first-and-last-name match.
 */
export class InMemoryAuthorityStore implements AuthorityStore {
  private readonly byId = new Map<string, AuthorityEntry>();
  private readonly byName = new Map<string, AuthorityEntry>();
  private readonly entries: readonly AuthorityEntry[];

  constructor(entries: readonly AuthorityEntry[]) {
    this.entries = entries;
    for (const entry of entries) {
      this.byId.set(entry.id, entry);
      const cleaned = cleanAuthorName(entry.name);
      if (!this.byName.has(cleaned)) this.byName.set(cleaned, entry);
    }
  }

  lookup(authorId: string): AuthorityRecord | undefined {
    const entry = this.byId.get(authorId) ?? this.findByName(authorId);
    if (!entry) return undefined;
    return { authorId: entry.id, level: entry.level, expertise: entry.expertise };
  }

  size(): number {
    return this.entries.length;
  }

  private findByName(name: string): AuthorityEntry | undefined {
    const cleaned = cleanAuthorName(name);
    if (cleaned.length === 0) return undefined;

    const exact = this.byName.get(cleaned);
    if (exact) return exact;

    const parts = cleaned.split(' ');
    const first = parts[0];
    const last = parts[parts.length - 1];
    if (parts.length < 2 || first === undefined || last === undefined) return undefined;

    for (const [known, entry] of this.byName) {
      const knownParts = known.split(' ');
      const knownFirst = knownParts[0];
      const knownLast = knownParts[knownParts.length - 1];
      if (knownParts.length < 2 || knownFirst === undefined || knownLast === undefined) continue;

      if (
        (knownParts.includes(first) && knownParts.includes(last)) ||
        (parts.includes(knownFirst) && parts.includes(knownLast))
      ) {
        return entry;
      }
    }
    return undefined;
  }
}

export function buildAuthorityStore(document: unknown): Result<InMemoryAuthorityStore, ConfigurationError> {
  const parsed = authorityDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return err(new ConfigurationError(`Authority file validation failed: ${formatZodErrors(parsed.error)}`));
  }

  const seen = new Set<string>();
  for (const author of parsed.data.authors) {
    if (seen.has(author.id)) {
      return err(new ConfigurationError(`Authority file has duplicate author id: ${author.id}`));
    }
    seen.add(author.id);
  }

  return ok(new InMemoryAuthorityStore(parsed.data.authors));
}

export async function loadAuthorityFile(
  path: string,
): Promise<Result<InMemoryAuthorityStore, ConfigurationError>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return err(new ConfigurationError(`Authority file not found: ${path}`));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigurationError(`Invalid JSON in authority file: ${message}`));
  }

  return buildAuthorityStore(parsed);
}
