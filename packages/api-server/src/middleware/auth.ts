import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface ApiKeyEntry {
  readonly key: string;
  /** Admin keys may call /api/v1/admin routes. */
  readonly admin: boolean;
}

const ADMIN_SUFFIX = ':admin';

/**
 * Parse AUTHRAG_API_KEYS: comma-separated keys, `:admin` marks an admin key.
 * Example: "reader,ops:admin"
 */
export function parseApiKeys(envValue: string | undefined): ReadonlyArray<ApiKeyEntry> {
  if (!envValue) return [];

  const entries: ApiKeyEntry[] = [];
  for (const raw of envValue.split(',')) {
    const entry = raw.trim();
    if (entry.length === 0) continue;
    entries.push(
      entry.endsWith(ADMIN_SUFFIX)
        ? { key: entry.slice(0, -ADMIN_SUFFIX.length), admin: true }
        : { key: entry, admin: false },
    );
  }
  return entries;
}

function isApiKeyEntry(value: unknown): value is ApiKeyEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'string' &&
    'admin' in value &&
    typeof value.admin === 'boolean'
  );
}

/** Key entry the auth middleware attached to this response, if any. */
export function authenticatedKey(res: Response): ApiKeyEntry | undefined {
  const value: unknown = res.locals['apiKey'];
  return isApiKeyEntry(value) ? value : undefined;
}

// Hashing first gives equal-length buffers for timingSafeEqual
function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function presentedKey(req: Request): string | undefined {
  const authorization = req.headers['authorization'];
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice('Bearer '.length).trim() || undefined;
  }
  const header = req.headers['x-api-key'];
  return typeof header === 'string' ? header.trim() || undefined : undefined;
}

/**
 * Validate `Authorization: Bearer <key>` or `X-API-Key: <key>`.
 * With no keys configured every request passes.
 */
export function createAuthMiddleware(apiKeys: ReadonlyArray<ApiKeyEntry>): RequestHandler {
  const known = apiKeys.map((entry) => ({ entry, hash: digest(entry.key) }));

  return (req: Request, res: Response, next: NextFunction): void => {
    if (known.length === 0) {
      next();
      return;
    }

    const key = presentedKey(req);
    if (!key) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Missing API key. Provide via Authorization: Bearer <key> or X-API-Key: <key> header.',
      });
      return;
    }

    const hash = digest(key);
    const match = known.find((candidate) => timingSafeEqual(candidate.hash, hash));
    if (!match) {
      res.status(401).json({ error: 'Unauthorized', message: 'Invalid API key.' });
      return;
    }

    res.locals['apiKey'] = match.entry;
    next();
  };
}

/**
 * Reject non-admin keys. Mount after createAuthMiddleware; when auth is
 * disabled no key is attached and the request passes.
 */
export function requireAdmin(_req: Request, res: Response, next: NextFunction): void {
  const apiKey = authenticatedKey(res);
  if (apiKey && !apiKey.admin) {
    res.status(403).json({
      error: 'Forbidden',
      message: 'Admin privileges required for this endpoint.',
    });
    return;
  }
  next();
}
