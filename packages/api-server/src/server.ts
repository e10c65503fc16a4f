import express, { type Express } from 'express';
import { createServer, type Server as HttpServer } from 'node:http';
import { ok, err, type Result } from 'neverthrow';
import {
  createConsoleLogger,
  createRuntime,
  type AuthorityRagRuntime,
  type ConfigurationError,
  type Logger,
} from '@authority-rag/core';
import { parseApiKeys, createAuthMiddleware, type ApiKeyEntry } from './middleware/auth.js';
import { createSearchRouter } from './routes/search.js';
import { createStatusRouter } from './routes/status.js';
import { createAdminRouter } from './routes/admin.js';
import { createOpenAPISpec } from './openapi.js';

export const API_SERVER_VERSION = '0.1.0';

export interface ApiServerOptions {
  /** Project root holding .authrag.yaml and the knowledge files. */
  readonly rootDir: string;
  /** Port to listen on. Default: 3100 */
  readonly port: number;
  /** Parsed API keys. If not provided, reads from AUTHRAG_API_KEYS env var. */
  readonly apiKeys?: ReadonlyArray<ApiKeyEntry>;
  /** CORS origin. Default: '*' */
  readonly corsOrigin?: string;
  /** Prebuilt runtime; initialize() builds one from rootDir otherwise. */
  readonly runtime?: AuthorityRagRuntime;
  readonly logger?: Logger;
}

export class ApiServer {
  private readonly app: Express;
  private readonly rootDir: string;
  private readonly port: number;
  private readonly logger: Logger;
  private httpServer: HttpServer | null = null;

  // Populated by initialize() or injected through options
  private runtime: AuthorityRagRuntime | null;

  constructor(options: ApiServerOptions) {
    this.rootDir = options.rootDir;
    this.port = options.port;
    this.runtime = options.runtime ?? null;
    this.logger = options.logger ?? createConsoleLogger({ prefix: 'api-server' });

    const apiKeys = options.apiKeys ?? parseApiKeys(process.env['AUTHRAG_API_KEYS']);
    const corsOrigin = options.corsOrigin ?? '*';

    this.app = express();

    // --- Global Middleware ---

    // CORS
    this.app.use((req, res, next) => {
      res.setHeader('Access-Control-Allow-Origin', corsOrigin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-API-Key');
      if (req.method === 'OPTIONS') {
        res.status(204).end();
        return;
      }
      next();
    });

    // JSON body parser
    this.app.use(express.json());

    // --- Unauthenticated Routes ---

    this.app.get('/health', (_req, res) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.get('/api/openapi.json', (_req, res) => {
      res.json(createOpenAPISpec(API_SERVER_VERSION));
    });

    // --- Authenticated Routes ---

    this.app.use('/api/v1', createAuthMiddleware(apiKeys));

    // Deps are resolved at request time so initialize() can fill them in later
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    const self = this;
    const deps = {
      get runtime() {
        return self.runtime;
      },
    };

    this.app.use('/api/v1/search', createSearchRouter(deps));
    this.app.use('/api/v1/status', createStatusRouter(deps));
    this.app.use('/api/v1/admin', createAdminRouter(deps));
  }

  /**
   * Load config and knowledge files and wire the pipeline.
   * A config or knowledge error is returned and the server stays unloaded.
   */
  async initialize(): Promise<Result<void, ConfigurationError>> {
    if (this.runtime) return ok(undefined);

    const result = await createRuntime({ rootDir: this.rootDir });
    if (result.isErr()) {
      this.logger.error('runtime initialization failed', { error: result.error.message });
      return err(result.error);
    }
    this.runtime = result.value;
    return ok(undefined);
  }

  /**
   * Start listening on the configured port. Rejects when no runtime is loaded.
   */
  async start(): Promise<void> {
    if (!this.runtime) {
      throw new Error('Cannot start API server: runtime is not initialized');
    }

    const server = createServer(this.app);
    this.httpServer = server;

    return new Promise<void>((resolvePromise, reject) => {
      server.on('error', reject);
      server.listen(this.port, () => {
        resolvePromise();
      });
    });
  }

  /**
   * Gracefully shut down the HTTP server.
   */
  async close(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;

    await new Promise<void>((resolvePromise, reject) => {
      server.close((closeErr) => {
        if (closeErr) reject(closeErr);
        else resolvePromise();
      });
    });
    this.httpServer = null;
  }

  /** Expose Express app for testing with supertest. */
  getApp(): Express {
    return this.app;
  }
}
