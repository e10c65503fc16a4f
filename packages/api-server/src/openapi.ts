import { DOCUMENT_TYPES, INTENTS } from '@authority-rag/core';

/**
 * OpenAPI 3.0 specification for the retrieval API.
 */
export interface OpenAPISpec {
  readonly openapi: string;
  readonly info: {
    readonly title: string;
    readonly version: string;
    readonly description: string;
  };
  readonly paths: Record<string, unknown>;
  readonly components: Record<string, unknown>;
}

const SECURITY = [{ apiKeyAuth: [] }, { bearerAuth: [] }];

export function createOpenAPISpec(version: string): OpenAPISpec {
  return {
    openapi: '3.0.3',
    info: {
      title: 'authority-rag API',
      version,
      description:
        'Ontology-guided, authority-aware retrieval over a knowledge base partitioned by document type. ' +
        'Queries are classified, expanded through the ontology, searched per partition and reranked by ' +
        'similarity, source authority, recency and partition fit.',
    },
    paths: {
      '/api/v1/search': {
        post: {
          summary: 'Retrieve ranked passages',
          operationId: 'search',
          tags: ['Search'],
          security: SECURITY,
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  required: ['query'],
                  properties: {
                    query: { type: 'string', minLength: 1, maxLength: 2000 },
                    document_type: {
                      type: 'string',
                      enum: [...DOCUMENT_TYPES],
                      description: 'Restrict the search to one partition',
                    },
                    intent: {
                      type: 'string',
                      enum: [...INTENTS],
                      description: 'Skip classification and use this intent',
                    },
                    deadline_ms: {
                      type: 'integer',
                      minimum: 1,
                      maximum: 60000,
                      description: 'Request budget; defaults to search.deadlineMs from config',
                    },
                  },
                },
              },
            },
          },
          responses: {
            '200': {
              description: 'Ranked results; degraded when some partitions failed',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/SearchResponse' },
                },
              },
            },
            '400': { $ref: '#/components/responses/ValidationError' },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '503': { $ref: '#/components/responses/PipelineFailure' },
            '504': { $ref: '#/components/responses/PipelineFailure' },
          },
        },
      },
      '/api/v1/status': {
        get: {
          summary: 'Knowledge snapshot status',
          operationId: 'getStatus',
          tags: ['Status'],
          security: SECURITY,
          responses: {
            '200': {
              description: 'Current snapshot and configuration summary',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/StatusResponse' },
                },
              },
            },
            '401': { $ref: '#/components/responses/Unauthorized' },
          },
        },
      },
      '/api/v1/admin/reload': {
        post: {
          summary: 'Reload ontology and authority files (admin)',
          description: 'On failure the previous snapshot keeps serving requests.',
          operationId: 'reloadSnapshot',
          tags: ['Admin'],
          security: SECURITY,
          responses: {
            '200': { description: 'New snapshot installed' },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '403': { $ref: '#/components/responses/Forbidden' },
            '500': { description: 'Reload failed; previous snapshot kept' },
          },
        },
      },
      '/health': {
        get: {
          summary: 'Health check',
          operationId: 'healthCheck',
          tags: ['Health'],
          responses: {
            '200': {
              description: 'Server is healthy',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      status: { type: 'string', enum: ['ok'] },
                      timestamp: { type: 'string', format: 'date-time' },
                    },
                  },
                },
              },
            },
          },
        },
      },
    },
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          description: 'API key passed as Bearer token in the Authorization header',
        },
        apiKeyAuth: {
          type: 'apiKey',
          in: 'header',
          name: 'X-API-Key',
          description: 'API key passed in the X-API-Key header',
        },
      },
      schemas: {
        RankedResult: {
          type: 'object',
          properties: {
            document_id: { type: 'string' },
            chunk_id: { type: 'string' },
            partition: { type: 'string', enum: [...DOCUMENT_TYPES] },
            title: { type: 'string', nullable: true },
            score: { type: 'number' },
            similarity: { type: 'number' },
            authority_level: { type: 'integer', minimum: 1, maximum: 5 },
            authority_origin: { type: 'string', enum: ['author', 'affiliation', 'document_type_default'] },
            author_id: { type: 'string', nullable: true },
            recency: { type: 'number' },
            published_at: { type: 'string', format: 'date-time', nullable: true },
            provenances: { type: 'array', items: { type: 'string' } },
            variants: { type: 'array', items: { type: 'string' } },
          },
        },
        SearchResponse: {
          type: 'object',
          properties: {
            query: { type: 'string' },
            intent: { type: 'string', enum: [...INTENTS] },
            intent_source: { type: 'string', enum: ['override', 'classifier'] },
            degraded: { type: 'boolean' },
            snapshot_version: { type: 'integer' },
            results: { type: 'array', items: { $ref: '#/components/schemas/RankedResult' } },
            total: { type: 'integer' },
          },
        },
        StatusResponse: {
          type: 'object',
          properties: {
            health: { type: 'string', enum: ['ok', 'not_initialized'] },
            snapshot_version: { type: 'integer', nullable: true },
            loaded_at: { type: 'string', format: 'date-time', nullable: true },
            ontology_version: { type: 'string', nullable: true },
            concepts: { type: 'integer' },
            authors: { type: 'integer' },
          },
        },
        ErrorResponse: {
          type: 'object',
          properties: {
            error: { type: 'string' },
            message: { type: 'string' },
          },
        },
      },
      responses: {
        ValidationError: {
          description: 'Request validation error',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  error: { type: 'string' },
                  details: { type: 'array', items: { type: 'object' } },
                },
              },
            },
          },
        },
        Unauthorized: {
          description: 'Missing or invalid API key',
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/ErrorResponse' },
            },
          },
        },
        Forbidden: {
          description: 'Insufficient permissions (admin required)',
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/ErrorResponse' },
            },
          },
        },
        PipelineFailure: {
          description: 'Retrieval unavailable (503) or deadline exceeded (504)',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  error: { type: 'string' },
                  code: { type: 'string', enum: ['retrieval_unavailable', 'deadline_exceeded'] },
                  reason: { type: 'string' },
                  message: { type: 'string' },
                },
              },
            },
          },
        },
      },
    },
  };
}
