import type { FastifySchema } from 'fastify';

const candidateSchema = {
  type: 'object',
  required: ['id', 'score'],
  additionalProperties: true
} as const;

const timingsSchema = {
  type: 'object',
  required: ['totalMs'],
  properties: {
    cacheMs: { type: 'number' },
    embeddingMs: { type: 'number' },
    retrievalMs: { type: 'number' },
    rerankMs: { type: 'number' },
    totalMs: { type: 'number' }
  }
} as const;

const errorSchema = {
  type: 'object',
  required: ['code', 'message'],
  properties: {
    code: { type: 'string' },
    message: { type: 'string' },
    details: { type: 'object', additionalProperties: true }
  }
} as const;

export const searchSchema: FastifySchema = {
  body: {
    type: 'object',
    additionalProperties: false,
    properties: {
      query: { type: 'string', maxLength: 2000 },
      location: { type: 'string', maxLength: 200 },
      minExperience: { type: 'integer', minimum: 0, maximum: 80 },
      topK: { type: 'integer', minimum: 1, maximum: 200 }
    }
  },
  response: {
    200: {
      type: 'object',
      required: ['results', 'cached', 'requestId', 'timings', 'degraded'],
      properties: {
        results: { type: 'array', items: candidateSchema },
        cached: { type: 'boolean' },
        requestId: { type: 'string' },
        timings: timingsSchema,
        degraded: { type: 'array', items: { type: 'string' } }
      }
    },
    400: errorSchema,
    503: errorSchema
  }
};

export const invalidateCacheSchema: FastifySchema = {
  body: {
    type: 'object',
    additionalProperties: false,
    properties: {
      pattern: { type: 'string', minLength: 1, maxLength: 256 }
    }
  },
  response: {
    200: {
      type: 'object',
      required: ['status', 'deleted'],
      properties: {
        status: { type: 'string' },
        deleted: { type: 'integer' }
      }
    },
    401: errorSchema,
    403: errorSchema
  }
};

export const cacheStatsSchema: FastifySchema = {
  response: {
    200: {
      type: 'object',
      required: ['status', 'stats'],
      properties: {
        status: { type: 'string' },
        stats: {
          type: 'object',
          required: ['hits', 'misses', 'keyCount', 'hitRate'],
          properties: {
            hits: { type: 'integer' },
            misses: { type: 'integer' },
            keyCount: { type: 'integer' },
            hitRate: { type: 'number' },
            available: { type: 'boolean' }
          }
        }
      }
    },
    401: errorSchema,
    403: errorSchema
  }
};
