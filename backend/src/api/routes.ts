import type { FastifyInstance, FastifyReply } from 'fastify';
import type { KeyOrder, TreeKeyType } from '@avl-arbor/shared';
import { TreeRegistry, TreeRegistryError, type TreeRegistryErrorCode } from '../services/tree-registry.js';
import { getErrorMessage } from '../utils/error-utils.js';

interface CreateTreeBody {
  keyType: TreeKeyType;
  label?: string;
}

interface TreeParams {
  id: string;
}

interface KeyParams {
  id: string;
  key: string;
}

interface InsertKeyBody {
  key: number | string;
}

interface ListKeysQuery {
  order?: KeyOrder;
}

const ERROR_STATUS: Record<TreeRegistryErrorCode, number> = {
  TREE_NOT_FOUND: 404,
  INVALID_KEY: 400,
  DUPLICATE_KEY: 409,
  ALLOCATION_FAILED: 507,
  TREE_INVALID: 500
};

/**
 * Sends the error response matching a failed registry call
 */
function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof TreeRegistryError) {
    return reply.code(ERROR_STATUS[error.code]).send({ error: error.message, code: error.code });
  }
  reply.log.error(error);
  return reply.code(500).send({ error: getErrorMessage(error) });
}

export function registerRoutes(fastify: FastifyInstance, registry: TreeRegistry): void {
  // Rate limiting applied to write routes once @fastify/rate-limit is registered
  const writeRateLimit = {
    max: 1000,
    timeWindow: 1_000 // 1 second
  };

  // Schema definitions for OpenAPI
  const keySchema = {
    anyOf: [{ type: 'number' }, { type: 'string' }],
    description: 'Key stored in the tree'
  };

  const treeSummarySchema = {
    type: 'object',
    properties: {
      id: { type: 'string', description: 'Tree identifier' },
      label: { type: ['string', 'null'], description: 'Optional label' },
      keyType: { type: 'string', enum: ['number', 'string'] },
      size: { type: 'number', description: 'Number of keys' },
      height: { type: 'number', description: 'Tree height, 0 when empty' },
      rootKey: {
        anyOf: [{ type: 'number' }, { type: 'string' }, { type: 'null' }],
        description: 'Key at the root, null when empty'
      },
      createdAt: { type: 'number', description: 'Creation timestamp' }
    }
  };

  const errorSchema = {
    type: 'object',
    properties: {
      error: { type: 'string', description: 'Error message' },
      code: { type: 'string', description: 'Registry error code' }
    }
  };

  const treeParamsSchema = {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'string', description: 'Tree identifier' }
    }
  };

  const keyParamsSchema = {
    type: 'object',
    required: ['id', 'key'],
    properties: {
      id: { type: 'string', description: 'Tree identifier' },
      key: { type: 'string', description: 'Key, parsed according to the tree key type' }
    }
  };

  fastify.get('/api/health', {
    schema: {
      tags: ['System'],
      summary: 'Health check',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'number' },
            trees: { type: 'number' }
          }
        }
      }
    }
  }, async () => {
    return { status: 'ok', timestamp: Date.now(), trees: registry.listTrees().length };
  });

  fastify.get('/api/memory', {
    schema: {
      tags: ['System'],
      summary: 'Node budget usage',
      description: 'Allocation statistics of the node allocator shared by all trees',
      response: {
        200: {
          type: 'object',
          properties: {
            capacity: { type: 'number' },
            inUse: { type: 'number' },
            peak: { type: 'number' },
            allocations: { type: 'number' },
            deallocations: { type: 'number' },
            failures: { type: 'number' }
          }
        }
      }
    }
  }, async () => {
    return registry.getMemoryStats();
  });

  fastify.get('/api/trees', {
    schema: {
      tags: ['Trees'],
      summary: 'List trees',
      response: {
        200: {
          type: 'object',
          properties: {
            trees: { type: 'array', items: treeSummarySchema }
          }
        }
      }
    }
  }, async () => {
    return { trees: registry.listTrees() };
  });

  fastify.post<{ Body: CreateTreeBody }>('/api/trees', {
    config: { rateLimit: writeRateLimit },
    schema: {
      tags: ['Trees'],
      summary: 'Create a tree',
      body: {
        type: 'object',
        required: ['keyType'],
        properties: {
          keyType: { type: 'string', enum: ['number', 'string'], description: 'Type of keys the tree orders' },
          label: { type: 'string', maxLength: 200, description: 'Optional label' }
        }
      },
      response: {
        201: treeSummarySchema,
        400: errorSchema
      }
    }
  }, async (request, reply) => {
    const { keyType, label } = request.body;
    return reply.code(201).send(registry.createTree(keyType, label));
  });

  fastify.get<{ Params: TreeParams }>('/api/trees/:id', {
    schema: {
      tags: ['Trees'],
      summary: 'Get a tree summary',
      params: treeParamsSchema,
      response: {
        200: treeSummarySchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send(registry.getSummary(request.params.id));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.delete<{ Params: TreeParams }>('/api/trees/:id', {
    config: { rateLimit: writeRateLimit },
    schema: {
      tags: ['Trees'],
      summary: 'Drop a tree',
      description: 'Releases every node of the tree and forgets it',
      params: treeParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            released: { type: 'number', description: 'Number of keys released' }
          }
        },
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send({ released: registry.dropTree(request.params.id) });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.get<{ Params: TreeParams; Querystring: ListKeysQuery }>('/api/trees/:id/keys', {
    schema: {
      tags: ['Keys'],
      summary: 'List keys in order',
      params: treeParamsSchema,
      querystring: {
        type: 'object',
        properties: {
          order: { type: 'string', enum: ['asc', 'desc'], default: 'asc' }
        }
      },
      response: {
        200: {
          type: 'object',
          properties: {
            keys: { type: 'array', items: keySchema }
          }
        },
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send({ keys: registry.listKeys(request.params.id, request.query.order ?? 'asc') });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post<{ Params: TreeParams; Body: InsertKeyBody }>('/api/trees/:id/keys', {
    config: { rateLimit: writeRateLimit },
    schema: {
      tags: ['Keys'],
      summary: 'Insert a key',
      params: treeParamsSchema,
      body: {
        type: 'object',
        required: ['key'],
        properties: {
          key: keySchema
        }
      },
      response: {
        201: treeSummarySchema,
        400: errorSchema,
        404: errorSchema,
        409: errorSchema,
        507: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      return reply.code(201).send(registry.insertKey(request.params.id, request.body.key));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.get<{ Params: KeyParams }>('/api/trees/:id/keys/:key', {
    schema: {
      tags: ['Keys'],
      summary: 'Check whether a key is present',
      params: keyParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            key: keySchema,
            present: { type: 'boolean' }
          }
        },
        400: errorSchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const { id, key } = request.params;
    try {
      return reply.send(registry.lookupKey(id, key));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.delete<{ Params: KeyParams }>('/api/trees/:id/keys/:key', {
    config: { rateLimit: writeRateLimit },
    schema: {
      tags: ['Keys'],
      summary: 'Remove a key',
      description: 'Removing a key that is not present succeeds with removed=false',
      params: keyParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            removed: { type: 'boolean' }
          }
        },
        400: errorSchema,
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    const { id, key } = request.params;
    try {
      return reply.send({ removed: registry.removeKey(id, key) });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.get<{ Params: TreeParams }>('/api/trees/:id/structure', {
    schema: {
      tags: ['Trees'],
      summary: 'Tree shape',
      description: 'Nested nodes with key, height and balance factor',
      params: treeParamsSchema
    }
  }, async (request, reply) => {
    try {
      return reply.send({ root: registry.getStructure(request.params.id) });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.get<{ Params: TreeParams }>('/api/trees/:id/verify', {
    schema: {
      tags: ['Trees'],
      summary: 'Check tree invariants',
      params: treeParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            valid: { type: 'boolean' },
            violations: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  kind: { type: 'string' },
                  message: { type: 'string' }
                }
              }
            }
          }
        },
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send(registry.verifyTree(request.params.id));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post<{ Params: TreeParams }>('/api/trees/:id/clear', {
    config: { rateLimit: writeRateLimit },
    schema: {
      tags: ['Trees'],
      summary: 'Remove every key',
      params: treeParamsSchema,
      response: {
        200: {
          type: 'object',
          properties: {
            released: { type: 'number' }
          }
        },
        404: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      return reply.send({ released: registry.clearTree(request.params.id) });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post<{ Params: TreeParams }>('/api/trees/:id/clone', {
    config: { rateLimit: writeRateLimit },
    schema: {
      tags: ['Trees'],
      summary: 'Clone a tree',
      params: treeParamsSchema,
      response: {
        201: treeSummarySchema,
        404: errorSchema,
        507: errorSchema
      }
    }
  }, async (request, reply) => {
    try {
      return reply.code(201).send(registry.cloneTree(request.params.id));
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
