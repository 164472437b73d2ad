import dotenv from 'dotenv'; // Load environment variables from .env file
import fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loadConfig } from './config.js';
import { TreeRegistry } from './services/tree-registry.js';
import { registerRoutes } from './api/routes.js';
import { getErrorMessage } from './utils/error-utils.js';

dotenv.config();

const config = loadConfig();

const logger: FastifyServerOptions['logger'] = {
  level: (config.hideLogs || config.nodeEnv === 'production') ? 'warn' : 'debug',
  transport: (config.nodeEnv === 'development' && !config.hideLogs) ? {
    target: 'pino-pretty'
  } : undefined
};

const server = fastify({ logger });

const registry = new TreeRegistry({
  nodeLimit: config.treeNodeLimit,
  strict: config.strictTrees,
  logger: server.log
});

async function start(): Promise<void> {
  try {
    server.log.info('Starting tree store...');
    for (const warning of config.warnings) {
      server.log.warn(warning);
    }
    server.log.info(`Node budget: ${config.treeNodeLimit}, strict trees: ${config.strictTrees}`);

    await server.register(cors, {
      origin: config.corsOrigins,
      credentials: true
    });
    server.log.info('CORS registered');

    await server.register(rateLimit, {
      global: false, // Applied per route
      max: 100,
      timeWindow: '1 minute'
    });
    server.log.info('Rate limiting registered');

    await server.register(swagger, {
      openapi: {
        openapi: '3.0.0',
        info: {
          title: 'Tree Store API',
          description: 'Ordered key sets backed by AVL trees sharing a bounded node allocator',
          version: '1.0.0',
          license: {
            name: 'MIT',
            url: 'https://opensource.org/licenses/MIT'
          }
        },
        servers: [
          {
            url: `http://localhost:${config.port}`,
            description: 'Development server'
          }
        ],
        tags: [
          { name: 'Trees', description: 'Tree lifecycle and inspection' },
          { name: 'Keys', description: 'Key insertion, lookup and removal' },
          { name: 'System', description: 'Health and allocator usage' }
        ]
      }
    });
    server.log.info('Swagger registered');

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: false
      },
      staticCSP: true
    });
    server.log.info('Swagger UI registered');

    registerRoutes(server, registry);
    server.log.info('Routes registered');

    await server.listen({ port: config.port, host: config.host });

    server.log.info(`Tree store running on ${config.host}:${config.port}`);
    server.log.info(`REST API: http://${config.host}:${config.port}/api`);
    server.log.info(`API Documentation: http://${config.host}:${config.port}/docs`);
  } catch (err) {
    server.log.error(`Failed to start server: ${getErrorMessage(err)}`);
    process.exit(1);
  }
}

async function shutdown(): Promise<void> {
  server.log.info('Shutting down gracefully...');
  registry.shutdown();
  await server.close();
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

void start();
