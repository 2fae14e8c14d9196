/**
 * Fastify Server Configuration
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { Config } from '../../config/index.js';
import { isAppError, errorMessage } from '../../application/errors.js';
import { RedisKeyCacheStore, type KeyCacheStore } from '../../application/auth/apikey-cache.service.js';
import { createServices, type HealthProbes, type Services } from '../../services.js';
import { createLogger } from '../logging/logger.js';
import { createRedisClient } from '../database/redis.client.js';
import { createPostgresPool } from '../database/postgres.client.js';
import { PgApiKeyRepository } from '../repositories/apikey.repository.js';
import { PgUserRepository } from '../repositories/user.repository.js';
import { API_KEY_HEADER, createAuthenticationHook } from './middleware/auth.middleware.js';
import { healthRoutes } from './routes/health.routes.js';
import { authRoutes } from './routes/auth.routes.js';
import { apiKeyRoutes } from './routes/apikey.routes.js';

const logger = createLogger('http-server');

const CONNECT_RETRY_DELAY_MS = 2000;

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function withRetry(name: string, attemptConnect: () => Promise<void>, maxRetries = 10): Promise<void> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await attemptConnect();
      logger.info(`${name} connected`);
      return;
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({ attempt, maxRetries, error: message }, `${name} connection attempt failed`);

      if (attempt === maxRetries) {
        throw new Error(`${name} connection failed after ${maxRetries} attempts: ${message}`);
      }

      await sleep(CONNECT_RETRY_DELAY_MS);
    }
  }
}

/**
 * Registers plugins, hooks and routes. Opens no connections: storage comes in
 * through `services`.
 */
export async function buildServer(config: Config, services: Services): Promise<FastifyInstance> {
  const server = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    connectionTimeout: 30000,
    keepAliveTimeout: 10000,
    maxParamLength: 100,
    bodyLimit: 1024 * 1024,
  });

  // Swagger/OpenAPI documentation
  await server.register(swagger, {
    openapi: {
      info: {
        title: 'Hamco API',
        description: 'Account, token and API key authentication service',
        version: '1.0.0',
      },
      servers: [
        { url: config.server.baseUrl, description: config.env },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
          apiKey: {
            type: 'apiKey',
            name: API_KEY_HEADER,
            in: 'header',
            description: 'API key for automated callers',
          },
        },
      },
      tags: [
        { name: 'Auth', description: 'Account and session endpoints' },
        { name: 'API Keys', description: 'API key administration' },
        { name: 'Health', description: 'Health check endpoints' },
      ],
    },
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  // Security middleware
  await server.register(helmet, {
    contentSecurityPolicy: false, // Disable for API-only server
  });

  await server.register(cors, {
    origin: config.env === 'production' ? [config.server.baseUrl] : true,
    credentials: true,
  });

  await server.register(cookie);

  await server.register(rateLimit, {
    global: true,
    max: 1000,
    timeWindow: '1 minute',
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: 'RATE_LIMIT_EXCEEDED',
      message: `Too many requests, retry in ${context.after}`,
    }),
  });

  server.addHook('onRequest', async (request) => {
    logger.debug({
      method: request.method,
      url: request.url,
      requestId: request.id,
    }, 'Incoming request');
  });

  server.addHook('onRequest', createAuthenticationHook(services.authenticationSteps));

  server.addHook('onResponse', async (request, reply) => {
    logger.info({
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
      authMethod: request.principal?.method,
    }, 'Request completed');
  });

  // Error handler
  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (isAppError(error)) {
      if (error.statusCode >= 500) {
        logger.error({ error: error.message, code: error.code, requestId: request.id }, 'Request error');
      }
      return reply.status(error.statusCode).send({
        success: false,
        error: { code: error.code, message: error.message },
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({
        error: error.message,
        stack: error.stack,
        requestId: request.id,
      }, 'Request error');
    }

    return reply.status(statusCode).send({
      success: false,
      error: {
        code: statusCode >= 500 ? 'INTERNAL_ERROR' : (error.code ?? 'BAD_REQUEST'),
        message: statusCode >= 500 && config.env === 'production'
          ? 'An internal error occurred'
          : error.message,
      },
    });
  });

  // Register routes
  await server.register(healthRoutes, { prefix: '/api', probes: services.health });
  await server.register(authRoutes, { prefix: '/api/auth', config, services });
  await server.register(apiKeyRoutes, { prefix: '/api/admin/api-keys', services });

  logger.info('Routes registered');
  return server;
}

/**
 * Connects storage with retries, then builds the server over it
 */
export async function createServer(config: Config): Promise<FastifyInstance> {
  const pool = createPostgresPool(config);
  await withRetry('PostgreSQL', async () => {
    await pool.query('SELECT 1');
  });

  let cacheStore: KeyCacheStore | undefined;
  let redisProbe: HealthProbes['redis'] = null;

  if (config.apiKeys.cacheDriver === 'redis' && config.apiKeys.cacheTtlSeconds > 0) {
    const redis = createRedisClient(config);
    await withRetry('Redis', async () => {
      if (redis.status === 'wait') {
        await redis.connect();
      }
      const pong = await redis.ping();
      if (pong !== 'PONG') {
        throw new Error(`Redis ping failed: expected PONG, got ${pong}`);
      }
    });
    cacheStore = new RedisKeyCacheStore(redis);
    redisProbe = async () => {
      await redis.ping();
    };
  }

  const services = createServices(config, {
    users: new PgUserRepository(pool),
    apiKeys: new PgApiKeyRepository(pool),
    cacheStore,
    health: {
      postgres: async () => {
        await pool.query('SELECT 1');
      },
      redis: redisProbe,
    },
  });

  return buildServer(config, services);
}
