/**
 * Health Check Routes
 * Provides system status for monitoring and load balancers
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { HealthCheckResponse, ServiceHealth } from '@hamco/shared';
import type { HealthProbes } from '../../../services.js';
import { errorMessage } from '../../../application/errors.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('health-routes');

const VERSION = '1.0.0';

async function probe(name: string, check: (() => Promise<void>) | null): Promise<ServiceHealth> {
  if (!check) {
    return { status: 'disabled' };
  }
  const startedAt = Date.now();
  try {
    await check();
    return { status: 'up', latencyMs: Date.now() - startedAt };
  } catch (error) {
    logger.warn({ service: name, error: errorMessage(error) }, 'Health probe failed');
    return { status: 'down' };
  }
}

/**
 * Postgres down means no request can authenticate; a lost Redis cache only
 * costs latency.
 */
export async function checkHealth(probes: HealthProbes): Promise<HealthCheckResponse> {
  const [postgres, redis] = await Promise.all([
    probe('postgres', probes.postgres),
    probe('redis', probes.redis),
  ]);

  let status: HealthCheckResponse['status'] = 'healthy';
  if (postgres.status === 'down') {
    status = 'unhealthy';
  } else if (redis.status === 'down') {
    status = 'degraded';
  }

  return {
    status,
    version: VERSION,
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    services: { postgres, redis },
  };
}

export interface HealthRoutesOptions {
  readonly probes: HealthProbes;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify: FastifyInstance,
  { probes }
): Promise<void> => {
  // GET /health - Full health check
  fastify.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'System health check',
      description: 'Returns the health status of the database and cache connections.',
    },
  }, async (_request, reply) => {
    const response = await checkHealth(probes);
    return reply.status(response.status === 'unhealthy' ? 503 : 200).send(response);
  });

  // GET /ready - Kubernetes readiness probe
  fastify.get('/ready', {
    schema: {
      tags: ['Health'],
      summary: 'Readiness probe',
      description: 'Indicates if the server is ready to accept traffic.',
    },
  }, async (_request, reply) => {
    const postgres = await probe('postgres', probes.postgres);
    const ready = postgres.status === 'up';
    return reply.status(ready ? 200 : 503).send({ ready });
  });

  // GET /live - Kubernetes liveness probe
  fastify.get('/live', {
    schema: {
      tags: ['Health'],
      summary: 'Liveness probe',
      description: 'Indicates if the server process is alive.',
    },
  }, async (_request, reply) => {
    return reply.send({ live: true });
  });
};
