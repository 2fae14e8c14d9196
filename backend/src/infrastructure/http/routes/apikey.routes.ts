/**
 * API Key Administration Routes
 * Every route requires the Admin role.
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { Services } from '../../../services.js';
import { ADMIN_ROLE } from '../../../application/auth/authorization.js';
import { NotFoundError } from '../../../application/errors.js';
import { requireRole } from '../middleware/auth.middleware.js';
import { parseRequest } from '../validation.js';

const GenerateApiKeySchema = z.object({
  name: z
    .string({ required_error: 'API key name is required' })
    .trim()
    .min(1, 'API key name is required')
    .max(100, 'API key name must be at most 100 characters'),
  isAdmin: z.boolean().optional(),
  expiresAt: z.string().datetime({ offset: true, message: 'expiresAt must be an ISO-8601 date-time' }).nullable().optional(),
});

const IdParamsSchema = z.object({
  id: z.string(),
});

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Ids that cannot exist are answered like unknown ones, without a query
 */
function parseKeyId(params: unknown): string {
  const { id } = parseRequest(IdParamsSchema, params);
  if (!UUID_PATTERN.test(id)) {
    throw new NotFoundError('API key not found', 'API_KEY_NOT_FOUND');
  }
  return id;
}

export interface ApiKeyRoutesOptions {
  readonly services: Services;
}

export const apiKeyRoutes: FastifyPluginAsync<ApiKeyRoutesOptions> = async (
  fastify: FastifyInstance,
  { services }
): Promise<void> => {
  fastify.addHook('preHandler', requireRole(ADMIN_ROLE));

  const security: Array<Record<string, string[]>> = [{ bearerAuth: [] }, { apiKey: [] }];

  // POST /admin/api-keys
  fastify.post('/', {
    schema: {
      tags: ['API Keys'],
      summary: 'Generate API key',
      description: 'Returns the plaintext key once. Store it securely.',
      security,
    },
  }, async (request, reply) => {
    const body = parseRequest(GenerateApiKeySchema, request.body);
    const result = await services.apiKeys.generate(request.principal?.subjectId ?? '', {
      name: body.name,
      isAdmin: body.isAdmin,
      expiresAt: body.expiresAt ? new Date(body.expiresAt) : null,
    });
    return reply.status(201).send({ success: true, data: result });
  });

  // GET /admin/api-keys
  fastify.get('/', {
    schema: {
      tags: ['API Keys'],
      summary: 'List API keys created by the caller',
      security,
    },
  }, async (request, reply) => {
    const keys = await services.apiKeys.list(request.principal?.subjectId ?? '');
    return reply.send({ success: true, data: keys });
  });

  // GET /admin/api-keys/:id
  fastify.get('/:id', {
    schema: {
      tags: ['API Keys'],
      summary: 'Get an API key',
      security,
    },
  }, async (request, reply) => {
    const key = await services.apiKeys.get(request.principal?.subjectId ?? '', parseKeyId(request.params));
    return reply.send({ success: true, data: key });
  });

  // DELETE /admin/api-keys/:id
  fastify.delete('/:id', {
    schema: {
      tags: ['API Keys'],
      summary: 'Revoke an API key',
      description: 'Soft revocation. Revoking an already revoked key succeeds.',
      security,
    },
  }, async (request, reply) => {
    await services.apiKeys.revoke(parseKeyId(request.params));
    return reply.status(204).send();
  });
};
