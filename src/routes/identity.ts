/**
 * Caller identity from the headers set by the upstream auth layer.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { IdentityHeadersSchema, type Identity } from '../types/models.js';

/**
 * Read the identity headers, or answer 401 and return null.
 */
export function requireIdentity(request: FastifyRequest, reply: FastifyReply): Identity | null {
  const parsed = IdentityHeadersSchema.safeParse(request.headers);
  if (!parsed.success) {
    void reply.status(401).send({
      error: 'Unauthorized',
      message: 'Missing or invalid x-user-id / x-user-role headers',
    });
    return null;
  }
  return { userId: parsed.data['x-user-id'], role: parsed.data['x-user-role'] };
}
