import type { FastifyRequest, FastifyReply } from 'fastify';
import { config } from '../../config';
import { UnauthorizedError } from '../../shared/errors';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export async function authMiddleware(
  request: FastifyRequest,
  _reply: FastifyReply
): Promise<void> {
  const apiKey = headerValue(request.headers['x-api-key']);
  const authHeader = headerValue(request.headers['authorization']);

  let token: string | undefined;

  // Check X-API-Key header first
  if (apiKey) {
    token = apiKey;
  }
  // Then check Authorization: Bearer header
  else if (authHeader?.startsWith('Bearer ')) {
    token = authHeader.substring(7);
  }

  if (!token) {
    throw new UnauthorizedError('Missing API key or authorization token');
  }

  if (token !== config.apiSecretKey) {
    request.log.warn({ providedKey: token.substring(0, 4) + '...' }, 'Invalid API key attempt');
    throw new UnauthorizedError('Invalid API key');
  }

  request.log.debug('API key validated');
}
