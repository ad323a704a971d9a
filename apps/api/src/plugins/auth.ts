import { type FastifyRequest } from 'fastify';
import { type Actor } from '@careline/domain';
import { AppError, ErrorCode, type TokenScope, type TokenService } from '@careline/shared';

type RequestActor = Exclude<Actor, { kind: 'system' }>;

declare module 'fastify' {
  interface FastifyRequest {
    actor?: RequestActor;
  }
}

/**
 * Verifies the bearer token and, when `scopes` is given, refuses tokens of
 * any other scope. A caregiver token never reaches a dependent route.
 */
export function createAuthMiddleware(tokenService: TokenService, scopes?: readonly TokenScope[]) {
  return async function authenticate(request: FastifyRequest) {
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Missing or invalid authorization header');
    }

    const token = header.slice(7);
    let actor: RequestActor;
    try {
      actor = await tokenService.verify(token);
    } catch {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or expired access token');
    }

    if (scopes && !scopes.includes(actor.kind)) {
      throw new AppError(ErrorCode.FORBIDDEN, 'Token scope not allowed for this route');
    }
    request.actor = actor;
  };
}

export type Authenticate = ReturnType<typeof createAuthMiddleware>;

export function requireActor(request: FastifyRequest): RequestActor {
  if (!request.actor) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
  }
  return request.actor;
}

export function requireCaregiverId(request: FastifyRequest): string {
  const actor = requireActor(request);
  if (actor.kind !== 'caregiver') {
    throw new AppError(ErrorCode.FORBIDDEN, 'Caregiver token required');
  }
  return actor.caregiverId;
}
