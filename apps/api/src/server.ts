import Fastify from 'fastify';
import { type CareServices } from '@careline/domain';
import { createLogger, type TokenService } from '@careline/shared';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createRateLimiter } from './plugins/rate-limit';
import { registerPairingRoutes } from './routes/pairings';
import { registerRedeemRoutes } from './routes/redeem';
import { registerDailyRoutes } from './routes/daily';
import { registerEpisodeRoutes } from './routes/episodes';

const logger = createLogger({ name: 'api' });

export interface ServerOptions<Tx> {
  services: CareServices<Tx>;
  tokenService: TokenService;
  credentialTtlMs: number;
  redeemRateLimitPerMinute: number;
}

export function buildServer<Tx>(opts: ServerOptions<Tx>) {
  const app = Fastify({
    logger: false,
    bodyLimit: 65_536,
  });

  registerErrorHandler(app);

  const { services, tokenService } = opts;
  const authenticate = createAuthMiddleware(tokenService);
  const authenticateCaregiver = createAuthMiddleware(tokenService, ['caregiver']);
  const authenticateDependent = createAuthMiddleware(tokenService, ['dependent']);
  const redeemRateLimit = createRateLimiter({
    name: 'redeem',
    windowMs: 60_000,
    maxRequests: opts.redeemRateLimitPerMinute,
  });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerPairingRoutes(app, { services, authenticateCaregiver, credentialTtlMs: opts.credentialTtlMs });
  registerRedeemRoutes(app, { services, tokenService, redeemRateLimit });
  registerDailyRoutes(app, { services, authenticateDependent });
  registerEpisodeRoutes(app, { services, authenticate, authenticateCaregiver });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info({ method: request.method, url: request.url, requestId: request.id }, 'Incoming request');
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  return app;
}
