import { type FastifyInstance } from 'fastify';
import { type CareServices, type PresentedSecret } from '@careline/domain';
import { RedeemRequestSchema } from '@careline/proto';
import { AppError, type TokenService } from '@careline/shared';
import { type RateLimit } from '../plugins/rate-limit';
import { parseOrThrow } from '../plugins/validation';

interface RedeemRouteDeps<Tx> {
  services: CareServices<Tx>;
  tokenService: TokenService;
  redeemRateLimit: RateLimit;
}

export function registerRedeemRoutes<Tx>(app: FastifyInstance, deps: RedeemRouteDeps<Tx>): void {
  const { services, tokenService, redeemRateLimit } = deps;

  app.post('/redeem', { preHandler: [redeemRateLimit] }, async (request, reply) => {
    const body = parseOrThrow(RedeemRequestSchema, request.body, 'Invalid redemption data');
    const presented: PresentedSecret =
      body.shortCode !== undefined
        ? { kind: 'short_code', code: body.shortCode }
        : { kind: 'link_token', token: body.linkToken ?? '' };

    const result = await services.gate.redeem(presented, `ip:${request.ip}`, {
      communityCode: body.communityCode ?? null,
    });
    if (!result.ok) {
      throw AppError.fromRedemptionFailure(result.error.kind);
    }

    const pairing = result.value;
    return reply.status(200).send({
      pairingId: pairing.id,
      timeZone: pairing.timeZone,
      sessionToken: await tokenService.signDependentSession(pairing.id),
    });
  });
}
