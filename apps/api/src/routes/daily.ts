import { type FastifyInstance } from 'fastify';
import { type CareServices } from '@careline/domain';
import { DailyActionRequestSchema } from '@careline/proto';
import { type Authenticate, requireActor } from '../plugins/auth';
import { unwrap } from '../plugins/error-handler';
import { parseOrThrow } from '../plugins/validation';
import { presentDailyStatus, presentEpisode } from './presenters';

interface DailyRouteDeps<Tx> {
  services: CareServices<Tx>;
  authenticateDependent: Authenticate;
}

export function registerDailyRoutes<Tx>(app: FastifyInstance, deps: DailyRouteDeps<Tx>): void {
  const { services, authenticateDependent } = deps;

  app.post('/daily/confirm', { preHandler: [authenticateDependent] }, async (request, reply) => {
    const { pairingId } = parseOrThrow(DailyActionRequestSchema, request.body, 'Invalid daily action');
    const status = unwrap(await services.tracker.recordConfirm(requireActor(request), pairingId));
    return reply.status(200).send(presentDailyStatus(status));
  });

  app.post('/daily/help', { preHandler: [authenticateDependent] }, async (request, reply) => {
    const { pairingId } = parseOrThrow(DailyActionRequestSchema, request.body, 'Invalid daily action');
    const outcome = unwrap(await services.tracker.recordHelp(requireActor(request), pairingId));
    return reply.status(200).send({
      dailyStatus: presentDailyStatus(outcome.dailyStatus),
      episode: outcome.episode ? presentEpisode(outcome.episode) : null,
    });
  });
}
