import { type FastifyInstance } from 'fastify';
import { type CareServices } from '@careline/domain';
import {
  DebriefIdParamsSchema,
  DebriefRequestSchema,
  EpisodeIdParamsSchema,
  ResolveEpisodeRequestSchema,
} from '@careline/proto';
import { type Authenticate, requireActor } from '../plugins/auth';
import { unwrap } from '../plugins/error-handler';
import { parseOrThrow } from '../plugins/validation';
import { presentDebrief, presentEpisode } from './presenters';

interface EpisodeRouteDeps<Tx> {
  services: CareServices<Tx>;
  authenticate: Authenticate;
  authenticateCaregiver: Authenticate;
}

export function registerEpisodeRoutes<Tx>(app: FastifyInstance, deps: EpisodeRouteDeps<Tx>): void {
  const { services, authenticate, authenticateCaregiver } = deps;
  const { coordinator, recorder } = services;

  app.get('/episodes/:episodeId', { preHandler: [authenticate] }, async (request, reply) => {
    const { episodeId } = parseOrThrow(EpisodeIdParamsSchema, request.params, 'Invalid episode id');
    const episode = unwrap(await coordinator.getEpisode(requireActor(request), episodeId));
    return reply.status(200).send(presentEpisode(episode));
  });

  app.post('/episodes/:episodeId/advance', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { episodeId } = parseOrThrow(EpisodeIdParamsSchema, request.params, 'Invalid episode id');
    const episode = unwrap(await coordinator.advance(requireActor(request), episodeId));
    return reply.status(200).send(presentEpisode(episode));
  });

  app.post('/episodes/:episodeId/resolve', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { episodeId } = parseOrThrow(EpisodeIdParamsSchema, request.params, 'Invalid episode id');
    const resolution = parseOrThrow(ResolveEpisodeRequestSchema, request.body, 'Invalid resolution');
    const episode = unwrap(await coordinator.resolve(requireActor(request), episodeId, resolution));
    return reply.status(200).send(presentEpisode(episode));
  });

  app.get('/episodes/:episodeId/debriefs', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { episodeId } = parseOrThrow(EpisodeIdParamsSchema, request.params, 'Invalid episode id');
    const debriefs = unwrap(await recorder.listDebriefs(requireActor(request), episodeId));
    return reply.status(200).send(debriefs.map(presentDebrief));
  });

  app.post('/episodes/:episodeId/debriefs', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { episodeId } = parseOrThrow(EpisodeIdParamsSchema, request.params, 'Invalid episode id');
    const body = parseOrThrow(DebriefRequestSchema, request.body, 'Invalid debrief');
    const debrief = unwrap(await recorder.recordDebrief(requireActor(request), episodeId, body));
    return reply.status(201).send(presentDebrief(debrief));
  });

  app.post('/debriefs/:debriefId/corrections', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { debriefId } = parseOrThrow(DebriefIdParamsSchema, request.params, 'Invalid debrief id');
    const body = parseOrThrow(DebriefRequestSchema, request.body, 'Invalid debrief');
    const debrief = unwrap(await recorder.recordCorrection(requireActor(request), debriefId, body));
    return reply.status(201).send(presentDebrief(debrief));
  });
}
