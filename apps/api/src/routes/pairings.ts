import { type FastifyInstance } from 'fastify';
import { type CareServices } from '@careline/domain';
import {
  CaregiverActionsRequestSchema,
  CreatePairingRequestSchema,
  PairingIdParamsSchema,
  SetContactChainRequestSchema,
  StatusHistoryQuerySchema,
} from '@careline/proto';
import { type Authenticate, requireCaregiverId } from '../plugins/auth';
import { unwrap } from '../plugins/error-handler';
import { parseOrThrow } from '../plugins/validation';
import { presentDailyStatus, presentPairing } from './presenters';

interface PairingRouteDeps<Tx> {
  services: CareServices<Tx>;
  authenticateCaregiver: Authenticate;
  credentialTtlMs: number;
}

export function registerPairingRoutes<Tx>(app: FastifyInstance, deps: PairingRouteDeps<Tx>): void {
  const { services, authenticateCaregiver } = deps;
  const { authority, tracker } = services;

  app.post('/pairings', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const caregiverId = requireCaregiverId(request);
    const body = parseOrThrow(CreatePairingRequestSchema, request.body, 'Invalid pairing data');

    const issued = unwrap(
      await authority.createPairing(caregiverId, body.dependentRef, {
        ttlMs: deps.credentialTtlMs,
        communityCode: body.communityCode ?? null,
        timeZone: body.timeZone,
        contactChain: body.contactChain,
      }),
    );
    return reply.status(201).send({
      pairing: presentPairing(issued.pairing),
      shortCode: issued.shortCode,
      linkToken: issued.linkToken,
      expiresAt: issued.expiresAt.toISOString(),
    });
  });

  app.get('/pairings', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const pairings = await authority.listPairings(requireCaregiverId(request));
    return reply.status(200).send(pairings.map(presentPairing));
  });

  app.delete('/pairings/:pairingId', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { pairingId } = parseOrThrow(PairingIdParamsSchema, request.params, 'Invalid pairing id');
    const pairing = unwrap(await authority.revokePairing(pairingId, requireCaregiverId(request)));
    return reply.status(200).send(presentPairing(pairing));
  });

  app.put('/pairings/:pairingId/contacts', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { pairingId } = parseOrThrow(PairingIdParamsSchema, request.params, 'Invalid pairing id');
    const body = parseOrThrow(SetContactChainRequestSchema, request.body, 'Invalid contact chain');
    const pairing = unwrap(
      await authority.setContactChain(pairingId, requireCaregiverId(request), body.contactChain),
    );
    return reply.status(200).send(presentPairing(pairing));
  });

  app.get('/pairings/:pairingId/credential', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { pairingId } = parseOrThrow(PairingIdParamsSchema, request.params, 'Invalid pairing id');
    const view = unwrap(await authority.describeCredential(pairingId, requireCaregiverId(request)));
    return reply.status(200).send({
      status: view.status,
      expiresAt: view.expiresAt.toISOString(),
      redeemedAt: view.redeemedAt ? view.redeemedAt.toISOString() : null,
      createdAt: view.createdAt.toISOString(),
    });
  });

  app.get('/pairings/:pairingId/statuses', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { pairingId } = parseOrThrow(PairingIdParamsSchema, request.params, 'Invalid pairing id');
    const { days } = parseOrThrow(StatusHistoryQuerySchema, request.query, 'Invalid status query');
    const statuses = unwrap(await tracker.getRecentStatuses(pairingId, requireCaregiverId(request), days));
    return reply.status(200).send(statuses.map(presentDailyStatus));
  });

  app.post('/pairings/:pairingId/actions', { preHandler: [authenticateCaregiver] }, async (request, reply) => {
    const { pairingId } = parseOrThrow(PairingIdParamsSchema, request.params, 'Invalid pairing id');
    const body = parseOrThrow(CaregiverActionsRequestSchema, request.body, 'Invalid caregiver actions');
    const status = unwrap(
      await tracker.recordCaregiverActions(pairingId, requireCaregiverId(request), body.actions, body.note ?? null),
    );
    return reply.status(200).send(presentDailyStatus(status));
  });
}
