import { describe, it, expect } from 'vitest';
import { createEnvelope, EventEnvelopeSchema } from '../envelope';
import { CareNotifyPayload, CareAuditPayload } from '../events';

describe('EventEnvelope', () => {
  it('creates a valid envelope', () => {
    const env = createEnvelope(
      'evt-1',
      'CARE_NOTIFY',
      { episodeId: 'ep-1', contactRef: 'contact-a', eventKind: 'help_requested' },
      new Date('2026-03-10T02:00:00Z'),
    );

    expect(env).toEqual({
      eventId: 'evt-1',
      timestamp: '2026-03-10T02:00:00.000Z',
      type: 'CARE_NOTIFY',
      payload: { episodeId: 'ep-1', contactRef: 'contact-a', eventKind: 'help_requested' },
    });
    expect(EventEnvelopeSchema.safeParse(env).success).toBe(true);
  });

  it('rejects invalid envelope', () => {
    const result = EventEnvelopeSchema.safeParse({
      eventId: '',
      timestamp: 'not-a-date',
      type: '',
    });
    expect(result.success).toBe(false);
  });
});

describe('event payloads', () => {
  it('accepts a notify payload', () => {
    const result = CareNotifyPayload.safeParse({
      episodeId: 'ep-1',
      contactRef: 'contact-a',
      eventKind: 'escalation_exhausted',
    });
    expect(result.success).toBe(true);
  });

  it('rejects an unknown notify kind', () => {
    const result = CareNotifyPayload.safeParse({ episodeId: 'ep-1', contactRef: 'contact-a', eventKind: 'ping' });
    expect(result.success).toBe(false);
  });

  it('requires an ISO timestamp on audit payloads', () => {
    const base = { actor: 'system', action: 'credential_expired', resourceRef: 'credential:c-1', metadata: {} };
    expect(CareAuditPayload.safeParse({ ...base, timestamp: '2026-03-10T02:00:00.000Z' }).success).toBe(true);
    expect(CareAuditPayload.safeParse({ ...base, timestamp: 'yesterday' }).success).toBe(false);
  });
});
