import { describe, it, expect, beforeEach } from 'vitest';
import { type EscalationEpisode } from '../escalation';
import { createWorld, type World } from './harness';

const caregiver = { kind: 'caregiver', caregiverId: 'cg-1' } as const;

describe('DebriefRecorder', () => {
  let world: World;

  beforeEach(() => {
    world = createWorld(new Date('2026-03-10T02:00:00Z'));
  });

  async function openEpisode(contacts: string[] = ['contact-a']): Promise<EscalationEpisode> {
    const pairing = await world.activePairing('cg-1', contacts);
    const help = await world.tracker.recordHelp({ kind: 'dependent', pairingId: pairing.id }, pairing.id);
    if (!help.ok || !help.value.episode) throw new Error('setup');
    return help.value.episode;
  }

  it('refuses an episode that is still escalating', async () => {
    const episode = await openEpisode();
    const result = await world.recorder.recordDebrief(caregiver, episode.id, { outcome: 'false_alarm', difficulty: 1 });
    expect(result).toMatchObject({ ok: false, error: { kind: 'NOT_TERMINAL' } });
  });

  it('closes a resolved episode and stores the debrief', async () => {
    const episode = await openEpisode();
    await world.coordinator.resolve(caregiver, episode.id, { outcome: 'contact_reached', contactRef: 'contact-a' });
    world.clock.advance(60_000);

    const result = await world.recorder.recordDebrief(caregiver, episode.id, {
      outcome: 'reached_backup',
      difficulty: 3,
      feedback: '  neighbour knocked  ',
    });

    expect(result).toMatchObject({
      ok: true,
      value: { episodeId: episode.id, outcome: 'reached_backup', difficulty: 3, feedback: 'neighbour knocked', supersedes: null },
    });
    const closed = await world.repos.episodeRepo.findById(null, episode.id);
    expect(closed?.closedAt).toEqual(new Date('2026-03-10T02:01:00Z'));
  });

  it('accepts an exhausted episode', async () => {
    const episode = await openEpisode([]);
    const result = await world.recorder.recordDebrief(caregiver, episode.id, {
      outcome: 'unresolved',
      difficulty: 5,
      feedback: '   ',
    });
    expect(result).toMatchObject({ ok: true, value: { outcome: 'unresolved', feedback: null } });
  });

  it('reports ALREADY_CLOSED for a second debrief', async () => {
    const episode = await openEpisode([]);
    await world.recorder.recordDebrief(caregiver, episode.id, { outcome: 'false_alarm', difficulty: 1 });

    const again = await world.recorder.recordDebrief(caregiver, episode.id, { outcome: 'false_alarm', difficulty: 2 });
    expect(again).toMatchObject({ ok: false, error: { kind: 'ALREADY_CLOSED' } });

    const advance = await world.coordinator.advance(caregiver, episode.id);
    expect(advance).toMatchObject({ ok: false, error: { kind: 'ALREADY_CLOSED' } });
  });

  it('corrects a debrief with a linked record and never edits it', async () => {
    const episode = await openEpisode([]);
    const original = await world.recorder.recordDebrief(caregiver, episode.id, { outcome: 'false_alarm', difficulty: 1 });
    if (!original.ok) throw new Error('setup');

    const correction = await world.recorder.recordCorrection(caregiver, original.value.id, {
      outcome: 'reached_dependent',
      difficulty: 2,
    });
    const duplicate = await world.recorder.recordCorrection(caregiver, original.value.id, {
      outcome: 'emergency_services',
      difficulty: 4,
    });

    expect(correction).toMatchObject({ ok: true, value: { supersedes: original.value.id, outcome: 'reached_dependent' } });
    expect(duplicate).toMatchObject({ ok: false, error: { kind: 'ALREADY_CLOSED' } });

    const listed = await world.recorder.listDebriefs(caregiver, episode.id);
    expect(listed.ok && listed.value.map((d) => d.outcome)).toEqual(['false_alarm', 'reached_dependent']);
  });

  it('reports NOT_FOUND for an unknown debrief', async () => {
    const result = await world.recorder.recordCorrection(caregiver, 'missing', { outcome: 'false_alarm', difficulty: 1 });
    expect(result).toMatchObject({ ok: false, error: { kind: 'NOT_FOUND' } });
  });

  it('hides debriefs from other caregivers', async () => {
    const episode = await openEpisode([]);
    const result = await world.recorder.listDebriefs({ kind: 'caregiver', caregiverId: 'cg-2' }, episode.id);
    expect(result).toMatchObject({ ok: false, error: { kind: 'NOT_FOUND' } });
  });
});
