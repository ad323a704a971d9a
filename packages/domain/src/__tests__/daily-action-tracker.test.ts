import { describe, it, expect, beforeEach, vi } from 'vitest';
import { isOverdue } from '../daily-action-tracker';
import { type Pairing } from '../pairing';
import { createWorld, TEN_MINUTES, TZ, type World } from './harness';

const DAY = 24 * 60 * 60 * 1000;
const deadline = { hour: 20, minute: 0 };

describe('DailyActionTracker', () => {
  let world: World;

  beforeEach(() => {
    world = createWorld(new Date('2026-03-10T02:00:00Z'));
  });

  async function episodeFor(pairingId: string, date = '2026-03-10') {
    const row = await world.repos.dailyStatusRepo.findByPairingAndDate(null, pairingId, date);
    if (!row) return null;
    return world.repos.episodeRepo.findByDailyStatus(null, row.id);
  }

  describe('recordConfirm', () => {
    it('confirms today in the pairing time zone', async () => {
      const pairing = await world.activePairing();
      const result = await world.tracker.recordConfirm({ kind: 'dependent', pairingId: pairing.id }, pairing.id);

      expect(result).toMatchObject({
        ok: true,
        value: { statusDate: '2026-03-10', status: 'confirmed', confirmedAt: new Date('2026-03-10T02:00:00Z') },
      });
    });

    it('is idempotent for the same day', async () => {
      const pairing = await world.activePairing();
      const actor = { kind: 'dependent', pairingId: pairing.id } as const;

      const first = await world.tracker.recordConfirm(actor, pairing.id);
      world.clock.advance(60_000);
      const second = await world.tracker.recordConfirm(actor, pairing.id);

      expect(second).toEqual(first);
      expect(world.repos.audit.events.filter((e) => e.action === 'daily_confirmed')).toHaveLength(1);
    });

    it('rejects a dependent session for another pairing', async () => {
      const mine = await world.activePairing('cg-1');
      const other = await world.activePairing('cg-2');

      const result = await world.tracker.recordConfirm({ kind: 'dependent', pairingId: other.id }, mine.id);
      expect(result).toMatchObject({ ok: false, error: { kind: 'SCOPE_MISMATCH' } });
    });

    it('reports NOT_FOUND while the pairing is still pending', async () => {
      const created = await world.authority.createPairing('cg-1', 'dep-1', { ttlMs: TEN_MINUTES });
      if (!created.ok) throw new Error('setup');
      const id = created.value.pairing.id;

      const result = await world.tracker.recordConfirm({ kind: 'dependent', pairingId: id }, id);
      expect(result).toMatchObject({ ok: false, error: { kind: 'NOT_FOUND' } });
    });

    it('is ignored and logged after a help request', async () => {
      const pairing = await world.activePairing();
      const actor = { kind: 'dependent', pairingId: pairing.id } as const;

      await world.tracker.recordHelp(actor, pairing.id);
      const result = await world.tracker.recordConfirm(actor, pairing.id);

      expect(result).toMatchObject({ ok: true, value: { status: 'help_requested', confirmedAt: null } });
      expect(world.logger.info).toHaveBeenCalledWith(
        expect.objectContaining({ pairingId: pairing.id, statusDate: '2026-03-10' }),
        'Confirm after help request ignored',
      );
    });

    it('resolves the open episode on an escalated day and keeps the history', async () => {
      const pairing = await world.activePairing();
      world.clock.set(new Date('2026-03-10T12:30:00Z'));
      await world.tracker.sweepOverdue(world.clock.now(), deadline);

      const result = await world.tracker.recordConfirm({ kind: 'dependent', pairingId: pairing.id }, pairing.id);

      expect(result).toMatchObject({ ok: true, value: { status: 'escalated', confirmedAt: null } });
      expect(await episodeFor(pairing.id)).toMatchObject({
        resolution: { outcome: 'dependent_confirmed' },
        resolvedAt: new Date('2026-03-10T12:30:00Z'),
      });
    });
  });

  describe('recordHelp', () => {
    it('opens an episode straight away', async () => {
      const pairing = await world.activePairing();
      const result = await world.tracker.recordHelp({ kind: 'dependent', pairingId: pairing.id }, pairing.id);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.dailyStatus).toMatchObject({
        status: 'help_requested',
        helpFlag: true,
        escalationStage: 'notify_primary',
      });
      expect(result.value.episode).toMatchObject({
        trigger: 'help_requested',
        stage: 'notify_primary',
        contactIndex: 0,
      });
      expect(world.repos.notifications.intents).toEqual([
        { contactRef: 'contact-a', eventKind: 'help_requested', episodeId: result.value.episode?.id },
      ]);
    });

    it('does nothing more on a repeated request', async () => {
      const pairing = await world.activePairing();
      const actor = { kind: 'dependent', pairingId: pairing.id } as const;

      const first = await world.tracker.recordHelp(actor, pairing.id);
      const second = await world.tracker.recordHelp(actor, pairing.id);

      expect(second.ok && second.value.episode?.id).toBe(first.ok && first.value.episode?.id);
      expect(world.repos.notifications.intents).toHaveLength(1);
    });

    it('still escalates after a confirmation', async () => {
      const pairing = await world.activePairing();
      const actor = { kind: 'dependent', pairingId: pairing.id } as const;

      await world.tracker.recordConfirm(actor, pairing.id);
      const result = await world.tracker.recordHelp(actor, pairing.id);

      expect(result).toMatchObject({ ok: true, value: { dailyStatus: { status: 'help_requested' } } });
      expect(world.logger.info).toHaveBeenCalledWith(expect.anything(), 'Help request after confirmation');
    });

    it('ends in help_requested with one episode when confirm and help arrive together', async () => {
      const pairing = await world.activePairing();
      const actor = { kind: 'dependent', pairingId: pairing.id } as const;

      const [confirm, help] = await Promise.all([
        world.tracker.recordConfirm(actor, pairing.id),
        world.tracker.recordHelp(actor, pairing.id),
      ]);

      expect(confirm.ok).toBe(true);
      expect(help).toMatchObject({ ok: true, value: { dailyStatus: { status: 'help_requested', helpFlag: true } } });
      const row = await world.repos.dailyStatusRepo.findByPairingAndDate(null, pairing.id, '2026-03-10');
      expect(row).toMatchObject({ status: 'help_requested', helpFlag: true, escalationStage: 'notify_primary' });
      expect(await episodeFor(pairing.id)).toMatchObject({ trigger: 'help_requested', stage: 'notify_primary' });
      expect(world.repos.notifications.intents).toHaveLength(1);
    });

    it('notifies the caregiver directly when no contacts are configured', async () => {
      const pairing = await world.activePairing('cg-1', []);
      const result = await world.tracker.recordHelp({ kind: 'dependent', pairingId: pairing.id }, pairing.id);

      expect(result).toMatchObject({ ok: true, value: { episode: { stage: 'exhausted' } } });
      expect(world.repos.notifications.intents[0]).toMatchObject({
        contactRef: 'cg-1',
        eventKind: 'escalation_exhausted',
      });
    });
  });

  describe('sweepOverdue', () => {
    it('leaves pairings alone before the deadline', async () => {
      await world.activePairing();
      world.clock.set(new Date('2026-03-10T11:59:00Z'));
      expect(await world.tracker.sweepOverdue(world.clock.now(), deadline)).toEqual({ escalated: 0, failed: 0 });
    });

    it('escalates a missed confirmation and walks the contact chain', async () => {
      const pairing = await world.activePairing('cg-1', ['contact-a', 'contact-b']);
      world.clock.set(new Date('2026-03-10T12:30:00Z'));

      expect(await world.tracker.sweepOverdue(world.clock.now(), deadline)).toEqual({ escalated: 1, failed: 0 });
      const episode = await episodeFor(pairing.id);
      expect(episode).toMatchObject({ trigger: 'confirmation_missed', stage: 'notify_primary' });
      if (!episode) return;

      const caregiver = { kind: 'caregiver', caregiverId: 'cg-1' } as const;
      const first = await world.coordinator.advance(caregiver, episode.id);
      const second = await world.coordinator.advance(caregiver, episode.id);

      expect(first).toMatchObject({ ok: true, value: { stage: 'notify_backup', contactIndex: 1 } });
      expect(second).toMatchObject({ ok: true, value: { stage: 'exhausted' } });
      expect(world.repos.notifications.intents.map((i) => [i.contactRef, i.eventKind])).toEqual([
        ['contact-a', 'confirmation_missed'],
        ['contact-b', 'confirmation_missed'],
        ['cg-1', 'escalation_exhausted'],
      ]);
    });

    it('produces the same state when run twice', async () => {
      const pairing = await world.activePairing();
      world.clock.set(new Date('2026-03-10T12:30:00Z'));

      await world.tracker.sweepOverdue(world.clock.now(), deadline);
      const afterFirst = await world.repos.dailyStatusRepo.findByPairingAndDate(null, pairing.id, '2026-03-10');
      const second = await world.tracker.sweepOverdue(world.clock.now(), deadline);
      const afterSecond = await world.repos.dailyStatusRepo.findByPairingAndDate(null, pairing.id, '2026-03-10');

      expect(second).toEqual({ escalated: 0, failed: 0 });
      expect(afterSecond).toEqual(afterFirst);
      expect(world.repos.notifications.intents).toHaveLength(1);
    });

    it('escalates the remaining pairings when one of them fails', async () => {
      const broken = await world.activePairing('cg-1');
      const healthy = await world.activePairing('cg-2');
      const ensure = world.repos.dailyStatusRepo.ensure.bind(world.repos.dailyStatusRepo);
      vi.spyOn(world.repos.dailyStatusRepo, 'ensure').mockImplementation(async (tx, row) => {
        if (row.pairingId === broken.id) throw new Error('connection reset');
        return ensure(tx, row);
      });

      world.clock.set(new Date('2026-03-10T12:30:00Z'));
      const result = await world.tracker.sweepOverdue(world.clock.now(), deadline);

      expect(result).toEqual({ escalated: 1, failed: 1 });
      expect(await episodeFor(healthy.id)).toMatchObject({ trigger: 'confirmation_missed' });
      expect(await episodeFor(broken.id)).toBeNull();
      expect(world.logger.error).toHaveBeenCalledWith(
        { pairingId: broken.id, err: 'connection reset' },
        'Overdue escalation failed',
      );
    });

    it('skips confirmed pairings and pairings that are not active', async () => {
      const confirmed = await world.activePairing('cg-1');
      await world.tracker.recordConfirm({ kind: 'dependent', pairingId: confirmed.id }, confirmed.id);
      const revoked = await world.activePairing('cg-2');
      await world.authority.revokePairing(revoked.id, 'cg-2');

      world.clock.set(new Date('2026-03-10T12:30:00Z'));
      expect(await world.tracker.sweepOverdue(world.clock.now(), deadline)).toEqual({ escalated: 0, failed: 0 });
    });
  });

  describe('caregiver follow-up', () => {
    it('records de-duplicated actions with a trimmed note', async () => {
      const pairing = await world.activePairing();
      const result = await world.tracker.recordCaregiverActions(
        pairing.id,
        'cg-1',
        ['remind', 'neighbor', 'remind'],
        '  called twice ',
      );

      expect(result).toMatchObject({
        ok: true,
        value: { caregiverActions: ['remind', 'neighbor'], caregiverNote: 'called twice', status: 'unconfirmed' },
      });
    });

    it('returns recent days oldest first', async () => {
      const pairing = await world.activePairing();
      const actor = { kind: 'dependent', pairingId: pairing.id } as const;
      await world.tracker.recordConfirm(actor, pairing.id);
      world.clock.advance(DAY);
      await world.tracker.recordConfirm(actor, pairing.id);

      const week = await world.tracker.getRecentStatuses(pairing.id, 'cg-1', 7);
      const today = await world.tracker.getRecentStatuses(pairing.id, 'cg-1', 1);

      expect(week.ok && week.value.map((s) => s.statusDate)).toEqual(['2026-03-10', '2026-03-11']);
      expect(today.ok && today.value.map((s) => s.statusDate)).toEqual(['2026-03-11']);
    });

    it('hides history from other caregivers', async () => {
      const pairing = await world.activePairing();
      const result = await world.tracker.getRecentStatuses(pairing.id, 'cg-2', 7);
      expect(result).toMatchObject({ ok: false, error: { kind: 'NOT_FOUND' } });
    });
  });
});

describe('isOverdue', () => {
  function makePairing(activatedAt: Date | null): Pairing {
    return {
      id: 'pair-1', caregiverId: 'cg-1', dependentRef: 'dep-1', communityCode: null, timeZone: TZ,
      contactChain: ['a'], status: 'active', createdAt: new Date('2026-03-01T00:00:00Z'),
      expiresAt: null, activatedAt, revokedAt: null,
    };
  }

  it('spares a pairing activated after today\'s deadline', () => {
    const now = new Date('2026-03-10T13:00:00Z');
    expect(isOverdue(makePairing(new Date('2026-03-10T12:10:00Z')), now, deadline)).toBe(false);
    expect(isOverdue(makePairing(new Date('2026-03-10T03:00:00Z')), now, deadline)).toBe(true);
    expect(isOverdue(makePairing(new Date('2026-03-09T12:10:00Z')), now, deadline)).toBe(true);
  });
});
