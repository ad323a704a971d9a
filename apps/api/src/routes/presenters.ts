import {
  type DailyStatus,
  type Debrief,
  type EscalationEpisode,
  type Pairing,
} from '@careline/domain';

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function presentPairing(p: Pairing) {
  return {
    id: p.id,
    dependentRef: p.dependentRef,
    communityCode: p.communityCode,
    timeZone: p.timeZone,
    contactChain: p.contactChain,
    status: p.status,
    createdAt: p.createdAt.toISOString(),
    expiresAt: iso(p.expiresAt),
    activatedAt: iso(p.activatedAt),
    revokedAt: iso(p.revokedAt),
  };
}

export function presentDailyStatus(s: DailyStatus) {
  return {
    id: s.id,
    pairingId: s.pairingId,
    statusDate: s.statusDate,
    status: s.status,
    confirmedAt: iso(s.confirmedAt),
    helpFlag: s.helpFlag,
    escalationStage: s.escalationStage,
    caregiverActions: s.caregiverActions,
    caregiverNote: s.caregiverNote,
    updatedAt: s.updatedAt.toISOString(),
  };
}

export function presentEpisode(e: EscalationEpisode) {
  return {
    id: e.id,
    pairingId: e.pairingId,
    dailyStatusId: e.dailyStatusId,
    trigger: e.trigger,
    stage: e.stage,
    contactIndex: e.contactIndex,
    primaryNotifiedAt: iso(e.primaryNotifiedAt),
    backupNotifiedAt: iso(e.backupNotifiedAt),
    exhaustedAt: iso(e.exhaustedAt),
    resolution: e.resolution,
    resolvedAt: iso(e.resolvedAt),
    closedAt: iso(e.closedAt),
    createdAt: e.createdAt.toISOString(),
  };
}

export function presentDebrief(d: Debrief) {
  return {
    id: d.id,
    episodeId: d.episodeId,
    outcome: d.outcome,
    difficulty: d.difficulty,
    feedback: d.feedback,
    supersedes: d.supersedes,
    createdAt: d.createdAt.toISOString(),
  };
}
