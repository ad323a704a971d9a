export const ESCALATION_STAGES = ['notify_primary', 'notify_backup', 'exhausted'] as const;
export type EscalationStage = (typeof ESCALATION_STAGES)[number];

export type EscalationTrigger = 'help_requested' | 'confirmation_missed';

export type NotifyEventKind = 'help_requested' | 'confirmation_missed' | 'escalation_exhausted';

export type EpisodeResolution =
  | { outcome: 'contact_reached'; contactRef: string }
  | { outcome: 'dependent_confirmed' };

export interface EscalationEpisode {
  id: string;
  pairingId: string;
  dailyStatusId: string;
  trigger: EscalationTrigger;
  stage: EscalationStage;
  contactIndex: number;
  primaryNotifiedAt: Date | null;
  backupNotifiedAt: Date | null;
  exhaustedAt: Date | null;
  lastNotifiedAt: Date | null;
  resolution: EpisodeResolution | null;
  resolvedAt: Date | null;
  closedAt: Date | null;
  createdAt: Date;
}

export const ESCALATION_TRANSITIONS: Readonly<Record<EscalationStage, readonly EscalationStage[]>> = {
  notify_primary: ['notify_backup', 'exhausted'],
  notify_backup: ['notify_backup', 'exhausted'],
  exhausted: [],
};

export function canTransitionStage(from: EscalationStage, to: EscalationStage): boolean {
  return ESCALATION_TRANSITIONS[from].includes(to);
}

export interface StageStep {
  stage: EscalationStage;
  contactIndex: number;
  contactRef: string | null;
}

export function firstStep(chain: readonly string[]): StageStep {
  if (chain.length === 0) {
    return { stage: 'exhausted', contactIndex: 0, contactRef: null };
  }
  return { stage: 'notify_primary', contactIndex: 0, contactRef: chain[0] };
}

/** Step taken when the contact at `contactIndex` did not resolve the episode. */
export function nextStep(contactIndex: number, chain: readonly string[]): StageStep {
  const next = contactIndex + 1;
  if (next < chain.length) {
    return { stage: 'notify_backup', contactIndex: next, contactRef: chain[next] };
  }
  return { stage: 'exhausted', contactIndex: chain.length, contactRef: null };
}

/** Terminal episodes can be debriefed: the chain ran out or someone resolved it. */
export function isEpisodeTerminal(episode: EscalationEpisode): boolean {
  return episode.stage === 'exhausted' || episode.resolvedAt !== null;
}

export function isEpisodeClosed(episode: EscalationEpisode): boolean {
  return episode.closedAt !== null;
}

export function notifyKindFor(trigger: EscalationTrigger): NotifyEventKind {
  return trigger === 'help_requested' ? 'help_requested' : 'confirmation_missed';
}
