import { type EscalationStage } from './escalation';

export const DAILY_STATUS_KINDS = ['unconfirmed', 'confirmed', 'help_requested', 'escalated'] as const;
export type DailyStatusKind = (typeof DAILY_STATUS_KINDS)[number];

export const CAREGIVER_ACTIONS = ['remind', 'neighbor', 'community'] as const;
export type CaregiverAction = (typeof CAREGIVER_ACTIONS)[number];

/** Calendar date in the pairing's own time zone, `YYYY-MM-DD`. */
export type LocalDate = string;

export interface DailyStatus {
  id: string;
  pairingId: string;
  statusDate: LocalDate;
  status: DailyStatusKind;
  confirmedAt: Date | null;
  helpFlag: boolean;
  escalationStage: EscalationStage | null;
  caregiverActions: CaregiverAction[];
  caregiverNote: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Confirmed and help_requested are both end states for the day, but a help
 * signal after a confirmation still has to reach someone, so confirmed may
 * move on to help_requested. Nothing moves back.
 */
export const DAILY_STATUS_TRANSITIONS: Readonly<Record<DailyStatusKind, readonly DailyStatusKind[]>> = {
  unconfirmed: ['confirmed', 'help_requested', 'escalated'],
  confirmed: ['help_requested'],
  help_requested: ['escalated'],
  escalated: [],
};

export function canTransitionDailyStatus(from: DailyStatusKind, to: DailyStatusKind): boolean {
  return DAILY_STATUS_TRANSITIONS[from].includes(to);
}

export function dailyStatusSourcesFor(to: DailyStatusKind): DailyStatusKind[] {
  return DAILY_STATUS_KINDS.filter((from) => canTransitionDailyStatus(from, to));
}

export function isCaregiverAction(value: string): value is CaregiverAction {
  return CAREGIVER_ACTIONS.some((action) => action === value);
}
