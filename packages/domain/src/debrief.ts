export const DEBRIEF_OUTCOMES = [
  'reached_dependent',
  'reached_backup',
  'emergency_services',
  'false_alarm',
  'unresolved',
] as const;
export type DebriefOutcome = (typeof DEBRIEF_OUTCOMES)[number];

export interface Debrief {
  id: string;
  episodeId: string;
  pairingId: string;
  outcome: DebriefOutcome;
  /** 1 (easy) to 5 (very hard). */
  difficulty: number;
  feedback: string | null;
  supersedes: string | null;
  createdAt: Date;
}

export interface DebriefInput {
  outcome: DebriefOutcome;
  difficulty: number;
  feedback?: string | null;
}
