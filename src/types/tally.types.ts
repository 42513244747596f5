import type { StoredCandidateTally, StoredTallyOutcome } from '../db/schema';

export type CandidateTally = StoredCandidateTally;

export type TallyOutcome = StoredTallyOutcome;

export interface TallySnapshot {
  eventId: string;
  totalBallots: number;
  results: CandidateTally[];
  outcome: TallyOutcome;
  computedAt: Date;
}
