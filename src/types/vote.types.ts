import type { CandidateInfo } from './event.types';

export interface SubmitVoteRequest {
  voterSecret: string;
  eventId: string;
  selectedCandidateIds: string[];
}

/**
 * Returned once to the voter. Neither value can be recovered later:
 * the secret is stored only as a digest.
 */
export interface VoteReceipt {
  eventId: string;
  verificationCode: string;
  voteSecret: string;
  submittedAt: Date;
}

export interface BulletinBoardEntry {
  verificationCode: string;
  submittedAt: Date;
}

export type VerificationLevel = 1 | 2;

export interface DecodeVoteRequest {
  level: VerificationLevel;
  verificationCode: string;
  voteSecret?: string;
}

export interface DecodedVote {
  level: VerificationLevel;
  eventId: string;
  eventName: string;
  verificationCode: string;
  submittedAt: Date;
  selectedCandidates: Array<Pick<CandidateInfo, 'id' | 'name'>>;
  /** Whether the stored ciphertext still matches its validity proof. */
  proofVerified: boolean;
  /** Whether the latest stored tally includes this ballot. */
  isCounted: boolean;
  voterId?: string;
}

export interface EventParticipant {
  voterId: string;
  hasVoted: boolean;
  submittedAt: Date | null;
}

// Voter registry
export const VOTER_ID_MAX_LENGTH = 255;

export interface Voter {
  id: string;
  createdAt: Date;
}

export interface VoterRegistration {
  voterId: string;
  voterSecret: string;
}
