import type { EventStatusValue } from '../db/schema';
import type { TallySnapshot } from './tally.types';

export type EventStatus = EventStatusValue;

export const EVENT_NAME_MAX_LENGTH = 255;
export const CANDIDATE_NAME_MAX_LENGTH = 255;
export const MIN_CANDIDATES = 2;

// Event Creation Types
export interface CreateEventRequest {
  name: string;
  opensAt: Date;
  closesAt: Date;
  selectionLimit: number;
  candidateNames: string[];
}

export interface CandidateInfo {
  id: string;
  name: string;
  position: number;
}

/**
 * Event as it is loaded for vote processing, including the crypto materials
 * the engine needs. Never sent to clients as is: `cryptoContext` carries the
 * decryption key.
 */
export interface VotingEvent {
  id: string;
  name: string;
  opensAt: Date;
  closesAt: Date;
  selectionLimit: number;
  status: EventStatus;
  manifest: string;
  publicKey: string;
  cryptoContext: string;
  createdAt: Date;
  endedAt: Date | null;
}

// Public event views
export interface EventSummary {
  id: string;
  name: string;
  opensAt: Date;
  closesAt: Date;
  selectionLimit: number;
  status: EventStatus;
  createdAt: Date;
  endedAt: Date | null;
}

export interface EventDetails extends EventSummary {
  publicKey: string;
  candidates: CandidateInfo[];
  ballotCount: number;
  tally: TallySnapshot | null;
}

export type VotingAvailability =
  | { accepting: true }
  | { accepting: false; reason: 'VOTING_ENDED' | 'VOTING_NOT_OPEN' | 'VOTING_WINDOW_CLOSED' };

export type LifecycleCommand = { type: 'CLOSE'; at: Date };

export type TransitionResult =
  | { ok: true; status: EventStatus; endedAt: Date }
  | { ok: false; code: 'EVENT_ALREADY_ENDED' };
