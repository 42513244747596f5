import type { EventStatus, LifecycleCommand, TransitionResult, VotingAvailability } from '../types/event.types';
import { StateError } from '../utils/errors';

interface WindowedEvent {
  status: EventStatus;
  opensAt: Date;
  closesAt: Date;
}

const assertNever = (value: never): never => {
  throw new Error(`Unhandled event status: ${String(value)}`);
};

/**
 * INVOTING -> ENDED, once. There is no way back.
 */
export function transition(status: EventStatus, command: LifecycleCommand): TransitionResult {
  switch (status) {
    case 'INVOTING':
      return { ok: true, status: 'ENDED', endedAt: command.at };
    case 'ENDED':
      return { ok: false, code: 'EVENT_ALREADY_ENDED' };
    default:
      return assertNever(status);
  }
}

/**
 * Status and window are checked separately so the caller learns which one
 * rejected the vote. The window is half-open: [opensAt, closesAt).
 */
export function getVotingAvailability(event: WindowedEvent, now: Date): VotingAvailability {
  if (event.status === 'ENDED') {
    return { accepting: false, reason: 'VOTING_ENDED' };
  }
  if (now.getTime() < event.opensAt.getTime()) {
    return { accepting: false, reason: 'VOTING_NOT_OPEN' };
  }
  if (now.getTime() >= event.closesAt.getTime()) {
    return { accepting: false, reason: 'VOTING_WINDOW_CLOSED' };
  }
  return { accepting: true };
}

export function isAcceptingVotes(event: WindowedEvent, now: Date): boolean {
  return getVotingAvailability(event, now).accepting;
}

const REJECTION_MESSAGES = {
  VOTING_ENDED: 'Voting has ended for this event',
  VOTING_NOT_OPEN: 'Voting has not opened yet',
  VOTING_WINDOW_CLOSED: 'The voting window has closed',
} as const;

export function assertAcceptingVotes(event: WindowedEvent, now: Date): void {
  const availability = getVotingAvailability(event, now);
  if (!availability.accepting) {
    throw new StateError(REJECTION_MESSAGES[availability.reason], availability.reason);
  }
}
