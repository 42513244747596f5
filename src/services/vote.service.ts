import { and, asc, count, desc, eq, max } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { AppDatabase } from '../config/database';
import { ballots, voteEvents, voters } from '../db/schema';
import { violatesUnique } from '../db/constraints';
import type { BulletinBoardEntry, EventParticipant, SubmitVoteRequest, VoteReceipt } from '../types/vote.types';
import {
  AppError,
  AuthenticationError,
  ConcurrencyConflict,
  IdempotencyViolation,
  ValidationError,
} from '../utils/errors';
import {
  PaginatedResult,
  PaginationOptions,
  generateSecureToken,
  hashSecret,
  normalizePagination,
  paginate,
} from '../utils/helpers';
import { logAudit, logError, logSecurity } from '../utils/logger';
import type { CryptoService } from './crypto.service';
import type { EventService } from './event.service';
import { assertAcceptingVotes } from './lifecycle';
import type { VoterService } from './voter.service';

const MAX_INSERT_ATTEMPTS = 5;

export class VoteService {
  constructor(
    private readonly db: AppDatabase,
    private readonly events: EventService,
    private readonly voters: VoterService,
    private readonly crypto: CryptoService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Cast one encrypted ballot. Checks run in a fixed order and the first
   * failure wins; nothing is written unless encryption succeeded. The
   * (event, voter) unique index is what finally decides between concurrent
   * submissions of the same voter.
   */
  async submitVote(request: SubmitVoteRequest): Promise<VoteReceipt> {
    const voter = this.voters.resolveBySecret(request.voterSecret);
    if (!voter) {
      logSecurity('BALLOT_REJECTED_UNKNOWN_SECRET', 'low', { eventId: request.eventId });
      throw new AuthenticationError('Invalid voter secret');
    }

    const event = this.events.loadEvent(request.eventId);
    assertAcceptingVotes(event, this.now());

    if (this.hasVoted(event.id, voter.id)) {
      throw new IdempotencyViolation();
    }

    if (!Array.isArray(request.selectedCandidateIds)) {
      throw new ValidationError('selectedCandidateIds must be an array', { field: 'selectedCandidateIds' });
    }
    const selectedIds = [...request.selectedCandidateIds];
    const vector = this.events.loadRegistry(event).buildVector(selectedIds);

    const { ciphertext, proof } = await this.crypto.encryptBallot(
      vector,
      event.manifest,
      event.cryptoContext,
      event.publicKey
    );

    let codeAttempt = 0;
    let verificationCode = await this.crypto.deriveVerificationCode(ciphertext, codeAttempt);
    let voteSecret = generateSecureToken();

    for (let attempt = 1; attempt <= MAX_INSERT_ATTEMPTS; attempt++) {
      const submittedAt = this.now();

      try {
        this.db.transaction((tx) => {
          // The event may have closed while the ballot was being encrypted
          const current = tx
            .select({ status: voteEvents.status, opensAt: voteEvents.opensAt, closesAt: voteEvents.closesAt })
            .from(voteEvents)
            .where(eq(voteEvents.id, event.id))
            .get();
          if (current) {
            assertAcceptingVotes(current, submittedAt);
          }

          const last = tx
            .select({ value: max(ballots.sequence) })
            .from(ballots)
            .where(eq(ballots.eventId, event.id))
            .get();

          tx.insert(ballots)
            .values({
              id: uuidv4(),
              eventId: event.id,
              voterId: voter.id,
              ciphertext,
              proof,
              verificationCode,
              voteSecretHash: hashSecret(voteSecret),
              selectedCandidateIds: selectedIds,
              submittedAt,
              sequence: (last?.value ?? 0) + 1,
            })
            .run();
        });
      } catch (error) {
        if (error instanceof AppError) {
          throw error;
        }

        if (violatesUnique(error, 'ballots.voter_id')) {
          logSecurity('CONCURRENT_BALLOT_SUBMISSION', 'medium', { eventId: event.id, voterId: voter.id });
          throw new ConcurrencyConflict();
        }
        if (violatesUnique(error, 'ballots.verification_code')) {
          codeAttempt += 1;
          verificationCode = await this.crypto.deriveVerificationCode(ciphertext, codeAttempt);
          continue;
        }
        if (violatesUnique(error, 'ballots.vote_secret_hash')) {
          voteSecret = generateSecureToken();
          continue;
        }

        if (error instanceof Error) {
          logError(error, { operation: 'submitVote', eventId: event.id });
        }
        throw new AppError('Failed to record ballot', 500, 'BALLOT_PERSISTENCE_FAILED');
      }

      logAudit('BALLOT_CAST', voter.id, { eventId: event.id });
      return { eventId: event.id, verificationCode, voteSecret, submittedAt };
    }

    throw new AppError('Could not allocate a unique verification code', 500, 'BALLOT_PERSISTENCE_FAILED');
  }

  /**
   * Public bulletin board: which codes were recorded and when. Carries no
   * voter identity and no selections.
   */
  listEventBallots(eventId: string): BulletinBoardEntry[] {
    this.events.loadEvent(eventId);

    return this.db
      .select({ verificationCode: ballots.verificationCode, submittedAt: ballots.submittedAt })
      .from(ballots)
      .where(eq(ballots.eventId, eventId))
      .orderBy(asc(ballots.submittedAt), asc(ballots.verificationCode))
      .all();
  }

  /**
   * Every registered voter with whether they have voted in this event.
   * Carries no codes, secrets or selections.
   */
  listEventParticipants(eventId: string, options: PaginationOptions = {}): PaginatedResult<EventParticipant> {
    this.events.loadEvent(eventId);
    const { limit, offset } = normalizePagination(options);

    const rows = this.db
      .select({ voterId: voters.id, submittedAt: ballots.submittedAt })
      .from(voters)
      .leftJoin(ballots, and(eq(ballots.voterId, voters.id), eq(ballots.eventId, eventId)))
      .orderBy(desc(voters.createdAt), asc(voters.id))
      .limit(limit)
      .offset(offset)
      .all();
    const total = this.db.select({ value: count() }).from(voters).get()?.value ?? 0;

    const participants = rows.map((row) => ({
      voterId: row.voterId,
      hasVoted: row.submittedAt !== null,
      submittedAt: row.submittedAt,
    }));

    return paginate(participants, total, options);
  }

  private hasVoted(eventId: string, voterId: string): boolean {
    const row = this.db
      .select({ id: ballots.id })
      .from(ballots)
      .where(and(eq(ballots.eventId, eventId), eq(ballots.voterId, voterId)))
      .get();
    return row !== undefined;
  }
}
