import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../config/database';
import { ballots, tallySnapshots, voteEvents } from '../db/schema';
import type { DecodeVoteRequest, DecodedVote } from '../types/vote.types';
import { AuthenticationError, NotFoundError, ValidationError } from '../utils/errors';
import { digestsMatch, hashSecret } from '../utils/helpers';
import { logSecurity } from '../utils/logger';
import type { CryptoService } from './crypto.service';
import type { EventService } from './event.service';

/**
 * Read-only disclosure of a recorded ballot. Level 1 needs the public
 * verification code; Level 2 also needs the vote secret and adds the voter.
 * Nothing here decrypts: selections come from the stored plaintext list.
 */
export class VerificationService {
  constructor(
    private readonly db: AppDatabase,
    private readonly events: EventService,
    private readonly crypto: CryptoService
  ) {}

  async decodeVote(request: DecodeVoteRequest): Promise<DecodedVote> {
    const { level } = request;
    if (level !== 1 && level !== 2) {
      throw new ValidationError('Verification level must be 1 or 2', { field: 'level' });
    }

    const code = typeof request.verificationCode === 'string' ? request.verificationCode.trim().toUpperCase() : '';
    if (code.length === 0) {
      throw new ValidationError('Verification code is required', { field: 'verificationCode' });
    }
    if (level === 2 && (typeof request.voteSecret !== 'string' || request.voteSecret.length === 0)) {
      throw new ValidationError('Level 2 verification requires the vote secret', { field: 'voteSecret' });
    }

    const record = this.db
      .select({
        eventId: ballots.eventId,
        eventName: voteEvents.name,
        selectionLimit: voteEvents.selectionLimit,
        cryptoContext: voteEvents.cryptoContext,
        voterId: ballots.voterId,
        ciphertext: ballots.ciphertext,
        proof: ballots.proof,
        verificationCode: ballots.verificationCode,
        voteSecretHash: ballots.voteSecretHash,
        selectedCandidateIds: ballots.selectedCandidateIds,
        submittedAt: ballots.submittedAt,
        sequence: ballots.sequence,
      })
      .from(ballots)
      .innerJoin(voteEvents, eq(voteEvents.id, ballots.eventId))
      .where(eq(ballots.verificationCode, code))
      .get();

    if (!record) {
      throw new NotFoundError(`No ballot with verification code ${code}`);
    }

    if (level === 2 && !digestsMatch(hashSecret(request.voteSecret ?? ''), record.voteSecretHash)) {
      logSecurity('VOTE_SECRET_MISMATCH', 'medium', { eventId: record.eventId });
      throw new AuthenticationError('Vote secret does not match this ballot');
    }

    const registry = this.events.loadRegistry({ id: record.eventId, selectionLimit: record.selectionLimit });
    const proofVerified = await this.crypto.verifyBallot(record.ciphertext, record.proof, record.cryptoContext);

    // A tally reads ballots 1..totalBallots of the event's sequence
    const snapshot = this.db
      .select({ totalBallots: tallySnapshots.totalBallots })
      .from(tallySnapshots)
      .where(eq(tallySnapshots.eventId, record.eventId))
      .get();

    const decoded: DecodedVote = {
      level,
      eventId: record.eventId,
      eventName: record.eventName,
      verificationCode: record.verificationCode,
      submittedAt: record.submittedAt,
      selectedCandidates: registry.describe(record.selectedCandidateIds),
      proofVerified,
      isCounted: snapshot !== undefined && record.sequence <= snapshot.totalBallots,
    };

    if (level === 2) {
      decoded.voterId = record.voterId;
    }

    return decoded;
  }
}
