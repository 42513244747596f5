import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { HOUR, TestContext, createOpenEvent, createTestContext, registerVoters } from '../__tests__/helpers/context';
import { ballots } from '../db/schema';
import type { EventDetails } from '../types/event.types';
import {
  AuthenticationError,
  ConcurrencyConflict,
  CryptoEngineError,
  IdempotencyViolation,
  NotFoundError,
  StateError,
  ValidationError,
} from '../utils/errors';
import { hashSecret } from '../utils/helpers';

describe('VoteService', () => {
  let context: TestContext;
  let event: EventDetails;
  let secret: string;

  const candidateId = (name: string): string => {
    const candidate = event.candidates.find((entry) => entry.name === name);
    if (!candidate) {
      throw new Error(`No candidate ${name}`);
    }
    return candidate.id;
  };

  const storedBallots = () =>
    context.handle.db.select().from(ballots).where(eq(ballots.eventId, event.id)).all();

  beforeEach(async () => {
    context = createTestContext({ timeoutMs: 50 });
    event = await createOpenEvent(context);
    [secret] = registerVoters(context, 1);
  });

  afterEach(() => {
    context.close();
  });

  describe('submitVote', () => {
    it('records one ballot and returns a receipt', async () => {
      const receipt = await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Bob')],
      });

      expect(receipt.eventId).toBe(event.id);
      expect(receipt.verificationCode).toMatch(/^[0-9A-F]{16}$/);
      expect(receipt.voteSecret).toMatch(/^[0-9a-f]{64}$/);
      expect(receipt.submittedAt).toEqual(context.clock.now());

      const rows = storedBallots();
      expect(rows).toHaveLength(1);
      expect(rows[0].voterId).toBe('voter-1');
      expect(rows[0].selectedCandidateIds).toEqual([candidateId('Bob')]);
      expect(rows[0].verificationCode).toBe(receipt.verificationCode);
      expect(rows[0].voteSecretHash).toBe(hashSecret(receipt.voteSecret));
      expect(JSON.parse(rows[0].ciphertext)).toEqual({ vector: [0, 1, 0], nonce: 1 });
    });

    it('rejects an unknown voter secret first', async () => {
      await expect(
        context.services.votes.submitVote({
          voterSecret: 'not-a-secret',
          eventId: '00000000-0000-4000-8000-000000000000',
          selectedCandidateIds: [],
        })
      ).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('rejects an unknown event', async () => {
      await expect(
        context.services.votes.submitVote({
          voterSecret: secret,
          eventId: '00000000-0000-4000-8000-000000000000',
          selectedCandidateIds: [candidateId('Bob')],
        })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects votes before the window opens', async () => {
      context.clock.advance(-2 * HOUR);

      await expect(
        context.services.votes.submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: [candidateId('Bob')] })
      ).rejects.toMatchObject({ code: 'VOTING_NOT_OPEN' });
    });

    it('rejects votes at the closing instant', async () => {
      context.clock.set(event.closesAt);

      const error = await context.services.votes
        .submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: [candidateId('Bob')] })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StateError);
      expect(error).toMatchObject({ code: 'VOTING_WINDOW_CLOSED' });
      expect(storedBallots()).toHaveLength(0);
    });

    it('rejects votes after the event is closed', async () => {
      context.services.events.closeVoting(event.id);

      await expect(
        context.services.votes.submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: [candidateId('Bob')] })
      ).rejects.toMatchObject({ code: 'VOTING_ENDED' });
    });

    it('rejects a wrong selection count even with unknown ids', async () => {
      const error = await context.services.votes
        .submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: ['nope-1', 'nope-2'] })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ details: { expected: 1, actual: 2 } });
      expect(context.engine.calls.encryptBallot).toBe(0);
    });

    it('rejects an unknown candidate', async () => {
      await expect(
        context.services.votes.submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: ['nope'] })
      ).rejects.toMatchObject({ details: { unknownCandidateId: 'nope' } });
    });

    it('keeps the first ballot when the voter retries with another selection', async () => {
      await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Alice')],
      });

      const error = await context.services.votes
        .submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: [candidateId('Carol')] })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(IdempotencyViolation);
      expect(error).toMatchObject({ code: 'ALREADY_VOTED', statusCode: 409 });
      const rows = storedBallots();
      expect(rows).toHaveLength(1);
      expect(rows[0].selectedCandidateIds).toEqual([candidateId('Alice')]);
    });

    it('checks idempotency before the selection', async () => {
      await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Alice')],
      });

      await expect(
        context.services.votes.submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: [] })
      ).rejects.toMatchObject({ code: 'ALREADY_VOTED' });
    });

    it('accepts exactly one of many concurrent submissions by the same voter', async () => {
      context.engine.encryptDelayMs = 5;

      const outcomes = await Promise.allSettled(
        ['Alice', 'Bob', 'Carol', 'Alice', 'Bob', 'Carol', 'Alice', 'Bob'].map((name) =>
          context.services.votes.submitVote({
            voterSecret: secret,
            eventId: event.id,
            selectedCandidateIds: [candidateId(name)],
          })
        )
      );

      const fulfilled = outcomes.filter((outcome) => outcome.status === 'fulfilled');
      const rejected = outcomes.flatMap((outcome) => (outcome.status === 'rejected' ? [outcome.reason] : []));

      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(7);
      for (const reason of rejected) {
        expect(reason).toBeInstanceOf(IdempotencyViolation);
        expect(reason).toBeInstanceOf(ConcurrencyConflict);
        expect(reason).toMatchObject({ code: 'CONCURRENT_SUBMISSION' });
      }
      expect(storedBallots()).toHaveLength(1);
    });

    it('lets different voters vote concurrently', async () => {
      const secrets = registerVoters(context, 5, 'crowd');

      const receipts = await Promise.all(
        secrets.map((voterSecret) =>
          context.services.votes.submitVote({ voterSecret, eventId: event.id, selectedCandidateIds: [candidateId('Bob')] })
        )
      );

      expect(new Set(receipts.map((receipt) => receipt.verificationCode)).size).toBe(5);
      expect(storedBallots()).toHaveLength(5);
      expect(storedBallots().map((ballot) => ballot.sequence).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
    });

    it('persists nothing when encryption times out and never retries it', async () => {
      context.engine.queue('encryptBallot', 'hang');

      const error = await context.services.votes
        .submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: [candidateId('Bob')] })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(CryptoEngineError);
      expect(error).toMatchObject({ code: 'CRYPTO_ENGINE_TIMEOUT', operation: 'encryptBallot' });
      expect(context.engine.calls.encryptBallot).toBe(1);
      expect(storedBallots()).toHaveLength(0);
    });

    it('persists nothing when encryption fails', async () => {
      context.engine.queue('encryptBallot', 'fail');

      await expect(
        context.services.votes.submitVote({ voterSecret: secret, eventId: event.id, selectedCandidateIds: [candidateId('Bob')] })
      ).rejects.toMatchObject({ code: 'CRYPTO_ENGINE_FAILURE' });
      expect(storedBallots()).toHaveLength(0);

      const retry = await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Bob')],
      });
      expect(retry.eventId).toBe(event.id);
    });

    it('derives a new code when the first one collides', async () => {
      const [otherSecret] = registerVoters(context, 1, 'other');
      context.engine.codeOverride = (_ciphertext, attempt) => `CODE-${attempt}`;

      const first = await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Bob')],
      });
      const second = await context.services.votes.submitVote({
        voterSecret: otherSecret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Alice')],
      });

      expect(first.verificationCode).toBe('CODE-0');
      expect(second.verificationCode).toBe('CODE-1');
    });

    it('rejects a ballot whose encryption finishes after the event closed', async () => {
      context.engine.encryptDelayMs = 20;

      const pending = context.services.votes.submitVote({
        voterSecret: secret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Bob')],
      });
      context.services.events.closeVoting(event.id);

      await expect(pending).rejects.toMatchObject({ code: 'VOTING_ENDED' });
      expect(storedBallots()).toHaveLength(0);
    });
  });

  describe('listEventBallots', () => {
    it('lists codes and times without voter data', async () => {
      const receipt = await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Carol')],
      });

      expect(context.services.votes.listEventBallots(event.id)).toEqual([
        { verificationCode: receipt.verificationCode, submittedAt: receipt.submittedAt },
      ]);
    });

    it('throws NotFoundError for an unknown event', () => {
      expect(() => context.services.votes.listEventBallots('00000000-0000-4000-8000-000000000000')).toThrow(
        NotFoundError
      );
    });
  });

  describe('listEventParticipants', () => {
    it('reports who has voted without codes or selections', async () => {
      registerVoters(context, 2, 'crowd');
      const receipt = await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: event.id,
        selectedCandidateIds: [candidateId('Alice')],
      });

      const result = context.services.votes.listEventParticipants(event.id);

      expect(result.data).toEqual([
        { voterId: 'crowd-1', hasVoted: false, submittedAt: null },
        { voterId: 'crowd-2', hasVoted: false, submittedAt: null },
        { voterId: 'voter-1', hasVoted: true, submittedAt: receipt.submittedAt },
      ]);
      expect(result.pagination.totalItems).toBe(3);
    });

    it('only counts ballots of the requested event', async () => {
      const other = await createOpenEvent(context, { name: 'Other election' });
      await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: other.id,
        selectedCandidateIds: [other.candidates[0].id],
      });

      expect(context.services.votes.listEventParticipants(event.id).data).toEqual([
        { voterId: 'voter-1', hasVoted: false, submittedAt: null },
      ]);
    });

    it('pages through the voters', () => {
      registerVoters(context, 2, 'crowd');

      const page = context.services.votes.listEventParticipants(event.id, { page: 2, limit: 2 });

      expect(page.data.map((participant) => participant.voterId)).toEqual(['voter-1']);
      expect(page.pagination).toMatchObject({ totalItems: 3, hasNext: false, hasPrevious: true });
    });

    it('throws NotFoundError for an unknown event', () => {
      expect(() => context.services.votes.listEventParticipants('00000000-0000-4000-8000-000000000000')).toThrow(
        NotFoundError
      );
    });
  });
});
