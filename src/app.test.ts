import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import type { Application } from 'express';
import { eq } from 'drizzle-orm';
import { createApp } from './app';
import { ElGamalCryptoEngine } from './crypto/elgamal-engine';
import { ballots } from './db/schema';
import {
  HOUR,
  TestContext,
  createOpenEvent,
  createTestContext,
  createTestContextWith,
  registerVoters,
} from './__tests__/helpers/context';

const listen = async (app: Application): Promise<{ server: Server; baseUrl: string }> => {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
};

const shutdown = (server: Server): Promise<void> =>
  new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));

describe('HTTP API', () => {
  let context: TestContext;
  let server: Server;
  let baseUrl: string;

  const request = async (method: string, path: string, body?: unknown) => {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: response.status, body: JSON.parse(await response.text()) };
  };

  const window = () => {
    const now = context.clock.now().getTime();
    return { opensAt: new Date(now - HOUR).toISOString(), closesAt: new Date(now + HOUR).toISOString() };
  };

  beforeEach(async () => {
    context = createTestContext();
    const app = createApp({ services: context.services, db: context.handle.db, enableRateLimit: false });
    ({ server, baseUrl } = await listen(app));
  });

  afterEach(async () => {
    await shutdown(server);
    context.close();
  });

  it('runs an event from creation to tally', async () => {
    const voter = await request('POST', '/api/voters', { voterId: 'http-voter' });
    expect(voter.status).toBe(201);
    expect(voter.body.data.voterId).toBe('http-voter');
    const voterSecret: string = voter.body.data.voterSecret;

    const created = await request('POST', '/api/events', {
      name: 'Board election',
      ...window(),
      selectionLimit: 1,
      candidateNames: ['Alice', 'Bob', 'Carol'],
    });
    expect(created.status).toBe(201);
    expect(created.body.success).toBe(true);
    expect(created.body.data.status).toBe('INVOTING');
    const eventId: string = created.body.data.id;
    const bobId: string = created.body.data.candidates[1].id;

    const vote = await request('POST', '/api/votes', { voterSecret, eventId, selectedCandidateIds: [bobId] });
    expect(vote.status).toBe(201);
    expect(vote.body.data.eventId).toBe(eventId);
    expect(vote.body.data.submittedAt).toBe('2030-05-01T12:00:00.000Z');
    const { verificationCode, voteSecret } = vote.body.data;

    const again = await request('POST', '/api/votes', { voterSecret, eventId, selectedCandidateIds: [bobId] });
    expect(again.status).toBe(409);
    expect(again.body.error).toMatchObject({ kind: 'IdempotencyViolation', code: 'ALREADY_VOTED' });

    const levelOne = await request('POST', '/api/votes/decode', { level: 1, verificationCode });
    expect(levelOne.status).toBe(200);
    expect(levelOne.body.data.selectedCandidates).toEqual([{ id: bobId, name: 'Bob' }]);
    expect(levelOne.body.data.proofVerified).toBe(true);
    expect(levelOne.body.data).not.toHaveProperty('voterId');

    const levelTwo = await request('POST', '/api/votes/decode', { level: 2, verificationCode, voteSecret });
    expect(levelTwo.status).toBe(200);
    expect(levelTwo.body.data.voterId).toBe('http-voter');

    const board = await request('GET', `/api/events/${eventId}/ballots`);
    expect(board.body.data).toEqual([{ verificationCode, submittedAt: '2030-05-01T12:00:00.000Z' }]);

    const tally = await request('POST', `/api/events/${eventId}/tally`);
    expect(tally.status).toBe(200);
    expect(tally.body.data.totalBallots).toBe(1);
    expect(tally.body.data.outcome).toEqual({ kind: 'WINNER', candidateId: bobId });

    const closed = await request('POST', `/api/events/${eventId}/close`);
    expect(closed.status).toBe(200);
    expect(closed.body.data.status).toBe('ENDED');

    const late = await request('POST', '/api/votes', { voterSecret, eventId, selectedCandidateIds: [bobId] });
    expect(late.status).toBe(409);
    expect(late.body.error).toMatchObject({ kind: 'StateError', code: 'VOTING_ENDED' });
  });

  it('rejects a wrong voter secret with 401', async () => {
    const response = await request('POST', '/api/votes', {
      voterSecret: 'test-secret',
      eventId: '00000000-0000-4000-8000-000000000000',
      selectedCandidateIds: [],
    });

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      success: false,
      error: { kind: 'AuthenticationError', code: 'AUTHENTICATION_FAILED', message: 'Invalid voter secret' },
    });
  });

  it('checks the voter secret before the event id', async () => {
    const [voterSecret] = registerVoters(context, 1);

    const unknownSecret = await request('POST', '/api/votes', {
      voterSecret: 'test-secret',
      eventId: 'not-a-uuid',
      selectedCandidateIds: [],
    });
    const unknownEvent = await request('POST', '/api/votes', {
      voterSecret,
      eventId: 'not-a-uuid',
      selectedCandidateIds: [],
    });

    expect(unknownSecret.status).toBe(401);
    expect(unknownEvent.status).toBe(404);
    expect(unknownEvent.body.error.message).toBe('Event not-a-uuid not found');
  });

  it('rejects a request body of the wrong shape', async () => {
    const response = await request('POST', '/api/votes', {
      voterSecret: 'test-secret',
      eventId: 'not-a-uuid',
      selectedCandidateIds: 'Alice',
    });

    expect(response.status).toBe(400);
    expect(response.body.error.details).toEqual([
      { field: 'selectedCandidateIds', message: 'selectedCandidateIds must be an array' },
    ]);
  });

  it('lists participants without codes or selections', async () => {
    const event = await createOpenEvent(context);
    const [first] = registerVoters(context, 2);
    await context.services.votes.submitVote({
      voterSecret: first,
      eventId: event.id,
      selectedCandidateIds: [event.candidates[0].id],
    });

    const response = await request('GET', `/api/events/${event.id}/voters?page=1&limit=10`);

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual([
      { voterId: 'voter-1', hasVoted: true, submittedAt: '2030-05-01T12:00:00.000Z' },
      { voterId: 'voter-2', hasVoted: false, submittedAt: null },
    ]);
    expect(response.body.pagination.totalItems).toBe(2);
  });

  it('reports malformed JSON as a validation error', async () => {
    const response = await fetch(`${baseUrl}/api/voters`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"voterId":',
    });

    expect(response.status).toBe(400);
    expect(JSON.parse(await response.text())).toEqual({
      success: false,
      error: { kind: 'ValidationError', code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
    });
  });

  it('lists every failed field of an invalid request', async () => {
    const response = await request('POST', '/api/events', {
      name: 'Board election',
      ...window(),
      selectionLimit: 1,
      candidateNames: ['Alice'],
    });

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({
      kind: 'ValidationError',
      code: 'VALIDATION_ERROR',
      message: 'At least 2 candidate names are required',
      details: [{ field: 'candidateNames', message: 'At least 2 candidate names are required' }],
    });
  });

  it('rejects a malformed event id', async () => {
    const response = await request('GET', '/api/events/not-a-uuid');

    expect(response.status).toBe(400);
    expect(response.body.error.details).toEqual([{ field: 'eventId', message: 'Invalid event ID format' }]);
  });

  it('returns 404 for an unknown event', async () => {
    const response = await request('GET', '/api/events/00000000-0000-4000-8000-000000000000');

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({
      kind: 'NotFoundError',
      code: 'NOT_FOUND',
      message: 'Event 00000000-0000-4000-8000-000000000000 not found',
    });
  });

  it('returns 404 for an unknown route', async () => {
    const response = await request('GET', '/api/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.error.message).toBe('Route not found - /api/nowhere');
  });

  it('reports health', async () => {
    const response = await request('GET', '/health');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: 'OK', services: { database: 'connected' } });
  });
});

describe('HTTP API with the ElGamal engine', () => {
  let context: TestContext<ElGamalCryptoEngine>;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    context = createTestContextWith(new ElGamalCryptoEngine(), { timeoutMs: 20000 });
    const app = createApp({ services: context.services, db: context.handle.db, enableRateLimit: false });
    ({ server, baseUrl } = await listen(app));
  });

  afterEach(async () => {
    await shutdown(server);
    context.close();
  });

  it('keeps stored ciphertext out of a failed tally response', async () => {
    const event = await createOpenEvent(context);
    const [voterSecret] = registerVoters(context, 1);
    const receipt = await context.services.votes.submitVote({
      voterSecret,
      eventId: event.id,
      selectedCandidateIds: [event.candidates[1].id],
    });

    const stored = context.handle.db
      .select({ ciphertext: ballots.ciphertext })
      .from(ballots)
      .where(eq(ballots.verificationCode, receipt.verificationCode))
      .get();
    if (!stored) {
      throw new Error('Ballot was not stored');
    }
    const ciphertext = JSON.parse(stored.ciphertext);
    const point: string = ciphertext.selections[0].a;
    ciphertext.selections[0].a = point.toUpperCase();
    context.handle.db
      .update(ballots)
      .set({ ciphertext: JSON.stringify(ciphertext) })
      .where(eq(ballots.verificationCode, receipt.verificationCode))
      .run();

    const response = await fetch(`${baseUrl}/api/events/${event.id}/tally`, { method: 'POST' });
    const text = await response.text();

    expect(response.status).toBe(502);
    expect(JSON.parse(text)).toEqual({
      success: false,
      error: {
        kind: 'CryptoEngineError',
        code: 'CRYPTO_ENGINE_FAILURE',
        message: 'Crypto engine failed during aggregateAndDecrypt',
      },
    });
    expect(text.toLowerCase()).not.toContain(point.slice(2, 18));
  });
});
