import { and, asc, count, desc, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { AppDatabase } from '../config/database';
import { ballots, candidates, tallySnapshots, voteEvents, VoteEventRow } from '../db/schema';
import {
  CANDIDATE_NAME_MAX_LENGTH,
  CandidateInfo,
  CreateEventRequest,
  EVENT_NAME_MAX_LENGTH,
  EventDetails,
  EventSummary,
  MIN_CANDIDATES,
  VotingEvent,
} from '../types/event.types';
import { NotFoundError, StateError, ValidationError } from '../utils/errors';
import { PaginatedResult, PaginationOptions, normalizePagination, paginate } from '../utils/helpers';
import { logAudit, logger } from '../utils/logger';
import { CandidateRegistry } from './candidate.registry';
import type { CryptoService } from './crypto.service';
import { transition } from './lifecycle';
import { toTallySnapshot } from './result.service';

type FieldIssue = {
  field: string;
  message: string;
};

const isValidDate = (value: unknown): value is Date => value instanceof Date && !Number.isNaN(value.getTime());

const toSummary = (row: VoteEventRow): EventSummary => ({
  id: row.id,
  name: row.name,
  opensAt: row.opensAt,
  closesAt: row.closesAt,
  selectionLimit: row.selectionLimit,
  status: row.status,
  createdAt: row.createdAt,
  endedAt: row.endedAt,
});

export class EventService {
  constructor(
    private readonly db: AppDatabase,
    private readonly crypto: CryptoService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Create an event with its candidates and crypto materials. The engine runs
   * before anything is written, so an engine failure leaves no event behind.
   */
  async createEvent(request: CreateEventRequest): Promise<EventDetails> {
    const definition = this.validateDefinition(request);

    const manifest = await this.crypto.buildManifest(
      definition.name,
      definition.candidateNames,
      definition.selectionLimit
    );
    const { publicKey, context } = await this.crypto.performKeyCeremony(manifest);

    const eventId = uuidv4();
    const createdAt = this.now();
    const candidateRows = definition.candidateNames.map((name, position) => ({
      id: uuidv4(),
      eventId,
      name,
      position,
    }));

    this.db.transaction((tx) => {
      tx.insert(voteEvents)
        .values({
          id: eventId,
          name: definition.name,
          opensAt: definition.opensAt,
          closesAt: definition.closesAt,
          selectionLimit: definition.selectionLimit,
          status: 'INVOTING',
          manifest,
          publicKey,
          cryptoContext: context,
          createdAt,
          endedAt: null,
        })
        .run();
      tx.insert(candidates).values(candidateRows).run();
    });

    logAudit('EVENT_CREATED', 'system', {
      eventId,
      candidates: candidateRows.length,
      selectionLimit: definition.selectionLimit,
    });

    return {
      id: eventId,
      name: definition.name,
      opensAt: definition.opensAt,
      closesAt: definition.closesAt,
      selectionLimit: definition.selectionLimit,
      status: 'INVOTING',
      createdAt,
      endedAt: null,
      publicKey,
      candidates: candidateRows.map(({ id, name, position }) => ({ id, name, position })),
      ballotCount: 0,
      tally: null,
    };
  }

  getEvent(eventId: string): EventDetails {
    const event = this.loadEvent(eventId);

    const ballotCount =
      this.db.select({ value: count() }).from(ballots).where(eq(ballots.eventId, eventId)).get()?.value ?? 0;
    const snapshot = this.db.select().from(tallySnapshots).where(eq(tallySnapshots.eventId, eventId)).get();

    return {
      ...toSummary(event),
      publicKey: event.publicKey,
      candidates: this.loadCandidates(eventId),
      ballotCount,
      tally: snapshot ? toTallySnapshot(snapshot) : null,
    };
  }

  listEvents(options: PaginationOptions): PaginatedResult<EventSummary> {
    const { limit, offset } = normalizePagination(options);

    const rows = this.db
      .select()
      .from(voteEvents)
      .orderBy(desc(voteEvents.createdAt), asc(voteEvents.id))
      .limit(limit)
      .offset(offset)
      .all();
    const total = this.db.select({ value: count() }).from(voteEvents).get()?.value ?? 0;

    return paginate(rows.map(toSummary), total, options);
  }

  /**
   * INVOTING -> ENDED. The status guard on the UPDATE makes concurrent
   * closers race on the row: exactly one sees a changed row.
   */
  closeVoting(eventId: string): EventSummary {
    const event = this.loadEvent(eventId);
    const next = transition(event.status, { type: 'CLOSE', at: this.now() });

    if (!next.ok) {
      throw new StateError('Voting has already ended for this event', next.code);
    }

    const result = this.db
      .update(voteEvents)
      .set({ status: next.status, endedAt: next.endedAt })
      .where(and(eq(voteEvents.id, eventId), eq(voteEvents.status, 'INVOTING')))
      .run();

    if (result.changes === 0) {
      throw new StateError('Voting has already ended for this event', 'EVENT_ALREADY_ENDED');
    }

    logAudit('EVENT_CLOSED', 'system', { eventId });

    return { ...toSummary(event), status: next.status, endedAt: next.endedAt };
  }

  /**
   * Full event row including crypto materials. Internal use only.
   */
  loadEvent(eventId: string): VotingEvent {
    const row = this.db.select().from(voteEvents).where(eq(voteEvents.id, eventId)).get();
    if (!row) {
      throw new NotFoundError(`Event ${eventId} not found`);
    }
    return row;
  }

  loadCandidates(eventId: string): CandidateInfo[] {
    return this.db
      .select({ id: candidates.id, name: candidates.name, position: candidates.position })
      .from(candidates)
      .where(eq(candidates.eventId, eventId))
      .orderBy(asc(candidates.position))
      .all();
  }

  loadRegistry(event: Pick<VotingEvent, 'id' | 'selectionLimit'>): CandidateRegistry {
    return new CandidateRegistry(this.loadCandidates(event.id), event.selectionLimit);
  }

  listOpenEventIds(): string[] {
    return this.db
      .select({ id: voteEvents.id })
      .from(voteEvents)
      .where(eq(voteEvents.status, 'INVOTING'))
      .all()
      .map((row) => row.id);
  }

  private validateDefinition(request: CreateEventRequest): CreateEventRequest {
    const issues: FieldIssue[] = [];

    const name = typeof request.name === 'string' ? request.name.trim() : '';
    if (name.length === 0 || name.length > EVENT_NAME_MAX_LENGTH) {
      issues.push({ field: 'name', message: `Name must be between 1 and ${EVENT_NAME_MAX_LENGTH} characters` });
    }

    const windowValid = isValidDate(request.opensAt) && isValidDate(request.closesAt);
    if (!windowValid) {
      issues.push({ field: 'opensAt', message: 'Voting window must be given as valid dates' });
    } else if (request.opensAt.getTime() >= request.closesAt.getTime()) {
      issues.push({ field: 'closesAt', message: 'Voting window must close after it opens' });
    }

    const candidateNames = Array.isArray(request.candidateNames)
      ? request.candidateNames.map((candidate) => (typeof candidate === 'string' ? candidate.trim() : ''))
      : [];
    if (candidateNames.length < MIN_CANDIDATES) {
      issues.push({ field: 'candidateNames', message: `At least ${MIN_CANDIDATES} candidates are required` });
    }
    candidateNames.forEach((candidate, index) => {
      if (candidate.length === 0 || candidate.length > CANDIDATE_NAME_MAX_LENGTH) {
        issues.push({
          field: `candidateNames[${index}]`,
          message: `Candidate name must be between 1 and ${CANDIDATE_NAME_MAX_LENGTH} characters`,
        });
      } else if (candidateNames.indexOf(candidate) !== index) {
        issues.push({ field: `candidateNames[${index}]`, message: `Duplicate candidate name "${candidate}"` });
      }
    });

    const { selectionLimit } = request;
    if (!Number.isInteger(selectionLimit) || selectionLimit < 1 || selectionLimit > candidateNames.length) {
      issues.push({
        field: 'selectionLimit',
        message: `Selection limit must be an integer between 1 and the number of candidates (${candidateNames.length})`,
      });
    }

    if (issues.length > 0) {
      logger.debug('Rejected event definition', { issues });
      throw new ValidationError(issues[0].message, issues);
    }

    return {
      name,
      opensAt: request.opensAt,
      closesAt: request.closesAt,
      selectionLimit,
      candidateNames,
    };
  }
}
