import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../config/database';
import { ballots, tallySnapshots, TallySnapshotRow } from '../db/schema';
import type { CandidateInfo } from '../types/event.types';
import type { CandidateTally, TallyOutcome, TallySnapshot } from '../types/tally.types';
import { CryptoEngineError, NotFoundError } from '../utils/errors';
import { logAudit, logger } from '../utils/logger';
import type { CryptoService } from './crypto.service';
import type { EventService } from './event.service';

export const toTallySnapshot = (row: TallySnapshotRow): TallySnapshot => ({
  eventId: row.eventId,
  totalBallots: row.totalBallots,
  results: row.results,
  outcome: row.outcome,
  computedAt: row.computedAt,
});

const roundPercentage = (value: number): number => Math.round(value * 100) / 100;

/**
 * Strictly highest count wins. A shared highest count is a tie, and a tally
 * where nobody received a vote has no outcome.
 */
export function determineOutcome(results: CandidateTally[]): TallyOutcome {
  const highest = results.reduce((max, result) => Math.max(max, result.votes), 0);
  if (highest === 0) {
    return { kind: 'NO_VOTES' };
  }

  const leaders = results.filter((result) => result.votes === highest).map((result) => result.candidateId);
  if (leaders.length === 1) {
    return { kind: 'WINNER', candidateId: leaders[0] };
  }
  return { kind: 'TIE', candidateIds: leaders };
}

/**
 * Percentages are shares of all selections cast (ballots x selection limit),
 * which makes them sum to 100 for any selection limit.
 */
export function buildSnapshot(
  eventId: string,
  candidates: CandidateInfo[],
  counts: number[],
  totalBallots: number,
  selectionLimit: number,
  computedAt: Date
): TallySnapshot {
  const totalSelections = totalBallots * selectionLimit;

  const results: CandidateTally[] = candidates.map((candidate, index) => {
    const votes = counts[index] ?? 0;
    return {
      candidateId: candidate.id,
      name: candidate.name,
      position: candidate.position,
      votes,
      percentage: totalSelections > 0 ? roundPercentage((votes / totalSelections) * 100) : 0,
    };
  });

  return {
    eventId,
    totalBallots,
    results,
    outcome: determineOutcome(results),
    computedAt,
  };
}

export class ResultService {
  constructor(
    private readonly db: AppDatabase,
    private readonly events: EventService,
    private readonly crypto: CryptoService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Recompute the event's tally from every recorded ballot and replace the
   * stored snapshot. Runs regardless of the event's status.
   */
  async tally(eventId: string): Promise<TallySnapshot> {
    const event = this.events.loadEvent(eventId);
    const candidates = this.events.loadRegistry(event).list();

    // One statement, so the ballot set is a consistent snapshot: sequences
    // 1..n of the event, which makes n the watermark of this read
    const ciphertexts = this.db
      .select({ ciphertext: ballots.ciphertext })
      .from(ballots)
      .where(eq(ballots.eventId, eventId))
      .all()
      .map((row) => row.ciphertext);

    let counts: number[];
    if (ciphertexts.length === 0) {
      counts = candidates.map(() => 0);
    } else {
      counts = await this.crypto.aggregateAndDecrypt(ciphertexts, event.cryptoContext);
      this.assertConsistent(counts, candidates.length, ciphertexts.length * event.selectionLimit);
    }

    const snapshot = buildSnapshot(
      eventId,
      candidates,
      counts,
      ciphertexts.length,
      event.selectionLimit,
      this.now()
    );

    const values = {
      eventId,
      totalBallots: snapshot.totalBallots,
      results: snapshot.results,
      outcome: snapshot.outcome,
      computedAt: snapshot.computedAt,
    };
    // An overlapping tally that read fewer ballots must not replace this one
    const stored = this.db.transaction((tx) => {
      const existing = tx
        .select({ totalBallots: tallySnapshots.totalBallots })
        .from(tallySnapshots)
        .where(eq(tallySnapshots.eventId, eventId))
        .get();
      if (existing && existing.totalBallots > values.totalBallots) {
        return false;
      }

      tx.insert(tallySnapshots)
        .values(values)
        .onConflictDoUpdate({
          target: tallySnapshots.eventId,
          set: {
            totalBallots: values.totalBallots,
            results: values.results,
            outcome: values.outcome,
            computedAt: values.computedAt,
          },
        })
        .run();
      return true;
    });

    if (!stored) {
      logger.info(`Tally for event ${eventId} superseded by a newer snapshot`, {
        totalBallots: snapshot.totalBallots,
      });
      return snapshot;
    }

    logAudit('TALLY_COMPUTED', 'system', {
      eventId,
      totalBallots: snapshot.totalBallots,
      outcome: snapshot.outcome.kind,
    });

    return snapshot;
  }

  getTally(eventId: string): TallySnapshot {
    this.events.loadEvent(eventId);

    const row = this.db.select().from(tallySnapshots).where(eq(tallySnapshots.eventId, eventId)).get();
    if (!row) {
      throw new NotFoundError(`Event ${eventId} has not been tallied yet`);
    }
    return toTallySnapshot(row);
  }

  private assertConsistent(counts: number[], candidateCount: number, expectedTotal: number): void {
    const total = counts.reduce((sum, value) => sum + value, 0);
    const wellFormed = counts.every((value) => Number.isInteger(value) && value >= 0);

    if (counts.length !== candidateCount || !wellFormed || total !== expectedTotal) {
      logger.error('Decrypted tally failed the integrity check', {
        candidates: candidateCount,
        entries: counts.length,
        total,
        expectedTotal,
      });
      throw new CryptoEngineError(
        'aggregateAndDecrypt',
        `Decrypted tally is inconsistent: expected ${candidateCount} counts totalling ${expectedTotal}`
      );
    }
  }
}
