import { sqliteTable, text, integer, uniqueIndex, index } from 'drizzle-orm/sqlite-core';

export const EVENT_STATUSES = ['INVOTING', 'ENDED'] as const;

export type EventStatusValue = (typeof EVENT_STATUSES)[number];

export interface StoredCandidateTally {
  candidateId: string;
  name: string;
  position: number;
  votes: number;
  percentage: number;
}

export type StoredTallyOutcome =
  | { kind: 'WINNER'; candidateId: string }
  | { kind: 'TIE'; candidateIds: string[] }
  | { kind: 'NO_VOTES' };

export const voteEvents = sqliteTable('vote_events', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  opensAt: integer('opens_at', { mode: 'timestamp_ms' }).notNull(),
  closesAt: integer('closes_at', { mode: 'timestamp_ms' }).notNull(),
  selectionLimit: integer('selection_limit').notNull(),
  status: text('status', { enum: EVENT_STATUSES }).notNull(),
  manifest: text('manifest').notNull(),
  publicKey: text('public_key').notNull(),
  cryptoContext: text('crypto_context').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  endedAt: integer('ended_at', { mode: 'timestamp_ms' }),
});

export const candidates = sqliteTable(
  'candidates',
  {
    id: text('id').primaryKey(),
    eventId: text('event_id')
      .notNull()
      .references(() => voteEvents.id),
    name: text('name').notNull(),
    position: integer('position').notNull(),
  },
  (table) => ({
    eventNameIdx: uniqueIndex('ux_candidates_event_name').on(table.eventId, table.name),
    eventPositionIdx: uniqueIndex('ux_candidates_event_position').on(table.eventId, table.position),
  })
);

export const voters = sqliteTable('voters', {
  id: text('id').primaryKey(),
  secretHash: text('secret_hash').notNull().unique(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

export const ballots = sqliteTable(
  'ballots',
  {
    id: text('id').primaryKey(),
    eventId: text('event_id')
      .notNull()
      .references(() => voteEvents.id),
    voterId: text('voter_id')
      .notNull()
      .references(() => voters.id),
    ciphertext: text('ciphertext').notNull(),
    proof: text('proof').notNull(),
    verificationCode: text('verification_code').notNull(),
    voteSecretHash: text('vote_secret_hash').notNull(),
    selectedCandidateIds: text('selected_candidate_ids', { mode: 'json' }).$type<string[]>().notNull(),
    submittedAt: integer('submitted_at', { mode: 'timestamp_ms' }).notNull(),
    // 1, 2, 3... per event in commit order
    sequence: integer('sequence').notNull(),
  },
  (table) => ({
    eventSequenceIdx: uniqueIndex('ux_ballots_event_sequence').on(table.eventId, table.sequence),
    eventVoterIdx: uniqueIndex('ux_ballots_event_voter').on(table.eventId, table.voterId),
    verificationCodeIdx: uniqueIndex('ux_ballots_verification_code').on(table.verificationCode),
    voteSecretIdx: uniqueIndex('ux_ballots_vote_secret_hash').on(table.voteSecretHash),
    eventIdx: index('ix_ballots_event').on(table.eventId),
  })
);

export const tallySnapshots = sqliteTable('tally_snapshots', {
  eventId: text('event_id')
    .primaryKey()
    .references(() => voteEvents.id),
  totalBallots: integer('total_ballots').notNull(),
  results: text('results', { mode: 'json' }).$type<StoredCandidateTally[]>().notNull(),
  outcome: text('outcome', { mode: 'json' }).$type<StoredTallyOutcome>().notNull(),
  computedAt: integer('computed_at', { mode: 'timestamp_ms' }).notNull(),
});

export type VoteEventRow = typeof voteEvents.$inferSelect;
export type TallySnapshotRow = typeof tallySnapshots.$inferSelect;
