const UNIQUE_PREFIX = 'UNIQUE constraint failed: ';

const MAX_CAUSE_DEPTH = 5;

// Primary keys report their own code but the same message
const UNIQUE_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

/**
 * Columns named by a SQLite unique-constraint failure, e.g.
 * ["ballots.event_id", "ballots.voter_id"], or null if the error is something
 * else. Follows `cause` in case the driver error was wrapped.
 */
export function uniqueViolationColumns(error: unknown): string[] | null {
  let current: unknown = error;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string' && UNIQUE_CODES.has(current.code)) {
      const index = current.message.indexOf(UNIQUE_PREFIX);
      if (index === -1) {
        return [];
      }
      return current.message
        .slice(index + UNIQUE_PREFIX.length)
        .split(',')
        .map((column) => column.trim());
    }
    current = current.cause;
  }

  return null;
}

export function violatesUnique(error: unknown, column: string): boolean {
  return uniqueViolationColumns(error)?.includes(column) ?? false;
}
