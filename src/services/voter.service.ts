import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../config/database';
import { voters } from '../db/schema';
import { violatesUnique } from '../db/constraints';
import { Voter, VoterRegistration, VOTER_ID_MAX_LENGTH } from '../types/vote.types';
import { AppError, ConflictError, ValidationError } from '../utils/errors';
import { generateSecureToken, hashSecret } from '../utils/helpers';
import { logAudit } from '../utils/logger';

const MAX_SECRET_ATTEMPTS = 3;

export class VoterService {
  constructor(
    private readonly db: AppDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Register a voter and hand back the secret that authenticates them. Only
   * the secret's digest is kept, so this is the one chance to see it.
   */
  registerVoter(voterId: string): VoterRegistration {
    const id = typeof voterId === 'string' ? voterId.trim() : '';
    if (id.length === 0 || id.length > VOTER_ID_MAX_LENGTH) {
      throw new ValidationError(`Voter id must be between 1 and ${VOTER_ID_MAX_LENGTH} characters`, {
        field: 'voterId',
      });
    }

    const existing = this.db.select({ id: voters.id }).from(voters).where(eq(voters.id, id)).get();
    if (existing) {
      throw new ConflictError(`Voter ${id} is already registered`);
    }

    for (let attempt = 1; attempt <= MAX_SECRET_ATTEMPTS; attempt++) {
      const voterSecret = generateSecureToken();

      try {
        this.db
          .insert(voters)
          .values({ id, secretHash: hashSecret(voterSecret), createdAt: this.now() })
          .run();
      } catch (error) {
        if (violatesUnique(error, 'voters.id')) {
          throw new ConflictError(`Voter ${id} is already registered`);
        }
        if (violatesUnique(error, 'voters.secret_hash')) {
          continue;
        }
        throw error;
      }

      logAudit('VOTER_REGISTERED', id, {});
      return { voterId: id, voterSecret };
    }

    throw new AppError('Could not generate a unique voter secret', 500, 'SECRET_GENERATION_FAILED');
  }

  resolveBySecret(secret: string): Voter | null {
    if (typeof secret !== 'string' || secret.length === 0) {
      return null;
    }

    const row = this.db
      .select({ id: voters.id, createdAt: voters.createdAt })
      .from(voters)
      .where(eq(voters.secretHash, hashSecret(secret)))
      .get();

    return row ?? null;
  }
}
