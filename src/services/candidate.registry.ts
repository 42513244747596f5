import type { SelectionVector } from '../crypto/engine';
import type { CandidateInfo } from '../types/event.types';
import { ValidationError } from '../utils/errors';

/**
 * Candidate list and selection rule of one event, in ballot order.
 */
export class CandidateRegistry {
  private readonly candidates: CandidateInfo[];
  private readonly byId: Map<string, CandidateInfo>;

  constructor(
    candidates: CandidateInfo[],
    public readonly selectionLimit: number
  ) {
    this.candidates = [...candidates].sort((a, b) => a.position - b.position);
    this.byId = new Map(this.candidates.map((candidate) => [candidate.id, candidate]));
  }

  get size(): number {
    return this.candidates.length;
  }

  list(): CandidateInfo[] {
    return [...this.candidates];
  }

  has(candidateId: string): boolean {
    return this.byId.has(candidateId);
  }

  /**
   * Count is checked before ids, so a wrong-sized selection is rejected
   * whether or not its ids exist.
   */
  validateSelection(selectedIds: readonly string[]): void {
    if (selectedIds.length !== this.selectionLimit) {
      throw new ValidationError(
        `Expected exactly ${this.selectionLimit} selection(s), got ${selectedIds.length}`,
        { expected: this.selectionLimit, actual: selectedIds.length }
      );
    }

    const seen = new Set<string>();
    for (const id of selectedIds) {
      if (seen.has(id)) {
        throw new ValidationError(`Candidate ${id} is selected more than once`, { duplicateCandidateId: id });
      }
      seen.add(id);
    }

    for (const id of selectedIds) {
      if (!this.byId.has(id)) {
        throw new ValidationError(`Candidate ${id} is not on this ballot`, { unknownCandidateId: id });
      }
    }
  }

  buildVector(selectedIds: readonly string[]): SelectionVector {
    this.validateSelection(selectedIds);
    const selected = new Set(selectedIds);
    return this.candidates.map((candidate): 0 | 1 => (selected.has(candidate.id) ? 1 : 0));
  }

  /**
   * Map stored ids back to names, keeping the submitted order. Ids no longer
   * on the ballot keep an empty name.
   */
  describe(selectedIds: readonly string[]): Array<Pick<CandidateInfo, 'id' | 'name'>> {
    return selectedIds.map((id) => ({ id, name: this.byId.get(id)?.name ?? '' }));
  }
}
