import { describe, it, expect } from 'vitest';
import { CandidateRegistry } from './candidate.registry';
import { ValidationError } from '../utils/errors';

const candidates = [
  { id: 'c-bob', name: 'Bob', position: 1 },
  { id: 'c-alice', name: 'Alice', position: 0 },
  { id: 'c-carol', name: 'Carol', position: 2 },
];

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
};

describe('CandidateRegistry', () => {
  it('keeps candidates in ballot order', () => {
    const registry = new CandidateRegistry(candidates, 1);
    expect(registry.list().map((candidate) => candidate.id)).toEqual(['c-alice', 'c-bob', 'c-carol']);
    expect(registry.size).toBe(3);
  });

  it('builds a 0/1 vector in ballot order', () => {
    const registry = new CandidateRegistry(candidates, 2);
    expect(registry.buildVector(['c-carol', 'c-alice'])).toEqual([1, 0, 1]);
  });

  it('rejects a wrong selection count before looking at ids', () => {
    const registry = new CandidateRegistry(candidates, 1);
    const error = captureError(() => registry.buildVector(['unknown-1', 'unknown-2']));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'Expected exactly 1 selection(s), got 2',
      details: { expected: 1, actual: 2 },
    });
  });

  it('rejects an empty selection', () => {
    const registry = new CandidateRegistry(candidates, 1);
    expect(captureError(() => registry.validateSelection([]))).toMatchObject({ details: { expected: 1, actual: 0 } });
  });

  it('names a duplicated candidate', () => {
    const registry = new CandidateRegistry(candidates, 2);
    expect(captureError(() => registry.validateSelection(['c-bob', 'c-bob']))).toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { duplicateCandidateId: 'c-bob' },
    });
  });

  it('names an unknown candidate', () => {
    const registry = new CandidateRegistry(candidates, 1);
    expect(captureError(() => registry.validateSelection(['c-dave']))).toMatchObject({
      message: 'Candidate c-dave is not on this ballot',
      details: { unknownCandidateId: 'c-dave' },
    });
  });

  it('describes selections in submitted order', () => {
    const registry = new CandidateRegistry(candidates, 2);
    expect(registry.describe(['c-carol', 'c-alice'])).toEqual([
      { id: 'c-carol', name: 'Carol' },
      { id: 'c-alice', name: 'Alice' },
    ]);
  });
});
