import type { CryptoEngine, EncryptedBallot, KeyCeremonyResult, ManifestHandle, SelectionVector } from '../crypto/engine';
import { CryptoEngineError, type CryptoOperation } from '../utils/errors';
import { retryWithBackoff, withTimeout } from '../utils/helpers';
import { logError, logger, logPerformance } from '../utils/logger';

export interface CryptoServiceOptions {
  timeoutMs: number;
  retryBackoffMs: number;
}

/**
 * Every engine call goes through here: bounded by a timeout, with engine
 * failures surfaced as CryptoEngineError. Only calls without side effects on
 * our state (key ceremony, tally decryption) are retried.
 */
export class CryptoService {
  constructor(
    private readonly engine: CryptoEngine,
    private readonly options: CryptoServiceOptions
  ) {}

  async buildManifest(eventName: string, candidateNames: string[], selectionLimit: number): Promise<ManifestHandle> {
    return this.call('buildManifest', () => this.engine.buildManifest(eventName, candidateNames, selectionLimit));
  }

  async performKeyCeremony(manifest: ManifestHandle): Promise<KeyCeremonyResult> {
    return this.callWithRetry('performKeyCeremony', () => this.engine.performKeyCeremony(manifest));
  }

  async encryptBallot(
    vector: SelectionVector,
    manifest: ManifestHandle,
    context: string,
    publicKey: string
  ): Promise<EncryptedBallot> {
    return this.call('encryptBallot', () => this.engine.encryptBallot(vector, manifest, context, publicKey));
  }

  async deriveVerificationCode(ciphertext: string, attempt: number = 0): Promise<string> {
    return this.call('deriveVerificationCode', () => this.engine.deriveVerificationCode(ciphertext, attempt));
  }

  async aggregateAndDecrypt(ciphertexts: string[], context: string): Promise<number[]> {
    return this.callWithRetry('aggregateAndDecrypt', () => this.engine.aggregateAndDecrypt(ciphertexts, context), {
      ballots: ciphertexts.length,
    });
  }

  async verifyBallot(ciphertext: string, proof: string, context: string): Promise<boolean> {
    return this.call('verifyBallot', () => this.engine.verifyBallot(ciphertext, proof, context));
  }

  private async call<T>(
    operation: CryptoOperation,
    fn: () => Promise<T>,
    details?: Record<string, unknown>
  ): Promise<T> {
    const startedAt = Date.now();

    try {
      const result = await withTimeout(
        fn(),
        this.options.timeoutMs,
        () =>
          new CryptoEngineError(operation, `Crypto engine timed out after ${this.options.timeoutMs}ms`, {
            timedOut: true,
          })
      );
      logPerformance(`crypto.${operation}`, Date.now() - startedAt, details);
      return result;
    } catch (error) {
      if (error instanceof CryptoEngineError) {
        throw error;
      }
      // The engine's reason may quote blob contents, so it stays in the logs
      logError(error instanceof Error ? error : new Error(String(error)), { operation: `crypto.${operation}` });
      throw new CryptoEngineError(operation, `Crypto engine failed during ${operation}`, { cause: error });
    }
  }

  private async callWithRetry<T>(
    operation: CryptoOperation,
    fn: () => Promise<T>,
    details?: Record<string, unknown>
  ): Promise<T> {
    return retryWithBackoff(
      () => this.call(operation, fn, details),
      2,
      this.options.retryBackoffMs,
      (error, attempt) => {
        logger.warn(`Retrying crypto.${operation} after attempt ${attempt} failed`, {
          code: error instanceof CryptoEngineError ? error.code : undefined,
        });
      }
    );
  }
}
