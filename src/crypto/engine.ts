/**
 * Capability interface of the cryptographic engine. Every blob crossing this
 * boundary is an opaque string owned by the engine; callers store and hand
 * them back without looking inside.
 */

export type ManifestHandle = string;

export interface KeyCeremonyResult {
  publicKey: string;
  context: string;
}

export interface EncryptedBallot {
  ciphertext: string;
  proof: string;
}

/** One 0/1 flag per candidate, in ballot order. */
export type SelectionVector = ReadonlyArray<0 | 1>;

export interface CryptoEngine {
  buildManifest(eventName: string, candidateNames: string[], selectionLimit: number): Promise<ManifestHandle>;

  performKeyCeremony(manifest: ManifestHandle): Promise<KeyCeremonyResult>;

  encryptBallot(
    vector: SelectionVector,
    manifest: ManifestHandle,
    context: string,
    publicKey: string
  ): Promise<EncryptedBallot>;

  /**
   * Public code identifying a ballot. Deterministic in (ciphertext, attempt);
   * a caller bumps `attempt` to get a different code after a collision.
   */
  deriveVerificationCode(ciphertext: string, attempt?: number): Promise<string>;

  /** Per-candidate totals in ballot order. */
  aggregateAndDecrypt(ciphertexts: string[], context: string): Promise<number[]>;

  verifyBallot(ciphertext: string, proof: string, context: string): Promise<boolean>;
}
