import Joi from 'joi';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { mod } from '@noble/curves/abstract/modular';
import { secp256k1 } from '@noble/curves/secp256k1';
import {
  type Ciphertext,
  type DisjunctiveProof,
  type ProofBranch,
  addCiphertexts,
  decryptSmall,
  emptyCiphertext,
  encrypt,
  generateKeyPair,
  hexToPoint,
  hexToScalar,
  pointToHex,
  proveTotal,
  proveZeroOrOne,
  randomScalar,
  scalarToHex,
  verifyTotal,
  verifyZeroOrOne,
} from './elgamal';
import type { CryptoEngine, EncryptedBallot, KeyCeremonyResult, ManifestHandle, SelectionVector } from './engine';
import { yieldToEventLoop } from '../utils/helpers';

const MANIFEST_VERSION = 1;

// Blob shapes

interface Manifest {
  version: number;
  eventName: string;
  candidates: string[];
  selectionLimit: number;
}

interface EngineContext {
  manifestHash: string;
  candidateCount: number;
  selectionLimit: number;
  publicKey: string;
  secretKey: string;
}

interface SerializedCiphertext {
  a: string;
  b: string;
}

interface BallotCiphertext {
  selections: SerializedCiphertext[];
}

interface BallotProof {
  selections: DisjunctiveProof[];
  total: ProofBranch;
}

const pointHex = Joi.string().pattern(/^(00|0[23][0-9a-f]{64})$/);
const scalarHex = Joi.string().pattern(/^[0-9a-f]{64}$/);

const branchSchema = Joi.object<ProofBranch>({
  a: pointHex.required(),
  b: pointHex.required(),
  c: scalarHex.required(),
  z: scalarHex.required(),
});

const manifestSchema = Joi.object<Manifest>({
  version: Joi.number().valid(MANIFEST_VERSION).required(),
  eventName: Joi.string().required(),
  candidates: Joi.array().items(Joi.string()).min(1).required(),
  selectionLimit: Joi.number().integer().min(1).required(),
});

const contextSchema = Joi.object<EngineContext>({
  manifestHash: Joi.string().hex().length(64).required(),
  candidateCount: Joi.number().integer().min(1).required(),
  selectionLimit: Joi.number().integer().min(1).required(),
  publicKey: pointHex.required(),
  secretKey: scalarHex.required(),
});

const ciphertextSchema = Joi.object<BallotCiphertext>({
  selections: Joi.array()
    .items(Joi.object<SerializedCiphertext>({ a: pointHex.required(), b: pointHex.required() }))
    .min(1)
    .required(),
});

const proofSchema = Joi.object<BallotProof>({
  selections: Joi.array()
    .items(Joi.object<DisjunctiveProof>({ zero: branchSchema.required(), one: branchSchema.required() }))
    .min(1)
    .required(),
  total: branchSchema.required(),
});

export class MalformedBlobError extends Error {
  constructor(label: string, reason: string) {
    super(`Malformed ${label}: ${reason}`);
    this.name = 'MalformedBlobError';
  }
}

function parseBlob<T>(schema: Joi.ObjectSchema<T>, raw: string, label: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // Parser messages quote the input
    throw new MalformedBlobError(label, 'invalid JSON');
  }

  const { error, value } = schema.validate(parsed, { presence: 'required', convert: false, abortEarly: false });
  if (error) {
    // Paths only: joi's messages quote the offending values
    const paths = [...new Set(error.details.map((detail) => detail.path.join('.') || '(root)'))];
    throw new MalformedBlobError(label, `invalid ${paths.join(', ')}`);
  }
  return value;
}

const manifestDigest = (manifest: ManifestHandle): string => bytesToHex(sha256(utf8ToBytes(manifest)));

const toCiphertext = (serialized: SerializedCiphertext): Ciphertext => ({
  a: hexToPoint(serialized.a),
  b: hexToPoint(serialized.b),
});

const serializeCiphertext = (ciphertext: Ciphertext): SerializedCiphertext => ({
  a: pointToHex(ciphertext.a),
  b: pointToHex(ciphertext.b),
});

/**
 * Single-guardian exponential ElGamal engine. The context blob holds the
 * guardian's secret key, so it must never leave the server.
 */
export class ElGamalCryptoEngine implements CryptoEngine {
  async buildManifest(eventName: string, candidateNames: string[], selectionLimit: number): Promise<ManifestHandle> {
    if (candidateNames.length === 0) {
      throw new Error('A manifest needs at least one candidate');
    }
    if (!Number.isInteger(selectionLimit) || selectionLimit < 1 || selectionLimit > candidateNames.length) {
      throw new Error(`Selection limit ${selectionLimit} is out of range for ${candidateNames.length} candidates`);
    }

    const manifest: Manifest = {
      version: MANIFEST_VERSION,
      eventName,
      candidates: [...candidateNames],
      selectionLimit,
    };
    return JSON.stringify(manifest);
  }

  async performKeyCeremony(manifest: ManifestHandle): Promise<KeyCeremonyResult> {
    const parsed = parseBlob(manifestSchema, manifest, 'manifest');
    const { secretKey, publicKey } = generateKeyPair();
    const publicKeyHex = pointToHex(publicKey);

    const context: EngineContext = {
      manifestHash: manifestDigest(manifest),
      candidateCount: parsed.candidates.length,
      selectionLimit: parsed.selectionLimit,
      publicKey: publicKeyHex,
      secretKey: scalarToHex(secretKey),
    };

    return { publicKey: publicKeyHex, context: JSON.stringify(context) };
  }

  async encryptBallot(
    vector: SelectionVector,
    manifest: ManifestHandle,
    context: string,
    publicKey: string
  ): Promise<EncryptedBallot> {
    const parsedManifest = parseBlob(manifestSchema, manifest, 'manifest');
    const ctx = parseBlob(contextSchema, context, 'context');

    if (ctx.manifestHash !== manifestDigest(manifest)) {
      throw new Error('Context was not produced for this manifest');
    }
    if (ctx.publicKey !== publicKey) {
      throw new Error('Public key does not match the context');
    }
    if (vector.length !== parsedManifest.candidates.length) {
      throw new Error(`Expected ${parsedManifest.candidates.length} selections, got ${vector.length}`);
    }

    const total = vector.reduce<number>((sum, flag) => sum + flag, 0);
    if (total !== parsedManifest.selectionLimit) {
      throw new Error(`Ballot selects ${total} candidates, manifest requires ${parsedManifest.selectionLimit}`);
    }

    const key = hexToPoint(publicKey);
    const selections: SerializedCiphertext[] = [];
    const proofs: DisjunctiveProof[] = [];
    let aggregate = emptyCiphertext();
    let nonceSum = 0n;

    for (const flag of vector) {
      const nonce = randomScalar();
      const ciphertext = encrypt(BigInt(flag), nonce, key);

      selections.push(serializeCiphertext(ciphertext));
      proofs.push(proveZeroOrOne(flag, nonce, ciphertext, key));
      aggregate = addCiphertexts(aggregate, ciphertext);
      nonceSum = mod(nonceSum + nonce, secp256k1.CURVE.n);

      await yieldToEventLoop();
    }

    const ballotCiphertext: BallotCiphertext = { selections };
    const ballotProof: BallotProof = {
      selections: proofs,
      total: proveTotal(total, nonceSum, aggregate, key),
    };

    return { ciphertext: JSON.stringify(ballotCiphertext), proof: JSON.stringify(ballotProof) };
  }

  async deriveVerificationCode(ciphertext: string, attempt: number = 0): Promise<string> {
    const input = attempt > 0 ? `${ciphertext}:${attempt}` : ciphertext;
    const hex = bytesToHex(sha256(utf8ToBytes(input))).slice(0, 16).toUpperCase();
    return hex.match(/.{4}/g)?.join('-') ?? hex;
  }

  async aggregateAndDecrypt(ciphertexts: string[], context: string): Promise<number[]> {
    const ctx = parseBlob(contextSchema, context, 'context');
    const ballots = ciphertexts.map((raw) => parseBlob(ciphertextSchema, raw, 'ciphertext'));

    const sums: Ciphertext[] = Array.from({ length: ctx.candidateCount }, () => emptyCiphertext());
    for (const ballot of ballots) {
      if (ballot.selections.length !== ctx.candidateCount) {
        throw new Error(`Ciphertext has ${ballot.selections.length} selections, expected ${ctx.candidateCount}`);
      }
      ballot.selections.forEach((selection, index) => {
        sums[index] = addCiphertexts(sums[index], toCiphertext(selection));
      });
      await yieldToEventLoop();
    }

    const secretKey = hexToScalar(ctx.secretKey);
    const counts: number[] = [];
    for (const sum of sums) {
      const count = await decryptSmall(sum, secretKey, ballots.length);
      if (count === null) {
        throw new Error('Aggregate decrypted outside the expected range');
      }
      counts.push(count);
      await yieldToEventLoop();
    }

    return counts;
  }

  async verifyBallot(ciphertext: string, proof: string, context: string): Promise<boolean> {
    const ctx = parseBlob(contextSchema, context, 'context');

    let ballot: BallotCiphertext;
    let ballotProof: BallotProof;
    try {
      ballot = parseBlob(ciphertextSchema, ciphertext, 'ciphertext');
      ballotProof = parseBlob(proofSchema, proof, 'proof');
    } catch (error) {
      if (error instanceof MalformedBlobError) {
        return false;
      }
      throw error;
    }

    if (
      ballot.selections.length !== ctx.candidateCount ||
      ballotProof.selections.length !== ctx.candidateCount
    ) {
      return false;
    }

    const key = hexToPoint(ctx.publicKey);
    let aggregate = emptyCiphertext();

    try {
      for (let i = 0; i < ballot.selections.length; i++) {
        const selection = toCiphertext(ballot.selections[i]);
        if (!verifyZeroOrOne(ballotProof.selections[i], selection, key)) {
          return false;
        }
        aggregate = addCiphertexts(aggregate, selection);
        await yieldToEventLoop();
      }

      return verifyTotal(ballotProof.total, ctx.selectionLimit, aggregate, key);
    } catch (error) {
      // Encodings that pass the shape check but are not curve points
      if (error instanceof Error) {
        return false;
      }
      throw error;
    }
  }
}
