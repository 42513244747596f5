/**
 * Exponential ElGamal over secp256k1.
 *
 * Enc(m) = (A, B) with A = r*G and B = r*H + m*G, H = x*G being the election
 * public key. Ciphertexts add component-wise, so the sum of many encryptions
 * decrypts to the sum of their plaintexts.
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { mod } from '@noble/curves/abstract/modular';
import { bytesToNumberBE } from '@noble/curves/abstract/utils';
import { sha256 } from '@noble/hashes/sha256';
import { utf8ToBytes } from '@noble/hashes/utils';
import { yieldToEventLoop } from '../utils/helpers';

const CURVE_ORDER = secp256k1.CURVE.n;
const G = secp256k1.ProjectivePoint.BASE;
const ZERO = secp256k1.ProjectivePoint.ZERO;

// Point additions between yields in the discrete-log walk
const DLOG_YIELD_INTERVAL = 2048;

export type Point = typeof G;

export interface Ciphertext {
  a: Point;
  b: Point;
}

/** Serialized Chaum-Pedersen transcript (hex points and scalars). */
export interface ProofBranch {
  a: string;
  b: string;
  c: string;
  z: string;
}

export interface DisjunctiveProof {
  zero: ProofBranch;
  one: ProofBranch;
}

export interface KeyPair {
  secretKey: bigint;
  publicKey: Point;
}

export function randomScalar(): bigint {
  return mod(bytesToNumberBE(secp256k1.utils.randomPrivateKey()), CURVE_ORDER);
}

/**
 * Scalar multiplication that accepts 0 (noble rejects it).
 */
export function mul(point: Point, scalar: bigint): Point {
  const k = mod(scalar, CURVE_ORDER);
  if (k === 0n || point.equals(ZERO)) {
    return ZERO;
  }
  return point.multiply(k);
}

export function pointToHex(point: Point): string {
  // Identity has no SEC1 encoding
  if (point.equals(ZERO)) {
    return '00';
  }
  return point.toHex(true);
}

export function hexToPoint(hex: string): Point {
  if (hex === '00') {
    return ZERO;
  }
  return secp256k1.ProjectivePoint.fromHex(hex);
}

export function scalarToHex(scalar: bigint): string {
  return scalar.toString(16).padStart(64, '0');
}

export function hexToScalar(hex: string): bigint {
  return mod(BigInt('0x' + hex), CURVE_ORDER);
}

/**
 * Fiat-Shamir challenge over a domain tag and the transcript.
 */
export function hashToScalar(domain: string, parts: string[]): bigint {
  const digest = sha256(utf8ToBytes([domain, ...parts].join('|')));
  return mod(bytesToNumberBE(digest), CURVE_ORDER);
}

export function generateKeyPair(): KeyPair {
  const secretKey = randomScalar();
  return { secretKey, publicKey: G.multiply(secretKey) };
}

export function encrypt(value: bigint, nonce: bigint, publicKey: Point): Ciphertext {
  return {
    a: mul(G, nonce),
    b: mul(publicKey, nonce).add(mul(G, value)),
  };
}

export function addCiphertexts(left: Ciphertext, right: Ciphertext): Ciphertext {
  return { a: left.a.add(right.a), b: left.b.add(right.b) };
}

export function emptyCiphertext(): Ciphertext {
  return { a: ZERO, b: ZERO };
}

/**
 * Recover m from B - x*A = m*G by walking m upward. `maxValue` bounds the walk;
 * null means the plaintext is outside [0, maxValue]. Yields to the event loop
 * every DLOG_YIELD_INTERVAL steps.
 */
export async function decryptSmall(ciphertext: Ciphertext, secretKey: bigint, maxValue: number): Promise<number | null> {
  const target = ciphertext.b.add(mul(ciphertext.a, secretKey).negate());
  let acc = ZERO;
  for (let m = 0; m <= maxValue; m++) {
    if (acc.equals(target)) {
      return m;
    }
    acc = acc.add(G);
    if (m > 0 && m % DLOG_YIELD_INTERVAL === 0) {
      await yieldToEventLoop();
    }
  }
  return null;
}

function transcript(publicKey: Point, ciphertext: Ciphertext): string[] {
  return [pointToHex(publicKey), pointToHex(ciphertext.a), pointToHex(ciphertext.b)];
}

/**
 * Disjunctive Chaum-Pedersen proof that the ciphertext encrypts 0 or 1.
 * The branch for the real value is proven honestly, the other is simulated.
 */
export function proveZeroOrOne(
  value: 0 | 1,
  nonce: bigint,
  ciphertext: Ciphertext,
  publicKey: Point
): DisjunctiveProof {
  const { a: A, b: B } = ciphertext;
  const bMinusG = B.add(G.negate());
  const w = randomScalar();
  const simulatedC = randomScalar();
  const simulatedZ = randomScalar();

  if (value === 0) {
    const a0 = mul(G, w);
    const b0 = mul(publicKey, w);
    const a1 = mul(G, simulatedZ).add(mul(A, simulatedC).negate());
    const b1 = mul(publicKey, simulatedZ).add(mul(bMinusG, simulatedC).negate());

    const challenge = hashToScalar('selection', [
      ...transcript(publicKey, ciphertext),
      pointToHex(a0),
      pointToHex(b0),
      pointToHex(a1),
      pointToHex(b1),
    ]);
    const c0 = mod(challenge - simulatedC, CURVE_ORDER);
    const z0 = mod(w + c0 * nonce, CURVE_ORDER);

    return {
      zero: { a: pointToHex(a0), b: pointToHex(b0), c: scalarToHex(c0), z: scalarToHex(z0) },
      one: { a: pointToHex(a1), b: pointToHex(b1), c: scalarToHex(simulatedC), z: scalarToHex(simulatedZ) },
    };
  }

  const a0 = mul(G, simulatedZ).add(mul(A, simulatedC).negate());
  const b0 = mul(publicKey, simulatedZ).add(mul(B, simulatedC).negate());
  const a1 = mul(G, w);
  const b1 = mul(publicKey, w);

  const challenge = hashToScalar('selection', [
    ...transcript(publicKey, ciphertext),
    pointToHex(a0),
    pointToHex(b0),
    pointToHex(a1),
    pointToHex(b1),
  ]);
  const c1 = mod(challenge - simulatedC, CURVE_ORDER);
  const z1 = mod(w + c1 * nonce, CURVE_ORDER);

  return {
    zero: { a: pointToHex(a0), b: pointToHex(b0), c: scalarToHex(simulatedC), z: scalarToHex(simulatedZ) },
    one: { a: pointToHex(a1), b: pointToHex(b1), c: scalarToHex(c1), z: scalarToHex(z1) },
  };
}

export function verifyZeroOrOne(proof: DisjunctiveProof, ciphertext: Ciphertext, publicKey: Point): boolean {
  const { a: A, b: B } = ciphertext;

  const challenge = hashToScalar('selection', [
    ...transcript(publicKey, ciphertext),
    proof.zero.a,
    proof.zero.b,
    proof.one.a,
    proof.one.b,
  ]);
  const c0 = hexToScalar(proof.zero.c);
  const c1 = hexToScalar(proof.one.c);
  if (mod(c0 + c1, CURVE_ORDER) !== challenge) {
    return false;
  }

  const z0 = hexToScalar(proof.zero.z);
  const z1 = hexToScalar(proof.one.z);

  // Branch 0: B = r*H
  if (!mul(G, z0).equals(hexToPoint(proof.zero.a).add(mul(A, c0)))) {
    return false;
  }
  if (!mul(publicKey, z0).equals(hexToPoint(proof.zero.b).add(mul(B, c0)))) {
    return false;
  }

  // Branch 1: B - G = r*H
  const bMinusG = B.add(G.negate());
  if (!mul(G, z1).equals(hexToPoint(proof.one.a).add(mul(A, c1)))) {
    return false;
  }
  return mul(publicKey, z1).equals(hexToPoint(proof.one.b).add(mul(bMinusG, c1)));
}

/**
 * Chaum-Pedersen proof that the aggregate ciphertext encrypts `total`,
 * i.e. log_G(A) = log_H(B - total*G).
 */
export function proveTotal(
  total: number,
  nonceSum: bigint,
  aggregate: Ciphertext,
  publicKey: Point
): ProofBranch {
  const w = randomScalar();
  const a = mul(G, w);
  const b = mul(publicKey, w);
  const c = hashToScalar('total', [
    ...transcript(publicKey, aggregate),
    String(total),
    pointToHex(a),
    pointToHex(b),
  ]);
  const z = mod(w + c * nonceSum, CURVE_ORDER);

  return { a: pointToHex(a), b: pointToHex(b), c: scalarToHex(c), z: scalarToHex(z) };
}

export function verifyTotal(proof: ProofBranch, total: number, aggregate: Ciphertext, publicKey: Point): boolean {
  const c = hashToScalar('total', [...transcript(publicKey, aggregate), String(total), proof.a, proof.b]);
  if (c !== hexToScalar(proof.c)) {
    return false;
  }

  const z = hexToScalar(proof.z);
  const shifted = aggregate.b.add(mul(G, BigInt(total)).negate());

  return (
    mul(G, z).equals(hexToPoint(proof.a).add(mul(aggregate.a, c))) &&
    mul(publicKey, z).equals(hexToPoint(proof.b).add(mul(shifted, c)))
  );
}
