import { KeyObject } from 'node:crypto';
import { z } from 'zod';
import { canonicalize } from './canonical.js';
import { verifySignature, type KeyInput, type PayloadSigner } from './signer.js';
import { SigningUnavailableError } from '../errors.js';

export type UnsignedPolicy = 'require' | 'allow-unsigned';

export const UNSIGNED_POLICIES: readonly UnsignedPolicy[] = ['require', 'allow-unsigned'];

export interface SignedPayload {
  /** Canonical JSON text of the response body. */
  readonly body: string;
  /** Base64 Ed25519 signature over the UTF-8 bytes of `body`. */
  readonly signature: string | null;
  readonly keyId: string | null;
  readonly algorithm: 'ed25519';
  readonly verification: 'signed' | 'unavailable';
}

export const SignedPayloadSchema = z.object({
  body: z.string(),
  signature: z.string().nullable(),
  keyId: z.string().nullable(),
  algorithm: z.literal('ed25519'),
  verification: z.enum(['signed', 'unavailable']),
}).strict();

export function signPayload(value: unknown, signer: PayloadSigner): SignedPayload {
  const body = canonicalize(value);
  const signature = signer.sign(new TextEncoder().encode(body));
  return Object.freeze({
    body,
    signature: Buffer.from(signature).toString('base64'),
    keyId: signer.keyId,
    algorithm: 'ed25519',
    verification: 'signed',
  });
}

/** Same body, explicitly marked as carrying no signature. */
export function unsignedPayload(value: unknown): SignedPayload {
  return Object.freeze({
    body: canonicalize(value),
    signature: null,
    keyId: null,
    algorithm: 'ed25519',
    verification: 'unavailable',
  });
}

/**
 * Signs when a signer is available. Without one, `require` throws and
 * `allow-unsigned` returns an envelope marked `unavailable`.
 */
export function envelopeFor(
  value: unknown,
  signer: PayloadSigner | undefined,
  policy: UnsignedPolicy = 'require',
): SignedPayload {
  if (signer) {
    return signPayload(value, signer);
  }
  if (policy === 'allow-unsigned') {
    return unsignedPayload(value);
  }
  throw new SigningUnavailableError('Signing key unavailable; refusing to return an unsigned response');
}

/** keyId → public key. */
export type Keyring = ReadonlyMap<string, KeyInput>;

export interface VerificationResult {
  valid: boolean;
  reason?: string;
}

export function verifySignedPayload(envelope: SignedPayload, keyring: Keyring | KeyObject): VerificationResult {
  if (envelope.verification === 'unavailable' || envelope.signature === null) {
    return { valid: false, reason: 'Payload is unsigned' };
  }

  let publicKey: KeyInput | undefined;
  if (keyring instanceof KeyObject) {
    publicKey = keyring;
  } else {
    if (envelope.keyId === null) {
      return { valid: false, reason: 'Payload has no keyId' };
    }
    publicKey = keyring.get(envelope.keyId);
    if (publicKey === undefined) {
      return { valid: false, reason: `Unknown keyId "${envelope.keyId}"` };
    }
  }

  const bytes = new TextEncoder().encode(envelope.body);
  if (!verifySignature(bytes, envelope.signature, publicKey)) {
    return { valid: false, reason: 'Signature does not match body' };
  }
  return { valid: true };
}

/** Parses an envelope read from disk or the wire. */
export function parseSignedPayload(raw: unknown): SignedPayload {
  return Object.freeze(SignedPayloadSchema.parse(raw));
}

export function decodeSignedBody(envelope: SignedPayload): unknown {
  return JSON.parse(envelope.body);
}
