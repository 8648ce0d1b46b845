import {
  KeyObject,
  createHash,
  createPrivateKey,
  createPublicKey,
  sign,
  verify,
} from 'node:crypto';
import { SigningUnavailableError } from '../errors.js';

/** PEM text, DER bytes in PKCS#8 (private) or SPKI (public) form, or a parsed key. */
export type KeyInput = KeyObject | string | Buffer;

/**
 * Signs raw bytes. The façade composes this with canonical serialization;
 * signers never see structured values.
 */
export interface PayloadSigner {
  readonly keyId: string;
  readonly publicKey: KeyObject;
  sign(bytes: Uint8Array): Uint8Array;
}

/** PEM pasted into an env var often arrives with literal `\n` sequences. */
function normalizePem(text: string): string {
  return text.includes('\\n') ? text.replace(/\\n/g, '\n') : text;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function requireEd25519(key: KeyObject, role: string): KeyObject {
  if (key.asymmetricKeyType !== 'ed25519') {
    throw new SigningUnavailableError(
      `${role} key must be Ed25519, got ${key.asymmetricKeyType ?? key.type}`,
    );
  }
  return key;
}

export function loadPrivateKey(input: KeyInput | undefined): KeyObject {
  if (input === undefined || (typeof input === 'string' && input.trim() === '')) {
    throw new SigningUnavailableError('No signing key configured');
  }
  if (input instanceof KeyObject) {
    if (input.type !== 'private') {
      throw new SigningUnavailableError(`Signing key must be a private key, got ${input.type}`);
    }
    return requireEd25519(input, 'Signing');
  }
  let key: KeyObject;
  try {
    key = typeof input === 'string'
      ? createPrivateKey(normalizePem(input.trim()))
      : createPrivateKey({ key: input, format: 'der', type: 'pkcs8' });
  } catch (err) {
    throw new SigningUnavailableError(`Failed to parse signing key: ${describe(err)}`);
  }
  return requireEd25519(key, 'Signing');
}

/** Accepts a public key, or a private key whose public half is derived. */
export function loadPublicKey(input: KeyInput): KeyObject {
  let key: KeyObject;
  try {
    if (input instanceof KeyObject) {
      key = input.type === 'private' ? createPublicKey(input) : input;
    } else if (typeof input === 'string') {
      key = createPublicKey(normalizePem(input.trim()));
    } else {
      key = createPublicKey({ key: input, format: 'der', type: 'spki' });
    }
  } catch (err) {
    throw new SigningUnavailableError(`Failed to parse public key: ${describe(err)}`);
  }
  if (key.type !== 'public') {
    throw new SigningUnavailableError(`Expected a public key, got ${key.type}`);
  }
  return requireEd25519(key, 'Public');
}

/** First 16 hex characters of SHA-256 over the SPKI DER encoding. */
export function keyIdFor(publicKey: KeyObject): string {
  const der = publicKey.export({ type: 'spki', format: 'der' });
  return createHash('sha256').update(der).digest('hex').slice(0, 16);
}

export function publicKeyPem(publicKey: KeyObject): string {
  return publicKey.export({ type: 'spki', format: 'pem' }).toString();
}

export class Ed25519Signer implements PayloadSigner {
  readonly keyId: string;
  readonly publicKey: KeyObject;
  private readonly privateKey: KeyObject;

  constructor(key: KeyInput | undefined) {
    this.privateKey = loadPrivateKey(key);
    this.publicKey = createPublicKey(this.privateKey);
    this.keyId = keyIdFor(this.publicKey);
  }

  sign(bytes: Uint8Array): Uint8Array {
    return sign(null, bytes, this.privateKey);
  }
}

/**
 * True iff `signature` is a valid Ed25519 signature over exactly `bytes`.
 * Malformed signatures or keys yield false.
 */
export function verifySignature(
  bytes: Uint8Array,
  signature: Uint8Array | string,
  publicKey: KeyInput,
): boolean {
  const raw = typeof signature === 'string' ? Buffer.from(signature, 'base64') : signature;
  if (raw.length !== 64) return false;
  try {
    return verify(null, bytes, loadPublicKey(publicKey), raw);
  } catch {
    return false;
  }
}
