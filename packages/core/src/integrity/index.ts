export { canonicalize, encodeCanonical } from './canonical.js';

export {
  type KeyInput,
  type PayloadSigner,
  Ed25519Signer,
  loadPrivateKey,
  loadPublicKey,
  keyIdFor,
  publicKeyPem,
  verifySignature,
} from './signer.js';

export {
  type SignedPayload,
  type UnsignedPolicy,
  type Keyring,
  type VerificationResult,
  UNSIGNED_POLICIES,
  SignedPayloadSchema,
  signPayload,
  unsignedPayload,
  envelopeFor,
  verifySignedPayload,
  parseSignedPayload,
  decodeSignedBody,
} from './envelope.js';
