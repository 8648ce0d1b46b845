import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { generateKeyPairSync } from 'node:crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Ed25519Signer, publicKeyPem, signPayload } from '@newsdesk/core';
import { buildKeyring, verifyFile } from './verify.js';
import { ConfigDefaults, type Config } from '../config/index.js';

const { privateKey } = generateKeyPairSync('ed25519');
const signer = new Ed25519Signer(privateKey);
const other = new Ed25519Signer(generateKeyPairSync('ed25519').privateKey);
const body = { tool: 'get_wire_feed', snapshotVersion: 3, count: 0, data: [] };

describe('verify command', () => {
  let dir: string;
  let config: Config;
  let envelopePath: string;

  const writeKey = (name: string, pem: string): string => {
    const path = join(dir, name);
    writeFileSync(path, pem);
    return path;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'newsdesk-verify-'));
    config = structuredClone(ConfigDefaults);
    envelopePath = join(dir, 'response.json');
    writeFileSync(envelopePath, JSON.stringify(signPayload(body, signer)));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('verifies with a key from the configured keyring', () => {
    config.signing.public_keys = { [signer.keyId]: writeKey('desk.pem', publicKeyPem(signer.publicKey)) };
    expect(verifyFile(config, envelopePath)).toEqual({ file: envelopePath, keyId: signer.keyId, valid: true });
  });

  it('verifies with an explicit public key file', () => {
    const keyPath = writeKey('desk.pem', publicKeyPem(signer.publicKey));
    expect(verifyFile(config, envelopePath, { publicKey: keyPath }).valid).toBe(true);
  });

  it('falls back to the configured signing key', () => {
    config.signing.private_key = privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();
    expect(verifyFile(config, envelopePath).valid).toBe(true);
  });

  it('rejects a signature made by another key', () => {
    const keyPath = writeKey('other.pem', publicKeyPem(other.publicKey));
    expect(verifyFile(config, envelopePath, { publicKey: keyPath })).toEqual({
      file: envelopePath,
      keyId: signer.keyId,
      valid: false,
      reason: 'Signature does not match body',
    });
  });

  it('rejects a tampered body', () => {
    const envelope = signPayload(body, signer);
    writeFileSync(envelopePath, JSON.stringify({ ...envelope, body: envelope.body.replace('"count":0', '"count":1') }));
    config.signing.public_keys = { [signer.keyId]: writeKey('desk.pem', publicKeyPem(signer.publicKey)) };
    expect(verifyFile(config, envelopePath).reason).toBe('Signature does not match body');
  });

  it('reports an unknown keyId', () => {
    expect(verifyFile(config, envelopePath).reason).toBe(`Unknown keyId "${signer.keyId}"`);
  });

  it('looks up only keyIds configured in the keyring', () => {
    writeFileSync(envelopePath, JSON.stringify({ ...signPayload(body, signer), keyId: 'constructor' }));
    expect(verifyFile(config, envelopePath).reason).toBe('Unknown keyId "constructor"');
  });

  it('reports an unsigned envelope', () => {
    writeFileSync(envelopePath, JSON.stringify({
      body: '{}',
      signature: null,
      keyId: null,
      algorithm: 'ed25519',
      verification: 'unavailable',
    }));
    expect(verifyFile(config, envelopePath).reason).toBe('Payload is unsigned');
  });

  it('throws on a file that is not JSON', () => {
    writeFileSync(envelopePath, 'not json');
    expect(() => verifyFile(config, envelopePath)).toThrow(/is not valid JSON/);
  });

  it('throws on JSON that is not an envelope', () => {
    writeFileSync(envelopePath, JSON.stringify({ body: '{}' }));
    expect(() => verifyFile(config, envelopePath)).toThrow(/is not a signed payload: signature: Required/);
  });

  it('reads only the key file for the requested keyId', () => {
    config.signing.public_keys = {
      [signer.keyId]: writeKey('desk.pem', publicKeyPem(signer.publicKey)),
      '0000000000000000': join(dir, 'missing.pem'),
    };
    expect([...buildKeyring(config, signer.keyId).keys()]).toEqual([signer.keyId]);
    expect(buildKeyring(config, null).size).toBe(0);
  });
});
