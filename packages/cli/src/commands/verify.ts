import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { ZodError } from 'zod';
import {
  loadPublicKey,
  parseSignedPayload,
  verifySignedPayload,
  type KeyInput,
  type SignedPayload,
  type VerificationResult,
} from '@newsdesk/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { loadSigner, resolvePath } from '../runtime.js';
import type { Config } from '../config/index.js';

interface VerifyOptions {
  publicKey?: string;
}

export interface VerifyReport extends VerificationResult {
  file: string;
  keyId: string | null;
}

function readText(path: string, what: string): string {
  try {
    return readFileSync(resolvePath(path), 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read ${what} ${path}: ${reason}`);
  }
}

/**
 * keyId → public key for the envelope's key. Looks in `signing.public_keys`
 * first, then at the configured signing key.
 */
export function buildKeyring(config: Config, keyId: string | null): Map<string, KeyInput> {
  const keyring = new Map<string, KeyInput>();
  if (keyId === null) return keyring;

  if (Object.hasOwn(config.signing.public_keys, keyId)) {
    keyring.set(keyId, readText(config.signing.public_keys[keyId], 'public key'));
    return keyring;
  }

  const { signer } = loadSigner(config.signing);
  if (signer && signer.keyId === keyId) {
    keyring.set(keyId, signer.publicKey);
  }
  return keyring;
}

export function readEnvelope(file: string): SignedPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(readText(file, 'envelope'));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new Error(`Envelope ${file} is not valid JSON: ${err.message}`);
    }
    throw err;
  }
  try {
    return parseSignedPayload(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
      throw new Error(`Envelope ${file} is not a signed payload: ${issues}`);
    }
    throw err;
  }
}

export function verifyFile(config: Config, file: string, options: VerifyOptions = {}): VerifyReport {
  const envelope = readEnvelope(file);
  const keys = options.publicKey
    ? loadPublicKey(readText(options.publicKey, 'public key'))
    : buildKeyring(config, envelope.keyId);
  return { file, keyId: envelope.keyId, ...verifySignedPayload(envelope, keys) };
}

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Verify the signature of a saved response envelope')
    .argument('<file>', 'JSON file holding a signed envelope')
    .option('-k, --public-key <path>', 'PEM file of the public key to verify with')
    .action((file: string, options: VerifyOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const report = verifyFile(getConfig(), file, options);

      if (globalOpts.json) {
        console.log(JSON.stringify(report, null, 2));
      } else if (report.valid) {
        console.log(chalk.green(`✓ Valid signature (key ${report.keyId ?? 'given'})`));
      } else {
        console.log(chalk.red(`✗ Invalid: ${report.reason ?? 'unknown reason'}`));
      }

      if (!report.valid) {
        process.exitCode = 1;
      }
    });
}
