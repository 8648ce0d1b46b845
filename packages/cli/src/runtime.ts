import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  CorpusStore,
  Ed25519Signer,
  QueryEngine,
  SigningUnavailableError,
  loadCorpusFile,
  type CorpusSnapshot,
  type PayloadSigner,
} from '@newsdesk/core';
import { ToolRegistry, type ToolContext } from '@newsdesk/tools';
import { expandTilde, type Config, type SigningConfig } from './config/index.js';

export interface Runtime {
  store: CorpusStore;
  engine: QueryEngine;
  registry: ToolRegistry;
  context: ToolContext;
  /** Why no signer is available, when none is */
  signingError?: SigningUnavailableError;
}

export function resolvePath(path: string): string {
  return resolve(expandTilde(path));
}

/**
 * Builds the signer from config. Returns an error instead of throwing so a
 * server can still start and report SIGNING_UNAVAILABLE per call.
 */
export function loadSigner(signing: SigningConfig): { signer?: PayloadSigner; error?: SigningUnavailableError } {
  let pem = signing.private_key;
  if (!pem && signing.private_key_path) {
    const keyPath = resolvePath(signing.private_key_path);
    try {
      pem = readFileSync(keyPath, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { error: new SigningUnavailableError(`Failed to read signing key file ${keyPath}: ${reason}`) };
    }
  }

  try {
    return { signer: new Ed25519Signer(pem) };
  } catch (err) {
    if (err instanceof SigningUnavailableError) {
      return { error: err };
    }
    throw err;
  }
}

/** Reads the configured corpus file and swaps it into the store. */
export function reloadCorpus(store: CorpusStore, config: Config): CorpusSnapshot {
  return store.replace(loadCorpusFile(resolvePath(config.corpus.path)));
}

export function createRuntime(config: Config, store = new CorpusStore()): Runtime {
  const engine = new QueryEngine(store, {
    maxLimit: config.query.max_limit,
    defaultLimit: config.query.default_limit,
    wireDefaultLimit: config.query.wire_default_limit,
  });
  const { signer, error } = loadSigner(config.signing);

  return {
    store,
    engine,
    registry: new ToolRegistry(config.tools.enabled),
    context: { engine, signer, unsignedPolicy: config.signing.policy },
    signingError: error,
  };
}
