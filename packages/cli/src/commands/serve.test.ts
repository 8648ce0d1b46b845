import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import chalk from 'chalk';
import { sampleCorpus } from '@newsdesk/core/testing';
import { attachStoreLogging, parsePort, tryReload } from './serve.js';
import { createRuntime } from '../runtime.js';
import { ConfigDefaults, type Config } from '../config/index.js';

describe('serve command', () => {
  let dir: string;
  let config: Config;

  beforeEach(() => {
    chalk.level = 0;
    dir = mkdtempSync(join(tmpdir(), 'newsdesk-serve-'));
    config = structuredClone(ConfigDefaults);
    config.corpus.path = join(dir, 'corpus.json');
    writeFileSync(config.corpus.path, JSON.stringify(sampleCorpus()));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('parses ports', () => {
    expect(parsePort('3030')).toBe(3030);
    expect(parsePort('0')).toBe(0);
    expect(() => parsePort('70000')).toThrow('Port must be an integer between 0 and 65535.');
    expect(() => parsePort('http')).toThrow('Port must be an integer between 0 and 65535.');
  });

  it('logs each snapshot swap', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const runtime = createRuntime(config);
    attachStoreLogging(runtime.store);

    expect(tryReload(runtime, config)).toBe(true);
    expect(tryReload(runtime, config)).toBe(true);

    expect(error.mock.calls.map(call => call[0])).toEqual([
      '  Corpus v1: 5 articles, 3 statistics, 3 wire items',
      '  Corpus v2 (was v1): 5 articles, 3 statistics, 3 wire items',
    ]);
  });

  it('keeps the previous snapshot when the file becomes unreadable', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const runtime = createRuntime(config);
    tryReload(runtime, config);

    writeFileSync(config.corpus.path, '{ broken');
    expect(tryReload(runtime, config)).toBe(false);
    expect(runtime.store.version).toBe(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^ {2}Failed to load corpus: CORPUS_INVALID: Failed to parse corpus file /);
  });

  it('logs a reload the store rejects', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const runtime = createRuntime(config);
    tryReload(runtime, config);
    attachStoreLogging(runtime.store);

    const doc = sampleCorpus();
    const articles = (doc.articles ?? []).map(a => (
      a.id === 'openclaw-stars' ? { ...a, publishedAt: '2025-01-01T00:00:00Z' } : a
    ));
    writeFileSync(config.corpus.path, JSON.stringify({ ...doc, articles }));

    expect(tryReload(runtime, config)).toBe(false);
    expect(runtime.store.version).toBe(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^ {2}Corpus replace rejected: CORPUS_CONFLICT: /);
  });
});
