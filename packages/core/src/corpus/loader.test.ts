import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadCorpusFile, parseCorpusDocument } from './loader.js';
import { sampleCorpus } from '../__fixtures__/corpus.js';
import { CorpusLoadError, CorpusValidationError } from '../errors.js';

describe('parseCorpusDocument', () => {
  it('normalizes confidence labels and timestamps', () => {
    const data = parseCorpusDocument(sampleCorpus());
    const moltbook = data.articles.find(a => a.id === 'moltbook-growth');
    expect(moltbook?.confidence).toBe('self-reported');
    expect(moltbook?.publishedAt).toBe('2026-02-01T09:00:00.000Z');
  });

  it('accepts date-only timestamps', () => {
    const data = parseCorpusDocument({
      wire: [{ id: 'w1', timestamp: '2026-02-03', text: 'Short item' }],
    });
    expect(data.wire[0].timestamp).toBe('2026-02-03T00:00:00.000Z');
    expect(data.wire[0].sources).toEqual([]);
  });

  it('treats an empty document as an empty corpus', () => {
    expect(parseCorpusDocument(null)).toEqual({ articles: [], statistics: [], wire: [] });
  });

  it('requires sources unless the article is self-reported', () => {
    const doc = sampleCorpus();
    const articles = (doc.articles ?? []).map(a => (a.id === 'eu-agent-act' ? { ...a, sources: [] } : a));
    expect(() => parseCorpusDocument({ ...doc, articles })).toThrow(/needs at least one source/);
  });

  it('rejects unknown sections', () => {
    const doc = sampleCorpus();
    const articles = (doc.articles ?? []).map(a => (a.id === 'eu-agent-act' ? { ...a, section: 'sports' } : a));
    expect(() => parseCorpusDocument({ ...doc, articles })).toThrow(CorpusValidationError);
  });

  it('rejects unknown confidence levels', () => {
    const doc = sampleCorpus();
    const articles = (doc.articles ?? []).map(a => (a.id === 'eu-agent-act' ? { ...a, confidence: 'rumour' } : a));
    expect(() => parseCorpusDocument({ ...doc, articles })).toThrow(/Unknown confidence level: "rumour"/);
  });

  it('rejects duplicate article ids with the offending path', () => {
    const doc = sampleCorpus();
    const articles = [...(doc.articles ?? []), ...(doc.articles ?? []).slice(0, 1)];
    try {
      parseCorpusDocument({ ...doc, articles });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(CorpusValidationError);
      if (err instanceof CorpusValidationError) {
        expect(err.issues[0].path).toEqual(['articles', 5]);
        expect(err.issues[0].message).toBe('Duplicate article id "moltbook-growth"');
      }
    }
  });

  it.each(['__proto__', 'constructor'])('rejects %s as a confidence level', (label) => {
    const doc = sampleCorpus();
    const articles = (doc.articles ?? []).map(a => (a.id === 'eu-agent-act' ? { ...a, confidence: label } : a));
    expect(() => parseCorpusDocument({ ...doc, articles })).toThrow(`Unknown confidence level: "${label}"`);
  });

  it('reads date-times without an offset as UTC', () => {
    const data = parseCorpusDocument({
      wire: [
        { id: 'w1', timestamp: '2026-02-03T12:00:00', text: 'No offset' },
        { id: 'w2', timestamp: '2026-02-03T12:00', text: 'No seconds' },
        { id: 'w3', timestamp: '2026-02-03T14:00:00+02:00', text: 'With offset' },
      ],
    });
    expect(data.wire.map(w => w.timestamp)).toEqual([
      '2026-02-03T12:00:00.000Z',
      '2026-02-03T12:00:00.000Z',
      '2026-02-03T12:00:00.000Z',
    ]);
  });

  it.each(['Feb 3, 2026', '2026/02/03', '1770120000000'])('rejects the non-ISO timestamp %s', (timestamp) => {
    expect(() => parseCorpusDocument({ wire: [{ id: 'w1', timestamp, text: 'Item' }] }))
      .toThrow(`Invalid timestamp: "${timestamp}"`);
  });

  it('rejects unknown fields', () => {
    expect(() => parseCorpusDocument({ articles: [], extra: true })).toThrow(CorpusValidationError);
  });
});

describe('loadCorpusFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'newsdesk-corpus-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads JSON files', () => {
    const file = join(dir, 'corpus.json');
    writeFileSync(file, JSON.stringify(sampleCorpus()));
    const data = loadCorpusFile(file);
    expect(data.articles).toHaveLength(5);
    expect(data.statistics).toHaveLength(3);
  });

  it('reads YAML files', () => {
    const file = join(dir, 'corpus.yaml');
    writeFileSync(file, `
wire:
  - id: w1
    timestamp: "2026-02-03T10:00:00Z"
    text: Agent exchange opens
    sources:
      - label: Example Wire
        url: https://news.example.com/exchange
`);
    const data = loadCorpusFile(file);
    expect(data.wire).toEqual([{
      id: 'w1',
      timestamp: '2026-02-03T10:00:00.000Z',
      text: 'Agent exchange opens',
      sources: [{ label: 'Example Wire', url: 'https://news.example.com/exchange' }],
    }]);
  });

  it('throws CorpusLoadError for a missing file', () => {
    expect(() => loadCorpusFile(join(dir, 'missing.json'))).toThrow(CorpusLoadError);
  });

  it('throws CorpusLoadError for malformed JSON', () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ not json');
    expect(() => loadCorpusFile(file)).toThrow(/Failed to parse corpus file/);
  });

  it('reports the file path on validation errors', () => {
    const file = join(dir, 'bad.json');
    writeFileSync(file, JSON.stringify({ articles: [{ id: 'x' }] }));
    try {
      loadCorpusFile(file);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(CorpusValidationError);
      if (err instanceof CorpusValidationError) {
        expect(err.filePath).toBe(file);
        expect(err.code).toBe('CORPUS_INVALID');
      }
    }
  });
});
