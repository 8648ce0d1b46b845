import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createProgram } from './program.js';
import { getConfig, resetConfig } from './context.js';

describe('CLI command structure', () => {
  it('creates a program with correct name and version', () => {
    const program = createProgram();
    expect(program.name()).toBe('newsdesk');
    expect(program.version()).toBe('0.1.0');
  });

  it('registers all top-level commands', () => {
    const program = createProgram();
    expect(program.commands.map(c => c.name())).toEqual(['serve', 'query', 'verify', 'config']);
  });

  it('has all global options', () => {
    const program = createProgram();
    const optLongs = program.options.map(o => o.long);
    expect(optLongs).toContain('--json');
    expect(optLongs).toContain('--config');
  });

  describe('serve command', () => {
    it('has transport options', () => {
      const program = createProgram();
      const cmd = program.commands.find(c => c.name() === 'serve')!;
      expect(cmd.options.map(o => o.long)).toEqual(['--http', '--port', '--host']);
    });
  });

  describe('query command', () => {
    it('has a required tool argument', () => {
      const program = createProgram();
      const cmd = program.commands.find(c => c.name() === 'query')!;
      expect(cmd.registeredArguments).toHaveLength(1);
      expect(cmd.registeredArguments[0].name()).toBe('tool');
      expect(cmd.registeredArguments[0].required).toBe(true);
    });

    it('has all options', () => {
      const program = createProgram();
      const cmd = program.commands.find(c => c.name() === 'query')!;
      const optLongs = cmd.options.map(o => o.long);
      expect(optLongs).toContain('--limit');
      expect(optLongs).toContain('--query');
      expect(optLongs).toContain('--section');
      expect(optLongs).toContain('--since');
      expect(optLongs).toContain('--allow-unsigned');
    });

    it('generates help text', () => {
      const program = createProgram();
      const cmd = program.commands.find(c => c.name() === 'query')!;
      const help = cmd.helpInformation();
      expect(help).toContain('query');
      expect(help).toContain('tool');
      expect(help).toContain('--section');
    });
  });

  describe('verify command', () => {
    it('takes a file and an optional public key', () => {
      const program = createProgram();
      const cmd = program.commands.find(c => c.name() === 'verify')!;
      expect(cmd.registeredArguments[0].name()).toBe('file');
      expect(cmd.options.map(o => o.long)).toEqual(['--public-key']);
    });
  });

  describe('config subcommands', () => {
    it('has show and path', () => {
      const program = createProgram();
      const cmd = program.commands.find(c => c.name() === 'config')!;
      expect(cmd.commands.map(c => c.name())).toEqual(['show', 'path']);
    });
  });
});

describe('preAction config loading', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'newsdesk-program-'));
    vi.stubEnv('NEWSDESK_SIGNING_KEY', '');
    vi.stubEnv('NEWSDESK_CORPUS_PATH', '');
    resetConfig();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetConfig();
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the config file named by --config before running a command', async () => {
    const configPath = join(dir, 'config.yaml');
    writeFileSync(configPath, 'server:\n  port: 4040\n');
    vi.spyOn(console, 'log').mockImplementation(() => {});

    await createProgram().parseAsync(['config', 'show', '--json', '-c', configPath], { from: 'user' });

    expect(getConfig().server.port).toBe(4040);
  });

  it('prints the config path without loading the file', async () => {
    const configPath = join(dir, 'config.yaml');
    writeFileSync(configPath, 'server: [broken\n');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createProgram().parseAsync(['config', 'path', '-c', configPath], { from: 'user' });

    expect(log).toHaveBeenCalledWith(configPath);
    expect(() => getConfig()).toThrow('Config not loaded');
  });
});
