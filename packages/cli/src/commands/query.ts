import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander';
import chalk from 'chalk';
import { decodeSignedBody, isNewsdeskError } from '@newsdesk/core';
import type { ToolResult } from '@newsdesk/tools';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRuntime, reloadCorpus } from '../runtime.js';
import { renderToolBody } from '../render/body.js';
import { formatSignature } from '../render/format.js';
import type { Config } from '../config/index.js';

export interface QueryOptions {
  limit?: number;
  query?: string;
  section?: string;
  since?: string;
  allowUnsigned?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new CommanderArgumentError('Expected an integer.');
  }
  return parsed;
}

/** Maps command-line flags onto tool arguments, leaving out what was not given. */
export function toToolParams(options: QueryOptions): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  if (options.limit !== undefined) params.limit = options.limit;
  if (options.query !== undefined) params.query = options.query;
  if (options.section !== undefined) params.section = options.section;
  if (options.since !== undefined) params.since = options.since;
  return params;
}

/** Loads the corpus and runs one tool against it. */
export async function executeQuery(config: Config, tool: string, options: QueryOptions): Promise<ToolResult> {
  const effective: Config = options.allowUnsigned
    ? { ...config, signing: { ...config.signing, policy: 'allow-unsigned' } }
    : config;
  const runtime = createRuntime(effective);

  try {
    reloadCorpus(runtime.store, effective);
  } catch (err) {
    if (!isNewsdeskError(err)) throw err;
    return { success: false, data: null, error: err.message, code: err.code };
  }

  return runtime.registry.executeTool(tool, toToolParams(options), runtime.context);
}

/**
 * Prints a tool result: the envelope as JSON, or a readable rendering with
 * a signature footer. Returns the exit code.
 */
export function printResult(result: ToolResult, json: boolean): number {
  if (!result.success || !result.data) {
    if (json) {
      console.log(JSON.stringify({ error: result.error, code: result.code ?? 'INTERNAL' }, null, 2));
    } else {
      console.error(chalk.red(`${result.code ?? 'INTERNAL'}: ${result.error ?? 'Tool failed'}`));
    }
    return 1;
  }

  if (json) {
    console.log(JSON.stringify(result.data, null, 2));
  } else {
    console.log(renderToolBody(decodeSignedBody(result.data)));
    console.log('');
    console.log(formatSignature(result.data));
  }
  return 0;
}

export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Run one tool against the configured corpus')
    .argument('<tool>', 'Tool name (e.g., get_latest_articles)')
    .option('-l, --limit <n>', 'Maximum number of results', parseInteger)
    .option('-q, --query <text>', 'Search query (search_articles)')
    .option('-s, --section <name>', 'Section (get_section_articles)')
    .option('--since <timestamp>', 'Only wire items after this time (get_wire_feed)')
    .option('--allow-unsigned', 'Return unsigned responses when no signing key is available')
    .action(async (tool: string, options: QueryOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const result = await executeQuery(getConfig(), tool, options);
      const code = printResult(result, globalOpts.json ?? false);
      if (code !== 0) {
        process.exitCode = code;
      }
    });
}
