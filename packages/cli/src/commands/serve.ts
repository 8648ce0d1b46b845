import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander';
import chalk from 'chalk';
import { isNewsdeskError, loadCorpusFile, type CorpusData, type CorpusStore } from '@newsdesk/core';
import {
  createNewsdeskServer,
  serveStdio,
  startHttpServer,
  SERVER_VERSION,
} from '@newsdesk/mcp';
import { getConfig } from '../context.js';
import { createRuntime, resolvePath, type Runtime } from '../runtime.js';
import type { Config } from '../config/index.js';

interface ServeOptions {
  http?: boolean;
  port?: number;
  host?: string;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new CommanderArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function describeError(err: unknown): string {
  if (isNewsdeskError(err)) return `${err.code}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}

/** Logs corpus lifecycle events to stderr. */
export function attachStoreLogging(store: CorpusStore): void {
  store.on('snapshot:swap', event => {
    const from = event.previousVersion === null ? '' : ` (was v${event.previousVersion})`;
    console.error(chalk.green(
      `  Corpus v${event.version}${from}: ${event.articles} articles, ${event.statistics} statistics, ${event.wireItems} wire items`,
    ));
  });
  store.on('refresh:rejected', event => {
    console.error(chalk.red(`  Corpus ${event.reason} rejected: ${describeError(event.error)}`));
  });
}

/**
 * Loads the configured corpus file into the store. A failed load keeps the
 * previous snapshot serving. Read and parse failures are logged here; the
 * store reports its own rejections through `refresh:rejected`.
 */
export function tryReload(runtime: Runtime, config: Config): boolean {
  let data: CorpusData;
  try {
    data = loadCorpusFile(resolvePath(config.corpus.path));
  } catch (err) {
    console.error(chalk.red(`  Failed to load corpus: ${describeError(err)}`));
    return false;
  }

  try {
    runtime.store.replace(data);
    return true;
  } catch (err) {
    if (!isNewsdeskError(err)) throw err;
    return false;
  }
}

export function createServerFactory(runtime: Runtime, config: Config) {
  return () => createNewsdeskServer({
    name: config.server.name,
    registry: runtime.registry,
    context: runtime.context,
    onError: (toolName, result) => {
      console.error(chalk.yellow(`  ${toolName} failed: ${result.code ?? 'INTERNAL'}: ${result.error ?? 'unknown error'}`));
    },
  });
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Serve the corpus to agent clients over MCP')
    .option('--http', 'Use Streamable HTTP instead of stdio')
    .option('-p, --port <port>', 'HTTP port', parsePort)
    .option('--host <host>', 'HTTP host')
    .action(async (options: ServeOptions) => {
      const config = getConfig();
      const runtime = createRuntime(config);
      attachStoreLogging(runtime.store);

      if (runtime.signingError) {
        const consequence = config.signing.policy === 'require'
          ? 'tool calls will fail with SIGNING_UNAVAILABLE'
          : 'responses will be unsigned';
        console.error(chalk.yellow(`  ${runtime.signingError.message}; ${consequence}.`));
      } else if (runtime.context.signer) {
        console.error(chalk.dim(`  Signing with key ${runtime.context.signer.keyId}`));
      }

      tryReload(runtime, config);

      process.on('SIGHUP', () => {
        console.error(chalk.cyan('  SIGHUP: reloading corpus...'));
        tryReload(runtime, config);
      });

      const createServer = createServerFactory(runtime, config);
      const useHttp = options.http ?? config.server.transport === 'http';

      if (!useHttp) {
        await serveStdio(createServer());
        console.error(chalk.blue(`  ${config.server.name} v${SERVER_VERSION} serving ${runtime.registry.size} tool(s) on stdio`));
        return;
      }

      const handle = await startHttpServer(createServer, {
        host: options.host ?? config.server.host,
        port: options.port ?? config.server.port,
        health: () => ({
          snapshotVersion: runtime.store.version,
          signing: runtime.context.signer ? 'available' : 'unavailable',
        }),
        onError: error => {
          console.error(chalk.red(`  HTTP error: ${error.message}`));
        },
      });
      console.error(chalk.blue(`  ${config.server.name} v${SERVER_VERSION} serving ${runtime.registry.size} tool(s) at ${handle.url}/mcp`));

      const shutdown = (): void => {
        handle.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error(chalk.red(`  Shutdown failed: ${describeError(err)}`));
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
