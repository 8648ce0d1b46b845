import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { getConfig, type GlobalOptions } from '../context.js';
import { getConfigPath, maskSecrets } from '../config/index.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Inspect newsdesk configuration');

  config
    .command('show')
    .description('Show the resolved configuration (secrets masked)')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const cfg = maskSecrets(getConfig());

      if (globalOpts.json) {
        console.log(JSON.stringify(cfg, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:\n'));
        console.log(stringify(cfg));
      }
    });

  config
    .command('path')
    .description('Print the config file path')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      console.log(getConfigPath(globalOpts.config));
    });
}
