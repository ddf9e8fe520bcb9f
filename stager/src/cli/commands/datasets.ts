/**
 * datasets
 */
import type { Command } from 'commander';
import { loadConfig } from '../../config/config.js';
import type { GlobalOptions } from '../session.js';

export function registerDatasetsCommand(program: Command): void {
  program
    .command('datasets')
    .description('List configured datasets')
    .action(async (_options: object, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions>();
      const config = await loadConfig({
        rootDir: options.root,
        configPath: options.config,
        cacheDir: options.cacheDir,
        scratchDir: options.scratchDir,
      });

      for (const dataset of config.datasets) {
        console.log(`${dataset.id.padEnd(18)} ${dataset.name}`);
        console.log(`${''.padEnd(18)} ${dataset.url}`);
        console.log(`${''.padEnd(18)} ${dataset.attribution}${dataset.license ? ` (${dataset.license})` : ''}`);
      }
    });
}
