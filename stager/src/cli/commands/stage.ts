/**
 * stage [datasets...]
 *
 * Download (and unpack) datasets into the cache. Without arguments every
 * configured dataset is staged, in configuration order.
 */
import type { Command } from 'commander';
import { stageDatasets } from '../../pipelines/stage-datasets.js';
import { describeResult } from '../output.js';
import type { CliDependencies } from '../session.js';
import { withSession } from '../session.js';

export function registerStageCommand(program: Command, deps: CliDependencies): void {
  program
    .command('stage')
    .description('Download and unpack datasets into the cache directory')
    .argument('[datasets...]', 'dataset ids (default: all)')
    .action(async (datasets: string[], _options: object, command: Command) => {
      await withSession(command, deps, async ({ config, ctx }) => {
        const results = await stageDatasets(config, datasets, ctx);
        if (!command.optsWithGlobals<{ quiet?: boolean }>().quiet) {
          for (const result of results) {
            console.log(describeResult(result.dataset, result));
          }
        }
      });
    });
}
