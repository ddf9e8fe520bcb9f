/**
 * status [--verify] [--concurrency n] [--ledger] [--prune]
 */
import type { Command } from 'commander';
import {
  collectStatus,
  findLeftovers,
  formatLedger,
  formatLeftovers,
  formatStatus,
  pruneLedger,
} from '../../pipelines/status.js';
import { parsePositiveInt } from '../output.js';
import type { CliDependencies } from '../session.js';
import { withSession } from '../session.js';

interface StatusCliOptions {
  verify?: boolean;
  concurrency?: number;
  ledger?: boolean;
  prune?: boolean;
}

export function registerStatusCommand(program: Command, deps: CliDependencies): void {
  program
    .command('status')
    .description('Show which artifacts are staged')
    .option('--concurrency <n>', 'files hashed in parallel with --verify', parsePositiveInt, 2)
    .option('--ledger', 'list recorded checksums instead of known artifacts')
    .option('--prune', 'forget recorded checksums of files that no longer exist')
    .action(async (_options: object, command: Command) => {
      const options = command.optsWithGlobals<StatusCliOptions>();

      await withSession(command, deps, async ({ config, ledger }) => {
        if (options.prune) {
          for (const entry of pruneLedger(ledger)) console.log(`pruned     ${entry.path}`);
        }

        if (options.ledger) {
          for (const line of formatLedger(ledger.list())) console.log(line);
          return;
        }

        const rows = await collectStatus(config, ledger, {
          verify: options.verify,
          concurrency: options.concurrency,
        });
        for (const line of formatStatus(rows)) console.log(line);
        for (const line of formatLeftovers(await findLeftovers(config))) console.log(line);
      });
    });
}
