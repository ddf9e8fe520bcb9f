/**
 * conflacao CLI
 *
 * Stages the datasets used to conflate Brazilian health facilities and
 * administrative boundaries with OpenStreetMap. Each former script section
 * is a subcommand:
 *
 *   conflacao stage [datasets...]     download and unpack into data/cache
 *   conflacao boundaries              admin_level 4/8 extracts + GeoPackages
 *   conflacao facilities --uf SC      CNES registry -> GeoJSON -> GeoPackage
 *   conflacao status | inspect | doctor | datasets
 */
import { Command } from 'commander';
import { spawnRunner } from '../core/command.js';
import { createLogger } from '../core/logger.js';
import { registerBoundariesCommand } from './commands/boundaries.js';
import { registerDatasetsCommand } from './commands/datasets.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { registerFacilitiesCommand } from './commands/facilities.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerStageCommand } from './commands/stage.js';
import { registerStatusCommand } from './commands/status.js';
import type { CliDependencies } from './session.js';

export const CLI_NAME = 'conflacao';
export const CLI_VERSION = '1.0.0';

export function createProgram(deps: CliDependencies): Command {
  const program = new Command(CLI_NAME)
    .version(CLI_VERSION)
    .description('Stage OSM, IBGE and DATASUS data for conflation')
    .option('--root <dir>', 'working root (default: current directory)')
    .option('--config <file>', 'JSON configuration file')
    .option('--cache-dir <dir>', 'directory for downloaded archives')
    .option('--scratch-dir <dir>', 'directory for derived artifacts')
    .option('--verify', 're-check staged files against recorded checksums')
    .option('-q, --quiet', 'only print errors')
    .option('--no-color', 'disable coloured banners');

  registerStageCommand(program, deps);
  registerBoundariesCommand(program, deps);
  registerFacilitiesCommand(program, deps);
  registerStatusCommand(program, deps);
  registerInspectCommand(program);
  registerDoctorCommand(program, deps);
  registerDatasetsCommand(program);

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram({
    runner: spawnRunner,
    isTTY: Boolean(process.stdout.isTTY),
  });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    createLogger().error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
