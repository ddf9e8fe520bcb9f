/**
 * doctor
 *
 * Check that the external programs the pipelines call are installed.
 */
import type { Command } from 'commander';
import { checkPrerequisites } from '../../core/command.js';
import { ConfigError } from '../../core/errors.js';
import { loadConfig } from '../../config/config.js';
import type { CliDependencies, GlobalOptions } from '../session.js';

const INSTALL_HINTS: Record<string, string> = {
  curl: 'apt install curl',
  unzip: 'apt install unzip',
  osmium: 'apt install osmium-tool (https://osmcode.org/osmium-tool/)',
  ogr2ogr: 'apt install gdal-bin',
};

export function registerDoctorCommand(program: Command, deps: CliDependencies): void {
  program
    .command('doctor')
    .description('Check that curl, unzip, osmium, ogr2ogr and csv2geojson are installed')
    .action(async (_options: object, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions>();
      const config = await loadConfig({ rootDir: options.root, configPath: options.config });
      const programs = ['curl', 'unzip', 'osmium', 'ogr2ogr', config.facilities.converter];

      const report = await checkPrerequisites(programs, deps.runner);
      for (const name of report.available) console.log(`  ok       ${name}`);
      for (const name of report.missing) {
        const hint = INSTALL_HINTS[name];
        console.log(`  missing  ${name}${hint ? `  (${hint})` : ''}`);
      }

      if (report.missing.length > 0) {
        throw new ConfigError(`Missing programs: ${report.missing.join(', ')}`);
      }
    });
}
