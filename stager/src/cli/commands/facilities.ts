/**
 * facilities [options]
 *
 * Geocode the CNES establishment table with csv2geojson and load the
 * result into a GeoPackage.
 *
 * Examples:
 *   conflacao facilities --uf SC
 *   conflacao facilities --format GeoJSON --contain-and CO_ESTADO_GESTOR=42
 */
import { Option } from 'commander';
import type { Command } from 'commander';
import type { GeoJsonOutputType } from '../../core/command.js';
import { geocodeFacilities } from '../../pipelines/facilities.js';
import { collect, describeResult } from '../output.js';
import type { CliDependencies } from '../session.js';
import { withSession } from '../session.js';

interface FacilitiesCliOptions {
  input?: string;
  format?: GeoJsonOutputType;
  uf?: string;
  containAnd: string[];
  containOr: string[];
  geopackage: boolean;
  strictWarnings?: boolean;
  quiet?: boolean;
}

export function registerFacilitiesCommand(program: Command, deps: CliDependencies): void {
  program
    .command('facilities')
    .description('Convert the health-facility registry to GeoJSON and GeoPackage')
    .option('--input <csv>', 'registry CSV (default from configuration)')
    .addOption(
      new Option('--format <type>', 'converter output type').choices(['GeoJSON', 'GeoJSONSeq'])
    )
    .option('--uf <sigla>', 'only facilities managed by this state, e.g. SC')
    .option('--contain-and <expr>', 'column=value clause all rows must match (repeatable)', collect, [])
    .option('--contain-or <expr>', 'column=value clause any row may match (repeatable)', collect, [])
    .option('--no-geopackage', 'skip the GeoPackage conversion')
    .option('--strict-warnings', 'let the converter report rows without coordinates')
    .action(async (_options: object, command: Command) => {
      const options = command.optsWithGlobals<FacilitiesCliOptions>();

      await withSession(command, deps, async ({ config, ctx }) => {
        const result = await geocodeFacilities(
          config,
          {
            input: options.input,
            format: options.format,
            uf: options.uf,
            containAnd: options.containAnd,
            containOr: options.containOr,
            geopackage: options.geopackage,
            ignoreWarnings: !options.strictWarnings,
          },
          ctx
        );
        if (!options.quiet) {
          console.log(describeResult('facilities', result));
          if (result.geopackage) console.log(`  geopackage: ${result.geopackage}`);
        }
      });
    });
}
