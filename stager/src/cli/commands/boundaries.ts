/**
 * boundaries [--geojsonseq] [--ibge]
 *
 * Split the OSM extract by admin_level into GeoPackages, or with --ibge
 * convert the unpacked IBGE shapefiles instead.
 */
import type { Command } from 'commander';
import { extractBoundaries } from '../../pipelines/boundaries.js';
import { convertIbgeShapefiles } from '../../pipelines/ibge-geopackage.js';
import { describeResult } from '../output.js';
import type { CliDependencies } from '../session.js';
import { withSession } from '../session.js';

interface BoundariesCliOptions {
  ibge?: boolean;
  geojsonseq?: boolean;
  quiet?: boolean;
}

export function registerBoundariesCommand(program: Command, deps: CliDependencies): void {
  program
    .command('boundaries')
    .description('Extract administrative boundaries (admin_level 4 and 8) from the OSM extract')
    .option('--geojsonseq', 'also export each level as GeoJSON text sequences')
    .option('--ibge', 'convert the IBGE shapefiles to GeoPackage instead')
    .action(async (_options: object, command: Command) => {
      const options = command.optsWithGlobals<BoundariesCliOptions>();

      await withSession(command, deps, async ({ config, ctx }) => {
        if (options.ibge) {
          const results = await convertIbgeShapefiles(config, ctx);
          if (!options.quiet) {
            for (const result of results) console.log(describeResult(result.layer, result));
          }
          return;
        }

        const results = await extractBoundaries(config, ctx, {
          exportGeoJsonSeq: options.geojsonseq ? true : undefined,
        });
        if (!options.quiet) {
          for (const result of results) {
            console.log(describeResult(`${result.name} (admin_level=${result.level})`, result.extract));
            if (result.geojsonseq) console.log(describeResult(`${result.name} geojsonseq`, result.geojsonseq));
          }
        }
      });
    });
}
