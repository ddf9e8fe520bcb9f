/**
 * inspect <shapefile>
 */
import type { Command } from 'commander';
import { formatSummary, inspectShapefile } from '../../pipelines/inspect.js';

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Summarize a shapefile (features, geometry types, fields)')
    .argument('<shapefile>', 'path to the .shp file')
    .action(async (path: string) => {
      const summary = await inspectShapefile(path);
      for (const line of formatSummary(path, summary)) console.log(line);
    });
}
