/**
 * Convert the unpacked IBGE boundary shapefiles to GeoPackages, one layer
 * each, named after the shapefile.
 */
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ogr2ogrGpkgCommand } from '../core/command.js';
import { ConversionFailedError } from '../core/errors.js';
import type { PipelineContext, StageResult } from '../core/stage.js';
import { runConversion, runSteps, stageArtifact, withBanner } from '../core/stage.js';
import type { StagerConfig } from '../config/config.js';
import type { DatasetDescriptor } from '../registry/datasets.js';
import { extractDirectory } from './stage-datasets.js';

export type ShapefileConversionResult = StageResult & { dataset: string; layer: string };

export function shapefilePath(config: StagerConfig, dataset: DatasetDescriptor): string | null {
  if (!dataset.shapefile) return null;
  const directory = dataset.extract ? extractDirectory(config, dataset.extract) : config.cacheDir;
  return join(directory, `${dataset.shapefile}.shp`);
}

async function convertShapefile(
  config: StagerConfig,
  dataset: DatasetDescriptor,
  layer: string,
  shp: string,
  ctx: PipelineContext
): Promise<ShapefileConversionResult> {
  const step = `ibge-geopackage:${dataset.id}`;
  const destination = join(config.scratchDir, `${layer}.gpkg`);

  const result = await stageArtifact(
    {
      step,
      destination,
      source: shp,
      produce: async (tempPath) => {
        if (!existsSync(shp)) {
          throw new ConversionFailedError(
            step,
            destination,
            `shapefile not found at ${shp}; run "stage ${dataset.id}" first`
          );
        }
        await runConversion(step, destination, ogr2ogrGpkgCommand(tempPath, shp, { layerName: layer }), ctx);
      },
    },
    ctx
  );

  return { ...result, dataset: dataset.id, layer };
}

export async function convertIbgeShapefiles(
  config: StagerConfig,
  ctx: PipelineContext
): Promise<ShapefileConversionResult[]> {
  return withBanner('ibge-geopackage', ctx.logger, () => {
    const steps = config.datasets.flatMap((dataset) => {
      const shp = shapefilePath(config, dataset);
      if (!shp || !dataset.shapefile) return [];
      const layer = dataset.shapefile;
      return [() => convertShapefile(config, dataset, layer, shp, ctx)];
    });
    return runSteps(steps);
  });
}
