/**
 * Boundary extractor: split the country-wide OSM extract into one derived
 * extract per administrative level and convert each to a GeoPackage.
 *
 * @see https://wiki.openstreetmap.org/wiki/Tag:boundary%3Dadministrative
 */
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import {
  ogr2ogrGpkgCommand,
  osmiumExportCommand,
  osmiumTagsFilterCommand,
} from '../core/command.js';
import { ConversionFailedError } from '../core/errors.js';
import type { PipelineContext, StageResult } from '../core/stage.js';
import { runConversion, runSteps, stageArtifact, withBanner } from '../core/stage.js';
import type { StagerConfig } from '../config/config.js';
import type { BoundaryLevel } from '../registry/datasets.js';
import { getDataset } from '../registry/datasets.js';
import { datasetPath } from './stage-datasets.js';

export interface BoundaryPaths {
  extract: string;
  geopackage: string;
  geojsonseq: string;
}

export interface BoundaryResult {
  level: number;
  name: string;
  extract: StageResult;
  geopackage: string;
  geojsonseq: StageResult | null;
}

export interface BoundaryOptions {
  /** Overrides boundaries.exportGeoJsonSeq from the configuration */
  exportGeoJsonSeq?: boolean;
}

export function boundaryPaths(config: StagerConfig, level: BoundaryLevel): BoundaryPaths {
  return {
    extract: join(config.scratchDir, `${level.name}.osm.pbf`),
    geopackage: join(config.scratchDir, `${level.name}.gpkg`),
    geojsonseq: join(config.scratchDir, `${level.name}.osm.geojsonseq`),
  };
}

export function boundarySourcePath(config: StagerConfig): string {
  return datasetPath(config, getDataset(config.datasets, config.boundaries.source));
}

async function extractLevel(
  config: StagerConfig,
  source: string,
  level: BoundaryLevel,
  exportGeoJsonSeq: boolean,
  ctx: PipelineContext
): Promise<BoundaryResult> {
  const step = `boundaries:${level.name}`;
  const paths = boundaryPaths(config, level);

  // Each level keeps its own guard; the GeoPackage is derived only when the
  // filtered extract is first produced.
  const extract = await stageArtifact(
    {
      step,
      destination: paths.extract,
      source,
      produce: (tempPath) =>
        runConversion(step, paths.extract, osmiumTagsFilterCommand(source, level.level, tempPath), ctx),
      postProcess: (filtered) =>
        runConversion(
          step,
          paths.geopackage,
          ogr2ogrGpkgCommand(paths.geopackage, filtered, { overwrite: true }),
          ctx
        ),
    },
    ctx
  );

  let geojsonseq: StageResult | null = null;
  if (exportGeoJsonSeq) {
    geojsonseq = await stageArtifact(
      {
        step,
        destination: paths.geojsonseq,
        source: paths.extract,
        produce: (tempPath) =>
          runConversion(step, paths.geojsonseq, osmiumExportCommand(paths.extract, tempPath), ctx),
      },
      ctx
    );
  }

  return {
    level: level.level,
    name: level.name,
    extract,
    geopackage: paths.geopackage,
    geojsonseq,
  };
}

export async function extractBoundaries(
  config: StagerConfig,
  ctx: PipelineContext,
  options: BoundaryOptions = {}
): Promise<BoundaryResult[]> {
  const exportGeoJsonSeq = options.exportGeoJsonSeq ?? config.boundaries.exportGeoJsonSeq;

  return withBanner('boundaries', ctx.logger, async () => {
    const source = boundarySourcePath(config);
    if (!existsSync(source)) {
      throw new ConversionFailedError(
        'boundaries',
        source,
        `OSM extract not found at ${source}; run "stage ${config.boundaries.source}" first`
      );
    }

    return runSteps(
      config.boundaries.levels.map(
        (level) => () => extractLevel(config, source, level, exportGeoJsonSeq, ctx)
      )
    );
  });
}
