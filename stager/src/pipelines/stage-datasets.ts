/**
 * Bulk dataset stager: download each dataset into the cache once and
 * unpack archives where the dataset asks for it.
 */
import { join } from 'node:path';
import { unzipCommand } from '../core/command.js';
import type { PipelineContext, StageResult } from '../core/stage.js';
import { fetchAndStage, runConversion, runSteps, withBanner } from '../core/stage.js';
import type { StagerConfig } from '../config/config.js';
import type { DatasetDescriptor, ExtractSettings } from '../registry/datasets.js';
import { selectDatasets } from '../registry/datasets.js';

export type DatasetStageResult = StageResult & { dataset: string };

export function datasetPath(config: StagerConfig, dataset: DatasetDescriptor): string {
  return join(config.cacheDir, dataset.fileName);
}

export function extractDirectory(config: StagerConfig, extract: ExtractSettings): string {
  return extract.into === 'cache' ? config.cacheDir : config.scratchDir;
}

export async function stageDataset(
  config: StagerConfig,
  dataset: DatasetDescriptor,
  ctx: PipelineContext
): Promise<DatasetStageResult> {
  const step = `stage:${dataset.id}`;

  return withBanner(step, ctx.logger, async () => {
    const destination = datasetPath(config, dataset);
    const { extract } = dataset;

    const result = await fetchAndStage(
      {
        step,
        destination,
        url: dataset.url,
        postProcess: extract
          ? (archive) =>
              runConversion(
                step,
                destination,
                unzipCommand(archive, extractDirectory(config, extract), extract.members),
                ctx
              )
          : undefined,
      },
      ctx
    );

    return { ...result, dataset: dataset.id };
  });
}

/**
 * Stage the given datasets (all of them when `ids` is empty), in order.
 * Unknown ids are rejected before anything is downloaded.
 */
export async function stageDatasets(
  config: StagerConfig,
  ids: readonly string[],
  ctx: PipelineContext
): Promise<DatasetStageResult[]> {
  const selected = selectDatasets(config.datasets, ids);
  return runSteps(selected.map((dataset) => () => stageDataset(config, dataset, ctx)));
}
