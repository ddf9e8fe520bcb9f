/**
 * Health-facility geocoder: turn the CNES establishment table into GeoJSON
 * (or GeoJSON text sequences) with the external csv2geojson converter, then
 * into a GeoPackage.
 *
 * Filter expressions are handed to the converter untouched.
 */
import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Csv2GeoJsonOptions, GeoJsonOutputType } from '../core/command.js';
import { csv2geojsonCommand, ogr2ogrGpkgCommand } from '../core/command.js';
import { ConfigError, ConversionFailedError } from '../core/errors.js';
import type { PipelineContext, StageResult } from '../core/stage.js';
import { runConversion, stageArtifact, withBanner } from '../core/stage.js';
import type { StagerConfig } from '../config/config.js';
import { getUf } from '../registry/ufs.js';

// ============================================================================
// Types
// ============================================================================

export interface FacilitiesOptions {
  input?: string;
  format?: GeoJsonOutputType;
  /** State abbreviation; adds `<ufColumn>=<IBGE code>` and an output suffix */
  uf?: string;
  containAnd?: readonly string[];
  containOr?: readonly string[];
  geopackage?: boolean;
  ignoreWarnings?: boolean;
}

export interface FacilitiesPlan {
  converter: Csv2GeoJsonOptions;
  layerName: string;
  destination: string;
  geopackage: string | null;
}

export type FacilitiesResult = StageResult & { geopackage: string | null };

// ============================================================================
// Planning
// ============================================================================

function checkExpressions(kind: string, expressions: readonly string[]): void {
  for (const expr of expressions) {
    if (expr.trim() === '') {
      throw new ConfigError(`--${kind} expressions must not be empty`);
    }
  }
}

/**
 * Short tag naming custom filters and a non-default input in the output
 * file name. Expression order does not matter.
 */
export function selectionTag(
  containAnd: readonly string[],
  containOr: readonly string[],
  input: string | null
): string | null {
  if (containAnd.length === 0 && containOr.length === 0 && input === null) return null;

  const key = JSON.stringify({
    and: [...containAnd].sort(),
    or: [...containOr].sort(),
    input,
  });
  return createHash('sha256').update(key).digest('hex').slice(0, 8);
}

export function outputExtension(format: GeoJsonOutputType): string {
  return format === 'GeoJSON' ? 'geojson' : 'geojsonl';
}

export function planFacilities(config: StagerConfig, options: FacilitiesOptions = {}): FacilitiesPlan {
  const settings = config.facilities;
  const format = options.format ?? settings.format;
  const containAnd = [...(options.containAnd ?? [])];
  const containOr = [...(options.containOr ?? [])];

  checkExpressions('contain-and', containAnd);
  checkExpressions('contain-or', containOr);

  const input = options.input ? resolve(options.input) : settings.input;
  const tag = selectionTag(containAnd, containOr, input === settings.input ? null : input);

  let layerName = settings.outputName;
  if (tag) {
    layerName = `${layerName}_${tag}`;
  }
  if (options.uf) {
    const uf = getUf(options.uf);
    containAnd.push(`${settings.ufColumn}=${uf.codigo}`);
    layerName = `${layerName}_${uf.sigla}`;
  }

  const destination = join(config.scratchDir, `${layerName}.${outputExtension(format)}`);
  const geopackage =
    options.geopackage === false ? null : join(config.scratchDir, `${layerName}.gpkg`);

  return {
    converter: {
      converter: settings.converter,
      input,
      latitude: settings.latitude,
      longitude: settings.longitude,
      delimiter: settings.delimiter,
      encoding: settings.encoding,
      outputType: format,
      ignoreWarnings: options.ignoreWarnings ?? true,
      containAnd,
      containOr,
    },
    layerName,
    destination,
    geopackage,
  };
}

// ============================================================================
// Pipeline
// ============================================================================

export async function geocodeFacilities(
  config: StagerConfig,
  options: FacilitiesOptions,
  ctx: PipelineContext
): Promise<FacilitiesResult> {
  const plan = planFacilities(config, options);
  const step = 'facilities';
  const { geopackage } = plan;

  return withBanner(step, ctx.logger, async () => {
    const result = await stageArtifact(
      {
        step,
        destination: plan.destination,
        source: plan.converter.input,
        produce: async (tempPath) => {
          if (!existsSync(plan.converter.input)) {
            throw new ConversionFailedError(
              step,
              plan.destination,
              `registry CSV not found at ${plan.converter.input}; run "stage datasus-cnes" first`
            );
          }
          await runConversion(step, plan.destination, csv2geojsonCommand(plan.converter, tempPath), ctx);
        },
        postProcess: geopackage
          ? (converted) =>
              runConversion(
                step,
                geopackage,
                ogr2ogrGpkgCommand(geopackage, converted, {
                  overwrite: true,
                  layerName: plan.layerName,
                }),
                ctx
              )
          : undefined,
      },
      ctx
    );

    return { ...result, geopackage };
  });
}
