/**
 * Stager configuration.
 *
 * Everything a pipeline needs is carried in one StagerConfig value built
 * from defaults, an optional JSON file, and CLI overrides.
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import type { GeoJsonOutputType } from '../core/command.js';
import { ConfigError } from '../core/errors.js';
import type { RetryOptions } from '../core/transport.js';
import { DEFAULT_RETRY } from '../core/transport.js';
import type { BoundaryLevel, DatasetDescriptor } from '../registry/datasets.js';
import {
  DEFAULT_BOUNDARY_LEVELS,
  DEFAULT_DATASETS,
  OSM_BRASIL,
} from '../registry/datasets.js';

// ============================================================================
// Types
// ============================================================================

export interface BoundariesConfig {
  /** Dataset id of the country-wide OSM extract */
  source: string;
  levels: BoundaryLevel[];
  exportGeoJsonSeq: boolean;
}

export interface FacilitiesConfig {
  /** csv2geojson executable */
  converter: string;
  /** Registry CSV, absolute */
  input: string;
  latitude: string;
  longitude: string;
  delimiter: string;
  encoding: string;
  /** Column holding the IBGE UF code, used by UF filters */
  ufColumn: string;
  /** Base name for outputs in the scratch directory */
  outputName: string;
  format: GeoJsonOutputType;
}

export interface StagerConfig {
  rootDir: string;
  cacheDir: string;
  scratchDir: string;
  datasets: DatasetDescriptor[];
  boundaries: BoundariesConfig;
  facilities: FacilitiesConfig;
  retry: RetryOptions;
}

export interface ConfigOverrides {
  rootDir?: string;
  configPath?: string;
  cacheDir?: string;
  scratchDir?: string;
}

export const DEFAULT_CONFIG_FILE = 'conflacao.config.json';

// ============================================================================
// File Schema
// ============================================================================

const fileName = z
  .string()
  .min(1)
  .refine((value) => !value.includes('/') && !value.includes('\\'), {
    message: 'must be a plain file name',
  });

const datasetSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    url: z.string().url(),
    fileName,
    extract: z
      .object({
        into: z.enum(['cache', 'scratch']),
        members: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),
    shapefile: z.string().min(1).optional(),
    attribution: z.string(),
    license: z.string().optional(),
  })
  .strict();

const configFileSchema = z
  .object({
    cacheDir: z.string().min(1).optional(),
    scratchDir: z.string().min(1).optional(),
    datasets: z.array(datasetSchema).min(1).optional(),
    boundaries: z
      .object({
        source: z.string().min(1),
        levels: z
          .array(z.object({ level: z.number().int().min(1).max(11), name: fileName }).strict())
          .min(1),
        exportGeoJsonSeq: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
    facilities: z
      .object({
        converter: z.string().min(1),
        input: z.string().min(1),
        latitude: z.string().min(1),
        longitude: z.string().min(1),
        delimiter: z.string().min(1),
        encoding: z.string().min(1),
        ufColumn: z.string().min(1),
        outputName: fileName,
        format: z.enum(['GeoJSON', 'GeoJSONSeq']),
      })
      .partial()
      .strict()
      .optional(),
    retry: z
      .object({
        maxRetries: z.number().int().min(0),
        baseDelayMs: z.number().int().min(0),
        maxDelayMs: z.number().int().min(0),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Defaults
// ============================================================================

// input is relative to the scratch directory until buildConfig resolves it
const DEFAULT_FACILITIES: FacilitiesConfig = {
  converter: 'csv2geojson',
  input: 'tbEstabelecimento202302.csv',
  latitude: 'NU_LATITUDE',
  longitude: 'NU_LONGITUDE',
  delimiter: ';',
  encoding: 'latin-1',
  ufColumn: 'CO_ESTADO_GESTOR',
  outputName: 'DATASUS-tbEstabelecimento',
  format: 'GeoJSONSeq',
};

function resolveFrom(base: string, path: string): string {
  return isAbsolute(path) ? path : resolve(base, path);
}

/**
 * Turn a validated file (possibly empty) into a complete configuration.
 */
export function buildConfig(
  file: ConfigFile,
  overrides: Omit<ConfigOverrides, 'configPath'> = {}
): StagerConfig {
  const rootDir = resolve(overrides.rootDir ?? process.cwd());
  const cacheDir = resolveFrom(rootDir, overrides.cacheDir ?? file.cacheDir ?? 'data/cache');
  const scratchDir = resolveFrom(rootDir, overrides.scratchDir ?? file.scratchDir ?? 'data/tmp');

  const declared: readonly DatasetDescriptor[] = file.datasets ?? DEFAULT_DATASETS;
  const datasets = declared.map((d) => ({ ...d }));
  const ids = new Set<string>();
  for (const dataset of datasets) {
    if (ids.has(dataset.id)) {
      throw new ConfigError(`Duplicate dataset id: ${dataset.id}`);
    }
    ids.add(dataset.id);
  }

  const boundaries: BoundariesConfig = {
    source: OSM_BRASIL.id,
    levels: DEFAULT_BOUNDARY_LEVELS.map((l) => ({ ...l })),
    exportGeoJsonSeq: false,
    ...file.boundaries,
  };
  if (!ids.has(boundaries.source)) {
    throw new ConfigError(`boundaries.source refers to unknown dataset: ${boundaries.source}`);
  }

  const facilitySettings = { ...DEFAULT_FACILITIES, ...file.facilities };

  return {
    rootDir,
    cacheDir,
    scratchDir,
    datasets,
    boundaries,
    facilities: {
      ...facilitySettings,
      input: resolveFrom(scratchDir, facilitySettings.input),
    },
    retry: { ...DEFAULT_RETRY, ...file.retry },
  };
}

export function parseConfigFile(raw: unknown, origin: string): ConfigFile {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration in ${origin}:\n${issues}`);
  }
  return parsed.data;
}

async function readConfigFile(path: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read configuration ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Configuration ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseConfigFile(raw, path);
}

/**
 * Load configuration: explicit --config file, else conflacao.config.json in
 * the root when present, else built-in defaults.
 */
export async function loadConfig(overrides: ConfigOverrides = {}): Promise<StagerConfig> {
  const rootDir = resolve(overrides.rootDir ?? process.cwd());

  let file: ConfigFile = {};
  if (overrides.configPath) {
    file = await readConfigFile(resolveFrom(rootDir, overrides.configPath));
  } else {
    const implicit = join(rootDir, DEFAULT_CONFIG_FILE);
    if (existsSync(implicit)) {
      file = await readConfigFile(implicit);
    }
  }

  return buildConfig(file, { ...overrides, rootDir });
}
