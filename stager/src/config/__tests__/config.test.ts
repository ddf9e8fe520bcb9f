/**
 * Unit tests for configuration loading and validation.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from '../../core/errors.js';
import { DEFAULT_RETRY } from '../../core/transport.js';
import { DEFAULT_CONFIG_FILE, buildConfig, loadConfig, parseConfigFile } from '../config.js';
import { makeTempDir, removeDir } from '../../__tests__/support.js';

// ============================================================================
// buildConfig
// ============================================================================

describe('buildConfig', () => {
  it('fills in defaults under the root directory', () => {
    const config = buildConfig({}, { rootDir: '/work' });

    expect(config.rootDir).toBe('/work');
    expect(config.cacheDir).toBe('/work/data/cache');
    expect(config.scratchDir).toBe('/work/data/tmp');
    expect(config.datasets.map((d) => d.id)).toEqual([
      'osm-brasil',
      'ibge-uf',
      'ibge-municipios',
      'datasus-cnes',
    ]);
    expect(config.boundaries).toEqual({
      source: 'osm-brasil',
      levels: [
        { level: 4, name: 'brasil-uf' },
        { level: 8, name: 'brasil-municipios' },
      ],
      exportGeoJsonSeq: false,
    });
    expect(config.facilities.input).toBe('/work/data/tmp/tbEstabelecimento202302.csv');
    expect(config.facilities.format).toBe('GeoJSONSeq');
    expect(config.retry).toEqual(DEFAULT_RETRY);
  });

  it('prefers overrides to the file and resolves them against the root', () => {
    const config = buildConfig(
      { cacheDir: '/elsewhere/cache', scratchDir: 'scratch' },
      { rootDir: '/work', cacheDir: 'cache' }
    );

    expect(config.cacheDir).toBe('/work/cache');
    expect(config.scratchDir).toBe('/work/scratch');
  });

  it('merges partial sections over the defaults', () => {
    const config = buildConfig(
      {
        boundaries: { exportGeoJsonSeq: true },
        facilities: { input: '/srv/registry.csv', converter: './bin/csv2geojson' },
        retry: { maxRetries: 0 },
      },
      { rootDir: '/work' }
    );

    expect(config.boundaries.exportGeoJsonSeq).toBe(true);
    expect(config.boundaries.levels).toHaveLength(2);
    expect(config.facilities.input).toBe('/srv/registry.csv');
    expect(config.facilities.converter).toBe('./bin/csv2geojson');
    expect(config.facilities.delimiter).toBe(';');
    expect(config.retry).toEqual({ ...DEFAULT_RETRY, maxRetries: 0 });
  });

  it('rejects duplicate dataset ids', () => {
    const dataset = {
      id: 'osm',
      name: 'OSM',
      url: 'https://download.example.org/a.osm.pbf',
      fileName: 'a.osm.pbf',
      attribution: 'example',
    };

    expect(() =>
      buildConfig({ datasets: [dataset, dataset], boundaries: { source: 'osm' } })
    ).toThrow(new ConfigError('Duplicate dataset id: osm'));
  });

  it('rejects a boundary source that is not a dataset', () => {
    expect(() => buildConfig({ boundaries: { source: 'osm-chile' } })).toThrow(
      'boundaries.source refers to unknown dataset: osm-chile'
    );
  });
});

// ============================================================================
// parseConfigFile
// ============================================================================

describe('parseConfigFile', () => {
  it('accepts an empty object', () => {
    expect(parseConfigFile({}, 'test.json')).toEqual({});
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfigFile({ cacheDirectory: 'x' }, 'test.json')).toThrow(ConfigError);
  });

  it('names the offending field', () => {
    expect(() => parseConfigFile({ retry: { maxRetries: -1 } }, 'test.json')).toThrow(
      /Invalid configuration in test\.json:\n {2}retry\.maxRetries: /
    );
  });

  it('rejects dataset file names containing a directory', () => {
    const raw = {
      datasets: [
        {
          id: 'osm',
          name: 'OSM',
          url: 'https://download.example.org/a.osm.pbf',
          fileName: '../a.osm.pbf',
          attribution: 'example',
        },
      ],
    };

    expect(() => parseConfigFile(raw, 'test.json')).toThrow(
      'datasets.0.fileName: must be a plain file name'
    );
  });

  it('rejects an unsupported output format', () => {
    expect(() => parseConfigFile({ facilities: { format: 'KML' } }, 'test.json')).toThrow(
      /facilities\.format/
    );
  });
});

// ============================================================================
// loadConfig
// ============================================================================

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('uses defaults when no file is present', async () => {
    const config = await loadConfig({ rootDir: root });

    expect(config.cacheDir).toBe(join(root, 'data/cache'));
  });

  it('reads the configuration file from the root', async () => {
    await writeFile(
      join(root, DEFAULT_CONFIG_FILE),
      JSON.stringify({ scratchDir: 'scratch', facilities: { ufColumn: 'CO_UF' } })
    );

    const config = await loadConfig({ rootDir: root });

    expect(config.scratchDir).toBe(join(root, 'scratch'));
    expect(config.facilities.ufColumn).toBe('CO_UF');
    expect(config.facilities.input).toBe(join(root, 'scratch', 'tbEstabelecimento202302.csv'));
  });

  it('reads an explicit --config path relative to the root', async () => {
    await writeFile(join(root, 'alt.json'), JSON.stringify({ cacheDir: 'alt-cache' }));

    const config = await loadConfig({ rootDir: root, configPath: 'alt.json' });

    expect(config.cacheDir).toBe(join(root, 'alt-cache'));
  });

  it('reports a missing explicit file', async () => {
    await expect(loadConfig({ rootDir: root, configPath: 'missing.json' })).rejects.toThrow(
      `Cannot read configuration ${join(root, 'missing.json')}`
    );
  });

  it('reports malformed JSON', async () => {
    await writeFile(join(root, DEFAULT_CONFIG_FILE), '{ "cacheDir": ');

    await expect(loadConfig({ rootDir: root })).rejects.toThrow(
      `Configuration ${join(root, DEFAULT_CONFIG_FILE)} is not valid JSON`
    );
  });
});
