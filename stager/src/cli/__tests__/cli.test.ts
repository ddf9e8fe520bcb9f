/**
 * End-to-end tests for the CLI wiring, with fake tools and transport.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CommandFailedError, ConfigError } from '../../core/errors.js';
import { LEDGER_FILE_NAME } from '../../core/ledger.js';
import { selectionTag } from '../../pipelines/facilities.js';
import { createProgram, main } from '../index.js';
import { parsePositiveInt } from '../output.js';
import { RecordingRunner, makeTempDir, removeDir } from '../../__tests__/support.js';

let root: string;
let runner: RecordingRunner;
let download: ReturnType<typeof fakeDownload>;

function fakeDownload() {
  return vi.fn(async (_url: string, destination: string) => {
    await writeFile(destination, 'payload');
  });
}

beforeEach(async () => {
  root = await makeTempDir();
  runner = new RecordingRunner();
  download = fakeDownload();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await removeDir(root);
});

async function run(...args: string[]): Promise<void> {
  const program = createProgram({
    runner,
    isTTY: false,
    createTransport: () => ({ download }),
  });
  await program.parseAsync(['node', 'conflacao', '--root', root, '--quiet', ...args]);
}

describe('conflacao stage', () => {
  it('stages the named dataset and opens the ledger in the cache', async () => {
    await run('stage', 'osm-brasil');

    expect(download).toHaveBeenCalledTimes(1);
    expect(download.mock.calls[0][0]).toBe(
      'https://download.geofabrik.de/south-america/brazil-latest.osm.pbf'
    );
    expect(existsSync(join(root, 'data/cache/brasil.osm.pbf'))).toBe(true);
    expect(existsSync(join(root, 'data/cache', LEDGER_FILE_NAME))).toBe(true);
  });

  it('honours --cache-dir', async () => {
    await run('--cache-dir', 'elsewhere', 'stage', 'osm-brasil');

    expect(existsSync(join(root, 'elsewhere/brasil.osm.pbf'))).toBe(true);
  });

  it('rejects an unknown dataset', async () => {
    await expect(run('stage', 'osm-chile')).rejects.toBeInstanceOf(ConfigError);
    expect(download).not.toHaveBeenCalled();
  });
});

describe('conflacao facilities', () => {
  it('passes UF and filter options through to the converter', async () => {
    const scratch = join(root, 'data/tmp');
    await mkdir(scratch, { recursive: true });
    await writeFile(join(scratch, 'tbEstabelecimento202302.csv'), 'CO_UNIDADE\n');

    await run(
      'facilities',
      '--uf',
      'SC',
      '--contain-and',
      'TP_UNIDADE=05',
      '--no-geopackage',
      '--strict-warnings'
    );

    expect(runner.commands).toHaveLength(1);
    expect(runner.commands[0].args).toEqual([
      '--lat=NU_LATITUDE',
      '--lon=NU_LONGITUDE',
      '--delimiter=;',
      '--encoding=latin-1',
      '--output-type=GeoJSONSeq',
      '--contain-and=TP_UNIDADE=05',
      '--contain-and=CO_ESTADO_GESTOR=42',
      join(scratch, 'tbEstabelecimento202302.csv'),
    ]);
    const tag = selectionTag(['TP_UNIDADE=05'], [], null);
    expect(existsSync(join(scratch, `DATASUS-tbEstabelecimento_${tag}_SC.geojsonl`))).toBe(true);
  });
});

describe('conflacao status', () => {
  it('prunes ledger entries of deleted files and lists the rest', async () => {
    await run('stage', 'osm-brasil', 'ibge-uf');
    await rm(join(root, 'data/cache/BR_UF.zip'));
    vi.mocked(console.log).mockClear();

    await run('status', '--prune', '--ledger');

    const lines = vi.mocked(console.log).mock.calls.map(([line]) => String(line));
    expect(lines[0]).toBe(`pruned     ${join(root, 'data/cache/BR_UF.zip')}`);
    expect(lines).toHaveLength(2);
    expect(lines[1].endsWith(join(root, 'data/cache/brasil.osm.pbf'))).toBe(true);
  });

  it('reports temporary files left by a killed run', async () => {
    const cache = join(root, 'data/cache');
    await mkdir(cache, { recursive: true });
    await writeFile(join(cache, '.tmp-0123456789ab-brasil.osm.pbf'), 'partial');

    await run('status');

    expect(console.log).toHaveBeenCalledWith(
      `leftover   ${join(cache, '.tmp-0123456789ab-brasil.osm.pbf')}`
    );
  });
});

describe('conflacao doctor', () => {
  it('fails when a program is missing', async () => {
    runner = new RecordingRunner(async (command) => {
      if (command.args[0] === 'osmium') throw new CommandFailedError(command, 1);
    });

    await expect(run('doctor')).rejects.toThrow('Missing programs: osmium');
    expect(runner.commands.map((c) => c.args[0])).toEqual([
      'curl',
      'unzip',
      'osmium',
      'ogr2ogr',
      'csv2geojson',
    ]);
  });
});

describe('main', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('prints the error and sets exit code 1', async () => {
    await main(['node', 'conflacao', '--root', root, '--quiet', 'stage', 'osm-chile']);

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      '\t ERROR: Unknown dataset: osm-chile. Available: osm-brasil, ibge-uf, ibge-municipios, datasus-cnes '
    );
  });
});

describe('parsePositiveInt', () => {
  it('accepts positive integers only', () => {
    expect(parsePositiveInt('4')).toBe(4);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer, got "0"');
    expect(() => parsePositiveInt('2.5')).toThrow('Expected a positive integer');
  });
});
