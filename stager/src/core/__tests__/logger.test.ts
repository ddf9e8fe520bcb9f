/**
 * Unit tests for console banners.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createLogger } from '../logger.js';
import { osmiumTagsFilterCommand } from '../command.js';

let log: MockInstance<typeof console.log>;
let error: MockInstance<typeof console.error>;

beforeEach(() => {
  log = vi.spyOn(console, 'log').mockImplementation(() => {});
  error = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('right-aligns plain banners to forty columns', () => {
    const logger = createLogger();

    logger.started('stage:osm-brasil');
    logger.finished('stage:osm-brasil');

    expect(log).toHaveBeenNthCalledWith(1, `\n\t${' '.repeat(15)}stage:osm-brasil STARTED `);
    expect(log).toHaveBeenNthCalledWith(2, `\t${' '.repeat(9)}stage:osm-brasil FINISHED OKAY `);
  });

  it('pads coloured banners after colouring', () => {
    const logger = createLogger({ color: true });

    logger.finished('stage');

    expect(log).toHaveBeenCalledWith(`\t${' '.repeat(11)}\u001b[32mstage FINISHED OKAY \u001b[0m`);
  });

  it('sends warnings and errors to stderr', () => {
    const logger = createLogger();

    logger.warn('checksum mismatch');
    logger.error('unzip exited with code 9');

    expect(error).toHaveBeenNthCalledWith(1, `\t${' '.repeat(12)} WARNING: checksum mismatch `);
    expect(error).toHaveBeenNthCalledWith(2, `\t${' '.repeat(7)} ERROR: unzip exited with code 9 `);
    expect(log).not.toHaveBeenCalled();
  });

  it('shows the command being run', () => {
    createLogger().command(osmiumTagsFilterCommand('in.pbf', 4, 'out.pbf'));

    expect(log).toHaveBeenCalledWith('  Running: osmium tags-filter in.pbf r/admin_level=4 -o out.pbf');
  });

  it('keeps only errors when quiet', () => {
    const logger = createLogger({ quiet: true });

    logger.started('boundaries');
    logger.info('downloading');
    logger.warn('retrying');
    logger.command(osmiumTagsFilterCommand('in.pbf', 4, 'out.pbf'));
    logger.error('failed');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });
});
