/**
 * Unit tests for the dataset and UF registries.
 */
import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../core/errors.js';
import { DEFAULT_DATASETS, getDataset, selectDatasets } from '../datasets.js';
import { getUf, listUfs } from '../ufs.js';

describe('selectDatasets', () => {
  it('returns every dataset when no ids are given', () => {
    expect(selectDatasets(DEFAULT_DATASETS)).toEqual([...DEFAULT_DATASETS]);
  });

  it('returns datasets in the order requested', () => {
    const ids = selectDatasets(DEFAULT_DATASETS, ['datasus-cnes', 'osm-brasil']).map((d) => d.id);
    expect(ids).toEqual(['datasus-cnes', 'osm-brasil']);
  });

  it('rejects an unknown id', () => {
    expect(() => selectDatasets(DEFAULT_DATASETS, ['osm-brasil', 'osm-chile'])).toThrow(
      ConfigError
    );
  });
});

describe('getDataset', () => {
  it('lists the available ids when the lookup fails', () => {
    expect(() => getDataset(DEFAULT_DATASETS, 'nope')).toThrow(
      'Unknown dataset: nope. Available: osm-brasil, ibge-uf, ibge-municipios, datasus-cnes'
    );
  });

  it('unpacks only the establishment table from the CNES dump', () => {
    expect(getDataset(DEFAULT_DATASETS, 'datasus-cnes').extract).toEqual({
      into: 'scratch',
      members: ['tbEstabelecimento202302.csv'],
    });
  });
});

describe('UF registry', () => {
  it('lists all 27 federative units', () => {
    expect(listUfs()).toHaveLength(27);
  });

  it('looks up a UF case-insensitively', () => {
    expect(getUf(' sc ')).toEqual({ sigla: 'SC', codigo: 42, nome: 'Santa Catarina' });
    expect(getUf('DF').codigo).toBe(53);
  });

  it('rejects an unknown UF', () => {
    expect(() => getUf('XX')).toThrow(ConfigError);
  });
});
