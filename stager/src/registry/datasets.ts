/**
 * Dataset registry for the Brazilian conflation inputs.
 * Defines download locations, cache file names, and how archives unpack.
 */
import { ConfigError } from '../core/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface ExtractSettings {
  /** Unpack next to the archive (cache) or among derived artifacts (scratch) */
  into: 'cache' | 'scratch';
  /** Only these archive members; everything when omitted */
  members?: string[];
}

export interface DatasetDescriptor {
  id: string;
  name: string;
  url: string;

  /** File name inside the cache directory */
  fileName: string;

  extract?: ExtractSettings;

  /** Base name of the shapefile the archive contains, if any */
  shapefile?: string;

  attribution: string;
  license?: string;
}

export interface BoundaryLevel {
  /** OpenStreetMap admin_level value */
  level: number;
  /** Base name for the derived extract and GeoPackage */
  name: string;
}

// ============================================================================
// Sources
// ============================================================================

const IBGE_BASE_URL =
  'https://geoftp.ibge.gov.br/organizacao_do_territorio/malhas_territoriais/malhas_municipais/municipio_2022/Brasil/BR/';

export const OSM_BRASIL: DatasetDescriptor = {
  id: 'osm-brasil',
  name: 'OpenStreetMap Brazil extract',
  url: 'https://download.geofabrik.de/south-america/brazil-latest.osm.pbf',
  fileName: 'brasil.osm.pbf',
  attribution: '© OpenStreetMap contributors (Geofabrik extract)',
  license: 'ODbL-1.0',
};

export const IBGE_UF: DatasetDescriptor = {
  id: 'ibge-uf',
  name: 'IBGE state boundaries 2022',
  url: `${IBGE_BASE_URL}BR_UF_2022.zip`,
  fileName: 'BR_UF.zip',
  extract: { into: 'cache' },
  shapefile: 'BR_UF_2022',
  attribution: 'IBGE - Malha Municipal 2022',
};

export const IBGE_MUNICIPIOS: DatasetDescriptor = {
  id: 'ibge-municipios',
  name: 'IBGE municipality boundaries 2022',
  url: `${IBGE_BASE_URL}BR_Municipios_2022.zip`,
  fileName: 'BR_municipio.zip',
  extract: { into: 'cache' },
  shapefile: 'BR_Municipios_2022',
  attribution: 'IBGE - Malha Municipal 2022',
};

// CNES dump is only published over FTP; the archive holds dozens of tables
export const DATASUS_CNES: DatasetDescriptor = {
  id: 'datasus-cnes',
  name: 'DATASUS CNES health facility registry (2023-02)',
  url: 'ftp://ftp.datasus.gov.br/cnes/BASE_DE_DADOS_CNES_202302.ZIP',
  fileName: 'BASE_DE_DADOS_CNES.zip',
  extract: { into: 'scratch', members: ['tbEstabelecimento202302.csv'] },
  attribution: 'Ministério da Saúde - DATASUS/CNES',
};

export const DEFAULT_DATASETS: readonly DatasetDescriptor[] = [
  OSM_BRASIL,
  IBGE_UF,
  IBGE_MUNICIPIOS,
  DATASUS_CNES,
];

export const DEFAULT_BOUNDARY_LEVELS: readonly BoundaryLevel[] = [
  { level: 4, name: 'brasil-uf' },
  { level: 8, name: 'brasil-municipios' },
];

// ============================================================================
// Lookup
// ============================================================================

export function getDataset(datasets: readonly DatasetDescriptor[], id: string): DatasetDescriptor {
  const dataset = datasets.find((d) => d.id === id);
  if (!dataset) {
    throw new ConfigError(
      `Unknown dataset: ${id}. Available: ${datasets.map((d) => d.id).join(', ')}`
    );
  }
  return dataset;
}

/**
 * Resolve ids to descriptors, all of them when `ids` is empty.
 * Every id is checked before anything is returned.
 */
export function selectDatasets(
  datasets: readonly DatasetDescriptor[],
  ids: readonly string[] = []
): DatasetDescriptor[] {
  if (ids.length === 0) return [...datasets];
  return ids.map((id) => getDataset(datasets, id));
}
