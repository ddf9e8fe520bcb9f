/**
 * Summarize a staged shapefile: feature count, geometry types, attribute
 * fields. Used to check that an unpacked archive is what we expect.
 */
import type { Feature, Geometry } from 'geojson';
import * as shapefile from 'shapefile';

export interface FeatureSource {
  bbox?: readonly number[];
  read(): Promise<{ done: boolean; value?: Feature<Geometry | null> }>;
}

export interface FeatureSummary {
  featureCount: number;
  geometryTypes: Record<string, number>;
  fields: string[];
  bbox: number[] | null;
}

export async function summarizeFeatures(source: FeatureSource): Promise<FeatureSummary> {
  const geometryTypes: Record<string, number> = {};
  const fields: string[] = [];
  const seen = new Set<string>();
  let featureCount = 0;

  while (true) {
    const result = await source.read();
    if (result.done || !result.value) break;

    const feature = result.value;
    featureCount++;

    const type = feature.geometry ? feature.geometry.type : 'null';
    geometryTypes[type] = (geometryTypes[type] ?? 0) + 1;

    for (const key of Object.keys(feature.properties ?? {})) {
      if (!seen.has(key)) {
        seen.add(key);
        fields.push(key);
      }
    }
  }

  return {
    featureCount,
    geometryTypes,
    fields,
    bbox: source.bbox ? [...source.bbox] : null,
  };
}

/**
 * Read the .shp (and its sibling .dbf) with the shapefile library.
 */
export async function inspectShapefile(path: string): Promise<FeatureSummary> {
  const source = await shapefile.open(path);
  return summarizeFeatures(source);
}

export function formatSummary(path: string, summary: FeatureSummary): string[] {
  const lines = [
    `Shapefile: ${path}`,
    `Features: ${summary.featureCount.toLocaleString('en-US')}`,
    `Geometry: ${
      Object.entries(summary.geometryTypes)
        .map(([type, count]) => `${type} (${count})`)
        .join(', ') || 'none'
    }`,
    `Fields: ${summary.fields.join(', ') || 'none'}`,
  ];
  if (summary.bbox) {
    lines.push(`BBox: ${summary.bbox.map((n) => n.toFixed(4)).join(', ')}`);
  }
  return lines;
}
