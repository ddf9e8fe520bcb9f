/**
 * Report which artifacts are staged, and optionally re-verify their
 * checksums against the ledger.
 */
import { existsSync } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import pLimit from 'p-limit';
import type { LedgerEntry, StageLedger } from '../core/ledger.js';
import { sha256File } from '../core/ledger.js';
import { isTemporaryPath } from '../core/stage.js';
import type { StagerConfig } from '../config/config.js';
import { boundaryPaths } from './boundaries.js';
import { planFacilities } from './facilities.js';
import { datasetPath } from './stage-datasets.js';

export type ArtifactKind = 'dataset' | 'boundary' | 'geopackage' | 'facilities';

export interface KnownArtifact {
  kind: ArtifactKind;
  label: string;
  path: string;
}

export interface ArtifactStatus extends KnownArtifact {
  present: boolean;
  bytes: number | null;
  sha256: string | null;
  /** null when not verified (no --verify, no ledger entry, or absent) */
  verified: boolean | null;
}

export interface StatusOptions {
  verify?: boolean;
  concurrency?: number;
}

export function knownArtifacts(config: StagerConfig): KnownArtifact[] {
  const artifacts: KnownArtifact[] = config.datasets.map((dataset) => ({
    kind: 'dataset',
    label: dataset.id,
    path: datasetPath(config, dataset),
  }));

  for (const level of config.boundaries.levels) {
    const paths = boundaryPaths(config, level);
    artifacts.push(
      { kind: 'boundary', label: `${level.name} (admin_level=${level.level})`, path: paths.extract },
      { kind: 'geopackage', label: level.name, path: paths.geopackage },
      { kind: 'boundary', label: `${level.name} geojsonseq`, path: paths.geojsonseq }
    );
  }

  for (const dataset of config.datasets) {
    if (dataset.shapefile) {
      artifacts.push({
        kind: 'geopackage',
        label: dataset.shapefile,
        path: join(config.scratchDir, `${dataset.shapefile}.gpkg`),
      });
    }
  }

  const facilities = planFacilities(config);
  artifacts.push({ kind: 'facilities', label: facilities.layerName, path: facilities.destination });
  if (facilities.geopackage) {
    artifacts.push({ kind: 'geopackage', label: facilities.layerName, path: facilities.geopackage });
  }

  return artifacts;
}

async function describe(
  artifact: KnownArtifact,
  ledger: StageLedger | null,
  verify: boolean
): Promise<ArtifactStatus> {
  if (!existsSync(artifact.path)) {
    return { ...artifact, present: false, bytes: null, sha256: null, verified: null };
  }

  const { size } = await stat(artifact.path);
  const entry = ledger?.get(artifact.path) ?? null;
  const verified = verify && entry ? (await sha256File(artifact.path)) === entry.sha256 : null;

  return { ...artifact, present: true, bytes: size, sha256: entry?.sha256 ?? null, verified };
}

export async function collectStatus(
  config: StagerConfig,
  ledger: StageLedger | null,
  options: StatusOptions = {}
): Promise<ArtifactStatus[]> {
  const limit = pLimit(options.concurrency ?? 2);
  const verify = options.verify ?? false;

  return Promise.all(
    knownArtifacts(config).map((artifact) => limit(() => describe(artifact, ledger, verify)))
  );
}

/**
 * Temporary files left in the cache and scratch directories by killed runs.
 */
export async function findLeftovers(config: StagerConfig): Promise<string[]> {
  const leftovers: string[] = [];
  for (const dir of new Set([config.cacheDir, config.scratchDir])) {
    if (!existsSync(dir)) continue;
    for (const name of await readdir(dir)) {
      if (isTemporaryPath(name)) leftovers.push(join(dir, name));
    }
  }
  return leftovers.sort();
}

/**
 * Drop ledger entries whose file is gone; returns the dropped entries.
 */
export function pruneLedger(ledger: StageLedger): LedgerEntry[] {
  const dropped = ledger.list().filter((entry) => !existsSync(entry.path));
  for (const entry of dropped) {
    ledger.remove(entry.path);
  }
  return dropped;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

export function formatStatus(rows: readonly ArtifactStatus[]): string[] {
  return rows.map((row) => {
    const state = row.present ? 'present' : 'missing';
    const size = row.bytes !== null ? ` ${formatBytes(row.bytes)}` : '';
    const check =
      row.verified === null ? '' : row.verified ? ' checksum ok' : ' CHECKSUM MISMATCH';
    return `${row.kind.padEnd(10)} ${row.label.padEnd(36)} ${state}${size}${check}`;
  });
}

export function formatLeftovers(paths: readonly string[]): string[] {
  return paths.map((path) => `${'leftover'.padEnd(10)} ${path}`);
}

export function formatLedger(entries: readonly LedgerEntry[]): string[] {
  return entries.map(
    (entry) =>
      `${entry.sha256.slice(0, 12)}  ${formatBytes(entry.bytes).padStart(9)}  ${entry.stagedAt}  ${entry.path}`
  );
}
