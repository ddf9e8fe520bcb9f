/**
 * Idempotent fetch-and-stage.
 *
 * A destination that exists is complete: artifacts are produced into a
 * temporary sibling and only renamed into place once production and any
 * post-processing have succeeded. Interrupted runs leave the destination
 * absent, so the next run starts over.
 */
import { randomBytes } from 'node:crypto';
import { existsSync } from 'node:fs';
import { mkdir, rename, rm, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { Command, CommandRunner } from './command.js';
import { ConversionFailedError, RetrievalFailedError, isStagingError } from './errors.js';
import type { LedgerEntry, StageLedger } from './ledger.js';
import { sha256File } from './ledger.js';
import type { Logger } from './logger.js';
import type { Transport } from './transport.js';

// ============================================================================
// Types
// ============================================================================

export interface StageContext {
  logger: Logger;
  ledger?: StageLedger | null;
  /** Re-hash present destinations against the ledger before skipping them */
  verify?: boolean;
}

/**
 * Everything a pipeline needs besides its configuration.
 */
export interface PipelineContext extends StageContext {
  runner: CommandRunner;
  transport: Transport;
}

export interface ArtifactSpec {
  step: string;
  destination: string;
  /** Where the artifact came from (URL or input path), kept in the ledger */
  source: string;
  produce: (tempPath: string) => Promise<void>;
  /** Runs on the produced file before it is renamed into place */
  postProcess?: (producedPath: string) => Promise<void>;
}

export type StageResult =
  | { status: 'skipped'; destination: string }
  | { status: 'staged' | 'restaged'; destination: string; sha256: string; bytes: number };

// ============================================================================
// Helpers
// ============================================================================

/**
 * Unique sibling of `destination` that keeps its file name (and extension)
 * at the end, for tools that pick a driver from the extension.
 */
export function temporaryPath(destination: string): string {
  const token = randomBytes(6).toString('hex');
  return join(dirname(destination), `.tmp-${token}-${basename(destination)}`);
}

export function isTemporaryPath(path: string): boolean {
  return /^\.tmp-[0-9a-f]{12}-/.test(basename(path));
}

async function checksumMatches(entry: LedgerEntry): Promise<boolean> {
  return (await sha256File(entry.path)) === entry.sha256;
}

// ============================================================================
// Staging
// ============================================================================

export async function stageArtifact(artifact: ArtifactSpec, ctx: StageContext): Promise<StageResult> {
  const { destination, step } = artifact;
  let restaging = false;

  if (existsSync(destination)) {
    const entry = ctx.verify ? (ctx.ledger?.get(destination) ?? null) : null;

    if (!entry || (await checksumMatches(entry))) {
      ctx.logger.info(`[${step}] ${destination} already present, skipping`);
      return { status: 'skipped', destination };
    }

    ctx.logger.warn(`[${step}] checksum mismatch for ${destination}, staging again`);
    restaging = true;
  }

  await mkdir(dirname(destination), { recursive: true });
  const tempPath = temporaryPath(destination);

  try {
    await artifact.produce(tempPath);
    if (artifact.postProcess) {
      await artifact.postProcess(tempPath);
    }
    await rename(tempPath, destination);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }

  const sha256 = await sha256File(destination);
  const { size } = await stat(destination);
  ctx.ledger?.record({ path: destination, source: artifact.source, sha256, bytes: size });

  return { status: restaging ? 'restaged' : 'staged', destination, sha256, bytes: size };
}

export interface FetchRequest {
  step: string;
  destination: string;
  url: string;
  postProcess?: (downloadedPath: string) => Promise<void>;
}

/**
 * Download `url` into `destination` unless it is already there.
 */
export async function fetchAndStage(
  request: FetchRequest,
  ctx: StageContext & { transport: Transport }
): Promise<StageResult> {
  return stageArtifact(
    {
      step: request.step,
      destination: request.destination,
      source: request.url,
      produce: async (tempPath) => {
        ctx.logger.info(`[${request.step}] downloading ${request.url}`);
        try {
          await ctx.transport.download(request.url, tempPath);
        } catch (err) {
          if (isStagingError(err)) throw err;
          throw new RetrievalFailedError(request.url, request.destination, {
            transient: false,
            cause: err,
          });
        }
      },
      postProcess: request.postProcess,
    },
    ctx
  );
}

/**
 * Run an external conversion, reporting any failure as ConversionFailedError.
 */
export async function runConversion(
  step: string,
  destination: string,
  command: Command,
  ctx: { runner: CommandRunner; logger: Logger }
): Promise<void> {
  ctx.logger.command(command);
  try {
    await ctx.runner.run(command);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConversionFailedError(step, destination, reason, err);
  }
}

// ============================================================================
// Sequencing
// ============================================================================

export type Step<T> = () => Promise<T>;

/**
 * Run steps strictly one after another; the first failure aborts the rest.
 */
export async function runSteps<T>(steps: readonly Step<T>[]): Promise<T[]> {
  const results: T[] = [];
  for (const step of steps) {
    results.push(await step());
  }
  return results;
}

/**
 * Wrap a step in STARTED / FINISHED OKAY banners.
 */
export async function withBanner<T>(
  name: string,
  logger: Logger,
  body: () => Promise<T>
): Promise<T> {
  logger.started(name);
  const result = await body();
  logger.finished(name);
  return result;
}
