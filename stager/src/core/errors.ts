/**
 * Error kinds raised while staging datasets.
 *
 * Every failure aborts the run. The kinds exist so callers (and the CLI)
 * can tell a transport problem from an external tool rejecting its input.
 */
import type { Command } from './command.js';

// ============================================================================
// Base
// ============================================================================

export type StagingErrorCode =
  | 'RETRIEVAL_FAILED'
  | 'CONVERSION_FAILED'
  | 'COMMAND_FAILED'
  | 'CONFIG_INVALID';

export abstract class StagingError extends Error {
  abstract readonly code: StagingErrorCode;
}

// ============================================================================
// Kinds
// ============================================================================

/**
 * Network or transport failure while retrieving a source.
 */
export class RetrievalFailedError extends StagingError {
  readonly code = 'RETRIEVAL_FAILED';

  constructor(
    readonly source: string,
    readonly destination: string,
    readonly detail: {
      status?: number;
      /** Network errors, 5xx and 429 are worth retrying; the rest are not */
      transient: boolean;
      cause?: unknown;
    }
  ) {
    super(
      `Retrieval of ${source} failed` +
        (detail.status !== undefined ? ` (HTTP ${detail.status})` : '') +
        (detail.cause instanceof Error ? `: ${detail.cause.message}` : ''),
      { cause: detail.cause }
    );
    this.name = 'RetrievalFailedError';
  }

  get status(): number | undefined {
    return this.detail.status;
  }

  get transient(): boolean {
    return this.detail.transient;
  }
}

/**
 * An external tool rejected its input while deriving an artifact.
 */
export class ConversionFailedError extends StagingError {
  readonly code = 'CONVERSION_FAILED';

  constructor(
    readonly step: string,
    readonly destination: string,
    message: string,
    cause?: unknown
  ) {
    super(`${step}: ${message}`, { cause });
    this.name = 'ConversionFailedError';
  }
}

/**
 * An external program exited non-zero or could not be spawned.
 */
export class CommandFailedError extends StagingError {
  readonly code = 'COMMAND_FAILED';

  constructor(
    readonly command: Command,
    /** null when the process never started or was killed by a signal */
    readonly exitCode: number | null,
    cause?: unknown
  ) {
    super(
      exitCode === null
        ? `${command.program} failed` +
            (cause instanceof Error ? `: ${cause.message}` : '')
        : `${command.program} exited with code ${exitCode}`,
      { cause }
    );
    this.name = 'CommandFailedError';
  }
}

export class ConfigError extends StagingError {
  readonly code = 'CONFIG_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isStagingError(err: unknown): err is StagingError {
  return err instanceof StagingError;
}
