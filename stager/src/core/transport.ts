/**
 * Transports retrieve a remote source into a local file.
 * HTTP(S) goes through fetch with retry; anything else (ftp://) through curl.
 */
import { createWriteStream } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { CommandRunner } from './command.js';
import { curlCommand } from './command.js';
import { RetrievalFailedError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export interface Transport {
  download(url: string, destination: string): Promise<void>;
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

// ============================================================================
// Retry Logic
// ============================================================================

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, options: RetryOptions): number {
  return Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs);
}

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

// ============================================================================
// HTTP Transport
// ============================================================================

export class HttpTransport implements Transport {
  private readonly retry: RetryOptions;

  constructor(
    retry: Partial<RetryOptions> = {},
    private readonly logger: Logger = silentLogger
  ) {
    this.retry = { ...DEFAULT_RETRY, ...retry };
  }

  async download(url: string, destination: string): Promise<void> {
    let lastError: RetrievalFailedError | null = null;

    for (let attempt = 0; attempt <= this.retry.maxRetries; attempt++) {
      try {
        await this.attempt(url, destination);
        return;
      } catch (err) {
        if (!(err instanceof RetrievalFailedError)) throw err;
        if (!err.transient) throw err;
        lastError = err;

        if (attempt < this.retry.maxRetries) {
          const delay = backoffDelay(attempt, this.retry);
          this.logger.warn(
            `Fetch failed (attempt ${attempt + 1}/${this.retry.maxRetries + 1}): ${err.message}. Retrying in ${delay}ms...`
          );
          await sleep(delay);
        }
      }
    }

    throw lastError ?? new RetrievalFailedError(url, destination, { transient: false });
  }

  private async attempt(url: string, destination: string): Promise<void> {
    let res: Response;
    try {
      res = await fetch(url);
    } catch (err) {
      throw new RetrievalFailedError(url, destination, { transient: true, cause: err });
    }

    if (!res.ok) {
      throw new RetrievalFailedError(url, destination, {
        status: res.status,
        transient: isTransientStatus(res.status),
      });
    }
    if (!res.body) {
      throw new RetrievalFailedError(url, destination, {
        status: res.status,
        transient: false,
        cause: new Error('empty response body'),
      });
    }

    try {
      // Truncates whatever a previous attempt left behind
      await pipeline(Readable.fromWeb(res.body), createWriteStream(destination));
    } catch (err) {
      throw new RetrievalFailedError(url, destination, { transient: true, cause: err });
    }
  }
}

// ============================================================================
// curl Transport
// ============================================================================

export class CurlTransport implements Transport {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger = silentLogger
  ) {}

  async download(url: string, destination: string): Promise<void> {
    const command = curlCommand(url, destination);
    this.logger.command(command);
    try {
      await this.runner.run(command);
    } catch (err) {
      throw new RetrievalFailedError(url, destination, { transient: false, cause: err });
    }
  }
}

// ============================================================================
// Selection
// ============================================================================

export interface TransportSet {
  http: Transport;
  curl: Transport;
}

export function selectTransport(url: string, transports: TransportSet): Transport {
  const { protocol } = new URL(url);
  return protocol === 'http:' || protocol === 'https:' ? transports.http : transports.curl;
}

/**
 * Routes each download to the transport its URL scheme needs.
 */
export function routingTransport(transports: TransportSet): Transport {
  return {
    download: (url, destination) =>
      selectTransport(url, transports).download(url, destination),
  };
}
