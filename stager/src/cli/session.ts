/**
 * Per-invocation wiring shared by every subcommand: configuration, logger,
 * ledger and the pipeline context built from them.
 */
import type { Command } from 'commander';
import type { CommandRunner } from '../core/command.js';
import type { StageLedger } from '../core/ledger.js';
import { openLedger } from '../core/ledger.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { PipelineContext } from '../core/stage.js';
import type { Transport } from '../core/transport.js';
import { CurlTransport, HttpTransport, routingTransport } from '../core/transport.js';
import type { StagerConfig } from '../config/config.js';
import { loadConfig } from '../config/config.js';

export interface GlobalOptions {
  root?: string;
  config?: string;
  cacheDir?: string;
  scratchDir?: string;
  quiet?: boolean;
  color: boolean;
  verify?: boolean;
}

export interface CliDependencies {
  runner: CommandRunner;
  /** Whether stdout is a terminal (enables colour unless --no-color) */
  isTTY: boolean;
  createTransport?: (config: StagerConfig, runner: CommandRunner, logger: Logger) => Transport;
}

export interface Session {
  config: StagerConfig;
  logger: Logger;
  ledger: StageLedger;
  ctx: PipelineContext;
}

export function defaultTransport(
  config: StagerConfig,
  runner: CommandRunner,
  logger: Logger
): Transport {
  return routingTransport({
    http: new HttpTransport(config.retry, logger),
    curl: new CurlTransport(runner, logger),
  });
}

export function loggerFor(options: GlobalOptions, deps: CliDependencies): Logger {
  return createLogger({ color: options.color && deps.isTTY, quiet: options.quiet });
}

/**
 * Open a session for `command`, run `body`, and close the ledger afterwards.
 */
export async function withSession<T>(
  command: Command,
  deps: CliDependencies,
  body: (session: Session) => Promise<T>
): Promise<T> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = await loadConfig({
    rootDir: options.root,
    configPath: options.config,
    cacheDir: options.cacheDir,
    scratchDir: options.scratchDir,
  });
  const logger = loggerFor(options, deps);
  const ledger = await openLedger(config.cacheDir);
  const createTransport = deps.createTransport ?? defaultTransport;

  const ctx: PipelineContext = {
    logger,
    ledger,
    verify: options.verify ?? false,
    runner: deps.runner,
    transport: createTransport(config, deps.runner, logger),
  };

  try {
    return await body({ config, logger, ledger, ctx });
  } finally {
    ledger.close();
  }
}
