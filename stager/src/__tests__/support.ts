/**
 * Shared test doubles: a command runner that records what it was asked to
 * run, and throwaway working directories.
 */
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Command, CommandRunner } from '../core/command.js';
import { silentLogger } from '../core/logger.js';
import type { PipelineContext } from '../core/stage.js';
import type { Transport } from '../core/transport.js';
import type { StagerConfig } from '../config/config.js';
import { buildConfig } from '../config/config.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'conflacao-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Output file an external tool would write for `command`, if any.
 */
export function outputOf(command: Command): string | null {
  if (command.stdoutPath) return command.stdoutPath;
  // unzip's -o means overwrite, and it writes into a directory
  if (command.program === 'unzip') return null;

  const { args } = command;
  const flag = args.indexOf('-o');
  if (flag >= 0 && flag + 1 < args.length) return args[flag + 1];

  const output = args.find((arg) => arg.startsWith('--output='));
  if (output) return output.slice('--output='.length);

  if (command.program === 'ogr2ogr') {
    let index = args.indexOf('GPKG') + 1;
    if (args[index] === '-overwrite') index++;
    return index < args.length ? args[index] : null;
  }

  return null;
}

export type CommandHandler = (command: Command) => Promise<void>;

/**
 * Default behaviour: every tool succeeds and writes a small placeholder
 * wherever its output would go.
 */
export const touchOutputs: CommandHandler = async (command) => {
  const output = outputOf(command);
  if (output) {
    await writeFile(output, `${command.program} output\n`);
  }
};

export class RecordingRunner implements CommandRunner {
  readonly commands: Command[] = [];

  constructor(private readonly handler: CommandHandler = touchOutputs) {}

  async run(command: Command): Promise<void> {
    this.commands.push(command);
    await this.handler(command);
  }

  programs(): string[] {
    return this.commands.map((c) => c.program);
  }
}

/**
 * Default configuration rooted in a scratch directory.
 */
export function testConfig(root: string): StagerConfig {
  return buildConfig({}, { rootDir: root });
}

const unusedTransport: Transport = {
  download: async (url) => {
    throw new Error(`unexpected download of ${url}`);
  },
};

export function testContext(
  runner: CommandRunner,
  transport: Transport = unusedTransport
): PipelineContext {
  return { logger: silentLogger, ledger: null, runner, transport };
}
