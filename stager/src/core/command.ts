/**
 * Command composition for the external tools the pipelines delegate to.
 *
 * Builders return plain argument vectors; nothing goes through a shell, so
 * filter expressions and paths reach the tool exactly as given.
 */
import { spawn } from 'node:child_process';
import { createWriteStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { CommandFailedError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface Command {
  program: string;
  args: readonly string[];
  /** Redirect stdout into this file instead of the terminal */
  stdoutPath?: string;
  /** Drop stdout entirely (used by prerequisite probes) */
  discardOutput?: boolean;
  cwd?: string;
}

export interface CommandRunner {
  run(command: Command): Promise<void>;
}

// ============================================================================
// Process Runner
// ============================================================================

function stdoutMode(command: Command): 'pipe' | 'ignore' | 'inherit' {
  if (command.stdoutPath) return 'pipe';
  return command.discardOutput ? 'ignore' : 'inherit';
}

async function runProcess(command: Command): Promise<void> {
  const output = command.stdoutPath ? createWriteStream(command.stdoutPath) : null;

  const child = spawn(command.program, [...command.args], {
    cwd: command.cwd,
    stdio: ['ignore', stdoutMode(command), 'inherit'],
  });

  const exited = new Promise<{ code: number | null; signal: NodeJS.Signals | null }>(
    (resolve, reject) => {
      child.once('error', reject);
      child.once('close', (code, signal) => resolve({ code, signal }));
    }
  );

  const copied = output && child.stdout ? pipeline(child.stdout, output) : Promise.resolve();

  let result: { code: number | null; signal: NodeJS.Signals | null };
  try {
    result = await exited;
  } catch (err) {
    output?.destroy();
    // The spawn error is the one worth reporting; the broken copy follows from it
    await Promise.allSettled([copied]);
    throw new CommandFailedError(command, null, err);
  }

  await copied;

  if (result.signal) {
    throw new CommandFailedError(
      command,
      null,
      new Error(`terminated by ${result.signal}`)
    );
  }
  if (result.code !== 0) {
    throw new CommandFailedError(command, result.code);
  }
}

export const spawnRunner: CommandRunner = {
  run: runProcess,
};

// ============================================================================
// Formatting
// ============================================================================

const SAFE_ARG = /^[A-Za-z0-9_\-./=:,@%+]+$/;

export function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command the way it would be typed in a shell (for logging only).
 */
export function formatCommand(command: Command): string {
  const parts = [command.program, ...command.args].map(quoteArg).join(' ');
  return command.stdoutPath ? `${parts} > ${quoteArg(command.stdoutPath)}` : parts;
}

// ============================================================================
// Builders
// ============================================================================

export function curlCommand(url: string, destination: string): Command {
  return {
    program: 'curl',
    args: ['--fail', '--location', '--silent', '--show-error', '-o', destination, url],
  };
}

export function unzipCommand(
  archive: string,
  directory: string,
  members: readonly string[] = []
): Command {
  return {
    program: 'unzip',
    args: ['-o', archive, ...members, '-d', directory],
  };
}

export function osmiumTagsFilterCommand(
  input: string,
  adminLevel: number,
  output: string
): Command {
  return {
    program: 'osmium',
    args: ['tags-filter', input, `r/admin_level=${adminLevel}`, '-o', output],
  };
}

export function osmiumExportCommand(input: string, output: string): Command {
  return {
    program: 'osmium',
    args: [
      'export',
      '--output-format=geojsonseq',
      '--geometry-types=polygon',
      '--attributes=type,id,version,timestamp',
      `--output=${output}`,
      input,
    ],
  };
}

export interface Ogr2OgrOptions {
  layerName?: string;
  geometryType?: string;
  overwrite?: boolean;
  skipFailures?: boolean;
}

export function ogr2ogrGpkgCommand(
  output: string,
  input: string,
  options: Ogr2OgrOptions = {}
): Command {
  const args = ['-f', 'GPKG'];
  if (options.overwrite) args.push('-overwrite');
  args.push(output, input);
  if (options.layerName) args.push('-nln', options.layerName);
  if (options.geometryType) args.push('-nlt', options.geometryType);
  if (options.skipFailures) args.push('-skipfailures');

  return { program: 'ogr2ogr', args };
}

export type GeoJsonOutputType = 'GeoJSON' | 'GeoJSONSeq';

export interface Csv2GeoJsonOptions {
  converter: string;
  input: string;
  latitude: string;
  longitude: string;
  delimiter: string;
  encoding: string;
  outputType: GeoJsonOutputType;
  ignoreWarnings: boolean;
  containAnd: readonly string[];
  containOr: readonly string[];
}

export function csv2geojsonCommand(options: Csv2GeoJsonOptions, output: string): Command {
  const args = [
    `--lat=${options.latitude}`,
    `--lon=${options.longitude}`,
    `--delimiter=${options.delimiter}`,
    `--encoding=${options.encoding}`,
    `--output-type=${options.outputType}`,
  ];
  if (options.ignoreWarnings) args.push('--ignore-warnings');
  for (const expr of options.containAnd) args.push(`--contain-and=${expr}`);
  for (const expr of options.containOr) args.push(`--contain-or=${expr}`);
  args.push(options.input);

  return { program: options.converter, args, stdoutPath: output };
}

// ============================================================================
// Prerequisites
// ============================================================================

export interface PrerequisiteReport {
  available: string[];
  missing: string[];
}

/**
 * Probe each program with `which`. Only a failed probe counts as missing;
 * any other error propagates.
 */
export async function checkPrerequisites(
  programs: readonly string[],
  runner: CommandRunner
): Promise<PrerequisiteReport> {
  const report: PrerequisiteReport = { available: [], missing: [] };

  for (const program of programs) {
    try {
      await runner.run({ program: 'which', args: [program], discardOutput: true });
      report.available.push(program);
    } catch (err) {
      if (!(err instanceof CommandFailedError)) throw err;
      report.missing.push(program);
    }
  }

  return report;
}
