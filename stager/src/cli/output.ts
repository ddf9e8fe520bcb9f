/**
 * Human-readable lines for command results.
 */
import { InvalidArgumentError } from 'commander';
import type { StageResult } from '../core/stage.js';

export function describeResult(label: string, result: StageResult): string {
  if (result.status === 'skipped') {
    return `  ${label}: skipped (already present) ${result.destination}`;
  }
  return `  ${label}: ${result.status} ${result.destination} sha256=${result.sha256.slice(0, 12)} bytes=${result.bytes}`;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}
