/**
 * Brazilian federative units (UF) with their IBGE numeric codes.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';

const UFS_PATH = new URL('../../data/ufs.json', import.meta.url);

const ufSchema = z.object({
  sigla: z.string().length(2),
  codigo: z.number().int(),
  nome: z.string(),
});

export type FederativeUnit = z.infer<typeof ufSchema>;

let cached: FederativeUnit[] | null = null;

export function listUfs(): FederativeUnit[] {
  if (!cached) {
    cached = z.array(ufSchema).parse(JSON.parse(readFileSync(UFS_PATH, 'utf-8')));
  }
  return cached;
}

export function getUf(sigla: string): FederativeUnit {
  const wanted = sigla.trim().toUpperCase();
  const uf = listUfs().find((u) => u.sigla === wanted);
  if (!uf) {
    throw new ConfigError(
      `Unknown UF: ${sigla}. Available: ${listUfs().map((u) => u.sigla).join(', ')}`
    );
  }
  return uf;
}
