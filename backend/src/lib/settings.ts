import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_RISK_WEIGHTS, type RiskWeights } from '@tickwatch/shared';
import { config } from './config.js';
import { SpeciesIndex } from './normalize.js';

const speciesCatalogSchema = z.object({
  version: z.number().int(),
  species: z
    .array(
      z.object({
        name: z.string().min(1),
        latinName: z.string().min(1),
        synonyms: z.array(z.string().min(1)).default([]),
      })
    )
    .min(1),
});

export type SpeciesCatalog = z.infer<typeof speciesCatalogSchema>;

/**
 * Read-only tables the analytics need, built once at startup and passed
 * explicitly to every service.
 */
export interface AnalyticsSettings {
  readonly species: SpeciesIndex;
  readonly riskWeights: RiskWeights;
  readonly earliestSightingDate: string;
  readonly computeBudgetMs: number;
}

const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../config/species.json', import.meta.url));

export function parseSpeciesCatalog(raw: unknown): SpeciesCatalog {
  return speciesCatalogSchema.parse(raw);
}

export function loadSpeciesCatalog(path: string = config.ingestion.speciesCatalogPath ?? DEFAULT_CATALOG_PATH): SpeciesCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseSpeciesCatalog(raw);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function createAnalyticsSettings(overrides: {
  catalog?: SpeciesCatalog;
  riskWeights?: RiskWeights;
  earliestSightingDate?: string;
  computeBudgetMs?: number;
} = {}): AnalyticsSettings {
  const catalog = overrides.catalog ?? loadSpeciesCatalog();
  // Weights are copied so freezing never touches the shared default
  const riskWeights = deepFreeze(structuredClone(overrides.riskWeights ?? DEFAULT_RISK_WEIGHTS));

  return Object.freeze({
    species: new SpeciesIndex(deepFreeze(structuredClone(catalog.species))),
    riskWeights,
    earliestSightingDate: overrides.earliestSightingDate ?? config.ingestion.earliestSightingDate,
    computeBudgetMs: overrides.computeBudgetMs ?? config.api.computeBudgetMs,
  });
}
