import {
  RiskBand,
  type PetProfile,
  type RiskFactorContribution,
  type RiskResult,
  type RiskWeights,
} from '@tickwatch/shared';
import { UnknownCategoryError } from '../errors.js';

const ADVICE: Record<RiskBand, string> = {
  [RiskBand.LOW]: 'Low risk: Standard tick prevention measures recommended.',
  [RiskBand.MEDIUM]: 'Medium risk: Enhanced tick prevention measures recommended.',
  [RiskBand.HIGH]: 'High risk: Consult a veterinarian for comprehensive tick prevention.',
};

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function weightFor(field: string, table: Readonly<Record<string, number>>, value: string): number {
  const match = Object.entries(table).find(([category]) => category === value);
  if (!match) {
    throw new UnknownCategoryError(field, value, Object.keys(table));
  }
  return match[1];
}

export function bandFor(score: number, weights: RiskWeights): RiskBand {
  if (score < weights.bands.mediumFrom) return RiskBand.LOW;
  if (score < weights.bands.highFrom) return RiskBand.MEDIUM;
  return RiskBand.HIGH;
}

/**
 * Weighted tick-exposure score for a pet, clamped to `[0, maxScore]`.
 * Pure: the same profile and weights always give the same result.
 */
export function scoreRisk(profile: PetProfile, weights: RiskWeights): RiskResult {
  const factors: RiskFactorContribution[] = [];

  const add = (
    factor: RiskFactorContribution['factor'],
    table: Readonly<Record<string, number>>,
    value: string,
    multiplier: number
  ): void => {
    const weight = weightFor(factor, table, value);
    factors.push({ factor, value, weight, contribution: round2(weight * multiplier) });
  };

  add('lifestyle', weights.lifestyle, profile.lifestyle, weights.multipliers.lifestyle);
  add('coat', weights.coat, profile.coat, weights.multipliers.coat);
  add('regionType', weights.regionType, profile.regionType, weights.multipliers.regionType);
  if (profile.petSpecies !== undefined) {
    // Species is an additive modifier, not a weighted factor
    add('petSpecies', weights.petSpecies, profile.petSpecies, 1);
  }

  const raw = factors.reduce((sum, f) => sum + f.contribution, 0);
  const score = round2(Math.min(weights.maxScore, Math.max(0, raw)));
  const band = bandFor(score, weights);

  return { score, maxScore: weights.maxScore, band, info: ADVICE[band], factors };
}
