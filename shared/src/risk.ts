import type { CoatType, Lifestyle, PetSpecies, RegionType, RiskBand } from './enums.js';

// Pet profile as received; values are checked against the weight table
export interface PetProfile {
  readonly coat: string;
  readonly lifestyle: string;
  readonly regionType: string;
  readonly petSpecies?: string;
}

export interface RiskFactorContribution {
  factor: 'lifestyle' | 'coat' | 'regionType' | 'petSpecies';
  value: string;
  weight: number;
  contribution: number;
}

export interface RiskResult {
  score: number;
  maxScore: number;
  band: RiskBand;
  info: string;
  factors: RiskFactorContribution[];
}

// Per-category weights (0-1) and the multiplier each factor carries
export interface RiskWeights {
  lifestyle: Record<Lifestyle, number>;
  coat: Record<CoatType, number>;
  regionType: Record<RegionType, number>;
  petSpecies: Record<PetSpecies, number>;
  multipliers: {
    lifestyle: number;
    coat: number;
    regionType: number;
  };
  maxScore: number;
  bands: {
    mediumFrom: number;
    highFrom: number;
  };
}

export const DEFAULT_RISK_WEIGHTS: RiskWeights = {
  lifestyle: { indoor: 0.1, mixed: 0.6, outdoor: 1 },
  coat: { short: 0.1, medium: 0.5, long: 1 },
  regionType: { urban: 0.1, suburban: 0.5, rural: 1 },
  petSpecies: { dog: 0.5, cat: 0 },
  multipliers: {
    lifestyle: 5,
    coat: 3,
    regionType: 2,
  },
  maxScore: 10,
  bands: {
    mediumFrom: 4,
    highFrom: 7,
  },
};
