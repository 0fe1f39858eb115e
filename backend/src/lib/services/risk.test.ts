import { describe, it, expect } from 'vitest';
import { DEFAULT_RISK_WEIGHTS, RiskBand } from '@tickwatch/shared';
import { UnknownCategoryError } from '../errors.js';
import { bandFor, scoreRisk } from './risk.js';

describe('scoreRisk', () => {
  it('scores a low-exposure profile', () => {
    const result = scoreRisk({ lifestyle: 'indoor', coat: 'short', regionType: 'urban' }, DEFAULT_RISK_WEIGHTS);

    expect(result.score).toBe(1);
    expect(result.band).toBe(RiskBand.LOW);
    expect(result.info).toBe('Low risk: Standard tick prevention measures recommended.');
    expect(result.factors).toEqual([
      { factor: 'lifestyle', value: 'indoor', weight: 0.1, contribution: 0.5 },
      { factor: 'coat', value: 'short', weight: 0.1, contribution: 0.3 },
      { factor: 'regionType', value: 'urban', weight: 0.1, contribution: 0.2 },
    ]);
  });

  it('scores a medium-exposure profile', () => {
    const result = scoreRisk({ lifestyle: 'mixed', coat: 'medium', regionType: 'suburban' }, DEFAULT_RISK_WEIGHTS);

    expect(result.score).toBe(5.5);
    expect(result.band).toBe(RiskBand.MEDIUM);
    expect(result.info).toBe('Medium risk: Enhanced tick prevention measures recommended.');
  });

  it('adds the species modifier', () => {
    const base = { lifestyle: 'indoor', coat: 'long', regionType: 'rural' };

    expect(scoreRisk({ ...base, petSpecies: 'dog' }, DEFAULT_RISK_WEIGHTS).score).toBe(6);
    expect(scoreRisk({ ...base, petSpecies: 'cat' }, DEFAULT_RISK_WEIGHTS).score).toBe(5.5);
  });

  it('clamps to the maximum score', () => {
    const result = scoreRisk(
      { lifestyle: 'outdoor', coat: 'long', regionType: 'rural', petSpecies: 'dog' },
      DEFAULT_RISK_WEIGHTS
    );

    expect(result.score).toBe(10);
    expect(result.maxScore).toBe(10);
    expect(result.band).toBe(RiskBand.HIGH);
    expect(result.info).toBe('High risk: Consult a veterinarian for comprehensive tick prevention.');
  });

  it('is deterministic', () => {
    const profile = { lifestyle: 'outdoor', coat: 'medium', regionType: 'suburban' };
    expect(scoreRisk(profile, DEFAULT_RISK_WEIGHTS)).toEqual(scoreRisk(profile, DEFAULT_RISK_WEIGHTS));
  });

  it('rejects unknown categories instead of weighting them as zero', () => {
    try {
      scoreRisk({ lifestyle: 'nocturnal', coat: 'short', regionType: 'urban' }, DEFAULT_RISK_WEIGHTS);
      expect.unreachable('scoreRisk should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownCategoryError);
      if (error instanceof UnknownCategoryError) {
        expect(error.statusCode).toBe(400);
        expect(error.details).toEqual({
          reason: 'unknown-category',
          field: 'lifestyle',
          value: 'nocturnal',
          allowed: ['indoor', 'mixed', 'outdoor'],
        });
      }
    }
  });

  it('rejects an unknown species modifier', () => {
    expect(() =>
      scoreRisk({ lifestyle: 'indoor', coat: 'short', regionType: 'urban', petSpecies: 'hamster' }, DEFAULT_RISK_WEIGHTS)
    ).toThrow(UnknownCategoryError);
  });
});

describe('bandFor', () => {
  it('places band edges in the higher band', () => {
    expect(bandFor(3.99, DEFAULT_RISK_WEIGHTS)).toBe(RiskBand.LOW);
    expect(bandFor(4, DEFAULT_RISK_WEIGHTS)).toBe(RiskBand.MEDIUM);
    expect(bandFor(7, DEFAULT_RISK_WEIGHTS)).toBe(RiskBand.HIGH);
  });
});
