import { describe, it, expect } from 'vitest';
import { DEFAULT_RISK_WEIGHTS } from '@tickwatch/shared';
import { createAnalyticsSettings, loadSpeciesCatalog, parseSpeciesCatalog } from './settings.js';

describe('analytics settings', () => {
  it('loads the bundled species catalogue', () => {
    const catalog = loadSpeciesCatalog();
    const names = catalog.species.map((s) => s.name);
    expect(names).toContain('Marsh tick');
    expect(names).toContain('Fox/badger tick');
  });

  it('rejects a catalogue without species', () => {
    expect(() => parseSpeciesCatalog({ version: 1, species: [] })).toThrow();
  });

  it('defaults missing synonyms to an empty list', () => {
    const catalog = parseSpeciesCatalog({
      version: 1,
      species: [{ name: 'Marsh tick', latinName: 'Dermacentor reticulatus' }],
    });
    expect(catalog.species[0].synonyms).toEqual([]);
  });

  it('builds an immutable settings object', () => {
    const settings = createAnalyticsSettings({
      catalog: { version: 1, species: [{ name: 'Marsh tick', latinName: 'Dermacentor reticulatus', synonyms: [] }] },
      computeBudgetMs: 250,
    });

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.riskWeights.coat)).toBe(true);
    expect(settings.computeBudgetMs).toBe(250);
    expect(settings.species.resolve('marsh tick').species).toBe('Marsh tick');
  });

  it('does not freeze the shared default weights', () => {
    createAnalyticsSettings({
      catalog: { version: 1, species: [{ name: 'Marsh tick', latinName: 'Dermacentor reticulatus', synonyms: [] }] },
    });
    expect(Object.isFrozen(DEFAULT_RISK_WEIGHTS.coat)).toBe(false);
  });
});
