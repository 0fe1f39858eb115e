// Normalization shared by ingestion and the query engine, so a filter typed
// in any casing hits the same keys the importer stored.

export interface SpeciesEntry {
  name: string;
  latinName: string;
  synonyms: string[];
}

export interface ResolvedSpecies {
  species: string;
  latinName?: string;
  recognized: boolean;
}

function collapseWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Lowercase and strip everything but letters and digits, in any script.
 * A value with neither keeps its whitespace-collapsed lowercase form, so
 * "???" and "!!" stay distinct.
 */
export function matchKey(value: string): string {
  const folded = value.normalize('NFKC').toLowerCase();
  const key = folded.replace(/[^\p{L}\p{N}]/gu, '');
  return key || collapseWhitespace(folded);
}

/**
 * Canonical location spelling: trimmed, single-spaced, each word capitalised.
 * Hyphenated parts are capitalised too ("Stoke-On-Trent").
 */
export function canonicalLocation(raw: string): string {
  return collapseWhitespace(raw)
    .toLowerCase()
    .replace(/(^|[\s\-(])(\p{L})/gu, (_, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

// Derived from the canonical spelling: capitalising is not always undone by
// lowercasing ("ß" becomes "SS"), and stored records hold the canonical form
export function locationKey(raw: string): string {
  return canonicalLocation(raw).toLowerCase();
}

/** Lookup of canonical species names by name, Latin name and synonym */
export class SpeciesIndex {
  private readonly byKey = new Map<string, SpeciesEntry>();

  constructor(public readonly entries: readonly SpeciesEntry[]) {
    for (const entry of entries) {
      for (const alias of [entry.name, entry.latinName, ...entry.synonyms]) {
        this.byKey.set(matchKey(alias), entry);
      }
    }
  }

  lookup(raw: string): SpeciesEntry | undefined {
    return this.byKey.get(matchKey(raw));
  }

  resolve(raw: string): ResolvedSpecies {
    const entry = this.lookup(raw);
    if (entry) {
      return { species: entry.name, latinName: entry.latinName, recognized: true };
    }
    return { species: collapseWhitespace(raw), recognized: false };
  }

  /** Key stored with each record and used by species filters */
  speciesKey(raw: string): string {
    return matchKey(this.resolve(raw).species);
  }
}
