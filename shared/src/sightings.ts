// A single observed tick, as stored and served
export interface SightingRecord {
  id: string;                 // ULID assigned at ingestion
  date: string;               // YYYY-MM-DD
  location: string;           // canonical casing
  species: string;            // canonical name when recognised
  latinName?: string;
  habitat?: string;
  host?: string;
  sourceId?: string;          // identifier found in the source row
  importId: string;
}

// Sighting filter; absent fields impose no constraint
export interface FilterCriteria {
  readonly startDate?: string;  // inclusive, YYYY-MM-DD
  readonly endDate?: string;    // inclusive, YYYY-MM-DD
  readonly location?: string;
  readonly species?: string;
}

export interface SightingListResult {
  items: SightingRecord[];
  total: number;
}
