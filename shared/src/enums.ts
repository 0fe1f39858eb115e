// Time bucket size for aggregation and forecasting
export const Granularity = {
  DAY: 'day',
  WEEK: 'week',
  MONTH: 'month',
} as const;
export type Granularity = (typeof Granularity)[keyof typeof Granularity];

// Pet coat length
export const CoatType = {
  SHORT: 'short',
  MEDIUM: 'medium',
  LONG: 'long',
} as const;
export type CoatType = (typeof CoatType)[keyof typeof CoatType];

// How much time the pet spends outdoors
export const Lifestyle = {
  INDOOR: 'indoor',
  MIXED: 'mixed',
  OUTDOOR: 'outdoor',
} as const;
export type Lifestyle = (typeof Lifestyle)[keyof typeof Lifestyle];

// Kind of area the pet lives in
export const RegionType = {
  URBAN: 'urban',
  SUBURBAN: 'suburban',
  RURAL: 'rural',
} as const;
export type RegionType = (typeof RegionType)[keyof typeof RegionType];

// Optional risk modifier
export const PetSpecies = {
  DOG: 'dog',
  CAT: 'cat',
} as const;
export type PetSpecies = (typeof PetSpecies)[keyof typeof PetSpecies];

// Qualitative risk label
export const RiskBand = {
  LOW: 'LOW',
  MEDIUM: 'MEDIUM',
  HIGH: 'HIGH',
} as const;
export type RiskBand = (typeof RiskBand)[keyof typeof RiskBand];

// Import manifest lifecycle
export const ImportStatus = {
  PENDING: 'PENDING',
  COMMITTED: 'COMMITTED',
  ABORTED: 'ABORTED',
} as const;
export type ImportStatus = (typeof ImportStatus)[keyof typeof ImportStatus];

// Why an ingestion row was rejected
export const RejectionReason = {
  MISSING_FIELD: 'missing-field',
  UNPARSEABLE_DATE: 'unparseable-date',
  FUTURE_DATE: 'future-date',
  IMPLAUSIBLE_DATE: 'implausible-date',
  DUPLICATE_ID: 'duplicate-id',
} as const;
export type RejectionReason = (typeof RejectionReason)[keyof typeof RejectionReason];

// Non-fatal ingestion findings
export const WarningKind = {
  UNRECOGNIZED_SPECIES: 'unrecognized-species',
} as const;
export type WarningKind = (typeof WarningKind)[keyof typeof WarningKind];
