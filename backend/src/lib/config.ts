// Environment configuration
export const config = {
  // AWS Region
  region: process.env.AWS_REGION || 'eu-west-2',

  // DynamoDB
  tables: {
    sightings: process.env.SIGHTINGS_TABLE || 'TickSightings',
  },
  // Local endpoint (e.g. DynamoDB Local) for development
  dynamoEndpoint: process.env.DYNAMODB_ENDPOINT || undefined,

  // API settings
  api: {
    defaultHorizon: 7,
    maxHorizon: 365,
    computeBudgetMs: Number(process.env.COMPUTE_BUDGET_MS) || 10_000,
  },

  // Ingestion
  ingestion: {
    earliestSightingDate: process.env.EARLIEST_SIGHTING_DATE || '1900-01-01',
    speciesCatalogPath: process.env.SPECIES_CATALOG_PATH || undefined,
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;

export type Config = typeof config;
