// Core types and enums for the tick sightings service
export * from './enums.js';
export * from './sightings.js';
export * from './statistics.js';
export * from './forecast.js';
export * from './risk.js';
export * from './ingestion.js';
export * from './api.js';
