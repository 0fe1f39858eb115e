import { z } from 'zod';
import { Granularity, type FilterCriteria, type PetProfile } from '@tickwatch/shared';
import { config } from './config.js';
import { isDateKey } from './dates.js';

// Common validators
export const ulidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/);

// YYYY-MM-DD, or an ISO date-time whose date part is used
export const queryDateSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const datePart = value.slice(0, 10);
    const rest = value.slice(10);
    if (!isDateKey(datePart) || (rest !== '' && !/^[T ]\d{2}:\d{2}/.test(rest))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected a date (YYYY-MM-DD) or ISO date-time',
      });
      return z.NEVER;
    }
    return datePart;
  });

const filterFields = {
  start_date: queryDateSchema.optional(),
  end_date: queryDateSchema.optional(),
  location: z.string().trim().min(1).max(200).optional(),
  species: z.string().trim().min(1).max(200).optional(),
};

type FilterFields = {
  start_date?: string;
  end_date?: string;
  location?: string;
  species?: string;
};

function checkDateOrder(value: FilterFields, ctx: z.RefinementCtx): void {
  if (value.start_date && value.end_date && value.start_date > value.end_date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['end_date'],
      message: 'end_date must not be before start_date',
    });
  }
}

function toCriteria(value: FilterFields): FilterCriteria {
  return Object.freeze({
    ...(value.start_date && { startDate: value.start_date }),
    ...(value.end_date && { endDate: value.end_date }),
    ...(value.location && { location: value.location }),
    ...(value.species && { species: value.species }),
  });
}

// Query parameter schemas
export const filterQuerySchema = z
  .object(filterFields)
  .superRefine(checkDateOrder)
  .transform(toCriteria);

export const predictionQuerySchema = z
  .object({
    ...filterFields,
    days: z.coerce.number().int().min(1).max(config.api.maxHorizon).optional().default(config.api.defaultHorizon),
    granularity: z.nativeEnum(Granularity).optional().default(Granularity.DAY),
  })
  .superRefine(checkDateOrder)
  .transform((value) => ({
    criteria: toCriteria(value),
    horizon: value.days,
    granularity: value.granularity,
  }));

const MISSING_RISK_PARAM =
  'All parameters (lifestyle, coat, region_type) must be provided for risk factor calculation.';

const riskParam = z.string({ required_error: MISSING_RISK_PARAM }).trim().toLowerCase().min(1, MISSING_RISK_PARAM);

// Category membership is checked against the weight table by the risk service
export const riskQuerySchema = z
  .object({
    lifestyle: riskParam,
    coat: riskParam,
    region_type: riskParam,
    pet_species: z.string().trim().toLowerCase().min(1).optional(),
  })
  .transform(
    (value): PetProfile => ({
      lifestyle: value.lifestyle,
      coat: value.coat,
      regionType: value.region_type,
      ...(value.pet_species && { petSpecies: value.pet_species }),
    })
  );

export const sightingIdSchema = ulidSchema;

// Export types
export type FilterQueryInput = z.input<typeof filterQuerySchema>;
export type PredictionQuery = z.output<typeof predictionQuerySchema>;
export type RiskQueryInput = z.input<typeof riskQuerySchema>;
