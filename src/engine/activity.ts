import { z } from 'zod';
import {
  FERTILIZER_TYPES,
  LIVESTOCK_SPECIES,
  FUEL_TYPES,
  SEASONS,
} from '../models/ActivityInput';
import type { ActivityInput } from '../models/ActivityInput';
import { ValidationError } from './errors';

// =============================================================================
// SCHEMAN
// =============================================================================

// -0 passerar min(0); + 0 gör det till 0
const QuantitySchema = z.number().finite().min(0).transform((v) => v + 0);

export const FertilizerTypeSchema = z.enum(FERTILIZER_TYPES);
export const LivestockSpeciesSchema = z.enum(LIVESTOCK_SPECIES);
export const FuelTypeSchema = z.enum(FUEL_TYPES);
export const SeasonSchema = z.enum(SEASONS);

export const FertilizerSchema = z.object({
  type: FertilizerTypeSchema,
  quantityKg: QuantitySchema,
}).strict();

/**
 * Antal djur per art - heltal >= 0, bara kända arter
 */
export const LivestockCountsSchema = z.record(
  LivestockSpeciesSchema,
  z.number().int().min(0).transform((v) => v + 0),
);

export const FuelSchema = z.object({
  type: FuelTypeSchema,
  volumeLiters: QuantitySchema,
}).strict();

export const ActivityInputSchema = z.object({
  fertilizer: FertilizerSchema,
  livestock: LivestockCountsSchema,
  fuel: FuelSchema,
  season: SeasonSchema,
}).strict();

// =============================================================================
// KONSTRUKTION
// =============================================================================

/**
 * Validate loosely typed data into a frozen ActivityInput.
 * Throws ValidationError listing every failing field.
 */
export function createActivityInput(raw: unknown): ActivityInput {
  const result = ActivityInputSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZod('Invalid activity input', result.error);
  }

  const { fertilizer, livestock, fuel, season } = result.data;
  return Object.freeze({
    fertilizer: Object.freeze({ ...fertilizer }),
    livestock: Object.freeze({ ...livestock }),
    fuel: Object.freeze({ ...fuel }),
    season,
  });
}

/**
 * Samma regler som createActivityInput, för värden som byggts utan den
 */
export function assertValidActivityInput(input: ActivityInput): void {
  const result = ActivityInputSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod('Invalid activity input', result.error);
  }
}
