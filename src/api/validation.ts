/**
 * AgroCarbon API Input Validation Schemas
 *
 * Använder Zod för typsäker validering av alla API-requests.
 * Request-scheman bygger på samma delscheman som ActivityInput,
 * så HTTP-lagret och beräkningen delar exakt samma regler.
 */

import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import log from '../utils/logger';
import {
  FertilizerSchema,
  FuelSchema,
  LivestockCountsSchema,
  SeasonSchema,
} from '../engine/activity';
import { toFieldIssues } from '../engine/errors';

// =============================================================================
// API ENDPOINT SCHEMAN
// =============================================================================

/**
 * POST /api/estimate
 *
 * Fertilizer, livestock and fuel default to "nothing"; season defaults to
 * the current Cameroonian season in the route.
 */
export const EstimateRequestSchema = z.object({
  fertilizer: FertilizerSchema.optional().default({ type: 'none', quantityKg: 0 }),
  livestock: LivestockCountsSchema.optional().default({}),
  fuel: FuelSchema.optional().default({ type: 'none', volumeLiters: 0 }),
  season: SeasonSchema.optional(),
  farmSizeHa: z.number().finite().positive().optional(),
}).strict();

export type EstimateRequest = z.infer<typeof EstimateRequestSchema>;

// =============================================================================
// VALIDERINGS-MIDDLEWARE
// =============================================================================

/**
 * Skapar en Express-middleware som validerar request body mot ett Zod-schema
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const errors = toFieldIssues(result.error);

      log.warn('Validation failed', {
        path: req.path,
        errors,
      });

      return res.status(400).json({
        success: false,
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: errors,
      });
    }

    // Ersätt body med validerad och transformerad data
    req.body = result.data;
    next();
  };
}

// =============================================================================
// VARNINGS-GENERATOR
// =============================================================================

const LARGE_HERD = 500;
const LARGE_FERTILIZER_KG = 50000;

/**
 * Warnings for inputs that are valid but probably not what the farmer meant
 */
export function generateInputWarnings(data: EstimateRequest): string[] {
  const warnings: string[] = [];

  // Mängd angiven men typ "none" - bidrar 0
  if (data.fertilizer.type === 'none' && data.fertilizer.quantityKg > 0) {
    warnings.push(`Fertilizer quantity (${data.fertilizer.quantityKg} kg) ignored because fertilizer type is "none".`);
  }

  if (data.fuel.type === 'none' && data.fuel.volumeLiters > 0) {
    warnings.push(`Fuel volume (${data.fuel.volumeLiters} L) ignored because fuel type is "none".`);
  }

  if (data.fertilizer.quantityKg > LARGE_FERTILIZER_KG) {
    warnings.push(`Very high fertilizer quantity (${data.fertilizer.quantityKg} kg).`);
  }

  for (const [species, count] of Object.entries(data.livestock)) {
    if (count !== undefined && count > LARGE_HERD) {
      warnings.push(`Large ${species} herd (${count} head).`);
    }
  }

  return warnings;
}
