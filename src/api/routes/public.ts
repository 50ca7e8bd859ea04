/**
 * AgroCarbon - Public API Routes
 * Endpoints for form options, emission factors and estimates
 */

import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import log from '../../utils/logger';
import {
  FERTILIZER_TYPES,
  LIVESTOCK_SPECIES,
  FUEL_TYPES,
  SEASONS,
} from '../../models/ActivityInput';
import type { EmissionFactorTable } from '../../models/EmissionFactorTable';
import {
  computeEmissions,
  createActivityInput,
  getCurrentSeason,
  summarizeIntensity,
} from '../../engine';
import {
  validateBody,
  EstimateRequestSchema,
  generateInputWarnings,
  type EstimateRequest,
} from '../validation';

export interface PublicRouteDeps {
  factorTable: EmissionFactorTable;
  requireApiKey: RequestHandler;
  estimateLimiter: RequestHandler;
}

export default function publicRoutes({ factorTable, requireApiKey, estimateLimiter }: PublicRouteDeps): Router {
  const router = Router();

  /**
   * GET /api/form-options
   * Listor för formulärets dropdowns
   */
  router.get('/form-options', (req: Request, res: Response) => {
    res.json({
      success: true,
      fertilizerTypes: FERTILIZER_TYPES,
      livestockSpecies: LIVESTOCK_SPECIES,
      fuelTypes: FUEL_TYPES,
      seasons: SEASONS,
      currentSeason: getCurrentSeason(),
      factorTableVersion: factorTable.version,
    });
  });

  /**
   * GET /api/factors
   * Returnera den laddade faktortabellen (read-only)
   */
  router.get('/factors', requireApiKey, (req: Request, res: Response) => {
    res.json({
      success: true,
      factorTable,
    });
  });

  /**
   * POST /api/estimate
   * Beräkna utsläpp för en gård
   */
  router.post('/estimate', requireApiKey, estimateLimiter, validateBody(EstimateRequestSchema), (req: Request, res: Response, next: NextFunction) => {
    try {
      const validatedData = req.body as EstimateRequest;
      const { fertilizer, livestock, fuel, farmSizeHa } = validatedData;
      const season = validatedData.season ?? getCurrentSeason();

      log.request('POST', '/api/estimate', {
        fertilizerType: fertilizer.type,
        fuelType: fuel.type,
        species: Object.keys(livestock),
        season,
      });

      const warnings = generateInputWarnings(validatedData);
      if (warnings.length > 0) {
        log.warn('Input warnings', { warnings });
      }

      const input = createActivityInput({ fertilizer, livestock, fuel, season });
      const report = computeEmissions(input, factorTable);

      log.estimate(`Estimate ${report.adjustedTotal.toFixed(1)} kg CO2e`, {
        version: report.factorTableVersion,
        recommendations: report.recommendations.length,
      });

      const response: Record<string, unknown> = {
        success: true,
        input,
        report,
      };

      if (farmSizeHa !== undefined) {
        response.metrics = { farmSizeHa, ...summarizeIntensity(report, farmSizeHa) };
      }

      if (warnings.length > 0) {
        response.warnings = warnings;
      }

      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
