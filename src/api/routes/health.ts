/**
 * AgroCarbon - Health Check Route
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { EmissionFactorTable } from '../../models/EmissionFactorTable';

export default function healthRoutes(factorTable: EmissionFactorTable): Router {
  const router = Router();

  /**
   * GET /health
   * Health check endpoint
   */
  router.get('/', (req: Request, res: Response) => {
    res.json({
      success: true,
      status: 'OK',
      timestamp: new Date().toISOString(),
      factorTableVersion: factorTable.version,
    });
  });

  return router;
}
