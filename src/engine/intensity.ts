import type { CarbonIntensity, EmissionReport, IntensitySummary } from '../models/EmissionReport';
import { ValidationError } from './errors';

/**
 * Gränser för kolintensitet (kg CO2e/ha, övre gräns exklusiv)
 */
const INTENSITY_BANDS: ReadonlyArray<{ below: number; intensity: CarbonIntensity }> = [
  { below: 1000, intensity: 'low' },
  { below: 2000, intensity: 'medium' },
  { below: 4000, intensity: 'high' },
];

/**
 * Uppskattad minskningspotential (%) per intensitetsklass
 */
export const REDUCTION_POTENTIAL_PERCENT: Readonly<Record<CarbonIntensity, number>> = {
  low: 5,
  medium: 15,
  high: 25,
  very_high: 35,
};

export function classifyIntensity(emissionsPerHectare: number): CarbonIntensity {
  const band = INTENSITY_BANDS.find((b) => emissionsPerHectare < b.below);
  return band ? band.intensity : 'very_high';
}

/**
 * Season-adjusted emissions per hectare and their intensity class
 */
export function summarizeIntensity(report: EmissionReport, farmSizeHa: number): IntensitySummary {
  if (!Number.isFinite(farmSizeHa) || farmSizeHa <= 0) {
    throw new ValidationError('Farm size must be a positive number of hectares', [
      { field: 'farmSizeHa', message: 'Must be greater than 0', code: 'too_small' },
    ]);
  }

  const emissionsPerHectare = report.adjustedTotal / farmSizeHa;
  if (!Number.isFinite(emissionsPerHectare)) {
    throw new ValidationError('Farm size is too small to compute emissions per hectare', [
      { field: 'farmSizeHa', message: 'Emissions per hectare exceed the largest representable number', code: 'too_small' },
    ]);
  }

  const carbonIntensity = classifyIntensity(emissionsPerHectare);
  return {
    emissionsPerHectare,
    carbonIntensity,
    reductionPotentialPercent: REDUCTION_POTENTIAL_PERCENT[carbonIntensity],
  };
}
