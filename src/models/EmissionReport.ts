import type { LivestockSpecies, Season } from './ActivityInput';

export const EMISSION_CATEGORIES = ['fertilizer', 'livestock', 'fuel'] as const;

export type EmissionCategory = typeof EMISSION_CATEGORIES[number];

/**
 * Resultat av en beräkning, alla värden i kg CO2e
 */
export interface EmissionReport {
  readonly factorTableVersion: string;
  readonly categories: Readonly<Record<EmissionCategory, number>>;
  readonly livestockBreakdown: Readonly<Partial<Record<LivestockSpecies, number>>>;
  readonly grandTotal: number;
  readonly season: Season;
  readonly seasonalMultiplier: number;
  readonly adjustedTotal: number; // grandTotal × seasonalMultiplier
  readonly recommendations: readonly string[];
}

export type CarbonIntensity = 'low' | 'medium' | 'high' | 'very_high';

/**
 * Per-hectare metrics derived from a report
 */
export interface IntensitySummary {
  emissionsPerHectare: number; // kg CO2e/ha
  carbonIntensity: CarbonIntensity;
  reductionPotentialPercent: number; // % av nuvarande utsläpp
}
