import type { ActiveFertilizerType, ActiveFuelType, LivestockSpecies, Season } from './ActivityInput';

export const RECOMMENDATION_METRICS = ['fertilizer', 'livestock', 'fuel', 'total'] as const;

export type RecommendationMetric = typeof RECOMMENDATION_METRICS[number];

/**
 * Tröskelregel: taggen ges när metric > threshold
 */
export interface RecommendationRule {
  readonly metric: RecommendationMetric;
  readonly threshold: number; // kg CO2e
  readonly tag: string;
}

/**
 * Versioned emission-factor dataset, all factors in kg CO2e per unit
 */
export interface EmissionFactorTable {
  readonly version: string;
  readonly description?: string;
  readonly factors: {
    readonly fertilizer: Readonly<Partial<Record<ActiveFertilizerType, number>>>; // per kg
    readonly livestock: Readonly<Partial<Record<LivestockSpecies, number>>>;      // per head and year
    readonly fuel: Readonly<Partial<Record<ActiveFuelType, number>>>;             // per litre
  };
  readonly seasonalMultipliers: Readonly<Partial<Record<Season, number>>>;
  readonly recommendationRules: readonly RecommendationRule[];
}
