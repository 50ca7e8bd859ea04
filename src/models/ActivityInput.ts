export const FERTILIZER_TYPES = ['synthetic-N', 'urea', 'organic', 'none'] as const;
export const LIVESTOCK_SPECIES = ['cattle', 'goats', 'sheep', 'pigs', 'poultry', 'rabbits'] as const;
export const FUEL_TYPES = ['diesel', 'petrol', 'none'] as const;
export const SEASONS = ['rainy', 'dry'] as const;

export type FertilizerType = typeof FERTILIZER_TYPES[number];
export type LivestockSpecies = typeof LIVESTOCK_SPECIES[number];
export type FuelType = typeof FUEL_TYPES[number];
export type Season = typeof SEASONS[number];

/** Subtypes that carry an emission factor ('none' never does) */
export type ActiveFertilizerType = Exclude<FertilizerType, 'none'>;
export type ActiveFuelType = Exclude<FuelType, 'none'>;

/**
 * Antal djur per art. En art som saknas räknas som 0.
 */
export type LivestockCounts = Readonly<Partial<Record<LivestockSpecies, number>>>;

/**
 * Farm activity for one estimate
 */
export interface ActivityInput {
  readonly fertilizer: {
    readonly type: FertilizerType;
    readonly quantityKg: number; // kg applied
  };
  readonly livestock: LivestockCounts;
  readonly fuel: {
    readonly type: FuelType;
    readonly volumeLiters: number; // L burned
  };
  readonly season: Season;
}
