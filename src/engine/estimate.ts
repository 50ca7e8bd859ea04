import type { ActivityInput, LivestockSpecies } from '../models/ActivityInput';
import { LIVESTOCK_SPECIES } from '../models/ActivityInput';
import type { EmissionFactorTable } from '../models/EmissionFactorTable';
import type { EmissionReport } from '../models/EmissionReport';
import { assertValidActivityInput } from './activity';
import { ConfigurationError, ValidationError } from './errors';
import { selectRecommendations } from './recommend';

/**
 * Slå upp en faktor, eller kasta ConfigurationError om posten saknas
 */
function requireFactor<K extends string>(
  table: Readonly<Partial<Record<K, number>>>,
  key: K,
  entryName: string,
  version: string
): number {
  const factor = table[key];
  if (factor === undefined) {
    throw new ConfigurationError(
      `Factor table ${version} has no entry for ${entryName}`,
      [entryName]
    );
  }
  return factor;
}

/**
 * Ett giltigt men enormt värde kan ge Infinity vid multiplikation.
 * Returnerar summan med -0 normaliserat till 0.
 */
function requireFinite(value: number, field: string, label: string): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${label} is too large to compute`, [
      { field, message: 'Result exceeds the largest representable number', code: 'too_big' },
    ]);
  }
  return value + 0;
}

function fertilizerEmissions(input: ActivityInput, factors: EmissionFactorTable): number {
  const { type, quantityKg } = input.fertilizer;
  if (type === 'none') {
    return 0;
  }
  const factor = requireFactor(factors.factors.fertilizer, type, `fertilizer.${type}`, factors.version);
  return quantityKg * factor;
}

function fuelEmissions(input: ActivityInput, factors: EmissionFactorTable): number {
  const { type, volumeLiters } = input.fuel;
  if (type === 'none') {
    return 0;
  }
  const factor = requireFactor(factors.factors.fuel, type, `fuel.${type}`, factors.version);
  return volumeLiters * factor;
}

/**
 * Summera count × faktor per art, i den fasta artordningen
 */
function livestockEmissions(
  input: ActivityInput,
  factors: EmissionFactorTable
): { total: number; breakdown: Partial<Record<LivestockSpecies, number>> } {
  const breakdown: Partial<Record<LivestockSpecies, number>> = {};
  let total = 0;

  for (const species of LIVESTOCK_SPECIES) {
    const count = input.livestock[species];
    if (count === undefined) {
      continue;
    }
    const factor = requireFactor(factors.factors.livestock, species, `livestock.${species}`, factors.version);
    const contribution = requireFinite(count * factor, `livestock.${species}`, `Livestock emissions for ${species}`);
    breakdown[species] = contribution;
    total += contribution;
  }

  return { total: requireFinite(total, 'livestock', 'Livestock emissions'), breakdown };
}

/**
 * Huvudfunktion: beräkna utsläppsrapport för en gård
 *
 * Pure and synchronous. Input is validated before any factor lookup, so a
 * ValidationError always wins over a ConfigurationError and no partial
 * report is ever produced.
 *
 * @example 100 kg urea (1.3), 2 cattle (500), 20 L diesel (2.68), dry (1.0)
 *   fertilizer 130 + livestock 1000 + fuel 53.6 = 1183.6, adjusted 1183.6
 */
export function computeEmissions(input: ActivityInput, factors: EmissionFactorTable): EmissionReport {
  assertValidActivityInput(input);

  const fertilizer = requireFinite(fertilizerEmissions(input, factors), 'fertilizer.quantityKg', 'Fertilizer emissions');
  const livestock = livestockEmissions(input, factors);
  const fuel = requireFinite(fuelEmissions(input, factors), 'fuel.volumeLiters', 'Fuel emissions');

  const seasonalMultiplier = requireFactor(
    factors.seasonalMultipliers,
    input.season,
    `seasonalMultipliers.${input.season}`,
    factors.version
  );

  const grandTotal = requireFinite(fertilizer + livestock.total + fuel, 'grandTotal', 'Total emissions');
  const adjustedTotal = requireFinite(grandTotal * seasonalMultiplier, 'adjustedTotal', 'Season-adjusted emissions');

  const recommendations = selectRecommendations(
    { fertilizer, livestock: livestock.total, fuel, total: grandTotal },
    factors.recommendationRules
  );

  return Object.freeze({
    factorTableVersion: factors.version,
    categories: Object.freeze({ fertilizer, livestock: livestock.total, fuel }),
    livestockBreakdown: Object.freeze(livestock.breakdown),
    grandTotal,
    season: input.season,
    seasonalMultiplier,
    adjustedTotal,
    recommendations: Object.freeze(recommendations),
  });
}
