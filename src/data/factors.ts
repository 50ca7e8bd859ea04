/**
 * Emissionsfaktorer
 * Data läses från data/emission-factors.json en gång vid uppstart
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  FERTILIZER_TYPES,
  LIVESTOCK_SPECIES,
  FUEL_TYPES,
  SEASONS,
} from '../models/ActivityInput';
import type { EmissionFactorTable } from '../models/EmissionFactorTable';
import { RECOMMENDATION_METRICS } from '../models/EmissionFactorTable';
import { ConfigurationError, getErrorMessage } from '../engine/errors';

export const DEFAULT_FACTOR_TABLE_PATH = path.join(__dirname, '../../data/emission-factors.json');

const FactorSchema = z.number().finite().min(0);

const ActiveFertilizerSchema = z.enum(['synthetic-N', 'urea', 'organic']);
const ActiveFuelSchema = z.enum(['diesel', 'petrol']);

export const RecommendationRuleSchema = z.object({
  metric: z.enum(RECOMMENDATION_METRICS),
  threshold: z.number().finite().min(0),
  tag: z.string().min(1),
});

export const EmissionFactorTableSchema = z.object({
  version: z.string().min(1),
  description: z.string().optional(),
  factors: z.object({
    fertilizer: z.record(ActiveFertilizerSchema, FactorSchema),
    livestock: z.record(z.enum(LIVESTOCK_SPECIES), FactorSchema),
    fuel: z.record(ActiveFuelSchema, FactorSchema),
  }),
  seasonalMultipliers: z.record(z.enum(SEASONS), FactorSchema),
  recommendationRules: z.array(RecommendationRuleSchema),
});

/**
 * Every entry a valid ActivityInput may need but the table lacks,
 * e.g. ['livestock.goats', 'seasonalMultipliers.rainy']
 */
export function findMissingEntries(table: EmissionFactorTable): string[] {
  const missing: string[] = [];

  for (const type of FERTILIZER_TYPES) {
    if (type !== 'none' && table.factors.fertilizer[type] === undefined) {
      missing.push(`fertilizer.${type}`);
    }
  }
  for (const species of LIVESTOCK_SPECIES) {
    if (table.factors.livestock[species] === undefined) {
      missing.push(`livestock.${species}`);
    }
  }
  for (const type of FUEL_TYPES) {
    if (type !== 'none' && table.factors.fuel[type] === undefined) {
      missing.push(`fuel.${type}`);
    }
  }
  for (const season of SEASONS) {
    if (table.seasonalMultipliers[season] === undefined) {
      missing.push(`seasonalMultipliers.${season}`);
    }
  }

  return missing;
}

/**
 * Validera rådata till en fryst, komplett faktortabell
 */
export function parseFactorTable(raw: unknown): EmissionFactorTable {
  const result = EmissionFactorTableSchema.safeParse(raw);
  if (!result.success) {
    const entries = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid emission factor table', entries);
  }

  const { version, description, factors, seasonalMultipliers, recommendationRules } = result.data;
  const table: EmissionFactorTable = Object.freeze({
    version,
    ...(description !== undefined ? { description } : {}),
    factors: Object.freeze({
      fertilizer: Object.freeze({ ...factors.fertilizer }),
      livestock: Object.freeze({ ...factors.livestock }),
      fuel: Object.freeze({ ...factors.fuel }),
    }),
    seasonalMultipliers: Object.freeze({ ...seasonalMultipliers }),
    recommendationRules: Object.freeze(recommendationRules.map((rule) => Object.freeze({ ...rule }))),
  });

  const missing = findMissingEntries(table);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Emission factor table ${version} is missing ${missing.length} entr${missing.length === 1 ? 'y' : 'ies'}`,
      missing
    );
  }

  return table;
}

/**
 * Läs och validera faktortabellen från fil
 */
export function loadFactorTable(filePath: string = DEFAULT_FACTOR_TABLE_PATH): EmissionFactorTable {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read emission factor table from ${filePath}: ${getErrorMessage(error)}`,
      [filePath]
    );
  }
  return parseFactorTable(raw);
}
