/**
 * AgroCarbon - Tester för estimate.ts
 *
 * Testar computeEmissions:
 * - kategorisummor, totalsumma och säsongsjustering
 * - validering före beräkning
 * - saknade faktorer (ConfigurationError)
 */

import { describe, it, expect } from 'vitest';
import { computeEmissions } from '../../engine/estimate';
import { ValidationError, ConfigurationError } from '../../engine/errors';
import type { ActivityInput } from '../../models/ActivityInput';
import { testFactorTable, tableWithoutGoats, exampleInput, zeroInput, captureError } from '../fixtures/factorTable';

// ============================================================================
// DOKUMENTERAT EXEMPEL
// ============================================================================

describe('computeEmissions', () => {

  describe('documented example', () => {

    it('should compute 100 kg urea, 2 cattle, 20 L diesel in the dry season', () => {
      const report = computeEmissions(exampleInput, testFactorTable);

      expect(report.categories.fertilizer).toBeCloseTo(130, 10);
      expect(report.categories.livestock).toBe(1000);
      expect(report.categories.fuel).toBeCloseTo(53.6, 10);
      expect(report.grandTotal).toBeCloseTo(1183.6, 10);
      expect(report.adjustedTotal).toBeCloseTo(1183.6, 10);
      expect(report.seasonalMultiplier).toBe(1.0);
      expect(report.season).toBe('dry');
      expect(report.factorTableVersion).toBe('test-1');
    });

    it('should select tags in rule order without duplicates', () => {
      const report = computeEmissions(exampleInput, testFactorTable);

      expect(report.recommendations).toEqual(['FERTILIZER_REDUCE', 'LIVESTOCK_FEED_QUALITY', 'AGROFORESTRY']);
    });

    it('should break livestock down per species', () => {
      const input: ActivityInput = {
        ...exampleInput,
        livestock: { cattle: 2, goats: 3, poultry: 10 },
      };
      const report = computeEmissions(input, testFactorTable);

      expect(report.livestockBreakdown).toEqual({ cattle: 1000, goats: 60, poultry: 20 });
      expect(report.categories.livestock).toBe(1080);
    });

  });

  // ============================================================================
  // EGENSKAPER
  // ============================================================================

  describe('properties', () => {

    it('should return zero totals and no tags when every quantity is 0', () => {
      const report = computeEmissions(zeroInput, testFactorTable);

      expect(report.categories).toEqual({ fertilizer: 0, livestock: 0, fuel: 0 });
      expect(report.grandTotal).toBe(0);
      expect(report.adjustedTotal).toBe(0);
      expect(report.recommendations).toEqual([]);
    });

    it('should make the grand total the sum of the category subtotals', () => {
      const input: ActivityInput = {
        fertilizer: { type: 'synthetic-N', quantityKg: 37.5 },
        livestock: { sheep: 7, pigs: 3, rabbits: 11 },
        fuel: { type: 'petrol', volumeLiters: 12.25 },
        season: 'rainy',
      };
      const report = computeEmissions(input, testFactorTable);
      const { fertilizer, livestock, fuel } = report.categories;

      expect(report.grandTotal).toBeCloseTo(fertilizer + livestock + fuel, 10);
      expect(fertilizer).toBe(150);
      expect(livestock).toBe(7 * 25 + 3 * 40 + 11 * 1);
      expect(fuel).toBeCloseTo(28.175, 10);
    });

    it('should multiply the grand total by the rainy-season multiplier exactly', () => {
      const report = computeEmissions({ ...exampleInput, season: 'rainy' }, testFactorTable);

      expect(report.seasonalMultiplier).toBe(1.2);
      expect(report.adjustedTotal).toBe(report.grandTotal * 1.2);
      expect(report.adjustedTotal).toBeCloseTo(1420.32, 8);
    });

    it('should contribute 0 for subtype "none" whatever the quantity', () => {
      const input: ActivityInput = {
        fertilizer: { type: 'none', quantityKg: 500 },
        livestock: {},
        fuel: { type: 'none', volumeLiters: 80 },
        season: 'dry',
      };
      const report = computeEmissions(input, testFactorTable);

      expect(report.categories).toEqual({ fertilizer: 0, livestock: 0, fuel: 0 });
      expect(report.livestockBreakdown).toEqual({});
    });

    it('should report one FERTILIZER_REDUCE tag when both fertilizer thresholds are exceeded', () => {
      const input: ActivityInput = {
        fertilizer: { type: 'urea', quantityKg: 2000 },
        livestock: {},
        fuel: { type: 'none', volumeLiters: 0 },
        season: 'dry',
      };
      const report = computeEmissions(input, testFactorTable);

      expect(report.categories.fertilizer).toBe(2600);
      expect(report.recommendations).toEqual(['FERTILIZER_REDUCE', 'AGROFORESTRY']);
    });

    it('should return a frozen report', () => {
      const report = computeEmissions(exampleInput, testFactorTable);

      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.categories)).toBe(true);
      expect(Object.isFrozen(report.livestockBreakdown)).toBe(true);
      expect(Object.isFrozen(report.recommendations)).toBe(true);
    });

    it('should not mutate its input or the table and give equal reports for equal calls', () => {
      const inputCopy = JSON.parse(JSON.stringify(exampleInput));
      const tableCopy = JSON.parse(JSON.stringify(testFactorTable));

      const first = computeEmissions(exampleInput, testFactorTable);
      const second = computeEmissions(exampleInput, testFactorTable);

      expect(second).toEqual(first);
      expect(second).not.toBe(first);
      expect(exampleInput).toEqual(inputCopy);
      expect(testFactorTable).toEqual(tableCopy);
    });

  });

  // ============================================================================
  // VALIDERING
  // ============================================================================

  describe('validation', () => {

    it('should reject a negative fertilizer quantity', () => {
      const input: ActivityInput = { ...exampleInput, fertilizer: { type: 'urea', quantityKg: -1 } };
      expect(() => computeEmissions(input, testFactorTable)).toThrow(ValidationError);
    });

    it('should reject a negative livestock count', () => {
      const input: ActivityInput = { ...exampleInput, livestock: { cattle: -2 } };
      expect(() => computeEmissions(input, testFactorTable)).toThrow(ValidationError);
    });

    it('should reject a negative fuel volume', () => {
      const input: ActivityInput = { ...exampleInput, fuel: { type: 'diesel', volumeLiters: -0.5 } };
      expect(() => computeEmissions(input, testFactorTable)).toThrow(ValidationError);
    });

    it('should accept 0 as a boundary value', () => {
      expect(() => computeEmissions(zeroInput, testFactorTable)).not.toThrow();
    });

    it('should name the failing field', () => {
      const input: ActivityInput = { ...exampleInput, fuel: { type: 'diesel', volumeLiters: -3 } };

      const error = captureError(() => computeEmissions(input, testFactorTable));

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues.map((issue) => issue.field)).toEqual(['fuel.volumeLiters']);
        expect(error.statusCode).toBe(400);
      }
    });

  });

  // ============================================================================
  // STORA VÄRDEN OCH -0
  // ============================================================================

  describe('numeric limits', () => {

    function failingFields(input: ActivityInput): string[] {
      const error = captureError(() => computeEmissions(input, testFactorTable));
      expect(error).toBeInstanceOf(ValidationError);
      return error instanceof ValidationError ? error.issues.map((issue) => issue.field) : [];
    }

    it('should reject a fertilizer quantity whose emissions overflow', () => {
      const input: ActivityInput = { ...exampleInput, fertilizer: { type: 'urea', quantityKg: 1.7e308 } };

      expect(failingFields(input)).toEqual(['fertilizer.quantityKg']);
    });

    it('should reject a herd whose emissions overflow', () => {
      const input: ActivityInput = { ...exampleInput, livestock: { cattle: 1e306 } };

      expect(failingFields(input)).toEqual(['livestock.cattle']);
    });

    it('should reject finite subtotals whose sum overflows', () => {
      const input: ActivityInput = {
        fertilizer: { type: 'urea', quantityKg: 1e308 },
        livestock: {},
        fuel: { type: 'diesel', volumeLiters: 5e307 },
        season: 'dry',
      };

      expect(failingFields(input)).toEqual(['grandTotal']);
    });

    it('should reject a grand total that overflows after the seasonal multiplier', () => {
      const input: ActivityInput = {
        fertilizer: { type: 'urea', quantityKg: 1.3e308 },
        livestock: {},
        fuel: { type: 'none', volumeLiters: 0 },
        season: 'rainy',
      };

      expect(failingFields(input)).toEqual(['adjustedTotal']);
    });

    it('should report -0 quantities as 0', () => {
      const input: ActivityInput = {
        fertilizer: { type: 'urea', quantityKg: -0 },
        livestock: { cattle: -0 },
        fuel: { type: 'diesel', volumeLiters: -0 },
        season: 'dry',
      };
      const report = computeEmissions(input, testFactorTable);

      expect(Object.is(report.categories.fertilizer, 0)).toBe(true);
      expect(Object.is(report.categories.livestock, 0)).toBe(true);
      expect(Object.is(report.categories.fuel, 0)).toBe(true);
      expect(Object.is(report.livestockBreakdown.cattle, 0)).toBe(true);
      expect(Object.is(report.grandTotal, 0)).toBe(true);
      expect(Object.is(report.adjustedTotal, 0)).toBe(true);
      expect(report.recommendations).toEqual([]);
    });

  });

  // ============================================================================
  // KONFIGURATIONSFEL
  // ============================================================================

  describe('configuration errors', () => {

    it('should throw ConfigurationError when a used species has no factor', () => {
      const input: ActivityInput = { ...exampleInput, livestock: { goats: 3 } };

      const error = captureError(() => computeEmissions(input, tableWithoutGoats));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).not.toBeInstanceOf(ValidationError);
      if (error instanceof ConfigurationError) {
        expect(error.entries).toEqual(['livestock.goats']);
        expect(error.code).toBe('CONFIGURATION_ERROR');
      }
    });

    it('should not need the missing factor when the species is absent', () => {
      const report = computeEmissions(exampleInput, tableWithoutGoats);
      expect(report.categories.livestock).toBe(1000);
    });

    it('should throw ConfigurationError for a missing seasonal multiplier', () => {
      const table = { ...testFactorTable, seasonalMultipliers: { dry: 1.0 } };
      expect(() => computeEmissions({ ...exampleInput, season: 'rainy' }, table)).toThrow(ConfigurationError);
    });

    it('should report invalid input before a missing factor', () => {
      const input: ActivityInput = { ...exampleInput, livestock: { goats: -3 } };
      expect(() => computeEmissions(input, tableWithoutGoats)).toThrow(ValidationError);
    });

  });

});
