import { describe, it, expect } from 'vitest';
import {
  deriveGrowthRates,
  EXPERIENCE_RATES,
  growthInputsFor,
  NUTRITION_MULTIPLIERS,
  projectedAt,
  projectGrowth
} from '../src/engine/growth.js';
import { InvalidRangeError } from '../src/domain/errors.js';

describe('growth rates', () => {
  it('derives the band from experience and nutrition', () => {
    const rates = deriveGrowthRates(0.0125, 1.2);
    expect(rates.average).toBeCloseTo(0.015, 12);
    expect(rates.optimistic).toBeCloseTo(0.0225, 12);
    expect(rates.conservative).toBeCloseTo(0.0075, 12);
  });

  it('looks up the tables', () => {
    expect(growthInputsFor('elite', 'deficit')).toEqual({ experienceRate: 0.001, nutritionMultiplier: 0.5 });
    expect(growthInputsFor('intermediate', 'maintenance')).toEqual({ experienceRate: 0.006, nutritionMultiplier: 0.9 });
  });
});

describe('projectGrowth', () => {
  it('projects a beginner in surplus over two weeks', () => {
    const series = projectGrowth(100, 0.0125, 1.2, 2);
    expect(series).toHaveLength(3);
    expect(series[0]).toEqual({ week: 0, average: 100, optimistic: 100, conservative: 100 });
    expect(series[1].average).toBeCloseTo(101.5, 10);
    expect(series[1].optimistic).toBeCloseTo(102.25, 10);
    expect(series[1].conservative).toBeCloseTo(100.75, 10);
    expect(series[2].average).toBeCloseTo(103.0225, 10);
  });

  it('returns a single row for zero weeks', () => {
    expect(projectGrowth(140, 0.006, 0.9, 0)).toEqual([
      { week: 0, average: 140, optimistic: 140, conservative: 140 }
    ]);
  });

  it('keeps optimistic >= average >= conservative and never shrinks', () => {
    for (const rate of Object.values(EXPERIENCE_RATES)) {
      for (const multiplier of Object.values(NUTRITION_MULTIPLIERS)) {
        const series = projectGrowth(100, rate, multiplier, 24);
        expect(series).toHaveLength(25);
        series.forEach((row, i) => {
          expect(row.week).toBe(i);
          expect(row.optimistic).toBeGreaterThanOrEqual(row.average);
          expect(row.average).toBeGreaterThanOrEqual(row.conservative);
          if (i > 0) {
            expect(row.optimistic).toBeGreaterThanOrEqual(series[i - 1].optimistic);
            expect(row.average).toBeGreaterThanOrEqual(series[i - 1].average);
            expect(row.conservative).toBeGreaterThanOrEqual(series[i - 1].conservative);
          }
        });
      }
    }
  });

  it('matches week-by-week compounding', () => {
    const rate = 0.0025 * 1.2;
    let running = 180;
    const series = projectGrowth(180, 0.0025, 1.2, 12);
    for (const row of series) {
      expect(row.average).toBeCloseTo(running, 9);
      expect(row.average).toBeCloseTo(projectedAt(180, rate, row.week), 9);
      running *= 1 + rate;
    }
  });

  it('rejects negative or fractional horizons', () => {
    expect(() => projectGrowth(100, 0.01, 1.0, -3)).toThrow(InvalidRangeError);
    expect(() => projectGrowth(100, 0.01, 1.0, 1.5)).toThrow(InvalidRangeError);
  });
});
