import type { ExperienceLevel, GrowthRates, NutritionStatus, ProjectionSeries } from '../domain/types.js';
import { InvalidRangeError } from '../domain/errors.js';

// Weekly fractional gain of a trained lift
export const EXPERIENCE_RATES: Record<ExperienceLevel, number> = {
  beginner: 0.0125,
  intermediate: 0.006,
  advanced: 0.0025,
  elite: 0.001
};

export const NUTRITION_MULTIPLIERS: Record<NutritionStatus, number> = {
  surplus: 1.2,
  maintenance: 0.9,
  deficit: 0.5
};

const OPTIMISTIC_FACTOR = 1.5;
const CONSERVATIVE_FACTOR = 0.5;

export function growthInputsFor(experience: ExperienceLevel, nutrition: NutritionStatus) {
  return {
    experienceRate: EXPERIENCE_RATES[experience],
    nutritionMultiplier: NUTRITION_MULTIPLIERS[nutrition]
  };
}

export function deriveGrowthRates(experienceRate: number, nutritionMultiplier: number): GrowthRates {
  const average = experienceRate * nutritionMultiplier;
  return {
    average,
    optimistic: average * OPTIMISTIC_FACTOR,
    conservative: average * CONSERVATIVE_FACTOR
  };
}

export function projectedAt(start: number, rate: number, week: number): number {
  return start * Math.pow(1 + rate, week);
}

/**
 * Compound weekly growth from `start`, one row per week from 0 to `weeks` inclusive.
 * Row 0 is `start` in every column. Each row is computed directly rather than
 * accumulated, so any week can be read without replaying the ones before it.
 */
export function projectGrowth(
  start: number,
  experienceRate: number,
  nutritionMultiplier: number,
  weeks: number
): ProjectionSeries {
  if (!Number.isInteger(weeks) || weeks < 0) {
    throw new InvalidRangeError(`Weeks must be a whole number of at least 0, got ${weeks}`);
  }

  const rates = deriveGrowthRates(experienceRate, nutritionMultiplier);
  return Array.from({ length: weeks + 1 }, (_, week) => ({
    week,
    average: projectedAt(start, rates.average, week),
    optimistic: projectedAt(start, rates.optimistic, week),
    conservative: projectedAt(start, rates.conservative, week)
  }));
}
