import type { LiftReport, LiftRequest } from '../domain/types.js';
import { compareFormulas, estimateOneRepMax } from './one-rep-max.js';
import { deriveGrowthRates, growthInputsFor, projectGrowth } from './growth.js';

export function buildLiftReport(request: LiftRequest): LiftReport {
  const current = estimateOneRepMax(request.weight, request.reps, request.formula);
  const comparison = compareFormulas(request.weight, request.reps);

  const { experienceRate, nutritionMultiplier } = growthInputsFor(request.experience, request.nutrition);
  const rates = deriveGrowthRates(experienceRate, nutritionMultiplier);
  const series = projectGrowth(current, experienceRate, nutritionMultiplier, request.weeks);

  const last = series[series.length - 1];
  const projected = last ? last.average : current;

  return {
    request,
    current,
    rates,
    series,
    projected,
    delta: projected - current,
    comparison
  };
}
