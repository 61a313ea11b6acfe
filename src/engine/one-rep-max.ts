import type { BaseFormula, FormulaComparison, FormulaKind } from '../domain/types.js';
import { InvalidInputError, UnknownFormulaError } from '../domain/errors.js';

export const BASE_FORMULAS: readonly BaseFormula[] = ['epley', 'brzycki', 'lombardi', 'oconner'];

export const FORMULA_LABELS: Record<FormulaKind, string> = {
  epley: 'Epley',
  brzycki: 'Brzycki',
  lombardi: 'Lombardi',
  oconner: "O'Conner",
  average: 'Average'
};

// Brzycki's denominator (37 - reps) reaches zero here
const BRZYCKI_LIMIT = 37;

export function epley(weight: number, reps: number): number {
  if (reps === 1) return weight;
  return weight * (1 + reps / 30);
}

export function brzycki(weight: number, reps: number): number {
  if (reps === 1) return weight;
  if (reps >= BRZYCKI_LIMIT) return weight;
  return weight * (36 / (BRZYCKI_LIMIT - reps));
}

export function lombardi(weight: number, reps: number): number {
  if (reps === 1) return weight;
  return weight * Math.pow(reps, 0.1);
}

export function oconner(weight: number, reps: number): number {
  if (reps === 1) return weight;
  return weight * (1 + 0.025 * reps);
}

function assertObservation(weight: number, reps: number) {
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new InvalidInputError(`Weight must be a positive number, got ${weight}`);
  }
  if (!Number.isInteger(reps) || reps < 1) {
    throw new InvalidInputError(`Reps must be a whole number of at least 1, got ${reps}`);
  }
}

function estimateBase(weight: number, reps: number, formula: BaseFormula): number {
  switch (formula) {
    case 'epley':
      return epley(weight, reps);
    case 'brzycki':
      return brzycki(weight, reps);
    case 'lombardi':
      return lombardi(weight, reps);
    case 'oconner':
      return oconner(weight, reps);
    default: {
      const unknown: never = formula;
      throw new UnknownFormulaError(String(unknown));
    }
  }
}

/**
 * Estimated one-rep max for a set of `reps` at `weight`.
 *
 * `average` is the mean of the four regressions, each evaluated on its own.
 * Throws `InvalidInputError` for a non-positive weight or rep count.
 */
export function estimateOneRepMax(weight: number, reps: number, formula: FormulaKind): number {
  assertObservation(weight, reps);
  if (formula === 'average') {
    const total = BASE_FORMULAS.reduce((sum, f) => sum + estimateBase(weight, reps, f), 0);
    return total / BASE_FORMULAS.length;
  }
  return estimateBase(weight, reps, formula);
}

export function compareFormulas(weight: number, reps: number): FormulaComparison {
  assertObservation(weight, reps);
  return {
    epley: estimateBase(weight, reps, 'epley'),
    brzycki: estimateBase(weight, reps, 'brzycki'),
    lombardi: estimateBase(weight, reps, 'lombardi'),
    oconner: estimateBase(weight, reps, 'oconner')
  };
}

export function parseFormula(label: string): FormulaKind {
  const m = label.toLowerCase().replace(/[\s'’`-]/g, '');
  if (m === 'epley') return 'epley';
  if (m === 'brzycki') return 'brzycki';
  if (m === 'lombardi') return 'lombardi';
  if (m === 'oconner' || m === 'oconnor') return 'oconner';
  if (m === 'average' || m === 'avg' || m === 'mean') return 'average';
  throw new UnknownFormulaError(label);
}
