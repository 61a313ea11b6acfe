export type FormulaKind = 'epley' | 'brzycki' | 'lombardi' | 'oconner' | 'average';

export type BaseFormula = Exclude<FormulaKind, 'average'>;

export type ExperienceLevel = 'beginner' | 'intermediate' | 'advanced' | 'elite';

export type NutritionStatus = 'surplus' | 'maintenance' | 'deficit';

export type WeightUnit = 'kg' | 'lb';

export interface LiftObservation {
  weight: number;
  reps: number;
}

export interface GrowthRates {
  average: number;
  optimistic: number;
  conservative: number;
}

export interface ProjectionRow {
  week: number;
  average: number;
  optimistic: number;
  conservative: number;
}

export type ProjectionSeries = ProjectionRow[];

export type FormulaComparison = Record<BaseFormula, number>;

export interface LiftRequest extends LiftObservation {
  formula: FormulaKind;
  experience: ExperienceLevel;
  nutrition: NutritionStatus;
  weeks: number;
  unit: WeightUnit;
}

export interface LiftReport {
  request: LiftRequest;
  current: number;
  rates: GrowthRates;
  series: ProjectionSeries;
  projected: number;
  delta: number;
  comparison: FormulaComparison;
}
