import type { ExperienceLevel, LiftRequest, NutritionStatus, WeightUnit } from '../domain/types.js';
import { parseFormula } from '../engine/one-rep-max.js';

export type ParsedLift = Partial<LiftRequest>;

// "100x5", "100 kg x 5", "102,5×3", "1,000 lb x 2", "225lb * 3", "100 for 5 reps"
export const SET_RE = /(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:[.,]\d+)?)\s*(kg|lbs?)?\s*(?:[x×*]|for)\s*(\d+)/i;
const GROUPED_RE = /^\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;
const FORMULA_RE = /\b(epley|brzycki|lombardi|o\s*['’]?\s*conn[eo]r|average|avg|mean)\b/i;
const WEEKS_RE = /\b(\d{1,3})\s*(?:weeks?|wks?|w)\b/i;

function toNumber(raw: string): number {
  // "1,000" groups thousands, "102,5" is a decimal comma
  if (GROUPED_RE.test(raw)) return Number(raw.replace(/,/g, ''));
  return Number(raw.replace(',', '.'));
}

function normalizeUnit(raw: string): WeightUnit {
  return /^lb|^pound/i.test(raw) ? 'lb' : 'kg';
}

export function extractSet(message: string): { weight: number; reps: number; unit?: WeightUnit } | null {
  const m = message.match(SET_RE);
  if (!m) return null;
  return {
    weight: toNumber(m[1]),
    reps: Number(m[3]),
    unit: m[2] ? normalizeUnit(m[2]) : undefined
  };
}

export function extractExperience(message: string): ExperienceLevel | null {
  const m = message.toLowerCase();
  if (/beginner|novice/.test(m)) return 'beginner';
  if (/intermediate/.test(m)) return 'intermediate';
  if (/advanced/.test(m)) return 'advanced';
  if (/elite/.test(m)) return 'elite';
  return null;
}

export function extractNutrition(message: string): NutritionStatus | null {
  const m = message.toLowerCase();
  if (/surplus|\bbulk/.test(m)) return 'surplus';
  if (/maintenance|maintain/.test(m)) return 'maintenance';
  if (/deficit|\bcut/.test(m)) return 'deficit';
  return null;
}

export function extractWeeks(message: string): number | null {
  // The set itself ("100x5") must not be read as a horizon
  const rest = message.replace(SET_RE, ' ');
  const m = rest.match(WEEKS_RE);
  return m ? Number(m[1]) : null;
}

export function extractUnit(message: string): WeightUnit | null {
  const m = message.toLowerCase();
  if (/\b(lbs?|pounds?)\b/.test(m)) return 'lb';
  if (/\b(kgs?|kilos?)\b/.test(m)) return 'kg';
  return null;
}

/**
 * Reads whatever lift fields a free-text message mentions. Absent fields are
 * left out so the caller can fill them from defaults.
 */
export function parseLiftMessage(message: string): ParsedLift {
  const parsed: ParsedLift = {};

  const set = extractSet(message);
  if (set) {
    parsed.weight = set.weight;
    parsed.reps = set.reps;
    if (set.unit) parsed.unit = set.unit;
  }

  const formula = message.match(FORMULA_RE);
  if (formula) parsed.formula = parseFormula(formula[1]);

  const experience = extractExperience(message);
  if (experience) parsed.experience = experience;

  const nutrition = extractNutrition(message);
  if (nutrition) parsed.nutrition = nutrition;

  const weeks = extractWeeks(message);
  if (weeks !== null) parsed.weeks = weeks;

  if (!parsed.unit) {
    const unit = extractUnit(message);
    if (unit) parsed.unit = unit;
  }

  return parsed;
}
