import 'dotenv/config';
import { z } from 'zod';
import { ExperienceSchema, FormulaSchema, MAX_WEEKS, NutritionSchema, UnitSchema } from './domain/schemas.js';

const must = (key: string): string => {
  const val = process.env[key];
  if (val) return val;
  if (process.env.NODE_ENV === 'test') return `test-${key}`;
  throw new Error(`Missing env var: ${key}`);
};

const DefaultsSchema = z.object({
  unit: UnitSchema.default('kg'),
  weeks: z.coerce.number().int().min(1).max(MAX_WEEKS).default(8),
  formula: FormulaSchema.default('average'),
  experience: ExperienceSchema.default('beginner'),
  nutrition: NutritionSchema.default('surplus')
});

export type LiftDefaults = z.infer<typeof DefaultsSchema>;

export const CONFIG = {
  telegramToken: must('TELEGRAM_BOT_TOKEN'),
  defaults: DefaultsSchema.parse({
    unit: process.env.DEFAULT_UNIT || undefined,
    weeks: process.env.DEFAULT_WEEKS || undefined,
    formula: process.env.DEFAULT_FORMULA || undefined,
    experience: process.env.DEFAULT_EXPERIENCE || undefined,
    nutrition: process.env.DEFAULT_NUTRITION || undefined
  })
};
