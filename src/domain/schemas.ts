import { z } from 'zod';

export const FormulaSchema = z.enum(['epley', 'brzycki', 'lombardi', 'oconner', 'average']);

export const ExperienceSchema = z.enum(['beginner', 'intermediate', 'advanced', 'elite']);

export const NutritionSchema = z.enum(['surplus', 'maintenance', 'deficit']);

export const UnitSchema = z.enum(['kg', 'lb']);

export const MAX_REPS = 30;
export const MAX_WEEKS = 24;

// Bounds for what the bot accepts; the engine itself only requires positive inputs.
export const LiftRequestSchema = z.object({
  weight: z.number().positive().max(1000),
  reps: z.number().int().min(1).max(MAX_REPS),
  formula: FormulaSchema,
  experience: ExperienceSchema,
  nutrition: NutritionSchema,
  weeks: z.number().int().min(1).max(MAX_WEEKS),
  unit: UnitSchema
});
