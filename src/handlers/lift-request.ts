import type { ZodIssue } from 'zod';
import type { LiftRequest } from '../domain/types.js';
import { LiftRequestSchema, MAX_REPS, MAX_WEEKS } from '../domain/schemas.js';
import { isLiftError } from '../domain/errors.js';
import { parseLiftMessage, type ParsedLift } from '../utils/parse-lift.js';
import { CONFIG, type LiftDefaults } from '../config.js';
import { logWarn } from '../utils/logger.js';

export type LiftRequestResult =
  | { ok: true; request: LiftRequest }
  | { ok: false; reply: string };

const FIELD_HINTS: Record<string, string> = {
  weight: 'Weight must be above 0 and at most 1000.',
  reps: `Reps must be a whole number from 1 to ${MAX_REPS}.`,
  weeks: `Weeks must be a whole number from 1 to ${MAX_WEEKS}.`
};

function describeIssue(issue: ZodIssue): string {
  const field = String(issue.path[0] ?? '');
  return FIELD_HINTS[field] || `Invalid ${field || 'input'}: ${issue.message}`;
}

export function buildLiftRequest(message: string, defaults: LiftDefaults = CONFIG.defaults): LiftRequestResult {
  let parsed: ParsedLift;
  try {
    parsed = parseLiftMessage(message);
  } catch (err) {
    if (isLiftError(err)) {
      logWarn('lift_request_rejected', { code: err.code, error: err.message });
      return { ok: false, reply: err.message };
    }
    throw err;
  }

  const result = LiftRequestSchema.safeParse({ ...defaults, ...parsed });
  if (!result.success) {
    const hints = Array.from(new Set(result.error.issues.map(describeIssue)));
    logWarn('lift_request_rejected', { code: 'InvalidInput', issues: hints });
    return { ok: false, reply: hints.join('\n') };
  }

  return { ok: true, request: result.data };
}
