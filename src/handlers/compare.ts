import { compareFormulas } from '../engine/one-rep-max.js';
import { renderComparison } from '../presenter/report.js';
import { isLiftError } from '../domain/errors.js';
import { logWarn } from '../utils/logger.js';
import { buildLiftRequest } from './lift-request.js';

export function handleCompare(message: string): string {
  const built = buildLiftRequest(message);
  if (!built.ok) return built.reply;

  const { weight, reps, unit } = built.request;
  try {
    return renderComparison(compareFormulas(weight, reps), unit);
  } catch (err) {
    if (!isLiftError(err)) throw err;
    logWarn('lift_compare_failed', { code: err.code, error: err.message });
    return err.message;
  }
}
