import { buildLiftReport } from '../engine/report.js';
import { renderLiftReport } from '../presenter/report.js';
import { isLiftError } from '../domain/errors.js';
import { logInfo, logWarn } from '../utils/logger.js';
import { buildLiftRequest } from './lift-request.js';

export function handleEstimate(message: string): string {
  const built = buildLiftRequest(message);
  if (!built.ok) return built.reply;

  try {
    const report = buildLiftReport(built.request);
    logInfo('lift_estimated', {
      formula: built.request.formula,
      weeks: built.request.weeks,
      current: report.current,
      projected: report.projected
    });
    return renderLiftReport(report);
  } catch (err) {
    if (!isLiftError(err)) throw err;
    logWarn('lift_estimate_failed', { code: err.code, error: err.message });
    return err.message;
  }
}
