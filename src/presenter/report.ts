import type { FormulaComparison, LiftReport, WeightUnit } from '../domain/types.js';
import { BASE_FORMULAS, FORMULA_LABELS } from '../engine/one-rep-max.js';
import { escapeHtml, formatDelta, formatWeeklyRate, formatWeight } from '../utils/format.js';
import { CHART_LEGEND, renderProjectionChart } from './chart.js';
import { renderProjectionTable } from './table.js';

export function renderSummary(report: LiftReport): string {
  const { request, current, projected, delta, rates } = report;
  const label = escapeHtml(FORMULA_LABELS[request.formula]);

  return [
    `<b>Current 1RM (${label})</b>: ${formatWeight(current, request.unit)}`,
    `<b>Projected 1RM (week ${request.weeks})</b>: ${formatWeight(projected, request.unit)} (${formatDelta(delta, request.unit)})`,
    `<b>Growth rate</b>: ${formatWeeklyRate(rates.average)}`
  ].join('\n');
}

export function renderComparison(comparison: FormulaComparison, unit: WeightUnit): string {
  const lines = BASE_FORMULAS.map((f) => `- ${escapeHtml(FORMULA_LABELS[f])}: ${formatWeight(comparison[f], unit)}`);
  return ['<b>Current 1RM by formula</b>', ...lines].join('\n');
}

export function renderLiftReport(report: LiftReport): string {
  const label = escapeHtml(FORMULA_LABELS[report.request.formula]);

  return [
    renderSummary(report),
    '',
    `<b>1RM projection using: ${label}</b>`,
    `<pre>${escapeHtml(renderProjectionChart(report.series))}\n${CHART_LEGEND}</pre>`,
    '',
    '<b>Projection data</b>',
    `<pre>${escapeHtml(renderProjectionTable(report.series, FORMULA_LABELS[report.request.formula]))}</pre>`,
    '',
    renderComparison(report.comparison, report.request.unit)
  ].join('\n');
}
