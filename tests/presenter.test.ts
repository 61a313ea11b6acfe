import { describe, it, expect } from 'vitest';
import { renderProjectionTable } from '../src/presenter/table.js';
import { renderProjectionChart } from '../src/presenter/chart.js';
import { renderComparison, renderLiftReport, renderSummary } from '../src/presenter/report.js';
import { buildLiftReport } from '../src/engine/report.js';
import { compareFormulas } from '../src/engine/one-rep-max.js';
import type { LiftRequest } from '../src/domain/types.js';

const request: LiftRequest = {
  weight: 100,
  reps: 5,
  formula: 'brzycki',
  experience: 'beginner',
  nutrition: 'surplus',
  weeks: 2,
  unit: 'kg'
};

describe('projection table', () => {
  it('aligns columns and rounds to one decimal', () => {
    const table = renderProjectionTable([
      { week: 0, average: 100, optimistic: 100, conservative: 100 },
      { week: 1, average: 101.5, optimistic: 102.26, conservative: 100.74 }
    ], 'Epley');

    expect(table.split('\n')).toEqual([
      'Week  Method  Average  Optimistic  Conservative',
      `   0  Epley${' '.repeat(5)}100.0${' '.repeat(7)}100.0${' '.repeat(9)}100.0`,
      `   1  Epley${' '.repeat(5)}101.5${' '.repeat(7)}102.3${' '.repeat(9)}100.7`
    ]);
  });
});

describe('projection chart', () => {
  it('draws the band between start and the best case', () => {
    const chart = renderProjectionChart([
      { week: 0, average: 100, optimistic: 100, conservative: 100 },
      { week: 1, average: 105, optimistic: 110, conservative: 102.5 }
    ], 4);

    expect(chart.split('\n')).toEqual([
      '0 │    │ 100.0',
      '1 │█▓░░│ 105.0'
    ]);
  });

  it('draws empty bars for a flat series', () => {
    expect(renderProjectionChart([{ week: 0, average: 100, optimistic: 100, conservative: 100 }], 3)).toBe('0 │   │ 100.0');
  });

  it('renders nothing for an empty series', () => {
    expect(renderProjectionChart([])).toBe('');
  });
});

describe('report rendering', () => {
  it('renders the summary metrics', () => {
    expect(renderSummary(buildLiftReport(request))).toBe([
      '<b>Current 1RM (Brzycki)</b>: 112.5 kg',
      '<b>Projected 1RM (week 2)</b>: 115.9 kg (+3.4 kg)',
      '<b>Growth rate</b>: 1.50% / week'
    ].join('\n'));
  });

  it('renders the formula comparison', () => {
    expect(renderComparison(compareFormulas(100, 5), 'lb')).toBe([
      '<b>Current 1RM by formula</b>',
      '- Epley: 116.7 lb',
      '- Brzycki: 112.5 lb',
      '- Lombardi: 117.5 lb',
      "- O'Conner: 112.5 lb"
    ].join('\n'));
  });

  it('puts chart and table in preformatted blocks', () => {
    const text = renderLiftReport(buildLiftReport(request));
    const lines = text.split('\n');
    expect(lines).toContain('<b>1RM projection using: Brzycki</b>');
    expect(lines).toContain('<b>Projection data</b>');
    expect(lines).toContain('<pre>Week  Method   Average  Optimistic  Conservative');
    expect(lines).toContain('█ conservative  ▓ average  ░ optimistic</pre>');
    expect(lines[lines.length - 1]).toBe("- O'Conner: 112.5 kg");
  });
});
