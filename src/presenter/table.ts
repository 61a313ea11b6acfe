import type { ProjectionSeries } from '../domain/types.js';

const HEADER = ['Week', 'Method', 'Average', 'Optimistic', 'Conservative'];

// Method is the only left-aligned column
function alignCell(cell: string, width: number, column: number): string {
  return column === 1 ? cell.padEnd(width) : cell.padStart(width);
}

export function renderProjectionTable(series: ProjectionSeries, methodLabel: string): string {
  const rows = series.map((r) => [
    String(r.week),
    methodLabel,
    r.average.toFixed(1),
    r.optimistic.toFixed(1),
    r.conservative.toFixed(1)
  ]);

  const widths = HEADER.map((h, col) => Math.max(h.length, ...rows.map((row) => row[col].length)));

  return [HEADER, ...rows]
    .map((row) => row.map((cell, col) => alignCell(cell, widths[col], col)).join('  '))
    .join('\n');
}
