import type { ProjectionSeries } from '../domain/types.js';

export const CHART_LEGEND = '█ conservative  ▓ average  ░ optimistic';

/**
 * One bar per week. Bars share a scale from the starting value to the
 * highest optimistic value, so the three shades show the projection band.
 */
export function renderProjectionChart(series: ProjectionSeries, width = 20): string {
  const first = series[0];
  const last = series[series.length - 1];
  if (!first || !last) return '';

  const min = first.conservative;
  const span = last.optimistic - min;
  const position = (value: number) => (span > 0 ? Math.round(((value - min) / span) * width) : 0);
  const weekWidth = String(last.week).length;

  return series.map((r) => {
    const low = position(r.conservative);
    const avg = position(r.average);
    const high = position(r.optimistic);

    let bar = '';
    for (let i = 0; i < width; i++) {
      if (i < low) bar += '█';
      else if (i < avg) bar += '▓';
      else if (i < high) bar += '░';
      else bar += ' ';
    }

    return `${String(r.week).padStart(weekWidth)} │${bar}│ ${r.average.toFixed(1)}`;
  }).join('\n');
}
