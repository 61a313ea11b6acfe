import type { WeightUnit } from '../domain/types.js';

export function formatWeight(value: number, unit: WeightUnit): string {
  return `${value.toFixed(1)} ${unit}`;
}

export function formatDelta(delta: number, unit: WeightUnit): string {
  const sign = delta >= 0 ? '+' : '';
  return `${sign}${delta.toFixed(1)} ${unit}`;
}

export function formatWeeklyRate(rate: number): string {
  return `${(rate * 100).toFixed(2)}% / week`;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
