import { CONFIG, type LiftDefaults } from '../config.js';
import { FORMULA_LABELS } from '../engine/one-rep-max.js';
import { escapeHtml } from '../utils/format.js';

export function handleHelp(defaults: LiftDefaults = CONFIG.defaults): string {
  const formulas = Object.values(FORMULA_LABELS).map(escapeHtml).join(', ');

  return [
    'Send a set you lifted and I will estimate your 1RM and project it forward.',
    '',
    'Examples:',
    '- <code>100x5</code>',
    '- <code>140 kg x 3 brzycki intermediate deficit 12 weeks</code>',
    '- <code>/compare 225lb x 5</code> compares every formula',
    '',
    `Formulas: ${formulas}`,
    'Experience: beginner, intermediate, advanced, elite',
    'Nutrition: surplus, maintenance, deficit',
    '',
    `Defaults: ${escapeHtml(FORMULA_LABELS[defaults.formula])}, ${defaults.experience}, ${defaults.nutrition}, ${defaults.weeks} weeks, ${defaults.unit}`
  ].join('\n');
}
