import { SET_RE } from '../utils/parse-lift.js';

export type Intent = 'estimate' | 'compare' | 'help';

export function detectIntent(message: string): Intent {
  const m = message.toLowerCase().trim();

  if (/^\/(start|help)\b/.test(m)) return 'help';

  // Comparison needs a set to compare on
  if (/^\/compare\b|compare|all formulas/.test(m) && SET_RE.test(m)) return 'compare';

  if (SET_RE.test(m)) return 'estimate';

  return 'help';
}
