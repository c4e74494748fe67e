import { MarkupShapeError } from '../utils/errors.js';

// days -> hours -> minutes -> seconds
const UNIT_MULTIPLIERS = [24, 60, 60] as const;
const EXPECTED_TOKENS = 5;

/**
 * Convert `"40 days 05h:32m:52s.00"` into whole seconds (3479572).
 * The trailing hundredths are dropped.
 */
export function parseUptime(text: string): number {
  const tokens = text.trim().split(/\D+/);

  if (tokens.length !== EXPECTED_TOKENS || tokens.some((t) => !/^\d+$/.test(t))) {
    throw new MarkupShapeError(`Unrecognised uptime "${text}"`, {
      context: { uptime: text, tokens },
    });
  }

  const [days, ...rest] = tokens.slice(0, UNIT_MULTIPLIERS.length + 1).map(Number);
  return rest.reduce(
    (acc, next, i) => acc * (UNIT_MULTIPLIERS[i] ?? 1) + next,
    days ?? 0
  );
}
