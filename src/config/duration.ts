const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;
const WHOLE = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h))+$/;

/**
 * Parses a duration such as `500ms`, `30s`, `1m30s` or `1.5h` into
 * milliseconds. A bare `0` is accepted; any other unitless value is not.
 *
 * @throws Error when the value is not a valid duration
 */
export function parseDuration(value: string): number {
  const trimmed = value.trim();
  if (trimmed === '0') return 0;

  if (!WHOLE.test(trimmed)) {
    throw new Error(`Invalid duration "${value}"`);
  }

  let total = 0;
  for (const [, amount, unit] of trimmed.matchAll(SEGMENT)) {
    total += Number.parseFloat(amount) * UNIT_MS[unit];
  }
  return Math.round(total);
}
