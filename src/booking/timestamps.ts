const ISO_LOCAL_PATTERN = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2})?)(\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parse an upstream ISO 8601 timestamp. Values without an offset are UTC, and
 * fractional seconds beyond milliseconds are truncated.
 */
export function parseUpstreamTimestamp(value: string): Date | undefined {
  const match = ISO_LOCAL_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, base, fraction, zone] = match;
  const millis = fraction ? fraction.slice(0, 4).padEnd(4, '0') : '';
  const offset = zone ? zone.toUpperCase().replace(/^([+-]\d{2})(\d{2})$/, '$1:$2') : 'Z';
  const parsed = new Date(`${base}${millis}${offset}`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}
