/**
 * Parses a stored or returned expiry into a Date.
 *
 * Numbers, and strings made only of digits, are epoch seconds. Other strings must
 * parse as a date. Values outside the range a Date can hold are rejected.
 * @param value - `expires_at` as found in a record or response
 * @returns The expiry, or null when it cannot be interpreted
 * @public
 */
export function parseExpiresAt(value: string | number): Date | null {
  if (typeof value === 'number') {
    return fromEpochMs(value * 1000);
  }

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return fromEpochMs(Number(trimmed) * 1000);
  }

  return fromEpochMs(Date.parse(trimmed));
}

/**
 * Date for an epoch in milliseconds, or null when it is not a representable time
 * @internal
 */
export function fromEpochMs(ms: number): Date | null {
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}
