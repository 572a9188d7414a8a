/**
 * Strips dashes, spaces and a `customers/` prefix: `123-456-7890` becomes `1234567890`.
 * @throws {Error} When anything but digits remains
 */
export function normalizeCustomerId(value: string): string {
  const digits = value
    .trim()
    .replace(/^customers\//, '')
    .replace(/[\s-]/g, '');
  if (!/^\d+$/.test(digits)) {
    throw new Error(`"${value}" is not a customer id`);
  }
  return digits;
}

/**
 * `2840` or `geoTargetConstants/2840` both become `geoTargetConstants/2840`.
 */
export function toResourceName(collection: string, id: string): string {
  const trimmed = id.trim();
  return trimmed.startsWith(`${collection}/`) ? trimmed : `${collection}/${trimmed}`;
}
