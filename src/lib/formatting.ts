/**
 * Shared formatting utilities
 */

export interface CountSuffixes {
  plural?: string;
  singular?: string;
}

/**
 * Format a message containing a count.
 * "{count}" is replaced by the count, or "no" when it is zero.
 * "{s}" is replaced by the plural or singular suffix.
 *
 * formatCount(2, "Found {count} thread geometr{s}", { plural: "ies", singular: "y" })
 *   -> "Found 2 thread geometries"
 */
export function formatCount(count: number, format: string, suffixes: CountSuffixes = {}): string {
  const plural = suffixes.plural ?? "s";
  const singular = suffixes.singular ?? "";
  const countText = count !== 0 ? String(count) : "no";
  const suffix = count !== 1 ? plural : singular;
  return format.replace(/\{count\}/g, countText).replace(/\{s\}/g, suffix);
}

/**
 * Like formatCount, followed by " --> ok" or " --> NOT OK".
 */
export function formatCountCheck(
  count: number,
  condition: boolean,
  format: string,
  suffixes: CountSuffixes = {}
): string {
  return formatCount(count, format, suffixes) + (condition ? " --> ok" : " --> NOT OK");
}

/**
 * Format a dimension for tables: shortest round-trip representation, "." decimal separator.
 */
export function formatNumber(value: number): string {
  return String(value);
}

/**
 * Format a dimension with a fixed number of decimals.
 */
export function formatFixed(value: number, decimals: number = 2): string {
  return value.toFixed(decimals);
}

/**
 * Timestamp as "yyyyMMdd-HHmmss" in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
