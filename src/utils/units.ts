/**
 * Unit parsing and rounding helpers for resource figures and prices
 */

const MEMORY_UNITS_IN_GB: Record<string, number> = {
  b: 1 / (1024 * 1024 * 1024),
  k: 1 / (1024 * 1024),
  m: 1 / 1024,
  g: 1,
  t: 1024,
};

/**
 * Parse a memory figure into GB.
 * Bare numbers are GB; strings accept B, K/KB/Ki/KiB, M/MB/Mi, G/GB/Gi, T/TB/Ti.
 */
export function parseMemoryGB(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const match = value.trim().toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(?:([bkmgt])(?:i?b|i)?)?$/);
  if (!match || !match[1]) {
    return undefined;
  }

  const amount = parseFloat(match[1]);
  const factor = MEMORY_UNITS_IN_GB[match[2] ?? 'g'] ?? 1;
  return amount * factor;
}

/**
 * Parse a vCPU count from a number or numeric string ("4", "2.5")
 */
export function parseCpu(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }
  if (typeof value !== 'string' || !/^\s*\d+(?:\.\d+)?\s*$/.test(value)) {
    return undefined;
  }
  return parseFloat(value);
}

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Round a money amount to cents
 */
export function roundCurrency(value: number): number {
  return roundTo(value, 2);
}

/**
 * Format a money amount, e.g. "$520.92"
 */
export function formatCurrency(value: number, currency = 'USD'): string {
  const fixed = value.toFixed(2);
  return currency === 'USD' ? `$${fixed}` : `${fixed} ${currency}`;
}
