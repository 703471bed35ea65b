/**
 * Shared formatting utilities for terminal and CSV output.
 */

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const padding = Math.max(0, len - stripped.length);
  return str + ' '.repeat(padding);
}

/** Cut to `len` characters, marking the cut with an ellipsis */
export function truncate(str: string, len: number): string {
  return str.length <= len ? str : str.slice(0, Math.max(0, len - 1)) + '…';
}

/** Escape a value for CSV output (quote if it contains commas, quotes or line breaks) */
export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Format a dollar amount compactly ($1.50T, $394.33B, $5.00M) */
export function formatCurrency(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (abs >= 1e12) return `${sign}$${(abs / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${sign}$${(abs / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${sign}$${(abs / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `${sign}$${(abs / 1e3).toFixed(2)}K`;
  return `${sign}$${abs.toFixed(0)}`;
}
