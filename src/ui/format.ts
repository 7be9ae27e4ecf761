const formatters = new Map<number, Intl.NumberFormat>();

/** Fixed decimals with thousands separators, e.g. 6771 -> "6,771.00". */
export function formatNumber(value: number, decimals: number): string {
  let nf = formatters.get(decimals);
  if (!nf) {
    nf = new Intl.NumberFormat('en-US', {
      minimumFractionDigits: decimals,
      maximumFractionDigits: decimals,
    });
    formatters.set(decimals, nf);
  }
  return nf.format(value);
}

const pad2 = (n: number) => n.toString().padStart(2, '0');

/** Seconds as HH:MM:SS (hours may exceed 24). */
export function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);
  return `${pad2(hours)}:${pad2(mins)}:${pad2(secs)}`;
}

/** UTC timestamp as YYYY-MM-DD HH:MM. */
export function formatTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} `
    + `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`;
}
