const wholeNumber = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/** 185000 -> "185,000" */
export function formatAmount(value: number): string {
  return wholeNumber.format(value);
}

/** 0.92 -> "92%" */
export function formatPct(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

export function plural(count: number, word: string, pluralWord = `${word}s`): string {
  return count === 1 ? word : pluralWord;
}

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, value));
}

export function round(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) return 0;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
