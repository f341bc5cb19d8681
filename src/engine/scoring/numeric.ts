export function clamp(n: number, min: number, max: number): number {
  const x = Number(n);
  if (Number.isNaN(x)) return min;
  return Math.max(min, Math.min(max, x));
}

export function sum(values: number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

export function sumApproxOne(values: number[], tolerance: number): boolean {
  return Math.abs(sum(values) - 1) <= tolerance;
}

export function inClosedRange(x: number, min: number, max: number): boolean {
  return Number.isFinite(x) && x >= min && x <= max;
}

/** Rounds half away from zero to a fixed number of decimals. */
export function roundTo(x: number, decimals: number): number {
  const f = 10 ** decimals;
  return (Math.sign(x) * Math.round(Math.abs(x) * f)) / f;
}
