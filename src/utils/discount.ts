/**
 * Multiplier turning a cash flow at `year` into present value: 1/(1+rate)^year.
 * `year` may be fractional (generator replacements land between years).
 */
export function discountFactor(rate: number, year: number): number {
  return 1 / Math.pow(1 + rate, year);
}

/**
 * Discount factors for years 1..horizon (index 0 holds year 1).
 */
export function discountFactors(rate: number, horizon: number): number[] {
  const out: number[] = [];
  for (let i = 1; i <= horizon; i++) {
    out.push(discountFactor(rate, i));
  }
  return out;
}

export function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

/**
 * Capital recovery factor r(1+r)^N / ((1+r)^N - 1).
 * Degenerates to 1/N for a zero rate. (1+r)^N - 1 goes through expm1/log1p
 * so that rates too small to change 1 + r still give a finite factor.
 */
export function capitalRecoveryFactor(rate: number, horizon: number): number {
  if (rate === 0) return 1 / horizon;
  const growthLog = horizon * Math.log1p(rate);
  const denominator = Math.expm1(growthLog);
  if (denominator === 0) return 1 / horizon;
  return (rate * Math.exp(growthLog)) / denominator;
}
