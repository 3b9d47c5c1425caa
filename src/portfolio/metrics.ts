/** Minimum daily observations before a Sharpe ratio is reported. */
export const MIN_SHARPE_OBSERVATIONS = 30;

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Sample standard deviation (n - 1). */
export function stdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Percentile with linear interpolation between closest ranks.
 * `q` is a fraction in [0, 1].
 */
export function percentile(values: number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.min(Math.max(q, 0), 1) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const weight = rank - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

export function dailyReturns(equities: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equities.length; i++) {
    const previous = equities[i - 1];
    if (previous > 0) {
      returns.push(equities[i] / previous - 1);
    }
  }
  return returns;
}

/**
 * Annualized (√365, markets trade daily) Sharpe ratio of daily equity
 * observations. 0 below MIN_SHARPE_OBSERVATIONS or with zero variance.
 */
export function sharpeRatio(equities: number[], periodsPerYear = 365): number {
  if (equities.length < MIN_SHARPE_OBSERVATIONS) return 0;
  const returns = dailyReturns(equities);
  const deviation = stdDev(returns);
  if (deviation === 0) return 0;
  return (mean(returns) / deviation) * Math.sqrt(periodsPerYear);
}

/** Herfindahl index of exposure shares; 0 when nothing is exposed. */
export function herfindahl(exposures: number[]): number {
  const total = exposures.reduce((sum, value) => sum + Math.abs(value), 0);
  if (total === 0) return 0;
  return exposures.reduce((sum, value) => sum + (Math.abs(value) / total) ** 2, 0);
}

/**
 * Historical VaR as a positive amount: the (1 - confidence) percentile of
 * per-trade returns, scaled by equity. 0 when that percentile is a gain.
 */
export function valueAtRisk(tradeReturns: number[], confidence: number, equity: number): number {
  if (tradeReturns.length === 0) return 0;
  const cutoff = percentile(tradeReturns, 1 - confidence);
  return Math.max(0, -cutoff) * equity;
}
