import { WorkbookOpsError } from "../errors.js";

export const SUMMARY_METRICS = ["mean", "median", "sum", "min", "max", "count"] as const;

export type SummaryMetric = (typeof SUMMARY_METRICS)[number];

export type SummaryResults = Partial<Record<SummaryMetric, number>>;

export function sum(values: number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

// Loops instead of `Math.min(...values)`: spreading a large range exceeds the
// engine's argument limit.
export function min(values: number[]): number {
  let result = Number.POSITIVE_INFINITY;
  for (const value of values) if (value < result) result = value;
  return result;
}

export function max(values: number[]): number {
  let result = Number.NEGATIVE_INFINITY;
  for (const value of values) if (value > result) result = value;
  return result;
}

export function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? Number.NaN;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? Number.NaN) + upper) / 2;
}

/**
 * Computes the requested metrics in a fixed order. Only `count` is reported
 * when there are no values.
 */
export function summarize(values: number[], metrics: readonly SummaryMetric[]): SummaryResults {
  const requested = new Set(metrics);
  const results: SummaryResults = {};
  const hasValues = values.length > 0;

  for (const metric of SUMMARY_METRICS) {
    if (!requested.has(metric)) continue;
    switch (metric) {
      case "mean":
        if (hasValues) results.mean = sum(values) / values.length;
        break;
      case "median":
        if (hasValues) results.median = median(values);
        break;
      case "sum":
        if (hasValues) results.sum = sum(values);
        break;
      case "min":
        if (hasValues) results.min = min(values);
        break;
      case "max":
        if (hasValues) results.max = max(values);
        break;
      case "count":
        results.count = values.length;
        break;
      default: {
        const exhaustive: never = metric;
        throw new Error(`Unhandled metric: ${exhaustive}`);
      }
    }
  }

  return results;
}

/**
 * Pearson correlation from running sums. Returns `null` when either series has
 * zero variance.
 */
export function pearson(xs: number[], ys: number[]): number | null {
  const n = xs.length;
  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;
  let sumY2 = 0;
  for (let i = 0; i < n; i++) {
    const x = xs[i] ?? 0;
    const y = ys[i] ?? 0;
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumX2 += x * x;
    sumY2 += y * y;
  }

  const numerator = n * sumXY - sumX * sumY;
  const denominator = Math.sqrt((n * sumX2 - sumX ** 2) * (n * sumY2 - sumY ** 2));
  if (denominator === 0 || !Number.isFinite(denominator)) return null;
  return numerator / denominator;
}

export interface LinearTrend {
  slope: number;
  intercept: number;
  r_squared: number | null;
  sample_size: number;
  next_value_prediction: number;
}

/**
 * Ordinary least squares fit of `ys` on `xs`, plus a prediction at `max(x) + 1`.
 */
export function linearTrend(xs: number[], ys: number[]): LinearTrend {
  const n = xs.length;
  if (n === 0) {
    throw new WorkbookOpsError("InsufficientData", "Insufficient data for trend analysis");
  }

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;
  for (let i = 0; i < n; i++) {
    const x = xs[i] ?? 0;
    const y = ys[i] ?? 0;
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumX2 += x * x;
  }

  const denominator = n * sumX2 - sumX ** 2;
  if (denominator === 0) {
    throw new WorkbookOpsError("InsufficientData", "Trend analysis requires at least two distinct x values");
  }

  const slope = (n * sumXY - sumX * sumY) / denominator;
  const intercept = (sumY - slope * sumX) / n;

  const yMean = sumY / n;
  let ssTotal = 0;
  let ssResidual = 0;
  for (let i = 0; i < n; i++) {
    const x = xs[i] ?? 0;
    const y = ys[i] ?? 0;
    ssTotal += (y - yMean) ** 2;
    ssResidual += (y - (slope * x + intercept)) ** 2;
  }

  const nextX = max(xs) + 1;
  return {
    slope,
    intercept,
    r_squared: ssTotal === 0 ? null : 1 - ssResidual / ssTotal,
    sample_size: n,
    next_value_prediction: slope * nextX + intercept,
  };
}
