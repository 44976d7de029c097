export function mean(values: number[]) {
  if (!values.length) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Population variance (divides by n). */
export function variance(values: number[]) {
  if (!values.length) return 0;
  const avg = mean(values);
  return values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length;
}

/**
 * Least-squares slope of `values` against their index. Zero for fewer than two
 * samples or a constant series.
 */
export function linearSlope(values: number[]) {
  if (values.length < 2 || variance(values) === 0) return 0;

  const xMean = (values.length - 1) / 2;
  const yMean = mean(values);
  let numerator = 0;
  let denominator = 0;
  for (let i = 0; i < values.length; i += 1) {
    numerator += (i - xMean) * (values[i] - yMean);
    denominator += (i - xMean) ** 2;
  }

  const slope = numerator / denominator;
  return Number.isFinite(slope) ? slope : 0;
}
