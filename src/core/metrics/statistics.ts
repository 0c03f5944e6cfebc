const sum = (values: readonly number[]): number =>
  values.reduce((total, value) => total + value, 0);

export const mean = (values: readonly number[]): number | null =>
  values.length ? sum(values) / values.length : null;

/**
 * Sample variance (n - 1 denominator). Undefined below two observations.
 */
export const sampleVariance = (values: readonly number[]): number | null => {
  if (values.length < 2) {
    return null;
  }
  const average = sum(values) / values.length;
  return (
    values.reduce((total, value) => total + (value - average) ** 2, 0) /
    (values.length - 1)
  );
};

export const sampleStandardDeviation = (
  values: readonly number[],
): number | null => {
  const variance = sampleVariance(values);
  return variance === null ? null : Math.sqrt(variance);
};

export const sampleCovariance = (
  left: readonly number[],
  right: readonly number[],
): number | null => {
  if (left.length !== right.length || left.length < 2) {
    return null;
  }
  const leftMean = sum(left) / left.length;
  const rightMean = sum(right) / right.length;
  let total = 0;
  for (let i = 0; i < left.length; i += 1) {
    total += ((left[i] ?? 0) - leftMean) * ((right[i] ?? 0) - rightMean);
  }
  return total / (left.length - 1);
};

/**
 * Period-over-period fractional change; the first point has no predecessor and is dropped.
 */
export const percentChanges = (values: readonly number[]): number[] => {
  const changes: number[] = [];
  for (let i = 1; i < values.length; i += 1) {
    const previous = values[i - 1] ?? Number.NaN;
    const current = values[i] ?? Number.NaN;
    changes.push((current - previous) / previous);
  }
  return changes;
};
