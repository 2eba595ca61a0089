/**
 * Statistics Utilities
 * Median, weighted mean and weighted standard deviation. Results depend on input order only
 * through floating-point summation, so callers sort first when they need bit-identical output.
 */

export interface WeightedValue {
  value: number;
  weight: number;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError("Cannot take the median of an empty set");
  }

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 1) {
    return sorted[middle];
  }
  const [low, high] = [sorted[middle - 1], sorted[middle]];
  const sum = low + high;
  return Number.isFinite(sum) ? sum / 2 : low / 2 + high / 2;
}

/**
 * `|value - center|` for each value, in input order. Their median is the MAD.
 */
export function absoluteDeviations(values: readonly number[], center: number): number[] {
  return values.map(value => Math.abs(value - center));
}

export function totalWeight(entries: readonly WeightedValue[]): number {
  let total = 0;
  for (const entry of entries) {
    total += entry.weight;
  }
  return total;
}

function requireWeight(entries: readonly WeightedValue[], what: string): number {
  const total = totalWeight(entries);
  if (entries.length === 0 || total <= 0) {
    throw new RangeError(`${what} needs at least one entry with positive total weight`);
  }
  return total;
}

// Largest magnitude among the values (and the extra terms), or 1 when everything is zero.
function scaleOf(entries: readonly WeightedValue[], ...extra: number[]): number {
  let scale = 0;
  for (const entry of entries) scale = Math.max(scale, Math.abs(entry.value));
  for (const value of extra) scale = Math.max(scale, Math.abs(value));
  return scale > 0 ? scale : 1;
}

/**
 * Sums `value × weight` directly. When that overflows for large finite values, the mean is taken
 * again over values divided by their largest magnitude and normalised weights, then scaled back.
 */
export function weightedMean(entries: readonly WeightedValue[]): number {
  const total = requireWeight(entries, "Weighted mean");

  let sum = 0;
  for (const entry of entries) {
    sum += entry.value * entry.weight;
  }
  const direct = sum / total;
  if (Number.isFinite(direct)) {
    return direct;
  }

  const scale = scaleOf(entries);
  let scaled = 0;
  for (const entry of entries) {
    scaled += (entry.weight / total) * (entry.value / scale);
  }
  return scaled * scale;
}

/**
 * Population form: the squared deviations are divided by the total weight. Falls back to a scaled
 * computation the same way `weightedMean` does when the squares overflow.
 */
export function weightedStdDev(entries: readonly WeightedValue[], mean: number): number {
  const total = requireWeight(entries, "Weighted standard deviation");

  let sum = 0;
  for (const entry of entries) {
    const deviation = entry.value - mean;
    sum += entry.weight * deviation * deviation;
  }
  const direct = Math.sqrt(sum / total);
  if (Number.isFinite(direct)) {
    return direct;
  }

  const scale = scaleOf(entries, mean);
  let scaled = 0;
  for (const entry of entries) {
    const deviation = entry.value / scale - mean / scale;
    scaled += (entry.weight / total) * deviation * deviation;
  }
  return Math.sqrt(scaled) * scale;
}
