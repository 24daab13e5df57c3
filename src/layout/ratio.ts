/**
 * Flexible sizing: split a total number of cells between items with fixed
 * sizes, minimum sizes and flex ratios.
 *
 * Used for layout regions and table column widths. Tie-breaks are positional:
 * rounding remainders go to the last flexible item and overshoot is removed
 * from the last items first.
 */

export interface SizeSpec {
  /** Fixed size; the item does not flex. */
  size?: number;
  /** Minimum size (default 1, never below 1). */
  minimumSize?: number;
  /** Flex ratio (default 1, never below 1). */
  ratio?: number;
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/** `round(numerator / denominator)` with halves rounded up. */
function roundDiv(numerator: number, denominator: number): number {
  return Math.floor((2 * numerator + denominator) / (2 * denominator));
}

/**
 * Share `amount` between weights: every weighted entry but the last gets its
 * rounded proportional share, capped so the running total never passes
 * `amount`; the last weighted entry takes what is left. Zero weights get 0.
 */
export function distribute(amount: number, weights: readonly number[]): number[] {
  const totalWeight = sum(weights);
  const shares = weights.map(() => 0);
  if (amount <= 0 || totalWeight <= 0) return shares;

  let lastWeighted = -1;
  weights.forEach((weight, index) => {
    if (weight > 0) lastWeighted = index;
  });

  let distributed = 0;
  weights.forEach((weight, index) => {
    if (weight <= 0) return;
    const share =
      index === lastWeighted
        ? amount - distributed
        : Math.min(roundDiv(weight * amount, totalWeight), amount - distributed);
    shares[index] = share;
    distributed += share;
  });
  return shares;
}

/**
 * Bring `sizes` down to at most `total`.
 *
 * 1. Shrink every item in proportion to how far it sits above its minimum.
 * 2. Take single cells from the last items first, keeping minimums.
 * 3. When the minimums alone exceed the total, take single cells round-robin
 *    from the first item, never below zero.
 */
export function shrinkSizes(sizes: readonly number[], minimums: readonly number[], total: number): number[] {
  const result = [...sizes];
  const target = Math.max(0, total);
  let current = sum(result);
  if (current <= target) return result;

  const floor = (index: number): number => minimums[index] ?? 0;
  const shrinkable = result.map((size, index) => Math.max(0, size - floor(index)));
  const totalShrinkable = sum(shrinkable);
  if (totalShrinkable > 0) {
    const excess = Math.min(current - target, totalShrinkable);
    shrinkable.forEach((amount, index) => {
      result[index] -= Math.floor((excess * amount) / totalShrinkable);
    });
    current = sum(result);
  }

  while (current > target) {
    let reduced = false;
    for (let index = result.length - 1; index >= 0 && current > target; index--) {
      if (result[index] > floor(index)) {
        result[index] -= 1;
        current -= 1;
        reduced = true;
      }
    }
    if (!reduced) break;
  }

  for (let index = 0; current > target; index = (index + 1) % result.length) {
    if (result[index] > 0) {
      result[index] -= 1;
      current -= 1;
    }
  }

  return result;
}

/**
 * Resolve item sizes for a total number of cells.
 *
 * The result sums to exactly `total` whenever the minimums fit, and never
 * exceeds it.
 */
export function ratioResolve(total: number, items: readonly SizeSpec[]): number[] {
  if (items.length === 0) return [];
  const available = Math.max(0, Math.floor(total));

  const minimums = items.map((item) => Math.max(1, item.minimumSize ?? 1));
  const sizes: number[] = [];
  const ratios: number[] = [];
  let fixedTotal = 0;
  let flexMinimumTotal = 0;

  items.forEach((item, index) => {
    const minimum = minimums[index];
    if (item.size !== undefined) {
      const size = Math.max(item.size, minimum);
      sizes.push(size);
      ratios.push(0);
      fixedTotal += size;
    } else {
      sizes.push(minimum);
      ratios.push(Math.max(1, item.ratio ?? 1));
      flexMinimumTotal += minimum;
    }
  });

  let remaining = Math.max(0, available - fixedTotal - flexMinimumTotal);
  const extra = distribute(remaining, ratios);
  extra.forEach((amount, index) => {
    sizes[index] += amount;
  });
  remaining -= sum(extra);

  for (let index = 0; remaining > 0; index = (index + 1) % sizes.length) {
    sizes[index] += 1;
    remaining -= 1;
  }

  return shrinkSizes(sizes, minimums, available);
}
