/**
 * Indicator series. Every function returns an array the same length as its
 * input; NaN marks a position with no value.
 */

export const RSI_EPSILON = 1e-10;
export const RSI_NEUTRAL = 50;

/**
 * Simple Moving Average over a trailing window. Positions with fewer than
 * `period` prior observations average whatever is available, so only
 * windows holding no finite value at all come out NaN. Each window is summed
 * from its own values, and a window of identical values averages to exactly
 * that value.
 */
export function computeSma(values: readonly number[], period: number): number[] {
  return values.map((_, i) => {
    let sum = 0;
    let count = 0;
    let first = NaN;
    let uniform = true;

    for (let j = Math.max(0, i - period + 1); j <= i; j++) {
      const v = values[j];
      if (Number.isNaN(v)) continue;
      if (count === 0) first = v;
      else if (v !== first) uniform = false;
      sum += v;
      count++;
    }

    if (count === 0) return NaN;
    return uniform ? first : sum / count;
  });
}

/**
 * Wilder RSI. Average gain and loss are exponentially weighted with
 * alpha = 1/period, seeded with the first observation. The first bar's delta
 * is taken as zero. Positions before `period` observations report 50.
 */
export function computeRsiSeries(values: readonly number[], period: number): number[] {
  const result: number[] = new Array(values.length).fill(RSI_NEUTRAL);
  const alpha = 1 / period;
  let avgGain = 0;
  let avgLoss = 0;

  for (let i = 0; i < values.length; i++) {
    const delta = i > 0 ? values[i] - values[i - 1] : NaN;
    const gain = delta > 0 ? delta : 0;
    const loss = delta < 0 ? -delta : 0;

    if (i === 0) {
      avgGain = gain;
      avgLoss = loss;
    } else {
      avgGain = (1 - alpha) * avgGain + alpha * gain;
      avgLoss = (1 - alpha) * avgLoss + alpha * loss;
    }

    if (i + 1 >= period) {
      const rs = avgGain / (avgLoss + RSI_EPSILON);
      result[i] = 100 - 100 / (1 + rs);
    }
  }
  return result;
}

/** Shift a series back by `lag` bars: position i takes the value at i - lag. */
export function shiftSeries(values: readonly number[], lag: number): number[] {
  if (lag === 0) return values.slice();
  return values.map((_, i) => (i - lag >= 0 ? values[i - lag] : NaN));
}
