import { z } from 'zod';
import { DataError } from '../errors';

export const barSchema = z.object({
  date: z.string().min(1).refine(v => !Number.isNaN(Date.parse(v)), 'not a valid date'),
  open: z.number().finite().positive(),
  high: z.number().finite().positive(),
  low: z.number().finite().positive(),
  close: z.number().finite().positive(),
  volume: z.number().finite().nonnegative(),
});

/** One trading day. */
export type Bar = z.infer<typeof barSchema>;

export const REQUIRED_FIELDS = ['date', 'open', 'high', 'low', 'close', 'volume'] as const;

/**
 * Validate raw rows into a bar series. Rejects (never repairs) rows with a
 * missing or invalid field, and dates that are duplicated or out of order.
 * Returns fresh objects; the input is not touched.
 */
export function parseBars(rows: readonly unknown[]): Bar[] {
  const bars: Bar[] = [];
  let prevTime = -Infinity;

  for (let i = 0; i < rows.length; i++) {
    const result = barSchema.safeParse(rows[i]);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue.path.length > 0 ? String(issue.path[0]) : undefined;
      if (field === undefined) {
        throw new DataError(`Bar ${i} is not an object`, undefined, i);
      }
      if (issue.code === 'invalid_type' && issue.received === 'undefined') {
        throw new DataError(`Bar ${i} is missing required field '${field}'`, field, i);
      }
      throw new DataError(`Bar ${i} has invalid '${field}': ${issue.message}`, field, i);
    }

    const bar = result.data;
    const time = Date.parse(bar.date);
    if (time <= prevTime) {
      const problem = time === prevTime ? 'duplicates' : 'is earlier than';
      throw new DataError(`Bar ${i} date ${bar.date} ${problem} the previous bar`, 'date', i);
    }
    prevTime = time;
    bars.push(bar);
  }

  return bars;
}

export function fieldSeries(bars: readonly Bar[], field: Exclude<keyof Bar, 'date'>): number[] {
  return bars.map(b => b[field]);
}

export function dateSeries(bars: readonly Bar[]): string[] {
  return bars.map(b => b.date);
}
