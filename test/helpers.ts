import { Bar } from '../src/data';
import { SignalSeries } from '../src/signals';

const DAY_MS = 86_400_000;

export function dayDate(i: number): string {
  return new Date(Date.UTC(2024, 0, 1) + i * DAY_MS).toISOString().slice(0, 10);
}

/** Consecutive daily bars; opens default to the closes. */
export function makeBars(closes: number[], opens: number[] = closes, volume = 1_000_000): Bar[] {
  return closes.map((close, i) => {
    const open = opens[i];
    return {
      date: dayDate(i),
      open,
      high: Math.max(open, close) + 1,
      low: Math.min(open, close) / 2,
      close,
      volume,
    };
  });
}

export function signalsFor(bars: Bar[], entry: boolean[], exit: boolean[]): SignalSeries {
  return { dates: bars.map(b => b.date), entry, exit };
}

/** Run fn and return what it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
