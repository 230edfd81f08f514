import { Bar } from './series';

export interface SampleDataOptions {
  count: number;
  seed?: number;
  /** First trading day, YYYY-MM-DD. Weekends are skipped. */
  startDate?: string;
  startPrice?: number;
}

const DAY_MS = 86_400_000;

/** mulberry32: small seeded PRNG, uniform in [0, 1). */
function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Deterministic daily random walk. The same options always produce the same
 * series, so demo runs and tests are reproducible.
 */
export function generateSampleBars(options: SampleDataOptions): Bar[] {
  const { count, seed = 42, startDate = '2023-01-02', startPrice = 100 } = options;
  const rand = createRng(seed);
  const bars: Bar[] = [];

  let time = Date.parse(`${startDate}T00:00:00Z`);
  let prevClose = startPrice;

  while (bars.length < count) {
    const weekday = new Date(time).getUTCDay();
    if (weekday !== 0 && weekday !== 6) {
      const open = prevClose * (1 + (rand() - 0.5) * 0.01);
      const close = open * (1 + (rand() - 0.5) * 0.04 + 0.0005);
      const high = Math.max(open, close) * (1 + rand() * 0.01);
      const low = Math.min(open, close) * (1 - rand() * 0.01);
      bars.push({
        date: new Date(time).toISOString().slice(0, 10),
        open: round2(open),
        high: round2(high),
        low: round2(low),
        close: round2(close),
        volume: Math.round(500_000 + rand() * 1_500_000),
      });
      prevClose = close;
    }
    time += DAY_MS;
  }

  return bars;
}
