import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  LOG_LEVEL: z
    .string()
    .transform(v => v.toUpperCase())
    .pipe(z.enum(LOG_LEVELS))
    .default('INFO'),
  INITIAL_CAPITAL: z.coerce.number().positive().finite().default(100_000),
  DATA_PATH: z.string().min(1).optional(),
  SAMPLE_BARS: z.coerce.number().int().min(2).max(100_000).default(250),
  SAMPLE_SEED: z.coerce.number().int().default(42),
});

export interface AppConfig {
  logLevel: LogLevel;
  backtest: {
    initialCapital: number;
  };
  data: {
    csvPath?: string;
    sampleBars: number;
    sampleSeed: number;
  };
}

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const e = result.data;
  return {
    logLevel: e.LOG_LEVEL,
    backtest: {
      initialCapital: e.INITIAL_CAPITAL,
    },
    data: {
      csvPath: e.DATA_PATH,
      sampleBars: e.SAMPLE_BARS,
      sampleSeed: e.SAMPLE_SEED,
    },
  };
}

export const config = loadConfig(process.env);
