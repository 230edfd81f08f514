#!/usr/bin/env node
import { Bar, generateSampleBars, loadBarsFromCsv } from '../data';
import { formatStrategy, parseRule } from '../dsl';
import { RuleEngineError } from '../errors';
import { PatternTranslator } from '../nl';
import { evaluateStrategy } from '../signals';
import { config, createLogger } from '../utils';
import { runBacktest } from './engine';
import { printReport } from './report';

const log = createLogger('run');

const USAGE = `Usage: rulebench (--rule "<rule text>" | --nl "<english>") [--data file.csv] [--capital N] [--bars N] [--seed N]

  --rule     rule text, e.g. "ENTRY: close crosses above SMA(close,20) EXIT: RSI(close,14) > 70"
  --nl       plain-English rule, translated to rule text first
  --data     CSV with date,open,high,low,close,volume (default: DATA_PATH, else a generated sample)
  --capital  starting capital (default: INITIAL_CAPITAL)
  --bars     sample length when no CSV is given (default: SAMPLE_BARS)
  --seed     sample seed when no CSV is given (default: SAMPLE_SEED)`;

interface CliOptions {
  rule?: string;
  nl?: string;
  data?: string;
  capital: number;
  bars: number;
  seed: number;
}

function parseNumberFlag(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${flag} expects a number, got '${raw}'`);
  }
  return value;
}

function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    data: config.data.csvPath,
    capital: config.backtest.initialCapital,
    bars: config.data.sampleBars,
    seed: config.data.sampleSeed,
  };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    if (value === undefined) throw new Error(`Missing value for ${flag}`);

    if (flag === '--rule') { opts.rule = value; }
    else if (flag === '--nl') { opts.nl = value; }
    else if (flag === '--data') { opts.data = value; }
    else if (flag === '--capital') { opts.capital = parseNumberFlag(flag, value); }
    else if (flag === '--bars') { opts.bars = parseNumberFlag(flag, value); }
    else if (flag === '--seed') { opts.seed = parseNumberFlag(flag, value); }
    else { throw new Error(`Unknown flag: ${flag}`); }
    i++;
  }

  if (!opts.rule && !opts.nl) throw new Error('One of --rule or --nl is required');
  if (opts.capital <= 0) throw new Error(`--capital must be positive, got ${opts.capital}`);
  if (!Number.isInteger(opts.bars) || opts.bars < 1) {
    throw new Error(`--bars must be a positive integer, got ${opts.bars}`);
  }
  return opts;
}

function loadBars(opts: CliOptions): Bar[] {
  if (opts.data) return loadBarsFromCsv(opts.data);
  return generateSampleBars({ count: opts.bars, seed: opts.seed });
}

export function main(argv: string[]): number {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 2;
  }

  try {
    let ruleText = opts.rule ?? '';
    if (opts.nl) {
      ruleText = new PatternTranslator().translate(opts.nl);
      console.log(`Translated: ${ruleText.replace(/\n/g, ' | ')}`);
    }

    const strategy = parseRule(ruleText);
    const bars = loadBars(opts);
    const signals = evaluateStrategy(bars, strategy);
    console.log(
      `Signals: ${signals.entry.filter(Boolean).length} entry, ` +
      `${signals.exit.filter(Boolean).length} exit over ${bars.length} bars` +
      (opts.data ? ` (${opts.data})` : ` (sample, seed ${opts.seed})`),
    );

    const result = runBacktest(bars, signals, { initialCapital: opts.capital });
    printReport(result, formatStrategy(strategy));
    return 0;
  } catch (err) {
    if (err instanceof RuleEngineError) {
      log.error('Backtest failed', err);
      return 1;
    }
    throw err;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
