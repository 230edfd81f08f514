export { evaluateStrategy, assertAligned } from './evaluator';
export type { SignalSeries } from './evaluator';
export { computeSma, computeRsiSeries, shiftSeries, RSI_EPSILON, RSI_NEUTRAL } from './indicators';
