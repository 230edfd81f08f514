export { barSchema, parseBars, fieldSeries, dateSeries, REQUIRED_FIELDS } from './series';
export type { Bar } from './series';
export { parseBarsCsv, loadBarsFromCsv } from './data-loader';
export { generateSampleBars } from './sample-data';
export type { SampleDataOptions } from './sample-data';
