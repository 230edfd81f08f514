export { PatternTranslator } from './translator';
export type { RuleTranslator } from './translator';
