import { createLogger } from '../utils';

const log = createLogger('translator');

/**
 * Turns free text into rule text. Implementations need not validate their
 * output; callers run it through the parser.
 */
export interface RuleTranslator {
  translate(text: string): string;
}

interface Replacement {
  pattern: RegExp;
  replacement: string;
  label: string;
}

// Applied in order; later rules see the output of earlier ones
const REPLACEMENTS: Replacement[] = [
  { pattern: /\bclosing price\b/gi, replacement: 'close', label: 'closing price -> close' },
  { pattern: /\bclose price\b/gi, replacement: 'close', label: 'close price -> close' },
  { pattern: /\bprice\b/gi, replacement: 'close', label: 'price -> close' },

  { pattern: /\b(\d+)[-\s]?day moving average\b/gi, replacement: 'SMA(close,$1)', label: 'N-day moving average' },
  { pattern: /\bsma[-\s]?(\d+)\b/gi, replacement: 'SMA(close,$1)', label: 'sma N' },
  { pattern: /\b(\d+)[-\s]?day sma\b/gi, replacement: 'SMA(close,$1)', label: 'N-day sma' },
  { pattern: /\bmoving average[-\s]?(\d+)\b/gi, replacement: 'SMA(close,$1)', label: 'moving average N' },
  { pattern: /\bma[-\s]?(\d+)\b/gi, replacement: 'SMA(close,$1)', label: 'ma N' },

  { pattern: /\brsi[-\s]?\(?(\d+)\)?/gi, replacement: 'RSI(close,$1)', label: 'rsi N' },
  { pattern: /\brsi\b(?!\()/gi, replacement: 'RSI(close,14)', label: 'rsi (default 14)' },

  { pattern: /\b(\d+(?:\.\d+)?)\s*million\b/gi, replacement: '$1M', label: 'N million' },
  { pattern: /\b(\d+(?:\.\d+)?)\s*m\b/gi, replacement: '$1M', label: 'N m' },
  { pattern: /\b(\d+(?:\.\d+)?)\s*thousand\b/gi, replacement: '$1K', label: 'N thousand' },
  { pattern: /\b(\d+(?:\.\d+)?)\s*k\b/gi, replacement: '$1K', label: 'N k' },

  { pattern: /\bcross(?:es)? (?:above|over)\b/gi, replacement: 'crosses above', label: 'crosses above' },
  { pattern: /\bcross(?:es)? (?:below|under)\b/gi, replacement: 'crosses below', label: 'crosses below' },

  { pattern: /\bvol\b/gi, replacement: 'volume', label: 'vol -> volume' },
  { pattern: /\band\b/gi, replacement: 'AND', label: 'and -> AND' },
  { pattern: /\bor\b/gi, replacement: 'OR', label: 'or -> OR' },
];

const ENTRY_WORDS = /\b(?:go long|buy|enter|entry|long)\b/gi;
const EXIT_WORDS = /\b(?:exit|sell|stop)\b/gi;

function mentions(words: RegExp, text: string): boolean {
  return new RegExp(words.source, 'i').test(text);
}

function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Rule-based translator for short English descriptions such as
 * "Buy when price crosses above the 50-day moving average. Sell when RSI > 70".
 * Sentences with a buy/enter/long word become ENTRY, sell/exit/stop become
 * EXIT, anything else ENTRY. Sentences of the same section are joined with AND.
 */
export class PatternTranslator implements RuleTranslator {
  translate(text: string): string {
    let normalized = squash(text.toLowerCase());
    for (const { pattern, replacement } of REPLACEMENTS) {
      normalized = normalized.replace(pattern, replacement);
    }

    const entry: string[] = [];
    const exit: string[] = [];

    for (const raw of normalized.split(/[.!?;](?:\s+|$)/)) {
      if (!raw.trim()) continue;
      const isExit = !mentions(ENTRY_WORDS, raw) && mentions(EXIT_WORDS, raw);

      let sentence = raw.replace(ENTRY_WORDS, ' ').replace(EXIT_WORDS, ' ');
      sentence = squash(sentence)
        .replace(/^(?:when|if)\s+/, '')
        .replace(/^the\s+/, '')
        .replace(/\bthe\s+/g, '');

      if (/^crosses (?:above|below)\b/.test(sentence)) {
        sentence = `close ${sentence}`;
      }
      if (!sentence) continue;

      (isExit ? exit : entry).push(sentence);
    }

    const sections: string[] = [];
    if (entry.length > 0) sections.push(`ENTRY: ${entry.join(' AND ')}`);
    if (exit.length > 0) sections.push(`EXIT: ${exit.join(' AND ')}`);

    const rule = sections.join('\n');
    log.debug('Translated rule text', { input: text, rule });
    return rule;
  }
}
