import fs from 'fs';
import { DataError } from '../errors';
import { createLogger } from '../utils';
import { Bar, REQUIRED_FIELDS, parseBars } from './series';

const log = createLogger('data-loader');

/**
 * Parse CSV text with a header row naming at least
 * `date,open,high,low,close,volume` (any order, case-insensitive; extra
 * columns are ignored).
 */
export function parseBarsCsv(content: string, source = 'csv'): Bar[] {
  // Spreadsheet exports often start with a byte order mark
  const lines = content.replace(/^\ufeff/, '').split(/\r?\n/);
  const headerLine = lines[0]?.trim() ?? '';
  if (!headerLine) {
    throw new DataError(`${source}: missing header row`);
  }

  const header = headerLine.split(',').map(h => h.trim().toLowerCase());
  for (const field of REQUIRED_FIELDS) {
    if (!header.includes(field)) {
      throw new DataError(`${source}: missing required column '${field}'`, field);
    }
  }
  const columnIndex = Object.fromEntries(REQUIRED_FIELDS.map(f => [f, header.indexOf(f)]));

  const rows: Record<string, string | number>[] = [];
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const parts = line.split(',').map(p => p.trim());
    if (parts.length < header.length) {
      throw new DataError(
        `${source}: line ${i + 1} has ${parts.length} cells, expected ${header.length}`,
        undefined, rows.length,
      );
    }

    const row: Record<string, string | number> = { date: parts[columnIndex.date] };
    for (const field of REQUIRED_FIELDS) {
      if (field === 'date') continue;
      const cell = parts[columnIndex[field]];
      const value = Number(cell);
      if (cell === '' || Number.isNaN(value)) {
        throw new DataError(`${source}: line ${i + 1} has non-numeric ${field} '${cell}'`, field, rows.length);
      }
      row[field] = value;
    }
    rows.push(row);
  }

  return parseBars(rows);
}

export function loadBarsFromCsv(filePath: string): Bar[] {
  if (!fs.existsSync(filePath)) {
    throw new DataError(`Data file not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  const bars = parseBarsCsv(content, filePath);
  log.debug('Bars loaded', {
    path: filePath,
    bars: bars.length,
    start: bars[0]?.date,
    end: bars[bars.length - 1]?.date,
  });
  return bars;
}
