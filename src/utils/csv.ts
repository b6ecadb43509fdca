import type { CsvRecord } from '../types';
import { CsvParseError } from '../errors';

export const CSV_HEADER = ['word', 'translation', 'example'] as const;

export type ParsedCsvRecord = CsvRecord & { line: number };

type RawRow = { line: number; cells: string[] };

// RFC 4180 reader: quoted fields may hold commas, doubled quotes and line breaks.
function readRows(text: string): RawRow[] {
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows: RawRow[] = [];
  let cells: string[] = [];
  let field = '';
  let inQuotes = false;
  let sawQuote = false;
  let line = 1;
  let rowLine = 1;

  const endRow = () => {
    cells.push(field);
    const blank = cells.length === 1 && cells[0] === '' && !sawQuote;
    if (!blank) rows.push({ line: rowLine, cells });
    cells = [];
    field = '';
    sawQuote = false;
  };

  for (let i = 0; i < src.length; i++) {
    const c = src[i];
    if (inQuotes) {
      if (c === '"') {
        if (src[i + 1] === '"') { field += '"'; i++; }
        else inQuotes = false;
      } else {
        if (c === '\n') line++;
        field += c;
      }
      continue;
    }
    if (c === '"' && field === '') { inQuotes = true; sawQuote = true; }
    else if (c === ',') { cells.push(field); field = ''; }
    else if (c === '\n' || c === '\r') {
      if (c === '\r' && src[i + 1] === '\n') i++;
      endRow();
      line++;
      rowLine = line;
    } else field += c;
  }
  if (inQuotes) throw new CsvParseError(rowLine, 'unterminated quoted field');
  if (field !== '' || cells.length || sawQuote) endRow();
  return rows;
}

export function parseCsv(text: string): ParsedCsvRecord[] {
  const rows = readRows(text);
  if (!rows.length) return [];
  let col = { word: 0, translation: 1, example: 2 };
  let body = rows;
  const head = rows[0].cells.map(c => c.trim().toLowerCase());
  // a header names both required columns; anything else is data
  if (head.includes('word') && head.includes('translation')) {
    col = { word: head.indexOf('word'), translation: head.indexOf('translation'), example: head.indexOf('example') };
    body = rows.slice(1);
  }
  const at = (cells: string[], i: number) => (i >= 0 ? cells[i] ?? '' : '');
  return body.map(r => ({
    line: r.line,
    word: at(r.cells, col.word),
    translation: at(r.cells, col.translation),
    example: at(r.cells, col.example),
  }));
}

function escapeField(text: string | undefined): string {
  const str = text ?? '';
  return /[",\r\n]/.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
}

export function formatCsv(records: readonly CsvRecord[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const r of records) lines.push([r.word, r.translation, r.example].map(escapeField).join(','));
  return lines.join('\n') + '\n';
}
