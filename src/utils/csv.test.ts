import { describe, expect, it } from 'vitest';
import { formatCsv, parseCsv } from './csv';
import { CsvParseError } from '../errors';

describe('formatCsv', () => {
  it('writes the header and quotes only fields that need it', () => {
    const out = formatCsv([
      { word: 'Haus', translation: 'house', example: '' },
      { word: 'sagen', translation: 'to say, to tell', example: 'Er sagt "ja".' },
      { word: 'Zeile', translation: 'line', example: 'eins\nzwei' },
    ]);
    expect(out).toBe(
      'word,translation,example\n' +
      'Haus,house,\n' +
      'sagen,"to say, to tell","Er sagt ""ja""."\n' +
      'Zeile,line,"eins\nzwei"\n',
    );
  });

  it('writes a missing example as an empty field', () => {
    expect(formatCsv([{ word: 'a', translation: 'b' }])).toBe('word,translation,example\na,b,\n');
  });
});

describe('parseCsv', () => {
  it('reads what formatCsv writes', () => {
    const records = [
      { word: 'sagen', translation: 'to say, to tell', example: 'Er sagt "ja".' },
      { word: 'Zeile', translation: 'line', example: 'eins\nzwei' },
    ];
    expect(parseCsv(formatCsv(records)).map(({ line: _l, ...r }) => r)).toEqual(records);
  });

  it('reports the physical line each record starts on', () => {
    const text = 'word,translation,example\n"a","b","multi\nline"\nc,d,e\n';
    expect(parseCsv(text).map(r => [r.line, r.word])).toEqual([[2, 'a'], [4, 'c']]);
  });

  it('maps columns by header name in any order', () => {
    const text = 'Example,Word,Translation\nein Satz,Satz,sentence\n';
    expect(parseCsv(text)).toEqual([{ line: 2, word: 'Satz', translation: 'sentence', example: 'ein Satz' }]);
  });

  it('reads a first row as data unless it names both word and translation', () => {
    expect(parseCsv('word,Wort\nhouse,Haus\ntree,Baum\n')).toEqual([
      { line: 1, word: 'word', translation: 'Wort', example: '' },
      { line: 2, word: 'house', translation: 'Haus', example: '' },
      { line: 3, word: 'tree', translation: 'Baum', example: '' },
    ]);
  });

  it('falls back to column position without a header', () => {
    expect(parseCsv('Baum,tree\n')).toEqual([{ line: 1, word: 'Baum', translation: 'tree', example: '' }]);
  });

  it('accepts CRLF, a BOM and blank lines', () => {
    const text = '\uFEFFword,translation,example\r\nHund,dog,\r\n\r\nKatze,cat,Die Katze\r\n';
    expect(parseCsv(text)).toEqual([
      { line: 2, word: 'Hund', translation: 'dog', example: '' },
      { line: 4, word: 'Katze', translation: 'cat', example: 'Die Katze' },
    ]);
  });

  it('keeps a row with an empty word so the importer can count it', () => {
    expect(parseCsv('word,translation\n,orphan\n')).toEqual([{ line: 2, word: '', translation: 'orphan', example: '' }]);
  });

  it('reads a last record without a trailing newline', () => {
    expect(parseCsv('word,translation\nx,y').map(r => r.word)).toEqual(['x']);
  });

  it('throws on an unterminated quoted field', () => {
    expect(() => parseCsv('word,translation\n"open,field\n')).toThrow(CsvParseError);
  });

  it('returns nothing for empty input', () => {
    expect(parseCsv('')).toEqual([]);
  });
});
