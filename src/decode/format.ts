import type { DecodedText } from '../types';

type Column = { src: string; tgt: string };

const width = (s: string) => [...s].length;
const pad = (s: string, w: number) => s + ' '.repeat(Math.max(0, w - width(s)));

// Columns are the whitespace-separated chunks of a source line. Inside a
// chunk, units contribute their translation and punctuation is copied as is.
function toLines(decoded: DecodedText): Column[][] {
  const lines: Column[][] = [[]];
  let open: Column | undefined;
  const cur = () => lines[lines.length - 1];
  for (const seg of decoded.segments) {
    if (seg.kind === 'passthrough' && (seg.token.kind === 'whitespace' || seg.token.kind === 'linebreak')) {
      open = undefined;
      if (seg.token.kind === 'linebreak') {
        const breaks = seg.token.text.split('\n').length - 1;
        for (let i = 0; i < breaks; i++) lines.push([]);
      }
      continue;
    }
    const src = seg.kind === 'unit' ? seg.sourceText : seg.token.text;
    const tgt = seg.kind === 'unit' ? seg.translatedText : seg.token.text;
    if (!open) {
      open = { src: '', tgt: '' };
      cur().push(open);
    }
    open.src += src;
    open.tgt += tgt;
  }
  while (lines.length && !lines[0].length) lines.shift();
  while (lines.length && !lines[lines.length - 1].length) lines.pop();
  return lines;
}

function renderLine(columns: Column[], maxLineLength: number): string {
  const out: string[] = [];
  let src = '';
  let tgt = '';
  let running = 0;
  for (const col of columns) {
    const w = Math.max(width(col.src), width(col.tgt));
    if (maxLineLength > 0 && running + w >= maxLineLength && src) {
      out.push(src.trimEnd(), tgt.trimEnd(), '');
      src = '';
      tgt = '';
      running = 0;
    }
    src += pad(col.src, w) + ' ';
    tgt += pad(col.tgt, w) + ' ';
    running += w + 1;
  }
  if (src) out.push(src.trimEnd(), tgt.trimEnd(), '');
  return out.join('\n').trimEnd() + '\n';
}

/**
 * Interlinear layout: each source line becomes a source row with the
 * decoded row under it, column-aligned. With `maxLineLength > 0` long lines
 * wrap into several two-row blocks separated by an empty line. Blank source
 * lines stay blank.
 */
export function formatAligned(decoded: DecodedText, maxLineLength = 0): string {
  return toLines(decoded)
    .map(cols => (cols.length ? renderLine(cols, maxLineLength) : ''))
    .join('\n');
}
