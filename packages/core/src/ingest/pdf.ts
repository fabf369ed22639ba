import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import { DocumentOpenError, describeError } from '../errors';
import { getLogger, type Logger } from '../logger';
import type { PageOutcome, SourceDocument, TextLayerExtractor } from './types';

type PositionedItem = { str: string; x: number; y: number; width: number };
type PdfLine = { y: number; items: PositionedItem[] };

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

export function clusterItemsIntoLines(items: TextItem[]): PdfLine[] {
  const lineTolerance = 3; // points
  const lines: PdfLine[] = [];
  for (const raw of items) {
    if (!raw.str) continue;
    const x = Number(raw.transform[4] || 0);
    const y = Number(raw.transform[5] || 0);
    let line = lines.find((ln) => Math.abs(ln.y - y) <= lineTolerance);
    if (!line) {
      line = { y, items: [] };
      lines.push(line);
    }
    const width = Number(raw.width || 0) || raw.str.length * 4;
    line.items.push({ str: raw.str.replace(/\u00A0/g, ' '), x, y, width });
  }

  // Sort top-to-bottom (PDF origin bottom-left)
  lines.sort((a, b) => b.y - a.y);
  return lines;
}

// Join a line's items left to right, inserting a space wherever the horizontal
// gap is wider than a fraction of the average glyph width.
export function lineText(line: PdfLine): string {
  const defaultWordGap = 2.5;
  const sorted = line.items.slice().sort((a, b) => a.x - b.x);
  let totalWidth = 0;
  let totalChars = 0;
  for (const item of sorted) {
    totalWidth += item.width;
    totalChars += item.str.replace(/\s+/g, '').length || item.str.length;
  }
  const avgCharWidth = totalChars ? totalWidth / totalChars : 0;
  const wordGapThreshold = Math.max(defaultWordGap, avgCharWidth * 0.6);

  let out = '';
  let prevRight: number | null = null;
  for (const item of sorted) {
    if (prevRight !== null && item.x - prevRight > wordGapThreshold && !/\s$/.test(out) && !/^\s/.test(item.str)) {
      out += ' ';
    }
    out += item.str;
    prevRight = item.x + item.width;
  }
  return out.trim();
}

async function loadPdfjs() {
  return import('pdfjs-dist/legacy/build/pdf.mjs');
}

/** Reads the embedded text layer of a PDF with pdfjs-dist. */
export class PdfjsTextLayer implements TextLayerExtractor {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? getLogger('core');
  }

  async extract(doc: SourceDocument): Promise<PageOutcome[]> {
    const { getDocument } = await loadPdfjs();
    // pdfjs may transfer the buffer it is given; hand it a copy.
    const loadingTask = getDocument({
      data: new Uint8Array(doc.data),
      isEvalSupported: false,
      useSystemFonts: false,
      disableFontFace: true,
      verbosity: 0,
    });
    try {
      const pdf = await loadingTask.promise.catch((err: unknown) => {
        if (err instanceof Error && err.name === 'PasswordException') {
          throw new DocumentOpenError('PDF encrypted. Use Unlock tool first.', { cause: err });
        }
        throw new DocumentOpenError(`Unable to open PDF: ${describeError(err)}`, { cause: err });
      });

      const outcomes: PageOutcome[] = [];
      for (let p = 1; p <= pdf.numPages; p++) {
        try {
          const page = await pdf.getPage(p);
          const content = await page.getTextContent();
          const items = content.items.filter(isTextItem);
          const text = clusterItemsIntoLines(items).map(lineText).join('\n');
          outcomes.push(text.trim() ? { page: p, status: 'text', text } : { page: p, status: 'empty' });
          page.cleanup();
        } catch (err) {
          this.log.warn('textlayer.page.failed', { page: p, filename: doc.filename, error: describeError(err) });
          outcomes.push({ page: p, status: 'failed', error: describeError(err) });
        }
      }
      this.log.debug('textlayer.done', { filename: doc.filename, pages: pdf.numPages });
      return outcomes;
    } finally {
      await loadingTask.destroy();
    }
  }
}
