import { BadRequestError } from '../errors';
import { formatLines } from '../format';
import type { FormatOptions } from '../format/types';
import { getLogger } from '../logger';
import { extractStructuredText, recognizePage, type AcquisitionCollaborators, type AcquisitionOptions } from './acquire';
import { ingestDOCX } from './doc';
import { ingestPresentation } from './presentation';
import { ingestPlainText } from './text';
import type { AcquisitionResult, SourceDocument, StructuredText } from './types';

export type Adapter = 'pdf' | 'image' | 'docx' | 'presentation' | 'text' | 'unsupported';

export function guessAdapter(filename?: string, mime?: string): Adapter {
  const ext = (filename || '').toLowerCase();
  const m = (mime || '').toLowerCase();
  if (ext.endsWith('.pdf') || m.includes('application/pdf')) return 'pdf';
  if (ext.endsWith('.docx') || m.includes('wordprocessingml.document')) return 'docx';
  if (ext.endsWith('.pptx') || m.includes('presentationml.presentation')) return 'presentation';
  if (ext.endsWith('.doc') || ext.endsWith('.ppt') || m.includes('application/msword') || m.includes('ms-powerpoint')) return 'unsupported';
  if (m.startsWith('image/') || /\.(png|jpg|jpeg|tif|tiff|bmp|gif|webp)$/i.test(ext)) return 'image';
  if (m.includes('text/plain') || ext.endsWith('.txt') || ext.endsWith('.md') || ext.endsWith('.log')) return 'text';
  return 'unsupported';
}

async function ingestImage(doc: SourceDocument, collab: AcquisitionCollaborators): Promise<AcquisitionResult> {
  const log = (collab.logger ?? getLogger('core')).child({ filename: doc.filename });
  const outcome = await recognizePage({ page: 1, data: Buffer.from(doc.data) }, collab.ocr, log);
  return {
    lines: outcome.status === 'text' ? outcome.text.split('\n') : [],
    path: 'ocr',
    pages: [outcome],
  };
}

/**
 * Structured text for any supported upload. PDFs take the text-layer/OCR
 * strategy, images go straight to OCR, office and text files are read directly.
 */
export async function extractDocumentText(
  doc: SourceDocument,
  collab: AcquisitionCollaborators,
  opts: AcquisitionOptions & FormatOptions
): Promise<StructuredText> {
  const log = (collab.logger ?? getLogger('core')).child({ filename: doc.filename });
  const adapter = guessAdapter(doc.filename, doc.mime);
  let acquired: AcquisitionResult;
  switch (adapter) {
    case 'pdf':
      return extractStructuredText(doc, collab, opts);
    case 'image':
      acquired = await ingestImage(doc, collab);
      break;
    case 'docx':
      acquired = await ingestDOCX(doc);
      break;
    case 'presentation':
      acquired = await ingestPresentation(doc);
      break;
    case 'text':
      acquired = ingestPlainText(doc);
      break;
    default:
      throw new BadRequestError('Unsupported file type for text extraction; upload a PDF, image, DOCX, PPTX or text file');
  }
  log.info('ingest.complete', { adapter, pages: acquired.pages.length, lines: acquired.lines.length });
  return { text: formatLines(acquired.lines, opts), path: acquired.path, pages: acquired.pages };
}

export { acquireLines, extractStructuredText, collectLines, hasText, recognizePage } from './acquire';
export type { AcquisitionCollaborators, AcquisitionOptions } from './acquire';
export { PdfjsTextLayer, clusterItemsIntoLines, lineText } from './pdf';
export { PopplerRasterizer, pageNumberFromFile } from './rasterize';
export type { PopplerOptions } from './rasterize';
export { TesseractOcrEngine, normalizeOcrLang, toGrayscale } from './image';
export type { TesseractOptions } from './image';
export { ingestDOCX } from './doc';
export { ingestPresentation, slideParagraphs } from './presentation';
export { ingestPlainText } from './text';
export type * from './types';
