import {
  AcquisitionTimeoutError,
  DocumentOpenError,
  RasterizationError,
  describeError,
} from '../errors';
import { formatLines } from '../format';
import type { FormatOptions } from '../format/types';
import { getLogger, type Logger } from '../logger';
import { withTimeout } from '../utils/timeout';
import type {
  AcquisitionResult,
  OcrEngine,
  PageImage,
  PageOutcome,
  Rasterizer,
  SourceDocument,
  StructuredText,
  TextLayerExtractor,
} from './types';

export type AcquisitionCollaborators = {
  textLayer: TextLayerExtractor;
  rasterizer: Rasterizer;
  ocr: OcrEngine;
  logger?: Logger;
};

export type AcquisitionOptions = {
  ocrDpi: number;
  maxOcrPages: number;
  timeoutMs?: number;
};

export function hasText(pages: readonly PageOutcome[]): boolean {
  return pages.some((p) => p.status === 'text' && p.text.trim() !== '');
}

/** Lines of every page with text, in page order. Empty and failed pages add nothing. */
export function collectLines(pages: readonly PageOutcome[]): string[] {
  const lines: string[] = [];
  for (const p of [...pages].sort((a, b) => a.page - b.page)) {
    if (p.status !== 'text') continue;
    for (const ln of p.text.replace(/\r\n/g, '\n').split('\n')) lines.push(ln.trimEnd());
  }
  return lines;
}

/** Recognize one page; a failure becomes a `failed` outcome and is logged, never thrown. */
export async function recognizePage(image: PageImage, ocr: OcrEngine, log: Logger): Promise<PageOutcome> {
  try {
    const text = await ocr.recognize(image.data);
    return text.trim() ? { page: image.page, status: 'text', text } : { page: image.page, status: 'empty' };
  } catch (err) {
    log.warn('ocr.page.failed', { page: image.page, error: describeError(err) });
    return { page: image.page, status: 'failed', error: describeError(err) };
  }
}

async function runOcrFallback(
  doc: SourceDocument,
  collab: AcquisitionCollaborators,
  opts: AcquisitionOptions,
  signal: AbortSignal,
  log: Logger
): Promise<PageOutcome[]> {
  const images = await collab.rasterizer
    .rasterize(doc, { dpi: opts.ocrDpi, maxPages: opts.maxOcrPages, format: 'png', gray: true, signal })
    .catch((err: unknown) => {
      if (err instanceof RasterizationError) throw err;
      throw new RasterizationError(`Rasterization failed: ${describeError(err)}`, { cause: err });
    });
  if (!images.length) {
    throw new RasterizationError('Rasterization produced no page images');
  }

  const pages = [...images].sort((a, b) => a.page - b.page).slice(0, opts.maxOcrPages);
  if (images.length > pages.length) {
    log.info('acquire.fallback.capped', { rendered: images.length, kept: pages.length });
  }
  // Pages are queued together; the engine bounds how many run at once.
  return Promise.all(pages.map((img) => recognizePage(img, collab.ocr, log)));
}

async function runAcquisition(
  doc: SourceDocument,
  collab: AcquisitionCollaborators,
  opts: AcquisitionOptions,
  signal: AbortSignal,
  log: Logger
): Promise<AcquisitionResult> {
  log.debug('acquire.primary.start');
  let primary: PageOutcome[] | null = null;
  try {
    primary = await collab.textLayer.extract(doc);
  } catch (err) {
    if (err instanceof DocumentOpenError) {
      log.warn('acquire.input_invalid', { error: err.message });
      throw err;
    }
    log.warn('acquire.primary.failed', { error: describeError(err) });
  }

  if (primary && hasText(primary)) {
    log.info('acquire.primary.done', {
      pages: primary.length,
      text_pages: primary.filter((p) => p.status === 'text').length,
    });
    return { lines: collectLines(primary), path: 'text-layer', pages: primary };
  }

  log.info('acquire.fallback.start', { pages: primary?.length ?? 0, dpi: opts.ocrDpi, max_pages: opts.maxOcrPages });
  const pages = await runOcrFallback(doc, collab, opts, signal, log);
  log.info('acquire.fallback.done', {
    pages: pages.length,
    text_pages: pages.filter((p) => p.status === 'text').length,
    failed_pages: pages.filter((p) => p.status === 'failed').length,
  });
  return { lines: collectLines(pages), path: 'ocr', pages };
}

/**
 * Two-tier line acquisition: the embedded text layer when any page has text,
 * otherwise OCR over rasterized pages. Each tier runs at most once.
 */
export async function acquireLines(
  doc: SourceDocument,
  collab: AcquisitionCollaborators,
  opts: AcquisitionOptions
): Promise<AcquisitionResult> {
  const log = (collab.logger ?? getLogger('core')).child({ filename: doc.filename });
  const controller = new AbortController();
  const work = runAcquisition(doc, collab, opts, controller.signal, log);
  if (!opts.timeoutMs) return work;
  const timeoutMs = opts.timeoutMs;
  return withTimeout(work, timeoutMs, () => {
    controller.abort();
    log.error('acquire.timeout', { timeout_ms: timeoutMs });
    return new AcquisitionTimeoutError(timeoutMs);
  });
}

export async function extractStructuredText(
  doc: SourceDocument,
  collab: AcquisitionCollaborators,
  opts: AcquisitionOptions & FormatOptions
): Promise<StructuredText> {
  const { lines, path, pages } = await acquireLines(doc, collab, opts);
  return { text: formatLines(lines, opts), path, pages };
}
