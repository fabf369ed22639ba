import JSZip from 'jszip';
import { PDFDocument, type PDFImage } from 'pdf-lib';
import sharp from 'sharp';
import { BadRequestError, ConversionError, describeError } from '../errors';
import type { Rasterizer } from '../ingest/types';
import { getLogger, type Logger } from '../logger';
import { loadPdf } from './pdf-ops';
import { parsePageList } from './pages';
import type { Artifact, UploadedFile } from './types';

// Images are placed as if scanned at this resolution.
const IMAGE_DPI = 150;

export function pointsFromPixels(px: number): number {
  return (px * 72) / IMAGE_DPI;
}

async function embedImage(doc: PDFDocument, file: UploadedFile, log: Logger): Promise<PDFImage | null> {
  const meta = await sharp(file.data)
    .metadata()
    .catch((err: unknown) => {
      log.warn('jpg_to_pdf.image.skipped', { filename: file.name, error: describeError(err) });
      return null;
    });
  if (!meta || !meta.format) return null;
  if (meta.format === 'jpeg') return doc.embedJpg(file.data);
  if (meta.format === 'png') return doc.embedPng(file.data);
  return doc.embedPng(await sharp(file.data).png().toBuffer());
}

/** One page per readable image, sized to the image. */
export async function imagesToPdf(files: readonly UploadedFile[], logger?: Logger): Promise<Artifact> {
  const log = logger ?? getLogger('core');
  const doc = await PDFDocument.create();
  for (const file of files) {
    const image = await embedImage(doc, file, log);
    if (!image) continue;
    const width = pointsFromPixels(image.width);
    const height = pointsFromPixels(image.height);
    doc.addPage([width, height]).drawImage(image, { x: 0, y: 0, width, height });
  }
  if (doc.getPageCount() === 0) throw new BadRequestError('No valid images uploaded');
  return { filename: 'output.pdf', contentType: 'application/pdf', data: Buffer.from(await doc.save()) };
}

export type PdfToJpgOptions = {
  dpi: number;
  pages?: string;
};

/** Render pages to colour JPEGs and zip them as `page_<n>.jpg`. */
export async function pdfToJpgZip(file: UploadedFile, rasterizer: Rasterizer, opts: PdfToJpgOptions): Promise<Artifact> {
  const total = (await loadPdf(file)).getPageCount();
  let selected: number[] | null = null;
  if (opts.pages && opts.pages.trim()) {
    selected = parsePageList(opts.pages, total);
    if (!selected.length) throw new BadRequestError('No valid pages selected');
  }

  const images = await rasterizer.rasterize(
    { data: file.data, filename: file.name },
    { dpi: opts.dpi, format: 'jpeg', maxPages: selected ? Math.max(...selected) : undefined }
  );
  const wanted = selected ? new Set(selected) : null;
  const kept = images.filter((img) => !wanted || wanted.has(img.page));
  if (!kept.length) throw new ConversionError('No images were produced');

  const zip = new JSZip();
  for (const img of kept) zip.file(`page_${img.page}.jpg`, img.data);
  const data = await zip.generateAsync({ type: 'nodebuffer' });
  return { filename: 'images.zip', contentType: 'application/zip', data };
}
