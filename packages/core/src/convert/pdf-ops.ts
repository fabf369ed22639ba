import JSZip from 'jszip';
import { PDFDocument, degrees } from 'pdf-lib';
import { BadRequestError, DocumentOpenError, describeError } from '../errors';
import { parsePageList } from './pages';
import type { Artifact, UploadedFile } from './types';

export async function loadPdf(file: UploadedFile): Promise<PDFDocument> {
  return PDFDocument.load(file.data, { ignoreEncryption: true }).catch((err: unknown) => {
    throw new DocumentOpenError(`Unable to open ${file.name}: ${describeError(err)}`, { cause: err });
  });
}

function pdfArtifact(filename: string, bytes: Uint8Array): Artifact {
  return { filename, contentType: 'application/pdf', data: Buffer.from(bytes) };
}

export async function mergePdfs(files: readonly UploadedFile[]): Promise<Artifact> {
  if (!files.length) throw new BadRequestError('No files uploaded');
  const merged = await PDFDocument.create();
  for (const file of files) {
    if (!file.name.toLowerCase().endsWith('.pdf')) throw new BadRequestError('All files must be PDF');
    const src = await loadPdf(file);
    const copied = await merged.copyPages(src, src.getPageIndices());
    for (const page of copied) merged.addPage(page);
  }
  return pdfArtifact('merged.pdf', await merged.save());
}

/** One single-page PDF per selected page, zipped as `page_<n>.pdf`. */
export async function splitPdf(file: UploadedFile, ranges: string): Promise<Artifact> {
  const src = await loadPdf(file);
  const pages = parsePageList(ranges, src.getPageCount());
  if (!pages.length) throw new BadRequestError('No valid pages derived from ranges');

  const zip = new JSZip();
  for (const p of pages) {
    const single = await PDFDocument.create();
    const [page] = await single.copyPages(src, [p - 1]);
    single.addPage(page);
    zip.file(`page_${p}.pdf`, await single.save());
  }
  const data = await zip.generateAsync({ type: 'nodebuffer' });
  return { filename: 'split.zip', contentType: 'application/zip', data };
}

export function normalizeAngle(angle: number): number {
  if (!Number.isInteger(angle) || angle % 90 !== 0) {
    throw new BadRequestError('Invalid angle');
  }
  return ((angle % 360) + 360) % 360;
}

/** Rotate every page clockwise by `angle`, added to the page's existing rotation. */
export async function rotatePdf(file: UploadedFile, angle: number): Promise<Artifact> {
  const delta = normalizeAngle(angle);
  const doc = await loadPdf(file);
  for (const page of doc.getPages()) {
    page.setRotation(degrees(normalizeAngle(page.getRotation().angle + delta)));
  }
  return pdfArtifact('rotated.pdf', await doc.save());
}
