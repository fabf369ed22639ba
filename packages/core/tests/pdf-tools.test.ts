import JSZip from 'jszip';
import { PDFDocument, degrees } from 'pdf-lib';
import sharp from 'sharp';
import { describe, expect, it, vi } from 'vitest';
import { imagesToPdf, mergePdfs, pdfToJpgZip, rotatePdf, splitPdf } from '../src/convert';
import { BadRequestError, DocumentOpenError } from '../src/errors';
import type { Rasterizer } from '../src/ingest/types';
import { getLogger } from '../src/logger';

const logger = getLogger('test', { sink: () => {} });

// A PDF whose page n is (100 * n) points wide, so pages can be told apart.
async function makePdf(pageCount: number): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  for (let n = 1; n <= pageCount; n++) doc.addPage([100 * n, 200]);
  return doc.save();
}

async function pageWidths(data: Uint8Array): Promise<number[]> {
  const doc = await PDFDocument.load(data);
  return doc.getPages().map((p) => p.getWidth());
}

describe('mergePdfs', () => {
  it('concatenates pages in upload order', async () => {
    const out = await mergePdfs([
      { name: 'a.pdf', data: await makePdf(2) },
      { name: 'b.pdf', data: await makePdf(1) },
    ]);
    expect(out.filename).toBe('merged.pdf');
    expect(await pageWidths(out.data)).toEqual([100, 200, 100]);
  });

  it('rejects non-PDF uploads', async () => {
    await expect(mergePdfs([{ name: 'a.txt', data: new Uint8Array([1]) }])).rejects.toBeInstanceOf(BadRequestError);
  });

  it('reports unreadable PDFs as input errors', async () => {
    await expect(mergePdfs([{ name: 'broken.pdf', data: Buffer.from('not a pdf') }])).rejects.toBeInstanceOf(DocumentOpenError);
  });
});

describe('splitPdf', () => {
  it('writes one single-page PDF per selected page', async () => {
    const out = await splitPdf({ name: 'doc.pdf', data: await makePdf(3) }, '3,1');
    expect(out.filename).toBe('split.zip');
    const zip = await JSZip.loadAsync(out.data);
    expect(Object.keys(zip.files).sort()).toEqual(['page_1.pdf', 'page_3.pdf']);
    const third = zip.file('page_3.pdf');
    expect(third).not.toBeNull();
    if (third) expect(await pageWidths(await third.async('uint8array'))).toEqual([300]);
  });

  it('fails when no page is in range', async () => {
    await expect(splitPdf({ name: 'doc.pdf', data: await makePdf(2) }, '5-9')).rejects.toThrow(
      'No valid pages derived from ranges'
    );
  });
});

describe('rotatePdf', () => {
  it('adds the angle to each page rotation', async () => {
    const src = await PDFDocument.create();
    src.addPage([100, 100]);
    src.addPage([100, 100]).setRotation(degrees(270));
    const out = await rotatePdf({ name: 'r.pdf', data: await src.save() }, 180);

    const doc = await PDFDocument.load(out.data);
    expect(doc.getPages().map((p) => p.getRotation().angle)).toEqual([180, 90]);
  });

  it('rejects angles that are not multiples of 90', async () => {
    await expect(rotatePdf({ name: 'r.pdf', data: await makePdf(1) }, 30)).rejects.toThrow('Invalid angle');
  });
});

describe('imagesToPdf', () => {
  const solid = (width: number, height: number) =>
    sharp({ create: { width, height, channels: 3, background: { r: 200, g: 30, b: 30 } } });

  it('places each readable image on a page sized at 150 dpi', async () => {
    const png = await solid(300, 150).png().toBuffer();
    const jpg = await solid(150, 300).jpeg().toBuffer();
    const webp = await solid(75, 75).webp().toBuffer();
    const out = await imagesToPdf(
      [
        { name: 'a.png', data: png },
        { name: 'junk.jpg', data: Buffer.from('definitely not an image') },
        { name: 'b.jpg', data: jpg },
        { name: 'c.webp', data: webp },
      ],
      logger
    );
    const doc = await PDFDocument.load(out.data);
    expect(doc.getPages().map((p) => [p.getWidth(), p.getHeight()])).toEqual([
      [144, 72],
      [72, 144],
      [36, 36],
    ]);
  });

  it('fails when no image can be read', async () => {
    await expect(imagesToPdf([{ name: 'x.png', data: Buffer.from('nope') }], logger)).rejects.toThrow(
      'No valid images uploaded'
    );
  });
});

describe('pdfToJpgZip', () => {
  const fakeRasterizer = (): Rasterizer => ({
    rasterize: vi.fn(async () => [1, 2, 3].map((page) => ({ page, data: Buffer.from(`jpeg ${page}`) }))),
  });

  it('zips the selected pages by page number', async () => {
    const raster = fakeRasterizer();
    const out = await pdfToJpgZip({ name: 'd.pdf', data: await makePdf(3) }, raster, { dpi: 140, pages: '2-3' });

    expect(raster.rasterize).toHaveBeenCalledWith(
      expect.objectContaining({ filename: 'd.pdf' }),
      { dpi: 140, format: 'jpeg', maxPages: 3 }
    );
    const zip = await JSZip.loadAsync(out.data);
    expect(Object.keys(zip.files).sort()).toEqual(['page_2.jpg', 'page_3.jpg']);
    const second = zip.file('page_2.jpg');
    if (second) expect(await second.async('string')).toBe('jpeg 2');
  });

  it('renders every page without a selection', async () => {
    const out = await pdfToJpgZip({ name: 'd.pdf', data: await makePdf(3) }, fakeRasterizer(), { dpi: 140 });
    const zip = await JSZip.loadAsync(out.data);
    expect(Object.keys(zip.files).sort()).toEqual(['page_1.jpg', 'page_2.jpg', 'page_3.jpg']);
  });

  it('rejects a selection with no valid page', async () => {
    await expect(
      pdfToJpgZip({ name: 'd.pdf', data: await makePdf(3) }, fakeRasterizer(), { dpi: 140, pages: '9' })
    ).rejects.toBeInstanceOf(BadRequestError);
  });
});
