import { writeFile } from 'node:fs/promises';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import { describe, expect, it, vi } from 'vitest';
import { DocumentOpenError, RasterizationError } from '../src/errors';
import { TesseractOcrEngine, normalizeOcrLang } from '../src/ingest/image';
import { PdfjsTextLayer } from '../src/ingest/pdf';
import { PopplerRasterizer } from '../src/ingest/rasterize';
import { getLogger } from '../src/logger';
import type { CommandResult } from '../src/utils/process';

const logger = getLogger('test', { sink: () => {} });

describe('PdfjsTextLayer', () => {
  it('reports blank pages as empty and reads drawn text', async () => {
    const doc = await PDFDocument.create();
    const font = await doc.embedFont(StandardFonts.Helvetica);
    doc.addPage([300, 300]);
    doc.addPage([300, 300]).drawText('Hello world', { x: 20, y: 200, size: 14, font });

    const pages = await new PdfjsTextLayer(logger).extract({ data: await doc.save(), filename: 'two.pdf' });

    expect(pages).toHaveLength(2);
    expect(pages[0]).toEqual({ page: 1, status: 'empty' });
    expect(pages[1]).toMatchObject({ page: 2, status: 'text' });
    expect(pages[1].status === 'text' && pages[1].text.includes('Hello')).toBe(true);
  });

  it('raises DocumentOpenError for bytes that are not a PDF', async () => {
    await expect(
      new PdfjsTextLayer(logger).extract({ data: Buffer.from('definitely not a pdf'), filename: 'junk.pdf' })
    ).rejects.toBeInstanceOf(DocumentOpenError);
  });
});

const done = (extra: Partial<CommandResult> = {}): CommandResult => ({
  stdout: '',
  stderr: '',
  exitCode: 0,
  timedOut: false,
  ...extra,
});

describe('PopplerRasterizer', () => {
  const doc = { data: Buffer.from('%PDF-1.4'), filename: 'scan.pdf' };

  it('returns images ordered by the page number in their names', async () => {
    // pdftoppm writes <prefix>-<n>.<ext>; the prefix is the last argument.
    const runner = vi.fn(async (_cmd: string, args: string[]) => {
      const prefix = args[args.length - 1];
      for (const n of ['10', '02', '01']) await writeFile(`${prefix}-${n}.png`, `image ${n}`);
      await writeFile(`${prefix}.log`, 'not an image');
      return done();
    });
    const rasterizer = new PopplerRasterizer({ binary: 'pdftoppm-test', runner });

    const images = await rasterizer.rasterize(doc, { dpi: 150, maxPages: 12, gray: true });

    expect(images.map((i) => i.page)).toEqual([1, 2, 10]);
    expect(images[2].data.toString()).toBe('image 10');
    const [cmd, args] = runner.mock.calls[0];
    expect(cmd).toBe('pdftoppm-test');
    expect(args.slice(0, 7)).toEqual(['-r', '150', '-f', '1', '-l', '12', '-gray']);
    expect(args).toContain('-png');
  });

  it('asks for JPEG output without a page limit', async () => {
    const runner = vi.fn(async (_cmd: string, args: string[]) => {
      await writeFile(`${args[args.length - 1]}-1.jpg`, 'jpeg');
      return done();
    });
    const images = await new PopplerRasterizer({ runner }).rasterize(doc, { dpi: 140, format: 'jpeg' });

    expect(images).toHaveLength(1);
    const args = runner.mock.calls[0][1];
    expect(args).toContain('-jpeg');
    expect(args).not.toContain('-l');
    expect(args).not.toContain('-gray');
  });

  it('turns a non-zero exit into RasterizationError', async () => {
    const runner = vi.fn(async () => done({ exitCode: 1, stderr: 'Syntax Error: broken xref' }));
    await expect(new PopplerRasterizer({ runner }).rasterize(doc, { dpi: 150 })).rejects.toThrow(
      new RasterizationError('Rasterization failed: pdftoppm exited with 1: Syntax Error: broken xref')
    );
  });

  it('turns a timeout into RasterizationError', async () => {
    const runner = vi.fn(async () => done({ exitCode: -1, timedOut: true }));
    await expect(new PopplerRasterizer({ runner, timeoutMs: 500 }).rasterize(doc, { dpi: 150 })).rejects.toThrow(
      new RasterizationError('Rasterization timed out after 500 ms')
    );
  });

  it('turns a missing binary into RasterizationError', async () => {
    const runner = vi.fn(async (): Promise<CommandResult> => {
      throw new Error('spawn pdftoppm ENOENT');
    });
    await expect(new PopplerRasterizer({ runner }).rasterize(doc, { dpi: 150 })).rejects.toBeInstanceOf(RasterizationError);
  });

  it('returns no images when the tool wrote none', async () => {
    const runner = vi.fn(async () => done());
    expect(await new PopplerRasterizer({ runner }).rasterize(doc, { dpi: 150 })).toEqual([]);
  });
});

describe('normalizeOcrLang', () => {
  it('maps language names and separators to tesseract codes', () => {
    expect(normalizeOcrLang('English, fra')).toBe('eng+fra');
    expect(normalizeOcrLang('eng+deu')).toBe('eng+deu');
    expect(normalizeOcrLang('german spanish')).toBe('deu+spa');
  });

  it('defaults to English', () => {
    expect(normalizeOcrLang()).toBe('eng');
    expect(normalizeOcrLang(' , ')).toBe('eng');
  });
});

describe('TesseractOcrEngine', () => {
  it('refuses to recognize after close', async () => {
    const engine = new TesseractOcrEngine({ logger });
    await engine.close();
    await expect(engine.recognize(Buffer.from('image'))).rejects.toThrow('OCR engine is closed');
  });
});
