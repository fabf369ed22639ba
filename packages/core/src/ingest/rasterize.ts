import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RasterizationError, describeError } from '../errors';
import { runCommand, type CommandRunner } from '../utils/process';
import { withTempDir } from '../utils/tmp';
import type { PageImage, RasterizeOptions, Rasterizer, SourceDocument } from './types';

const OUTPUT_PREFIX = 'page';

/**
 * Page number encoded in a pdftoppm output name (`page-7.png`, `page-007.jpg`).
 * pdftoppm zero-pads to the width of the page count, so names are parsed, never
 * sorted as strings.
 */
export function pageNumberFromFile(name: string): number | null {
  const m = /^page-(\d+)\.(png|jpg|pgm|ppm)$/.exec(name);
  return m ? Number(m[1]) : null;
}

export type PopplerOptions = {
  binary?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
};

/** Renders PDF pages to images with poppler's `pdftoppm`. */
export class PopplerRasterizer implements Rasterizer {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(opts: PopplerOptions = {}) {
    this.binary = opts.binary ?? 'pdftoppm';
    this.timeoutMs = opts.timeoutMs ?? 120_000;
    this.run = opts.runner ?? runCommand;
  }

  async rasterize(doc: SourceDocument, opts: RasterizeOptions): Promise<PageImage[]> {
    return withTempDir('pdfdesk-raster-', async (dir) => {
      const input = join(dir, 'input.pdf');
      await writeFile(input, doc.data);

      const args = ['-r', String(opts.dpi), '-f', '1'];
      if (opts.maxPages && opts.maxPages > 0) args.push('-l', String(opts.maxPages));
      if (opts.gray) args.push('-gray');
      args.push(opts.format === 'jpeg' ? '-jpeg' : '-png', input, join(dir, OUTPUT_PREFIX));

      const result = await this.run(this.binary, args, { timeoutMs: this.timeoutMs, signal: opts.signal })
        .catch((err: unknown) => {
          throw new RasterizationError(`Rasterization failed: ${describeError(err)}`, { cause: err });
        });
      if (result.timedOut) {
        throw new RasterizationError(`Rasterization timed out after ${this.timeoutMs} ms`);
      }
      if (result.exitCode !== 0) {
        throw new RasterizationError(`Rasterization failed: ${this.binary} exited with ${result.exitCode}: ${result.stderr.trim()}`);
      }

      const images: PageImage[] = [];
      for (const name of await readdir(dir)) {
        const page = pageNumberFromFile(name);
        if (page === null) continue;
        images.push({ page, data: await readFile(join(dir, name)) });
      }
      return images.sort((a, b) => a.page - b.page);
    });
  }
}
