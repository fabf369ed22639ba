import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConversionError } from '../errors';
import { withTempDir } from '../utils/tmp';
import { loadPdf } from './pdf-ops';
import { runTool } from './toolchain';
import type { Artifact, ToolchainOptions, UploadedFile } from './types';

export function ghostscriptArgs(input: string, output: string): string[] {
  return [
    '-sDEVICE=pdfwrite',
    '-dCompatibilityLevel=1.4',
    '-dPDFSETTINGS=/ebook',
    '-dNOPAUSE',
    '-dQUIET',
    '-dBATCH',
    `-sOutputFile=${output}`,
    input,
  ];
}

/** Re-distill with Ghostscript's ebook preset. */
export async function compressPdf(file: UploadedFile, opts: ToolchainOptions = {}): Promise<Artifact> {
  await loadPdf(file);
  const data = await withTempDir('pdfdesk-gs-', async (dir) => {
    const input = join(dir, 'input.pdf');
    const output = join(dir, 'compressed.pdf');
    await writeFile(input, file.data);
    await runTool('ghostscript', 'gs', ghostscriptArgs(input, output), opts);
    return readFile(output).catch((err: unknown) => {
      throw new ConversionError('Ghostscript produced no output', { cause: err });
    });
  });
  return { filename: 'compressed.pdf', contentType: 'application/pdf', data };
}
