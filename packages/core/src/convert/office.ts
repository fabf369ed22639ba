import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { BadRequestError, ConversionError } from '../errors';
import { withTempDir } from '../utils/tmp';
import { runTool } from './toolchain';
import type { Artifact, ToolchainOptions, UploadedFile } from './types';

const WRITER_PDF = 'pdf:writer_pdf_Export:{"EmbedStandardFonts":{"type":"boolean","value":"true"},"ReduceImageResolution":{"type":"boolean","value":"false"}}';
const IMPRESS_PDF = 'pdf:impress_pdf_Export';

export function sofficeArgs(profileDir: string, filter: string, outDir: string, input: string): string[] {
  return [
    `-env:UserInstallation=${pathToFileURL(profileDir).href}`,
    '--headless',
    '--norestore',
    '--nologo',
    '--invisible',
    '--convert-to',
    filter,
    '--outdir',
    outDir,
    input,
  ];
}

async function convertInDir(
  dir: string,
  inputName: string,
  filter: string,
  outputName: string,
  opts: ToolchainOptions
): Promise<Buffer> {
  // A private profile per run; concurrent soffice processes otherwise share one and lock it.
  const args = sofficeArgs(join(dir, 'profile'), filter, dir, join(dir, inputName));
  await runTool('libreoffice', 'libreoffice', args, opts);
  return readFile(join(dir, outputName)).catch((err: unknown) => {
    throw new ConversionError(`LibreOffice produced no ${outputName}`, { cause: err });
  });
}

/** DOC/DOCX → PDF, via an ODT intermediate so Writer re-lays the document out. */
export async function wordToPdf(file: UploadedFile, opts: ToolchainOptions = {}): Promise<Artifact> {
  const ext = file.name.toLowerCase().split('.').pop();
  if (ext !== 'doc' && ext !== 'docx') throw new BadRequestError('Upload a .doc or .docx file');

  const data = await withTempDir('pdfdesk-word-', async (dir) => {
    await writeFile(join(dir, `input.${ext}`), file.data);
    await convertInDir(dir, `input.${ext}`, 'odt', 'input.odt', opts);
    return convertInDir(dir, 'input.odt', WRITER_PDF, 'input.pdf', opts);
  });
  return { filename: 'output.pdf', contentType: 'application/pdf', data };
}

export async function pptToPdf(file: UploadedFile, opts: ToolchainOptions = {}): Promise<Artifact> {
  const ext = file.name.toLowerCase().split('.').pop();
  if (ext !== 'ppt' && ext !== 'pptx') throw new BadRequestError('Upload a .ppt or .pptx file');

  const data = await withTempDir('pdfdesk-ppt-', async (dir) => {
    await writeFile(join(dir, `input.${ext}`), file.data);
    return convertInDir(dir, `input.${ext}`, IMPRESS_PDF, 'input.pdf', opts);
  });
  return { filename: 'output.pdf', contentType: 'application/pdf', data };
}
