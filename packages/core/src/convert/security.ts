import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { BadRequestError, ConversionError } from '../errors';
import { withTempDir } from '../utils/tmp';
import { runTool } from './toolchain';
import type { Artifact, ToolchainOptions, UploadedFile } from './types';

// qpdf exits 3 when it succeeded with warnings.
const QPDF_OK = [0, 3] as const;

async function readOutput(path: string): Promise<Buffer> {
  return readFile(path).catch((err: unknown) => {
    throw new ConversionError('qpdf produced no output', { cause: err });
  });
}

/** AES-256 encryption; the password is used as both user and owner password. */
export async function protectPdf(file: UploadedFile, password: string, opts: ToolchainOptions = {}): Promise<Artifact> {
  if (!password) throw new BadRequestError('Password is required');
  const data = await withTempDir('pdfdesk-qpdf-', async (dir) => {
    const input = join(dir, 'input.pdf');
    const output = join(dir, 'protected.pdf');
    await writeFile(input, file.data);
    await runTool('qpdf', 'qpdf', ['--encrypt', password, password, '256', '--', input, output], opts, QPDF_OK);
    return readOutput(output);
  });
  return { filename: 'protected.pdf', contentType: 'application/pdf', data };
}

export async function unlockPdf(file: UploadedFile, password: string, opts: ToolchainOptions = {}): Promise<Artifact> {
  const data = await withTempDir('pdfdesk-qpdf-', async (dir) => {
    const input = join(dir, 'input.pdf');
    const output = join(dir, 'unlocked.pdf');
    await writeFile(input, file.data);

    // --requires-password: 0 means a password is needed, 2 means none is.
    const probe = await runTool('qpdf', 'qpdf', ['--requires-password', input], opts, [0, 2, 3]);
    if (probe.exitCode === 0 && !password) throw new BadRequestError('Password required to unlock');

    const args = password ? [`--password=${password}`, '--decrypt', input, output] : ['--decrypt', input, output];
    await runTool('qpdf', 'qpdf', args, opts, QPDF_OK).catch((err: unknown) => {
      if (err instanceof ConversionError && /invalid password/i.test(err.message)) {
        throw new BadRequestError('Wrong password');
      }
      throw err;
    });
    return readOutput(output);
  });
  return { filename: 'unlocked.pdf', contentType: 'application/pdf', data };
}
