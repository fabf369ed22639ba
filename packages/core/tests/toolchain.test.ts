import { writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { describe, expect, it, vi } from 'vitest';
import { compressPdf, protectPdf, unlockPdf, wordToPdf, pptToPdf } from '../src/convert';
import { BadRequestError, ConversionError } from '../src/errors';
import { getLogger } from '../src/logger';
import type { CommandResult } from '../src/utils/process';

const logger = getLogger('test', { sink: () => {} });
const pdf = { name: 'in.pdf', data: Buffer.from('%PDF-1.4\n%%EOF\n') };

const ok = (extra: Partial<CommandResult> = {}): CommandResult => ({
  stdout: '',
  stderr: '',
  exitCode: 0,
  timedOut: false,
  ...extra,
});

describe('compressPdf', () => {
  it('runs ghostscript with the ebook preset and returns its output', async () => {
    const runner = vi.fn(async (_cmd: string, args: string[]) => {
      const out = args.find((a) => a.startsWith('-sOutputFile='));
      if (out) await writeFile(out.slice('-sOutputFile='.length), 'small');
      return ok();
    });
    const doc = await PDFDocument.create();
    doc.addPage();
    const artifact = await compressPdf({ name: 'big.pdf', data: await doc.save() }, { binary: 'gs-test', runner, logger });

    expect(artifact.filename).toBe('compressed.pdf');
    expect(artifact.data.toString()).toBe('small');
    const [cmd, args] = runner.mock.calls[0];
    expect(cmd).toBe('gs-test');
    expect(args).toContain('-dPDFSETTINGS=/ebook');
    expect(args).toContain('-sDEVICE=pdfwrite');
  });
});

describe('protectPdf', () => {
  it('encrypts with AES-256 using the password for user and owner', async () => {
    const runner = vi.fn(async (_cmd: string, args: string[]) => {
      await writeFile(args[args.length - 1], 'locked');
      return ok();
    });
    const artifact = await protectPdf(pdf, 'test-secret', { runner, logger });

    expect(artifact.data.toString()).toBe('locked');
    expect(runner.mock.calls[0][1].slice(0, 5)).toEqual(['--encrypt', 'test-secret', 'test-secret', '256', '--']);
  });

  it('requires a password', async () => {
    await expect(protectPdf(pdf, '', { logger })).rejects.toBeInstanceOf(BadRequestError);
  });
});

describe('unlockPdf', () => {
  it('asks for a password when the file needs one', async () => {
    const runner = vi.fn(async () => ok());
    await expect(unlockPdf(pdf, '', { runner, logger })).rejects.toThrow('Password required to unlock');
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('decrypts with the given password', async () => {
    const runner = vi.fn(async (_cmd: string, args: string[]) => {
      if (args[0] === '--requires-password') return ok();
      await writeFile(args[args.length - 1], 'open');
      return ok({ exitCode: 3 });
    });
    const artifact = await unlockPdf(pdf, 'test-secret', { runner, logger });

    expect(artifact.data.toString()).toBe('open');
    expect(runner.mock.calls[1][1].slice(0, 2)).toEqual(['--password=test-secret', '--decrypt']);
  });

  it('reports a wrong password as a bad request', async () => {
    const runner = vi.fn(async (_cmd: string, args: string[]) =>
      args[0] === '--requires-password' ? ok() : ok({ exitCode: 2, stderr: 'in.pdf: invalid password' })
    );
    await expect(unlockPdf(pdf, 'nope', { runner, logger })).rejects.toThrow(new BadRequestError('Wrong password'));
  });

  it('decrypts files without a user password when none is given', async () => {
    const runner = vi.fn(async (_cmd: string, args: string[]) => {
      if (args[0] === '--requires-password') return ok({ exitCode: 2 });
      await writeFile(args[args.length - 1], 'plain');
      return ok();
    });
    const artifact = await unlockPdf(pdf, '', { runner, logger });
    expect(artifact.data.toString()).toBe('plain');
    expect(runner.mock.calls[1][1][0]).toBe('--decrypt');
  });
});

// Writes what soffice would: <outdir>/<input stem>.<filter extension>.
const fakeSoffice = () =>
  vi.fn(async (_cmd: string, args: string[]) => {
    const filter = args[args.indexOf('--convert-to') + 1];
    const outDir = args[args.indexOf('--outdir') + 1];
    const input = args[args.length - 1];
    const ext = filter.split(':')[0];
    await writeFile(join(outDir, basename(input).replace(/\.[^.]+$/, `.${ext}`)), `converted ${basename(input)}`);
    return ok();
  });

describe('office conversions', () => {
  it('converts Word documents through ODT', async () => {
    const runner = fakeSoffice();
    const artifact = await wordToPdf({ name: 'letter.docx', data: Buffer.from('docx') }, { runner, logger });

    expect(artifact.filename).toBe('output.pdf');
    expect(artifact.data.toString()).toBe('converted input.odt');
    expect(runner.mock.calls.map((c) => c[1][c[1].indexOf('--convert-to') + 1].split(':')[0])).toEqual(['odt', 'pdf']);
    expect(runner.mock.calls[0][1][0]).toMatch(/^-env:UserInstallation=file:\/\//);
  });

  it('converts presentations in one step', async () => {
    const runner = fakeSoffice();
    const artifact = await pptToPdf({ name: 'deck.pptx', data: Buffer.from('pptx') }, { runner, logger });
    expect(artifact.data.toString()).toBe('converted input.pptx');
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('rejects other file types', async () => {
    await expect(wordToPdf({ name: 'notes.txt', data: Buffer.from('x') }, { logger })).rejects.toBeInstanceOf(BadRequestError);
  });

  it('reports a timed out converter', async () => {
    const runner = vi.fn(async () => ok({ exitCode: -1, timedOut: true }));
    await expect(pptToPdf({ name: 'deck.ppt', data: Buffer.from('ppt') }, { runner, timeoutMs: 50, logger })).rejects.toThrow(
      new ConversionError('libreoffice timed out after 50 ms')
    );
  });
});
