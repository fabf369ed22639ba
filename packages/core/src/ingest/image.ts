import sharp from 'sharp';
import { createScheduler, createWorker, OEM, PSM, type Scheduler } from 'tesseract.js';
import { describeError } from '../errors';
import { getLogger, type Logger } from '../logger';
import type { OcrEngine } from './types';

const LANG_ALIASES: Record<string, string> = {
  english: 'eng', french: 'fra', german: 'deu', spanish: 'spa', italian: 'ita', arabic: 'ara', russian: 'rus',
};

/** Accepts `eng`, `english`, `eng+fra` or `eng, fra`; returns tesseract's `+` form. */
export function normalizeOcrLang(lang?: string): string {
  const parts = (lang || 'eng')
    .toLowerCase()
    .split(/[\s,+]+/)
    .filter(Boolean)
    .map((p) => LANG_ALIASES[p] ?? p);
  return parts.length ? parts.join('+') : 'eng';
}

export async function toGrayscale(image: Buffer): Promise<Buffer> {
  return sharp(image).grayscale().png().toBuffer();
}

export type TesseractOptions = {
  lang?: string;
  langPath?: string; // optional local traineddata dir
  concurrency?: number;
  logger?: Logger;
};

/**
 * tesseract.js engine backed by a scheduler of `concurrency` workers, started
 * lazily on the first page. Pages queued together are recognized in parallel.
 */
export class TesseractOcrEngine implements OcrEngine {
  private starting: Promise<Scheduler> | null = null;
  private closed = false;
  private readonly log: Logger;

  constructor(private readonly opts: TesseractOptions = {}) {
    this.log = opts.logger ?? getLogger('core');
  }

  private async start(): Promise<Scheduler> {
    const scheduler = createScheduler();
    const langs = normalizeOcrLang(this.opts.lang);
    const count = Math.max(1, this.opts.concurrency ?? 1);
    for (let i = 0; i < count; i++) {
      const worker = await createWorker(langs, OEM.LSTM_ONLY, {
        langPath: this.opts.langPath,
        gzip: true,
      });
      await worker.setParameters({ tessedit_pageseg_mode: PSM.AUTO });
      scheduler.addWorker(worker);
    }
    this.log.debug('ocr.scheduler.ready', { langs, workers: count });
    return scheduler;
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error('OCR engine is closed');
  }

  async recognize(image: Buffer): Promise<string> {
    this.ensureOpen();
    const gray = await toGrayscale(image);
    this.ensureOpen();
    this.starting ??= this.start();
    const scheduler = await this.starting;
    const result = await scheduler.addJob('recognize', gray);
    return (result.data.text || '').replace(/\r\n/g, '\n');
  }

  async close(): Promise<void> {
    this.closed = true;
    const pending = this.starting;
    this.starting = null;
    if (!pending) return;
    await pending.then(
      (scheduler) => scheduler.terminate(),
      (err: unknown) => this.log.debug('ocr.close.not_started', { error: describeError(err) })
    );
  }
}
