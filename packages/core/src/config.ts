import { z } from 'zod';
import type { BulletPolicy } from './format/types';

const MB = 1024 * 1024;

const EnvSchema = z.object({
  API_PORT: z.coerce.number().int().positive().default(3001),
  MAX_OCR_PAGES: z.coerce.number().int().positive().default(30),
  OCR_DPI: z.coerce.number().int().min(36).max(600).default(150),
  PDF_TO_JPG_DPI: z.coerce.number().int().min(36).max(600).default(140),
  OCR_LANG: z.string().min(1).default('eng'),
  OCR_LANG_PATH: z.string().min(1).optional(),
  OCR_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  ACQUISITION_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  SUBPROCESS_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  UPLOAD_LIMIT_MB: z.coerce.number().positive().default(25),
  COMPRESS_UPLOAD_LIMIT_MB: z.coerce.number().positive().default(50),
  BULLET_POLICY: z.enum(['glyph', 'all']).default('glyph'),
  SOFFICE_BIN: z.string().min(1).default('libreoffice'),
  PDFTOPPM_BIN: z.string().min(1).default('pdftoppm'),
  GS_BIN: z.string().min(1).default('gs'),
  QPDF_BIN: z.string().min(1).default('qpdf'),
});

export interface ServiceConfig {
  port: number;
  maxOcrPages: number;
  ocrDpi: number;
  pdfToJpgDpi: number;
  ocrLang: string;
  ocrLangPath?: string;
  ocrConcurrency: number;
  acquisitionTimeoutMs: number;
  subprocessTimeoutMs: number;
  uploadLimitBytes: number;
  compressUploadLimitBytes: number;
  bulletPolicy: BulletPolicy;
  binaries: {
    soffice: string;
    pdftoppm: string;
    gs: string;
    qpdf: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServiceConfig> {
  const parsed = EnvSchema.parse(env);
  return Object.freeze({
    port: parsed.API_PORT,
    maxOcrPages: parsed.MAX_OCR_PAGES,
    ocrDpi: parsed.OCR_DPI,
    pdfToJpgDpi: parsed.PDF_TO_JPG_DPI,
    ocrLang: parsed.OCR_LANG,
    ocrLangPath: parsed.OCR_LANG_PATH,
    ocrConcurrency: parsed.OCR_CONCURRENCY,
    acquisitionTimeoutMs: parsed.ACQUISITION_TIMEOUT_MS,
    subprocessTimeoutMs: parsed.SUBPROCESS_TIMEOUT_MS,
    uploadLimitBytes: Math.round(parsed.UPLOAD_LIMIT_MB * MB),
    compressUploadLimitBytes: Math.round(parsed.COMPRESS_UPLOAD_LIMIT_MB * MB),
    bulletPolicy: parsed.BULLET_POLICY,
    binaries: {
      soffice: parsed.SOFFICE_BIN,
      pdftoppm: parsed.PDFTOPPM_BIN,
      gs: parsed.GS_BIN,
      qpdf: parsed.QPDF_BIN,
    },
  });
}

export function uploadLimitFor(config: ServiceConfig, tool: string): number {
  return tool === 'compress-pdf' ? config.compressUploadLimitBytes : config.uploadLimitBytes;
}
