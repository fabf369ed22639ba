import fetch, { type Response } from 'node-fetch';

export type ClientOptions = { baseUrl: string; requestId?: string };

export type ClientFile = { name: string; data: Uint8Array; mime?: string };

export type PageOutcome =
  | { page: number; status: 'text'; text: string }
  | { page: number; status: 'empty' }
  | { page: number; status: 'failed'; error: string };

export type ExtractTextResult = {
  text: string;
  path: 'text-layer' | 'ocr' | 'direct';
  pages: PageOutcome[];
};

export type Tool =
  | 'pdf-to-word'
  | 'word-to-pdf'
  | 'ppt-to-pdf'
  | 'jpg-to-pdf'
  | 'pdf-to-jpg'
  | 'merge-pdf'
  | 'split-pdf'
  | 'rotate-pdf'
  | 'compress-pdf'
  | 'protect-pdf'
  | 'unlock-pdf';

/** Upload body: `file` for single-file tools, `files` for merge and jpg-to-pdf, plus tool parameters. */
export type ConvertBody = {
  file?: ClientFile;
  files?: ClientFile[];
  pages?: string;
  ranges?: string;
  angle?: number;
  password?: string;
};

export type ConvertResult = { filename: string; contentType: string; data: Buffer };

export class ConverterClientError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly category: string
  ) {
    super(message);
    this.name = 'ConverterClientError';
  }
}

function encode(file: ClientFile) {
  return { name: file.name, mime: file.mime, data_base64: Buffer.from(file.data).toString('base64') };
}

function filenameFrom(disposition: string | null): string {
  if (!disposition) return 'download';
  const star = /filename\*=UTF-8''([^;]+)/i.exec(disposition);
  if (star) return decodeURIComponent(star[1]);
  const plain = /filename="?([^";]+)"?/i.exec(disposition);
  return plain ? plain[1] : 'download';
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function isExtractTextResult(v: unknown): v is ExtractTextResult {
  return (
    typeof v === 'object' &&
    v !== null &&
    'text' in v &&
    typeof v.text === 'string' &&
    'path' in v &&
    typeof v.path === 'string' &&
    'pages' in v &&
    Array.isArray(v.pages)
  );
}

export class ConverterClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.requestId) h['x-request-id'] = this.opts.requestId;
    return h;
  }

  private async post(path: string, body: unknown): Promise<Response> {
    const r = await fetch(`${this.opts.baseUrl}${path}`, { method: 'POST', headers: this.headers(), body: JSON.stringify(body) });
    if (!r.ok) await this.fail(r);
    return r;
  }

  private async fail(r: Response): Promise<never> {
    const raw = await r.text();
    let category = 'HTTP_ERROR';
    let message = raw || r.statusText;
    const parsed = parseJson(raw);
    if (typeof parsed === 'object' && parsed !== null) {
      if ('error' in parsed && typeof parsed.error === 'string') category = parsed.error;
      if ('message' in parsed && typeof parsed.message === 'string') message = parsed.message;
    }
    throw new ConverterClientError(message, r.status, category);
  }

  async health(): Promise<{ ok: boolean }> {
    const r = await fetch(`${this.opts.baseUrl}/health`);
    if (!r.ok) await this.fail(r);
    const body: unknown = await r.json();
    return { ok: typeof body === 'object' && body !== null && 'ok' in body && body.ok === true };
  }

  async extractText(file: ClientFile): Promise<ExtractTextResult> {
    const r = await this.post('/extract-text', { file: encode(file) });
    const body: unknown = await r.json();
    if (!isExtractTextResult(body)) throw new ConverterClientError('Unexpected /extract-text response', r.status, 'BAD_RESPONSE');
    return body;
  }

  async convert(tool: Tool, body: ConvertBody): Promise<ConvertResult> {
    const payload = {
      ...body,
      file: body.file ? encode(body.file) : undefined,
      files: body.files ? body.files.map(encode) : undefined,
    };
    const r = await this.post(`/${tool}`, payload);
    return {
      filename: filenameFrom(r.headers.get('content-disposition')),
      contentType: r.headers.get('content-type') ?? 'application/octet-stream',
      data: Buffer.from(await r.arrayBuffer()),
    };
  }
}
