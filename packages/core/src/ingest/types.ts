export type SourceDocument = {
  data: Uint8Array;
  filename?: string;
  mime?: string;
};

/** Result of reading one page, from the text layer or from OCR. */
export type PageOutcome =
  | { page: number; status: 'text'; text: string }
  | { page: number; status: 'empty' }
  | { page: number; status: 'failed'; error: string };

export type PageImage = {
  page: number; // 1-based, assigned by the rasterizer
  data: Buffer;
};

export type RasterizeOptions = {
  dpi: number;
  maxPages?: number; // 0 or absent: every page
  format?: 'png' | 'jpeg';
  gray?: boolean;
  signal?: AbortSignal;
};

export interface TextLayerExtractor {
  /** One outcome per page in page order. Throws DocumentOpenError when the file cannot be opened. */
  extract(doc: SourceDocument): Promise<PageOutcome[]>;
}

export interface Rasterizer {
  rasterize(doc: SourceDocument, opts: RasterizeOptions): Promise<PageImage[]>;
}

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
  close(): Promise<void>;
}

export type AcquisitionPath = 'text-layer' | 'ocr' | 'direct';

export type AcquisitionResult = {
  lines: string[];
  path: AcquisitionPath;
  pages: PageOutcome[];
};

export type StructuredText = {
  text: string;
  path: AcquisitionPath;
  pages: PageOutcome[];
};
