export { parsePageList } from './pages';
export { loadPdf, mergePdfs, splitPdf, rotatePdf, normalizeAngle } from './pdf-ops';
export { imagesToPdf, pdfToJpgZip, pointsFromPixels } from './images';
export type { PdfToJpgOptions } from './images';
export { wordToPdf, pptToPdf, sofficeArgs } from './office';
export { compressPdf, ghostscriptArgs } from './compress';
export { protectPdf, unlockPdf } from './security';
export { buildDocx, docxParagraphs, isHeadingBlock } from './docx';
export { runTool } from './toolchain';
export type * from './types';
