import mammoth from 'mammoth';
import { DocumentOpenError, describeError } from '../errors';
import type { AcquisitionResult, SourceDocument } from './types';

export async function ingestDOCX(doc: SourceDocument): Promise<AcquisitionResult> {
  const result = await mammoth
    .extractRawText({ buffer: Buffer.from(doc.data) })
    .catch((err: unknown) => {
      throw new DocumentOpenError(`Unable to open DOCX: ${describeError(err)}`, { cause: err });
    });
  const text = result.value.replace(/\r\n/g, '\n');
  return {
    lines: text.split('\n'),
    path: 'direct',
    pages: [text.trim() ? { page: 1, status: 'text', text } : { page: 1, status: 'empty' }],
  };
}
