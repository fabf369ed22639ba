import type { AcquisitionResult, SourceDocument } from './types';

export function ingestPlainText(doc: SourceDocument): AcquisitionResult {
  const text = Buffer.from(doc.data).toString('utf8').replace(/\r\n/g, '\n');
  return {
    lines: text.split('\n'),
    path: 'direct',
    pages: [text.trim() ? { page: 1, status: 'text', text } : { page: 1, status: 'empty' }],
  };
}
