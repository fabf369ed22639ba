import { Document, Packer, Paragraph, TextRun } from 'docx';
import { BULLET_MARKER } from '../format/reflow';
import type { Artifact } from './types';

const MAX_HEADING_WORDS = 8;

export function isHeadingBlock(block: string): boolean {
  const words = block.trim().split(/\s+/).filter(Boolean);
  if (words.length < 1 || words.length > MAX_HEADING_WORDS) return false;
  return block === block.toUpperCase() && block !== block.toLowerCase();
}

/** docx paragraphs for the blank-line separated blocks of formatted text. */
export function docxParagraphs(text: string): Paragraph[] {
  const paragraphs: Paragraph[] = [];
  for (const raw of text.split(/\n{2,}/)) {
    const block = raw.trim();
    if (!block) continue;
    if (block.startsWith(BULLET_MARKER)) {
      for (const line of block.split('\n')) {
        const item = line.startsWith(BULLET_MARKER) ? line.slice(BULLET_MARKER.length) : line;
        paragraphs.push(new Paragraph({ text: item.trim(), bullet: { level: 0 } }));
      }
    } else if (isHeadingBlock(block)) {
      paragraphs.push(new Paragraph({ children: [new TextRun({ text: block, bold: true })] }));
    } else {
      paragraphs.push(new Paragraph({ text: block }));
    }
  }
  return paragraphs;
}

export async function buildDocx(text: string): Promise<Artifact> {
  const doc = new Document({ sections: [{ children: docxParagraphs(text) }] });
  return {
    filename: 'output.docx',
    contentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    data: await Packer.toBuffer(doc),
  };
}
