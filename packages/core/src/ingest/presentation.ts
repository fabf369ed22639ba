import { XMLParser } from 'fast-xml-parser';
import unzipper from 'unzipper';
import { DocumentOpenError, describeError } from '../errors';
import type { AcquisitionResult, PageOutcome, SourceDocument } from './types';

const SLIDE_PATH = /^ppt\/slides\/slide(\d+)\.xml$/;

type XmlNode = string | number | boolean | null | undefined | XmlNode[] | { [key: string]: XmlNode };

function isRecord(node: XmlNode): node is { [key: string]: XmlNode } {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

// Concatenated text runs (`a:t`) below a node.
function runText(node: XmlNode): string {
  if (Array.isArray(node)) return node.map(runText).join('');
  if (!isRecord(node)) return '';
  let out = '';
  for (const [key, value] of Object.entries(node)) {
    if (key === 'a:t') {
      out += Array.isArray(value) ? value.map(textValue).join('') : textValue(value);
    } else {
      out += runText(value);
    }
  }
  return out;
}

function textValue(v: XmlNode): string {
  if (typeof v === 'string' || typeof v === 'number') return String(v);
  if (isRecord(v) && typeof v['#text'] === 'string') return v['#text'];
  return '';
}

/** One entry per `a:p` paragraph, in document order. */
export function slideParagraphs(node: XmlNode, out: string[] = []): string[] {
  if (Array.isArray(node)) {
    for (const child of node) slideParagraphs(child, out);
    return out;
  }
  if (!isRecord(node)) return out;
  for (const [key, value] of Object.entries(node)) {
    if (key === 'a:p') {
      for (const para of Array.isArray(value) ? value : [value]) out.push(runText(para));
    } else {
      slideParagraphs(value, out);
    }
  }
  return out;
}

/** Slide text of a PPTX; slides are separated by a blank line. */
export async function ingestPresentation(doc: SourceDocument): Promise<AcquisitionResult> {
  const directory = await unzipper.Open.buffer(Buffer.from(doc.data)).catch((err: unknown) => {
    throw new DocumentOpenError(`Unable to open presentation: ${describeError(err)}`, { cause: err });
  });
  const parser = new XMLParser({ ignoreAttributes: true, parseTagValue: false, trimValues: false });

  const slides = directory.files
    .map((file) => ({ file, match: SLIDE_PATH.exec(file.path) }))
    .flatMap(({ file, match }) => (match ? [{ file, index: Number(match[1]) }] : []))
    .sort((a, b) => a.index - b.index);

  const lines: string[] = [];
  const pages: PageOutcome[] = [];
  for (const { file, index } of slides) {
    const xml = (await file.buffer()).toString('utf8');
    const parsed: XmlNode = parser.parse(xml);
    const paragraphs = slideParagraphs(parsed).map((p) => p.trim()).filter(Boolean);
    if (lines.length && paragraphs.length) lines.push('');
    lines.push(...paragraphs);
    const text = paragraphs.join('\n');
    pages.push(text ? { page: index, status: 'text', text } : { page: index, status: 'empty' });
  }
  return { lines, path: 'direct', pages };
}
