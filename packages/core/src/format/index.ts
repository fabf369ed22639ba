import { createLineClassifier } from './classifier';
import { formatBlocks } from './reflow';
import { segment } from './segmenter';
import type { Block, FormatOptions } from './types';

export function splitLines(raw: string): string[] {
  return raw.split(/\r?\n/).map((ln) => ln.trimEnd());
}

export function segmentLines(lines: readonly string[], options: FormatOptions = {}): Block[] {
  const classifier = createLineClassifier(options);
  return segment(classifier.classifyLines(lines));
}

/** Classify, segment and reflow a line sequence into blank-line separated text. */
export function formatLines(lines: readonly string[], options: FormatOptions = {}): string {
  return formatBlocks(segmentLines(lines, options), options);
}

export function formatText(raw: string, options: FormatOptions = {}): string {
  return formatLines(splitLines(raw), options);
}

export * from './types';
export { createLineClassifier, DEFAULT_BULLET_PATTERNS, GLYPH_BULLET_PATTERNS, ENUMERATED_BULLET_PATTERNS, DEFAULT_MAX_HEADING_WORDS } from './classifier';
export type { LineClassifier } from './classifier';
export { segment } from './segmenter';
export { reflow, formatBlocks, BULLET_MARKER } from './reflow';
