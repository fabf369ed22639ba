import { DEFAULT_BULLET_PATTERNS, GLYPH_BULLET_PATTERNS } from './classifier';
import type { Block, ReflowOptions } from './types';

export const BULLET_MARKER = '• ';

function stripMarker(line: string, patterns: readonly RegExp[]): string | null {
  for (const p of patterns) {
    const m = p.exec(line);
    if (m) return line.slice(m[0].length);
  }
  return null;
}

function renderBullet(line: string, options: ReflowOptions): string {
  const patterns = options.bulletPolicy === 'all'
    ? (options.bulletPatterns ?? DEFAULT_BULLET_PATTERNS)
    : (options.glyphPatterns ?? GLYPH_BULLET_PATTERNS);
  const body = stripMarker(line, patterns);
  return body === null ? line : BULLET_MARKER + body;
}

export function reflow(block: Block, options: ReflowOptions = {}): string {
  switch (block.role) {
    case 'bullet':
      return block.lines.map((ln) => renderBullet(ln.trim(), options)).join('\n');
    case 'heading':
      return block.lines[0].trim();
    case 'paragraph': {
      const text = block.lines
        .map((ln) => ln.trim())
        .filter(Boolean)
        .join(' ')
        .replace(/ {2,}/g, ' ');
      // A marker alone on its line joins the next fragment; render the result as a bullet.
      return renderBullet(text, options);
    }
  }
}

export function formatBlocks(blocks: readonly Block[], options: ReflowOptions = {}): string {
  return blocks
    .map((b) => reflow(b, options).trim())
    .filter(Boolean)
    .join('\n\n')
    .trim();
}
