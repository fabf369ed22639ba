import type { Block, ClassifiedLine } from './types';

/**
 * Group classified lines into blocks, left to right.
 *
 * Blank lines only separate; consecutive bullets form one block; every heading
 * is its own block; runs of paragraph fragments form one block. Lines are
 * stored trimmed.
 */
export function segment(lines: readonly ClassifiedLine[]): Block[] {
  const blocks: Block[] = [];
  let i = 0;
  while (i < lines.length) {
    const { line, role } = lines[i];

    if (role === 'blank') {
      i++;
      continue;
    }

    if (role === 'heading') {
      blocks.push({ role, lines: [line.trim()] });
      i++;
      continue;
    }

    const run: string[] = [];
    while (i < lines.length && lines[i].role === role) {
      run.push(lines[i].line.trim());
      i++;
    }
    blocks.push({ role, lines: run });
  }
  return blocks;
}
