import type { TextItem } from 'pdfjs-dist/types/src/display/api';
import { describe, expect, it } from 'vitest';
import { clusterItemsIntoLines, lineText } from '../src/ingest/pdf';

function item(str: string, x: number, y: number, width: number): TextItem {
  return { str, dir: 'ltr', transform: [1, 0, 0, 1, x, y], width, height: 10, fontName: 'F1', hasEOL: false };
}

describe('clusterItemsIntoLines', () => {
  it('groups items by baseline and orders lines top to bottom', () => {
    const lines = clusterItemsIntoLines([
      item('lower', 10, 680, 25),
      item('upper', 10, 700, 25),
      item('same', 50, 701.5, 20),
      item('', 90, 700, 0),
    ]);
    expect(lines.map((l) => l.items.map((i) => i.str))).toEqual([['upper', 'same'], ['lower']]);
  });

  it('replaces non-breaking spaces', () => {
    const [line] = clusterItemsIntoLines([item('a\u00A0b', 0, 0, 15)]);
    expect(line.items[0].str).toBe('a b');
  });
});

describe('lineText', () => {
  it('inserts a space across a word gap', () => {
    const [line] = clusterItemsIntoLines([item('world', 40, 100, 25), item('Hello', 10, 100, 25)]);
    expect(lineText(line)).toBe('Hello world');
  });

  it('joins fragments that touch', () => {
    const [line] = clusterItemsIntoLines([item('Hel', 10, 100, 15), item('lo', 25, 100, 10)]);
    expect(lineText(line)).toBe('Hello');
  });
});
