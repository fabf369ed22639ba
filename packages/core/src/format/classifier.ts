import type { ClassifiedLine, ClassifierOptions, LineRole } from './types';

export const GLYPH_BULLET_PATTERNS: readonly RegExp[] = [/^[-•]\s+/u];

export const ENUMERATED_BULLET_PATTERNS: readonly RegExp[] = [
  /^\d+\.\s+/,
  /^\([\p{L}\p{N}]\)\s+/u,
];

export const DEFAULT_BULLET_PATTERNS: readonly RegExp[] = [
  ...GLYPH_BULLET_PATTERNS,
  ...ENUMERATED_BULLET_PATTERNS,
];

export const DEFAULT_MAX_HEADING_WORDS = 8;

export interface LineClassifier {
  classify(line: string): LineRole;
  isBullet(line: string): boolean;
  isHeading(line: string): boolean;
  classifyLines(lines: readonly string[]): ClassifiedLine[];
}

// A string is upper-case when it has at least one cased letter and none in lower case.
function isUpperCase(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

function startsUpper(word: string): boolean {
  const first = word.charAt(0);
  return first !== first.toLowerCase() && first === first.toUpperCase();
}

export function createLineClassifier(options: ClassifierOptions = {}): LineClassifier {
  const bulletPatterns = options.bulletPatterns ?? DEFAULT_BULLET_PATTERNS;
  const maxWords = options.maxHeadingWords ?? DEFAULT_MAX_HEADING_WORDS;

  function isBullet(line: string): boolean {
    const t = line.trim();
    return bulletPatterns.some((p) => p.test(t));
  }

  function isHeading(line: string): boolean {
    const t = line.trim();
    if (!t) return false;
    const words = t.split(/\s+/);
    if (words.length < 1 || words.length > maxWords) return false;
    return isUpperCase(t) || words.every(startsUpper);
  }

  function classify(line: string): LineRole {
    if (!line.trim()) return 'blank';
    if (isBullet(line)) return 'bullet';
    if (isHeading(line)) return 'heading';
    return 'paragraph';
  }

  return {
    classify,
    isBullet,
    isHeading,
    classifyLines(lines) {
      return lines.map((line) => ({ line, role: classify(line) }));
    },
  };
}
