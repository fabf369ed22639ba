export type LineRole = 'heading' | 'bullet' | 'paragraph' | 'blank';

export interface ClassifiedLine {
  line: string;
  role: LineRole;
}

export type BlockRole = Exclude<LineRole, 'blank'>;

/** Contiguous, non-empty run of lines sharing one role, in source order. */
export interface Block {
  role: BlockRole;
  lines: string[];
}

/**
 * `glyph`: only dash/glyph markers become `• `; numbered and parenthetical
 * markers are kept as written.
 * `all`: every bullet marker is replaced by `• `.
 */
export type BulletPolicy = 'glyph' | 'all';

export interface ClassifierOptions {
  /** Prefix patterns tested against the trimmed line. */
  bulletPatterns?: readonly RegExp[];
  maxHeadingWords?: number;
}

export interface ReflowOptions {
  bulletPolicy?: BulletPolicy;
  /** Markers replaced under the `glyph` policy. */
  glyphPatterns?: readonly RegExp[];
  /** Markers replaced under the `all` policy. */
  bulletPatterns?: readonly RegExp[];
}

export type FormatOptions = ClassifierOptions & ReflowOptions;
