export type ScriptId =
  | 'latin'
  | 'hangul'
  | 'japanese'
  | 'chinese-simplified'
  | 'chinese-traditional'
  | 'cyrillic'
  | 'greek'
  | 'arabic'
  | 'hebrew'
  | 'devanagari'
  | 'thai';

/** A font as declared in the source document's resources. */
export interface SourceFont {
  id: string;
  /** BaseFont as written, including any subset prefix. */
  name: string;
  /** BaseFont with the subset prefix removed. */
  baseName: string;
  subtype: string;
  serif: boolean;
  fixedPitch: boolean;
  italic: boolean;
  bold: boolean;
  ascent: number;
  descent: number;
}

export type FontSubstitute =
  | { kind: 'standard'; name: string }
  | { kind: 'file'; name: string; path: string };

/** Substitute font state for one (source font, target script) pair. */
export interface FontEntry {
  key: string;
  sourceFontId: string;
  script: ScriptId;
  substitute: FontSubstitute;
  subset: boolean;
  glyphsUsed: Set<number>;
  finalized: boolean;
}

export interface FontTable {
  sources: Map<string, SourceFont>;
  entries: Map<string, FontEntry>;
}
