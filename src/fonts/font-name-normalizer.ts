export type NormalizedFontName = {
  raw: string;
  /** Name without the six-letter subset tag. */
  baseName: string;
  family: string;
  isSubset: boolean;
  bold: boolean;
  italic: boolean;
};

export interface FontTraits {
  serif: boolean;
  fixedPitch: boolean;
  italic: boolean;
  bold: boolean;
}

// FontDescriptor /Flags bits
const FLAG_FIXED_PITCH = 1;
const FLAG_SERIF = 1 << 1;
const FLAG_ITALIC = 1 << 6;
const FLAG_FORCE_BOLD = 1 << 18;

const MONO_FAMILIES = /(courier|mono|consol|menlo|code|typewriter|^cmtt|inconsolata|fixed)/i;
const SANS_FAMILIES = /(sans|helvetica|arial|verdana|tahoma|calibri|segoe|gothic|dotum|gulim|roboto|lato|futura|^cmss)/i;
const SERIF_FAMILIES = /(times|serif|roman|georgia|garamond|minion|palatino|book|cambria|batang|myeongjo|mincho|song|^cmr|^nimbusrom|^lmroman|^sfrm|^utm)/i;

function stripSubsetPrefix(raw: string): { value: string; isSubset: boolean } {
  const m = raw.match(/^([A-Z]{6}\+)(.*)$/);
  if (!m) return { value: raw, isSubset: false };
  return { value: m[2] ?? raw, isSubset: true };
}

function detectItalic(s: string): boolean {
  return /(italic|oblique|slanted|-it\b|,it\b|ital\b)/i.test(s) || /^cm(ti|mi|bxti|sl)\d/i.test(s);
}

function detectBold(s: string): boolean {
  return /(bold|black|heavy|semibold|demi|-bd\b|,bd\b)/i.test(s) || /^cmbx\d/i.test(s);
}

function familyOf(s: string): string {
  return s
    .replace(/[,-].*$/, '')
    .replace(/(PSMT|MT|PS)$/, '')
    .replace(/(Bold|Italic|Oblique|Regular|Roman|Medium|Light)+$/i, '')
    .toLowerCase();
}

export function normalizeFontName(rawName: string): NormalizedFontName {
  const raw = String(rawName ?? '');
  const subset = stripSubsetPrefix(raw.replace(/^\//, ''));
  const baseName = subset.value.trim();

  return {
    raw,
    baseName,
    family: familyOf(baseName),
    isSubset: subset.isSubset,
    bold: detectBold(baseName),
    italic: detectItalic(baseName)
  };
}

/**
 * Combines descriptor flags with what the name says. Flags win for
 * fixed pitch and serif when present; names fill in the rest.
 */
export function deriveFontTraits(args: { name: string; flags?: number }): FontTraits {
  const normalized = normalizeFontName(args.name);
  const flags = args.flags ?? 0;
  const base = normalized.baseName;

  const fixedPitch = (flags & FLAG_FIXED_PITCH) !== 0 || MONO_FAMILIES.test(base);
  const serifByName = SERIF_FAMILIES.test(base) && !SANS_FAMILIES.test(base);
  const serif = !fixedPitch && ((flags & FLAG_SERIF) !== 0 || serifByName);

  return {
    serif,
    fixedPitch,
    italic: (flags & FLAG_ITALIC) !== 0 || normalized.italic,
    bold: (flags & FLAG_FORCE_BOLD) !== 0 || normalized.bold
  };
}

/**
 * Tests a font-name pattern against the name without its subset tag,
 * anchored at the start the way formula-font patterns are written.
 */
export function matchesFontPattern(fontName: string, pattern: RegExp): boolean {
  const { baseName } = normalizeFontName(fontName);
  pattern.lastIndex = 0;
  const match = pattern.exec(baseName);
  return match !== null && match.index === 0;
}
