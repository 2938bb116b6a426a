import { describe, it, expect } from 'vitest';
import { ConfigPresets, resolveConfig } from '../../src/config/schema.js';
import { ConfigError } from '../../src/errors.js';
import { parsePageRange, parsePageSpans } from '../../src/core/page-range.js';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveConfig();

    expect(config.sourceLang).toBe('en');
    expect(config.targetLang).toBe('ko');
    expect(config.service).toBe('google');
    expect(config.threads).toBe(4);
    expect(config.overflow).toBe('shrink');
    expect(config.minFontScale).toBe(0.7);
    expect(config.dualLayout).toBe('interleave');
    expect(config.cache).toEqual({ enabled: true, forceRefresh: false });
    expect(config.retry).toEqual({ maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 20000 });
    expect(config.translatableKinds).toEqual(['body', 'heading', 'caption', 'footnote']);
    expect(config.layout.required).toBe(false);
  });

  it('should compile regex options', () => {
    const config = resolveConfig({ fontRegex: '^CMMI', charRegex: /[=+]/ });

    expect(config.fontRegex).toBeInstanceOf(RegExp);
    expect(config.fontRegex?.source).toBe('^CMMI');
    expect(config.charRegex?.test('=')).toBe(true);
  });

  it('should reject out-of-range fields', () => {
    let caught: unknown;
    try {
      resolveConfig({ threads: 0, minFontScale: 2 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.code).toBe('InvalidConfig');
    expect(caught.stage).toBe('config');
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0].startsWith('threads:')).toBe(true);
    expect(caught.issues[1].startsWith('minFontScale:')).toBe(true);
  });

  it('should list every cross-field problem', () => {
    let caught: unknown;
    try {
      resolveConfig({ targetLang: 'auto', pages: '5-2' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toEqual(['targetLang: target language cannot be auto', 'pages: Invalid page range "5-2"']);
  });

  it('should reject an invalid regular expression', () => {
    expect(() => resolveConfig({ fontRegex: '(' })).toThrow(ConfigError);
  });

  it('should reject a retry cap below the base delay', () => {
    expect(() => resolveConfig({ retry: { baseDelayMs: 500, maxDelayMs: 100 } })).toThrow('retry.maxDelayMs: must be >= baseDelayMs');
  });

  it('should accept every preset', () => {
    for (const preset of Object.values(ConfigPresets)) {
      expect(() => resolveConfig(preset)).not.toThrow();
    }
  });
});

describe('page ranges', () => {
  it('should parse single pages and spans', () => {
    expect(parsePageSpans('1,5,10-15')).toEqual([
      { first: 1, last: 1 },
      { first: 5, last: 5 },
      { first: 10, last: 15 }
    ]);
  });

  it('should parse open spans', () => {
    expect(parsePageSpans('3-')).toEqual([{ first: 3, last: undefined }]);
    expect(parsePageSpans('-4')).toEqual([{ first: 1, last: 4 }]);
  });

  it('should resolve to sorted unique 0-based indices within the document', () => {
    expect(parsePageRange('4-,2,1-2', 6)).toEqual([0, 1, 3, 4, 5]);
    expect(parsePageRange('8-12', 10)).toEqual([7, 8, 9]);
  });

  it('should reject malformed expressions', () => {
    expect(() => parsePageSpans('')).toThrow('Empty page range ""');
    expect(() => parsePageSpans('0')).toThrow('Invalid page range "0"');
    expect(() => parsePageSpans('a-b')).toThrow('Invalid page range "a-b"');
    expect(() => parsePageSpans('-')).toThrow('Invalid page range "-"');
  });
});
