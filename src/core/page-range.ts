export interface PageSpan {
  /** 1-based, inclusive. */
  first: number;
  /** 1-based, inclusive; `undefined` means "to the last page". */
  last?: number;
}

/** Parses `1-5`, `1,5,10-15`, `3-` or `-4` into spans; throws on malformed input. */
export function parsePageSpans(expression: string): PageSpan[] {
  const parts = expression.split(',').map((part) => part.trim()).filter((part) => part.length > 0);

  if (parts.length === 0) {
    throw new Error(`Empty page range "${expression}"`);
  }

  return parts.map((part) => {
    const range = /^(\d*)\s*-\s*(\d*)$/.exec(part);
    if (range) {
      if (range[1] === '' && range[2] === '') {
        throw new Error(`Invalid page range "${part}"`);
      }
      const first = range[1] === '' ? 1 : Number(range[1]);
      const last = range[2] === '' ? undefined : Number(range[2]);
      if (first < 1 || (last !== undefined && last < first)) {
        throw new Error(`Invalid page range "${part}"`);
      }
      return { first, last };
    }

    if (/^\d+$/.test(part) && Number(part) >= 1) {
      return { first: Number(part), last: Number(part) };
    }

    throw new Error(`Invalid page range "${part}"`);
  });
}

/**
 * Resolves a 1-based page selection into sorted, unique 0-based indices.
 * Pages past `pageCount` are dropped.
 */
export function parsePageRange(expression: string, pageCount: number): number[] {
  const selected = new Set<number>();

  for (const span of parsePageSpans(expression)) {
    const last = Math.min(span.last ?? pageCount, pageCount);
    for (let page = span.first; page <= last; page++) {
      selected.add(page - 1);
    }
  }

  return [...selected].sort((a, b) => a - b);
}
