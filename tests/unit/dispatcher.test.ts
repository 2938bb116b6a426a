import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  BackendRejectedError,
  BackendUnavailableError,
  InvalidLanguagePairError,
  JobCancelledError
} from '../../src/errors.js';
import { MemoryCacheStore } from '../../src/translation/cache-store.js';
import { TranslationDispatcher, applyResults, collectUnits } from '../../src/translation/dispatcher.js';
import type { TextRun } from '../../src/types/pdf.js';
import type { TranslationBackend, UnitResult } from '../../src/types/translation.js';
import { MockBackend, textRun } from '../helpers/fixtures.js';

const EN_FR = { sourceLang: 'en', targetLang: 'fr' };
const NO_RETRY = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

function runs(texts: string[]): TextRun[] {
  return texts.map((text, i) => textRun({ text, id: `p1-t${i + 1}`, isTranslatable: true }));
}

function translatedText(result: UnitResult | undefined): string | undefined {
  return result?.status === 'translated' ? result.text : undefined;
}

const upper = (texts: string[]) => texts.map((text) => text.toUpperCase());

describe('collectUnits', () => {
  it('should merge runs with the same normalised text', () => {
    const backend = new MockBackend(upper);
    const all = runs(['Hello  world', 'Other', 'Hello world', '   ']);
    all.push(textRun({ text: 'x^2', id: 'p1-t9' }));

    const units = collectUnits(all, EN_FR, backend);

    expect(units.map((unit) => unit.text)).toEqual(['Hello world', 'Other']);
    expect(units[0].runIds).toEqual(['p1-t1', 'p1-t3']);
    expect(units[0]).toMatchObject({ sourceLang: 'en', targetLang: 'fr', backend: 'mock', model: 'test' });
    expect(units[0].fingerprint).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should key units by language pair', () => {
    const backend = new MockBackend(upper);
    const [toFrench] = collectUnits(runs(['Hello']), EN_FR, backend);
    const [toGerman] = collectUnits(runs(['Hello']), { sourceLang: 'en', targetLang: 'de' }, backend);

    expect(toFrench.fingerprint).not.toBe(toGerman.fingerprint);
  });
});

describe('TranslationDispatcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should keep results aligned with their units across batches', async () => {
    const backend = new MockBackend((texts) => texts.map((text, i) => `#${i}:${text}`), { batchSize: 4 });
    const all = runs(Array.from({ length: 10 }, (_, i) => `text ${i}`));
    const units = collectUnits(all, EN_FR, backend);
    const dispatcher = new TranslationDispatcher(backend, { threads: 3, batchSize: 4, retry: NO_RETRY });

    const results = await dispatcher.translateAll(units);
    applyResults(all, units, results);

    expect(backend.calls).toBe(3);
    expect(all.map((run) => run.translation)).toEqual(
      Array.from({ length: 10 }, (_, i) => `#${i % 4}:text ${i}`)
    );
    expect(dispatcher.stats).toEqual({ units: 10, cacheHits: 0, backendCalls: 3, retries: 0, failed: 0, failedOver: false });
  });

  it('should translate a repeated text once', async () => {
    const backend = new MockBackend(upper);
    const all = runs(Array.from({ length: 50 }, () => 'Repeated header'));
    const units = collectUnits(all, EN_FR, backend);

    const results = await new TranslationDispatcher(backend, { retry: NO_RETRY }).translateAll(units);
    applyResults(all, units, results);

    expect(backend.calls).toBe(1);
    expect(new Set(all.map((run) => run.translation))).toEqual(new Set(['REPEATED HEADER']));
  });

  it('should split batches by character budget', async () => {
    const backend = new MockBackend(upper, { batchSize: 10 });
    const units = collectUnits(runs(['aaaaaa', 'bbbbbb', 'cccccc']), EN_FR, backend);

    await new TranslationDispatcher(backend, { batchSize: 10, maxBatchChars: 10, retry: NO_RETRY }).translateAll(units);

    expect(backend.seen).toEqual([['aaaaaa'], ['bbbbbb'], ['cccccc']]);
  });

  it('should serve repeated jobs from the cache', async () => {
    const backend = new MockBackend(upper);
    const cache = new MemoryCacheStore();
    const units = collectUnits(runs(['One', 'Two']), EN_FR, backend);

    await new TranslationDispatcher(backend, { cache, retry: NO_RETRY }).translateAll(units);
    expect(cache.size).toBe(2);
    expect((await cache.get(units[0].fingerprint))?.translation).toBe('ONE');

    const second = new TranslationDispatcher(backend, { cache, retry: NO_RETRY });
    const results = await second.translateAll(units);

    expect(backend.calls).toBe(2);
    expect(second.stats.cacheHits).toBe(2);
    expect(results.get(units[1].fingerprint)).toEqual({ status: 'translated', text: 'TWO', fromCache: true, backend: 'mock' });
  });

  it('should bypass cache reads on a forced refresh', async () => {
    const backend = new MockBackend(upper);
    const cache = new MemoryCacheStore();
    const units = collectUnits(runs(['One']), EN_FR, backend);

    await new TranslationDispatcher(backend, { cache, retry: NO_RETRY }).translateAll(units);
    const refreshed = new TranslationDispatcher(backend, { cache, forceRefresh: true, retry: NO_RETRY });
    await refreshed.translateAll(units);

    expect(backend.calls).toBe(2);
    expect(refreshed.stats.cacheHits).toBe(0);
  });

  it('should retry transient failures', async () => {
    let attempts = 0;
    const backend = new MockBackend((texts) => {
      attempts++;
      if (attempts < 3) throw new BackendUnavailableError('busy');
      return upper(texts);
    });
    const sleep = vi.fn(async (_ms: number) => undefined);
    const units = collectUnits(runs(['Hello']), EN_FR, backend);
    const dispatcher = new TranslationDispatcher(backend, {
      retry: { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 1000 },
      sleep
    });

    const results = await dispatcher.translateAll(units);

    expect(translatedText(results.get(units[0].fingerprint))).toBe('HELLO');
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(dispatcher.stats).toMatchObject({ backendCalls: 3, retries: 2, failed: 0 });
  });

  it('should leave failed texts untranslated with a warning', async () => {
    const backend = new MockBackend((texts) => {
      if (texts[0] === 'Bad') throw new BackendRejectedError('refused');
      return upper(texts);
    });
    const all = runs(['Good', 'Bad']);
    const units = collectUnits(all, EN_FR, backend);
    const dispatcher = new TranslationDispatcher(backend, { retry: NO_RETRY });

    const results = await dispatcher.translateAll(units);
    applyResults(all, units, results);

    expect(all[0].translation).toBe('GOOD');
    expect(all[1].translation).toBeUndefined();
    expect(all[1].warnings).toEqual([{ code: 'TranslationFailed', message: 'Translation failed: refused', runId: 'p1-t2' }]);
    expect(dispatcher.stats.failed).toBe(1);
  });

  it('should switch to the fallback after repeated failures', async () => {
    const primary = new MockBackend(() => {
      throw new BackendRejectedError('quota gone');
    });
    const fallback = new MockBackend((texts) => texts.map((text) => `fb:${text}`), { name: 'fallback' });
    const units = collectUnits(runs(['a', 'b', 'c']), EN_FR, primary);
    const dispatcher = new TranslationDispatcher(primary, { threads: 1, failoverAfter: 2, fallback, retry: NO_RETRY });

    const results = await dispatcher.translateAll(units);

    expect(primary.calls).toBe(2);
    expect(fallback.calls).toBe(3);
    expect(units.map((unit) => results.get(unit.fingerprint))).toEqual([
      { status: 'translated', text: 'fb:a', fromCache: false, backend: 'fallback' },
      { status: 'translated', text: 'fb:b', fromCache: false, backend: 'fallback' },
      { status: 'translated', text: 'fb:c', fromCache: false, backend: 'fallback' }
    ]);
    expect(dispatcher.stats).toMatchObject({ failed: 0, failedOver: true });
  });

  it('should retry a misaligned batch one text at a time', async () => {
    const backend = new MockBackend((texts) => (texts.length > 1 ? texts.slice(1) : upper(texts)), { batchSize: 4 });
    const units = collectUnits(runs(['w', 'x', 'y', 'z']), EN_FR, backend);

    const results = await new TranslationDispatcher(backend, { batchSize: 4, retry: NO_RETRY }).translateAll(units);

    expect(backend.calls).toBe(5);
    expect(units.map((unit) => translatedText(results.get(unit.fingerprint)))).toEqual(['W', 'X', 'Y', 'Z']);
  });

  it('should check batch alignment for any backend', async () => {
    let calls = 0;
    const raw: TranslationBackend = {
      name: 'raw',
      model: 'test',
      maxBatchSize: 4,
      translate: async (texts) => {
        calls++;
        return texts.length > 1 ? upper(texts.slice(1)) : upper(texts);
      },
      cacheParams: () => ({}),
      supports: () => true
    };
    const cache = new MemoryCacheStore();
    const all = runs(['a', 'b', 'c', 'd']);
    const units = collectUnits(all, EN_FR, raw);

    const results = await new TranslationDispatcher(raw, { batchSize: 4, cache, retry: NO_RETRY }).translateAll(units);
    applyResults(all, units, results);

    expect(calls).toBe(5);
    expect(all.map((run) => run.translation)).toEqual(['A', 'B', 'C', 'D']);
    expect((await cache.get(units[3].fingerprint))?.translation).toBe('D');
  });

  it('should start afresh when reused', async () => {
    let broken = true;
    const backend = new MockBackend((texts) => {
      if (broken) throw new InvalidLanguagePairError('en', 'fr', 'rejected');
      return upper(texts);
    });
    const units = collectUnits(runs(['One']), EN_FR, backend);
    const dispatcher = new TranslationDispatcher(backend, { retry: NO_RETRY });

    await expect(dispatcher.translateAll(units)).rejects.toThrow(InvalidLanguagePairError);
    broken = false;
    const results = await dispatcher.translateAll(units);

    expect(translatedText(results.get(units[0].fingerprint))).toBe('ONE');
    expect(dispatcher.stats).toEqual({ units: 1, cacheHits: 0, backendCalls: 1, retries: 0, failed: 0, failedOver: false });
  });

  it('should stop on an unsupported language pair', async () => {
    const backend = new MockBackend(() => {
      throw new InvalidLanguagePairError('en', 'tlh', 'rejected');
    });
    const units = collectUnits(runs(['One', 'Two', 'Three']), EN_FR, backend);

    await expect(new TranslationDispatcher(backend, { threads: 1, retry: NO_RETRY }).translateAll(units)).rejects.toThrow(
      InvalidLanguagePairError
    );
    expect(backend.calls).toBe(1);
  });

  it('should refuse to start once cancelled', async () => {
    const backend = new MockBackend(upper);
    const controller = new AbortController();
    controller.abort();

    const dispatcher = new TranslationDispatcher(backend, { signal: controller.signal });

    await expect(dispatcher.translateAll(collectUnits(runs(['One']), EN_FR, backend))).rejects.toThrow(JobCancelledError);
    expect(backend.calls).toBe(0);
  });

  it('should stop taking batches after cancellation', async () => {
    const controller = new AbortController();
    let calls = 0;
    const backend = new MockBackend((texts) => {
      if (++calls === 2) controller.abort();
      return upper(texts);
    });
    const units = collectUnits(runs(['a', 'b', 'c', 'd', 'e']), EN_FR, backend);
    const dispatcher = new TranslationDispatcher(backend, { threads: 1, signal: controller.signal, retry: NO_RETRY });

    await expect(dispatcher.translateAll(units)).rejects.toThrow(JobCancelledError);
    expect(backend.calls).toBe(2);
  });

  it('should let in-flight calls finish after cancellation', async () => {
    const controller = new AbortController();
    const cache = new MemoryCacheStore();
    const backend = new MockBackend((texts) => {
      controller.abort();
      return upper(texts);
    });
    const units = collectUnits(runs(Array.from({ length: 10 }, (_, i) => `unit ${i}`)), EN_FR, backend);
    const dispatcher = new TranslationDispatcher(backend, { threads: 3, cache, signal: controller.signal, retry: NO_RETRY });

    await expect(dispatcher.translateAll(units)).rejects.toThrow(JobCancelledError);
    expect(backend.calls).toBe(3);
    expect(cache.size).toBe(3);
  });

  it('should report progress', async () => {
    const backend = new MockBackend(upper);
    const progress: Array<[number, number]> = [];
    const units = collectUnits(runs(['a', 'b', 'c']), EN_FR, backend);

    await new TranslationDispatcher(backend, {
      threads: 1,
      retry: NO_RETRY,
      onProgress: (completed, total) => progress.push([completed, total])
    }).translateAll(units);

    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3]
    ]);
  });
});
