/**
 * AUM Extraction Orchestrator Tests
 *
 * Drives AumExtractor with scripted primary strategies.
 */

import {
  AUM_TEMPLATE,
  BudgetTracker,
  ConfigurationError,
  approximateTokens,
  config,
  createAumExtractor,
  promptTokens,
  type AumPrompt,
  type PrimaryExtractionOutcome,
  type PrimaryExtractionStrategy,
} from '@aum-scraper/shared';
import {
  CUSTODY_PARAGRAPH,
  FIGURE_PARAGRAPH,
  NAVIGATION,
  REPORT_PARAGRAPH,
  StubStrategy,
  TestClock,
  answer,
  buildExtractor,
  fail,
  hang,
  page,
} from './helpers';

describe('AumExtractor', () => {
  describe('primary strategy', () => {
    it('should extract a figure end to end', async () => {
      const strategy = new StubStrategy([answer('R$ 2,3 bi', 42)]);
      const extractor = buildExtractor(strategy);

      const result = await extractor.extractAum('Gestora Alfa', page(NAVIGATION, REPORT_PARAGRAPH));

      expect(result.value).toBeCloseTo(2.3e9);
      expect(result.currency).toBe('BRL');
      expect(result.unit).toBe('bi');
      expect(result.rawText).toBe('R$ 2,3 bi');
      expect(result.extractionMethod).toBe('llm');
      expect(result.tokensUsed).toBe(42);
      expect(result.confidence).toBeGreaterThanOrEqual(0.8);
    });

    it('should commit tokens to the shared budget', async () => {
      const strategy = new StubStrategy([answer('R$ 2,3 bi', 42)]);
      const extractor = buildExtractor(strategy);

      await extractor.extractAum('Gestora Alfa', REPORT_PARAGRAPH);

      const stats = extractor.dailyStats();
      expect(stats.tokensUsed).toBe(42);
      expect(stats.tokensLimit).toBe(100_000);
      expect(stats.usagePercentage).toBeCloseTo(0.042);
      expect(stats.callsToday).toBe(1);
      expect(extractor.isBudgetExceeded()).toBe(false);
    });

    it('should stop after a confident result', async () => {
      const strategy = new StubStrategy([answer('R$ 2,3 bi', 42), answer('R$ 9 bi', 42)]);
      const extractor = buildExtractor(strategy);

      const result = await extractor.extractAum(
        'Gestora Alfa',
        page(REPORT_PARAGRAPH, FIGURE_PARAGRAPH)
      );

      expect(strategy.calls).toBe(1);
      expect(result.value).toBeCloseTo(2.3e9);
    });

    it('should try the next chunk when the reply has no figure', async () => {
      const strategy = new StubStrategy([answer('NOT_AVAILABLE', 30), answer('290 milhões', 40)]);
      const extractor = buildExtractor(strategy);

      const result = await extractor.extractAum(
        'Gestora Alfa',
        page(FIGURE_PARAGRAPH, REPORT_PARAGRAPH)
      );

      expect(strategy.calls).toBe(2);
      expect(strategy.prompts[0].user).toContain(REPORT_PARAGRAPH);
      expect(strategy.prompts[1].user).toContain(FIGURE_PARAGRAPH);
      expect(result.value).toBe(290e6);
      expect(result.extractionMethod).toBe('llm');
      expect(result.confidence).toBeCloseTo(0.9);
      expect(result.tokensUsed).toBe(70);
    });

    it('should keep the earliest chunk on equal confidence', async () => {
      const strategy = new StubStrategy([answer('100 mil', 10), answer('R$ 290 milhões', 10)]);
      const extractor = buildExtractor(strategy, { earlyExitConfidence: 2 });

      const result = await extractor.extractAum(
        'Gestora Alfa',
        page(REPORT_PARAGRAPH, FIGURE_PARAGRAPH)
      );

      expect(strategy.calls).toBe(2);
      expect(result.value).toBe(100_000);
      expect(result.confidence).toBe(1);
      expect(result.tokensUsed).toBe(20);
    });

    it('should return the empty result with the tokens spent when nothing is found', async () => {
      const strategy = new StubStrategy([answer('NOT_AVAILABLE', 25)]);
      const extractor = buildExtractor(strategy);

      const result = await extractor.extractAum('Gestora Alfa', REPORT_PARAGRAPH);

      expect(result).toEqual({
        currency: 'BRL',
        rawText: 'NOT_AVAILABLE',
        confidence: 0,
        tokensUsed: 25,
        extractionMethod: 'none',
      });
    });
  });

  describe('fallback', () => {
    it('should use the regex fallback when the primary strategy fails', async () => {
      const strategy = new StubStrategy([fail('provider unavailable')]);
      const extractor = buildExtractor(strategy);

      const result = await extractor.extractAum('Gestora Alfa', CUSTODY_PARAGRAPH);

      expect(result).toEqual({
        value: 290e6,
        currency: 'BRL',
        unit: 'milhões',
        rawText: '290 milhões sob custódia',
        confidence: 0.7,
        tokensUsed: 0,
        extractionMethod: 'regex_fallback',
      });
      expect(extractor.dailyStats().callsToday).toBe(1);
    });

    it('should count tokens billed by a failed call', async () => {
      const strategy = new StubStrategy([fail('unusable reply', 15)]);
      const extractor = buildExtractor(strategy);

      const result = await extractor.extractAum('Gestora Alfa', CUSTODY_PARAGRAPH);

      expect(result.extractionMethod).toBe('regex_fallback');
      expect(result.tokensUsed).toBe(15);
      expect(extractor.dailyStats().tokensUsed).toBe(15);
    });

    it('should treat a rejected call as a primary failure', async () => {
      const rejecting: PrimaryExtractionStrategy = {
        name: 'rejecting',
        extract: async (): Promise<PrimaryExtractionOutcome> => {
          throw new Error('socket hang up');
        },
      };
      const extractor = buildExtractor(rejecting);

      const result = await extractor.extractAum('Gestora Alfa', CUSTODY_PARAGRAPH);

      expect(result.extractionMethod).toBe('regex_fallback');
      expect(result.value).toBe(290e6);
    });

    it('should abort a slow call and fall back', async () => {
      const strategy = new StubStrategy([hang()]);
      const extractor = buildExtractor(strategy, { timeoutMs: 20 });

      const result = await extractor.extractAum('Gestora Alfa', CUSTODY_PARAGRAPH);

      expect(result.extractionMethod).toBe('regex_fallback');
      expect(strategy.signals[0]?.aborted).toBe(true);
      expect(extractor.dailyStats().callsToday).toBe(1);
    });

    it('should skip the primary strategy when the budget refuses', async () => {
      const strategy = new StubStrategy([answer('R$ 2,3 bi', 42)]);
      const budget = new BudgetTracker({ dailyLimit: 10 });
      const extractor = buildExtractor(strategy, { budget });

      const result = await extractor.extractAum('Gestora Alfa', CUSTODY_PARAGRAPH);

      expect(strategy.calls).toBe(0);
      expect(result.extractionMethod).toBe('regex_fallback');
      expect(budget.dailyStats().callsToday).toBe(0);
      expect(budget.checkAndReserve(10)).toBe(true);
    });

    it('should return the empty result when the fallback finds nothing', async () => {
      const strategy = new StubStrategy([fail('provider unavailable')]);
      const extractor = buildExtractor(strategy);

      const result = await extractor.extractAum('Gestora Alfa', REPORT_PARAGRAPH);

      expect(result.extractionMethod).toBe('none');
      expect(result.rawText).toBe('NOT_AVAILABLE');
      expect(result.value).toBeUndefined();
    });
  });

  describe('limits and faults', () => {
    it('should not call the primary strategy when no chunk is relevant', async () => {
      const strategy = new StubStrategy([answer('R$ 2,3 bi', 42)]);
      const extractor = buildExtractor(strategy);

      const result = await extractor.extractAum('Gestora Alfa', NAVIGATION);

      expect(strategy.calls).toBe(0);
      expect(result.extractionMethod).toBe('none');
      expect(result.tokensUsed).toBe(0);
    });

    it('should truncate a chunk that would exceed the per-request limit', async () => {
      const strategy = new StubStrategy([answer('NOT_AVAILABLE', 10)]);
      const extractor = buildExtractor(strategy, {
        maxTokensPerRequest: 300,
        maxCharsPerChunk: 20_000,
      });
      const long = Array(2_000).fill('fundo').join(' ');

      await extractor.extractAum('Gestora Alfa', long);

      const prompt: AumPrompt = strategy.prompts[0];
      expect(promptTokens(prompt, approximateTokens)).toBeLessThanOrEqual(300);
      expect(prompt.user).toContain('Texto para análise:\nfundo fundo');
      expect(prompt.user).not.toContain(long);
    });

    it('should fall back and free the reservation when the strategy throws synchronously', async () => {
      const clock = new TestClock(new Date(2026, 2, 14, 9, 0));
      const budget = new BudgetTracker({ dailyLimit: 300, now: clock.now });
      const throwing: PrimaryExtractionStrategy = {
        name: 'throwing',
        extract: (): Promise<PrimaryExtractionOutcome> => {
          throw new Error('boom');
        },
      };
      const extractor = buildExtractor(throwing, { budget });

      const result = await extractor.extractAum('Gestora Alfa', CUSTODY_PARAGRAPH);

      expect(result.extractionMethod).toBe('regex_fallback');
      expect(result.value).toBe(290e6);
      expect(result.tokensUsed).toBe(0);
      expect(budget.dailyStats().callsToday).toBe(1);
      expect(budget.checkAndReserve(300)).toBe(true);
    });

    it('should leave the next day with its whole budget after a throwing strategy', async () => {
      const clock = new TestClock(new Date(2026, 2, 14, 9, 0));
      const budget = new BudgetTracker({ dailyLimit: 300, now: clock.now });
      const throwing: PrimaryExtractionStrategy = {
        name: 'throwing',
        extract: (): Promise<PrimaryExtractionOutcome> => {
          throw new Error('boom');
        },
      };

      await buildExtractor(throwing, { budget }).extractAum('Gestora Alfa', CUSTODY_PARAGRAPH);
      clock.advanceDays(1);

      expect(budget.dailyStats().callsToday).toBe(0);
      expect(budget.checkAndReserve(300)).toBe(true);
    });

    it('should name the prompt template in the completion log', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      try {
        const extractor = buildExtractor(new StubStrategy([answer('R$ 2,3 bi', 42)]));

        await extractor.extractAum('Gestora Alfa', REPORT_PARAGRAPH);

        const entries: Array<Record<string, unknown>> = log.mock.calls.map(([line]) =>
          JSON.parse(String(line))
        );
        const done = entries.find((entry) => entry.message === 'AUM extraction complete');
        expect(done?.template).toBe('aum');
        expect(done?.template_version).toBe(AUM_TEMPLATE.version);
      } finally {
        log.mockRestore();
      }
    });

    it('should refuse to build without an API key', () => {
      expect(() => createAumExtractor({ ...config, openaiApiKey: '' })).toThrow(ConfigurationError);
    });
  });
});
