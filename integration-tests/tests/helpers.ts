/**
 * Test Helpers
 *
 * Stub strategies, fixed clocks and sample page text.
 */

import {
  AumExtractor,
  BudgetTracker,
  Err,
  Ok,
  approximateTokens,
  type AumExtractorOptions,
  type AumPrompt,
  type PrimaryExtractionOutcome,
  type PrimaryExtractionStrategy,
} from '@aum-scraper/shared';

type Reply = (prompt: AumPrompt, signal?: AbortSignal) => Promise<PrimaryExtractionOutcome>;

/**
 * Primary strategy that answers from a script, one reply per call.
 * Calls past the end of the script fail.
 */
export class StubStrategy implements PrimaryExtractionStrategy {
  readonly name = 'stub';
  readonly prompts: AumPrompt[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly replies: Reply[]) {}

  get calls(): number {
    return this.prompts.length;
  }

  async extract(prompt: AumPrompt, signal?: AbortSignal): Promise<PrimaryExtractionOutcome> {
    const reply = this.replies[this.prompts.length];
    this.prompts.push(prompt);
    this.signals.push(signal);
    if (!reply) return Err({ error: new Error('no scripted reply'), tokensUsed: 0 });
    return reply(prompt, signal);
  }
}

export function answer(text: string, tokensUsed: number): Reply {
  return async () => Ok({ text, tokensUsed, model: 'stub-model' });
}

export function fail(message: string, tokensUsed = 0): Reply {
  return async () => Err({ error: new Error(message), tokensUsed });
}

/**
 * Reply that only settles when the request is aborted.
 */
export function hang(): Reply {
  return (_prompt, signal) =>
    new Promise((resolve) => {
      signal?.addEventListener('abort', () =>
        resolve(Err({ error: new Error('aborted'), tokensUsed: 0 }))
      );
    });
}

/**
 * Mutable clock for BudgetTracker.
 */
export class TestClock {
  constructor(public current: Date) {}

  readonly now = (): Date => this.current;

  advanceDays(days: number): void {
    const next = new Date(this.current);
    next.setDate(next.getDate() + days);
    this.current = next;
  }
}

export function buildExtractor(
  strategy: PrimaryExtractionStrategy,
  overrides: Partial<AumExtractorOptions> = {}
): AumExtractor {
  return new AumExtractor({
    strategy,
    budget: new BudgetTracker({ dailyLimit: 100_000 }),
    estimateTokens: approximateTokens,
    ...overrides,
  });
}

/** Paragraph with many domain keywords; ranks first. */
export const REPORT_PARAGRAPH =
  'Relatório anual: patrimônio sob gestão, fundos de investimento e gestão de riscos em reais.';

/** Paragraph with a figure and a single keyword; ranks after REPORT_PARAGRAPH. */
export const FIGURE_PARAGRAPH =
  'A empresa soma 290 milhões em ativos de clientes espalhados pelo Brasil inteiro.';

export const CUSTODY_PARAGRAPH =
  'A gestora informou que administra 290 milhões sob custódia para clientes institucionais.';

export const NAVIGATION = 'Início | Sobre | Contato';

export function page(...paragraphs: string[]): string {
  return paragraphs.join('\n\n');
}
