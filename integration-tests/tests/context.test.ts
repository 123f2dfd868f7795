/**
 * Request Context Tests
 */

import {
  getContext,
  getCorrelationId,
  runWithChildContextAsync,
  runWithContextAsync,
} from '@aum-scraper/shared';

describe('Request context', () => {
  it('should carry the company context across awaits', async () => {
    const seen = await runWithContextAsync(
      { correlationId: 'corr-1', companyId: 7, companyName: 'Gestora Alfa' },
      async () => {
        await Promise.resolve();
        return getContext();
      }
    );

    expect(seen).toEqual({ correlationId: 'corr-1', companyId: 7, companyName: 'Gestora Alfa' });
  });

  it('should derive a child context that keeps the correlation ID', async () => {
    const seen = await runWithContextAsync({ correlationId: 'corr-1', companyId: 7 }, () =>
      runWithChildContextAsync({ sourceType: 'website' }, async () => getContext())
    );

    expect(seen).toEqual({ correlationId: 'corr-1', companyId: 7, sourceType: 'website' });
  });

  it('should generate a correlation ID outside any context', () => {
    expect(getContext()).toBeUndefined();
    expect(getCorrelationId()).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });
});
