/**
 * Persistence Tests
 *
 * Runs the persistence layer against an in-memory SQL client that records
 * statements and answers the few queries the layer reads from.
 */

import type { PersistAumJob } from '@aum-scraper/shared';
import {
  persistAumSnapshot,
  type SqlClient,
  type SqlResult,
} from '../../services/worker-persistence/src/lib/db';

interface Statement {
  text: string;
  values?: unknown[];
}

class FakeSqlClient implements SqlClient {
  readonly statements: Statement[] = [];

  constructor(
    private readonly tokensToday = 0,
    private readonly failOn: string[] = []
  ) {}

  async query(text: string, values?: unknown[]): Promise<SqlResult> {
    this.statements.push({ text, values });

    const failure = this.failOn.find((fragment) => text.includes(fragment));
    if (failure) {
      throw new Error(failure === 'ROLLBACK' ? 'connection lost' : 'insert failed');
    }
    if (text.includes('INSERT INTO scrape_logs')) return { rows: [{ id: 11 }], rowCount: 1 };
    if (text.includes('INSERT INTO aum_snapshots')) return { rows: [{ id: 22 }], rowCount: 1 };
    if (text.includes('SUM(tokens_used)')) {
      return { rows: [{ tokens_used: String(this.tokensToday) }], rowCount: 1 };
    }
    return { rows: [], rowCount: 0 };
  }

  verbs(): string[] {
    return this.statements.map((s) => s.text.trim().split(/\s+/)[0]);
  }

  find(fragment: string): Statement | undefined {
    return this.statements.find((s) => s.text.includes(fragment));
  }
}

const LIMITS = { tokensLimit: 100_000, alertThreshold: 0.8 };

function job(overrides: Partial<PersistAumJob> = {}): PersistAumJob {
  return {
    correlation_id: 'corr-1',
    company: { id: 7, name: 'Gestora Alfa' },
    source: {
      url: 'https://gestora-alfa.example/sobre',
      sourceType: 'website',
      status: 'success',
      contentLength: 1200,
      isBlocked: false,
    },
    result: {
      value: 2.3e9,
      currency: 'BRL',
      unit: 'bi',
      rawText: 'R$ 2,3 bi',
      confidence: 1,
      tokensUsed: 42,
      extractionMethod: 'llm',
    },
    chunks_count: 2,
    ...overrides,
  };
}

describe('persistAumSnapshot', () => {
  it('should write the log, the snapshot and the usage in one transaction', async () => {
    const client = new FakeSqlClient(85_000);

    const outcome = await persistAumSnapshot(client, job(), LIMITS);

    expect(client.verbs()).toEqual(['BEGIN', 'INSERT', 'INSERT', 'INSERT', 'SELECT', 'COMMIT']);
    expect(outcome.scrapeLogId).toBe(11);
    expect(outcome.snapshotId).toBe(22);
    expect(outcome.usage?.tokensUsedToday).toBe(85_000);
    expect(outcome.usage?.usagePercentage).toBeCloseTo(85);
    expect(outcome.usage?.thresholdReached).toBe(true);
  });

  it('should store the extracted figure on the snapshot', async () => {
    const client = new FakeSqlClient();

    await persistAumSnapshot(client, job(), LIMITS);

    expect(client.find('INSERT INTO aum_snapshots')?.values).toEqual([
      7,
      11,
      2.3e9,
      'BRL',
      'bi',
      'R$ 2,3 bi',
      'https://gestora-alfa.example/sobre',
      'website',
      1,
      'llm',
      42,
    ]);
    expect(client.find('INSERT INTO usage')?.values).toEqual([42, 100_000, 7]);
  });

  it('should skip the usage row when no tokens were spent', async () => {
    const client = new FakeSqlClient();
    const empty = job({
      result: {
        currency: 'BRL',
        rawText: 'NOT_AVAILABLE',
        confidence: 0,
        tokensUsed: 0,
        extractionMethod: 'none',
      },
    });

    const outcome = await persistAumSnapshot(client, empty, LIMITS);

    expect(client.verbs()).toEqual(['BEGIN', 'INSERT', 'INSERT', 'COMMIT']);
    expect(outcome.usage).toBeUndefined();
    const snapshot = client.find('INSERT INTO aum_snapshots');
    expect(snapshot?.values?.[2]).toBeNull();
    expect(snapshot?.values?.[5]).toBe('NOT_AVAILABLE');
  });

  it('should stay quiet below the alert threshold', async () => {
    const client = new FakeSqlClient(10_000);

    const outcome = await persistAumSnapshot(client, job(), LIMITS);

    expect(outcome.usage?.tokensUsedToday).toBe(10_000);
    expect(outcome.usage?.usagePercentage).toBeCloseTo(10);
    expect(outcome.usage?.thresholdReached).toBe(false);
  });

  it('should log blocked sources with their error', async () => {
    const client = new FakeSqlClient();
    const blocked = job({
      source: {
        url: 'https://social.example/gestora-alfa',
        sourceType: 'instagram',
        status: 'failed',
        contentLength: 0,
        isBlocked: true,
      },
      error_message: 'Login wall',
      result: {
        currency: 'BRL',
        rawText: 'NOT_AVAILABLE',
        confidence: 0,
        tokensUsed: 0,
        extractionMethod: 'none',
      },
    });

    await persistAumSnapshot(client, blocked, LIMITS);

    expect(client.find('INSERT INTO scrape_logs')?.values).toEqual([
      7,
      'https://social.example/gestora-alfa',
      'instagram',
      'blocked',
      0,
      'Login wall',
      true,
      'corr-1',
    ]);
  });

  it('should roll back and rethrow when a write fails', async () => {
    const client = new FakeSqlClient(0, ['INSERT INTO aum_snapshots']);

    await expect(persistAumSnapshot(client, job(), LIMITS)).rejects.toThrow('insert failed');
    expect(client.verbs()).toEqual(['BEGIN', 'INSERT', 'INSERT', 'ROLLBACK']);
  });

  it('should rethrow the write error when the rollback also fails', async () => {
    const client = new FakeSqlClient(0, ['INSERT INTO aum_snapshots', 'ROLLBACK']);

    await expect(persistAumSnapshot(client, job(), LIMITS)).rejects.toThrow('insert failed');
    expect(client.verbs()).toEqual(['BEGIN', 'INSERT', 'INSERT', 'ROLLBACK']);
  });
});
