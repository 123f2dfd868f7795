/**
 * Daily Token Budget
 *
 * Counts tokens and calls spent on the primary extraction strategy per
 * calendar day. One instance is shared by every extraction in a process.
 *
 * Every method is synchronous: Node runs each call to completion before any
 * other extraction resumes, so check-then-reserve and commit cannot
 * interleave. Estimates are held as reservations between checkAndReserve
 * and commit so concurrent extractions see each other's pending spend.
 */

import { logger } from '../logger';
import type { BudgetState, DailyStats } from '../types';

export interface BudgetTrackerOptions {
  dailyLimit: number;
  /** Fraction of the daily limit that raises a warning (default 0.8) */
  alertThreshold?: number;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export interface BudgetCommitResult {
  /** Usage is at or above the alert threshold after this commit */
  thresholdReached: boolean;
  stats: DailyStats;
}

/**
 * Local calendar date as YYYY-MM-DD.
 */
export function toDayAnchor(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export class BudgetTracker {
  readonly dailyLimit: number;
  readonly alertThreshold: number;

  private readonly now: () => Date;
  private state: BudgetState;
  private reservedTokens = 0;

  constructor(options: BudgetTrackerOptions) {
    this.dailyLimit = options.dailyLimit;
    this.alertThreshold = options.alertThreshold ?? 0.8;
    this.now = options.now ?? (() => new Date());
    this.state = {
      tokensUsedToday: 0,
      callsToday: 0,
      dayAnchor: toDayAnchor(this.now()),
    };
  }

  /**
   * Reserve room for a request. Returns false, and reserves nothing, when
   * the estimate would take the day past its limit.
   */
  checkAndReserve(estimatedTokens: number): boolean {
    this.rollOver();

    const projected = this.state.tokensUsedToday + this.reservedTokens + estimatedTokens;
    if (projected > this.dailyLimit) {
      logger.warn('Token budget refused request', {
        estimated_tokens: estimatedTokens,
        tokens_used_today: this.state.tokensUsedToday,
        reserved_tokens: this.reservedTokens,
        daily_limit: this.dailyLimit,
      });
      return false;
    }

    this.reservedTokens += estimatedTokens;
    return true;
  }

  /**
   * Record a finished call. Called after every attempt that reached the
   * provider, successful or not.
   */
  commit(actualTokens: number, reservedTokens = 0): BudgetCommitResult {
    this.rollOver();
    this.release(reservedTokens);

    this.state.tokensUsedToday += Math.max(0, actualTokens);
    this.state.callsToday += 1;

    const stats = this.dailyStats();
    const thresholdReached = this.state.tokensUsedToday / this.dailyLimit >= this.alertThreshold;

    if (thresholdReached) {
      logger.warn('Daily token budget above alert threshold', {
        tokens_used: stats.tokensUsed,
        tokens_limit: stats.tokensLimit,
        usage_percentage: stats.usagePercentage,
        alert_threshold: this.alertThreshold,
      });
    }

    return { thresholdReached, stats };
  }

  /**
   * Drop a reservation whose call never happened.
   */
  release(reservedTokens: number): void {
    this.reservedTokens = Math.max(0, this.reservedTokens - Math.max(0, reservedTokens));
  }

  dailyStats(): DailyStats {
    this.rollOver();
    return {
      tokensUsed: this.state.tokensUsedToday,
      tokensLimit: this.dailyLimit,
      usagePercentage:
        this.dailyLimit > 0 ? (this.state.tokensUsedToday / this.dailyLimit) * 100 : 0,
      callsToday: this.state.callsToday,
    };
  }

  isBudgetExceeded(): boolean {
    this.rollOver();
    return this.state.tokensUsedToday >= this.dailyLimit;
  }

  snapshot(): BudgetState {
    this.rollOver();
    return { ...this.state };
  }

  /**
   * Reset the counters once the date has moved past the anchor. Never moves
   * the anchor backwards.
   */
  private rollOver(): void {
    const today = toDayAnchor(this.now());
    if (today <= this.state.dayAnchor) return;

    logger.info('Token budget day rolled over', {
      previous_day: this.state.dayAnchor,
      day: today,
      tokens_used: this.state.tokensUsedToday,
      calls: this.state.callsToday,
    });

    this.state = { tokensUsedToday: 0, callsToday: 0, dayAnchor: today };
  }
}
