/**
 * Error Types
 *
 * Routine extraction problems never surface as exceptions; they are folded
 * into the result. Only configuration faults are thrown.
 */

export class AumScraperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AumScraperError';
  }
}

/**
 * Raised once at startup or construction time, before any extraction runs.
 */
export class ConfigurationError extends AumScraperError {
  constructor(public readonly problems: string[]) {
    super(`Configuration error: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export class PrimaryExtractionTimeoutError extends AumScraperError {
  constructor(public readonly timeoutMs: number) {
    super(`Primary extraction timed out after ${timeoutMs}ms`);
    this.name = 'PrimaryExtractionTimeoutError';
  }
}
