/**
 * Invalid engine / run configuration. Raised at construction time, never mid-run.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A run aborted while processing a bar. Nothing from that bar was applied.
 */
export class BacktestError extends Error {
  readonly barIndex: number;

  constructor(barIndex: number, message: string, options?: { cause?: unknown }) {
    super(`Bar ${barIndex}: ${message}`, options);
    this.name = 'BacktestError';
    this.barIndex = barIndex;
  }
}

export class MarketDataError extends Error {
  readonly symbol: string;

  constructor(symbol: string, message: string, options?: { cause?: unknown }) {
    super(`${symbol}: ${message}`, options);
    this.name = 'MarketDataError';
    this.symbol = symbol;
  }
}
