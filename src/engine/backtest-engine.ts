import { z } from 'zod';
import type {
  BacktestResult,
  Candle,
  ClosedTrade,
  EquityPoint,
  IndicatorBar,
  SetupFilters,
} from '../types/index.js';
import { NO_FILTERS } from '../types/index.js';
import type { IndicatorProvider, SetupProvider } from '../strategy/provider.js';
import { EmaRsiSetupProvider } from '../strategy/ema-rsi-setup.js';
import { EventBus } from './event-bus.js';
import { PositionManager } from './position-manager.js';
import { computeMetrics } from '../report/metrics.js';
import { BacktestError, ConfigurationError } from '../errors.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('backtest');

/** Fewer bars than this and a run returns null */
export const MIN_BARS = 22;
/** First bar the engine processes; earlier bars only warm up indicators */
export const WARMUP_BARS = 21;

export interface BacktestConfig {
  readonly initialCapital: number;
  readonly useDca: boolean;
  readonly positionSizeFraction: number;   // of current capital per new position (0 < f <= 1)
  readonly filters: SetupFilters;
  readonly trailingStopPercent?: number;   // e.g. 1.0 = 1%; unset or 0 disables trailing
}

export type BacktestOptions = Partial<Omit<BacktestConfig, 'filters'>> & {
  readonly filters?: Partial<SetupFilters>;
};

const DEFAULT_CONFIG: BacktestConfig = {
  initialCapital: 10_000,
  useDca: false,
  positionSizeFraction: 1.0,
  filters: NO_FILTERS,
};

const configSchema = z.object({
  initialCapital: z.number().finite().positive(),
  useDca: z.boolean(),
  positionSizeFraction: z.number().gt(0).lte(1),
  filters: z.object({
    trend: z.boolean(),
    volume: z.boolean(),
    adx: z.boolean(),
    macd: z.boolean(),
  }),
  trailingStopPercent: z.number().gt(0).lt(100).optional(),
});

export function resolveConfig(options?: BacktestOptions): BacktestConfig {
  const { trailingStopPercent, ...rest } = { ...DEFAULT_CONFIG, ...options };
  const merged: BacktestConfig = {
    ...rest,
    filters: { ...DEFAULT_CONFIG.filters, ...options?.filters },
    // 0 turns trailing off
    ...(trailingStopPercent !== undefined && trailingStopPercent !== 0 ? { trailingStopPercent } : {}),
  };
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`),
    );
  }
  return merged;
}

/**
 * Bar-by-bar replay of a setup provider over an enriched bar series.
 *
 * Per bar, with a position open: trailing stop, then at most one DCA fill,
 * then stop-loss / take-profit. When flat (including right after an exit on
 * the same bar) the provider is asked for a setup using only bars up to the
 * current one. Equity is sampled once per processed bar.
 *
 * An instance holds state for one run at a time; `run` resets it, so
 * repeated runs over the same input give identical results.
 */
export class BacktestEngine {
  private readonly config: BacktestConfig;
  private readonly provider: SetupProvider;
  private readonly bus: EventBus;
  private readonly positions: PositionManager;

  private capital: number;
  private trades: ClosedTrade[] = [];
  private equityCurve: EquityPoint[] = [];
  private providerErrors: number = 0;
  private skippedEntries: number = 0;

  constructor(options?: BacktestOptions, provider: SetupProvider = new EmaRsiSetupProvider()) {
    this.config = resolveConfig(options);
    this.provider = provider;
    this.bus = new EventBus();
    this.positions = new PositionManager(this.bus);
    this.capital = this.config.initialCapital;
  }

  get settings(): BacktestConfig {
    return this.config;
  }

  run(bars: readonly IndicatorBar[]): BacktestResult | null {
    if (bars.length < MIN_BARS) {
      log.debug({ bars: bars.length, required: MIN_BARS }, 'Insufficient data, skipping run');
      return null;
    }
    assertChronological(bars);

    this.reset();
    log.info(
      { bars: bars.length, provider: this.provider.name, config: this.config },
      'Backtest started',
    );

    for (let i = WARMUP_BARS; i < bars.length; i++) {
      try {
        this.processBar(bars, i);
      } catch (err) {
        if (err instanceof BacktestError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        log.error({ barIndex: i, err }, 'Backtest aborted');
        throw new BacktestError(i, message, { cause: err });
      }
    }

    const lastIndex = bars.length - 1;
    const lastBar = bars[lastIndex]!;
    if (this.positions.hasPosition) {
      this.recordClose(
        this.positions.close(lastBar.timestamp, lastBar.close, 'END_OF_DATA', lastIndex, this.capital),
      );
    }

    const metrics = computeMetrics(
      this.trades,
      this.equityCurve,
      this.config.initialCapital,
      this.capital,
    );
    log.info(
      {
        trades: metrics.totalTrades,
        winRate: metrics.winRate,
        finalCapital: this.capital,
        providerErrors: this.providerErrors,
      },
      'Backtest finished',
    );

    return {
      trades: [...this.trades],
      equityCurve: [...this.equityCurve],
      metrics,
      initialCapital: this.config.initialCapital,
      finalCapital: this.capital,
      providerErrors: this.providerErrors,
      skippedEntries: this.skippedEntries,
    };
  }

  getEventLog() {
    return this.bus.getLog();
  }

  private processBar(bars: readonly IndicatorBar[], i: number): void {
    const bar = bars[i]!;

    if (this.positions.hasPosition) {
      if (this.config.trailingStopPercent !== undefined) {
        this.positions.updateTrailingStop(bar, i, this.config.trailingStopPercent);
      }
      if (this.config.useDca) {
        this.positions.applyDca(bar, i);
      }
      const exit = this.positions.checkExit(bar);
      if (exit) {
        this.recordClose(this.positions.close(bar.timestamp, exit.price, exit.reason, i, this.capital));
      }
    }

    if (!this.positions.hasPosition) {
      this.tryEnter(bars, i);
    }

    this.equityCurve.push({
      timestamp: bar.timestamp,
      equity: this.capital + this.positions.unrealizedPnl(bar.close),
    });
  }

  private tryEnter(bars: readonly IndicatorBar[], i: number): void {
    const bar = bars[i]!;
    const from = Math.max(0, i + 1 - this.provider.lookback);
    const history = bars.slice(from, i + 1);
    const result = this.provider.getSetup(history, bar.close, this.config.filters);

    switch (result.kind) {
      case 'SETUP': {
        const size = this.capital * this.config.positionSizeFraction;
        if (size <= 0) {
          this.skippedEntries++;
          log.warn({ barIndex: i, capital: this.capital }, 'No capital left, setup skipped');
          break;
        }
        this.positions.open(result.setup, bar, i, size, this.config.useDca);
        break;
      }
      case 'NONE':
        break;
      case 'ERROR':
        this.providerErrors++;
        log.warn({ barIndex: i, timestamp: bar.timestamp, err: result.error }, 'Setup provider failed');
        break;
    }
  }

  private recordClose(trade: ClosedTrade): void {
    this.capital = trade.capitalAfter;
    this.trades.push(trade);
  }

  private reset(): void {
    this.bus.clearLog();
    this.positions.reset();
    this.capital = this.config.initialCapital;
    this.trades = [];
    this.equityCurve = [];
    this.providerErrors = 0;
    this.skippedEntries = 0;
  }
}

function assertChronological(bars: readonly Candle[]): void {
  for (let i = 1; i < bars.length; i++) {
    if (bars[i]!.timestamp <= bars[i - 1]!.timestamp) {
      throw new BacktestError(i, 'bar timestamps must be strictly increasing');
    }
  }
}

/**
 * Enrich raw candles with the provider's indicators, then replay them.
 */
export function runBacktest(
  candles: readonly Candle[],
  options?: BacktestOptions,
  provider: IndicatorProvider = new EmaRsiSetupProvider(),
): BacktestResult | null {
  const engine = new BacktestEngine(options, provider);
  return engine.run(provider.computeIndicators(candles));
}
