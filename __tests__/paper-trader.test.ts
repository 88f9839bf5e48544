import { describe, expect, it } from '@jest/globals';

import type { ClosedTrade, Position } from '@/types';
import { buildEngineConfig, DEFAULT_ENGINE_CONFIG } from '@/lib/config';
import {
  PaperTrader,
  checkExit,
  exitPrice,
  nextTrailingStop,
  toClosedTrade,
} from '@/lib/paper-trading/paper-trader';
import { StrategyMatcher } from '@/lib/strategy';
import { silentLogger } from '@/lib/utils/logger';
import {
  fixedExitRules,
  makeInstrument,
  makePosition,
  makeSignal,
  makeTrade,
} from './helpers/fixtures';

function traderWith(positions: Position[], closedTrades: ClosedTrade[] = []): PaperTrader {
  return new PaperTrader(fixedExitRules(), DEFAULT_ENGINE_CONFIG.trader, {
    logger: silentLogger,
    state: { positions, closedTrades, virtualBalance: 500, lastUpdated: null },
  });
}

describe('Position lifecycle', () => {
  it('should stop out a long position at the stop price when the bar trades through it', () => {
    const trader = traderWith([makePosition()]);

    const { closed, open } = trader.updatePositions(
      { AAPL: { open: 146, high: 146, low: 144, close: 145.5 } },
      '2024-03-04',
    );

    expect(open).toHaveLength(0);
    expect(closed).toHaveLength(1);
    expect(closed[0].exitReason).toBe('stopped_out');
    expect(closed[0].exitPrice).toBe(145);
    expect(closed[0].pnl).toBe(-10);
    expect(closed[0].rMultiple).toBe(-1);
    expect(closed[0].pnlPct).toBe(-3.33);
    expect(closed[0].daysHeld).toBe(1);
    expect(trader.getBalance()).toBe(490);
  });

  it('should close at the target when the high reaches it', () => {
    const trader = traderWith([makePosition()]);

    const { closed } = trader.updatePositions(
      { AAPL: { open: 152, high: 161, low: 150, close: 158 } },
      '2024-03-04',
    );

    expect(closed[0].exitReason).toBe('target_hit');
    expect(closed[0].exitPrice).toBe(160);
    expect(closed[0].pnl).toBe(20);
    expect(trader.getBalance()).toBe(520);
  });

  it('should prefer the stop when one bar touches both stop and target', () => {
    const position = makePosition();
    const bar = { open: 150, high: 161, low: 144, close: 150 };

    expect(checkExit(position, bar)).toBe('stopped_out');
  });

  it('should expire a position at the close once max hold days are reached', () => {
    const trader = traderWith([makePosition({ daysHeld: 4, maxHoldDays: 5 })]);

    const { closed } = trader.updatePositions(
      { AAPL: { open: 151, high: 152, low: 149, close: 151.5 } },
      '2024-03-08',
    );

    expect(closed[0].exitReason).toBe('expired');
    expect(closed[0].exitPrice).toBe(151.5);
    expect(closed[0].pnl).toBe(3);
    expect(closed[0].daysHeld).toBe(5);
  });

  it('should only age a position that has no bar for the step', () => {
    const trader = traderWith([makePosition()]);

    const { closed, open } = trader.updatePositions({}, '2024-03-04');

    expect(closed).toHaveLength(0);
    expect(open[0].daysHeld).toBe(1);
    expect(open[0].highestPrice).toBe(150);
    expect(open[0].unrealizedPnl).toBe(0);
  });

  it('should mark unrealized P&L on positions that stay open', () => {
    const trader = traderWith([makePosition()]);

    const { open } = trader.updatePositions(
      { AAPL: { open: 150, high: 153, low: 149, close: 152.25 } },
      '2024-03-04',
    );

    expect(open[0].unrealizedPnl).toBe(4.5);
    expect(open[0].highestPrice).toBe(153);
    expect(open[0].lowestPrice).toBe(149);
  });
});

describe('Trailing stop', () => {
  it('should ratchet up in profit and exit at the trailing level', () => {
    const trader = traderWith([makePosition({ trailingStopAtr: 2, takeProfit: 170, maxHoldDays: 10 })]);

    const first = trader.updatePositions(
      { AAPL: { open: 158, high: 160, low: 158, close: 159 } },
      '2024-03-04',
    );
    expect(first.closed).toHaveLength(0);
    expect(first.open[0].trailingStop).toBe(156);
    expect(first.open[0].unrealizedPnl).toBe(18);

    // A wider bar would put the candidate at 152; the level never loosens
    const second = trader.updatePositions(
      { AAPL: { open: 159, high: 159, low: 155, close: 155.5 } },
      '2024-03-05',
    );
    expect(second.closed[0].exitReason).toBe('trailing_stopped');
    expect(second.closed[0].exitPrice).toBe(156);
    expect(second.closed[0].pnl).toBe(12);
  });

  it('should not activate while the candidate is below the entry', () => {
    const position = makePosition({ trailingStopAtr: 2 });

    expect(nextTrailingStop(position, { open: 150, high: 151, low: 149, close: 150 })).toBe(0);
  });

  it('should trail shorts from the lowest price', () => {
    const position = makePosition({
      direction: 'SHORT',
      entryPrice: 100,
      stopLoss: 105,
      takeProfit: 80,
      trailingStopAtr: 2,
      highestPrice: 100,
      lowestPrice: 90,
    });

    expect(nextTrailingStop(position, { open: 91, high: 92, low: 90, close: 91 })).toBe(94);
  });

  it('should stay inactive for strategies that do not trail', () => {
    const position = makePosition({ highestPrice: 170 });

    expect(nextTrailingStop(position, { open: 169, high: 170, low: 160, close: 165 })).toBe(0);
  });
});

describe('Exit pricing', () => {
  it('should price a stop-out at an active trailing level', () => {
    const position = makePosition({ trailingStop: 152 });
    const bar = { open: 151, high: 151, low: 140, close: 141 };

    expect(exitPrice(position, 'stopped_out', bar)).toBe(152);
  });

  it('should report a zero R-multiple when the stop equals the entry', () => {
    const trade = toClosedTrade(makePosition({ stopLoss: 150 }), 155, '2024-03-04', 'manual');

    expect(trade.pnl).toBe(10);
    expect(trade.rMultiple).toBe(0);
  });

  it('should compute short P&L from the entry downwards', () => {
    const position = makePosition({ direction: 'SHORT', stopLoss: 155, takeProfit: 140 });
    const trade = toClosedTrade(position, 140, '2024-03-04', 'target_hit');

    expect(trade.pnl).toBe(20);
    expect(trade.rMultiple).toBe(2);
  });
});

describe('Signal admission', () => {
  it('should open positions with sequential daily ids', () => {
    const trader = traderWith([]);
    const signals = [
      makeSignal({ instrument: makeInstrument({ ticker: 'AAPL' }) }),
      makeSignal({ instrument: makeInstrument({ ticker: 'MSFT' }) }),
    ];

    const opened = trader.admitSignals(signals, '2024-03-04');

    expect(opened.map((p) => p.id)).toEqual(['PT-2024-03-04-001', 'PT-2024-03-04-002']);
    expect(opened[0].highestPrice).toBe(100);
    expect(opened[0].lowestPrice).toBe(100);
    expect(opened[0].daysHeld).toBe(0);
  });

  it('should continue the id sequence after positions closed the same day', () => {
    const closed = makeTrade(5, { id: 'PT-2024-03-04-001', entryDate: '2024-03-04', exitDate: '2024-03-04' });
    const trader = traderWith([], [closed]);

    const [position] = trader.admitSignals([makeSignal()], '2024-03-04');

    expect(position.id).toBe('PT-2024-03-04-002');
  });

  it('should stop admitting at the concurrency cap', () => {
    const trader = traderWith([]);
    const signals = ['AAPL', 'MSFT', 'NVDA', 'AMZN'].map((ticker) =>
      makeSignal({ instrument: makeInstrument({ ticker }) }),
    );

    const opened = trader.admitSignals(signals, '2024-03-04');

    expect(opened.map((p) => p.ticker)).toEqual(['AAPL', 'MSFT', 'NVDA']);
  });

  it('should skip signals that are not enter_now and tickers already held', () => {
    const trader = traderWith([makePosition()]);
    const signals = [
      makeSignal({ action: 'watchlist', instrument: makeInstrument({ ticker: 'MSFT' }) }),
      makeSignal({ instrument: makeInstrument({ ticker: 'AAPL' }) }),
      makeSignal({ instrument: makeInstrument({ ticker: 'NVDA' }) }),
    ];

    const opened = trader.admitSignals(signals, '2024-03-04');

    expect(opened.map((p) => p.ticker)).toEqual(['NVDA']);
  });

  it('should take hold days, trailing distance and target from the strategy rules', () => {
    const trader = new PaperTrader(new StrategyMatcher(undefined, undefined, silentLogger), undefined, {
      logger: silentLogger,
    });

    const [breakout] = trader.admitSignals([makeSignal()], '2024-03-04');
    const [trend] = trader.admitSignals(
      [makeSignal({ strategyName: 'trend_following', instrument: makeInstrument({ ticker: 'MSFT' }) })],
      '2024-03-04',
    );

    expect(breakout.maxHoldDays).toBe(7);
    expect(breakout.trailingStopAtr).toBe(0);
    expect(breakout.takeProfit).toBe(108);
    expect(trend.maxHoldDays).toBe(10);
    expect(trend.trailingStopAtr).toBe(2);
    expect(trend.takeProfit).toBe(106);
  });

  it('should emit entry and exit events', () => {
    const trader = traderWith([]);
    const entries: string[] = [];
    const exits: string[] = [];
    trader.on('entry', (position) => entries.push(position.ticker));
    trader.on('exit', (trade) => exits.push(`${trade.ticker}:${trade.exitReason}`));

    trader.admitSignals([makeSignal()], '2024-03-04');
    trader.updatePositions({ AAPL: { open: 100, high: 100, low: 96, close: 96.5 } }, '2024-03-05');

    expect(entries).toEqual(['AAPL']);
    expect(exits).toEqual(['AAPL:stopped_out']);
  });
});

describe('Pattern day trading simulation', () => {
  const config = buildEngineConfig({ trader: { pdtSimulation: true, pdtMaxDayTrades: 1 } }).trader;
  const dayTrade = makeTrade(5, { entryDate: '2024-03-04', exitDate: '2024-03-04' });

  it('should block entries once the day-trade limit is reached', () => {
    const trader = new PaperTrader(fixedExitRules(), config, {
      logger: silentLogger,
      state: { positions: [], closedTrades: [dayTrade], virtualBalance: 505, lastUpdated: null },
    });
    const blocked: Array<[string, number]> = [];
    trader.on('pdtBlocked', (ticker, count) => blocked.push([ticker, count]));

    const opened = trader.admitSignals([makeSignal()], '2024-03-05');

    expect(opened).toHaveLength(0);
    expect(blocked).toEqual([['AAPL', 1]]);
  });

  it('should ignore day trades older than the window', () => {
    const trader = new PaperTrader(fixedExitRules(), config, {
      logger: silentLogger,
      state: { positions: [], closedTrades: [dayTrade], virtualBalance: 505, lastUpdated: null },
    });

    expect(trader.countRecentDayTrades('2024-03-20')).toBe(0);
    expect(trader.wouldViolatePdt('2024-03-20')).toBe(false);
  });

  it('should count the window in business days', () => {
    const fridayTrade = makeTrade(5, { entryDate: '2024-03-01', exitDate: '2024-03-01' });
    const trader = new PaperTrader(fixedExitRules(), config, {
      logger: silentLogger,
      state: { positions: [], closedTrades: [fridayTrade], virtualBalance: 505, lastUpdated: null },
    });

    expect(trader.countRecentDayTrades('2024-03-07')).toBe(1);
    expect(trader.countRecentDayTrades('2024-03-08')).toBe(0);
  });
});

describe('Manual close and state', () => {
  it('should return null for an unknown position id', () => {
    const trader = traderWith([makePosition()]);

    expect(trader.closePosition('PT-1999-01-01-001', 150, '2024-03-04')).toBeNull();
    expect(trader.getOpenPositions()).toHaveLength(1);
  });

  it('should close manually at the supplied price', () => {
    const trader = traderWith([makePosition()]);

    const trade = trader.closePosition('PT-2024-03-01-001', 153, '2024-03-04');

    expect(trade?.exitReason).toBe('manual');
    expect(trade?.pnl).toBe(6);
    expect(trader.getBalance()).toBe(506);
    expect(trader.getOpenPositions()).toHaveLength(0);
  });

  it('should resume from exported state', () => {
    const trader = traderWith([makePosition()]);
    trader.updatePositions({}, '2024-03-04');

    const resumed = new PaperTrader(fixedExitRules(), DEFAULT_ENGINE_CONFIG.trader, {
      logger: silentLogger,
      state: trader.exportState(),
    });

    expect(resumed.getOpenPositions()).toEqual(trader.getOpenPositions());
    expect(resumed.getBalance()).toBe(500);
    expect(resumed.getPerformance().lastUpdated).toBe('2024-03-04');
  });
});
