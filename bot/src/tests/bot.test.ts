import { describe, expect, it, vi } from 'vitest';
import { DAY_MS, HOUR_MS, MINUTE_MS } from '../core/clock';
import { BotEngine, type BotPorts } from '../core/bot';
import {
  FakeAdvisory,
  FakeExecutionClient,
  FakeMarketFeed,
  FakePriceStream,
  ManualClock,
  MemoryPositionStore,
  MemorySink,
  T0,
  testConfig,
} from './fakes';

function ports() {
  const feed = new FakeMarketFeed();
  const stream = new FakePriceStream();
  const sink = new MemorySink();
  const positions = new MemoryPositionStore();
  const logEvent = vi.fn(async () => undefined);
  const value: BotPorts = {
    feed,
    advisory: new FakeAdvisory(),
    executionClient: new FakeExecutionClient(),
    priceStream: stream,
    sink,
    positions,
    logEvent,
    clock: new ManualClock(),
  };
  return { value, feed, stream, sink, positions, logEvent };
}

describe('BotEngine', () => {
  it('runs a candidate from the feed into a supervised position and persists it on shutdown', async () => {
    const { value, feed, stream, sink, logEvent } = ports();
    feed.events = [
      {
        id: 'levy',
        title: 'Will the transit levy pass?',
        category: 'Politics',
        description: 'Resolves YES if the county certifies the levy.',
        endDate: new Date(T0 + 10 * DAY_MS).toISOString(),
        markets: [
          { id: 'm-levy', question: 'Will the transit levy pass?', groupItemTitle: '', tokenIds: ['t-levy'], outcomes: ['Yes'] },
        ],
      },
    ];
    feed.setPrice('t-levy', 0.4);

    const bot = new BotEngine(testConfig(), value);
    await bot.start();
    await vi.waitFor(() => expect(bot.supervisor.openCount).toBe(1));
    await bot.stop();

    expect(stream.started).toBe(false);
    expect(stream.subscribed.has('t-levy')).toBe(true);
    expect(sink.ofKind('TRADE')).toHaveLength(1);
    expect(sink.ofKind('HEARTBEAT')[0]).toEqual({
      kind: 'HEARTBEAT',
      bot_id: 'prediction-sniper-1',
      queue_depth: 0,
      open_positions: 0,
      balance: 1000,
    });
    expect(sink.ofKind('POSITION_SNAPSHOT').map(s => s.reason)).toEqual(['OPENED', 'SHUTDOWN']);
    expect(sink.ofKind('POSITION_SNAPSHOT')[1]).toMatchObject({
      market_id: 'm-levy',
      token_id: 't-levy',
      event_id: 'levy',
      state: 'HOLDING_UNARMED',
      entry_price: 0.4,
      entry_time: T0,
      size: 250,
      escalated: false,
    });
    expect(logEvent).toHaveBeenCalledWith('INFO', 'Process started in PAPER mode');
    expect(logEvent).toHaveBeenCalledWith('WARN', 'Process stopping');
    expect(bot.queue.isClosed).toBe(true);
  });

  it('restores positions held before the start and supervises them', async () => {
    const { value, feed, stream, sink, positions, logEvent } = ports();
    positions.stored = [
      {
        marketId: 'm-held',
        tokenId: 't-held',
        eventId: 'e-held',
        title: 'Will the bridge reopen by June?',
        category: 'Politics',
        entryPrice: 0.5,
        size: 30,
        stakeUsdc: 15,
        resolutionTime: T0 + 5 * DAY_MS,
        targetPrice: 0.6,
        entryTime: T0 - HOUR_MS,
        state: 'HOLDING_UNARMED',
        exitReason: null,
        currentPrice: 0.5,
        highWaterMark: 0.5,
        capturedAt: T0 - MINUTE_MS,
      },
    ];
    feed.setPrice('t-held', 0.5);

    const bot = new BotEngine(testConfig(), value);
    await bot.start();

    expect(bot.supervisor.get('m-held')).toMatchObject({ entryTime: T0 - HOUR_MS, openSize: 30 });
    expect(stream.subscribed.has('t-held')).toBe(true);
    expect(logEvent).toHaveBeenCalledWith('INFO', 'Restored 1 open positions');

    await bot.stop();
    expect(sink.ofKind('POSITION_SNAPSHOT').map(s => [s.reason, s.market_id])).toEqual([
      ['RESTORED', 'm-held'],
      ['SHUTDOWN', 'm-held'],
    ]);
  });

  it('starts without restored positions when the ledger cannot be read', async () => {
    const { value, positions, logEvent } = ports();
    positions.failure = new Error('ledger offline');

    const bot = new BotEngine(testConfig(), value);
    await bot.start();
    await bot.stop();

    expect(bot.supervisor.openCount).toBe(0);
    expect(logEvent).toHaveBeenCalledWith(
      'ERROR',
      'Open positions could not be loaded (ledger offline). Positions held before this start are unsupervised.'
    );
  });
});
