import { describe, expect, it, vi } from 'vitest';
import { DAY_MS, HOUR_MS, MINUTE_MS } from '../core/clock';
import { InvariantViolation } from '../core/errors';
import { EventGroupRegistry } from '../markets/eventGroups';
import { ExecutionService } from '../services/execution';
import { Observer } from '../services/observer';
import { PositionSupervisor, type OpenPositionInput, type SupervisorDeps } from '../services/positionSupervisor';
import type { StoredPosition } from '../services/positionStore';
import { FakeExecutionClient, FakePriceStream, ManualClock, MemorySink, T0, testConfig } from './fakes';

function setup(env: Record<string, string> = {}, quote?: SupervisorDeps['quote']) {
  const config = testConfig(env);
  const clock = new ManualClock();
  const client = new FakeExecutionClient();
  const stream = new FakePriceStream();
  const observer = new Observer(stream);
  const sink = new MemorySink();
  const eventGroups = new EventGroupRegistry(config.eventCaps);
  const logEvent = vi.fn(async () => undefined);

  const supervisor = new PositionSupervisor(config.supervisor, {
    execution: new ExecutionService(client, { retries: 0, baseDelayMs: 0 }),
    watcher: observer,
    sink,
    clock,
    logEvent,
    quote,
  });
  observer.attach(event => supervisor.ingest(event));

  const open = (overrides: Partial<OpenPositionInput> = {}) => {
    const input: OpenPositionInput = {
      marketId: 'm-1',
      tokenId: 't-1',
      eventId: 'e-1',
      title: 'Will Northside FC win the league title?',
      category: 'Politics',
      entryPrice: 0.5,
      size: 20,
      stakeUsdc: 10,
      resolutionTime: T0 + 10 * DAY_MS,
      targetPrice: 0.6,
      ...overrides,
    };
    const reservation = eventGroups.tryReserve({ eventId: input.eventId, category: input.category, eventMarketCount: 4 });
    if (!reservation) throw new Error('no event slot');
    return supervisor.register(input, reservation);
  };

  const price = async (value: number, tokenId = 't-1') => {
    stream.emit({ tokenId, price: value, timestamp: clock.now() });
    await supervisor.idle();
  };

  return { supervisor, client, stream, observer, sink, clock, eventGroups, logEvent, open, price };
}

describe('PositionSupervisor', () => {
  it('registers a position as unarmed and subscribes to its token', () => {
    const { open, stream, eventGroups } = setup();
    const position = open();

    expect(position).toMatchObject({
      state: 'HOLDING_UNARMED',
      entryTime: T0,
      armingDeadline: T0 + 2 * HOUR_MS,
      openSize: 20,
      currentPrice: 0.5,
    });
    expect(stream.subscribed.has('t-1')).toBe(true);
    expect(eventGroups.openCount('e-1')).toBe(1);
  });

  it('refuses a second position in the same market', () => {
    const { open } = setup();
    open();
    expect(() => open({ eventId: 'e-2' })).toThrow(InvariantViolation);
  });

  it('holds through a drawdown before the stop-loss is armed', async () => {
    const { open, clock, price, client } = setup();
    const position = open();

    clock.advance(HOUR_MS);
    await price(0.39);

    expect(client.sells).toEqual([]);
    expect(position).toMatchObject({ state: 'HOLDING_UNARMED', currentPrice: 0.39 });
  });

  it('sells below the observed price once the armed stop-loss is hit', async () => {
    const { open, clock, price, client, supervisor, sink, stream, eventGroups } = setup();
    const position = open();

    clock.advance(2 * HOUR_MS + MINUTE_MS);
    await price(0.39);

    expect(client.sells).toEqual([{ market: { marketId: 'm-1', tokenId: 't-1' }, price: 0.382, size: 20 }]);
    expect(position.state).toBe('CLOSED');
    expect(position.exitReason).toBe('STOP_LOSS');
    expect(supervisor.hasPosition('m-1')).toBe(false);
    expect(stream.subscribed.has('t-1')).toBe(false);
    expect(eventGroups.openCount('e-1')).toBe(0);

    const [exit] = sink.ofKind('EXIT');
    expect(exit).toMatchObject({ reason: 'STOP_LOSS', exit_price: 0.382, size: 20, held_ms: 2 * HOUR_MS + MINUTE_MS });
    expect(exit.realized_pnl).toBeCloseTo(-2.36, 10);

    expect(sink.ofKind('POSITION_SNAPSHOT').map(s => [s.reason, s.state, s.size])).toEqual([
      ['OPENED', 'HOLDING_UNARMED', 20],
      ['UPDATED', 'HOLDING_ARMED', 20],
      ['UPDATED', 'EXITING', 20],
      ['CLOSED', 'CLOSED', 0],
    ]);
  });

  it('exits on time regardless of arming when resolution is near and the position is flat', async () => {
    const { open, clock, price, client, sink } = setup({ ARMING_DELAY_HOURS: '100' });
    const position = open({ resolutionTime: T0 + 3 * DAY_MS });

    clock.advance(DAY_MS / 2);
    await price(0.5);
    expect(client.sells).toEqual([]);

    clock.advance(DAY_MS);
    await price(0.5);

    expect(position.state).toBe('CLOSED');
    expect(client.sells[0]).toMatchObject({ price: 0.49, size: 20 });
    expect(sink.ofKind('EXIT')[0].reason).toBe('TIME_EXIT');
  });

  it('exits on time from a clock tick without any price event', async () => {
    const { open, clock, client, supervisor } = setup({ ARMING_DELAY_HOURS: '100' });
    const position = open({ resolutionTime: T0 + 3 * DAY_MS });

    clock.advance(1.5 * DAY_MS);
    await supervisor.tick();

    expect(position.exitReason).toBe('TIME_EXIT');
    expect(client.sells).toHaveLength(1);
  });

  it('takes profit at the target', async () => {
    const { open, clock, price, sink } = setup();
    open();

    clock.advance(MINUTE_MS);
    await price(0.61);

    expect(sink.ofKind('EXIT')[0]).toMatchObject({ reason: 'TAKE_PROFIT', exit_price: 0.597 });
  });

  it('sells at break-even when a run-up fades before the stop-loss is armed', async () => {
    const { open, clock, price, client, sink } = setup();
    const position = open();

    clock.advance(MINUTE_MS);
    await price(0.55);
    expect(position).toMatchObject({ state: 'HOLDING_UNARMED', highWaterMark: 0.55 });

    clock.advance(MINUTE_MS);
    await price(0.51);

    expect(client.sells).toEqual([{ market: { marketId: 'm-1', tokenId: 't-1' }, price: 0.499, size: 20 }]);
    expect(position.state).toBe('CLOSED');
    expect(sink.ofKind('EXIT')[0]).toMatchObject({ reason: 'BREAK_EVEN', exit_price: 0.499 });
  });

  it('accepts stream events stamped behind the local clock', async () => {
    const { open, clock, stream, supervisor, sink } = setup();
    open();

    clock.advance(MINUTE_MS);
    stream.emit({ tokenId: 't-1', price: 0.61, timestamp: T0 - 10 * MINUTE_MS });
    await supervisor.idle();

    expect(sink.ofKind('EXIT')[0]).toMatchObject({ reason: 'TAKE_PROFIT', exit_price: 0.597 });
  });

  it('keeps applying stream events after a REST re-quote', async () => {
    const quote = vi.fn(async (_tokenId: string): Promise<number | null> => 0.52);
    const { open, clock, stream, supervisor, sink } = setup({}, quote);
    const position = open();

    clock.advance(MINUTE_MS);
    await supervisor.tick();
    expect(quote).toHaveBeenCalledWith('t-1');
    expect(position).toMatchObject({ currentPrice: 0.52, lastPriceAt: T0 + MINUTE_MS });

    stream.emit({ tokenId: 't-1', price: 0.61, timestamp: T0 });
    await supervisor.idle();

    expect(sink.ofKind('EXIT')[0]).toMatchObject({ reason: 'TAKE_PROFIT', exit_price: 0.597 });
  });

  it('ignores a stale price that arrives after a newer one', async () => {
    const { open, clock, price, client, supervisor, stream } = setup();
    const position = open();

    clock.advance(3 * HOUR_MS);
    await price(0.45);
    stream.emit({ tokenId: 't-1', price: 0.3, timestamp: T0 + 2 * HOUR_MS });
    await supervisor.idle();

    expect(client.sells).toEqual([]);
    expect(position).toMatchObject({ state: 'HOLDING_ARMED', currentPrice: 0.45, revision: 1 });
  });

  it('serializes updates for one position', async () => {
    const { open, clock, client, supervisor } = setup();
    open();
    clock.advance(3 * HOUR_MS);

    await Promise.all([
      supervisor.onPrice({ marketId: 'm-1', price: 0.39, timestamp: clock.now() }),
      supervisor.onPrice({ marketId: 'm-1', price: 0.38, timestamp: clock.now() + 1 }),
    ]);

    expect(client.sells).toHaveLength(1);
  });

  it('retries a failed exit on the next tick', async () => {
    const { open, clock, price, client, supervisor } = setup();
    const position = open();
    client.sellScript = ['fail'];

    clock.advance(3 * HOUR_MS);
    await price(0.39);
    expect(position).toMatchObject({ state: 'EXITING', exitAttempts: 1 });

    clock.advance(MINUTE_MS);
    await supervisor.tick();
    expect(position.state).toBe('CLOSED');
    expect(client.sells).toHaveLength(2);
  });

  it('keeps selling the remainder after a partial fill', async () => {
    const { open, clock, price, client, supervisor, sink } = setup();
    const position = open();
    client.sellScript = [{ partial: 8 }];

    clock.advance(3 * HOUR_MS);
    await price(0.39);
    expect(position).toMatchObject({ state: 'EXITING', openSize: 12 });

    clock.advance(MINUTE_MS);
    await supervisor.tick();
    expect(client.sells.map(s => s.size)).toEqual([20, 12]);
    expect(position.state).toBe('CLOSED');
    expect(sink.ofKind('EXIT').map(e => e.size)).toEqual([8, 12]);
  });

  it('waits out the retry interval between exit attempts', async () => {
    const { open, clock, price, client, logEvent } = setup();
    const position = open();
    client.sellScript = ['fail', 'fail', 'fail'];

    clock.advance(3 * HOUR_MS);
    await price(0.39);
    for (let i = 0; i < 3; i++) {
      clock.advance(1);
      await price(0.39);
    }

    expect(client.sells).toHaveLength(1);
    expect(position).toMatchObject({ state: 'EXITING', exitAttempts: 1, escalated: false });
    expect(logEvent).not.toHaveBeenCalled();

    clock.advance(45_000);
    await price(0.39);
    expect(client.sells).toHaveLength(2);
    expect(position.exitAttempts).toBe(2);
  });

  it('escalates after the last exit attempt and stops selling', async () => {
    const { open, clock, price, client, supervisor, sink, logEvent, eventGroups } = setup();
    const position = open();
    client.sellScript = ['fail', 'fail', 'fail'];

    clock.advance(3 * HOUR_MS);
    await price(0.39);
    for (let i = 0; i < 3; i++) {
      clock.advance(MINUTE_MS);
      await supervisor.tick();
    }

    const message =
      'Exit of m-1 failed after 3/3 attempts (SELL m-1 failed: sell rejected). ' +
      '20 shares still held. Manual intervention required.';
    expect(client.sells).toHaveLength(3);
    expect(position).toMatchObject({ state: 'EXITING', escalated: true });
    expect(sink.ofKind('ALERT')).toEqual([{ kind: 'ALERT', market_id: 'm-1', severity: 'CRITICAL', message }]);
    expect(logEvent).toHaveBeenCalledWith('ERROR', message);
    expect(eventGroups.openCount('e-1')).toBe(1);
  });

  it('keeps supervising other positions while one is escalated', async () => {
    const { open, clock, client, supervisor } = setup();
    open();
    const other = open({ marketId: 'm-2', tokenId: 't-2', eventId: 'e-2' });
    client.sellScript = ['fail', 'fail', 'fail'];

    clock.advance(3 * HOUR_MS);
    await supervisor.onPrice({ marketId: 'm-1', price: 0.39, timestamp: clock.now() });
    clock.advance(MINUTE_MS);
    await supervisor.tick();
    clock.advance(MINUTE_MS);
    await supervisor.tick();
    expect(supervisor.get('m-1')).toMatchObject({ escalated: true });

    await supervisor.onPrice({ marketId: 'm-2', price: 0.35, timestamp: clock.now() });
    expect(other.state).toBe('CLOSED');
  });

  it('records every open position when stopped', async () => {
    const { open, supervisor, sink } = setup();
    open();

    await supervisor.stop();

    const snapshots = sink.ofKind('POSITION_SNAPSHOT');
    expect(snapshots.map(s => s.reason)).toEqual(['OPENED', 'SHUTDOWN']);
    expect(snapshots[1]).toEqual({
      kind: 'POSITION_SNAPSHOT',
      reason: 'SHUTDOWN',
      market_id: 'm-1',
      token_id: 't-1',
      event_id: 'e-1',
      title: 'Will Northside FC win the league title?',
      category: 'Politics',
      state: 'HOLDING_UNARMED',
      exit_reason: null,
      entry_price: 0.5,
      entry_time: T0,
      resolution_time: T0 + 10 * DAY_MS,
      target_price: 0.6,
      stake_usdc: 10,
      current_price: 0.5,
      high_water_mark: 0.5,
      size: 20,
      escalated: false,
      captured_at: T0,
    });
  });
});

describe('PositionSupervisor.restore', () => {
  const stored = (overrides: Partial<StoredPosition> = {}): StoredPosition => ({
    marketId: 'm-9',
    tokenId: 't-9',
    eventId: 'e-1',
    title: 'Will Eastside FC be relegated?',
    category: 'Politics',
    entryPrice: 0.5,
    size: 12,
    stakeUsdc: 10,
    resolutionTime: T0 + 10 * DAY_MS,
    targetPrice: 0.6,
    entryTime: T0 - 3 * HOUR_MS,
    state: 'HOLDING_ARMED',
    exitReason: null,
    currentPrice: 0.47,
    highWaterMark: 0.56,
    capturedAt: T0 - MINUTE_MS,
    ...overrides,
  });

  it('resumes a position with its original entry time and an event slot', () => {
    const { supervisor, eventGroups, stream, sink } = setup();
    const position = supervisor.restore(stored(), eventGroups.reserveHeld('e-1'));

    expect(position).toMatchObject({
      entryTime: T0 - 3 * HOUR_MS,
      armingDeadline: T0 - HOUR_MS,
      state: 'HOLDING_ARMED',
      openSize: 12,
      currentPrice: 0.47,
      highWaterMark: 0.56,
      lastPriceAt: T0 - MINUTE_MS,
      exitAttempts: 0,
    });
    expect(supervisor.hasPosition('m-9')).toBe(true);
    expect(stream.subscribed.has('t-9')).toBe(true);
    expect(eventGroups.openCount('e-1')).toBe(1);
    expect(sink.ofKind('POSITION_SNAPSHOT')[0]).toMatchObject({
      reason: 'RESTORED',
      market_id: 'm-9',
      entry_time: T0 - 3 * HOUR_MS,
      captured_at: T0,
    });
  });

  it('keeps the restored high-water mark for the break-even exit', async () => {
    const { supervisor, eventGroups, price, client, sink } = setup();
    supervisor.restore(stored(), eventGroups.reserveHeld('e-1'));

    await price(0.51, 't-9');

    expect(client.sells).toEqual([{ market: { marketId: 'm-9', tokenId: 't-9' }, price: 0.499, size: 12 }]);
    expect(sink.ofKind('EXIT')[0].reason).toBe('BREAK_EVEN');
    expect(eventGroups.openCount('e-1')).toBe(0);
  });

  it('finishes an exit that was under way before the restart', async () => {
    const { supervisor, eventGroups, client } = setup();
    const position = supervisor.restore(
      stored({ state: 'EXITING', exitReason: 'STOP_LOSS', currentPrice: 0.39 }),
      eventGroups.reserveHeld('e-1')
    );

    await supervisor.tick();

    expect(client.sells).toEqual([{ market: { marketId: 'm-9', tokenId: 't-9' }, price: 0.382, size: 12 }]);
    expect(position.state).toBe('CLOSED');
  });
});
