import WebSocket from 'ws';
import { errorMessage } from '../core/errors';
import { isRecord, readNumber, readRecords, readString, type JsonRecord } from '../utils/json';
import { Logger } from '../utils/logger';

export interface PriceTick {
  tokenId: string;
  price: number;
  timestamp: number;
}

export type PriceTickListener = (tick: PriceTick) => void;

/** Live per-token price subscription. Delivery is at-least-once. */
export interface PriceStream {
  start(): void;
  stop(): Promise<void>;
  subscribe(tokenId: string): void;
  unsubscribe(tokenId: string): void;
  onPrice(listener: PriceTickListener): void;
}

const round3 = (value: number) => Math.round(value * 1000) / 1000;

function bestBid(book: JsonRecord): number | null {
  const prices = readRecords(book.bids)
    .map(level => readNumber(level, 'price'))
    .filter((p): p is number => p !== null);
  return prices.length > 0 ? Math.max(...prices) : null;
}

/**
 * Extracts price ticks from one market-channel frame. Book snapshots yield
 * their best bid; price changes yield `best_bid`, falling back to `price`.
 * Frames that are not JSON (PONG) yield nothing.
 */
export function parseMarketMessage(raw: string, receivedAt: number): PriceTick[] {
  if (!raw.trim() || raw === 'PONG') return [];

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return [];
  }

  const frames = Array.isArray(data) ? data.filter(isRecord) : isRecord(data) ? [data] : [];
  const ticks: PriceTick[] = [];

  for (const frame of frames) {
    const frameTs = readNumber(frame, 'timestamp') ?? receivedAt;

    if (readString(frame, 'event_type') === 'book') {
      const price = bestBid(frame);
      const tokenId = readString(frame, 'asset_id');
      if (tokenId && price !== null && price > 0) ticks.push({ tokenId, price: round3(price), timestamp: frameTs });
      continue;
    }

    let changes = [...readRecords(frame.price_changes), ...readRecords(frame.changes)];
    if (changes.length === 0 && readString(frame, 'asset_id')) changes = [frame];

    for (const change of changes) {
      const tokenId = readString(change, 'asset_id') || readString(frame, 'asset_id');
      const bid = readNumber(change, 'best_bid');
      const price = bid !== null && bid > 0 ? bid : readNumber(change, 'price');
      if (!tokenId || price === null || price <= 0) continue;
      ticks.push({ tokenId, price: round3(price), timestamp: readNumber(change, 'timestamp') ?? frameTs });
    }
  }
  return ticks;
}

export interface ClobPriceStreamOptions {
  pingIntervalMs?: number;
  reconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
}

/**
 * Polymarket CLOB market channel. Keeps one socket open, re-subscribes every
 * watched token after a reconnect, and sends PING every 10 s.
 */
export class ClobPriceStream implements PriceStream {
  private ws: WebSocket | null = null;
  private readonly assets = new Set<string>();
  private readonly listeners: PriceTickListener[] = [];
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempts = 0;
  private running = false;

  private readonly pingIntervalMs: number;
  private readonly reconnectDelayMs: number;
  private readonly maxReconnectDelayMs: number;

  constructor(
    private readonly url: string,
    options: ClobPriceStreamOptions = {}
  ) {
    this.pingIntervalMs = options.pingIntervalMs ?? 10_000;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 2_000;
    this.maxReconnectDelayMs = options.maxReconnectDelayMs ?? 60_000;
  }

  public start() {
    if (this.running) return;
    this.running = true;
    this.connect();
  }

  public async stop() {
    this.running = false;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
    this.clearPing();

    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>(resolve => {
      ws.once('close', () => resolve());
      ws.close();
    });
  }

  public subscribe(tokenId: string) {
    if (this.assets.has(tokenId)) return;
    this.assets.add(tokenId);
    this.send({ assets_ids: [tokenId], operation: 'subscribe' });
  }

  public unsubscribe(tokenId: string) {
    if (!this.assets.delete(tokenId)) return;
    this.send({ assets_ids: [tokenId], operation: 'unsubscribe' });
  }

  public onPrice(listener: PriceTickListener) {
    this.listeners.push(listener);
  }

  private connect() {
    Logger.info(`[PRICE_STREAM] Connecting to ${this.url}`);
    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on('open', () => {
      Logger.info(`[PRICE_STREAM] Connected, subscribing ${this.assets.size} tokens`);
      this.reconnectAttempts = 0;
      ws.send(JSON.stringify({ type: 'market', assets_ids: [...this.assets] }));
      this.pingTimer = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) ws.send('PING');
      }, this.pingIntervalMs);
    });

    ws.on('message', (data: WebSocket.RawData) => {
      const ticks = parseMarketMessage(data.toString(), Date.now());
      for (const tick of ticks) {
        if (!this.assets.has(tick.tokenId)) continue;
        for (const listener of this.listeners) listener(tick);
      }
    });

    ws.on('error', err => {
      Logger.error(`[PRICE_STREAM] WebSocket error: ${errorMessage(err)}`);
    });

    ws.on('close', () => {
      this.clearPing();
      if (this.ws !== ws) return;
      this.ws = null;
      if (!this.running) return;

      const delay = Math.min(this.maxReconnectDelayMs, this.reconnectDelayMs * 2 ** this.reconnectAttempts);
      this.reconnectAttempts++;
      Logger.warn(`[PRICE_STREAM] Disconnected. Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        if (this.running) this.connect();
      }, delay);
    });
  }

  private send(message: Record<string, unknown>) {
    if (this.ws?.readyState === WebSocket.OPEN) this.ws.send(JSON.stringify(message));
  }

  private clearPing() {
    if (this.pingTimer) clearInterval(this.pingTimer);
    this.pingTimer = null;
  }
}
