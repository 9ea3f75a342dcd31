/**
 * core/bot.ts
 *
 * Wires every component from one frozen config and owns their lifecycle.
 *
 * Startup:  restore held positions -> price stream -> supervisor -> sniper
 *           -> scanner -> heartbeat
 * Shutdown: scanner stops producing, the queue closes and drains, the
 *           supervisor settles in-flight exits and persists what is open,
 *           then the stream and the sink.
 */

import type { BotConfig } from '../config/env';
import type { ExecutionClient } from '../execution/adapter';
import { LiveExecutionAdapter } from '../execution/liveAdapter';
import { PaperExecutionAdapter } from '../execution/paperAdapter';
import { EventGroupRegistry } from '../markets/eventGroups';
import { ScannerLoop } from '../loops/scannerLoop';
import { SniperLoop } from '../loops/sniperLoop';
import { PortfolioGuard } from '../risk/portfolioGuard';
import { RiskManager } from '../risk/riskManager';
import { LlmAdvisoryService } from '../services/advisory/llmAdvisoryService';
import { createModel } from '../services/advisory/models';
import type { AdvisoryService } from '../services/advisory/types';
import { ExecutionService } from '../services/execution';
import { Gatekeeper } from '../services/gatekeeper';
import { HeartbeatService } from '../services/heartbeat';
import type { MarketFeed } from '../services/marketFeed';
import { Observer } from '../services/observer';
import { PolymarketService } from '../services/polymarket';
import { SupabasePositionStore, type PositionStore, type StoredPosition } from '../services/positionStore';
import { PositionSupervisor } from '../services/positionSupervisor';
import { ClobPriceStream, type PriceStream } from '../services/priceStream';
import { ResearchService } from '../services/research';
import { createEventLog, createSupabase, type LogEvent } from '../services/supabase';
import { TradeLogger } from '../services/tradeLogger';
import { WarRoom } from '../services/warRoom';
import type { Candidate } from '../types';
import type { PersistenceSink } from '../types/tables';
import { Logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { CandidateQueue } from './candidateQueue';
import { DAY_MS, systemClock, type Clock } from './clock';
import { errorMessage } from './errors';
import { Scheduler } from './scheduler';

/** Everything that talks to the outside world. Tests substitute fakes. */
export interface BotPorts {
  feed: MarketFeed;
  advisory: AdvisoryService;
  executionClient: ExecutionClient;
  priceStream: PriceStream;
  sink: PersistenceSink & { flush?: () => Promise<void> };
  positions: PositionStore;
  logEvent: LogEvent;
  clock: Clock;
}

export function createPorts(config: BotConfig): BotPorts {
  const venue = new PolymarketService(config.execution);
  const executionClient: ExecutionClient =
    config.execution.mode === 'LIVE'
      ? new LiveExecutionAdapter(venue, config.execution)
      : new PaperExecutionAdapter(config.execution.paperBankroll);

  const { models, apiKeys, timeoutMs, sizingTimeoutMs } = config.advisory;
  const advisory = new LlmAdvisoryService(
    {
      GATEKEEPER: createModel(models.GATEKEEPER, apiKeys, 'GATEKEEPER', timeoutMs),
      RULE_CLARITY: createModel(models.RULE_CLARITY, apiKeys, 'RULE_CLARITY', timeoutMs),
      SENTIMENT: createModel(models.SENTIMENT, apiKeys, 'SENTIMENT', timeoutMs),
      SIZING: createModel(models.SIZING, apiKeys, 'SIZING', sizingTimeoutMs),
    },
    new ResearchService(config.advisory),
    systemClock
  );

  const supabase = createSupabase(config.persistence);

  return {
    feed: venue,
    advisory,
    executionClient,
    priceStream: new ClobPriceStream(config.execution.wsUrl),
    sink: new TradeLogger(supabase, config.botId),
    positions: new SupabasePositionStore(
      supabase,
      config.botId,
      systemClock,
      (config.filter.resolutionMaxDays + 1) * DAY_MS
    ),
    logEvent: createEventLog(supabase, config.botId),
    clock: systemClock,
  };
}

export class BotEngine {
  public readonly queue: CandidateQueue<Candidate>;
  public readonly supervisor: PositionSupervisor;
  public readonly scanner: ScannerLoop;
  public readonly sniper: SniperLoop;

  private readonly observer: Observer;
  private readonly heartbeat: HeartbeatService;
  private readonly execution: ExecutionService;
  private readonly eventGroups: EventGroupRegistry;
  private readonly retry: { retries: number; baseDelayMs: number };
  private readonly balancePoller = new Scheduler('balance');
  private lastBalance: number | null = null;
  private running = false;

  constructor(
    private readonly config: BotConfig,
    private readonly ports: BotPorts
  ) {
    const retry = { retries: config.execution.maxRetries, baseDelayMs: config.execution.retryBaseDelayMs };
    this.retry = retry;

    this.queue = new CandidateQueue<Candidate>(config.scanner.queueCapacity);
    this.execution = new ExecutionService(ports.executionClient, retry);

    const riskManager = new RiskManager(config.risk, config.filter);
    const eventGroups = new EventGroupRegistry(config.eventCaps);
    this.eventGroups = eventGroups;

    this.observer = new Observer(ports.priceStream);
    this.supervisor = new PositionSupervisor(config.supervisor, {
      execution: this.execution,
      watcher: this.observer,
      sink: ports.sink,
      clock: ports.clock,
      logEvent: ports.logEvent,
      quote: async tokenId => (await ports.feed.getQuote(tokenId)).bid,
    });
    this.observer.attach(event => this.supervisor.ingest(event));

    const gatekeeper = new Gatekeeper(ports.advisory, {
      timeoutMs: config.advisory.timeoutMs,
      ...retry,
    });
    const warRoom = new WarRoom(ports.advisory, {
      timeoutMs: config.advisory.timeoutMs,
      sizingTimeoutMs: config.advisory.sizingTimeoutMs,
      minSentimentScore: config.advisory.minSentimentScore,
      minEdge: config.risk.minEdge,
      ...retry,
    });

    this.scanner = new ScannerLoop(config.scanner, config.filter, {
      feed: ports.feed,
      gatekeeper,
      queue: this.queue,
      riskManager,
      eventGroups,
      sink: ports.sink,
      clock: ports.clock,
      isHeld: marketId => this.supervisor.hasPosition(marketId),
      retry,
    });

    this.sniper = new SniperLoop({
      queue: this.queue,
      warRoom,
      riskManager,
      portfolioGuard: new PortfolioGuard(config.risk),
      eventGroups,
      execution: this.execution,
      feed: ports.feed,
      supervisor: this.supervisor,
      sink: ports.sink,
      clock: ports.clock,
      mode: config.execution.mode,
    });

    this.heartbeat = new HeartbeatService(ports.sink, config.botId, config.persistence.heartbeatIntervalMs);
  }

  public async start() {
    if (this.running) return;
    this.running = true;

    Logger.info(`[BOT] Starting ${this.config.botId} in ${this.config.execution.mode} mode (${this.config.risk.mode})`);
    await this.ports.logEvent('INFO', `Process started in ${this.config.execution.mode} mode`);

    this.lastBalance = await this.execution.balance();
    Logger.info(`[BOT] Collateral balance: ${this.lastBalance ?? 'unavailable'}`);

    await this.restorePositions();
    this.ports.priceStream.start();
    this.supervisor.start();
    this.sniper.start();
    this.scanner.start();
    this.balancePoller.start(async () => {
      this.lastBalance = await this.execution.balance();
    }, this.config.persistence.heartbeatIntervalMs);
    this.heartbeat.start(() => ({
      queueDepth: this.queue.size,
      openPositions: this.supervisor.openCount,
      balance: this.lastBalance,
    }));
  }

  public async stop() {
    if (!this.running) return;
    this.running = false;

    Logger.info('[BOT] Shutting down...');
    await this.ports.logEvent('WARN', 'Process stopping');

    await this.scanner.stop();
    this.queue.close();
    await this.sniper.drained();
    await this.supervisor.stop();
    this.heartbeat.stop();
    await this.balancePoller.stop();
    await this.ports.priceStream.stop();
    if (this.ports.sink.flush) await this.ports.sink.flush();

    Logger.info(`[BOT] Stopped with ${this.supervisor.openCount} positions still open`);
  }

  /** Puts positions held before this start back under supervision. */
  private async restorePositions() {
    let stored: StoredPosition[];
    try {
      stored = await withRetry(() => this.ports.positions.loadOpen(), { ...this.retry, label: 'LOAD_POSITIONS' });
    } catch (err) {
      const message = `Open positions could not be loaded (${errorMessage(err)}). Positions held before this start are unsupervised.`;
      Logger.error(`[BOT] ${message}`);
      await this.ports.logEvent('ERROR', message);
      return;
    }

    for (const position of stored) {
      if (this.supervisor.hasPosition(position.marketId)) continue;
      this.supervisor.restore(position, this.eventGroups.reserveHeld(position.eventId));
    }
    if (stored.length > 0) {
      await this.ports.logEvent('INFO', `Restored ${stored.length} open positions`);
    }
  }
}
