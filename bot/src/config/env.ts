import { Logger } from '../utils/logger';
import type { AdvisoryRole, CategoryClass, RiskMode } from '../types';
import { CATEGORY_DEFAULTS, DEFAULTS } from './defaults';
import { parseExecutionMode, type ExecutionMode } from './executionMode';

/**
 * Runtime configuration. Assembled once by `loadConfig` at boot, frozen, and
 * handed to each component. Nothing reads `process.env` after that.
 */

export type ModelProvider = 'gemini' | 'xai' | 'deepseek';

export interface ModelSelector {
  readonly provider: ModelProvider;
  readonly model: string;
}

export interface FilterConfig {
  readonly priceBandMin: number;
  readonly priceBandMax: number;
  readonly resolutionMinDays: number;
  readonly resolutionMaxDays: number;
  readonly minBidLiquidity: number;
  readonly skipTitlePatterns: readonly string[];
  readonly sportsStartedGraceHours: number;
}

export interface EventCapConfig {
  readonly balanced: number;
  readonly multiOutcome: number;
  readonly balancedCategories: readonly string[];
}

export interface RiskConfig {
  readonly mode: RiskMode;
  readonly multipliers: Readonly<Record<CategoryClass, number>>;
  readonly defensiveMultiplier: number;
  readonly defensiveLiquidityFactor: number;
  readonly defensiveBandMargin: number;
  readonly preferredCategories: readonly string[];
  readonly highRiskCategories: readonly string[];
  readonly maxStakeUsdc: number;
  readonly maxStakeFraction: number;
  readonly minStakeUsdc: number;
  readonly minEdge: number;
  readonly maxOpenPositions: number;
  readonly maxDrawdownPct: number;
  readonly maxCorrelatedPositions: number;
}

export interface SupervisorConfig {
  readonly stopLossFraction: number;
  readonly armingDelayHours: number;
  readonly timeExitDays: number;
  readonly timeExitProfitMargin: number;
  readonly tickMs: number;
  readonly exitSlippage: number;
  readonly maxExitAttempts: number;
  readonly exitRetryMs: number;
  readonly breakEvenTrigger: number;
  readonly breakEvenFloor: number;
}

export interface ScannerConfig {
  readonly intervalMs: number;
  readonly pageSize: number;
  readonly eventLimit: number;
  readonly dedupTtlMs: number;
  readonly queueCapacity: number;
}

export interface AdvisoryConfig {
  readonly models: Readonly<Record<AdvisoryRole, ModelSelector>>;
  readonly timeoutMs: number;
  readonly sizingTimeoutMs: number;
  readonly minSentimentScore: number;
  readonly apiKeys: Readonly<Record<ModelProvider, string>>;
  readonly tavilyApiKey: string;
  readonly newsApiKey: string;
}

export interface ExecutionConfig {
  readonly mode: ExecutionMode;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly paperBankroll: number;
  readonly fillPollMs: number;
  readonly fillTimeoutMs: number;
  readonly privateKey: string;
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly passphrase: string;
  readonly funderAddress: string;
  readonly clobHost: string;
  readonly gammaHost: string;
  readonly wsUrl: string;
  readonly chainId: number;
}

export interface PersistenceConfig {
  readonly supabaseUrl: string;
  readonly supabaseServiceKey: string;
  readonly heartbeatIntervalMs: number;
}

export interface BotConfig {
  readonly botId: string;
  readonly filter: FilterConfig;
  readonly eventCaps: EventCapConfig;
  readonly risk: RiskConfig;
  readonly supervisor: SupervisorConfig;
  readonly scanner: ScannerConfig;
  readonly advisory: AdvisoryConfig;
  readonly execution: ExecutionConfig;
  readonly persistence: PersistenceConfig;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

const PROVIDERS: readonly ModelProvider[] = ['gemini', 'xai', 'deepseek'];

function str(env: EnvSource, key: string, fallback = ''): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function num(env: EnvSource, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    Logger.warn(`[CONFIG] ${key}="${raw}" is not a number, using default ${fallback}`);
    return fallback;
  }
  return value;
}

function bool(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = str(env, key).toLowerCase();
  if (raw === '') return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;

  Logger.warn(`[CONFIG] ${key}="${raw}" is not a boolean, using default ${fallback}`);
  return fallback;
}

function list(env: EnvSource, key: string, fallback: readonly string[]): string[] {
  const raw = str(env, key);
  if (!raw) return [...fallback];
  return raw
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

function isProvider(value: string): value is ModelProvider {
  return PROVIDERS.some(p => p === value);
}

export function parseModelSelector(key: string, raw: string): ModelSelector {
  const idx = raw.indexOf(':');
  const provider = idx > 0 ? raw.slice(0, idx).trim().toLowerCase() : '';
  const model = idx > 0 ? raw.slice(idx + 1).trim() : '';

  if (!isProvider(provider) || !model) {
    throw new Error(
      `[CONFIG_FATAL] ${key}="${raw}" must look like "<provider>:<model>" with provider one of ${PROVIDERS.join(', ')}`
    );
  }
  return { provider, model };
}

function deepFreeze<T extends object>(obj: T): T {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

export function loadConfig(env: EnvSource): BotConfig {
  const defensive = bool(env, 'DEFENSIVE_MODE', DEFAULTS.DEFENSIVE_MODE);

  const config: BotConfig = {
    botId: str(env, 'BOT_ID', DEFAULTS.BOT_ID),

    filter: {
      priceBandMin: num(env, 'PRICE_BAND_MIN', DEFAULTS.PRICE_BAND_MIN),
      priceBandMax: num(env, 'PRICE_BAND_MAX', DEFAULTS.PRICE_BAND_MAX),
      resolutionMinDays: num(env, 'RESOLUTION_MIN_DAYS', DEFAULTS.RESOLUTION_MIN_DAYS),
      resolutionMaxDays: num(env, 'RESOLUTION_MAX_DAYS', DEFAULTS.RESOLUTION_MAX_DAYS),
      minBidLiquidity: num(env, 'MIN_BID_LIQUIDITY_USDC', DEFAULTS.MIN_BID_LIQUIDITY_USDC),
      skipTitlePatterns: list(env, 'SKIP_TITLE_PATTERNS', [DEFAULTS.SKIP_TITLE_PATTERNS]).map(p =>
        p.toLowerCase()
      ),
      sportsStartedGraceHours: num(env, 'SPORTS_STARTED_GRACE_HOURS', DEFAULTS.SPORTS_STARTED_GRACE_HOURS),
    },

    eventCaps: {
      balanced: num(env, 'BALANCED_EVENT_CAP', DEFAULTS.BALANCED_EVENT_CAP),
      multiOutcome: num(env, 'MULTI_OUTCOME_EVENT_CAP', DEFAULTS.MULTI_OUTCOME_EVENT_CAP),
      balancedCategories: list(env, 'BALANCED_CATEGORIES', CATEGORY_DEFAULTS.BALANCED),
    },

    risk: {
      mode: defensive ? 'DEFENSIVE' : 'NORMAL',
      multipliers: {
        PREFERRED: num(env, 'PREFERRED_MULTIPLIER', DEFAULTS.PREFERRED_MULTIPLIER),
        STANDARD: num(env, 'STANDARD_MULTIPLIER', DEFAULTS.STANDARD_MULTIPLIER),
        HIGH_RISK: num(env, 'HIGH_RISK_MULTIPLIER', DEFAULTS.HIGH_RISK_MULTIPLIER),
      },
      defensiveMultiplier: num(env, 'DEFENSIVE_MULTIPLIER', DEFAULTS.DEFENSIVE_MULTIPLIER),
      defensiveLiquidityFactor: num(env, 'DEFENSIVE_LIQUIDITY_FACTOR', DEFAULTS.DEFENSIVE_LIQUIDITY_FACTOR),
      defensiveBandMargin: num(env, 'DEFENSIVE_BAND_MARGIN', DEFAULTS.DEFENSIVE_BAND_MARGIN),
      preferredCategories: list(env, 'PREFERRED_CATEGORIES', CATEGORY_DEFAULTS.PREFERRED),
      highRiskCategories: list(env, 'HIGH_RISK_CATEGORIES', CATEGORY_DEFAULTS.HIGH_RISK),
      maxStakeUsdc: num(env, 'MAX_STAKE_USDC', DEFAULTS.MAX_STAKE_USDC),
      maxStakeFraction: num(env, 'MAX_STAKE_FRACTION', DEFAULTS.MAX_STAKE_FRACTION),
      minStakeUsdc: num(env, 'MIN_STAKE_USDC', DEFAULTS.MIN_STAKE_USDC),
      minEdge: num(env, 'MIN_EDGE', DEFAULTS.MIN_EDGE),
      maxOpenPositions: num(env, 'MAX_OPEN_POSITIONS', DEFAULTS.MAX_OPEN_POSITIONS),
      maxDrawdownPct: num(env, 'MAX_DRAWDOWN_PCT', DEFAULTS.MAX_DRAWDOWN_PCT),
      maxCorrelatedPositions: num(env, 'MAX_CORRELATED_POSITIONS', DEFAULTS.MAX_CORRELATED_POSITIONS),
    },

    supervisor: {
      stopLossFraction: num(env, 'STOP_LOSS_FRACTION', DEFAULTS.STOP_LOSS_FRACTION),
      armingDelayHours: num(env, 'ARMING_DELAY_HOURS', DEFAULTS.ARMING_DELAY_HOURS),
      timeExitDays: num(env, 'TIME_EXIT_DAYS', DEFAULTS.TIME_EXIT_DAYS),
      timeExitProfitMargin: num(env, 'TIME_EXIT_PROFIT_MARGIN', DEFAULTS.TIME_EXIT_PROFIT_MARGIN),
      tickMs: num(env, 'SUPERVISOR_TICK_MS', DEFAULTS.SUPERVISOR_TICK_MS),
      exitSlippage: num(env, 'EXIT_SLIPPAGE', DEFAULTS.EXIT_SLIPPAGE),
      maxExitAttempts: num(env, 'MAX_EXIT_ATTEMPTS', DEFAULTS.MAX_EXIT_ATTEMPTS),
      exitRetryMs: num(env, 'EXIT_RETRY_INTERVAL_MS', DEFAULTS.EXIT_RETRY_INTERVAL_MS),
      breakEvenTrigger: num(env, 'BREAK_EVEN_TRIGGER', DEFAULTS.BREAK_EVEN_TRIGGER),
      breakEvenFloor: num(env, 'BREAK_EVEN_FLOOR', DEFAULTS.BREAK_EVEN_FLOOR),
    },

    scanner: {
      intervalMs: num(env, 'SCAN_INTERVAL_MS', DEFAULTS.SCAN_INTERVAL_MS),
      pageSize: num(env, 'SCAN_PAGE_SIZE', DEFAULTS.SCAN_PAGE_SIZE),
      eventLimit: num(env, 'SCAN_EVENT_LIMIT', DEFAULTS.SCAN_EVENT_LIMIT),
      dedupTtlMs: num(env, 'DEDUP_TTL_MS', DEFAULTS.DEDUP_TTL_MS),
      queueCapacity: num(env, 'QUEUE_CAPACITY', DEFAULTS.QUEUE_CAPACITY),
    },

    advisory: {
      models: {
        GATEKEEPER: parseModelSelector('GATEKEEPER_MODEL', str(env, 'GATEKEEPER_MODEL', DEFAULTS.GATEKEEPER_MODEL)),
        RULE_CLARITY: parseModelSelector('RULES_MODEL', str(env, 'RULES_MODEL', DEFAULTS.RULES_MODEL)),
        SENTIMENT: parseModelSelector('SENTIMENT_MODEL', str(env, 'SENTIMENT_MODEL', DEFAULTS.SENTIMENT_MODEL)),
        SIZING: parseModelSelector('SIZING_MODEL', str(env, 'SIZING_MODEL', DEFAULTS.SIZING_MODEL)),
      },
      timeoutMs: num(env, 'ADVISORY_TIMEOUT_MS', DEFAULTS.ADVISORY_TIMEOUT_MS),
      sizingTimeoutMs: num(env, 'SIZING_TIMEOUT_MS', DEFAULTS.SIZING_TIMEOUT_MS),
      minSentimentScore: num(env, 'MIN_SENTIMENT_SCORE', DEFAULTS.MIN_SENTIMENT_SCORE),
      apiKeys: {
        gemini: str(env, 'GEMINI_API_KEY', str(env, 'API_KEY')),
        xai: str(env, 'XAI_API_KEY'),
        deepseek: str(env, 'DEEPSEEK_API_KEY'),
      },
      tavilyApiKey: str(env, 'TAVILY_API_KEY'),
      newsApiKey: str(env, 'NEWS_API_KEY'),
    },

    execution: {
      mode: parseExecutionMode(env.EXECUTION_MODE),
      maxRetries: num(env, 'MAX_RETRIES', DEFAULTS.MAX_RETRIES),
      retryBaseDelayMs: num(env, 'RETRY_BASE_DELAY_MS', DEFAULTS.RETRY_BASE_DELAY_MS),
      paperBankroll: num(env, 'PAPER_BANKROLL', DEFAULTS.PAPER_BANKROLL),
      fillPollMs: num(env, 'FILL_POLL_MS', DEFAULTS.FILL_POLL_MS),
      fillTimeoutMs: num(env, 'FILL_TIMEOUT_MS', DEFAULTS.FILL_TIMEOUT_MS),
      privateKey: str(env, 'PRIVATE_KEY'),
      apiKey: str(env, 'POLY_API_KEY'),
      apiSecret: str(env, 'POLY_API_SECRET'),
      passphrase: str(env, 'POLY_PASSPHRASE'),
      funderAddress: str(env, 'POLY_FUNDER_ADDRESS'),
      clobHost: str(env, 'CLOB_HOST', DEFAULTS.CLOB_HOST),
      gammaHost: str(env, 'GAMMA_HOST', DEFAULTS.GAMMA_HOST),
      wsUrl: str(env, 'WS_URL', DEFAULTS.WS_URL),
      chainId: num(env, 'CHAIN_ID', DEFAULTS.CHAIN_ID),
    },

    persistence: {
      supabaseUrl: str(env, 'SUPABASE_URL'),
      supabaseServiceKey: str(env, 'SUPABASE_SERVICE_ROLE_KEY'),
      heartbeatIntervalMs: num(env, 'HEARTBEAT_INTERVAL_MS', DEFAULTS.HEARTBEAT_INTERVAL_MS),
    },
  };

  return deepFreeze(config);
}

export function validateConfig(config: BotConfig): void {
  const missing: string[] = [];
  const { execution, persistence, advisory } = config;

  // ---- Always required ----
  if (!persistence.supabaseUrl) missing.push('SUPABASE_URL');
  if (!persistence.supabaseServiceKey) missing.push('SUPABASE_SERVICE_ROLE_KEY');

  // ---- Required ONLY in LIVE mode ----
  if (execution.mode === 'LIVE') {
    if (!execution.privateKey) missing.push('PRIVATE_KEY');
    if (!execution.apiKey) missing.push('POLY_API_KEY');
    if (!execution.apiSecret) missing.push('POLY_API_SECRET');
    if (!execution.passphrase) missing.push('POLY_PASSPHRASE');
  }

  // ---- One key per advisory provider in use ----
  const providerKeys: Record<ModelProvider, string> = {
    gemini: 'GEMINI_API_KEY',
    xai: 'XAI_API_KEY',
    deepseek: 'DEEPSEEK_API_KEY',
  };
  const used = new Set(Object.values(advisory.models).map(m => m.provider));
  for (const provider of PROVIDERS) {
    if (used.has(provider) && !advisory.apiKeys[provider]) missing.push(providerKeys[provider]);
  }

  if (missing.length > 0) {
    throw new Error(
      `[CONFIG_FATAL] Missing required ENV variables for ${execution.mode} mode: ${missing.join(', ')}`
    );
  }

  const problems: string[] = [];
  const { filter, risk, scanner, eventCaps, supervisor } = config;

  if (filter.priceBandMin > filter.priceBandMax) problems.push('PRICE_BAND_MIN > PRICE_BAND_MAX');
  if (filter.resolutionMinDays > filter.resolutionMaxDays) {
    problems.push('RESOLUTION_MIN_DAYS > RESOLUTION_MAX_DAYS');
  }
  if (risk.multipliers.HIGH_RISK > risk.multipliers.STANDARD) {
    problems.push('HIGH_RISK_MULTIPLIER > STANDARD_MULTIPLIER');
  }
  if (risk.maxStakeFraction <= 0 || risk.maxStakeFraction > 1) problems.push('MAX_STAKE_FRACTION outside (0, 1]');
  if (supervisor.stopLossFraction <= 0 || supervisor.stopLossFraction >= 1) {
    problems.push('STOP_LOSS_FRACTION outside (0, 1)');
  }
  if (!Number.isInteger(scanner.queueCapacity) || scanner.queueCapacity < 1) problems.push('QUEUE_CAPACITY < 1');
  if (eventCaps.balanced < 1) problems.push('BALANCED_EVENT_CAP < 1');
  if (eventCaps.multiOutcome < 1) problems.push('MULTI_OUTCOME_EVENT_CAP < 1');
  if (supervisor.maxExitAttempts < 1) problems.push('MAX_EXIT_ATTEMPTS < 1');
  if (supervisor.breakEvenFloor >= supervisor.breakEvenTrigger) problems.push('BREAK_EVEN_FLOOR >= BREAK_EVEN_TRIGGER');

  if (problems.length > 0) {
    throw new Error(`[CONFIG_FATAL] Inconsistent configuration: ${problems.join('; ')}`);
  }

  Logger.info(
    execution.mode === 'LIVE'
      ? '[MODE] EXECUTION_MODE=LIVE (real trading enabled)'
      : '[MODE] EXECUTION_MODE=PAPER (execution disabled)'
  );
  if (risk.mode === 'DEFENSIVE') Logger.warn('[MODE] DEFENSIVE_MODE=true (reduced sizing, tightened filter)');
}
