/**
 * config/defaults.ts
 *
 * Fallback values for every tunable. Anything not set in the environment
 * takes its value from here.
 */

export const DEFAULTS = {
  BOT_ID: 'prediction-sniper-1',

  // ---- Position lifecycle ----
  STOP_LOSS_FRACTION: 0.2,
  ARMING_DELAY_HOURS: 2,
  TIME_EXIT_DAYS: 2,
  TIME_EXIT_PROFIT_MARGIN: 0.02,
  SUPERVISOR_TICK_MS: 30_000,
  EXIT_SLIPPAGE: 0.02,
  MAX_EXIT_ATTEMPTS: 3,
  EXIT_RETRY_INTERVAL_MS: 45_000,
  BREAK_EVEN_TRIGGER: 0.08,
  BREAK_EVEN_FLOOR: 0.03,

  // ---- Admission ----
  QUEUE_CAPACITY: 500,
  MIN_BID_LIQUIDITY_USDC: 20,
  PRICE_BAND_MIN: 0.1,
  PRICE_BAND_MAX: 0.75,
  RESOLUTION_MIN_DAYS: 1,
  RESOLUTION_MAX_DAYS: 60,
  BALANCED_EVENT_CAP: 1,
  MULTI_OUTCOME_EVENT_CAP: 3,
  MIN_SENTIMENT_SCORE: 5,
  SKIP_TITLE_PATTERNS: 'up or down',
  SPORTS_STARTED_GRACE_HOURS: 4,

  // ---- Sizing ----
  DEFENSIVE_MODE: false,
  DEFENSIVE_MULTIPLIER: 0.5,
  DEFENSIVE_LIQUIDITY_FACTOR: 1.5,
  DEFENSIVE_BAND_MARGIN: 0.05,
  PREFERRED_MULTIPLIER: 0.6,
  STANDARD_MULTIPLIER: 0.5,
  HIGH_RISK_MULTIPLIER: 0.25,
  MAX_STAKE_USDC: 100,
  MAX_STAKE_FRACTION: 0.7,
  MIN_STAKE_USDC: 2,
  MIN_EDGE: 0.03,

  // ---- Portfolio ----
  MAX_OPEN_POSITIONS: 15,
  MAX_DRAWDOWN_PCT: 30,
  MAX_CORRELATED_POSITIONS: 3,

  // ---- Scanner ----
  SCAN_INTERVAL_MS: 25_000,
  SCAN_PAGE_SIZE: 100,
  SCAN_EVENT_LIMIT: 1000,
  DEDUP_TTL_MS: 300_000,

  // ---- Services ----
  MAX_RETRIES: 3,
  RETRY_BASE_DELAY_MS: 1000,
  ADVISORY_TIMEOUT_MS: 20_000,
  SIZING_TIMEOUT_MS: 90_000,
  HEARTBEAT_INTERVAL_MS: 10_000,
  FILL_POLL_MS: 1500,
  FILL_TIMEOUT_MS: 15_000,
  PAPER_BANKROLL: 5000,

  GATEKEEPER_MODEL: 'gemini:gemini-2.5-flash',
  RULES_MODEL: 'gemini:gemini-2.5-flash',
  SENTIMENT_MODEL: 'gemini:gemini-2.5-pro',
  SIZING_MODEL: 'deepseek:deepseek-reasoner',

  CLOB_HOST: 'https://clob.polymarket.com',
  GAMMA_HOST: 'https://gamma-api.polymarket.com',
  WS_URL: 'wss://ws-subscriptions-clob.polymarket.com/ws/market',
  CHAIN_ID: 137,
};

export const CATEGORY_DEFAULTS = {
  PREFERRED: ['Sports', 'Elections', 'Politics'],
  HIGH_RISK: ['Crypto', 'Business', 'Tech', 'Economics', 'Geopolitics'],
  // Events in these categories are treated as balanced (one outcome per event)
  BALANCED: ['Sports', 'Crypto', 'Earnings'],
};
