import { describe, expect, it } from 'vitest';
import { loadConfig, parseModelSelector, validateConfig } from '../config/env';
import { testConfig } from './fakes';

describe('loadConfig', () => {
  it('fills every section from defaults', () => {
    const config = testConfig();

    expect(config.filter).toMatchObject({ priceBandMin: 0.1, priceBandMax: 0.75, minBidLiquidity: 20 });
    expect(config.supervisor).toMatchObject({ stopLossFraction: 0.2, armingDelayHours: 2, timeExitDays: 2 });
    expect(config.supervisor).toMatchObject({ exitRetryMs: 45_000, breakEvenTrigger: 0.08, breakEvenFloor: 0.03 });
    expect(config.scanner.queueCapacity).toBe(500);
    expect(config.eventCaps).toMatchObject({ balanced: 1, multiOutcome: 3 });
    expect(config.execution.mode).toBe('PAPER');
    expect(config.risk.mode).toBe('NORMAL');
    expect(config.advisory.models.SIZING).toEqual({ provider: 'deepseek', model: 'deepseek-reasoner' });
  });

  it('returns a deeply frozen object', () => {
    const config = testConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.risk.multipliers)).toBe(true);
    expect(Object.isFrozen(config.filter.skipTitlePatterns)).toBe(true);
  });

  it('falls back to the default for values that do not parse', () => {
    const config = testConfig({ STOP_LOSS_FRACTION: 'twenty', DEFENSIVE_MODE: 'maybe' });
    expect(config.supervisor.stopLossFraction).toBe(0.2);
    expect(config.risk.mode).toBe('NORMAL');
  });

  it('reads lists, flags and model selectors', () => {
    const config = testConfig({
      SKIP_TITLE_PATTERNS: 'Up or Down, Hourly',
      DEFENSIVE_MODE: 'true',
      SENTIMENT_MODEL: 'xai:grok-3-mini',
    });
    expect(config.filter.skipTitlePatterns).toEqual(['up or down', 'hourly']);
    expect(config.risk.mode).toBe('DEFENSIVE');
    expect(config.advisory.models.SENTIMENT).toEqual({ provider: 'xai', model: 'grok-3-mini' });
  });

  it('rejects an unknown execution mode', () => {
    expect(() => loadConfig({ EXECUTION_MODE: 'SHADOW' })).toThrow(
      '[CONFIG_FATAL] Invalid EXECUTION_MODE="SHADOW". Must be "LIVE" or "PAPER".'
    );
  });

  it('rejects a malformed model selector', () => {
    expect(() => parseModelSelector('SIZING_MODEL', 'openai:gpt')).toThrow('[CONFIG_FATAL] SIZING_MODEL="openai:gpt"');
    expect(parseModelSelector('SIZING_MODEL', 'gemini:gemini-2.5-pro')).toEqual({
      provider: 'gemini',
      model: 'gemini-2.5-pro',
    });
  });
});

describe('validateConfig', () => {
  it('accepts a complete paper configuration', () => {
    expect(() => validateConfig(testConfig())).not.toThrow();
  });

  it('lists every missing credential', () => {
    expect(() => validateConfig(loadConfig({}))).toThrow(
      '[CONFIG_FATAL] Missing required ENV variables for PAPER mode: ' +
        'SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, GEMINI_API_KEY, DEEPSEEK_API_KEY'
    );
  });

  it('requires venue credentials in live mode', () => {
    expect(() => validateConfig(testConfig({ EXECUTION_MODE: 'LIVE' }))).toThrow(
      '[CONFIG_FATAL] Missing required ENV variables for LIVE mode: ' +
        'PRIVATE_KEY, POLY_API_KEY, POLY_API_SECRET, POLY_PASSPHRASE'
    );
  });

  it('requires a key for each provider in use', () => {
    expect(() => validateConfig(testConfig({ GATEKEEPER_MODEL: 'xai:grok-3-mini' }))).toThrow('XAI_API_KEY');
  });

  it('rejects inconsistent bounds', () => {
    expect(() => validateConfig(testConfig({ PRICE_BAND_MIN: '0.8' }))).toThrow(
      '[CONFIG_FATAL] Inconsistent configuration: PRICE_BAND_MIN > PRICE_BAND_MAX'
    );
    expect(() => validateConfig(testConfig({ HIGH_RISK_MULTIPLIER: '0.9' }))).toThrow(
      'HIGH_RISK_MULTIPLIER > STANDARD_MULTIPLIER'
    );
    expect(() => validateConfig(testConfig({ QUEUE_CAPACITY: '0' }))).toThrow('QUEUE_CAPACITY < 1');
    expect(() => validateConfig(testConfig({ BREAK_EVEN_FLOOR: '0.1' }))).toThrow('BREAK_EVEN_FLOOR >= BREAK_EVEN_TRIGGER');
  });
});
