import { gameConfigSchema } from '@config/game-config.schema';
import { parseEnv } from '@config/env-config.provider';

const VALID_ENV = {
  OPERATOR_ID: 'operator-a',
  HOUSE_EDGE_PERCENT: '1',
  MIN_BET_CENTS: '10',
  MAX_BET_CENTS: '100000',
  NATS_URL: 'nats://localhost:4222',
};

describe('gameConfigSchema', () => {
  it('coerces strings and applies defaults', () => {
    const result = gameConfigSchema.safeParse(VALID_ENV);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toEqual({
      OPERATOR_ID: 'operator-a',
      HOUSE_EDGE_PERCENT: 1,
      MAX_MULTIPLIER: 1000,
      MIN_BET_CENTS: 10,
      MAX_BET_CENTS: 100_000,
      BETTING_WINDOW_MS: 5000,
      TICK_INTERVAL_MS: 50,
      GROWTH_RATE: 0.00006,
      LEDGER_TIMEOUT_MS: 2000,
      CREDIT_RETRY_BASE_MS: 250,
      CREDIT_RETRY_MAX_MS: 30_000,
      CREDIT_ALERT_AFTER_ATTEMPTS: 5,
      HISTORY_CAPACITY: 1000,
      NATS_URL: 'nats://localhost:4222',
      LOG_LEVEL: 'info',
      NODE_ENV: 'development',
    });
  });

  it('accepts a zero house edge', () => {
    expect(gameConfigSchema.safeParse({ ...VALID_ENV, HOUSE_EDGE_PERCENT: '0' }).success).toBe(true);
  });

  it('keeps the optional ledger URL and client seed', () => {
    const result = gameConfigSchema.safeParse({
      ...VALID_ENV,
      ACCOUNT_LEDGER_URL: 'https://ledger.internal:8443',
      CLIENT_SEED: 'public-seed',
    });
    expect(result.success && result.data.ACCOUNT_LEDGER_URL).toBe('https://ledger.internal:8443');
    expect(result.success && result.data.CLIENT_SEED).toBe('public-seed');
  });

  it.each([
    ['HOUSE_EDGE_PERCENT', '100'],
    ['HOUSE_EDGE_PERCENT', '-1'],
    ['MAX_MULTIPLIER', '1'],
    ['MIN_BET_CENTS', '0'],
    ['TICK_INTERVAL_MS', '5'],
    ['TICK_INTERVAL_MS', '500'],
    ['OPERATOR_ID', 'Operator A'],
    ['ACCOUNT_LEDGER_URL', 'ftp://ledger'],
    ['NATS_URL', 'http://localhost:4222'],
    ['LOG_LEVEL', 'verbose'],
  ])('rejects %s=%s', (key, value) => {
    expect(gameConfigSchema.safeParse({ ...VALID_ENV, [key]: value }).success).toBe(false);
  });

  it('requires the house edge', () => {
    const env: Record<string, string> = { ...VALID_ENV };
    delete env.HOUSE_EDGE_PERCENT;
    const result = gameConfigSchema.safeParse(env);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].path).toEqual(['HOUSE_EDGE_PERCENT']);
  });

  it('requires MIN_BET_CENTS < MAX_BET_CENTS', () => {
    const result = gameConfigSchema.safeParse({ ...VALID_ENV, MIN_BET_CENTS: '500', MAX_BET_CENTS: '500' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('MIN_BET_CENTS must be less than MAX_BET_CENTS');
  });

  it('requires the retry base delay not to exceed the cap', () => {
    const result = gameConfigSchema.safeParse({
      ...VALID_ENV,
      CREDIT_RETRY_BASE_MS: '5000',
      CREDIT_RETRY_MAX_MS: '1000',
    });
    expect(result.success).toBe(false);
  });
});

describe('parseEnv', () => {
  it('returns the parsed config', () => {
    expect(parseEnv(VALID_ENV).OPERATOR_ID).toBe('operator-a');
  });

  it('lists every invalid variable in one error', () => {
    expect(() => parseEnv({ ...VALID_ENV, HOUSE_EDGE_PERCENT: '100', TICK_INTERVAL_MS: '5' })).toThrow(
      '[GameConfig] Invalid environment variables:\n' +
        '  - HOUSE_EDGE_PERCENT: HOUSE_EDGE_PERCENT must be < 100\n' +
        '  - TICK_INTERVAL_MS: TICK_INTERVAL_MS must be >= 10',
    );
  });
});
