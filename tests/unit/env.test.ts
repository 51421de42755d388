import { parseEnv, isProductionLike, getEffectiveNodeEnv } from '../../src/server/config/env';

describe('environment schema', () => {
  it('fills in defaults for an empty environment', () => {
    const result = parseEnv({});

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      HOST: '0.0.0.0',
      LOG_LEVEL: 'info',
      LOG_FORMAT: 'json',
      BOARD_WIDTH: 8,
      BOARD_HEIGHT: 8,
      BOARD_LAYOUT: 'chess',
      EXECUTION_RETRY_LIMIT: 1,
      COMMIT_LOG_MAX_ENTRIES: 500,
      ENABLE_METRICS: true,
      ENABLE_HEALTH_CHECKS: true,
    });
  });

  it('coerces numbers and reads boolean flags', () => {
    const result = parseEnv({
      PORT: '8080',
      BOARD_LAYOUT: 'empty',
      BOARD_WIDTH: '10',
      EXECUTION_RETRY_LIMIT: '0',
      ENABLE_METRICS: 'false',
      ENABLE_HEALTH_CHECKS: '0',
    });

    expect(result.data).toMatchObject({
      PORT: 8080,
      BOARD_LAYOUT: 'empty',
      BOARD_WIDTH: 10,
      EXECUTION_RETRY_LIMIT: 0,
      ENABLE_METRICS: false,
      ENABLE_HEALTH_CHECKS: false,
    });
  });

  it('reports each invalid variable by name', () => {
    const result = parseEnv({ PORT: 'not-a-port', BOARD_LAYOUT: 'go', EXECUTION_RETRY_LIMIT: '2' });

    expect(result.success).toBe(false);
    expect(result.errors?.map((error) => error.path).sort()).toEqual([
      'BOARD_LAYOUT',
      'EXECUTION_RETRY_LIMIT',
      'PORT',
    ]);
  });

  it('allows at most one internal execution retry', () => {
    const result = parseEnv({ EXECUTION_RETRY_LIMIT: '5' });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      { path: 'EXECUTION_RETRY_LIMIT', message: 'Number must be less than or equal to 1' },
    ]);
  });

  it('treats staging as production-like', () => {
    expect(isProductionLike('staging')).toBe(true);
    expect(isProductionLike('test')).toBe(false);
  });

  it('reports the test environment under Jest', () => {
    const result = parseEnv({ NODE_ENV: 'production' });
    expect(result.data && getEffectiveNodeEnv(result.data)).toBe('test');
  });
});
