import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig, getConfig, resetConfig } from '../../config/index.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('requires a JWT secret', () => {
    vi.stubEnv('JWT_SECRET', '');
    vi.stubEnv('JWT_SECRET_FILE', '');

    expect(() => loadConfig()).toThrow('JWT_SECRET (or JWT_SECRET_FILE) must be set');
  });

  it('reads values from the environment', () => {
    vi.stubEnv('JWT_SECRET', 'test-secret');
    vi.stubEnv('PORT', '9000');
    vi.stubEnv('ALLOW_SIGNUP', 'false');
    vi.stubEnv('CORS_ORIGINS', 'http://a.test, http://b.test,');
    vi.stubEnv('ACCESS_TOKEN_TTL', '60');
    vi.stubEnv('REFRESH_TOKEN_RETENTION', '86400');

    const config = loadConfig();
    expect(config.secrets.jwtSecret).toBe('test-secret');
    expect(config.server.port).toBe(9000);
    expect(config.server.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.auth.allowSignup).toBe(false);
    expect(config.auth.accessTokenTtl).toBe(60);
    expect(config.auth.refreshTokenRetention).toBe(86400);
  });

  it('keeps expired refresh records for 30 days by default', () => {
    vi.stubEnv('JWT_SECRET', 'test-secret');
    vi.stubEnv('REFRESH_TOKEN_RETENTION', '');

    expect(loadConfig().auth.refreshTokenRetention).toBe(2592000);
  });

  it('rejects malformed numbers and booleans', () => {
    vi.stubEnv('JWT_SECRET', 'test-secret');
    vi.stubEnv('PORT', 'eighty');
    expect(() => loadConfig()).toThrow('PORT must be an integer, got "eighty"');

    vi.stubEnv('PORT', '');
    vi.stubEnv('ALLOW_SIGNUP', 'maybe');
    expect(() => loadConfig()).toThrow('ALLOW_SIGNUP must be "true" or "false", got "maybe"');
  });

  it('caches the loaded configuration', () => {
    vi.stubEnv('JWT_SECRET', 'test-secret');
    const first = getConfig();

    vi.stubEnv('JWT_SECRET', 'other-secret');
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().secrets.jwtSecret).toBe('other-secret');
  });
});
