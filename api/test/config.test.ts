import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      logLevel: 'info',
      corsOrigin: 'http://localhost:3000',
      rankingFile: 'ranking.json',
      linterBin: 'pylint',
      linterTimeoutMs: 30000,
      exposeStack: true,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '9100',
      LOG_LEVEL: 'debug',
      RANKING_FILE: '/var/lib/lint-arena/ranking.json',
      LINTER_BIN: '/usr/local/bin/pylint',
      LINTER_TIMEOUT_MS: '5000',
      NODE_ENV: 'production',
    });

    expect(config).toMatchObject({
      port: 9100,
      logLevel: 'debug',
      rankingFile: '/var/lib/lint-arena/ranking.json',
      linterBin: '/usr/local/bin/pylint',
      linterTimeoutMs: 5000,
      exposeStack: false,
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ LINTER_TIMEOUT_MS: '0' })).toThrow(/LINTER_TIMEOUT_MS/);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/Invalid configuration/);
  });
});
