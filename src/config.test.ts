import { describe, it, expect } from 'vitest';
import { ConfigValidationError, loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ port: 3000, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.database.path).toBe('vocab-drill.db');
    expect(config.tasks.dir).toBe('./data/tasks');
    expect(config.scheduler).toEqual({
      cooldownMs: 720 * 60_000,
      expiryMs: 30 * 60_000,
      redeliverOutstanding: true,
      sweepIntervalMs: 0,
    });
    expect(config.store.retry).toEqual({ attempts: 3, baseDelayMs: 50, maxDelayMs: 1000 });
    expect(config.operator.chatId).toBeNull();
    expect(config.logging.level).toBe('info');
  });

  it('reads and converts variables', () => {
    const config = loadConfig({
      PORT: '8080',
      SCHEDULER_COOLDOWN_MINUTES: '60',
      SCHEDULER_EXPIRY_MINUTES: '5',
      SCHEDULER_REDELIVER_OUTSTANDING: 'no',
      SCHEDULER_SWEEP_INTERVAL_MINUTES: '1',
      OPERATOR_CHAT_ID: '-100123',
      LOG_LEVEL: 'warn',
    });

    expect(config.server.port).toBe(8080);
    expect(config.scheduler).toEqual({
      cooldownMs: 3_600_000,
      expiryMs: 300_000,
      redeliverOutstanding: false,
      sweepIntervalMs: 60_000,
    });
    expect(config.operator.chatId).toBe(-100123);
    expect(config.logging.level).toBe('warn');
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', OPERATOR_CHAT_ID: '' }).server.port).toBe(3000);
  });

  it('reports every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'eighty', SCHEDULER_EXPIRY_MINUTES: '0', LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    const names = caught instanceof ConfigValidationError ? caught.invalidVars.map((v) => v.name) : [];
    expect(names.sort()).toEqual(['LOG_LEVEL', 'PORT', 'SCHEDULER_EXPIRY_MINUTES']);
  });

  it('rejects a retry cap below the base delay', () => {
    expect(() => loadConfig({ STORE_RETRY_BASE_DELAY_MS: '500', STORE_RETRY_MAX_DELAY_MS: '100' })).toThrow(
      'STORE_RETRY_MAX_DELAY_MS'
    );
  });
});
