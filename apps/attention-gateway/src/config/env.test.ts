import { DEFAULT_ATTENTION_CONFIG } from '@attention-gw/core';
import { describe, expect, it } from 'vitest';

import { loadConfig } from './env';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8080);
    expect(config.session).toEqual({
      driver: 'memory',
      redisUrl: undefined,
      ttlSeconds: 30 * 24 * 60 * 60,
    });
    expect(config.rateLimit).toEqual({ max: 120, timeWindow: '1 minute' });
    expect(config.ingest).toEqual({
      signingSecret: undefined,
      botId: undefined,
      botNicknames: [],
      commandWords: [],
    });
    expect(config.attention).toEqual({ ...DEFAULT_ATTENTION_CONFIG, shortcutPhrases: [] });
    expect(config.agui.timeoutMs).toBe(120_000);
    expect(config.replies.timeoutMs).toBe(10_000);
  });

  it('reads outbound request timeouts', () => {
    const config = loadConfig({ AGUI_TIMEOUT_MS: '0', REPLY_CALLBACK_TIMEOUT_MS: '2500' });

    expect(config.agui.timeoutMs).toBe(0);
    expect(config.replies.timeoutMs).toBe(2_500);
    expect(() => loadConfig({ REPLY_CALLBACK_TIMEOUT_MS: '0' })).toThrow(
      'Invalid REPLY_CALLBACK_TIMEOUT_MS value: 0',
    );
  });

  it('reads attention tunables and comma lists', () => {
    const config = loadConfig({
      ENERGY_FLOOR: '0.25',
      DEBOUNCE_QUIET_PERIOD_SECONDS: '1.5',
      DEBOUNCE_MAX_WINDOW_SECONDS: '10',
      BACKGROUND_POOL_CAPACITY: '5',
      CLASSIFIER_FAILURE_DEFAULT: 'ignore',
      CLASSIFIER_TIMEOUT_MS: '0',
      BOT_NICKNAMES: ' Mai , ,Maimai',
      SHORTCUT_PHRASES: 'good night',
      SESSION_STORE_DRIVER: 'REDIS',
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(config.attention).toMatchObject({
      energyFloor: 0.25,
      debounceQuietPeriodSeconds: 1.5,
      debounceMaxWindowSeconds: 10,
      backgroundPoolCapacity: 5,
      classifierFailureDefault: 'IGNORE',
      classifierTimeoutMs: 0,
      shortcutPhrases: ['good night'],
    });
    expect(config.ingest.botNicknames).toEqual(['mai', 'maimai']);
    expect(config.session.driver).toBe('redis');
  });

  it('rejects out of range values', () => {
    expect(() => loadConfig({ ENERGY_FLOOR: '1.5' })).toThrow('Invalid ENERGY_FLOOR value: 1.5');
    expect(() => loadConfig({ PORT: '0' })).toThrow('Invalid PORT value: 0');
  });

  it('rejects a max window shorter than the quiet period', () => {
    expect(() =>
      loadConfig({ DEBOUNCE_QUIET_PERIOD_SECONDS: '5', DEBOUNCE_MAX_WINDOW_SECONDS: '2' }),
    ).toThrow('DEBOUNCE_MAX_WINDOW_SECONDS must not be shorter than the quiet period');
  });

  it('rejects malformed urls', () => {
    expect(() => loadConfig({ CLASSIFIER_URL: 'not a url' })).toThrow(
      'CLASSIFIER_URL must be a valid URL',
    );
  });
});
