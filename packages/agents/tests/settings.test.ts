import { describe, it, expect } from 'vitest';
import { loadSettings, ConfigError } from '../config/settings.js';

describe('loadSettings', () => {
  it('applies defaults', () => {
    const settings = loadSettings({});
    expect(settings.llm.apiKey).toBeUndefined();
    expect(settings.llm.models).toEqual([
      'claude-haiku-4-5-20251001',
      'claude-sonnet-4-5-20250929',
      'claude-3-5-haiku-20241022',
    ]);
    expect(settings.llm.maxAttempts).toBe(3);
    expect(settings.cache).toEqual({ dir: 'data/cache', ttlDays: 7 });
    expect(settings.research).toEqual({ timeboxMinutes: 5, criticMaxRetries: 2, maxSubQueries: 4 });
    expect(settings.search.provider).toBe('serpapi');
    expect(settings.currency).toEqual({ report: 'USD', eurUsdRate: 1.08 });
  });

  it('puts the primary model first without duplicates', () => {
    const settings = loadSettings({ LLM_MODEL: 'claude-sonnet-4-5-20250929' });
    expect(settings.llm.models).toEqual(['claude-sonnet-4-5-20250929', 'claude-3-5-haiku-20241022']);
  });

  it('coerces numbers and normalises strings', () => {
    const settings = loadSettings({
      ANTHROPIC_API_KEY: '  ',
      CACHE_TTL_DAYS: '3',
      CRITIC_MAX_RETRIES: '1',
      SEARCH_PROVIDER: 'Google',
      SERPAPI_API_KEY: ' test-secret ',
    });
    expect(settings.llm.apiKey).toBeUndefined();
    expect(settings.cache.ttlDays).toBe(3);
    expect(settings.research.criticMaxRetries).toBe(1);
    expect(settings.search.provider).toBe('google_cse');
    expect(settings.search.serpApiKey).toBe('test-secret');
  });

  it('raises ConfigError listing invalid variables', () => {
    let caught: unknown;
    try {
      loadSettings({ CACHE_TTL_DAYS: '-1', REPORT_CURRENCY: 'GBP' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((i) => i.split(':')[0])).toEqual(['CACHE_TTL_DAYS', 'REPORT_CURRENCY']);
    }
  });

  it('freezes the result', () => {
    const settings = loadSettings({});
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.llm.models)).toBe(true);
  });
});
