import { describe, it, expect } from 'vitest';
import { applyGuardrails, isOnTopic, MAX_INPUT_CHARS } from '../utils/guardrails.js';

describe('guardrails', () => {
  describe('applyGuardrails', () => {
    it('strips control characters and trims', () => {
      expect(applyGuardrails('  Nokia\u0000revenue ')).toEqual({ allowed: true, text: 'Nokia revenue', truncated: false });
    });

    it('truncates long input', () => {
      const result = applyGuardrails('x'.repeat(MAX_INPUT_CHARS + 1));
      expect(result.allowed).toBe(true);
      if (result.allowed) {
        expect(result.text).toHaveLength(MAX_INPUT_CHARS);
        expect(result.truncated).toBe(true);
      }
    });

    it('blocks listed categories at a word start', () => {
      expect(applyGuardrails('terrorism statistics')).toEqual({ allowed: false, reason: 'blocked category: terror' });
    });

    it('does not block words that merely contain a keyword', () => {
      expect(applyGuardrails('whatever the outlook').allowed).toBe(true);
    });
  });

  describe('isOnTopic', () => {
    it('accepts questions naming the company', () => {
      expect(isOnTopic('Tell me about nokia', 'Nokia')).toBe(true);
    });

    it('accepts business vocabulary and years', () => {
      expect(isOnTopic('Who are the main competitors?', 'Nokia')).toBe(true);
      expect(isOnTopic('What happened in 2023?', 'Nokia')).toBe(true);
    });

    it('rejects unrelated questions', () => {
      expect(isOnTopic('What is the weather like?', 'Nokia')).toBe(false);
    });
  });
});
