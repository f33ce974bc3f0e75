import { describe, it, expect } from 'vitest';
import {
  AskSchema,
  ClarifySchema,
  EvidenceSchema,
  OverviewSchema,
  ReportSchema,
  ResearchSchema,
} from '../src/schemas/account-plan.js';

describe('Schema Validation', () => {
  describe('AskSchema', () => {
    it('accepts company and question with defaults', () => {
      expect(AskSchema.parse({ company: ' Nokia ', question: 'What was revenue in 2024?' })).toEqual({
        company: 'Nokia',
        question: 'What was revenue in 2024?',
        force_refresh: false,
      });
    });

    it('rejects empty company', () => {
      expect(() => AskSchema.parse({ company: '   ', question: 'Revenue?' })).toThrow();
    });

    it('rejects missing question', () => {
      expect(() => AskSchema.parse({ company: 'Nokia' })).toThrow();
    });

    it('rejects a string force_refresh', () => {
      expect(() => AskSchema.parse({ company: 'Nokia', question: 'Revenue?', force_refresh: 'false' })).toThrow();
    });
  });

  describe('ReportSchema', () => {
    it('defaults to an empty directive and JSON output', () => {
      const result = ReportSchema.parse({ company: 'Nokia' });
      expect(result.directive).toBe('');
      expect(result.format).toBe('json');
    });

    it('accepts markdown format', () => {
      expect(ReportSchema.parse({ company: 'Nokia', format: 'markdown' }).format).toBe('markdown');
    });

    it('rejects unknown format', () => {
      expect(() => ReportSchema.parse({ company: 'Nokia', format: 'pdf' })).toThrow();
    });
  });

  describe('OverviewSchema', () => {
    it('accepts force_refresh', () => {
      expect(OverviewSchema.parse({ company: 'Nokia', force_refresh: true })).toEqual({
        company: 'Nokia',
        force_refresh: true,
      });
    });
  });

  describe('ResearchSchema', () => {
    it('leaves topics undefined when omitted', () => {
      expect(ResearchSchema.parse({ company: 'Nokia' }).topics).toBeUndefined();
    });

    it('trims topics', () => {
      expect(ResearchSchema.parse({ company: 'Nokia', topics: [' pricing '] }).topics).toEqual(['pricing']);
    });

    it('rejects an empty topic list', () => {
      expect(() => ResearchSchema.parse({ company: 'Nokia', topics: [] })).toThrow();
    });

    it('rejects more than 10 topics', () => {
      const topics = Array.from({ length: 11 }, (_, i) => `topic ${i}`);
      expect(() => ResearchSchema.parse({ company: 'Nokia', topics })).toThrow();
    });
  });

  describe('EvidenceSchema', () => {
    it('takes a company and a question only', () => {
      expect(EvidenceSchema.parse({ company: 'Nokia', question: ' Revenue in 2024? ', force_refresh: true })).toEqual({
        company: 'Nokia',
        question: 'Revenue in 2024?',
      });
    });

    it('rejects a blank question', () => {
      expect(() => EvidenceSchema.parse({ company: 'Nokia', question: ' ' })).toThrow();
    });
  });

  describe('ClarifySchema', () => {
    it('defaults to an empty directive', () => {
      expect(ClarifySchema.parse({ company: 'Nokia' })).toEqual({ company: 'Nokia', directive: '' });
    });
  });
});
