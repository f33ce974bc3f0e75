import { describe, it, expect } from 'vitest';
import { Orchestrator, BlockedInputError } from '../orchestrator/orchestrator.js';
import type { OrchestratorConfig } from '../orchestrator/orchestrator.js';
import { loadSettings } from '../config/settings.js';
import { UnavailableError } from '../llm/errors.js';
import type { CompletionRequest } from '../llm/gateway.js';
import { CacheManager } from '../cache/cache-manager.js';
import { MemoryCacheStore } from '../cache/cache-store.js';
import { ASSEMBLY_ORDER } from '../types/report.js';
import type { DomainEventType } from '../types/events.js';
import { BLOCKED_MESSAGE, OFF_TOPIC_REDIRECT } from '../utils/guardrails.js';
import { NOW, StaticAdapter, fakeGateway, isPlannerPrompt, isStructuredPrompt, snippet } from './helpers.js';
import type { Responder } from './helpers.js';

const SETTINGS = loadSettings({
  CRITIC_MAX_RETRIES: '2',
  RETRIEVER_MIN_CORPUS_RESULTS: '1',
  RESEARCH_TIMEBOX_MINUTES: '5',
});

const DIRECTIVE = 'compare 2025 vs 2024 revenue';
const TIMEBOX_WARNING = 'Research timebox reached; answering from the knowledge gathered so far.';
const REPORT_SNIPPET = snippet('ar#page=3', 'Nokia net sales were EUR 19.2 billion in 2024.');

const PRODUCTS_ANSWER = [
  'Top products and segments for Nokia [S1]',
  '',
  '| Product | FY | Revenue | Source |',
  '|---|---|---|---|',
  '| Mobile Networks | 2024 | 7.5 | [S1] |',
].join('\n');

function questionOf(request: CompletionRequest): string {
  return /^Question: (.*)$/m.exec(request.prompt)?.[1] ?? '';
}

function isAnswerPrompt(request: CompletionRequest): boolean {
  return request.prompt.startsWith('Company: ');
}

/** Echo the question back with a citation and both years, which the critic accepts. */
function defaultAnswer(question: string): string {
  return question.includes('Top Products') ? PRODUCTS_ANSWER : `${question} [S1] 2024 2025`;
}

interface Script {
  answer?: (question: string) => string;
  structured?: () => string;
}

function scripted(script: Script = {}): Responder {
  return (request) => {
    if (isPlannerPrompt(request)) return 'Nokia revenue';
    if (isStructuredPrompt(request)) return script.structured ? script.structured() : 'not json';
    if (request.prompt.startsWith('Summarize these search snippets')) return '- Nokia makes network equipment.';
    const question = questionOf(request);
    return script.answer ? script.answer(question) : defaultAnswer(question);
  };
}

function setup(respond: Responder, overrides: Partial<OrchestratorConfig> = {}) {
  const { gateway, backend } = fakeGateway(respond);
  const corpus = new StaticAdapter('corpus', () => [REPORT_SNIPPET]);
  const web = new StaticAdapter('serpapi', () => []);
  const events: Array<{ type: DomainEventType; payload: unknown }> = [];
  const orchestrator = new Orchestrator({
    company: 'Nokia',
    settings: SETTINGS,
    gateway,
    corpus,
    web,
    clock: () => NOW,
    onEvent: (e) => events.push(e),
    ...overrides,
  });
  return { orchestrator, backend, corpus, web, events };
}

describe('Orchestrator', () => {
  describe('ask', () => {
    it('plans, retrieves, answers and records revenue facts', async () => {
      const { orchestrator, web } = setup(scripted({ answer: () => 'Nokia revenue was EUR 19.2 billion in 2024 [S1].' }));

      const result = await orchestrator.ask('What was Nokia revenue in 2024?');

      expect(result).toMatchObject({
        answer: 'Nokia revenue was EUR 19.2 billion in 2024 [S1].',
        sources: ['ar#page=3'],
        lowConfidence: false,
        warnings: [],
        retries: 0,
        status: 'answered',
      });
      expect(result.followups).toHaveLength(3);
      expect(web.queries).toEqual([]);

      const kb = orchestrator.snapshot();
      expect(kb.snippets.map((s) => s.sourceId)).toEqual(['ar#page=3']);
      expect(kb.facts.map((f) => [f.year, f.value, f.currency])).toEqual([[2024, 20.736, 'USD']]);
    });

    it('blocks disallowed input without calling the model', async () => {
      const { orchestrator, backend } = setup(scripted());
      const result = await orchestrator.ask('hate speech statistics');
      expect(result).toMatchObject({ answer: BLOCKED_MESSAGE, status: 'blocked' });
      expect(backend.calls).toHaveLength(0);
    });

    it('redirects off-topic questions', async () => {
      const { orchestrator, backend } = setup(scripted());
      const result = await orchestrator.ask('What is the weather like?');
      expect(result).toMatchObject({ answer: OFF_TOPIC_REDIRECT, status: 'off_topic' });
      expect(backend.calls).toHaveLength(0);
    });

    it('bounds critic retries and returns the last candidate', async () => {
      const { orchestrator, backend } = setup(scripted({ answer: () => 'Nothing useful.' }));

      const result = await orchestrator.ask('What was Nokia revenue in 2024?');

      expect(result.answer).toBe('Nothing useful.');
      expect(result.lowConfidence).toBe(true);
      expect(result.retries).toBe(2);
      expect(backend.calls.filter(isAnswerPrompt)).toHaveLength(3);
    });

    it('keeps the previous draft when the model fails during a retry', async () => {
      let answers = 0;
      const { orchestrator } = setup(scripted({
        answer: () => {
          answers++;
          if (answers > 1) throw new Error('overloaded');
          return 'Nothing useful.';
        },
      }));

      const result = await orchestrator.ask('What was Nokia revenue in 2024?');

      expect(result).toMatchObject({
        answer: 'Nothing useful.',
        lowConfidence: true,
        retries: 1,
        warnings: ['The model became unavailable during revision; returning the previous draft.'],
      });
    });

    it('fails with UnavailableError when no draft was ever produced', async () => {
      const { orchestrator } = setup(() => {
        throw new Error('overloaded');
      });
      await expect(orchestrator.ask('What was Nokia revenue in 2024?')).rejects.toBeInstanceOf(UnavailableError);
    });

    it('runs one request at a time per session', async () => {
      const { orchestrator, backend } = setup(scripted());
      const first = 'How did Nokia revenue develop in 2024?';
      const second = 'Who are the competitors of Nokia?';

      await Promise.all([orchestrator.ask(first), orchestrator.ask(second)]);

      const mentions = (q: string) => backend.calls
        .map((call, i) => (call.prompt.includes(q) ? i : -1))
        .filter((i) => i >= 0);
      expect(Math.max(...mentions(first))).toBeLessThan(Math.min(...mentions(second)));
    });
  });

  describe('generateReport', () => {
    const STRUCTURED = JSON.stringify({
      directiveResponse: 'Revenue rose from 2024 to 2025 [S1].',
      overview: 'Network vendor [S1].',
      competitors: 'Ericsson, Huawei',
      marketPosition: 'Top three in radio.',
      financialSummary: 'Flat sales.',
      swot: 'Strength: portfolio.',
      strategy: 'Grow enterprise.',
      structuredInsights: 'Private wireless demand.',
      topProducts: [{ product: 'Mobile Networks', fiscalYear: 2024, revenue: 7.5, source: 'https://example.com/q4' }],
    });

    it('uses the structured path when the output validates', async () => {
      const { orchestrator, events } = setup(scripted({ structured: () => STRUCTURED }));

      const report = await orchestrator.generateReport(DIRECTIVE);

      expect(report.path).toBe('structured');
      expect(report.sections.map((s) => s.kind)).toEqual([...ASSEMBLY_ORDER]);
      expect(report.sections[0]).toMatchObject({
        kind: 'DirectiveResponse',
        body: { type: 'text', text: 'Revenue rose from 2024 to 2025 [S1].' },
        status: 'ok',
        sources: ['ar#page=3'],
      });
      expect(report.sections.find((s) => s.kind === 'RevenueGraphData')?.body).toEqual({
        type: 'series', unit: 'USD bn', points: [{ year: 2024, value: 20.736 }], plottable: false,
      });
      expect(report.references).toEqual([
        { label: '[R1] ar#page=3', sourceId: 'ar#page=3' },
        { label: '[R2] https://example.com/q4', sourceId: 'https://example.com/q4' },
      ]);
      expect(report.lowConfidence).toBe(false);
      expect(events.filter((e) => e.type === 'ReportAssembled')).toHaveLength(1);
    });

    it('falls back per section with the same section order', async () => {
      const structured = await setup(scripted({ structured: () => STRUCTURED })).orchestrator.generateReport(DIRECTIVE);
      const { orchestrator, events } = setup(scripted());

      const report = await orchestrator.generateReport(DIRECTIVE);

      expect(report.path).toBe('fallback');
      expect(report.sections.map((s) => s.kind)).toEqual(structured.sections.map((s) => s.kind));
      expect(report.sections.every((s) => s.status === 'ok')).toBe(true);
      expect(report.sections.find((s) => s.kind === 'TopProductsTable')?.body).toEqual({
        type: 'table',
        columns: ['Product', 'FY', 'Revenue (USD bn)', 'Source'],
        rows: [{ Product: 'Mobile Networks', FY: '2024', 'Revenue (USD bn)': '7.5', Source: '[S1]' }],
      });
      expect(events.filter((e) => e.type === 'StructuredAttemptFailed').map((e) => e.payload))
        .toEqual([{ reason: 'no JSON object in output' }]);
    });

    it('omits the directive section without a directive', async () => {
      const { orchestrator, backend } = setup(scripted());

      const report = await orchestrator.generateReport('');

      expect(report.sections.map((s) => s.kind)).toEqual(ASSEMBLY_ORDER.filter((k) => k !== 'DirectiveResponse'));
      expect(backend.calls.filter(isAnswerPrompt)).toHaveLength(8);
    });

    it('keeps finished sections when the model becomes unavailable and resumes them', async () => {
      let down = false;
      let answers = 0;
      const base = scripted();
      const { orchestrator, backend } = setup((request) => {
        if (down) throw new Error('service unavailable');
        if (isAnswerPrompt(request)) {
          answers++;
          if (answers === 3) down = true;
        }
        return base(request);
      });

      await expect(orchestrator.generateReport(DIRECTIVE)).rejects.toBeInstanceOf(UnavailableError);
      expect(orchestrator.pendingReportSections()).toEqual(['DirectiveResponse', 'Overview', 'Competitors']);

      down = false;
      const before = answers;
      const report = await orchestrator.generateReport(DIRECTIVE);

      expect(answers - before).toBe(6);
      expect(report.path).toBe('fallback');
      expect(report.sections.map((s) => s.kind)).toEqual([...ASSEMBLY_ORDER]);
      expect(orchestrator.pendingReportSections()).toEqual([]);
      expect(backend.calls.filter(isStructuredPrompt)).toHaveLength(1);
    });

    it('shares one timebox across research and every fallback section', async () => {
      let now = NOW;
      const corpus = new StaticAdapter('corpus', () => {
        now += 6 * 60_000;
        return [REPORT_SNIPPET];
      });
      const { orchestrator, backend, events } = setup(scripted(), { corpus, clock: () => now });

      const report = await orchestrator.generateReport(DIRECTIVE);

      expect(report.path).toBe('fallback');
      expect(report.sections.map((s) => s.kind)).toEqual([...ASSEMBLY_ORDER]);
      expect(backend.calls.filter(isPlannerPrompt)).toHaveLength(1);
      expect(backend.calls.filter(isAnswerPrompt)).toHaveLength(9);
      expect(report.warnings.filter((w) => w === TIMEBOX_WARNING)).toHaveLength(1);
      expect(events.filter((e) => e.type === 'TimeboxExpired')).toHaveLength(9);
    });

    it('rejects a blocked directive', async () => {
      const { orchestrator } = setup(scripted());
      await expect(orchestrator.generateReport('extremist content')).rejects.toBeInstanceOf(BlockedInputError);
    });
  });

  describe('evidenceCard', () => {
    const CLAIM = 'Nokia net sales were EUR 19.2 billion in 2024 [S1].';

    function cards(card: () => string): Responder {
      const base = scripted();
      return (request) => {
        if (request.prompt.startsWith('Answer concisely')) return CLAIM;
        if (request.prompt.startsWith('Build an evidence card')) return card();
        return base(request);
      };
    }

    it('answers without the model when the knowledge base is empty', async () => {
      const { orchestrator, backend } = setup(scripted());

      expect(await orchestrator.evidenceCard('What was Nokia revenue in 2024?')).toEqual({
        claim: 'No evidence found; run deep research first.',
        sources: [],
        evidence: 'Not publicly available',
        confidence: 0,
      });
      expect(backend.calls).toHaveLength(0);
    });

    it('builds the card from knowledge base snippets', async () => {
      const { orchestrator, backend } = setup(cards(() => JSON.stringify({
        sources: ['S1'],
        evidence: 'Nokia net sales were EUR 19.2 billion in 2024.',
        confidence: 0.9,
      })));
      await orchestrator.ask('What was Nokia revenue in 2024?');
      const before = backend.calls.length;

      const card = await orchestrator.evidenceCard('What was Nokia revenue in 2024?');

      expect(card).toEqual({
        claim: CLAIM,
        sources: ['ar#page=3'],
        evidence: 'Nokia net sales were EUR 19.2 billion in 2024.',
        confidence: 0.9,
      });
      expect(backend.calls.length - before).toBe(2);
    });

    it('falls back to the claim citations when the card does not validate', async () => {
      const { orchestrator } = setup(cards(() => 'not json'));
      await orchestrator.ask('What was Nokia revenue in 2024?');

      expect(await orchestrator.evidenceCard('What was Nokia revenue in 2024?')).toEqual({
        claim: CLAIM,
        sources: ['ar#page=3'],
        evidence: 'Nokia net sales were EUR 19.2 billion in 2024.',
        confidence: 0.6,
      });
    });

    it('rejects a blocked question', async () => {
      const { orchestrator } = setup(scripted());
      await expect(orchestrator.evidenceCard('terror funding at Nokia')).rejects.toBeInstanceOf(BlockedInputError);
    });
  });

  describe('clarifyingQuestions', () => {
    const isClarifyPrompt = (request: CompletionRequest) => request.prompt.startsWith('Before deep research on Nokia');

    it('returns the questions the model asks, with the directive in the prompt', async () => {
      const { orchestrator, backend } = setup(() =>
        '1. Which business units matter most?\n2. Should the plan cover fiscal 2023 as well?');

      const questions = await orchestrator.clarifyingQuestions(DIRECTIVE);

      expect(questions).toEqual(['Which business units matter most?', 'Should the plan cover fiscal 2023 as well?']);
      expect(backend.calls.filter(isClarifyPrompt)).toHaveLength(1);
      expect(backend.calls[0].prompt).toContain(`User directive: ${DIRECTIVE}`);
    });

    it('returns no questions when the model sees no need', async () => {
      const { orchestrator } = setup(() => 'NONE');
      expect(await orchestrator.clarifyingQuestions()).toEqual([]);
    });

    it('offers the stock follow-ups when the model is unavailable', async () => {
      const { orchestrator } = setup(() => {
        throw new Error('overloaded');
      });
      const questions = await orchestrator.clarifyingQuestions();
      expect(questions).toHaveLength(3);
      expect(questions[0]).toBe('Should I compare the last 3 years or focus on the latest year?');
    });
  });

  describe('deepResearch', () => {
    it('stops at the timebox and reports skipped topics', async () => {
      let now = NOW;
      let calls = 0;
      const corpus = new StaticAdapter('corpus', () => {
        calls++;
        now += 3 * 60_000;
        return [snippet(`memo#${calls}`, `Nokia research note ${calls}`)];
      });
      const { orchestrator } = setup(scripted(), { corpus, clock: () => now });

      const result = await orchestrator.deepResearch(['alpha', 'beta', 'gamma']);

      expect(result).toEqual({
        topicsCompleted: ['alpha', 'beta'],
        topicsSkipped: ['gamma'],
        addedSnippets: 2,
        addedFacts: 0,
        timedOut: true,
      });
    });
  });

  describe('refreshOverview', () => {
    it('summarises overview topics into the knowledge base and caches the result', async () => {
      const cache = new CacheManager(new MemoryCacheStore(), { ttlDays: 7, now: () => NOW });
      const { orchestrator, backend } = setup(scripted(), { cache });

      expect(await orchestrator.refreshOverview()).toBe('- Nokia makes network equipment.');
      expect(orchestrator.snapshot().overview).toBe('- Nokia makes network equipment.');

      await orchestrator.refreshOverview();
      expect(backend.calls).toHaveLength(1);

      await orchestrator.refreshOverview({ forceRefresh: true });
      expect(backend.calls).toHaveLength(2);
    });
  });

  it('rebuildKnowledge empties the knowledge base', async () => {
    const { orchestrator } = setup(scripted());
    await orchestrator.ask('What was Nokia revenue in 2024?');
    await orchestrator.rebuildKnowledge();
    expect(orchestrator.snapshot()).toMatchObject({ snippets: [], facts: [], overview: '' });
  });
});
