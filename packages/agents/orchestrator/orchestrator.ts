// Orchestrator — drives Planner → Retriever → Synthesizer → Critic as an
// explicit bounded state machine, and the report pipeline with its
// structured-first / per-section fallback paths. Sole owner of the
// session's knowledge base.

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type {
  AgentRequest,
  AgentResponse,
  CritiqueVerdict,
  EvidenceCard,
  Query,
  ResearchPlan,
} from '../types/agents.js';
import type { KnowledgeSnapshot, MergeReport, Snippet } from '../types/knowledge.js';
import type { AccountPlanReport, ReportSection, SectionKind } from '../types/report.js';
import { ASSEMBLY_ORDER, SECTION_TITLES } from '../types/report.js';
import type { DomainEventType, EventBus } from '../types/events.js';
import { ALL_EVENT_TYPES, SimpleEventBus, createEvent } from '../types/events.js';
import type { Settings } from '../config/settings.js';
import type { LlmGateway } from '../llm/gateway.js';
import { UnavailableError } from '../llm/errors.js';
import type { SourceAdapter } from '../sources/types.js';
import { SnippetListSchema } from '../sources/snippet.js';
import type { CacheManager } from '../cache/cache-manager.js';
import { cacheKey } from '../cache/cache-manager.js';
import { PlannerAgent } from '../agents/planner.js';
import { RetrieverAgent } from '../agents/retriever.js';
import type { RetrievalResult } from '../agents/retriever.js';
import { SynthesizerAgent, citedSources, selectEvidence } from '../agents/synthesizer.js';
import { CriticAgent } from '../agents/critic.js';
import {
  OVERVIEW_TOPICS,
  RESEARCH_TOPICS,
  formatEvidence,
  overviewPrompt,
  SYSTEM_BASE,
} from '../agents/prompts.js';
import { extractRevenueFacts } from '../utils/financial-parser.js';
import { BLOCKED_MESSAGE, OFF_TOPIC_REDIRECT, applyGuardrails, isOnTopic } from '../utils/guardrails.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { KnowledgeBase } from './knowledge-base.js';
import { Timebox } from './timebox.js';
import type { Clock } from './timebox.js';
import {
  assembleReport,
  revenueSeries,
  section,
  sectionsFromStructured,
  textSection,
  topProductsFromMarkdown,
} from './report-assembler.js';

const log = createLogger('Orchestrator');

// ── Public types ─────────────────────────────────────────────────────

export interface OrchestratorConfig {
  company: string;
  settings: Readonly<Settings>;
  gateway: LlmGateway;
  corpus: SourceAdapter;
  web: SourceAdapter;
  cache?: CacheManager;
  events?: EventBus;
  onEvent?: (event: { type: DomainEventType; payload: unknown }) => void;
  clock?: Clock;
}

export interface RequestOptions {
  forceRefresh?: boolean;
}

export interface AskResult {
  answer: string;
  sources: string[];
  followups: string[];
  lowConfidence: boolean;
  warnings: string[];
  /** Critic retries consumed */
  retries: number;
  status: 'answered' | 'blocked' | 'off_topic';
}

export interface DeepResearchResult {
  topicsCompleted: string[];
  topicsSkipped: string[];
  addedSnippets: number;
  addedFacts: number;
  timedOut: boolean;
}

/** Input refused by the guardrails. */
export class BlockedInputError extends Error {
  constructor(public readonly reason: string) {
    super(BLOCKED_MESSAGE);
    this.name = 'BlockedInputError';
  }
}

// ── Agent loop ───────────────────────────────────────────────────────

type LoopState = 'planning' | 'retrieving' | 'synthesizing' | 'critiquing' | 'done';

interface LoopContext {
  readonly query: Query;
  readonly timebox: Timebox;
  state: LoopState;
  retries: number;
  feedback?: string;
  plan: ResearchPlan | null;
  candidate: AgentResponse | null;
  verdict: CritiqueVerdict | null;
  lowConfidence: boolean;
  warnings: string[];
}

interface LoopOutcome {
  response: AgentResponse;
  plan: ResearchPlan | null;
  retries: number;
  warnings: string[];
}

type Synthesize = (request: AgentRequest) => Promise<AgentResponse>;

interface ReportRun {
  directive: string;
  sections: Map<SectionKind, ReportSection>;
  warnings: string[];
}

const OverviewCacheSchema = z.object({
  summary: z.string(),
  snippets: SnippetListSchema,
});

export class Orchestrator {
  readonly company: string;
  readonly sessionId = randomUUID();
  private readonly settings: Readonly<Settings>;
  private readonly gateway: LlmGateway;
  private readonly cache?: CacheManager;
  private readonly eventBus: EventBus;
  private readonly clock: Clock;
  private readonly knowledge: KnowledgeBase;
  private readonly planner: PlannerAgent;
  private readonly retriever: RetrieverAgent;
  private readonly synthesizer: SynthesizerAgent;
  private readonly critic: CriticAgent;
  private reportRun: ReportRun | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(config: OrchestratorConfig) {
    this.company = config.company.trim();
    this.settings = config.settings;
    this.gateway = config.gateway;
    this.cache = config.cache;
    this.eventBus = config.events ?? new SimpleEventBus();
    this.clock = config.clock ?? Date.now;
    this.knowledge = new KnowledgeBase(this.company, () => new Date(this.clock()));

    const { settings } = config;
    this.planner = new PlannerAgent(this.gateway, {
      maxSubQueries: settings.research.maxSubQueries,
      ttlDays: settings.cache.ttlDays,
      now: this.clock,
    });
    this.retriever = new RetrieverAgent(config.corpus, config.web, {
      ...settings.retrieval,
      cache: config.cache,
      events: this.eventBus,
    });
    this.synthesizer = new SynthesizerAgent(this.gateway, settings.currency.report);
    this.critic = new CriticAgent();

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of ALL_EVENT_TYPES) {
        this.eventBus.on(type, (e) => handler({ type: e.type, payload: e.payload }));
      }
    }
  }

  snapshot(): KnowledgeSnapshot {
    return this.knowledge.snapshot();
  }

  /** Sections kept from an interrupted report run, if any. */
  pendingReportSections(): SectionKind[] {
    return this.reportRun ? [...this.reportRun.sections.keys()] : [];
  }

  // ── Chat ───────────────────────────────────────────────────────────

  ask(question: string, options: RequestOptions = {}): Promise<AskResult> {
    return this.exclusive(async () => {
      const guarded = applyGuardrails(question);
      if (!guarded.allowed) {
        log.warn('Question blocked', { reason: guarded.reason });
        return this.fixedAnswer(BLOCKED_MESSAGE, 'blocked');
      }
      if (!isOnTopic(guarded.text, this.company)) {
        return this.fixedAnswer(OFF_TOPIC_REDIRECT, 'off_topic');
      }

      const query: Query = {
        text: guarded.text,
        origin: 'chat',
        company: this.company,
        forceRefresh: options.forceRefresh,
      };
      this.emit('RequestStarted', { kind: 'ask', text: query.text });

      const timebox = Timebox.minutes(this.settings.research.timeboxMinutes, this.clock);
      const outcome = await this.runLoop(query, (req) => this.synthesizer.answer(req), timebox);
      const warnings = guarded.truncated ? ['Question truncated to 6000 characters.', ...outcome.warnings] : outcome.warnings;
      return {
        answer: outcome.response.text,
        sources: [...outcome.response.usedSources],
        followups: [...(outcome.plan?.followups ?? [])],
        lowConfidence: outcome.response.lowConfidence,
        warnings,
        retries: outcome.retries,
        status: 'answered',
      };
    });
  }

  // ── Report ─────────────────────────────────────────────────────────

  /**
   * Structured attempt first; on a validation failure every section goes
   * through the agent loop. Throws UnavailableError when the LLM is
   * exhausted; sections finished before that are reused by the next call
   * with the same directive.
   */
  generateReport(directive: string, options: RequestOptions = {}): Promise<AccountPlanReport> {
    return this.exclusive(async () => {
      const guarded = applyGuardrails(directive);
      if (!guarded.allowed) throw new BlockedInputError(guarded.reason);
      const text = guarded.text;

      if (this.reportRun?.directive !== text) {
        this.reportRun = { directive: text, sections: new Map(), warnings: [] };
      }
      const run = this.reportRun;
      if (guarded.truncated && run.warnings.length === 0) run.warnings.push('Directive truncated to 6000 characters.');

      const query: Query = {
        text: text || `${this.company} account plan`,
        origin: 'report',
        company: this.company,
        directive: text || undefined,
        forceRefresh: options.forceRefresh,
      };
      this.emit('RequestStarted', { kind: 'report', directive: text, resumedSections: run.sections.size });

      // One timebox covers research, the structured attempt and every fallback section.
      const timebox = Timebox.minutes(this.settings.research.timeboxMinutes, this.clock);
      let report: AccountPlanReport;
      if (run.sections.size === 0) {
        await this.research(query, timebox);
        report = await this.structuredOrFallback(query, run, timebox);
      } else {
        log.info('Resuming report run', { sections: [...run.sections.keys()] });
        report = await this.fallbackReport(query, run, timebox);
      }

      this.reportRun = null;
      this.emit('ReportAssembled', {
        path: report.path,
        sections: report.sections.map((s) => `${s.kind}:${s.status}`),
        lowConfidence: report.lowConfidence,
      });
      return report;
    });
  }

  private async structuredOrFallback(query: Query, run: ReportRun, timebox: Timebox): Promise<AccountPlanReport> {
    const request = this.request(query, 0);
    const result = await this.synthesizer.synthesizeReport(request);

    if (result.kind === 'validation_failure') {
      log.warn('Structured generation failed validation, falling back per section', { reason: result.reason });
      this.emit('StructuredAttemptFailed', { reason: result.reason });
      return this.fallbackReport(query, run, timebox);
    }

    const knowledge = this.knowledge.snapshot();
    const evidence = selectEvidence(knowledge.snippets, `${query.directive ?? ''} ${query.text}`);
    const sections = sectionsFromStructured(
      result.value,
      knowledge.facts,
      this.settings.currency.report,
      (text) => citedSources(text, evidence),
    );
    return assembleReport({
      company: this.company,
      directive: query.directive ?? '',
      path: 'structured',
      sections,
      snippets: knowledge.snippets,
      warnings: run.warnings,
    });
  }

  private async fallbackReport(query: Query, run: ReportRun, timebox: Timebox): Promise<AccountPlanReport> {
    const currency = this.settings.currency.report;

    for (const kind of ASSEMBLY_ORDER) {
      if (run.sections.has(kind)) continue;
      if (kind === 'DirectiveResponse' && !query.directive) continue;
      if (kind === 'RevenueGraphData') continue;

      const sectionQuery: Query = kind === 'DirectiveResponse'
        ? query
        : { ...query, text: `${this.company} ${SECTION_TITLES[kind]}` };
      const outcome = await this.runLoop(sectionQuery, (req) => this.synthesizer.synthesizeSection(req, kind), timebox);
      for (const warning of outcome.warnings) {
        if (!run.warnings.includes(warning)) run.warnings.push(warning);
      }

      const { response } = outcome;
      const status = response.lowConfidence ? 'low_confidence' : 'ok';
      let built: ReportSection;
      if (kind === 'TopProductsTable') {
        const table = topProductsFromMarkdown(response.text, currency);
        built = table
          ? section(kind, table, status, response.usedSources)
          : section(kind, { type: 'text', text: response.text }, 'low_confidence', response.usedSources);
      } else {
        built = textSection(kind, response.text, response.usedSources);
        if (built.status === 'ok') built.status = status;
      }
      run.sections.set(kind, built);
      this.emit('SectionGenerated', { kind, status: built.status, retries: outcome.retries });
    }

    const knowledge = this.knowledge.snapshot();
    const factSources = [...new Set(knowledge.facts.map((f) => f.sourceId))];
    run.sections.set('RevenueGraphData',
      section('RevenueGraphData', revenueSeries(knowledge.facts, [], currency), 'ok', factSources));

    return assembleReport({
      company: this.company,
      directive: query.directive ?? '',
      path: 'fallback',
      sections: run.sections,
      snippets: knowledge.snippets,
      warnings: run.warnings,
    });
  }

  // ── Evidence cards and clarifying questions ──────────────────────────

  /** A claim answering `question` from the knowledge base alone, with its best sources. */
  evidenceCard(question: string): Promise<EvidenceCard> {
    return this.exclusive(async () => {
      const guarded = applyGuardrails(question);
      if (!guarded.allowed) throw new BlockedInputError(guarded.reason);
      const query: Query = { text: guarded.text, origin: 'chat', company: this.company };
      this.emit('RequestStarted', { kind: 'evidence', text: query.text });
      return this.synthesizer.evidenceCard(this.request(query, 0));
    });
  }

  /** Questions worth putting to the user before deep research or a report. */
  clarifyingQuestions(directive = ''): Promise<string[]> {
    return this.exclusive(async () => {
      const guarded = applyGuardrails(directive);
      if (!guarded.allowed) throw new BlockedInputError(guarded.reason);
      const query: Query = {
        text: guarded.text || `${this.company} account plan`,
        origin: 'report',
        company: this.company,
        directive: guarded.text || undefined,
      };
      this.emit('RequestStarted', { kind: 'clarify', directive: guarded.text });
      return this.planner.clarifyingQuestions(this.request(query, 0));
    });
  }

  // ── Overview, deep research, rebuild ───────────────────────────────

  /** Search overview topics and summarise them into the knowledge base overview. Cached per company. */
  refreshOverview(options: RequestOptions = {}): Promise<string> {
    return this.exclusive(async () => {
      const load = async (): Promise<z.infer<typeof OverviewCacheSchema>> => {
        const retrieval = await this.retriever.retrieve(
          OVERVIEW_TOPICS.map((t) => `${this.company} ${t}`),
          { company: this.company, forceRefresh: options.forceRefresh },
        );
        const summary = await this.gateway.generateText(
          overviewPrompt(this.company, formatEvidence(retrieval.snippets)),
          { system: SYSTEM_BASE },
        );
        return { summary, snippets: retrieval.snippets };
      };

      const overview = this.cache
        ? await this.cache.getOrLoad(cacheKey(this.company, 'overview'), OverviewCacheSchema, load, options)
        : await load();

      this.mergeKnowledge(overview.snippets, overview.summary);
      return overview.summary;
    });
  }

  /** Planner/Retriever cycles over research topics until done or the timebox closes. */
  deepResearch(topics: readonly string[] = RESEARCH_TOPICS, options: RequestOptions = {}): Promise<DeepResearchResult> {
    return this.exclusive(async () => {
      const timebox = Timebox.minutes(this.settings.research.timeboxMinutes, this.clock);
      const result: DeepResearchResult = {
        topicsCompleted: [], topicsSkipped: [], addedSnippets: 0, addedFacts: 0, timedOut: false,
      };

      for (const [i, topic] of topics.entries()) {
        if (timebox.expired) {
          result.timedOut = true;
          result.topicsSkipped.push(...topics.slice(i));
          this.emit('TimeboxExpired', { during: 'deepResearch', skipped: topics.length - i });
          break;
        }
        const query: Query = {
          text: `${this.company} ${topic}`,
          origin: 'chat',
          company: this.company,
          forceRefresh: options.forceRefresh,
        };
        const merged = await this.research(query, timebox);
        result.addedSnippets += merged?.addedSnippets ?? 0;
        result.addedFacts += merged?.addedFacts ?? 0;
        result.topicsCompleted.push(topic);
      }
      return result;
    });
  }

  /** Clear the knowledge base and any interrupted report run. */
  rebuildKnowledge(): Promise<void> {
    return this.exclusive(async () => {
      this.knowledge.rebuild();
      this.reportRun = null;
    });
  }

  // ── Loop internals ─────────────────────────────────────────────────

  /** `timebox` belongs to the calling request; every loop it runs shares it. */
  private async runLoop(query: Query, synthesize: Synthesize, timebox: Timebox): Promise<LoopOutcome> {
    const ctx: LoopContext = {
      query,
      timebox,
      state: 'planning',
      retries: 0,
      plan: null,
      candidate: null,
      verdict: null,
      lowConfidence: false,
      warnings: [],
    };
    const maxRetries = this.settings.research.criticMaxRetries;

    while (ctx.state !== 'done') {
      switch (ctx.state) {
        case 'planning': {
          if (this.timeboxClosed(ctx)) {
            ctx.state = 'synthesizing';
            break;
          }
          ctx.plan = await this.planner.plan(this.request(query, ctx.retries, ctx.feedback));
          this.emit('PlanCreated', {
            retrievalNeeded: ctx.plan.retrievalNeeded,
            reason: ctx.plan.reason,
            subQueries: ctx.plan.subQueries,
          });
          ctx.state = ctx.plan.retrievalNeeded ? 'retrieving' : 'synthesizing';
          break;
        }

        case 'retrieving': {
          if (ctx.plan && !this.timeboxClosed(ctx)) {
            await this.retrieveAndMerge(ctx.plan.subQueries, query);
          }
          ctx.state = 'synthesizing';
          break;
        }

        case 'synthesizing': {
          try {
            ctx.candidate = await synthesize(this.request(query, ctx.retries, ctx.feedback));
          } catch (err) {
            if (!(err instanceof UnavailableError) || !ctx.candidate) throw err;
            log.warn('Retry synthesis unavailable, keeping the previous candidate', { error: err.message });
            ctx.warnings.push('The model became unavailable during revision; returning the previous draft.');
            ctx.lowConfidence = true;
            ctx.state = 'done';
            break;
          }
          this.emit('CandidateSynthesized', {
            attempt: ctx.retries,
            usedSources: ctx.candidate.usedSources.length,
            confidence: ctx.candidate.confidence,
          });
          ctx.state = 'critiquing';
          break;
        }

        case 'critiquing': {
          if (!ctx.candidate) throw new Error('critiquing without a candidate');
          const verdict = this.critic.review(ctx.candidate, query);
          ctx.verdict = verdict;
          this.emit('CritiqueCompleted', { attempt: ctx.retries, ...verdict });

          if (verdict.verdict === 'accept') {
            ctx.state = 'done';
          } else if (ctx.retries >= maxRetries) {
            log.info('Critic retry budget exhausted, returning last candidate', { retries: ctx.retries });
            ctx.lowConfidence = true;
            ctx.state = 'done';
          } else {
            ctx.retries++;
            ctx.feedback = verdict.feedback;
            ctx.state = verdict.missingEvidence && !ctx.timebox.expired ? 'planning' : 'synthesizing';
          }
          break;
        }
      }
    }

    if (!ctx.candidate) throw new Error('agent loop finished without a candidate');
    return {
      response: { ...ctx.candidate, lowConfidence: ctx.lowConfidence },
      plan: ctx.plan,
      retries: ctx.retries,
      warnings: ctx.warnings,
    };
  }

  /** One plan + retrieve cycle that only grows the knowledge base. */
  private async research(query: Query, timebox: Timebox): Promise<MergeReport | null> {
    if (timebox.expired) {
      this.emit('TimeboxExpired', { during: 'research', query: query.text });
      return null;
    }
    const plan = await this.planner.plan(this.request(query, 0));
    this.emit('PlanCreated', { retrievalNeeded: plan.retrievalNeeded, reason: plan.reason, subQueries: plan.subQueries });
    if (!plan.retrievalNeeded) return null;
    return this.retrieveAndMerge(plan.subQueries, query);
  }

  private async retrieveAndMerge(subQueries: readonly string[], query: Query): Promise<MergeReport> {
    const result: RetrievalResult = await this.retriever.retrieve(subQueries, {
      company: this.company,
      forceRefresh: query.forceRefresh,
    });
    this.emit('RetrievalCompleted', {
      subQueries: subQueries.length,
      corpus: result.corpusCount,
      web: result.webCount,
      kept: result.snippets.length,
      disabled: result.disabled,
      failures: result.failures.length,
    });
    return this.mergeKnowledge(result.snippets);
  }

  private mergeKnowledge(snippets: readonly Snippet[], overview?: string): MergeReport {
    const { currency } = this.settings;
    const facts = snippets.flatMap((s) => extractRevenueFacts(s.title ? `${s.title}. ${s.text}` : s.text, {
      sourceId: s.sourceId,
      sourceKind: s.sourceKind,
      currency: currency.report,
      eurUsdRate: currency.eurUsdRate,
    }));
    const report = this.knowledge.merge({ snippets, facts, overview });
    this.emit('KnowledgeMerged', {
      addedSnippets: report.addedSnippets,
      duplicateSnippets: report.duplicateSnippets,
      addedFacts: report.addedFacts,
      conflicts: report.conflicts.length,
    });
    return report;
  }

  private timeboxClosed(ctx: LoopContext): boolean {
    if (!ctx.timebox.expired) return false;
    this.emit('TimeboxExpired', { during: 'loop', query: ctx.query.text });
    ctx.warnings.push('Research timebox reached; answering from the knowledge gathered so far.');
    return true;
  }

  private request(query: Query, attempt: number, feedback?: string): AgentRequest {
    return { query, knowledge: this.knowledge.snapshot(), feedback, attempt };
  }

  private fixedAnswer(answer: string, status: AskResult['status']): AskResult {
    return { answer, sources: [], followups: [], lowConfidence: false, warnings: [], retries: 0, status };
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    try {
      this.eventBus.emit(createEvent(type, 'orchestrator', payload));
    } catch (err) {
      log.warn('Event handler failed', { type, error: errorMessage(err) });
    }
  }

  /** One in-flight call per session; later calls wait their turn. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.tail.then(fn);
    this.tail = next.then(() => undefined, () => undefined);
    return next;
  }
}
