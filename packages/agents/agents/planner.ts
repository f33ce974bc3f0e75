// Planner agent — decides whether the knowledge base already covers a query
// and, if not, which sub-queries the retriever should run

import { randomUUID } from 'node:crypto';
import type { AgentRequest, ResearchPlan } from '../types/agents.js';
import type { KnowledgeSnapshot } from '../types/knowledge.js';
import type { LlmGateway } from '../llm/gateway.js';
import { UnavailableError } from '../llm/errors.js';
import { extractEntities, keyTerms } from '../utils/entities.js';
import { createLogger } from '../utils/logger.js';
import { PLAN_FOLLOWUPS, SYSTEM_BASE, clarifyPrompt, plannerPrompt } from './prompts.js';

const log = createLogger('Planner');

const DAY_MS = 86_400_000;
const MAX_CLARIFYING_QUESTIONS = 4;

// Explicit requests to answer from what is already known
const KB_ONLY_PHRASES = ['use kb', 'from cached', 'from pdf', 'from overview'];

export interface PlannerOptions {
  maxSubQueries: number;
  ttlDays: number;
  now?: () => number;
}

export interface Coverage {
  covered: boolean;
  missing: string[];
}

/** Strip bullets, numbering and quotes; drop blanks and case-insensitive duplicates. */
export function parseSubQueries(text: string, max: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const line of text.split('\n')) {
    const q = line
      .replace(/^\s*(?:[-*•]|\d+[.)]|Query\s*\d*:)\s*/i, '')
      .replace(/^["'`]+|["'`]+$/g, '')
      .trim();
    if (q === '' || seen.has(q.toLowerCase())) continue;
    seen.add(q.toLowerCase());
    out.push(q);
    if (out.length >= max) break;
  }
  return out;
}

export class PlannerAgent {
  readonly agentId = randomUUID();
  private readonly now: () => number;

  constructor(
    private readonly gateway: LlmGateway,
    private readonly options: PlannerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async plan(request: AgentRequest): Promise<ResearchPlan> {
    const { query, knowledge } = request;
    const followups = [...PLAN_FOLLOWUPS];
    const lower = query.text.toLowerCase();

    if (!query.forceRefresh && !isEmpty(knowledge)) {
      if (KB_ONLY_PHRASES.some((p) => lower.includes(p))) {
        return { retrievalNeeded: false, reason: 'user asked to answer from the knowledge base', subQueries: [], followups };
      }
      // Critic feedback about missing evidence always earns another look
      if (!request.feedback) {
        const coverage = this.coverage(query.text, knowledge);
        if (coverage.covered) {
          return { retrievalNeeded: false, reason: 'knowledge base covers every key entity', subQueries: [], followups };
        }
      }
    }

    const reason = query.forceRefresh
      ? 'forced refresh'
      : isEmpty(knowledge)
        ? 'knowledge base is empty'
        : request.feedback
          ? 'critic reported missing evidence'
          : `missing: ${this.coverage(query.text, knowledge).missing.join(', ')}`;

    let subQueries: string[] = [];
    try {
      const text = await this.gateway.generateText(
        plannerPrompt(query.company, query.text, this.options.maxSubQueries, request.feedback),
        { system: SYSTEM_BASE },
      );
      subQueries = parseSubQueries(text, this.options.maxSubQueries);
    } catch (err) {
      if (!(err instanceof UnavailableError)) throw err;
      log.warn('Planner LLM unavailable, using the query as the only sub-query', { company: query.company });
    }

    if (subQueries.length === 0) subQueries = [query.text];
    return { retrievalNeeded: true, reason, subQueries, followups };
  }

  /**
   * Up to four questions whose answers would sharpen the research; none when
   * the model sees no need, the stock follow-ups when it is unavailable.
   */
  async clarifyingQuestions(request: AgentRequest): Promise<string[]> {
    const { query, knowledge } = request;
    let text: string;
    try {
      text = await this.gateway.generateText(
        clarifyPrompt(query.company, knowledge, query.directive ?? ''),
        { system: SYSTEM_BASE },
      );
    } catch (err) {
      if (!(err instanceof UnavailableError)) throw err;
      log.warn('Planner LLM unavailable, offering the stock follow-ups', { company: query.company });
      return [...PLAN_FOLLOWUPS];
    }
    return parseSubQueries(text, MAX_CLARIFYING_QUESTIONS).filter((q) => q.toUpperCase() !== 'NONE');
  }

  /**
   * Every year and metric named in `text` must appear as a tag on a fresh
   * snippet (or, for years and revenue, as a financial fact). Without such
   * entities, every key term must appear in fresh evidence or the overview.
   */
  coverage(text: string, knowledge: KnowledgeSnapshot): Coverage {
    const ttlMs = this.options.ttlDays * DAY_MS;
    const now = this.now();

    if (!knowledge.updatedAt || now - knowledge.updatedAt.getTime() > ttlMs) {
      return { covered: false, missing: ['fresh knowledge'] };
    }

    const fresh = knowledge.snippets.filter((s) => now - s.retrievedAt.getTime() <= ttlMs);
    const tags = new Set(fresh.flatMap((s) => s.tags));
    const factYears = new Set(knowledge.facts.map((f) => f.year));
    const { years, metrics } = extractEntities(text);

    const missing: string[] = [];
    if (years.length > 0 || metrics.length > 0) {
      for (const year of years) {
        if (!tags.has(String(year)) && !factYears.has(year)) missing.push(String(year));
      }
      for (const metric of metrics) {
        const viaFacts = metric === 'revenue' && knowledge.facts.length > 0;
        if (!tags.has(metric) && !viaFacts) missing.push(metric);
      }
    } else {
      const haystack = `${knowledge.overview}\n${fresh.map((s) => s.text).join('\n')}`.toLowerCase();
      for (const term of keyTerms(text)) {
        if (!haystack.includes(term)) missing.push(term);
      }
    }
    return { covered: missing.length === 0, missing };
  }
}

function isEmpty(knowledge: KnowledgeSnapshot): boolean {
  return knowledge.snippets.length === 0 && knowledge.facts.length === 0 && knowledge.overview === '';
}
