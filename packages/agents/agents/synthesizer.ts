// Synthesizer agent — turns the knowledge snapshot into a candidate answer,
// a per-section draft, or a structured (JSON) account plan

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { AgentRequest, AgentResponse, EvidenceCard } from '../types/agents.js';
import type { Snippet } from '../types/knowledge.js';
import type { SectionKind } from '../types/report.js';
import type { LlmGateway, StructuredResult } from '../llm/gateway.js';
import { UnavailableError } from '../llm/errors.js';
import { extractYears, keyTerms } from '../utils/entities.js';
import { createLogger } from '../utils/logger.js';
import { cleanText, firstParagraph, truncate } from '../utils/text.js';
import {
  NOT_PUBLIC,
  NO_EVIDENCE_CLAIM,
  SYSTEM_BASE,
  answerPrompt,
  claimPrompt,
  evidenceCardPrompt,
  formatEvidence,
  formatFacts,
  sectionPrompt,
  structuredReportPrompt,
} from './prompts.js';

const log = createLogger('Synthesizer');

// ── Structured report schema ─────────────────────────────────────────

const TEXT_FIELDS = [
  'overview', 'competitors', 'marketPosition', 'financialSummary',
  'swot', 'strategy', 'structuredInsights',
] as const;

export const TopProductSchema = z.object({
  product: z.string().min(1),
  fiscalYear: z.coerce.number().int(),
  revenue: z.number().nullable().default(null),
  source: z.string().default(''),
});

export const StructuredReportSchema = z.object({
  directiveResponse: z.string().optional(),
  overview: z.string(),
  competitors: z.string(),
  marketPosition: z.string(),
  financialSummary: z.string(),
  swot: z.string(),
  strategy: z.string(),
  structuredInsights: z.string(),
  topProducts: z.array(TopProductSchema).default([]),
  revenueSeries: z.array(z.object({ year: z.number().int(), value: z.number() })).default([]),
});

export type StructuredReport = z.infer<typeof StructuredReportSchema>;
export type TopProduct = z.infer<typeof TopProductSchema>;

/** The base schema, plus: a directive requires a directive response, and some section must have content. */
export function reportSchemaFor(directive: string) {
  return StructuredReportSchema
    .refine((r) => TEXT_FIELDS.some((f) => r[f].trim() !== ''), {
      message: 'every section is empty',
    })
    .refine((r) => directive.trim() === '' || (r.directiveResponse ?? '').trim() !== '', {
      message: 'directiveResponse is required when a directive is given',
      path: ['directiveResponse'],
    });
}

export const EvidenceCardSchema = z.object({
  sources: z.array(z.string()).default([]),
  evidence: z.string().min(1),
  confidence: z.coerce.number().min(0).max(1),
});

// ── Evidence selection and citation tracking ─────────────────────────

const MAX_PROMPT_SNIPPETS = 12;
const CARD_SNIPPETS = 5;
const MAX_CARD_SOURCES = 2;
const MAX_CARD_EVIDENCE_CHARS = 280;

/** Most relevant snippets first; corpus before web on ties, then original order. */
export function selectEvidence(snippets: readonly Snippet[], text: string, max = MAX_PROMPT_SNIPPETS): Snippet[] {
  const terms = keyTerms(text);
  const years = extractYears(text).map(String);
  return snippets
    .map((snippet, index) => {
      const haystack = `${snippet.title ?? ''} ${snippet.text}`.toLowerCase();
      const score = terms.filter((t) => haystack.includes(t)).length
        + 2 * years.filter((y) => snippet.tags.includes(y)).length;
      return { snippet, index, score };
    })
    .sort((a, b) =>
      b.score - a.score
      || Number(a.snippet.sourceKind === 'web') - Number(b.snippet.sourceKind === 'web')
      || a.index - b.index)
    .slice(0, max)
    .map((s) => s.snippet);
}

/** Source ids cited by `[S#]` marker (numbered against `evidence`) or by verbatim URL. */
export function citedSources(text: string, evidence: readonly Snippet[]): string[] {
  const used = new Set<string>();
  for (const bracket of text.matchAll(/\[([^\]]*S\d+[^\]]*)\]/g)) {
    for (const m of bracket[1].matchAll(/S(\d+)/g)) {
      const snippet = evidence[Number(m[1]) - 1];
      if (snippet) used.add(snippet.sourceId);
    }
  }
  for (const snippet of evidence) {
    if (snippet.sourceKind === 'web' && text.includes(snippet.sourceId)) used.add(snippet.sourceId);
  }
  return [...used];
}

/**
 * Prepend a lead paragraph restating the directive unless the first
 * paragraph already names its years and at least half of its key terms.
 */
export function ensureDirectiveLead(text: string, directive: string | undefined): string {
  const d = directive?.trim();
  if (!d) return text;

  const lead = firstParagraph(text).toLowerCase();
  const years = extractYears(d).map(String);
  const terms = keyTerms(d);
  const yearsOk = years.every((y) => lead.includes(y));
  const termHits = terms.filter((t) => lead.includes(t)).length;
  if (yearsOk && termHits >= Math.ceil(terms.length / 2)) return text;

  return `**Directive:** ${d}\n\n${text}`;
}

function confidenceFor(used: number): number {
  return used === 0 ? 0.3 : Math.min(1, 0.5 + 0.1 * used);
}

// ── Agent ────────────────────────────────────────────────────────────

export class SynthesizerAgent {
  readonly agentId = randomUUID();

  constructor(
    private readonly gateway: LlmGateway,
    private readonly currency: string = 'USD',
  ) {}

  /** Free-form answer to the query. Throws UnavailableError from the gateway. */
  async answer(request: AgentRequest): Promise<AgentResponse> {
    return this.compose(request, request.query.text);
  }

  /** Free-form draft of one report section, used by the per-section fallback. */
  async synthesizeSection(request: AgentRequest, kind: SectionKind): Promise<AgentResponse> {
    const { query } = request;
    const question = kind === 'DirectiveResponse' && query.directive
      ? query.directive
      : sectionPrompt(kind, query.company, query.directive ?? '');
    return this.compose(request, question, kind === 'DirectiveResponse');
  }

  /** Full account plan in one schema-constrained call. */
  async synthesizeReport(request: AgentRequest): Promise<StructuredResult<StructuredReport>> {
    const { query, knowledge } = request;
    const directive = query.directive ?? '';
    const evidence = selectEvidence(knowledge.snippets, `${directive} ${query.text}`);
    const prompt = structuredReportPrompt(query.company, directive, knowledge, formatEvidence(evidence), this.currency);

    const result = await this.gateway.generateStructured(prompt, reportSchemaFor(directive), { system: SYSTEM_BASE });
    if (result.kind !== 'success') return result;

    const value = result.value;
    const cleaned: StructuredReport = {
      ...value,
      overview: cleanText(value.overview),
      competitors: cleanText(value.competitors),
      marketPosition: cleanText(value.marketPosition),
      financialSummary: cleanText(value.financialSummary),
      swot: cleanText(value.swot),
      strategy: cleanText(value.strategy),
      structuredInsights: cleanText(value.structuredInsights),
      directiveResponse: value.directiveResponse === undefined
        ? undefined
        : ensureDirectiveLead(cleanText(value.directiveResponse), directive),
    };
    return { ...result, value: cleaned };
  }

  /**
   * Short claim answering the query from knowledge-base snippets alone, with
   * the one or two sources behind it. When the card call fails validation or
   * names no known source, the card is built from the claim's own citations.
   */
  async evidenceCard(request: AgentRequest): Promise<EvidenceCard> {
    const { query, knowledge } = request;
    const evidence = selectEvidence(knowledge.snippets, query.text, CARD_SNIPPETS);
    if (evidence.length === 0) {
      return { claim: NO_EVIDENCE_CLAIM, sources: [], evidence: NOT_PUBLIC, confidence: 0 };
    }

    const formatted = formatEvidence(evidence);
    const claim = cleanText(await this.gateway.generateText(
      claimPrompt(query.company, query.text, formatted),
      { system: SYSTEM_BASE },
    ));
    const cited = citedSources(claim, evidence);

    try {
      const result = await this.gateway.generateStructured(evidenceCardPrompt(claim, formatted), EvidenceCardSchema);
      if (result.kind === 'success') {
        const markers = result.value.sources.map((s) => `[${s}]`).join(' ');
        const sources = citedSources(markers, evidence).slice(0, MAX_CARD_SOURCES);
        if (sources.length > 0) {
          return {
            claim,
            sources,
            evidence: truncate(cleanText(result.value.evidence), MAX_CARD_EVIDENCE_CHARS),
            confidence: result.value.confidence,
          };
        }
      } else {
        log.warn('Evidence card failed validation, building it from citations', { reason: result.reason });
      }
    } catch (err) {
      if (!(err instanceof UnavailableError)) throw err;
      log.warn('Evidence card call unavailable, building it from citations', { error: err.message });
    }

    const sources = (cited.length > 0 ? cited : [evidence[0].sourceId]).slice(0, MAX_CARD_SOURCES);
    const lead = evidence.find((s) => s.sourceId === sources[0]) ?? evidence[0];
    return {
      claim,
      sources,
      evidence: truncate(lead.text, MAX_CARD_EVIDENCE_CHARS),
      confidence: confidenceFor(cited.length),
    };
  }

  private async compose(request: AgentRequest, question: string, directiveLead = true): Promise<AgentResponse> {
    const { query, knowledge, feedback } = request;
    const evidence = selectEvidence(knowledge.snippets, `${query.text} ${question}`);

    const raw = await this.gateway.generateText(answerPrompt({
      company: query.company,
      question,
      directive: directiveLead ? query.directive : undefined,
      overview: knowledge.overview,
      facts: formatFacts(knowledge),
      evidence: formatEvidence(evidence),
      feedback,
    }), { system: SYSTEM_BASE });

    const text = directiveLead ? ensureDirectiveLead(raw, query.directive) : raw;
    const usedSources = citedSources(text, evidence);
    return {
      text,
      valid: text.trim() !== '',
      confidence: confidenceFor(usedSources.length),
      usedSources,
      inference: usedSources.length === 0,
      lowConfidence: false,
    };
  }
}
