// Prompt builders shared by the planner, synthesizer and orchestrator

import type { Snippet, KnowledgeSnapshot } from '../types/knowledge.js';
import type { SectionKind } from '../types/report.js';
import { SECTION_TITLES } from '../types/report.js';
import { formatBillions } from '../utils/financial-parser.js';

export const NOT_PUBLIC = 'Not publicly available';

export const SYSTEM_BASE = [
  'You are a research-driven assistant for company analysis and account planning.',
  'Synthesize concise, useful analysis aligned with the user\'s intent from the evidence provided.',
  'Cite evidence with its [S#] marker. When a statement is your own inference rather than sourced, say so.',
  'Use clean Markdown without escaped characters, and put a space between units and numbers (e.g. "USD 19.22 bn").',
  'Never output ASCII graphs.',
  `If data is not publicly available, say exactly "${NOT_PUBLIC}".`,
].join(' ');

const MAX_SNIPPET_CHARS = 600;

/** Number snippets `[S1]…` for citation; the index maps markers back to sources. */
export function formatEvidence(snippets: readonly Snippet[]): string {
  if (snippets.length === 0) return '(no evidence retrieved)';
  return snippets
    .map((s, i) => {
      const text = s.text.length > MAX_SNIPPET_CHARS ? `${s.text.slice(0, MAX_SNIPPET_CHARS)}…` : s.text;
      const title = s.title ? `${s.title}: ` : '';
      return `[S${i + 1}] ${title}${text} (${s.sourceKind}: ${s.sourceId})`;
    })
    .join('\n');
}

export function formatFacts(knowledge: KnowledgeSnapshot): string {
  if (knowledge.facts.length === 0) return '(none)';
  return knowledge.facts
    .map((f) => `- FY${f.year}: ${formatBillions(f.value, f.currency)} (${f.sourceKind}: ${f.sourceId})`)
    .join('\n');
}

export function plannerPrompt(company: string, request: string, maxSubQueries: number, feedback?: string): string {
  const lines = [
    `Derive up to ${maxSubQueries} focused web search queries from the user's request.`,
    'Queries MUST be specific to the company and the years, metrics and entities mentioned.',
    'No bullets, no commentary: one query per line.',
    '',
    `Company: ${company}`,
    `User request: ${request}`,
  ];
  if (feedback) lines.push(`The previous answer was missing: ${feedback}`);
  return lines.join('\n');
}

export interface AnswerPromptInput {
  company: string;
  question: string;
  directive?: string;
  overview: string;
  facts: string;
  evidence: string;
  feedback?: string;
}

export function answerPrompt(input: AnswerPromptInput): string {
  const lines = [
    `Company: ${input.company}`,
    `Question: ${input.question}`,
  ];
  if (input.directive) {
    lines.push(`Directive: ${input.directive}`);
  }
  lines.push(
    '',
    'Produce a direct, well-reasoned answer with:',
    input.directive
      ? '- a first paragraph that restates and answers the directive'
      : '- one short paragraph answering the question and naming the key drivers',
    '- 3 to 5 bullets of implications or suggestions (not a restatement of the data)',
    'Rules:',
    '- cite every sourced figure with its [S#] marker',
    '- if evidence is missing, say what is missing and mark conclusions as inference',
  );
  if (input.feedback) {
    lines.push('', `Reviewer feedback on the previous draft: ${input.feedback}`);
  }
  lines.push(
    '',
    `Company overview:\n${input.overview || '(none yet)'}`,
    '',
    `Known revenue figures:\n${input.facts}`,
    '',
    `Evidence:\n${input.evidence}`,
  );
  return lines.join('\n');
}

const SECTION_GUIDANCE: Record<SectionKind, string> = {
  DirectiveResponse: 'Explicitly address the directive: comparisons, reasons and next steps.',
  Overview: '3 to 5 bullets describing the business.',
  Competitors: '6 to 10 competitors, one line each as "Name: descriptor".',
  MarketPosition: '2 to 4 bullets on market position.',
  FinancialSummary: 'Revenue and growth by year, with figures and sources.',
  SWOT: 'Strengths, Weaknesses, Opportunities and Threats, 4 to 6 bullets each.',
  Strategy: 'Recommended account strategy and next steps.',
  StructuredInsights: 'Cross-cutting insights an account team can act on.',
  TopProductsTable:
    'A Markdown table with columns | Product | FY | Revenue | Source |, one row per product or segment. '
    + `Write "${NOT_PUBLIC}" in any cell whose figure is not in the evidence.`,
  RevenueGraphData: 'Annual revenue by year, one line per year as "YYYY: value".',
};

export function sectionPrompt(kind: SectionKind, company: string, directive: string): string {
  const focus = directive ? ` Keep the user's directive in mind: ${directive}` : '';
  return `Write the "${SECTION_TITLES[kind]}" section of an account plan for ${company}. `
    + `${SECTION_GUIDANCE[kind]}${focus}`;
}

export function structuredReportPrompt(
  company: string,
  directive: string,
  knowledge: KnowledgeSnapshot,
  evidence: string,
  currency: string,
): string {
  return [
    `Create a structured account plan for ${company}.`,
    directive ? `User directive: ${directive}` : 'No directive was given.',
    '',
    'Return ONLY a JSON object with these keys:',
    directive
      ? '- "directiveResponse": string. MUST explicitly address the directive (comparisons, reasons, next steps)'
      : '- "directiveResponse": string or omitted',
    '- "overview", "competitors", "marketPosition", "financialSummary", "swot", "strategy", "structuredInsights": strings of plain Markdown',
    `- "topProducts": array of {"product": string, "fiscalYear": number, "revenue": number or null (${currency} billions), "source": string}`,
    `- "revenueSeries": array of {"year": number, "value": number} in ${currency} billions`,
    'Use null for figures that are not in the evidence. Cite evidence with [S#] markers inside text values.',
    '',
    `Company overview:\n${knowledge.overview || '(none yet)'}`,
    '',
    `Known revenue figures:\n${formatFacts(knowledge)}`,
    '',
    `Evidence:\n${evidence}`,
  ].join('\n');
}

export const NO_EVIDENCE_CLAIM = 'No evidence found; run deep research first.';

export function claimPrompt(company: string, question: string, evidence: string): string {
  return [
    `Answer concisely, in one or two sentences, using only the evidence below: ${question}`,
    `Company: ${company}`,
    'Cite the evidence you rely on with its [S#] marker.',
    '',
    `Evidence:\n${evidence}`,
  ].join('\n');
}

export function evidenceCardPrompt(claim: string, evidence: string): string {
  return [
    'Build an evidence card for the claim below from the evidence that follows.',
    'Return ONLY a JSON object with these keys:',
    '- "sources": array of the 1 or 2 [S#] markers whose evidence best supports the claim',
    '- "evidence": the supporting passage, quoted or paraphrased in 1 or 2 sentences',
    '- "confidence": number between 0 and 1',
    '',
    `Claim: ${claim}`,
    '',
    `Evidence:\n${evidence}`,
  ].join('\n');
}

export function clarifyPrompt(company: string, knowledge: KnowledgeSnapshot, directive: string): string {
  return [
    `Before deep research on ${company}, ask 2 to 4 short clarifying questions, only ones whose answers would change the research.`,
    'Do not ask about anything the directive or the knowledge below already settles.',
    'One question per line, no commentary. If no question would help, reply NONE.',
    '',
    directive ? `User directive: ${directive}` : 'No directive was given.',
    '',
    `Company overview:\n${knowledge.overview || '(none yet)'}`,
    '',
    `Known revenue figures:\n${formatFacts(knowledge)}`,
  ].join('\n');
}

export function overviewPrompt(company: string, evidence: string): string {
  return [
    `Summarize these search snippets about ${company} into a neutral 3 to 6 bullet overview.`,
    'Call out uncertainties or conflicts between sources.',
    '',
    evidence,
  ].join('\n');
}

export const OVERVIEW_TOPICS: readonly string[] = [
  'finances overview',
  'annual report',
  'revenue by year',
];

export const RESEARCH_TOPICS: readonly string[] = [
  'annual report revenue by segment',
  'competitors and market share',
  'strategy and outlook',
  'products and services',
];

export const PLAN_FOLLOWUPS: readonly string[] = [
  'Should I compare the last 3 years or focus on the latest year?',
  'Do you want product-level revenue or segment-level revenue?',
  'Should I include competitor benchmarks for context?',
];
