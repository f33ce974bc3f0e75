// Report assembly — section bodies from either generation path, fixed
// ordering, references

import type { FinancialFact, Snippet } from '../types/knowledge.js';
import type {
  AccountPlanReport,
  Reference,
  ReportPath,
  ReportSection,
  SectionBody,
  SectionKind,
  SectionStatus,
  SeriesPoint,
} from '../types/report.js';
import { ASSEMBLY_ORDER, SECTION_TITLES } from '../types/report.js';
import type { StructuredReport, TopProduct } from '../agents/synthesizer.js';
import { NOT_PUBLIC } from '../agents/prompts.js';
import { parseMarkdownTable } from '../utils/markdown-table.js';

export function productColumns(currency: string): string[] {
  return ['Product', 'FY', `Revenue (${currency} bn)`, 'Source'];
}

const MISSING_CELL = /^(?:|-+|—|n\/?a|none|null|unknown|not available|not publicly available)$/i;

function cell(value: string | undefined): string {
  const v = (value ?? '').trim();
  return MISSING_CELL.test(v) ? NOT_PUBLIC : v;
}

/**
 * Parse the model's Markdown products table into the fixed column set.
 * Columns are matched by header keyword; missing figures read "Not publicly available".
 */
export function topProductsFromMarkdown(text: string, currency: string): SectionBody | null {
  const parsed = parseMarkdownTable(text);
  if (!parsed || parsed.rows.length === 0) return null;

  const find = (re: RegExp, fallback: number): string | undefined =>
    parsed.columns.find((c) => re.test(c)) ?? parsed.columns[fallback];
  const productCol = find(/product|segment|name/i, 0);
  const yearCol = find(/\bfy\b|year/i, 1);
  const revenueCol = find(/revenue|sales/i, 2);
  const sourceCol = find(/source/i, 3);

  const columns = productColumns(currency);
  const rows = parsed.rows
    .map((row) => ({
      [columns[0]]: (productCol ? row[productCol] : '') ?? '',
      [columns[1]]: cell(yearCol ? row[yearCol] : undefined),
      [columns[2]]: cell(revenueCol ? row[revenueCol] : undefined),
      [columns[3]]: cell(sourceCol ? row[sourceCol] : undefined),
    }))
    .filter((row) => row[columns[0]].trim() !== '');
  return rows.length > 0 ? { type: 'table', columns, rows } : null;
}

export function topProductsFromStructured(items: readonly TopProduct[], currency: string): SectionBody {
  const columns = productColumns(currency);
  const rows = items.map((item) => ({
    [columns[0]]: item.product.trim(),
    [columns[1]]: String(item.fiscalYear),
    [columns[2]]: item.revenue === null ? NOT_PUBLIC : item.revenue.toFixed(2),
    [columns[3]]: cell(item.source),
  }));
  return { type: 'table', columns, rows };
}

/**
 * Revenue series from knowledge-base facts, falling back to the structured
 * output's series. Fewer than two years is kept but marked non-plottable.
 */
export function revenueSeries(
  facts: readonly FinancialFact[],
  fallback: readonly SeriesPoint[],
  currency: string,
): SectionBody {
  const source: SeriesPoint[] = facts.length > 0
    ? facts.map((f) => ({ year: f.year, value: f.value }))
    : fallback.filter((p) => Number.isFinite(p.value)).map((p) => ({ year: p.year, value: p.value }));

  const byYear = new Map<number, SeriesPoint>();
  for (const point of source) {
    if (!byYear.has(point.year)) byYear.set(point.year, point);
  }
  const points = [...byYear.values()].sort((a, b) => a.year - b.year);
  return { type: 'series', unit: `${currency} bn`, points, plottable: points.length >= 2 };
}

export function section(
  kind: SectionKind,
  body: SectionBody,
  status: SectionStatus,
  sources: readonly string[] = [],
): ReportSection {
  return { kind, title: SECTION_TITLES[kind], body, status, sources: [...sources] };
}

export function textSection(kind: SectionKind, text: string | undefined, sources: readonly string[] = []): ReportSection {
  const t = (text ?? '').trim();
  return t === ''
    ? section(kind, { type: 'text', text: NOT_PUBLIC }, 'unavailable')
    : section(kind, { type: 'text', text: t }, 'ok', sources);
}

const STRUCTURED_FIELDS: Array<[SectionKind, keyof StructuredReport]> = [
  ['DirectiveResponse', 'directiveResponse'],
  ['Overview', 'overview'],
  ['Competitors', 'competitors'],
  ['MarketPosition', 'marketPosition'],
  ['FinancialSummary', 'financialSummary'],
  ['SWOT', 'swot'],
  ['Strategy', 'strategy'],
  ['StructuredInsights', 'structuredInsights'],
];

/** Sections of a successful structured generation. */
export function sectionsFromStructured(
  report: StructuredReport,
  facts: readonly FinancialFact[],
  currency: string,
  sourcesOf: (text: string) => string[],
): Map<SectionKind, ReportSection> {
  const out = new Map<SectionKind, ReportSection>();
  for (const [kind, field] of STRUCTURED_FIELDS) {
    const value = report[field];
    const text = typeof value === 'string' ? value : '';
    out.set(kind, textSection(kind, text, sourcesOf(text)));
  }

  const products = topProductsFromStructured(report.topProducts, currency);
  const productSources = report.topProducts.map((p) => p.source).filter((s) => /^https?:\/\//.test(s));
  out.set('TopProductsTable', report.topProducts.length > 0
    ? section('TopProductsTable', products, 'ok', productSources)
    : section('TopProductsTable', products, 'unavailable'));

  const series = revenueSeries(facts, report.revenueSeries, currency);
  out.set('RevenueGraphData', section('RevenueGraphData', series, 'ok', [...new Set(facts.map((f) => f.sourceId))]));
  return out;
}

export interface AssemblyInput {
  company: string;
  directive: string;
  path: ReportPath;
  sections: ReadonlyMap<SectionKind, ReportSection>;
  snippets: readonly Snippet[];
  warnings?: readonly string[];
  generatedAt?: Date;
}

/**
 * Fixed order: DirectiveResponse (omitted without a directive), the text
 * sections, chart data, the products table. Absent sections are marked
 * unavailable rather than dropped.
 */
export function assembleReport(input: AssemblyInput): AccountPlanReport {
  const hasDirective = input.directive.trim() !== '';
  const sections: ReportSection[] = [];
  for (const kind of ASSEMBLY_ORDER) {
    if (kind === 'DirectiveResponse' && !hasDirective) continue;
    sections.push(input.sections.get(kind) ?? section(kind, { type: 'text', text: NOT_PUBLIC }, 'unavailable'));
  }

  const titles = new Map(input.snippets.map((s) => [s.sourceId, s.title]));
  const references: Reference[] = [];
  const seen = new Set<string>();
  for (const s of sections) {
    for (const sourceId of s.sources) {
      if (seen.has(sourceId)) continue;
      seen.add(sourceId);
      const title = titles.get(sourceId);
      references.push({ label: `[R${references.length + 1}] ${title ?? sourceId}`, sourceId });
    }
  }

  return {
    company: input.company,
    directive: input.directive.trim(),
    path: input.path,
    sections,
    references,
    lowConfidence: sections.some((s) => s.status !== 'ok'),
    warnings: [...(input.warnings ?? [])],
    generatedAt: input.generatedAt ?? new Date(),
  };
}
