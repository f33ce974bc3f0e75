// Markdown rendering of an assembled account plan

import type { AccountPlanReport, Reference, ReportSection } from '../types/report.js';
import { renderMarkdownTable } from './markdown-table.js';

const STATUS_NOTE: Record<ReportSection['status'], string> = {
  ok: '',
  low_confidence: '_Low confidence: review before use._\n\n',
  unavailable: '_Section unavailable._\n\n',
};

function renderBody(section: ReportSection): string {
  const { body } = section;
  switch (body.type) {
    case 'text':
      return body.text;
    case 'table':
      return body.rows.length > 0 ? renderMarkdownTable(body.columns, body.rows) : '_No rows._';
    case 'series': {
      const rows = body.points.map((p) => ({ Year: String(p.year), [`Revenue (${body.unit})`]: p.value.toFixed(2) }));
      const table = rows.length > 0
        ? renderMarkdownTable(['Year', `Revenue (${body.unit})`], rows)
        : '_No revenue figures found._';
      return body.plottable ? table : `${table}\n\n_Single data point: no chart._`;
    }
  }
}

function referenceLine(ref: Reference): string {
  return ref.label.includes(ref.sourceId) ? `- ${ref.label}` : `- ${ref.label} (${ref.sourceId})`;
}

export function renderReportMarkdown(report: AccountPlanReport): string {
  const parts = [`# Account Plan: ${report.company}`];
  if (report.directive) parts.push(`> Directive: ${report.directive}`);
  if (report.lowConfidence) parts.push('_Some sections are low confidence or unavailable._');
  for (const warning of report.warnings) parts.push(`> Warning: ${warning}`);

  for (const section of report.sections) {
    parts.push(`## ${section.title}\n\n${STATUS_NOTE[section.status]}${renderBody(section)}`);
  }

  if (report.references.length > 0) {
    parts.push(`## References\n\n${report.references.map(referenceLine).join('\n')}`);
  }
  return `${parts.join('\n\n')}\n`;
}
