// Account plan report — fixed section enumeration and assembly contract

export const SECTION_KINDS = [
  'DirectiveResponse',
  'Overview',
  'Competitors',
  'MarketPosition',
  'FinancialSummary',
  'SWOT',
  'Strategy',
  'TopProductsTable',
  'RevenueGraphData',
  'StructuredInsights',
] as const;

export type SectionKind = typeof SECTION_KINDS[number];

/** Order sections are emitted in: directive, text sections, chart data, table. */
export const ASSEMBLY_ORDER: readonly SectionKind[] = [
  'DirectiveResponse',
  'Overview',
  'Competitors',
  'MarketPosition',
  'FinancialSummary',
  'SWOT',
  'Strategy',
  'StructuredInsights',
  'RevenueGraphData',
  'TopProductsTable',
];

export const SECTION_TITLES: Record<SectionKind, string> = {
  DirectiveResponse: 'Directive Response',
  Overview: 'Company Overview',
  Competitors: 'Competitors',
  MarketPosition: 'Market Position',
  FinancialSummary: 'Financial Summary',
  SWOT: 'SWOT Analysis',
  Strategy: 'Strategy',
  TopProductsTable: 'Top Products / Segments',
  RevenueGraphData: 'Revenue Graph',
  StructuredInsights: 'Structured Insights',
};

export interface SeriesPoint {
  year: number;
  value: number;
}

export type SectionBody =
  | { type: 'text'; text: string }
  | { type: 'table'; columns: string[]; rows: Array<Record<string, string>> }
  | {
      type: 'series';
      unit: string;
      points: SeriesPoint[];
      /** Chart consumers skip rendering when false (fewer than two years) */
      plottable: boolean;
    };

export type SectionStatus = 'ok' | 'low_confidence' | 'unavailable';

export interface ReportSection {
  kind: SectionKind;
  title: string;
  body: SectionBody;
  status: SectionStatus;
  sources: string[];
}

export interface Reference {
  label: string;
  sourceId: string;
}

export type ReportPath = 'structured' | 'fallback';

export interface AccountPlanReport {
  company: string;
  directive: string;
  path: ReportPath;
  sections: ReportSection[];
  references: Reference[];
  lowConfidence: boolean;
  warnings: string[];
  generatedAt: Date;
}
