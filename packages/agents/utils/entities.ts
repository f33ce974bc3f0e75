// Key-entity extraction — years and financial metric keywords. Drives snippet
// tags, the planner's coverage check and the critic's relevance check.

const YEAR_RE = /\b(?:FY\s?)?((?:19|20)\d{2})\b/gi;

// Surface form → canonical metric tag
const METRIC_SYNONYMS: Array<[RegExp, string]> = [
  [/\b(?:revenues?|net sales|total sales|turnover|top[- ]line)\b/i, 'revenue'],
  [/\b(?:net income|net profit|earnings|bottom[- ]line)\b/i, 'net_income'],
  [/\bprofit(?:s|ability)?\b/i, 'profit'],
  [/\bebitda\b/i, 'ebitda'],
  [/\b(?:operating (?:income|profit)|ebit)\b/i, 'operating_income'],
  [/\bmargins?\b/i, 'margin'],
  [/\b(?:eps|earnings per share)\b/i, 'eps'],
  [/\b(?:free )?cash flow\b/i, 'cash_flow'],
  [/\bmarket share\b/i, 'market_share'],
  [/\bmarket cap(?:italization)?\b/i, 'market_cap'],
  [/\b(?:guidance|outlook)\b/i, 'guidance'],
  [/\bdividends?\b/i, 'dividend'],
  [/\b(?:debt|leverage)\b/i, 'debt'],
  [/\b(?:growth|cagr)\b/i, 'growth'],
  [/\bsegments?\b/i, 'segment'],
];

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'compare', 'did', 'do',
  'does', 'for', 'from', 'give', 'how', 'in', 'is', 'it', 'its', 'me', 'of', 'on',
  'or', 'show', 'tell', 'than', 'that', 'the', 'their', 'this', 'to', 'versus',
  'vs', 'was', 'were', 'what', 'which', 'who', 'why', 'with', 'about', 'please',
]);

export interface KeyEntities {
  years: number[];
  metrics: string[];
}

export function extractYears(text: string): number[] {
  const years = new Set<number>();
  for (const m of text.matchAll(YEAR_RE)) {
    const year = Number(m[1]);
    if (year >= 1990 && year <= 2100) years.add(year);
  }
  return [...years].sort((a, b) => a - b);
}

export function extractMetrics(text: string): string[] {
  return METRIC_SYNONYMS.filter(([re]) => re.test(text)).map(([, tag]) => tag);
}

export function extractEntities(text: string): KeyEntities {
  return { years: extractYears(text), metrics: extractMetrics(text) };
}

/** Tags attached to snippets: years as strings followed by metric tags. */
export function entityTags(text: string): string[] {
  const { years, metrics } = extractEntities(text);
  return [...years.map(String), ...metrics];
}

export function isFinancialQuery(text: string): boolean {
  return extractMetrics(text).length > 0;
}

/** Significant lower-cased words (stopwords, years and short tokens removed). */
export function keyTerms(text: string): string[] {
  const terms = new Set<string>();
  for (const word of text.toLowerCase().match(/[a-z][a-z0-9&'-]+/g) ?? []) {
    if (word.length < 3 || STOPWORDS.has(word)) continue;
    terms.add(word);
  }
  return [...terms];
}
