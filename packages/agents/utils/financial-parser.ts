// Revenue fact extraction from free text
// Handles "revenue of $394.3 billion in 2024", "FY2023 net sales EUR 21,140 million",
// "2022 turnover: €23.76bn"

import type { FinancialFact, SourceKind } from '../types/knowledge.js';

export type ReportCurrency = 'USD' | 'EUR';

export interface ParseContext {
  sourceId: string;
  sourceKind: SourceKind;
  currency: ReportCurrency;
  /** USD per 1 EUR */
  eurUsdRate: number;
}

// Multipliers into billions
const MULTIPLIERS: Record<string, number> = {
  t: 1000, tn: 1000, trillion: 1000,
  b: 1, bn: 1, billion: 1,
  m: 0.001, mn: 0.001, million: 0.001,
};

const REVENUE_RE = /\b(?:revenues?|net sales|total sales|turnover)\b/i;

// Match "$394.3 billion", "EUR 21,140 million", "€23.76bn", "394B"
const AMOUNT_RE = /(US\$|USD|EUR|\$|€)?\s?(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)\s?(trillion|billion|million|tn|bn|mn|[TBM])\b/gi;

const YEAR_RE = /\b(?:FY\s?)?((?:19|20)\d{2})\b/gi;

const MIN_BILLIONS = 0.01;
const MAX_BILLIONS = 5000;

interface Located<T> {
  value: T;
  start: number;
  end: number;
}

interface Amount {
  billions: number;
  currency: ReportCurrency;
  raw: string;
}

function parseAmount(numStr: string, suffix: string): number {
  const num = parseFloat(numStr.replace(/,/g, ''));
  const mult = MULTIPLIERS[suffix.toLowerCase()];
  if (isNaN(num) || mult === undefined) return NaN;
  return num * mult;
}

function currencyOf(symbol: string | undefined, sentence: string): ReportCurrency {
  if (symbol) return symbol === '€' || symbol.toUpperCase() === 'EUR' ? 'EUR' : 'USD';
  return /€|\bEUR\b/.test(sentence) ? 'EUR' : 'USD';
}

export function convertCurrency(
  billions: number,
  from: ReportCurrency,
  to: ReportCurrency,
  eurUsdRate: number,
): number {
  if (from === to) return billions;
  return from === 'EUR' ? billions * eurUsdRate : billions / eurUsdRate;
}

function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?;])\s+|\n+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

function findAmounts(sentence: string): Array<Located<Amount>> {
  const out: Array<Located<Amount>> = [];
  for (const m of sentence.matchAll(AMOUNT_RE)) {
    const billions = parseAmount(m[2], m[3]);
    if (isNaN(billions)) continue;
    const start = m.index ?? 0;
    out.push({
      value: { billions, currency: currencyOf(m[1], sentence), raw: m[0].trim() },
      start,
      end: start + m[0].length,
    });
  }
  return out;
}

function findYears(sentence: string, amounts: Array<Located<Amount>>): Array<Located<number>> {
  const out: Array<Located<number>> = [];
  for (const m of sentence.matchAll(YEAR_RE)) {
    const start = m.index ?? 0;
    const end = start + m[0].length;
    // "2024 million" is an amount, not a year
    if (amounts.some((a) => start < a.end && end > a.start)) continue;
    const year = Number(m[1]);
    if (year >= 1990 && year <= 2100) out.push({ value: year, start, end });
  }
  return out;
}

function distance(a: Located<unknown>, b: Located<unknown>): number {
  if (a.end <= b.start) return b.start - a.end;
  if (b.end <= a.start) return a.start - b.end;
  return 0;
}

/**
 * Extract yearly revenue facts, normalised to billions of the report
 * currency. Each amount in a revenue sentence is paired with the nearest
 * unused year; the first figure per year wins within one text.
 */
export function extractRevenueFacts(text: string, ctx: ParseContext): FinancialFact[] {
  const facts = new Map<number, FinancialFact>();

  for (const sentence of splitSentences(text)) {
    if (!REVENUE_RE.test(sentence)) continue;

    const amounts = findAmounts(sentence);
    const years = findYears(sentence, amounts);
    const used = new Set<number>();

    for (const amount of amounts) {
      let best: Located<number> | undefined;
      for (const year of years) {
        if (used.has(year.value)) continue;
        if (!best || distance(amount, year) < distance(amount, best)) best = year;
      }
      if (!best) continue;
      used.add(best.value);

      const value = convertCurrency(amount.value.billions, amount.value.currency, ctx.currency, ctx.eurUsdRate);
      if (value < MIN_BILLIONS || value > MAX_BILLIONS) continue;
      if (facts.has(best.value)) continue;

      facts.set(best.value, {
        year: best.value,
        value: Math.round(value * 1000) / 1000,
        currency: ctx.currency,
        unit: 'billion',
        sourceId: ctx.sourceId,
        sourceKind: ctx.sourceKind,
        raw: sentence.length > 240 ? `${sentence.slice(0, 239)}…` : sentence,
      });
    }
  }

  return [...facts.values()].sort((a, b) => a.year - b.year);
}

/** Format a billions figure as "USD 394.33 bn". */
export function formatBillions(value: number, currency: string): string {
  return `${currency} ${value.toFixed(2)} bn`;
}
