// Knowledge base — session-scoped evidence store owned by the orchestrator.
// Agents see frozen snapshots and propose deltas; only merge() mutates.

import type {
  FinancialFact,
  KnowledgeDelta,
  KnowledgeSnapshot,
  MergeReport,
  Snippet,
} from '../types/knowledge.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('KnowledgeBase');

// Figures within this relative distance are the same figure, not a conflict
const CONFLICT_TOLERANCE = 0.01;

/**
 * Corpus figures beat web figures for the same year. Between two facts of the
 * same source kind the one recorded first is kept.
 */
export function preferFact(existing: FinancialFact, incoming: FinancialFact): FinancialFact {
  if (existing.sourceKind === 'web' && incoming.sourceKind === 'corpus') return incoming;
  return existing;
}

function sameFigure(a: FinancialFact, b: FinancialFact): boolean {
  const scale = Math.max(Math.abs(a.value), Math.abs(b.value), 1e-9);
  return Math.abs(a.value - b.value) / scale <= CONFLICT_TOLERANCE;
}

export class KnowledgeBase {
  private snippets: Snippet[] = [];
  private snippetIds = new Set<string>();
  private overview = '';
  private facts = new Map<number, FinancialFact>();
  private updatedAt: Date | null = null;
  private version = 0;

  constructor(
    readonly company: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get isEmpty(): boolean {
    return this.snippets.length === 0 && this.overview === '' && this.facts.size === 0;
  }

  snapshot(): KnowledgeSnapshot {
    return Object.freeze({
      company: this.company,
      snippets: Object.freeze([...this.snippets]),
      overview: this.overview,
      facts: Object.freeze([...this.facts.values()].sort((a, b) => a.year - b.year)),
      updatedAt: this.updatedAt,
      version: this.version,
    });
  }

  /** Apply a delta. Snippets dedupe by source id; the overview is replaced when given. */
  merge(delta: KnowledgeDelta): MergeReport {
    const report: MergeReport = { addedSnippets: 0, duplicateSnippets: 0, addedFacts: 0, conflicts: [] };

    for (const snippet of delta.snippets ?? []) {
      if (this.snippetIds.has(snippet.sourceId)) {
        report.duplicateSnippets++;
        continue;
      }
      this.snippetIds.add(snippet.sourceId);
      this.snippets.push(snippet);
      report.addedSnippets++;
    }

    let replaced = false;
    for (const fact of delta.facts ?? []) {
      const existing = this.facts.get(fact.year);
      if (!existing) {
        this.facts.set(fact.year, fact);
        report.addedFacts++;
        continue;
      }
      if (sameFigure(existing, fact)) {
        const preferred = preferFact(existing, fact);
        if (preferred !== existing) {
          this.facts.set(fact.year, preferred);
          replaced = true;
        }
        continue;
      }
      const kept = preferFact(existing, fact);
      const rejected = kept === existing ? fact : existing;
      if (kept !== existing) {
        this.facts.set(fact.year, kept);
        replaced = true;
      }
      report.conflicts.push({ year: fact.year, kept, rejected });
      log.warn('Conflicting revenue figures', {
        year: fact.year,
        kept: `${kept.value} (${kept.sourceKind}: ${kept.sourceId})`,
        rejected: `${rejected.value} (${rejected.sourceKind}: ${rejected.sourceId})`,
      });
    }

    const overview = delta.overview?.trim();
    const overviewChanged = overview !== undefined && overview !== '' && overview !== this.overview;
    if (overviewChanged) this.overview = overview;

    // A conflict that keeps the existing figure changes nothing
    const changed = report.addedSnippets > 0 || report.addedFacts > 0;
    if (changed || replaced || overviewChanged) {
      this.version++;
      this.updatedAt = this.now();
    }
    return report;
  }

  /** Drop everything; the only way the knowledge base shrinks. */
  rebuild(): void {
    this.snippets = [];
    this.snippetIds.clear();
    this.overview = '';
    this.facts.clear();
    this.updatedAt = null;
    this.version++;
    log.info('Knowledge base cleared', { company: this.company });
  }
}
