// Knowledge model — evidence snippets, financial facts and the read-only
// knowledge base view handed to agents

export type SourceKind = 'corpus' | 'web';

/** A retrieved, sourced unit of evidence. Frozen once created. */
export interface Snippet {
  readonly sourceId: string;       // URL or document locator (e.g. annual-report.pdf#page=4)
  readonly sourceKind: SourceKind;
  readonly title?: string;
  readonly text: string;
  readonly retrievedAt: Date;
  readonly score: number;          // 0-1, adapter-relative
  readonly tags: readonly string[];
}

export interface FinancialFact {
  readonly year: number;
  readonly value: number;          // in billions of `currency`
  readonly currency: string;
  readonly unit: 'billion';
  readonly sourceId: string;
  readonly sourceKind: SourceKind;
  readonly raw: string;
}

export interface KnowledgeSnapshot {
  readonly company: string;
  readonly snippets: readonly Snippet[];
  readonly overview: string;
  readonly facts: readonly FinancialFact[];
  readonly updatedAt: Date | null;
  readonly version: number;
}

/** Additions proposed by an agent; only the Orchestrator applies them. */
export interface KnowledgeDelta {
  snippets?: readonly Snippet[];
  overview?: string;
  facts?: readonly FinancialFact[];
}

export interface MergeReport {
  addedSnippets: number;
  duplicateSnippets: number;
  addedFacts: number;
  conflicts: Array<{ year: number; kept: FinancialFact; rejected: FinancialFact }>;
}
