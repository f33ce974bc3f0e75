// Knowledge source adapter contracts

import type { Snippet } from '../types/knowledge.js';

export interface SourceAdapter {
  readonly name: string;
  /** Ranked snippets, best first. Throws DisabledError when unconfigured. */
  search(query: string, maxResults: number): Promise<Snippet[]>;
}

/** Previously extracted document text (annual reports, filings) */
export type DocumentCorpusAdapter = SourceAdapter;

export type WebSearchAdapter = SourceAdapter;
