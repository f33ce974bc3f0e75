// Agent message contracts — requests carry a read-only knowledge snapshot,
// responses carry candidate text plus the evidence they consumed

import type { KnowledgeSnapshot } from './knowledge.js';

export type QueryOrigin = 'chat' | 'report';

export interface Query {
  readonly text: string;
  readonly origin: QueryOrigin;
  readonly company: string;
  /** Report directive steering the answer, if any */
  readonly directive?: string;
  /** Bypass cached retrieval results */
  readonly forceRefresh?: boolean;
}

export interface AgentRequest {
  readonly query: Query;
  readonly knowledge: KnowledgeSnapshot;
  /** Critic feedback from the previous attempt */
  readonly feedback?: string;
  readonly attempt: number;
}

export interface AgentResponse {
  readonly text: string;
  readonly valid: boolean;
  readonly confidence: number;     // 0-1
  readonly usedSources: readonly string[];
  /** True when no cited evidence backs the text */
  readonly inference: boolean;
  /** Set when the critic's retry budget ran out before acceptance */
  readonly lowConfidence: boolean;
}

/** A short claim and the evidence behind it. */
export interface EvidenceCard {
  readonly claim: string;
  /** One or two source ids; empty when the knowledge base had nothing */
  readonly sources: readonly string[];
  readonly evidence: string;
  readonly confidence: number;     // 0-1
}

export interface ResearchPlan {
  readonly retrievalNeeded: boolean;
  readonly reason: string;
  readonly subQueries: readonly string[];
  readonly followups: readonly string[];
}

export type CritiqueVerdict =
  | { readonly verdict: 'accept'; readonly score: number }
  | {
      readonly verdict: 'retry';
      readonly score: number;
      readonly feedback: string;
      /** The candidate lacks evidence; another retrieval cycle may help */
      readonly missingEvidence: boolean;
    };
