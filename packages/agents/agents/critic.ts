// Critic agent — scores a candidate against its query on relevance,
// groundedness and substance; accept or retry with feedback

import { randomUUID } from 'node:crypto';
import type { AgentResponse, CritiqueVerdict, Query } from '../types/agents.js';
import { extractYears, isFinancialQuery, keyTerms } from '../utils/entities.js';

const PLACEHOLDER_MARKERS = [
  '[insert', 'cite source]', '(no answer)', '(overview)', 'lorem ipsum', '[placeholder', '[tbd]', 'xx%',
];

const INFERENCE_MARKERS = /\b(?:inference|inferred|infer|estimated?|not publicly available|based on general knowledge|assum(?:e|ed|ption))\b/i;

export interface CheckResult {
  name: 'content' | 'relevance' | 'groundedness' | 'substance';
  passed: boolean;
  feedback?: string;
  /** Failing this check means evidence, not wording, is lacking */
  evidenceGap?: boolean;
}

export class CriticAgent {
  readonly agentId = randomUUID();

  review(response: AgentResponse, query: Query): CritiqueVerdict {
    const checks = this.check(response, query);
    const passed = checks.filter((c) => c.passed).length;
    const score = Math.round((passed / checks.length) * 100) / 100;
    const failed = checks.filter((c) => !c.passed);

    if (failed.length === 0) return { verdict: 'accept', score };
    return {
      verdict: 'retry',
      score,
      feedback: failed.map((c) => c.feedback).join(' '),
      missingEvidence: failed.some((c) => c.evidenceGap === true),
    };
  }

  check(response: AgentResponse, query: Query): CheckResult[] {
    const text = response.text.trim();
    const lower = text.toLowerCase();

    const placeholder = PLACEHOLDER_MARKERS.find((m) => lower.includes(m));
    const content: CheckResult = text === '' || !response.valid
      ? { name: 'content', passed: false, feedback: 'The answer is empty.' }
      : placeholder
        ? { name: 'content', passed: false, feedback: `Remove the placeholder "${placeholder}".` }
        : { name: 'content', passed: true };

    const years = extractYears(query.text);
    const missingYears = years.filter((y) => !lower.includes(String(y)));
    const terms = keyTerms(query.text);
    const termHits = terms.filter((t) => lower.includes(t)).length;
    const relevance: CheckResult = missingYears.length > 0
      ? {
          name: 'relevance',
          passed: false,
          feedback: `Address ${missingYears.join(' and ')} explicitly.`,
          evidenceGap: true,
        }
      : termHits < Math.ceil(terms.length / 2)
        ? {
            name: 'relevance',
            passed: false,
            feedback: `Answer the question directly; it asks about ${terms.slice(0, 6).join(', ')}.`,
          }
        : { name: 'relevance', passed: true };

    const groundedness: CheckResult = response.usedSources.length > 0 || INFERENCE_MARKERS.test(text)
      ? { name: 'groundedness', passed: true }
      : {
          name: 'groundedness',
          passed: false,
          feedback: 'Cite the evidence with [S#] markers or mark unsupported claims as inference.',
          evidenceGap: true,
        };

    const substance: CheckResult = isFinancialQuery(query.text) && !/\d/.test(text)
      ? {
          name: 'substance',
          passed: false,
          feedback: 'Include the relevant figures.',
          evidenceGap: true,
        }
      : { name: 'substance', passed: true };

    return [content, relevance, groundedness, substance];
  }
}
