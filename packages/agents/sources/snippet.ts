// Snippet construction — normalises text, tags entities, freezes the result

import { z } from 'zod';
import type { Snippet, SourceKind } from '../types/knowledge.js';
import { entityTags } from '../utils/entities.js';
import { squash } from '../utils/text.js';

export interface SnippetInput {
  sourceId: string;
  sourceKind: SourceKind;
  title?: string;
  text: string;
  score: number;
  retrievedAt?: Date;
}

export function createSnippet(input: SnippetInput): Snippet {
  const text = squash(input.text);
  const title = input.title ? squash(input.title) : undefined;
  const tags = Object.freeze(entityTags(title ? `${title} ${text}` : text));
  return Object.freeze({
    sourceId: input.sourceId.trim(),
    sourceKind: input.sourceKind,
    ...(title ? { title } : {}),
    text,
    retrievedAt: input.retrievedAt ?? new Date(),
    score: Math.max(0, Math.min(1, input.score)),
    tags,
  });
}

/**
 * Re-validates snippets read back from the cache, where dates are ISO strings,
 * and rebuilds them frozen like freshly retrieved ones.
 */
export const SnippetSchema = z.object({
  sourceId: z.string(),
  sourceKind: z.enum(['corpus', 'web']),
  title: z.string().optional(),
  text: z.string(),
  retrievedAt: z.coerce.date(),
  score: z.number(),
  tags: z.array(z.string()),
}).transform((s) => createSnippet(s));

export const SnippetListSchema = z.array(SnippetSchema);
