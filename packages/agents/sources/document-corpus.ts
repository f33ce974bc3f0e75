// Document corpus — text previously extracted from PDFs (annual reports,
// filings), chunked per page and ranked by keyword overlap with the query

import { readFile, readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { z } from 'zod';
import type { Snippet } from '../types/knowledge.js';
import type { DocumentCorpusAdapter } from './types.js';
import { createSnippet } from './snippet.js';
import { extractYears, keyTerms } from '../utils/entities.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Corpus');

export interface CorpusDocument {
  /** Locator used in snippet source ids, e.g. "annual-report-2024.pdf" */
  id: string;
  title?: string;
  /** Extracted text; pages separated by form feeds */
  text: string;
}

export interface CorpusOptions {
  chunkSize?: number;
  overlap?: number;
}

interface Chunk {
  sourceId: string;
  title?: string;
  text: string;
  lower: string;
}

const ManifestSchema = z.array(z.object({
  file: z.string().min(1),
  id: z.string().min(1).optional(),
  title: z.string().optional(),
}));

export type CorpusManifest = z.infer<typeof ManifestSchema>;

export class DocumentCorpus implements DocumentCorpusAdapter {
  readonly name = 'corpus';
  private chunks: Chunk[] = [];
  private documentIds = new Set<string>();
  private readonly chunkSize: number;
  private readonly overlap: number;

  constructor(documents: CorpusDocument[] = [], options: CorpusOptions = {}) {
    this.chunkSize = options.chunkSize ?? 1200;
    this.overlap = Math.min(options.overlap ?? 200, Math.floor(this.chunkSize / 2));
    for (const doc of documents) this.addDocument(doc);
  }

  get documentCount(): number {
    return this.documentIds.size;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  addDocument(doc: CorpusDocument): void {
    if (this.documentIds.has(doc.id)) {
      this.chunks = this.chunks.filter((c) => !c.sourceId.startsWith(`${doc.id}#`));
    }
    this.documentIds.add(doc.id);

    const pages = doc.text.split('\f');
    pages.forEach((page, pageIdx) => {
      const pieces = this.split(page);
      pieces.forEach((text, chunkIdx) => {
        const locator = pages.length > 1 ? `page=${pageIdx + 1}` : `chunk=${chunkIdx + 1}`;
        const suffix = pages.length > 1 && pieces.length > 1 ? `&chunk=${chunkIdx + 1}` : '';
        this.chunks.push({
          sourceId: `${doc.id}#${locator}${suffix}`,
          title: doc.title,
          text,
          lower: text.toLowerCase(),
        });
      });
    });
  }

  async search(query: string, maxResults: number): Promise<Snippet[]> {
    const terms = keyTerms(query);
    const years = extractYears(query).map(String);
    if (terms.length === 0 && years.length === 0) return [];

    const scored: Array<{ chunk: Chunk; score: number }> = [];
    for (const chunk of this.chunks) {
      const termHits = terms.filter((t) => chunk.lower.includes(t)).length;
      const yearHits = years.filter((y) => chunk.lower.includes(y)).length;
      if (termHits === 0 && yearHits === 0) continue;
      // Years weigh double: a figure for the wrong year is not evidence
      const score = (termHits + 2 * yearHits) / (terms.length + 2 * years.length);
      scored.push({ chunk, score });
    }

    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, maxResults).map(({ chunk, score }) => createSnippet({
      sourceId: chunk.sourceId,
      sourceKind: 'corpus',
      title: chunk.title,
      text: chunk.text,
      score,
    }));
  }

  private split(text: string): string[] {
    const clean = text.replace(/[ \t]+/g, ' ').trim();
    if (clean === '') return [];
    if (clean.length <= this.chunkSize) return [clean];

    const out: string[] = [];
    const step = this.chunkSize - this.overlap;
    for (let start = 0; start < clean.length; start += step) {
      out.push(clean.slice(start, start + this.chunkSize));
      if (start + this.chunkSize >= clean.length) break;
    }
    return out;
  }

  /**
   * Load every `.txt` file in `dir`. An optional `sources.json` manifest maps
   * file names to document ids and titles.
   */
  static async fromDirectory(dir: string, options: CorpusOptions = {}): Promise<DocumentCorpus> {
    const files = (await readdir(dir)).filter((f) => f.endsWith('.txt')).sort();
    const manifest = await readManifest(join(dir, 'sources.json'));
    const byFile = new Map(manifest.map((entry) => [entry.file, entry]));

    const documents: CorpusDocument[] = [];
    for (const file of files) {
      const entry = byFile.get(file);
      documents.push({
        id: entry?.id ?? basename(file, '.txt'),
        title: entry?.title,
        text: await readFile(join(dir, file), 'utf-8'),
      });
    }

    log.info('Loaded corpus', { dir, documents: documents.length });
    return new DocumentCorpus(documents, options);
  }
}

async function readManifest(path: string): Promise<CorpusManifest> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }
  const parsed = ManifestSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Invalid corpus manifest ${path}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}
