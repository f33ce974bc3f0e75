import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DocumentCorpus } from '../sources/document-corpus.js';

const REPORT = [
  'Nokia net sales were EUR 19.2 billion in 2024.',
  'The company competes with Ericsson and Huawei in mobile networks.',
].join('\f');

describe('DocumentCorpus', () => {
  it('ranks pages by term and year overlap', async () => {
    const corpus = new DocumentCorpus([{ id: 'nokia-ar-2024', text: REPORT }]);
    const hits = await corpus.search('Nokia net sales 2024', 5);

    expect(hits.map((h) => [h.sourceId, h.score])).toEqual([
      ['nokia-ar-2024#page=1', 1],
      ['nokia-ar-2024#page=2', 0.2],
    ]);
    expect(hits[0].sourceKind).toBe('corpus');
    expect(hits[0].tags).toEqual(['2024', 'revenue']);
  });

  it('respects maxResults', async () => {
    const corpus = new DocumentCorpus([{ id: 'ar', text: REPORT }]);
    expect(await corpus.search('Nokia net sales 2024', 1)).toHaveLength(1);
  });

  it('returns nothing for a query without key terms', async () => {
    const corpus = new DocumentCorpus([{ id: 'ar', text: REPORT }]);
    expect(await corpus.search('what is the', 5)).toEqual([]);
  });

  it('splits long single-page documents into overlapping chunks', async () => {
    const corpus = new DocumentCorpus(
      [{ id: 'memo', text: 'abcdefghijklmnopqrstuvwxyz0123456789' }],
      { chunkSize: 20, overlap: 5 },
    );
    expect(corpus.chunkCount).toBe(3);

    const hits = await corpus.search('xyz0', 5);
    expect(hits.map((h) => h.sourceId)).toEqual(['memo#chunk=2']);
  });

  it('replaces a document added twice', () => {
    const corpus = new DocumentCorpus([{ id: 'ar', text: REPORT }]);
    corpus.addDocument({ id: 'ar', text: 'Only one page now.' });
    expect(corpus.documentCount).toBe(1);
    expect(corpus.chunkCount).toBe(1);
  });

  describe('fromDirectory', () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it('loads text files and applies the manifest', async () => {
      dir = await mkdtemp(join(tmpdir(), 'account-plan-corpus-'));
      await writeFile(join(dir, 'a.txt'), 'Acme revenue grew in 2023.');
      await writeFile(join(dir, 'b.txt'), 'Acme strategy memo.');
      await writeFile(join(dir, 'notes.md'), 'ignored');
      await writeFile(join(dir, 'sources.json'), JSON.stringify([
        { file: 'a.txt', id: 'acme-ar-2023.pdf', title: 'Acme Annual Report 2023' },
      ]));

      const corpus = await DocumentCorpus.fromDirectory(dir);
      expect(corpus.documentCount).toBe(2);

      const hits = await corpus.search('Acme revenue 2023', 5);
      expect(hits[0].sourceId).toBe('acme-ar-2023.pdf#chunk=1');
      expect(hits[0].title).toBe('Acme Annual Report 2023');
      expect(hits[1].sourceId).toBe('b#chunk=1');
    });

    it('rejects an invalid manifest', async () => {
      dir = await mkdtemp(join(tmpdir(), 'account-plan-corpus-'));
      await writeFile(join(dir, 'sources.json'), JSON.stringify([{ id: 'x' }]));
      await expect(DocumentCorpus.fromDirectory(dir)).rejects.toThrow('Invalid corpus manifest');
    });
  });
});
