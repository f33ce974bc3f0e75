import { describe, it, expect } from 'vitest';
import { KnowledgeBase, preferFact } from '../orchestrator/knowledge-base.js';
import { NOW, fact, snippet } from './helpers.js';

function kb() {
  return new KnowledgeBase('Nokia', () => new Date(NOW));
}

describe('KnowledgeBase', () => {
  it('starts empty', () => {
    const base = kb();
    expect(base.isEmpty).toBe(true);
    expect(base.snapshot()).toEqual({ company: 'Nokia', snippets: [], overview: '', facts: [], updatedAt: null, version: 0 });
  });

  it('dedupes snippets by source id and bumps the version', () => {
    const base = kb();
    const first = base.merge({ snippets: [snippet('a', 'one'), snippet('b', 'two')] });
    const second = base.merge({ snippets: [snippet('a', 'again')] });

    expect(first).toMatchObject({ addedSnippets: 2, duplicateSnippets: 0 });
    expect(second).toMatchObject({ addedSnippets: 0, duplicateSnippets: 1 });
    const snap = base.snapshot();
    expect(snap.snippets.map((s) => s.text)).toEqual(['one', 'two']);
    expect(snap.version).toBe(1);
    expect(snap.updatedAt).toEqual(new Date(NOW));
  });

  it('prefers corpus figures over web figures for the same year', () => {
    const base = kb();
    const web = fact(2024, 20, 'web', 'https://example.com/a');
    const corpus = fact(2024, 22, 'corpus', 'ar#page=3');
    base.merge({ facts: [web] });
    const report = base.merge({ facts: [corpus] });

    expect(report.conflicts).toEqual([{ year: 2024, kept: corpus, rejected: web }]);
    expect(base.snapshot().facts).toEqual([corpus]);
    expect(base.snapshot().version).toBe(2);
  });

  it('keeps the first figure between sources of the same kind', () => {
    const base = kb();
    const first = fact(2024, 22, 'corpus', 'ar-2024');
    const later = fact(2024, 25, 'corpus', 'ar-2025');
    base.merge({ facts: [first] });
    const report = base.merge({ facts: [later] });

    expect(report.conflicts).toEqual([{ year: 2024, kept: first, rejected: later }]);
    expect(base.snapshot().facts).toEqual([first]);
  });

  it('leaves the version alone when a conflict keeps the existing figure', () => {
    const base = kb();
    const corpus = fact(2024, 22, 'corpus', 'ar#page=3');
    base.merge({ facts: [corpus] });
    const before = base.snapshot();

    const report = base.merge({ facts: [fact(2024, 30, 'web', 'https://example.com/a')] });

    expect(report.conflicts).toHaveLength(1);
    expect(base.snapshot().version).toBe(1);
    expect(base.snapshot().updatedAt).toBe(before.updatedAt);
  });

  it('treats figures within one percent as the same figure', () => {
    const base = kb();
    base.merge({ facts: [fact(2024, 20, 'web')] });
    const corpus = fact(2024, 20.1, 'corpus');
    const report = base.merge({ facts: [corpus] });

    expect(report.conflicts).toEqual([]);
    expect(base.snapshot().facts).toEqual([corpus]);
    expect(base.snapshot().version).toBe(2);
  });

  it('sorts facts by year', () => {
    const base = kb();
    base.merge({ facts: [fact(2025, 22), fact(2023, 18), fact(2024, 20)] });
    expect(base.snapshot().facts.map((f) => f.year)).toEqual([2023, 2024, 2025]);
  });

  it('replaces the overview only with non-empty text', () => {
    const base = kb();
    base.merge({ overview: 'Network vendor.' });
    base.merge({ overview: '   ' });
    expect(base.snapshot().overview).toBe('Network vendor.');
    expect(base.snapshot().version).toBe(1);
  });

  it('hands out snapshots that later merges do not change', () => {
    const base = kb();
    base.merge({ snippets: [snippet('a', 'one')] });
    const before = base.snapshot();
    base.merge({ snippets: [snippet('b', 'two')] });

    expect(before.snippets).toHaveLength(1);
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.snippets)).toBe(true);
  });

  it('rebuild clears everything', () => {
    const base = kb();
    base.merge({ snippets: [snippet('a', 'one')], facts: [fact(2024, 20)], overview: 'x' });
    base.rebuild();

    expect(base.isEmpty).toBe(true);
    expect(base.snapshot()).toMatchObject({ snippets: [], facts: [], overview: '', updatedAt: null, version: 2 });
    expect(base.merge({ snippets: [snippet('a', 'one')] }).addedSnippets).toBe(1);
  });
});

describe('preferFact', () => {
  it('only lets corpus replace web', () => {
    const web = fact(2024, 1, 'web');
    const corpus = fact(2024, 2, 'corpus');
    expect(preferFact(web, corpus)).toBe(corpus);
    expect(preferFact(corpus, web)).toBe(corpus);
  });
});
