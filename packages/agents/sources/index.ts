export { DocumentCorpus } from './document-corpus.js';
export type { CorpusDocument, CorpusManifest, CorpusOptions } from './document-corpus.js';
export { SerpApiSearch, GoogleCseSearch, createWebSearchAdapter } from './web-search.js';
export type { WebSearchOptions } from './web-search.js';
export { createSnippet, SnippetSchema, SnippetListSchema } from './snippet.js';
export type { SnippetInput } from './snippet.js';
export type { SourceAdapter, DocumentCorpusAdapter, WebSearchAdapter } from './types.js';
