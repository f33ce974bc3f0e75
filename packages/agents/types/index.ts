export type * from './knowledge.js';
export type * from './agents.js';
export * from './report.js';
export * from './events.js';
