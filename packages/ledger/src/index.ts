export { resolveOriginAccount, sanitizeSegment, type AccountAliases } from './accounts.js';
export { generatePostings, isBalanced, type GeneratedEntry } from './generate.js';
export { renderLedger, renderTransaction, type LedgerEntry, type RenderOptions } from './render.js';
