// Zod schemas and inferred domain types
export * from './schemas/index.js';

// Error taxonomy
export * from './errors.js';

// Logging
export * from './logger.js';

// Pure utils (date, money, id, constants)
export * from './utils/index.js';

// Upstream record types and the store/upstream contracts
export * from './plaid/index.js';
