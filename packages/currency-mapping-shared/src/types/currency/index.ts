// ============================================================================
// Currency Types
// ============================================================================

export * from './token-table.js';
export * from './currency-id.types.js';
