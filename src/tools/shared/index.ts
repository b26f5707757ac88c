// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { toolResponse, toolError } from './response.js';
