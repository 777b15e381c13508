// ============================================================================
// prefcanvas Shared Package - Main Entry Point
// ============================================================================

// Types
export * from './types/index.js';

// Model catalog
export * from './catalog/models.js';
