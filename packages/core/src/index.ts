/**
 * @llm-relay/core - Core package for llm-relay
 *
 * Re-exports message types, configuration and utilities.
 */

// Types & Schemas
export * from './types/index.js';

// Configuration
export * from './config/index.js';

// Utilities
export { errorMessage, isPlainObject, omitKeys } from './utils/index.js';
