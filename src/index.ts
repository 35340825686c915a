/**
 * capwalk
 *
 * Capability-driven traversal of typed value trees. Handlers are bound to
 * interfaces, concrete types, kinds or container kinds; a traverser walks a
 * value depth-first and dispatches every node to the first matching binding.
 *
 * @packageDocumentation
 */

// =============================================================================
// Value model - kinds, type tokens, values and reflection
// =============================================================================
export * from './value/index.js';

// =============================================================================
// Handler shapes
// =============================================================================
export * from './handler/index.js';

// =============================================================================
// Registry - capability sets, binding rules, matching and errors
// =============================================================================
export * from './registry/index.js';

// =============================================================================
// Traversal - config, context, property resolvers and the traverser
// =============================================================================
export * from './traversal/index.js';

// =============================================================================
// Events module
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Logging
// =============================================================================
export { createLogger, getRootLogger, type LogFields, type Logger, loggerOptionsFromEnv } from './logging/index.js';
