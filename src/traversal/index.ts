/**
 * Traversal engine: configuration, shared context, property resolvers and
 * the traverser itself.
 */

export {
  DEFAULT_TRAVERSAL_CONFIG,
  describeConfig,
  resolveTraversalConfig,
  type TraversalConfig,
  type TraversalConfigInput,
} from './config.js';
export { ContextKey, defineContextKey, TraversalContext } from './context.js';
export { type ChildPosition, ROOT_POSITION, TraversalFrame } from './frame.js';
export {
  CachingPropertyResolver,
  DefaultPropertyResolver,
  describeProperty,
  dispatchIndex,
  OrderedPropertyResolver,
  type Property,
  type PropertyResolution,
  type PropertyResolver,
} from './properties.js';
export { Traverser, type TraverserOptions } from './traverser.js';
