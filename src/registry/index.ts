/**
 * Binding registry infrastructure.
 *
 * - `CapabilitySet`: Declares handlers, by builder calls or from an adapter object
 * - `classifyBindingName`: Maps a capability name to its binding rule
 * - `BindingRegistry`: Validated, immutable rule table built from a capability set
 * - `Matcher`: Finds the binding a value dispatches to
 *
 * @example Building a registry from an adapter
 * ```typescript
 * import { BindingRegistry, CapabilitySet } from './registry';
 *
 * const registry = BindingRegistry.build(
 *   CapabilitySet.fromAdapter(new PrintingAdapter()),
 *   { toleratesMissingBinding: true }
 * );
 * console.log(registry.describe());
 * ```
 *
 * @module registry
 */

export {
  type BindingKind,
  type BindingRule,
  CONTAINER_PREFIX,
  categoryOf,
  classifyBindingName,
  describeRule,
  IMPL_PREFIX,
  INT_FAMILY_NAME,
  isContainerRule,
  KIND_PREFIX,
  NIL_POINTER_NAME,
  type NameClassification,
  TYPE_PREFIX,
  UINT_FAMILY_NAME,
} from './binding-kind.js';
export {
  BindingRegistry,
  type CapabilityDescriptor,
  type CategoryBinding,
  describeDescriptor,
  type NilPointerBinding,
} from './binding-registry.js';
export {
  type AdapterOptions,
  type BoundContainerHandler,
  type BoundValueHandler,
  type CapabilityEntry,
  CapabilitySet,
  type ContainerRule,
  type ValueRule,
} from './capability-set.js';
export {
  AmbiguousBindingError,
  AsyncHandlerError,
  BindingMissingError,
  ContainerEndError,
  DefectError,
  HandlerReturnError,
  InvalidAdapterError,
  InvariantViolationError,
  NoUsableBindingError,
  PropertyOrderError,
  ReflectionError,
  RegistryError,
  TraversalError,
} from './errors.js';
export { Matcher, matchesDescriptor, type Resolution } from './matcher.js';
