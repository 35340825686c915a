import type { TraversalContext } from '../traversal/context.js';
import type { ContainerValue, TraversableValue } from '../value/values.js';

/**
 * Position of a visited value relative to its parent container.
 *
 * The root is reported at depth 0 with index -1 and an empty name.
 * Children of a container at depth d are reported at depth d.
 */
export interface Visit<V extends TraversableValue = TraversableValue> {
  readonly depth: number;
  /** Index in parent: effective order for record members, else offset */
  readonly index: number;
  /** Member name in a parent record, '' otherwise */
  readonly name: string;
  readonly value: V;
}

/**
 * Start or end phase of a container call.
 */
export type ContainerPhase = 'start' | 'end';

export interface ContainerVisit<V extends ContainerValue = ContainerValue> extends Visit<V> {
  /** Number of dispatch slots (elements, 2 × keys, record slots, 0/1 for pointers) */
  readonly size: number;
  readonly phase: ContainerPhase;
}

/**
 * Handler for a scalar, type-bound, interface-bound or nil-pointer binding.
 * Throwing aborts the walk.
 */
export type ValueHandler = (context: TraversalContext, visit: Visit) => void;

/**
 * Handler for a container binding. On 'start' the result decides whether
 * children are visited; on 'end' it is ignored.
 */
export type ContainerHandler = (context: TraversalContext, visit: ContainerVisit) => boolean;

/**
 * Parameter count a handler of each shape may declare.
 */
export const HANDLER_ARITY = 2;
