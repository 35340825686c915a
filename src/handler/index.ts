/**
 * Handler shapes shared by capability sets and traversers.
 */

export {
  type ContainerHandler,
  type ContainerPhase,
  type ContainerVisit,
  HANDLER_ARITY,
  type ValueHandler,
  type Visit,
} from './types.js';
