/**
 * Matcher: finds the binding a value dispatches to.
 *
 * Precedence, per value:
 * 1. A nil pointer goes to the nil-pointer binding when one is registered.
 * 2. The rule table is scanned in declaration order; first match wins.
 * 3. With auto-dereference on, an unbound non-nil pointer asks the caller
 *    to retry with its target; an unbound nil pointer is skipped.
 * 4. Otherwise the value is skipped when missing bindings are tolerated,
 *    and a BindingMissingError is thrown when they are not.
 */

import { kindInCategory } from '../value/kinds.js';
import { implementsInterface, isAssignable, typeNameOf } from '../value/types.js';
import {
  type ContainerValue,
  isContainer,
  isNilPointer,
  type TraversableValue,
} from '../value/values.js';
import type { BindingRegistry, CapabilityDescriptor } from './binding-registry.js';
import type { BoundContainerHandler, BoundValueHandler } from './capability-set.js';
import { BindingMissingError, InvariantViolationError } from './errors.js';

export type Resolution =
  | { readonly outcome: 'nil_pointer'; readonly name: string; readonly handler: BoundValueHandler }
  | {
      readonly outcome: 'value';
      readonly descriptor: CapabilityDescriptor;
      readonly handler: BoundValueHandler;
    }
  | {
      readonly outcome: 'container';
      readonly descriptor: CapabilityDescriptor;
      readonly value: ContainerValue;
      readonly handler: BoundContainerHandler;
    }
  | { readonly outcome: 'dereference'; readonly target: TraversableValue }
  | { readonly outcome: 'skip'; readonly reason: 'nil_pointer' | 'missing_binding' };

/**
 * Check a single rule against a value.
 */
export function matchesDescriptor(
  descriptor: CapabilityDescriptor,
  value: TraversableValue
): boolean {
  const bound = descriptor.boundType;
  if (bound !== null) {
    if (bound.variant === 'interface') {
      return implementsInterface(value, bound);
    }
    return value.type !== undefined && isAssignable(value.type, bound);
  }
  return descriptor.boundCategory !== null && kindInCategory(value.kind, descriptor.boundCategory);
}

export class Matcher {
  private readonly registry: BindingRegistry;

  constructor(registry: BindingRegistry) {
    this.registry = registry;
  }

  /**
   * Resolve the binding for a value.
   *
   * @throws BindingMissingError if nothing matches and missing bindings are not tolerated
   * @throws InvariantViolationError if a matched rule has no handler in the lookup maps
   */
  resolve(value: TraversableValue): Resolution {
    const nilPointer = this.registry.nilPointerBinding();
    if (nilPointer !== null && isNilPointer(value)) {
      return { outcome: 'nil_pointer', name: nilPointer.name, handler: nilPointer.handler };
    }

    for (const descriptor of this.registry.list()) {
      if (matchesDescriptor(descriptor, value)) {
        return this.bind(descriptor, value);
      }
    }

    const config = this.registry.config;
    if (config.autoDereferencePointers && value.kind === 'pointer') {
      return value.target !== null
        ? { outcome: 'dereference', target: value.target }
        : { outcome: 'skip', reason: 'nil_pointer' };
    }

    if (!config.toleratesMissingBinding) {
      throw new BindingMissingError(typeNameOf(value), value.kind);
    }
    return { outcome: 'skip', reason: 'missing_binding' };
  }

  private bind(descriptor: CapabilityDescriptor, value: TraversableValue): Resolution {
    if (descriptor.boundType !== null) {
      const handler = this.registry.handlerForType(descriptor.boundType);
      if (handler === undefined) {
        throw new InvariantViolationError(
          `Matched ${descriptor.name} but no handler is registered for type ${descriptor.boundType.name}`
        );
      }
      return { outcome: 'value', descriptor, handler };
    }

    const category = descriptor.boundCategory;
    const binding = category !== null ? this.registry.bindingForCategory(category) : undefined;
    if (binding === undefined) {
      throw new InvariantViolationError(
        `Matched ${descriptor.name} but no handler is registered for kind ${String(category)}`
      );
    }
    if (binding.shape === 'container') {
      if (!isContainer(value)) {
        throw new InvariantViolationError(
          `Container binding ${descriptor.name} matched non-container kind ${value.kind}`
        );
      }
      return { outcome: 'container', descriptor, value, handler: binding.handler };
    }
    return { outcome: 'value', descriptor, handler: binding.handler };
  }
}
