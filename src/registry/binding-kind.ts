/**
 * Binding taxonomy: the closed vocabulary of rules a capability can bind by,
 * and the method-name prefixes adapters use to declare them.
 *
 * | Method name            | Binding       | Handler shape |
 * |------------------------|---------------|---------------|
 * | `forImpl<Name>`        | `interface`   | value         |
 * | `forType<Name>`        | `type`        | value         |
 * | `forKind<Kind>`        | `kind`        | value         |
 * | `forContainer<Kind>`   | `container`   | container     |
 * | `forNilPointer`        | `nil_pointer` | value         |
 * | `forIntFamily`         | `int_family`  | value         |
 * | `forUintFamily`        | `uint_family` | value         |
 */

import {
  type Category,
  type ContainerKind,
  isContainerKind,
  kindFromSuffix,
  type ScalarKind,
} from '../value/kinds.js';
import type { ConcreteType, InterfaceType } from '../value/types.js';

export const IMPL_PREFIX = 'forImpl';
export const TYPE_PREFIX = 'forType';
export const KIND_PREFIX = 'forKind';
export const CONTAINER_PREFIX = 'forContainer';
export const NIL_POINTER_NAME = 'forNilPointer';
export const INT_FAMILY_NAME = 'forIntFamily';
export const UINT_FAMILY_NAME = 'forUintFamily';

export type BindingKind =
  | 'interface'
  | 'type'
  | 'kind'
  | 'container'
  | 'nil_pointer'
  | 'int_family'
  | 'uint_family';

/**
 * A fully specified matching rule.
 */
export type BindingRule =
  | { readonly binding: 'interface'; readonly token: InterfaceType }
  | { readonly binding: 'type'; readonly token: ConcreteType }
  | { readonly binding: 'kind'; readonly kind: ScalarKind }
  | { readonly binding: 'container'; readonly kind: ContainerKind }
  | { readonly binding: 'nil_pointer' }
  | { readonly binding: 'int_family' }
  | { readonly binding: 'uint_family' };

/**
 * What a method name alone says about its binding. Type-bound names still
 * need a token from the adapter's type table.
 */
export type NameClassification =
  | { readonly binding: 'interface' }
  | { readonly binding: 'type' }
  | Exclude<BindingRule, { binding: 'interface' | 'type' }>;

/**
 * Classify an adapter method name.
 *
 * @returns The classification, or null when the name is outside the vocabulary
 *
 * @example
 * classifyBindingName('forKindString');    // { binding: 'kind', kind: 'string' }
 * classifyBindingName('forContainerMap');  // { binding: 'container', kind: 'mapping' }
 * classifyBindingName('forKindRecord');    // null (containers bind via forContainer)
 * classifyBindingName('helper');           // null
 */
export function classifyBindingName(name: string): NameClassification | null {
  switch (name) {
    case NIL_POINTER_NAME:
      return { binding: 'nil_pointer' };
    case INT_FAMILY_NAME:
      return { binding: 'int_family' };
    case UINT_FAMILY_NAME:
      return { binding: 'uint_family' };
  }

  if (name.startsWith(IMPL_PREFIX) && name.length > IMPL_PREFIX.length) {
    return { binding: 'interface' };
  }
  if (name.startsWith(TYPE_PREFIX) && name.length > TYPE_PREFIX.length) {
    return { binding: 'type' };
  }
  if (name.startsWith(CONTAINER_PREFIX)) {
    const kind = kindFromSuffix(name.slice(CONTAINER_PREFIX.length));
    if (kind === null || !isContainerKind(kind)) {
      return null;
    }
    return { binding: 'container', kind };
  }
  if (name.startsWith(KIND_PREFIX)) {
    const kind = kindFromSuffix(name.slice(KIND_PREFIX.length));
    if (kind === null || isContainerKind(kind)) {
      return null;
    }
    return { binding: 'kind', kind };
  }
  return null;
}

/**
 * Whether a rule's handler uses the container shape.
 */
export function isContainerRule(rule: BindingRule): boolean {
  return rule.binding === 'container';
}

/**
 * Category a rule is keyed by, or null for type-bound and nil-pointer rules.
 */
export function categoryOf(rule: BindingRule): Category | null {
  switch (rule.binding) {
    case 'kind':
    case 'container':
      return rule.kind;
    case 'int_family':
    case 'uint_family':
      return rule.binding;
    default:
      return null;
  }
}

export function describeRule(rule: BindingRule): string {
  switch (rule.binding) {
    case 'interface':
      return `Impl:${rule.token.name}`;
    case 'type':
      return `Type:${rule.token.name}`;
    case 'kind':
    case 'container':
      return `Kind:${rule.kind}`;
    case 'nil_pointer':
      return 'NilPointer';
    case 'int_family':
      return 'IntFamily';
    case 'uint_family':
      return 'UintFamily';
  }
}
