/**
 * Type identity tokens for traversable values.
 *
 * A token stands in for a runtime type: concrete types are matched by
 * identity or declared assignability, interfaces nominally (declared
 * implementations) or structurally (a guard over the value).
 *
 * @example
 * ```typescript
 * const Named = defineInterface('Named');
 * const UserId = defineType('UserId', { implements: [Named] });
 * const Account = defineRecord('Account', ['id', { name: 'secret', hidden: true }]);
 * ```
 */

import type { TraversableValue } from './values.js';

/**
 * Interface-like type, satisfied nominally or through its guard.
 */
export interface InterfaceType {
  readonly variant: 'interface';
  readonly id: symbol;
  readonly name: string;
  /** Interfaces this one refines; satisfying this one satisfies them */
  readonly extends: readonly InterfaceType[];
  /** Structural check, consulted when no declaration matches */
  readonly guard?: (value: TraversableValue) => boolean;
}

/**
 * Concrete (nominal) type.
 */
export interface ConcreteType {
  readonly variant: 'concrete';
  readonly id: symbol;
  readonly name: string;
  /** Types a value of this type may be assigned to */
  readonly assignableTo: readonly ConcreteType[];
  /** Interfaces this type declares it implements */
  readonly implements: readonly InterfaceType[];
}

/**
 * Declared field of a record type.
 */
export interface FieldSpec {
  readonly name: string;
  /** Not externally visible; never enumerated by the default resolver */
  readonly hidden?: boolean;
  /** Explicit effective order, honoured by the ordered resolver */
  readonly order?: number;
  /** Excluded by the ordered resolver */
  readonly skip?: boolean;
}

/**
 * Concrete type with an ordered field layout.
 */
export interface RecordType extends ConcreteType {
  readonly fields: readonly FieldSpec[];
}

export type TypeToken = ConcreteType | InterfaceType;

export interface TypeOptions {
  assignableTo?: readonly ConcreteType[];
  implements?: readonly InterfaceType[];
}

export interface InterfaceOptions {
  extends?: readonly InterfaceType[];
  guard?: (value: TraversableValue) => boolean;
}

export function defineType(name: string, options: TypeOptions = {}): ConcreteType {
  return Object.freeze({
    variant: 'concrete' as const,
    id: Symbol(name),
    name,
    assignableTo: Object.freeze([...(options.assignableTo ?? [])]),
    implements: Object.freeze([...(options.implements ?? [])]),
  });
}

export function defineInterface(name: string, options: InterfaceOptions = {}): InterfaceType {
  const token: InterfaceType = {
    variant: 'interface',
    id: Symbol(name),
    name,
    extends: Object.freeze([...(options.extends ?? [])]),
    ...(options.guard ? { guard: options.guard } : {}),
  };
  return Object.freeze(token);
}

/**
 * Define a record type. Plain strings are shorthand for visible fields.
 *
 * @throws Error if two fields share a name
 */
export function defineRecord(
  name: string,
  fields: ReadonlyArray<string | FieldSpec>,
  options: TypeOptions = {}
): RecordType {
  const specs = fields.map((field) => (typeof field === 'string' ? { name: field } : { ...field }));
  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new Error(`Duplicate field '${spec.name}' in record type ${name}`);
    }
    seen.add(spec.name);
  }

  return Object.freeze({
    ...defineType(name, options),
    fields: Object.freeze(specs.map((spec) => Object.freeze(spec))),
  });
}

export function isRecordType(type: TypeToken | undefined): type is RecordType {
  return type !== undefined && type.variant === 'concrete' && 'fields' in type;
}

/**
 * Check whether a concrete type is identical or declared assignable
 * (transitively) to a target type.
 */
export function isAssignable(type: ConcreteType, target: ConcreteType): boolean {
  if (type === target) {
    return true;
  }
  return type.assignableTo.some((next) => isAssignable(next, target));
}

function refines(iface: InterfaceType, target: InterfaceType): boolean {
  if (iface === target) {
    return true;
  }
  return iface.extends.some((next) => refines(next, target));
}

function declaresInterface(type: ConcreteType, target: InterfaceType): boolean {
  if (type.implements.some((iface) => refines(iface, target))) {
    return true;
  }
  return type.assignableTo.some((next) => declaresInterface(next, target));
}

/**
 * Check whether a value satisfies an interface.
 *
 * Declared implementations win; otherwise the interface's guard decides.
 */
export function implementsInterface(value: TraversableValue, iface: InterfaceType): boolean {
  if (value.type !== undefined && declaresInterface(value.type, iface)) {
    return true;
  }
  return iface.guard !== undefined && iface.guard(value);
}

/**
 * Human-readable type name of a value, falling back to its kind.
 */
export function typeNameOf(value: TraversableValue): string {
  return value.type?.name ?? value.kind;
}
