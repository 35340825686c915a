/**
 * Traversable value model.
 *
 * A tagged union over the value shapes the traverser understands. Every
 * value carries its kind, and optionally a concrete type token used by
 * type and interface bindings.
 */

import { ReflectionError } from '../registry/errors.js';
import type {
  ScalarKind,
  SignedIntegerKind,
  UnsignedIntegerKind,
} from './kinds.js';
import type { ConcreteType, RecordType } from './types.js';

export interface ScalarValue {
  readonly kind: ScalarKind;
  readonly value: unknown;
  readonly type?: ConcreteType;
}

export interface SequenceValue {
  readonly kind: 'sequence';
  readonly items: readonly TraversableValue[];
  readonly type?: ConcreteType;
}

export interface MappingValue {
  readonly kind: 'mapping';
  /** Keys and values are both traversed; enumeration order is the map's */
  readonly entries: Map<TraversableValue, TraversableValue>;
  readonly type?: ConcreteType;
}

export interface PointerValue {
  readonly kind: 'pointer';
  /** null for a nil pointer */
  readonly target: TraversableValue | null;
  readonly type?: ConcreteType;
}

export interface RecordValue {
  readonly kind: 'record';
  readonly type: RecordType;
  /** Positional, aligned with type.fields */
  readonly fields: readonly TraversableValue[];
}

export type ContainerValue = SequenceValue | MappingValue | PointerValue | RecordValue;

export type TraversableValue = ScalarValue | ContainerValue;

export function isContainer(value: TraversableValue): value is ContainerValue {
  switch (value.kind) {
    case 'sequence':
    case 'mapping':
    case 'pointer':
    case 'record':
      return true;
    default:
      return false;
  }
}

export function isNilPointer(value: TraversableValue): value is PointerValue {
  return value.kind === 'pointer' && value.target === null;
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

function withType<T extends object>(shape: T, type: ConcreteType | undefined): T {
  return type === undefined ? shape : { ...shape, type };
}

export function scalar(kind: ScalarKind, value: unknown, type?: ConcreteType): ScalarValue {
  return withType({ kind, value }, type);
}

export function bool(value: boolean, type?: ConcreteType): ScalarValue {
  return scalar('boolean', value, type);
}

export function str(value: string, type?: ConcreteType): ScalarValue {
  return scalar('string', value, type);
}

export function int(
  value: number | bigint,
  kind: SignedIntegerKind = 'int',
  type?: ConcreteType
): ScalarValue {
  return scalar(kind, value, type);
}

export function uint(
  value: number | bigint,
  kind: UnsignedIntegerKind = 'uint',
  type?: ConcreteType
): ScalarValue {
  return scalar(kind, value, type);
}

export function float(
  value: number,
  kind: 'float32' | 'float64' = 'float64',
  type?: ConcreteType
): ScalarValue {
  return scalar(kind, value, type);
}

export function fn(value: (...args: never[]) => unknown, type?: ConcreteType): ScalarValue {
  return scalar('function', value, type);
}

export function seq(items: readonly TraversableValue[], type?: ConcreteType): SequenceValue {
  return withType({ kind: 'sequence' as const, items }, type);
}

export function mapping(
  entries: Iterable<readonly [TraversableValue, TraversableValue]>,
  type?: ConcreteType
): MappingValue {
  return withType({ kind: 'mapping' as const, entries: new Map(entries) }, type);
}

export function ptr(target: TraversableValue, type?: ConcreteType): PointerValue {
  return withType({ kind: 'pointer' as const, target }, type);
}

export function nil(type?: ConcreteType): PointerValue {
  return withType({ kind: 'pointer' as const, target: null }, type);
}

/**
 * Build a record value from field values keyed by name.
 *
 * @throws ReflectionError if a declared field is missing or an unknown one is given
 */
export function record(
  type: RecordType,
  values: Readonly<Record<string, TraversableValue>>
): RecordValue {
  const known = new Set(type.fields.map((field) => field.name));
  for (const name of Object.keys(values)) {
    if (!known.has(name)) {
      throw new ReflectionError(`Record type ${type.name} has no field '${name}'`);
    }
  }

  const fields = type.fields.map((field) => {
    const value = Object.hasOwn(values, field.name) ? values[field.name] : undefined;
    if (value === undefined) {
      throw new ReflectionError(`Missing value for field '${field.name}' of ${type.name}`);
    }
    return value;
  });

  return { kind: 'record', type, fields };
}

