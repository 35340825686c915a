/**
 * Coarse runtime categories ("kinds") of traversable values.
 *
 * A kind is distinct from a value's concrete type: many types share
 * one kind, and bindings may target either.
 */

/**
 * Signed integer kinds
 */
export const SIGNED_INTEGER_KINDS = ['int', 'int8', 'int16', 'int32', 'int64'] as const;

/**
 * Unsigned integer kinds
 */
export const UNSIGNED_INTEGER_KINDS = ['uint', 'uint8', 'uint16', 'uint32', 'uint64'] as const;

/**
 * Every scalar (non-container) kind
 */
export const SCALAR_KINDS = [
  'boolean',
  'string',
  'function',
  'float32',
  'float64',
  ...SIGNED_INTEGER_KINDS,
  ...UNSIGNED_INTEGER_KINDS,
] as const;

/**
 * Kinds that own child values and are bracketed by start/end calls
 */
export const CONTAINER_KINDS = ['sequence', 'mapping', 'pointer', 'record'] as const;

export type SignedIntegerKind = (typeof SIGNED_INTEGER_KINDS)[number];
export type UnsignedIntegerKind = (typeof UNSIGNED_INTEGER_KINDS)[number];
export type ScalarKind = (typeof SCALAR_KINDS)[number];
export type ContainerKind = (typeof CONTAINER_KINDS)[number];
export type ValueKind = ScalarKind | ContainerKind;

/**
 * Kind families that a single binding can cover.
 */
export type KindFamily = 'int_family' | 'uint_family';

/**
 * Anything a category binding can be keyed by.
 */
export type Category = ValueKind | KindFamily;

const CONTAINER_KIND_SET: ReadonlySet<string> = new Set(CONTAINER_KINDS);
const SCALAR_KIND_SET: ReadonlySet<string> = new Set(SCALAR_KINDS);
const SIGNED_KIND_SET: ReadonlySet<string> = new Set(SIGNED_INTEGER_KINDS);
const UNSIGNED_KIND_SET: ReadonlySet<string> = new Set(UNSIGNED_INTEGER_KINDS);

export function isContainerKind(kind: string): kind is ContainerKind {
  return CONTAINER_KIND_SET.has(kind);
}

export function isScalarKind(kind: string): kind is ScalarKind {
  return SCALAR_KIND_SET.has(kind);
}

export function isSignedIntegerKind(kind: string): kind is SignedIntegerKind {
  return SIGNED_KIND_SET.has(kind);
}

export function isUnsignedIntegerKind(kind: string): kind is UnsignedIntegerKind {
  return UNSIGNED_KIND_SET.has(kind);
}

/**
 * Check whether a value kind belongs to a category.
 *
 * @example
 * kindInCategory('int16', 'int_family'); // true
 * kindInCategory('int16', 'int');        // false
 */
export function kindInCategory(kind: ValueKind, category: Category): boolean {
  switch (category) {
    case 'int_family':
      return isSignedIntegerKind(kind);
    case 'uint_family':
      return isUnsignedIntegerKind(kind);
    default:
      return kind === category;
  }
}

// PascalCase suffixes used by adapter method names, e.g. forKindString.
const KIND_SUFFIXES: ReadonlyMap<string, ValueKind> = new Map<string, ValueKind>([
  ...[...SCALAR_KINDS, ...CONTAINER_KINDS].map(
    (kind): [string, ValueKind] => [kind.charAt(0).toUpperCase() + kind.slice(1), kind]
  ),
  ['Bool', 'boolean'],
  ['Ptr', 'pointer'],
  ['Array', 'sequence'],
  ['Map', 'mapping'],
  ['Struct', 'record'],
]);

/**
 * Parse a kind from an adapter method-name suffix.
 *
 * @returns The kind, or null when the suffix is not in the vocabulary
 */
export function kindFromSuffix(suffix: string): ValueKind | null {
  return KIND_SUFFIXES.get(suffix) ?? null;
}
