/**
 * Traversable value model: kinds, type tokens, values and native reflection.
 */

export {
  CONTAINER_KINDS,
  type Category,
  type ContainerKind,
  isContainerKind,
  isScalarKind,
  isSignedIntegerKind,
  isUnsignedIntegerKind,
  type KindFamily,
  kindFromSuffix,
  kindInCategory,
  SCALAR_KINDS,
  type ScalarKind,
  SIGNED_INTEGER_KINDS,
  type SignedIntegerKind,
  UNSIGNED_INTEGER_KINDS,
  type UnsignedIntegerKind,
  type ValueKind,
} from './kinds.js';
export { type ReflectorOptions, ValueReflector } from './reflect.js';
export {
  type ConcreteType,
  defineInterface,
  defineRecord,
  defineType,
  type FieldSpec,
  type InterfaceOptions,
  type InterfaceType,
  implementsInterface,
  isAssignable,
  isRecordType,
  type RecordType,
  type TypeOptions,
  type TypeToken,
  typeNameOf,
} from './types.js';
export {
  bool,
  type ContainerValue,
  float,
  fn,
  int,
  isContainer,
  isNilPointer,
  type MappingValue,
  mapping,
  nil,
  type PointerValue,
  ptr,
  type RecordValue,
  record,
  type ScalarValue,
  type SequenceValue,
  scalar,
  seq,
  str,
  type TraversableValue,
  uint,
} from './values.js';
