import { Bool } from "../system/bool";
import { Char } from "../system/char";
import { Double } from "../system/double";
import { Int16 } from "../system/int16";
import { Int32 } from "../system/int32";
import { Int64 } from "../system/int64";
import { SByte } from "../system/sbyte";
import { Single } from "../system/single";
import { PrimitiveKind, Type } from "./reflection";

/**
 * Runtime kind of a value, or null when the value is not one of the eight primitive kinds.
 * A JS `number` is a double, a `bigint` a long and a `boolean` a boolean; boxed values
 * report the kind they were constructed as.
 */
export function primitiveKindOf(value: unknown): PrimitiveKind | null {
  switch (typeof value) {
    case "number": return "Double";
    case "bigint": return "Int64";
    case "boolean": return "Boolean";
  }
  if (value instanceof SByte) return "SByte";
  if (value instanceof Int16) return "Int16";
  if (value instanceof Int32) return "Int32";
  if (value instanceof Int64) return "Int64";
  if (value instanceof Single) return "Single";
  if (value instanceof Double) return "Double";
  if (value instanceof Bool) return "Boolean";
  if (value instanceof Char) return "Char";
  return null;
}

/**
 * Whether `value` may be used where `targetType` is declared.
 *
 * A primitive type and its boxed counterpart are the same target here, and the value must
 * be of exactly that kind: an `Int32` matches `int` and `System.Int32` but never `long`.
 * There is no numeric widening. Every other target is an instance-of test.
 */
export function matches(value: unknown, targetType: Type): boolean {
  const kind = targetType.PrimitiveKind;
  if (kind !== null) {
    return primitiveKindOf(value) === kind;
  }
  return targetType.IsInstanceOfType(value);
}

// Type-level counterpart of matches(): can a slot of type `source` be read as `target`?
export function isCompatibleType(target: Type, source: Type): boolean {
  const kind = target.PrimitiveKind;
  if (kind !== null && kind === source.PrimitiveKind) {
    return true;
  }
  return target.IsAssignableFrom(source);
}
