import { Activator } from "../system/reflection/activator";
import { withElevatedAccess } from "./access-scope";
import { FieldAccessor } from "./field-accessor";
import { MemberLocator } from "./member-locator";
import { FieldInfo, MethodInfo, Type } from "./reflection";
import { DEFAULT_REFLECTION_OPTIONS } from "./reflection-options";

export * from "./reflection";
export * from "./reflection-options";
export { withElevatedAccess } from "./access-scope";
export { MemberLocator } from "./member-locator";
export { FieldAccessor, decapitalize } from "./field-accessor";
export type { AccessorPair, FieldResolution } from "./field-accessor";
export { matches, isCompatibleType, primitiveKindOf } from "./type-matcher";
export { Activator } from "../system/reflection/activator";
export { Debug } from "../system/diagnostics/debug";

export { SByte } from "../system/sbyte";
export { Int16 } from "../system/int16";
export { Int32 } from "../system/int32";
export { Int64 } from "../system/int64";
export { Single } from "../system/single";
export { Double } from "../system/double";
export { Bool } from "../system/bool";
export { Char } from "../system/char";
export { ValueType } from "../system/value-type";

export { AccessViolationException } from "../system/access-violation.exception";
export { ArgumentException } from "../system/argument.exception";
export { ArgumentOutOfRangeException } from "../system/argument-out-of-range.exception";
export { FieldNotFoundException } from "../system/field-not-found.exception";
export { IncorrectReturnTypeException } from "../system/incorrect-return-type.exception";
export { IncorrectValueTypeException } from "../system/incorrect-value-type.exception";
export { InstantiationException } from "../system/instantiation.exception";
export { MemberAccessException } from "../system/member-access.exception";
export { MethodNotFoundException } from "../system/method-not-found.exception";
export { NoAccessibleConstructorException } from "../system/no-accessible-constructor.exception";
export { TargetInvocationException } from "../system/reflection/target-invocation.exception";
export { TypeLoadException } from "../system/type-load.exception";

const locator = new MemberLocator(DEFAULT_REFLECTION_OPTIONS);
const accessor = new FieldAccessor(locator);

// Reads a field, through its getter when one exists; the expected type defaults to System.String
export function readField(instance: unknown, name: string, expectedType: Type = Type.string): unknown {
  return accessor.readField(instance, name, expectedType);
}

export function writeField(instance: unknown, name: string, value: unknown): void {
  accessor.writeField(instance, name, value);
}

export function readSlot(instance: unknown, field: FieldInfo, expectedType: Type = Type.string): unknown {
  return accessor.readSlot(instance, field, expectedType);
}

export function writeSlot(instance: unknown, field: FieldInfo, value: unknown): void {
  accessor.writeSlot(instance, field, value);
}

export function findField(type: Type, name: string): FieldInfo | null {
  return locator.findField(type, name);
}

export function locateField(type: Type, name: string): FieldInfo {
  return locator.locateField(type, name);
}

export function locateMethod(type: Type, name: string, ...parameterTypes: Type[]): MethodInfo {
  return locator.locateMethod(type, name, ...parameterTypes);
}

export function invokeMethod(target: unknown, method: MethodInfo, ...args: unknown[]): unknown {
  return withElevatedAccess(method, DEFAULT_REFLECTION_OPTIONS, () => method.Invoke(target, args));
}

export function construct(type: Type): unknown {
  return Activator.CreateInstance(type, DEFAULT_REFLECTION_OPTIONS);
}
