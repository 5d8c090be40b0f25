import { Debug } from "../system/diagnostics/debug";
import { FieldNotFoundException } from "../system/field-not-found.exception";
import { IncorrectReturnTypeException } from "../system/incorrect-return-type.exception";
import { IncorrectValueTypeException } from "../system/incorrect-value-type.exception";
import { MemberAccessException } from "../system/member-access.exception";
import { MethodNotFoundException } from "../system/method-not-found.exception";
import { TargetInvocationException } from "../system/reflection/target-invocation.exception";
import { withElevatedAccess } from "./access-scope";
import { MemberLocator } from "./member-locator";
import { BindingFlags, FieldInfo, MethodInfo, Type } from "./reflection";
import { ReflectionOptions } from "./reflection-options";
import { isCompatibleType, matches } from "./type-matcher";

export type AccessorPair = {
  readMethod: MethodInfo | null;
  writeMethod: MethodInfo | null;
};

export type FieldResolution =
  | { kind: "accessor"; method: MethodInfo }
  | { kind: "slot"; field: FieldInfo }
  | { kind: "not-found"; name: string };

type AccessorRole = "read" | "write";

function isUpperCase(c: string): boolean {
  return c !== c.toLowerCase() && c === c.toUpperCase();
}

// "Name" -> "name", but "URL" stays "URL"
export function decapitalize(name: string): string {
  if (name.length > 1 && isUpperCase(name.charAt(0)) && isUpperCase(name.charAt(1))) return name;
  return name.charAt(0).toLowerCase() + name.slice(1);
}

// Property a method reads or writes by naming convention, if any
function accessorRoleOf(method: MethodInfo): { property: string; role: AccessorRole } | null {
  const { name, parameters, returnType } = method;
  if (method.isStatic) return null;
  if (name.length > 3 && name.startsWith("get") && parameters.length === 0 && returnType !== Type.void) {
    return { property: decapitalize(name.slice(3)), role: "read" };
  }
  if (name.length > 2 && name.startsWith("is") && parameters.length === 0 && returnType.PrimitiveKind === "Boolean") {
    return { property: decapitalize(name.slice(2)), role: "read" };
  }
  if (name.length > 3 && name.startsWith("set") && parameters.length === 1 && returnType === Type.void) {
    return { property: decapitalize(name.slice(3)), role: "write" };
  }
  return null;
}

function describeValueType(value: unknown): string {
  if (value === null || value === undefined) return "null";
  const t = Type.of(value);
  if (t && t !== Type.object) return t.FullName;
  if (typeof value === "object" && value !== null) return value.constructor?.name ?? "Object";
  return typeof value;
}

/**
 * Reads and writes fields by name, preferring a conventional accessor over the raw slot.
 *
 * A `getX`/`isX`/`setX` accessor runs whatever logic its class put there. Only when none
 * exists, or it cannot be used, is the slot located along the hierarchy and accessed
 * directly with its access check lifted for the one operation.
 */
export class FieldAccessor {
  readonly locator: MemberLocator;

  constructor(locator: MemberLocator = new MemberLocator()) {
    this.locator = locator;
  }

  get options(): ReflectionOptions { return this.locator.options; }

  discoverAccessors(type: Type, name: string): AccessorPair {
    let readMethod: MethodInfo | null = null;
    const writers: MethodInfo[] = [];
    for (const method of type.GetMethods(BindingFlags.Public | BindingFlags.Instance)) {
      const accessor = accessorRoleOf(method);
      if (!accessor || accessor.property !== name) continue;
      if (accessor.role === "write") {
        writers.push(method);
      } else if (!readMethod) {
        readMethod = method;
      }
    }
    const readType = readMethod?.returnType;
    const writeMethod = writers.find(w => w.parameters[0].parameterType === readType) ?? writers[0] ?? null;
    return { readMethod, writeMethod };
  }

  resolve(type: Type, name: string, role: AccessorRole): FieldResolution {
    const pair = this.discoverAccessors(type, name);
    const method = role === "read" ? pair.readMethod : pair.writeMethod;
    if (method) return { kind: "accessor", method };
    const field = this.locator.findField(type, name);
    return field ? { kind: "slot", field } : { kind: "not-found", name };
  }

  readField(instance: unknown, name: string, expectedType: Type = Type.string): unknown {
    if (instance === null || instance === undefined) return null;
    const type = Type.of(instance) ?? Type.object;
    const resolution = this.resolve(type, name, "read");
    if (resolution.kind === "accessor") {
      const result: { value?: unknown } = {};
      if (this.tryInvokeAccessor(resolution.method, instance, [], result)) {
        return result.value;
      }
    }
    return this.readSlot(instance, this.fallbackSlot(type, name, resolution), expectedType);
  }

  writeField(instance: unknown, name: string, value: unknown): void {
    if (instance === null || instance === undefined) return;
    const type = Type.of(instance) ?? Type.object;
    const resolution = this.resolve(type, name, "write");
    if (resolution.kind === "accessor") {
      // The setter's declared parameter decides; a mismatch here is not a reason to fall back
      if (!this.accepts(value, resolution.method.parameters[0].parameterType)) {
        throw new IncorrectValueTypeException(describeValueType(value));
      }
      if (this.tryInvokeAccessor(resolution.method, instance, [value], {})) {
        return;
      }
    }
    this.writeSlot(instance, this.fallbackSlot(type, name, resolution), value);
  }

  readSlot(instance: unknown, field: FieldInfo, expectedType: Type = Type.string): unknown {
    if (instance === null || instance === undefined) return null;
    if (expectedType !== Type.object && !isCompatibleType(expectedType, field.fieldType)) {
      throw new IncorrectReturnTypeException(expectedType.FullName);
    }
    return withElevatedAccess(field, this.options, () => field.GetValue(instance));
  }

  writeSlot(instance: unknown, field: FieldInfo, value: unknown): void {
    if (instance === null || instance === undefined) return;
    if (!this.accepts(value, field.fieldType)) {
      throw new IncorrectValueTypeException(describeValueType(value));
    }
    withElevatedAccess(field, this.options, () => field.SetValue(instance, value));
  }

  // Null fits anything but a primitive; System.Object takes any value
  private accepts(value: unknown, targetType: Type): boolean {
    if (value === null || value === undefined) return !targetType.IsPrimitive;
    return targetType === Type.object || matches(value, targetType);
  }

  private fallbackSlot(type: Type, name: string, resolution: FieldResolution): FieldInfo {
    switch (resolution.kind) {
      case "slot":
        return resolution.field;
      case "accessor":
        return this.locator.locateField(type, name);
      case "not-found":
        throw new FieldNotFoundException(name);
    }
  }

  private tryInvokeAccessor(method: MethodInfo, instance: unknown, args: unknown[], outValue: { value?: unknown }): boolean {
    try {
      outValue.value = method.Invoke(instance, args);
      return true;
    } catch (error) {
      if (error instanceof TargetInvocationException && this.options.accessorFailure === "propagate") {
        throw error;
      }
      if (!(error instanceof TargetInvocationException
        || error instanceof MemberAccessException
        || error instanceof MethodNotFoundException)) {
        throw error;
      }
      if (this.options.trace) {
        Debug.WriteFormat("Accessor {0} unusable, falling back to field access: {1}", method, error.message);
      }
      return false;
    }
  }
}
