import { FieldNotFoundException } from "../system/field-not-found.exception";
import { MethodNotFoundException } from "../system/method-not-found.exception";
import { BindingFlags, FieldInfo, MethodInfo, Type } from "./reflection";
import { DEFAULT_REFLECTION_OPTIONS, ReflectionOptions } from "./reflection-options";

const DECLARED_ANY = BindingFlags.DeclaredOnly | BindingFlags.Public | BindingFlags.NonPublic
  | BindingFlags.Instance | BindingFlags.Static;
const PUBLIC_ANY = BindingFlags.Public | BindingFlags.Instance | BindingFlags.Static;

/**
 * Finds storage slots and methods along a type's base chain.
 *
 * Slots are looked up among the members each type declares itself, most-derived first, so a
 * redeclared field shadows the one it hides. The walk ends before the first stop type.
 */
export class MemberLocator {
  readonly options: ReflectionOptions;

  constructor(options: ReflectionOptions = DEFAULT_REFLECTION_OPTIONS) {
    this.options = options;
  }

  // The types a field walk inspects, in order
  *hierarchy(type: Type): Generator<Type> {
    for (const t of type._lineage()) {
      if (this.isStopType(t)) return;
      yield t;
    }
  }

  findField(type: Type, name: string): FieldInfo | null {
    for (const t of this.hierarchy(type)) {
      const field = t.GetDeclaredField(name);
      if (field) return field;
    }
    return null;
  }

  locateField(type: Type, name: string): FieldInfo {
    const field = this.findField(type, name);
    if (!field) throw new FieldNotFoundException(name);
    return field;
  }

  // Declared on `type` (any visibility) first, then any public method in the hierarchy
  locateMethod(type: Type, name: string, ...parameterTypes: Type[]): MethodInfo {
    const method = type.GetMethod(name, DECLARED_ANY, parameterTypes)
      ?? type.GetMethod(name, PUBLIC_ANY, parameterTypes);
    if (!method) throw new MethodNotFoundException(name);
    return method;
  }

  private isStopType(type: Type): boolean {
    return this.options.stopTypes.includes(type);
  }
}
