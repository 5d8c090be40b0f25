/*
 Reflection runtime
 - Provides a .NET-style reflection API over TypeScript classes
 - Consumes declared member metadata via registerType/registerMetadata
 - Supports: Type lookup, hierarchy walks, member enumeration, invocation and construction
 - Member handles are built on every lookup and carry their own accessibility flag
*/

import { ArgumentException } from "../system/argument.exception";
import { Bool } from "../system/bool";
import { Char } from "../system/char";
import { Double } from "../system/double";
import { Int16 } from "../system/int16";
import { Int32 } from "../system/int32";
import { Int64 } from "../system/int64";
import { MemberAccessException } from "../system/member-access.exception";
import { MethodNotFoundException } from "../system/method-not-found.exception";
import { TargetInvocationException } from "../system/reflection/target-invocation.exception";
import { TypeLoadException } from "../system/type-load.exception";
import { SByte } from "../system/sbyte";
import { Single } from "../system/single";

export type PrimitiveKind = "SByte" | "Int16" | "Int32" | "Int64" | "Single" | "Double" | "Boolean" | "Char";

// Any class, including ones with a private constructor
export type TypeConstructor = Function;

export type ParameterMetadata = {
  name: string;
  type: string; // full name
};

export type MethodMetadata = {
  name: string;
  isPublic?: boolean;
  isStatic?: boolean;
  returnType?: string; // full name
  parameters?: ParameterMetadata[];
};

export type ConstructorMetadata = {
  isPublic?: boolean;
  parameters?: ParameterMetadata[];
};

export type FieldMetadata = {
  name: string;
  type: string; // full name
  isPublic?: boolean;
  isStatic?: boolean;
};

export type TypeMetadata = {
  name: string;
  namespace?: string;
  fullName: string; // namespace + name
  isClass?: boolean;
  isInterface?: boolean;
  isAbstract?: boolean;
  isPrimitive?: boolean;
  primitiveKind?: PrimitiveKind;
  // Nested types: a non-static nested class needs an enclosing instance to be constructed
  declaringType?: string;
  isStatic?: boolean;
  baseType?: string; // full name
  interfaces?: string[];
  fields?: FieldMetadata[];
  methods?: MethodMetadata[];
  // Omitted means one implicit public parameterless constructor
  constructors?: ConstructorMetadata[];
};

export enum BindingFlags {
  Default = 0,
  DeclaredOnly = 1 << 1,
  Instance = 1 << 2,
  Static = 1 << 3,
  Public = 1 << 4,
  NonPublic = 1 << 5,
}

class ReflectionRegistry {
  private byFullName = new Map<string, Type>();
  private byCtor = new WeakMap<TypeConstructor, Type>();
  private unresolved = new Map<string, Type>();

  register(ctor: TypeConstructor, metadata: TypeMetadata): Type {
    const existing = this.byFullName.get(metadata.fullName);
    if (existing) {
      if (existing._ctor === ctor) return existing;
      if (existing._ctor) {
        throw new ArgumentException(`Type ${metadata.fullName} is already registered to another class.`, "ctor");
      }
      this.byCtor.set(ctor, existing);
      existing._bindCtor(ctor);
      return existing;
    }
    const t = new Type(metadata, ctor);
    this.byFullName.set(t.FullName, t);
    this.byCtor.set(ctor, t);
    this.unresolved.delete(t.FullName);
    return t;
  }

  registerMetadataOnly(metadata: TypeMetadata): Type {
    const existing = this.byFullName.get(metadata.fullName);
    if (existing) return existing;
    const t = new Type(metadata, null);
    this.byFullName.set(t.FullName, t);
    this.unresolved.delete(t.FullName);
    return t;
  }

  getByCtor(ctor: TypeConstructor | null | undefined): Type | undefined {
    if (!ctor) return undefined;
    return this.byCtor.get(ctor);
  }

  getByFullName(fullName: string): Type | undefined {
    return this.byFullName.get(fullName);
  }

  // Stand-in for a declared type name nobody registered; it is assignable from nothing but itself
  placeholder(fullName: string): Type {
    let t = this.unresolved.get(fullName);
    if (!t) {
      const dot = fullName.lastIndexOf(".");
      t = new Type({
        name: fullName.slice(dot + 1),
        namespace: dot > 0 ? fullName.slice(0, dot) : undefined,
        fullName,
        isClass: false,
      }, null, false);
      this.unresolved.set(fullName, t);
    }
    return t;
  }
}

// Declared member types resolve when a handle is built, so later registrations are picked up
function resolveDeclaredType(fullName: string): Type {
  return registry.getByFullName(fullName) ?? registry.placeholder(fullName);
}

const registry = new ReflectionRegistry();

function isObjectLike(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

export abstract class MemberInfo {
  readonly name: string;
  readonly declaringType: Type;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
  private accessible = false;

  constructor(declaringType: Type, name: string, isStatic: boolean, isPublic: boolean) {
    this.declaringType = declaringType;
    this.name = name;
    this.isStatic = isStatic;
    this.isPublic = isPublic;
  }

  get IsAccessible(): boolean { return this.accessible; }

  // Lifts (or re-imposes) the declared access check for this handle only
  SetAccessible(flag: boolean): void { this.accessible = flag; }

  toString(): string { return `${this.declaringType.FullName}.${this.name}`; }

  protected requireAccess(): void {
    if (!this.isPublic && !this.accessible) {
      throw new MemberAccessException(`Member ${this} is not public.`);
    }
  }

  protected resolveOwner(target: unknown): object {
    if (this.isStatic) {
      const ctor = this.declaringType._ctor;
      if (!ctor) throw new MemberAccessException(`Static member ${this} has no bound constructor.`);
      return ctor;
    }
    if (!isObjectLike(target) || !this.declaringType.IsInstanceOfType(target)) {
      throw new ArgumentException(`Object does not match target type ${this.declaringType.FullName}.`, "target");
    }
    return target;
  }
}

export class ParameterInfo {
  readonly name: string;
  readonly parameterType: Type;

  constructor(meta: ParameterMetadata) {
    this.name = meta.name;
    this.parameterType = resolveDeclaredType(meta.type);
  }
}

function sameParameterTypes(parameters: readonly ParameterInfo[], parameterTypes: readonly Type[]): boolean {
  return parameters.length === parameterTypes.length
    && parameters.every((p, i) => p.parameterType === parameterTypes[i]);
}

export class MethodInfo extends MemberInfo {
  readonly returnType: Type;
  readonly parameters: ParameterInfo[];

  constructor(declaringType: Type, meta: MethodMetadata) {
    super(declaringType, meta.name, !!meta.isStatic, !!meta.isPublic);
    this.returnType = resolveDeclaredType(meta.returnType ?? "System.Void");
    this.parameters = (meta.parameters ?? []).map(p => new ParameterInfo(p));
  }

  get parameterTypes(): Type[] { return this.parameters.map(p => p.parameterType); }

  Invoke(target: unknown, parameters: readonly unknown[] = []): unknown {
    this.requireAccess();
    if (parameters.length !== this.parameters.length) {
      throw new ArgumentException(`Parameter count mismatch for ${this}.`, "parameters");
    }
    const owner = this.resolveOwner(target);
    const fn: unknown = Reflect.get(owner, this.name);
    if (typeof fn !== "function") {
      throw new MethodNotFoundException(this.name, `Method not found at runtime: ${this}`);
    }
    try {
      return Reflect.apply(fn, owner, parameters);
    } catch (error) {
      throw new TargetInvocationException(error);
    }
  }
}

export class FieldInfo extends MemberInfo {
  readonly fieldType: Type;

  constructor(declaringType: Type, meta: FieldMetadata) {
    super(declaringType, meta.name, !!meta.isStatic, !!meta.isPublic);
    this.fieldType = resolveDeclaredType(meta.type);
  }

  GetValue(target: unknown): unknown {
    this.requireAccess();
    return Reflect.get(this.resolveOwner(target), this.name);
  }

  SetValue(target: unknown, value: unknown): void {
    this.requireAccess();
    if (!Reflect.set(this.resolveOwner(target), this.name, value)) {
      throw new MemberAccessException(`Field ${this} is not writable.`);
    }
  }
}

export class ConstructorInfo extends MemberInfo {
  readonly parameters: ParameterInfo[];

  constructor(declaringType: Type, meta: ConstructorMetadata) {
    super(declaringType, ".ctor", false, !!meta.isPublic);
    this.parameters = (meta.parameters ?? []).map(p => new ParameterInfo(p));
  }

  Invoke(parameters: readonly unknown[] = []): unknown {
    this.requireAccess();
    if (parameters.length !== this.parameters.length) {
      throw new ArgumentException(`Parameter count mismatch for ${this}.`, "parameters");
    }
    const ctor = this.declaringType._ctor;
    if (!ctor) throw new MemberAccessException(`Constructor invoke failed: missing ctor for ${this.declaringType.FullName}`);
    try {
      return Reflect.construct(ctor, parameters);
    } catch (error) {
      throw new TargetInvocationException(error);
    }
  }
}

export class Type {
  private meta: TypeMetadata;
  _ctor: TypeConstructor | null;

  // Built-in types, assigned once below the class
  static void: Type;
  static object: Type;
  static string: Type;

  static sbyte: Type;
  static short: Type;
  static int: Type;
  static long: Type;
  static float: Type;
  static double: Type;
  static bool: Type;
  static char: Type;

  static SByte: Type;
  static Int16: Type;
  static Int32: Type;
  static Int64: Type;
  static Single: Type;
  static Double: Type;
  static Boolean: Type;
  static Char: Type;

  private readonly resolved: boolean;

  constructor(metadata: TypeMetadata, ctor: TypeConstructor | null, resolved: boolean = true) {
    this.meta = metadata;
    this._ctor = ctor;
    this.resolved = resolved;
  }

  _bindCtor(ctor: TypeConstructor): void { this._ctor = ctor; }

  static get(fullNameOrCtor: string | TypeConstructor | null | undefined): Type | undefined {
    if (!fullNameOrCtor) return undefined;
    if (typeof fullNameOrCtor === "string") return registry.getByFullName(fullNameOrCtor);
    return registry.getByCtor(fullNameOrCtor);
  }

  static GetType(fullName: string): Type | null { return registry.getByFullName(fullName) ?? null; }

  // Runtime type of a value: the nearest registered constructor on its prototype chain
  static of(value: unknown): Type | null {
    switch (typeof value) {
      case "undefined": return null;
      case "string": return Type.string;
      case "number": return Type.Double;
      case "boolean": return Type.Boolean;
      case "bigint": return Type.Int64;
      case "symbol": return Type.object;
    }
    if (value === null) return null;
    for (let proto: unknown = Object.getPrototypeOf(value); isObjectLike(proto); proto = Object.getPrototypeOf(proto)) {
      const ctor: unknown = Reflect.get(proto, "constructor");
      const t = typeof ctor === "function" ? registry.getByCtor(ctor) : undefined;
      if (t) return t;
    }
    return Type.object;
  }

  get Name(): string { return this.meta.name; }
  get Namespace(): string | undefined { return this.meta.namespace; }
  get FullName(): string { return this.meta.fullName; }
  get IsClass(): boolean { return this.meta.isClass ?? (!this.meta.isInterface && !this.meta.isPrimitive); }
  get IsInterface(): boolean { return !!this.meta.isInterface; }
  get IsAbstract(): boolean { return !!this.meta.isAbstract || this.IsInterface; }
  get IsPrimitive(): boolean { return !!this.meta.isPrimitive; }
  get PrimitiveKind(): PrimitiveKind | null { return this.meta.primitiveKind ?? null; }
  get RequiresEnclosingInstance(): boolean { return !!this.meta.declaringType && !this.meta.isStatic; }
  // False for the stand-in of a declared type name that was never registered
  get IsResolved(): boolean { return this.resolved; }

  // Resolved on every access so that registration order does not matter
  get BaseType(): Type | null {
    if (this.meta.baseType) return Type.get(this.meta.baseType) ?? null;
    if (this === Type.object || !this.IsClass) return null;
    if (this._ctor) {
      for (let proto: unknown = Object.getPrototypeOf(this._ctor); isObjectLike(proto); proto = Object.getPrototypeOf(proto)) {
        const base = typeof proto === "function" ? registry.getByCtor(proto) : undefined;
        if (base) return base;
      }
    }
    return Type.object;
  }

  GetInterfaces(): Type[] {
    const interfaces: Type[] = [];
    for (const name of this.meta.interfaces ?? []) {
      const t = Type.get(name);
      if (t) interfaces.push(t);
    }
    return interfaces;
  }

  GetDeclaredField(name: string): FieldInfo | null {
    const meta = (this.meta.fields ?? []).find(f => f.name === name);
    return meta ? new FieldInfo(this, meta) : null;
  }

  GetFields(bindingFlags: BindingFlags = BindingFlags.Public | BindingFlags.Instance): FieldInfo[] {
    return filterMembers(this.collect(t => t.declaredFields()), bindingFlags, this);
  }

  GetField(name: string, bindingFlags: BindingFlags = BindingFlags.Public | BindingFlags.Instance): FieldInfo | null {
    return this.GetFields(bindingFlags).find(f => f.name === name) ?? null;
  }

  GetMethods(bindingFlags: BindingFlags = BindingFlags.Public | BindingFlags.Instance): MethodInfo[] {
    return filterMembers(this.collect(t => t.declaredMethods()), bindingFlags, this);
  }

  GetMethod(
    name: string,
    bindingFlags: BindingFlags = BindingFlags.Public | BindingFlags.Instance,
    parameterTypes?: readonly Type[],
  ): MethodInfo | null {
    return this.GetMethods(bindingFlags)
      .find(m => m.name === name && (!parameterTypes || sameParameterTypes(m.parameters, parameterTypes))) ?? null;
  }

  // Constructors are never inherited
  GetConstructors(bindingFlags: BindingFlags = BindingFlags.Public | BindingFlags.Instance): ConstructorInfo[] {
    return this.declaredConstructors().filter(c => c.isPublic || !!(bindingFlags & BindingFlags.NonPublic));
  }

  GetConstructor(
    parameterTypes: readonly Type[],
    bindingFlags: BindingFlags = BindingFlags.Public | BindingFlags.Instance,
  ): ConstructorInfo | null {
    return this.GetConstructors(bindingFlags).find(c => sameParameterTypes(c.parameters, parameterTypes)) ?? null;
  }

  IsSubclassOf(t: Type | null): boolean {
    if (!t) return false;
    for (const b of this._lineage()) {
      if (b !== this && b === t) return true;
    }
    return false;
  }

  // This type followed by its base types; a base chain that leads back into itself is a TypeLoadException
  *_lineage(): Generator<Type> {
    const seen = new Set<Type>();
    for (let t: Type | null = this; t; t = t.BaseType) {
      if (seen.has(t)) throw new TypeLoadException(this.FullName, `Circular base type chain through ${t.FullName}.`);
      seen.add(t);
      yield t;
    }
  }

  IsAssignableFrom(t: Type | null): boolean {
    if (!t) return false;
    if (this === t) return true;
    if (this.IsPrimitive || t.IsPrimitive || t === Type.void) return false;
    if (this === Type.object) return true;
    if (t.IsSubclassOf(this)) return true;
    if (this.IsInterface) {
      for (const c of t._lineage()) {
        if (c.GetInterfaces().some(i => Type.extendsInterface(i, this, new Set()))) return true;
      }
    }
    return false;
  }

  IsInstanceOfType(value: unknown): boolean {
    if (value === null || value === undefined) return false;
    return this.IsAssignableFrom(Type.of(value));
  }

  toString(): string { return this.FullName; }

  private static extendsInterface(candidate: Type, target: Type, seen: Set<Type>): boolean {
    if (candidate === target) return true;
    if (seen.has(candidate)) return false;
    seen.add(candidate);
    return candidate.GetInterfaces().some(i => Type.extendsInterface(i, target, seen));
  }

  // Declared members of this type followed by those of every base type, most-derived first
  private collect<T>(declared: (t: Type) => T[]): T[] {
    const members: T[] = [];
    for (const t of this._lineage()) {
      members.push(...declared(t));
    }
    return members;
  }

  private declaredFields(): FieldInfo[] {
    return (this.meta.fields ?? []).map(f => new FieldInfo(this, f));
  }

  private declaredMethods(): MethodInfo[] {
    return (this.meta.methods ?? []).map(m => new MethodInfo(this, m));
  }

  private declaredConstructors(): ConstructorInfo[] {
    if (!this.IsClass) return [];
    return (this.meta.constructors ?? [{ isPublic: true, parameters: [] }]).map(c => new ConstructorInfo(this, c));
  }
}

function primitive(name: string, kind: PrimitiveKind): Type {
  return registry.registerMetadataOnly({ name, fullName: name, isPrimitive: true, primitiveKind: kind });
}

function boxed(ctor: TypeConstructor, kind: PrimitiveKind): Type {
  return registry.register(ctor, { name: kind, namespace: "System", fullName: `System.${kind}`, primitiveKind: kind });
}

Type.void = registry.registerMetadataOnly({ name: "Void", namespace: "System", fullName: "System.Void", isClass: false });
Type.object = registry.register(Object, { name: "Object", namespace: "System", fullName: "System.Object" });
Type.string = registry.register(String, { name: "String", namespace: "System", fullName: "System.String" });

Type.sbyte = primitive("sbyte", "SByte");
Type.short = primitive("short", "Int16");
Type.int = primitive("int", "Int32");
Type.long = primitive("long", "Int64");
Type.float = primitive("float", "Single");
Type.double = primitive("double", "Double");
Type.bool = primitive("bool", "Boolean");
Type.char = primitive("char", "Char");

Type.SByte = boxed(SByte, "SByte");
Type.Int16 = boxed(Int16, "Int16");
Type.Int32 = boxed(Int32, "Int32");
Type.Int64 = boxed(Int64, "Int64");
Type.Single = boxed(Single, "Single");
Type.Double = boxed(Double, "Double");
Type.Boolean = boxed(Bool, "Boolean");
Type.Char = boxed(Char, "Char");

function filterMembers<T extends MemberInfo>(items: T[], bindingFlags: BindingFlags, self: Type): T[] {
  const isVisible = (m: MemberInfo) => m.isPublic
    ? !!(bindingFlags & BindingFlags.Public)
    : !!(bindingFlags & BindingFlags.NonPublic);
  const isKindAllowed = (m: MemberInfo) => m.isStatic
    ? !!(bindingFlags & BindingFlags.Static)
    : !!(bindingFlags & BindingFlags.Instance);
  const declaredOnly = (m: MemberInfo) => (bindingFlags & BindingFlags.DeclaredOnly) ? m.declaringType === self : true;
  return items.filter(m => isVisible(m) && isKindAllowed(m) && declaredOnly(m));
}

export function registerType(ctor: TypeConstructor, metadata: TypeMetadata): Type {
  return registry.register(ctor, metadata);
}

export function registerMetadata(metadata: TypeMetadata): Type {
  return registry.registerMetadataOnly(metadata);
}

export function getTypeOf(value: unknown): Type | null { return Type.of(value); }

export function getType(fullName: string): Type | null { return Type.GetType(fullName); }
