import { MemberInfo, Type } from "./reflection";

export type AccessorFailureMode = "fallback" | "propagate";

export type AccessPolicy = (member: MemberInfo) => boolean;

export interface ReflectionOptions {
  // Ancestors at which hierarchy walks halt without inspecting them
  readonly stopTypes: readonly Type[];
  // What an accessor whose own body throws does to a read or write
  readonly accessorFailure: AccessorFailureMode;
  // Consulted before any accessibility elevation; false raises AccessViolationException
  readonly accessPolicy: AccessPolicy;
  // Writes fallbacks and refused elevations through Debug
  readonly trace: boolean;
}

export const allowAllAccess: AccessPolicy = () => true;

export const DEFAULT_REFLECTION_OPTIONS: ReflectionOptions = Object.freeze({
  stopTypes: Object.freeze([Type.object]),
  accessorFailure: "fallback",
  accessPolicy: allowAllAccess,
  trace: false,
});

export function createReflectionOptions(overrides: Partial<ReflectionOptions> = {}): ReflectionOptions {
  return Object.freeze({
    ...DEFAULT_REFLECTION_OPTIONS,
    ...overrides,
    stopTypes: Object.freeze([...(overrides.stopTypes ?? DEFAULT_REFLECTION_OPTIONS.stopTypes)]),
  });
}
