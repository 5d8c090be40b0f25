import { AccessViolationException } from "../system/access-violation.exception";
import { Debug } from "../system/diagnostics/debug";
import { MemberInfo } from "./reflection";
import { ReflectionOptions } from "./reflection-options";

/**
 * Runs `action` with `member`'s access check lifted, then puts the flag back to what it was
 * on every exit path.
 *
 * The flag belongs to the handle, so two callers sharing one handle across workers must
 * serialize themselves; separately located handles never interfere.
 */
export function withElevatedAccess<T>(member: MemberInfo, options: ReflectionOptions, action: () => T): T {
  if (!options.accessPolicy(member)) {
    if (options.trace) Debug.WriteFormat("Access elevation refused for {0}", member);
    throw new AccessViolationException(`Access elevation refused for ${member}.`);
  }
  const wasAccessible = member.IsAccessible;
  member.SetAccessible(true);
  try {
    return action();
  } finally {
    member.SetAccessible(wasAccessible);
  }
}
