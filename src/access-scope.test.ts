import { describe, it } from "mocha";
import { expect } from "chai";
import { AccessViolationException } from "../system/access-violation.exception";
import { withElevatedAccess } from "./access-scope";
import { FieldInfo, Type, registerType } from "./reflection";
import { DEFAULT_REFLECTION_OPTIONS, createReflectionOptions } from "./reflection-options";

class Locker {
  private combination = "000";
}

const LockerType = registerType(Locker, {
  name: "Locker",
  namespace: "Scope",
  fullName: "Scope.Locker",
  fields: [{ name: "combination", type: "System.String" }],
});

function combination(): FieldInfo {
  const field = LockerType.GetDeclaredField("combination");
  if (!field) throw new Error("missing field combination");
  return field;
}

describe("withElevatedAccess", () => {
  it("should lift the access check for the action only", () => {
    const field = combination();
    const value = withElevatedAccess(field, DEFAULT_REFLECTION_OPTIONS, () => {
      expect(field.IsAccessible).to.equal(true);
      return field.GetValue(new Locker());
    });
    expect(value).to.equal("000");
    expect(field.IsAccessible).to.equal(false);
  });

  it("should restore the flag when the action throws", () => {
    const field = combination();
    expect(() => withElevatedAccess(field, DEFAULT_REFLECTION_OPTIONS, () => {
      throw new Error("jammed");
    })).to.throw("jammed");
    expect(field.IsAccessible).to.equal(false);
  });

  it("should leave an already accessible handle accessible", () => {
    const field = combination();
    field.SetAccessible(true);
    withElevatedAccess(field, DEFAULT_REFLECTION_OPTIONS, () => field.GetValue(new Locker()));
    expect(field.IsAccessible).to.equal(true);
  });

  it("should not touch other handles to the same field", () => {
    const first = combination();
    const second = combination();
    withElevatedAccess(first, DEFAULT_REFLECTION_OPTIONS, () => {
      expect(second.IsAccessible).to.equal(false);
    });
  });

  it("should refuse elevation the policy denies without running the action", () => {
    const field = combination();
    let ran = false;
    const options = createReflectionOptions({ accessPolicy: member => member.declaringType !== LockerType });
    expect(() => withElevatedAccess(field, options, () => {
      ran = true;
    })).to.throw(AccessViolationException, "Access elevation refused for Scope.Locker.combination.");
    expect(ran).to.equal(false);
    expect(field.IsAccessible).to.equal(false);
  });

  it("should trace a refusal when tracing is on", () => {
    const options = createReflectionOptions({ accessPolicy: () => false, trace: true });
    const original = console.debug;
    const lines: string[] = [];
    console.debug = (message?: unknown) => {
      lines.push(String(message));
    };
    try {
      expect(() => withElevatedAccess(combination(), options, () => Type.object)).to.throw(AccessViolationException);
    } finally {
      console.debug = original;
    }
    expect(lines).to.deep.equal(["Access elevation refused for Scope.Locker.combination"]);
  });
});
