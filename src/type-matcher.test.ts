/**
 * Tests for value/type compatibility
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { Bool } from "../system/bool";
import { Char } from "../system/char";
import { Int16 } from "../system/int16";
import { Int32 } from "../system/int32";
import { Int64 } from "../system/int64";
import { SByte } from "../system/sbyte";
import { Single } from "../system/single";
import { Type, registerMetadata, registerType } from "./reflection";
import { isCompatibleType, matches, primitiveKindOf } from "./type-matcher";

class Vehicle {}
class Truck extends Vehicle {}

const Movable = registerMetadata({ name: "Movable", namespace: "Match", fullName: "Match.Movable", isInterface: true });
const VehicleType = registerType(Vehicle, { name: "Vehicle", namespace: "Match", fullName: "Match.Vehicle", interfaces: ["Match.Movable"] });
const TruckType = registerType(Truck, { name: "Truck", namespace: "Match", fullName: "Match.Truck" });

describe("Type matcher", () => {
  describe("primitiveKindOf", () => {
    it("should report the kind of JS primitives", () => {
      expect(primitiveKindOf(1)).to.equal("Double");
      expect(primitiveKindOf(1n)).to.equal("Int64");
      expect(primitiveKindOf(false)).to.equal("Boolean");
      expect(primitiveKindOf("a")).to.equal(null);
    });

    it("should report the kind a boxed value was built as", () => {
      expect(primitiveKindOf(new SByte(1))).to.equal("SByte");
      expect(primitiveKindOf(new Int16(1))).to.equal("Int16");
      expect(primitiveKindOf(new Int32(1))).to.equal("Int32");
      expect(primitiveKindOf(new Int64(1))).to.equal("Int64");
      expect(primitiveKindOf(new Single(1))).to.equal("Single");
      expect(primitiveKindOf(new Bool(true))).to.equal("Boolean");
      expect(primitiveKindOf(new Char("c"))).to.equal("Char");
      expect(primitiveKindOf(new Vehicle())).to.equal(null);
    });
  });

  describe("matches", () => {
    it("should treat a primitive type and its boxed type as one target", () => {
      const boxed = new Int32(7);
      expect(matches(boxed, Type.int)).to.equal(true);
      expect(matches(boxed, Type.Int32)).to.equal(true);
    });

    it("should not widen between numeric kinds", () => {
      const boxed = new Int32(7);
      expect(matches(boxed, Type.long)).to.equal(false);
      expect(matches(boxed, Type.Int64)).to.equal(false);
      expect(matches(boxed, Type.double)).to.equal(false);
      expect(matches(new Int16(7), Type.int)).to.equal(false);
    });

    it("should match JS numbers only as doubles", () => {
      expect(matches(7, Type.double)).to.equal(true);
      expect(matches(7, Type.Double)).to.equal(true);
      expect(matches(7, Type.int)).to.equal(false);
      expect(matches(7, Type.float)).to.equal(false);
    });

    it("should match the remaining kinds", () => {
      expect(matches(7n, Type.long)).to.equal(true);
      expect(matches(true, Type.bool)).to.equal(true);
      expect(matches(new Bool(true), Type.Boolean)).to.equal(true);
      expect(matches(new Char("a"), Type.char)).to.equal(true);
      expect(matches("a", Type.char)).to.equal(false);
      expect(matches(new Single(1.5), Type.float)).to.equal(true);
      expect(matches(new SByte(-1), Type.sbyte)).to.equal(true);
      expect(matches(new Int16(300), Type.short)).to.equal(true);
    });

    it("should never match null", () => {
      expect(matches(null, Type.Int32)).to.equal(false);
      expect(matches(null, Type.string)).to.equal(false);
      expect(matches(undefined, Type.object)).to.equal(false);
    });

    it("should fall back to an instance test for other types", () => {
      expect(matches("a", Type.string)).to.equal(true);
      expect(matches(new Truck(), VehicleType)).to.equal(true);
      expect(matches(new Truck(), Movable)).to.equal(true);
      expect(matches(new Vehicle(), TruckType)).to.equal(false);
      expect(matches({}, VehicleType)).to.equal(false);
      expect(matches(new Int32(1), Type.object)).to.equal(true);
    });
  });

  describe("isCompatibleType", () => {
    it("should accept a shared primitive kind in either direction", () => {
      expect(isCompatibleType(Type.int, Type.Int32)).to.equal(true);
      expect(isCompatibleType(Type.Int32, Type.int)).to.equal(true);
      expect(isCompatibleType(Type.long, Type.int)).to.equal(false);
    });

    it("should otherwise follow assignability", () => {
      expect(isCompatibleType(Type.object, Type.string)).to.equal(true);
      expect(isCompatibleType(VehicleType, TruckType)).to.equal(true);
      expect(isCompatibleType(TruckType, VehicleType)).to.equal(false);
      expect(isCompatibleType(Type.string, Type.object)).to.equal(false);
      expect(isCompatibleType(Type.object, Type.int)).to.equal(false);
    });
  });
});
