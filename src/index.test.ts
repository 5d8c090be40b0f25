import { describe, it } from "mocha";
import { expect } from "chai";
import {
  FieldNotFoundException,
  Int32,
  MethodNotFoundException,
  TargetInvocationException,
  Type,
  construct,
  findField,
  getType,
  invokeMethod,
  locateField,
  locateMethod,
  matches,
  readField,
  readSlot,
  registerType,
  writeField,
  writeSlot,
} from "./index";

class Ticket {
  private seat = "A1";
  private price = new Int32(40);
  private stamp(prefix: string): string {
    return `${prefix}:${this.seat}`;
  }
  cancel(): void {
    throw new Error("already used");
  }
}

const TicketType = registerType(Ticket, {
  name: "Ticket",
  namespace: "Facade",
  fullName: "Facade.Ticket",
  fields: [
    { name: "seat", type: "System.String" },
    { name: "price", type: "int" },
  ],
  methods: [
    { name: "stamp", returnType: "System.String", parameters: [{ name: "prefix", type: "System.String" }] },
    { name: "cancel", isPublic: true },
  ],
  constructors: [{ isPublic: false }],
});

describe("Facade", () => {
  it("should load with the built-in types registered", () => {
    expect(getType("System.Object")).to.equal(Type.object);
    expect(getType("System.Int32")).to.equal(Type.Int32);
    expect(getType("int")).to.equal(Type.int);
    expect(Type.get(Int32)).to.equal(Type.Int32);
    expect(matches(new Int32(1), Type.int)).to.equal(true);
  });

  it("should read and write fields with the default options", () => {
    const ticket = new Ticket();
    expect(readField(ticket, "seat")).to.equal("A1");
    writeField(ticket, "seat", "B2");
    expect(readField(ticket, "seat")).to.equal("B2");
    expect(Number(readField(ticket, "price", Type.int))).to.equal(40);
  });

  it("should default the expected type to System.String", () => {
    expect(() => readField(new Ticket(), "price")).to.throw("Incorrect return type: System.String");
  });

  it("should expose the slot operations and field lookups", () => {
    const ticket = new Ticket();
    const seat = locateField(TicketType, "seat");
    writeSlot(ticket, seat, "C3");
    expect(readSlot(ticket, seat)).to.equal("C3");
    expect(findField(TicketType, "row")).to.equal(null);
    expect(() => locateField(TicketType, "row")).to.throw(FieldNotFoundException);
  });

  it("should invoke a non-public method and restore its flag", () => {
    const stamp = locateMethod(TicketType, "stamp", Type.string);
    expect(invokeMethod(new Ticket(), stamp, "gate")).to.equal("gate:A1");
    expect(stamp.IsAccessible).to.equal(false);
    expect(() => locateMethod(TicketType, "stamp", Type.int)).to.throw(MethodNotFoundException);
  });

  it("should wrap errors thrown by an invoked method", () => {
    const cancel = locateMethod(TicketType, "cancel");
    expect(() => invokeMethod(new Ticket(), cancel)).to.throw(TargetInvocationException);
    expect(cancel.IsAccessible).to.equal(false);
  });

  it("should construct through a private parameterless constructor", () => {
    const ticket = construct(TicketType);
    expect(ticket).to.be.instanceOf(Ticket);
    expect(readField(ticket, "seat")).to.equal("A1");
  });
});
