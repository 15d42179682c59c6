import { describe, it, expect } from "vitest";
import { CallbackActionRegistry, decodeToken, type CallbackAction } from "../dialog/actionRegistry";

const link: CallbackAction = { kind: "LINK", meetingId: "m1", contactId: "c1", contactName: "Jon Lee" };
const create: CallbackAction = { kind: "CREATE", meetingId: "m1", searchName: "Jon" };
const skip: CallbackAction = { kind: "SKIP", meetingId: "m1", searchName: "Jon" };

describe("decodeToken", () => {
  it("recovers the kind and sequence", () => {
    expect(decodeToken("l1")).toEqual({ kind: "LINK", sequence: 1 });
    expect(decodeToken("ca")).toEqual({ kind: "CREATE", sequence: 10 });
    expect(decodeToken("e10")).toEqual({ kind: "CORRECT", sequence: 36 });
  });

  it("rejects anything the registry could not have minted", () => {
    expect(decodeToken("")).toBeNull();
    expect(decodeToken("x1")).toBeNull();
    expect(decodeToken("l")).toBeNull();
    expect(decodeToken("L1")).toBeNull();
    expect(decodeToken("l-1")).toBeNull();
  });
});

describe("CallbackActionRegistry", () => {
  it("mints prefixed tokens from one shared counter", () => {
    const registry = new CallbackActionRegistry();
    expect(registry.registerGroup([link, create, skip])).toEqual(["l1", "c2", "s3"]);
    expect(registry.register(skip)).toBe("s4");
  });

  it("returns the action once and then null", () => {
    const registry = new CallbackActionRegistry();
    const token = registry.register(link);
    expect(registry.consume(token)).toEqual(link);
    expect(registry.consume(token)).toBeNull();
  });

  it("retires every button of a keyboard when one is pressed", () => {
    const registry = new CallbackActionRegistry();
    const [linkToken, createToken, skipToken] = registry.registerGroup([link, create, skip]);
    expect(registry.consume(createToken)).toEqual(create);
    expect(registry.consume(linkToken)).toBeNull();
    expect(registry.consume(skipToken)).toBeNull();
    expect(registry.size).toBe(0);
  });

  it("leaves other keyboards alone", () => {
    const registry = new CallbackActionRegistry();
    const [first] = registry.registerGroup([link, skip]);
    const [second] = registry.registerGroup([create]);
    registry.consume(first);
    expect(registry.consume(second)).toEqual(create);
  });

  it("does not consume when the prefix does not match the stored kind", () => {
    const registry = new CallbackActionRegistry();
    registry.register(link);
    expect(registry.consume("s1")).toBeNull();
    expect(registry.consume("l1")).toEqual(link);
  });

  it("returns null for unknown or malformed tokens", () => {
    const registry = new CallbackActionRegistry();
    registry.register(link);
    expect(registry.consume("l99")).toBeNull();
    expect(registry.consume("garbage!")).toBeNull();
    expect(registry.size).toBe(1);
  });
});
