// test/objects/enums.spec.ts
// Enumeration classes and their members

import { describe, it, expect } from "vitest";
import { EnumMember, defineEnum, enumClassOf, isEnumClass } from "../../src/core/objects/enums";
import { originOf } from "../../src/core/objects/origin";
import { attr } from "../helpers/runtime";

describe("defineEnum", () => {
  const Color = defineEnum("Color", { RED: 1, GREEN: 2 });

  it("attaches members as class attributes", () => {
    const red = attr(Color, "RED");
    expect(red).toBe(Color.member("RED"));
    expect(red instanceof EnumMember).toBe(true);
    expect(red instanceof Color).toBe(true);
    expect(String(red)).toBe("Color.RED");
  });

  it("looks members up by value", () => {
    expect(Color.of(2).name).toBe("GREEN");
    expect(() => Color.of(9)).toThrow("9 is not a valid Color");
    expect(() => Color.member("BLUE")).toThrow("Color has no member 'BLUE'");
  });

  it("lists members in definition order", () => {
    expect([...Color.members.keys()]).toEqual(["RED", "GREEN"]);
  });

  it("finds the class of a member", () => {
    expect(isEnumClass(Color)).toBe(true);
    expect(isEnumClass(EnumMember)).toBe(false);
    expect(enumClassOf(Color.member("RED"))).toBe(Color);
  });

  it("rejects reserved and duplicate member names", () => {
    expect(() => defineEnum("Bad", { name: 1 })).toThrow("'name' cannot be used as an enum member name");
  });

  it("declares its origin when a module is given", () => {
    const Size = defineEnum("Size", { S: "s" }, { module: "shop" });
    expect(originOf(Size)).toEqual({ module: "shop", qualname: "Size" });
  });
});
