// test/objects/functions.spec.ts
// Instantiating units against late-bound namespaces and cells

import { describe, it, expect } from "vitest";
import { cell } from "../../src/core/objects/cell";
import { compileUnit } from "../../src/core/objects/code";
import {
  boundMethod,
  boundMethodOf,
  closure,
  createCellScope,
  createNamespace,
  instantiate,
  recordOf,
} from "../../src/core/objects/functions";
import { originOf } from "../../src/core/objects/origin";
import { callMethod, construct, fnOf } from "../helpers/runtime";

describe("instantiate", () => {
  it("resolves free names in the namespace at call time", () => {
    const ns = createNamespace();
    const fn = instantiate(compileUnit("function f() { return base + 1; }"), { globals: ns, cells: createCellScope() });
    ns.base = 41;
    expect(fnOf(fn)()).toBe(42);
    ns.base = 1;
    expect(fnOf(fn)()).toBe(2);
  });

  it("reads closure variables through the cell scope", () => {
    const cells = createCellScope({ counter: cell(4) });
    const fn = instantiate(compileUnit("function g() { return counter.value * 2; }", ["counter"]), {
      globals: createNamespace(),
      cells,
    });
    expect(fnOf(fn)()).toBe(8);
    cells.counter = cell(10);
    expect(fnOf(fn)()).toBe(20);
  });

  it("extracts methods and getters from their object literal", () => {
    const area = instantiate(compileUnit("area() { return this.w * this.h; }"), {
      globals: createNamespace(),
      cells: createCellScope(),
    });
    expect(Reflect.apply(area, { w: 2, h: 3 }, [])).toBe(6);

    const twice = instantiate(compileUnit("get twice() { return this.n * 2; }"), {
      globals: createNamespace(),
      cells: createCellScope(),
    });
    expect(Reflect.apply(twice, { n: 5 }, [])).toBe(10);
  });

  it("binds the base of a class with an extends clause", () => {
    const options = { globals: createNamespace(), cells: createCellScope() };
    const base = instantiate(compileUnit("class B { who() { return 'b'; } }"), options);
    const derived = instantiate(compileUnit("class D extends B { who() { return 'd' + super.who(); } }"), {
      ...options,
      base,
    });
    const instance = construct(derived);
    expect(callMethod(instance, "who")).toBe("db");
    expect(instance instanceof base).toBe(true);
  });
});

describe("closure", () => {
  it("records cells in declaration order", () => {
    const a = cell(1);
    const b = cell(2);
    const fn = closure({ a, b }, new Function("return a.value + b.value;"));
    const record = recordOf(fn);
    expect(record?.code.freevars).toEqual(["a", "b"]);
    expect(record?.cells.a).toBe(a);
    expect(record?.qualname).toBe("anonymous");
  });

  it("declares the origin when a module is given", () => {
    const fn = closure({}, new Function("return 1;"), { module: "lab", qualname: "one" });
    expect(originOf(fn)).toEqual({ module: "lab", qualname: "one" });
  });

  it("rejects closure variables that are not cells", () => {
    expect(() => Reflect.apply(createCellScope, undefined, [{ n: 1 }])).toThrow("closure variable 'n' must be a Cell");
  });
});

describe("boundMethod", () => {
  it("remembers target and key", () => {
    const target = { n: 3, get() { return this.n; } };
    const bound = boundMethod(target, "get");
    expect(fnOf(bound)()).toBe(3);
    expect(boundMethodOf(bound)).toEqual({ target, key: "get" });
  });

  it("rejects attributes that are not methods", () => {
    expect(() => boundMethod({ n: 1 }, "n")).toThrow("'n' is not a method");
  });
});
