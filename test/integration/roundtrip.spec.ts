// test/integration/roundtrip.spec.ts
// Functions, classes, enums and runtime-internal objects shipped between runtimes

import { describe, it, expect, afterEach } from "vitest";
import { once } from "events";
import * as fs from "fs";
import * as path from "path";
import { Readable } from "node:stream";
import { FerryError } from "../../src/core/errors";
import { cell, isCell } from "../../src/core/objects/cell";
import { boundMethod } from "../../src/core/objects/functions";
import { createDispatchTable } from "../../src/core/reduce/strategies";
import { reconstructor } from "../../src/core/reduce/types";
import { Runtime } from "../../src/runtime";
import { attr, callMethod, construct, fnOf, ship, tempDir, tracedRuntime } from "../helpers/runtime";

function failure(fn: () => unknown): FerryError | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof FerryError) return err;
    throw err;
  }
  return undefined;
}

async function readAll(stream: unknown): Promise<string> {
  if (!(stream instanceof Readable)) throw new TypeError("expected a readable stream");
  const chunks: string[] = [];
  for await (const chunk of stream) {
    const piece: unknown = chunk;
    chunks.push(Buffer.isBuffer(piece) ? piece.toString("utf8") : String(piece));
  }
  return chunks.join("");
}

describe("closures", () => {
  it("carries a counter's cell and keeps incrementing it", () => {
    const source = new Runtime();
    source.exec(`
      function makeCounter() {
        const counter = cell(5);
        return closure({ counter }, function next() {
          const v = counter.value;
          counter.value = v + 1;
          return v;
        });
      }
    `);
    const next = fnOf(source.main.makeCounter)();
    const rebuilt = fnOf(ship(next, source));
    expect(rebuilt()).toBe(5);
    expect(rebuilt()).toBe(6);
    expect(rebuilt()).toBe(7);
    expect(fnOf(next)()).toBe(5);
  });

  it("keeps one cell shared by two functions", () => {
    const source = new Runtime();
    source.exec(`
      function makeTally() {
        const total = cell(0);
        const add = closure({ total }, function add(n) { total.value = total.value + n; return total.value; });
        const read = closure({ total }, function read() { return total.value; });
        return { add, read };
      }
    `);
    const tally = ship(fnOf(source.main.makeTally)(), source);
    expect(fnOf(attr(tally, "add"))(3)).toBe(3);
    expect(fnOf(attr(tally, "add"))(4)).toBe(7);
    expect(fnOf(attr(tally, "read"))()).toBe(7);
  });

  it("keeps an empty cell empty", () => {
    const source = new Runtime();
    source.exec(`
      function makeLate() {
        const later = cell();
        const load = closure({ later }, function load() { return later.value; });
        const store = closure({ later }, function store(v) { later.value = v; });
        return { load, store };
      }
    `);
    const late = ship(fnOf(source.main.makeLate)(), source);
    expect(() => fnOf(attr(late, "load"))()).toThrow("cell variable referenced before assignment");
    fnOf(attr(late, "store"))(4);
    expect(fnOf(attr(late, "load"))()).toBe(4);

    const empty = ship(cell(), source);
    expect(isCell(empty) && empty.isEmpty).toBe(true);
  });

  it("rebuilds module globals the function uses", () => {
    const source = new Runtime();
    source.exec(`
      const RATE = 3;
      function price(n) { return n * RATE; }
      function total(items) { return items.map(price).reduce((a, b) => a + b, 0); }
    `);
    expect(fnOf(ship(source.main.total, source))([1, 2])).toBe(9);
  });

  it("rebuilds recursive functions and self-referencing attributes", () => {
    const source = new Runtime();
    source.exec("function fact(n) { return n <= 1 ? 1 : n * fact(n - 1); } fact.self = fact;");
    const fact = ship(source.main.fact, source);
    expect(fnOf(fact)(5)).toBe(120);
    expect(attr(fact, "self")).toBe(fact);
  });

  it("rebuilds bound methods", () => {
    const source = new Runtime();
    source.exec("class Greeter { constructor(n) { this.n = n; } hi() { return 'hi ' + this.n; } }");
    const greeter = construct(source.main.Greeter, "ann");
    expect(fnOf(ship(boundMethod(greeter, "hi"), source))()).toBe("hi ann");
  });
});

describe("dynamic classes", () => {
  it("gives an instance the rebuilt class its method returns", () => {
    const source = new Runtime();
    source.exec(`
      function build() {
        class C { m() { return C; } }
        return new C();
      }
    `);
    const instance = ship(fnOf(source.main.build)(), source);
    const C = callMethod(instance, "m");
    if (typeof C !== "function") throw new TypeError("m() returned no class");
    expect(instance).toBeInstanceOf(C);
    expect(C.name).toBe("C");
  });

  it("dedups a class across instances, payloads and loads", () => {
    const source = new Runtime();
    source.exec("class Point { constructor(x, y) { this.x = x; this.y = y; } norm() { return Math.abs(this.x) + Math.abs(this.y); } }");
    const a = construct(source.main.Point, 1, 2);
    const b = construct(source.main.Point, -3, 4);

    const both = ship([a, b], source);
    if (!Array.isArray(both)) throw new TypeError("expected an array");
    expect(Object.getPrototypeOf(both[0])).toBe(Object.getPrototypeOf(both[1]));
    expect(callMethod(both[0], "norm")).toBe(3);
    expect(callMethod(both[1], "norm")).toBe(7);

    const dest = new Runtime();
    const x = dest.loads(source.dumps(a));
    const y = dest.loads(source.dumps(b));
    expect(Object.getPrototypeOf(x)).toBe(Object.getPrototypeOf(y));
    expect(Object.getPrototypeOf(ship(a, source))).not.toBe(Object.getPrototypeOf(x));

    expect(Object.getPrototypeOf(source.loads(source.dumps(a)))).toBe(attr(source.main.Point, "prototype"));
  });

  it("keeps static state and static methods", () => {
    const source = new Runtime();
    source.exec(`
      class Counter {
        static created = 0;
        static make() { Counter.created += 1; return new Counter(); }
      }
      Counter.make();
    `);
    const Counter = ship(source.main.Counter, source);
    expect(attr(Counter, "created")).toBe(1);
    const made = callMethod(Counter, "make");
    expect(attr(Counter, "created")).toBe(2);
    expect(Object.getPrototypeOf(made)).toBe(attr(Counter, "prototype"));
  });

  it("rebuilds subclasses over their rebuilt base", () => {
    const source = new Runtime();
    source.exec(`
      class Animal { speak() { return 'generic'; } }
      class Dog extends Animal { speak() { return 'woof/' + super.speak(); } }
    `);
    const dog = ship(construct(source.main.Dog), source);
    expect(callMethod(dog, "speak")).toBe("woof/generic");
    const dogProto: unknown = Object.getPrototypeOf(dog);
    const animalProto: unknown = dogProto === null || typeof dogProto !== "object" ? undefined : Object.getPrototypeOf(dogProto);
    expect(attr(attr(animalProto, "constructor"), "name")).toBe("Animal");
  });

  it("rebuilds error subclasses", () => {
    const source = new Runtime();
    source.exec("class AppError extends Error { constructor(m) { super(m); this.name = 'AppError'; } }");
    const err = ship(construct(source.main.AppError, "boom"), source);
    expect(err).toBeInstanceOf(Error);
    expect(attr(err, "message")).toBe("boom");
    expect(attr(err, "name")).toBe("AppError");
  });
});

describe("enums", () => {
  it("resolves members to the rebuilt enum class", () => {
    const source = new Runtime();
    source.exec("const Color = defineEnum('Color', { RED: 1, GREEN: 2 }); function pick() { return Color.RED; }");
    const dest = new Runtime();
    const red = dest.loads(source.dumps(attr(source.main.Color, "RED")));
    const pick = dest.loads(source.dumps(source.main.pick));
    expect(fnOf(pick)()).toBe(red);
    expect(String(red)).toBe("Color.RED");
    expect(attr(red, "value")).toBe(1);
  });
});

describe("modules", () => {
  const absent = () => {
    throw new Error("module not installed");
  };

  it("references importable modules and their functions", () => {
    const source = new Runtime();
    const ns = source.exec("const rate = 2; function scale(x) { return x * rate; }", "tools", { origin: "file" });
    const dest = new Runtime({ loader: () => ({ scale: (x: number) => x * 10 }) });

    expect(source.encode(attr(ns, "scale"))).toEqual({ tag: "Global", module: "tools", qualname: "scale" });
    expect(fnOf(dest.loads(source.dumps(attr(ns, "scale"))))(3)).toBe(30);
    expect(failure(() => new Runtime({ loader: absent }).loads(source.dumps(ns)))?.reason).toBe("lookup-failed");
  });

  it("leaves out submodules of a local object named like their package", () => {
    const source = new Runtime();
    source.modules.register("pkg/sub", { f: () => 2 }, "file");
    source.exec("const pkg = { sub: { f: () => 1 } }; function use() { return pkg.sub.f(); }");
    const dest = new Runtime({ loader: absent });
    expect(fnOf(dest.loads(source.dumps(source.main.use)))()).toBe(1);
  });

  it("sends modules under the by-value policy with their variables", () => {
    const source = new Runtime();
    const ns = source.exec("const rate = 2; function scale(x) { return x * rate; }", "tools", { origin: "file" });
    source.registerByValue("tools");
    source.registerByValue("tools");

    const dest = new Runtime({ loader: absent });
    const copy = dest.loads(source.dumps(ns));
    expect(attr(copy, "rate")).toBe(2);
    expect(fnOf(attr(copy, "scale"))(3)).toBe(6);
    expect(dest.modules.get("tools")?.origin).toBe("dynamic");

    source.unregisterByValue("tools");
    expect(source.encode(attr(ns, "scale"))).toEqual({ tag: "Global", module: "tools", qualname: "scale" });
  });
});

describe("runtime-internal objects", () => {
  const streams: Array<fs.ReadStream | fs.WriteStream> = [];
  afterEach(() => {
    for (const s of streams.splice(0)) s.destroy();
  });

  it("rebuilds a read stream from its remaining content", async () => {
    const file = path.join(tempDir(), "data.txt");
    fs.writeFileSync(file, "abc");
    const whole = fs.createReadStream(file);
    const tail = fs.createReadStream(file, { start: 1, encoding: "utf8" });
    streams.push(whole, tail);

    const source = new Runtime();
    expect(await readAll(ship(whole, source))).toBe("abc");
    expect(await readAll(ship(tail, source))).toBe("bc");
  });

  it("counts buffered multibyte text of a decoding stream as unread", async () => {
    const file = path.join(tempDir(), "accent.txt");
    fs.writeFileSync(file, "\u00e9abc");
    const stream = fs.createReadStream(file, { encoding: "utf8", highWaterMark: 3 });
    streams.push(stream);
    await once(stream, "readable");

    const source = new Runtime();
    expect(await readAll(ship(stream, source))).toBe("\u00e9abc");
    expect(stream.read(1)).toBe("\u00e9");
    expect(await readAll(ship(stream, source))).toBe("abc");
  });

  it("rejects read streams opened from a descriptor", () => {
    const file = path.join(tempDir(), "fd.txt");
    fs.writeFileSync(file, "abc");
    const stream = fs.createReadStream("", { fd: fs.openSync(file, "r") });
    streams.push(stream);
    const err = failure(() => new Runtime().dumps(stream));
    expect(err?.reason).toBe("unsupported-object");
    expect(err?.message).toContain("opened from a descriptor");
  });

  it("refuses write streams", () => {
    const { runtime, sink } = tracedRuntime();
    const out = fs.createWriteStream(path.join(tempDir(), "out.txt"));
    streams.push(out);
    expect(failure(() => runtime.dumps(out))?.reason).toBe("refused-by-policy");
    expect(sink.ofTag("E_Refused").map(e => e.target)).toEqual(["instance of WriteStream"]);
  });

  it("references built-in natives, singletons and intrinsics", () => {
    const source = new Runtime();
    const asyncFunction: unknown = Reflect.get(Object.getPrototypeOf(async function () {}), "constructor");
    const out = ship([Math.max, Array.prototype.push, console, asyncFunction], source);
    expect(out).toEqual([Math.max, Array.prototype.push, console, asyncFunction]);
    if (!Array.isArray(out)) throw new TypeError("expected an array");
    expect(out[2]).toBe(console);
    expect(out[3]).toBe(asyncFunction);
  });

  it("rebuilds built-in errors with message, stack and cause", () => {
    const source = new Runtime();
    const original = new TypeError("bad", { cause: "upstream" });
    const err = ship(original, source);
    expect(err).toBeInstanceOf(TypeError);
    expect(attr(err, "message")).toBe("bad");
    expect(attr(err, "stack")).toBe(original.stack);
    expect(attr(err, "cause")).toBe("upstream");
  });

  it("rebuilds URLs, views, controllers and weak references", () => {
    const source = new Runtime();
    const buffer = new ArrayBuffer(8);
    const view = new DataView(buffer, 2, 4);
    view.setUint8(0, 9);
    const controller = new AbortController();
    controller.abort("stop");
    const target = { v: 1 };

    const out = ship(
      {
        url: new URL("https://example.com/a?b=1"),
        params: new URLSearchParams("a=1&b=2"),
        view,
        controller,
        ref: new WeakRef(target),
        target,
      },
      source
    );

    expect(String(attr(out, "url"))).toBe("https://example.com/a?b=1");
    expect(callMethod(attr(out, "params"), "get", "b")).toBe("2");
    const copy = attr(out, "view");
    if (!(copy instanceof DataView)) throw new TypeError("expected a DataView");
    expect([copy.byteOffset, copy.byteLength, copy.getUint8(0)]).toEqual([2, 4, 9]);
    const signal = attr(attr(out, "controller"), "signal");
    expect(attr(signal, "aborted")).toBe(true);
    expect(attr(signal, "reason")).toBe("stop");
    expect(callMethod(attr(out, "ref"), "deref")).toBe(attr(out, "target"));
  });
});

describe("failures", () => {
  it("refuses functions marked as coroutines", () => {
    const { runtime, sink } = tracedRuntime();
    runtime.exec("async function job() { return 1; } markCoroutine(job);");
    expect(failure(() => runtime.dumps(runtime.main.job))?.reason).toBe("refused-by-policy");
    expect(sink.ofTag("E_Refused").map(e => e.target)).toEqual(["function job"]);
  });

  it("rejects an object needed to construct itself", () => {
    class Loop {}
    const table = createDispatchTable();
    table.register(Loop, loop => ({ fn: reconstructor("getAttribute"), args: [loop, "x"] }));
    const runtime = new Runtime({ table });
    const err = failure(() => runtime.encode(new Loop()));
    expect(err?.reason).toBe("unsupported-object");
    expect(err?.message).toContain("it is needed to construct itself");
  });

  it("rejects functions reading names it cannot capture", () => {
    const runtime = new Runtime();
    expect(failure(() => runtime.dumps(new Function("return missingName;")))?.reason).toBe("unsupported-object");
  });

  it("reports unknown global references", () => {
    const bytes = Buffer.from('{"format":"ferry","version":1,"root":{"tag":"Global","module":"builtins","qualname":"NoSuchThing"}}');
    expect(failure(() => new Runtime().loads(bytes))?.reason).toBe("lookup-failed");
  });

  it("rejects damaged payloads", () => {
    expect(failure(() => new Runtime().loads(Buffer.from("garbage")))?.reason).toBe("corrupt-payload");
  });
});

describe("trace events", () => {
  it("reports resolution, capture and skeleton creation", () => {
    const { runtime: source, sink } = tracedRuntime();
    source.exec("class Box {} function make() { return new Box(); }");
    const bytes = source.dumps(source.main.make);

    expect(sink.ofTag("E_Resolve")).toEqual([
      { tag: "E_Resolve", target: "function make", decision: "value", module: "__main__", reason: "entry-point" },
      { tag: "E_Resolve", target: "class Box", decision: "value", module: "__main__", reason: "entry-point" },
    ]);
    expect(sink.ofTag("E_Capture").map(e => e.target)).toEqual(["function make"]);
    expect(sink.ofTag("E_TrackClass").map(e => e.target)).toEqual(["class Box"]);

    const { runtime: dest, sink: destSink } = tracedRuntime();
    dest.loads(bytes);
    dest.loads(bytes);
    expect(destSink.ofTag("E_Skeleton").map(e => e.fresh)).toEqual([true, false]);
  });
});
