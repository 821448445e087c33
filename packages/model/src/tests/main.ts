import * as assert from "assert";
import { equal } from "@wry/equality";
import {
  Reflector,
  array,
  bool,
  children,
  deref,
  elem,
  entries,
  entry,
  func,
  iface,
  indirectionLevel,
  int,
  isNil,
  isPointerRef,
  isValue,
  isZeroSized,
  literal,
  map,
  pointer,
  primitive,
  reflect,
  rootOccurrence,
  slice,
  str,
  struct,
} from "../index";
import type { Pointer, Value } from "../index";

function targetOf(value: Value): Value {
  assert.strictEqual(value.kind, "pointer");
  const target = value.kind === "pointer" ? value.target : null;
  assert.ok(target);
  return target;
}

describe("builders", () => {
  it("registers the nodes they create", () => {
    assert.strictEqual(isValue(int(1)), true);
    assert.strictEqual(isValue(struct("Point", {})), true);
    assert.strictEqual(isValue({ kind: "primitive", type: "int", value: 1 }), false);
    assert.strictEqual(isValue(null), false);
    assert.strictEqual(isValue("int"), false);
  });

  it("copies struct fields but shares slice and map storage", () => {
    const fields = [{ name: "X", value: int(1) }];
    const point = struct("Point", fields);
    assert.notStrictEqual(point.fields, fields);
    assert.deepStrictEqual(point.fields, fields);

    const backing = [int(1), int(2)];
    const a = slice("[]int", backing);
    const b = slice("[]int", backing);
    assert.notStrictEqual(a, b);
    assert.strictEqual(a.elements, b.elements);

    const table = [entry(str("k"), int(1))];
    assert.strictEqual(map("map[string]int", table).entries, table);
  });

  it("names pointer types after their targets", () => {
    const point = struct("Point", {});
    assert.strictEqual(pointer(point).type, "*Point");
    assert.strictEqual(pointer(pointer(point)).type, "**Point");
    assert.strictEqual(pointer(null, "*Point").type, "*Point");
  });

  it("builds structs from records in key order", () => {
    const point = struct("Point", { X: int(1), Y: int(2) });
    assert.deepStrictEqual(point.fields.map(field => field.name), ["X", "Y"]);
  });
});

describe("occurrences", () => {
  it("treats roots as addressable unless they are indirect", () => {
    assert.strictEqual(rootOccurrence(int(1)).addressable, true);
    assert.strictEqual(rootOccurrence(struct("T", {})).addressable, true);
    assert.strictEqual(rootOccurrence(pointer(int(1))).addressable, false);
    assert.strictEqual(rootOccurrence(iface("any", int(1))).addressable, false);
  });

  it("gives pointer targets an address but not interface contents", () => {
    const target = int(1);
    const viaPointer = elem(rootOccurrence(pointer(target)));
    assert.deepStrictEqual(viaPointer, { value: target, addressable: true });
    const viaInterface = elem(rootOccurrence(iface("any", target)));
    assert.deepStrictEqual(viaInterface, { value: target, addressable: false });
    assert.strictEqual(elem(rootOccurrence(target)), null);
  });

  it("dereferences through chains of pointers and interfaces", () => {
    const point = struct("Point", { X: int(1) });
    const chain = iface("any", pointer(pointer(point)));
    const result = deref(rootOccurrence(chain));
    assert.ok(result);
    assert.strictEqual(result.value, point);
    assert.strictEqual(result.addressable, true);

    assert.strictEqual(deref(rootOccurrence(pointer(null, "*int"))), null);
    assert.strictEqual(deref(rootOccurrence(iface("error", null))), null);
  });

  it("stops at pointer chains that loop back on themselves", () => {
    const a: Pointer = pointer(null, "*any");
    const b = pointer(a, "**any");
    a.target = b;
    assert.strictEqual(deref(rootOccurrence(a)), null);
    assert.strictEqual(indirectionLevel(a), 2);
  });

  it("recognises pointers behind interfaces", () => {
    const target = int(1);
    assert.strictEqual(isPointerRef(pointer(target)), true);
    assert.strictEqual(isPointerRef(iface("any", pointer(target))), true);
    assert.strictEqual(isPointerRef(iface("any", target)), false);
    assert.strictEqual(isPointerRef(slice("[]int", [])), false);
  });

  it("counts pointer hops", () => {
    const target = int(1);
    assert.strictEqual(indirectionLevel(target), 0);
    assert.strictEqual(indirectionLevel(pointer(target)), 1);
    assert.strictEqual(indirectionLevel(iface("any", pointer(pointer(target)))), 2);
    assert.strictEqual(indirectionLevel(pointer(null, "*int")), 1);
  });

  it("knows which values are nil", () => {
    assert.strictEqual(isNil(slice("[]int", null)), true);
    assert.strictEqual(isNil(slice("[]int", [])), false);
    assert.strictEqual(isNil(map("map[string]int", null)), true);
    assert.strictEqual(isNil(func("func()", "f", null)), true);
    assert.strictEqual(isNil(int(0)), false);
  });

  it("detects zero-sized structs and arrays", () => {
    const empty = struct("Empty", {});
    assert.strictEqual(isZeroSized(empty), true);
    assert.strictEqual(isZeroSized(array("[2]Empty", [empty, struct("Empty", {})])), true);
    assert.strictEqual(isZeroSized(array("[0]int", [])), true);
    assert.strictEqual(isZeroSized(struct("Box", { Inner: empty })), true);
    assert.strictEqual(isZeroSized(struct("Point", { X: int(0) })), false);
    assert.strictEqual(isZeroSized(slice("[]int", [])), false);
  });

  it("decides the size of deeply nested values", () => {
    let empty: Value = struct("Empty", {});
    let full: Value = int(1);
    for (let i = 0; i < 20000; ++i) {
      empty = struct("Box", { Inner: empty });
      full = array("[1]A", [full]);
    }
    assert.strictEqual(isZeroSized(empty), true);
    assert.strictEqual(isZeroSized(full), false);

    const known = new Map<Value, boolean>();
    const shared = struct("Empty", {});
    assert.strictEqual(isZeroSized(struct("Pair", { A: shared, B: shared }), known), true);
    assert.strictEqual(known.get(shared), true);
  });

  it("inherits addressability into struct fields and arrays only", () => {
    const point = struct("Point", { X: int(1) });
    const boxed = elem(rootOccurrence(iface("any", point)));
    assert.ok(boxed);
    assert.deepStrictEqual(children(boxed).map(child => child.addressable), [false]);

    const list = slice("[]int", [int(1), int(2)]);
    const inBox = elem(rootOccurrence(iface("any", list)));
    assert.ok(inBox);
    assert.deepStrictEqual(children(inBox).map(child => child.addressable), [true, true]);
  });

  it("orders map entries by key", () => {
    const table = map("map[any]int", [
      entry(str("b"), int(1)),
      entry(int(10), int(2)),
      entry(str("a"), int(3)),
      entry(int(2), int(4)),
      entry(bool(true), int(5)),
    ]);
    const keys = entries(rootOccurrence(table)).map(([key]) =>
      key.value.kind === "primitive" ? key.value.value : undefined);
    assert.deepStrictEqual(keys, [2, 10, "a", "b", true]);

    const flat = children(rootOccurrence(table)).map(child =>
      child.value.kind === "primitive" ? child.value.value : undefined);
    assert.deepStrictEqual(flat, [2, 4, 10, 2, "a", 3, "b", 1, true, 5]);
    assert.deepStrictEqual(
      children(rootOccurrence(table)).map(child => child.addressable),
      [false, false, false, false, false, false, false, false, false, false],
    );
  });

  it("prints primitive literals", () => {
    assert.strictEqual(literal("a\"b"), "\"a\\\"b\"");
    assert.strictEqual(literal(42), "42");
    assert.strictEqual(literal(BigInt(7)), "7n");
    assert.strictEqual(literal(null), "null");
    assert.strictEqual(literal(undefined), "undefined");
    assert.strictEqual(literal(Symbol("s")), "Symbol(s)");
  });
});

describe("Reflector", () => {
  it("maps primitives to primitive nodes", () => {
    assert.ok(equal(reflect(1), primitive("number", 1)));
    assert.ok(equal(reflect("x"), str("x")));
    assert.ok(equal(reflect(null), primitive("null", null)));
    assert.ok(equal(reflect(undefined), primitive("undefined", undefined)));
    assert.ok(equal(
      reflect(new Date(Date.UTC(2020, 0, 2))),
      primitive("Date", "2020-01-02T00:00:00.000Z"),
    ));
    assert.ok(equal(reflect(new Date(NaN)), primitive("Date", "Invalid Date")));
    assert.ok(equal(reflect(/ab+c/g), primitive("RegExp", "/ab+c/g")));
  });

  it("reaches objects through pointers", () => {
    const expected = pointer(struct("Object", {
      a: primitive("number", 1),
      b: pointer(array("Array", [str("x")]), "Array"),
    }), "Object");
    assert.ok(equal(reflect({ a: 1, b: ["x"] }), expected));
  });

  it("shares storage between occurrences of one object", () => {
    const shared = { n: 1 };
    const list = targetOf(reflect([shared, shared]));
    assert.strictEqual(list.kind, "array");
    if (list.kind !== "array") return;
    const [first, second] = list.elements;
    assert.notStrictEqual(first, second);
    assert.strictEqual(targetOf(first), targetOf(second));
  });

  it("keeps separate objects apart even when they are equal", () => {
    const list = targetOf(reflect([{ n: 1 }, { n: 1 }]));
    if (list.kind !== "array") throw new TypeError("expected an array");
    assert.notStrictEqual(targetOf(list.elements[0]), targetOf(list.elements[1]));
  });

  it("closes cycles", () => {
    const node: { name: string; self?: object } = { name: "loop" };
    node.self = node;
    const storage = targetOf(reflect(node));
    if (storage.kind !== "struct") throw new TypeError("expected a struct");
    assert.deepStrictEqual(storage.fields.map(field => field.name), ["name", "self"]);
    assert.strictEqual(targetOf(storage.fields[1].value), storage);

    const again: { name: string; self?: object } = { name: "loop" };
    again.self = again;
    assert.ok(equal(reflect(node), reflect(again)));
  });

  it("shares storage across calls on one instance", () => {
    const shared = {};
    const reflector = new Reflector;
    assert.strictEqual(
      targetOf(reflector.reflect(shared)),
      targetOf(reflector.reflect(shared)),
    );
    assert.notStrictEqual(
      targetOf(reflect(shared)),
      targetOf(reflect(shared)),
    );
  });

  it("names storage after constructors", () => {
    class Point {
      constructor(public x: number, public y: number) {}
    }
    const storage = targetOf(reflect(new Point(1, 2)));
    assert.strictEqual(storage.type, "Point");
    assert.strictEqual(targetOf(reflect(Object.create(null))).type, "Object");
    assert.strictEqual(targetOf(reflect(new Set([1]))).kind, "array");
    assert.strictEqual(targetOf(reflect(new Set([1]))).type, "Set");
  });

  it("turns Maps into map storage", () => {
    const storage = targetOf(reflect(new Map([["k", 1]])));
    assert.ok(equal(storage, map("Map", [
      entry(str("k"), primitive("number", 1)),
    ])));
  });

  it("shows accessors without calling them", () => {
    let calls = 0;
    const input = {
      get lazy() {
        ++calls;
        return 1;
      },
    };
    const storage = targetOf(reflect(input));
    assert.ok(equal(storage, struct("Object", {
      lazy: primitive("accessor", "[Getter]"),
    })));
    assert.strictEqual(calls, 0);
  });

  it("includes the name and message of errors", () => {
    const storage = targetOf(reflect(new RangeError("too far")));
    if (storage.kind !== "struct") throw new TypeError("expected a struct");
    assert.strictEqual(storage.type, "RangeError");
    assert.deepStrictEqual(storage.fields.slice(0, 2).map(field => field.value), [
      str("RangeError"),
      str("too far"),
    ]);
  });

  it("records how objects read as text", () => {
    class Money {
      constructor(public cents: number) {}
      public toString() {
        return `$${this.cents / 100}`;
      }
    }
    const money = targetOf(reflect(new Money(250)));
    if (money.kind !== "struct") throw new TypeError("expected a struct");
    assert.deepStrictEqual(money.textForm, { source: "stringer", text: "$2.5" });

    const error = targetOf(reflect(new TypeError("bad")));
    if (error.kind !== "struct") throw new TypeError("expected a struct");
    assert.deepStrictEqual(error.textForm, { source: "error", text: "bad" });

    const plain = targetOf(reflect({ a: 1 }));
    if (plain.kind !== "struct") throw new TypeError("expected a struct");
    assert.strictEqual(plain.textForm, undefined);
  });

  it("lists the methods of an object's prototype chain", () => {
    class Shape {
      public area() {
        return 0;
      }
    }
    class Square extends Shape {
      constructor(public side: number) {
        super();
      }
      public area() {
        return this.side * this.side;
      }
      public grow() {
        this.side += 1;
      }
    }
    const square = targetOf(reflect(new Square(2)));
    if (square.kind !== "struct") throw new TypeError("expected a struct");
    assert.deepStrictEqual(square.methods, ["area", "grow"]);

    const plain = targetOf(reflect({ a: 1 }));
    if (plain.kind !== "struct") throw new TypeError("expected a struct");
    assert.strictEqual(plain.methods, undefined);
  });

  it("turns byte arrays into uint8 elements", () => {
    assert.ok(equal(
      targetOf(reflect(new Uint8Array([1, 255]))),
      array("Uint8Array", [int(1, "uint8"), int(255, "uint8")]),
    ));
    assert.strictEqual(targetOf(reflect(Buffer.from("hi"))).type, "Buffer");
  });

  it("wraps functions in func nodes keyed by the function", () => {
    function handler() {}
    const value = reflect(handler);
    assert.ok(equal(value, func("Function", "handler", handler)));
    assert.strictEqual(value.kind === "func" && value.handle, handler);
    assert.strictEqual(reflect(() => 1).kind, "func");
  });
});
