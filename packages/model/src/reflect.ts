import {
  array,
  bytes,
  entry,
  func,
  map,
  pointer,
  primitive,
  struct,
} from "./build";
import type {
  Field,
  MapEntry,
  PrimitiveData,
  StructDetails,
  TextForm,
  Value,
} from "./types";

const {
  getPrototypeOf,
  getOwnPropertyDescriptor,
  getOwnPropertyNames,
} = Object;
const objectToString = Object.prototype.toString;

// Translates ordinary JavaScript values into the value model. JavaScript
// objects are always held by reference, so every place an object appears
// becomes a fresh pointer, while the object itself becomes a single storage
// node shared by all of those pointers. That is what lets shared and cyclic
// objects be recognised later on.
//
// A Reflector remembers the objects it has seen, so values reflected through
// the same instance share storage. Use one instance per top-level call.
export class Reflector {
  private storage = new Map<object, Value>();
  private pending: Array<() => void> = [];

  public reflect(input: unknown): Value {
    const result = this.occurrence(input);
    // Storage nodes are filled in from a worklist rather than by recursion,
    // so deep object chains cannot exhaust the call stack.
    for (let job = this.pending.pop(); job; job = this.pending.pop()) {
      job();
    }
    return result;
  }

  private occurrence(input: unknown): Value {
    if (typeof input === "function") {
      return func("Function", input.name || "anonymous", input);
    }
    if (typeof input !== "object" || input === null) {
      return primitive(input === null ? "null" : typeof input, primitiveData(input));
    }
    if (input instanceof Date) {
      return primitive("Date", dateText(input));
    }
    if (input instanceof RegExp) {
      return primitive("RegExp", String(input));
    }
    const target = this.storageFor(input);
    return pointer(target, target.type);
  }

  private storageFor(input: object): Value {
    const known = this.storage.get(input);
    if (known) return known;

    const type = typeName(input);

    if (input instanceof Uint8Array) {
      const node = bytes(type, input);
      this.storage.set(input, node);
      return node;
    }

    if (Array.isArray(input) || input instanceof Set) {
      const items: unknown[] = Array.from(input);
      const node = array(type, []);
      this.storage.set(input, node);
      this.pending.push(() => {
        items.forEach(item => node.elements.push(this.occurrence(item)));
      });
      return node;
    }

    if (input instanceof Map) {
      const pairs: [unknown, unknown][] = Array.from(input);
      const table: MapEntry[] = [];
      const node = map(type, table);
      this.storage.set(input, node);
      this.pending.push(() => {
        pairs.forEach(([key, value]) => {
          table.push(entry(this.occurrence(key), this.occurrence(value)));
        });
      });
      return node;
    }

    const node = struct(type, [], details(input));
    this.storage.set(input, node);
    this.pending.push(() => this.fillFields(input, node.fields));
    return node;
  }

  private fillFields(input: object, fields: Field[]) {
    if (input instanceof Error) {
      fields.push(
        { name: "name", value: this.occurrence(input.name) },
        { name: "message", value: this.occurrence(input.message) },
      );
    }
    Object.keys(input).forEach(name => {
      if (fields.some(field => field.name === name)) return;
      const descriptor = getOwnPropertyDescriptor(input, name);
      if (!descriptor) return;
      // Accessors are shown rather than invoked, since a getter can throw or
      // have side effects.
      const value = "value" in descriptor
        ? this.occurrence(descriptor.value)
        : primitive("accessor", descriptor.get ? "[Getter]" : "[Setter]");
      fields.push({ name, value });
    });
  }
}

export function reflect(input: unknown): Value {
  return new Reflector().reflect(input);
}

function details(input: object): StructDetails {
  const result: StructDetails = {};
  const form = textForm(input);
  if (form) result.textForm = form;
  const names = methodNames(input);
  if (names.length > 0) result.methods = names;
  return result;
}

// Errors read as their message. Other objects read as their own toString,
// when they have one besides the one every object inherits.
function textForm(input: object): TextForm | undefined {
  if (input instanceof Error) {
    return { source: "error", text: input.message };
  }
  const toString: unknown = Reflect.get(input, "toString");
  if (typeof toString === "function" && toString !== objectToString) {
    return { source: "stringer", text: String(toString.call(input)) };
  }
  return undefined;
}

// Function-valued properties of the prototype chain, up to Object.prototype.
function methodNames(input: object): string[] {
  const names = new Set<string>();
  let proto: object | null = getPrototypeOf(input);
  while (proto && proto !== Object.prototype) {
    const owner: object = proto;
    getOwnPropertyNames(owner).forEach(name => {
      if (name === "constructor") return;
      const descriptor = getOwnPropertyDescriptor(owner, name);
      if (descriptor && typeof descriptor.value === "function") {
        names.add(name);
      }
    });
    proto = getPrototypeOf(owner);
  }
  return Array.from(names).sort();
}

function typeName(input: object): string {
  const proto = getPrototypeOf(input);
  if (proto === null) return "Object";
  const ctor = proto.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
}

function primitiveData(value: unknown): PrimitiveData {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "bigint":
    case "symbol":
    case "undefined":
      return value;
  }
  return null;
}

function dateText(date: Date): string {
  const time = date.getTime();
  return time === time ? date.toISOString() : "Invalid Date";
}
