import type {
  ArrayValue,
  Field,
  Func,
  Interface,
  MapEntry,
  MapValue,
  Pointer,
  Primitive,
  PrimitiveData,
  Slice,
  Struct,
  StructDetails,
  Value,
} from "./types";

// Nodes created by the functions below, so callers that accept arbitrary
// input can tell model values apart from plain objects that merely look like
// them.
const known = new WeakSet<object>();

function admit<T extends Value>(value: T): T {
  known.add(value);
  return value;
}

export function isValue(value: unknown): value is Value {
  return typeof value === "object" && value !== null && known.has(value);
}

export function primitive(type: string, value: PrimitiveData): Primitive {
  return admit({ kind: "primitive", type, value });
}

export function int(value: number, type = "int"): Primitive {
  return primitive(type, value);
}

export function float(value: number, type = "float64"): Primitive {
  return primitive(type, value);
}

export function str(value: string, type = "string"): Primitive {
  return primitive(type, value);
}

export function bool(value: boolean, type = "bool"): Primitive {
  return primitive(type, value);
}

export function struct(
  type: string,
  fields: Field[] | Record<string, Value>,
  details: StructDetails = {},
): Struct {
  return admit({
    ...details,
    kind: "struct",
    type,
    fields: Array.isArray(fields)
      ? fields.slice(0)
      : Object.keys(fields).map(name => ({ name, value: fields[name] })),
  });
}

export function array(type: string, elements: Value[]): ArrayValue {
  return admit({ kind: "array", type, elements });
}

// Byte data, as an array of uint8 elements.
export function bytes(type: string, data: ArrayLike<number>): ArrayValue {
  return array(type, Array.from(data, byte => int(byte, "uint8")));
}

// The elements array is kept as given rather than copied: passing the same
// array to two slice calls makes two slices over one backing store.
export function slice(type: string, elements: Value[] | null): Slice {
  return admit({ kind: "slice", type, elements });
}

export function entry(key: Value, value: Value): MapEntry {
  return { key, value };
}

// As with slice, the entries array is the map's identity.
export function map(type: string, entries: MapEntry[] | null): MapValue {
  return admit({ kind: "map", type, entries });
}

export function pointer(target: Value, type?: string): Pointer;
export function pointer(target: Value | null, type: string): Pointer;
export function pointer(target: Value | null, type?: string): Pointer {
  return admit({
    kind: "pointer",
    type: type || "*" + (target ? target.type : "unknown"),
    target,
  });
}

export function iface(type: string, elem: Value | null): Interface {
  return admit({ kind: "interface", type, elem });
}

export function func(type: string, name: string, handle: object | null): Func {
  return admit({ kind: "func", type, name, handle });
}
