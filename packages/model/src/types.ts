// Every node in a value graph is also a unit of storage: the object identity of
// a node stands in for the address of the slot holding it. Two pointers denote
// the same value exactly when their targets are the same node object, while a
// structurally equal node elsewhere in the graph is a copy.

export type PrimitiveData =
  | string
  | number
  | boolean
  | bigint
  | symbol
  | null
  | undefined;

interface Node<TKind extends string> {
  readonly kind: TKind;
  // Display name of the value's type, also part of its canonical key.
  readonly type: string;
}

export interface Primitive extends Node<"primitive"> {
  readonly value: PrimitiveData;
}

export interface Field {
  readonly name: string;
  readonly value: Value;
  // Rendered with a different marker, like unexported fields.
  readonly hidden?: boolean;
}

// Text a value gives for itself, such as an error's message or what a
// custom toString returns.
export interface TextForm {
  readonly source: "stringer" | "error";
  readonly text: string;
}

export interface StructDetails {
  textForm?: TextForm;
  // Names of the methods the value's type offers, sorted.
  methods?: string[];
}

export interface Struct extends Node<"struct">, Readonly<StructDetails> {
  readonly fields: Field[];
}

// Fixed-size sequence stored inline, so copying the array copies its elements.
export interface ArrayValue extends Node<"array"> {
  readonly elements: Value[];
}

// Slices share their element storage: the elements array object is the
// handle, and two slices with the same handle see the same elements.
export interface Slice extends Node<"slice"> {
  readonly elements: Value[] | null;
}

export interface MapEntry {
  readonly key: Value;
  readonly value: Value;
}

export interface MapValue extends Node<"map"> {
  readonly entries: MapEntry[] | null;
}

export interface Pointer extends Node<"pointer"> {
  // Writable so that cycles can be closed after construction.
  target: Value | null;
}

export interface Interface extends Node<"interface"> {
  readonly elem: Value | null;
}

export interface Func extends Node<"func"> {
  readonly name: string;
  readonly handle: object | null;
}

export type Value =
  | Primitive
  | Struct
  | ArrayValue
  | Slice
  | MapValue
  | Pointer
  | Interface
  | Func;

export type Kind = Value["kind"];

export type Composite = Struct | ArrayValue | Slice | MapValue;

// A place where a value is seen during traversal. The same node can occur in
// several places, and whether that place has an address of its own decides
// how the occurrence is identified.
export interface Occurrence {
  readonly value: Value;
  readonly addressable: boolean;
}
