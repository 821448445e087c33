import type {
  Composite,
  Field,
  Interface,
  Occurrence,
  Pointer,
  PrimitiveData,
  Value,
} from "./types";

// Values handed to a top-level call live in slots of their own, except for
// pointers and interfaces, which only carry the identity of what they refer
// to.
export function rootOccurrence(value: Value): Occurrence {
  return {
    value,
    addressable: !isIndirect(value),
  };
}

export function isIndirect(value: Value): value is Pointer | Interface {
  return value.kind === "pointer" || value.kind === "interface";
}

// Takes a single step through a pointer or interface. Whatever a pointer
// refers to has an address; a value boxed in an interface is a copy that
// does not.
export function elem(occurrence: Occurrence): Occurrence | null {
  const { value } = occurrence;
  switch (value.kind) {
    case "pointer":
      return value.target ? { value: value.target, addressable: true } : null;
    case "interface":
      return value.elem ? { value: value.elem, addressable: false } : null;
  }
  return null;
}

// Follows pointers and interfaces down to the first direct value. Returns
// null at a nil link, and also when a chain of pointers leads back to itself,
// since such a chain never reaches a value.
export function deref(occurrence: Occurrence): Occurrence | null {
  let current = occurrence;
  let seen: Set<Value> | undefined;
  while (isIndirect(current.value)) {
    seen = seen || new Set;
    if (seen.has(current.value)) return null;
    seen.add(current.value);
    const next = elem(current);
    if (!next) return null;
    current = next;
  }
  return current;
}

// True for pointers, and for interfaces that (eventually) hold one.
export function isPointerRef(value: Value): boolean {
  let current: Value | null = value;
  while (current && current.kind === "interface") {
    current = current.elem;
  }
  return current !== null && current.kind === "pointer";
}

// Number of pointer hops from the occurrence to the value it denotes:
// T is 0, *T is 1, **T is 2. Interfaces in front of the first pointer are
// unwrapped without counting.
export function indirectionLevel(value: Value): number {
  let current: Value | null = value;
  while (current && current.kind === "interface") {
    current = current.elem;
  }
  let level = 0;
  const seen = new Set<Value>();
  while (current && current.kind === "pointer" && !seen.has(current)) {
    seen.add(current);
    ++level;
    current = current.target;
  }
  return level;
}

export function isComposite(value: Value): value is Composite {
  switch (value.kind) {
    case "struct":
    case "array":
    case "slice":
    case "map":
      return true;
  }
  return false;
}

export function isNil(value: Value): boolean {
  switch (value.kind) {
    case "pointer": return value.target === null;
    case "interface": return value.elem === null;
    case "slice": return value.elements === null;
    case "map": return value.entries === null;
    case "func": return value.handle === null;
  }
  return false;
}

// Structs and arrays that hold no data at all. Every such value compares
// equal to every other value of its type.
// Answers are cached in `known`, which callers may share between calls over
// the same values.
export function isZeroSized(
  value: Value,
  known = new Map<Value, boolean>(),
): boolean {
  const stack: Value[] = [value];
  const visiting = new Set<Value>();
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (known.has(top)) {
      stack.pop();
      continue;
    }
    if (top.kind !== "struct" && top.kind !== "array") {
      known.set(top, false);
      stack.pop();
      continue;
    }
    const members = top.kind === "struct"
      ? top.fields.map(field => field.value)
      : top.elements;
    if (!members.every(isAggregate)) {
      known.set(top, false);
      stack.pop();
      continue;
    }
    if (!visiting.has(top)) {
      visiting.add(top);
      const before = stack.length;
      members.forEach(member => {
        if (!known.has(member) && !visiting.has(member)) stack.push(member);
      });
      if (stack.length > before) continue;
    }
    stack.pop();
    visiting.delete(top);
    // A member still being visited is part of a cycle, which has size.
    known.set(top, members.every(member => known.get(member) === true));
  }
  return known.get(value) === true;
}

function isAggregate(value: Value): boolean {
  return value.kind === "struct" || value.kind === "array";
}

export function fields(occurrence: Occurrence): [Field, Occurrence][] {
  const { value, addressable } = occurrence;
  if (value.kind !== "struct") return [];
  return value.fields.map((field): [Field, Occurrence] => [
    field,
    { value: field.value, addressable },
  ]);
}

export function elements(occurrence: Occurrence): Occurrence[] {
  const { value } = occurrence;
  switch (value.kind) {
    case "array":
      return value.elements.map(element => ({
        value: element,
        addressable: occurrence.addressable,
      }));
    case "slice":
      // Slice elements live in the backing store, which always has an
      // address, however the slice itself was reached.
      return (value.elements || []).map(element => ({
        value: element,
        addressable: true,
      }));
  }
  return [];
}

// Map entries in a stable order. Neither keys nor values are addressable.
export function entries(occurrence: Occurrence): [Occurrence, Occurrence][] {
  const { value } = occurrence;
  if (value.kind !== "map" || !value.entries) return [];
  return value.entries
    .slice(0)
    .sort((a, b) => compareKeys(a.key, b.key))
    .map((entry): [Occurrence, Occurrence] => [
      { value: entry.key, addressable: false },
      { value: entry.value, addressable: false },
    ]);
}

// Direct children in traversal order: struct fields, then elements, then
// map keys each followed by its value.
export function children(occurrence: Occurrence): Occurrence[] {
  switch (occurrence.value.kind) {
    case "struct":
      return fields(occurrence).map(([, child]) => child);
    case "array":
    case "slice":
      return elements(occurrence);
    case "map": {
      const result: Occurrence[] = [];
      entries(occurrence).forEach(([key, value]) => result.push(key, value));
      return result;
    }
  }
  return [];
}

export function literal(data: PrimitiveData): string {
  switch (typeof data) {
    case "string":
      return JSON.stringify(data);
    case "bigint":
      return `${data}n`;
    case "symbol":
      return data.toString();
  }
  return String(data);
}

// Short text for a value, used to order map keys that are not numbers or
// strings.
export function describe(value: Value): string {
  if (value.kind === "primitive") return literal(value.value);
  if (isNil(value)) return value.type + "(nil)";
  return value.type + "{…}";
}

function keyRank(value: Value): number {
  if (value.kind !== "primitive") return 3;
  switch (typeof value.value) {
    case "number":
    case "bigint":
      return 0;
    case "string":
      return 1;
  }
  return 2;
}

function compareKeys(a: Value, b: Value): number {
  const rankA = keyRank(a);
  const rankB = keyRank(b);
  if (rankA !== rankB) return rankA - rankB;
  if (a.kind === "primitive" && b.kind === "primitive") {
    const x = a.value;
    const y = b.value;
    if (
      (typeof x === "number" || typeof x === "bigint") &&
      (typeof y === "number" || typeof y === "bigint")
    ) {
      return x < y ? -1 : x > y ? 1 : 0;
    }
    if (typeof x === "string" && typeof y === "string") {
      return compareStrings(x, y);
    }
  }
  return compareStrings(describe(a), describe(b));
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
