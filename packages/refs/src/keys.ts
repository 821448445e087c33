import { Trie } from "@wry/trie";
import { deref } from "@refdump/model";
import type { Occurrence, PrimitiveData, Value } from "@refdump/model";

// Identity of a piece of storage as seen through a particular type. Keys are
// interned, so two keys with the same location and type are the same object
// and can be compared with === or used as Map keys.
export interface CanonicalKey {
  readonly location: number;
  readonly type: string;
}

interface SyntheticSlot {
  location?: number;
}

// Hands out slot indices and canonical keys for one analysis session. Slot
// indices are assigned the first time a piece of storage is asked about, from
// a single counter, so ordering keys by location orders them by when the
// session first came across them.
export class KeyDeriver {
  private counter = 0;
  private slots = new Map<object, number>();

  // Values without storage of their own (primitives reached through an
  // interface or a map) are identified by what they hold. Each distinct
  // (type, value) pair gets one synthetic location.
  private synthetic = new Trie<SyntheticSlot>(false);

  private keys = new Trie<CanonicalKey>(
    false,
    ([location, type]) => Object.freeze({ location, type }),
  );

  public key(location: number, type: string): CanonicalKey {
    return this.keys.lookup(location, type);
  }

  public location(storage: object): number {
    let location = this.slots.get(storage);
    if (location === undefined) {
      this.slots.set(storage, location = ++this.counter);
    }
    return location;
  }

  private syntheticLocation(type: string, data: PrimitiveData): number {
    const slot = this.synthetic.lookup(type, data);
    if (slot.location === undefined) {
      slot.location = ++this.counter;
    }
    return slot.location;
  }

  // Key for whatever the occurrence ultimately denotes, after following every
  // pointer and interface.
  public rawKey(occurrence: Occurrence): CanonicalKey | undefined {
    const target = deref(occurrence);
    return target ? this.direct(target) : undefined;
  }

  // Key for the occurrence itself. Interfaces are looked through, since they
  // have no identity apart from their contents, but pointers are not: a
  // pointer that is not stored anywhere is identified by where it points,
  // under the pointer's own type.
  public instanceKey(occurrence: Occurrence): CanonicalKey | undefined {
    let { value, addressable } = occurrence;
    while (value.kind === "interface") {
      if (!value.elem) return undefined;
      value = value.elem;
      addressable = false;
    }
    if (value.kind === "pointer" && !addressable) {
      return value.target
        ? this.key(this.location(value.target), value.type)
        : undefined;
    }
    return this.direct({ value, addressable });
  }

  private direct(occurrence: Occurrence): CanonicalKey | undefined {
    const { value } = occurrence;
    if (occurrence.addressable) {
      return this.key(this.location(value), value.type);
    }
    const handle = handleOf(value);
    if (handle) {
      return this.key(this.location(handle), value.type);
    }
    if (value.kind === "primitive") {
      return this.key(this.syntheticLocation(value.type, value.value), value.type);
    }
    return undefined;
  }
}

// The storage a reference-like value shares with its copies.
function handleOf(value: Value): object | null {
  switch (value.kind) {
    case "slice": return value.elements;
    case "map": return value.entries;
    case "func": return value.handle;
  }
  return null;
}
