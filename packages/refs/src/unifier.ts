import { isZeroSized } from "@refdump/model";
import type { Value } from "@refdump/model";
import { Fingerprinter } from "./fingerprint";
import type { UnionFind } from "./forest";
import type { CanonicalKey, KeyDeriver } from "./keys";
import type { RefStats } from "./walker";

// Merges keys that most likely denote the same value. Pointers hand out the
// address of their target, so a value that was both stored somewhere and
// reached through a pointer to a copy shows up under two keys with equal
// contents. Grouping by fingerprint finds such pairs.
//
// This is a guess, not a proof: unrelated values that happen to be equal can
// be merged too. Equal primitives are paired 1:1 in location order, which
// is not always the pairing the program had in mind.
export function unifyCopies(
  stats: Map<CanonicalKey, RefStats>,
  keys: KeyDeriver,
  forest: UnionFind,
) {
  const groups = new Map<string, CanonicalKey[]>();
  const printer = new Fingerprinter(keys);
  const sizes = new Map<Value, boolean>();

  stats.forEach((entry, key) => {
    // Every zero-sized value equals every other one of its type, so their
    // fingerprints say nothing.
    if (isZeroSized(entry.sample, sizes)) return;
    const print = printer.print(entry.sample);
    const group = groups.get(print);
    if (group) {
      group.push(key);
    } else {
      groups.set(print, [key]);
    }
  });

  groups.forEach(group => {
    if (group.length < 2) return;

    const sources: CanonicalKey[] = [];
    const copies: CanonicalKey[] = [];
    group.forEach(key => {
      const entry = stats.get(key);
      (entry && entry.pointerRefs > 0 ? sources : copies).push(key);
    });

    const first = stats.get(group[0]);
    if (first && first.isPrimitive) {
      if (sources.length > 1 && sources.length === copies.length) {
        sources.sort(byLocation);
        copies.sort(byLocation);
        sources.forEach((source, i) => forest.union(source, copies[i]));
      }
    } else if (sources.length > 1 && copies.length === 0) {
      for (let i = 1; i < sources.length; ++i) {
        forest.union(sources[i], sources[0]);
      }
    }

    if (sources.length === 1) {
      copies.forEach(copy => forest.union(copy, sources[0]));
    }
  });
}

function byLocation(a: CanonicalKey, b: CanonicalKey): number {
  return a.location - b.location;
}
