import { compareStrings } from "@refdump/model";
import type { UnionFind } from "./forest";
import type { CanonicalKey } from "./keys";
import type { RefStats } from "./walker";

export type MergedStats = Pick<
  RefStats,
  "totalRefs" | "pointerRefs" | "kind" | "isPrimitive" | "sample"
>;

// Sums the counts of every key in a group under the group's root. The
// descriptive fields come from the root's own entry.
export function mergeStats(
  stats: Map<CanonicalKey, RefStats>,
  forest: UnionFind,
): Map<CanonicalKey, MergedStats> {
  const merged = new Map<CanonicalKey, MergedStats>();
  stats.forEach((entry, key) => {
    const root = forest.find(key);
    let total = merged.get(root);
    if (!total) {
      const { kind, isPrimitive, sample } = stats.get(root) || entry;
      merged.set(root, total = {
        totalRefs: 0,
        pointerRefs: 0,
        kind,
        isPrimitive,
        sample,
      });
    }
    total.totalRefs += entry.totalRefs;
    total.pointerRefs += entry.pointerRefs;
  });
  return merged;
}

// A value is worth labelling when more than one pointer leads to it, or when
// it is reached both through a pointer and directly.
export function qualifies({ totalRefs, pointerRefs }: MergedStats): boolean {
  return pointerRefs > 1 || (pointerRefs > 0 && totalRefs > pointerRefs);
}

export function compareKeys(a: CanonicalKey, b: CanonicalKey): number {
  return a.location - b.location || compareStrings(a.type, b.type);
}

// Labels are numbered in root order, so the same graph always gets the same
// labels.
export function assignReferenceIDs(
  merged: Map<CanonicalKey, MergedStats>,
): Map<CanonicalKey, string> {
  const ids = new Map<CanonicalKey, string>();
  let next = 1;
  Array.from(merged.keys()).sort(compareKeys).forEach(root => {
    const total = merged.get(root);
    if (total && qualifies(total)) {
      ids.set(root, "&" + next++);
    }
  });
  return ids;
}
