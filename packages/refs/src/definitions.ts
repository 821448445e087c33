import { deref, indirectionLevel, isPointerRef } from "@refdump/model";
import type { Occurrence } from "@refdump/model";
import type { UnionFind } from "./forest";
import type { CanonicalKey, KeyDeriver } from "./keys";
import { traverse } from "./walker";

// The one occurrence of a labelled value that gets expanded in full.
export interface DefinitionPoint {
  instanceKey: CanonicalKey;
  isPointerRef: boolean;
  indirection: number;
  level: number;
  isMapKey: boolean;
  // Type name of the value the occurrence denotes.
  valueType: string;
}

export type Candidate = Pick<
  DefinitionPoint,
  "isPointerRef" | "indirection" | "level" | "isMapKey"
>;

// Anywhere beats a map key, which is printed before the value it indexes.
// Then showing a value where it is stored beats showing it where a pointer
// leads to it. Among pointers, fewer hops win. Among equals, the shallower
// occurrence wins, and on a tie the one seen first stays.
export function isBetter(candidate: Candidate, incumbent?: Candidate): boolean {
  if (!incumbent) return true;
  if (incumbent.isMapKey !== candidate.isMapKey) {
    return !candidate.isMapKey;
  }
  if (incumbent.isPointerRef !== candidate.isPointerRef) {
    return !candidate.isPointerRef;
  }
  if (candidate.isPointerRef && candidate.indirection !== incumbent.indirection) {
    return candidate.indirection < incumbent.indirection;
  }
  return candidate.level < incumbent.level;
}

export function selectDefinitionPoints(
  root: Occurrence,
  keys: KeyDeriver,
  forest: UnionFind,
  ids: Map<CanonicalKey, string>,
  points: Map<CanonicalKey, DefinitionPoint>,
) {
  traverse(root, keys, ({ occurrence, level, isMapKey }) => {
    const rawKey = keys.rawKey(occurrence);
    if (!rawKey) return;
    const rootKey = forest.find(rawKey);
    if (!ids.has(rootKey)) return;

    const candidate: Candidate = {
      isPointerRef: isPointerRef(occurrence.value),
      indirection: indirectionLevel(occurrence.value),
      level,
      isMapKey,
    };
    if (!isBetter(candidate, points.get(rootKey))) return;

    const instanceKey = keys.instanceKey(occurrence);
    const target = deref(occurrence);
    if (!instanceKey || !target) return;

    points.set(rootKey, {
      ...candidate,
      instanceKey,
      valueType: target.value.type,
    });
  });
}
