import {
  children,
  deref,
  isComposite,
  isNil,
  isPointerRef,
} from "@refdump/model";
import type { Kind, Occurrence, Value } from "@refdump/model";
import type { CanonicalKey, KeyDeriver } from "./keys";

export interface QueueItem {
  occurrence: Occurrence;
  level: number;
  isMapKey: boolean;
}

// Breadth-first walk from one root. Every occurrence reachable from the root
// is visited, but the children of a composite are enqueued only the first
// time its key comes up, which is what makes cyclic graphs terminate. The
// queue is consumed by index rather than shifted.
export function traverse(
  root: Occurrence,
  keys: KeyDeriver,
  visit: (item: QueueItem) => void,
) {
  const queue: QueueItem[] = [{ occurrence: root, level: 0, isMapKey: false }];
  const traversed = new Set<CanonicalKey>();

  for (let head = 0; head < queue.length; ++head) {
    const item = queue[head];
    visit(item);

    const target = deref(item.occurrence);
    if (!target || !isComposite(target.value)) continue;

    const key = keys.rawKey(target);
    if (!key || traversed.has(key)) continue;
    traversed.add(key);

    // Map children alternate between keys and values.
    const inMap = target.value.kind === "map";
    children(target).forEach((occurrence, i) => {
      queue.push({
        occurrence,
        level: item.level + 1,
        isMapKey: inMap && i % 2 === 0,
      });
    });
  }
}

export interface RefStats {
  totalRefs: number;
  pointerRefs: number;
  // Shallowest level at which a pointer-like reference was seen, or -1.
  minPointerLevel: number;
  firstLevel: number;
  kind: Kind;
  isPrimitive: boolean;
  // The dereferenced value, kept for fingerprinting.
  sample: Value;
}

// Slices and maps carry a reference to shared storage, so for counting they
// behave like pointers even though they are not dereferenced.
export function isPointerLike(value: Value): boolean {
  if (isPointerRef(value)) return true;
  return (value.kind === "slice" || value.kind === "map") && !isNil(value);
}

// Collects reference statistics for every key reachable from the roots it is
// given. Stats accumulate across roots; each root gets its own traversal.
export class GraphWalker {
  public readonly stats = new Map<CanonicalKey, RefStats>();

  constructor(private keys: KeyDeriver) {}

  public walk(root: Occurrence) {
    traverse(root, this.keys, item => this.record(item));
  }

  private record({ occurrence, level }: QueueItem) {
    const target = deref(occurrence);
    if (!target) return;
    const key = this.keys.rawKey(target);
    if (!key) return;

    const stats = this.statsFor(key, target.value, level);
    ++stats.totalRefs;

    if (isPointerLike(occurrence.value)) {
      ++stats.pointerRefs;
      if (stats.minPointerLevel < 0 || level < stats.minPointerLevel) {
        stats.minPointerLevel = level;
      }
    }
  }

  private statsFor(key: CanonicalKey, value: Value, level: number): RefStats {
    let stats = this.stats.get(key);
    if (!stats) {
      this.stats.set(key, stats = {
        totalRefs: 0,
        pointerRefs: 0,
        minPointerLevel: -1,
        firstLevel: level,
        kind: value.kind,
        isPrimitive: value.kind === "primitive",
        sample: value,
      });
    }
    return stats;
  }
}
