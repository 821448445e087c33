import type { CanonicalKey } from "./keys";

// Disjoint-set forest over canonical keys. A key that was never merged is its
// own root, without needing an entry.
export class UnionFind {
  private parent = new Map<CanonicalKey, CanonicalKey>();

  public find(key: CanonicalKey): CanonicalKey {
    let root = key;
    for (let next = this.parent.get(root); next && next !== root; next = this.parent.get(root)) {
      root = next;
    }
    // Second pass points everything on the path directly at the root.
    for (let current = key; current !== root;) {
      const next = this.parent.get(current);
      this.parent.set(current, root);
      if (!next) break;
      current = next;
    }
    return root;
  }

  // The root with the smaller location ends up on top. When the locations
  // are equal the root of the second key wins.
  public union(a: CanonicalKey, b: CanonicalKey) {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    if (rootA.location < rootB.location) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootA, rootB);
    }
  }

  public connected(a: CanonicalKey, b: CanonicalKey): boolean {
    return this.find(a) === this.find(b);
  }
}
