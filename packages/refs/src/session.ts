import { deref, rootOccurrence } from "@refdump/model";
import type { Occurrence, Value } from "@refdump/model";
import { selectDefinitionPoints } from "./definitions";
import type { DefinitionPoint } from "./definitions";
import { UnionFind } from "./forest";
import { assignReferenceIDs, mergeStats } from "./ids";
import { KeyDeriver } from "./keys";
import type { CanonicalKey } from "./keys";
import { unifyCopies } from "./unifier";
import { GraphWalker } from "./walker";
import type { RefStats } from "./walker";

export type Resolution =
  | { kind: "plain" }
  | { kind: "definition"; label: string }
  | { kind: "backref"; label: string };

export interface Inspection {
  rawKey?: CanonicalKey;
  rootKey?: CanonicalKey;
  label?: string;
  isDefinitionPoint: boolean;
  dereferencedType?: string;
  rendered: boolean;
}

const PLAIN: Resolution = Object.freeze({ kind: "plain" });

// Everything one rendering call knows about identity. A session analyzes a
// list of roots once, and then answers, for each occurrence the renderer
// reaches, whether to print it normally, print it with its label, or print
// only a back-reference to where it was shown.
export class ReferenceSession {
  public readonly keys = new KeyDeriver;
  private walker = new GraphWalker(this.keys);
  private forest = new UnionFind;
  private ids = new Map<CanonicalKey, string>();
  private points = new Map<CanonicalKey, DefinitionPoint>();
  private rendered = new Set<CanonicalKey>();
  private analyzed = false;

  // Runs every analysis pass over the roots and returns the occurrences the
  // renderer should start from.
  public analyze(roots: Value[]): Occurrence[] {
    if (this.analyzed) {
      throw new Error("ReferenceSession has already analyzed its roots");
    }
    this.analyzed = true;

    const occurrences = roots.map(rootOccurrence);
    occurrences.forEach(root => this.walker.walk(root));
    unifyCopies(this.walker.stats, this.keys, this.forest);
    this.ids = assignReferenceIDs(mergeStats(this.walker.stats, this.forest));
    occurrences.forEach(root => selectDefinitionPoints(
      root,
      this.keys,
      this.forest,
      this.ids,
      this.points,
    ));
    return occurrences;
  }

  // Decides how to show one occurrence. The first time the renderer reaches
  // the chosen definition site of a labelled value, the value is marked as
  // rendered; every other occurrence of it becomes a back-reference,
  // including the definition site itself when a cycle leads back to it.
  public resolve(occurrence: Occurrence): Resolution {
    const rawKey = this.keys.rawKey(occurrence);
    if (!rawKey) return PLAIN;
    const rootKey = this.forest.find(rawKey);
    const label = this.ids.get(rootKey);
    if (!label) return PLAIN;

    if (this.isDefinitionPoint(rootKey, occurrence) && !this.rendered.has(rootKey)) {
      this.rendered.add(rootKey);
      return { kind: "definition", label };
    }
    return { kind: "backref", label };
  }

  public inspect(occurrence: Occurrence): Inspection {
    const rawKey = this.keys.rawKey(occurrence);
    const target = deref(occurrence);
    const result: Inspection = {
      isDefinitionPoint: false,
      rendered: false,
      dereferencedType: target ? target.value.type : undefined,
    };
    if (!rawKey) return result;

    const rootKey = this.forest.find(rawKey);
    result.rawKey = rawKey;
    result.rootKey = rootKey;
    result.label = this.ids.get(rootKey);
    result.isDefinitionPoint = this.isDefinitionPoint(rootKey, occurrence);
    result.rendered = this.rendered.has(rootKey);
    return result;
  }

  public labelOf(key: CanonicalKey): string | undefined {
    return this.ids.get(this.forest.find(key));
  }

  public rootOf(key: CanonicalKey): CanonicalKey {
    return this.forest.find(key);
  }

  public statsOf(key: CanonicalKey): RefStats | undefined {
    return this.walker.stats.get(key);
  }

  public definitionOf(key: CanonicalKey): DefinitionPoint | undefined {
    return this.points.get(this.forest.find(key));
  }

  // Labelled roots in label order.
  public labels(): Array<[CanonicalKey, string]> {
    return Array.from(this.ids);
  }

  private isDefinitionPoint(rootKey: CanonicalKey, occurrence: Occurrence): boolean {
    const point = this.points.get(rootKey);
    return !!point && point.instanceKey === this.keys.instanceKey(occurrence);
  }
}
