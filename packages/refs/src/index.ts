export { KeyDeriver } from "./keys";
export type { CanonicalKey } from "./keys";
export { GraphWalker, isPointerLike, traverse } from "./walker";
export type { QueueItem, RefStats } from "./walker";
export { UnionFind } from "./forest";
export { Fingerprinter, fingerprint } from "./fingerprint";
export { unifyCopies } from "./unifier";
export { assignReferenceIDs, compareKeys, mergeStats, qualifies } from "./ids";
export type { MergedStats } from "./ids";
export { isBetter, selectDefinitionPoints } from "./definitions";
export type { Candidate, DefinitionPoint } from "./definitions";
export { ReferenceSession } from "./session";
export type { Inspection, Resolution } from "./session";
