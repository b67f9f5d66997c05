export type Side = "left" | "right";

export type NodeKind = "node" | "leaf";

/**
 * A flat, order-independent description of one tree node.
 *
 * A list of FlatRecords describes a whole tree through parent pointers instead of
 * nested children:
 * - Exactly one record has `parentId: null`; that is the root, and its `side` is ignored.
 * - Every other record points at a `"node"` record, and each node record is
 *   pointed at by exactly two records: one `"left"`, one `"right"`.
 * - Ids are unique non-negative integers within a list.
 *
 * Position within the list carries no meaning. See {@link flatten} for the order
 * we emit records in and {@link rebuild} for the inverse.
 */
export type FlatRecord<T> = FlatNodeRecord | FlatLeafRecord<T>;

export interface FlatNodeRecord {
  readonly id: number;
  readonly kind: "node";
  readonly side: Side;
  readonly parentId: number | null;
  readonly payload: null;
}

export interface FlatLeafRecord<T> {
  readonly id: number;
  readonly kind: "leaf";
  readonly side: Side;
  readonly parentId: number | null;
  /**
   * The leaf's elements, in order.
   */
  readonly payload: readonly T[];
}
