import { StructuralIntegrityError } from "./errors";
import { FlatRecord, Side } from "./flat_record";
import { InnerNode, Leaf, TreeNode } from "./nodes";

/**
 * An inner node whose children have not all arrived yet.
 */
interface PartialNode<T> {
  left: TreeNode<T> | null;
  right: TreeNode<T> | null;
}

/**
 * Rebuilds the tree described by a list of {@link FlatRecord}s, e.g., from {@link flatten}.
 *
 * Records are consumed from the end of the list backwards, which is the natural order
 * for flatten's output: every record's descendants come after it.
 * Records in any other order are also accepted; a node record that arrives before its
 * subtree is complete waits until its last child arrives, then attaches right away.
 * Either way, each record is attached once.
 *
 * The input list is not modified, and rebuilt leaves do not share its payload arrays.
 *
 * @throws StructuralIntegrityError If the records do not describe exactly one tree:
 * empty list, duplicate or invalid ids, zero or several roots, a parent that is missing
 * or is a leaf, two children on the same side, a node missing a child,
 * or records that never connect to the root.
 */
export function rebuild<T>(records: readonly FlatRecord<T>[]): TreeNode<T> {
  checkRecords(records);

  const rebuilder = new Rebuilder<T>();
  for (let i = records.length - 1; i >= 0; i--) rebuilder.add(records[i]);
  return rebuilder.result();
}

/**
 * Working state for one rebuild call.
 */
class Rebuilder<T> {
  /**
   * Inner nodes still missing a child, keyed by their id.
   */
  private readonly pending = new Map<number, PartialNode<T>>();
  /**
   * Fully-assembled subtrees, keyed by their root's id, waiting for that
   * id's own record to attach them to their parent.
   */
  private readonly completed = new Map<number, TreeNode<T>>();
  /**
   * Node records seen before their subtree was complete, keyed by id.
   */
  private readonly waiting = new Map<number, FlatRecord<T>>();
  private root: TreeNode<T> | null = null;

  add(record: FlatRecord<T>): void {
    if (record.kind === "leaf") {
      this.attach(record, new Leaf(record.payload.slice()));
      return;
    }
    const done = this.completed.get(record.id);
    if (done === undefined) {
      this.waiting.set(record.id, record);
    } else {
      this.completed.delete(record.id);
      this.attach(record, done);
    }
  }

  /**
   * Attaches record's subtree to its parent (or makes it the root), then keeps
   * going upward while that completes a parent whose record is waiting.
   */
  private attach(record: FlatRecord<T>, subtree: TreeNode<T>): void {
    while (true) {
      const parentId = record.parentId;
      if (parentId === null) {
        this.root = subtree;
        return;
      }

      let partial = this.pending.get(parentId);
      if (partial === undefined) {
        partial = { left: null, right: null };
        this.pending.set(parentId, partial);
      }
      partial[record.side] = subtree;
      if (partial.left === null || partial.right === null) return;

      this.pending.delete(parentId);
      const parentNode = new InnerNode(partial.left, partial.right);
      const parentRecord = this.waiting.get(parentId);
      if (parentRecord === undefined) {
        // Available to attach once the parent's record arrives.
        this.completed.set(parentId, parentNode);
        return;
      }
      this.waiting.delete(parentId);
      record = parentRecord;
      subtree = parentNode;
    }
  }

  result(): TreeNode<T> {
    if (this.waiting.size !== 0) {
      throw new StructuralIntegrityError(
        `Records never connect to the root: ${[...this.waiting.keys()].join(
          ", "
        )}`
      );
    }
    if (this.root === null) {
      throw new StructuralIntegrityError("No root record was attached");
    }
    return this.root;
  }
}

/**
 * Checks the invariants that can be checked record-by-record, before any assembly:
 * ids, kinds, roots, and parent/side linkage.
 *
 * Cycles are left to rebuild, which detects them as records that never attach.
 */
function checkRecords<T>(records: readonly FlatRecord<T>[]) {
  if (records.length === 0) {
    throw new StructuralIntegrityError("Empty record list: no root");
  }

  // 1. Ids and kinds.
  const kinds = new Map<number, FlatRecord<T>["kind"]>();
  let rootId: number | null = null;
  for (const record of records) {
    const { id, kind } = record;
    if (!(Number.isSafeInteger(id) && id >= 0)) {
      throw new StructuralIntegrityError(`Invalid record id: ${id}`);
    }
    if (kinds.has(id)) {
      throw new StructuralIntegrityError(`Duplicate record id: ${id}`);
    }
    const hasPayload = record.payload !== null;
    if (hasPayload !== (kind === "leaf")) {
      throw new StructuralIntegrityError(
        `Record ${id} has kind ${kind} but ${hasPayload ? "a" : "no"} payload`
      );
    }
    kinds.set(id, kind);

    if (record.parentId === null) {
      if (rootId !== null) {
        throw new StructuralIntegrityError(
          `Multiple root records: ${rootId} and ${id}`
        );
      }
      rootId = id;
    }
  }
  if (rootId === null) {
    throw new StructuralIntegrityError(
      "No root record (every record has a parentId)"
    );
  }

  // 2. Parent/side linkage: each node gets exactly one child per side.
  const children = new Map<number, Record<Side, number | null>>();
  for (const record of records) {
    const { id, parentId, side } = record;
    if (parentId === null) continue;
    const parentKind = kinds.get(parentId);
    if (parentKind === undefined) {
      throw new StructuralIntegrityError(
        `Record ${id} references unknown parent ${parentId}`
      );
    }
    if (parentKind === "leaf") {
      throw new StructuralIntegrityError(
        `Record ${id} references leaf ${parentId} as its parent`
      );
    }
    if (side !== "left" && side !== "right") {
      throw new StructuralIntegrityError(
        `Record ${id} has invalid side: ${String(side)}`
      );
    }
    let sides = children.get(parentId);
    if (sides === undefined) {
      sides = { left: null, right: null };
      children.set(parentId, sides);
    }
    const existing = sides[side];
    if (existing !== null) {
      throw new StructuralIntegrityError(
        `Node ${parentId} has two ${side} children: ${existing} and ${id}`
      );
    }
    sides[side] = id;
  }

  for (const [id, kind] of kinds) {
    if (kind !== "node") continue;
    const sides = children.get(id);
    if (sides === undefined || sides.left === null) {
      throw new StructuralIntegrityError(
        `Node ${id} is missing its left child`
      );
    }
    if (sides.right === null) {
      throw new StructuralIntegrityError(
        `Node ${id} is missing its right child`
      );
    }
  }
}
