import { StructuralIntegrityError } from "./errors";
import { FlatRecord, NodeKind, Side } from "./flat_record";

/**
 * JSON encoding of one {@link FlatRecord}, as a fixed-field tuple:
 * `[id, kind, side, parentId, payload]`.
 *
 * `payload` is the leaf's elements for `"leaf"` records and null for `"node"` records.
 */
export type SavedRecord<T> = readonly [
  id: number,
  kind: NodeKind,
  side: Side,
  parentId: number | null,
  payload: readonly T[] | null
];

/**
 * JSON saved state for a partition tree: its FlatRecords, in emission order.
 *
 * Elements are stored as-is, so they must be JSON-safe themselves if you
 * pass the saved state through `JSON.stringify`.
 */
export type SavedPartitionTree<T> = SavedRecord<T>[];

/**
 * Encodes records as a {@link SavedPartitionTree}, preserving their order.
 */
export function saveRecords<T>(
  records: readonly FlatRecord<T>[]
): SavedPartitionTree<T> {
  return records.map((record): SavedRecord<T> => [
    record.id,
    record.kind,
    record.side,
    record.parentId,
    record.payload,
  ]);
}

/**
 * Decodes a {@link SavedPartitionTree}, checking the shape of each tuple.
 *
 * Only per-record shape is checked here; pass the result to {@link rebuild}
 * to check the tree structure.
 *
 * @throws StructuralIntegrityError If a tuple is malformed.
 */
export function loadRecords<T>(
  savedState: SavedPartitionTree<T>
): FlatRecord<T>[] {
  if (!Array.isArray(savedState)) {
    throw new StructuralIntegrityError("Saved state is not an array");
  }

  const records: FlatRecord<T>[] = [];
  for (let i = 0; i < savedState.length; i++) {
    const item: unknown = savedState[i];
    if (!(Array.isArray(item) && item.length === 5)) {
      throw new StructuralIntegrityError(
        `Saved record ${i} is not a 5-field tuple`
      );
    }
    const [id, kind, side, parentId, payload] = savedState[i];

    if (typeof id !== "number") {
      throw new StructuralIntegrityError(`Saved record ${i} has invalid id`);
    }
    if (side !== "left" && side !== "right") {
      throw new StructuralIntegrityError(
        `Saved record ${i} has invalid side: ${String(side)}`
      );
    }
    if (!(parentId === null || typeof parentId === "number")) {
      throw new StructuralIntegrityError(
        `Saved record ${i} has invalid parentId`
      );
    }

    if (kind === "leaf") {
      if (!Array.isArray(payload)) {
        throw new StructuralIntegrityError(
          `Saved record ${i} is a leaf without a payload`
        );
      }
      records.push({ id, kind, side, parentId, payload });
    } else if (kind === "node") {
      if (payload !== null) {
        throw new StructuralIntegrityError(
          `Saved record ${i} is a node with a payload`
        );
      }
      records.push({ id, kind, side, parentId, payload });
    } else {
      throw new StructuralIntegrityError(
        `Saved record ${i} has invalid kind: ${String(kind)}`
      );
    }
  }
  return records;
}
