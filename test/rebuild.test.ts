import { expect } from "chai";
import seedrandom from "seedrandom";
import {
  buildTree,
  elementsOf,
  equalsTree,
  FlatRecord,
  flatten,
  flattenTree,
  InnerNode,
  Leaf,
  rebuild,
  StructuralIntegrityError,
  TreeNode,
  treeStats,
} from "../src";

describe("rebuild", () => {
  let prng!: seedrandom.PRNG;

  beforeEach(() => {
    prng = seedrandom("42");
  });

  const range = (start: number, end: number) =>
    Array.from({ length: end - start }, (_, i) => start + i);

  function shuffle<U>(arr: U[]): U[] {
    const ans = arr.slice();
    for (let i = ans.length - 1; i > 0; i--) {
      const j = Math.floor(prng() * (i + 1));
      [ans[i], ans[j]] = [ans[j], ans[i]];
    }
    return ans;
  }

  /**
   * flatten([1, 2, 3], 1):
   * node 0 -> (leaf 1 [1], node 2 -> (leaf 3 [2], leaf 4 [3])).
   */
  function smallRecords(): FlatRecord<number>[] {
    return [
      { id: 0, kind: "node", side: "left", parentId: null, payload: null },
      { id: 1, kind: "leaf", side: "left", parentId: 0, payload: [1] },
      { id: 2, kind: "node", side: "right", parentId: 0, payload: null },
      { id: 3, kind: "leaf", side: "left", parentId: 2, payload: [2] },
      { id: 4, kind: "leaf", side: "right", parentId: 2, payload: [3] },
    ];
  }

  /**
   * Round-trips through JSON, the way records arrive from storage, so tests can
   * describe records that the FlatRecord type rules out.
   */
  function fromJson(records: object[]): FlatRecord<number>[] {
    const parsed: FlatRecord<number>[] = JSON.parse(JSON.stringify(records));
    return parsed;
  }

  describe("round trip", () => {
    it("should rebuild the tree of eleven elements with maxElems = 2", () => {
      const elements = range(1, 12);
      const rebuilt = rebuild(flatten(elements, 2));
      expect(equalsTree(rebuilt, buildTree(elements, 2))).to.be.true;
      expect([...elementsOf(rebuilt)]).to.deep.equal(elements);
      expect(treeStats(rebuilt)).to.deep.equal({
        nodeCount: 13,
        leafCount: 7,
        depth: 3,
        elementCount: 11,
      });
    });

    it("should match the small hand-written records", () => {
      expect(flatten([1, 2, 3], 1)).to.deep.equal(smallRecords());
      const rebuilt = rebuild(smallRecords());
      expect(
        equalsTree(
          rebuilt,
          new InnerNode(
            new Leaf([1]),
            new InnerNode(new Leaf([2]), new Leaf([3]))
          )
        )
      ).to.be.true;
    });

    it("should return a lone root leaf directly", () => {
      const rebuilt = rebuild(flatten(["x", "y"], 2));
      expect(rebuilt).to.be.instanceOf(Leaf);
      expect([...elementsOf(rebuilt)]).to.deep.equal(["x", "y"]);
    });

    it("should rebuild an empty leaf", () => {
      const rebuilt = rebuild(flatten([], 4));
      expect(rebuilt).to.be.instanceOf(Leaf);
      expect([...elementsOf(rebuilt)]).to.deep.equal([]);
    });

    it("should ignore the root's side", () => {
      const records = smallRecords();
      records[0] = { ...records[0], side: "right" };
      expect(equalsTree(rebuild(records), buildTree([1, 2, 3], 1))).to.be.true;
    });

    it("should not modify its input", () => {
      const records = flatten(range(0, 20), 3);
      const copy = JSON.parse(JSON.stringify(records));
      rebuild(records);
      expect(records).to.deep.equal(copy);
    });

    it("should not alias the records' payload arrays", () => {
      const records = smallRecords();
      const payload = [1];
      records[1] = { id: 1, kind: "leaf", side: "left", parentId: 0, payload };
      const rebuilt = rebuild(records);
      payload.push(99, 100);
      expect([...elementsOf(rebuilt)]).to.deep.equal([1, 2, 3]);
    });

    it("should rebuild a very deep tree without recursion", () => {
      const depth = 50000;
      let root: TreeNode<number> = new Leaf([0]);
      for (let i = 1; i <= depth; i++) {
        root = new InnerNode(root, new Leaf([i]));
      }
      const rebuilt = rebuild(flattenTree(root));
      expect(equalsTree(rebuilt, root)).to.be.true;
      expect(treeStats(rebuilt).depth).to.equal(depth);
    });

    it("should rebuild a very deep tree from records in emission order", () => {
      const depth = 50000;
      let root: TreeNode<number> = new Leaf([0]);
      for (let i = 1; i <= depth; i++) {
        root = new InnerNode(root, new Leaf([i]));
      }
      // Every node record is scanned before its children here.
      const rebuilt = rebuild(flattenTree(root).reverse());
      expect(equalsTree(rebuilt, root)).to.be.true;
      expect(treeStats(rebuilt).depth).to.equal(depth);
    });
  });

  describe("record order", () => {
    it("should accept records in emission order", () => {
      const elements = range(0, 50);
      const records = flatten(elements, 3);
      // Reversed, so that the rebuilder's backwards scan sees emission order.
      const rebuilt = rebuild(records.slice().reverse());
      expect(equalsTree(rebuilt, buildTree(elements, 3))).to.be.true;
    });

    it("should accept records in any order", () => {
      for (let trial = 0; trial < 20; trial++) {
        const elements = range(0, Math.floor(prng() * 60));
        const maxElems = 1 + Math.floor(prng() * 4);
        const records = shuffle(flatten(elements, maxElems));
        expect(equalsTree(rebuild(records), buildTree(elements, maxElems))).to
          .be.true;
      }
    });

    it("should accept ids that do not follow the flatten numbering", () => {
      const records: FlatRecord<string>[] = [
        { id: 3, kind: "leaf", side: "right", parentId: 10, payload: ["c"] },
        { id: 10, kind: "node", side: "left", parentId: null, payload: null },
        { id: 7, kind: "node", side: "left", parentId: 10, payload: null },
        { id: 42, kind: "leaf", side: "right", parentId: 7, payload: ["b"] },
        { id: 0, kind: "leaf", side: "left", parentId: 7, payload: ["a"] },
      ];
      expect(
        equalsTree(
          rebuild(records),
          new InnerNode(
            new InnerNode(new Leaf(["a"]), new Leaf(["b"])),
            new Leaf(["c"])
          )
        )
      ).to.be.true;
    });
  });

  describe("malformed input", () => {
    it("should reject an empty list", () => {
      expect(() => rebuild([])).to.throw(
        StructuralIntegrityError,
        "Empty record list: no root"
      );
    });

    it("should reject duplicate ids", () => {
      const records = smallRecords();
      records[4] = { ...records[4], id: 3 };
      expect(() => rebuild(records)).to.throw(
        StructuralIntegrityError,
        "Duplicate record id: 3"
      );
    });

    it("should reject invalid ids", () => {
      const records = smallRecords();
      records[1] = { ...records[1], id: -1 };
      expect(() => rebuild(records)).to.throw(
        StructuralIntegrityError,
        "Invalid record id: -1"
      );
    });

    it("should reject a node record with a payload", () => {
      const raw = smallRecords().map((record): object => record);
      raw[2] = { ...smallRecords()[2], payload: [7] };
      expect(() => rebuild(fromJson(raw))).to.throw(
        StructuralIntegrityError,
        "Record 2 has kind node but a payload"
      );
    });

    it("should reject a leaf record without a payload", () => {
      const raw = smallRecords().map((record): object => record);
      raw[3] = { ...smallRecords()[3], payload: null };
      expect(() => rebuild(fromJson(raw))).to.throw(
        StructuralIntegrityError,
        "Record 3 has kind leaf but no payload"
      );
    });

    it("should reject an invalid side", () => {
      const raw = smallRecords().map((record): object => record);
      raw[3] = { ...smallRecords()[3], side: "up" };
      expect(() => rebuild(fromJson(raw))).to.throw(
        StructuralIntegrityError,
        "Record 3 has invalid side: up"
      );
    });

    it("should reject multiple roots", () => {
      const records = smallRecords();
      records.push({
        id: 5,
        kind: "leaf",
        side: "left",
        parentId: null,
        payload: [9],
      });
      expect(() => rebuild(records)).to.throw(
        StructuralIntegrityError,
        "Multiple root records: 0 and 5"
      );
    });

    it("should reject a list without a root", () => {
      expect(() => rebuild(smallRecords().slice(1))).to.throw(
        StructuralIntegrityError,
        "No root record"
      );
    });

    it("should reject a missing sibling", () => {
      expect(() => rebuild(smallRecords().slice(0, 4))).to.throw(
        StructuralIntegrityError,
        "Node 2 is missing its right child"
      );
    });

    it("should reject a node without children", () => {
      const records = smallRecords().slice(0, 3);
      expect(() => rebuild(records)).to.throw(
        StructuralIntegrityError,
        "Node 2 is missing its left child"
      );
    });

    it("should reject an unknown parent", () => {
      const records = smallRecords();
      records[3] = { ...records[3], parentId: 7 };
      expect(() => rebuild(records)).to.throw(
        StructuralIntegrityError,
        "Record 3 references unknown parent 7"
      );
    });

    it("should reject a leaf parent", () => {
      const records = smallRecords();
      records[3] = { ...records[3], parentId: 1 };
      expect(() => rebuild(records)).to.throw(
        StructuralIntegrityError,
        "Record 3 references leaf 1 as its parent"
      );
    });

    it("should reject two children on the same side", () => {
      const records = smallRecords();
      records[4] = { ...records[4], side: "left" };
      expect(() => rebuild(records)).to.throw(
        StructuralIntegrityError,
        "Node 2 has two left children: 3 and 4"
      );
    });

    it("should reject records that never connect to the root", () => {
      const records: FlatRecord<number>[] = [
        { id: 0, kind: "leaf", side: "left", parentId: null, payload: [0] },
        { id: 1, kind: "node", side: "left", parentId: 2, payload: null },
        { id: 2, kind: "node", side: "left", parentId: 1, payload: null },
        { id: 3, kind: "leaf", side: "right", parentId: 1, payload: [1] },
        { id: 4, kind: "leaf", side: "right", parentId: 2, payload: [2] },
      ];
      expect(() => rebuild(records)).to.throw(
        StructuralIntegrityError,
        "Records never connect to the root: 2, 1"
      );
    });
  });
});
