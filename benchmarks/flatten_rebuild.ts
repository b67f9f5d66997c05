import { assert } from "chai";
import { v4 as uuidv4 } from "uuid";
import {
  buildTree,
  equalsTree,
  flatten,
  FlatRecord,
  loadRecords,
  PartitionTree,
  rebuild,
  SavedPartitionTree,
  saveRecords,
  TreeNode,
  treeStats,
} from "../src";
import {
  avg,
  getMemUsed,
  gunzipString,
  gzipString,
  msSince,
  sleep,
} from "./internal/util";

const NUM_ELEMENTS = 1000000;

export async function flattenRebuild(maxElems: number) {
  console.log(`\n## Flatten / Rebuild, maxElems = ${maxElems}\n`);

  const elements: string[] = [];
  for (let i = 0; i < NUM_ELEMENTS; i++) elements.push(uuidv4());

  let startTime = process.hrtime.bigint();
  const built = buildTree(elements, maxElems);
  console.log("- Recursive build time (ms):", msSince(startTime));

  const stats = treeStats(built);
  console.log(
    `- Tree: ${stats.nodeCount} nodes, ${stats.leafCount} leaves, depth ${stats.depth}`
  );
  const leafSizes = [...PartitionTree.fromRoot(built).leaves()].map(
    (leaf) => leaf.elements.length
  );
  console.log("- Avg leaf size (elements):", avg(leafSizes).toFixed(2));

  startTime = process.hrtime.bigint();
  const records = flatten(elements, maxElems);
  console.log("- Flatten time (ms):", msSince(startTime));

  startTime = process.hrtime.bigint();
  const rebuilt = rebuild(records);
  console.log("- Rebuild time (ms):", msSince(startTime));
  assert.isTrue(equalsTree(rebuilt, built));

  saveLoad(records, built, false);
  saveLoad(records, built, true);

  await treeMemory(records);
}

function saveLoad(
  records: FlatRecord<string>[],
  expected: TreeNode<string>,
  gzip: boolean
) {
  // Save.
  let startTime = process.hrtime.bigint();
  const savedStateObj = saveRecords(records);
  const savedState = gzip
    ? gzipString(JSON.stringify(savedStateObj))
    : JSON.stringify(savedStateObj);

  console.log(`- Save time ${gzip ? "GZIP'd " : ""}(ms):`, msSince(startTime));
  console.log(
    `- Save size ${gzip ? "GZIP'd " : ""}(bytes):`,
    savedState.length
  );

  // Load the saved state.
  startTime = process.hrtime.bigint();
  const toLoadStr =
    typeof savedState === "string" ? savedState : gunzipString(savedState);
  const toLoadObj: SavedPartitionTree<string> = JSON.parse(toLoadStr);
  const loaded = rebuild(loadRecords(toLoadObj));

  console.log(`- Load time ${gzip ? "GZIP'd " : ""}(ms):`, msSince(startTime));
  assert.isTrue(equalsTree(loaded, expected));
}

/**
 * Estimates the heap retained by a tree rebuilt from records: its nodes and leaf
 * arrays, but not the elements, which the records already hold.
 */
async function treeMemory(records: FlatRecord<string>[]) {
  await sleep(1000);
  const before = getMemUsed();
  const tree = PartitionTree.fromRecords(records);
  const retained = getMemUsed() - before;

  console.log(
    `- Rebuilt tree mem estimate (MB, ${tree.leafCount} leaves):`,
    (retained / 1000000).toFixed(1)
  );
  console.log("- Bytes per leaf:", (retained / tree.leafCount).toFixed(1));
}
