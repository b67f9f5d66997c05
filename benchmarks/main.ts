import { flattenRebuild } from "./flatten_rebuild";

void (async function () {
  console.log("# Benchmark Results");
  console.log(
    "Output of\n```bash\nnpm run benchmarks -s > benchmark_results.md\n```"
  );
  console.log(
    "Each benchmark partitions 1,000,000 random UUID strings, then measures building, flattening, saving (JSON, with optional GZIP), loading and rebuilding.\n"
  );

  for (const maxElems of [1, 8, 64]) {
    await flattenRebuild(maxElems);
  }
})();
