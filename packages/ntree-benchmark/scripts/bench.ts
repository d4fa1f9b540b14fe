import path from "node:path";

import { CommanderError } from "commander";

import { buildWorkloads, createBenchTree, parseBenchCliArgs, runBenchmarkSamples } from "../src/index.js";
import { repoRootFromImportMeta, writeResult } from "../src/node.js";

async function main(): Promise<void> {
  const args = parseBenchCliArgs();
  const outDir = args.outDir ?? path.join(repoRootFromImportMeta(import.meta.url, 3), "benchmarks", "ntree-ts");

  for (const workload of buildWorkloads(args.workloads, args.sizes)) {
    const result = runBenchmarkSamples(() => createBenchTree({ debug: args.debug }), workload, args.timing);
    const outFile = path.join(outDir, `${workload.name}.json`);
    const payload = await writeResult(result, { implementation: "ntree-ts", outFile });
    console.log(JSON.stringify(payload));
  }
}

main().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error(err);
  process.exitCode = 1;
});
