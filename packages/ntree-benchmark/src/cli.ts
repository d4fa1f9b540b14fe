import { Command, InvalidArgumentError, Option } from "commander";

import type { BenchTiming } from "./samples.js";
import { DEFAULT_BENCH_SIZES, WORKLOAD_NAMES, isWorkloadName, type WorkloadName } from "./workloads.js";

export type BenchCliArgs = {
  sizes: number[];
  workloads: WorkloadName[];
  timing: BenchTiming;
  /** One `<workload>-<size>.json` per run lands here. */
  outDir?: string;
  debug: boolean;
};

function integerAtLeast(flag: string, min: number): (raw: string) => number {
  return (raw) => {
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min) {
      throw new InvalidArgumentError(`${flag} expects an integer >= ${min}, got: ${raw}`);
    }
    return n;
  };
}

const nodeCount = integerAtLeast("--sizes", 1);

function collectSizes(raw: string, previous: number[] | undefined): number[] {
  return [...(previous ?? []), nodeCount(raw)];
}

export function parseBenchCliArgs(
  opts: {
    argv?: string[];
    defaultSizes?: readonly number[];
  } = {},
): BenchCliArgs {
  const argv = opts.argv ?? process.argv.slice(2);
  const defaultSizes = Array.from(opts.defaultSizes ?? DEFAULT_BENCH_SIZES);

  const program = new Command()
    .name("ntree-bench")
    .description("Time tree construction, deletion, compaction and rendering.")
    .exitOverride()
    .addOption(
      new Option("--workloads <names...>", "workloads to run (default: all)").choices(WORKLOAD_NAMES),
    )
    .addOption(
      new Option("--sizes <nodes...>", `node counts per workload (default: ${defaultSizes.join(" ")})`).argParser(
        collectSizes,
      ),
    )
    .option("--iterations <n>", "measured runs per workload and size", integerAtLeast("--iterations", 1), 1)
    .option("--warmup <n>", "unmeasured runs first (default: 1 when --iterations > 1)", integerAtLeast("--warmup", 0))
    .option("--out-dir <dir>", "write one JSON result per workload and size into this directory")
    .option("--debug", "trace node exploration and deletion", false);

  program.parse(argv, { from: "user" });

  const parsed = program.opts<{
    workloads?: string[];
    sizes?: number[];
    iterations: number;
    warmup?: number;
    outDir?: string;
    debug: boolean;
  }>();

  const workloads = parsed.workloads ? Array.from(new Set(parsed.workloads.filter(isWorkloadName))) : [];
  const sizes = parsed.sizes ? Array.from(new Set(parsed.sizes)) : [];

  return {
    workloads: workloads.length > 0 ? workloads : [...WORKLOAD_NAMES],
    sizes: sizes.length > 0 ? sizes : defaultSizes,
    timing: {
      iterations: parsed.iterations,
      warmupIterations: parsed.warmup ?? (parsed.iterations > 1 ? 1 : 0),
    },
    outDir: parsed.outDir && parsed.outDir.length > 0 ? parsed.outDir : undefined,
    debug: parsed.debug,
  };
}
