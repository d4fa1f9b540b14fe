import { GenericTree, StringSink, type TreeNode } from "@ntree/core";

import { summarizeSamples, type BenchTiming } from "./samples.js";
import type { WorkloadName } from "./workloads.js";

export * from "./samples.js";
export * from "./workloads.js";
export { parseBenchCliArgs, type BenchCliArgs } from "./cli.js";

export type BenchTree = GenericTree<number>;

export type BenchmarkResult = {
  name: string;
  totalOps: number;
  durationMs: number;
  opsPerSec: number;
  extra?: Record<string, unknown>;
};

export type BenchmarkWorkload = {
  name: string;
  totalOps?: number;
  prepare?: (tree: BenchTree) => void;
  run: (tree: BenchTree) => void | { extra?: Record<string, unknown> };
  cleanup?: (tree: BenchTree) => void;
};

// Payloads are plain numbers, so skip structuredClone.
export function createBenchTree(opts: { debug?: boolean; log?: (line: string) => void } = {}): BenchTree {
  return new GenericTree<number>({ copy: (n) => n, debug: opts.debug, log: opts.log });
}

function opsPerSecond(totalOps: number, durationMs: number): number {
  return totalOps > 0 && durationMs > 0
    ? (totalOps / durationMs) * 1000
    : durationMs > 0
      ? 1000 / durationMs
      : Infinity;
}

export function runBenchmark(treeFactory: () => BenchTree, workload: BenchmarkWorkload): BenchmarkResult {
  const tree = treeFactory();
  const totalOps = workload.totalOps ?? -1;
  workload.prepare?.(tree);
  const start = performance.now();
  const runResult = workload.run(tree);
  const end = performance.now();
  if (workload.cleanup) {
    workload.cleanup(tree);
  } else {
    tree.clear();
  }

  const durationMs = end - start;
  return {
    name: workload.name,
    totalOps,
    durationMs,
    opsPerSec: opsPerSecond(totalOps, durationMs),
    extra: runResult && typeof runResult === "object" ? runResult.extra : undefined,
  };
}

/**
 * Run `workload` `warmupIterations + iterations` times and report the median measured run.
 * The rest of the sample summary goes under `extra`.
 */
export function runBenchmarkSamples(
  treeFactory: () => BenchTree,
  workload: BenchmarkWorkload,
  timing: BenchTiming
): BenchmarkResult {
  for (let i = 0; i < timing.warmupIterations; i++) runBenchmark(treeFactory, workload);

  const samples: number[] = [];
  let last: BenchmarkResult | undefined;
  for (let i = 0; i < timing.iterations; i++) {
    last = runBenchmark(treeFactory, workload);
    samples.push(last.durationMs);
  }
  if (!last) throw new Error(`no measured iterations for ${workload.name}`);

  const { medianMs, ...summary } = summarizeSamples(samples);
  return {
    ...last,
    durationMs: medianMs,
    opsPerSec: opsPerSecond(last.totalOps, medianMs),
    extra: {
      ...last.extra,
      ...summary,
      iterations: timing.iterations,
      warmupIterations: timing.warmupIterations,
    },
  };
}

// N children directly under the root: addChild throughput on one wide slot sequence.
export function makeBuildWideWorkload(opts: { count: number }): BenchmarkWorkload {
  return {
    name: `build-wide-${opts.count}`,
    totalOps: opts.count,
    run: (tree) => {
      const root = tree.createRoot(0);
      for (let i = 1; i <= opts.count; i++) root.addChild(i);
      return { extra: { nodeCount: tree.nodeCount() } };
    },
  };
}

// A single path N deep, then one deleteSubtree at the root. Height equals N.
export function makeBuildChainWorkload(opts: { count: number }): BenchmarkWorkload {
  return {
    name: `build-chain-${opts.count}`,
    totalOps: opts.count + 1,
    run: (tree) => {
      let cur: TreeNode<number> = tree.createRoot(0);
      for (let i = 1; i < opts.count; i++) cur = cur.addChild(i);
      tree.deleteSubtree(tree.getRoot());
      return { extra: { nodeCount: tree.nodeCount() } };
    },
  };
}

// Wide build, tombstone every other child, then compact.
export function makeDeleteCompactWorkload(opts: { count: number }): BenchmarkWorkload {
  const deletes = Math.ceil(opts.count / 2);
  return {
    name: `delete-compact-${opts.count}`,
    totalOps: opts.count + deletes + 1,
    run: (tree) => {
      const root = tree.createRoot(0);
      const children: TreeNode<number>[] = [];
      for (let i = 1; i <= opts.count; i++) children.push(root.addChild(i));
      for (let i = 0; i < children.length; i += 2) tree.deleteSubtree(children[i]);
      const slotsBefore = root.children.length;
      tree.compress();
      return { extra: { slotsBefore, slotsAfter: root.children.length, deletes } };
    },
  };
}

// Complete ternary tree of N nodes, filled breadth-first, printed once.
export function makeRenderWorkload(opts: { count: number }): BenchmarkWorkload {
  return {
    name: `render-${opts.count}`,
    totalOps: opts.count,
    run: (tree) => {
      const nodes: TreeNode<number>[] = [tree.createRoot(0)];
      for (let i = 1; i < opts.count; i++) {
        const parent = nodes[Math.floor((i - 1) / 3)];
        if (!parent) throw new Error(`no parent for node ${i}`);
        nodes.push(parent.addChild(i));
      }
      const lines = tree.print(new StringSink()).toString().split("\n").length - 1;
      return { extra: { lines } };
    },
  };
}

export function makeWorkload(name: WorkloadName, count: number): BenchmarkWorkload {
  if (name === "build-chain") return makeBuildChainWorkload({ count });
  if (name === "delete-compact") return makeDeleteCompactWorkload({ count });
  if (name === "render") return makeRenderWorkload({ count });
  return makeBuildWideWorkload({ count });
}

export function buildWorkloads(names: WorkloadName[], sizes: number[]): BenchmarkWorkload[] {
  const result: BenchmarkWorkload[] = [];
  for (const name of names) {
    for (const size of sizes) {
      result.push(makeWorkload(name, size));
    }
  }
  return result;
}

export function runWorkloads(
  treeFactory: () => BenchTree,
  workloads: BenchmarkWorkload[],
  timing?: BenchTiming
): BenchmarkResult[] {
  return workloads.map((workload) =>
    timing ? runBenchmarkSamples(treeFactory, workload, timing) : runBenchmark(treeFactory, workload)
  );
}
