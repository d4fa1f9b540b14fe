import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { BenchmarkResult } from "./index.js";

export type BenchmarkOutput = BenchmarkResult & {
  implementation: string;
  workload: string;
  timestamp: string;
  env?: Record<string, unknown>;
  sourceFile?: string;
};

export function benchmarkOutput(
  result: BenchmarkResult,
  opts: { implementation: string; workload?: string; extra?: Record<string, unknown> }
): BenchmarkOutput {
  const mergedExtra =
    result.extra && opts.extra ? { ...result.extra, ...opts.extra } : (result.extra ?? opts.extra);
  return {
    implementation: opts.implementation,
    workload: opts.workload ?? result.name,
    timestamp: new Date().toISOString(),
    env: {
      node: process.version,
      platform: process.platform,
      arch: process.arch,
      cpu: os.cpus()[0]?.model,
      cores: os.cpus().length,
    },
    ...result,
    extra: mergedExtra,
  };
}

/**
 * Write one result as pretty JSON, creating parent directories. `sourceFile` is recorded
 * relative to the nearest `benchmarks` directory when there is one.
 */
export async function writeResult(
  result: BenchmarkResult,
  opts: {
    implementation: string;
    workload?: string;
    outFile: string;
    extra?: Record<string, unknown>;
  }
): Promise<BenchmarkOutput> {
  const abs = path.resolve(opts.outFile);
  const parts = abs.split(path.sep);
  const idx = parts.lastIndexOf("benchmarks");
  const payload: BenchmarkOutput = {
    ...benchmarkOutput(result, opts),
    sourceFile: idx === -1 ? abs : parts.slice(idx).join(path.sep),
  };
  await fs.mkdir(path.dirname(opts.outFile), { recursive: true });
  await fs.writeFile(opts.outFile, JSON.stringify(payload, null, 2), "utf-8");
  return payload;
}

export function dirnameFromImportMeta(importMetaUrl: string): string {
  return path.dirname(fileURLToPath(importMetaUrl));
}

export function repoRootFromImportMeta(importMetaUrl: string, levelsUp: number): string {
  if (!Number.isInteger(levelsUp) || levelsUp < 0) throw new Error(`invalid levelsUp: ${levelsUp}`);
  const dir = dirnameFromImportMeta(importMetaUrl);
  return path.resolve(dir, ...Array.from({ length: levelsUp }, () => ".."));
}
