export const WORKLOAD_NAMES = ["build-wide", "build-chain", "delete-compact", "render"] as const;
export type WorkloadName = (typeof WORKLOAD_NAMES)[number];

export const DEFAULT_BENCH_SIZES = [100, 1000, 10000] as const;

export function isWorkloadName(value: string): value is WorkloadName {
  return WORKLOAD_NAMES.some((name) => name === value);
}
