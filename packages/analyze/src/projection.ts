import type { ClassCounts, SizeClass } from "../../schema/src/schema.js";

export type WaitEstimate = {
  // whole quarters; Infinity when nothing of this class is being cleared
  quarters: number;
  years: number;
};

export type WaitProjection = Record<SizeClass, WaitEstimate>;

// A partial quarter still costs a full quarter.
export function estimateWait(depth: number, ratePerQuarter: number): WaitEstimate {
  const quarters = ratePerQuarter > 0 ? Math.ceil(depth / ratePerQuarter) : Number.POSITIVE_INFINITY;
  return { quarters, years: quarters / 4 };
}

export function projectWaitTimes(depthByClass: ClassCounts, ratesByClass: ClassCounts): WaitProjection {
  const at = (cls: SizeClass): WaitEstimate =>
    estimateWait(depthByClass[String(cls)] ?? 0, ratesByClass[String(cls)] ?? 0);

  return { 22: at(22), 23: at(23), 24: at(24) };
}
