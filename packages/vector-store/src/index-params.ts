import type { IndexParams } from "@ingestkit/types";

export interface HnswTuning {
  m: number;
  efConstruct: number;
  indexingThreshold: number;
}

function intParam(params: IndexParams, names: readonly string[], fallback: number): number {
  for (const name of names) {
    const value = params[name];
    if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  }
  return fallback;
}

/** Accepts both `ef_construct` and the `efconstruction` spelling. */
export function toHnswTuning(params: IndexParams): HnswTuning {
  return {
    m: intParam(params, ["m"], 16),
    efConstruct: intParam(params, ["ef_construct", "efconstruction"], 200),
    indexingThreshold: intParam(params, ["indexing_threshold"], 10_000),
  };
}
