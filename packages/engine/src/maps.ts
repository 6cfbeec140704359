import type { ResourceMap } from "@ledger/shared";

export const QTY_EPSILON = 1e-9;

export function nearlyZero(x: number): boolean {
  return Math.abs(x) <= QTY_EPSILON;
}

/** Snaps float noise around integers and zero back onto them. */
export function tidy(x: number): number {
  const r = Math.round(x);
  return Math.abs(x - r) <= QTY_EPSILON ? r : x;
}

export function scaleMap(map: ResourceMap, factor: number): ResourceMap {
  const out: ResourceMap = {};
  for (const [k, v] of Object.entries(map)) out[k] = v * factor;
  return out;
}

export function addInto(target: ResourceMap, map: ResourceMap, sign = 1): ResourceMap {
  for (const [k, v] of Object.entries(map)) target[k] = (target[k] ?? 0) + sign * v;
  return target;
}

/** Drops zero entries, keeps key order. */
export function compactMap(map: ResourceMap): ResourceMap {
  const out: ResourceMap = {};
  for (const [k, v] of Object.entries(map)) {
    if (!nearlyZero(v)) out[k] = tidy(v);
  }
  return out;
}
