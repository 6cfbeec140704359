import { QTY_EPSILON } from "./maps";
import type { ProvinceId, ProvinceRow, StateId, StockpileEntry } from "./state";

type Ranked = Pick<ProvinceRow, "province_id" | "node_strength">;

/** node_strength descending, then province id ascending. */
export function compareProvinces(a: Ranked, b: Ranked): number {
  if (a.node_strength !== b.node_strength) return b.node_strength - a.node_strength;
  if (a.province_id === b.province_id) return 0;
  return a.province_id < b.province_id ? -1 : 1;
}

export function rankProvinces<T extends Ranked>(provinces: T[]): T[] {
  return [...provinces].sort(compareProvinces);
}

/** The requesting state's provinces first, then the rest of the nation, each ranked. */
export function stateFirstOrder<T extends Ranked & { state_id: StateId }>(provinces: T[], stateId: StateId): T[] {
  const inState = provinces.filter((p) => p.state_id === stateId);
  const rest = provinces.filter((p) => p.state_id !== stateId);
  return [...rankProvinces(inState), ...rankProvinces(rest)];
}

export function availableOf(entry: Pick<StockpileEntry, "amount"> | null, reserved: number): number {
  if (!entry) return 0;
  return Math.max(0, entry.amount - reserved);
}

/** Room left under the capacity ceiling; Infinity for uncapped rows. */
export function headroom(entry: Pick<StockpileEntry, "amount" | "capacity">): number {
  if (entry.capacity === null) return Number.POSITIVE_INFINITY;
  return Math.max(0, entry.capacity - entry.amount);
}

export type DrawSource = { province_id: ProvinceId; available: number };
export type DrawPlan = {
  draws: Array<{ province_id: ProvinceId; amount: number }>;
  shortfall: number;
};

/** Greedily takes `amount` from the sources in the order given. */
export function planDraw(sources: DrawSource[], amount: number): DrawPlan {
  const draws: DrawPlan["draws"] = [];
  let remaining = amount;
  for (const s of sources) {
    if (remaining <= QTY_EPSILON) break;
    if (s.available <= QTY_EPSILON) continue;
    const take = Math.min(s.available, remaining);
    draws.push({ province_id: s.province_id, amount: take });
    remaining -= take;
  }
  return { draws, shortfall: remaining > QTY_EPSILON ? remaining : 0 };
}
