import type { EconomyRules, ResourceMap, TransportMode } from "@ledger/shared";
import type { ProvinceRow } from "./state";

export type TransportQuote = {
  weight_kg: number;
  distance_km: number;
  mode: TransportMode;
  cost: number;
};

/** Unknown goods weigh 1 kg per unit. */
export function shipmentWeight(
  offered: ResourceMap,
  requested: ResourceMap,
  weightOf: (resource: string) => number | undefined
): number {
  let total = 0;
  for (const map of [offered, requested]) {
    for (const [resource, qty] of Object.entries(map)) {
      total += (weightOf(resource) ?? 1) * qty;
    }
  }
  return total;
}

/** Straight-line distance between two hub provinces; 0 when either side has none. */
export function hubDistance(a: Pick<ProvinceRow, "x" | "y"> | null, b: Pick<ProvinceRow, "x" | "y"> | null): number {
  if (!a || !b) return 0;
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function computeTransportCost(
  weightKg: number,
  distanceKm: number,
  mode: TransportMode,
  rules: Pick<EconomyRules, "transport_base_rate_per_kg_km" | "mode_factors">
): TransportQuote {
  const factor = rules.mode_factors[mode] ?? 1;
  return {
    weight_kg: weightKg,
    distance_km: distanceKm,
    mode,
    cost: weightKg * distanceKm * rules.transport_base_rate_per_kg_km * factor
  };
}
