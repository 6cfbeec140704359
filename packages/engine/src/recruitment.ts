import type { ResourceMap, UnitTemplate } from "@ledger/shared";
import type { NationRow } from "./state";

export type RecruitCost = {
  manpower: number;
  cash: number;
  resources: ResourceMap;
};

/** Linear in quantity; cash and resources round to whole units. */
export function estimateRecruitCost(template: UnitTemplate, quantity: number): RecruitCost {
  const resources: ResourceMap = {};
  for (const [resource, perUnit] of Object.entries(template.resources)) {
    const total = Math.round(perUnit * quantity);
    if (total > 0) resources[resource] = total;
  }
  return {
    manpower: template.manpower_cost * quantity,
    cash: Math.round(template.cash_cost * quantity),
    resources
  };
}

export type ManpowerPool = {
  population: number;
  ratio: number;
  used_by_buildings: number;
  committed_recruits: number;
};

/** floor(population × ratio) less what buildings and recruits already hold; never below 0. */
export function recruitableManpower(pool: ManpowerPool): number {
  const raw = Math.floor(pool.population * pool.ratio) - pool.used_by_buildings - pool.committed_recruits;
  return Math.max(0, raw);
}

/** An empty allow-list admits everyone; otherwise affiliation or a tag must match. */
export function classificationAllows(template: Pick<UnitTemplate, "allowed_affiliations">, nation: Pick<NationRow, "affiliation" | "tags">): boolean {
  if (template.allowed_affiliations.length === 0) return true;
  const allowed = new Set(template.allowed_affiliations.map((a) => a.toLowerCase()));
  if (nation.affiliation && allowed.has(nation.affiliation.toLowerCase())) return true;
  return nation.tags.some((t) => allowed.has(t.toLowerCase()));
}
