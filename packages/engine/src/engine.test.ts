import { describe, it, expect } from "vitest";
import type { BuildingTemplate, UnitTemplate } from "@ledger/shared";
import { computeFinalModifiers } from "./modifiers";
import { planDraw, rankProvinces, stateFirstOrder, availableOf, headroom } from "./allocation";
import { computeTransportCost, hubDistance, shipmentWeight } from "./transport";
import { maintenanceDue, projectFlows, settleMaintenance } from "./production";
import { classificationAllows, estimateRecruitCost, recruitableManpower } from "./recruitment";
import { compactMap, tidy } from "./maps";
import type { InstalledBuilding, Modifier } from "./state";

function mkModifier(over: Partial<Modifier>): Modifier {
  return {
    modifier_id: 1,
    scope: "global",
    scope_id: null,
    effect: "production",
    kind: "add",
    value: 0,
    source: "test",
    created_turn: 0,
    expires_turn: null,
    active: true,
    ...over
  };
}

const mill: BuildingTemplate = {
  building_id: "mill",
  name: "Mill",
  build_cost: { Wood: 10 },
  cash_cost: 0,
  build_time_turns: 1,
  max_tier: 3,
  inputs: { Grain: 2 },
  outputs: { Flour: 3 },
  maintenance_cash: 5,
  maintenance_manpower: 10
};

describe("modifier aggregation", () => {
  it("adds first, then multiplies", () => {
    const mods = [
      mkModifier({ modifier_id: 1, kind: "add", value: 0.1 }),
      mkModifier({ modifier_id: 2, scope: "nation", scope_id: "A", kind: "mul", value: 0.9 })
    ];
    const out = computeFinalModifiers(mods, { nation_id: "A", current_turn: 1 });
    expect(out.production.add_sum).toBeCloseTo(0.1, 12);
    expect(out.production.mul_product).toBe(0.9);
    expect(out.production.final).toBeCloseTo(0.99, 12);
    expect(out.tax).toEqual({ add_sum: 0, mul_product: 1, final: 1 });
  });

  it("applies effect=all to every effect and skips other nations, provinces and expired rows", () => {
    const mods = [
      mkModifier({ modifier_id: 1, effect: "all", kind: "mul", value: 2 }),
      mkModifier({ modifier_id: 2, scope: "nation", scope_id: "B", kind: "add", value: 5 }),
      mkModifier({ modifier_id: 3, scope: "province", scope_id: "p1", kind: "add", value: 5 }),
      mkModifier({ modifier_id: 4, effect: "tax", kind: "add", value: 1, expires_turn: 3 }),
      mkModifier({ modifier_id: 5, effect: "tax", kind: "add", value: 1, active: false }),
      mkModifier({ modifier_id: 6, scope: "state", scope_id: "s1", effect: "population", kind: "add", value: 0.5 })
    ];
    const out = computeFinalModifiers(mods, { nation_id: "A", state_id: "s1", current_turn: 4 });
    expect(out.production.final).toBe(2);
    expect(out.tax.final).toBe(2);
    expect(out.population.final).toBe(3);

    const atExpiry = computeFinalModifiers(mods, { nation_id: "A", current_turn: 3 });
    expect(atExpiry.tax.final).toBe(4);
    expect(atExpiry.population.final).toBe(2);
  });

  it("never goes below zero", () => {
    const out = computeFinalModifiers([mkModifier({ value: -3 })], { nation_id: "A", current_turn: 0 });
    expect(out.production.final).toBe(0);
  });
});

describe("allocation", () => {
  const provinces = [
    { province_id: "p3", state_id: "s2", node_strength: 9 },
    { province_id: "p2", state_id: "s1", node_strength: 5 },
    { province_id: "p1", state_id: "s1", node_strength: 5 },
    { province_id: "p4", state_id: "s1", node_strength: 7 }
  ];

  it("ranks by node_strength then id", () => {
    expect(rankProvinces(provinces).map((p) => p.province_id)).toEqual(["p3", "p4", "p1", "p2"]);
  });

  it("drains the requesting state before the rest of the nation", () => {
    expect(stateFirstOrder(provinces, "s1").map((p) => p.province_id)).toEqual(["p4", "p1", "p2", "p3"]);
  });

  it("plans a greedy draw and reports the shortfall", () => {
    const plan = planDraw(
      [
        { province_id: "a", available: 120 },
        { province_id: "b", available: 0 },
        { province_id: "c", available: 50 }
      ],
      200
    );
    expect(plan.draws).toEqual([
      { province_id: "a", amount: 120 },
      { province_id: "c", amount: 50 }
    ]);
    expect(plan.shortfall).toBe(30);
  });

  it("stops drawing once satisfied", () => {
    const plan = planDraw([{ province_id: "a", available: 10 }, { province_id: "b", available: 10 }], 4);
    expect(plan).toEqual({ draws: [{ province_id: "a", amount: 4 }], shortfall: 0 });
  });

  it("computes available and headroom", () => {
    expect(availableOf({ amount: 100 }, 60)).toBe(40);
    expect(availableOf({ amount: 10 }, 60)).toBe(0);
    expect(availableOf(null, 0)).toBe(0);
    expect(headroom({ amount: 30, capacity: 100 })).toBe(70);
    expect(headroom({ amount: 30, capacity: null })).toBe(Number.POSITIVE_INFINITY);
    expect(headroom({ amount: 0, capacity: 0 })).toBe(0);
  });
});

describe("transport", () => {
  it("weighs both legs, defaulting to 1 kg per unit", () => {
    const weights: Record<string, number> = { Steel: 2 };
    expect(shipmentWeight({ Steel: 10 }, { Food: 5 }, (r) => weights[r])).toBe(25);
  });

  it("prices weight × distance × rate × mode factor", () => {
    const rules = {
      transport_base_rate_per_kg_km: 0.00008,
      mode_factors: { land: 1, rail: 0.7, sea: 0.4, auto: 1 }
    };
    const d = hubDistance({ x: 0, y: 0 }, { x: 300, y: 400 });
    expect(d).toBe(500);
    expect(computeTransportCost(1000, d, "land", rules).cost).toBeCloseTo(40, 9);
    expect(computeTransportCost(1000, d, "sea", rules).cost).toBeCloseTo(16, 9);
    expect(hubDistance(null, { x: 1, y: 1 })).toBe(0);
  });
});

describe("production", () => {
  const installed: InstalledBuilding[] = [
    { province_id: "p1", building_id: "mill", tier: 2, count: 3 },
    { province_id: "p1", building_id: "gone", tier: 1, count: 1 }
  ];
  const lookup = (id: string) => (id === "mill" ? mill : undefined);

  it("projects flows with tier × count", () => {
    const flows = projectFlows(installed, lookup, 0.5);
    expect(flows.produced).toEqual({ Flour: 9 });
    expect(flows.consumed).toEqual({ Grain: 12 });
    expect(flows.net).toEqual({ Flour: 9, Grain: -12 });
  });

  it("charges maintenance per building", () => {
    expect(maintenanceDue(installed, lookup)).toEqual({ cash: 15, manpower: 30 });
  });

  it("pushes unpaid maintenance onto the debt", () => {
    expect(settleMaintenance(100, 0, 40)).toEqual({ cash: 60, debt: 0, paid: 40, shortfall: 0 });
    expect(settleMaintenance(25, 10, 40)).toEqual({ cash: 0, debt: 25, paid: 25, shortfall: 15 });
    expect(settleMaintenance(-5, 0, 10)).toEqual({ cash: -5, debt: 10, paid: 0, shortfall: 10 });
  });
});

describe("recruitment math", () => {
  const rifles: UnitTemplate = {
    unit_template_id: "rifles",
    name: "Rifles",
    category: "land",
    manpower_cost: 100,
    cash_cost: 12.5,
    resources: { Arms: 1.5, Food: 0 },
    training_turns: 1,
    allowed_affiliations: ["Coalition"]
  };

  it("scales linearly with rounding", () => {
    expect(estimateRecruitCost(rifles, 3)).toEqual({ manpower: 300, cash: 38, resources: { Arms: 5 } });
  });

  it("computes the recruitable pool", () => {
    expect(recruitableManpower({ population: 10_001, ratio: 0.4, used_by_buildings: 500, committed_recruits: 1000 })).toBe(2500);
    expect(recruitableManpower({ population: 100, ratio: 0.4, used_by_buildings: 500, committed_recruits: 0 })).toBe(0);
  });

  it("matches affiliation or tags case-insensitively", () => {
    expect(classificationAllows(rifles, { affiliation: "coalition", tags: [] })).toBe(true);
    expect(classificationAllows(rifles, { affiliation: null, tags: ["COALITION"] })).toBe(true);
    expect(classificationAllows(rifles, { affiliation: "Pact", tags: ["naval"] })).toBe(false);
    expect(classificationAllows({ allowed_affiliations: [] }, { affiliation: null, tags: [] })).toBe(true);
  });
});

describe("map helpers", () => {
  it("tidies float noise", () => {
    expect(tidy(0.1 + 0.2 - 0.3)).toBe(0);
    expect(compactMap({ A: 0, B: 2.0000000000001, C: 0.5 })).toEqual({ B: 2, C: 0.5 });
  });
});
