import { CatalogRegistry } from "../lib/catalog";
import type { EconomyContext } from "../lib/context";
import { silentLogger } from "../lib/logger";
import { MemoryLedgerStore } from "./memoryLedgerStore";

export const testCatalog = {
  version: 1,
  goods: [
    { resource: "Coal", category: "raw", weight_kg: 1 },
    { resource: "Iron", category: "raw", weight_kg: 2 },
    { resource: "Wood", category: "raw", weight_kg: 1 },
    { resource: "Grain", category: "food", weight_kg: 1 },
    { resource: "Food", category: "food", weight_kg: 1 },
    { resource: "Flour", category: "food" },
    { resource: "Steel", category: "industrial", weight_kg: 2 },
    { resource: "Arms", category: "military", weight_kg: 1 }
  ],
  buildings: [
    {
      building_id: "smelter",
      name: "Smelter",
      build_cost: { Iron: 100 },
      build_time_turns: 1,
      max_tier: 2,
      inputs: { Coal: 10 },
      outputs: { Steel: 5 },
      maintenance_cash: 20,
      maintenance_manpower: 100
    },
    {
      building_id: "works",
      name: "Iron Works",
      build_cost: { Iron: 200 },
      build_time_turns: 2
    },
    {
      building_id: "mill",
      name: "Mill",
      build_cost: { Wood: 10 },
      cash_cost: 50,
      build_time_turns: 1,
      max_tier: 3,
      inputs: { Grain: 4 },
      outputs: { Flour: 2 },
      maintenance_cash: 5,
      maintenance_manpower: 10
    },
    {
      building_id: "foundry",
      name: "Foundry",
      build_cost: { Iron: 10 },
      build_time_turns: 1,
      tech_required: "metallurgy"
    }
  ],
  units: [
    {
      unit_template_id: "rifles",
      name: "Rifles",
      manpower_cost: 100,
      cash_cost: 50,
      resources: { Arms: 2 },
      training_turns: 1
    },
    {
      unit_template_id: "guards",
      name: "Guards",
      manpower_cost: 50,
      allowed_affiliations: ["Pact"]
    },
    {
      unit_template_id: "tanks",
      name: "Tanks",
      manpower_cost: 10,
      tech_required: "metallurgy"
    }
  ],
  technologies: [
    {
      tech_id: "metallurgy",
      name: "Metallurgy",
      cash_cost: 100,
      resources: { Iron: 10 },
      research_time_turns: 2
    }
  ]
};

export type TestContext = EconomyContext & { store: MemoryLedgerStore };

export function mkContext(store = new MemoryLedgerStore()): TestContext {
  return { store, catalog: CatalogRegistry.fromData(testCatalog), log: silentLogger() };
}

/**
 * Two nations. A holds state sA (a1 strength 5, a2 strength 3) and sA2 (a3
 * strength 1), all at the origin; B holds b1 in sB at (300, 400).
 */
export function mkWorld(): TestContext {
  const ctx = mkContext();
  const s = ctx.store;
  s.seedNation({ nation_id: "A", cash: 10000 });
  s.seedNation({ nation_id: "B", cash: 5000 });
  s.seedProvince({ province_id: "a1", state_id: "sA", nation_id: "A", population: 10000, node_strength: 5 });
  s.seedProvince({ province_id: "a2", state_id: "sA", nation_id: "A", population: 5000, node_strength: 3 });
  s.seedProvince({ province_id: "a3", state_id: "sA2", nation_id: "A", population: 2000, node_strength: 1 });
  s.seedProvince({ province_id: "b1", state_id: "sB", nation_id: "B", population: 8000, node_strength: 4, x: 300, y: 400 });
  return ctx;
}

export function expectOk<T>(result: { ok: true; value: T } | { ok: false; error: { kind: string; message: string } }): T {
  if (!result.ok) throw new Error(`expected ok, got ${result.error.kind}: ${result.error.message}`);
  return result.value;
}
