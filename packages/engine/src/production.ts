import type { BuildingTemplate, ResourceMap } from "@ledger/shared";
import { addInto, scaleMap } from "./maps";
import type { InstalledBuilding } from "./state";

export type TemplateLookup = (buildingId: string) => BuildingTemplate | undefined;

export function buildingMultiplier(b: Pick<InstalledBuilding, "tier" | "count">): number {
  return b.tier * b.count;
}

export type ProjectedFlows = {
  produced: ResourceMap;
  consumed: ResourceMap;
  net: ResourceMap;
};

/**
 * Nominal per-turn flows of a set of installed buildings, assuming every input
 * is on hand. `outputScale` multiplies outputs only (production modifiers).
 */
export function projectFlows(installed: InstalledBuilding[], lookup: TemplateLookup, outputScale = 1): ProjectedFlows {
  const produced: ResourceMap = {};
  const consumed: ResourceMap = {};
  for (const b of installed) {
    const tpl = lookup(b.building_id);
    if (!tpl) continue;
    const mult = buildingMultiplier(b);
    addInto(produced, scaleMap(tpl.outputs, mult * outputScale));
    addInto(consumed, scaleMap(tpl.inputs, mult));
  }
  const net = addInto(addInto({}, produced), consumed, -1);
  return { produced, consumed, net };
}

export type MaintenanceDue = { cash: number; manpower: number };

/** Maintenance scales with the number of buildings, not their tier. */
export function maintenanceDue(installed: InstalledBuilding[], lookup: TemplateLookup): MaintenanceDue {
  let cash = 0;
  let manpower = 0;
  for (const b of installed) {
    const tpl = lookup(b.building_id);
    if (!tpl) continue;
    cash += tpl.maintenance_cash * b.count;
    manpower += tpl.maintenance_manpower * b.count;
  }
  return { cash, manpower };
}

export type MaintenanceSettlement = {
  cash: number;
  debt: number;
  paid: number;
  shortfall: number;
};

/** Pays what the treasury covers; the rest goes on the debt. */
export function settleMaintenance(cash: number, debt: number, due: number): MaintenanceSettlement {
  if (due <= 0) return { cash, debt, paid: 0, shortfall: 0 };
  if (cash >= due) return { cash: cash - due, debt, paid: due, shortfall: 0 };
  const paid = Math.max(0, cash);
  const shortfall = due - paid;
  return { cash: cash - paid, debt: debt + shortfall, paid, shortfall };
}
