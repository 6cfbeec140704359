import type { ResourceMap } from "@ledger/shared";
import {
  computeFinalModifiers,
  maintenanceDue,
  projectFlows,
  recruitableManpower,
  tidy,
  type FinalModifiers,
  type InstalledBuilding,
  type ProvinceRow
} from "@ledger/engine";
import type { LedgerTx, StoredEffect } from "../db/ledgerStore";
import type { EconomyContext } from "./context";
import type { Result } from "./errors";
import { requireControlledState, requireNation, runLedgerOperation } from "./operation";
import { stateManpowerIn, type StateManpower } from "./recruitment";

export type StockLine = {
  amount: number;
  /** null when any contributing stockpile is uncapped. */
  capacity: number | null;
  reserved: number;
  available: number;
};

async function aggregateStock(tx: LedgerTx, provinces: ProvinceRow[]): Promise<Record<string, StockLine>> {
  const ids = provinces.map((p) => p.province_id);
  if (!ids.length) return {};
  const out: Record<string, StockLine> = {};
  for (const s of await tx.listStockpiles({ province_ids: ids })) {
    const line = out[s.resource] ?? { amount: 0, capacity: 0, reserved: 0, available: 0 };
    line.amount += s.amount;
    line.capacity = line.capacity === null || s.capacity === null ? null : line.capacity + s.capacity;
    out[s.resource] = line;
  }
  for (const r of await tx.listReservations({ province_ids: ids })) {
    const line = out[r.resource];
    if (line) line.reserved += r.amount;
  }
  for (const line of Object.values(out)) {
    line.amount = tidy(line.amount);
    line.reserved = tidy(line.reserved);
    line.available = tidy(Math.max(0, line.amount - line.reserved));
  }
  return out;
}

async function installedIn(tx: LedgerTx, provinces: ProvinceRow[]): Promise<InstalledBuilding[]> {
  if (!provinces.length) return [];
  return tx.listInstalled({ province_ids: provinces.map((p) => p.province_id) });
}

export type NationOverview = {
  nation_id: string;
  name: string;
  turn: number;
  cash: number;
  debt: number;
  tax_rate: number;
  population: number;
  manpower_used: number;
  recruitable_manpower: number;
  technologies: string[];
  pending_builds: number;
  open_offers: number;
  modifiers: FinalModifiers;
  estimated_tax_income: number;
};

export async function nationOverview(ctx: EconomyContext, nationId: string): Promise<Result<NationOverview>> {
  return runLedgerOperation(ctx, "nationOverview", async (tx) => {
    const nation = await requireNation(tx, nationId);
    const turn = await tx.getCurrentTurn();
    const provinces = await tx.listProvinces({ nation_id: nationId });
    const population = provinces.reduce((s, p) => s + p.population, 0);
    const buildingsManpower = maintenanceDue(await installedIn(tx, provinces), (id) => ctx.catalog.building(id)).manpower;
    const committed = (await tx.listRecruits({ nation_id: nationId })).reduce((s, r) => s + r.manpower, 0);
    const modifiers = computeFinalModifiers(await tx.listModifiers({ active_only: true }), { nation_id: nationId, current_turn: turn });

    return {
      nation_id: nation.nation_id,
      name: nation.name,
      turn,
      cash: nation.cash,
      debt: nation.debt,
      tax_rate: nation.tax_rate,
      population,
      manpower_used: nation.manpower_used,
      recruitable_manpower: recruitableManpower({
        population,
        ratio: ctx.catalog.rules.manpower_ratio,
        used_by_buildings: buildingsManpower,
        committed_recruits: committed
      }),
      technologies: await tx.listNationTechs(nationId),
      pending_builds: (await tx.listBuilds({ nation_id: nationId, status: "pending" })).length,
      open_offers: (await tx.listOffers({ nation_id: nationId, status: "open" })).length,
      modifiers,
      estimated_tax_income: tidy(nation.tax_rate * population * modifiers.tax.final)
    };
  });
}

export type StateOverview = {
  nation_id: string;
  state_id: string;
  provinces: ProvinceRow[];
  manpower: StateManpower;
  stockpiles: Record<string, StockLine>;
  buildings: InstalledBuilding[];
  produced: ResourceMap;
  consumed: ResourceMap;
  net: ResourceMap;
  modifiers: FinalModifiers;
  estimated_tax_income: number;
};

export async function stateOverview(ctx: EconomyContext, nationId: string, stateId: string): Promise<Result<StateOverview>> {
  return runLedgerOperation(ctx, "stateOverview", async (tx) => {
    const nation = await requireNation(tx, nationId);
    const provinces = await requireControlledState(tx, nationId, stateId);
    const turn = await tx.getCurrentTurn();
    const modifiers = computeFinalModifiers(await tx.listModifiers({ active_only: true }), {
      nation_id: nationId,
      state_id: stateId,
      current_turn: turn
    });
    const buildings = await installedIn(tx, provinces);
    const flows = projectFlows(buildings, (id) => ctx.catalog.building(id), modifiers.production.final);
    const manpower = await stateManpowerIn(ctx, tx, nationId, stateId);

    return {
      nation_id: nationId,
      state_id: stateId,
      provinces,
      manpower,
      stockpiles: await aggregateStock(tx, provinces),
      buildings,
      ...flows,
      modifiers,
      estimated_tax_income: tidy(nation.tax_rate * manpower.population * modifiers.tax.final)
    };
  });
}

export type GoodsLine = StockLine & {
  resource: string;
  produced: number;
  consumed: number;
  net: number;
};

/** Every declared good, grouped by category, with stock and nominal flows. */
export async function goodsReport(ctx: EconomyContext, nationId: string): Promise<Result<Record<string, GoodsLine[]>>> {
  return runLedgerOperation(ctx, "goodsReport", async (tx) => {
    await requireNation(tx, nationId);
    const provinces = await tx.listProvinces({ nation_id: nationId });
    const stock = await aggregateStock(tx, provinces);
    const flows = projectFlows(await installedIn(tx, provinces), (id) => ctx.catalog.building(id));

    const out: Record<string, GoodsLine[]> = {};
    for (const good of ctx.catalog.goods()) {
      const line = stock[good.resource] ?? { amount: 0, capacity: 0, reserved: 0, available: 0 };
      const produced = tidy(flows.produced[good.resource] ?? 0);
      const consumed = tidy(flows.consumed[good.resource] ?? 0);
      (out[good.category] ??= []).push({ resource: good.resource, ...line, produced, consumed, net: tidy(produced - consumed) });
    }
    return out;
  });
}

export async function auditLog(
  ctx: EconomyContext,
  filter: { nation_id?: string; turn?: number; limit?: number }
): Promise<Result<StoredEffect[]>> {
  return runLedgerOperation(ctx, "auditLog", (tx) => tx.listEffects(filter));
}
