import type { EconomyRules, ResourceMap } from "@ledger/shared";
import {
  QTY_EPSILON,
  availableOf,
  headroom,
  planDraw,
  rankProvinces,
  stateFirstOrder,
  tidy,
  type DrawSource,
  type ProvinceRow,
  type ReservationRow,
  type StockpileEntry
} from "@ledger/engine";
import type { LedgerTx } from "../db/ledgerStore";
import type { EconomyContext } from "./context";
import { fail, type Result } from "./errors";
import { requireProvince, runLedgerOperation } from "./operation";

// --- primitives, used inside a caller's transaction ---

export async function availableIn(tx: LedgerTx, provinceId: string, resource: string): Promise<number> {
  const entry = await tx.getStockpile(provinceId, resource);
  const reserved = entry ? await tx.sumReserved(provinceId, resource) : 0;
  return availableOf(entry, reserved);
}

/** Claims `amount` for `buildId` if it is still available; false leaves everything untouched. */
export async function reserveIn(tx: LedgerTx, buildId: number, provinceId: string, resource: string, amount: number): Promise<boolean> {
  if (!(amount > 0)) fail("InvalidState", `Reservation amount must be positive, got ${amount}.`);
  const available = await availableIn(tx, provinceId, resource);
  if (available + QTY_EPSILON < amount) return false;
  await tx.insertReservation({ build_id: buildId, province_id: provinceId, resource, amount });
  return true;
}

/** Spends every reservation held by `buildId`. */
export async function consumeIn(tx: LedgerTx, buildId: number): Promise<ReservationRow[]> {
  const rows = await tx.listReservations({ build_id: buildId });
  for (const r of rows) {
    const entry = await tx.getStockpile(r.province_id, r.resource);
    if (!entry) continue;
    await tx.putStockpile({ ...entry, amount: Math.max(0, tidy(entry.amount - r.amount)) });
  }
  await tx.deleteReservations(buildId);
  return rows;
}

export async function releaseIn(tx: LedgerTx, buildId: number): Promise<number> {
  return tx.deleteReservations(buildId);
}

/** Adds up to the capacity ceiling, creating the row if needed; returns what did not fit. */
export async function addIn(
  tx: LedgerTx,
  rules: Pick<EconomyRules, "default_stockpile_capacity">,
  provinceId: string,
  resource: string,
  amount: number
): Promise<{ added: number; overflow: number }> {
  if (amount <= 0) return { added: 0, overflow: 0 };
  const entry: StockpileEntry = (await tx.getStockpile(provinceId, resource)) ?? {
    province_id: provinceId,
    resource,
    amount: 0,
    capacity: rules.default_stockpile_capacity
  };
  const added = Math.min(amount, headroom(entry));
  await tx.putStockpile({ ...entry, amount: tidy(entry.amount + added) });
  return { added, overflow: tidy(amount - added) };
}

/** Takes from unreserved stock only; false when there is not enough. */
export async function removeDirectIn(tx: LedgerTx, provinceId: string, resource: string, amount: number): Promise<boolean> {
  if (amount <= 0) return true;
  const entry = await tx.getStockpile(provinceId, resource);
  if (!entry) return false;
  const reserved = await tx.sumReserved(provinceId, resource);
  if (availableOf(entry, reserved) + QTY_EPSILON < amount) return false;
  await tx.putStockpile({ ...entry, amount: Math.max(0, tidy(entry.amount - amount)) });
  return true;
}

// --- nation-wide helpers ---

export type DrawScope = { kind: "state"; state_id: string } | { kind: "state_first"; state_id: string } | { kind: "nation" };

function orderFor(provinces: ProvinceRow[], scope: DrawScope): ProvinceRow[] {
  switch (scope.kind) {
    case "state":
      return rankProvinces(provinces.filter((p) => p.state_id === scope.state_id));
    case "state_first":
      return stateFirstOrder(provinces, scope.state_id);
    case "nation":
      return rankProvinces(provinces);
  }
}

export async function nationAvailable(tx: LedgerTx, nationId: string, resource: string): Promise<number> {
  const provinces = await tx.listProvinces({ nation_id: nationId });
  let total = 0;
  for (const p of provinces) total += await availableIn(tx, p.province_id, resource);
  return tidy(total);
}

export type Draw = { province_id: string; resource: string; amount: number };

/**
 * Plans every resource first and fails with the first shortfall before touching
 * stock, then deducts. Either all of `needs` is taken or nothing is.
 */
export async function drawFromNation(tx: LedgerTx, nationId: string, needs: ResourceMap, scope: DrawScope): Promise<Draw[]> {
  const provinces = orderFor(await tx.listProvinces({ nation_id: nationId }), scope);
  const draws: Draw[] = [];
  for (const [resource, amount] of Object.entries(needs)) {
    if (amount <= QTY_EPSILON) continue;
    const sources: DrawSource[] = [];
    for (const p of provinces) sources.push({ province_id: p.province_id, available: await availableIn(tx, p.province_id, resource) });
    const plan = planDraw(sources, amount);
    if (plan.shortfall > 0) {
      fail("InsufficientResource", `Not enough ${resource}: short by ${tidy(plan.shortfall)}.`, {
        resource,
        shortfall: tidy(plan.shortfall)
      });
    }
    for (const d of plan.draws) draws.push({ province_id: d.province_id, resource, amount: d.amount });
  }
  for (const d of draws) {
    if (!(await removeDirectIn(tx, d.province_id, d.resource, d.amount))) {
      fail("InsufficientResource", `Not enough ${d.resource} in ${d.province_id}.`, { resource: d.resource, shortfall: d.amount });
    }
  }
  return draws;
}

export type Credit = { province_id: string; amount: number };

/**
 * Credits a nation: existing rows in rank order first, then new rows at the
 * default capacity. Whatever still does not fit is returned as overflow.
 */
export async function creditNation(
  tx: LedgerTx,
  rules: Pick<EconomyRules, "default_stockpile_capacity">,
  nationId: string,
  resource: string,
  amount: number,
  preferState?: string
): Promise<{ credits: Credit[]; overflow: number }> {
  const all = await tx.listProvinces({ nation_id: nationId });
  const ranked = preferState ? stateFirstOrder(all, preferState) : rankProvinces(all);
  const credits: Credit[] = [];
  let remaining = amount;

  const holders: ProvinceRow[] = [];
  const empty: ProvinceRow[] = [];
  for (const p of ranked) {
    if (await tx.getStockpile(p.province_id, resource)) holders.push(p);
    else empty.push(p);
  }
  for (const p of [...holders, ...empty]) {
    if (remaining <= QTY_EPSILON) break;
    const { added } = await addIn(tx, rules, p.province_id, resource, remaining);
    if (added > 0) credits.push({ province_id: p.province_id, amount: added });
    remaining -= added;
  }
  return { credits, overflow: remaining > QTY_EPSILON ? tidy(remaining) : 0 };
}

// --- public operations ---

export async function available(ctx: EconomyContext, provinceId: string, resource: string): Promise<Result<number>> {
  return runLedgerOperation(ctx, "available", async (tx) => {
    await requireProvince(tx, provinceId);
    return availableIn(tx, provinceId, resource);
  });
}

export async function reserve(
  ctx: EconomyContext,
  buildId: number,
  provinceId: string,
  resource: string,
  amount: number
): Promise<Result<{ reserved: number }>> {
  return runLedgerOperation(ctx, "reserve", async (tx) => {
    await requireProvince(tx, provinceId);
    if (!(await reserveIn(tx, buildId, provinceId, resource, amount))) {
      const have = await availableIn(tx, provinceId, resource);
      fail("InsufficientResource", `Only ${have} ${resource} available in ${provinceId}.`, {
        resource,
        shortfall: tidy(amount - have)
      });
    }
    return { reserved: amount };
  });
}

export async function consume(ctx: EconomyContext, buildId: number): Promise<Result<{ consumed: ReservationRow[] }>> {
  return runLedgerOperation(ctx, "consume", async (tx) => ({ consumed: await consumeIn(tx, buildId) }));
}

export async function release(ctx: EconomyContext, buildId: number): Promise<Result<{ released: number }>> {
  return runLedgerOperation(ctx, "release", async (tx) => ({ released: await releaseIn(tx, buildId) }));
}

export async function add(
  ctx: EconomyContext,
  provinceId: string,
  resource: string,
  amount: number
): Promise<Result<{ added: number; overflow: number }>> {
  return runLedgerOperation(ctx, "add", async (tx) => {
    await requireProvince(tx, provinceId);
    if (!(amount > 0)) fail("InvalidState", `Amount must be positive, got ${amount}.`);
    return addIn(tx, ctx.catalog.rules, provinceId, resource, amount);
  });
}

export async function removeDirect(
  ctx: EconomyContext,
  provinceId: string,
  resource: string,
  amount: number
): Promise<Result<{ removed: number }>> {
  return runLedgerOperation(ctx, "removeDirect", async (tx) => {
    await requireProvince(tx, provinceId);
    if (!(amount > 0)) fail("InvalidState", `Amount must be positive, got ${amount}.`);
    if (!(await removeDirectIn(tx, provinceId, resource, amount))) {
      const have = await availableIn(tx, provinceId, resource);
      fail("InsufficientResource", `Only ${have} ${resource} available in ${provinceId}.`, {
        resource,
        shortfall: tidy(amount - have)
      });
    }
    return { removed: amount };
  });
}
