import { z } from "zod";
import { StartBuildBody, DemolishBody } from "@ledger/shared";
import {
  QTY_EPSILON,
  compactMap,
  scaleMap,
  tidy,
  type EconomyEffect,
  type InstalledBuilding,
  type PendingBuild,
  type ReservationRow
} from "@ledger/engine";
import type { LedgerTx } from "../db/ledgerStore";
import type { EconomyContext } from "./context";
import { fail, type Result } from "./errors";
import { creditCash, debitCash, parseInput, requireControlledState, requireNation, requireProvince, runLedgerOperation } from "./operation";
import { availableIn, consumeIn, releaseIn, reserveIn } from "./stockpile";

export type StartBuildInput = z.input<typeof StartBuildBody> & { nation_id: string };

export type StartedBuild = {
  build: PendingBuild;
  reserved: ReservationRow[];
};

/**
 * Debits the cash cost, queues the build and reserves its resource cost across
 * the nation's provinces in the target state (node_strength desc, id asc).
 * Any shortfall aborts the whole thing: no build row, no reservations, no debit.
 */
export async function startBuild(ctx: EconomyContext, input: StartBuildInput): Promise<Result<StartedBuild>> {
  return runLedgerOperation(ctx, "startBuild", async (tx) => {
    const body = parseInput(StartBuildBody, { state_id: input.state_id, building_id: input.building_id, tier: input.tier });
    const tpl = ctx.catalog.building(body.building_id);
    if (!tpl) fail("NotFound", `Unknown building ${body.building_id}.`);
    if (body.tier > tpl.max_tier) fail("InvalidState", `${tpl.name} only goes up to tier ${tpl.max_tier}.`);

    const nation = await requireNation(tx, input.nation_id);
    if (tpl.tech_required) {
      const techs = await tx.listNationTechs(nation.nation_id);
      if (!techs.includes(tpl.tech_required)) fail("Unauthorized", `${tpl.name} requires ${tpl.tech_required}.`);
    }
    const provinces = await requireControlledState(tx, nation.nation_id, body.state_id);

    const turn = await tx.getCurrentTurn();
    const cashCost = tpl.cash_cost * body.tier;
    await debitCash(tx, nation, cashCost);

    const build = await tx.insertBuild({
      nation_id: nation.nation_id,
      state_id: body.state_id,
      building_id: tpl.building_id,
      tier: body.tier,
      cash_paid: cashCost,
      started_turn: turn,
      complete_turn: turn + tpl.build_time_turns,
      status: "pending",
      province_id: null
    });

    for (const [resource, need] of Object.entries(scaleMap(tpl.build_cost, body.tier))) {
      let remaining = need;
      for (const p of provinces) {
        if (remaining <= QTY_EPSILON) break;
        const take = Math.min(await availableIn(tx, p.province_id, resource), remaining);
        if (take <= QTY_EPSILON) continue;
        if (await reserveIn(tx, build.build_id, p.province_id, resource, take)) remaining -= take;
      }
      if (remaining > QTY_EPSILON) {
        fail("InsufficientResource", `Not enough ${resource} in ${body.state_id}: short by ${tidy(remaining)}.`, {
          resource,
          shortfall: tidy(remaining)
        });
      }
    }

    return { build, reserved: await tx.listReservations({ build_id: build.build_id }) };
  });
}

export async function cancelBuild(
  ctx: EconomyContext,
  nationId: string,
  buildId: number
): Promise<Result<{ build_id: number; released: number; refunded: number }>> {
  return runLedgerOperation(ctx, "cancelBuild", async (tx) => {
    const build = await tx.getBuild(buildId);
    if (!build) fail("NotFound", `Build ${buildId} not found.`);
    if (build.nation_id !== nationId) fail("Unauthorized", `Build ${buildId} belongs to another nation.`);
    if (build.status !== "pending") fail("InvalidState", `Build ${buildId} is already ${build.status}.`);

    const released = await releaseIn(tx, buildId);
    await tx.updateBuild(buildId, { status: "cancelled" });
    const nation = await requireNation(tx, nationId);
    await creditCash(tx, nation, build.cash_paid);
    return { build_id: buildId, released, refunded: build.cash_paid };
  });
}

export type DemolishInput = z.input<typeof DemolishBody> & { nation_id: string };

/** Removes one building of the given tier. Nothing is refunded. */
export async function demolish(ctx: EconomyContext, input: DemolishInput): Promise<Result<{ remaining: number }>> {
  return runLedgerOperation(ctx, "demolish", async (tx) => {
    const body = parseInput(DemolishBody, { province_id: input.province_id, building_id: input.building_id, tier: input.tier });
    const province = await requireProvince(tx, body.province_id);
    if (province.nation_id !== input.nation_id) fail("Unauthorized", `Nation ${input.nation_id} does not control ${body.province_id}.`);

    const installed = await tx.getInstalled(body.province_id, body.building_id, body.tier);
    if (!installed) fail("NotFound", `No tier ${body.tier} ${body.building_id} in ${body.province_id}.`);

    const remaining = installed.count - 1;
    if (remaining <= 0) await tx.deleteInstalled(body.province_id, body.building_id, body.tier);
    else await tx.putInstalled({ ...installed, count: remaining });
    return { remaining: Math.max(0, remaining) };
  });
}

export async function buildQueue(ctx: EconomyContext, nationId: string): Promise<Result<PendingBuild[]>> {
  return runLedgerOperation(ctx, "buildQueue", async (tx) => {
    await requireNation(tx, nationId);
    return tx.listBuilds({ nation_id: nationId, status: "pending" });
  });
}

export async function listInstalledBuildings(
  ctx: EconomyContext,
  nationId: string,
  stateId?: string
): Promise<Result<InstalledBuilding[]>> {
  return runLedgerOperation(ctx, "listInstalledBuildings", async (tx) => {
    const provinces = await tx.listProvinces({ nation_id: nationId, state_id: stateId });
    if (!provinces.length) return [];
    return tx.listInstalled({ province_ids: provinces.map((p) => p.province_id) });
  });
}

/**
 * Turn-side completion of one due build. Reservations are spent first; if the
 * nation no longer holds a province in the state the build fails and the spent
 * resources are not returned.
 */
export async function completeDueBuild(tx: LedgerTx, build: PendingBuild, turn: number): Promise<EconomyEffect> {
  const consumed = await consumeIn(tx, build.build_id);
  const spent: Record<string, number> = {};
  for (const r of consumed) spent[r.resource] = (spent[r.resource] ?? 0) + r.amount;

  const hosts = await tx.listProvinces({ nation_id: build.nation_id, state_id: build.state_id });
  const host = hosts[0];
  if (!host) {
    await tx.updateBuild(build.build_id, { status: "failed" });
    return {
      effect_type: "build_failed",
      nation_id: build.nation_id,
      turn,
      delta: { build_id: build.build_id, building_id: build.building_id, spent: compactMap(spent) },
      audit: { reason: `No province left in ${build.state_id} to host the building.` }
    };
  }

  const existing = await tx.getInstalled(host.province_id, build.building_id, build.tier);
  await tx.putInstalled({
    province_id: host.province_id,
    building_id: build.building_id,
    tier: build.tier,
    count: (existing?.count ?? 0) + 1
  });
  await tx.updateBuild(build.build_id, { status: "completed", province_id: host.province_id });
  return {
    effect_type: "build_completed",
    nation_id: build.nation_id,
    turn,
    delta: { build_id: build.build_id, building_id: build.building_id, tier: build.tier, province_id: host.province_id },
    audit: { reason: "Construction finished." }
  };
}
