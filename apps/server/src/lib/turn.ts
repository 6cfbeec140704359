import {
  QTY_EPSILON,
  addInto,
  buildingMultiplier,
  compactMap,
  maintenanceDue,
  settleMaintenance,
  tidy,
  type EconomyEffect,
  type InstalledBuilding,
  type ProvinceRow
} from "@ledger/engine";
import type { ResourceMap } from "@ledger/shared";
import type { LedgerTx } from "../db/ledgerStore";
import { completeDueBuild } from "./builds";
import type { EconomyContext } from "./context";
import { EconomyFailure, type Result } from "./errors";
import { runLedgerOperation } from "./operation";
import { completeDueResearch } from "./research";
import { addIn, availableIn, removeDirectIn } from "./stockpile";

export type TurnStage = "build" | "production" | "maintenance" | "research" | "recruit";

export type TurnFailure = {
  stage: TurnStage;
  ref: string;
  message: string;
};

export type TurnReport = {
  turn: number;
  builds_completed: number;
  builds_failed: number;
  buildings_run: number;
  nations_charged: number;
  research_completed: number;
  recruits_ready: number;
  modifiers_expired: number;
  failures: TurnFailure[];
  effects: EconomyEffect[];
};

type Flows = { produced: ResourceMap; consumed: ResourceMap; overflow: ResourceMap };

/**
 * Runs one building row: inputs come out of unreserved stock as far as it goes,
 * outputs are credited in full and clamped to capacity. Short inputs never block output.
 */
async function runBuilding(ctx: EconomyContext, tx: LedgerTx, row: InstalledBuilding, flows: Flows): Promise<void> {
  const tpl = ctx.catalog.building(row.building_id);
  if (!tpl) throw new Error(`Unknown building template ${row.building_id}.`);
  const mult = buildingMultiplier(row);

  for (const [resource, perUnit] of Object.entries(tpl.inputs)) {
    const need = perUnit * mult;
    if (need <= QTY_EPSILON) continue;
    const use = Math.min(await availableIn(tx, row.province_id, resource), need);
    if (use > QTY_EPSILON && (await removeDirectIn(tx, row.province_id, resource, use))) {
      addInto(flows.consumed, { [resource]: use });
    }
  }

  for (const [resource, perUnit] of Object.entries(tpl.outputs)) {
    const amount = tidy(perUnit * mult);
    if (amount <= QTY_EPSILON) continue;
    const { added, overflow } = await addIn(tx, ctx.catalog.rules, row.province_id, resource, amount);
    addInto(flows.produced, { [resource]: added });
    if (overflow > 0) addInto(flows.overflow, { [resource]: overflow });
  }
}

/**
 * Advances the global turn. Every row of work runs in its own savepoint: a row
 * that fails is rolled back, logged and reported, and the rest carry on. The
 * new turn number is written last.
 */
export async function advanceTurn(ctx: EconomyContext): Promise<Result<TurnReport>> {
  return runLedgerOperation(ctx, "advanceTurn", async (tx) => {
    const next = (await tx.getCurrentTurn()) + 1;
    const report: TurnReport = {
      turn: next,
      builds_completed: 0,
      builds_failed: 0,
      buildings_run: 0,
      nations_charged: 0,
      research_completed: 0,
      recruits_ready: 0,
      modifiers_expired: 0,
      failures: [],
      effects: []
    };

    const step = async (stage: TurnStage, ref: string, fn: () => Promise<void>): Promise<boolean> => {
      try {
        await tx.savepoint(fn);
        return true;
      } catch (err) {
        const message = err instanceof EconomyFailure ? err.error.message : err instanceof Error ? err.message : String(err);
        ctx.log.warn({ turn: next, stage, ref, err }, "turn row failed");
        report.failures.push({ stage, ref, message });
        return false;
      }
    };

    // 1. due builds
    for (const build of await tx.listBuilds({ status: "pending", due_by: next })) {
      await step("build", `build:${build.build_id}`, async () => {
        const effect = await completeDueBuild(tx, build, next);
        report.effects.push(effect);
        if (effect.effect_type === "build_completed") report.builds_completed += 1;
        else report.builds_failed += 1;
      });
    }

    // 2. production and consumption
    const provinces = new Map<string, ProvinceRow>((await tx.listProvinces()).map((p) => [p.province_id, p]));
    const byNation = new Map<string | null, Flows>();
    for (const row of await tx.listInstalled()) {
      const owner = provinces.get(row.province_id)?.nation_id ?? null;
      const flows: Flows = { produced: {}, consumed: {}, overflow: {} };
      const ok = await step("production", `${row.province_id}/${row.building_id}/t${row.tier}`, () => runBuilding(ctx, tx, row, flows));
      if (!ok) continue;
      report.buildings_run += 1;
      const total = byNation.get(owner) ?? { produced: {}, consumed: {}, overflow: {} };
      addInto(total.produced, flows.produced);
      addInto(total.consumed, flows.consumed);
      addInto(total.overflow, flows.overflow);
      byNation.set(owner, total);
    }
    for (const [nationId, flows] of byNation) {
      report.effects.push({
        effect_type: "production",
        nation_id: nationId,
        turn: next,
        delta: { produced: compactMap(flows.produced), consumed: compactMap(flows.consumed), overflow: compactMap(flows.overflow) },
        audit: { reason: "Building production and consumption." }
      });
    }

    // 3. maintenance
    for (const nation of await tx.listNations()) {
      await step("maintenance", `nation:${nation.nation_id}`, async () => {
        const owned = [...provinces.values()].filter((p) => p.nation_id === nation.nation_id).map((p) => p.province_id);
        if (!owned.length) return;
        const due = maintenanceDue(await tx.listInstalled({ province_ids: owned }), (id) => ctx.catalog.building(id)).cash;
        if (due <= 0) return;
        const row = await tx.getNation(nation.nation_id);
        if (!row) return;
        const settled = settleMaintenance(row.cash, row.debt, due);
        await tx.updateNation(row.nation_id, { cash: settled.cash, debt: settled.debt });
        report.nations_charged += 1;
        report.effects.push({
          effect_type: "maintenance",
          nation_id: row.nation_id,
          turn: next,
          delta: { due, paid: settled.paid, added_debt: settled.shortfall },
          audit: { reason: settled.shortfall > 0 ? "Treasury could not cover upkeep; shortfall added to debt." : "Building upkeep." }
        });
      });
    }

    // 4. research, training, modifier expiry
    for (const project of await tx.listResearch({ status: "in_progress", due_by: next })) {
      await step("research", `research:${project.project_id}`, async () => {
        report.effects.push(await completeDueResearch(tx, project, next));
        report.research_completed += 1;
      });
    }

    for (const recruit of await tx.listRecruits({ status: "queued", ready_by: next })) {
      await step("recruit", `recruit:${recruit.recruit_id}`, async () => {
        await tx.setRecruitStatus(recruit.recruit_id, "active");
        report.recruits_ready += 1;
      });
    }
    if (report.recruits_ready > 0) {
      report.effects.push({
        effect_type: "recruit_ready",
        nation_id: null,
        turn: next,
        delta: { count: report.recruits_ready },
        audit: { reason: "Training finished." }
      });
    }

    const expired = await tx.expireModifiers(next);
    report.modifiers_expired = expired.length;
    for (const m of expired) {
      report.effects.push({
        effect_type: "modifier_expired",
        nation_id: m.scope === "nation" ? m.scope_id : null,
        turn: next,
        delta: { modifier_id: m.modifier_id, effect: m.effect, kind: m.kind, value: m.value },
        audit: { reason: `Expired after turn ${m.expires_turn ?? next}.` }
      });
    }

    await tx.appendEffects(report.effects);
    await tx.setCurrentTurn(next);
    ctx.log.info(
      { turn: next, builds_completed: report.builds_completed, builds_failed: report.builds_failed, failures: report.failures.length },
      "turn advanced"
    );
    return report;
  });
}

export async function currentTurn(ctx: EconomyContext): Promise<Result<{ turn: number }>> {
  return runLedgerOperation(ctx, "currentTurn", async (tx) => ({ turn: await tx.getCurrentTurn() }));
}
