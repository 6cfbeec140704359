import type { z } from "zod";
import { CreateArmyBody, RecruitBody } from "@ledger/shared";
import {
  classificationAllows,
  estimateRecruitCost,
  maintenanceDue,
  recruitableManpower,
  type ArmyRow,
  type RecruitCost,
  type RecruitRow
} from "@ledger/engine";
import type { LedgerTx } from "../db/ledgerStore";
import type { EconomyContext } from "./context";
import { fail, type Result } from "./errors";
import { creditCash, debitCash, parseInput, requireControlledState, requireNation, runLedgerOperation } from "./operation";
import { creditNation, drawFromNation, type Draw } from "./stockpile";

export type StateManpower = {
  population: number;
  used_by_buildings: number;
  committed_recruits: number;
  recruitable: number;
};

export async function stateManpowerIn(ctx: EconomyContext, tx: LedgerTx, nationId: string, stateId: string): Promise<StateManpower> {
  const provinces = await tx.listProvinces({ nation_id: nationId, state_id: stateId });
  const population = provinces.reduce((s, p) => s + p.population, 0);
  const installed = provinces.length ? await tx.listInstalled({ province_ids: provinces.map((p) => p.province_id) }) : [];
  const used_by_buildings = maintenanceDue(installed, (id) => ctx.catalog.building(id)).manpower;
  const committed_recruits = (await tx.listRecruits({ nation_id: nationId, state_id: stateId })).reduce((s, r) => s + r.manpower, 0);
  return {
    population,
    used_by_buildings,
    committed_recruits,
    recruitable: recruitableManpower({
      population,
      ratio: ctx.catalog.rules.manpower_ratio,
      used_by_buildings,
      committed_recruits
    })
  };
}

export async function estimateCost(ctx: EconomyContext, unitTemplateId: string, quantity: number): Promise<Result<RecruitCost>> {
  const tpl = ctx.catalog.unit(unitTemplateId);
  if (!tpl) return { ok: false, error: { kind: "NotFound", message: `Unknown unit ${unitTemplateId}.` } };
  if (!Number.isInteger(quantity) || quantity < 1) {
    return { ok: false, error: { kind: "InvalidState", message: `Quantity must be a positive integer, got ${quantity}.` } };
  }
  return { ok: true, value: estimateRecruitCost(tpl, quantity) };
}

export type RecruitInput = z.input<typeof RecruitBody> & { nation_id: string };

export type Recruited = {
  recruits: RecruitRow[];
  cost: RecruitCost;
  draws: Draw[];
};

/**
 * Raises `quantity` units in a state. Cash, manpower and resources are taken
 * immediately; resources come from the state's provinces first, then the rest
 * of the nation. Any failure leaves the nation exactly as it was.
 */
export async function recruit(ctx: EconomyContext, input: RecruitInput): Promise<Result<Recruited>> {
  return runLedgerOperation(ctx, "recruit", async (tx) => {
    const body = parseInput(RecruitBody, {
      unit_template_id: input.unit_template_id,
      quantity: input.quantity,
      state_id: input.state_id,
      army_id: input.army_id
    });
    const tpl = ctx.catalog.unit(body.unit_template_id);
    if (!tpl) fail("NotFound", `Unknown unit ${body.unit_template_id}.`);

    const nation = await requireNation(tx, input.nation_id);
    if (tpl.tech_required) {
      const techs = await tx.listNationTechs(nation.nation_id);
      if (!techs.includes(tpl.tech_required)) fail("Unauthorized", `${tpl.name} requires ${tpl.tech_required}.`);
    }
    if (!classificationAllows(tpl, nation)) {
      fail("Unauthorized", `${tpl.name} is restricted to ${tpl.allowed_affiliations.join(", ")}.`);
    }
    const provinces = await requireControlledState(tx, nation.nation_id, body.state_id);

    if (body.army_id !== undefined) {
      const army = await tx.getArmy(body.army_id);
      if (!army) fail("NotFound", `Army ${body.army_id} not found.`);
      if (army.nation_id !== nation.nation_id) fail("Unauthorized", `Army ${body.army_id} belongs to another nation.`);
    }

    const cost = estimateRecruitCost(tpl, body.quantity);
    const pool = await stateManpowerIn(ctx, tx, nation.nation_id, body.state_id);
    if (pool.recruitable < cost.manpower) {
      fail("InsufficientManpower", `${body.state_id} can supply ${pool.recruitable} manpower, ${cost.manpower} needed.`, {
        shortfall: cost.manpower - pool.recruitable
      });
    }
    if (nation.cash + 1e-9 < cost.cash) {
      fail("InsufficientCash", `Recruiting costs ${cost.cash} cash, treasury holds ${nation.cash}.`, {
        shortfall: cost.cash - Math.max(0, nation.cash)
      });
    }

    const draws = await drawFromNation(tx, nation.nation_id, cost.resources, { kind: "state_first", state_id: body.state_id });
    await debitCash(tx, nation, cost.cash);
    await tx.updateNation(nation.nation_id, { manpower_used: nation.manpower_used + cost.manpower });

    const turn = await tx.getCurrentTurn();
    const readyTurn = turn + tpl.training_turns;
    const host = provinces[0]?.province_id ?? null;
    const rows: Array<Omit<RecruitRow, "recruit_id">> = [];
    for (let i = 0; i < body.quantity; i++) {
      rows.push({
        nation_id: nation.nation_id,
        army_id: body.army_id ?? null,
        state_id: body.state_id,
        province_id: host,
        unit_template_id: tpl.unit_template_id,
        manpower: tpl.manpower_cost,
        created_turn: turn,
        ready_turn: readyTurn,
        status: tpl.training_turns === 0 ? "active" : "queued"
      });
    }
    return { recruits: await tx.insertRecruits(rows), cost, draws };
  });
}

export type Disbanded = {
  recruit_id: number;
  refunded: RecruitCost;
  /** Refunded resources that found no room in any stockpile. */
  overflow: Record<string, number>;
};

/** Refunds one unit's cost as far as stockpile room allows and frees its manpower. */
export async function disband(ctx: EconomyContext, nationId: string, recruitId: number): Promise<Result<Disbanded>> {
  return runLedgerOperation(ctx, "disband", async (tx) => {
    const row = await tx.getRecruit(recruitId);
    if (!row) fail("NotFound", `Recruit ${recruitId} not found.`);
    if (row.nation_id !== nationId) fail("Unauthorized", `Recruit ${recruitId} belongs to another nation.`);
    const nation = await requireNation(tx, nationId);

    await tx.deleteRecruit(recruitId);
    await tx.updateNation(nationId, { manpower_used: Math.max(0, nation.manpower_used - row.manpower) });

    const tpl = ctx.catalog.unit(row.unit_template_id);
    const refunded: RecruitCost = { manpower: row.manpower, cash: 0, resources: {} };
    const overflow: Record<string, number> = {};
    if (tpl) {
      const perUnit = estimateRecruitCost(tpl, 1);
      await creditCash(tx, nation, perUnit.cash);
      refunded.cash = perUnit.cash;
      for (const [resource, amount] of Object.entries(perUnit.resources)) {
        const credit = await creditNation(tx, ctx.catalog.rules, nationId, resource, amount, row.state_id);
        refunded.resources[resource] = amount - credit.overflow;
        if (credit.overflow > 0) overflow[resource] = credit.overflow;
      }
    } else {
      ctx.log.warn({ recruit_id: recruitId, unit_template_id: row.unit_template_id }, "disbanding unit with unknown template; no refund");
    }
    return { recruit_id: recruitId, refunded, overflow };
  });
}

export async function listRecruits(ctx: EconomyContext, nationId: string, stateId?: string): Promise<Result<RecruitRow[]>> {
  return runLedgerOperation(ctx, "listRecruits", (tx) => tx.listRecruits({ nation_id: nationId, state_id: stateId }));
}

export async function stateManpower(ctx: EconomyContext, nationId: string, stateId: string): Promise<Result<StateManpower>> {
  return runLedgerOperation(ctx, "stateManpower", async (tx) => {
    await requireNation(tx, nationId);
    await requireControlledState(tx, nationId, stateId);
    return stateManpowerIn(ctx, tx, nationId, stateId);
  });
}

export async function createArmy(ctx: EconomyContext, nationId: string, input: z.input<typeof CreateArmyBody>): Promise<Result<ArmyRow>> {
  return runLedgerOperation(ctx, "createArmy", async (tx) => {
    const body = parseInput(CreateArmyBody, input);
    await requireNation(tx, nationId);
    await requireControlledState(tx, nationId, body.state_id);
    const turn = await tx.getCurrentTurn();
    return tx.insertArmy({ nation_id: nationId, name: body.name, state_id: body.state_id, created_turn: turn });
  });
}

export async function listArmies(ctx: EconomyContext, nationId: string): Promise<Result<ArmyRow[]>> {
  return runLedgerOperation(ctx, "listArmies", (tx) => tx.listArmies(nationId));
}
