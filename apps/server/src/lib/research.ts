import type { EconomyEffect, ResearchProject } from "@ledger/engine";
import type { LedgerTx } from "../db/ledgerStore";
import type { EconomyContext } from "./context";
import { fail, type Result } from "./errors";
import { debitCash, requireNation, runLedgerOperation } from "./operation";
import { drawFromNation } from "./stockpile";

/** Pays for a technology up front; it is granted when the project's turn comes round. */
export async function startResearch(ctx: EconomyContext, nationId: string, techId: string): Promise<Result<ResearchProject>> {
  return runLedgerOperation(ctx, "startResearch", async (tx) => {
    const tech = ctx.catalog.technology(techId);
    if (!tech) fail("NotFound", `Unknown technology ${techId}.`);
    const nation = await requireNation(tx, nationId);

    const known = await tx.listNationTechs(nationId);
    if (known.includes(techId)) fail("InvalidState", `${tech.name} is already researched.`);
    const running = await tx.listResearch({ nation_id: nationId, status: "in_progress" });
    if (running.some((p) => p.tech_id === techId)) fail("InvalidState", `${tech.name} is already being researched.`);
    const missing = tech.prerequisites.filter((p) => !known.includes(p));
    if (missing.length) fail("Unauthorized", `${tech.name} requires ${missing.join(", ")}.`);

    if (nation.cash + 1e-9 < tech.cash_cost) {
      fail("InsufficientCash", `${tech.name} costs ${tech.cash_cost} cash.`, { shortfall: tech.cash_cost - Math.max(0, nation.cash) });
    }
    await drawFromNation(tx, nationId, tech.resources, { kind: "nation" });
    await debitCash(tx, nation, tech.cash_cost);

    const turn = await tx.getCurrentTurn();
    return tx.insertResearch({
      nation_id: nationId,
      tech_id: techId,
      started_turn: turn,
      complete_turn: turn + tech.research_time_turns,
      status: "in_progress"
    });
  });
}

export async function listResearch(ctx: EconomyContext, nationId: string): Promise<Result<{ known: string[]; projects: ResearchProject[] }>> {
  return runLedgerOperation(ctx, "listResearch", async (tx) => ({
    known: await tx.listNationTechs(nationId),
    projects: await tx.listResearch({ nation_id: nationId })
  }));
}

export async function completeDueResearch(tx: LedgerTx, project: ResearchProject, turn: number): Promise<EconomyEffect> {
  await tx.addNationTech(project.nation_id, project.tech_id, turn);
  await tx.setResearchStatus(project.project_id, "completed");
  return {
    effect_type: "research_completed",
    nation_id: project.nation_id,
    turn,
    delta: { tech_id: project.tech_id, project_id: project.project_id },
    audit: { reason: "Research finished." }
  };
}
