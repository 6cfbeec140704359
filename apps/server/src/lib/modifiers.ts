import type { z } from "zod";
import { ModifierInput } from "@ledger/shared";
import { computeFinalModifiers, type FinalModifiers, type Modifier } from "@ledger/engine";
import type { EconomyContext } from "./context";
import { fail, type Result } from "./errors";
import { parseInput, requireNation, runLedgerOperation } from "./operation";

export async function addModifier(ctx: EconomyContext, input: z.input<typeof ModifierInput>): Promise<Result<Modifier>> {
  return runLedgerOperation(ctx, "addModifier", async (tx) => {
    const m = parseInput(ModifierInput, input);
    if (m.scope === "nation" && m.scope_id !== null) await requireNation(tx, m.scope_id);
    const turn = await tx.getCurrentTurn();
    return tx.insertModifier({ ...m, created_turn: turn, active: true });
  });
}

export async function removeModifier(ctx: EconomyContext, modifierId: number): Promise<Result<{ modifier_id: number }>> {
  return runLedgerOperation(ctx, "removeModifier", async (tx) => {
    if (!(await tx.deleteModifier(modifierId))) fail("NotFound", `Modifier ${modifierId} not found.`);
    return { modifier_id: modifierId };
  });
}

export async function listModifiers(ctx: EconomyContext, opts: { active_only?: boolean } = {}): Promise<Result<Modifier[]>> {
  return runLedgerOperation(ctx, "listModifiers", (tx) => tx.listModifiers(opts));
}

export async function computeFinal(
  ctx: EconomyContext,
  nationId: string,
  stateId?: string | null
): Promise<Result<FinalModifiers & { turn: number }>> {
  return runLedgerOperation(ctx, "computeFinalModifiers", async (tx) => {
    await requireNation(tx, nationId);
    const turn = await tx.getCurrentTurn();
    const mods = await tx.listModifiers({ active_only: true });
    return { ...computeFinalModifiers(mods, { nation_id: nationId, state_id: stateId ?? null, current_turn: turn }), turn };
  });
}
