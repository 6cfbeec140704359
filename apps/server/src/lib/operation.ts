import type { ZodType, ZodTypeDef } from "zod";
import type { NationRow, ProvinceRow } from "@ledger/engine";
import type { LedgerTx } from "../db/ledgerStore";
import type { EconomyContext } from "./context";
import { describeZodError, fail, toFailure, type Result } from "./errors";

/**
 * Runs one ledger operation in its own transaction. Domain failures and store
 * errors both come back as a failed Result; nothing is thrown.
 */
export async function runLedgerOperation<T>(
  ctx: EconomyContext,
  op: string,
  fn: (tx: LedgerTx) => Promise<T>
): Promise<Result<T>> {
  try {
    const value = await ctx.store.transaction(fn);
    return { ok: true, value };
  } catch (err) {
    return toFailure(ctx.log, op, err);
  }
}

/** Validates caller input inside an operation; a mismatch is an InvalidState failure. */
export function parseInput<Out, In = Out>(schema: ZodType<Out, ZodTypeDef, In>, value: unknown): Out {
  const parsed = schema.safeParse(value);
  if (!parsed.success) fail("InvalidState", `Invalid input: ${describeZodError(parsed.error)}`);
  return parsed.data;
}

export async function requireNation(tx: LedgerTx, nationId: string): Promise<NationRow> {
  const nation = await tx.getNation(nationId);
  if (!nation) fail("NotFound", `Nation ${nationId} not found.`);
  return nation;
}

export async function requireProvince(tx: LedgerTx, provinceId: string): Promise<ProvinceRow> {
  const province = await tx.getProvince(provinceId);
  if (!province) fail("NotFound", `Province ${provinceId} not found.`);
  return province;
}

/** The nation's provinces in a state, ranked; Unauthorized when it holds none. */
export async function requireControlledState(tx: LedgerTx, nationId: string, stateId: string): Promise<ProvinceRow[]> {
  const provinces = await tx.listProvinces({ nation_id: nationId, state_id: stateId });
  if (!provinces.length) fail("Unauthorized", `Nation ${nationId} controls no province in state ${stateId}.`);
  return provinces;
}

/** Debits cash, failing with the shortfall when the treasury cannot cover it. */
export async function debitCash(tx: LedgerTx, nation: NationRow, amount: number): Promise<number> {
  if (amount <= 0) return nation.cash;
  if (nation.cash + 1e-9 < amount) {
    fail("InsufficientCash", `Nation ${nation.nation_id} needs ${amount} cash but has ${nation.cash}.`, {
      shortfall: amount - Math.max(0, nation.cash)
    });
  }
  const cash = nation.cash - amount;
  await tx.updateNation(nation.nation_id, { cash });
  nation.cash = cash;
  return cash;
}

export async function creditCash(tx: LedgerTx, nation: NationRow, amount: number): Promise<number> {
  if (amount === 0) return nation.cash;
  const cash = nation.cash + amount;
  await tx.updateNation(nation.nation_id, { cash });
  nation.cash = cash;
  return cash;
}
