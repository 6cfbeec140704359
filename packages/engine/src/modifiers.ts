import type { AggregatedEffect } from "@ledger/shared";
import type { Modifier, NationId, StateId } from "./state";

export type ModifierBreakdown = {
  add_sum: number;
  mul_product: number;
  final: number;
};

export type FinalModifiers = Record<AggregatedEffect, ModifierBreakdown>;

export type ModifierTarget = {
  nation_id: NationId;
  state_id?: StateId | null;
  current_turn: number;
};

export function isModifierLive(m: Modifier, currentTurn: number): boolean {
  return m.active && (m.expires_turn === null || m.expires_turn >= currentTurn);
}

/** Province-scoped modifiers never reach the nation/state aggregate. */
export function modifierTargets(m: Modifier, target: ModifierTarget): boolean {
  switch (m.scope) {
    case "global":
      return true;
    case "nation":
      return m.scope_id === target.nation_id;
    case "state":
      return target.state_id != null && m.scope_id === target.state_id;
    case "province":
      return false;
  }
}

/**
 * final = max(0, (1 + Σadd) × Πmul), computed per effect.
 * Modifiers with effect "all" feed every effect.
 */
export function computeFinalModifiers(mods: Modifier[], target: ModifierTarget): FinalModifiers {
  const live = mods.filter((m) => isModifierLive(m, target.current_turn) && modifierTargets(m, target));

  const breakdown = (effect: AggregatedEffect): ModifierBreakdown => {
    let add_sum = 0;
    let mul_product = 1;
    for (const m of live) {
      if (m.effect !== effect && m.effect !== "all") continue;
      if (m.kind === "add") add_sum += m.value;
      else mul_product *= m.value;
    }
    return { add_sum, mul_product, final: Math.max(0, (1 + add_sum) * mul_product) };
  };

  return {
    production: breakdown("production"),
    population: breakdown("population"),
    tax: breakdown("tax")
  };
}
