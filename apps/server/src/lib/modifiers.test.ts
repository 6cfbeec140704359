import { describe, it, expect } from "vitest";
import { mkWorld, expectOk } from "../test/fixtures";
import { addModifier, computeFinal, listModifiers, removeModifier } from "./modifiers";

describe("modifiers", () => {
  it("combines a global add with a nation multiplier", async () => {
    const ctx = mkWorld();
    expectOk(await addModifier(ctx, { scope: "global", effect: "production", kind: "add", value: 0.1 }));
    expectOk(await addModifier(ctx, { scope: "nation", scope_id: "A", effect: "production", kind: "mul", value: 0.9 }));

    const final = expectOk(await computeFinal(ctx, "A"));
    expect(final.production.final).toBeCloseTo(0.99, 12);
    expect(final.tax).toEqual({ add_sum: 0, mul_product: 1, final: 1 });
    expect(final.turn).toBe(0);

    const other = expectOk(await computeFinal(ctx, "B"));
    expect(other.production.final).toBeCloseTo(1.1, 12);
  });

  it("applies state modifiers only when a state is asked for", async () => {
    const ctx = mkWorld();
    expectOk(await addModifier(ctx, { scope: "state", scope_id: "sA", effect: "all", kind: "mul", value: 2 }));

    expect(expectOk(await computeFinal(ctx, "A")).population.final).toBe(1);
    expect(expectOk(await computeFinal(ctx, "A", "sA")).population.final).toBe(2);
  });

  it("never goes below zero", async () => {
    const ctx = mkWorld();
    expectOk(await addModifier(ctx, { scope: "global", effect: "tax", kind: "add", value: -1.5 }));
    expect(expectOk(await computeFinal(ctx, "A")).tax).toEqual({ add_sum: -1.5, mul_product: 1, final: 0 });
  });

  it("validates scope targets", async () => {
    const ctx = mkWorld();
    const missingId = await addModifier(ctx, { scope: "nation", effect: "tax", kind: "add", value: 1 });
    expect(missingId.ok ? null : missingId.error.kind).toBe("InvalidState");

    const unknownNation = await addModifier(ctx, { scope: "nation", scope_id: "Z", effect: "tax", kind: "add", value: 1 });
    expect(unknownNation.ok ? null : unknownNation.error.kind).toBe("NotFound");
    expect(ctx.store.world.modifiers.size).toBe(0);
  });

  it("removes modifiers by id", async () => {
    const ctx = mkWorld();
    const m = expectOk(await addModifier(ctx, { scope: "global", effect: "production", kind: "add", value: 0.1, source: "event:harvest" }));
    expect(m).toEqual({
      modifier_id: 1,
      scope: "global",
      scope_id: null,
      effect: "production",
      kind: "add",
      value: 0.1,
      source: "event:harvest",
      expires_turn: null,
      created_turn: 0,
      active: true
    });

    expect(expectOk(await removeModifier(ctx, 1))).toEqual({ modifier_id: 1 });
    expect(expectOk(await listModifiers(ctx))).toEqual([]);
    const again = await removeModifier(ctx, 1);
    expect(again).toEqual({ ok: false, error: { kind: "NotFound", message: "Modifier 1 not found." } });
  });
});
