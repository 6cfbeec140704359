import { describe, it, expect } from "vitest";
import { mkWorld, expectOk } from "../test/fixtures";
import { startBuild } from "./builds";
import { addModifier, listModifiers } from "./modifiers";
import { listRecruits, recruit } from "./recruitment";
import { listResearch, startResearch } from "./research";
import { advanceTurn, currentTurn } from "./turn";

function loseState(ctx: ReturnType<typeof mkWorld>, stateId: string, to: string): void {
  for (const p of ctx.store.world.provinces.values()) {
    if (p.state_id === stateId) p.nation_id = to;
  }
}

describe("advanceTurn: builds", () => {
  it("fails a due build with no host but still spends its reservations", async () => {
    const ctx = mkWorld();
    ctx.store.seedStock("a1", "Iron", 100);
    expectOk(await startBuild(ctx, { nation_id: "A", state_id: "sA", building_id: "smelter" }));
    loseState(ctx, "sA", "B");

    const report = expectOk(await advanceTurn(ctx));
    expect(report.turn).toBe(1);
    expect(report.builds_failed).toBe(1);
    expect(report.effects[0]).toEqual({
      effect_type: "build_failed",
      nation_id: "A",
      turn: 1,
      delta: { build_id: 1, building_id: "smelter", spent: { Iron: 100 } },
      audit: { reason: "No province left in sA to host the building." }
    });
    expect(ctx.store.world.builds.get(1)?.status).toBe("failed");
    expect(ctx.store.amount("a1", "Iron")).toBe(0);
    expect(ctx.store.world.reservations).toEqual([]);
    expect(ctx.store.world.turn).toBe(1);
  });

  it("installs a completed build in the strongest province of the state", async () => {
    const ctx = mkWorld();
    ctx.store.seedStock("a1", "Iron", 60);
    ctx.store.seedStock("a2", "Iron", 40);
    expectOk(await startBuild(ctx, { nation_id: "A", state_id: "sA", building_id: "smelter" }));

    const report = expectOk(await advanceTurn(ctx));
    expect(report.builds_completed).toBe(1);
    expect(ctx.store.world.installed.get("a1|smelter|1")).toEqual({ province_id: "a1", building_id: "smelter", tier: 1, count: 1 });
    expect(ctx.store.world.builds.get(1)).toMatchObject({ status: "completed", province_id: "a1" });
    expect(ctx.store.amount("a1", "Iron")).toBe(0);
    expect(ctx.store.amount("a2", "Iron")).toBe(0);
    // upkeep of the new smelter is charged in the same turn
    expect(ctx.store.nation("A").cash).toBe(9980);
  });

  it("leaves builds that are not yet due alone", async () => {
    const ctx = mkWorld();
    ctx.store.seedStock("a1", "Iron", 200);
    expectOk(await startBuild(ctx, { nation_id: "A", state_id: "sA", building_id: "works" }));

    expect(expectOk(await advanceTurn(ctx)).builds_completed).toBe(0);
    expect(ctx.store.reservationsFor(1)).toHaveLength(1);
    expect(expectOk(await advanceTurn(ctx)).builds_completed).toBe(1);
  });

  it("isolates a failing row and completes the rest", async () => {
    const ctx = mkWorld();
    ctx.store.seedStock("a1", "Iron", 100);
    ctx.store.seedStock("a1", "Wood", 10);
    expectOk(await startBuild(ctx, { nation_id: "A", state_id: "sA", building_id: "smelter" }));
    expectOk(await startBuild(ctx, { nation_id: "A", state_id: "sA", building_id: "mill" }));
    ctx.store.injectFault("putInstalled");

    const report = expectOk(await advanceTurn(ctx));
    expect(report.failures).toEqual([{ stage: "build", ref: "build:1", message: "injected fault in putInstalled" }]);
    expect(report.builds_completed).toBe(1);
    expect(ctx.store.world.builds.get(1)?.status).toBe("pending");
    expect(ctx.store.reservationsFor(1)).toEqual([{ build_id: 1, province_id: "a1", resource: "Iron", amount: 100 }]);
    expect(ctx.store.amount("a1", "Iron")).toBe(100);
    expect(ctx.store.world.installed.get("a1|mill|1")?.count).toBe(1);
    expect(ctx.store.world.turn).toBe(1);

    expect(expectOk(await advanceTurn(ctx)).builds_completed).toBe(1);
    expect(ctx.store.world.builds.get(1)?.status).toBe("completed");
  });
});

describe("advanceTurn: production and maintenance", () => {
  it("credits full output when inputs run short and leaves reserved stock alone", async () => {
    const ctx = mkWorld();
    ctx.store.seedInstalled({ province_id: "a1", building_id: "mill", tier: 2, count: 1 });
    ctx.store.seedInstalled({ province_id: "a2", building_id: "smelter", tier: 1, count: 1 });
    ctx.store.seedStock("a1", "Grain", 6);
    ctx.store.seedStock("a2", "Coal", 25);
    ctx.store.world.reservations.push({ build_id: 7, province_id: "a2", resource: "Coal", amount: 20 });

    const report = expectOk(await advanceTurn(ctx));
    expect(report.buildings_run).toBe(2);
    expect(ctx.store.amount("a1", "Grain")).toBe(0);
    expect(ctx.store.stock("a1", "Flour")).toEqual({ province_id: "a1", resource: "Flour", amount: 4, capacity: 10000 });
    expect(ctx.store.amount("a2", "Coal")).toBe(20);
    expect(ctx.store.amount("a2", "Steel")).toBe(5);

    const production = report.effects.find((e) => e.effect_type === "production");
    expect(production?.delta).toEqual({
      produced: { Flour: 4, Steel: 5 },
      consumed: { Grain: 6, Coal: 5 },
      overflow: {}
    });
    expect(ctx.store.nation("A").cash).toBe(9975);
  });

  it("keeps producing with no inputs on hand", async () => {
    const ctx = mkWorld();
    ctx.store.seedInstalled({ province_id: "a1", building_id: "mill", tier: 1, count: 1 });

    const report = expectOk(await advanceTurn(ctx));
    expect(ctx.store.amount("a1", "Flour")).toBe(2);
    expect(ctx.store.amount("a1", "Grain")).toBe(0);
    expect(report.effects.find((e) => e.effect_type === "production")?.delta).toEqual({
      produced: { Flour: 2 },
      consumed: {},
      overflow: {}
    });
  });

  it("clamps output to stockpile capacity", async () => {
    const ctx = mkWorld();
    ctx.store.seedInstalled({ province_id: "a1", building_id: "mill", tier: 1, count: 1 });
    ctx.store.seedStock("a1", "Grain", 4);
    ctx.store.seedStock("a1", "Flour", 9, 10);

    const report = expectOk(await advanceTurn(ctx));
    expect(ctx.store.amount("a1", "Flour")).toBe(10);
    expect(report.effects.find((e) => e.effect_type === "production")?.delta).toEqual({
      produced: { Flour: 1 },
      consumed: { Grain: 4 },
      overflow: { Flour: 1 }
    });
  });

  it("puts unpaid upkeep on the debt", async () => {
    const ctx = mkWorld();
    ctx.store.nation("A").cash = 15;
    ctx.store.seedInstalled({ province_id: "a1", building_id: "smelter", tier: 1, count: 1 });
    ctx.store.seedInstalled({ province_id: "a2", building_id: "mill", tier: 1, count: 1 });

    const report = expectOk(await advanceTurn(ctx));
    expect(ctx.store.nation("A")).toMatchObject({ cash: 0, debt: 10 });
    expect(report.nations_charged).toBe(1);
    expect(report.effects.find((e) => e.effect_type === "maintenance")).toEqual({
      effect_type: "maintenance",
      nation_id: "A",
      turn: 1,
      delta: { due: 25, paid: 15, added_debt: 10 },
      audit: { reason: "Treasury could not cover upkeep; shortfall added to debt." }
    });
  });

  it("advances an empty world with nothing to report", async () => {
    const ctx = mkWorld();
    expect(expectOk(await advanceTurn(ctx))).toEqual({
      turn: 1,
      builds_completed: 0,
      builds_failed: 0,
      buildings_run: 0,
      nations_charged: 0,
      research_completed: 0,
      recruits_ready: 0,
      modifiers_expired: 0,
      failures: [],
      effects: []
    });
    expectOk(await advanceTurn(ctx));
    expect(expectOk(await currentTurn(ctx))).toEqual({ turn: 2 });
  });

  it("writes nothing when the store fails outside a row", async () => {
    const ctx = mkWorld();
    ctx.store.seedInstalled({ province_id: "a1", building_id: "smelter", tier: 1, count: 1 });
    ctx.store.injectFault("appendEffects");

    expect(kindOf(await advanceTurn(ctx))).toBe("StoreError");
    expect(ctx.store.world.turn).toBe(0);
    expect(ctx.store.nation("A").cash).toBe(10000);
  });
});

function kindOf(result: { ok: true } | { ok: false; error: { kind: string } }): string | null {
  return result.ok ? null : result.error.kind;
}

describe("advanceTurn: research, training and modifiers", () => {
  it("grants research when its turn comes", async () => {
    const ctx = mkWorld();
    ctx.store.seedStock("a3", "Iron", 10);
    const project = expectOk(await startResearch(ctx, "A", "metallurgy"));
    expect(project).toMatchObject({ project_id: 1, complete_turn: 2, status: "in_progress" });
    expect(ctx.store.nation("A").cash).toBe(9900);
    expect(ctx.store.amount("a3", "Iron")).toBe(0);

    expect(expectOk(await advanceTurn(ctx)).research_completed).toBe(0);
    expect(expectOk(await advanceTurn(ctx)).research_completed).toBe(1);
    const { known, projects } = expectOk(await listResearch(ctx, "A"));
    expect(known).toEqual(["metallurgy"]);
    expect(projects.map((p) => p.status)).toEqual(["completed"]);
  });

  it("activates queued recruits once trained", async () => {
    const ctx = mkWorld();
    ctx.store.seedStock("a1", "Arms", 4);
    expectOk(await recruit(ctx, { nation_id: "A", unit_template_id: "rifles", quantity: 2, state_id: "sA" }));

    const report = expectOk(await advanceTurn(ctx));
    expect(report.recruits_ready).toBe(2);
    expect(report.effects).toContainEqual({
      effect_type: "recruit_ready",
      nation_id: null,
      turn: 1,
      delta: { count: 2 },
      audit: { reason: "Training finished." }
    });
    expect(expectOk(await listRecruits(ctx, "A")).map((r) => r.status)).toEqual(["active", "active"]);
  });

  it("expires modifiers after their last turn", async () => {
    const ctx = mkWorld();
    expectOk(await addModifier(ctx, { scope: "global", effect: "production", kind: "add", value: 0.1, expires_turn: 1 }));

    expect(expectOk(await advanceTurn(ctx)).modifiers_expired).toBe(0);
    expect(expectOk(await advanceTurn(ctx)).modifiers_expired).toBe(1);
    expect(expectOk(await listModifiers(ctx, { active_only: true }))).toEqual([]);
    expect(ctx.store.world.effects.map((e) => e.effect_type)).toEqual(["modifier_expired"]);
  });
});
