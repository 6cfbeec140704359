import { afterEach, describe, expect, it } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import { buildApp } from "./app";
import { STORE_ERROR_MESSAGE } from "./lib/errors";
import { sendError } from "./routes/http";
import { mkWorld, type TestContext } from "./test/fixtures";

const ADMIN = { "x-admin-token": "test-secret" };

describe("http api", () => {
  let app: FastifyInstance | null = null;

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  async function start(ctx: TestContext = mkWorld()): Promise<FastifyInstance> {
    app = await buildApp(ctx, { adminToken: "test-secret" });
    return app;
  }

  it("answers health checks", async () => {
    const res = await (await start()).inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it("hides unexpected error details from the client", async () => {
    app = Fastify({ logger: false });
    app.get("/boom", async (_req, reply) => sendError(reply, new Error("connect ECONNREFUSED 10.0.0.5:5432")));

    const res = await app.inject({ method: "GET", url: "/boom" });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: { kind: "StoreError", message: STORE_ERROR_MESSAGE } });
  });

  it("needs an acting nation", async () => {
    const res = await (await start()).inject({ method: "POST", url: "/api/builds", payload: { state_id: "sA", building_id: "works" } });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: { kind: "Request", message: "Missing x-nation-id header." } });
  });

  it("maps ledger failures onto status codes", async () => {
    const ctx = mkWorld();
    ctx.store.seedStock("a1", "Iron", 120);
    ctx.store.seedStock("a2", "Iron", 50);
    const server = await start(ctx);

    const res = await server.inject({
      method: "POST",
      url: "/api/builds",
      headers: { "x-nation-id": "A" },
      payload: { state_id: "sA", building_id: "works" }
    });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: { kind: "InsufficientResource", message: "Not enough Iron in sA: short by 30.", resource: "Iron", shortfall: 30 }
    });

    const bad = await server.inject({ method: "POST", url: "/api/builds", headers: { "x-nation-id": "A" }, payload: { state_id: "sA" } });
    expect(bad.statusCode).toBe(400);
  });

  it("creates builds and lists the queue", async () => {
    const ctx = mkWorld();
    ctx.store.seedStock("a1", "Iron", 100);
    const server = await start(ctx);
    const headers = { "x-nation-id": "A" };

    const created = await server.inject({ method: "POST", url: "/api/builds", headers, payload: { state_id: "sA", building_id: "smelter" } });
    expect(created.statusCode).toBe(201);
    expect(created.json().build.build_id).toBe(1);

    const queue = await server.inject({ method: "GET", url: "/api/builds", headers });
    expect(queue.json().map((b: { build_id: number }) => b.build_id)).toEqual([1]);
  });

  it("guards admin routes with the token", async () => {
    const server = await start();

    const denied = await server.inject({ method: "POST", url: "/api/admin/turn/advance" });
    expect(denied.statusCode).toBe(403);

    const advanced = await server.inject({ method: "POST", url: "/api/admin/turn/advance", headers: ADMIN });
    expect(advanced.statusCode).toBe(200);
    expect(advanced.json().turn).toBe(1);

    const turn = await server.inject({ method: "GET", url: "/api/turn" });
    expect(turn.json()).toEqual({ turn: 1 });
  });

  it("adds modifiers and reports the final values", async () => {
    const server = await start();

    const added = await server.inject({
      method: "POST",
      url: "/api/admin/modifiers",
      headers: ADMIN,
      payload: { scope: "nation", scope_id: "A", effect: "tax", kind: "add", value: 0.25 }
    });
    expect(added.statusCode).toBe(201);

    const final = await server.inject({ method: "GET", url: "/api/modifiers/final", headers: { "x-nation-id": "A" } });
    expect(final.json().tax).toEqual({ add_sum: 0.25, mul_product: 1, final: 1.25 });

    const removed = await server.inject({ method: "DELETE", url: "/api/admin/modifiers/1", headers: ADMIN });
    expect(removed.json()).toEqual({ modifier_id: 1 });
    const missing = await server.inject({ method: "DELETE", url: "/api/admin/modifiers/1", headers: ADMIN });
    expect(missing.statusCode).toBe(404);
  });

  it("rejects a fourth open offer with 429", async () => {
    const server = await start();
    const send = () =>
      server.inject({ method: "POST", url: "/api/offers", headers: { "x-nation-id": "A" }, payload: { to_nation: "B", offered_cash: 10 } });

    for (let i = 0; i < 3; i++) expect((await send()).statusCode).toBe(201);
    expect((await send()).statusCode).toBe(429);
  });

  it("refuses to reload a catalog that was not read from a file", async () => {
    const res = await (await start()).inject({ method: "POST", url: "/api/admin/catalog/reload", headers: ADMIN });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: { kind: "Request", message: "Catalog was not loaded from a file." } });
  });
});
