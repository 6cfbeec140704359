import Fastify from "fastify";
import type { EconomyContext } from "./lib/context";
import { adminRoutes } from "./routes/adminRoutes";
import { buildRoutes } from "./routes/buildRoutes";
import { militaryRoutes } from "./routes/militaryRoutes";
import { reportRoutes } from "./routes/reportRoutes";
import { researchRoutes } from "./routes/researchRoutes";
import { tradeRoutes } from "./routes/tradeRoutes";

export async function buildApp(ctx: EconomyContext, opts: { adminToken?: string | null } = {}) {
  const app = Fastify({ logger: ctx.log });
  const deps = { ctx, adminToken: opts.adminToken ?? null };

  app.get("/health", async () => ({ ok: true }));

  await buildRoutes(app, deps);
  await tradeRoutes(app, deps);
  await militaryRoutes(app, deps);
  await researchRoutes(app, deps);
  await reportRoutes(app, deps);
  await adminRoutes(app, deps);

  return app;
}
