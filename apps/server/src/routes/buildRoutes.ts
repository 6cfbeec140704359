import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { DemolishBody, RowIdParams, StartBuildBody } from "@ledger/shared";
import { buildQueue, cancelBuild, demolish, listInstalledBuildings, startBuild } from "../lib/builds";
import { actingNation, sendError, sendResult, type RouteDeps } from "./http";

export async function buildRoutes(app: FastifyInstance, { ctx }: RouteDeps): Promise<void> {
  app.post("/api/builds", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const body = StartBuildBody.parse(req.body);
      return sendResult(reply, await startBuild(ctx, { ...body, nation_id: nationId }), 201);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/builds", async (req, reply) => {
    try {
      return sendResult(reply, await buildQueue(ctx, actingNation(req)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/builds/:id/cancel", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const { id } = RowIdParams.parse(req.params);
      return sendResult(reply, await cancelBuild(ctx, nationId, id));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/buildings/demolish", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const body = DemolishBody.parse(req.body);
      return sendResult(reply, await demolish(ctx, { ...body, nation_id: nationId }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/buildings", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const query = z.object({ state_id: z.string().min(1).optional() }).parse(req.query ?? {});
      return sendResult(reply, await listInstalledBuildings(ctx, nationId, query.state_id));
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
