import type { FastifyInstance } from "fastify";
import { StartResearchBody } from "@ledger/shared";
import { listResearch, startResearch } from "../lib/research";
import { actingNation, sendError, sendResult, type RouteDeps } from "./http";

export async function researchRoutes(app: FastifyInstance, { ctx }: RouteDeps): Promise<void> {
  app.get("/api/research", async (req, reply) => {
    try {
      return sendResult(reply, await listResearch(ctx, actingNation(req)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/research", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const body = StartResearchBody.parse(req.body);
      return sendResult(reply, await startResearch(ctx, nationId, body.tech_id), 201);
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
