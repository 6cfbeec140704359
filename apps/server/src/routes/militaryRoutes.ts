import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { CreateArmyBody, RecruitBody, RecruitEstimateQuery, RowIdParams } from "@ledger/shared";
import { createArmy, disband, estimateCost, listArmies, listRecruits, recruit, stateManpower } from "../lib/recruitment";
import { actingNation, sendError, sendResult, type RouteDeps } from "./http";

export async function militaryRoutes(app: FastifyInstance, { ctx }: RouteDeps): Promise<void> {
  app.get("/api/recruits/estimate", async (req, reply) => {
    try {
      const query = RecruitEstimateQuery.parse(req.query ?? {});
      return sendResult(reply, await estimateCost(ctx, query.unit_template_id, query.quantity));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/recruits", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const query = z.object({ state_id: z.string().min(1).optional() }).parse(req.query ?? {});
      return sendResult(reply, await listRecruits(ctx, nationId, query.state_id));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/recruits", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const body = RecruitBody.parse(req.body);
      return sendResult(reply, await recruit(ctx, { ...body, nation_id: nationId }), 201);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/recruits/:id/disband", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const { id } = RowIdParams.parse(req.params);
      return sendResult(reply, await disband(ctx, nationId, id));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/states/:stateId/manpower", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const { stateId } = z.object({ stateId: z.string().min(1) }).parse(req.params);
      return sendResult(reply, await stateManpower(ctx, nationId, stateId));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/armies", async (req, reply) => {
    try {
      return sendResult(reply, await listArmies(ctx, actingNation(req)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/armies", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const body = CreateArmyBody.parse(req.body);
      return sendResult(reply, await createArmy(ctx, nationId, body), 201);
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
