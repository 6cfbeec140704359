import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { computeFinal, listModifiers } from "../lib/modifiers";
import { auditLog, goodsReport, nationOverview, stateOverview } from "../lib/reports";
import { currentTurn } from "../lib/turn";
import { actingNation, sendError, sendResult, type RouteDeps } from "./http";

const AuditQuery = z.object({
  turn: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

export async function reportRoutes(app: FastifyInstance, { ctx }: RouteDeps): Promise<void> {
  app.get("/api/turn", async (_req, reply) => sendResult(reply, await currentTurn(ctx)));

  app.get("/api/reports/nation", async (req, reply) => {
    try {
      return sendResult(reply, await nationOverview(ctx, actingNation(req)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/reports/states/:stateId", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const { stateId } = z.object({ stateId: z.string().min(1) }).parse(req.params);
      return sendResult(reply, await stateOverview(ctx, nationId, stateId));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/reports/goods", async (req, reply) => {
    try {
      return sendResult(reply, await goodsReport(ctx, actingNation(req)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/reports/audit", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const query = AuditQuery.parse(req.query ?? {});
      return sendResult(reply, await auditLog(ctx, { nation_id: nationId, turn: query.turn, limit: query.limit }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/modifiers", async (req, reply) => {
    try {
      const query = z.object({ active_only: z.enum(["true", "false"]).default("false") }).parse(req.query ?? {});
      return sendResult(reply, await listModifiers(ctx, { active_only: query.active_only === "true" }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/modifiers/final", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const query = z.object({ state_id: z.string().min(1).optional() }).parse(req.query ?? {});
      return sendResult(reply, await computeFinal(ctx, nationId, query.state_id));
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
