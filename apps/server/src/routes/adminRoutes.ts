import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { ModifierInput, RowIdParams } from "@ledger/shared";
import { addModifier, removeModifier } from "../lib/modifiers";
import { advanceTurn } from "../lib/turn";
import { HttpError, requireAdmin, sendError, sendResult, type RouteDeps } from "./http";

export async function adminRoutes(app: FastifyInstance, { ctx, adminToken }: RouteDeps): Promise<void> {
  app.post("/api/admin/turn/advance", async (req, reply) => {
    try {
      requireAdmin(req, adminToken);
      return sendResult(reply, await advanceTurn(ctx));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/admin/modifiers", async (req, reply) => {
    try {
      requireAdmin(req, adminToken);
      const body = ModifierInput.parse(req.body);
      return sendResult(reply, await addModifier(ctx, body), 201);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.delete("/api/admin/modifiers/:id", async (req, reply) => {
    try {
      requireAdmin(req, adminToken);
      const { id } = RowIdParams.parse(req.params);
      return sendResult(reply, await removeModifier(ctx, id));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/admin/catalog/reload", async (req, reply) => {
    try {
      requireAdmin(req, adminToken);
      z.object({}).strict().parse(req.body ?? {});
      try {
        const { version } = ctx.catalog.reload();
        ctx.log.info({ version }, "economy catalog reloaded");
        return reply.send({ ok: true, version });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new HttpError(422, message);
      }
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
