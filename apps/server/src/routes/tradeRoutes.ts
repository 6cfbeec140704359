import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { CreateOfferBody, MarketPostBody, RowIdParams, TransportEstimateBody } from "@ledger/shared";
import {
  acceptMarketPost,
  acceptOffer,
  cancelMarketPost,
  cancelOffer,
  createOffer,
  estimateTransportCost,
  listMarketPosts,
  listOffers,
  postMarket
} from "../lib/trade";
import { actingNation, sendError, sendResult, type RouteDeps } from "./http";

const OfferListQuery = z.object({ status: z.enum(["open", "completed", "cancelled", "failed"]).optional() });

export async function tradeRoutes(app: FastifyInstance, { ctx }: RouteDeps): Promise<void> {
  app.get("/api/market", async (req, reply) => {
    try {
      const query = z.object({ resource: z.string().min(1).optional() }).parse(req.query ?? {});
      return sendResult(reply, await listMarketPosts(ctx, query.resource));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/market", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const body = MarketPostBody.parse(req.body);
      return sendResult(reply, await postMarket(ctx, { ...body, nation_id: nationId }), 201);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/market/:id/accept", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const { id } = RowIdParams.parse(req.params);
      return sendResult(reply, await acceptMarketPost(ctx, nationId, id), 201);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/market/:id/cancel", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const { id } = RowIdParams.parse(req.params);
      return sendResult(reply, await cancelMarketPost(ctx, nationId, id));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.get("/api/offers", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const query = OfferListQuery.parse(req.query ?? {});
      return sendResult(reply, await listOffers(ctx, nationId, query.status));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/offers", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const body = CreateOfferBody.parse(req.body);
      return sendResult(reply, await createOffer(ctx, { ...body, from_nation: nationId }), 201);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/offers/:id/accept", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const { id } = RowIdParams.parse(req.params);
      return sendResult(reply, await acceptOffer(ctx, id, nationId));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/offers/:id/cancel", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const { id } = RowIdParams.parse(req.params);
      return sendResult(reply, await cancelOffer(ctx, id, nationId));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/transport/estimate", async (req, reply) => {
    try {
      const nationId = actingNation(req);
      const body = TransportEstimateBody.parse(req.body);
      return sendResult(reply, await estimateTransportCost(ctx, { ...body, from_nation: nationId }));
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
