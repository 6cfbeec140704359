import type { z } from "zod";
import { CreateOfferBody, MarketPostBody, ResourceMap, TransportEstimateBody, type TransportMode } from "@ledger/shared";
import {
  compactMap,
  computeTransportCost,
  hubDistance,
  shipmentWeight,
  tidy,
  type MarketPost,
  type NationRow,
  type OfferStatus,
  type TradeOffer,
  type TradeRecord,
  type TransportQuote
} from "@ledger/engine";
import type { LedgerTx } from "../db/ledgerStore";
import type { EconomyContext } from "./context";
import { fail, toFailure, type Result } from "./errors";
import { creditCash, debitCash, parseInput, requireNation, runLedgerOperation } from "./operation";
import { creditNation, drawFromNation, nationAvailable } from "./stockpile";

function requireGoods(ctx: EconomyContext, map: ResourceMap): void {
  for (const resource of Object.keys(map)) {
    if (!ctx.catalog.good(resource)) fail("NotFound", `Unknown resource ${resource}.`);
  }
}

async function quoteIn(
  ctx: EconomyContext,
  tx: LedgerTx,
  fromNation: string,
  toNation: string,
  offered: ResourceMap,
  requested: ResourceMap,
  mode: TransportMode
): Promise<TransportQuote> {
  const [fromHub] = await tx.listProvinces({ nation_id: fromNation });
  const [toHub] = await tx.listProvinces({ nation_id: toNation });
  const weight = shipmentWeight(offered, requested, (r) => ctx.catalog.weightOf(r));
  return computeTransportCost(weight, hubDistance(fromHub ?? null, toHub ?? null), mode, ctx.catalog.rules);
}

// --- market ---

export type MarketPostInput = z.input<typeof MarketPostBody> & { nation_id: string };

/** Sell posts must be covered by unreserved stock; buy posts escrow price × quantity up front. */
export async function postMarket(ctx: EconomyContext, input: MarketPostInput): Promise<Result<MarketPost>> {
  return runLedgerOperation(ctx, "postMarket", async (tx) => {
    const body = parseInput(MarketPostBody, {
      resource: input.resource,
      quantity: input.quantity,
      price_per_unit: input.price_per_unit,
      is_sell: input.is_sell,
      transport_mode: input.transport_mode
    });
    if (!ctx.catalog.good(body.resource)) fail("NotFound", `Unknown resource ${body.resource}.`);
    const nation = await requireNation(tx, input.nation_id);

    let escrow = 0;
    if (body.is_sell) {
      const have = await nationAvailable(tx, nation.nation_id, body.resource);
      if (have + 1e-9 < body.quantity) {
        fail("InsufficientResource", `Only ${have} ${body.resource} available to sell.`, {
          resource: body.resource,
          shortfall: tidy(body.quantity - have)
        });
      }
    } else {
      escrow = body.price_per_unit * body.quantity;
      await debitCash(tx, nation, escrow);
    }

    return tx.insertMarketPost({
      poster_nation: nation.nation_id,
      resource: body.resource,
      quantity: body.quantity,
      price_per_unit: body.price_per_unit,
      is_sell: body.is_sell,
      transport_mode: body.transport_mode,
      escrow_cash: escrow,
      created_turn: await tx.getCurrentTurn()
    });
  });
}

export async function listMarketPosts(ctx: EconomyContext, resource?: string): Promise<Result<MarketPost[]>> {
  return runLedgerOperation(ctx, "listMarketPosts", (tx) => tx.listMarketPosts({ resource }));
}

export async function cancelMarketPost(
  ctx: EconomyContext,
  nationId: string,
  postId: number
): Promise<Result<{ post_id: number; refunded: number }>> {
  return runLedgerOperation(ctx, "cancelMarketPost", async (tx) => {
    const post = await tx.getMarketPost(postId);
    if (!post) fail("NotFound", `Market post ${postId} not found.`);
    if (post.poster_nation !== nationId) fail("Unauthorized", `Market post ${postId} belongs to another nation.`);
    await tx.deleteMarketPost(postId);
    if (post.escrow_cash > 0) await creditCash(tx, await requireNation(tx, nationId), post.escrow_cash);
    return { post_id: postId, refunded: post.escrow_cash };
  });
}

/**
 * Turns a post into an open offer that the other side settles with acceptOffer.
 * On a sell post the accepter is the buyer and pays into escrow now; on a buy
 * post the poster's escrow moves onto the offer.
 */
export async function acceptMarketPost(ctx: EconomyContext, accepterId: string, postId: number): Promise<Result<TradeOffer>> {
  return runLedgerOperation(ctx, "acceptMarketPost", async (tx) => {
    const post = await tx.getMarketPost(postId);
    if (!post) fail("NotFound", `Market post ${postId} not found.`);
    if (post.poster_nation === accepterId) fail("InvalidState", "A nation cannot accept its own market post.");
    const accepter = await requireNation(tx, accepterId);
    await requireNation(tx, post.poster_nation);

    await tx.deleteMarketPost(postId);
    const turn = await tx.getCurrentTurn();
    const common: Omit<TradeOffer, "offer_id" | "from_nation" | "to_nation" | "offered_cash"> = {
      offered: {},
      requested: { [post.resource]: post.quantity },
      requested_cash: 0,
      status: "open",
      transport_mode: post.transport_mode,
      created_turn: turn,
      from_market: true
    };

    if (post.is_sell) {
      const total = post.price_per_unit * post.quantity;
      await debitCash(tx, accepter, total);
      return tx.insertOffer({ ...common, from_nation: accepter.nation_id, to_nation: post.poster_nation, offered_cash: total });
    }
    return tx.insertOffer({ ...common, from_nation: post.poster_nation, to_nation: accepter.nation_id, offered_cash: post.escrow_cash });
  });
}

// --- direct offers ---

export type CreateOfferInput = z.input<typeof CreateOfferBody> & { from_nation: string };

export async function createOffer(ctx: EconomyContext, input: CreateOfferInput): Promise<Result<TradeOffer>> {
  return runLedgerOperation(ctx, "createOffer", async (tx) => {
    const body = parseInput(CreateOfferBody, {
      to_nation: input.to_nation,
      offered: input.offered,
      requested: input.requested,
      offered_cash: input.offered_cash,
      requested_cash: input.requested_cash,
      transport_mode: input.transport_mode
    });
    const offered = compactMap(body.offered);
    const requested = compactMap(body.requested);
    if (input.from_nation === body.to_nation) fail("InvalidState", "A nation cannot trade with itself.");
    if (!Object.keys(offered).length && !Object.keys(requested).length && body.offered_cash === 0 && body.requested_cash === 0) {
      fail("InvalidState", "An offer must move something.");
    }
    requireGoods(ctx, offered);
    requireGoods(ctx, requested);

    const creator = await requireNation(tx, input.from_nation);
    await requireNation(tx, body.to_nation);

    const open = await tx.countOpenDirectOffers(creator.nation_id);
    const cap = ctx.catalog.rules.max_open_offers;
    if (open >= cap) fail("AdmissionLimitExceeded", `Nation ${creator.nation_id} already has ${open} open offers (limit ${cap}).`);

    await debitCash(tx, creator, body.offered_cash);
    return tx.insertOffer({
      from_nation: creator.nation_id,
      to_nation: body.to_nation,
      offered,
      requested,
      offered_cash: body.offered_cash,
      requested_cash: body.requested_cash,
      status: "open",
      transport_mode: body.transport_mode,
      created_turn: await tx.getCurrentTurn(),
      from_market: false
    });
  });
}

export type Settlement = {
  offer_id: number;
  trade: TradeRecord;
  transport: TransportQuote;
  /** Cash the accepter received: offered cash less transport, never below 0. */
  payout: number;
  /** Goods that found no stockpile room on the receiving side, per nation. */
  overflow: Record<string, ResourceMap>;
};

/**
 * Settles an open offer. Once the offer has been validated as open and
 * addressed to the accepter, any failure refunds the creator's escrow and marks
 * the offer failed in a separate transaction.
 */
export async function acceptOffer(ctx: EconomyContext, offerId: number, accepterId: string): Promise<Result<Settlement>> {
  const progress = { validated: false };
  try {
    const value = await ctx.store.transaction(async (tx) => {
      const offer = await tx.getOffer(offerId);
      if (!offer) fail("NotFound", `Offer ${offerId} not found.`);
      if (offer.to_nation !== accepterId) fail("Unauthorized", `Offer ${offerId} is not addressed to ${accepterId}.`);
      if (offer.status !== "open") fail("InvalidState", `Offer ${offerId} is already ${offer.status}.`);
      progress.validated = true;

      // Lock both treasuries in a fixed order.
      const nations = new Map<string, NationRow>();
      for (const id of [offer.from_nation, offer.to_nation].sort()) nations.set(id, await requireNation(tx, id));
      const creator = nations.get(offer.from_nation);
      const accepter = nations.get(offer.to_nation);
      if (!creator || !accepter) fail("NotFound", `Offer ${offerId} references a missing nation.`);

      const transport = await quoteIn(ctx, tx, offer.from_nation, offer.to_nation, offer.offered, offer.requested, offer.transport_mode);

      await debitCash(tx, accepter, offer.requested_cash);
      await drawFromNation(tx, accepter.nation_id, offer.requested, { kind: "nation" });
      await drawFromNation(tx, creator.nation_id, offer.offered, { kind: "nation" });

      const overflow: Record<string, ResourceMap> = {};
      const deliver = async (nationId: string, goods: ResourceMap) => {
        for (const [resource, qty] of Object.entries(goods)) {
          const { overflow: lost } = await creditNation(tx, ctx.catalog.rules, nationId, resource, qty);
          if (lost > 0) overflow[nationId] = { ...overflow[nationId], [resource]: lost };
        }
      };
      await deliver(creator.nation_id, offer.requested);
      await deliver(accepter.nation_id, offer.offered);

      const payout = Math.max(0, offer.offered_cash - transport.cost);
      await creditCash(tx, accepter, payout);
      await creditCash(tx, creator, offer.requested_cash);
      await tx.setOfferStatus(offerId, "completed");

      const turn = await tx.getCurrentTurn();
      const trade = await tx.insertTrade({
        offer_id: offerId,
        from_nation: offer.from_nation,
        to_nation: offer.to_nation,
        offered: offer.offered,
        requested: offer.requested,
        offered_cash: offer.offered_cash,
        requested_cash: offer.requested_cash,
        transport_cost: transport.cost,
        turn
      });
      return { offer_id: offerId, trade, transport, payout, overflow };
    });
    return { ok: true, value };
  } catch (err) {
    const failure = toFailure(ctx.log, "acceptOffer", err);
    if (progress.validated) await compensateFailedOffer(ctx, offerId);
    return failure;
  }
}

const COMPENSATION_ATTEMPTS = 3;

/** Refunds the escrow and marks the offer failed; a no-op once the offer is terminal. */
export async function compensateFailedOffer(ctx: EconomyContext, offerId: number): Promise<boolean> {
  for (let attempt = 1; attempt <= COMPENSATION_ATTEMPTS; attempt++) {
    try {
      return await ctx.store.transaction(async (tx) => {
        const offer = await tx.getOffer(offerId);
        if (!offer || offer.status !== "open") return false;
        const creator = await tx.getNation(offer.from_nation);
        if (creator) await creditCash(tx, creator, offer.offered_cash);
        await tx.setOfferStatus(offerId, "failed");
        ctx.log.info({ offer_id: offerId, refunded: offer.offered_cash }, "offer failed; escrow refunded");
        return true;
      });
    } catch (err) {
      ctx.log.error({ err, offer_id: offerId, attempt }, "escrow refund failed");
    }
  }
  return false;
}

export async function cancelOffer(
  ctx: EconomyContext,
  offerId: number,
  nationId: string
): Promise<Result<{ offer_id: number; refunded: number }>> {
  return runLedgerOperation(ctx, "cancelOffer", async (tx) => {
    const offer = await tx.getOffer(offerId);
    if (!offer) fail("NotFound", `Offer ${offerId} not found.`);
    if (offer.from_nation !== nationId) fail("Unauthorized", `Only ${offer.from_nation} can cancel offer ${offerId}.`);
    if (offer.status !== "open") fail("InvalidState", `Offer ${offerId} is already ${offer.status}.`);

    await creditCash(tx, await requireNation(tx, nationId), offer.offered_cash);
    await tx.setOfferStatus(offerId, "cancelled");
    return { offer_id: offerId, refunded: offer.offered_cash };
  });
}

export async function listOffers(ctx: EconomyContext, nationId: string, status?: OfferStatus): Promise<Result<TradeOffer[]>> {
  return runLedgerOperation(ctx, "listOffers", (tx) => tx.listOffers({ nation_id: nationId, status }));
}

export type TransportEstimateInput = z.input<typeof TransportEstimateBody> & { from_nation: string };

export async function estimateTransportCost(ctx: EconomyContext, input: TransportEstimateInput): Promise<Result<TransportQuote>> {
  return runLedgerOperation(ctx, "estimateTransportCost", async (tx) => {
    const body = parseInput(TransportEstimateBody, {
      to_nation: input.to_nation,
      offered: input.offered,
      requested: input.requested,
      transport_mode: input.transport_mode
    });
    await requireNation(tx, input.from_nation);
    await requireNation(tx, body.to_nation);
    return quoteIn(ctx, tx, input.from_nation, body.to_nation, body.offered, body.requested, body.transport_mode);
  });
}
