import { z } from "zod";
import { CashAmount, NationId, NonEmpty, ProvinceId, Quantity, ResourceMap, ResourceName, RowId, StateId, TransportMode } from "./resources";

// HTTP request bodies. The acting nation always comes from the request headers.

export const StartBuildBody = z
  .object({
    state_id: StateId,
    building_id: NonEmpty,
    tier: z.number().int().min(1).default(1)
  })
  .strict();
export type StartBuildBody = z.infer<typeof StartBuildBody>;

export const DemolishBody = z
  .object({
    province_id: ProvinceId,
    building_id: NonEmpty,
    tier: z.number().int().min(1)
  })
  .strict();
export type DemolishBody = z.infer<typeof DemolishBody>;

export const MarketPostBody = z
  .object({
    resource: ResourceName,
    quantity: Quantity,
    price_per_unit: CashAmount,
    is_sell: z.boolean(),
    transport_mode: TransportMode.default("auto")
  })
  .strict();
export type MarketPostBody = z.infer<typeof MarketPostBody>;

export const CreateOfferBody = z
  .object({
    to_nation: NationId,
    offered: ResourceMap.default({}),
    requested: ResourceMap.default({}),
    offered_cash: CashAmount.default(0),
    requested_cash: CashAmount.default(0),
    transport_mode: TransportMode.default("auto")
  })
  .strict();
export type CreateOfferBody = z.infer<typeof CreateOfferBody>;

export const TransportEstimateBody = z
  .object({
    to_nation: NationId,
    offered: ResourceMap.default({}),
    requested: ResourceMap.default({}),
    transport_mode: TransportMode.default("auto")
  })
  .strict();
export type TransportEstimateBody = z.infer<typeof TransportEstimateBody>;

export const RecruitBody = z
  .object({
    unit_template_id: NonEmpty,
    quantity: z.number().int().min(1).max(1000),
    state_id: StateId,
    army_id: RowId.optional()
  })
  .strict();
export type RecruitBody = z.infer<typeof RecruitBody>;

export const RecruitEstimateQuery = z.object({
  unit_template_id: NonEmpty,
  quantity: z.coerce.number().int().min(1).max(1000).default(1)
});

export const CreateArmyBody = z
  .object({
    name: z.string().trim().min(1).max(80),
    state_id: StateId
  })
  .strict();
export type CreateArmyBody = z.infer<typeof CreateArmyBody>;

export const StartResearchBody = z.object({ tech_id: NonEmpty }).strict();
export type StartResearchBody = z.infer<typeof StartResearchBody>;

export const RowIdParams = z.object({ id: z.coerce.number().int().positive() });
