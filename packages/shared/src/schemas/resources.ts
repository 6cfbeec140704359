import { z } from "zod";

export const NonEmpty = z.string().min(1);
export const ResourceName = z.string().trim().min(1).max(64);
export const NationId = NonEmpty;
export const StateId = NonEmpty;
export const ProvinceId = NonEmpty;
export const RowId = z.number().int().positive();

/** A strictly positive amount of something. */
export const Quantity = z.number().finite().positive();
/** Cash amounts the caller supplies; zero is allowed, negatives never are. */
export const CashAmount = z.number().finite().min(0);

export const ResourceMap = z.record(ResourceName, z.number().finite().min(0));
export type ResourceMap = z.infer<typeof ResourceMap>;

export const TransportModes = ["land", "rail", "sea", "auto"] as const;
export const TransportMode = z.enum(TransportModes);
export type TransportMode = z.infer<typeof TransportMode>;
