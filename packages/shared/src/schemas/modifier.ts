import { z } from "zod";
import { NonEmpty } from "./resources";

export const ModifierScope = z.enum(["global", "nation", "state", "province"]);
export type ModifierScope = z.infer<typeof ModifierScope>;

export const ModifierEffect = z.enum(["production", "population", "tax", "all"]);
export type ModifierEffect = z.infer<typeof ModifierEffect>;

export const ModifierKind = z.enum(["mul", "add"]);
export type ModifierKind = z.infer<typeof ModifierKind>;

/** Effects reported by the aggregator; `all` fans out to each of these. */
export const AggregatedEffects = ["production", "population", "tax"] as const;
export type AggregatedEffect = (typeof AggregatedEffects)[number];

export const ModifierInput = z
  .object({
    scope: ModifierScope,
    scope_id: NonEmpty.nullable().default(null),
    effect: ModifierEffect,
    kind: ModifierKind,
    value: z.number().finite(),
    source: z.string().max(200).default("admin"),
    expires_turn: z.number().int().min(0).nullable().default(null)
  })
  .strict()
  .refine((m) => (m.scope === "global" ? m.scope_id === null : m.scope_id !== null), {
    message: "scope_id is required for nation, state and province modifiers and forbidden for global ones",
    path: ["scope_id"]
  });
export type ModifierInput = z.infer<typeof ModifierInput>;
