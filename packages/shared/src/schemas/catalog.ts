import { z } from "zod";
import { NonEmpty, ResourceMap, ResourceName, TransportMode } from "./resources";

/**
 * Reference data for the economy: tradable goods, building and unit templates,
 * technologies and the numeric rules the engine runs with.
 *
 * Templates are immutable once loaded. Every resource named anywhere in a
 * template must be declared in `goods`.
 */

export const Good = z
  .object({
    resource: ResourceName,
    category: NonEmpty.default("misc"),
    weight_kg: z.number().finite().min(0).default(1)
  })
  .strict();
export type Good = z.infer<typeof Good>;

export const BuildingTemplate = z
  .object({
    building_id: NonEmpty,
    name: NonEmpty,
    build_cost: ResourceMap.default({}),
    cash_cost: z.number().finite().min(0).default(0),
    build_time_turns: z.number().int().min(0),
    max_tier: z.number().int().min(1).default(1),
    inputs: ResourceMap.default({}),
    outputs: ResourceMap.default({}),
    maintenance_cash: z.number().finite().min(0).default(0),
    maintenance_manpower: z.number().int().min(0).default(0),
    tech_required: NonEmpty.optional()
  })
  .strict();
export type BuildingTemplate = z.infer<typeof BuildingTemplate>;

export const UnitCategory = z.enum(["land", "naval", "air", "support"]);

export const UnitTemplate = z
  .object({
    unit_template_id: NonEmpty,
    name: NonEmpty,
    category: UnitCategory.default("land"),
    manpower_cost: z.number().int().min(0),
    cash_cost: z.number().finite().min(0).default(0),
    resources: ResourceMap.default({}),
    training_turns: z.number().int().min(0).default(0),
    tech_required: NonEmpty.optional(),
    allowed_affiliations: z.array(NonEmpty).default([])
  })
  .strict();
export type UnitTemplate = z.infer<typeof UnitTemplate>;

export const Technology = z
  .object({
    tech_id: NonEmpty,
    name: NonEmpty,
    cash_cost: z.number().finite().min(0).default(0),
    resources: ResourceMap.default({}),
    research_time_turns: z.number().int().min(0).default(1),
    prerequisites: z.array(NonEmpty).default([])
  })
  .strict();
export type Technology = z.infer<typeof Technology>;

export const EconomyRules = z
  .object({
    manpower_ratio: z.number().min(0).max(1).default(0.4),
    max_open_offers: z.number().int().min(1).default(3),
    transport_base_rate_per_kg_km: z.number().min(0).default(0.00008),
    mode_factors: z
      .record(TransportMode, z.number().min(0))
      .default({ land: 1.0, rail: 0.7, sea: 0.4, auto: 1.0 }),
    default_stockpile_capacity: z.number().min(0).default(10000)
  })
  .strict();
export type EconomyRules = z.infer<typeof EconomyRules>;

export const EconomyCatalog = z
  .object({
    version: z.number().int().min(1),
    goods: z.array(Good).min(1),
    buildings: z.array(BuildingTemplate).default([]),
    units: z.array(UnitTemplate).default([]),
    technologies: z.array(Technology).default([]),
    rules: EconomyRules.default({})
  })
  .strict()
  .superRefine((cat, ctx) => {
    const goods = new Set<string>();
    cat.goods.forEach((g, i) => {
      if (goods.has(g.resource)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["goods", i, "resource"], message: `Duplicate good ${g.resource}` });
      }
      goods.add(g.resource);
    });
    const techs = new Set(cat.technologies.map((t) => t.tech_id));

    const checkMap = (map: ResourceMap, path: (string | number)[]) => {
      for (const resource of Object.keys(map)) {
        if (!goods.has(resource)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...path, resource], message: `Unknown resource ${resource}` });
        }
      }
    };
    const checkTech = (tech: string | undefined, path: (string | number)[]) => {
      if (tech && !techs.has(tech)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `Unknown technology ${tech}` });
      }
    };
    const checkUnique = (ids: string[], key: string) => {
      const seen = new Set<string>();
      ids.forEach((id, i) => {
        if (seen.has(id)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key, i], message: `Duplicate id ${id}` });
        seen.add(id);
      });
    };

    checkUnique(cat.buildings.map((b) => b.building_id), "buildings");
    checkUnique(cat.units.map((u) => u.unit_template_id), "units");
    checkUnique(cat.technologies.map((t) => t.tech_id), "technologies");

    cat.buildings.forEach((b, i) => {
      checkMap(b.build_cost, ["buildings", i, "build_cost"]);
      checkMap(b.inputs, ["buildings", i, "inputs"]);
      checkMap(b.outputs, ["buildings", i, "outputs"]);
      checkTech(b.tech_required, ["buildings", i, "tech_required"]);
    });
    cat.units.forEach((u, i) => {
      checkMap(u.resources, ["units", i, "resources"]);
      checkTech(u.tech_required, ["units", i, "tech_required"]);
    });
    cat.technologies.forEach((t, i) => {
      checkMap(t.resources, ["technologies", i, "resources"]);
      t.prerequisites.forEach((p, j) => checkTech(p, ["technologies", i, "prerequisites", j]));
    });
  });
export type EconomyCatalog = z.infer<typeof EconomyCatalog>;
