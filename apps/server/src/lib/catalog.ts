import fs from "node:fs";
import {
  EconomyCatalog,
  type BuildingTemplate,
  type EconomyRules,
  type Good,
  type Technology,
  type UnitTemplate
} from "@ledger/shared";
import { describeZodError } from "./errors";

type Indexed = {
  data: EconomyCatalog;
  goods: Map<string, Good>;
  buildings: Map<string, BuildingTemplate>;
  units: Map<string, UnitTemplate>;
  technologies: Map<string, Technology>;
};

function index(data: EconomyCatalog): Indexed {
  return {
    data,
    goods: new Map(data.goods.map((g) => [g.resource, g])),
    buildings: new Map(data.buildings.map((b) => [b.building_id, b])),
    units: new Map(data.units.map((u) => [u.unit_template_id, u])),
    technologies: new Map(data.technologies.map((t) => [t.tech_id, t]))
  };
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export function parseCatalog(raw: unknown): EconomyCatalog {
  const parsed = EconomyCatalog.safeParse(raw);
  if (!parsed.success) throw new CatalogError(`Invalid economy catalog: ${describeZodError(parsed.error)}`);
  return parsed.data;
}

export function readCatalogFile(filePath: string): EconomyCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`Cannot read economy catalog ${filePath}: ${message}`);
  }
  return parseCatalog(raw);
}

/**
 * Reference data the ledger runs against. Owned by whoever builds the
 * EconomyContext; `reload()` swaps the data in only once it has validated.
 */
export class CatalogRegistry {
  private current: Indexed;

  private constructor(data: EconomyCatalog, private readonly sourcePath: string | null) {
    this.current = index(data);
  }

  static load(filePath: string): CatalogRegistry {
    return new CatalogRegistry(readCatalogFile(filePath), filePath);
  }

  static fromData(raw: unknown): CatalogRegistry {
    return new CatalogRegistry(parseCatalog(raw), null);
  }

  reload(): { version: number } {
    if (!this.sourcePath) throw new CatalogError("Catalog was not loaded from a file.");
    this.current = index(readCatalogFile(this.sourcePath));
    return { version: this.current.data.version };
  }

  get version(): number {
    return this.current.data.version;
  }

  get rules(): EconomyRules {
    return this.current.data.rules;
  }

  goods(): Good[] {
    return this.current.data.goods;
  }

  good(resource: string): Good | undefined {
    return this.current.goods.get(resource);
  }

  weightOf(resource: string): number | undefined {
    return this.current.goods.get(resource)?.weight_kg;
  }

  building(buildingId: string): BuildingTemplate | undefined {
    return this.current.buildings.get(buildingId);
  }

  buildings(): BuildingTemplate[] {
    return this.current.data.buildings;
  }

  unit(unitTemplateId: string): UnitTemplate | undefined {
    return this.current.units.get(unitTemplateId);
  }

  units(): UnitTemplate[] {
    return this.current.data.units;
  }

  technology(techId: string): Technology | undefined {
    return this.current.technologies.get(techId);
  }

  technologies(): Technology[] {
    return this.current.data.technologies;
  }
}
