import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, it, expect } from "vitest";
import { CatalogError, CatalogRegistry } from "./catalog";

const bundled = fileURLToPath(new URL("../../data/catalog.json", import.meta.url));

describe("CatalogRegistry", () => {
  it("loads the bundled catalog", () => {
    const catalog = CatalogRegistry.load(bundled);
    expect(catalog.version).toBe(1);
    expect(catalog.goods()).toHaveLength(17);
    expect(catalog.buildings()).toHaveLength(15);
    expect(catalog.units()).toHaveLength(6);
    expect(catalog.technologies()).toHaveLength(3);
    expect(catalog.rules.max_open_offers).toBe(3);
    expect(catalog.unit("expeditionary_corps")?.allowed_affiliations).toEqual(["Maritime League", "great_power"]);
  });

  it("rejects templates that name undeclared goods", () => {
    const raw = {
      version: 1,
      goods: [{ resource: "Coal" }],
      buildings: [{ building_id: "mint", name: "Mint", build_cost: { Unobtainium: 1 }, build_time_turns: 1 }]
    };
    expect(() => CatalogRegistry.fromData(raw)).toThrow(
      new CatalogError("Invalid economy catalog: buildings.0.build_cost.Unobtainium: Unknown resource Unobtainium")
    );
  });

  it("fills in defaults", () => {
    const catalog = CatalogRegistry.fromData({ version: 3, goods: [{ resource: "Coal" }] });
    expect(catalog.good("Coal")).toEqual({ resource: "Coal", category: "misc", weight_kg: 1 });
    expect(catalog.rules.default_stockpile_capacity).toBe(10000);
    expect(catalog.weightOf("Tin")).toBeUndefined();
  });
});

describe("CatalogRegistry.reload", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function tempCatalog(content: unknown): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-catalog-"));
    dirs.push(dir);
    const file = path.join(dir, "catalog.json");
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  }

  it("swaps in a valid file and keeps the old data on a bad one", () => {
    const file = tempCatalog({ version: 1, goods: [{ resource: "Coal" }] });
    const catalog = CatalogRegistry.load(file);

    fs.writeFileSync(file, JSON.stringify({ version: 2, goods: [{ resource: "Coal" }, { resource: "Iron", weight_kg: 2 }] }));
    expect(catalog.reload()).toEqual({ version: 2 });
    expect(catalog.weightOf("Iron")).toBe(2);

    fs.writeFileSync(file, "{ not json");
    expect(() => catalog.reload()).toThrow(CatalogError);
    expect(catalog.version).toBe(2);
  });

  it("cannot reload a catalog built from data", () => {
    const catalog = CatalogRegistry.fromData({ version: 1, goods: [{ resource: "Coal" }] });
    expect(() => catalog.reload()).toThrow("Catalog was not loaded from a file.");
  });
});
