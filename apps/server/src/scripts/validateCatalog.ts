import { resolveCatalogPath } from "../config";
import { readCatalogFile } from "../lib/catalog";
import { createLogger } from "../lib/logger";

const log = createLogger("info");
const filePath = resolveCatalogPath({ CATALOG_PATH: process.argv[2] ?? process.env.CATALOG_PATH });

try {
  const catalog = readCatalogFile(filePath);
  log.info(
    {
      file: filePath,
      version: catalog.version,
      goods: catalog.goods.length,
      buildings: catalog.buildings.length,
      units: catalog.units.length,
      technologies: catalog.technologies.length
    },
    "catalog ok"
  );
} catch (err) {
  log.error({ file: filePath, err }, "catalog invalid");
  process.exitCode = 1;
}
