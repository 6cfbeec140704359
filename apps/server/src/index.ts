import { buildApp } from "./app";
import { loadEnv, resolveCatalogPath } from "./config";
import { createPool } from "./db";
import { PgLedgerStore } from "./db/pgLedgerStore";
import { CatalogRegistry } from "./lib/catalog";
import { createLogger } from "./lib/logger";

const env = loadEnv();
const log = createLogger(env.LOG_LEVEL);
const catalog = CatalogRegistry.load(resolveCatalogPath(env));
const store = new PgLedgerStore(createPool(env.DATABASE_URL));

const app = await buildApp({ store, catalog, log }, { adminToken: env.ADMIN_TOKEN ?? null });

app.log.info(
  { catalogVersion: catalog.version, goods: catalog.goods().length, buildings: catalog.buildings().length, admin: Boolean(env.ADMIN_TOKEN) },
  "Economy catalog loaded"
);

app.addHook("onClose", async () => {
  await store.close();
});

app.listen({ port: env.PORT, host: "0.0.0.0" })
  .then((a) => app.log.info(`Server listening at ${a}`))
  .catch((e) => {
    app.log.error(e);
    process.exit(1);
  });
