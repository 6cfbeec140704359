import type { LedgerStore } from "../db/ledgerStore";
import type { CatalogRegistry } from "./catalog";
import type { Logger } from "./logger";

export type EconomyContext = {
  store: LedgerStore;
  catalog: CatalogRegistry;
  log: Logger;
};
