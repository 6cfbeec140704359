import type {
  ArmyRow,
  BuildStatus,
  EconomyEffect,
  InstalledBuilding,
  MarketPost,
  Modifier,
  NationRow,
  OfferStatus,
  PendingBuild,
  ProvinceRow,
  RecruitRow,
  RecruitStatus,
  ResearchProject,
  ResearchStatus,
  ReservationRow,
  StockpileEntry,
  TradeOffer,
  TradeRecord
} from "@ledger/engine";

export type NationPatch = Partial<Pick<NationRow, "cash" | "debt" | "manpower_used">>;

export type StoredEffect = EconomyEffect & { event_id: number };

/**
 * Typed row access inside one ledger transaction.
 *
 * The single-row getters (`getNation`, `getStockpile`, `getBuild`, `getOffer`,
 * `getMarketPost`, `getRecruit`) lock the row until the transaction ends, so a
 * value read through them can be re-validated and written back safely.
 */
export type LedgerTx = {
  /** Runs `fn` so that a throw rolls back only its own writes. */
  savepoint<T>(fn: () => Promise<T>): Promise<T>;

  getCurrentTurn(): Promise<number>;
  setCurrentTurn(turn: number): Promise<void>;

  getNation(nationId: string): Promise<NationRow | null>;
  listNations(): Promise<NationRow[]>;
  updateNation(nationId: string, patch: NationPatch): Promise<void>;
  listNationTechs(nationId: string): Promise<string[]>;
  addNationTech(nationId: string, techId: string, turn: number): Promise<void>;

  getProvince(provinceId: string): Promise<ProvinceRow | null>;
  listProvinces(filter?: { nation_id?: string; state_id?: string }): Promise<ProvinceRow[]>;

  getStockpile(provinceId: string, resource: string): Promise<StockpileEntry | null>;
  listStockpiles(filter?: { province_ids?: string[]; resource?: string }): Promise<StockpileEntry[]>;
  putStockpile(entry: StockpileEntry): Promise<void>;

  sumReserved(provinceId: string, resource: string): Promise<number>;
  listReservations(filter?: { build_id?: number; province_ids?: string[] }): Promise<ReservationRow[]>;
  insertReservation(row: ReservationRow): Promise<void>;
  deleteReservations(buildId: number): Promise<number>;

  insertBuild(row: Omit<PendingBuild, "build_id">): Promise<PendingBuild>;
  getBuild(buildId: number): Promise<PendingBuild | null>;
  updateBuild(buildId: number, patch: Partial<Pick<PendingBuild, "status" | "province_id">>): Promise<void>;
  listBuilds(filter?: { nation_id?: string; status?: BuildStatus; due_by?: number }): Promise<PendingBuild[]>;

  getInstalled(provinceId: string, buildingId: string, tier: number): Promise<InstalledBuilding | null>;
  putInstalled(row: InstalledBuilding): Promise<void>;
  deleteInstalled(provinceId: string, buildingId: string, tier: number): Promise<void>;
  listInstalled(filter?: { province_ids?: string[] }): Promise<InstalledBuilding[]>;

  insertMarketPost(row: Omit<MarketPost, "post_id">): Promise<MarketPost>;
  getMarketPost(postId: number): Promise<MarketPost | null>;
  deleteMarketPost(postId: number): Promise<void>;
  listMarketPosts(filter?: { resource?: string; poster_nation?: string }): Promise<MarketPost[]>;

  insertOffer(row: Omit<TradeOffer, "offer_id">): Promise<TradeOffer>;
  getOffer(offerId: number): Promise<TradeOffer | null>;
  setOfferStatus(offerId: number, status: OfferStatus): Promise<void>;
  listOffers(filter?: { nation_id?: string; status?: OfferStatus }): Promise<TradeOffer[]>;
  /** Open direct offers sent by a nation; market-derived offers are not counted. */
  countOpenDirectOffers(fromNation: string): Promise<number>;
  insertTrade(row: Omit<TradeRecord, "trade_id">): Promise<TradeRecord>;

  insertModifier(row: Omit<Modifier, "modifier_id">): Promise<Modifier>;
  deleteModifier(modifierId: number): Promise<boolean>;
  listModifiers(filter?: { active_only?: boolean }): Promise<Modifier[]>;
  /** Deactivates active modifiers whose expiry turn is before `turn`; returns them. */
  expireModifiers(turn: number): Promise<Modifier[]>;

  insertRecruits(rows: Array<Omit<RecruitRow, "recruit_id">>): Promise<RecruitRow[]>;
  getRecruit(recruitId: number): Promise<RecruitRow | null>;
  deleteRecruit(recruitId: number): Promise<void>;
  setRecruitStatus(recruitId: number, status: RecruitStatus): Promise<void>;
  listRecruits(filter?: { nation_id?: string; state_id?: string; status?: RecruitStatus; ready_by?: number }): Promise<RecruitRow[]>;

  insertArmy(row: Omit<ArmyRow, "army_id">): Promise<ArmyRow>;
  getArmy(armyId: number): Promise<ArmyRow | null>;
  listArmies(nationId: string): Promise<ArmyRow[]>;

  insertResearch(row: Omit<ResearchProject, "project_id">): Promise<ResearchProject>;
  setResearchStatus(projectId: number, status: ResearchStatus): Promise<void>;
  listResearch(filter?: { nation_id?: string; status?: ResearchStatus; due_by?: number }): Promise<ResearchProject[]>;

  appendEffects(effects: EconomyEffect[]): Promise<void>;
  listEffects(filter?: { nation_id?: string; turn?: number; limit?: number }): Promise<StoredEffect[]>;
};

export type LedgerStore = {
  /**
   * Runs `fn` in one write-isolated transaction. Everything `fn` wrote is
   * rolled back if it throws; the error is rethrown unchanged.
   */
  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T>;
  close(): Promise<void>;
};
