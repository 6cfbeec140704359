import type { ModifierEffect, ModifierKind, ModifierScope, ResourceMap, TransportMode } from "@ledger/shared";

export type NationId = string;
export type StateId = string;
export type ProvinceId = string;
export type ResourceName = string;

export type NationRow = {
  nation_id: NationId;
  name: string;
  cash: number;
  debt: number;
  tax_rate: number;
  manpower_used: number;
  affiliation: string | null;
  tags: string[];
};

export type ProvinceRow = {
  province_id: ProvinceId;
  state_id: StateId;
  nation_id: NationId | null;
  population: number;
  node_strength: number;
  x: number;
  y: number;
};

/** `capacity === null` marks an uncapped stockpile. */
export type StockpileEntry = {
  province_id: ProvinceId;
  resource: ResourceName;
  amount: number;
  capacity: number | null;
};

export type ReservationRow = {
  build_id: number;
  province_id: ProvinceId;
  resource: ResourceName;
  amount: number;
};

export type BuildStatus = "pending" | "completed" | "failed" | "cancelled";

export type PendingBuild = {
  build_id: number;
  nation_id: NationId;
  state_id: StateId;
  building_id: string;
  tier: number;
  cash_paid: number;
  started_turn: number;
  complete_turn: number;
  status: BuildStatus;
  province_id: ProvinceId | null;
};

export type InstalledBuilding = {
  province_id: ProvinceId;
  building_id: string;
  tier: number;
  count: number;
};

export type MarketPost = {
  post_id: number;
  poster_nation: NationId;
  resource: ResourceName;
  quantity: number;
  price_per_unit: number;
  is_sell: boolean;
  transport_mode: TransportMode;
  escrow_cash: number;
  created_turn: number;
};

export type OfferStatus = "open" | "completed" | "cancelled" | "failed";

export type TradeOffer = {
  offer_id: number;
  from_nation: NationId;
  to_nation: NationId;
  offered: ResourceMap;
  requested: ResourceMap;
  offered_cash: number;
  requested_cash: number;
  status: OfferStatus;
  transport_mode: TransportMode;
  created_turn: number;
  /** Market-derived offers do not count against the open-offer cap. */
  from_market: boolean;
};

export type TradeRecord = {
  trade_id: number;
  offer_id: number;
  from_nation: NationId;
  to_nation: NationId;
  offered: ResourceMap;
  requested: ResourceMap;
  offered_cash: number;
  requested_cash: number;
  transport_cost: number;
  turn: number;
};

export type Modifier = {
  modifier_id: number;
  scope: ModifierScope;
  scope_id: string | null;
  effect: ModifierEffect;
  kind: ModifierKind;
  value: number;
  source: string;
  created_turn: number;
  expires_turn: number | null;
  active: boolean;
};

export type RecruitStatus = "queued" | "active";

export type RecruitRow = {
  recruit_id: number;
  nation_id: NationId;
  army_id: number | null;
  state_id: StateId;
  province_id: ProvinceId | null;
  unit_template_id: string;
  manpower: number;
  created_turn: number;
  ready_turn: number;
  status: RecruitStatus;
};

export type ArmyRow = {
  army_id: number;
  nation_id: NationId;
  name: string;
  state_id: StateId;
  created_turn: number;
};

export type ResearchStatus = "in_progress" | "completed";

export type ResearchProject = {
  project_id: number;
  nation_id: NationId;
  tech_id: string;
  started_turn: number;
  complete_turn: number;
  status: ResearchStatus;
};

export type EconomyEffectType =
  | "build_completed"
  | "build_failed"
  | "production"
  | "maintenance"
  | "research_completed"
  | "recruit_ready"
  | "modifier_expired";

/** One line of the turn's audit trail. */
export type EconomyEffect = {
  effect_type: EconomyEffectType;
  nation_id: NationId | null;
  turn: number;
  delta: Record<string, unknown>;
  audit: { reason: string };
};
