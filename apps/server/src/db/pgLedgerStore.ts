import type pg from "pg";
import { z } from "zod";
import { ResourceMap } from "@ledger/shared";
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
import { withClient } from "./index";
import type { LedgerStore, LedgerTx, NationPatch, StoredEffect } from "./ledgerStore";

const NATION_COLS = "nation_id, name, cash, debt, tax_rate, manpower_used, affiliation, tags";
const PROVINCE_COLS = "province_id, state_id, nation_id, population, node_strength, x, y";
const BUILD_COLS = "build_id, nation_id, state_id, building_id, tier, cash_paid, started_turn, complete_turn, status, province_id";
const POST_COLS = "post_id, poster_nation, resource, quantity, price_per_unit, is_sell, transport_mode, escrow_cash, created_turn";
const OFFER_COLS =
  "offer_id, from_nation, to_nation, offered, requested, offered_cash, requested_cash, status, transport_mode, created_turn, from_market";
const MODIFIER_COLS = "modifier_id, scope, scope_id, effect, kind, value, source, created_turn, expires_turn, active";
const RECRUIT_COLS = "recruit_id, nation_id, army_id, state_id, province_id, unit_template_id, manpower, created_turn, ready_turn, status";
const RESEARCH_COLS = "project_id, nation_id, tech_id, started_turn, complete_turn, status";

type OfferRowRaw = Omit<TradeOffer, "offered" | "requested"> & { offered: unknown; requested: unknown };
type TradeRowRaw = Omit<TradeRecord, "offered" | "requested"> & { offered: unknown; requested: unknown };

const EffectDelta = z.record(z.unknown());
const EffectAudit = z.object({ reason: z.string() });

function toOffer(row: OfferRowRaw): TradeOffer {
  return { ...row, offered: ResourceMap.parse(row.offered), requested: ResourceMap.parse(row.requested) };
}

/** Builds a `WHERE` clause from optional equality filters. */
class Where {
  readonly params: unknown[] = [];
  private readonly parts: string[] = [];

  eq(column: string, value: unknown): this {
    if (value === undefined) return this;
    this.params.push(value);
    this.parts.push(`${column} = $${this.params.length}`);
    return this;
  }

  anyOf(column: string, values: unknown[] | undefined): this {
    if (values === undefined) return this;
    this.params.push(values);
    this.parts.push(`${column} = ANY($${this.params.length})`);
    return this;
  }

  cmp(column: string, op: "<=" | "<", value: number | undefined): this {
    if (value === undefined) return this;
    this.params.push(value);
    this.parts.push(`${column} ${op} $${this.params.length}`);
    return this;
  }

  raw(sql: string): this {
    this.parts.push(sql);
    return this;
  }

  toString(): string {
    return this.parts.length ? `WHERE ${this.parts.join(" AND ")}` : "";
  }
}

class PgLedgerTx implements LedgerTx {
  private savepoints = 0;

  constructor(private readonly c: pg.PoolClient) {}

  async savepoint<T>(fn: () => Promise<T>): Promise<T> {
    const name = `sp_${++this.savepoints}`;
    await this.c.query(`SAVEPOINT ${name}`);
    try {
      const out = await fn();
      await this.c.query(`RELEASE SAVEPOINT ${name}`);
      return out;
    } catch (e) {
      await this.c.query(`ROLLBACK TO SAVEPOINT ${name}`);
      throw e;
    }
  }

  async getCurrentTurn(): Promise<number> {
    const { rows } = await this.c.query<{ value: string }>("SELECT value FROM ledger_config WHERE key = 'current_turn'");
    const row = rows[0];
    return row ? Number.parseInt(row.value, 10) : 0;
  }

  async setCurrentTurn(turn: number): Promise<void> {
    await this.c.query(
      `INSERT INTO ledger_config (key, value) VALUES ('current_turn', $1)
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
      [String(turn)]
    );
  }

  async getNation(nationId: string): Promise<NationRow | null> {
    const { rows } = await this.c.query<NationRow>(`SELECT ${NATION_COLS} FROM nations WHERE nation_id = $1 FOR UPDATE`, [nationId]);
    return rows[0] ?? null;
  }

  async listNations(): Promise<NationRow[]> {
    const { rows } = await this.c.query<NationRow>(`SELECT ${NATION_COLS} FROM nations ORDER BY nation_id`);
    return rows;
  }

  async updateNation(nationId: string, patch: NationPatch): Promise<void> {
    const w = new Where();
    const sets: string[] = [];
    for (const key of ["cash", "debt", "manpower_used"] as const) {
      const value = patch[key];
      if (value === undefined) continue;
      w.params.push(value);
      sets.push(`${key} = $${w.params.length}`);
    }
    if (!sets.length) return;
    w.params.push(nationId);
    await this.c.query(`UPDATE nations SET ${sets.join(", ")} WHERE nation_id = $${w.params.length}`, w.params);
  }

  async listNationTechs(nationId: string): Promise<string[]> {
    const { rows } = await this.c.query<{ tech_id: string }>(
      "SELECT tech_id FROM nation_techs WHERE nation_id = $1 ORDER BY tech_id",
      [nationId]
    );
    return rows.map((r) => r.tech_id);
  }

  async addNationTech(nationId: string, techId: string, turn: number): Promise<void> {
    await this.c.query(
      "INSERT INTO nation_techs (nation_id, tech_id, acquired_turn) VALUES ($1, $2, $3) ON CONFLICT DO NOTHING",
      [nationId, techId, turn]
    );
  }

  async getProvince(provinceId: string): Promise<ProvinceRow | null> {
    const { rows } = await this.c.query<ProvinceRow>(`SELECT ${PROVINCE_COLS} FROM provinces WHERE province_id = $1`, [provinceId]);
    return rows[0] ?? null;
  }

  async listProvinces(filter: { nation_id?: string; state_id?: string } = {}): Promise<ProvinceRow[]> {
    const w = new Where().eq("nation_id", filter.nation_id).eq("state_id", filter.state_id);
    const { rows } = await this.c.query<ProvinceRow>(
      `SELECT ${PROVINCE_COLS} FROM provinces ${w} ORDER BY node_strength DESC, province_id ASC`,
      w.params
    );
    return rows;
  }

  async getStockpile(provinceId: string, resource: string): Promise<StockpileEntry | null> {
    const { rows } = await this.c.query<StockpileEntry>(
      "SELECT province_id, resource, amount, capacity FROM province_stockpiles WHERE province_id = $1 AND resource = $2 FOR UPDATE",
      [provinceId, resource]
    );
    return rows[0] ?? null;
  }

  async listStockpiles(filter: { province_ids?: string[]; resource?: string } = {}): Promise<StockpileEntry[]> {
    const w = new Where().anyOf("province_id", filter.province_ids).eq("resource", filter.resource);
    const { rows } = await this.c.query<StockpileEntry>(
      `SELECT province_id, resource, amount, capacity FROM province_stockpiles ${w} ORDER BY province_id, resource`,
      w.params
    );
    return rows;
  }

  async putStockpile(entry: StockpileEntry): Promise<void> {
    await this.c.query(
      `INSERT INTO province_stockpiles (province_id, resource, amount, capacity) VALUES ($1, $2, $3, $4)
       ON CONFLICT (province_id, resource) DO UPDATE SET amount = EXCLUDED.amount, capacity = EXCLUDED.capacity`,
      [entry.province_id, entry.resource, entry.amount, entry.capacity]
    );
  }

  async sumReserved(provinceId: string, resource: string): Promise<number> {
    const { rows } = await this.c.query<{ total: number }>(
      "SELECT COALESCE(SUM(amount), 0)::float8 AS total FROM province_reservations WHERE province_id = $1 AND resource = $2",
      [provinceId, resource]
    );
    return rows[0]?.total ?? 0;
  }

  async listReservations(filter: { build_id?: number; province_ids?: string[] } = {}): Promise<ReservationRow[]> {
    const w = new Where().eq("build_id", filter.build_id).anyOf("province_id", filter.province_ids);
    const { rows } = await this.c.query<ReservationRow>(
      `SELECT build_id, province_id, resource, amount FROM province_reservations ${w} ORDER BY build_id, province_id, resource`,
      w.params
    );
    return rows;
  }

  async insertReservation(row: ReservationRow): Promise<void> {
    await this.c.query(
      `INSERT INTO province_reservations (build_id, province_id, resource, amount) VALUES ($1, $2, $3, $4)
       ON CONFLICT (build_id, province_id, resource) DO UPDATE SET amount = province_reservations.amount + EXCLUDED.amount`,
      [row.build_id, row.province_id, row.resource, row.amount]
    );
  }

  async deleteReservations(buildId: number): Promise<number> {
    const res = await this.c.query("DELETE FROM province_reservations WHERE build_id = $1", [buildId]);
    return res.rowCount ?? 0;
  }

  async insertBuild(row: Omit<PendingBuild, "build_id">): Promise<PendingBuild> {
    const { rows } = await this.c.query<PendingBuild>(
      `INSERT INTO state_builds (nation_id, state_id, building_id, tier, cash_paid, started_turn, complete_turn, status, province_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9) RETURNING ${BUILD_COLS}`,
      [row.nation_id, row.state_id, row.building_id, row.tier, row.cash_paid, row.started_turn, row.complete_turn, row.status, row.province_id]
    );
    return firstRow(rows, "state_builds");
  }

  async getBuild(buildId: number): Promise<PendingBuild | null> {
    const { rows } = await this.c.query<PendingBuild>(`SELECT ${BUILD_COLS} FROM state_builds WHERE build_id = $1 FOR UPDATE`, [buildId]);
    return rows[0] ?? null;
  }

  async updateBuild(buildId: number, patch: Partial<Pick<PendingBuild, "status" | "province_id">>): Promise<void> {
    await this.c.query(
      `UPDATE state_builds SET status = COALESCE($2, status), province_id = COALESCE($3, province_id) WHERE build_id = $1`,
      [buildId, patch.status ?? null, patch.province_id ?? null]
    );
  }

  async listBuilds(filter: { nation_id?: string; status?: BuildStatus; due_by?: number } = {}): Promise<PendingBuild[]> {
    const w = new Where().eq("nation_id", filter.nation_id).eq("status", filter.status).cmp("complete_turn", "<=", filter.due_by);
    const { rows } = await this.c.query<PendingBuild>(
      `SELECT ${BUILD_COLS} FROM state_builds ${w} ORDER BY complete_turn, build_id`,
      w.params
    );
    return rows;
  }

  async getInstalled(provinceId: string, buildingId: string, tier: number): Promise<InstalledBuilding | null> {
    const { rows } = await this.c.query<InstalledBuilding>(
      `SELECT province_id, building_id, tier, count FROM province_buildings
       WHERE province_id = $1 AND building_id = $2 AND tier = $3 FOR UPDATE`,
      [provinceId, buildingId, tier]
    );
    return rows[0] ?? null;
  }

  async putInstalled(row: InstalledBuilding): Promise<void> {
    await this.c.query(
      `INSERT INTO province_buildings (province_id, building_id, tier, count) VALUES ($1, $2, $3, $4)
       ON CONFLICT (province_id, building_id, tier) DO UPDATE SET count = EXCLUDED.count`,
      [row.province_id, row.building_id, row.tier, row.count]
    );
  }

  async deleteInstalled(provinceId: string, buildingId: string, tier: number): Promise<void> {
    await this.c.query("DELETE FROM province_buildings WHERE province_id = $1 AND building_id = $2 AND tier = $3", [
      provinceId,
      buildingId,
      tier
    ]);
  }

  async listInstalled(filter: { province_ids?: string[] } = {}): Promise<InstalledBuilding[]> {
    const w = new Where().anyOf("province_id", filter.province_ids);
    const { rows } = await this.c.query<InstalledBuilding>(
      `SELECT province_id, building_id, tier, count FROM province_buildings ${w} ORDER BY province_id, building_id, tier`,
      w.params
    );
    return rows;
  }

  async insertMarketPost(row: Omit<MarketPost, "post_id">): Promise<MarketPost> {
    const { rows } = await this.c.query<MarketPost>(
      `INSERT INTO market_posts (poster_nation, resource, quantity, price_per_unit, is_sell, transport_mode, escrow_cash, created_turn)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8) RETURNING ${POST_COLS}`,
      [row.poster_nation, row.resource, row.quantity, row.price_per_unit, row.is_sell, row.transport_mode, row.escrow_cash, row.created_turn]
    );
    return firstRow(rows, "market_posts");
  }

  async getMarketPost(postId: number): Promise<MarketPost | null> {
    const { rows } = await this.c.query<MarketPost>(`SELECT ${POST_COLS} FROM market_posts WHERE post_id = $1 FOR UPDATE`, [postId]);
    return rows[0] ?? null;
  }

  async deleteMarketPost(postId: number): Promise<void> {
    await this.c.query("DELETE FROM market_posts WHERE post_id = $1", [postId]);
  }

  async listMarketPosts(filter: { resource?: string; poster_nation?: string } = {}): Promise<MarketPost[]> {
    const w = new Where().eq("resource", filter.resource).eq("poster_nation", filter.poster_nation);
    const { rows } = await this.c.query<MarketPost>(`SELECT ${POST_COLS} FROM market_posts ${w} ORDER BY post_id`, w.params);
    return rows;
  }

  async insertOffer(row: Omit<TradeOffer, "offer_id">): Promise<TradeOffer> {
    const { rows } = await this.c.query<OfferRowRaw>(
      `INSERT INTO trade_offers
         (from_nation, to_nation, offered, requested, offered_cash, requested_cash, status, transport_mode, created_turn, from_market)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10) RETURNING ${OFFER_COLS}`,
      [
        row.from_nation,
        row.to_nation,
        JSON.stringify(row.offered),
        JSON.stringify(row.requested),
        row.offered_cash,
        row.requested_cash,
        row.status,
        row.transport_mode,
        row.created_turn,
        row.from_market
      ]
    );
    return toOffer(firstRow(rows, "trade_offers"));
  }

  async getOffer(offerId: number): Promise<TradeOffer | null> {
    const { rows } = await this.c.query<OfferRowRaw>(`SELECT ${OFFER_COLS} FROM trade_offers WHERE offer_id = $1 FOR UPDATE`, [offerId]);
    const row = rows[0];
    return row ? toOffer(row) : null;
  }

  async setOfferStatus(offerId: number, status: OfferStatus): Promise<void> {
    await this.c.query("UPDATE trade_offers SET status = $2 WHERE offer_id = $1", [offerId, status]);
  }

  async listOffers(filter: { nation_id?: string; status?: OfferStatus } = {}): Promise<TradeOffer[]> {
    const w = new Where().eq("status", filter.status);
    if (filter.nation_id !== undefined) {
      w.params.push(filter.nation_id);
      w.raw(`(from_nation = $${w.params.length} OR to_nation = $${w.params.length})`);
    }
    const { rows } = await this.c.query<OfferRowRaw>(`SELECT ${OFFER_COLS} FROM trade_offers ${w} ORDER BY offer_id`, w.params);
    return rows.map(toOffer);
  }

  async countOpenDirectOffers(fromNation: string): Promise<number> {
    const { rows } = await this.c.query<{ n: number }>(
      "SELECT COUNT(*)::int AS n FROM trade_offers WHERE from_nation = $1 AND status = 'open' AND from_market = false",
      [fromNation]
    );
    return rows[0]?.n ?? 0;
  }

  async insertTrade(row: Omit<TradeRecord, "trade_id">): Promise<TradeRecord> {
    const { rows } = await this.c.query<TradeRowRaw>(
      `INSERT INTO trades (offer_id, from_nation, to_nation, offered, requested, offered_cash, requested_cash, transport_cost, turn)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING trade_id, offer_id, from_nation, to_nation, offered, requested, offered_cash, requested_cash, transport_cost, turn`,
      [
        row.offer_id,
        row.from_nation,
        row.to_nation,
        JSON.stringify(row.offered),
        JSON.stringify(row.requested),
        row.offered_cash,
        row.requested_cash,
        row.transport_cost,
        row.turn
      ]
    );
    const raw = firstRow(rows, "trades");
    return { ...raw, offered: ResourceMap.parse(raw.offered), requested: ResourceMap.parse(raw.requested) };
  }

  async insertModifier(row: Omit<Modifier, "modifier_id">): Promise<Modifier> {
    const { rows } = await this.c.query<Modifier>(
      `INSERT INTO modifiers (scope, scope_id, effect, kind, value, source, created_turn, expires_turn, active)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9) RETURNING ${MODIFIER_COLS}`,
      [row.scope, row.scope_id, row.effect, row.kind, row.value, row.source, row.created_turn, row.expires_turn, row.active]
    );
    return firstRow(rows, "modifiers");
  }

  async deleteModifier(modifierId: number): Promise<boolean> {
    const res = await this.c.query("DELETE FROM modifiers WHERE modifier_id = $1", [modifierId]);
    return (res.rowCount ?? 0) > 0;
  }

  async listModifiers(filter: { active_only?: boolean } = {}): Promise<Modifier[]> {
    const w = new Where();
    if (filter.active_only) w.raw("active = true");
    const { rows } = await this.c.query<Modifier>(`SELECT ${MODIFIER_COLS} FROM modifiers ${w} ORDER BY modifier_id`, w.params);
    return rows;
  }

  async expireModifiers(turn: number): Promise<Modifier[]> {
    const { rows } = await this.c.query<Modifier>(
      `UPDATE modifiers SET active = false
       WHERE active = true AND expires_turn IS NOT NULL AND expires_turn < $1
       RETURNING ${MODIFIER_COLS}`,
      [turn]
    );
    return rows;
  }

  async insertRecruits(rows: Array<Omit<RecruitRow, "recruit_id">>): Promise<RecruitRow[]> {
    const out: RecruitRow[] = [];
    for (const row of rows) {
      const res = await this.c.query<RecruitRow>(
        `INSERT INTO recruits (nation_id, army_id, state_id, province_id, unit_template_id, manpower, created_turn, ready_turn, status)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9) RETURNING ${RECRUIT_COLS}`,
        [row.nation_id, row.army_id, row.state_id, row.province_id, row.unit_template_id, row.manpower, row.created_turn, row.ready_turn, row.status]
      );
      out.push(firstRow(res.rows, "recruits"));
    }
    return out;
  }

  async getRecruit(recruitId: number): Promise<RecruitRow | null> {
    const { rows } = await this.c.query<RecruitRow>(`SELECT ${RECRUIT_COLS} FROM recruits WHERE recruit_id = $1 FOR UPDATE`, [recruitId]);
    return rows[0] ?? null;
  }

  async deleteRecruit(recruitId: number): Promise<void> {
    await this.c.query("DELETE FROM recruits WHERE recruit_id = $1", [recruitId]);
  }

  async setRecruitStatus(recruitId: number, status: RecruitStatus): Promise<void> {
    await this.c.query("UPDATE recruits SET status = $2 WHERE recruit_id = $1", [recruitId, status]);
  }

  async listRecruits(
    filter: { nation_id?: string; state_id?: string; status?: RecruitStatus; ready_by?: number } = {}
  ): Promise<RecruitRow[]> {
    const w = new Where()
      .eq("nation_id", filter.nation_id)
      .eq("state_id", filter.state_id)
      .eq("status", filter.status)
      .cmp("ready_turn", "<=", filter.ready_by);
    const { rows } = await this.c.query<RecruitRow>(`SELECT ${RECRUIT_COLS} FROM recruits ${w} ORDER BY recruit_id`, w.params);
    return rows;
  }

  async insertArmy(row: Omit<ArmyRow, "army_id">): Promise<ArmyRow> {
    const { rows } = await this.c.query<ArmyRow>(
      `INSERT INTO armies (nation_id, name, state_id, created_turn) VALUES ($1, $2, $3, $4)
       RETURNING army_id, nation_id, name, state_id, created_turn`,
      [row.nation_id, row.name, row.state_id, row.created_turn]
    );
    return firstRow(rows, "armies");
  }

  async getArmy(armyId: number): Promise<ArmyRow | null> {
    const { rows } = await this.c.query<ArmyRow>(
      "SELECT army_id, nation_id, name, state_id, created_turn FROM armies WHERE army_id = $1",
      [armyId]
    );
    return rows[0] ?? null;
  }

  async listArmies(nationId: string): Promise<ArmyRow[]> {
    const { rows } = await this.c.query<ArmyRow>(
      "SELECT army_id, nation_id, name, state_id, created_turn FROM armies WHERE nation_id = $1 ORDER BY army_id",
      [nationId]
    );
    return rows;
  }

  async insertResearch(row: Omit<ResearchProject, "project_id">): Promise<ResearchProject> {
    const { rows } = await this.c.query<ResearchProject>(
      `INSERT INTO research_projects (nation_id, tech_id, started_turn, complete_turn, status)
       VALUES ($1, $2, $3, $4, $5) RETURNING ${RESEARCH_COLS}`,
      [row.nation_id, row.tech_id, row.started_turn, row.complete_turn, row.status]
    );
    return firstRow(rows, "research_projects");
  }

  async setResearchStatus(projectId: number, status: ResearchStatus): Promise<void> {
    await this.c.query("UPDATE research_projects SET status = $2 WHERE project_id = $1", [projectId, status]);
  }

  async listResearch(filter: { nation_id?: string; status?: ResearchStatus; due_by?: number } = {}): Promise<ResearchProject[]> {
    const w = new Where().eq("nation_id", filter.nation_id).eq("status", filter.status).cmp("complete_turn", "<=", filter.due_by);
    const { rows } = await this.c.query<ResearchProject>(
      `SELECT ${RESEARCH_COLS} FROM research_projects ${w} ORDER BY complete_turn, project_id`,
      w.params
    );
    return rows;
  }

  async appendEffects(effects: EconomyEffect[]): Promise<void> {
    for (const e of effects) {
      await this.c.query(
        "INSERT INTO economy_events (effect_type, nation_id, turn, delta, audit) VALUES ($1, $2, $3, $4, $5)",
        [e.effect_type, e.nation_id, e.turn, JSON.stringify(e.delta), JSON.stringify(e.audit)]
      );
    }
  }

  async listEffects(filter: { nation_id?: string; turn?: number; limit?: number } = {}): Promise<StoredEffect[]> {
    const w = new Where().eq("nation_id", filter.nation_id).eq("turn", filter.turn);
    w.params.push(filter.limit ?? 100);
    const { rows } = await this.c.query<Omit<StoredEffect, "delta" | "audit"> & { delta: unknown; audit: unknown }>(
      `SELECT event_id, effect_type, nation_id, turn, delta, audit FROM economy_events ${w}
       ORDER BY event_id DESC LIMIT $${w.params.length}`,
      w.params
    );
    return rows.map((r) => ({ ...r, delta: EffectDelta.parse(r.delta), audit: EffectAudit.parse(r.audit) }));
  }
}

function firstRow<T>(rows: T[], table: string): T {
  const row = rows[0];
  if (!row) throw new Error(`INSERT INTO ${table} returned no row`);
  return row;
}

export class PgLedgerStore implements LedgerStore {
  constructor(private readonly pool: pg.Pool) {}

  async transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    return withClient(this.pool, async (c) => {
      await c.query("BEGIN");
      try {
        const out = await fn(new PgLedgerTx(c));
        await c.query("COMMIT");
        return out;
      } catch (e) {
        await c.query("ROLLBACK");
        throw e;
      }
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
