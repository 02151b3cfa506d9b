import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import type { ChannelMap, DcaCue } from "../dca/types.js";
import { log } from "../utils/logger.js";
import { patchToColumns, rowToCue, slotsToColumns, type CueInput, type CuePatch, type CueRow, type StoredCue } from "./cueRows.js";

const storeLog = log.withScope("store");

const STORE_DIR = path.dirname(fileURLToPath(import.meta.url));
const POINT_STEP = 10;

let schemaSqlCache: string | null = null;
let defaultConfigCache: Record<string, string> | null = null;

export interface Profile {
  id: number;
  channel: number | null;
  name: string | null;
  label: string | null;
}

export interface Ensemble {
  id: number;
  name: string | null;
  /** Comma-joined member channels, e.g. "5,6,7". */
  channels: string | null;
}

export interface OpenStoreOptions {
  /** Create the tables when the file is new. */
  createSchema?: boolean;
  /** Seed the config table with defaults when the file is new. */
  initConfig?: boolean;
}

function getSchemaSql(): string {
  if (schemaSqlCache) return schemaSqlCache;
  schemaSqlCache = fs.readFileSync(path.join(STORE_DIR, "schema.sql"), "utf8");
  return schemaSqlCache;
}

export function getDefaultConfig(): Record<string, string> {
  if (defaultConfigCache) return { ...defaultConfigCache };
  const parsed: unknown = JSON.parse(fs.readFileSync(path.join(STORE_DIR, "defaultConfig.json"), "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("defaultConfig.json must be an object of string values");
  }
  const out: Record<string, string> = {};
  for (const [param, value] of Object.entries(parsed)) {
    if (typeof value !== "string") throw new Error(`defaultConfig.json: ${param} must be a string`);
    out[param] = value;
  }
  defaultConfigCache = out;
  return { ...out };
}

function isMemoryPath(dbPath: string): boolean {
  return dbPath === ":memory:";
}

function assertTestDbPathSafety(dbPath: string): void {
  if (process.env.NODE_ENV !== "test" || isMemoryPath(dbPath)) return;

  const resolvedDbPath = path.resolve(dbPath);
  const resolvedTmpRoot = path.resolve(os.tmpdir());
  const normalize = (value: string) => path.normalize(value).toLowerCase();

  if (!normalize(resolvedDbPath).startsWith(normalize(resolvedTmpRoot + path.sep))) {
    throw new Error(
      `[store-test-safety] Refusing non-temp DB path in test mode: ${resolvedDbPath}. Expected under ${resolvedTmpRoot}`,
    );
  }
}

/**
 * Cue, profile, ensemble and config access over a TheatreMix show file.
 */
export class CueStore {
  private constructor(
    readonly db: Database.Database,
    readonly dbPath: string,
  ) {}

  static open(dbPath: string, options: OpenStoreOptions = {}): CueStore {
    const createSchema = options.createSchema ?? true;
    const initConfig = options.initConfig ?? true;

    assertTestDbPathSafety(dbPath);
    const isNew = isMemoryPath(dbPath) || !fs.existsSync(dbPath);
    if (!isMemoryPath(dbPath)) fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });

    const db = new Database(dbPath);
    const store = new CueStore(db, dbPath);

    if (createSchema && isNew) {
      db.exec(getSchemaSql());
      if (initConfig) store.seedConfig();
      storeLog.info(`created show file ${isMemoryPath(dbPath) ? dbPath : path.resolve(dbPath)}`);
    }
    return store;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private seedConfig(): void {
    const insert = this.db.prepare<[string, string]>("INSERT OR IGNORE INTO config (param, value) VALUES (?, ?)");
    const seed = this.db.transaction((entries: Array<[string, string]>) => {
      for (const [param, value] of entries) insert.run(param, value);
    });
    seed(Object.entries(getDefaultConfig()));
  }

  // ── cues ────────────────────────────────────────────────────────────

  /** Next cue number and point: one past the highest number, ten past the highest point. */
  getNextCueNumber(): { number: number; point: number } {
    const row = this.db
      .prepare<[], { maxNumber: number | null; maxPoint: number | null }>(
        "SELECT MAX(number) AS maxNumber, MAX(point) AS maxPoint FROM cues",
      )
      .get();
    return {
      number: (row?.maxNumber ?? 0) + 1,
      point: (row?.maxPoint ?? 0) + POINT_STEP,
    };
  }

  /** Insert a cue and return the point it was stored at. */
  addCue(input: CueInput): number {
    const next = input.number === undefined || input.point === undefined ? this.getNextCueNumber() : null;
    const values: CueRow = {
      number: input.number ?? next?.number ?? 1,
      point: input.point ?? next?.point ?? POINT_STEP,
      name: input.name,
      colour: input.colour ?? 0,
      qLabCue: input.qLabCue ?? null,
      channelFX: input.channelFX ?? null,
      fxMutes: input.fxMutes ?? null,
      snippets: input.snippets ?? null,
      ...slotsToColumns(input.slots),
    };
    const columns = Object.keys(values);
    this.db
      .prepare<[CueRow]>(`INSERT INTO cues (${columns.join(", ")}) VALUES (${columns.map((c) => `@${c}`).join(", ")})`)
      .run(values);

    const point = Number(values.point);
    storeLog.debug(`added cue ${values.number} at point ${point}`, { name: input.name });
    return point;
  }

  /** Insert several cues in one transaction; nothing is written if any insert fails. */
  addCues(inputs: readonly CueInput[]): number[] {
    const insertAll = this.db.transaction((batch: readonly CueInput[]) => batch.map((input) => this.addCue(input)));
    return insertAll(inputs);
  }

  getCue(point: number): StoredCue | null {
    const row = this.db.prepare<[number], CueRow>("SELECT * FROM cues WHERE point = ? LIMIT 1").get(point);
    return row ? rowToCue(row) : null;
  }

  getAllCues(): StoredCue[] {
    return this.db.prepare<[], CueRow>("SELECT * FROM cues ORDER BY point, number").all().map(rowToCue);
  }

  /** Returns false when no cue sits at `point`. */
  updateCue(point: number, patch: CuePatch): boolean {
    const values = patchToColumns(patch);
    const columns = Object.keys(values);
    if (columns.length === 0) return this.getCue(point) !== null;

    const result = this.db
      .prepare<[CueRow]>(`UPDATE cues SET ${columns.map((c) => `${c} = @${c}`).join(", ")} WHERE point = @wherePoint`)
      .run({ ...values, wherePoint: point });
    return result.changes > 0;
  }

  deleteCue(point: number): boolean {
    return this.db.prepare<[number]>("DELETE FROM cues WHERE point = ?").run(point).changes > 0;
  }

  // ── profiles & ensembles ────────────────────────────────────────────

  getProfiles(): Profile[] {
    return this.db
      .prepare<[], Profile>("SELECT id, channel, name, label FROM profiles ORDER BY channel, id")
      .all();
  }

  getProfileByName(name: string): Profile | null {
    return (
      this.db
        .prepare<[string], Profile>("SELECT id, channel, name, label FROM profiles WHERE name = ? LIMIT 1")
        .get(name) ?? null
    );
  }

  getChannelForCharacter(character: string): number | null {
    return this.getProfileByName(character)?.channel ?? null;
  }

  addProfile(profile: { name: string; channel: number; label?: string | null }): number {
    const result = this.db
      .prepare<[string, number, string | null]>("INSERT INTO profiles (name, channel, label) VALUES (?, ?, ?)")
      .run(profile.name, profile.channel, profile.label ?? null);
    return Number(result.lastInsertRowid);
  }

  getEnsembles(): Ensemble[] {
    return this.db.prepare<[], Ensemble>("SELECT id, name, channels FROM ensembles ORDER BY id").all();
  }

  addEnsemble(ensemble: { name: string; channels: readonly number[] }): number {
    const result = this.db
      .prepare<[string, string]>("INSERT INTO ensembles (name, channels) VALUES (?, ?)")
      .run(ensemble.name, ensemble.channels.join(","));
    return Number(result.lastInsertRowid);
  }

  /**
   * Name -> channel list for every profile (a single channel) and every
   * ensemble (comma-joined member channels). An ensemble shadows a profile of
   * the same name. Rows without a name or channel are skipped.
   */
  getCharacterChannels(): ChannelMap {
    const channels = new Map<string, string>();
    for (const profile of this.getProfiles()) {
      if (profile.name === null || profile.channel === null) continue;
      channels.set(profile.name, String(profile.channel));
    }
    for (const ensemble of this.getEnsembles()) {
      if (ensemble.name === null || ensemble.channels === null) continue;
      channels.set(ensemble.name, ensemble.channels);
    }
    storeLog.debug(`loaded ${channels.size} character channel mappings`);
    return channels;
  }

  // ── config ──────────────────────────────────────────────────────────

  getConfig(param: string): string | null {
    const row = this.db.prepare<[string], { value: string | null }>("SELECT value FROM config WHERE param = ?").get(param);
    return row?.value ?? null;
  }

  setConfig(param: string, value: string): void {
    this.db
      .prepare<[string, string]>(
        "INSERT INTO config (param, value) VALUES (?, ?) ON CONFLICT(param) DO UPDATE SET value = excluded.value",
      )
      .run(param, value);
  }

  getAllConfig(): Record<string, string | null> {
    const out: Record<string, string | null> = {};
    for (const row of this.db.prepare<[], { param: string; value: string | null }>("SELECT param, value FROM config ORDER BY param").all()) {
      out[row.param] = row.value;
    }
    return out;
  }
}

/**
 * Write generated cues to the store, which assigns their points. With
 * `renumber` the cue numbers continue after the store's highest number.
 * Throws (and writes nothing) if any insert fails; the cue list is not touched.
 */
export function persistCues(store: CueStore, cues: readonly DcaCue[], options: { renumber?: boolean } = {}): number[] {
  const offset = options.renumber ? store.getNextCueNumber().number - 1 : 0;
  const points = store.addCues(
    cues.map((cue) => ({
      number: cue.number + offset,
      name: cue.name,
      colour: cue.colour,
      slots: cue.slots,
    })),
  );
  storeLog.info(`persisted ${points.length} cues to ${store.dbPath}`);
  return points;
}
