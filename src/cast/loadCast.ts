import fs from "node:fs";
import path from "node:path";
import yaml from "yaml";
import type { CueStore } from "../store/cueStore.js";
import { log } from "../utils/logger.js";

const castLog = log.withScope("cast");

export type CastProfile = {
  name: string;
  channel: number;
  label?: string;
};

export type CastEnsemble = {
  name: string;
  channels: number[];
};

export type Cast = {
  version: number;
  profiles: CastProfile[];
  ensembles: CastEnsemble[];
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function requireName(entry: Record<string, unknown>, where: string): string {
  const name = entry.name;
  if (typeof name !== "string" || !name.trim()) throw new Error(`${where}: missing name`);
  return name.trim();
}

function requireChannel(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new Error(`${where}: channel must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return value;
}

function listOf(raw: Record<string, unknown>, key: string): unknown[] {
  const v = raw[key];
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v)) throw new Error(`Cast ${key} must be a list`);
  return v;
}

/**
 * Validate a parsed cast document. Hard fails on a missing name, a bad
 * channel or a name used twice (profiles and ensembles share one namespace).
 */
export function parseCast(raw: unknown): Cast {
  if (!isRecord(raw)) throw new Error("Cast file must be a mapping with profiles and/or ensembles");

  const seen = new Set<string>();
  const claim = (name: string, where: string) => {
    if (seen.has(name)) throw new Error(`${where}: duplicate name "${name}"`);
    seen.add(name);
  };

  const profiles = listOf(raw, "profiles").map((entry, i): CastProfile => {
    const where = `profiles[${i}]`;
    if (!isRecord(entry)) throw new Error(`${where}: expected a mapping`);
    const name = requireName(entry, where);
    claim(name, where);
    const label = entry.label;
    if (label !== undefined && typeof label !== "string") throw new Error(`${where}: label must be a string`);
    return label === undefined
      ? { name, channel: requireChannel(entry.channel, where) }
      : { name, channel: requireChannel(entry.channel, where), label };
  });

  const ensembles = listOf(raw, "ensembles").map((entry, i): CastEnsemble => {
    const where = `ensembles[${i}]`;
    if (!isRecord(entry)) throw new Error(`${where}: expected a mapping`);
    const name = requireName(entry, where);
    claim(name, where);
    const channels = entry.channels;
    if (!Array.isArray(channels) || channels.length === 0) {
      throw new Error(`${where}: channels must be a non-empty list`);
    }
    return { name, channels: channels.map((c: unknown, j) => requireChannel(c, `${where}.channels[${j}]`)) };
  });

  const version = raw.version;
  return { version: typeof version === "number" ? version : 1, profiles, ensembles };
}

export function loadCast(castPath: string): Cast {
  const abs = path.resolve(castPath);
  if (!fs.existsSync(abs)) throw new Error(`Cast file not found: ${abs}`);
  const cast = parseCast(yaml.parse(fs.readFileSync(abs, "utf-8")));
  castLog.debug(`loaded ${cast.profiles.length} profiles and ${cast.ensembles.length} ensembles from ${abs}`);
  return cast;
}

/** Write the cast's profiles and ensembles to the store in one transaction. */
export function importCast(store: CueStore, cast: Cast): { profiles: number; ensembles: number } {
  const write = store.db.transaction((c: Cast) => {
    for (const profile of c.profiles) store.addProfile(profile);
    for (const ensemble of c.ensembles) store.addEnsemble(ensemble);
  });
  write(cast);
  castLog.info(`imported ${cast.profiles.length} profiles and ${cast.ensembles.length} ensembles`);
  return { profiles: cast.profiles.length, ensembles: cast.ensembles.length };
}
