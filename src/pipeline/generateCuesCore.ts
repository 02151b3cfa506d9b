import fs from "node:fs";
import path from "node:path";
import { generateDcaCues } from "../dca/allocator.js";
import type { DcaAnomaly, DcaCue, DcaOptions } from "../dca/types.js";
import { readScriptFile } from "../script/fountain.js";
import { CueStore, persistCues } from "../store/cueStore.js";
import { log } from "../utils/logger.js";

const bootLog = log.withScope("boot");

export interface GenerateCuesArgs {
  scriptPath: string;
  dbPath: string;
  options: Partial<DcaOptions>;
  /** Generate and report without writing to the show file. */
  dryRun: boolean;
  /** Continue cue numbers after those already in the show file. */
  append: boolean;
}

export interface GenerateCuesResult {
  cues: DcaCue[];
  anomalies: DcaAnomaly[];
  /** Points the store assigned, empty on a dry run. */
  points: number[];
}

/**
 * Script file + show file in, cues out. Channel mappings are read once
 * before the pass; cues are written only after the whole list is built.
 */
export function runGenerateCues(args: GenerateCuesArgs): GenerateCuesResult {
  const elements = readScriptFile(args.scriptPath);
  bootLog.info(`read ${elements.length} script elements from ${args.scriptPath}`);

  const dbPath = path.resolve(args.dbPath);
  if (!fs.existsSync(dbPath)) throw new Error(`Show file not found: ${dbPath}`);
  const store = CueStore.open(dbPath, { createSchema: false, initConfig: false });
  try {
    const channels = store.getCharacterChannels();
    const { cues, anomalies } = generateDcaCues(elements, channels, args.options);
    bootLog.info(`generated ${cues.length} DCA cues`, { anomalies: anomalies.length });

    if (args.dryRun) return { cues, anomalies, points: [] };
    const points = persistCues(store, cues, { renumber: args.append });
    return { cues, anomalies, points };
  } finally {
    store.close();
  }
}

/** One line per cue: number, name and the labelled DCAs. */
export function formatCueLine(cue: DcaCue): string {
  const slots = cue.slots
    .map((slot, i) => (slot.label === null ? null : `${i + 1}=${slot.label}${slot.channels ? `[${slot.channels}]` : ""}`))
    .filter((s): s is string => s !== null);
  return `${String(cue.number).padStart(4)}  ${cue.name}${slots.length > 0 ? `  | ${slots.join(" ")}` : ""}`;
}

export function formatAnomaly(anomaly: DcaAnomaly): string {
  return `cue ${anomaly.cueNumber} (p${anomaly.page}): no free DCA for ${anomaly.character}, forced onto DCA ${anomaly.slot}`;
}
