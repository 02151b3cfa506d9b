import { DCA_COUNT, type DcaSlot } from "../dca/types.js";

/** A raw row of the cues table. */
export type CueRow = Record<string, string | number | null>;

export interface StoredCue {
  number: number;
  point: number;
  name: string | null;
  colour: number | null;
  qLabCue: string | null;
  channelFX: string | null;
  fxMutes: string | null;
  snippets: string | null;
  /** Index 0 is DCA 1. */
  slots: DcaSlot[];
}

export interface CueInput {
  name: string;
  slots?: readonly DcaSlot[];
  colour?: number | null;
  qLabCue?: string | null;
  channelFX?: string | null;
  fxMutes?: string | null;
  snippets?: string | null;
  /** Allocated by the store when omitted. */
  number?: number;
  point?: number;
}

export type CuePatch = Partial<Omit<StoredCue, "point">>;

const TEXT_FIELDS = ["name", "qLabCue", "channelFX", "fxMutes", "snippets"] as const;

function pad(dca: number): string {
  return String(dca).padStart(2, "0");
}

export function channelsColumn(dca: number): string {
  return `dca${pad(dca)}Channels`;
}

export function labelColumn(dca: number): string {
  return `dca${pad(dca)}Label`;
}

function text(row: CueRow, column: string): string | null {
  const v = row[column];
  if (v === null || v === undefined) return null;
  return String(v);
}

function int(row: CueRow, column: string): number | null {
  const v = row[column];
  if (v === null || v === undefined) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

export function rowToCue(row: CueRow): StoredCue {
  return {
    number: int(row, "number") ?? 0,
    point: int(row, "point") ?? 0,
    name: text(row, "name"),
    colour: int(row, "colour"),
    qLabCue: text(row, "qLabCue"),
    channelFX: text(row, "channelFX"),
    fxMutes: text(row, "fxMutes"),
    snippets: text(row, "snippets"),
    slots: Array.from({ length: DCA_COUNT }, (_, i) => ({
      channels: text(row, channelsColumn(i + 1)),
      label: text(row, labelColumn(i + 1)),
    })),
  };
}

/** Column values for the slots of a snapshot; slots beyond the array are written empty. */
export function slotsToColumns(slots: readonly DcaSlot[] | undefined): CueRow {
  const out: CueRow = {};
  if (slots && slots.length > DCA_COUNT) {
    throw new Error(`A cue carries at most ${DCA_COUNT} DCAs, got ${slots.length}`);
  }
  for (let i = 0; i < DCA_COUNT; i++) {
    const slot = slots?.[i];
    out[channelsColumn(i + 1)] = slot?.channels ?? null;
    out[labelColumn(i + 1)] = slot?.label ?? null;
  }
  return out;
}

/** Column values for the fields a patch sets; absent fields are left out. */
export function patchToColumns(patch: CuePatch): CueRow {
  const out: CueRow = {};
  if (patch.number !== undefined) out.number = patch.number;
  if (patch.colour !== undefined) out.colour = patch.colour;
  for (const field of TEXT_FIELDS) {
    const v = patch[field];
    if (v !== undefined) out[field] = v;
  }
  if (patch.slots !== undefined) Object.assign(out, slotsToColumns(patch.slots));
  return out;
}
