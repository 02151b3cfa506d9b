/** Number of DCA slots the console (and the cue table) carries. */
export const DCA_COUNT = 12;

/** Character or ensemble name -> channel list ("7", or "5,6,7" for an ensemble). */
export type ChannelMap = ReadonlyMap<string, string>;

export interface DcaSlot {
  readonly channels: string | null;
  readonly label: string | null;
}

export type CueTrigger = "scene" | "character";

/** One emitted cue: a complete snapshot of all DCA slots, never a diff. */
export interface DcaCue {
  readonly number: number;
  /** Provisional ordering; the cue store assigns the final point. */
  readonly point: number;
  readonly name: string;
  readonly colour: number;
  readonly page: number;
  readonly trigger: CueTrigger;
  /** Index of the scene or character heading that produced the cue. */
  readonly elementIndex: number;
  readonly unmuted: readonly string[];
  readonly muted: readonly string[];
  /** Index 0 is DCA 1. Always DCA_COUNT entries. */
  readonly slots: readonly DcaSlot[];
}

export interface DcaOptions {
  /** Dialogue blocks to look ahead before muting an idle character. */
  lookahead: number;
  /** DCAs 1..slotCount are available for assignment. */
  slotCount: number;
  /** Characters of dialogue quoted in cue names. */
  previewLength: number;
  /** Console label width; character identities are cut to this length. */
  labelLength: number;
}

export const DEFAULT_DCA_OPTIONS: Readonly<DcaOptions> = Object.freeze({
  lookahead: 7,
  slotCount: DCA_COUNT,
  previewLength: 30,
  labelLength: 12,
});

export interface SlotExhaustedAnomaly {
  kind: "slot-exhausted";
  cueNumber: number;
  character: string;
  slot: number;
  page: number;
  elementIndex: number;
}

export type DcaAnomaly = SlotExhaustedAnomaly;

export interface DcaRunResult {
  cues: DcaCue[];
  anomalies: DcaAnomaly[];
}
