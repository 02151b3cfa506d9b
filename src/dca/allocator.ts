import { characterKey, splitCharacters } from "../script/characters.js";
import { parsePageMarker } from "../script/pages.js";
import { previewEnd, previewStart } from "../script/preview.js";
import type { ScriptElement } from "../script/types.js";
import { assertScriptElements } from "../script/validate.js";
import { log } from "../utils/logger.js";
import { firstSpeakers, speaksWithin } from "./lookahead.js";
import { emptySnapshot, freezeSnapshot, SlotPool } from "./slots.js";
import {
  DEFAULT_DCA_OPTIONS,
  type ChannelMap,
  type CueTrigger,
  type DcaAnomaly,
  type DcaCue,
  type DcaOptions,
  type DcaRunResult,
  type DcaSlot,
} from "./types.js";

const dcaLog = log.withScope("dca");

/** Fallback DCA when the pool is exhausted. */
const OVERFLOW_DCA = 1;

function requirePositiveInt(name: keyof DcaOptions, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`DCA option ${name} must be a positive integer, got ${value}`);
  }
}

export function resolveDcaOptions(overrides: Partial<DcaOptions> = {}): DcaOptions {
  const options: DcaOptions = {
    lookahead: overrides.lookahead ?? DEFAULT_DCA_OPTIONS.lookahead,
    slotCount: overrides.slotCount ?? DEFAULT_DCA_OPTIONS.slotCount,
    previewLength: overrides.previewLength ?? DEFAULT_DCA_OPTIONS.previewLength,
    labelLength: overrides.labelLength ?? DEFAULT_DCA_OPTIONS.labelLength,
  };
  requirePositiveInt("lookahead", options.lookahead);
  requirePositiveInt("slotCount", options.slotCount);
  requirePositiveInt("previewLength", options.previewLength);
  requirePositiveInt("labelLength", options.labelLength);
  return options;
}

/**
 * Walks a script once and emits the DCA cues that unmute each character just
 * before they speak and mute them once they fall idle.
 *
 * A character stays unmuted while they speak again within `lookahead` dialogue
 * blocks. A scene heading mutes everyone except whoever speaks first in the
 * new scene. Every cue carries the full twelve-slot snapshot.
 *
 * State is per instance: construct one allocator per run.
 */
export class DcaAllocator {
  readonly options: DcaOptions;

  private readonly pool: SlotPool;
  // Unmuted characters and their DCA; insertion order is unmute order.
  private readonly active = new Map<string, number>();
  private readonly snapshot: DcaSlot[] = emptySnapshot();
  private readonly cues: DcaCue[] = [];
  private readonly anomalies: DcaAnomaly[] = [];
  private page = 0;
  private cueNumber = 1;
  private consumed = false;

  constructor(
    private readonly channels: ChannelMap,
    options: Partial<DcaOptions> = {},
  ) {
    this.options = resolveDcaOptions(options);
    this.pool = new SlotPool(this.options.slotCount);
  }

  run(input: readonly ScriptElement[]): DcaRunResult {
    if (this.consumed) {
      throw new Error("DcaAllocator.run() may only be called once; construct a new allocator per run");
    }
    this.consumed = true;

    const elements = assertScriptElements(input);

    elements.forEach((element, index) => {
      switch (element.kind) {
        case "Comment": {
          const page = parsePageMarker(element.text);
          if (page !== null) this.page = page;
          break;
        }
        case "SceneHeading":
          this.onSceneHeading(elements, index);
          break;
        case "Character":
          this.onCharacter(elements, index);
          break;
        case "Dialogue":
          break;
      }
    });

    dcaLog.debug("DCA pass complete", {
      elements: elements.length,
      cues: this.cues.length,
      anomalies: this.anomalies.length,
      stillActive: Array.from(this.active.keys()),
    });

    return { cues: [...this.cues], anomalies: [...this.anomalies] };
  }

  /** Scene boundary: mute everyone who is not the first speaker of the new scene. */
  private onSceneHeading(elements: ScriptElement[], index: number): void {
    const first = firstSpeakers(elements.slice(index + 1), this.options.labelLength);
    const toMute = Array.from(this.active.keys()).filter((name) => !first.has(name));
    if (toMute.length === 0) return;

    const muted = [...toMute].sort();
    const preview = previewEnd(elements.slice(0, index), this.options.previewLength);
    const name = `p${this.page} -${muted.join(", ")}- Scene Change${preview !== undefined ? ` - ${preview}` : ""}`;

    for (const character of toMute) this.mute(character);
    this.emit({ name, trigger: "scene", elementIndex: index, unmuted: [], muted });
  }

  /** Character heading: unmute the speakers, mute whoever will not speak again soon. */
  private onCharacter(elements: ScriptElement[], index: number): void {
    const { labelLength, lookahead, previewLength } = this.options;
    const fullNames = splitCharacters(elements[index].text);
    const currentlySpeaking = new Set(fullNames.map((n) => characterKey(n, labelLength)));
    const remaining = elements.slice(index + 1);

    const toUnmute: string[] = [];
    const channelNames = new Map<string, string>();
    for (const fullName of fullNames) {
      const character = characterKey(fullName, labelLength);
      if (this.active.has(character)) continue;
      const dca = this.pool.take() ?? this.overflow(character, index);
      this.active.set(character, dca);
      toUnmute.push(character);
      channelNames.set(character, fullName);
    }

    const toMute: string[] = [];
    for (const character of this.active.keys()) {
      if (currentlySpeaking.has(character)) continue;
      if (!speaksWithin(remaining, character, lookahead, false, labelLength)) {
        toMute.push(character);
      }
    }

    if (toUnmute.length === 0 && toMute.length === 0) return;

    const tokens = [
      toUnmute.map((c) => `+${c}`).join(", "),
      toMute.map((c) => `-${c}`).join(", "),
    ].filter((t) => t.length > 0);
    const preview = previewStart(remaining, previewLength);
    const name = `p${this.page} ${tokens.join(" ")}${preview !== undefined ? `: "${preview}"` : ""}`;

    for (const character of toUnmute) this.unmute(character, channelNames.get(character) ?? character);
    for (const character of toMute) this.mute(character);
    this.emit({ name, trigger: "character", elementIndex: index, unmuted: toUnmute, muted: toMute });
  }

  private overflow(character: string, index: number): number {
    const anomaly: DcaAnomaly = {
      kind: "slot-exhausted",
      cueNumber: this.cueNumber,
      character,
      slot: OVERFLOW_DCA,
      page: this.page,
      elementIndex: index,
    };
    this.anomalies.push(anomaly);
    dcaLog.warn(
      `All ${this.options.slotCount} DCAs in use; forcing ${character} onto DCA ${OVERFLOW_DCA}. Consider a shorter lookahead or more DCAs.`,
      anomaly,
    );
    return OVERFLOW_DCA;
  }

  /** `fullName` is the untruncated heading name the channel map is keyed by. */
  private unmute(character: string, fullName: string): void {
    const dca = this.active.get(character);
    if (dca === undefined) return;
    const current = this.snapshot[dca - 1];
    // Unmapped characters still get a label so the console shows who is up.
    this.snapshot[dca - 1] = {
      // An empty mapping counts as unmapped.
      channels: this.channels.get(fullName) || this.channels.get(character) || current.channels,
      label: character,
    };
  }

  private mute(character: string): void {
    const dca = this.active.get(character);
    if (dca === undefined) return;
    this.snapshot[dca - 1] = { channels: null, label: null };
    this.pool.release(dca);
    this.active.delete(character);
  }

  private emit(change: {
    name: string;
    trigger: CueTrigger;
    elementIndex: number;
    unmuted: string[];
    muted: string[];
  }): void {
    const cue: DcaCue = Object.freeze({
      number: this.cueNumber,
      point: 0,
      name: change.name,
      colour: 0,
      page: this.page,
      trigger: change.trigger,
      elementIndex: change.elementIndex,
      unmuted: Object.freeze([...change.unmuted]),
      muted: Object.freeze([...change.muted]),
      slots: freezeSnapshot(this.snapshot),
    });
    this.cues.push(cue);
    this.cueNumber += 1;
    dcaLog.debug(`cue ${cue.number}: ${cue.name}`);
  }
}

export function generateDcaCues(
  elements: readonly ScriptElement[],
  channels: ChannelMap,
  options: Partial<DcaOptions> = {},
): DcaRunResult {
  return new DcaAllocator(channels, options).run(elements);
}
