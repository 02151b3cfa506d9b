export { DcaAllocator, generateDcaCues, resolveDcaOptions } from "./dca/allocator.js";
export { firstSpeakers, speaksWithin } from "./dca/lookahead.js";
export { assignmentOf, findSlotConflicts, replayCues } from "./dca/replay.js";
export { SlotPool } from "./dca/slots.js";
export { DCA_COUNT, DEFAULT_DCA_OPTIONS } from "./dca/types.js";
export type {
  ChannelMap,
  CueTrigger,
  DcaAnomaly,
  DcaCue,
  DcaOptions,
  DcaRunResult,
  DcaSlot,
  SlotExhaustedAnomaly,
} from "./dca/types.js";

export { characterKey, headingKeys, listCharacters, splitCharacters, titleCase } from "./script/characters.js";
export { parseFountain, readScriptFile } from "./script/fountain.js";
export { parsePageMarker } from "./script/pages.js";
export { previewEnd, previewStart } from "./script/preview.js";
export { assertScriptElements } from "./script/validate.js";
export { SCRIPT_ELEMENT_KINDS } from "./script/types.js";
export type { Script, ScriptElement, ScriptElementKind } from "./script/types.js";

export { CueStore, getDefaultConfig, persistCues } from "./store/cueStore.js";
export type { Ensemble, OpenStoreOptions, Profile } from "./store/cueStore.js";
export type { CueInput, CuePatch, StoredCue } from "./store/cueRows.js";

export { importCast, loadCast, parseCast } from "./cast/loadCast.js";
export type { Cast, CastEnsemble, CastProfile } from "./cast/loadCast.js";
