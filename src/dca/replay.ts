import type { DcaCue, DcaSlot } from "./types.js";

/** Label -> DCA number for every labelled slot of a snapshot. */
export function assignmentOf(slots: readonly DcaSlot[]): Map<string, number> {
  const assignment = new Map<string, number>();
  slots.forEach((slot, i) => {
    if (slot.label !== null && !assignment.has(slot.label)) assignment.set(slot.label, i + 1);
  });
  return assignment;
}

/**
 * Replays a cue list from an empty console and returns, for each cue, the
 * label -> DCA assignment the console holds after firing it. Because every cue
 * is a full snapshot this equals `assignmentOf(cue.slots)`; the replay also
 * checks that each cue's changes agree with the state left by the previous one.
 */
export function replayCues(cues: readonly DcaCue[]): Map<string, number>[] {
  const states: Map<string, number>[] = [];
  let previous = new Map<string, number>();

  for (const cue of cues) {
    const next = assignmentOf(cue.slots);
    for (const name of cue.unmuted) {
      if (!next.has(name)) {
        throw new Error(`Cue ${cue.number} unmutes ${name} but no DCA carries that label`);
      }
    }
    for (const name of cue.muted) {
      if (!previous.has(name)) {
        throw new Error(`Cue ${cue.number} mutes ${name} which was not unmuted`);
      }
    }
    states.push(next);
    previous = next;
  }
  return states;
}

/** Labels bound to more than one DCA in a single cue. */
export function findSlotConflicts(cue: DcaCue): string[] {
  const seen = new Map<string, number>();
  for (const slot of cue.slots) {
    if (slot.label === null) continue;
    seen.set(slot.label, (seen.get(slot.label) ?? 0) + 1);
  }
  return Array.from(seen.entries())
    .filter(([, count]) => count > 1)
    .map(([label]) => label)
    .sort();
}
