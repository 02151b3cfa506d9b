import { DEFAULT_LABEL_LENGTH, headingKeys } from "../script/characters.js";
import type { ScriptElement } from "../script/types.js";

/**
 * Does `character` speak within the next `window` dialogue blocks of `remaining`?
 *
 * A scene heading ends the search with false whatever the window. Each
 * character heading that does not name `character` uses up one block; once
 * `window` blocks are used the answer is false. With `skipFirst` the first
 * heading is passed over without being tested or counted.
 */
export function speaksWithin(
  remaining: readonly ScriptElement[],
  character: string,
  window = 7,
  skipFirst = false,
  labelLength: number = DEFAULT_LABEL_LENGTH,
): boolean {
  let blocks = 0;
  let firstSkipped = !skipFirst;

  for (const element of remaining) {
    if (blocks >= window) return false;
    if (element.kind === "SceneHeading") return false;
    if (element.kind !== "Character") continue;

    if (!firstSkipped) {
      firstSkipped = true;
      continue;
    }
    if (headingKeys(element.text, labelLength).includes(character)) return true;
    blocks += 1;
  }
  return false;
}

/**
 * Names on the first character heading of `remaining`, or an empty set when a
 * scene heading (or the end of the script) comes first.
 */
export function firstSpeakers(
  remaining: readonly ScriptElement[],
  labelLength: number = DEFAULT_LABEL_LENGTH,
): Set<string> {
  for (const element of remaining) {
    if (element.kind === "Character") return new Set(headingKeys(element.text, labelLength));
    if (element.kind === "SceneHeading") break;
  }
  return new Set();
}
