import type { ScriptElement } from "./types.js";

export const DEFAULT_LABEL_LENGTH = 12;

const PARENTHETICAL_RE = /\([^)]*\)/g;
const HEADING_SEPARATOR = " & ";

/**
 * Title-case the way screenplay cues expect: a letter that follows a
 * non-letter is upper-cased, every other letter lower-cased.
 * "MR. MAYOR" -> "Mr. Mayor", "JOJO'S MOM" -> "Jojo'S Mom".
 */
export function titleCase(raw: string): string {
  return raw.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, pre: string, ch: string) => pre + ch.toUpperCase());
}

/**
 * Clean and split a character heading into speaker names, in speaking order.
 *
 * Parentheticals such as "(V.O.)" are removed and shared headings are split on
 * " & ". A piece that already contains lowercase letters ("Dr. Seuss") is kept
 * as written; an all-caps piece is title-cased.
 */
export function splitCharacters(raw: string): string[] {
  return raw
    .replace(PARENTHETICAL_RE, "")
    .split(HEADING_SEPARATOR)
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0)
    .map((piece) => (/[a-z]/.test(piece) ? piece : titleCase(piece)));
}

/**
 * The identity a character is tracked under: the name cut to the console's
 * label width. Two names sharing the same leading `labelLength` characters
 * collapse into one identity.
 */
export function characterKey(name: string, labelLength: number = DEFAULT_LABEL_LENGTH): string {
  return name.trim().slice(0, labelLength);
}

export function headingKeys(raw: string, labelLength: number = DEFAULT_LABEL_LENGTH): string[] {
  return splitCharacters(raw).map((name) => characterKey(name, labelLength));
}

/** Every distinct speaker name in the script, sorted. */
export function listCharacters(elements: readonly ScriptElement[]): string[] {
  const names = new Set<string>();
  for (const element of elements) {
    if (element.kind !== "Character") continue;
    for (const name of splitCharacters(element.text)) {
      names.add(name);
    }
  }
  return Array.from(names).sort();
}
