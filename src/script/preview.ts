import type { ScriptElement } from "./types.js";

export const DEFAULT_PREVIEW_LENGTH = 40;
const ELLIPSIS = "...";

/** Leading snippet of the first dialogue line in `elements`. */
export function previewStart(
  elements: readonly ScriptElement[],
  length: number = DEFAULT_PREVIEW_LENGTH,
): string | undefined {
  const line = elements.find((e) => e.kind === "Dialogue")?.text;
  if (line === undefined) return undefined;
  return line.length > length ? line.slice(0, length) + ELLIPSIS : line;
}

/** Trailing snippet of the last dialogue line in `elements`. */
export function previewEnd(
  elements: readonly ScriptElement[],
  length: number = DEFAULT_PREVIEW_LENGTH,
): string | undefined {
  for (let i = elements.length - 1; i >= 0; i--) {
    const element = elements[i];
    if (element.kind !== "Dialogue") continue;
    const line = element.text;
    return line.length > length ? ELLIPSIS + line.slice(line.length - length) : line;
  }
  return undefined;
}
