import { SCRIPT_ELEMENT_KINDS, type ScriptElement, type ScriptElementKind } from "./types.js";

function isElementKind(value: unknown): value is ScriptElementKind {
  return typeof value === "string" && SCRIPT_ELEMENT_KINDS.some((k) => k === value);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Reject a malformed element sequence before any cue is generated.
 * Throws on the first bad element; there is no partial recovery.
 */
export function assertScriptElements(input: unknown): ScriptElement[] {
  if (!Array.isArray(input)) {
    throw new Error(`Script must be an array of elements, got ${describe(input)}`);
  }

  const out: ScriptElement[] = [];
  input.forEach((item: unknown, index) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new Error(`Script element ${index} must be an object, got ${describe(item)}`);
    }
    const kind: unknown = Reflect.get(item, "kind");
    const text: unknown = Reflect.get(item, "text");
    if (!isElementKind(kind)) {
      throw new Error(
        `Script element ${index} has unknown kind ${JSON.stringify(kind)}. Allowed: ${SCRIPT_ELEMENT_KINDS.join(", ")}`,
      );
    }
    if (typeof text !== "string") {
      throw new Error(`Script element ${index} (${kind}) must have string text, got ${describe(text)}`);
    }
    out.push({ kind, text });
  });
  return out;
}
