export const SCRIPT_ELEMENT_KINDS = ["SceneHeading", "Character", "Dialogue", "Comment"] as const;

export type ScriptElementKind = (typeof SCRIPT_ELEMENT_KINDS)[number];

export interface ScriptElement {
  kind: ScriptElementKind;
  text: string;
}

/** The parsed script, read-only for everything downstream of the reader. */
export type Script = readonly ScriptElement[];
