import fs from "node:fs";
import path from "node:path";
import type { ScriptElement } from "./types.js";

/**
 * Minimal Fountain reader producing the four element kinds cue generation needs.
 *
 * Scene headings, character headings, dialogue and comments ([[notes]] and
 * /* boneyard *\/ blocks) are kept; action, transitions, centered text and the
 * title page are dropped.
 */

function isSceneHeadingLine(trimmed: string): boolean {
  if (/^\.[^.]/.test(trimmed)) return true;
  return /^(INT\.?\/EXT|INT|EXT|EST|I\/E)[.\s]/i.test(trimmed);
}

function sceneHeadingText(trimmed: string): string {
  return trimmed.startsWith(".") ? trimmed.slice(1).trim() : trimmed;
}

function isTransitionLine(trimmed: string): boolean {
  return trimmed.startsWith(">") || /^[A-Z\s]+TO:$/.test(trimmed);
}

function isCharacterLine(trimmed: string): boolean {
  if (trimmed.startsWith("@")) return trimmed.length > 1;
  if (isSceneHeadingLine(trimmed) || isTransitionLine(trimmed)) return false;
  // Extensions like "(cont'd)" may be lowercase; the name itself may not.
  const name = trimmed.replace(/\([^)]*\)/g, "").replace(/\^$/, "").trim();
  if (!/[A-Z]/.test(name)) return false;
  return !/[a-z]/.test(name);
}

function characterText(trimmed: string): string {
  const withoutForce = trimmed.startsWith("@") ? trimmed.slice(1) : trimmed;
  // "^" marks dual dialogue; the heading itself is unchanged.
  return withoutForce.replace(/\s*\^$/, "").trim();
}

function stripInlineNotes(text: string): string {
  return text.replace(/\[\[[\s\S]*?\]\]/g, "").replace(/\s+/g, " ").trim();
}

function skipTitlePage(lines: string[]): number {
  const first = (lines[0] ?? "").trim();
  if (!/^[A-Za-z][A-Za-z ]*:/.test(first)) return 0;
  let i = 0;
  while (i < lines.length && (lines[i] ?? "").trim() !== "") i += 1;
  return i;
}

export function parseFountain(sourceText: string): ScriptElement[] {
  const elements: ScriptElement[] = [];
  const lines = sourceText.replace(/\r\n?/g, "\n").split("\n");

  let i = skipTitlePage(lines);
  let prevBlank = true;

  while (i < lines.length) {
    const trimmed = (lines[i] ?? "").trim();
    i += 1;

    if (!trimmed) {
      prevBlank = true;
      continue;
    }

    // Comments do not break the blank-line context of what follows them.
    // Boneyard: everything between /* and */ is a comment, possibly across lines.
    if (trimmed.startsWith("/*")) {
      const parts: string[] = [trimmed.slice(2)];
      while (!parts[parts.length - 1].includes("*/") && i < lines.length) {
        parts.push((lines[i] ?? "").trim());
        i += 1;
      }
      const body = parts.join("\n").replace(/\*\/[\s\S]*$/, "").trim();
      if (body) elements.push({ kind: "Comment", text: body });
      continue;
    }

    // A note standing on its own line(s).
    if (trimmed.startsWith("[[")) {
      const parts: string[] = [trimmed.slice(2)];
      while (!parts[parts.length - 1].includes("]]") && i < lines.length) {
        parts.push((lines[i] ?? "").trim());
        i += 1;
      }
      const body = parts.join(" ").replace(/\]\][\s\S]*$/, "").trim();
      if (body) elements.push({ kind: "Comment", text: body });
      continue;
    }

    if (prevBlank && isSceneHeadingLine(trimmed)) {
      elements.push({ kind: "SceneHeading", text: sceneHeadingText(trimmed) });
      prevBlank = false;
      continue;
    }

    const next = (lines[i] ?? "").trim();
    if (prevBlank && next && isCharacterLine(trimmed)) {
      elements.push({ kind: "Character", text: characterText(trimmed) });

      // Dialogue block: contiguous non-empty lines; parentheticals are direction, not speech.
      const spoken: string[] = [];
      const flush = () => {
        const text = stripInlineNotes(spoken.join(" "));
        if (text) elements.push({ kind: "Dialogue", text });
        spoken.length = 0;
      };
      while (i < lines.length) {
        const line = (lines[i] ?? "").trim();
        // A note or boneyard line ends the speech and is read as a comment.
        if (!line || line.startsWith("[[") || line.startsWith("/*")) break;
        i += 1;
        if (/^\(.*\)$/.test(line)) {
          flush();
          continue;
        }
        spoken.push(line);
      }
      flush();
      prevBlank = false;
      continue;
    }

    // Action, transition or anything else the cue generator ignores.
    prevBlank = false;
  }

  return elements;
}

export function readScriptFile(filePath: string): ScriptElement[] {
  const abs = path.resolve(filePath);
  if (!fs.existsSync(abs)) throw new Error(`Script not found: ${abs}`);
  return parseFountain(fs.readFileSync(abs, "utf8"));
}
