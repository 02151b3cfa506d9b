import { describe, expect, test } from "vitest";
import { firstSpeakers, speaksWithin } from "../dca/lookahead.js";
import type { ScriptElement } from "../script/types.js";
import { block, ch, dl, scene } from "./scriptBuilders.js";

function othersThen(count: number, target: string): ScriptElement[] {
  const out: ScriptElement[] = [];
  for (let i = 0; i < count; i++) out.push(...block(i % 2 === 0 ? "JOJO" : "MAYOR"));
  out.push(...block(target));
  return out;
}

describe("speaksWithin", () => {
  test("true when window - 1 other blocks come first", () => {
    expect(speaksWithin(othersThen(6, "HORTON"), "Horton", 7)).toBe(true);
  });

  test("false when a full window of other blocks comes first", () => {
    expect(speaksWithin(othersThen(7, "HORTON"), "Horton", 7)).toBe(false);
  });

  test("the window is configurable", () => {
    expect(speaksWithin(othersThen(2, "HORTON"), "Horton", 3)).toBe(true);
    expect(speaksWithin(othersThen(3, "HORTON"), "Horton", 3)).toBe(false);
  });

  test("a scene heading ends liveness inside the window", () => {
    const remaining = [dl("still talking"), scene("EXT. WHOVILLE - NIGHT"), ...block("HORTON")];
    expect(speaksWithin(remaining, "Horton", 7)).toBe(false);
  });

  test("reaching the end of the script is false", () => {
    expect(speaksWithin([dl("last line"), ...block("JOJO")], "Horton", 7)).toBe(false);
    expect(speaksWithin([], "Horton", 7)).toBe(false);
  });

  test("matches any name on a shared or extended heading", () => {
    expect(speaksWithin(block("JOJO & HORTON"), "Horton")).toBe(true);
    expect(speaksWithin(block("HORTON (O.S.)"), "Horton")).toBe(true);
  });

  test("skipFirst passes over the first heading without testing it", () => {
    const remaining = [...block("HORTON"), ...block("JOJO")];
    expect(speaksWithin(remaining, "Horton", 7, false)).toBe(true);
    expect(speaksWithin(remaining, "Horton", 7, true)).toBe(false);
  });

  test("skipFirst does not spend a block of the window", () => {
    const remaining = [ch("JOJO"), ch("HORTON")];
    expect(speaksWithin(remaining, "Horton", 1, true)).toBe(true);
    expect(speaksWithin(remaining, "Horton", 1, false)).toBe(false);
  });

  test("compares truncated identities", () => {
    expect(speaksWithin(block("GENERAL GENGHIS KAHN SCHMITZ"), "General Geng")).toBe(true);
  });
});

describe("firstSpeakers", () => {
  test("names on the next heading", () => {
    const remaining = [dl("stray"), ch("JOJO & MAYOR"), dl("Hi"), ...block("HORTON")];
    expect(Array.from(firstSpeakers(remaining))).toEqual(["Jojo", "Mayor"]);
  });

  test("empty when a scene heading comes first", () => {
    expect(firstSpeakers([scene("INT. NOOL - DAY"), ...block("HORTON")]).size).toBe(0);
  });

  test("empty at the end of the script", () => {
    expect(firstSpeakers([dl("orphan line")]).size).toBe(0);
  });
});
