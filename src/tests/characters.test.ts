import { describe, expect, test } from "vitest";
import { characterKey, listCharacters, splitCharacters, titleCase } from "../script/characters.js";
import { ch, dl, scene } from "./scriptBuilders.js";

describe("splitCharacters", () => {
  test("title-cases an all-caps heading", () => {
    expect(splitCharacters("HORTON")).toEqual(["Horton"]);
    expect(splitCharacters("SOUR KANGAROO")).toEqual(["Sour Kangaroo"]);
  });

  test("drops parenthetical extensions", () => {
    expect(splitCharacters("HORTON (V.O.)")).toEqual(["Horton"]);
    expect(splitCharacters("MR. MAYOR (CONT'D) & MRS. MAYOR")).toEqual(["Mr. Mayor", "Mrs. Mayor"]);
  });

  test("splits shared headings in speaking order", () => {
    expect(splitCharacters("JOJO & MAYOR")).toEqual(["Jojo", "Mayor"]);
    expect(splitCharacters("WHOS & HORTON & JOJO")).toEqual(["Whos", "Horton", "Jojo"]);
  });

  test("keeps a name that already has lowercase letters", () => {
    expect(splitCharacters("Dr. Seuss & SOUR KANGAROO")).toEqual(["Dr. Seuss", "Sour Kangaroo"]);
    expect(splitCharacters("McDUFF")).toEqual(["McDUFF"]);
  });

  test("only splits on a spaced ampersand", () => {
    expect(splitCharacters("JOJO&MAYOR")).toEqual(["Jojo&Mayor"]);
  });

  test("empty heading yields no names", () => {
    expect(splitCharacters("")).toEqual([]);
    expect(splitCharacters("(beat)")).toEqual([]);
  });
});

test("titleCase capitalises after any non-letter", () => {
  expect(titleCase("MR. MAYOR")).toBe("Mr. Mayor");
  expect(titleCase("JOJO'S MOM")).toBe("Jojo'S Mom");
  expect(titleCase("WHO-BOY 2ND")).toBe("Who-Boy 2Nd");
});

describe("characterKey", () => {
  test("cuts names to the label width", () => {
    expect(characterKey("Cat In The Hat Junior")).toBe("Cat In The H");
    expect(characterKey("Horton")).toBe("Horton");
    expect(characterKey("Horton", 3)).toBe("Hor");
  });

  // Known lossy behaviour: distinct long names collapse into one identity.
  test("long names sharing a 12-character prefix collide", () => {
    expect(characterKey("General Genghis Kahn Schmitz")).toBe("General Geng");
    expect(characterKey("General Genghis Mayor")).toBe("General Geng");
  });
});

test("listCharacters returns each speaker once, sorted", () => {
  const elements = [
    scene("INT. JUNGLE - DAY"),
    ch("JOJO & MAYOR"),
    dl("We are here!"),
    ch("HORTON"),
    dl("I hear you."),
    ch("MAYOR (O.S.)"),
    dl("Again!"),
  ];
  expect(listCharacters(elements)).toEqual(["Horton", "Jojo", "Mayor"]);
});
