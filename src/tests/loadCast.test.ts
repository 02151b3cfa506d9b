import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { importCast, loadCast, parseCast } from "../cast/loadCast.js";
import { CueStore } from "../store/cueStore.js";

const CAST_YAML = `version: 1
profiles:
  - name: Horton
    channel: 1
  - name: Jojo
    channel: 2
    label: JoJo
ensembles:
  - name: Whos
    channels: [5, 6, 7]
`;

describe("parseCast", () => {
  test("accepts profiles and ensembles", () => {
    expect(
      parseCast({
        profiles: [{ name: " Horton ", channel: 1 }, { name: "Jojo", channel: 2, label: "JoJo" }],
        ensembles: [{ name: "Whos", channels: [5, 6, 7] }],
      }),
    ).toEqual({
      version: 1,
      profiles: [
        { name: "Horton", channel: 1 },
        { name: "Jojo", channel: 2, label: "JoJo" },
      ],
      ensembles: [{ name: "Whos", channels: [5, 6, 7] }],
    });
  });

  test("either list may be left out", () => {
    expect(parseCast({ version: 2, ensembles: [{ name: "Whos", channels: [5] }] })).toEqual({
      version: 2,
      profiles: [],
      ensembles: [{ name: "Whos", channels: [5] }],
    });
  });

  test("rejects malformed entries with their position", () => {
    expect(() => parseCast(["Horton"])).toThrow("Cast file must be a mapping with profiles and/or ensembles");
    expect(() => parseCast({ profiles: "Horton" })).toThrow("Cast profiles must be a list");
    expect(() => parseCast({ profiles: [{ channel: 1 }] })).toThrow("profiles[0]: missing name");
    expect(() => parseCast({ profiles: [{ name: "Horton", channel: 0 }] })).toThrow(
      "profiles[0]: channel must be a positive integer, got 0",
    );
    expect(() => parseCast({ ensembles: [{ name: "Whos", channels: [] }] })).toThrow(
      "ensembles[0]: channels must be a non-empty list",
    );
    expect(() => parseCast({ ensembles: [{ name: "Whos", channels: [5, "six"] }] })).toThrow(
      'ensembles[0].channels[1]: channel must be a positive integer, got "six"',
    );
  });

  test("profiles and ensembles share one namespace", () => {
    expect(() =>
      parseCast({ profiles: [{ name: "Whos", channel: 9 }], ensembles: [{ name: "Whos", channels: [5] }] }),
    ).toThrow('ensembles[0]: duplicate name "Whos"');
  });
});

describe("loadCast and importCast", () => {
  test("loads a YAML cast file into a show file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mixcue-cast-"));
    const store = CueStore.open(":memory:");
    try {
      const castPath = path.join(dir, "cast.yml");
      fs.writeFileSync(castPath, CAST_YAML);

      const cast = loadCast(castPath);
      expect(importCast(store, cast)).toEqual({ profiles: 2, ensembles: 1 });
      expect(store.getProfiles().map((p) => [p.channel, p.name, p.label])).toEqual([
        [1, "Horton", null],
        [2, "Jojo", "JoJo"],
      ]);
      expect(Array.from(store.getCharacterChannels().entries())).toEqual([
        ["Horton", "1"],
        ["Jojo", "2"],
        ["Whos", "5,6,7"],
      ]);
    } finally {
      store.close();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test("fails on a missing cast file", () => {
    expect(() => loadCast(path.join(os.tmpdir(), "mixcue-missing", "cast.yml"))).toThrow(/^Cast file not found: /);
  });
});
