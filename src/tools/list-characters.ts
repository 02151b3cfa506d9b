import fs from "node:fs";
import { cfg } from "../config/env.js";
import { listCharacters } from "../script/characters.js";
import { readScriptFile } from "../script/fountain.js";
import { CueStore } from "../store/cueStore.js";
import { log } from "../utils/logger.js";
import { argString, parseArgs } from "./args.js";

/**
 * List every speaker in a script with the channel the show file maps them to.
 * Useful for spotting characters that still need a profile or ensemble.
 *
 * Usage:
 *   npx tsx src/tools/list-characters.ts --script ./scripts/show.fountain [--db ./mix/show.tmix]
 */

function main(): void {
  log.configure({ ...cfg.logging, scopes: cfg.logging.scopes ?? [] });
  const args = parseArgs();
  const scriptPath = argString(args, "script") ?? cfg.paths.script;
  const dbPath = argString(args, "db") ?? cfg.paths.db;

  const characters = listCharacters(readScriptFile(scriptPath));

  let channels: ReadonlyMap<string, string> = new Map();
  if (fs.existsSync(dbPath)) {
    const store = CueStore.open(dbPath, { createSchema: false });
    try {
      channels = store.getCharacterChannels();
    } finally {
      store.close();
    }
  }

  const width = Math.max(0, ...characters.map((c) => c.length));
  for (const character of characters) {
    console.log(`${character.padEnd(width)}  ${channels.get(character) ?? "-"}`);
  }
  const unmapped = characters.filter((c) => !channels.has(c)).length;
  console.log(`\n${characters.length} characters, ${unmapped} without a channel`);
}

try {
  main();
} catch (err) {
  log.error(err instanceof Error ? err.message : String(err), "script");
  process.exit(1);
}
