import { importCast, loadCast } from "../cast/loadCast.js";
import { cfg } from "../config/env.js";
import { CueStore } from "../store/cueStore.js";
import { log } from "../utils/logger.js";
import { argString, parseArgs } from "./args.js";

/**
 * Seed a show file's profiles and ensembles from a YAML cast list.
 *
 * Usage:
 *   npx tsx src/tools/import-cast.ts --cast ./cast.yml --db ./mix/show.tmix
 */

function main(): void {
  log.configure({ ...cfg.logging, scopes: cfg.logging.scopes ?? [] });
  const args = parseArgs();
  const castPath = argString(args, "cast") ?? cfg.paths.cast;
  const dbPath = argString(args, "db") ?? cfg.paths.db;

  const cast = loadCast(castPath);
  const store = CueStore.open(dbPath);
  try {
    const counts = importCast(store, cast);
    console.log(`Imported ${counts.profiles} profiles and ${counts.ensembles} ensembles into ${dbPath}`);
  } finally {
    store.close();
  }
}

try {
  main();
} catch (err) {
  log.error(err instanceof Error ? err.message : String(err), "cast");
  process.exit(1);
}
