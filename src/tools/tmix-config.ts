import { cfg } from "../config/env.js";
import { CueStore } from "../store/cueStore.js";
import { log } from "../utils/logger.js";
import { argFlag, argString, parseArgs } from "./args.js";

/**
 * Read or change the key/value config table of a show file.
 *
 * Usage:
 *   npx tsx src/tools/tmix-config.ts --list
 *   npx tsx src/tools/tmix-config.ts --get consoleIP
 *   npx tsx src/tools/tmix-config.ts --set consoleIP --value 10.0.0.20
 */

function main(): void {
  log.configure({ ...cfg.logging, scopes: cfg.logging.scopes ?? [] });
  const args = parseArgs();
  const store = CueStore.open(argString(args, "db") ?? cfg.paths.db);

  try {
    const getKey = argString(args, "get");
    const setKey = argString(args, "set");

    if (setKey) {
      const value = argString(args, "value");
      if (value === undefined) throw new Error("--set needs --value");
      store.setConfig(setKey, value);
      console.log(`${setKey}=${value}`);
    } else if (getKey) {
      const value = store.getConfig(getKey);
      if (value === null) throw new Error(`No config value for ${getKey}`);
      console.log(value);
    } else if (argFlag(args, "list")) {
      for (const [param, value] of Object.entries(store.getAllConfig())) {
        console.log(`${param}=${value ?? ""}`);
      }
    } else {
      throw new Error("Nothing to do: pass --list, --get <key> or --set <key> --value <v>");
    }
  } finally {
    store.close();
  }
}

try {
  main();
} catch (err) {
  log.error(err instanceof Error ? err.message : String(err), "config");
  process.exit(1);
}
