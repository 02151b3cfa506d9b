import { cfg, printConfigSnapshot } from "../config/env.js";
import { formatAnomaly, formatCueLine, runGenerateCues } from "../pipeline/generateCuesCore.js";
import { log } from "../utils/logger.js";
import { argFlag, argInt, argString, parseArgs } from "./args.js";

/**
 * Generate DCA mute/unmute cues from a Fountain script into a show file.
 *
 * Usage:
 *   npx tsx src/tools/generate-cues.ts --script ./scripts/show.fountain --db ./mix/show.tmix
 *   npx tsx src/tools/generate-cues.ts --dry-run --limit 20 --lookahead 5
 *
 * Flags:
 *   --script <file>    Fountain script (default: MIXCUE_SCRIPT_PATH)
 *   --db <file>        .tmix show file (default: MIXCUE_DB_PATH)
 *   --lookahead <n>    dialogue blocks to look ahead (default: DCA_LOOKAHEAD)
 *   --slots <n>        DCAs available, 1..12 (default: DCA_SLOT_COUNT)
 *   --preview <n>      dialogue characters in cue names (default: DCA_PREVIEW_LENGTH)
 *   --dry-run          print cues without writing them
 *   --append           number new cues after those already in the show file
 *   --json             print cues as JSON
 *   --limit <n>        print only the first n cues
 *   --print-config     print the resolved environment config first
 */

function main(): void {
  log.configure({ ...cfg.logging, scopes: cfg.logging.scopes ?? [] });
  const args = parseArgs();
  if (argFlag(args, "print-config")) printConfigSnapshot(cfg);

  const result = runGenerateCues({
    scriptPath: argString(args, "script") ?? cfg.paths.script,
    dbPath: argString(args, "db") ?? cfg.paths.db,
    options: {
      lookahead: argInt(args, "lookahead") ?? cfg.dca.lookahead,
      slotCount: argInt(args, "slots") ?? cfg.dca.slotCount,
      previewLength: argInt(args, "preview") ?? cfg.dca.previewLength,
      labelLength: cfg.dca.labelLength,
    },
    dryRun: argFlag(args, "dry-run"),
    append: argFlag(args, "append"),
  });

  const limit = argInt(args, "limit") ?? result.cues.length;
  const shown = result.cues.slice(0, limit);

  if (argFlag(args, "json")) {
    console.log(JSON.stringify({ cues: shown, anomalies: result.anomalies }, null, 2));
  } else {
    console.log(`Generated ${result.cues.length} DCA cues\n`);
    for (const cue of shown) console.log(formatCueLine(cue));
    if (shown.length < result.cues.length) console.log(`  ... ${result.cues.length - shown.length} more`);
    if (result.points.length > 0) console.log(`\nWrote ${result.points.length} cues`);
  }

  if (result.anomalies.length > 0) {
    console.warn(`\n${result.anomalies.length} DCA anomalies:`);
    for (const anomaly of result.anomalies) console.warn(`  ${formatAnomaly(anomaly)}`);
  }
}

try {
  main();
} catch (err) {
  log.error(err instanceof Error ? err.message : String(err), "boot");
  process.exit(1);
}
